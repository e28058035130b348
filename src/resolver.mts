import fs from "node:fs";
import path from "node:path";
import { CANDIDATE_DIRECTORIES, DEFAULT_FORMAT } from "./constants.mjs";
import { extractTitleToken, withExtension } from "./document.mjs";
import { NoTargetFileFoundError } from "./errors.mjs";
import { getLogger } from "./logger.mjs";
import type {
  CommentaryFormat,
  ResolutionContext,
  ResolutionStrategy,
  ResolvedTarget,
  SourceDocument
} from "./types.mjs";

export function expandCandidates(projectRoot: string, name: string): string[] {
  if (path.isAbsolute(name)) {
    return [name];
  }
  return CANDIDATE_DIRECTORIES.map((directory) => path.resolve(projectRoot, directory, name));
}

function isRegularFile(candidate: string): boolean {
  return fs.statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
}

export const explicitPathStrategy: ResolutionStrategy = {
  name: "explicit",
  exclusive: true,
  candidates: ({ explicitPath, cwd, projectRoot }) => {
    if (!explicitPath) {
      return [];
    }
    if (path.isAbsolute(explicitPath)) {
      return [explicitPath];
    }
    const verbatim = path.resolve(cwd, explicitPath);
    return isRegularFile(verbatim) ? [verbatim] : expandCandidates(projectRoot, explicitPath);
  }
};

export const userHintStrategy: ResolutionStrategy = {
  name: "hint",
  candidates: ({ userHint, projectRoot }) => (userHint ? expandCandidates(projectRoot, userHint) : [])
};

export const overrideStrategy: ResolutionStrategy = {
  name: "override",
  candidates: ({ override, projectRoot }) => (override ? expandCandidates(projectRoot, override) : [])
};

export const projectNameStrategy: ResolutionStrategy = {
  name: "project-name",
  candidates: ({ projectRoot, format }) => {
    const name = path.basename(path.resolve(projectRoot));
    return name ? expandCandidates(projectRoot, withExtension(name, format.extension)) : [];
  }
};

export const documentTitleStrategy: ResolutionStrategy = {
  name: "document-title",
  candidates: ({ document, projectRoot, format }) => {
    const token = extractTitleToken(document);
    return token ? expandCandidates(projectRoot, withExtension(token, format.extension)) : [];
  }
};

export const DEFAULT_STRATEGIES: readonly ResolutionStrategy[] = [
  explicitPathStrategy,
  userHintStrategy,
  overrideStrategy,
  projectNameStrategy,
  documentTitleStrategy
];

export function findProjectRoot(startPath: string): string {
  const start = path.resolve(startPath);
  let current = start;

  for (;;) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
}

export interface ResolveOptions {
  explicitPath?: string;
  userHint?: string;
  /** Configured target file; a missing file falls through to later strategies. */
  override?: string;
  projectRoot?: string;
  cwd?: string;
  format?: CommentaryFormat;
  strategies?: readonly ResolutionStrategy[];
}

export function resolveTargetFile(document: SourceDocument, options: ResolveOptions = {}): ResolvedTarget {
  const logger = getLogger("resolver");
  const cwd = options.cwd ?? process.cwd();
  const documentDir = document.path ? path.dirname(document.path) : cwd;

  const context: ResolutionContext = {
    document,
    cwd,
    projectRoot: options.projectRoot ? path.resolve(cwd, options.projectRoot) : findProjectRoot(documentDir),
    format: options.format ?? DEFAULT_FORMAT,
    explicitPath: options.explicitPath,
    userHint: options.userHint,
    override: options.override
  };

  const probed: string[] = [];
  for (const strategy of options.strategies ?? DEFAULT_STRATEGIES) {
    const candidates = strategy.candidates(context);
    logger.debug("trying strategy", { strategy: strategy.name, candidates });

    for (const candidate of candidates) {
      probed.push(candidate);
      if (isRegularFile(candidate)) {
        logger.debug("resolved target", { strategy: strategy.name, path: candidate });
        return { path: candidate, strategy: strategy.name };
      }
    }

    if (strategy.exclusive && candidates.length > 0) {
      logger.debug("stopping after exclusive strategy", { strategy: strategy.name });
      break;
    }
  }

  throw new NoTargetFileFoundError(probed, document.path ?? document.label);
}
