import path from "node:path";
import { assertCommentary, checkCommentary } from "./checker.mjs";
import { discoverConfigPath, loadCommentaryConfig, resolveFormat } from "./config.mjs";
import { DEFAULT_SOURCE } from "./constants.mjs";
import { loadSourceDocument } from "./document.mjs";
import { getLogger } from "./logger.mjs";
import { findProjectRoot, resolveTargetFile } from "./resolver.mjs";
import type { CheckResult, CommentaryFormat, ResolvedTarget, SourceDocument } from "./types.mjs";
import { previewCommentary, updateCommentary, type CommentaryPreview } from "./update.mjs";

export interface SessionOptions {
  /** Markdown source; defaults to the configured source, then README.md. */
  source?: string;
  targetHint?: string;
  explicitTarget?: string;
  projectRoot?: string;
  configPath?: string;
  cwd?: string;
}

export interface CommentarySession {
  document: SourceDocument;
  target: ResolvedTarget;
  format: CommentaryFormat;
  projectRoot: string;
  configPath: string | null;
}

export function openSession(options: SessionOptions = {}): CommentarySession {
  const cwd = options.cwd ?? process.cwd();
  const startDirectory = options.source ? path.dirname(path.resolve(cwd, options.source)) : cwd;
  const configPath = discoverConfigPath(startDirectory, options.configPath, cwd);
  const config = loadCommentaryConfig(configPath, cwd);

  const sourcePath = options.source
    ? path.resolve(cwd, options.source)
    : config.source && configPath
      ? path.resolve(path.dirname(configPath), config.source)
      : path.resolve(cwd, DEFAULT_SOURCE);

  const document = loadSourceDocument(sourcePath);
  const format = resolveFormat(config.format);
  const projectRoot = options.projectRoot
    ? path.resolve(cwd, options.projectRoot)
    : findProjectRoot(path.dirname(sourcePath));

  const target = resolveTargetFile(document, {
    explicitPath: options.explicitTarget,
    userHint: options.targetHint,
    override: config.target,
    projectRoot,
    cwd,
    format
  });

  getLogger("session").debug("session opened", {
    source: sourcePath,
    target: target.path,
    strategy: target.strategy,
    configPath
  });

  return { document, target, format, projectRoot, configPath };
}

export function checkCommentaryFile(options: SessionOptions = {}): CheckResult {
  const session = openSession(options);
  return checkCommentary(session.document, session.target.path, { format: session.format });
}

/** Like `checkCommentaryFile`, but a stale block raises `MismatchError`. */
export function verifyCommentaryFile(options: SessionOptions = {}): string {
  const session = openSession(options);
  assertCommentary(session.document, session.target.path, { format: session.format });
  return session.target.path;
}

export function synchronizeCommentaryFile(options: SessionOptions = {}): string {
  const session = openSession(options);
  updateCommentary(session.document, session.target.path, { format: session.format });
  return session.target.path;
}

export function previewCommentaryFile(options: SessionOptions = {}): CommentaryPreview & { targetPath: string } {
  const session = openSession(options);
  return {
    ...previewCommentary(session.document, session.target.path, { format: session.format }),
    targetPath: session.target.path
  };
}
