import { randomBytes } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createTwoFilesPatch } from "diff";
import { DEFAULT_FORMAT } from "./constants.mjs";
import { ExportFailureError, GenerationFailureError, MismatchError } from "./errors.mjs";
import { getLogger } from "./logger.mjs";
import { locateRegion, regionText } from "./region.mjs";
import { renderCommentary } from "./renderer.mjs";
import type {
  CheckResult,
  CommentaryFormat,
  RenderedBlock,
  ScratchIdentity,
  SourceDocument,
  SubstitutionRule
} from "./types.mjs";

export interface CheckOptions {
  format?: CommentaryFormat;
  scratch?: ScratchIdentity;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function createScratchIdentity(targetPath: string): ScratchIdentity {
  const token = randomBytes(6).toString("hex");
  return {
    targetFile: path.join(os.tmpdir(), `commentary-${token}`, path.basename(targetPath)),
    exportBuffer: `*commentary-export-${token}*`
  };
}

export function reportSubstitutions(
  scratch: ScratchIdentity,
  labels: { target: string; source: string }
): SubstitutionRule[] {
  return [
    { pattern: /^=+\n/gm, replacement: "" },
    { pattern: /^\\ No newline at end of file\n/gm, replacement: "" },
    { pattern: new RegExp(escapeRegExp(scratch.targetFile), "g"), replacement: labels.target },
    { pattern: new RegExp(escapeRegExp(scratch.exportBuffer), "g"), replacement: `<exported from ${labels.source}>` }
  ];
}

export function applySubstitutions(text: string, rules: readonly SubstitutionRule[]): string {
  return rules.reduce((result, rule) => result.replace(rule.pattern, () => rule.replacement), text);
}

export function buildDiffReport(
  current: string,
  expected: string,
  scratch: ScratchIdentity,
  labels: { target: string; source: string }
): string {
  const patch = createTwoFilesPatch(scratch.targetFile, scratch.exportBuffer, `${current}\n`, `${expected}\n`);
  return applySubstitutions(patch, reportSubstitutions(scratch, labels));
}

function renderForCheck(document: SourceDocument, format: CommentaryFormat): RenderedBlock {
  try {
    return renderCommentary(document, format);
  } catch (error) {
    if (error instanceof ExportFailureError) {
      throw new GenerationFailureError(error.file, error);
    }
    throw error;
  }
}

export function checkCommentary(
  document: SourceDocument,
  targetPath: string,
  options: CheckOptions = {}
): CheckResult {
  const format = options.format ?? DEFAULT_FORMAT;
  const rendered = renderForCheck(document, format);
  const region = locateRegion(fs.readFileSync(targetPath, "utf8"), format, targetPath);
  const current = regionText(region);

  if (current === rendered.text) {
    getLogger("checker").debug("commentary matches", { targetPath });
    return { status: "match", targetPath };
  }

  const report = buildDiffReport(current, rendered.text, options.scratch ?? createScratchIdentity(targetPath), {
    target: path.basename(targetPath),
    source: document.label
  });
  return { status: "mismatch", targetPath, report };
}

export function assertCommentary(
  document: SourceDocument,
  targetPath: string,
  options: CheckOptions = {}
): void {
  const result = checkCommentary(document, targetPath, options);
  if (result.status === "mismatch") {
    throw new MismatchError(result.report, targetPath);
  }
}
