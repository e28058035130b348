import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { DEFAULT_FORMAT } from "./constants.mjs";
import { getLogger } from "./logger.mjs";
import { locateRegion, replaceRegion } from "./region.mjs";
import { renderCommentary } from "./renderer.mjs";
import type { CommentaryFormat, RenderedBlock, SourceDocument } from "./types.mjs";

export interface UpdateOptions {
  format?: CommentaryFormat;
}

export interface CommentaryPreview {
  rendered: RenderedBlock;
  content: string;
}

function spliceCommentary(
  document: SourceDocument,
  source: string,
  targetPath: string,
  format: CommentaryFormat
): CommentaryPreview {
  const rendered = renderCommentary(document, format);
  const region = locateRegion(source, format, targetPath);
  return {
    rendered,
    content: replaceRegion(region, rendered.text)
  };
}

export function previewCommentary(
  document: SourceDocument,
  targetPath: string,
  options: UpdateOptions = {}
): CommentaryPreview {
  return spliceCommentary(document, fs.readFileSync(targetPath, "utf8"), targetPath, options.format ?? DEFAULT_FORMAT);
}

/** Replaces the file through a sibling temp file and a rename. */
export function writeFileAtomic(filePath: string, content: string): void {
  const mode = fs.statSync(filePath, { throwIfNoEntry: false })?.mode;
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(4).toString("hex")}.tmp`
  );

  try {
    fs.writeFileSync(tempPath, content, "utf8");
    if (mode !== undefined) {
      fs.chmodSync(tempPath, mode & 0o777);
    }
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

export function updateCommentary(
  document: SourceDocument,
  targetPath: string,
  options: UpdateOptions = {}
): void {
  const logger = getLogger("update");
  const original = fs.readFileSync(targetPath, "utf8");
  const { content } = spliceCommentary(document, original, targetPath, options.format ?? DEFAULT_FORMAT);

  if (content === original) {
    logger.debug("commentary already up to date", { targetPath });
    return;
  }

  writeFileAtomic(targetPath, content);
  logger.info("updated commentary", { targetPath, source: document.label });
}
