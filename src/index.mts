import { assertCommentary, buildDiffReport, checkCommentary, createScratchIdentity } from "./checker.mjs";
import { discoverConfigPath, loadCommentaryConfig, parseCommentaryConfig, resolveFormat } from "./config.mjs";
import {
  checkCommentaryFile,
  openSession,
  previewCommentaryFile,
  synchronizeCommentaryFile,
  verifyCommentaryFile
} from "./core.mjs";
import { findTitleHeading, inferTargetName, loadSourceDocument, parseSourceDocument } from "./document.mjs";
import { locateRegion, regionText, replaceRegion } from "./region.mjs";
import { renderCommentary } from "./renderer.mjs";
import { DEFAULT_STRATEGIES, findProjectRoot, resolveTargetFile } from "./resolver.mjs";
import { previewCommentary, updateCommentary } from "./update.mjs";

export * from "./errors.mjs";
export { DEFAULT_FORMAT } from "./constants.mjs";
export type * from "./types.mjs";
export type { SessionOptions, CommentarySession } from "./core.mjs";

export {
  assertCommentary,
  buildDiffReport,
  checkCommentary,
  checkCommentaryFile,
  createScratchIdentity,
  DEFAULT_STRATEGIES,
  discoverConfigPath,
  findProjectRoot,
  findTitleHeading,
  inferTargetName,
  loadCommentaryConfig,
  loadSourceDocument,
  locateRegion,
  openSession,
  parseCommentaryConfig,
  parseSourceDocument,
  previewCommentary,
  previewCommentaryFile,
  regionText,
  renderCommentary,
  replaceRegion,
  resolveFormat,
  resolveTargetFile,
  synchronizeCommentaryFile,
  updateCommentary,
  verifyCommentaryFile
};
