import type { CommentaryFormat } from "./types.mjs";

export const DEFAULT_SOURCE = "README.md";

export const DEFAULT_FORMAT: CommentaryFormat = Object.freeze({
  commentaryMarker: ";;; Commentary:",
  codeMarker: ";;; Code:",
  commentPrefix: ";;",
  extension: ".el",
  fillColumn: 75,
  codeQuotes: ["`", "'"] as const
});

export const CANDIDATE_DIRECTORIES = [".", "lisp", "src"];

export const DISCOVERABLE_CONFIG_FILES = [
  ".commentary.yaml",
  ".commentary.yml"
];
