import { DEFAULT_FORMAT } from "./constants.mjs";
import { MissingCodeMarkerError, MissingCommentaryMarkerError } from "./errors.mjs";
import type { CommentaryFormat, MarkerRegion } from "./types.mjs";

type MarkerFormat = Pick<CommentaryFormat, "commentaryMarker" | "codeMarker">;

interface ScannedLine {
  text: string;
  offset: number;
}

function scanLines(source: string): ScannedLine[] {
  const lines: ScannedLine[] = [];
  let offset = 0;
  for (const text of source.split("\n")) {
    lines.push({ text, offset });
    offset += text.length + 1;
  }
  return lines;
}

function matchesMarker(line: ScannedLine, marker: string): boolean {
  return line.text.replace(/\r$/, "") === marker;
}

function isBlank(line: ScannedLine): boolean {
  return line.text.trim() === "";
}

/**
 * Finds the commentary region: everything after the Commentary marker line and
 * the blank separator line following it, if any, up to the end of the line
 * before the Code marker. Offsets never include a line's `\r`.
 */
export function locateRegion(
  source: string,
  format: MarkerFormat = DEFAULT_FORMAT,
  file?: string
): MarkerRegion {
  const lines = scanLines(source);

  const commentaryIndex = lines.findIndex((line) => matchesMarker(line, format.commentaryMarker));
  const commentaryLine = lines[commentaryIndex];
  if (!commentaryLine) {
    throw new MissingCommentaryMarkerError(format.commentaryMarker, file);
  }

  let codeIndex = -1;
  for (let index = commentaryIndex + 1; index < lines.length; index += 1) {
    const line = lines[index];
    if (line && matchesMarker(line, format.codeMarker)) {
      codeIndex = index;
      break;
    }
  }
  const codeLine = lines[codeIndex];
  if (!codeLine) {
    throw new MissingCodeMarkerError(format.codeMarker, file);
  }

  const lineEnding = commentaryLine.text.endsWith("\r") ? "\r\n" : "\n";
  const next = lines[commentaryIndex + 1];
  const separated = next !== undefined && commentaryIndex + 1 < codeIndex && isBlank(next);
  const firstIndex = commentaryIndex + (separated ? 2 : 1);
  const firstLine = lines[firstIndex];
  const lastLine = lines[codeIndex - 1];

  if (!firstLine || !lastLine || firstIndex > codeIndex - 1) {
    return {
      source,
      start: codeLine.offset,
      end: codeLine.offset,
      empty: true,
      separated,
      lineEnding
    };
  }

  return {
    source,
    start: firstLine.offset,
    end: lastLine.offset + lastLine.text.replace(/\r$/, "").length,
    empty: false,
    separated,
    lineEnding
  };
}

/** The region's text with `\n` line endings. */
export function regionText(region: MarkerRegion): string {
  return region.source.slice(region.start, region.end).replace(/\r\n/g, "\n");
}

/** Splices `text` into the region, written with the target's own line endings. */
export function replaceRegion(region: MarkerRegion, text: string): string {
  const eol = region.lineEnding;
  const before = region.source.slice(0, region.start);
  const after = region.source.slice(region.end);
  const body = text.split("\n").join(eol);
  const separator = region.separated ? "" : eol;
  if (!region.empty) {
    return `${before}${separator}${body}${after}`;
  }
  return `${before}${separator}${body}${eol}${after}`;
}
