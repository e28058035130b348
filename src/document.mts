import fs from "node:fs";
import path from "node:path";
import type { Heading } from "mdast";
import { toString } from "mdast-util-to-string";
import { remark } from "remark";
import remarkGfm from "remark-gfm";
import { EmptyDocumentError, SourceNotFoundError } from "./errors.mjs";
import type { SourceDocument } from "./types.mjs";

const markdownParser = remark().use(remarkGfm);

export function parseSourceDocument(
  markdown: string,
  options: { label?: string; path?: string | null } = {}
): SourceDocument {
  const sourcePath = options.path ?? null;
  return {
    root: markdownParser.parse(markdown),
    label: options.label ?? (sourcePath ? path.basename(sourcePath) : "<buffer>"),
    path: sourcePath
  };
}

export function loadSourceDocument(sourcePath: string): SourceDocument {
  const absolutePath = path.resolve(sourcePath);
  if (!fs.existsSync(absolutePath) || !fs.statSync(absolutePath).isFile()) {
    throw new SourceNotFoundError(absolutePath);
  }
  return parseSourceDocument(fs.readFileSync(absolutePath, "utf8"), { path: absolutePath });
}

export function findTitleHeading(document: SourceDocument): Heading | null {
  for (const node of document.root.children) {
    if (node.type === "heading") {
      return node;
    }
  }
  return null;
}

const NAME_TOKEN = /[\p{L}\p{N}][\p{L}\p{N}_+.-]*/u;

/** Name token of the title heading, without extension handling. */
export function extractTitleToken(document: SourceDocument): string | null {
  const heading = findTitleHeading(document);
  if (!heading) {
    return null;
  }
  const match = NAME_TOKEN.exec(toString(heading));
  const token = match ? match[0].replace(/\.+$/, "") : "";
  return token || null;
}

export function withExtension(name: string, extension: string): string {
  return name.endsWith(extension) ? name : `${name}${extension}`;
}

export function inferTargetName(document: SourceDocument, extension: string): string {
  const token = extractTitleToken(document);
  if (!token) {
    throw new EmptyDocumentError(document.path ?? document.label);
  }
  return withExtension(token, extension);
}
