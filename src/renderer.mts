import type {
  AlignType,
  Blockquote,
  FootnoteDefinition,
  Heading,
  List,
  PhrasingContent,
  RootContent,
  Table
} from "mdast";
import { toString } from "mdast-util-to-string";
import { DEFAULT_FORMAT } from "./constants.mjs";
import { ExportFailureError } from "./errors.mjs";
import type { CommentaryFormat, RenderedBlock, SourceDocument } from "./types.mjs";

interface RenderContext {
  width: number;
  codeQuotes: readonly [string, string];
  /** Shallowest heading depth left after the title is removed. */
  topDepth: number;
}

const HEADING_UNDERLINES = ["=", "-"];

export function fillParagraph(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ` ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

function renderInline(nodes: PhrasingContent[], context: RenderContext): string {
  return nodes.map((node) => renderInlineNode(node, context)).join("");
}

function renderInlineNode(node: PhrasingContent, context: RenderContext): string {
  switch (node.type) {
    case "text":
      // Soft line breaks; only `break` nodes end a line.
      return node.value.replace(/[ \t]*\r?\n[ \t]*/g, " ");
    case "emphasis":
      return `_${renderInline(node.children, context)}_`;
    case "strong":
      return `*${renderInline(node.children, context)}*`;
    case "delete":
      return renderInline(node.children, context);
    case "inlineCode":
      return `${context.codeQuotes[0]}${node.value.replace(/\r?\n/g, " ")}${context.codeQuotes[1]}`;
    case "break":
      return "\n";
    case "link": {
      const text = renderInline(node.children, context);
      if (!text || text === node.url) {
        return `<${node.url}>`;
      }
      return node.url.startsWith("#") ? text : `${text} <${node.url}>`;
    }
    case "linkReference":
      return renderInline(node.children, context);
    case "image":
    case "imageReference":
      return node.alt ?? "";
    case "footnoteReference":
      return `[${node.label ?? node.identifier}]`;
    case "html":
      return "";
    default:
      return toString(node).replace(/\s+/g, " ");
  }
}

function fillInline(nodes: PhrasingContent[], context: RenderContext): string[] {
  return renderInline(nodes, context)
    .split("\n")
    .flatMap((segment) => fillParagraph(segment, context.width));
}

function renderHeading(node: Heading, context: RenderContext): string[] {
  const lines = fillInline(node.children, context);
  const underline = HEADING_UNDERLINES[node.depth - context.topDepth];
  if (!underline || lines.length === 0) {
    return lines;
  }
  const length = Math.max(...lines.map((line) => line.length));
  return [...lines, underline.repeat(length)];
}

function hangingIndent(head: string, body: string[]): string[] {
  if (body.length === 0) {
    return [head.trimEnd()];
  }
  const indent = " ".repeat(head.length);
  return body.map((line, index) => {
    if (index === 0) {
      return `${head}${line}`;
    }
    return line ? `${indent}${line}` : "";
  });
}

function renderList(node: List, context: RenderContext): string[] {
  const start = node.start ?? 1;
  const lines: string[] = [];

  node.children.forEach((item, index) => {
    const bullet = node.ordered ? `${start + index}.` : "-";
    const checkbox = item.checked === true ? "[X] " : item.checked === false ? "[ ] " : "";
    const head = `${bullet} ${checkbox}`;
    const body = renderBlocks(
      item.children,
      { ...context, width: Math.max(1, context.width - head.length) },
      item.spread === true
    );
    if (index > 0 && node.spread === true) {
      lines.push("");
    }
    lines.push(...hangingIndent(head, body));
  });

  return lines;
}

function renderFootnoteDefinition(node: FootnoteDefinition, context: RenderContext): string[] {
  const head = `[${node.label ?? node.identifier}] `;
  const body = renderBlocks(node.children, { ...context, width: Math.max(1, context.width - head.length) }, true);
  return hangingIndent(head, body);
}

function renderBlockquote(node: Blockquote, context: RenderContext): string[] {
  const body = renderBlocks(node.children, { ...context, width: Math.max(1, context.width - 2) }, true);
  return body.map((line) => (line ? `  ${line}` : ""));
}

function alignCell(text: string, width: number, align: AlignType | undefined): string {
  const padding = width - text.length;
  if (align === "right") {
    return text.padStart(width);
  }
  if (align === "center") {
    const left = Math.floor(padding / 2);
    return `${" ".repeat(left)}${text}${" ".repeat(padding - left)}`;
  }
  return text.padEnd(width);
}

function renderTable(node: Table, context: RenderContext): string[] {
  const rows = node.children.map((row) =>
    row.children.map((cell) => renderInline(cell.children, context).replace(/\s+/g, " ").trim())
  );
  const columnCount = Math.max(0, ...rows.map((row) => row.length));
  const widths: number[] = [];
  for (let column = 0; column < columnCount; column += 1) {
    widths.push(Math.max(...rows.map((row) => (row[column] ?? "").length)));
  }

  const formatRow = (row: string[]): string =>
    widths
      .map((width, column) => alignCell(row[column] ?? "", width, node.align?.[column]))
      .join(" | ")
      .trimEnd();

  const lines = rows.map(formatRow);
  if (lines.length > 0) {
    lines.splice(1, 0, widths.map((width) => "-".repeat(width)).join("-+-"));
  }
  return lines;
}

function renderBlock(node: RootContent, context: RenderContext): string[] | null {
  switch (node.type) {
    case "heading":
      return renderHeading(node, context);
    case "paragraph":
      return fillInline(node.children, context);
    case "code":
      return node.value.split("\n");
    case "list":
      return renderList(node, context);
    case "blockquote":
      return renderBlockquote(node, context);
    case "thematicBreak":
      return ["-".repeat(context.width)];
    case "table":
      return renderTable(node, context);
    case "footnoteDefinition":
      return renderFootnoteDefinition(node, context);
    case "html":
    case "definition":
    case "yaml":
      return null;
    default:
      return fillParagraph(toString(node), context.width);
  }
}

function renderBlocks(nodes: RootContent[], context: RenderContext, separated: boolean): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    const rendered = renderBlock(node, context);
    if (!rendered || rendered.length === 0) {
      continue;
    }
    if (separated && lines.length > 0) {
      lines.push("");
    }
    lines.push(...rendered);
  }
  return lines;
}

/** Body of the document with the title heading dropped, if there is one. */
export function stripTitle(document: SourceDocument): RootContent[] {
  const children = document.root.children;
  const titleIndex = children.findIndex((node) => node.type === "heading");
  const title = children[titleIndex];
  if (title?.type !== "heading" || title.depth !== 1) {
    return children;
  }
  return [...children.slice(0, titleIndex), ...children.slice(titleIndex + 1)];
}

export function prefixLine(line: string, prefix: string): string {
  const prefixed = `${prefix} ${line}`;
  return prefixed.trim() === prefix ? prefix : prefixed;
}

export function renderCommentary(
  document: SourceDocument,
  format: CommentaryFormat = DEFAULT_FORMAT
): RenderedBlock {
  const body = stripTitle(document);
  const depths = body.flatMap((node) => (node.type === "heading" ? [node.depth] : []));

  const plainLines = renderBlocks(
    body,
    {
      width: format.fillColumn,
      codeQuotes: format.codeQuotes,
      topDepth: depths.length > 0 ? Math.min(...depths) : 1
    },
    true
  );

  if (plainLines.length === 0) {
    throw new ExportFailureError(document.path ?? document.label);
  }

  const lines = plainLines.map((line) => prefixLine(line, format.commentPrefix));
  return Object.freeze({
    lines: Object.freeze(lines),
    text: lines.join("\n")
  });
}
