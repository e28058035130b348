import type { Root } from "mdast";

export interface CommentaryFormat {
  commentaryMarker: string;
  codeMarker: string;
  commentPrefix: string;
  extension: string;
  fillColumn: number;
  codeQuotes: readonly [string, string];
}

export interface SourceDocument {
  readonly root: Root;
  /** Name shown in reports, usually the source file's base name. */
  readonly label: string;
  readonly path: string | null;
}

export interface RenderedBlock {
  readonly lines: readonly string[];
  readonly text: string;
}

export interface MarkerRegion {
  readonly source: string;
  readonly start: number;
  readonly end: number;
  readonly empty: boolean;
  readonly separated: boolean;
  /** Line ending of the Commentary marker line, used when splicing. */
  readonly lineEnding: "\n" | "\r\n";
}

export interface ResolutionContext {
  document: SourceDocument;
  projectRoot: string;
  cwd: string;
  format: CommentaryFormat;
  explicitPath?: string;
  userHint?: string;
  override?: string;
}

export interface ResolutionStrategy {
  readonly name: string;
  /** When the strategy yields candidates and none exists, the search stops there. */
  readonly exclusive?: boolean;
  candidates: (context: ResolutionContext) => string[];
}

export interface ResolvedTarget {
  path: string;
  strategy: string;
}

export interface ScratchIdentity {
  targetFile: string;
  exportBuffer: string;
}

export interface SubstitutionRule {
  pattern: RegExp;
  replacement: string;
}

export type CheckResult =
  | { status: "match"; targetPath: string }
  | { status: "mismatch"; targetPath: string; report: string };

export interface CommentaryConfig {
  source?: string;
  target?: string;
  format: Partial<CommentaryFormat>;
}
