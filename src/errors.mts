export type CommentaryErrorCode =
  | "missing_commentary_marker"
  | "missing_code_marker"
  | "no_target_file"
  | "empty_document"
  | "export_failure"
  | "generation_failure"
  | "mismatch"
  | "source_not_found"
  | "invalid_config";

export interface CommentaryErrorOptions {
  file?: string;
  cause?: unknown;
}

/** Base of every error the core raises; `file` names the offending file or buffer. */
export class CommentaryError extends Error {
  readonly code: CommentaryErrorCode;
  readonly file?: string;

  constructor(code: CommentaryErrorCode, message: string, options: CommentaryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CommentaryError";
    this.code = code;
    this.file = options.file;
  }
}

export class MissingCommentaryMarkerError extends CommentaryError {
  constructor(marker: string, file?: string) {
    super("missing_commentary_marker", `${file ?? "<buffer>"}: no line matching "${marker}"`, { file });
    this.name = "MissingCommentaryMarkerError";
  }
}

export class MissingCodeMarkerError extends CommentaryError {
  constructor(marker: string, file?: string) {
    super("missing_code_marker", `${file ?? "<buffer>"}: no line matching "${marker}" after the commentary marker`, {
      file
    });
    this.name = "MissingCodeMarkerError";
  }
}

export class NoTargetFileFoundError extends CommentaryError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[], file?: string) {
    const tried = candidates.length > 0 ? `; tried ${candidates.join(", ")}` : "";
    super("no_target_file", `cannot find a target file for ${file ?? "<buffer>"}${tried}`, { file });
    this.name = "NoTargetFileFoundError";
    this.candidates = candidates;
  }
}

export class EmptyDocumentError extends CommentaryError {
  constructor(file?: string) {
    super("empty_document", `${file ?? "<buffer>"}: document has no heading to take a name from`, { file });
    this.name = "EmptyDocumentError";
  }
}

export class ExportFailureError extends CommentaryError {
  constructor(file?: string) {
    super("export_failure", `${file ?? "<buffer>"}: export produced no output`, { file });
    this.name = "ExportFailureError";
  }
}

export class GenerationFailureError extends CommentaryError {
  constructor(file: string | undefined, cause?: unknown) {
    super("generation_failure", `${file ?? "<buffer>"}: failed to generate commentary`, { file, cause });
    this.name = "GenerationFailureError";
  }
}

export class MismatchError extends CommentaryError {
  readonly report: string;

  constructor(report: string, file?: string) {
    super("mismatch", `${file ?? "<buffer>"}: commentary is out of date`, { file });
    this.name = "MismatchError";
    this.report = report;
  }
}

export class SourceNotFoundError extends CommentaryError {
  constructor(file: string) {
    super("source_not_found", `source document ${file} does not exist`, { file });
    this.name = "SourceNotFoundError";
  }
}

export class InvalidConfigError extends CommentaryError {
  constructor(message: string, file?: string) {
    super("invalid_config", message, { file });
    this.name = "InvalidConfigError";
  }
}
