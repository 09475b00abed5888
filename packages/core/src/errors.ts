export type ErrorCode =
  | "document_load_failed"
  | "no_documents"
  | "missing_input"
  | "output_write_failed"
  | "invalid_output"
  | "invalid_request"
  | "invalid_config";

export class DocsenseError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DocumentLoadError extends DocsenseError {
  constructor(readonly document: string, cause: unknown) {
    super("document_load_failed", `Failed to load ${document}: ${errorMessage(cause)}`, { cause });
  }
}

export class NoDocumentsError extends DocsenseError {
  constructor(attempted: number) {
    super("no_documents", `No documents could be processed (${attempted} attempted)`);
  }
}

export class MissingInputError extends DocsenseError {
  constructor(readonly field: string) {
    super("missing_input", `Missing required input: ${field}`);
  }
}

export class OutputWriteError extends DocsenseError {
  constructor(readonly target: string, cause: unknown) {
    super("output_write_failed", `Failed to write ${target}: ${errorMessage(cause)}`, { cause });
  }
}

export class ValidationError extends DocsenseError {
  constructor(code: "invalid_output" | "invalid_request" | "invalid_config", readonly issues: string[]) {
    super(code, issues.length ? issues.join("; ") : code);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
