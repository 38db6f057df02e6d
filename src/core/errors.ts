import type { Diagnostic, SourceSpan } from "./types.js";

export class SpindleError extends Error {
  readonly code: string;
  readonly span?: SourceSpan;

  constructor(code: string, message: string, span?: SourceSpan) {
    super(message);
    this.name = "SpindleError";
    this.code = code;
    this.span = span;
  }
}

/** Thrown by the API helpers when compilation reports errors. */
export class SpindleCompileError extends SpindleError {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const [first] = diagnostics;
    const location = first?.fileName ? `${first.fileName}${first.span ? `:${first.span.start.line}` : ""}: ` : "";
    const summary = first ? `${location}${first.message}` : "Compilation failed.";
    const more = diagnostics.length > 1 ? ` (and ${diagnostics.length - 1} more)` : "";
    super("API_COMPILE_FAILED", `${summary}${more}`, first?.span ?? undefined);
    this.name = "SpindleCompileError";
    this.diagnostics = diagnostics;
  }
}
