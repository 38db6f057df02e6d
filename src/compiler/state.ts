import { createStandardLibrary, type Library } from "../core/library.js";
import { createLogger, type Logger } from "../core/logger.js";
import type {
  Declaration,
  Diagnostic,
  NodeDebugInfo,
  Program,
  SourceSpan,
  StringTable,
  ValueKind,
} from "../core/types.js";
import type { Expression, FileSyntax } from "./ast.js";

export type CompilationType = "full" | "typeCheck" | "declarationsOnly" | "stringsOnly";

export interface SourceFile {
  fileName: string;
  source: string;
}

export interface CompilationJob {
  files: SourceFile[];
  /** Function signatures visible to scripts. Defaults to the standard library. */
  library?: Library;
  compilationType?: CompilationType;
  /** Seeded declarations, e.g. variables owned by the host application. */
  variableDeclarations?: Declaration[];
  logger?: Logger;
}

/**
 * Accumulator threaded through the passes. Passes never mutate it; each
 * returns a new state built from the previous one.
 */
export interface CompilerState {
  readonly files: readonly SourceFile[];
  readonly library: Library;
  readonly logger: Logger;
  readonly parsedFiles: readonly FileSyntax[];
  readonly knownDeclarations: readonly Declaration[];
  readonly derivedDeclarations: readonly Declaration[];
  readonly diagnostics: readonly Diagnostic[];
  readonly stringTable: Readonly<StringTable>;
  readonly containsImplicitStringTags: boolean;
  readonly fileTags: Readonly<Record<string, string[]>>;
  readonly trackingNodes: readonly string[];
  readonly knownTypes: ReadonlyMap<Expression, ValueKind>;
  readonly program: Program | null;
  readonly debugInfo: Readonly<Record<string, NodeDebugInfo>>;
}

export type CompilerPass = (state: CompilerState) => CompilerState;

export const createInitialState = (job: CompilationJob): CompilerState => {
  const library = job.library ?? createStandardLibrary();
  return {
    files: job.files,
    library,
    logger: job.logger ?? createLogger({ name: "spindle:compiler" }),
    parsedFiles: [],
    knownDeclarations: [...library.declarations(), ...(job.variableDeclarations ?? [])],
    derivedDeclarations: [],
    diagnostics: [],
    stringTable: {},
    containsImplicitStringTags: false,
    fileTags: {},
    trackingNodes: [],
    knownTypes: new Map(),
    program: null,
    debugInfo: {},
  };
};

export const diagnostic = (
  severity: Diagnostic["severity"],
  code: string,
  message: string,
  fileName: string | null,
  span: SourceSpan | null
): Diagnostic => ({ severity, code, message, fileName, span });

export const diagnosticKey = (entry: Diagnostic): string =>
  JSON.stringify([entry.severity, entry.code, entry.message, entry.fileName, entry.span]);

/** Keeps the first occurrence of every structurally equal diagnostic. */
export const dedupeDiagnostics = (diagnostics: readonly Diagnostic[]): Diagnostic[] => {
  const seen = new Set<string>();
  return diagnostics.filter((entry) => {
    const key = diagnosticKey(entry);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((entry) => entry.severity === "error");

export const findDeclaration = (
  declarations: readonly Declaration[],
  name: string
): Declaration | undefined => declarations.find((declaration) => declaration.name === name);
