import { compile } from "./compiler/compiler.js";
import { type CompilationType, type SourceFile } from "./compiler/state.js";
import { SpindleCompileError } from "./core/errors.js";
import type { Library } from "./core/library.js";
import type { Logger } from "./core/logger.js";
import type { CompilationResult, Declaration, Program } from "./core/types.js";
import type { VariableStorage } from "./core/variable-storage.js";
import { DEFAULT_START_NODE, Dialogue, type DialogueHandlers } from "./runtime/dialogue.js";

export type SourceInput = SourceFile[] | Record<string, string>;

export interface CompileFilesOptions {
  library?: Library;
  compilationType?: CompilationType;
  variableDeclarations?: Declaration[];
  logger?: Logger;
}

export type CompiledProject = CompilationResult & { program: Program };

const toSourceFiles = (sources: SourceInput): SourceFile[] =>
  Array.isArray(sources)
    ? sources
    : Object.entries(sources).map(([fileName, source]) => ({ fileName, source }));

/** Compiles and throws `API_COMPILE_FAILED` when any error diagnostic is reported. */
export const compileFiles = (sources: SourceInput, options: CompileFilesOptions = {}): CompiledProject => {
  const result = compile({ files: toSourceFiles(sources), ...options, compilationType: "full" });
  const errors = result.diagnostics.filter((entry) => entry.severity === "error");
  if (errors.length > 0 || !result.program) {
    throw new SpindleCompileError(errors);
  }
  return { ...result, program: result.program };
};

export interface CreateDialogueFromSourceOptions {
  sources: SourceInput;
  startNode?: string;
  handlers?: DialogueHandlers;
  variableStorage?: VariableStorage;
  library?: Library;
  logger?: Logger;
  randomSeed?: number;
}

export interface DialogueFromSource {
  dialogue: Dialogue;
  compilation: CompiledProject;
}

/**
 * Compiles `sources` against the dialogue's own library, so host functions
 * registered through `library` type-check, then selects the start node.
 */
export const createDialogueFromSource = (options: CreateDialogueFromSourceOptions): DialogueFromSource => {
  const dialogue = new Dialogue({
    handlers: options.handlers,
    variableStorage: options.variableStorage,
    library: options.library,
    logger: options.logger,
    randomSeed: options.randomSeed,
  });
  const compilation = compileFiles(options.sources, {
    library: dialogue.library,
    logger: options.logger?.child("compiler"),
  });
  dialogue.setProgram(compilation.program);
  dialogue.setNode(options.startNode ?? DEFAULT_START_NODE);
  return { dialogue, compilation };
};
