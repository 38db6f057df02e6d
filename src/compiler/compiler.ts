import type { CompilationResult } from "../core/types.js";
import { generateCode } from "./codegen.js";
import { getDeclarations } from "./declarations.js";
import { addInitialValueRegistrations } from "./initial-values.js";
import { registerStrings } from "./register-strings.js";
import {
  createInitialState,
  dedupeDiagnostics,
  type CompilationJob,
  type CompilationType,
  type CompilerPass,
  type CompilerState,
} from "./state.js";
import { addTrackingDeclarations, findTrackingNodes } from "./tracking.js";
import { checkTypes } from "./type-checker.js";

interface PipelineStep {
  name: string;
  pass: CompilerPass;
}

const PIPELINE: readonly PipelineStep[] = [
  { name: "registerStrings", pass: registerStrings },
  { name: "getDeclarations", pass: getDeclarations },
  { name: "checkTypes", pass: checkTypes },
  { name: "findTrackingNodes", pass: findTrackingNodes },
  { name: "addTrackingDeclarations", pass: addTrackingDeclarations },
  { name: "generateCode", pass: generateCode },
  { name: "addInitialValueRegistrations", pass: addInitialValueRegistrations },
];

const LAST_STEP: Record<CompilationType, string> = {
  stringsOnly: "registerStrings",
  declarationsOnly: "getDeclarations",
  typeCheck: "addTrackingDeclarations",
  full: "addInitialValueRegistrations",
};

const toResult = (state: CompilerState, emitProgram: boolean): CompilationResult => {
  const result: CompilationResult = {
    diagnostics: dedupeDiagnostics(state.diagnostics),
    stringTable: { ...state.stringTable },
    declarations: [...state.derivedDeclarations],
    debugInfo: { ...state.debugInfo },
    containsImplicitStringTags: state.containsImplicitStringTags,
    fileTags: { ...state.fileTags },
  };
  if (emitProgram && state.program) {
    result.program = state.program;
  }
  return result;
};

/**
 * Runs the compiler passes in order over `job.files`. Script problems are
 * returned as diagnostics; a program is emitted only for a full compilation
 * that produced no error diagnostics during code generation.
 */
export const compile = (job: CompilationJob): CompilationResult => {
  const compilationType = job.compilationType ?? "full";
  const lastIndex = PIPELINE.findIndex((step) => step.name === LAST_STEP[compilationType]);
  const finalState = PIPELINE.slice(0, lastIndex + 1).reduce((state, step) => {
    state.logger.debug(`running ${step.name}`, { files: state.files.length });
    return step.pass(state);
  }, createInitialState(job));
  return toResult(finalState, compilationType === "full");
};
