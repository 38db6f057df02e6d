export * from "./compiler.js";
export type * from "./ast.js";
export { parseExpression } from "./expression.js";
export { parseSource, type ParsedSource } from "./parser.js";
export { LAST_LINE_TAG, LINE_ID_PREFIX, lineIdOf, lineMetadataOf, tagLastLines } from "./register-strings.js";
export {
  dedupeDiagnostics,
  diagnosticKey,
  hasErrors,
  type CompilationJob,
  type CompilationType,
  type SourceFile,
} from "./state.js";
