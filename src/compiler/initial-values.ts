import type { YarnValue } from "../core/types.js";
import { dedupeDiagnostics, diagnostic, type CompilerPass } from "./state.js";

export const addInitialValueRegistrations: CompilerPass = (state) => {
  const diagnostics = [...state.diagnostics];
  const initialValues: Record<string, YarnValue> = {};
  for (const declaration of state.knownDeclarations) {
    if (declaration.type.kind === "function") {
      continue;
    }
    if (declaration.defaultValue === undefined) {
      diagnostics.push(
        diagnostic(
          "error",
          "DECLARATION_NO_DEFAULT",
          `${declaration.name} has no default value.`,
          declaration.sourceFileName,
          declaration.span
        )
      );
      continue;
    }
    initialValues[declaration.name] = declaration.defaultValue;
  }

  const program = state.program
    ? { ...state.program, initialValues: { ...state.program.initialValues, ...initialValues } }
    : null;
  return { ...state, program, diagnostics: dedupeDiagnostics(diagnostics) };
};
