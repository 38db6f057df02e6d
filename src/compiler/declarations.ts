import type { Declaration, Diagnostic, ValueKind, YarnValue } from "../core/types.js";
import { formatType, kindOf, parseTypeName, primitiveType } from "../core/value.js";
import { forEachStatement, type DeclareStatement, type Expression } from "./ast.js";
import { diagnostic, findDeclaration, type CompilerPass } from "./state.js";

/** Literal value of a constant expression; `-5` counts as a constant. */
export const constantValue = (expression: Expression): YarnValue | undefined => {
  if (expression.kind === "number" || expression.kind === "string" || expression.kind === "boolean") {
    return expression.value;
  }
  if (expression.kind === "unary" && expression.operator === "UnaryMinus" && expression.operand.kind === "number") {
    return -expression.operand.value;
  }
  return undefined;
};

const declarationFrom = (
  statement: DeclareStatement,
  fileName: string,
  nodeName: string,
  report: (entry: Diagnostic) => void
): Declaration | null => {
  const value = constantValue(statement.value);
  if (value === undefined) {
    report(
      diagnostic(
        "error",
        "DECLARATION_NOT_CONSTANT",
        `Initial value of ${statement.variable} must be a constant literal.`,
        fileName,
        statement.span
      )
    );
    return null;
  }

  let kind: ValueKind = kindOf(value);
  if (statement.typeName !== null) {
    const declared = parseTypeName(statement.typeName);
    if (declared === null) {
      report(
        diagnostic(
          "error",
          "DECLARATION_TYPE_MISMATCH",
          `Unknown type "${statement.typeName}" in declaration of ${statement.variable}.`,
          fileName,
          statement.span
        )
      );
      return null;
    }
    if (declared !== kind) {
      report(
        diagnostic(
          "error",
          "DECLARATION_TYPE_MISMATCH",
          `${statement.variable} is declared as ${declared} but its initial value is a ${kind}.`,
          fileName,
          statement.span
        )
      );
      return null;
    }
    kind = declared;
  }

  return {
    name: statement.variable,
    type: primitiveType(kind),
    defaultValue: value,
    description: `Declared in node ${nodeName}`,
    provenance: "explicit",
    sourceFileName: fileName,
    span: statement.span,
  };
};

export const getDeclarations: CompilerPass = (state) => {
  const known = [...state.knownDeclarations];
  const derived = [...state.derivedDeclarations];
  const diagnostics = [...state.diagnostics];
  const fileTags: Record<string, string[]> = { ...state.fileTags };
  const report = (entry: Diagnostic): void => {
    diagnostics.push(entry);
  };

  for (const file of state.parsedFiles) {
    fileTags[file.fileName] = [...file.tags];
    for (const node of file.nodes) {
      forEachStatement(node.body, (statement) => {
        if (statement.kind !== "declare") {
          return;
        }
        const declaration = declarationFrom(statement, file.fileName, node.title, report);
        if (!declaration) {
          return;
        }
        const existing = findDeclaration(known, declaration.name);
        if (existing) {
          const where = existing.sourceFileName ? ` in ${existing.sourceFileName}` : "";
          report(
            diagnostic(
              "error",
              "DECLARATION_DUPLICATE",
              `${declaration.name} is already declared${where} as ${formatType(existing.type)}.`,
              file.fileName,
              statement.span
            )
          );
          return;
        }
        known.push(declaration);
        derived.push(declaration);
      });
    }
  }

  state.logger.debug("collected declarations", { count: derived.length });
  return {
    ...state,
    knownDeclarations: known,
    derivedDeclarations: derived,
    diagnostics,
    fileTags,
  };
};
