import { supportsOperator, operatorResultKind, type OperatorName } from "../core/operators.js";
import type { Declaration, Diagnostic, SourceSpan, ValueKind } from "../core/types.js";
import { defaultValueForKind, primitiveType } from "../core/value.js";
import { forEachStatement, type Expression, type FileSyntax, type Statement } from "./ast.js";
import { diagnostic, findDeclaration, type CompilerPass } from "./state.js";

type VariableExpression = Extract<Expression, { kind: "variable" }>;

const BOOLEAN_OPERATORS: ReadonlySet<OperatorName> = new Set(["And", "Or", "Xor"]);
const NUMERIC_OPERATORS: ReadonlySet<OperatorName> = new Set([
  "Minus",
  "Multiply",
  "Divide",
  "Modulo",
  "GreaterThan",
  "GreaterThanOrEqualTo",
  "LessThan",
  "LessThanOrEqualTo",
]);

const operandHint = (operator: OperatorName, expected: ValueKind | null): ValueKind | null => {
  if (BOOLEAN_OPERATORS.has(operator)) return "boolean";
  if (NUMERIC_OPERATORS.has(operator)) return "number";
  if (operator === "Add") return expected === "boolean" ? null : expected;
  return null;
};

/**
 * Checks one file against the shared declaration list. Variables first
 * seen in a position whose type is known are declared on the spot; the
 * rest are left unresolved so the caller can retry the file later.
 */
class FileTypeChecker {
  readonly diagnostics: Diagnostic[] = [];
  readonly types = new Map<Expression, ValueKind>();
  private readonly pending: VariableExpression[] = [];
  private nodeName = "";

  constructor(
    private readonly fileName: string,
    private readonly known: Declaration[],
    private readonly derived: Declaration[],
    private readonly nodeNames: ReadonlySet<string>
  ) {}

  check(file: FileSyntax): this {
    for (const node of file.nodes) {
      this.nodeName = node.title;
      forEachStatement(node.body, (statement) => this.checkStatement(statement));
    }
    return this;
  }

  /** True when some variable's type was unknown at its first use in this file. */
  needsRetry(): boolean {
    return this.pending.length > 0;
  }

  unresolved(): VariableExpression[] {
    return this.pending.filter((expression) => !findDeclaration(this.known, expression.name));
  }

  private report(code: string, message: string, span: SourceSpan, severity: Diagnostic["severity"] = "error"): void {
    this.diagnostics.push(diagnostic(severity, code, message, this.fileName, span));
  }

  private declareInferred(name: string, kind: ValueKind, span: SourceSpan): void {
    if (findDeclaration(this.known, name)) {
      return;
    }
    const declaration: Declaration = {
      name,
      type: primitiveType(kind),
      defaultValue: defaultValueForKind(kind),
      description: `Implicitly declared in node ${this.nodeName}`,
      provenance: "inferred",
      sourceFileName: this.fileName,
      span,
    };
    this.known.push(declaration);
    this.derived.push(declaration);
  }

  private checkStatement(statement: Statement): void {
    switch (statement.kind) {
      case "line":
      case "command":
        for (const part of statement.parts) {
          if (part.kind === "expression") this.infer(part.expression, null);
        }
        return;
      case "options":
        for (const option of statement.options) {
          if (option.condition) this.expect(option.condition, "boolean", "Option condition");
          for (const part of option.parts) {
            if (part.kind === "expression") this.infer(part.expression, null);
          }
        }
        return;
      case "if":
        for (const clause of statement.clauses) {
          if (clause.condition) this.expect(clause.condition, "boolean", "Condition");
        }
        return;
      case "set": {
        const declaration = findDeclaration(this.known, statement.variable);
        if (declaration && declaration.type.kind === "primitive") {
          this.expect(statement.expression, declaration.type.name, `Value assigned to ${statement.variable}`);
          return;
        }
        if (declaration) {
          this.report("TYPE_MISMATCH", `${statement.variable} is a function and cannot be assigned.`, statement.span);
          return;
        }
        const kind = this.infer(statement.expression, null);
        if (kind !== null) {
          this.declareInferred(statement.variable, kind, statement.span);
        }
        return;
      }
      case "declare":
        this.infer(statement.value, null);
        return;
      case "jump":
        if (statement.target.kind === "expression") {
          this.expect(statement.target.expression, "string", "Jump target");
        } else if (!this.nodeNames.has(statement.target.name)) {
          this.report(
            "JUMP_TARGET_UNKNOWN",
            `Jump target "${statement.target.name}" is not a node in this compilation.`,
            statement.span,
            "warning"
          );
        }
        return;
      case "stop":
        return;
    }
  }

  private expect(expression: Expression, kind: ValueKind, context: string): void {
    const actual = this.infer(expression, kind);
    if (actual !== null && actual !== kind) {
      this.report("TYPE_MISMATCH", `${context} must be ${kind}, but is ${actual}.`, expression.span);
    }
  }

  private infer(expression: Expression, expected: ValueKind | null): ValueKind | null {
    const kind = this.inferUnrecorded(expression, expected);
    if (kind !== null) {
      this.types.set(expression, kind);
    }
    return kind;
  }

  private inferUnrecorded(expression: Expression, expected: ValueKind | null): ValueKind | null {
    switch (expression.kind) {
      case "number":
        return "number";
      case "string":
        return "string";
      case "boolean":
        return "boolean";
      case "variable": {
        const declaration = findDeclaration(this.known, expression.name);
        if (declaration) {
          if (declaration.type.kind === "primitive") {
            return declaration.type.name;
          }
          this.report("TYPE_MISMATCH", `${expression.name} is a function, not a variable.`, expression.span);
          return null;
        }
        if (expected !== null) {
          this.declareInferred(expression.name, expected, expression.span);
          return expected;
        }
        this.pending.push(expression);
        return null;
      }
      case "call":
        return this.inferCall(expression);
      case "unary": {
        const operand = this.infer(expression.operand, expression.operator === "Not" ? "boolean" : "number");
        if (operand === null) {
          return null;
        }
        if (!supportsOperator(operand, expression.operator)) {
          this.report("OPERATOR_UNSUPPORTED", `Operator ${expression.operator} is not defined for ${operand}.`, expression.span);
          return null;
        }
        return operatorResultKind(operand, expression.operator);
      }
      case "binary": {
        const hint = operandHint(expression.operator, expected);
        let left = this.infer(expression.left, hint);
        const right = this.infer(expression.right, left ?? hint);
        if (left === null && right !== null) {
          left = this.infer(expression.left, right);
        }
        if (left === null || right === null) {
          return null;
        }
        if (left !== right) {
          this.report(
            "TYPE_MISMATCH",
            `Operands of ${expression.operator} must have the same type, but are ${left} and ${right}.`,
            expression.span
          );
          return null;
        }
        if (!supportsOperator(left, expression.operator)) {
          this.report("OPERATOR_UNSUPPORTED", `Operator ${expression.operator} is not defined for ${left}.`, expression.span);
          return null;
        }
        return operatorResultKind(left, expression.operator);
      }
    }
  }

  private inferCall(expression: Extract<Expression, { kind: "call" }>): ValueKind | null {
    const declaration = findDeclaration(this.known, expression.name);
    if (!declaration || declaration.type.kind !== "function") {
      this.report("FUNCTION_UNDEFINED", `Function "${expression.name}" is not defined.`, expression.span);
      expression.args.forEach((arg) => this.infer(arg, null));
      return null;
    }
    const { parameters, returnType } = declaration.type;
    if (parameters.length !== expression.args.length) {
      this.report(
        "FUNCTION_ARITY",
        `Function "${expression.name}" takes ${parameters.length} argument(s) but is given ${expression.args.length}.`,
        expression.span
      );
      expression.args.forEach((arg) => this.infer(arg, null));
    } else {
      expression.args.forEach((arg, index) => {
        const parameter = parameters[index];
        if (parameter.kind === "primitive") {
          this.expect(arg, parameter.name, `Argument ${index + 1} of ${expression.name}`);
        } else {
          this.infer(arg, null);
        }
      });
    }
    return returnType.kind === "primitive" ? returnType.name : null;
  }
}

export const checkTypes: CompilerPass = (state) => {
  const known = [...state.knownDeclarations];
  const derived = [...state.derivedDeclarations];
  const diagnostics = [...state.diagnostics];
  const knownTypes = new Map(state.knownTypes);
  const nodeNames = new Set(state.parsedFiles.flatMap((file) => file.nodes.map((node) => node.title)));
  const commit = (checker: FileTypeChecker): void => {
    diagnostics.push(...checker.diagnostics);
    checker.types.forEach((kind, expression) => knownTypes.set(expression, kind));
  };

  const deferred: FileSyntax[] = [];
  for (const file of state.parsedFiles) {
    const checker = new FileTypeChecker(file.fileName, known, derived, nodeNames).check(file);
    if (checker.needsRetry()) {
      deferred.push(file);
    } else {
      commit(checker);
    }
  }

  for (const file of deferred) {
    const checker = new FileTypeChecker(file.fileName, known, derived, nodeNames).check(file);
    commit(checker);
    for (const expression of checker.unresolved()) {
      diagnostics.push(
        diagnostic(
          "error",
          "TYPE_UNDETERMINED",
          `Type of ${expression.name} cannot be determined; declare it with <<declare>>.`,
          file.fileName,
          expression.span
        )
      );
    }
  }

  state.logger.debug("checked types", { deferredFiles: deferred.map((file) => file.fileName) });
  return {
    ...state,
    knownDeclarations: known,
    derivedDeclarations: derived,
    diagnostics,
    knownTypes,
  };
};
