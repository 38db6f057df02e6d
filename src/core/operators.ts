import type { ValueKind } from "./types.js";

export type OperatorName =
  | "Add"
  | "Minus"
  | "Multiply"
  | "Divide"
  | "Modulo"
  | "UnaryMinus"
  | "EqualTo"
  | "NotEqualTo"
  | "GreaterThan"
  | "GreaterThanOrEqualTo"
  | "LessThan"
  | "LessThanOrEqualTo"
  | "And"
  | "Or"
  | "Xor"
  | "Not";

export const UNARY_OPERATORS: ReadonlySet<OperatorName> = new Set(["UnaryMinus", "Not"]);

const NUMBER_OPERATORS: readonly OperatorName[] = [
  "Add",
  "Minus",
  "Multiply",
  "Divide",
  "Modulo",
  "UnaryMinus",
  "EqualTo",
  "NotEqualTo",
  "GreaterThan",
  "GreaterThanOrEqualTo",
  "LessThan",
  "LessThanOrEqualTo",
];

const STRING_OPERATORS: readonly OperatorName[] = ["Add", "EqualTo", "NotEqualTo"];

const BOOL_OPERATORS: readonly OperatorName[] = ["EqualTo", "NotEqualTo", "And", "Or", "Xor", "Not"];

export const operatorsForKind = (kind: ValueKind): readonly OperatorName[] => {
  if (kind === "number") return NUMBER_OPERATORS;
  if (kind === "string") return STRING_OPERATORS;
  return BOOL_OPERATORS;
};

export const supportsOperator = (kind: ValueKind, operator: OperatorName): boolean =>
  operatorsForKind(kind).includes(operator);

/** Operators that produce a boolean regardless of operand kind. */
export const COMPARISON_OPERATORS: ReadonlySet<OperatorName> = new Set([
  "EqualTo",
  "NotEqualTo",
  "GreaterThan",
  "GreaterThanOrEqualTo",
  "LessThan",
  "LessThanOrEqualTo",
]);

export const operatorResultKind = (kind: ValueKind, operator: OperatorName): ValueKind =>
  COMPARISON_OPERATORS.has(operator) ? "boolean" : kind;
