import type { ScriptType, ValueKind, YarnValue } from "./types.js";

const NUMERIC_PATTERN = /^\s*[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?\s*$/;

export const kindOf = (value: YarnValue): ValueKind => {
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  return "string";
};

export const isYarnValue = (value: unknown): value is YarnValue =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean";

export const formatValue = (value: YarnValue): string => {
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    return Object.is(value, -0) ? "0" : String(value);
  }
  return String(value);
};

export const toNumber = (value: YarnValue): number | undefined => {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (!NUMERIC_PATTERN.test(value)) return undefined;
  return Number(value);
};

export const toBoolean = (value: YarnValue): boolean | undefined => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return !Number.isNaN(value) && value !== 0;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return undefined;
};

export const toStringValue = (value: YarnValue): string => formatValue(value);

export const convertValue = (value: YarnValue, kind: ValueKind): YarnValue | undefined => {
  if (kind === "number") return toNumber(value);
  if (kind === "boolean") return toBoolean(value);
  return toStringValue(value);
};

export const defaultValueForKind = (kind: ValueKind): YarnValue => {
  if (kind === "number") return 0;
  if (kind === "boolean") return false;
  return "";
};

/** Prefix used for operator functions of a kind, e.g. `Number.Add`. */
export const operatorTypeName = (kind: ValueKind): string => {
  if (kind === "number") return "Number";
  if (kind === "boolean") return "Bool";
  return "String";
};

export const primitiveType = (name: ValueKind): ScriptType => ({ kind: "primitive", name });

export const functionType = (parameters: ScriptType[], returnType: ScriptType): ScriptType => ({
  kind: "function",
  parameters,
  returnType,
});

export const formatType = (type: ScriptType): string => {
  if (type.kind === "primitive") {
    return type.name;
  }
  return `(${type.parameters.map(formatType).join(", ")}) -> ${formatType(type.returnType)}`;
};

export const typesEqual = (a: ScriptType, b: ScriptType): boolean => {
  if (a.kind === "primitive" || b.kind === "primitive") {
    return a.kind === "primitive" && b.kind === "primitive" && a.name === b.name;
  }
  if (a.parameters.length !== b.parameters.length) {
    return false;
  }
  for (let i = 0; i < a.parameters.length; i += 1) {
    if (!typesEqual(a.parameters[i], b.parameters[i])) {
      return false;
    }
  }
  return typesEqual(a.returnType, b.returnType);
};

export const parseTypeName = (raw: string): ValueKind | null => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "number") return "number";
  if (normalized === "string") return "string";
  if (normalized === "bool" || normalized === "boolean") return "boolean";
  return null;
};
