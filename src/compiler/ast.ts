import type { OperatorName } from "../core/operators.js";
import type { SourceSpan } from "../core/types.js";

export type Expression =
  | { kind: "number"; value: number; span: SourceSpan }
  | { kind: "string"; value: string; span: SourceSpan }
  | { kind: "boolean"; value: boolean; span: SourceSpan }
  | { kind: "variable"; name: string; span: SourceSpan }
  | { kind: "call"; name: string; args: Expression[]; span: SourceSpan }
  | { kind: "unary"; operator: OperatorName; operand: Expression; span: SourceSpan }
  | {
      kind: "binary";
      operator: OperatorName;
      left: Expression;
      right: Expression;
      span: SourceSpan;
    };

export type TextPart =
  | { kind: "text"; value: string }
  | { kind: "expression"; expression: Expression };

export interface LineStatement {
  kind: "line";
  parts: TextPart[];
  hashtags: string[];
  span: SourceSpan;
}

export interface OptionItem {
  parts: TextPart[];
  condition: Expression | null;
  hashtags: string[];
  body: Statement[];
  span: SourceSpan;
}

export interface OptionsStatement {
  kind: "options";
  options: OptionItem[];
  span: SourceSpan;
}

export interface IfClause {
  condition: Expression | null;
  body: Statement[];
  span: SourceSpan;
}

export interface IfStatement {
  kind: "if";
  clauses: IfClause[];
  span: SourceSpan;
}

export interface SetStatement {
  kind: "set";
  variable: string;
  expression: Expression;
  span: SourceSpan;
}

export interface DeclareStatement {
  kind: "declare";
  variable: string;
  value: Expression;
  typeName: string | null;
  span: SourceSpan;
}

export interface JumpStatement {
  kind: "jump";
  target: { kind: "node"; name: string } | { kind: "expression"; expression: Expression };
  span: SourceSpan;
}

export interface StopStatement {
  kind: "stop";
  span: SourceSpan;
}

export interface CommandStatement {
  kind: "command";
  parts: TextPart[];
  span: SourceSpan;
}

export type Statement =
  | LineStatement
  | OptionsStatement
  | IfStatement
  | SetStatement
  | DeclareStatement
  | JumpStatement
  | StopStatement
  | CommandStatement;

export interface NodeHeader {
  key: string;
  value: string;
  span: SourceSpan;
}

export interface NodeSyntax {
  title: string;
  headers: NodeHeader[];
  tags: string[];
  body: Statement[];
  bodySource: string;
  span: SourceSpan;
}

export interface FileSyntax {
  fileName: string;
  tags: string[];
  nodes: NodeSyntax[];
}

/** Statements nested directly inside `statement` (option bodies, if clauses). */
export const childBlocks = (statement: Statement): Statement[][] => {
  if (statement.kind === "options") {
    return statement.options.map((option) => option.body);
  }
  if (statement.kind === "if") {
    return statement.clauses.map((clause) => clause.body);
  }
  return [];
};

/** Depth-first, in source order. */
export const forEachStatement = (statements: readonly Statement[], visit: (statement: Statement) => void): void => {
  for (const statement of statements) {
    visit(statement);
    for (const block of childBlocks(statement)) {
      forEachStatement(block, visit);
    }
  }
};

const textExpressions = (parts: readonly TextPart[]): Expression[] =>
  parts.flatMap((part) => (part.kind === "expression" ? [part.expression] : []));

/** Top-level expressions owned by `statement`, excluding those of nested blocks. */
export const statementExpressions = (statement: Statement): Expression[] => {
  switch (statement.kind) {
    case "line":
    case "command":
      return textExpressions(statement.parts);
    case "options":
      return statement.options.flatMap((option) => [
        ...(option.condition ? [option.condition] : []),
        ...textExpressions(option.parts),
      ]);
    case "if":
      return statement.clauses.flatMap((clause) => (clause.condition ? [clause.condition] : []));
    case "set":
      return [statement.expression];
    case "declare":
      return [statement.value];
    case "jump":
      return statement.target.kind === "expression" ? [statement.target.expression] : [];
    case "stop":
      return [];
  }
};

export const forEachExpression = (expression: Expression, visit: (expression: Expression) => void): void => {
  visit(expression);
  if (expression.kind === "call") {
    expression.args.forEach((arg) => forEachExpression(arg, visit));
  } else if (expression.kind === "unary") {
    forEachExpression(expression.operand, visit);
  } else if (expression.kind === "binary") {
    forEachExpression(expression.left, visit);
    forEachExpression(expression.right, visit);
  }
};
