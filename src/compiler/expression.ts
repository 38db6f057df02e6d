import { SpindleError } from "../core/errors.js";
import type { OperatorName } from "../core/operators.js";
import type { SourceSpan } from "../core/types.js";
import type { Expression } from "./ast.js";

type TokenKind = "number" | "string" | "variable" | "identifier" | "operator" | "(" | ")" | ",";

interface Token {
  kind: TokenKind;
  text: string;
  column: number;
}

const WORD_OPERATORS: Record<string, string> = {
  and: "&&",
  or: "||",
  xor: "^",
  not: "!",
  eq: "==",
  is: "==",
  neq: "!=",
  lt: "<",
  lte: "<=",
  gt: ">",
  gte: ">=",
};

const SYMBOL_OPERATORS = ["&&", "||", "==", "!=", "<=", ">=", "<", ">", "+", "-", "*", "/", "%", "^", "!", "="];

const BINARY_LEVELS: Array<Record<string, OperatorName>> = [
  { "||": "Or" },
  { "^": "Xor" },
  { "&&": "And" },
  { "==": "EqualTo", "!=": "NotEqualTo" },
  { "<": "LessThan", "<=": "LessThanOrEqualTo", ">": "GreaterThan", ">=": "GreaterThanOrEqualTo" },
  { "+": "Add", "-": "Minus" },
  { "*": "Multiply", "/": "Divide", "%": "Modulo" },
];

const isIdentifierStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isIdentifierPart = (ch: string): boolean => /[A-Za-z0-9_.]/.test(ch);

const spanAt = (line: number, start: number, end: number): SourceSpan => ({
  start: { line, column: start },
  end: { line, column: end },
});

export const tokenizeExpression = (source: string, line: number, columnOffset: number): Token[] => {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    const column = columnOffset + i;
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    if (ch === "(" || ch === ")" || ch === ",") {
      tokens.push({ kind: ch, text: ch, column });
      i += 1;
      continue;
    }
    if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(source[i + 1] ?? ""))) {
      const match = /^(\d+(\.\d+)?|\.\d+)/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      tokens.push({ kind: "number", text, column });
      i += text.length;
      continue;
    }
    if (ch === "\"") {
      let value = "";
      let j = i + 1;
      let closed = false;
      while (j < source.length) {
        const c = source[j];
        if (c === "\\" && j + 1 < source.length) {
          const escaped = source[j + 1];
          value += escaped === "n" ? "\n" : escaped;
          j += 2;
          continue;
        }
        if (c === "\"") {
          closed = true;
          break;
        }
        value += c;
        j += 1;
      }
      if (!closed) {
        throw new SpindleError(
          "PARSE_ERROR",
          "Unterminated string literal.",
          spanAt(line, column, columnOffset + source.length)
        );
      }
      tokens.push({ kind: "string", text: value, column });
      i = j + 1;
      continue;
    }
    if (ch === "$") {
      let j = i + 1;
      while (j < source.length && isIdentifierPart(source[j])) j += 1;
      if (j === i + 1) {
        throw new SpindleError("PARSE_ERROR", "Expected a variable name after \"$\".", spanAt(line, column, column + 1));
      }
      tokens.push({ kind: "variable", text: source.slice(i, j), column });
      i = j;
      continue;
    }
    if (isIdentifierStart(ch)) {
      let j = i + 1;
      while (j < source.length && isIdentifierPart(source[j])) j += 1;
      const word = source.slice(i, j);
      const key = word.toLowerCase();
      const operator = Object.hasOwn(WORD_OPERATORS, key) ? WORD_OPERATORS[key] : undefined;
      tokens.push(operator ? { kind: "operator", text: operator, column } : { kind: "identifier", text: word, column });
      i = j;
      continue;
    }
    const symbol = SYMBOL_OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (symbol) {
      tokens.push({ kind: "operator", text: symbol === "=" ? "==" : symbol, column });
      i += symbol.length;
      continue;
    }
    throw new SpindleError("PARSE_ERROR", `Unexpected character "${ch}" in expression.`, spanAt(line, column, column + 1));
  }
  return tokens;
};

class ExpressionParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly line: number,
    private readonly endColumn: number
  ) {}

  parse(): Expression {
    if (this.tokens.length === 0) {
      throw this.error("Expected an expression.", this.endColumn);
    }
    const expression = this.parseLevel(0);
    const extra = this.peek();
    if (extra) {
      throw this.error(`Unexpected "${extra.text}" after expression.`, extra.column);
    }
    return expression;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw this.error("Unexpected end of expression.", this.endColumn);
    }
    this.index += 1;
    return token;
  }

  private error(message: string, column: number): SpindleError {
    return new SpindleError("PARSE_ERROR", message, spanAt(this.line, column, column + 1));
  }

  private parseLevel(level: number): Expression {
    if (level >= BINARY_LEVELS.length) {
      return this.parseUnary();
    }
    const operators = BINARY_LEVELS[level];
    let left = this.parseLevel(level + 1);
    while (true) {
      const token = this.peek();
      if (!token || token.kind !== "operator" || !Object.hasOwn(operators, token.text)) {
        return left;
      }
      this.advance();
      const right = this.parseLevel(level + 1);
      left = {
        kind: "binary",
        operator: operators[token.text],
        left,
        right,
        span: { start: left.span.start, end: right.span.end },
      };
    }
  }

  private parseUnary(): Expression {
    const token = this.peek();
    if (token && token.kind === "operator" && (token.text === "-" || token.text === "!")) {
      this.advance();
      const operand = this.parseUnary();
      return {
        kind: "unary",
        operator: token.text === "-" ? "UnaryMinus" : "Not",
        operand,
        span: { start: { line: this.line, column: token.column }, end: operand.span.end },
      };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.advance();
    const span = spanAt(this.line, token.column, token.column + token.text.length);
    if (token.kind === "number") {
      return { kind: "number", value: Number(token.text), span };
    }
    if (token.kind === "string") {
      return { kind: "string", value: token.text, span };
    }
    if (token.kind === "variable") {
      return { kind: "variable", name: token.text, span };
    }
    if (token.kind === "(") {
      const inner = this.parseLevel(0);
      const close = this.advance();
      if (close.kind !== ")") {
        throw this.error("Expected \")\".", close.column);
      }
      return inner;
    }
    if (token.kind === "identifier") {
      if (token.text === "true" || token.text === "false") {
        return { kind: "boolean", value: token.text === "true", span };
      }
      const open = this.peek();
      if (!open || open.kind !== "(") {
        throw this.error(`Unexpected identifier "${token.text}"; function calls need parentheses.`, token.column);
      }
      this.advance();
      const args: Expression[] = [];
      if (this.peek()?.kind === ")") {
        const close = this.advance();
        return { kind: "call", name: token.text, args, span: spanAt(this.line, token.column, close.column + 1) };
      }
      while (true) {
        args.push(this.parseLevel(0));
        const next = this.advance();
        if (next.kind === ")") {
          return { kind: "call", name: token.text, args, span: spanAt(this.line, token.column, next.column + 1) };
        }
        if (next.kind !== ",") {
          throw this.error("Expected \",\" or \")\" in argument list.", next.column);
        }
      }
    }
    throw this.error(`Unexpected "${token.text}".`, token.column);
  }
}

/**
 * Parses an expression found on `line`, where `columnOffset` is the column
 * of the first character of `source`. Throws `SpindleError("PARSE_ERROR")`.
 */
export const parseExpression = (source: string, line = 1, columnOffset = 1): Expression => {
  const tokens = tokenizeExpression(source, line, columnOffset);
  return new ExpressionParser(tokens, line, columnOffset + source.length).parse();
};
