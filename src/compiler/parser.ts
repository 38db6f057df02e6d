import { SpindleError } from "../core/errors.js";
import type { Diagnostic, SourceSpan } from "../core/types.js";
import type {
  Expression,
  FileSyntax,
  IfClause,
  NodeHeader,
  NodeSyntax,
  OptionItem,
  Statement,
  TextPart,
} from "./ast.js";
import { parseExpression } from "./expression.js";

const HEADER_PATTERN = /^([A-Za-z_][\w.-]*)\s*:\s*(.*)$/;
const NODE_NAME_PATTERN = /^[A-Za-z_][\w.]*$/;
// Node names key plain objects; this one would replace the prototype instead.
const RESERVED_NODE_NAMES: ReadonlySet<string> = new Set(["__proto__"]);
const isNodeName = (name: string): boolean => NODE_NAME_PATTERN.test(name) && !RESERVED_NODE_NAMES.has(name);
const VARIABLE_ASSIGNMENT_PATTERN = /^(set|declare)\s+(\$[\w.]+)\s*(?:=|to\b)\s*(.+)$/s;
const DECLARE_TYPE_PATTERN = /^(.*?)\s+as\s+([A-Za-z]+)$/s;
const BRANCH_KEYWORD_PATTERN = /^<<\s*(elseif\b|else\s*>>|endif\s*>>)/;

export const RAW_TEXT_TAG = "rawText";

export interface ParsedSource {
  file: FileSyntax;
  diagnostics: Diagnostic[];
}

interface BodyLine {
  text: string;
  indent: number;
  line: number;
  column: number;
}

interface ParsedText {
  parts: TextPart[];
  hashtags: string[];
  condition: Expression | null;
}

const lineSpan = (line: number, startColumn: number, endColumn: number): SourceSpan => ({
  start: { line, column: startColumn },
  end: { line, column: endColumn },
});

const bodyLineSpan = (line: BodyLine): SourceSpan =>
  lineSpan(line.line, line.column, line.column + line.text.length);

const parseError = (fileName: string, message: string, span: SourceSpan): Diagnostic => ({
  severity: "error",
  code: "PARSE_ERROR",
  message,
  fileName,
  span,
});

const measureIndent = (raw: string): { width: number; length: number } => {
  let width = 0;
  let length = 0;
  while (length < raw.length && (raw[length] === " " || raw[length] === "\t")) {
    width += raw[length] === "\t" ? 4 : 1;
    length += 1;
  }
  return { width, length };
};

/** Drops a trailing `//` comment that sits outside any `{...}` or `<<...>>` string literal. */
export const stripComment = (text: string): string => {
  let depth = 0;
  let inString = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\") {
      i += 1;
      continue;
    }
    if (inString) {
      if (ch === "\"") inString = false;
      continue;
    }
    if (depth > 0 && ch === "\"") {
      inString = true;
      continue;
    }
    if (ch === "{") depth += 1;
    else if (ch === "}") depth = Math.max(0, depth - 1);
    else if (text.startsWith("<<", i)) {
      depth += 1;
      i += 1;
    } else if (text.startsWith(">>", i) && depth > 0) {
      depth -= 1;
      i += 1;
    } else if (depth === 0 && text.startsWith("//", i) && (i === 0 || /\s/.test(text[i - 1]))) {
      return text.slice(0, i);
    }
  }
  return text;
};

const findClosingBrace = (source: string, openIndex: number): number => {
  let inString = false;
  for (let i = openIndex + 1; i < source.length; i += 1) {
    const ch = source[i];
    if (ch === "\\") {
      i += 1;
      continue;
    }
    if (ch === "\"") inString = !inString;
    else if (ch === "}" && !inString) return i;
  }
  return -1;
};

/**
 * Splits author text into literal and `{expression}` parts. Hashtags end the
 * text; an option may carry one `<<if ...>>` condition. Throws
 * `SpindleError("PARSE_ERROR")` on malformed input.
 */
export const parseText = (
  source: string,
  line: number,
  column: number,
  mode: { hashtags: boolean; condition: boolean }
): ParsedText => {
  const parts: TextPart[] = [];
  let hashtags: string[] = [];
  let condition: Expression | null = null;
  let buffer = "";
  const flush = (): void => {
    if (buffer.length > 0) {
      parts.push({ kind: "text", value: buffer });
      buffer = "";
    }
  };

  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "\\" && i + 1 < source.length) {
      buffer += source[i + 1];
      i += 2;
      continue;
    }
    if (ch === "{") {
      const close = findClosingBrace(source, i);
      if (close < 0) {
        throw new SpindleError("PARSE_ERROR", "Unterminated \"{\" in text.", lineSpan(line, column + i, column + source.length));
      }
      flush();
      parts.push({
        kind: "expression",
        expression: parseExpression(source.slice(i + 1, close), line, column + i + 1),
      });
      i = close + 1;
      continue;
    }
    if (mode.condition && source.startsWith("<<", i)) {
      const close = source.indexOf(">>", i + 2);
      if (close < 0) {
        throw new SpindleError("PARSE_ERROR", "Unterminated \"<<\" in option.", lineSpan(line, column + i, column + source.length));
      }
      const inner = source.slice(i + 2, close);
      const match = /^\s*if\s+(.+?)\s*$/s.exec(inner);
      if (!match) {
        throw new SpindleError("PARSE_ERROR", "Only <<if ...>> may follow option text.", lineSpan(line, column + i, column + close + 2));
      }
      if (condition) {
        throw new SpindleError("PARSE_ERROR", "An option takes at most one condition.", lineSpan(line, column + i, column + close + 2));
      }
      const expressionStart = i + 2 + inner.trimEnd().length - match[1].length;
      condition = parseExpression(match[1], line, column + expressionStart);
      i = close + 2;
      continue;
    }
    if (mode.hashtags && ch === "#" && (i === 0 || /\s/.test(source[i - 1]))) {
      hashtags = source
        .slice(i)
        .split(/\s+/)
        .filter((token) => token.length > 0)
        .map((token) => token.replace(/^#/, ""))
        .filter((token) => token.length > 0);
      break;
    }
    buffer += ch;
    i += 1;
  }
  flush();

  const last = parts[parts.length - 1];
  if (last && last.kind === "text") {
    const trimmed = last.value.trimEnd();
    if (trimmed.length === 0) {
      parts.pop();
    } else {
      parts[parts.length - 1] = { kind: "text", value: trimmed };
    }
  }
  return { parts, hashtags, condition };
};

class BodyParser {
  private index = 0;

  constructor(
    private readonly fileName: string,
    private readonly lines: BodyLine[],
    private readonly diagnostics: Diagnostic[]
  ) {}

  parseAll(): Statement[] {
    const statements = this.parseStatements(-1);
    while (this.index < this.lines.length) {
      // Only reachable through a stray branch keyword at the top level.
      const line = this.lines[this.index];
      this.report(`Unexpected "${line.text}" without a matching <<if>>.`, bodyLineSpan(line));
      this.index += 1;
      statements.push(...this.parseStatements(-1));
    }
    return statements;
  }

  private report(message: string, span: SourceSpan): void {
    this.diagnostics.push(parseError(this.fileName, message, span));
  }

  private attempt<T>(run: () => T): T | null {
    try {
      return run();
    } catch (error) {
      if (error instanceof SpindleError && error.code === "PARSE_ERROR") {
        this.report(error.message, error.span ?? lineSpan(1, 1, 1));
        return null;
      }
      throw error;
    }
  }

  private parseStatements(parentIndent: number): Statement[] {
    const statements: Statement[] = [];
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      if (line.indent <= parentIndent || BRANCH_KEYWORD_PATTERN.test(line.text)) {
        break;
      }
      const statement = this.parseStatement(line, parentIndent);
      if (statement) {
        statements.push(statement);
      }
    }
    return statements;
  }

  private parseStatement(line: BodyLine, parentIndent: number): Statement | null {
    if (line.text.startsWith("->")) {
      return this.parseOptions();
    }
    if (line.text.startsWith("<<")) {
      return this.parseCommandLine(line, parentIndent);
    }
    this.index += 1;
    const parsed = this.attempt(() =>
      parseText(line.text, line.line, line.column, { hashtags: true, condition: false })
    );
    if (!parsed) {
      return null;
    }
    return { kind: "line", parts: parsed.parts, hashtags: parsed.hashtags, span: bodyLineSpan(line) };
  }

  private parseOptions(): Statement {
    const first = this.lines[this.index];
    const options: OptionItem[] = [];
    let lastLine = first;
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      if (line.indent !== first.indent || !line.text.startsWith("->")) {
        break;
      }
      this.index += 1;
      const content = line.text.slice(2);
      const offset = content.length - content.trimStart().length;
      const parsed = this.attempt(() =>
        parseText(content.trimStart(), line.line, line.column + 2 + offset, { hashtags: true, condition: true })
      );
      const body = this.parseStatements(line.indent);
      lastLine = this.lines[this.index - 1] ?? line;
      if (parsed) {
        options.push({
          parts: parsed.parts,
          condition: parsed.condition,
          hashtags: parsed.hashtags,
          body,
          span: bodyLineSpan(line),
        });
      }
    }
    return {
      kind: "options",
      options,
      span: { start: bodyLineSpan(first).start, end: bodyLineSpan(lastLine).end },
    };
  }

  private parseCommandLine(line: BodyLine, parentIndent: number): Statement | null {
    const close = line.text.lastIndexOf(">>");
    if (close < 2) {
      this.index += 1;
      this.report("Unterminated \"<<\" command.", bodyLineSpan(line));
      return null;
    }
    const raw = line.text.slice(2, close);
    const inner = raw.trim();
    const innerColumn = line.column + 2 + (raw.length - raw.trimStart().length);
    const keyword = /^\w+/.exec(inner)?.[0] ?? "";

    if (keyword === "if") {
      return this.parseIf(line, inner, innerColumn, parentIndent);
    }
    this.index += 1;
    const span = bodyLineSpan(line);
    const expressionColumn = (expression: string): number => innerColumn + inner.length - expression.length;

    if (keyword === "set" || keyword === "declare") {
      const match = VARIABLE_ASSIGNMENT_PATTERN.exec(inner);
      if (!match) {
        this.report(`Malformed <<${keyword}>>; expected "<<${keyword} $name = value>>".`, span);
        return null;
      }
      const variable = match[2];
      if (keyword === "set") {
        const expression = this.attempt(() => parseExpression(match[3], line.line, expressionColumn(match[3])));
        return expression ? { kind: "set", variable, expression, span } : null;
      }
      const typed = DECLARE_TYPE_PATTERN.exec(match[3]);
      const valueSource = typed ? typed[1] : match[3];
      const value = this.attempt(() =>
        parseExpression(valueSource, line.line, expressionColumn(match[3]))
      );
      return value ? { kind: "declare", variable, value, typeName: typed ? typed[2] : null, span } : null;
    }

    if (keyword === "jump") {
      const target = inner.slice(4).trim();
      if (target.startsWith("{") && target.endsWith("}")) {
        const source = target.slice(1, -1);
        const expression = this.attempt(() =>
          parseExpression(source, line.line, expressionColumn(target) + 1)
        );
        return expression ? { kind: "jump", target: { kind: "expression", expression }, span } : null;
      }
      if (!isNodeName(target)) {
        this.report(`Invalid jump target "${target}".`, span);
        return null;
      }
      return { kind: "jump", target: { kind: "node", name: target }, span };
    }

    if (inner === "stop") {
      return { kind: "stop", span };
    }

    const parsed = this.attempt(() =>
      parseText(inner, line.line, innerColumn, { hashtags: false, condition: false })
    );
    if (!parsed) {
      return null;
    }
    if (parsed.parts.length === 0) {
      this.report("Empty command.", span);
      return null;
    }
    return { kind: "command", parts: parsed.parts, span };
  }

  private parseIf(
    line: BodyLine,
    inner: string,
    innerColumn: number,
    parentIndent: number
  ): Statement {
    const placeholder = (span: SourceSpan): Expression => ({ kind: "boolean", value: false, span });
    const parseCondition = (source: string, at: BodyLine, column: number): Expression => {
      if (source.trim().length === 0) {
        this.report("Missing condition.", bodyLineSpan(at));
        return placeholder(bodyLineSpan(at));
      }
      return this.attempt(() => parseExpression(source, at.line, column)) ?? placeholder(bodyLineSpan(at));
    };

    const clauses: IfClause[] = [];
    let condition: Expression | null = parseCondition(inner.slice(2), line, innerColumn + 2);
    let clauseLine = line;
    let endLine = line;
    this.index += 1;

    while (true) {
      const body = this.parseStatements(parentIndent);
      clauses.push({ condition, body, span: bodyLineSpan(clauseLine) });
      const next = this.lines[this.index];
      if (!next || next.indent <= parentIndent || !BRANCH_KEYWORD_PATTERN.test(next.text)) {
        this.report("Missing <<endif>>.", bodyLineSpan(line));
        break;
      }
      this.index += 1;
      endLine = next;
      const close = next.text.lastIndexOf(">>");
      const branch = next.text.slice(2, close).trim();
      if (branch === "endif") {
        break;
      }
      if (branch === "else") {
        if (condition === null) {
          this.report("Only one <<else>> is allowed per <<if>>.", bodyLineSpan(next));
        }
        condition = null;
      } else {
        if (condition === null) {
          this.report("<<elseif>> cannot follow <<else>>.", bodyLineSpan(next));
        }
        const offset = next.text.indexOf("elseif") + "elseif".length;
        condition = parseCondition(next.text.slice(offset, close), next, next.column + offset);
      }
      clauseLine = next;
    }

    return {
      kind: "if",
      clauses,
      span: { start: bodyLineSpan(line).start, end: bodyLineSpan(endLine).end },
    };
  }
}

interface PendingNode {
  headers: NodeHeader[];
  startLine: number;
  bodyLines: { raw: string; line: number }[];
}

const buildNode = (
  fileName: string,
  pending: PendingNode,
  endLine: number,
  diagnostics: Diagnostic[]
): NodeSyntax | null => {
  const span = lineSpan(pending.startLine, 1, 1);
  const titleHeader = pending.headers.find((header) => header.key === "title");
  if (!titleHeader || titleHeader.value.length === 0) {
    diagnostics.push(parseError(fileName, "Node is missing a \"title:\" header.", span));
    return null;
  }
  if (!isNodeName(titleHeader.value)) {
    diagnostics.push(parseError(fileName, `Invalid node title "${titleHeader.value}".`, titleHeader.span));
    return null;
  }
  const tags = pending.headers
    .filter((header) => header.key === "tags")
    .flatMap((header) => header.value.split(/\s+/))
    .filter((tag) => tag.length > 0);

  // rawText nodes keep their body as one string and are never parsed as statements.
  const lines: BodyLine[] = [];
  if (!tags.includes(RAW_TEXT_TAG)) {
    for (const { raw, line } of pending.bodyLines) {
      const { width, length } = measureIndent(raw);
      const text = stripComment(raw.slice(length)).trimEnd();
      if (text.length > 0) {
        lines.push({ text, indent: width, line, column: length + 1 });
      }
    }
  }
  const body = new BodyParser(fileName, lines, diagnostics).parseAll();

  return {
    title: titleHeader.value,
    headers: pending.headers,
    tags,
    body,
    bodySource: pending.bodyLines.map((entry) => entry.raw).join("\n"),
    span: { start: span.start, end: { line: endLine, column: 4 } },
  };
};

/**
 * Parses one script file into its syntax tree. Problems are reported as
 * `PARSE_ERROR` diagnostics; the tree keeps every node that could be read.
 */
export const parseSource = (fileName: string, source: string): ParsedSource => {
  const diagnostics: Diagnostic[] = [];
  const fileTags: string[] = [];
  const nodes: NodeSyntax[] = [];
  const rawLines = source.split(/\r?\n/);

  let mode: "between" | "header" | "body" = "between";
  let pending: PendingNode = { headers: [], startLine: 1, bodyLines: [] };

  for (let index = 0; index < rawLines.length; index += 1) {
    const raw = rawLines[index];
    const lineNumber = index + 1;
    const trimmed = raw.trim();

    if (mode === "body") {
      if (trimmed === "===") {
        const node = buildNode(fileName, pending, lineNumber, diagnostics);
        if (node) nodes.push(node);
        mode = "between";
      } else {
        pending.bodyLines.push({ raw, line: lineNumber });
      }
      continue;
    }

    if (trimmed.length === 0 || trimmed.startsWith("//")) {
      continue;
    }

    if (mode === "header" && trimmed === "---") {
      mode = "body";
      continue;
    }

    if (mode === "between" && nodes.length === 0 && trimmed.startsWith("#")) {
      const tag = trimmed.slice(1).trim();
      if (tag.length > 0) fileTags.push(tag);
      continue;
    }

    const header = HEADER_PATTERN.exec(trimmed);
    if (!header) {
      diagnostics.push(
        parseError(
          fileName,
          mode === "header" ? `Expected a header or "---", found "${trimmed}".` : `Expected a node header, found "${trimmed}".`,
          lineSpan(lineNumber, 1, raw.length + 1)
        )
      );
      continue;
    }
    if (mode === "between") {
      pending = { headers: [], startLine: lineNumber, bodyLines: [] };
      mode = "header";
    }
    pending.headers.push({
      key: header[1],
      value: header[2].trim(),
      span: lineSpan(lineNumber, 1, raw.length + 1),
    });
  }

  if (mode === "header") {
    diagnostics.push(parseError(fileName, "Node headers are not followed by \"---\".", lineSpan(pending.startLine, 1, 1)));
  } else if (mode === "body") {
    diagnostics.push(parseError(fileName, "Node body is not closed with \"===\".", lineSpan(pending.startLine, 1, 1)));
    const node = buildNode(fileName, pending, rawLines.length, diagnostics);
    if (node) nodes.push(node);
  }

  return { file: { fileName, tags: fileTags, nodes }, diagnostics };
};
