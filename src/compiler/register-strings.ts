import { rawTextStringId } from "../core/program.js";
import type { Diagnostic, StringTable } from "../core/types.js";
import type { FileSyntax, OptionItem, Statement, TextPart } from "./ast.js";
import { parseSource, RAW_TEXT_TAG } from "./parser.js";
import { diagnostic, type CompilerPass } from "./state.js";

export const LAST_LINE_TAG = "lastline";
export const LINE_ID_PREFIX = "line:";

export const lineIdOf = (hashtags: readonly string[]): string | undefined =>
  hashtags.find((tag) => tag.startsWith(LINE_ID_PREFIX));

export const lineMetadataOf = (hashtags: readonly string[]): string[] =>
  hashtags.filter((tag) => !tag.startsWith(LINE_ID_PREFIX));

/** Author text with each interpolated expression replaced by its `{n}` placeholder. */
export const textWithPlaceholders = (parts: readonly TextPart[]): string => {
  let index = 0;
  let text = "";
  for (const part of parts) {
    if (part.kind === "text") {
      text += part.value;
    } else {
      text += `{${index}}`;
      index += 1;
    }
  }
  return text;
};

const mapBlocks = (statement: Statement, map: (block: Statement[]) => Statement[]): Statement => {
  if (statement.kind === "options") {
    return { ...statement, options: statement.options.map((option) => ({ ...option, body: map(option.body) })) };
  }
  if (statement.kind === "if") {
    return { ...statement, clauses: statement.clauses.map((clause) => ({ ...clause, body: map(clause.body) })) };
  }
  return statement;
};

const tagBlock = (statements: Statement[]): Statement[] =>
  statements.map((statement, index) => {
    const mapped = mapBlocks(statement, tagBlock);
    const next = statements[index + 1];
    if (mapped.kind === "line" && next?.kind === "options" && !mapped.hashtags.includes(LAST_LINE_TAG)) {
      return { ...mapped, hashtags: [...mapped.hashtags, LAST_LINE_TAG] };
    }
    return mapped;
  });

/**
 * Marks the final line before each option group with `#lastline`, so a UI
 * can present the options without waiting for another continue.
 */
export const tagLastLines = (file: FileSyntax): FileSyntax => ({
  ...file,
  nodes: file.nodes.map((node) => ({ ...node, body: tagBlock(node.body) })),
});

interface CollectedStrings {
  file: FileSyntax;
  diagnostics: Diagnostic[];
  addedImplicitIds: boolean;
}

/**
 * Adds every line and option of `file` to `table`. Lines without a
 * `#line:` tag receive an implicit id, which is written back into the
 * returned tree so code generation finds it in the hashtags.
 */
export const collectStrings = (file: FileSyntax, table: StringTable): CollectedStrings => {
  const diagnostics: Diagnostic[] = [];
  let addedImplicitIds = false;

  const nodes = file.nodes.map((node) => {
    if (node.tags.includes(RAW_TEXT_TAG)) {
      table[rawTextStringId(node.title)] = {
        text: node.bodySource,
        nodeName: node.title,
        lineNumber: node.span.start.line,
        fileName: file.fileName,
        isImplicitTag: false,
        metadata: [],
      };
      return node;
    }

    let implicitCounter = 0;
    const register = (parts: TextPart[], hashtags: string[], lineNumber: number, span: Statement["span"]): string[] => {
      const metadata = lineMetadataOf(hashtags);
      const explicitId = lineIdOf(hashtags);
      const entry = {
        text: textWithPlaceholders(parts),
        nodeName: node.title,
        lineNumber,
        fileName: file.fileName,
        metadata,
      };
      if (explicitId) {
        if (Object.hasOwn(table, explicitId)) {
          diagnostics.push(
            diagnostic("error", "DUPLICATE_LINE_ID", `Duplicate line ID "${explicitId}".`, file.fileName, span)
          );
        } else {
          table[explicitId] = { ...entry, isImplicitTag: false };
        }
        return hashtags;
      }
      const implicitId = `${LINE_ID_PREFIX}${file.fileName}-${node.title}-${implicitCounter}`;
      implicitCounter += 1;
      addedImplicitIds = true;
      // A clash here only happens for duplicated node names, reported when programs combine.
      if (!Object.hasOwn(table, implicitId)) {
        table[implicitId] = { ...entry, isImplicitTag: true };
      }
      return [...hashtags, implicitId];
    };

    const registerOption = (option: OptionItem): OptionItem => ({
      ...option,
      hashtags: register(option.parts, option.hashtags, option.span.start.line, option.span),
      body: registerBlock(option.body),
    });

    const registerBlock = (statements: Statement[]): Statement[] =>
      statements.map((statement) => {
        if (statement.kind === "line") {
          return {
            ...statement,
            hashtags: register(statement.parts, statement.hashtags, statement.span.start.line, statement.span),
          };
        }
        if (statement.kind === "options") {
          return { ...statement, options: statement.options.map(registerOption) };
        }
        return mapBlocks(statement, registerBlock);
      });

    return { ...node, body: registerBlock(node.body) };
  });

  return { file: { ...file, nodes }, diagnostics, addedImplicitIds };
};

export const registerStrings: CompilerPass = (state) => {
  const stringTable: StringTable = { ...state.stringTable };
  const diagnostics = [...state.diagnostics];
  const parsedFiles: FileSyntax[] = [];
  let containsImplicitStringTags = state.containsImplicitStringTags;

  for (const source of state.files) {
    const parsed = parseSource(source.fileName, source.source);
    diagnostics.push(...parsed.diagnostics);
    const collected = collectStrings(tagLastLines(parsed.file), stringTable);
    diagnostics.push(...collected.diagnostics);
    containsImplicitStringTags = containsImplicitStringTags || collected.addedImplicitIds;
    parsedFiles.push(collected.file);
    state.logger.debug("registered strings", {
      file: source.fileName,
      nodes: collected.file.nodes.length,
    });
  }

  return { ...state, parsedFiles, stringTable, diagnostics, containsImplicitStringTags };
};
