import { SpindleError } from "../core/errors.js";
import { expandSubstitutions } from "../core/text.js";
import type { Line, LineId, StringTable } from "../core/types.js";

export type TextProvider =
  | {
      kind: "stringTable";
      baseLanguage: string;
      base: Record<LineId, string>;
      translations: Record<string, Record<LineId, string>>;
    }
  | {
      kind: "custom";
      getText: (lineId: LineId, language: string | null) => string | undefined;
    };

const lookup = (texts: Record<LineId, string> | undefined, lineId: LineId): string | undefined =>
  texts && Object.hasOwn(texts, lineId) ? texts[lineId] : undefined;

export const createStringTableTextProvider = (stringTable: StringTable, baseLanguage = "en"): TextProvider => {
  const base: Record<LineId, string> = {};
  for (const [lineId, info] of Object.entries(stringTable)) {
    base[lineId] = info.text;
  }
  return { kind: "stringTable", baseLanguage, base, translations: {} };
};

/** Returns a provider with `texts` added to (or overriding) the `language` table. */
export const extendTranslation = (
  provider: TextProvider,
  language: string,
  texts: Record<LineId, string>
): TextProvider => {
  if (provider.kind !== "stringTable") {
    throw new SpindleError(
      "TEXT_PROVIDER_UNSUPPORTED",
      "Translations can only be added to a string-table text provider."
    );
  }
  const existing = Object.hasOwn(provider.translations, language) ? provider.translations[language] : {};
  return {
    ...provider,
    translations: { ...provider.translations, [language]: { ...existing, ...texts } },
  };
};

/** Text for `lineId`, falling back to the base language when a translation lacks it. */
export const getLineText = (provider: TextProvider, lineId: LineId, language?: string): string | undefined => {
  if (provider.kind === "custom") {
    return provider.getText(lineId, language ?? null);
  }
  if (language !== undefined && language !== provider.baseLanguage) {
    const translated = lookup(
      Object.hasOwn(provider.translations, language) ? provider.translations[language] : undefined,
      lineId
    );
    if (translated !== undefined) {
      return translated;
    }
  }
  return lookup(provider.base, lineId);
};

export const resolveLineText = (provider: TextProvider, line: Line, language?: string): string => {
  const text = getLineText(provider, line.id, language);
  if (text === undefined) {
    throw new SpindleError("TEXT_NOT_FOUND", `No text for line "${line.id}".`);
  }
  return expandSubstitutions(text, line.substitutions);
};
