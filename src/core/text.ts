/** Replaces `{0}`, `{1}`, ... with the matching substitution; unknown indices stay as written. */
export const expandSubstitutions = (text: string, substitutions: readonly string[]): string =>
  text.replace(/\{(\d+)\}/g, (match: string, index: string) => {
    const position = Number(index);
    return position < substitutions.length ? substitutions[position] : match;
  });

/**
 * Splits command text on whitespace. Double-quoted runs stay together with
 * their quotes removed, so `walk "the long way"` yields two tokens.
 */
export const splitCommandText = (text: string): string[] => {
  const tokens: string[] = [];
  let current = "";
  let quoted = false;
  let hasToken = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\" && quoted && i + 1 < text.length) {
      current += text[i + 1];
      i += 1;
      continue;
    }
    if (ch === "\"") {
      quoted = !quoted;
      hasToken = true;
      continue;
    }
    if (!quoted && /\s/.test(ch)) {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
      continue;
    }
    current += ch;
    hasToken = true;
  }
  if (hasToken) {
    tokens.push(current);
  }
  return tokens;
};
