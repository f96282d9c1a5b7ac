const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Whole-word (or whole-phrase) match, so "hi" does not hit "this" and "ok" does not hit "book".
 * `text` is expected lower-cased.
 */
export function containsKeyword(text: string, keyword: string): boolean {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`);
    patternCache.set(keyword, pattern);
  }
  return pattern.test(text);
}

export function findKeyword(text: string, keywords: readonly string[]): string | undefined {
  return keywords.find((kw) => containsKeyword(text, kw));
}
