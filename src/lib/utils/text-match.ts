/**
 * Word-bounded phrase matching for spoken queries
 *
 * A plain substring test turns "mi" into a hit on "minutes" and "epi" into a
 * hit on "epidural"; these helpers anchor phrases on non-alphanumeric edges.
 */

const patternCache = new Map<string, RegExp>();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function boundedPattern(phrase: string, prefixOnly: boolean, flags: string): RegExp {
  const key = `${prefixOnly ? "p" : "w"}:${flags}:${phrase}`;
  const cached = patternCache.get(key);
  if (cached) {
    cached.lastIndex = 0;
    return cached;
  }

  const tail = prefixOnly ? "" : "(?![a-z0-9])";
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase.toLowerCase())}${tail}`, flags);
  patternCache.set(key, pattern);
  return pattern;
}

/**
 * True when `phrase` occurs in `text` as whole words
 */
export function containsPhrase(text: string, phrase: string): boolean {
  return boundedPattern(phrase, false, "").test(text.toLowerCase());
}

/**
 * True when some word in `text` starts with `stem` ("burn" matches "burned")
 */
export function containsWordStartingWith(text: string, stem: string): boolean {
  return boundedPattern(stem, true, "").test(text.toLowerCase());
}

export function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase));
}

export function containsAnyWordStartingWith(text: string, stems: readonly string[]): boolean {
  return stems.some((stem) => containsWordStartingWith(text, stem));
}

/**
 * Replace every whole-word occurrence of `phrase` (text is expected lowercase)
 */
export function replacePhrase(text: string, phrase: string, replacement: string): string {
  return text.replace(boundedPattern(phrase, false, "g"), replacement);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
