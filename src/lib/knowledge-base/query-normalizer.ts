/**
 * Query Normalizer
 *
 * Deterministic cleanup of speech-recognized queries before they reach the
 * patient context extractor, the rule tables and the ranker:
 *
 *   raw ──► lowercase / whitespace ──► literal corrections ──► disambiguation
 *                                                                   │
 *                                          cleanQuery() ◄───────────┘
 *                                               │
 *                                   expandQuery() (retrieval only)
 *
 * Expansion words are only ever used for ranking, so a synonym such as
 * "pregnancy" appended for "obstetric" can never become a patient condition.
 */

import { getQueryLexicon, type DisambiguationRule, type QueryLexicon } from "./query-lexicon";
import {
  collapseWhitespace,
  containsAnyWordStartingWith,
  containsPhrase,
  replacePhrase,
} from "@/lib/utils/text-match";

/**
 * Rewrite the ambiguous short token to its clinical form, but only when an
 * indicator word shares the utterance. Kept as its own rule so clinicians can
 * review it apart from the literal corrections.
 */
export function applyDisambiguation(query: string, rule: DisambiguationRule): string {
  if (!containsPhrase(query, rule.token)) return query;
  if (containsPhrase(query, rule.skipWhenPresent)) return query;
  if (!containsAnyWordStartingWith(query, rule.indicators)) return query;
  return replacePhrase(query, rule.token, rule.replacement);
}

/**
 * Lowercase, apply the ordered correction table, then the disambiguation rule
 */
export function cleanQuery(raw: string, lexicon: QueryLexicon = getQueryLexicon()): string {
  let query = collapseWhitespace(raw.toLowerCase());

  for (const [heard, meant] of lexicon.corrections) {
    query = replacePhrase(query, heard, meant);
  }

  return applyDisambiguation(collapseWhitespace(query), lexicon.disambiguation);
}

/**
 * Append each triggered synonym set once. Triggers are matched against the
 * cleaned query only, so appended words never trigger further expansion.
 */
export function expandQuery(cleaned: string, lexicon: QueryLexicon = getQueryLexicon()): string {
  const appended: string[] = [];

  for (const [trigger, synonyms] of Object.entries(lexicon.expansions)) {
    if (containsPhrase(cleaned, trigger)) {
      appended.push(...synonyms);
    }
  }

  return collapseWhitespace([cleaned, ...appended].join(" "));
}

export function normalizeQuery(raw: string, lexicon: QueryLexicon = getQueryLexicon()): string {
  return expandQuery(cleanQuery(raw, lexicon), lexicon);
}
