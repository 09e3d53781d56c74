/**
 * Relevance Re-ranker
 *
 * BM25 favours whatever repeats the query words, which in guideline PDFs is
 * often a section header or a contributor list. The re-ranker prefers
 * dosage-bearing, actionable text:
 *
 *   +3  numeric dosage with a unit ("0.3 mg/kg", "1g")
 *   +2  per known medication name
 *   +1  per action verb
 *   −2  per boilerplate indicator
 *   −3  text shorter than the short-text threshold
 *
 * Entries are ordered by that adjustment alone; equal adjustments keep the
 * ranker's order.
 */

import type { CorpusEntry, RankedEntry } from "@/lib/types/corpus";
import type { QueryLexicon } from "./query-lexicon";
import { getQueryLexicon } from "./query-lexicon";
import { tokenize } from "./lexical-ranker";

export interface RerankedEntry extends RankedEntry {
  adjustment: number;
}

export function scoreContentDensity(text: string, lexicon: QueryLexicon = getQueryLexicon()): number {
  const lower = text.toLowerCase();
  const { reranker } = lexicon;
  let score = 0;

  if (new RegExp(reranker.dosagePattern).test(lower)) score += 3;

  for (const med of reranker.medications) {
    if (lower.includes(med)) score += 2;
  }

  for (const verb of reranker.actionVerbs) {
    if (lower.includes(verb)) score += 1;
  }

  for (const indicator of reranker.boilerplate) {
    if (lower.includes(indicator)) score -= 2;
  }

  if (lower.length < reranker.shortTextLength) score -= 3;

  return score;
}

/**
 * Re-score ranked candidates. The adjustments depend on entry text only.
 */
export function rerankCandidates(
  candidates: readonly RankedEntry[],
  lexicon: QueryLexicon = getQueryLexicon()
): RerankedEntry[] {
  const rescored = candidates.map((candidate, rank) => ({
    candidate: { ...candidate, adjustment: scoreContentDensity(candidate.entry.text, lexicon) },
    rank,
  }));

  rescored.sort((a, b) => b.candidate.adjustment - a.candidate.adjustment || a.rank - b.rank);
  return rescored.map(({ candidate }) => candidate);
}

/**
 * Keyword-overlap fallback for when BM25 finds nothing. Query words are
 * tokenized like ranker terms, stop words dropped, then matched as substrings.
 *
 * +2 per query word in the text, +3 in the source, +1 in the section, and +2
 * for each clinical-term variation of a query word found in text or source.
 */
export function keywordFallbackSearch(
  entries: readonly CorpusEntry[],
  query: string,
  topN = 5,
  lexicon: QueryLexicon = getQueryLexicon()
): RankedEntry[] {
  const queryWords = tokenize(query);
  if (queryWords.length === 0 || topN <= 0) return [];

  const results: RankedEntry[] = [];

  entries.forEach((entry, position) => {
    const text = entry.text.toLowerCase();
    const source = entry.source.toLowerCase();
    const section = entry.section.toLowerCase();
    const matchedTerms = new Set<string>();
    let score = 0;

    for (const word of queryWords) {
      if (text.includes(word)) {
        score += 2;
        matchedTerms.add(word);
      }
      if (source.includes(word)) {
        score += 3;
        matchedTerms.add(word);
      }
      if (section.includes(word)) {
        score += 1;
        matchedTerms.add(word);
      }
    }

    for (const [term, variations] of Object.entries(lexicon.fallbackVariations)) {
      if (!queryWords.includes(term)) continue;
      for (const variation of variations) {
        if (text.includes(variation) || source.includes(variation)) {
          score += 2;
          matchedTerms.add(variation);
        }
      }
    }

    if (score > 0) {
      results.push({ entry, position, score, matchedTerms: [...matchedTerms] });
    }
  });

  results.sort((a, b) => b.score - a.score || a.position - b.position);
  return results.slice(0, topN);
}
