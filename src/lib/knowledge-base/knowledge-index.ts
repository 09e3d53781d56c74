/**
 * Knowledge Index - the searchable view over the guideline corpus
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────────┐
 * │  Startup (once per engine)                                  │
 * │                                                             │
 * │  Corpus Store ──► BM25 index ──► frozen KnowledgeIndex      │
 * │                                                             │
 * │  Per query                                                  │
 * │                                                             │
 * │  raw ─► normalize ─► BM25 top-N ─► re-rank ─┐               │
 * │                         │ (empty)           ├─► results     │
 * │                         └─► keyword overlap ┘               │
 * └─────────────────────────────────────────────────────────────┘
 */

import type { CorpusStore, RankedEntry } from "@/lib/types/corpus";
import { buildRankerIndex, searchIndex, type RankerIndex, type RankerOptions } from "./lexical-ranker";
import { getQueryLexicon, type QueryLexicon } from "./query-lexicon";
import { normalizeQuery } from "./query-normalizer";
import { keywordFallbackSearch, rerankCandidates } from "./relevance-reranker";
import { getCorpusStatistics, type CorpusStatistics } from "./corpus-store";

export interface KnowledgeIndex {
  store: CorpusStore;
  ranker: RankerIndex;
  lexicon: QueryLexicon;
}

export interface GuidelineSearchResult {
  normalizedQuery: string;
  results: RankedEntry[];
  usedFallback: boolean;
}

/**
 * Build the index over a loaded corpus
 */
export function buildKnowledgeIndex(
  store: CorpusStore,
  options: RankerOptions & { lexicon?: QueryLexicon } = {}
): KnowledgeIndex {
  console.log("[Knowledge Index] Building BM25 index from corpus...");
  const startTime = Date.now();

  const ranker = buildRankerIndex(store.entries, options);

  console.log(
    `[Knowledge Index] Built index: ${ranker.totalDocs} documents, ${ranker.documentFrequency.size} terms in ${Date.now() - startTime}ms`
  );

  return Object.freeze({
    store,
    ranker,
    lexicon: options.lexicon ?? getQueryLexicon(),
  });
}

/**
 * Search the guideline corpus
 *
 * @param query - Raw or cleaned utterance (e.g., "how do i stop arterial bleeding")
 */
export function searchGuidelines(index: KnowledgeIndex, query: string, topN = 5): GuidelineSearchResult {
  const normalizedQuery = normalizeQuery(query, index.lexicon);
  const ranked = searchIndex(index.ranker, normalizedQuery, topN);

  if (ranked.length > 0) {
    return {
      normalizedQuery,
      results: rerankCandidates(ranked, index.lexicon),
      usedFallback: false,
    };
  }

  return {
    normalizedQuery,
    results: keywordFallbackSearch(index.store.entries, normalizedQuery, topN, index.lexicon),
    usedFallback: true,
  };
}

/**
 * Strip document headers and contributor blocks, then keep the first
 * actionable sentence, or a truncated excerpt when none is found
 */
export function extractGuidelineExcerpt(text: string, lexicon: QueryLexicon, budget: number): string {
  let cleaned = text;
  for (const pattern of lexicon.boilerplatePatterns) {
    cleaned = cleaned.replace(new RegExp(pattern, "gi"), " ");
  }
  cleaned = cleaned.replace(/\s+/g, " ").trim();

  const sentences = cleaned.split(/(?<=[.!?])\s+/).filter((s) => s.length > 0);
  const actionable = sentences.find((sentence) => {
    const lower = sentence.toLowerCase();
    return lexicon.reranker.actionVerbs.some((verb) => lower.includes(verb));
  });

  const excerpt = actionable ?? cleaned;
  if (excerpt.length <= budget) return excerpt;
  return excerpt.slice(0, budget).trimEnd() + "...";
}

/**
 * Get index statistics (for startup logs and health checks)
 */
export function getIndexStats(index: KnowledgeIndex): CorpusStatistics & {
  corpusLevel: CorpusStore["level"];
  vocabularySize: number;
  averageDocumentLength: number;
} {
  return {
    ...getCorpusStatistics(index.store),
    corpusLevel: index.store.level,
    vocabularySize: index.ranker.documentFrequency.size,
    averageDocumentLength: index.ranker.averageDocumentLength,
  };
}
