/**
 * Lightweight BM25 Ranking Engine
 *
 * Zero external dependencies. Scores guideline entries with the two-parameter
 * saturating term-frequency formula:
 *
 *   score(q, d) = Σ idf(t) · tf(t,d)·(k1+1) / (tf(t,d) + k1·(1 − b + b·|d|/avgdl))
 *   idf(t)      = ln((N − df + 0.5) / (df + 0.5)), floored at 0
 *
 * Architecture:
 * ┌─────────────────────────────────────────────────────────┐
 * │  Corpus Store (immutable, ordered)                      │
 * │                  │                                      │
 * │                  ▼                                      │
 * │         ┌─────────────────┐                             │
 * │         │  BM25 Indexer   │  built once at startup      │
 * │         │  tf / df / avgdl│  frozen afterwards          │
 * │         └────────┬────────┘                             │
 * │                  ▼                                      │
 * │         ┌─────────────────┐                             │
 * │         │  Stable ranking │  → Top-N, ties by position  │
 * │         └─────────────────┘                             │
 * └─────────────────────────────────────────────────────────┘
 *
 * The index holds no mutable state after build, so any number of sessions can
 * query one index.
 */

import type { CorpusEntry, RankedEntry } from "@/lib/types/corpus";

// ============================================================
// Types
// ============================================================

export interface RankerOptions {
  k1?: number;
  b?: number;
  /** Drop common English function words from documents and queries */
  stopWords?: boolean;
}

export interface RankerIndex {
  entries: readonly CorpusEntry[];
  /** Per-entry term frequencies */
  termFrequencies: readonly ReadonlyMap<string, number>[];
  /** Per-entry token counts */
  documentLengths: readonly number[];
  /** Number of entries containing each term */
  documentFrequency: ReadonlyMap<string, number>;
  averageDocumentLength: number;
  totalDocs: number;
  k1: number;
  b: number;
  stopWords: boolean;
}

// ============================================================
// Text Processing
// ============================================================

/** Common words that add no search value */
const STOP_WORDS = new Set([
  "a", "an", "the", "is", "are", "was", "were", "be", "been", "being",
  "have", "has", "had", "do", "does", "did", "will", "would", "could",
  "should", "may", "might", "must", "shall", "can",
  "to", "of", "in", "for", "on", "with", "at", "by", "from", "as",
  "into", "through", "during", "then", "once", "here", "there", "when",
  "where", "why", "how", "all", "both", "each", "some", "such",
  "only", "own", "same", "so", "than", "too", "very", "just",
  "about", "also", "and", "but", "or", "if", "while", "this", "that",
  "these", "those", "it", "its", "they", "them", "their", "we", "us",
  "our", "you", "your", "he", "she", "his", "her", "him", "i", "me", "my",
  "which", "who", "whom", "what",
]);

/**
 * Tokenize text into ranking terms
 * Keeps dosage notation ("mg/kg", "0.5", "90%") and hyphenated clinical terms
 * intact; single letters are dropped
 */
export function tokenize(text: string, stopWords = true): string[] {
  const tokens: string[] = [];

  for (const raw of text.toLowerCase().split(/\s+/)) {
    const token = raw.replace(/[^\w/.%-]/g, "").replace(/^[.\-/]+|[.\-/]+$/g, "");
    if (token.length === 0) continue;
    if (token.length === 1 && !/\d/.test(token)) continue;
    if (stopWords && STOP_WORDS.has(token)) continue;
    tokens.push(token);
  }

  return tokens;
}

// ============================================================
// BM25 Engine
// ============================================================

function countTerms(terms: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const term of terms) {
    tf.set(term, (tf.get(term) ?? 0) + 1);
  }
  return tf;
}

/**
 * Build a BM25 index over the corpus. Called once per engine.
 */
export function buildRankerIndex(entries: readonly CorpusEntry[], options: RankerOptions = {}): RankerIndex {
  const { k1 = 1.5, b = 0.75, stopWords = true } = options;

  const termFrequencies: Map<string, number>[] = [];
  const documentLengths: number[] = [];
  const documentFrequency = new Map<string, number>();

  for (const entry of entries) {
    const terms = tokenize(entry.text, stopWords);
    const tf = countTerms(terms);
    termFrequencies.push(tf);
    documentLengths.push(terms.length);

    for (const term of tf.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const totalLength = documentLengths.reduce((sum, len) => sum + len, 0);

  return Object.freeze({
    entries,
    termFrequencies,
    documentLengths,
    documentFrequency,
    averageDocumentLength: entries.length > 0 ? totalLength / entries.length : 0,
    totalDocs: entries.length,
    k1,
    b,
    stopWords,
  });
}

/**
 * Inverse document frequency; 0 for terms the corpus never saw
 */
export function inverseDocumentFrequency(index: RankerIndex, term: string): number {
  const df = index.documentFrequency.get(term);
  if (!df) return 0;
  return Math.max(0, Math.log((index.totalDocs - df + 0.5) / (df + 0.5)));
}

/**
 * BM25 score of one entry for a set of query terms
 */
export function scoreEntry(index: RankerIndex, position: number, queryTerms: readonly string[]): number {
  const tf = index.termFrequencies[position];
  const docLen = index.documentLengths[position];
  if (!tf || docLen === undefined || index.averageDocumentLength === 0) return 0;

  const { k1, b } = index;
  const lengthNorm = 1 - b + b * (docLen / index.averageDocumentLength);
  let score = 0;

  for (const term of queryTerms) {
    const freq = tf.get(term);
    if (!freq) continue;
    score += inverseDocumentFrequency(index, term) * ((freq * (k1 + 1)) / (freq + k1 * lengthNorm));
  }

  return score;
}

/**
 * Rank entries for pre-tokenized query terms. Entries that match no query
 * term are left out; ties keep corpus order.
 */
export function queryIndex(index: RankerIndex, tokens: readonly string[], topN = 5): RankedEntry[] {
  const queryTerms = [...new Set(tokens)].filter((term) => index.documentFrequency.has(term));
  if (queryTerms.length === 0 || topN <= 0) return [];

  const results: RankedEntry[] = [];
  for (let position = 0; position < index.entries.length; position++) {
    const tf = index.termFrequencies[position];
    const matchedTerms = queryTerms.filter((term) => tf?.has(term));
    if (matchedTerms.length === 0) continue;

    results.push({
      entry: index.entries[position],
      position,
      score: scoreEntry(index, position, queryTerms),
      matchedTerms,
    });
  }

  // Array.prototype.sort is stable; position breaks remaining ties explicitly
  results.sort((a, b) => b.score - a.score || a.position - b.position);
  return results.slice(0, topN);
}

/**
 * Tokenize a query string and rank
 */
export function searchIndex(index: RankerIndex, query: string, topN = 5): RankedEntry[] {
  return queryIndex(index, tokenize(query, index.stopWords), topN);
}
