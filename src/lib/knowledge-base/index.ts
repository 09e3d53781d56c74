/**
 * Guideline Knowledge Base
 *
 * Offline retrieval over the guideline corpus:
 * ┌─────────────────────────────────────────────────────────────┐
 * │  ┌──────────────┐  ┌──────────────┐  ┌──────────────┐       │
 * │  │ Corpus       │  │ Query        │  │ Query        │       │
 * │  │ Store        │  │ Lexicon      │  │ Normalizer   │       │
 * │  └──────┬───────┘  └──────┬───────┘  └──────┬───────┘       │
 * │         │                 │                 │               │
 * │         └────────┬────────┴─────────────────┘               │
 * │           ┌──────▼───────┐   ┌──────────────┐               │
 * │           │ BM25 Ranker  │──►│ Re-ranker    │               │
 * │           └──────────────┘   └──────────────┘               │
 * └─────────────────────────────────────────────────────────────┘
 */

export * from "./corpus-store";
export * from "./lexical-ranker";
export * from "./query-lexicon";
export * from "./query-normalizer";
export * from "./relevance-reranker";
export * from "./knowledge-index";
