export interface CorpusEntry {
  text: string;
  source: string;
  section: string;
  category: string;
  page: number;
  priorityScore: number;
}

export type CorpusLevel = "comprehensive" | "focused" | "legacy";

export interface CorpusStore {
  level: CorpusLevel | "in_memory";
  entries: readonly CorpusEntry[];
}

export interface RankedEntry {
  entry: CorpusEntry;
  /** Index of the entry in corpus order, used for tie-breaking */
  position: number;
  score: number;
  matchedTerms: string[];
}
