/**
 * Corpus Store - immutable guideline entries loaded once at startup
 *
 * The corpus builder writes up to three artifact levels; the first one found
 * wins:
 *
 *   comprehensive ──► focused ──► legacy ──► (none: refuse to start)
 *
 * Entry order is preserved and is the ranker's tie-break order.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { CorpusEntry, CorpusLevel, CorpusStore } from "@/lib/types/corpus";
import { createCorpusUnavailableError, createPolicyValidationError } from "@/lib/utils/errors";

export const DEFAULT_CORPUS_ARTIFACTS: ReadonlyArray<{ level: CorpusLevel; filename: string }> = [
  { level: "comprehensive", filename: "jts_comprehensive_corpus.json" },
  { level: "focused", filename: "jts_focused_corpus.json" },
  { level: "legacy", filename: "jts_rescue_medicine_cleaned.json" },
];

/** Wire format written by the corpus builder (snake_case) */
const corpusRecordSchema = z
  .object({
    text: z.string().min(1),
    source: z.string(),
    section: z.string().default(""),
    category: z.string().default("general"),
    page: z.number().int().nonnegative().default(0),
    priority_score: z.number().default(0),
  })
  .transform(
    (record): CorpusEntry => ({
      text: record.text,
      source: record.source,
      section: record.section,
      category: record.category,
      page: record.page,
      priorityScore: record.priority_score,
    })
  );

const corpusFileSchema = z.array(corpusRecordSchema);

export interface LoadCorpusOptions {
  directory: string;
  artifacts?: ReadonlyArray<{ level: CorpusLevel; filename: string }>;
}

/**
 * Validate raw corpus records from the builder
 */
export function parseCorpusRecords(raw: unknown, source = "corpus"): CorpusEntry[] {
  const result = corpusFileSchema.safeParse(raw);
  if (!result.success) {
    throw createPolicyValidationError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Wrap entries in a frozen store
 */
export function createCorpusStore(
  entries: readonly CorpusEntry[],
  level: CorpusStore["level"] = "in_memory"
): CorpusStore {
  const frozen = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
  return Object.freeze({ level, entries: frozen });
}

/**
 * Load the highest-priority corpus artifact present in `directory`
 */
export function loadCorpus(options: LoadCorpusOptions): CorpusStore {
  const artifacts = options.artifacts ?? DEFAULT_CORPUS_ARTIFACTS;
  const searched: string[] = [];

  for (const { level, filename } of artifacts) {
    const path = join(options.directory, filename);
    searched.push(path);
    if (!existsSync(path)) continue;

    console.log(`[Corpus Store] Loading ${level} corpus from ${path}...`);

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw createPolicyValidationError(path, [`unreadable corpus file: ${message}`]);
    }

    const entries = parseCorpusRecords(raw, path);
    console.log(`[Corpus Store] Loaded ${entries.length} corpus entries`);
    return createCorpusStore(entries, level);
  }

  console.error("[Corpus Store] No corpus files found. Run the corpus builder first.");
  throw createCorpusUnavailableError(searched);
}

export interface CorpusStatistics {
  totalEntries: number;
  entriesByCategory: Record<string, number>;
  sources: string[];
  averagePriorityScore: number;
}

/**
 * Get corpus statistics (for startup logs and health checks)
 */
export function getCorpusStatistics(store: CorpusStore): CorpusStatistics {
  const entriesByCategory: Record<string, number> = {};
  const sources = new Set<string>();
  let priorityTotal = 0;

  for (const entry of store.entries) {
    entriesByCategory[entry.category] = (entriesByCategory[entry.category] || 0) + 1;
    sources.add(entry.source);
    priorityTotal += entry.priorityScore;
  }

  return {
    totalEntries: store.entries.length,
    entriesByCategory,
    sources: [...sources].sort(),
    averagePriorityScore: store.entries.length > 0 ? priorityTotal / store.entries.length : 0,
  };
}
