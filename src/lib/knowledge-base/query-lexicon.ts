/**
 * Query Lexicon - speech corrections, synonym expansion and re-ranking vocabulary
 *
 * Bundled as static JSON, validated once with zod.
 */

import { z } from "zod";
import bundledLexicon from "./query-lexicon.json";
import { createPolicyValidationError } from "@/lib/utils/errors";

const queryLexiconSchema = z.object({
  corrections: z.array(z.tuple([z.string().min(1), z.string()])),
  disambiguation: z.object({
    token: z.string().min(1),
    replacement: z.string().min(1),
    skipWhenPresent: z.string().min(1),
    indicators: z.array(z.string().min(1)).min(1),
    note: z.string().optional(),
  }),
  expansions: z.record(z.string().min(1), z.array(z.string().min(1)).min(1)),
  reranker: z.object({
    dosagePattern: z.string().min(1),
    medications: z.array(z.string().min(1)),
    actionVerbs: z.array(z.string().min(1)),
    boilerplate: z.array(z.string().min(1)),
    shortTextLength: z.number().int().nonnegative(),
  }),
  fallbackVariations: z.record(z.string().min(1), z.array(z.string().min(1))),
  boilerplatePatterns: z.array(z.string().min(1)),
});

export type QueryLexicon = z.infer<typeof queryLexiconSchema>;
export type DisambiguationRule = QueryLexicon["disambiguation"];

let _lexicon: QueryLexicon | null = null;

export function parseQueryLexicon(raw: unknown, source = "query lexicon"): QueryLexicon {
  const result = queryLexiconSchema.safeParse(raw);
  if (!result.success) {
    throw createPolicyValidationError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Get the bundled lexicon (lazy singleton)
 */
export function getQueryLexicon(): QueryLexicon {
  if (_lexicon) return _lexicon;
  _lexicon = parseQueryLexicon(bundledLexicon, "bundled query-lexicon.json");
  return _lexicon;
}
