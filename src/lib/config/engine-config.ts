/**
 * Engine configuration from environment variables
 *
 *   RECALL_CORPUS_DIR        directory holding the corpus artifacts (default: cwd)
 *   RECALL_POLICY_PATH       reviewed clinical policy JSON (default: bundled table)
 *   RECALL_TOP_N             retrieval depth (default: 5)
 *   RECALL_RESOLUTION_MODE   "rules" | "guideline" (default: rules)
 */

import type { ResolutionMode } from "@/lib/types/decision";

export interface EngineConfig {
  corpusDirectory: string;
  policyPath?: string;
  topN: number;
  mode: ResolutionMode;
}

const DEFAULT_TOP_N = 5;

function parseMode(value: string | undefined): ResolutionMode {
  if (!value) return "rules";
  const mode = value.trim().toLowerCase();
  if (mode === "rules" || mode === "guideline") return mode;
  console.warn(`[Recall Engine] Unknown RECALL_RESOLUTION_MODE "${value}", using "rules"`);
  return "rules";
}

export function resolveEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const topN = parseInt(env.RECALL_TOP_N || String(DEFAULT_TOP_N), 10);

  return {
    corpusDirectory: env.RECALL_CORPUS_DIR || process.cwd(),
    policyPath: env.RECALL_POLICY_PATH || undefined,
    topN: Number.isFinite(topN) && topN > 0 ? topN : DEFAULT_TOP_N,
    mode: parseMode(env.RECALL_RESOLUTION_MODE),
  };
}
