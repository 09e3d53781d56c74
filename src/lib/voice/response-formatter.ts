/**
 * Response Formatter
 *
 * Turns a decision into one speakable string: deduplicated, capped at a
 * couple of action points, each truncated to a character budget.
 */

import type { Decision, Recommendation } from "@/lib/types/decision";
import type { ClinicalPolicy } from "@/lib/policy/clinical-policy";

export type FormatOptions = ClinicalPolicy["response"];

/** Kinds spoken exactly as written */
const VERBATIM_KINDS: ReadonlySet<Recommendation["kind"]> = new Set(["clarification", "vital_alert", "context"]);

function stripTerminalPunctuation(text: string): string {
  return text.trim().replace(/[\s.!?;:,]+$/, "");
}

function dedupeKey(recommendation: Recommendation): string {
  if (recommendation.medication) {
    return `med:${recommendation.medication}:${recommendation.dose ?? ""}${recommendation.doseUnit ?? ""}`;
  }
  return `text:${stripTerminalPunctuation(recommendation.description).toLowerCase().replace(/\s+/g, " ")}`;
}

export function dedupeRecommendations(recommendations: readonly Recommendation[]): Recommendation[] {
  const seen = new Set<string>();
  return recommendations.filter((recommendation) => {
    const key = dedupeKey(recommendation);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function truncateDescription(text: string, budget: number): string {
  if (text.length <= budget) return text;
  return text.slice(0, budget).trimEnd() + "...";
}

export function formatDecision(decision: Decision, options: FormatOptions): string {
  const [first] = decision.recommendations;
  if (decision.recommendations.length === 1 && first && VERBATIM_KINDS.has(first.kind)) {
    return first.description;
  }

  const parts = dedupeRecommendations(decision.recommendations)
    .slice(0, options.maxActionPoints)
    .map((recommendation) =>
      truncateDescription(stripTerminalPunctuation(recommendation.description), options.descriptionBudget)
    )
    .filter((part) => part.length > 0);

  let response = parts.length > 0 ? parts.join(". ") : options.fallbackSentence;
  if (!response.endsWith(".")) response += ".";

  if (decision.warning) {
    response += ` Caution: ${stripTerminalPunctuation(decision.warning)}.`;
  }

  return response;
}
