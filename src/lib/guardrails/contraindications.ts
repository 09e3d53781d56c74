/**
 * Contraindication Checker
 *
 * Cross-references the patient's active conditions with the medications named
 * in a query or in the answer about to be spoken. A hit produces a spoken
 * warning; it never blocks the answer.
 */

import type { ContraindicationRule } from "@/lib/policy/clinical-policy";
import { containsPhrase } from "@/lib/utils/text-match";

export interface ContraindicationHit {
  condition: string;
  trigger: string;
  warning: string;
}

/**
 * @param texts - The query, optionally followed by the candidate response texts
 */
export function findContraindications(
  texts: string | readonly string[],
  conditions: ReadonlySet<string>,
  rules: readonly ContraindicationRule[]
): ContraindicationHit[] {
  const sources = typeof texts === "string" ? [texts] : texts;
  const hits: ContraindicationHit[] = [];

  for (const rule of rules) {
    if (!conditions.has(rule.condition)) continue;
    const trigger = rule.triggers.find((t) => sources.some((text) => containsPhrase(text, t)));
    if (trigger) {
      hits.push({ condition: rule.condition, trigger, warning: rule.warning });
    }
  }

  return hits;
}

/**
 * Warnings joined with "; ", or null when nothing is triggered
 */
export function checkContraindications(
  texts: string | readonly string[],
  conditions: ReadonlySet<string>,
  rules: readonly ContraindicationRule[]
): string | null {
  const hits = findContraindications(texts, conditions, rules);
  return hits.length > 0 ? hits.map((hit) => hit.warning).join("; ") : null;
}

/**
 * Combine warnings from several checks, dropping empty ones and repeats
 */
export function mergeWarnings(...warnings: Array<string | null | undefined>): string | null {
  const unique = [...new Set(warnings.filter((w): w is string => typeof w === "string" && w.length > 0))];
  return unique.length > 0 ? unique.join("; ") : null;
}
