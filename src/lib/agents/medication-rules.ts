/**
 * Direct medication rules
 *
 * Weight-scaled dosing from the policy dose table. Without a recorded weight
 * the population range is spoken instead of a number.
 */

import type { Recommendation } from "@/lib/types/decision";
import type { DoseIntent, MedicationRule } from "@/lib/policy/clinical-policy";
import { containsAnyPhrase } from "@/lib/utils/text-match";

export interface MedicationMatch {
  rule: MedicationRule;
  intent: DoseIntent;
}

/**
 * Find the first medication named in the query and its dosing intent. An
 * intent with no keywords is the fallback when no other intent matches.
 */
export function matchMedication(query: string, medications: readonly MedicationRule[]): MedicationMatch | null {
  const rule = medications.find((med) => containsAnyPhrase(query, med.triggers));
  if (!rule) return null;

  const intent =
    rule.intents.find((i) => i.keywords.length > 0 && containsAnyPhrase(query, i.keywords)) ??
    rule.intents.find((i) => i.keywords.length === 0) ??
    rule.intents[0];

  return intent ? { rule, intent } : null;
}

export function computeDose(ratePerKg: number, weightKg: number): number {
  return Math.round(ratePerKg * weightKg);
}

function formatWeight(weightKg: number): string {
  return String(Math.round(weightKg * 10) / 10);
}

/**
 * Build the dosing recommendation for a matched medication
 */
export function buildMedicationRecommendation(match: MedicationMatch, weightKg: number | null): Recommendation {
  const { rule, intent } = match;
  const base: Recommendation = {
    kind: "medication_dosage",
    description: `${rule.label} ${intent.populationText}`,
    priority: "urgent",
    priorityScore: 4,
    medication: rule.name,
    doseUnit: intent.unit,
    route: intent.route,
  };

  if (intent.ratePerKg === undefined || weightKg === null) return base;

  const dose = computeDose(intent.ratePerKg, weightKg);
  const dosing = intent.dosingText ?? `${intent.ratePerKg} ${intent.unit}/kg ${intent.route}`;

  return {
    ...base,
    description: `${rule.label} ${dosing}. For ${formatWeight(weightKg)}kg patient: ${dose}${intent.unit} ${intent.route}${intent.doseSuffix}.`,
    dose,
  };
}
