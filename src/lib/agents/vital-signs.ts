/**
 * Vital Signs Analyzer
 *
 * Classifies the current vitals against the policy range table:
 *
 *   criticalLow ── min ═══ normal ═══ max ── criticalHigh
 *        critical │ abnormal        abnormal │ critical
 *
 * Critical readings carry the range's stabilizing action when it has one.
 */

import type { PatientContext, VitalAssessment, VitalReadings } from "@/lib/types/patient";
import {
  VITAL_ORDER,
  type ClinicalPolicy,
  type VitalCaution,
  type VitalRangeTable,
} from "@/lib/policy/clinical-policy";
import { containsAnyPhrase } from "@/lib/utils/text-match";

export type TreatmentAssessment =
  | { kind: "critical"; message: string }
  | { kind: "caution"; message: string }
  | { kind: "acceptable"; message: string };

export const VITALS_ACCEPTABLE = "Vitals acceptable. Proceed with treatment.";

function formatReading(value: number): string {
  return String(Math.round(value * 10) / 10);
}

export function analyzeVitals(vitals: VitalReadings, ranges: VitalRangeTable): VitalAssessment {
  const criticalConcerns: string[] = [];
  const abnormalConcerns: string[] = [];
  const recommendations: string[] = [];

  for (const name of VITAL_ORDER) {
    const value = vitals[name];
    if (value === undefined) continue;

    const range = ranges[name];
    if (value < range.criticalLow || value > range.criticalHigh) {
      criticalConcerns.push(`${range.label}: ${formatReading(value)} (CRITICAL)`);
      const action = value < range.criticalLow ? range.lowAction : range.highAction;
      if (action) recommendations.push(action);
    } else if (value < range.min || value > range.max) {
      abnormalConcerns.push(`${range.label}: ${formatReading(value)} (abnormal)`);
    }
  }

  const critical = criticalConcerns.length > 0;
  return {
    status: critical ? "critical" : abnormalConcerns.length > 0 ? "abnormal" : "normal",
    concerns: [...criticalConcerns, ...abnormalConcerns],
    recommendations,
    critical,
  };
}

function cautionApplies(caution: VitalCaution, value: number | undefined): boolean {
  if (value === undefined) return false;
  if (caution.above !== undefined && value > caution.above) return true;
  return caution.below !== undefined && value < caution.below;
}

/**
 * Decide whether the current vitals allow the requested treatment
 */
export function assessTreatment(vitals: VitalReadings, query: string, policy: ClinicalPolicy): TreatmentAssessment {
  const analysis = analyzeVitals(vitals, policy.vitalRanges);

  if (analysis.critical) {
    const recommendation = analysis.recommendations[0] ?? "Stabilize patient first";
    return { kind: "critical", message: `CRITICAL: ${analysis.concerns[0]}. ${recommendation}.` };
  }

  for (const caution of policy.vitalCautions) {
    if (cautionApplies(caution, vitals[caution.vital]) && containsAnyPhrase(query, caution.medications)) {
      return { kind: "caution", message: caution.message };
    }
  }

  return { kind: "acceptable", message: VITALS_ACCEPTABLE };
}

export function getTreatmentRecommendation(vitals: VitalReadings, query: string, policy: ClinicalPolicy): string {
  return assessTreatment(vitals, query, policy).message;
}

/**
 * Staleness warning, or null when the vitals are fresh enough to answer on
 *
 * @param now - Epoch milliseconds
 */
export function checkVitalStaleness(
  context: Pick<PatientContext, "lastVitalCheck" | "criticalPatient">,
  now: number,
  policy: ClinicalPolicy
): string | null {
  if (context.lastVitalCheck === null) {
    return "No vitals recorded. Please provide current vitals.";
  }

  const minutes = (now - context.lastVitalCheck) / 60_000;

  if (context.criticalPatient) {
    if (minutes > policy.staleness.criticalMinutes) {
      return `Critical patient - vitals needed. Last check: ${Math.round(minutes)} minutes ago.`;
    }
  } else if (minutes > policy.staleness.routineMinutes) {
    return `Vitals may be outdated. Last check: ${Math.round(minutes)} minutes ago.`;
  }

  return null;
}
