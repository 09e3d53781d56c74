/**
 * Clinical Policy Table
 *
 * Vital ranges, per-kilogram dose rules, staleness intervals, contraindication
 * rules and response budgets, loaded from JSON and validated with zod.
 *
 * The bundled table is provisional: every threshold and rate in it needs
 * clinical sign-off before field use. Deployments replace it by pointing
 * RECALL_POLICY_PATH at a reviewed copy.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import bundledPolicy from "./clinical-policy.json";
import { createPolicyValidationError } from "@/lib/utils/errors";
import type { VitalName } from "@/lib/types/patient";

const vitalRangeSchema = z
  .object({
    label: z.string().min(1),
    min: z.number(),
    max: z.number(),
    criticalLow: z.number(),
    criticalHigh: z.number(),
    lowAction: z.string().optional(),
    highAction: z.string().optional(),
  })
  .refine((r) => r.criticalLow <= r.min && r.min <= r.max && r.max <= r.criticalHigh, {
    message: "expected criticalLow <= min <= max <= criticalHigh",
  });

const vitalNameSchema = z.enum(["hr", "systolic", "diastolic", "rr", "spo2", "temp"]);

const vitalCautionSchema = z
  .object({
    vital: vitalNameSchema,
    above: z.number().optional(),
    below: z.number().optional(),
    medications: z.array(z.string().min(1)).min(1),
    message: z.string().min(1),
  })
  .refine((c) => c.above !== undefined || c.below !== undefined, {
    message: "a caution needs an 'above' or 'below' threshold",
  });

const doseIntentSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string()),
  ratePerKg: z.number().positive().optional(),
  unit: z.string().min(1),
  route: z.string().min(1),
  dosingText: z.string().optional(),
  doseSuffix: z.string().default(""),
  populationText: z.string().min(1),
});

const medicationRuleSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  triggers: z.array(z.string().min(1)).min(1),
  intents: z.array(doseIntentSchema).min(1),
});

const contraindicationRuleSchema = z.object({
  condition: z.string().min(1),
  triggers: z.array(z.string().min(1)).min(1),
  warning: z.string().min(1),
});

export const clinicalPolicySchema = z.object({
  version: z.string(),
  reviewStatus: z.string().optional(),
  vitalRanges: z.object({
    hr: vitalRangeSchema,
    systolic: vitalRangeSchema,
    diastolic: vitalRangeSchema,
    rr: vitalRangeSchema,
    spo2: vitalRangeSchema,
    temp: vitalRangeSchema,
  }),
  vitalCautions: z.array(vitalCautionSchema),
  staleness: z.object({
    criticalMinutes: z.number().positive(),
    routineMinutes: z.number().positive(),
  }),
  medications: z.array(medicationRuleSchema),
  contraindications: z.array(contraindicationRuleSchema),
  response: z.object({
    maxActionPoints: z.number().int().positive(),
    descriptionBudget: z.number().int().positive(),
    excerptBudget: z.number().int().positive(),
    fallbackSentence: z.string().min(1),
  }),
});

export type ClinicalPolicy = z.infer<typeof clinicalPolicySchema>;
export type VitalRangeTable = ClinicalPolicy["vitalRanges"];
export type VitalRangeEntry = VitalRangeTable[VitalName];
export type VitalCaution = ClinicalPolicy["vitalCautions"][number];
export type MedicationRule = ClinicalPolicy["medications"][number];
export type DoseIntent = MedicationRule["intents"][number];
export type ContraindicationRule = ClinicalPolicy["contraindications"][number];

/** Order in which vitals are analyzed and summarized */
export const VITAL_ORDER: readonly VitalName[] = ["hr", "systolic", "diastolic", "rr", "spo2", "temp"];

let _defaultPolicy: ClinicalPolicy | null = null;

/**
 * Validate an already-parsed policy object
 */
export function parseClinicalPolicy(raw: unknown, source = "clinical policy"): ClinicalPolicy {
  const result = clinicalPolicySchema.safeParse(raw);
  if (!result.success) {
    throw createPolicyValidationError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Get the bundled policy table (validated once, then cached)
 */
export function getDefaultClinicalPolicy(): ClinicalPolicy {
  if (_defaultPolicy) return _defaultPolicy;
  _defaultPolicy = parseClinicalPolicy(bundledPolicy, "bundled clinical-policy.json");
  return _defaultPolicy;
}

/**
 * Load the policy table from a reviewed JSON file, or the bundled one when
 * no path is given
 */
export function loadClinicalPolicy(path?: string): ClinicalPolicy {
  if (!path) return getDefaultClinicalPolicy();

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createPolicyValidationError(path, [`unreadable policy file: ${message}`]);
  }

  const policy = parseClinicalPolicy(raw, path);
  console.log(`[Clinical Policy] Loaded policy ${policy.version} from ${path}`);
  return policy;
}
