/**
 * Patient Context Store
 *
 * Per-session state the medic builds up by voice: weight, age, allergies,
 * conditions, vitals and the critical designation. Every extraction rule runs
 * on every cleaned utterance; a rule that finds nothing is a no-op.
 *
 * Vitals keep the latest value per name, and every reading is also appended to
 * the history log, which is never rewritten.
 */

import type {
  ContextUpdateKind,
  ContextUpdateResult,
  PatientContext,
  VitalName,
  VitalRecord,
} from "@/lib/types/patient";
import { containsAnyPhrase, containsPhrase } from "@/lib/utils/text-match";

const LB_TO_KG = 0.453592;

const ALLERGY_CUES = ["allergic", "allergy", "allergies"];

const ALLERGENS = ["penicillin", "sulfa", "aspirin", "latex", "peanuts", "shellfish", "morphine", "codeine", "nsaid"];

/**
 * Condition table. Injury conditions describe the scenario at hand rather
 * than the patient's history: they are recorded for the decision resolver but
 * do not turn the utterance into a context update.
 */
const CONDITION_TABLE: ReadonlyArray<{ condition: string; keywords: string[]; injury?: boolean }> = [
  { condition: "pregnancy", keywords: ["pregnant", "pregnancy"] },
  { condition: "diabetes", keywords: ["diabetic", "diabetes"] },
  { condition: "hypertension", keywords: ["hypertension", "hypertensive", "high blood pressure"] },
  { condition: "asthma", keywords: ["asthma", "asthmatic"] },
  {
    condition: "heart_disease",
    keywords: [
      "heart disease",
      "cardiac disease",
      "mi",
      "heart attack",
      "myocardial infarction",
      "coronary artery disease",
      "cardiovascular disease",
    ],
  },
  { condition: "burn", keywords: ["burn", "burns", "burned", "burnt"], injury: true },
  { condition: "trauma", keywords: ["trauma", "traumatic"], injury: true },
];

const CRITICAL_PHRASES = [
  "patient is critical",
  "patient is unstable",
  "critical patient",
  "unstable patient",
  "mark as critical",
  "mark critical",
  "mark patient as critical",
  "mark patient critical",
];

const WEIGHT_PATTERN = /(?<![\d.])(\d+(?:\.\d+)?)\s*(kg|kgs|kilos?|kilograms?|lbs?|pounds?)(?![a-z])/g;
const AGE_PATTERN = /(?<![\d.])(\d{1,3})\s*(?:years?|yrs?|y\.o\.?|yo)(?![a-z])/;
const BP_PATTERN = /(?<![\d.])(\d{2,3})\s*\/\s*(\d{2,3})(?![\d.])/;
// "over" alone also reads infusion rates ("100 over 10 minutes"), so the spoken form needs a cue
const SPOKEN_BP_PATTERN =
  /(?<![a-z0-9])(?:bp|blood pressure)\s*(?:is\s+|of\s+)?(\d{2,3})\s*over\s*(\d{2,3})(?![\d.])/;
/** Readings above this are taken as Fahrenheit */
const MAX_CELSIUS = 45;

const SINGLE_VITAL_PATTERNS: ReadonlyArray<{ vital: Exclude<VitalName, "systolic" | "diastolic">; pattern: RegExp }> = [
  { vital: "hr", pattern: /(?<![a-z0-9])(?:hr|pulse)\s*(?:is\s+|of\s+)?(\d{2,3})(?![\d.])/ },
  { vital: "temp", pattern: /(?<![a-z0-9])temp\s*(?:is\s+|of\s+)?(\d{2,3}(?:\.\d+)?)(?![\d.])/ },
  { vital: "spo2", pattern: /(?<![a-z0-9])spo2\s*(?:is\s+|of\s+)?(\d{2,3})(?![\d.])/ },
  { vital: "rr", pattern: /(?<![a-z0-9])rr\s*(?:is\s+|of\s+)?(\d{1,2})(?![\d.])/ },
];

export function createPatientContext(): PatientContext {
  return {
    weightKg: null,
    ageYears: null,
    allergies: new Set(),
    conditions: new Set(),
    vitals: {},
    vitalHistory: [],
    criticalPatient: false,
    lastVitalCheck: null,
  };
}

/**
 * Deep copy, used to restore a session after a failed turn
 */
export function cloneContext(context: PatientContext): PatientContext {
  return {
    ...context,
    allergies: new Set(context.allergies),
    conditions: new Set(context.conditions),
    vitals: { ...context.vitals },
    vitalHistory: context.vitalHistory.map((record) => ({ ...record })),
  };
}

function extractWeightKg(query: string): number | null {
  let weight: number | null = null;
  for (const match of query.matchAll(WEIGHT_PATTERN)) {
    const value = Number(match[1]);
    const unit = match[2] ?? "kg";
    weight = unit.startsWith("lb") || unit.startsWith("pound") ? value * LB_TO_KG : value;
  }
  return weight;
}

function toCelsius(reading: number): number {
  if (reading <= MAX_CELSIUS) return reading;
  return Math.round(((reading - 32) * 5) / 9 * 10) / 10;
}

function extractVitals(query: string, now: number): VitalRecord[] {
  const records: VitalRecord[] = [];

  const bp = BP_PATTERN.exec(query) ?? SPOKEN_BP_PATTERN.exec(query);
  if (bp) {
    records.push({ timestamp: now, vital: "bp", value: `${Number(bp[1])}/${Number(bp[2])}` });
  }

  for (const { vital, pattern } of SINGLE_VITAL_PATTERNS) {
    const match = pattern.exec(query);
    if (match) {
      const value = Number(match[1]);
      records.push({ timestamp: now, vital, value: vital === "temp" ? toCelsius(value) : value });
    }
  }

  return records;
}

function applyVitalRecord(context: PatientContext, record: VitalRecord): void {
  if (record.vital === "bp") {
    const [systolic, diastolic] = String(record.value).split("/").map(Number);
    context.vitals.systolic = systolic;
    context.vitals.diastolic = diastolic;
  } else {
    context.vitals[record.vital] = Number(record.value);
  }
  context.vitalHistory.push(record);
  context.lastVitalCheck = record.timestamp;
}

/**
 * Apply every extraction rule to a cleaned utterance
 *
 * @param now - Epoch milliseconds stamped on vital records
 */
export function updatePatientContext(context: PatientContext, query: string, now: number): ContextUpdateResult {
  const updates = new Set<ContextUpdateKind>();

  const weight = extractWeightKg(query);
  if (weight !== null && weight !== context.weightKg) {
    context.weightKg = weight;
    updates.add("weight");
  }

  const age = AGE_PATTERN.exec(query);
  if (age) {
    const years = Number(age[1]);
    if (years !== context.ageYears) {
      context.ageYears = years;
      updates.add("age");
    }
  }

  if (containsAnyPhrase(query, ALLERGY_CUES)) {
    for (const allergen of ALLERGENS) {
      if (containsPhrase(query, allergen) && !context.allergies.has(allergen)) {
        context.allergies.add(allergen);
        updates.add("allergy");
      }
    }
  }

  for (const { condition, keywords, injury } of CONDITION_TABLE) {
    if (context.conditions.has(condition) || !containsAnyPhrase(query, keywords)) continue;
    context.conditions.add(condition);
    if (!injury) updates.add("condition");
  }

  const readings = extractVitals(query, now);
  for (const record of readings) {
    applyVitalRecord(context, record);
  }
  if (readings.length > 0) updates.add("vitals");

  if (!context.criticalPatient && containsAnyPhrase(query, CRITICAL_PHRASES)) {
    context.criticalPatient = true;
    updates.add("critical");
  }

  return { changed: updates.size > 0, updates: [...updates] };
}

function formatNumber(value: number): string {
  return String(Math.round(value * 10) / 10);
}

/**
 * One-line vitals summary in a fixed order
 */
export function summarizeVitals(context: PatientContext): string {
  const { vitals } = context;
  const parts: string[] = [];

  if (vitals.systolic !== undefined && vitals.diastolic !== undefined) {
    parts.push(`BP: ${formatNumber(vitals.systolic)}/${formatNumber(vitals.diastolic)}`);
  }
  if (vitals.hr !== undefined) parts.push(`HR: ${formatNumber(vitals.hr)}`);
  if (vitals.spo2 !== undefined) parts.push(`SpO2: ${formatNumber(vitals.spo2)}%`);
  if (vitals.rr !== undefined) parts.push(`RR: ${formatNumber(vitals.rr)}`);
  if (vitals.temp !== undefined) parts.push(`Temp: ${formatNumber(vitals.temp)}°C`);

  return parts.length > 0 ? parts.join(", ") : "No vitals recorded.";
}

/**
 * Spoken acknowledgment for a context update
 */
export function describeContextUpdate(
  context: PatientContext,
  updates: readonly ContextUpdateKind[],
  criticalMinutes = 5
): string {
  if (updates.length === 1 && updates[0] === "critical") {
    return `Patient marked as critical. Vitals will be checked every ${criticalMinutes} minutes.`;
  }

  const parts: string[] = [];
  for (const kind of updates) {
    switch (kind) {
      case "weight":
        if (context.weightKg !== null) parts.push(`Weight: ${formatNumber(context.weightKg)} kg`);
        break;
      case "age":
        if (context.ageYears !== null) parts.push(`Age: ${context.ageYears} years`);
        break;
      case "allergy":
        parts.push(`Allergies: ${[...context.allergies].join(", ")}`);
        break;
      case "condition":
        parts.push(`Conditions: ${[...context.conditions].map((c) => c.replace(/_/g, " ")).join(", ")}`);
        break;
      case "vitals":
        parts.push(`Vitals: ${summarizeVitals(context)}`);
        break;
      case "critical":
        parts.push("Patient marked as critical");
        break;
    }
  }

  return `Patient context updated. ${parts.join(". ")}. What medical assistance do you need?`;
}
