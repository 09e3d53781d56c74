export type VitalName = "hr" | "systolic" | "diastolic" | "rr" | "spo2" | "temp";

export type VitalReadings = Partial<Record<VitalName, number>>;

export interface VitalRecord {
  timestamp: number;
  vital: Exclude<VitalName, "systolic" | "diastolic"> | "bp";
  value: number | string;
}

export interface PatientContext {
  weightKg: number | null;
  ageYears: number | null;
  allergies: Set<string>;
  conditions: Set<string>;
  vitals: VitalReadings;
  vitalHistory: VitalRecord[];
  criticalPatient: boolean;
  lastVitalCheck: number | null;
}

export type ContextUpdateKind =
  | "weight"
  | "age"
  | "allergy"
  | "condition"
  | "vitals"
  | "critical";

export interface ContextUpdateResult {
  changed: boolean;
  updates: ContextUpdateKind[];
}

export interface VitalRangeSpec {
  min: number;
  max: number;
  criticalLow: number;
  criticalHigh: number;
}

export interface VitalAssessment {
  status: "normal" | "abnormal" | "critical";
  concerns: string[];
  recommendations: string[];
  critical: boolean;
}
