import type { RankedEntry } from "./corpus";

export type DecisionType =
  | "assessment"
  | "intervention"
  | "monitoring"
  | "emergency"
  | "medication"
  | "general";

export type RecommendationKind =
  | "medication_dosage"
  | "procedural_step"
  | "assessment_criteria"
  | "guideline_excerpt"
  | "vital_alert"
  | "context"
  | "clarification";

export type RecommendationPriority = "critical" | "urgent" | "standard";

export interface Recommendation {
  kind: RecommendationKind;
  description: string;
  priority: RecommendationPriority;
  priorityScore: number;
  medication?: string;
  dose?: number;
  doseUnit?: string;
  route?: string;
  source?: string;
}

export interface PatientParams {
  weightKg?: number;
  ageYears?: number;
  conditions: string[];
}

export interface Decision {
  query: string;
  decisionType: DecisionType;
  patientParams: PatientParams;
  relevantCandidates: RankedEntry[];
  recommendations: Recommendation[];
  confidence: boolean;
  warning: string | null;
}

export type ResolutionStep =
  | "staleness"
  | "critical"
  | "medication"
  | "procedure"
  | "decision_tree"
  | "status"
  | "retrieval"
  | "clarification";

export type ResolutionMode = "rules" | "guideline";

export interface Resolution {
  decision: Decision;
  step: ResolutionStep;
}
