/**
 * Clinical Decision Resolver
 *
 * Ordered dispatch, first stage to answer wins:
 *
 *   1. staleness      vitals missing or too old → ask for vitals
 *   2. critical       current vitals critical → stabilizing action
 *   3. medication     dose table (weight-scaled when weight is known)
 *   4. procedure      fixed procedural sentence per scenario
 *   5. decision_tree  prioritized guideline answer (airway, hemorrhage, burn)
 *   6. status         vitals summary on request
 *   7. retrieval      BM25 + re-rank over the guideline corpus
 *   8. clarification  domain-specific or generic follow-up question
 *
 * In "guideline" mode stage 4 leaves tree-backed scenarios to stage 5 and the
 * vitals gate of stage 1 is off unless requested.
 */

import type {
  Decision,
  DecisionType,
  Recommendation,
  Resolution,
  ResolutionMode,
  ResolutionStep,
} from "@/lib/types/decision";
import type { RankedEntry } from "@/lib/types/corpus";
import type { PatientContext } from "@/lib/types/patient";
import type { ClinicalPolicy } from "@/lib/policy/clinical-policy";
import { extractGuidelineExcerpt, searchGuidelines, type KnowledgeIndex } from "@/lib/knowledge-base/knowledge-index";
import { containsAnyPhrase, containsAnyWordStartingWith } from "@/lib/utils/text-match";
import { assessTreatment, checkVitalStaleness } from "./vital-signs";
import { buildMedicationRecommendation, matchMedication } from "./medication-rules";
import { matchDecisionTree, matchProcedure, TREE_SCENARIOS } from "./procedure-rules";
import { summarizeVitals } from "./patient-context";

export interface ResolveOptions {
  policy: ClinicalPolicy;
  /** Retrieval is skipped when no index is given */
  index?: KnowledgeIndex;
  mode?: ResolutionMode;
  /** Stage 1; defaults to on in "rules" mode and off in "guideline" mode */
  gateOnVitals?: boolean;
  /** Epoch milliseconds */
  now: number;
  topN?: number;
}

const DECISION_PATTERNS: ReadonlyArray<[DecisionType, string[]]> = [
  ["assessment", ["assess", "evaluate", "examine", "check", "look for"]],
  ["intervention", ["treat", "intervene", "manage", "administer", "apply"]],
  ["monitoring", ["monitor", "observe", "watch", "track", "follow"]],
  ["emergency", ["emergency", "urgent", "immediate", "critical", "stat"]],
  ["medication", ["medication", "drug", "dose", "administer", "give"]],
];

const STATUS_PHRASES = ["vitals", "vital signs", "current vitals", "patient status"];

const CLARIFICATIONS: ReadonlyArray<{ keywords: string[]; text: string }> = [
  {
    keywords: ["airway"],
    text: "I need more context. What would you like help with? Airway assessment, intubation, ventilation, or airway adjuncts?",
  },
  {
    keywords: ["circulation", "shock"],
    text: "I need more context. What would you like help with? Hemorrhage control, resuscitation, blood products, or circulation assessment?",
  },
  {
    keywords: ["trauma"],
    text: "I need more context. What would you like help with? Trauma assessment, specific injury management, or trauma resuscitation?",
  },
];

export const GENERIC_CLARIFICATION =
  "I couldn't find specific guidelines for that query. Please try rephrasing or ask about a different aspect of trauma care.";

export function classifyDecisionType(query: string): DecisionType {
  for (const [type, keywords] of DECISION_PATTERNS) {
    if (keywords.some((keyword) => query.includes(keyword))) return type;
  }
  return "general";
}

export function isStatusQuery(query: string): boolean {
  return containsAnyPhrase(query, STATUS_PHRASES);
}

export function clarificationFor(query: string): string {
  const match = CLARIFICATIONS.find(({ keywords }) => containsAnyWordStartingWith(query, keywords));
  return match ? match.text : GENERIC_CLARIFICATION;
}

function alert(description: string, priority: Recommendation["priority"], priorityScore: number): Recommendation {
  return { kind: "vital_alert", description, priority, priorityScore };
}

export function resolveDecision(query: string, context: PatientContext, options: ResolveOptions): Resolution {
  const { policy, index, now } = options;
  const mode = options.mode ?? "rules";
  const gateOnVitals = options.gateOnVitals ?? mode === "rules";

  const decide = (
    step: ResolutionStep,
    recommendations: Recommendation[],
    extra: { confidence?: boolean; candidates?: RankedEntry[]; warning?: string | null } = {}
  ): Resolution => {
    const decision: Decision = {
      query,
      decisionType: classifyDecisionType(query),
      patientParams: {
        weightKg: context.weightKg ?? undefined,
        ageYears: context.ageYears ?? undefined,
        conditions: [...context.conditions],
      },
      relevantCandidates: extra.candidates ?? [],
      recommendations,
      confidence: extra.confidence ?? true,
      warning: extra.warning ?? null,
    };
    return { decision, step };
  };

  // 1. Staleness gate
  if (gateOnVitals) {
    const staleness = checkVitalStaleness(context, now, policy);
    if (staleness) {
      return decide("staleness", [alert(staleness, "urgent", 4)]);
    }
  }

  // 2. Critical short-circuit; non-critical cautions ride along as a warning
  let caution: string | null = null;
  if (Object.keys(context.vitals).length > 0) {
    const treatment = assessTreatment(context.vitals, query, policy);
    if (treatment.kind === "critical") {
      return decide("critical", [alert(treatment.message, "critical", 5)]);
    }
    if (treatment.kind === "caution") caution = treatment.message;
  }

  // 3. Medication
  const medication = matchMedication(query, policy.medications);
  if (medication) {
    return decide("medication", [buildMedicationRecommendation(medication, context.weightKg)], { warning: caution });
  }

  // 4. Procedure
  const procedure = matchProcedure(query, mode === "guideline" ? TREE_SCENARIOS : new Set());
  if (procedure) {
    return decide("procedure", [procedure.recommendation], { warning: caution });
  }

  // 5. Decision tree
  const tree = matchDecisionTree(query);
  if (tree) {
    return decide("decision_tree", [tree.recommendation], { warning: caution });
  }

  // 6. Status
  if (isStatusQuery(query)) {
    return decide("status", [
      { kind: "context", description: summarizeVitals(context), priority: "standard", priorityScore: 2 },
    ]);
  }

  // 7. Retrieval
  if (index) {
    const { results } = searchGuidelines(index, query, options.topN ?? 5);
    const top = results[0];
    if (top) {
      const excerpt = extractGuidelineExcerpt(top.entry.text, index.lexicon, policy.response.excerptBudget);
      return decide(
        "retrieval",
        [
          {
            kind: "guideline_excerpt",
            description: excerpt,
            priority: "standard",
            priorityScore: 3,
            source: top.entry.source,
          },
        ],
        { candidates: results, warning: caution }
      );
    }
  }

  // 8. Clarification
  return decide(
    "clarification",
    [{ kind: "clarification", description: clarificationFor(query), priority: "standard", priorityScore: 1 }],
    { confidence: false }
  );
}
