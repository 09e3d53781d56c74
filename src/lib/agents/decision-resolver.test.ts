import { describe, it, expect } from "vitest";
import type { CorpusEntry } from "@/lib/types/corpus";
import { getDefaultClinicalPolicy } from "@/lib/policy/clinical-policy";
import { createCorpusStore } from "@/lib/knowledge-base/corpus-store";
import { buildKnowledgeIndex } from "@/lib/knowledge-base/knowledge-index";
import { cleanQuery } from "@/lib/knowledge-base/query-normalizer";
import { formatDecision } from "@/lib/voice/response-formatter";
import { createPatientContext, updatePatientContext } from "./patient-context";
import {
  classifyDecisionType,
  clarificationFor,
  GENERIC_CLARIFICATION,
  resolveDecision,
  type ResolveOptions,
} from "./decision-resolver";

const policy = getDefaultClinicalPolicy();
const NOW = 1_700_000_000_000;
const MINUTE = 60_000;

function entry(text: string): CorpusEntry {
  return { text, source: "Hypothermia CPG", section: "", category: "general", page: 0, priorityScore: 0 };
}

const index = buildKnowledgeIndex(
  createCorpusStore([
    entry("Hypothermia prevention: apply a heat reflective shell and insulate the casualty from the ground."),
    entry("Contributors and introduction for the hypothermia guideline."),
    entry("Whole blood transfusion is preferred for hemorrhagic shock resuscitation."),
  ])
);

function withFreshVitals(query = "hr 80") {
  const context = createPatientContext();
  updatePatientContext(context, query, NOW);
  return context;
}

const options: ResolveOptions = { policy, index, now: NOW };

describe("vitals gate", () => {
  it("asks for vitals before answering when none exist", () => {
    const { decision, step } = resolveDecision("ketamine for pain", createPatientContext(), options);
    expect(step).toBe("staleness");
    expect(formatDecision(decision, policy.response)).toBe("No vitals recorded. Please provide current vitals.");
  });

  it("withholds clinical answers for a critical patient with stale vitals", () => {
    const context = withFreshVitals();
    updatePatientContext(context, "patient is critical", NOW);

    const { decision, step } = resolveDecision("ketamine for pain", context, { ...options, now: NOW + 6 * MINUTE });
    expect(step).toBe("staleness");
    expect(decision.recommendations[0]?.description).toBe(
      "Critical patient - vitals needed. Last check: 6 minutes ago."
    );
  });

  it("is off by default in guideline mode", () => {
    const { step } = resolveDecision("ketamine for pain", createPatientContext(), { ...options, mode: "guideline" });
    expect(step).toBe("medication");
  });
});

describe("critical short-circuit", () => {
  it("overrides an unrelated medication request", () => {
    const context = withFreshVitals("hr 40");
    const { decision, step } = resolveDecision("ketamine for pain", context, options);

    expect(step).toBe("critical");
    const response = formatDecision(decision, policy.response);
    expect(response.startsWith("CRITICAL:")).toBe(true);
    expect(response).toBe("CRITICAL: HR: 40 (CRITICAL). Consider atropine 1mg IV for bradycardia.");
  });
});

describe("medication rules", () => {
  it("scales the dose from the recorded weight", () => {
    const context = withFreshVitals();
    updatePatientContext(context, "patient is 80 kg", NOW);

    const { decision, step } = resolveDecision("ketamine for pain", context, options);
    expect(step).toBe("medication");
    expect(formatDecision(decision, policy.response)).toBe("Ketamine 0.3 mg/kg IV. For 80kg patient: 24mg IV.");
  });

  it("builds weight and burn context from one utterance", () => {
    const context = createPatientContext();
    const query = cleanQuery("80 kg patient burned, ketamine for pain");
    updatePatientContext(context, query, NOW);

    expect(context.weightKg).toBe(80);
    expect(context.conditions.has("burn")).toBe(true);

    const { decision } = resolveDecision(query, context, { ...options, mode: "guideline" });
    const response = formatDecision(decision, policy.response);
    expect(response).toContain("24mg");
    expect(response).toContain("IV");
    expect(decision.patientParams).toEqual({ weightKg: 80, ageYears: undefined, conditions: ["burn"] });
  });

  it("carries a vital caution as a warning", () => {
    const context = withFreshVitals("spo2 93");
    const { decision } = resolveDecision("morphine", context, options);
    expect(formatDecision(decision, policy.response)).toBe(
      "Morphine 0.1 mg/kg IV. Monitor respiratory rate. Caution: Low oxygen saturation. Monitor respiratory depression closely."
    );
  });
});

describe("procedures and decision trees", () => {
  it("answers airway obstruction with the tree text in guideline mode", () => {
    const { decision, step } = resolveDecision("airway obstruction", createPatientContext(), {
      ...options,
      mode: "guideline",
    });
    expect(step).toBe("decision_tree");
    expect(decision.recommendations[0]?.priorityScore).toBe(5);
    expect(formatDecision(decision, policy.response)).toBe(
      "Assess airway patency. If obstructed, attempt basic adjuncts (NPA/OPA). If unsuccessful, prepare for RSI with ketamine."
    );
  });

  it("answers airway obstruction with the procedure rule in rules mode", () => {
    const { step, decision } = resolveDecision("airway obstruction", withFreshVitals(), options);
    expect(step).toBe("procedure");
    expect(decision.recommendations[0]?.description).toBe(
      "Insert NPA if unconscious. If ineffective: surgical cricothyrotomy."
    );
  });

  it("keeps procedure rules for scenarios without a tree in guideline mode", () => {
    const { step } = resolveDecision("tension pneumothorax", createPatientContext(), { ...options, mode: "guideline" });
    expect(step).toBe("procedure");
  });
});

describe("status, retrieval and clarification", () => {
  it("summarizes vitals on request", () => {
    const context = withFreshVitals("bp 120/80 hr 88");
    const { decision, step } = resolveDecision("current vitals", context, options);
    expect(step).toBe("status");
    expect(formatDecision(decision, policy.response)).toBe("BP: 120/80, HR: 88");
  });

  it("answers from the corpus when no rule matches", () => {
    const { decision, step } = resolveDecision("hypothermia prevention", withFreshVitals(), options);
    expect(step).toBe("retrieval");
    expect(decision.recommendations[0]?.source).toBe("Hypothermia CPG");
    expect(formatDecision(decision, policy.response)).toBe(
      "Hypothermia prevention: apply a heat reflective shell and insulate the casualty from the ground."
    );
  });

  it("asks a clarifying question when nothing matches", () => {
    const { decision, step } = resolveDecision("tell me a joke", withFreshVitals(), options);
    expect(step).toBe("clarification");
    expect(decision.confidence).toBe(false);
    expect(formatDecision(decision, policy.response)).toBe(GENERIC_CLARIFICATION);
  });

  it("asks a domain question for broad keywords", () => {
    expect(clarificationFor("circulation problems")).toBe(
      "I need more context. What would you like help with? Hemorrhage control, resuscitation, blood products, or circulation assessment?"
    );
  });
});

describe("classifyDecisionType", () => {
  it("takes the first matching keyword family", () => {
    expect(classifyDecisionType("assess the airway")).toBe("assessment");
    expect(classifyDecisionType("administer morphine")).toBe("intervention");
    expect(classifyDecisionType("ketamine dose")).toBe("medication");
    expect(classifyDecisionType("pelvic binder")).toBe("general");
  });
});
