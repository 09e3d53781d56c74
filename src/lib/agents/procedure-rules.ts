/**
 * Direct procedure rules and decision trees
 *
 * Procedure rules map a scenario to one fixed procedural sentence, picked by
 * severity keywords. Decision trees cover the scenarios where a
 * guideline-backed answer is preferred and carry an explicit priority.
 * Keywords match at word starts, so "bleed" covers "bleeding" and "intubat"
 * covers "intubation".
 */

import type { Recommendation, RecommendationPriority } from "@/lib/types/decision";
import { containsAnyWordStartingWith } from "@/lib/utils/text-match";

export type ProcedureScenario = "hemorrhage" | "airway" | "pneumothorax" | "chest_pain" | "fracture" | "burn";

interface Branch {
  /** Absent on the final, unconditional branch */
  when?: string[];
  text: string;
}

interface ProcedureRule {
  scenario: ProcedureScenario;
  triggers: string[];
  branches: Branch[];
}

interface TreeBranch extends Branch {
  priority: RecommendationPriority;
  priorityScore: number;
}

interface DecisionTree {
  scenario: ProcedureScenario;
  triggers: string[];
  branches: TreeBranch[];
}

const HEMORRHAGE_TRIGGERS = ["bleed", "hemorrhag", "haemorrhag", "shock"];

const PROCEDURE_RULES: readonly ProcedureRule[] = [
  {
    scenario: "hemorrhage",
    triggers: HEMORRHAGE_TRIGGERS,
    branches: [
      { when: ["arterial"], text: "Apply direct pressure and tourniquet if needed. Reassess every 10 minutes." },
      { when: ["severe"], text: "Apply tourniquet above wound. Reassess in 2 hours." },
      { text: "Apply direct pressure and hemostatic dressing. Reassess every 10 minutes." },
    ],
  },
  {
    scenario: "airway",
    triggers: ["airway"],
    branches: [
      { when: ["obstruct"], text: "Insert NPA if unconscious. If ineffective: surgical cricothyrotomy." },
      {
        when: ["intubat", "rsi"],
        text: "Rapid sequence intubation: Ketamine 1-2 mg/kg IV, Rocuronium 0.6-1.2 mg/kg IV.",
      },
      { text: "Assess for obstruction. Insert NPA if unconscious. If ineffective: surgical cricothyrotomy." },
    ],
  },
  {
    scenario: "pneumothorax",
    triggers: ["pneumothora", "ptx"],
    branches: [
      { when: ["tension"], text: "Needle decompression 2nd intercostal space, mid-clavicular line." },
      { when: ["open", "sucking"], text: "Apply occlusive dressing taped on 3 sides. Monitor respiratory status." },
      { text: "Needle decompression 2nd intercostal space for tension pneumothorax." },
    ],
  },
  {
    scenario: "chest_pain",
    triggers: ["chest pain", "acs", "acute coronary"],
    branches: [
      {
        when: ["acs", "acute coronary"],
        text: "Aspirin 325mg PO, Nitroglycerin 0.4mg SL q5min x3, 12-lead ECG immediately.",
      },
      { text: "Aspirin 325mg PO, Nitroglycerin 0.4mg SL q5min x3, 12-lead ECG." },
    ],
  },
  {
    scenario: "fracture",
    triggers: ["fracture"],
    branches: [
      { when: ["pelvis", "pelvic"], text: "Apply pelvic binder if unstable. Control hemorrhage. Monitor for shock." },
      { text: "Immobilize fracture. Assess neurovascular status. Apply splint." },
    ],
  },
  {
    scenario: "burn",
    triggers: ["burn"],
    branches: [
      { when: ["chemical"], text: "Flush with copious water. Remove contaminated clothing. Monitor airway." },
      { text: "Cool with room temperature water. Cover with sterile dressing. Monitor airway." },
    ],
  },
];

const DECISION_TREES: readonly DecisionTree[] = [
  {
    scenario: "airway",
    triggers: ["airway"],
    branches: [
      {
        when: ["obstruct", "compromis"],
        text: "Assess airway patency. If obstructed, attempt basic adjuncts (NPA/OPA). If unsuccessful, prepare for RSI with ketamine.",
        priority: "critical",
        priorityScore: 5,
      },
      {
        when: ["intubat", "rsi"],
        text: "Prepare for RSI: ketamine 1-2mg/kg IV, apply apneic oxygenation, have backup airway ready.",
        priority: "critical",
        priorityScore: 5,
      },
      {
        text: "Assess airway: look, listen, feel. Check for obstruction, stridor, or inability to speak.",
        priority: "urgent",
        priorityScore: 4,
      },
    ],
  },
  {
    scenario: "hemorrhage",
    triggers: HEMORRHAGE_TRIGGERS,
    branches: [
      {
        text: "Control bleeding with direct pressure. Start IV access. Consider tourniquet for extremity bleeding.",
        priority: "critical",
        priorityScore: 5,
      },
    ],
  },
  {
    scenario: "burn",
    triggers: ["burn"],
    branches: [
      {
        text: "Cool burn with room temperature water. Remove jewelry. Assess airway for inhalation injury.",
        priority: "urgent",
        priorityScore: 4,
      },
    ],
  },
];

/** Scenarios a decision tree answers in guideline mode */
export const TREE_SCENARIOS: ReadonlySet<ProcedureScenario> = new Set(DECISION_TREES.map((tree) => tree.scenario));

function selectBranch<T extends Branch>(query: string, branches: readonly T[]): T | undefined {
  return branches.find((branch) => !branch.when || containsAnyWordStartingWith(query, branch.when));
}

export interface ScenarioMatch {
  scenario: ProcedureScenario;
  recommendation: Recommendation;
}

/**
 * First procedure rule whose scenario the query names
 *
 * @param skip - Scenarios left for another stage to answer
 */
export function matchProcedure(query: string, skip: ReadonlySet<ProcedureScenario> = new Set()): ScenarioMatch | null {
  for (const rule of PROCEDURE_RULES) {
    if (skip.has(rule.scenario) || !containsAnyWordStartingWith(query, rule.triggers)) continue;
    const branch = selectBranch(query, rule.branches);
    if (!branch) continue;
    return {
      scenario: rule.scenario,
      recommendation: {
        kind: "procedural_step",
        description: branch.text,
        priority: "urgent",
        priorityScore: 4,
      },
    };
  }
  return null;
}

export function matchDecisionTree(query: string): ScenarioMatch | null {
  for (const tree of DECISION_TREES) {
    if (!containsAnyWordStartingWith(query, tree.triggers)) continue;
    const branch = selectBranch(query, tree.branches);
    if (!branch) continue;
    return {
      scenario: tree.scenario,
      recommendation: {
        kind: branch.priorityScore >= 5 ? "procedural_step" : "assessment_criteria",
        description: branch.text,
        priority: branch.priority,
        priorityScore: branch.priorityScore,
      },
    };
  }
  return null;
}
