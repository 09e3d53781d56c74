/**
 * Guided airway assessment
 *
 * A yes/no walkthrough held in the session across turns:
 *
 *   Is the patient conscious?
 *     ├─ no  ─► Apply airway intervention now.
 *     └─ yes ─► Is the patient able to speak or respond verbally?
 *                 ├─ no  ─► Apply airway intervention now.
 *                 └─ yes ─► Continue to monitor airway. No action required.
 *
 * "cancel" or "stop" ends the walkthrough early.
 */

import { containsAnyPhrase } from "@/lib/utils/text-match";

export type GuidedAirwayStep = "conscious" | "verbal";

export interface GuidedAirwayState {
  step: GuidedAirwayStep;
}

export interface GuidedAirwayTurn {
  /** Null once the walkthrough has reached an outcome */
  state: GuidedAirwayState | null;
  response: string;
}

const PROMPTS: Record<GuidedAirwayStep, string> = {
  conscious: "Is the patient conscious?",
  verbal: "Is the patient able to speak or respond verbally?",
};

const START_PHRASES = [
  "walk me through airway",
  "walk me through the airway",
  "airway checklist",
  "airway walkthrough",
  "guided airway",
];

const YES_WORDS = ["yes", "yeah", "yep", "affirmative", "correct"];
const NO_WORDS = ["no", "nope", "negative"];
const CANCEL_WORDS = ["cancel", "stop", "exit", "never mind"];

export const AIRWAY_INTERVENTION = "Apply airway intervention now.";
export const AIRWAY_MONITOR = "Continue to monitor airway. No action required.";
export const AIRWAY_STOPPED = "Airway walkthrough stopped. What medical assistance do you need?";

export function isGuidedAirwayRequest(query: string): boolean {
  return containsAnyPhrase(query, START_PHRASES);
}

/** True for a yes or no answer to the current question */
export function isGuidedAirwayAnswer(answer: string): boolean {
  return containsAnyPhrase(answer, NO_WORDS) || containsAnyPhrase(answer, YES_WORDS);
}

export function isGuidedAirwayCancel(answer: string): boolean {
  return containsAnyPhrase(answer, CANCEL_WORDS);
}

export function startGuidedAirway(): GuidedAirwayTurn {
  return { state: { step: "conscious" }, response: PROMPTS.conscious };
}

/**
 * Advance on a spoken answer. An answer that is neither yes nor no repeats
 * the current question.
 */
export function advanceGuidedAirway(state: GuidedAirwayState, answer: string): GuidedAirwayTurn {
  // Negative answers take precedence over affirmative ones
  if (containsAnyPhrase(answer, NO_WORDS)) {
    return { state: null, response: AIRWAY_INTERVENTION };
  }

  if (!containsAnyPhrase(answer, YES_WORDS)) {
    return { state, response: PROMPTS[state.step] };
  }

  if (state.step === "conscious") {
    return { state: { step: "verbal" }, response: PROMPTS.verbal };
  }
  return { state: null, response: AIRWAY_MONITOR };
}
