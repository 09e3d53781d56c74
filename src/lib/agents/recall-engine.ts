/**
 * Recall Engine - the per-turn loop
 *
 * One engine holds the frozen knowledge index and the clinical policy; any
 * number of sessions share it. Each session owns its patient context, its
 * turn history and any guided assessment in progress.
 *
 * Turn flow:
 *
 *   utterance ─► clean ─► context update ─► guided assessment? ─► data only? ─► acknowledgment
 *                                                                    │ (request or critical vitals)
 *                                                                    ▼
 *                                     resolver ─► contraindications ─► formatter ─► response
 *
 * A fault anywhere in a turn is logged, answered with a spoken apology, and
 * the session's context is put back as it was before the turn.
 */

import { v4 as uuidv4 } from "uuid";
import type { CorpusEntry } from "@/lib/types/corpus";
import type { Decision, Resolution, ResolutionMode, ResolutionStep } from "@/lib/types/decision";
import type { PatientContext } from "@/lib/types/patient";
import { getDefaultClinicalPolicy, loadClinicalPolicy, type ClinicalPolicy } from "@/lib/policy/clinical-policy";
import { createCorpusStore, loadCorpus } from "@/lib/knowledge-base/corpus-store";
import { buildKnowledgeIndex, getIndexStats, type KnowledgeIndex } from "@/lib/knowledge-base/knowledge-index";
import { cleanQuery } from "@/lib/knowledge-base/query-normalizer";
import { checkContraindications, mergeWarnings } from "@/lib/guardrails";
import { formatDecision } from "@/lib/voice/response-formatter";
import { resolveEngineConfig, type EngineConfig } from "@/lib/config/engine-config";
import { buildErrorInfo } from "@/lib/utils/errors";
import { cloneContext, createPatientContext, describeContextUpdate, updatePatientContext } from "./patient-context";
import { isStatusQuery, resolveDecision, type ResolveOptions } from "./decision-resolver";
import { assessTreatment } from "./vital-signs";
import { matchMedication } from "./medication-rules";
import { matchDecisionTree, matchProcedure } from "./procedure-rules";
import {
  advanceGuidedAirway,
  AIRWAY_STOPPED,
  isGuidedAirwayAnswer,
  isGuidedAirwayCancel,
  isGuidedAirwayRequest,
  startGuidedAirway,
  type GuidedAirwayState,
} from "./guided-airway";

export const TURN_FAULT_RESPONSE = "Sorry, there was an error processing your query. Please try again.";
export const EMPTY_QUERY_RESPONSE = "I need more context. What specific medical assistance do you need?";

/** Turns kept per session */
const MAX_HISTORY = 50;

export type TurnStep = ResolutionStep | "context_update" | "guided_assessment" | "error";

export interface TurnRecord {
  query: string;
  response: string;
  step: TurnStep;
  timestamp: number;
}

export interface TurnResult {
  sessionId: string;
  /** Cleaned utterance */
  query: string;
  response: string;
  step: TurnStep;
  contextUpdated: boolean;
  decision: Decision | null;
}

export interface RecallSession {
  id: string;
  context: PatientContext;
  history: TurnRecord[];
  guidedAirway: GuidedAirwayState | null;
  createdAt: number;
  lastAccessedAt: number;
}

export type DecisionResolver = (query: string, context: PatientContext, options: ResolveOptions) => Resolution;

export interface RecallEngineOptions {
  policy?: ClinicalPolicy;
  mode?: ResolutionMode;
  gateOnVitals?: boolean;
  topN?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
  resolver?: DecisionResolver;
}

export class RecallEngine {
  private readonly sessions = new Map<string, RecallSession>();
  private readonly policy: ClinicalPolicy;
  private readonly mode: ResolutionMode;
  private readonly gateOnVitals?: boolean;
  private readonly topN: number;
  private readonly now: () => number;
  private readonly resolver: DecisionResolver;

  constructor(
    private readonly index: KnowledgeIndex,
    options: RecallEngineOptions = {}
  ) {
    this.policy = options.policy ?? getDefaultClinicalPolicy();
    this.mode = options.mode ?? "rules";
    this.gateOnVitals = options.gateOnVitals;
    this.topN = options.topN ?? 5;
    this.now = options.now ?? Date.now;
    this.resolver = options.resolver ?? resolveDecision;
  }

  startSession(sessionId: string = uuidv4()): RecallSession {
    const timestamp = this.now();
    const session: RecallSession = {
      id: sessionId,
      context: createPatientContext(),
      history: [],
      guidedAirway: null,
      createdAt: timestamp,
      lastAccessedAt: timestamp,
    };
    this.sessions.set(sessionId, session);
    console.log(`[Recall Engine] Started session ${sessionId}`);
    return session;
  }

  endSession(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    if (existed) console.log(`[Recall Engine] Ended session ${sessionId}`);
    return existed;
  }

  getSession(sessionId: string): RecallSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Answer one utterance. Never throws for a fault inside the turn.
   */
  respond(sessionId: string, utterance: string): TurnResult {
    let session = this.sessions.get(sessionId);
    if (!session) {
      console.warn(`[Recall Engine] Session ${sessionId} not found, starting it`);
      session = this.startSession(sessionId);
    }

    const snapshot = cloneContext(session.context);
    const guidedSnapshot = session.guidedAirway;
    const timestamp = this.now();
    let result: TurnResult;

    try {
      result = this.processTurn(session, utterance, timestamp);
      console.log(`[Recall Engine] [${sessionId}] Answered via ${result.step}`);
    } catch (error) {
      session.context = snapshot;
      session.guidedAirway = guidedSnapshot;
      console.error(`[Recall Engine] [${sessionId}] Turn failed:`, buildErrorInfo(error));
      result = {
        sessionId,
        query: utterance,
        response: TURN_FAULT_RESPONSE,
        step: "error",
        contextUpdated: false,
        decision: null,
      };
    }

    session.history.push({ query: result.query, response: result.response, step: result.step, timestamp });
    if (session.history.length > MAX_HISTORY) {
      session.history = session.history.slice(-MAX_HISTORY);
    }
    session.lastAccessedAt = timestamp;

    return result;
  }

  private processTurn(session: RecallSession, utterance: string, now: number): TurnResult {
    const query = cleanQuery(utterance, this.index.lexicon);
    const reply = (response: string, step: TurnStep, decision: Decision | null = null, contextUpdated = false) => ({
      sessionId: session.id,
      query,
      response,
      step,
      contextUpdated,
      decision,
    });

    if (!query) return reply(EMPTY_QUERY_RESPONSE, "clarification");

    const update = updatePatientContext(session.context, query, now);
    const request = this.carriesRequest(query);

    if (session.guidedAirway) {
      if (isGuidedAirwayAnswer(query)) {
        const turn = advanceGuidedAirway(session.guidedAirway, query);
        session.guidedAirway = turn.state;
        return reply(turn.response, "guided_assessment", null, update.changed);
      }
      if (!update.changed && !request) {
        if (isGuidedAirwayCancel(query)) {
          session.guidedAirway = null;
          return reply(AIRWAY_STOPPED, "guided_assessment");
        }
        return reply(advanceGuidedAirway(session.guidedAirway, query).response, "guided_assessment");
      }
      // New patient data or another request ends the walkthrough
      console.log(`[Recall Engine] [${session.id}] Leaving guided airway assessment`);
      session.guidedAirway = null;
    }

    if (isGuidedAirwayRequest(query)) {
      const turn = startGuidedAirway();
      session.guidedAirway = turn.state;
      return reply(turn.response, "guided_assessment", null, update.changed);
    }

    // Patient data alone is acknowledged; a request or critical vitals in the
    // same utterance are answered instead
    if (update.changed && !request && !this.hasCriticalVitals(session.context, query)) {
      const acknowledgment = describeContextUpdate(session.context, update.updates, this.policy.staleness.criticalMinutes);
      return reply(acknowledgment, "context_update", null, true);
    }

    const resolution = this.resolver(query, session.context, {
      policy: this.policy,
      index: this.index,
      mode: this.mode,
      gateOnVitals: this.gateOnVitals,
      now,
      topN: this.topN,
    });

    // Triggers are matched against the query and everything about to be spoken
    const spoken = [
      query,
      ...resolution.decision.recommendations.flatMap((recommendation) => [
        recommendation.description,
        recommendation.medication ?? "",
      ]),
    ];

    const decision: Decision = {
      ...resolution.decision,
      warning: mergeWarnings(
        resolution.decision.warning,
        checkContraindications(spoken, session.context.conditions, this.policy.contraindications)
      ),
    };

    return reply(formatDecision(decision, this.policy.response), resolution.step, decision, update.changed);
  }

  /**
   * Whether the utterance asks for something a rule table answers
   */
  private carriesRequest(query: string): boolean {
    return (
      matchMedication(query, this.policy.medications) !== null ||
      matchProcedure(query) !== null ||
      matchDecisionTree(query) !== null ||
      isStatusQuery(query)
    );
  }

  private hasCriticalVitals(context: PatientContext, query: string): boolean {
    if (Object.keys(context.vitals).length === 0) return false;
    return assessTreatment(context.vitals, query, this.policy).kind === "critical";
  }

  /**
   * Queries and truncated responses of a session, one per line
   */
  getConversationSummary(sessionId: string): string {
    const session = this.sessions.get(sessionId);
    if (!session || session.history.length === 0) return "No conversation recorded.";

    return session.history
      .flatMap((turn, i) => [
        `Query ${i + 1}: ${turn.query}`,
        `Response: ${turn.response.length > 100 ? `${turn.response.slice(0, 100)}...` : turn.response}`,
      ])
      .join("\n");
  }

  getIndexStats() {
    return getIndexStats(this.index);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}

/**
 * Build an engine over an in-memory corpus
 */
export function createRecallEngineFromCorpus(
  entries: readonly CorpusEntry[],
  options: RecallEngineOptions = {}
): RecallEngine {
  const index = buildKnowledgeIndex(createCorpusStore(entries));
  return new RecallEngine(index, options);
}

/**
 * Load the policy and the best available corpus artifact, then build the
 * index. Throws when no corpus artifact exists.
 */
export function createRecallEngine(
  config: EngineConfig = resolveEngineConfig(),
  options: Omit<RecallEngineOptions, "policy" | "mode" | "topN"> = {}
): RecallEngine {
  const policy = loadClinicalPolicy(config.policyPath);
  const store = loadCorpus({ directory: config.corpusDirectory });
  const index = buildKnowledgeIndex(store);

  const stats = getIndexStats(index);
  console.log(
    `[Recall Engine] Ready: ${stats.corpusLevel} corpus, ${stats.totalEntries} entries, ${stats.vocabularySize} terms, mode ${config.mode}`
  );

  return new RecallEngine(index, { ...options, policy, mode: config.mode, topN: config.topN });
}
