/**
 * Field Recall Engine
 *
 * Offline clinical-query answering for voice-driven field medicine.
 */

export * from "./lib/agents";
export * from "./lib/knowledge-base";
export * from "./lib/guardrails";
export * from "./lib/policy/clinical-policy";
export * from "./lib/config/engine-config";
export * from "./lib/voice/response-formatter";
export * from "./lib/voice/speech-adapter";
export * from "./lib/utils/errors";
export type * from "./lib/types/corpus";
export type * from "./lib/types/decision";
export type * from "./lib/types/patient";
