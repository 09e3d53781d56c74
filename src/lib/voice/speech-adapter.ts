/**
 * Speech adapters
 *
 * Audio capture and playback live outside the engine. A deployment passes its
 * recognizer and synthesizer in; the engine only sees text.
 */

import type { TurnResult } from "@/lib/agents/recall-engine";

export interface SpeechToTextAdapter {
  /** Resolves with one utterance, or an empty string when nothing was heard */
  transcribe(): Promise<string>;
}

export interface SpeechSynthesisAdapter {
  speak(text: string): Promise<void>;
}

export interface VoiceTurnEngine {
  respond(sessionId: string, utterance: string): TurnResult;
}

/**
 * Listen once, answer, speak the answer. Returns null when the recognizer
 * heard nothing.
 */
export async function runVoiceTurn(
  engine: VoiceTurnEngine,
  sessionId: string,
  stt: SpeechToTextAdapter,
  tts: SpeechSynthesisAdapter
): Promise<TurnResult | null> {
  const utterance = (await stt.transcribe()).trim();
  if (!utterance) return null;

  const result = engine.respond(sessionId, utterance);
  await tts.speak(result.response);
  return result;
}
