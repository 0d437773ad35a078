/**
 * Orchestration phases
 *
 * ```
 * continue ──(round < maxRounds)──▶ continue
 *    │                                 │
 *    └──(round == maxRounds)──▶ final_no_tools ──▶ done
 *
 * any phase ──(stop reason is not tool_use)──▶ done
 * ```
 *
 * Tools are offered only in `continue`. The call made in `final_no_tools`
 * is returned whatever its stop reason.
 */

import type { GenerationResponse } from '../providers/types.js';

export type LoopPhase = 'continue' | 'final_no_tools' | 'done';

export const DEFAULT_MAX_ROUNDS = 2;

export function initialPhase(toolCount: number, maxRounds: number): LoopPhase {
  return toolCount > 0 && maxRounds > 0 ? 'continue' : 'final_no_tools';
}

export function phaseAfterRound(round: number, maxRounds: number): LoopPhase {
  return round < maxRounds ? 'continue' : 'final_no_tools';
}

export function isTerminal(phase: LoopPhase, response: GenerationResponse): boolean {
  return phase !== 'continue' || response.stopReason !== 'tool_use';
}

/** `done` once the response ends the run, otherwise the phase unchanged */
export function settlePhase(phase: LoopPhase, response: GenerationResponse): LoopPhase {
  return isTerminal(phase, response) ? 'done' : phase;
}

export function offersTools(phase: LoopPhase): boolean {
  return phase === 'continue';
}
