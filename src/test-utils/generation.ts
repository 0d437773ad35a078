/**
 * Scripted generation client for orchestration tests.
 *
 * Each call returns the next scripted response and records a copy of the
 * request it was given.
 */

import { vi } from 'vitest';

import type { GenerationClient, GenerationRequest, GenerationResponse, ToolUseBlock } from '../providers/types.js';

export function scriptedClient(responses: readonly GenerationResponse[]) {
  const requests: GenerationRequest[] = [];
  const complete = vi.fn(async (request: GenerationRequest): Promise<GenerationResponse> => {
    requests.push(request);
    const next = responses[requests.length - 1];
    if (next === undefined) {
      throw new Error(`No scripted response for call ${requests.length}`);
    }
    return next;
  });
  const client: GenerationClient = { complete };
  return { client, complete, requests };
}

export function textResponse(text: string): GenerationResponse {
  return { stopReason: 'end_turn', content: [{ type: 'text', text }] };
}

export function toolUseResponse(...uses: Array<Omit<ToolUseBlock, 'type'>>): GenerationResponse {
  return {
    stopReason: 'tool_use',
    content: uses.map((use): ToolUseBlock => ({ type: 'tool_use', ...use })),
  };
}
