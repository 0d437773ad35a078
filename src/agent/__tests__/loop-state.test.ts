import { describe, it, expect } from 'vitest';

import { initialPhase, isTerminal, offersTools, phaseAfterRound, settlePhase } from '../loop-state.js';
import type { GenerationResponse } from '../../providers/types.js';

const toolUse: GenerationResponse = {
  stopReason: 'tool_use',
  content: [{ type: 'tool_use', id: 'tu_1', name: 'search_course_content', input: {} }],
};
const endTurn: GenerationResponse = { stopReason: 'end_turn', content: [{ type: 'text', text: 'done' }] };

describe('loop phases', () => {
  it('starts by offering tools only when there are tools and rounds to spend', () => {
    expect(initialPhase(2, 2)).toBe('continue');
    expect(initialPhase(0, 2)).toBe('final_no_tools');
    expect(initialPhase(2, 0)).toBe('final_no_tools');
  });

  it('withholds tools once the round budget is spent', () => {
    expect(phaseAfterRound(1, 2)).toBe('continue');
    expect(phaseAfterRound(2, 2)).toBe('final_no_tools');
    expect(phaseAfterRound(3, 2)).toBe('final_no_tools');
  });

  it('keeps going only while tools are offered and requested', () => {
    expect(isTerminal('continue', toolUse)).toBe(false);
    expect(isTerminal('continue', endTurn)).toBe(true);
    expect(isTerminal('continue', { stopReason: 'other', content: [] })).toBe(true);
    expect(isTerminal('final_no_tools', toolUse)).toBe(true);
    expect(isTerminal('done', toolUse)).toBe(true);
  });

  it('settles to done on a terminal response', () => {
    expect(settlePhase('continue', toolUse)).toBe('continue');
    expect(settlePhase('continue', endTurn)).toBe('done');
    expect(settlePhase('final_no_tools', toolUse)).toBe('done');
  });

  it('offers tools in the continue phase only', () => {
    expect(offersTools('continue')).toBe(true);
    expect(offersTools('final_no_tools')).toBe(false);
    expect(offersTools('done')).toBe(false);
  });
});
