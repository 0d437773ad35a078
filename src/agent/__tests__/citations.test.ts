import { describe, it, expect } from 'vitest';
import { dedupeSources, formatCitations } from '../citations.js';

describe('citations', () => {
  it('numbers sources and shows links when known', () => {
    expect(
      formatCitations([
        { text: 'Introduction to Retrieval - Lesson 1', link: 'https://example.com/retrieval/1' },
        { text: 'Prompt Design Fundamentals', link: null },
      ])
    ).toBe('[1] Introduction to Retrieval - Lesson 1 (https://example.com/retrieval/1)\n[2] Prompt Design Fundamentals');
  });

  it('cites a lesson once when several chunks came from it', () => {
    const lesson = { text: 'C - Lesson 2', link: null };

    expect(dedupeSources([lesson, { text: 'C - Lesson 3', link: null }, { ...lesson }])).toEqual([
      lesson,
      { text: 'C - Lesson 3', link: null },
    ]);
  });

  it('renders nothing for no sources', () => {
    expect(formatCitations([])).toBe('');
  });
});
