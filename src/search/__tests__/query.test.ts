import { describe, it, expect } from 'vitest';
import { buildFtsQuery, resolveCourseTitle, tokenize } from '../query.js';

const TITLES = ['Introduction to Retrieval', 'Prompt Design Fundamentals', 'Advanced Retrieval Systems'];

describe('tokenize', () => {
  it('lowercases and keeps letters and digits', () => {
    expect(tokenize('Café-au-lait 42')).toEqual(['café', 'au', 'lait', '42']);
  });
});

describe('buildFtsQuery', () => {
  it('quotes unique words and ORs them', () => {
    expect(buildFtsQuery('What is RAG? rag!')).toBe('"what" OR "is" OR "rag"');
  });

  it('returns undefined when there are no words', () => {
    expect(buildFtsQuery('?? -- !!')).toBeUndefined();
  });
});

describe('resolveCourseTitle', () => {
  it('matches exact titles case-insensitively', () => {
    expect(resolveCourseTitle('introduction to retrieval', TITLES)).toBe('Introduction to Retrieval');
  });

  it('matches a fragment of a title', () => {
    expect(resolveCourseTitle('Prompt Design', TITLES)).toBe('Prompt Design Fundamentals');
  });

  it('prefers the earlier title when several contain the fragment', () => {
    expect(resolveCourseTitle('retrieval', TITLES)).toBe('Introduction to Retrieval');
  });

  it('falls back to the title sharing the most words', () => {
    expect(resolveCourseTitle('Retrieval Systems Course', TITLES)).toBe('Advanced Retrieval Systems');
  });

  it('returns undefined for blank or unrelated names', () => {
    expect(resolveCourseTitle('  ', TITLES)).toBeUndefined();
    expect(resolveCourseTitle('Quantum Physics', TITLES)).toBeUndefined();
  });
});
