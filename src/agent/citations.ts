/**
 * Citation Formatter
 *
 * Terminal rendering of the sources returned with an answer.
 *
 * @example
 * ```typescript
 * formatCitations(result.sources);
 * // "[1] Introduction to Retrieval - Lesson 1 (https://example.com/retrieval/1)
 * //  [2] Prompt Design Fundamentals"
 * ```
 */

import type { Source } from './tools/types.js';

/**
 * Drop repeats (several chunks of one lesson cite it once), keeping first-seen order.
 */
export function dedupeSources(sources: readonly Source[]): Source[] {
  const seen = new Set<string>();
  const unique: Source[] = [];
  for (const source of sources) {
    const key = `${source.text}\u0000${source.link ?? ''}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(source);
    }
  }
  return unique;
}

export function formatCitations(sources: readonly Source[]): string {
  return dedupeSources(sources)
    .map((source, i) => `[${i + 1}] ${source.text}${source.link ? ` (${source.link})` : ''}`)
    .join('\n');
}
