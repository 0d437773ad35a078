/**
 * Sentence-based text chunker
 *
 * Packs whole sentences into chunks of at most `chunkSize` characters and
 * repeats the trailing sentences that fit in `chunkOverlap` characters at the
 * start of the next chunk. A single sentence longer than `chunkSize` becomes
 * a chunk on its own.
 */

import type { ChunkingOptions } from './types.js';

// Split after . ! or ? followed by whitespace and an upper-case letter,
// except after abbreviations such as "e.g." or "Dr."
const SENTENCE_BOUNDARY = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<=[.!?])\s+(?=[A-Z])/;

export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export function splitSentences(text: string): string[] {
  return normalizeWhitespace(text)
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Number of sentences at the end of `chunk` whose joined length fits in `budget`.
 */
function overlapCount(chunk: string[], budget: number): number {
  let size = 0;
  let count = 0;

  for (let k = chunk.length - 1; k >= 0; k--) {
    const sentence = chunk[k] ?? '';
    const length = sentence.length + (k < chunk.length - 1 ? 1 : 0);
    if (size + length > budget) break;
    size += length;
    count++;
  }

  return count;
}

export function chunkText(text: string, options: ChunkingOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const sentences = splitSentences(text);
  const chunks: string[] = [];

  let start = 0;
  while (start < sentences.length) {
    const current: string[] = [];
    let size = 0;

    for (let j = start; j < sentences.length; j++) {
      const sentence = sentences[j] ?? '';
      const addition = sentence.length + (current.length > 0 ? 1 : 0);
      if (current.length > 0 && size + addition > chunkSize) break;
      current.push(sentence);
      size += addition;
    }

    chunks.push(current.join(' '));

    if (start + current.length >= sentences.length) break;

    // Always advance by at least one sentence
    const next = start + current.length - overlapCount(current, chunkOverlap);
    start = Math.max(next, start + 1);
  }

  return chunks;
}
