/**
 * Query helpers: FTS5 match expressions and course name resolution.
 */

const WORD = /[\p{L}\p{N}]+/gu;

/** Ignored when matching course names word by word */
const NAME_STOPWORDS = new Set(['the', 'and', 'for', 'with', 'course', 'lesson']);

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(WORD) ?? []).filter((token) => token.length > 0);
}

/**
 * Turn free text into an FTS5 MATCH expression: every word quoted, any word
 * may match. Returns undefined when the text has no words.
 */
export function buildFtsQuery(text: string): string | undefined {
  const tokens = [...new Set(tokenize(text))];
  if (tokens.length === 0) {
    return undefined;
  }
  return tokens.map((token) => `"${token}"`).join(' OR ');
}

function nameWords(text: string): Set<string> {
  return new Set(tokenize(text).filter((token) => token.length >= 3 && !NAME_STOPWORDS.has(token)));
}

/**
 * Pick the catalog title a user-supplied course name refers to.
 *
 * Tried in order, first hit wins (ties go to the earlier title):
 * 1. case-insensitive exact match
 * 2. one contains the other
 * 3. most shared significant words
 */
export function resolveCourseTitle(name: string, titles: readonly string[]): string | undefined {
  const wanted = name.trim().toLowerCase();
  if (wanted === '') {
    return undefined;
  }

  const exact = titles.find((title) => title.toLowerCase() === wanted);
  if (exact !== undefined) {
    return exact;
  }

  const partial = titles.find((title) => {
    const candidate = title.toLowerCase();
    return candidate.includes(wanted) || wanted.includes(candidate);
  });
  if (partial !== undefined) {
    return partial;
  }

  const words = nameWords(wanted);
  let best: string | undefined;
  let bestScore = 0;
  for (const title of titles) {
    let score = 0;
    for (const word of nameWords(title)) {
      if (words.has(word)) score++;
    }
    if (score > bestScore) {
      best = title;
      bestScore = score;
    }
  }
  return best;
}
