/**
 * Edit distance between two strings, two-row dynamic programming.
 */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  const prev = new Array<number>(n + 1);
  const curr = new Array<number>(n + 1);

  for (let j = 0; j <= n; j++) prev[j] = j;

  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    for (let j = 0; j <= n; j++) prev[j] = curr[j];
  }

  return prev[n];
}

/** 1 for identical strings, 0 for nothing in common. */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;

  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;

  return 1 - levenshteinDistance(a, b) / maxLen;
}

export interface CloseMatch {
  word: string;
  similarity: number;
}

/**
 * Up to `limit` candidates whose similarity to `word` reaches `cutoff`,
 * best first. Ties keep candidate order.
 */
export function findCloseMatches(
  word: string,
  candidates: Iterable<string>,
  limit: number,
  cutoff: number,
): CloseMatch[] {
  if (limit <= 0 || !word) {
    return [];
  }

  const matches: CloseMatch[] = [];
  for (const candidate of candidates) {
    const maxLen = Math.max(word.length, candidate.length);
    // length gap alone already rules the candidate out
    if (maxLen === 0 || 1 - Math.abs(word.length - candidate.length) / maxLen < cutoff) {
      continue;
    }
    const similarity = levenshteinSimilarity(word, candidate);
    if (similarity >= cutoff) {
      matches.push({ word: candidate, similarity });
    }
  }

  return matches.sort((a, b) => b.similarity - a.similarity).slice(0, limit);
}
