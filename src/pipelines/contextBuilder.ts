import { DEFAULT_RETRIEVAL_TUNING, type RetrievalTuning } from "../config/tuning.js";
import type { RetrievalResult } from "../domain/types.js";
import { truncateText } from "../utils/text.js";

export function contentBudget(similarity: number, tuning: RetrievalTuning): number {
  if (similarity > tuning.highSimilarity) {
    return tuning.highSimilarityChars;
  }
  if (similarity >= tuning.midSimilarity) {
    return tuning.midSimilarityChars;
  }
  return tuning.lowSimilarityChars;
}

/**
 * Joins the visible results as `[category] content` lines, best first.
 * Entries are kept whole; the first one that would cross the cap ends the
 * context.
 */
export function buildContext(
  results: readonly RetrievalResult[],
  tuning: RetrievalTuning = DEFAULT_RETRIEVAL_TUNING,
): string {
  const lines: string[] = [];
  let length = 0;

  for (const result of results) {
    if (result.similarity <= tuning.contextVisibilityThreshold) {
      continue;
    }

    const content = truncateText(result.document.content, contentBudget(result.similarity, tuning));
    const line = `[${result.document.category}] ${content}`;
    const nextLength = length + (lines.length > 0 ? 1 : 0) + line.length;
    if (nextLength > tuning.contextCharCap) {
      break;
    }
    lines.push(line);
    length = nextLength;
  }

  return lines.join("\n");
}
