import { getLexicon, type Lexicon } from "../config/lexicon.js";
import { DEFAULT_RETRIEVAL_TUNING, type RetrievalTuning } from "../config/tuning.js";
import type { RetrievalResult } from "../domain/types.js";
import { toTitleCase } from "../utils/text.js";
import { baseCategory } from "./contextRelevance.js";

export interface SuggestTopicsOptions {
  limit?: number;
  /** picks the fallback list used for padding */
  category?: string | null;
  tuning?: RetrievalTuning;
  lexicon?: Lexicon;
}

export function cleanTopicTitle(title: string, lexicon: Lexicon = getLexicon()): string {
  const words = title.split(/\s+/).filter((word) => word.length > 0);
  let start = 0;
  while (start < words.length && lexicon.topicPrefixes.includes(words[start].toLowerCase())) {
    start += 1;
  }
  const remaining = start < words.length ? words.slice(start) : words;
  return toTitleCase(remaining.join(" "));
}

export function suggestTopics(
  results: readonly RetrievalResult[],
  options: SuggestTopicsOptions = {},
): string[] {
  const tuning = options.tuning ?? DEFAULT_RETRIEVAL_TUNING;
  const lexicon = options.lexicon ?? getLexicon();
  const limit = options.limit ?? tuning.topicLimit;
  if (limit <= 0) {
    return [];
  }

  const totals = new Map<string, number>();
  for (const result of results) {
    if (result.similarity <= tuning.topicSimilarityThreshold) {
      continue;
    }
    const topic = cleanTopicTitle(result.document.title, lexicon);
    if (topic) {
      totals.set(topic, (totals.get(topic) ?? 0) + result.similarity);
    }
  }

  const topics = [...totals.entries()]
    .sort((a, b) => b[1] - a[1])
    .map(([topic]) => topic)
    .slice(0, limit);

  const seen = new Set(topics.map((topic) => topic.toLowerCase()));
  for (const fallback of fallbackTopicsFor(options.category ?? null, lexicon)) {
    if (topics.length >= limit) {
      break;
    }
    if (!seen.has(fallback.toLowerCase())) {
      topics.push(fallback);
      seen.add(fallback.toLowerCase());
    }
  }

  return topics;
}

function fallbackTopicsFor(category: string | null, lexicon: Lexicon): string[] {
  const key = category ? baseCategory(category) : "default";
  return lexicon.fallbackTopics[key] ?? lexicon.fallbackTopics.default ?? [];
}
