/**
 * Scoring constants for indexing, ranking, context building and topic
 * suggestion. The values are empirical and were never calibrated against
 * query logs; every engine accepts overrides.
 */
export interface RetrievalTuning {
  /** vector boost for a token that is a declared keyword of the document */
  keywordTermBoost: number;
  /** vector boost for a token that appears in the title */
  titleTermBoost: number;

  keywordMatchWeight: number;
  titleMatchWeight: number;
  contentMatchWeight: number;
  fuzzyMatchWeight: number;
  fuzzyCutoff: number;
  maxFuzzyMatches: number;
  vectorSimilarityWeight: number;
  /** raw score that maps to similarity 1.0 */
  scoreScale: number;
  relevanceFloor: number;

  contextVisibilityThreshold: number;
  contextCharCap: number;
  highSimilarity: number;
  midSimilarity: number;
  highSimilarityChars: number;
  midSimilarityChars: number;
  lowSimilarityChars: number;

  topicSimilarityThreshold: number;
  topicLimit: number;
  topicCandidateCount: number;
}

export const DEFAULT_RETRIEVAL_TUNING: RetrievalTuning = {
  keywordTermBoost: 3.0,
  titleTermBoost: 2.0,

  keywordMatchWeight: 5.0,
  titleMatchWeight: 3.0,
  contentMatchWeight: 1.0,
  fuzzyMatchWeight: 0.5,
  fuzzyCutoff: 0.8,
  maxFuzzyMatches: 3,
  vectorSimilarityWeight: 2.0,
  scoreScale: 10.0,
  relevanceFloor: 0.1,

  contextVisibilityThreshold: 0.2,
  contextCharCap: 800,
  highSimilarity: 0.7,
  midSimilarity: 0.4,
  highSimilarityChars: 300,
  midSimilarityChars: 150,
  lowSimilarityChars: 100,

  topicSimilarityThreshold: 0.3,
  topicLimit: 3,
  topicCandidateCount: 5,
};

export interface ConversationTuning {
  /** transitions beyond this count switch carried-over context off */
  maxTopicTransitions: number;
  stalenessWindowMs: number;
  historyWindow: number;
  maxMentionedItems: number;
}

export const DEFAULT_CONVERSATION_TUNING: ConversationTuning = {
  maxTopicTransitions: 3,
  stalenessWindowMs: 5 * 60 * 1000,
  historyWindow: 10,
  maxMentionedItems: 20,
};

export function resolveRetrievalTuning(overrides?: Partial<RetrievalTuning>): RetrievalTuning {
  return { ...DEFAULT_RETRIEVAL_TUNING, ...overrides };
}

export function resolveConversationTuning(
  overrides?: Partial<ConversationTuning>,
): ConversationTuning {
  return { ...DEFAULT_CONVERSATION_TUNING, ...overrides };
}
