import { DEFAULT_RETRIEVAL_TUNING, type RetrievalTuning } from "../config/tuning.js";
import type { RetrievalResult } from "../domain/types.js";
import { findCloseMatches } from "../utils/similarity.js";
import { tokenize, uniqueTokens } from "../utils/text.js";
import { sparseCosineSimilarity, sparseNorm } from "../utils/vector.js";
import type { CorpusIndex } from "./indexing.js";

/** Per-document similarity in [0, 1], aligned with `index.documents`. */
export type VectorSimilarities = readonly number[];

export interface RankOptions {
  topK: number;
  categoryFilter?: string | null;
  tuning?: RetrievalTuning;
  vectorSimilarities?: VectorSimilarities | null;
}

interface Candidate {
  docIndex: number;
  score: number;
  matchedTerms: Set<string>;
}

export function rankDocuments(
  index: CorpusIndex,
  query: string,
  options: RankOptions,
): RetrievalResult[] {
  const tuning = options.tuning ?? DEFAULT_RETRIEVAL_TUNING;
  const tokens = uniqueTokens(tokenize(query));
  if (tokens.length === 0 || index.documents.length === 0 || options.topK <= 0) {
    return [];
  }

  const filter = options.categoryFilter ?? null;
  const passes = (docIndex: number) =>
    filter === null || index.documents[docIndex].category === filter;

  const candidates: Candidate[] = index.documents.map((_, docIndex) => ({
    docIndex,
    score: 0,
    matchedTerms: new Set<string>(),
  }));

  for (const token of tokens) {
    const postings = index.invertedIndex.get(token);
    if (!postings) {
      continue;
    }
    for (const docIndex of postings) {
      if (!passes(docIndex)) {
        continue;
      }
      const candidate = candidates[docIndex];
      if (index.keywordSets[docIndex].has(token)) {
        candidate.score += tuning.keywordMatchWeight;
      } else if (index.titleTokenSets[docIndex].has(token)) {
        candidate.score += tuning.titleMatchWeight;
      } else {
        candidate.score += tuning.contentMatchWeight;
      }
      candidate.matchedTerms.add(token);
    }
  }

  const vocabulary = [...index.invertedIndex.keys()];
  for (const token of tokens) {
    const matches = findCloseMatches(
      token,
      vocabulary.filter((word) => word !== token),
      tuning.maxFuzzyMatches,
      tuning.fuzzyCutoff,
    );
    for (const match of matches) {
      for (const docIndex of index.invertedIndex.get(match.word) ?? []) {
        if (!passes(docIndex)) {
          continue;
        }
        candidates[docIndex].score += tuning.fuzzyMatchWeight;
        candidates[docIndex].matchedTerms.add(match.word);
      }
    }
  }

  const similarities = options.vectorSimilarities;
  if (similarities) {
    for (const candidate of candidates) {
      if (passes(candidate.docIndex)) {
        candidate.score += (similarities[candidate.docIndex] ?? 0) * tuning.vectorSimilarityWeight;
      }
    }
  }

  // Array.prototype.sort is stable, so equal scores keep corpus order
  return candidates
    .filter((candidate) => passes(candidate.docIndex))
    .sort((a, b) => b.score - a.score)
    .slice(0, options.topK)
    .map((candidate) => ({
      document: index.documents[candidate.docIndex],
      similarity: clamp(candidate.score / tuning.scoreScale, 0, 1),
      score: candidate.score,
      matchedTerms: [...candidate.matchedTerms],
    }))
    .filter((result) => result.similarity >= tuning.relevanceFloor);
}

/**
 * Sparse tf-idf cosine between the query and every document. Query tokens
 * missing from the vocabulary get weight tf * 1.0.
 */
export function tfidfSimilarities(index: CorpusIndex, query: string): number[] {
  const tokens = tokenize(query);
  if (tokens.length === 0) {
    return index.documents.map(() => 0);
  }

  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const totalDocuments = index.documents.length;
  const queryVector = new Map<string, number>();
  for (const [token, count] of counts) {
    const df = index.docFrequency.get(token);
    const idf = df ? totalDocuments / df : 1.0;
    queryVector.set(token, (count / tokens.length) * idf);
  }
  const queryNorm = sparseNorm(queryVector);

  return index.vectors.map((vector, docIndex) =>
    sparseCosineSimilarity(queryVector, vector, queryNorm, index.vectorNorms[docIndex]),
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
