import { DEFAULT_RETRIEVAL_TUNING, type RetrievalTuning } from "../config/tuning.js";
import type { PortfolioDocument } from "../domain/types.js";
import { tokenize } from "../utils/text.js";
import { sparseNorm } from "../utils/vector.js";

export interface CorpusIndex {
  readonly documents: readonly PortfolioDocument[];
  readonly invertedIndex: ReadonlyMap<string, readonly number[]>;
  readonly docFrequency: ReadonlyMap<string, number>;
  readonly vectors: readonly ReadonlyMap<string, number>[];
  readonly vectorNorms: readonly number[];
  readonly keywordSets: readonly ReadonlySet<string>[];
  readonly titleTokenSets: readonly ReadonlySet<string>[];
}

type IndexingWeights = Pick<RetrievalTuning, "keywordTermBoost" | "titleTermBoost">;

export function buildCorpusIndex(
  documents: readonly PortfolioDocument[],
  weights: IndexingWeights = DEFAULT_RETRIEVAL_TUNING,
): CorpusIndex {
  const blobs = documents.map((document) =>
    tokenize(`${document.title} ${document.content} ${document.keywords.join(" ")}`),
  );

  const docFrequency = new Map<string, number>();
  const invertedIndex = new Map<string, number[]>();
  blobs.forEach((tokens, docIndex) => {
    for (const token of new Set(tokens)) {
      docFrequency.set(token, (docFrequency.get(token) ?? 0) + 1);
      const postings = invertedIndex.get(token);
      if (postings) {
        postings.push(docIndex);
      } else {
        invertedIndex.set(token, [docIndex]);
      }
    }
  });

  const keywordSets = documents.map(
    (document) => new Set(document.keywords.map((keyword) => keyword.trim().toLowerCase())),
  );
  const titleTokenSets = documents.map((document) => new Set(tokenize(document.title)));

  const totalDocuments = documents.length;
  const vectors = blobs.map((tokens, docIndex) => {
    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const vector = new Map<string, number>();
    for (const [token, count] of counts) {
      const tf = count / tokens.length;
      const idf = inverseDocumentFrequency(totalDocuments, docFrequency.get(token) ?? 0);
      let boost = 1.0;
      if (keywordSets[docIndex].has(token)) {
        boost = weights.keywordTermBoost;
      } else if (titleTokenSets[docIndex].has(token)) {
        boost = weights.titleTermBoost;
      }
      vector.set(token, tf * idf * boost);
    }
    return vector;
  });

  return {
    documents,
    invertedIndex,
    docFrequency,
    vectors,
    vectorNorms: vectors.map((vector) => sparseNorm(vector)),
    keywordSets,
    titleTokenSets,
  };
}

export function inverseDocumentFrequency(totalDocuments: number, documentFrequency: number): number {
  return documentFrequency > 0 ? totalDocuments / documentFrequency : 0;
}

export function vocabularySize(index: CorpusIndex): number {
  return index.invertedIndex.size;
}
