import type { RetrievalTuning } from "../../config/tuning.js";
import type { IndexType } from "../../domain/types.js";
import type { CorpusIndex } from "../../pipelines/indexing.js";
import { tfidfSimilarities } from "../../pipelines/ranking.js";
import { cosineSimilarity } from "../../utils/vector.js";
import type { AiClient } from "../ai/types.js";
import { createLogger } from "../logging/logger.js";
import { embeddingCacheKey, embeddingText, type EmbeddingCache } from "./embeddingCache.js";
import { InMemoryRetrievalEngine, type EngineSnapshot } from "./inMemoryRetrievalEngine.js";

export interface EmbeddingRetrievalEngineOptions {
  aiClient: AiClient;
  cache: EmbeddingCache;
  tuning?: Partial<RetrievalTuning>;
}

const log = createLogger("engine.embedding");

/**
 * Same ranking as the tf-idf engine, with the vector term taken from
 * provider embeddings. Any provider failure degrades to tf-idf cosine, for
 * the whole snapshot at load time or for one query at retrieval time.
 */
export class EmbeddingRetrievalEngine extends InMemoryRetrievalEngine {
  private readonly aiClient: AiClient;

  private readonly cache: EmbeddingCache;

  constructor(options: EmbeddingRetrievalEngineOptions) {
    super({ indexType: "tf-idf-vector", tuning: options.tuning });
    this.aiClient = options.aiClient;
    this.cache = options.cache;
  }

  async close(): Promise<void> {
    await this.cache.close();
  }

  protected getIndexType(): IndexType {
    return this.getSnapshot().documentEmbeddings ? "external-embedding" : "tf-idf-vector";
  }

  protected async prepareSnapshot(index: CorpusIndex): Promise<EngineSnapshot> {
    const builtAt = new Date().toISOString();
    if (index.documents.length === 0) {
      return { index, documentEmbeddings: null, builtAt };
    }

    try {
      return { index, documentEmbeddings: await this.embedDocuments(index), builtAt };
    } catch (error) {
      log.warn({ err: error }, "document embedding failed; snapshot uses tf-idf vectors");
      return { index, documentEmbeddings: null, builtAt };
    }
  }

  protected async computeVectorSimilarities(
    snapshot: EngineSnapshot,
    query: string,
  ): Promise<number[] | null> {
    const embeddings = snapshot.documentEmbeddings;
    if (!embeddings) {
      return tfidfSimilarities(snapshot.index, query);
    }

    try {
      const queryEmbedding = await this.aiClient.embedQuery(query);
      // negative cosine carries no relevance signal
      return embeddings.map((embedding) =>
        Math.max(0, cosineSimilarity(queryEmbedding, embedding)),
      );
    } catch (error) {
      log.warn({ err: error }, "query embedding failed; using tf-idf similarity");
      return tfidfSimilarities(snapshot.index, query);
    }
  }

  private async embedDocuments(index: CorpusIndex): Promise<number[][]> {
    const modelId = this.aiClient.getEmbeddingModelId();
    const keys = index.documents.map((document) => embeddingCacheKey(document, modelId));
    const cached = await this.cache.getMany(keys);

    const missing = index.documents
      .map((document, docIndex) => ({ document, docIndex, key: keys[docIndex] }))
      .filter((entry) => !cached.has(entry.key));

    if (missing.length > 0) {
      const fresh = await this.aiClient.embedTexts(
        missing.map((entry) => embeddingText(entry.document)),
      );
      if (fresh.length !== missing.length) {
        throw new Error(
          `Embedding provider returned ${fresh.length} vectors for ${missing.length} documents.`,
        );
      }
      const entries = missing.map((entry, i) => ({
        key: entry.key,
        documentId: entry.document.id,
        embedding: fresh[i],
      }));
      await this.cache.putMany(entries);
      for (const entry of entries) {
        cached.set(entry.key, entry.embedding);
      }
    }

    log.debug(
      { reused: index.documents.length - missing.length, embedded: missing.length },
      "document embeddings ready",
    );

    const embeddings = keys.map((key) => {
      const embedding = cached.get(key);
      if (!embedding) {
        throw new Error(`Missing embedding for cache key ${key}.`);
      }
      return embedding;
    });
    const dimensions = new Set(embeddings.map((embedding) => embedding.length));
    if (dimensions.size > 1) {
      throw new Error(`Document embeddings disagree on dimensions: ${[...dimensions].join(", ")}.`);
    }
    return embeddings;
  }
}
