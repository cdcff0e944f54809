import { resolveRetrievalTuning, type RetrievalTuning } from "../../config/tuning.js";
import type { RetrievalEngine, RetrieveInput } from "../../domain/retrievalEngine.js";
import {
  portfolioCorpusSchema,
  type EngineStats,
  type IndexType,
  type PortfolioDocument,
  type RetrievalResult,
} from "../../domain/types.js";
import { classifyQuery } from "../../pipelines/classification.js";
import { buildContext } from "../../pipelines/contextBuilder.js";
import { buildCorpusIndex, vocabularySize, type CorpusIndex } from "../../pipelines/indexing.js";
import { rankDocuments, tfidfSimilarities } from "../../pipelines/ranking.js";
import { suggestTopics } from "../../pipelines/topicSuggester.js";
import { createLogger } from "../logging/logger.js";

export interface EngineSnapshot {
  readonly index: CorpusIndex;
  /** aligned with `index.documents`; null when the backend has no embeddings */
  readonly documentEmbeddings: readonly (readonly number[])[] | null;
  readonly builtAt: string;
}

export interface InMemoryRetrievalEngineOptions {
  indexType?: Exclude<IndexType, "external-embedding">;
  tuning?: Partial<RetrievalTuning>;
}

const log = createLogger("engine");

/**
 * Keyword and tf-idf retrieval over an immutable snapshot. `loadDocuments`
 * builds the next snapshot off to the side and swaps one reference; readers
 * grab the reference once per call and never observe a half-built index.
 */
export class InMemoryRetrievalEngine implements RetrievalEngine {
  protected readonly tuning: RetrievalTuning;

  private readonly baseIndexType: Exclude<IndexType, "external-embedding">;

  private snapshot: EngineSnapshot;

  private rebuildChain: Promise<unknown> = Promise.resolve();

  constructor(options: InMemoryRetrievalEngineOptions = {}) {
    this.tuning = resolveRetrievalTuning(options.tuning);
    this.baseIndexType = options.indexType ?? "tf-idf-vector";
    this.snapshot = {
      index: buildCorpusIndex([], this.tuning),
      documentEmbeddings: null,
      builtAt: new Date().toISOString(),
    };
  }

  loadDocuments(documents: readonly PortfolioDocument[]): Promise<boolean> {
    const parsed = portfolioCorpusSchema.safeParse(documents);
    if (!parsed.success) {
      log.warn(
        { issues: parsed.error.issues.slice(0, 5) },
        "rejected invalid corpus; keeping previous index",
      );
      return Promise.resolve(false);
    }

    const task = async (): Promise<boolean> => {
      const startedAt = Date.now();
      const index = buildCorpusIndex(parsed.data, this.tuning);
      const next = await this.prepareSnapshot(index);
      this.snapshot = next;
      log.info(
        {
          documents: index.documents.length,
          vocabulary: vocabularySize(index),
          indexType: this.getIndexType(),
          ms: Date.now() - startedAt,
        },
        "index rebuilt",
      );
      return true;
    };

    const run = this.rebuildChain.then(task, task);
    this.rebuildChain = run.catch(() => undefined);
    return run;
  }

  async retrieve(input: RetrieveInput): Promise<RetrievalResult[]> {
    const snapshot = this.snapshot;
    if (snapshot.index.documents.length === 0 || input.topK <= 0) {
      return [];
    }

    const vectorSimilarities = await this.computeVectorSimilarities(snapshot, input.query);
    return rankDocuments(snapshot.index, input.query, {
      topK: input.topK,
      categoryFilter: input.categoryFilter ?? null,
      tuning: this.tuning,
      vectorSimilarities,
    });
  }

  async buildRagContext(
    query: string,
    topK: number,
    categoryFilter?: string | null,
  ): Promise<string> {
    const results = await this.retrieve({ query, topK, categoryFilter });
    return buildContext(results, this.tuning);
  }

  async suggestRelatedTopics(query: string): Promise<string[]> {
    const category = classifyQuery(query);
    const results = await this.retrieve({ query, topK: this.tuning.topicCandidateCount });
    return suggestTopics(results, { category, tuning: this.tuning });
  }

  getStats(): EngineStats {
    const { index } = this.snapshot;
    return {
      document_count: index.documents.length,
      vocabulary_size: vocabularySize(index),
      index_type: this.getIndexType(),
    };
  }

  getSnapshot(): EngineSnapshot {
    return this.snapshot;
  }

  getTuning(): RetrievalTuning {
    return this.tuning;
  }

  protected getIndexType(): IndexType {
    return this.baseIndexType;
  }

  protected async prepareSnapshot(index: CorpusIndex): Promise<EngineSnapshot> {
    return {
      index,
      documentEmbeddings: null,
      builtAt: new Date().toISOString(),
    };
  }

  protected async computeVectorSimilarities(
    snapshot: EngineSnapshot,
    query: string,
  ): Promise<number[] | null> {
    if (this.baseIndexType === "keyword-index") {
      return null;
    }
    return tfidfSimilarities(snapshot.index, query);
  }
}
