import type { AppConfig } from "../../config/env.js";
import type { RetrievalTuning } from "../../config/tuning.js";
import type { AiClient } from "../ai/types.js";
import { createPostgresPool } from "../db/postgres.js";
import { createLogger } from "../logging/logger.js";
import { InMemoryEmbeddingCache, type EmbeddingCache } from "./embeddingCache.js";
import { EmbeddingRetrievalEngine } from "./embeddingRetrievalEngine.js";
import { InMemoryRetrievalEngine } from "./inMemoryRetrievalEngine.js";
import { PgEmbeddingCache, type SqlExecutor } from "./pgEmbeddingCache.js";

export interface RetrievalEngineBootstrapResult {
  engine: InMemoryRetrievalEngine;
  close: () => Promise<void>;
}

type BackendConfig = Pick<AppConfig, "retrievalBackend" | "databaseUrl">;

const log = createLogger("engine.bootstrap");

/**
 * Picks the strongest backend the environment supports. The embedding
 * provider is probed with one real call; a failed probe settles on tf-idf.
 */
export async function createRetrievalEngine(
  config: BackendConfig,
  aiClient: AiClient,
  tuning?: Partial<RetrievalTuning>,
): Promise<RetrievalEngineBootstrapResult> {
  if (config.retrievalBackend === "keyword") {
    return staticEngine(new InMemoryRetrievalEngine({ indexType: "keyword-index", tuning }));
  }

  const wantsEmbedding =
    config.retrievalBackend === "embedding" ||
    (config.retrievalBackend === "auto" && aiClient.isEmbeddingConfigured());

  if (!wantsEmbedding) {
    return staticEngine(new InMemoryRetrievalEngine({ indexType: "tf-idf-vector", tuning }));
  }

  const probe = await probeEmbeddings(aiClient);
  if (!probe.ok) {
    log.warn({ reason: probe.reason }, "embedding provider unavailable; using tf-idf backend");
    return staticEngine(new InMemoryRetrievalEngine({ indexType: "tf-idf-vector", tuning }));
  }

  const cache = createEmbeddingCache(config.databaseUrl);
  const engine = new EmbeddingRetrievalEngine({ aiClient, cache, tuning });
  log.info(
    { dimension: probe.dimension, cache: config.databaseUrl ? "postgres" : "memory" },
    "embedding backend selected",
  );
  return {
    engine,
    close: async () => {
      await engine.close();
    },
  };
}

export async function probeEmbeddings(
  aiClient: AiClient,
): Promise<{ ok: true; dimension: number } | { ok: false; reason: string }> {
  if (!aiClient.isEmbeddingConfigured()) {
    return { ok: false, reason: "no embedding provider configured" };
  }
  try {
    const embedding = await aiClient.embedQuery("portfolio");
    if (embedding.length === 0) {
      return { ok: false, reason: "provider returned an empty vector" };
    }
    return { ok: true, dimension: embedding.length };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

function createEmbeddingCache(databaseUrl: string | null): EmbeddingCache {
  if (!databaseUrl) {
    return new InMemoryEmbeddingCache();
  }
  const pool = createPostgresPool(databaseUrl);
  const executor: SqlExecutor = {
    query: (text, values) => pool.query(text, values),
  };
  return new PgEmbeddingCache(executor, async () => {
    await pool.end();
  });
}

function staticEngine(engine: InMemoryRetrievalEngine): RetrievalEngineBootstrapResult {
  return {
    engine,
    close: async () => {},
  };
}
