import type { QueryResultRow } from "pg";
import type { EmbeddingCache } from "./embeddingCache.js";

/** The slice of `pg.Pool` the cache needs. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export class PgEmbeddingCache implements EmbeddingCache {
  private initialized = false;

  constructor(
    private readonly db: SqlExecutor,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.db.query(`
      CREATE TABLE IF NOT EXISTS document_embeddings (
        cache_key TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        embedding JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS idx_document_embeddings_document_id ON document_embeddings(document_id)`,
    );

    this.initialized = true;
  }

  async getMany(keys: string[]): Promise<Map<string, number[]>> {
    const found = new Map<string, number[]>();
    if (keys.length === 0) {
      return found;
    }
    await this.initialize();

    const result = await this.db.query(
      `SELECT cache_key, embedding FROM document_embeddings WHERE cache_key = ANY($1::text[])`,
      [keys],
    );
    for (const row of result.rows) {
      const key: unknown = row.cache_key;
      const embedding = parseEmbedding(row.embedding);
      if (typeof key === "string" && embedding) {
        found.set(key, embedding);
      }
    }
    return found;
  }

  async putMany(
    entries: Array<{ key: string; documentId: string; embedding: number[] }>,
  ): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.initialize();

    for (const entry of entries) {
      await this.db.query(
        `
          INSERT INTO document_embeddings (cache_key, document_id, embedding, updated_at)
          VALUES ($1, $2, $3::jsonb, NOW())
          ON CONFLICT (cache_key)
          DO UPDATE SET embedding = EXCLUDED.embedding, updated_at = NOW()
        `,
        [entry.key, entry.documentId, JSON.stringify(entry.embedding)],
      );
    }
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

function parseEmbedding(value: unknown): number[] | null {
  // pg hands JSONB back parsed; a text column would arrive as a string
  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(parsed) || parsed.length === 0) {
    return null;
  }
  const numbers: number[] = [];
  for (const item of parsed) {
    if (typeof item !== "number") {
      return null;
    }
    numbers.push(item);
  }
  return numbers;
}
