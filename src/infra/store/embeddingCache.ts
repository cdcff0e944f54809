import { createHash } from "node:crypto";
import type { PortfolioDocument } from "../../domain/types.js";

export interface EmbeddingCache {
  getMany(keys: string[]): Promise<Map<string, number[]>>;
  putMany(entries: Array<{ key: string; documentId: string; embedding: number[] }>): Promise<void>;
  close(): Promise<void>;
}

/**
 * `documentId:sha256` over the embedding model and the embedded fields, so
 * an edited document or a model switch re-embeds on the next rebuild.
 */
export function embeddingCacheKey(document: PortfolioDocument, modelId: string): string {
  const digest = createHash("sha256")
    .update(modelId)
    .update("\u0000")
    .update(document.title)
    .update("\u0000")
    .update(document.content)
    .update("\u0000")
    .update(document.keywords.join("\u0001"))
    .digest("hex");
  return `${document.id}:${digest}`;
}

export function embeddingText(document: PortfolioDocument): string {
  return `${document.title}: ${document.content} ${document.keywords.join(", ")}`.trim();
}

export class InMemoryEmbeddingCache implements EmbeddingCache {
  private readonly entries = new Map<string, number[]>();

  async getMany(keys: string[]): Promise<Map<string, number[]>> {
    const found = new Map<string, number[]>();
    for (const key of keys) {
      const embedding = this.entries.get(key);
      if (embedding) {
        found.set(key, embedding);
      }
    }
    return found;
  }

  async putMany(
    entries: Array<{ key: string; documentId: string; embedding: number[] }>,
  ): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.key, entry.embedding);
    }
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
