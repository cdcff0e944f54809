import type { RetrievalTuning } from "../config/tuning.js";
import type { EngineStats, PortfolioDocument, RetrievalResult } from "./types.js";

export interface RetrieveInput {
  query: string;
  topK: number;
  categoryFilter?: string | null;
}

export interface RetrievalEngine {
  /** Replaces the whole corpus. Returns false and keeps the old one on invalid input. */
  loadDocuments(documents: readonly PortfolioDocument[]): Promise<boolean>;
  retrieve(input: RetrieveInput): Promise<RetrievalResult[]>;
  buildRagContext(query: string, topK: number, categoryFilter?: string | null): Promise<string>;
  suggestRelatedTopics(query: string): Promise<string[]>;
  getStats(): EngineStats;
  getTuning(): RetrievalTuning;
}
