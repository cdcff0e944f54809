import { readFileSync } from "node:fs";
import path from "node:path";
import type { AnswerMode } from "../src/config/env.js";
import type { PortfolioDocument, RetrievalResult } from "../src/domain/types.js";
import type { AiClient, AnswerPrompt } from "../src/infra/ai/types.js";
import { parseCorpus } from "../src/infra/parsers/corpusLoader.js";

export function readPortfolioFixture(): PortfolioDocument[] {
  const raw: unknown = JSON.parse(readFileSync(path.resolve("data/portfolio.json"), "utf-8"));
  const documents = parseCorpus(raw);
  if (!documents) {
    throw new Error("data/portfolio.json failed validation");
  }
  return documents;
}

export function makeDocument(overrides: Partial<PortfolioDocument> & { id: string }): PortfolioDocument {
  return {
    category: "keahlian",
    title: "Untitled",
    content: "",
    keywords: [],
    ...overrides,
  };
}

export function makeResult(document: PortfolioDocument, similarity: number): RetrievalResult {
  return { document, similarity, score: similarity * 10, matchedTerms: [] };
}

/** Three-dimensional embeddings keyed on a couple of marker words. */
export function markerEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return [lower.includes("python") ? 1 : 0, lower.includes("novel") ? 1 : 0, 0.1];
}

export interface FakeAiClientOptions {
  embeddings?: boolean;
  embeddingModel?: string;
  /** vector for every text and query; marker embeddings otherwise */
  fixedEmbedding?: number[];
  queryEmbedding?: number[];
  answerMode?: AnswerMode;
  answer?: string | null;
  failEmbedTexts?: boolean;
  failEmbedQuery?: boolean;
  failAnswer?: boolean;
}

export class FakeAiClient implements AiClient {
  readonly embeddedBatches: string[][] = [];

  readonly prompts: AnswerPrompt[] = [];

  queryCount = 0;

  constructor(private readonly options: FakeAiClientOptions = {}) {}

  isEmbeddingConfigured(): boolean {
    return this.options.embeddings ?? false;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (this.options.failEmbedTexts) {
      throw new Error("embedding backend down");
    }
    this.embeddedBatches.push(texts);
    return texts.map((text) => this.embed(text));
  }

  async embedQuery(query: string): Promise<number[]> {
    this.queryCount += 1;
    if (this.options.failEmbedQuery) {
      throw new Error("embedding backend down");
    }
    return this.options.queryEmbedding ?? this.embed(query);
  }

  getEmbeddingModelId(): string {
    return `fake/${this.options.embeddingModel ?? "marker"}`;
  }

  getAnswerMode(): AnswerMode {
    return this.options.answerMode ?? "template";
  }

  async generateAnswer(prompt: AnswerPrompt): Promise<string | null> {
    this.prompts.push(prompt);
    if (this.options.failAnswer) {
      throw new Error("model timed out");
    }
    return this.options.answer ?? null;
  }

  private embed(text: string): number[] {
    return this.options.fixedEmbedding ?? markerEmbedding(text);
  }
}
