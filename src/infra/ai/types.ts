import type { AnswerMode } from "../../config/env.js";

export interface AnswerPrompt {
  question: string;
  /** output of the context builder, `[category] content` lines */
  context: string;
  category: string;
}

export interface AiClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
  /** `provider/model` of the embeddings, part of every cache key */
  getEmbeddingModelId(): string;
  getAnswerMode(): AnswerMode;
  /** null when the mode has no generator or the model returned nothing */
  generateAnswer(prompt: AnswerPrompt): Promise<string | null>;
}
