import type { AnswerMode, AppConfig, EmbeddingProvider } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import type { AiClient, AnswerPrompt } from "./types.js";

export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly answerMode: AnswerMode;

  private readonly openAiEmbeddingModel: string;

  private readonly ollamaEmbeddingModel: string;

  constructor(config: AppConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.answerMode = config.answerMode;
    this.openAiEmbeddingModel = config.openaiEmbeddingModel;
    this.ollamaEmbeddingModel = config.ollamaEmbeddingModel;
  }

  isEmbeddingConfigured(): boolean {
    if (this.embeddingProvider === "none") {
      return false;
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0 || this.embeddingProvider === "none") {
      return [];
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedTexts(texts);
    }
    return this.ollama.embedTexts(texts);
  }

  async embedQuery(query: string): Promise<number[]> {
    if (this.embeddingProvider === "none") {
      throw new Error("Embedding provider is disabled.");
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedQuery(query);
    }
    return this.ollama.embedQuery(query);
  }

  getEmbeddingModelId(): string {
    if (this.embeddingProvider === "openai") {
      return `openai/${this.openAiEmbeddingModel}`;
    }
    if (this.embeddingProvider === "ollama") {
      return `ollama/${this.ollamaEmbeddingModel}`;
    }
    return "none";
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async generateAnswer(prompt: AnswerPrompt): Promise<string | null> {
    if (this.answerMode === "openai") {
      return this.openAi.generateAnswer(prompt);
    }
    if (this.answerMode === "ollama") {
      return this.ollama.generateAnswer(prompt);
    }
    return null;
  }
}
