import { z } from "zod";

const envSchema = z.object({
  PORTFOLIO_DATA_PATH: z.string().optional(),
  RETRIEVAL_BACKEND: z.enum(["auto", "keyword", "tfidf", "embedding"]).default("auto"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  ANSWER_MODE: z.enum(["template", "openai", "ollama"]).default("template"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  DATABASE_URL: z.string().optional(),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(60),
  CONTEXT_STALENESS_MINUTES: z.coerce.number().positive().default(5),
  DEFAULT_TOP_K: z.coerce.number().int().positive().max(20).default(3),
});

export type RetrievalBackend = "auto" | "keyword" | "tfidf" | "embedding";
export type EmbeddingProvider = "none" | "openai" | "ollama";
export type AnswerMode = "template" | "openai" | "ollama";

export interface AppConfig {
  portfolioDataPath: string | null;
  retrievalBackend: RetrievalBackend;
  embeddingProvider: EmbeddingProvider;
  answerMode: AnswerMode;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  databaseUrl: string | null;
  transport: "stdio" | "http";
  host: string;
  port: number;
  sessionTimeoutMs: number;
  contextStalenessMs: number;
  defaultTopK: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? "openai" : "none");

  if (parsed.ANSWER_MODE === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("ANSWER_MODE=openai requires OPENAI_API_KEY.");
  }
  if (embeddingProvider === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (parsed.RETRIEVAL_BACKEND === "embedding" && embeddingProvider === "none") {
    throw new Error("RETRIEVAL_BACKEND=embedding requires an EMBEDDING_PROVIDER.");
  }

  return {
    portfolioDataPath: parsed.PORTFOLIO_DATA_PATH || null,
    retrievalBackend: parsed.RETRIEVAL_BACKEND,
    embeddingProvider,
    answerMode: parsed.ANSWER_MODE,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    databaseUrl: parsed.DATABASE_URL || null,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    sessionTimeoutMs: parsed.SESSION_TIMEOUT_MINUTES * 60_000,
    contextStalenessMs: parsed.CONTEXT_STALENESS_MINUTES * 60_000,
    defaultTopK: parsed.DEFAULT_TOP_K,
  };
}
