import type { AppConfig } from "../config/env.js";
import { resolveConversationTuning, type RetrievalTuning } from "../config/tuning.js";
import { DefaultAiClient } from "../infra/ai/defaultAiClient.js";
import type { AiClient } from "../infra/ai/types.js";
import { createLogger } from "../infra/logging/logger.js";
import { loadPortfolioDocuments } from "../infra/parsers/corpusLoader.js";
import { createRetrievalEngine } from "../infra/store/createRetrievalEngine.js";
import type { InMemoryRetrievalEngine } from "../infra/store/inMemoryRetrievalEngine.js";
import { PortfolioAssistantService } from "./portfolioAssistantService.js";
import { SessionStore } from "./sessionStore.js";

/**
 * Everything a request handler needs, built once by the entry point and
 * passed down. Nothing here lives in module scope.
 */
export interface EngineState {
  config: AppConfig;
  aiClient: AiClient;
  engine: InMemoryRetrievalEngine;
  sessions: SessionStore;
  service: PortfolioAssistantService;
  startedAt: number;
  close: () => Promise<void>;
}

export interface CreateEngineStateOptions {
  aiClient?: AiClient;
  tuning?: Partial<RetrievalTuning>;
}

const log = createLogger("bootstrap");

export async function createEngineState(
  config: AppConfig,
  options: CreateEngineStateOptions = {},
): Promise<EngineState> {
  const aiClient = options.aiClient ?? new DefaultAiClient(config);
  const { engine, close } = await createRetrievalEngine(config, aiClient, options.tuning);

  const conversationTuning = resolveConversationTuning({
    stalenessWindowMs: config.contextStalenessMs,
  });
  const sessions = new SessionStore({
    timeoutMs: config.sessionTimeoutMs,
    tuning: conversationTuning,
  });

  const service = new PortfolioAssistantService({
    engine,
    sessions,
    aiClient,
    loadCorpus: () => loadPortfolioDocuments(config.portfolioDataPath),
    defaultTopK: config.defaultTopK,
    conversationTuning,
  });

  const initial = await service.rebuildIndex();
  log.info(
    { source: initial.source, path: initial.path, ...initial.stats, answerMode: config.answerMode },
    "engine ready",
  );

  return {
    config,
    aiClient,
    engine,
    sessions,
    service,
    startedAt: Date.now(),
    close,
  };
}
