import type { AnswerMode } from "../config/env.js";
import { DEFAULT_CONVERSATION_TUNING, type ConversationTuning } from "../config/tuning.js";
import type { RetrievalEngine } from "../domain/retrievalEngine.js";
import {
  FOLLOWUP_SUFFIX,
  GENERAL,
  RECRUITMENT,
  type CategoryLabel,
  type ConversationState,
  type EngineStats,
  type RetrievalResult,
} from "../domain/types.js";
import type { AiClient } from "../infra/ai/types.js";
import { createLogger } from "../infra/logging/logger.js";
import type { LoadedCorpus } from "../infra/parsers/corpusLoader.js";
import {
  buildFixedAnswer,
  buildTemplatedAnswer,
  bypassesRetrieval,
  detectLanguage,
} from "../pipelines/answering.js";
import { classifyQuery } from "../pipelines/classification.js";
import { buildContext } from "../pipelines/contextBuilder.js";
import { baseCategory } from "../pipelines/contextRelevance.js";
import { suggestFollowups } from "../pipelines/followupSuggester.js";
import { suggestTopics } from "../pipelines/topicSuggester.js";
import { truncateText } from "../utils/text.js";
import type { SessionStats, SessionStore } from "./sessionStore.js";

export interface AskInput {
  question: string;
  sessionId?: string;
  topK?: number;
}

export interface AskResult {
  answer: string;
  session_id: string;
  category: CategoryLabel;
  related_topics: string[];
  context_used: boolean;
  sources: string[];
  answer_generation_mode: AnswerMode;
  latency_ms: number;
}

export interface SearchDocumentsInput {
  query: string;
  topK?: number;
  category?: string | null;
}

export interface SearchDocumentsResult {
  query: string;
  index_type: EngineStats["index_type"];
  hits: Array<{
    id: string;
    category: string;
    title: string;
    similarity: number;
    score: number;
    matched_terms: string[];
    snippet: string;
  }>;
}

export interface ClassifyResult {
  query: string;
  category: CategoryLabel;
  used_session: boolean;
}

export interface FollowupsResult {
  session_id: string | null;
  suggested_followups: string[];
  used_session: boolean;
}

export interface RebuildIndexResult {
  ok: boolean;
  source: LoadedCorpus["source"];
  path: string | null;
  stats: EngineStats;
}

export interface ServiceStatus {
  engine: EngineStats;
  corpus: { source: LoadedCorpus["source"]; path: string | null; loaded_at: string | null };
  sessions: SessionStats;
  answer_mode: AnswerMode;
}

export interface PortfolioAssistantServiceOptions {
  engine: RetrievalEngine;
  sessions: SessionStore;
  aiClient: AiClient;
  loadCorpus: () => Promise<LoadedCorpus>;
  defaultTopK?: number;
  conversationTuning?: ConversationTuning;
  clock?: () => number;
}

interface RetrievalPlan {
  query: string;
  categoryFilter: string | null;
  retryUnfiltered: boolean;
}

const log = createLogger("assistant");

export class PortfolioAssistantService {
  private readonly engine: RetrievalEngine;

  private readonly sessions: SessionStore;

  private readonly aiClient: AiClient;

  private readonly loadCorpus: () => Promise<LoadedCorpus>;

  private readonly defaultTopK: number;

  private readonly conversationTuning: ConversationTuning;

  private readonly clock: () => number;

  private corpusInfo: ServiceStatus["corpus"] = { source: "fallback", path: null, loaded_at: null };

  constructor(options: PortfolioAssistantServiceOptions) {
    this.engine = options.engine;
    this.sessions = options.sessions;
    this.aiClient = options.aiClient;
    this.loadCorpus = options.loadCorpus;
    this.defaultTopK = options.defaultTopK ?? 3;
    this.conversationTuning = options.conversationTuning ?? DEFAULT_CONVERSATION_TUNING;
    this.clock = options.clock ?? Date.now;
  }

  async ask(input: AskInput): Promise<AskResult> {
    const startedAt = Date.now();
    const topK = input.topK ?? this.defaultTopK;

    const result = await this.sessions.withSession(
      input.sessionId,
      async (state): Promise<Omit<AskResult, "latency_ms">> => {
        const category = classifyQuery(input.question, state, {
          now: this.clock(),
          tuning: this.conversationTuning,
        });
        const language = detectLanguage(input.question);

        const fixed = bypassesRetrieval(category) ? buildFixedAnswer(category, language) : null;
        if (fixed !== null) {
          this.sessions.recordTurn(state, input.question, category);
          return {
            answer: fixed,
            session_id: state.sessionId,
            category,
            related_topics: suggestTopics([], { tuning: this.engine.getTuning() }),
            context_used: false,
            sources: [],
            answer_generation_mode: "template",
          };
        }

        const plan = planRetrieval(category, input.question, state);
        const { results, context } = await this.retrieveWithPlan(plan, topK);
        const tuning = this.engine.getTuning();

        const generated = await this.generateAnswer(input.question, category, context);
        this.sessions.recordTurn(state, input.question, category);

        return {
          answer:
            generated ??
            buildTemplatedAnswer(category, results, language, tuning.contextVisibilityThreshold),
          session_id: state.sessionId,
          category,
          related_topics: suggestTopics(results, { category, tuning }),
          context_used: context.length > 0,
          sources: results.map((item) => item.document.id),
          answer_generation_mode: generated === null ? "template" : this.aiClient.getAnswerMode(),
        };
      },
    );

    const latency = Date.now() - startedAt;
    this.sessions.recordResponseTime(latency);
    log.info(
      {
        sessionId: result.session_id,
        category: result.category,
        contextUsed: result.context_used,
        ms: latency,
      },
      "question answered",
    );
    return { ...result, latency_ms: latency };
  }

  async searchDocuments(input: SearchDocumentsInput): Promise<SearchDocumentsResult> {
    const results = await this.engine.retrieve({
      query: input.query,
      topK: input.topK ?? this.defaultTopK,
      categoryFilter: input.category ?? null,
    });
    return {
      query: input.query,
      index_type: this.engine.getStats().index_type,
      hits: results.map((item) => ({
        id: item.document.id,
        category: item.document.category,
        title: item.document.title,
        similarity: Number(item.similarity.toFixed(4)),
        score: Number(item.score.toFixed(4)),
        matched_terms: item.matchedTerms,
        snippet: truncateText(item.document.content, 200),
      })),
    };
  }

  async relatedTopics(query: string): Promise<string[]> {
    return this.engine.suggestRelatedTopics(query);
  }

  /** Classifies without recording a turn; a known session adds its context. */
  classify(query: string, sessionId?: string): ClassifyResult {
    const state = sessionId ? this.sessions.get(sessionId) : null;
    const category = classifyQuery(query, state ?? undefined, {
      now: this.clock(),
      tuning: this.conversationTuning,
    });
    return { query, category, used_session: state !== null };
  }

  /** Next questions for a session; an unknown or expired session gets the defaults. */
  followups(sessionId?: string, limit?: number): FollowupsResult {
    const state = sessionId ? this.sessions.get(sessionId) : null;
    return {
      session_id: sessionId ?? null,
      suggested_followups: suggestFollowups(state, { limit }),
      used_session: state !== null,
    };
  }

  async rebuildIndex(): Promise<RebuildIndexResult> {
    const corpus = await this.loadCorpus();
    const ok = await this.engine.loadDocuments(corpus.documents);
    if (ok) {
      this.corpusInfo = {
        source: corpus.source,
        path: corpus.path,
        loaded_at: new Date(this.clock()).toISOString(),
      };
    } else {
      log.error({ source: corpus.source, path: corpus.path }, "index rebuild rejected");
    }
    return { ok, source: corpus.source, path: corpus.path, stats: this.engine.getStats() };
  }

  getStatus(): ServiceStatus {
    return {
      engine: this.engine.getStats(),
      corpus: this.corpusInfo,
      sessions: this.sessions.getStats(),
      answer_mode: this.aiClient.getAnswerMode(),
    };
  }

  private async retrieveWithPlan(
    plan: RetrievalPlan,
    topK: number,
  ): Promise<{ results: RetrievalResult[]; context: string }> {
    const tuning = this.engine.getTuning();
    let results = await this.engine.retrieve({
      query: plan.query,
      topK,
      categoryFilter: plan.categoryFilter,
    });
    let context = buildContext(results, tuning);

    if (!context && plan.retryUnfiltered) {
      results = await this.engine.retrieve({ query: plan.query, topK, categoryFilter: null });
      context = buildContext(results, tuning);
    }
    return { results, context };
  }

  private async generateAnswer(
    question: string,
    category: string,
    context: string,
  ): Promise<string | null> {
    if (this.aiClient.getAnswerMode() === "template" || !context) {
      return null;
    }
    try {
      return await this.aiClient.generateAnswer({ question, context, category });
    } catch (error) {
      log.warn({ err: error, category }, "answer generation failed; using template");
      return null;
    }
  }
}

export function planRetrieval(
  category: string,
  question: string,
  state: ConversationState,
): RetrievalPlan {
  if (category.endsWith(FOLLOWUP_SUFFIX)) {
    const previous = state.questionsHistory[state.questionsHistory.length - 1];
    return {
      query: previous ? `${previous} ${question}` : question,
      categoryFilter: baseCategory(category),
      retryUnfiltered: true,
    };
  }
  if (category === RECRUITMENT || category === GENERAL) {
    return { query: question, categoryFilter: null, retryUnfiltered: false };
  }
  return { query: question, categoryFilter: category, retryUnfiltered: true };
}
