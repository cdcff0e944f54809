import { randomUUID } from "node:crypto";
import { getLexicon } from "../config/lexicon.js";
import { DEFAULT_CONVERSATION_TUNING, type ConversationTuning } from "../config/tuning.js";
import type { ConversationState, ConversationTone } from "../domain/types.js";
import { containsKeyword, isTopicCategory } from "../pipelines/classification.js";
import { baseCategory } from "../pipelines/contextRelevance.js";
import { createLogger } from "../infra/logging/logger.js";
import { bypassesRetrieval } from "../pipelines/answering.js";
import { splitWords } from "../utils/text.js";

export interface SessionStoreOptions {
  timeoutMs?: number;
  tuning?: ConversationTuning;
  clock?: () => number;
  createId?: () => string;
}

export interface SessionStats {
  total_sessions: number;
  active_sessions: number;
  total_messages: number;
  average_response_time_ms: number | null;
}

const SKEPTICAL_MARKERS = ["yakin", "serius", "masa", "beneran", "really", "sure", "seriously", "bukti", "prove"];
const CASUAL_MARKERS = ["wkwk", "wkwkwk", "haha", "hehe", "dong", "sih", "bro", "gan", "lol", "btw"];
const CURIOUS_MARKERS = ["kenapa", "mengapa", "bagaimana", "gimana", "why", "how", "penasaran"];

const RESPONSE_TIME_WINDOW = 100;

const log = createLogger("sessions");

export function detectTone(question: string): ConversationTone {
  const words = splitWords(question);
  if (SKEPTICAL_MARKERS.some((marker) => words.includes(marker))) {
    return "skeptical";
  }
  if (CASUAL_MARKERS.some((marker) => words.includes(marker))) {
    return "casual";
  }
  if (question.includes("?") || CURIOUS_MARKERS.some((marker) => words.includes(marker))) {
    return "curious";
  }
  return "neutral";
}

/**
 * Conversation state per session id. Expired sessions are dropped when
 * touched, listed, or when a new session is opened.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationState>();

  private readonly chains = new Map<string, Promise<unknown>>();

  private readonly responseTimes: number[] = [];

  private readonly timeoutMs: number;

  private readonly tuning: ConversationTuning;

  private readonly clock: () => number;

  private readonly createId: () => string;

  private totalSessions = 0;

  private totalMessages = 0;

  constructor(options: SessionStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60 * 60_000;
    this.tuning = options.tuning ?? DEFAULT_CONVERSATION_TUNING;
    this.clock = options.clock ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  get(sessionId: string): ConversationState | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }
    if (this.isExpired(state)) {
      this.sessions.delete(sessionId);
      log.debug({ sessionId }, "session expired");
      return null;
    }
    return state;
  }

  getOrCreate(sessionId?: string): ConversationState {
    const existing = sessionId ? this.get(sessionId) : null;
    if (existing) {
      return existing;
    }

    this.pruneExpired();
    const now = this.clock();
    const state: ConversationState = {
      sessionId: sessionId ?? this.createId(),
      createdAt: now,
      lastActivity: now,
      mentionedItems: new Set<string>(),
      questionsHistory: [],
      topicTransitions: [],
      conversationTone: "neutral",
      messageCount: 0,
    };
    this.sessions.set(state.sessionId, state);
    this.totalSessions += 1;
    return state;
  }

  /**
   * Runs `task` after every earlier task of the same session has settled,
   * so two turns never interleave their reads and writes of one state.
   */
  withSession<T>(
    sessionId: string | undefined,
    task: (state: ConversationState) => Promise<T>,
  ): Promise<T> {
    const id = sessionId ?? this.createId();
    const previous = this.chains.get(id) ?? Promise.resolve();
    const run = previous.then(() => task(this.getOrCreate(id)));
    const settled = run.catch(() => undefined);
    this.chains.set(id, settled);
    void settled.then(() => {
      if (this.chains.get(id) === settled) {
        this.chains.delete(id);
      }
    });
    return run;
  }

  recordTurn(state: ConversationState, question: string, category: string): void {
    const now = this.clock();
    state.lastActivity = now;
    state.messageCount += 1;
    this.totalMessages += 1;

    state.questionsHistory.push(question);
    trimFront(state.questionsHistory, this.tuning.historyWindow);

    const topic = baseCategory(category);
    if (isTopicCategory(topic) && !bypassesRetrieval(topic) && topic !== state.lastCategory) {
      state.topicTransitions.push({ from: state.lastCategory ?? null, to: topic, timestamp: now });
      trimFront(state.topicTransitions, this.tuning.historyWindow);
      state.lastCategory = topic;
    }

    const words = splitWords(question);
    for (const term of getLexicon().entityTerms) {
      if (containsKeyword(words, term)) {
        state.mentionedItems.delete(term);
        state.mentionedItems.add(term);
      }
    }
    while (state.mentionedItems.size > this.tuning.maxMentionedItems) {
      const oldest = state.mentionedItems.values().next();
      if (oldest.done) {
        break;
      }
      state.mentionedItems.delete(oldest.value);
    }

    state.conversationTone = detectTone(question);
  }

  recordResponseTime(ms: number): void {
    this.responseTimes.push(ms);
    trimFront(this.responseTimes, RESPONSE_TIME_WINDOW);
  }

  pruneExpired(): number {
    let removed = 0;
    for (const [sessionId, state] of this.sessions) {
      if (this.isExpired(state)) {
        this.sessions.delete(sessionId);
        removed += 1;
      }
    }
    if (removed > 0) {
      log.info({ removed }, "pruned expired sessions");
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  getStats(): SessionStats {
    this.pruneExpired();
    const average =
      this.responseTimes.length > 0
        ? this.responseTimes.reduce((sum, ms) => sum + ms, 0) / this.responseTimes.length
        : null;
    return {
      total_sessions: this.totalSessions,
      active_sessions: this.sessions.size,
      total_messages: this.totalMessages,
      average_response_time_ms: average === null ? null : Math.round(average),
    };
  }

  private isExpired(state: ConversationState): boolean {
    return this.clock() - state.lastActivity > this.timeoutMs;
  }
}

function trimFront<T>(items: T[], max: number): void {
  if (items.length > max) {
    items.splice(0, items.length - max);
  }
}
