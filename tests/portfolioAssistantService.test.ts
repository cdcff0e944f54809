import { describe, expect, it, vi } from "vitest";
import type { ConversationState, PortfolioDocument } from "../src/domain/types.js";
import { InMemoryRetrievalEngine } from "../src/infra/store/inMemoryRetrievalEngine.js";
import {
  PortfolioAssistantService,
  planRetrieval,
} from "../src/services/portfolioAssistantService.js";
import { SessionStore } from "../src/services/sessionStore.js";
import { FakeAiClient, makeDocument, readPortfolioFixture } from "./helpers.js";

describe("PortfolioAssistantService", () => {
  it("answers a topical question from retrieved documents", async () => {
    const { service } = await createService();
    const result = await service.ask({ question: "ceritakan tentang python" });

    expect(result.session_id).toBe("session-1");
    expect(result.category).toBe("keahlian");
    expect(result.context_used).toBe(true);
    expect(result.sources).toEqual(["keahlian_python", "keahlian_algoritma"]);
    expect(result.answer_generation_mode).toBe("template");
    expect(
      result.answer.startsWith(
        "Berikut yang bisa saya ceritakan:\n- Python & Data Science: Python dipakai untuk analisis data",
      ),
    ).toBe(true);
    expect(result.related_topics).toEqual([
      "Python & Data Science",
      "Algoritma",
      "Web Development",
    ]);
    expect(result.latency_ms).toBeGreaterThanOrEqual(0);
  });

  it("redirects sensitive questions without touching the index", async () => {
    const { service, engine } = await createService();
    const retrieve = vi.spyOn(engine, "retrieve");

    const result = await service.ask({ question: "siapa nama pacarmu" });

    expect(retrieve).not.toHaveBeenCalled();
    expect(result.category).toBe("personal_relationship");
    expect(result.answer).toBe(
      "Soal hubungan pribadi saya simpan sendiri ya. Kalau mau, tanya saja tentang proyek atau keahlian saya.",
    );
    expect(result.context_used).toBe(false);
    expect(result.sources).toEqual([]);
    expect(result.related_topics).toEqual(["Keahlian Utama", "Proyek Unggulan", "Hobi"]);
  });

  it("answers gibberish in the detected language", async () => {
    const { service } = await createService();
    const result = await service.ask({ question: "xkcdqwrtzp" });

    expect(result.category).toBe("gibberish");
    expect(result.answer).toBe(
      "Sorry, I couldn't make sense of that. Try asking about my skills, projects or hobbies.",
    );
  });

  it("carries the previous topic into a follow-up", async () => {
    const { service } = await createService();
    const first = await service.ask({ question: "ceritakan tentang python" });
    const followUp = await service.ask({
      question: "terus selain itu apa lagi?",
      sessionId: first.session_id,
    });

    expect(followUp.session_id).toBe(first.session_id);
    expect(followUp.category).toBe("keahlian_followup");
    expect(followUp.context_used).toBe(true);
    expect(followUp.sources[0]).toBe("keahlian_python");
  });

  it("retries without the category filter when it finds nothing", async () => {
    const { service } = await createService();
    const result = await service.ask({ question: "kuliah informatika di kampus mana" });

    expect(result.category).toBe("pendidikan");
    expect(result.context_used).toBe(true);
    expect(result.sources[0]).toBe("profil_raka");
  });

  it("uses the model answer when one is configured", async () => {
    const aiClient = new FakeAiClient({ answerMode: "openai", answer: "jawaban dari model" });
    const { service } = await createService({ aiClient });

    const result = await service.ask({ question: "ceritakan tentang python" });

    expect(result.answer).toBe("jawaban dari model");
    expect(result.answer_generation_mode).toBe("openai");
    expect(aiClient.prompts).toHaveLength(1);
    expect(aiClient.prompts[0].category).toBe("keahlian");
    expect(aiClient.prompts[0].context.startsWith("[keahlian] Python dipakai")).toBe(true);
  });

  it("falls back to the template when the model fails", async () => {
    const aiClient = new FakeAiClient({ answerMode: "ollama", failAnswer: true });
    const { service } = await createService({ aiClient });

    const result = await service.ask({ question: "ceritakan tentang python" });

    expect(result.answer_generation_mode).toBe("template");
    expect(result.answer.startsWith("Berikut yang bisa saya ceritakan:")).toBe(true);
  });

  it("classifies without recording a turn", async () => {
    const { service } = await createService();
    const first = await service.ask({ question: "ceritakan tentang python" });

    expect(service.classify("terus selain itu?", "unknown")).toEqual({
      query: "terus selain itu?",
      category: "general",
      used_session: false,
    });
    expect(service.classify("terus selain itu?", first.session_id)).toEqual({
      query: "terus selain itu?",
      category: "keahlian_followup",
      used_session: true,
    });
    expect(service.getStatus().sessions.total_messages).toBe(1);
  });

  it("suggests follow-up questions from the session", async () => {
    const { service } = await createService();
    const first = await service.ask({ question: "ceritakan tentang python" });

    expect(service.followups(first.session_id)).toEqual({
      session_id: first.session_id,
      suggested_followups: [
        "ceritakan lebih detail tentang python",
        "bagaimana kamu belajar python sampai bisa dipakai untuk analisis data?",
        "algoritma apa yang paling sering kamu pakai?",
      ],
      used_session: true,
    });
    expect(service.followups("unknown", 1)).toEqual({
      session_id: "unknown",
      suggested_followups: ["ceritakan lebih detail tentang pengalaman python kamu"],
      used_session: false,
    });
  });

  it("searches documents with snippets and rounded scores", async () => {
    const { service } = await createService();
    const result = await service.searchDocuments({ query: "python", topK: 2 });

    expect(result.index_type).toBe("tf-idf-vector");
    expect(result.hits.map((hit) => hit.id)).toEqual(["keahlian_python", "keahlian_algoritma"]);
    expect(result.hits[0].snippet.length).toBeLessThanOrEqual(203);
    expect(result.hits[0].matched_terms).toEqual(["python"]);
  });

  it("suggests related topics", async () => {
    const { service } = await createService();
    const topics = await service.relatedTopics("ceritakan tentang python");
    expect(topics[0]).toBe("Python & Data Science");
  });

  it("keeps the current index when a rebuild is rejected", async () => {
    const corpus: { documents: PortfolioDocument[] } = { documents: readPortfolioFixture() };
    const { service } = await createService({ corpus });

    corpus.documents = [makeDocument({ id: "dup" }), makeDocument({ id: "dup" })];
    const rebuilt = await service.rebuildIndex();

    expect(rebuilt.ok).toBe(false);
    expect(rebuilt.stats.document_count).toBe(10);
    expect(service.getStatus().corpus.path).toBe("data/portfolio.json");
  });

  it("reports engine, corpus and session status", async () => {
    const { service } = await createService();
    await service.ask({ question: "ceritakan tentang python" });

    const status = service.getStatus();
    expect(status.engine.document_count).toBe(10);
    expect(status.corpus.source).toBe("file");
    expect(status.corpus.loaded_at).not.toBeNull();
    expect(status.sessions.total_sessions).toBe(1);
    expect(status.answer_mode).toBe("template");
  });
});

describe("retrieval planning", () => {
  const state: ConversationState = {
    sessionId: "s",
    createdAt: 0,
    lastActivity: 0,
    lastCategory: "keahlian",
    mentionedItems: new Set<string>(),
    questionsHistory: ["ceritakan tentang python"],
    topicTransitions: [],
    conversationTone: "neutral",
    messageCount: 1,
  };

  it("prepends the previous question for follow-ups", () => {
    expect(planRetrieval("keahlian_followup", "terus apa lagi", state)).toEqual({
      query: "ceritakan tentang python terus apa lagi",
      categoryFilter: "keahlian",
      retryUnfiltered: true,
    });
  });

  it("searches the whole corpus for recruitment and general questions", () => {
    expect(planRetrieval("recruitment", "why should I hire you", state)).toEqual({
      query: "why should I hire you",
      categoryFilter: null,
      retryUnfiltered: false,
    });
    expect(planRetrieval("general", "gimana ya", state).categoryFilter).toBeNull();
  });

  it("filters topical questions by their category", () => {
    expect(planRetrieval("proyek", "proyek puzzle", state)).toEqual({
      query: "proyek puzzle",
      categoryFilter: "proyek",
      retryUnfiltered: true,
    });
  });
});

async function createService(
  options: { aiClient?: FakeAiClient; corpus?: { documents: PortfolioDocument[] } } = {},
) {
  const engine = new InMemoryRetrievalEngine();
  const corpus = options.corpus ?? { documents: readPortfolioFixture() };
  let counter = 0;
  const service = new PortfolioAssistantService({
    engine,
    sessions: new SessionStore({
      createId: () => {
        counter += 1;
        return `session-${counter}`;
      },
    }),
    aiClient: options.aiClient ?? new FakeAiClient(),
    loadCorpus: async () => ({
      documents: corpus.documents,
      source: "file",
      path: "data/portfolio.json",
    }),
  });
  await service.rebuildIndex();
  return { service, engine };
}
