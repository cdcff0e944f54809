import { describe, expect, it } from "vitest";
import type { ConversationState } from "../src/domain/types.js";
import { suggestFollowups } from "../src/pipelines/followupSuggester.js";

const DEFAULT_FOLLOWUPS = [
  "ceritakan lebih detail tentang pengalaman python kamu",
  "apa proyek paling challenging yang pernah kamu kerjakan?",
  "bagaimana cara kamu mengatasi technical challenges?",
];

describe("follow-up suggestions", () => {
  it("offers the default questions without a conversation", () => {
    expect(suggestFollowups(null)).toEqual(DEFAULT_FOLLOWUPS);
    expect(suggestFollowups(makeState({ questionsHistory: [] }))).toEqual(DEFAULT_FOLLOWUPS);
  });

  it("starts from the latest mentioned item and the last topic", () => {
    const state = makeState({ mentionedItems: new Set(["git", "python"]) });

    expect(suggestFollowups(state)).toEqual([
      "ceritakan lebih detail tentang python",
      "bagaimana kamu belajar python sampai bisa dipakai untuk analisis data?",
      "algoritma apa yang paling sering kamu pakai?",
    ]);
  });

  it("skips questions already asked and continues with related topics", () => {
    const state = makeState({
      questionsHistory: [
        "Algoritma apa yang paling sering kamu pakai",
        "bagaimana kamu belajar python sampai bisa dipakai untuk analisis data?",
      ],
    });

    expect(suggestFollowups(state)).toEqual([
      "teknologi apa yang ingin kamu pelajari selanjutnya?",
      "apa proyek paling challenging yang pernah kamu kerjakan?",
      "apa tantangan terbesar waktu membuat puzzle solver?",
    ]);
  });

  it("falls back to the defaults when no topic was discussed", () => {
    expect(suggestFollowups(makeState({ lastCategory: undefined }), { limit: 2 })).toEqual(
      DEFAULT_FOLLOWUPS.slice(0, 2),
    );
    expect(suggestFollowups(makeState(), { limit: 0 })).toEqual([]);
  });
});

function makeState(overrides: Partial<ConversationState> = {}): ConversationState {
  return {
    sessionId: "s",
    createdAt: 0,
    lastActivity: 0,
    lastCategory: "keahlian",
    mentionedItems: new Set<string>(),
    questionsHistory: ["ceritakan tentang keahlianmu"],
    topicTransitions: [],
    conversationTone: "neutral",
    messageCount: 1,
    ...overrides,
  };
}
