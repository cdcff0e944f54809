import { describe, expect, it } from "vitest";
import {
  buildFixedAnswer,
  buildTemplatedAnswer,
  bypassesRetrieval,
  detectLanguage,
} from "../src/pipelines/answering.js";
import { makeDocument, makeResult } from "./helpers.js";

describe("answer templates", () => {
  it("detects Indonesian questions", () => {
    expect(detectLanguage("apa hobi kamu?")).toBe("id");
    expect(detectLanguage("What are your hobbies?")).toBe("en");
  });

  it("bypasses retrieval for privacy, gibberish, unclear and greetings", () => {
    expect(bypassesRetrieval("personal_age")).toBe(true);
    expect(bypassesRetrieval("gibberish")).toBe(true);
    expect(bypassesRetrieval("unclear_question")).toBe(true);
    expect(bypassesRetrieval("sapaan")).toBe(true);
    expect(bypassesRetrieval("keahlian")).toBe(false);
    expect(bypassesRetrieval("recruitment")).toBe(false);
  });

  it("returns a privacy redirect per sub-category", () => {
    expect(buildFixedAnswer("personal_age", "en")).toBe(
      "I'd rather not share my age, but I can tell you about my learning journey.",
    );
    expect(buildFixedAnswer("personal_unknown", "en")).toBeNull();
    expect(buildFixedAnswer("keahlian", "id")).toBeNull();
  });

  it("lists the two best visible documents", () => {
    const results = [
      makeResult(makeDocument({ id: "a", title: "Python", content: "Analisis data." }), 0.6),
      makeResult(makeDocument({ id: "b", title: "Java", content: "Competitive programming." }), 0.4),
      makeResult(makeDocument({ id: "c", title: "SQL", content: "Skema relasional." }), 0.3),
    ];

    expect(buildTemplatedAnswer("keahlian", results, "id", 0.2)).toBe(
      "Berikut yang bisa saya ceritakan:\n- Python: Analisis data.\n- Java: Competitive programming.",
    );
    expect(buildTemplatedAnswer("recruitment", results.slice(0, 1), "en", 0.2)).toBe(
      "In short, this is what I would bring to the team:\n- Python: Analisis data.",
    );
  });

  it("admits when nothing relevant was found", () => {
    const weak = [makeResult(makeDocument({ id: "a", content: "x" }), 0.1)];
    expect(buildTemplatedAnswer("keahlian", weak, "en", 0.2)).toBe(
      "I don't have information about that in this portfolio yet. Try one of the related topics.",
    );
  });
});
