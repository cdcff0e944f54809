import { describe, expect, it } from "vitest";
import { buildCorpusIndex, vocabularySize } from "../src/pipelines/indexing.js";
import { makeDocument, readPortfolioFixture } from "./helpers.js";

const PYTHON_DOC = makeDocument({
  id: "a",
  category: "keahlian",
  title: "Python Basics",
  content: "python scripts",
  keywords: ["python"],
});

const READING_DOC = makeDocument({
  id: "b",
  category: "hobi",
  title: "Reading",
  content: "novel reading",
  keywords: ["novel"],
});

describe("corpus indexing", () => {
  it("weights terms by tf, idf and keyword or title boost", () => {
    const index = buildCorpusIndex([PYTHON_DOC, READING_DOC]);

    // doc a tokens: python x3, basics, scripts; idf = 2 / 1 for every term
    expect(index.vectors[0].get("python")).toBeCloseTo(0.6 * 2 * 3, 10);
    expect(index.vectors[0].get("basics")).toBeCloseTo(0.2 * 2 * 2, 10);
    expect(index.vectors[0].get("scripts")).toBeCloseTo(0.2 * 2 * 1, 10);
    expect(index.vectors[1].get("reading")).toBeCloseTo(0.5 * 2 * 2, 10);
    expect(index.vectors[1].get("novel")).toBeCloseTo(0.5 * 2 * 3, 10);
    expect(index.vectorNorms[0]).toBeCloseTo(Math.sqrt(3.6 ** 2 + 0.8 ** 2 + 0.4 ** 2), 10);
  });

  it("records postings once per document", () => {
    const shared = makeDocument({ id: "c", content: "python python", keywords: [] });
    const index = buildCorpusIndex([PYTHON_DOC, READING_DOC, shared]);

    expect(index.invertedIndex.get("python")).toEqual([0, 2]);
    expect(index.docFrequency.get("python")).toBe(2);
    expect(index.invertedIndex.has("dan")).toBe(false);
  });

  it("reports vocabulary size", () => {
    expect(vocabularySize(buildCorpusIndex([PYTHON_DOC, READING_DOC]))).toBe(5);
    expect(vocabularySize(buildCorpusIndex([]))).toBe(0);
  });

  it("is deterministic for the same corpus", () => {
    const documents = readPortfolioFixture();
    const first = buildCorpusIndex(documents);
    const second = buildCorpusIndex(documents);

    expect([...first.invertedIndex.entries()]).toEqual([...second.invertedIndex.entries()]);
    expect(first.vectors.map((vector) => [...vector.entries()])).toEqual(
      second.vectors.map((vector) => [...vector.entries()]),
    );
  });
});
