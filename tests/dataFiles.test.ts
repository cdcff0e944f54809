import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { dataFileCandidates, findDataFile } from "../src/config/dataFiles.js";
import { readLexicon } from "../src/config/lexicon.js";

describe("data file lookup", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "portfolio-data-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds the package data directory from compiled output", async () => {
    const compiledDir = path.join(tempDir, "pkg", "dist", "src", "config");
    await fs.mkdir(compiledDir, { recursive: true });
    await fs.mkdir(path.join(tempDir, "pkg", "data"));
    const lexiconPath = path.join(tempDir, "pkg", "data", "lexicon.json");
    await fs.copyFile(path.resolve("data/lexicon.json"), lexiconPath);
    const elsewhere = path.join(tempDir, "elsewhere");
    await fs.mkdir(elsewhere);

    const found = findDataFile("lexicon.json", compiledDir, elsewhere);

    expect(found).toBe(lexiconPath);
    expect(readLexicon(lexiconPath).topicCategories[0].name).toBe("keahlian");
  });

  it("prefers the working directory", async () => {
    const cwdData = path.join(tempDir, "data");
    await fs.mkdir(cwdData);
    await fs.writeFile(path.join(cwdData, "portfolio.json"), "[]", "utf-8");

    expect(findDataFile("portfolio.json", path.join(tempDir, "nested", "src"), tempDir)).toBe(
      path.join(cwdData, "portfolio.json"),
    );
  });

  it("walks every ancestor of the module directory", () => {
    const candidates = dataFileCandidates("x.json", path.join(tempDir, "a", "b"), tempDir);

    expect(candidates.slice(0, 3)).toEqual([
      path.join(tempDir, "data", "x.json"),
      path.join(tempDir, "a", "b", "data", "x.json"),
      path.join(tempDir, "a", "data", "x.json"),
    ]);
  });

  it("returns null when nothing exists", () => {
    expect(findDataFile("absent-file.json", path.join(tempDir, "a"), tempDir)).toBeNull();
  });
});
