import { promises as fs } from "node:fs";
import path from "node:path";
import { dataFileCandidates } from "../../config/dataFiles.js";
import { portfolioCorpusSchema, type PortfolioDocument } from "../../domain/types.js";
import { createLogger } from "../logging/logger.js";
import { FALLBACK_CORPUS } from "../store/fallbackCorpus.js";

export interface LoadedCorpus {
  documents: readonly PortfolioDocument[];
  source: "file" | "fallback";
  /** file the documents came from; null for the fallback corpus */
  path: string | null;
}

const log = createLogger("corpus");

export interface LoadCorpusOptions {
  /** also look in the usual locations after the configured path; default true */
  searchDefaultPaths?: boolean;
}

export function candidateCorpusPaths(
  configuredPath: string | null,
  options: LoadCorpusOptions = {},
): string[] {
  const defaults =
    options.searchDefaultPaths === false
      ? []
      : [
          path.resolve("data/portfolio.json"),
          path.resolve("portfolio.json"),
          ...dataFileCandidates("portfolio.json"),
        ];
  const candidates = configuredPath ? [path.resolve(configuredPath), ...defaults] : defaults;
  return [...new Set(candidates)];
}

/**
 * First readable, valid, non-empty corpus among the candidate paths; the
 * built-in fallback otherwise. Never throws.
 */
export async function loadPortfolioDocuments(
  configuredPath: string | null,
  options: LoadCorpusOptions = {},
): Promise<LoadedCorpus> {
  for (const candidate of candidateCorpusPaths(configuredPath, options)) {
    const documents = await readCorpusFile(candidate);
    if (documents) {
      log.info({ path: candidate, documents: documents.length }, "corpus loaded");
      return { documents, source: "file", path: candidate };
    }
  }

  log.warn({ documents: FALLBACK_CORPUS.length }, "no usable corpus file; serving fallback corpus");
  return { documents: FALLBACK_CORPUS, source: "fallback", path: null };
}

export function parseCorpus(raw: unknown): PortfolioDocument[] | null {
  const parsed = portfolioCorpusSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return parsed.data;
}

async function readCorpusFile(filePath: string): Promise<PortfolioDocument[] | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (!isFileMissing(error)) {
      log.warn({ path: filePath, err: error }, "corpus file unreadable");
    }
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.warn({ path: filePath, err: error }, "corpus file is not valid JSON");
    return null;
  }

  const documents = parseCorpus(json);
  if (!documents) {
    log.warn({ path: filePath }, "corpus file failed validation");
    return null;
  }
  if (documents.length === 0) {
    log.warn({ path: filePath }, "corpus file is empty");
    return null;
  }
  return documents;
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
