import { readFileSync } from "node:fs";
import { z } from "zod";
import { findDataFile } from "./dataFiles.js";

const keywordGroupSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const lexiconSchema = z.object({
  stopwords: z.array(z.string()),
  alwaysValidTerms: z.array(z.string()),
  topicCategories: z.array(keywordGroupSchema).min(1),
  personalCategories: z.array(keywordGroupSchema).min(1),
  relatedCategories: z.record(z.array(z.string())),
  topicPrefixes: z.array(z.string()),
  fallbackTopics: z.record(z.array(z.string())),
  followupQuestions: z
    .record(z.array(z.string().min(1)))
    .refine((lists) => "default" in lists, "followupQuestions needs a default list"),
  mentionedItemFollowup: z.string().includes("{item}"),
  entityTerms: z.array(z.string()),
});

export type KeywordGroup = z.infer<typeof keywordGroupSchema>;

export type Lexicon = z.infer<typeof lexiconSchema>;

let cached: Lexicon | null = null;

/**
 * Word lists shared by the normalizer, the classifier and the topic
 * suggester. Read once from `data/lexicon.json`.
 */
export function getLexicon(): Lexicon {
  if (!cached) {
    const filePath = findDataFile("lexicon.json");
    if (!filePath) {
      throw new Error("data/lexicon.json not found.");
    }
    cached = readLexicon(filePath);
  }
  return cached;
}

export function readLexicon(filePath: string): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const parsed = lexiconSchema.parse(raw);
  return {
    ...parsed,
    stopwords: parsed.stopwords.map((word) => word.toLowerCase()),
    alwaysValidTerms: parsed.alwaysValidTerms.map((word) => word.toLowerCase()),
    topicPrefixes: parsed.topicPrefixes.map((word) => word.toLowerCase()),
    entityTerms: parsed.entityTerms.map((word) => word.toLowerCase()),
  };
}
