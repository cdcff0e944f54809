import { z } from "zod";

export const portfolioDocumentSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  title: z.string(),
  content: z.string(),
  keywords: z.array(z.string()),
});

export const portfolioCorpusSchema = z
  .array(portfolioDocumentSchema)
  .superRefine((documents, ctx) => {
    const seen = new Set<string>();
    documents.forEach((document, index) => {
      if (seen.has(document.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate document id: ${document.id}`,
          path: [index, "id"],
        });
      }
      seen.add(document.id);
    });
  });

export type PortfolioDocument = Readonly<z.infer<typeof portfolioDocumentSchema>>;

export interface RetrievalResult {
  document: PortfolioDocument;
  /** raw score normalised into [0, 1] */
  similarity: number;
  score: number;
  matchedTerms: string[];
}

export type PersonalSubcategory =
  | "relationship"
  | "financial"
  | "contact"
  | "age"
  | "family"
  | "religion"
  | "health"
  | "appearance";

export const GIBBERISH = "gibberish";
export const RECRUITMENT = "recruitment";
export const UNCLEAR_QUESTION = "unclear_question";
export const GENERAL = "general";
export const FOLLOWUP_SUFFIX = "_followup";
export const PERSONAL_PREFIX = "personal_";

/**
 * One of the fixed labels above, `personal_<subcategory>`, a topic name from
 * the lexicon, or `<topic>_followup`.
 */
export type CategoryLabel = string;

export type ConversationTone = "neutral" | "curious" | "skeptical" | "casual";

export interface TopicTransition {
  from: string | null;
  to: string;
  timestamp: number;
}

export interface ConversationState {
  sessionId: string;
  createdAt: number;
  lastActivity: number;
  lastCategory?: string;
  mentionedItems: Set<string>;
  questionsHistory: string[];
  topicTransitions: TopicTransition[];
  conversationTone: ConversationTone;
  messageCount: number;
}

export type IndexType = "keyword-index" | "tf-idf-vector" | "external-embedding";

export interface EngineStats {
  document_count: number;
  vocabulary_size: number;
  index_type: IndexType;
}
