import { getLexicon, type Lexicon } from "../config/lexicon.js";
import type { ConversationState } from "../domain/types.js";
import { normalizeText } from "../utils/text.js";

export interface SuggestFollowupsOptions {
  limit?: number;
  lexicon?: Lexicon;
}

const DEFAULT_FOLLOWUP_LIMIT = 3;

/**
 * Questions a visitor could ask next. With a conversation: the most recent
 * mentioned item first, then the last topic's questions, then its related
 * topics', skipping anything already asked. Without one: the default list.
 */
export function suggestFollowups(
  state: ConversationState | null,
  options: SuggestFollowupsOptions = {},
): string[] {
  const lexicon = options.lexicon ?? getLexicon();
  const limit = options.limit ?? DEFAULT_FOLLOWUP_LIMIT;
  if (limit <= 0) {
    return [];
  }

  const defaults = lexicon.followupQuestions.default ?? [];
  if (!state || state.questionsHistory.length === 0) {
    return defaults.slice(0, limit);
  }

  const candidates: string[] = [];
  const latestItem = [...state.mentionedItems].pop();
  if (latestItem) {
    candidates.push(lexicon.mentionedItemFollowup.replace("{item}", latestItem));
  }
  if (state.lastCategory) {
    candidates.push(...(lexicon.followupQuestions[state.lastCategory] ?? []));
    for (const related of lexicon.relatedCategories[state.lastCategory] ?? []) {
      candidates.push(...(lexicon.followupQuestions[related] ?? []));
    }
  }
  candidates.push(...defaults);

  const seen = new Set(state.questionsHistory.map((question) => normalizeText(question)));
  const suggestions: string[] = [];
  for (const candidate of candidates) {
    const key = normalizeText(candidate);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    suggestions.push(candidate);
    if (suggestions.length >= limit) {
      break;
    }
  }
  return suggestions;
}
