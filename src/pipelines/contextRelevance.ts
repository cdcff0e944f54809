import { getLexicon } from "../config/lexicon.js";
import { DEFAULT_CONVERSATION_TUNING, type ConversationTuning } from "../config/tuning.js";
import { FOLLOWUP_SUFFIX, type ConversationState } from "../domain/types.js";

export function baseCategory(category: string): string {
  return category.endsWith(FOLLOWUP_SUFFIX)
    ? category.slice(0, -FOLLOWUP_SUFFIX.length)
    : category;
}

export function isRelatedCategory(lastCategory: string, category: string): boolean {
  const related = getLexicon().relatedCategories[lastCategory] ?? [];
  return related.includes(category);
}

/**
 * Whether the previous turn's topic should still shape this one. Context
 * decays once the session has hopped topics too often or gone quiet for
 * longer than the staleness window.
 */
export function isContextRelevant(
  state: ConversationState | undefined,
  category: string,
  now: number = Date.now(),
  tuning: ConversationTuning = DEFAULT_CONVERSATION_TUNING,
): boolean {
  if (!state?.lastCategory) {
    return false;
  }

  const transitions = state.topicTransitions;
  if (transitions.length === 0 || transitions.length > tuning.maxTopicTransitions) {
    return false;
  }

  const latest = transitions[transitions.length - 1];
  if (now - latest.timestamp > tuning.stalenessWindowMs) {
    return false;
  }

  const base = baseCategory(category);
  return base === state.lastCategory || isRelatedCategory(state.lastCategory, base);
}
