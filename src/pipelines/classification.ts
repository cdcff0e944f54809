import { getLexicon, type KeywordGroup, type Lexicon } from "../config/lexicon.js";
import { DEFAULT_CONVERSATION_TUNING, type ConversationTuning } from "../config/tuning.js";
import {
  FOLLOWUP_SUFFIX,
  GENERAL,
  GIBBERISH,
  PERSONAL_PREFIX,
  RECRUITMENT,
  UNCLEAR_QUESTION,
  type CategoryLabel,
  type ConversationState,
} from "../domain/types.js";
import { normalizeText, splitWords } from "../utils/text.js";
import { isContextRelevant } from "./contextRelevance.js";

/** Indonesian possessive and particle suffixes accepted on single-word keywords. */
const ENCLITICS = ["mu", "ku", "nya", "kah", "lah"];

const VOWELS = new Set(["a", "e", "i", "o", "u", "y"]);
const CONSONANT_RUN_REGEX = /[bcdfghjklmnpqrstvwxz]{4,}/;
/** Long consonant runs of ordinary English words ("strengths", "instruct", "prompts"). */
const COMMON_CONSONANT_CLUSTERS = ["ngths", "ngth", "nstr", "ghts", "mpts", "ncts", "rsts", "rths", "tchw"];
const LETTER_REGEX = /\p{L}/gu;

export const RECRUITMENT_PATTERNS: readonly RegExp[] = [
  /\bwhy should (?:i|we) (?:hire|recruit|choose|pick) you\b/,
  /\bwhy (?:would|should) (?:i|we|anyone) (?:want to )?(?:hire|recruit) you\b/,
  /\bwhat makes you (?:a )?(?:good|great|right|best|the right|the best) (?:fit|candidate|hire)\b/,
  /\b(?:kenapa|mengapa) (?:saya |aku |kami |kita )?(?:harus|perlu|mesti) (?:merekrut|rekrut|hire|memilih|pilih|menerima) (?:kamu|anda|dirimu)\b/,
  /\b(?:kenapa|mengapa) (?:kamu|anda) (?:layak|pantas|cocok) (?:direkrut|dipilih|diterima|dihire)\b/,
  /\b(?:nilai lebih|nilai jual|kelebihan) (?:kamu|anda) (?:sebagai|untuk) (?:kandidat|karyawan|developer)\b/,
];

export const FOLLOW_UP_PATTERNS: readonly RegExp[] = [
  /^(?:terus|lalu|trus|kemudian|then)\b/,
  /\b(?:selain itu|selain ini|selainnya|besides that|other than that|what else|anything else)\b/,
  /\b(?:then what|and then|terus apa|lalu apa|terus gimana|lalu bagaimana)\b/,
  /\b(?:cuma|hanya|only) (?:itu|dengan|with|that)\b/,
  /\b(?:yakin|serius|masa sih|beneran|are you sure|really|seriously)\b/,
  /\b(?:lebih lanjut|lebih detail|tell me more|more about that|contohnya|misalnya|for example)\b/,
  /\b(?:bagaimana|gimana|how) (?:dengan|about) (?:itu|yang tadi|that)\b/,
];

export interface ClassifyOptions {
  now?: number;
  tuning?: ConversationTuning;
  lexicon?: Lexicon;
}

export interface ClassifierInput {
  normalized: string;
  words: string[];
  state?: ConversationState;
  now: number;
  tuning: ConversationTuning;
  lexicon: Lexicon;
}

export interface ClassifierStage {
  name: string;
  classify(input: ClassifierInput): CategoryLabel | null;
}

/** Evaluated in order; the first stage returning a label wins. */
export const CLASSIFIER_STAGES: readonly ClassifierStage[] = [
  {
    name: "gibberish",
    classify: (input) => (isGibberish(input) ? GIBBERISH : null),
  },
  {
    name: "recruitment",
    classify: ({ normalized }) =>
      RECRUITMENT_PATTERNS.some((pattern) => pattern.test(normalized)) ? RECRUITMENT : null,
  },
  {
    name: "follow-up",
    classify: classifyFollowUp,
  },
  {
    name: "personal-sensitive",
    classify: ({ words, lexicon }) => {
      const group = firstMatchingGroup(words, lexicon.personalCategories);
      return group ? `${PERSONAL_PREFIX}${group.name}` : null;
    },
  },
  {
    name: "topic",
    classify: ({ words, state, lexicon }) => bestTopicCategory(words, lexicon, state),
  },
  {
    name: "fallback",
    classify: ({ words }) => (words.length < 3 ? UNCLEAR_QUESTION : GENERAL),
  },
];

export function classifyQuery(
  query: string,
  state?: ConversationState,
  options: ClassifyOptions = {},
): CategoryLabel {
  const input: ClassifierInput = {
    normalized: normalizeText(query),
    words: splitWords(query),
    state,
    now: options.now ?? Date.now(),
    tuning: options.tuning ?? DEFAULT_CONVERSATION_TUNING,
    lexicon: options.lexicon ?? getLexicon(),
  };

  for (const stage of CLASSIFIER_STAGES) {
    const label = stage.classify(input);
    if (label !== null) {
      return label;
    }
  }
  return GENERAL;
}

/**
 * Keywords with a space match as whole-word phrases; single words also
 * match with an enclitic attached ("pacarmu", "hobinya").
 */
export function containsKeyword(words: readonly string[], keyword: string): boolean {
  if (keyword.includes(" ")) {
    return ` ${words.join(" ")} `.includes(` ${keyword} `);
  }
  return words.some(
    (word) =>
      word === keyword ||
      (word.startsWith(keyword) && ENCLITICS.includes(word.slice(keyword.length))),
  );
}

export function topicScores(
  words: readonly string[],
  lexicon: Lexicon = getLexicon(),
  state?: ConversationState,
): Map<string, number> {
  const scores = new Map<string, number>();
  for (const group of lexicon.topicCategories) {
    let score = 0;
    for (const keyword of group.keywords) {
      if (containsKeyword(words, keyword)) {
        score += keyword.includes(" ") ? 2 : 1;
      }
    }

    if (score > 0 && state) {
      if (state.lastCategory === group.name) {
        score += 1;
      }
      for (const item of state.mentionedItems) {
        if (group.keywords.includes(item)) {
          score += 0.5;
        }
      }
    }
    scores.set(group.name, score);
  }
  return scores;
}

export function bestTopicCategory(
  words: readonly string[],
  lexicon: Lexicon = getLexicon(),
  state?: ConversationState,
): string | null {
  let best: string | null = null;
  let bestScore = 0;
  // Map iteration follows declaration order, so strict > keeps the first on ties
  for (const [name, score] of topicScores(words, lexicon, state)) {
    if (score > bestScore) {
      best = name;
      bestScore = score;
    }
  }
  return best;
}

export function isTopicCategory(category: string, lexicon: Lexicon = getLexicon()): boolean {
  return lexicon.topicCategories.some((group) => group.name === category);
}

function classifyFollowUp(input: ClassifierInput): CategoryLabel | null {
  const { state, words, normalized, lexicon } = input;
  if (!state || state.questionsHistory.length === 0 || !state.lastCategory) {
    return null;
  }
  if (!isTopicCategory(state.lastCategory, lexicon)) {
    return null;
  }
  if (!FOLLOW_UP_PATTERNS.some((pattern) => pattern.test(normalized))) {
    return null;
  }
  // a sensitive keyword must reach the privacy redirect even mid-conversation
  if (firstMatchingGroup(words, lexicon.personalCategories)) {
    return null;
  }

  const candidate = bestTopicCategory(words, lexicon) ?? state.lastCategory;
  if (!isContextRelevant(state, candidate, input.now, input.tuning)) {
    return null;
  }
  return `${state.lastCategory}${FOLLOWUP_SUFFIX}`;
}

function isGibberish({ normalized, words, lexicon }: ClassifierInput): boolean {
  if (words.length === 0) {
    return true;
  }
  if (lexicon.alwaysValidTerms.some((term) => containsKeyword(words, term))) {
    return false;
  }

  if (words.length < 2 && !hasDomainTerm(words, lexicon)) {
    return true;
  }

  if (words.some(hasUnusualConsonantRun)) {
    return true;
  }

  const letters = normalized.match(LETTER_REGEX) ?? [];
  if (letters.length === 0) {
    return true;
  }
  const vowels = letters.filter((letter) => VOWELS.has(letter)).length;
  return vowels / letters.length < 0.1;
}

function hasUnusualConsonantRun(word: string): boolean {
  let rest = word;
  for (const cluster of COMMON_CONSONANT_CLUSTERS) {
    rest = rest.replaceAll(cluster, "-");
  }
  return CONSONANT_RUN_REGEX.test(rest);
}

function hasDomainTerm(words: readonly string[], lexicon: Lexicon): boolean {
  return (
    firstMatchingGroup(words, lexicon.topicCategories) !== null ||
    firstMatchingGroup(words, lexicon.personalCategories) !== null
  );
}

function firstMatchingGroup(
  words: readonly string[],
  groups: readonly KeywordGroup[],
): KeywordGroup | null {
  return (
    groups.find((group) => group.keywords.some((keyword) => containsKeyword(words, keyword))) ??
    null
  );
}
