import { getLexicon } from "../config/lexicon.js";

const URL_REGEX = /https?:\/\/\S+/g;
const EMAIL_REGEX = /[\p{L}\p{N}._%+-]+@[\p{L}\p{N}.-]+\.[\p{L}]{2,}/gu;
const WHITESPACE_REGEX = /\s+/g;
const EDGE_PUNCTUATION_REGEX = /^[.\-]+|[.\-]+$/g;
const NUMERIC_REGEX = /^\d+(?:[.,]\d+)*$/;

export const DEFAULT_PUNCTUATION_WHITELIST = [".", "-", "+", "#"];

export interface NormalizeOptions {
  punctuationWhitelist?: string[];
  minTokenLength?: number;
  stopwords?: ReadonlySet<string>;
}

let defaultStopwords: ReadonlySet<string> | null = null;

export function getStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    defaultStopwords = new Set(getLexicon().stopwords);
  }
  return defaultStopwords;
}

export function normalizeText(text: string, options?: NormalizeOptions): string {
  if (!text) {
    return "";
  }

  const whitelist = options?.punctuationWhitelist ?? DEFAULT_PUNCTUATION_WHITELIST;
  const disallowed = new RegExp(
    `[^\\p{L}\\p{N}\\s${whitelist.map(escapeForCharClass).join("")}]`,
    "gu",
  );

  return text
    .toLowerCase()
    .replace(URL_REGEX, " ")
    .replace(EMAIL_REGEX, " ")
    .replace(disallowed, "")
    .replace(WHITESPACE_REGEX, " ")
    .trim();
}

export function splitWords(text: string, options?: NormalizeOptions): string[] {
  const normalized = normalizeText(text, options);
  if (!normalized) {
    return [];
  }

  return normalized
    .split(" ")
    .map((word) => word.replace(EDGE_PUNCTUATION_REGEX, ""))
    .filter((word) => word.length > 0);
}

/**
 * Words that carry meaning for retrieval: no stopwords, nothing shorter than
 * three characters, no bare numbers.
 */
export function tokenize(text: string, options?: NormalizeOptions): string[] {
  const minLength = options?.minTokenLength ?? 3;
  const stopwords = options?.stopwords ?? getStopwords();

  return splitWords(text, options).filter(
    (word) =>
      word.length >= minLength && !stopwords.has(word) && !NUMERIC_REGEX.test(word),
  );
}

export function uniqueTokens(tokens: string[]): string[] {
  return [...new Set(tokens)];
}

export function truncateText(text: string, maxChars: number, marker = "..."): string {
  const normalized = text.replace(WHITESPACE_REGEX, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars).trimEnd()}${marker}`;
}

export function toTitleCase(text: string): string {
  return text
    .split(" ")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function escapeForCharClass(char: string): string {
  return char.replace(/[\\\]^-]/g, "\\$&");
}
