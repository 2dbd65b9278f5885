/**
 * Heuristics that separate explanatory prose from formulas, drill questions
 * and page furniture in text extracted from textbook PDFs.
 */

import { MIN_CHUNK_CHARS } from "./constants";

const MATH_SYMBOL_TOKENS = [
  "\\frac",
  "\\sum",
  "\\int",
  "=",
  "<",
  ">",
  "×",
  "÷",
  "^",
  "_",
  "∫",
  "Σ",
  "π",
  "√",
  "∈",
  "∉",
  "∪",
  "∩",
  "⊂",
  "⊆",
  "∅",
  "≤",
  "≥",
  "≠",
  "∞",
];

const MATH_WORD_PATTERN = /\b(?:lim|exp)\b/;
const BASIC_PUNCTUATION = new Set(".,;:-()[]{}'\"/".split(""));
const SYMBOL_RATIO_THRESHOLD = 0.28;
const DIGIT_RATIO_THRESHOLD = 0.05;

const NUMBERED_ITEM_PATTERN = /^\d+[.)]/;
const EXERCISE_VERB_PATTERN = /\b(?:Find|Calculate|Determine|Show that|Prove)\b/;
const PAGE_FURNITURE_PATTERN = /^(?:(?:page\s*)?\d{1,4}|header|footer)$/i;

function hasMathToken(text: string): boolean {
  return MATH_SYMBOL_TOKENS.some((token) => text.includes(token)) || MATH_WORD_PATTERN.test(text);
}

export function isMathBlock(text: string): boolean {
  if (!text) {
    return false;
  }

  if (hasMathToken(text)) {
    return true;
  }

  const characters = Array.from(text);
  const total = Math.max(1, characters.length);
  let symbols = 0;
  let digits = 0;
  for (const ch of characters) {
    if (/\p{Nd}/u.test(ch)) {
      digits += 1;
    }
    if (!/[\p{L}\p{N}\s]/u.test(ch) && !BASIC_PUNCTUATION.has(ch)) {
      symbols += 1;
    }
  }

  if (symbols / total > SYMBOL_RATIO_THRESHOLD && digits / total > DIGIT_RATIO_THRESHOLD) {
    return true;
  }

  return NUMBERED_ITEM_PATTERN.test(text.trim());
}

/** NFC-normalised text with control characters and odd spacing removed. */
export function normalizeSurfaceText(input: string): string {
  return input
    .normalize("NFC")
    .replace(/\r\n?/g, "\n")
    .replace(/[^\P{C}\n\t]|[\u2028\u2029]/gu, "")
    .replace(/[^\S\n\t ]/g, " ")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Returns the cleaned chunk text, or an empty string when the chunk is an
 * exercise, a numbered item, page furniture, or too short to be useful.
 */
export function cleanChunkText(input: string): string {
  if (!input) {
    return "";
  }

  const cleaned = normalizeSurfaceText(input)
    .replace(/-{3,}/g, "")
    .replace(/\.{3,}/g, ".")
    .replace(/[ \t]{2,}/g, " ")
    .trim();

  if (EXERCISE_VERB_PATTERN.test(cleaned)) {
    return "";
  }
  if (/^\d+\./.test(cleaned) || PAGE_FURNITURE_PATTERN.test(cleaned)) {
    return "";
  }
  if (cleaned.length < MIN_CHUNK_CHARS) {
    return "";
  }

  return cleaned;
}
