/**
 * Text Preprocessing Module for Comment Scoring
 *
 * This module handles:
 * - Tokenization: Breaking text into words/tokens
 * - Slang detection: Identifying and normalizing internet and stan-culture slang
 * - Sarcasm detection: Pattern and irony-marker based detection
 * - Sentence and clause splitting for entity-level attribution
 * - Question detection (interrogative vs rhetorical)
 */

import slang from "./data/slang.json";
import lexicon from "./data/lexicon.json";

const SLANG_DICTIONARY: Record<string, string> = slang;

const SARCASM_INDICATORS = [
  /\b(yeah right|sure thing|totally)\b/i,
  /\b(of course|obviously)\s+.*\s+(not|never)\b/i,
  /\b(right|sure)\s+\w+\s+\w+\s+(not|never)\b/i,
  /\b(oh great|fantastic|wonderful|brilliant)\s+.*\s+(fail|broke|wrong|bad)\b/i,
  /\b(thanks|thank you)\s+.*\s+(nothing|useless|broken)\b/i,
  /\b(just|exactly)\s+what\s+(I|we)\s+(need|want|love)\b.*\s+(not|never)\b/i,
  /"[^"]+"/,
  /\*[^*]+\*/,
  /\b([a-z]+[A-Z])+[a-z]*\b/,
  /\b(lol|lmao|rofl|haha)\s+.*\s+(terrible|awful|worst|bad|stupid)\b/i,
  /\b(wow|great|nice)\s+(job|move|one)\b.*(\.{3}|!{2,})/i,
];

// "can't", "won't" and friends open statements, not questions.
const INTERROGATIVE_OPENERS =
  /^(is|are|was|were|did|does|do|can|could|will|would|has|have|had|should|why|how|what|who|when|where|which)\b(?!['’])/i;

const EXCLAMATIVE_OPENERS = /^(what an?\b|how\s+[\p{L}]+\s*!)/iu;

const RHETORICAL_PATTERNS = [
  /\b(how could (anyone|you|she|he|they))\b/i,
  /\bwhy would anyone\b/i,
  /\b(isn't|isnt|wasn't|aren't) (it|this|she|he|that) (obvious|clear|disgusting|amazing|the best|the worst)\b/i,
  /\b(who|what) (even|tf|the hell)\b/i,
  /\bam i the only one\b/i,
  /\bhow (is|was) (she|he|this) (even )?(allowed|still)\b/i,
];

const CONTRASTIVE_SPLIT = /\s*(?:,\s*)?\b(?:but|however|although|though|whereas|while|yet)\b\s*/i;

export interface SarcasmReading {
  isSarcastic: boolean;
  confidence: number; // 0-100
  ironyMarker: boolean;
}

export function tokenize(text: string): string[] {
  const withoutUrls = text.replace(/https?:\/\/\S+/g, "");

  // Keep punctuation and capitalization for VADER sentiment analysis
  return withoutUrls
    .replace(/\s+/g, " ")
    .trim()
    .split(" ")
    .filter((token) => token.length > 0);
}

export function normalizeSlang(tokens: string[]): string[] {
  return tokens.map((token) => {
    const normalized = SLANG_DICTIONARY[token.toLowerCase()];
    return normalized ? normalized : token;
  });
}

export function hasIronyMarker(text: string): boolean {
  const lower = text.toLowerCase();
  return lexicon.ironyMarkers.some((marker) => lower.includes(marker));
}

export function detectSarcasm(text: string): SarcasmReading {
  let sarcasmScore = 0;
  const maxScore = SARCASM_INDICATORS.length;

  for (const pattern of SARCASM_INDICATORS) {
    if (pattern.test(text)) {
      sarcasmScore++;
    }
  }

  // Check for excessive punctuation patterns
  if (/(!{2,}|\?{2,})/.test(text)) {
    sarcasmScore += 0.5;
  }

  if (/\.{3,}/.test(text)) {
    sarcasmScore += 0.5;
  }

  // Check for repetitive affirmative words (often sarcastic)
  if (/\b(yeah|sure|right)[\s,]+(yeah|sure|right)\b/i.test(text)) {
    sarcasmScore += 1;
  }

  const ironyMarker = hasIronyMarker(text);
  if (ironyMarker) {
    sarcasmScore += 2;
  }

  const confidence = Math.min(100, (sarcasmScore / maxScore) * 100);

  return {
    isSarcastic: confidence > 30,
    confidence,
    ironyMarker,
  };
}

/** Split on sentence punctuation, keeping the terminator with its sentence. */
export function splitSentences(text: string): string[] {
  const matches = text.match(/[^.!?\n]+(?:[.!?]+|\n|$)/g) ?? [];
  return matches.map((sentence) => sentence.trim()).filter((s) => s.length > 0);
}

/**
 * Split a sentence at contrastive conjunctions so "I love Ryan but hate Blake"
 * scores each side on its own.
 */
export function splitClauses(sentence: string): string[] {
  return sentence
    .split(CONTRASTIVE_SPLIT)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

/**
 * A sentence is a question when it ends in "?", or when it opens with an
 * interrogative and carries no closing "." or "!" (unpunctuated replies).
 */
export function isQuestion(sentence: string): boolean {
  const trimmed = sentence.trim();
  if (trimmed.endsWith("?")) return true;
  if (/[.!]$/.test(trimmed)) return false;
  return INTERROGATIVE_OPENERS.test(trimmed) && !EXCLAMATIVE_OPENERS.test(trimmed);
}

export function isRhetorical(sentence: string): boolean {
  return RHETORICAL_PATTERNS.some((pattern) => pattern.test(sentence));
}

export interface PreprocessedText {
  original: string;
  processed: string;
  tokens: string[];
  normalizedTokens: string[];
  sentences: string[];
  sarcasm: SarcasmReading;
}

export function preprocessText(text: string): PreprocessedText {
  if (!text || text.trim() === "") {
    return {
      original: text || "",
      processed: "",
      tokens: [],
      normalizedTokens: [],
      sentences: [],
      sarcasm: { isSarcastic: false, confidence: 0, ironyMarker: false },
    };
  }

  const tokens = tokenize(text);
  const normalizedTokens = normalizeSlang(tokens);

  return {
    original: text,
    processed: normalizedTokens.join(" "),
    tokens,
    normalizedTokens,
    sentences: splitSentences(text),
    sarcasm: detectSarcasm(text),
  };
}
