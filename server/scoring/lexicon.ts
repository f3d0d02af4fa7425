import vader from "vader-sentiment";
import lexicon from "../data/lexicon.json";
import { NERService } from "../ner";
import {
  isQuestion,
  isRhetorical,
  normalizeSlang,
  preprocessText,
  splitClauses,
  tokenize,
} from "../preprocessing";
import { clampScore, stanceFor } from "../sentiment";
import type { CandidateMatch } from "../types/entities";
import type {
  DiscoveredMention,
  EntityScore,
  ScoreRequest,
  ScoreResult,
} from "../types/signals";
import type { SignalScorer } from "./port";

const LEXICON_WEIGHT = 0.3;
const EMPATHY_SCORE = 0.5;
const SARCASM_THRESHOLD = 30;
const HIGH_ENGAGEMENT_SARCASM_THRESHOLD = 15;
const HIGH_ENGAGEMENT_LIKES = 100;
const TOXIC_TERM_WEIGHT = 0.35;
const QUESTION_CONFIDENCE = 0.8;

const EMOTIONS: Record<string, string[]> = lexicon.emotions;
const TOPICS: Record<string, string[]> = lexicon.topics;

interface Clause {
  text: string;
  question: boolean;
  polarity: number;
}

function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}

/** Count lexicon terms in a text: single words by token, phrases and emoji by substring. */
function countTerms(text: string, terms: readonly string[]): number {
  const lower = text.toLowerCase();
  const tokens = new Set(words(text));
  return terms.filter((term) =>
    /^[\p{L}']+$/u.test(term) ? tokens.has(term) : lower.includes(term)
  ).length;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function containsName(text: string, name: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegex(name)}(?![\\p{L}\\p{N}])`, "iu").test(text);
}

function empathyToward(text: string, name: string): boolean {
  const target = escapeRegex(name);
  return [
    new RegExp(`\\bfeel(?:ing)?\\s+(?:so\\s+|really\\s+)?(?:bad|sorry)\\s+for\\s+${target}`, "iu"),
    new RegExp(`\\bheart\\s+(?:goes|go)\\s+out\\s+to\\s+${target}`, "iu"),
    new RegExp(`\\bpray(?:ing)?\\s+for\\s+${target}`, "iu"),
    new RegExp(`\\bpoor\\s+${target}`, "iu"),
  ].some((pattern) => pattern.test(text));
}

function dominant(scores: Record<string, number>): string | undefined {
  let best: string | undefined;
  let bestCount = 0;
  for (const [label, count] of Object.entries(scores)) {
    if (count > bestCount) {
      best = label;
      bestCount = count;
    }
  }
  return best;
}

export function detectEmotion(text: string): string | undefined {
  const counts: Record<string, number> = {};
  for (const [emotion, terms] of Object.entries(EMOTIONS)) {
    counts[emotion] = countTerms(text, terms);
  }
  return dominant(counts);
}

export function detectTopics(text: string): string[] {
  return Object.entries(TOPICS)
    .filter(([, terms]) => countTerms(text, terms) > 0)
    .map(([topic]) => topic);
}

export function toxicityScore(text: string): number {
  return Math.min(1, countTerms(text, lexicon.toxicTerms) * TOXIC_TERM_WEIGHT);
}

/**
 * VADER compound plus the entertainment lexicon (stan slang and emoji VADER
 * does not know about), clamped to [-1, 1].
 */
export function polarity(text: string): { score: number; hits: number } {
  const normalized = normalizeSlang(tokenize(text)).join(" ");
  const compound = normalized
    ? vader.SentimentIntensityAnalyzer.polarity_scores(normalized).compound
    : 0;

  const positive =
    countTerms(text, lexicon.positiveTerms) + countTerms(text, lexicon.positiveEmojis);
  const negative =
    countTerms(text, lexicon.negativeTerms) + countTerms(text, lexicon.negativeEmojis);

  return {
    score: clampScore(compound + LEXICON_WEIGHT * (positive - negative)),
    hits: positive + negative,
  };
}

/**
 * Deterministic scorer: sentences are split into clauses at contrastive
 * conjunctions and each candidate takes the polarity of the clauses that
 * name it.
 */
export class LexiconScorer implements SignalScorer {
  readonly name = "lexicon-v1";

  constructor(private readonly ner: NERService = new NERService()) {}

  async score(request: ScoreRequest): Promise<ScoreResult> {
    const { text, candidates, engagement } = request;
    const preprocessed = preprocessText(text);

    const clauses: Clause[] = preprocessed.sentences.flatMap((sentence) => {
      const question = isQuestion(sentence) && !isRhetorical(sentence);
      return splitClauses(sentence).map((clause) => {
        const { score } = polarity(clause);
        return { text: clause, question, polarity: question ? 0 : score };
      });
    });

    const allQuestions = clauses.length > 0 && clauses.every((c) => c.question);
    const whole = polarity(text);
    let overall = allQuestions ? 0 : whole.score;

    const sarcasmBar =
      engagement.likeCount >= HIGH_ENGAGEMENT_LIKES
        ? HIGH_ENGAGEMENT_SARCASM_THRESHOLD
        : SARCASM_THRESHOLD;
    const sarcasm =
      !allQuestions &&
      ((preprocessed.sarcasm.ironyMarker && overall > 0) ||
        preprocessed.sarcasm.confidence > sarcasmBar);

    const overallEmotion = detectEmotion(text);
    const entities: Record<string, EntityScore> = {};

    for (const candidate of candidates) {
      entities[candidate.entityName] = this.scoreEntity(candidate, clauses, sarcasm, overallEmotion);
    }

    if (sarcasm && overall > 0) overall = -overall;

    const confidence = allQuestions
      ? QUESTION_CONFIDENCE
      : whole.hits >= 2
        ? Math.min(0.8, 0.5 + whole.hits * 0.1)
        : 0.3 + Math.abs(overall) * 0.4;

    return {
      source: this.name,
      confidence,
      entities,
      overallSentiment: overall,
      emotion: overallEmotion,
      topics: detectTopics(text),
      toxicity: toxicityScore(text),
      sarcasm,
      discoveries: this.discover(text, candidates),
    };
  }

  private scoreEntity(
    candidate: CandidateMatch,
    clauses: Clause[],
    sarcasm: boolean,
    fallbackEmotion: string | undefined
  ): EntityScore {
    const mentions = clauses.filter((clause) => containsName(clause.text, candidate.matchedString));
    if (mentions.length === 0) {
      return { sentiment: 0, mentioned: false, stance: "neutral" };
    }

    if (mentions.every((clause) => clause.question)) {
      return {
        sentiment: 0,
        confidence: QUESTION_CONFIDENCE,
        stance: "neutral",
        emotion: fallbackEmotion,
        mentioned: true,
      };
    }

    const scores = mentions.map((clause) => {
      if (clause.question) return 0;
      if (empathyToward(clause.text, candidate.matchedString)) {
        return Math.max(EMPATHY_SCORE, clause.polarity);
      }
      return clause.polarity;
    });

    let sentiment = scores.reduce((sum, s) => sum + s, 0) / scores.length;
    if (sarcasm && sentiment > 0) sentiment = -sentiment;
    sentiment = clampScore(sentiment);

    return {
      sentiment,
      stance: stanceFor(sentiment),
      emotion: detectEmotion(mentions.map((m) => m.text).join(" ")) ?? fallbackEmotion,
      mentioned: true,
    };
  }

  private discover(text: string, candidates: CandidateMatch[]): DiscoveredMention[] {
    const known = candidates.flatMap((c) => [c.matchedString, c.entityName]);
    return this.ner
      .extractEntities(text)
      .filter((entity) => !known.some((name) => containsName(entity.text, name)))
      .map((entity) => ({ name: entity.text, kind: entity.kind }));
  }
}
