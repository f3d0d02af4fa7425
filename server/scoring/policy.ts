import { isRhetorical, splitSentences } from "../preprocessing";
import { clampScore } from "../sentiment";
import type { EntityScore, ScoreRequest, ScoreResult } from "../types/signals";

function mentionedIn(text: string, fragment: string): boolean {
  return fragment.length > 0 && text.toLowerCase().includes(fragment.toLowerCase());
}

/**
 * A comment made only of genuine (non-rhetorical) questions carries no
 * sentiment. Only "?"-terminated sentences count here, so a model's reading
 * of an exclamation or an unpunctuated statement is left alone.
 */
export function isPureQuestion(text: string): boolean {
  const sentences = splitSentences(text);
  return (
    sentences.length > 0 &&
    sentences.every((sentence) => sentence.endsWith("?") && !isRhetorical(sentence))
  );
}

/**
 * Apply the scoring rules every backend shares to a result:
 * candidates absent from the text score 0, pure questions score 0, and
 * out-of-range values are clamped. Remote models are held to the same rules
 * as the lexicon scorer.
 */
export function enforceScoringPolicy(request: ScoreRequest, result: ScoreResult): ScoreResult {
  const question = isPureQuestion(request.text);
  const entities: Record<string, EntityScore> = {};

  for (const [name, score] of Object.entries(result.entities)) {
    const candidate = request.candidates.find((c) => c.entityName === name);
    const mentioned = candidate
      ? mentionedIn(request.text, candidate.matchedString)
      : score.mentioned && mentionedIn(request.text, name);

    entities[name] = {
      ...score,
      sentiment: mentioned && !question ? clampScore(score.sentiment) : 0,
      mentioned,
      stance: mentioned && !question ? score.stance : "neutral",
    };
  }

  for (const candidate of request.candidates) {
    if (!(candidate.entityName in entities)) {
      entities[candidate.entityName] = {
        sentiment: 0,
        mentioned: mentionedIn(request.text, candidate.matchedString),
      };
    }
  }

  return {
    ...result,
    confidence: Math.max(0, Math.min(1, result.confidence)),
    entities,
    overallSentiment: question ? 0 : clampScore(result.overallSentiment),
    toxicity:
      result.toxicity === undefined ? undefined : Math.max(0, Math.min(1, result.toxicity)),
  };
}
