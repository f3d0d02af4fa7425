import type { ScoringSettings } from "../config";
import { HybridScorer } from "./hybrid";
import { LexiconScorer } from "./lexicon";
import type { SignalScorer } from "./port";
import { RemoteModelScorer, type ChatTransport } from "./remote";

export type { SignalScorer } from "./port";
export { HybridScorer } from "./hybrid";
export { LexiconScorer } from "./lexicon";
export { RemoteModelScorer } from "./remote";

/** Resolve the configured backend once, at startup. */
export function createScorer(settings: ScoringSettings, transport?: ChatTransport): SignalScorer {
  if (settings.backend === "lexicon") return new LexiconScorer();

  if (!settings.apiKey) {
    throw new Error(`MODEL_API_KEY is required for the ${settings.backend} scoring backend`);
  }

  const remote = new RemoteModelScorer({
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
    transport,
  });

  if (settings.backend === "remote") return remote;

  return new HybridScorer(new LexiconScorer(), remote, {
    escalateBelow: settings.escalateBelow,
    neutralBand: settings.neutralBand,
  });
}
