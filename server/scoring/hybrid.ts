import { log } from "../log";
import type { ScoreRequest, ScoreResult } from "../types/signals";
import type { SignalScorer } from "./port";

export interface HybridOptions {
  escalateBelow: number;
  neutralBand: number;
}

/**
 * Cheap scorer first; uncertain or near-neutral readings go to the expensive
 * one. Errors from the expensive scorer propagate so the engine can retry.
 */
export class HybridScorer implements SignalScorer {
  readonly name: string;

  constructor(
    private readonly cheap: SignalScorer,
    private readonly expensive: SignalScorer,
    private readonly options: HybridOptions = { escalateBelow: 0.7, neutralBand: 0.2 }
  ) {
    this.name = `hybrid(${cheap.name}|${expensive.name})`;
  }

  shouldEscalate(result: ScoreResult): boolean {
    return (
      result.confidence < this.options.escalateBelow ||
      Math.abs(result.overallSentiment) < this.options.neutralBand
    );
  }

  async score(request: ScoreRequest): Promise<ScoreResult> {
    const first = await this.cheap.score(request);
    if (!this.shouldEscalate(first)) return first;

    log.debug(
      `Escalating to ${this.expensive.name} (confidence ${first.confidence.toFixed(2)}, overall ${first.overallSentiment.toFixed(2)})`
    );
    return this.expensive.score(request);
  }
}
