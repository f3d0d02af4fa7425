import type { ScoreRequest, ScoreResult } from "../types/signals";

/**
 * Anything that turns a comment plus its candidate entities into signals.
 * Implementations must be safe to call concurrently for different comments.
 */
export interface SignalScorer {
  readonly name: string;
  score(request: ScoreRequest): Promise<ScoreResult>;
}
