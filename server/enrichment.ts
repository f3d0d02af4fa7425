import type { EntityCatalog } from "./catalog";
import { DEFAULT_ENRICHMENT, type EnrichmentSettings } from "./config";
import { DiscoveredEntityTracker } from "./discovery";
import { ScoringError, SignalConflictError, errorMessage } from "./errors";
import { log } from "./log";
import { isValidEntityName, normalizeName } from "./nameFilter";
import { EntityResolver } from "./resolver";
import { mapPool, withRetry } from "./retry";
import type { SignalScorer } from "./scoring/port";
import { engagementWeight, sentimentLabel, toxicityLabel } from "./sentiment";
import type { CommitBatch, SignalStore } from "./storage/signalStore";
import type { Comment, EnrichmentState, PersistedState } from "./types/comments";
import type { CandidateMatch, EntityKind } from "./types/entities";
import type { ReviewItemDraft, ScoreResult, SignalDraft, SignalKind } from "./types/signals";

const TRANSITIONS: Record<EnrichmentState, readonly EnrichmentState[]> = {
  UNPROCESSED: ["RESOLVING"],
  RESOLVING: ["SCORING", "UNPROCESSED"],
  SCORING: ["VALIDATING", "UNPROCESSED"],
  VALIDATING: ["COMMITTED", "QUEUED_FOR_REVIEW", "UNPROCESSED"],
  COMMITTED: ["DONE"],
  QUEUED_FOR_REVIEW: ["DONE"],
  DONE: [],
};

const REVIEW_CONTEXT_LENGTH = 500;

export class IllegalTransitionError extends Error {
  constructor(commentId: string, from: EnrichmentState, to: EnrichmentState) {
    super(`Comment ${commentId}: illegal transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** Tracks one comment through the enrichment pipeline. */
export class CommentRun {
  private current: EnrichmentState = "UNPROCESSED";
  readonly history: EnrichmentState[] = ["UNPROCESSED"];

  constructor(readonly commentId: string) {}

  get state(): EnrichmentState {
    return this.current;
  }

  advance(next: EnrichmentState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.commentId, this.current, next);
    }
    this.current = next;
    this.history.push(next);
  }
}

export interface EnrichOptions {
  /** Re-score these comments whatever their state. */
  commentIds?: string[];
  since?: Date;
  limit?: number;
}

export interface EnrichmentStats {
  commentsProcessed: number;
  committed: number;
  queuedForReview: number;
  failed: number;
  signalsWritten: number;
  reviewItemsQueued: number;
  entitiesDiscovered: number;
  batches: number;
  failedBatches: number;
}

interface Sighting {
  name: string;
  kind: EntityKind;
  snippet: string;
}

interface CommentOutcome {
  run: CommentRun;
  state: PersistedState;
  signals: SignalDraft[];
  reviewItems: ReviewItemDraft[];
  sightings: Sighting[];
}

export interface EnrichmentDeps {
  store: SignalStore;
  scorer: SignalScorer;
  /** Called once per batch; returns the current catalog snapshot. */
  loadCatalog: () => Promise<EntityCatalog>;
  settings?: Partial<EnrichmentSettings>;
  tracker?: DiscoveredEntityTracker;
  now?: () => Date;
}

function emptyStats(): EnrichmentStats {
  return {
    commentsProcessed: 0,
    committed: 0,
    queuedForReview: 0,
    failed: 0,
    signalsWritten: 0,
    reviewItemsQueued: 0,
    entitiesDiscovered: 0,
    batches: 0,
    failedBatches: 0,
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function isCanonicalKey(catalog: EntityCatalog, name: string): boolean {
  const entity = catalog.lookup(name);
  return entity !== undefined && normalizeName(entity.canonicalName) === normalizeName(name);
}

/**
 * Turns unprocessed comments into signals. Each batch is resolved against
 * one catalog snapshot, scored concurrently and committed in one write.
 */
export class EnrichmentEngine {
  private readonly store: SignalStore;
  private readonly scorer: SignalScorer;
  private readonly loadCatalog: () => Promise<EntityCatalog>;
  private readonly settings: EnrichmentSettings;
  private readonly tracker: DiscoveredEntityTracker;
  private readonly now: () => Date;

  constructor(deps: EnrichmentDeps) {
    this.store = deps.store;
    this.scorer = deps.scorer;
    this.loadCatalog = deps.loadCatalog;
    this.settings = { ...DEFAULT_ENRICHMENT, ...deps.settings };
    this.now = deps.now ?? (() => new Date());
    this.tracker =
      deps.tracker ??
      new DiscoveredEntityTracker(this.store, this.settings.discoverySampleCap, this.now);
  }

  async enrich(options: EnrichOptions = {}): Promise<EnrichmentStats> {
    const stats = emptyStats();
    const comments = await this.selectComments(options);

    if (comments.length === 0) {
      log.info("✅ No comments to enrich");
      return stats;
    }

    log.info(`🚀 Enriching ${comments.length} comments with ${this.scorer.name}`);

    for (const batch of chunk(comments, this.settings.batchSize)) {
      stats.batches++;
      await this.processBatch(batch, stats);
    }

    log.info(
      `✅ Enrichment finished: ${stats.committed} committed, ${stats.queuedForReview} queued for review, ${stats.failed} failed, ${stats.signalsWritten} signals, ${stats.entitiesDiscovered} discoveries`
    );
    return stats;
  }

  private async selectComments(options: EnrichOptions): Promise<Comment[]> {
    if (options.commentIds) {
      const comments = await this.store.getComments(options.commentIds);
      return options.limit === undefined ? comments : comments.slice(0, options.limit);
    }
    return this.store.listPendingComments({ since: options.since, limit: options.limit });
  }

  private async processBatch(batch: Comment[], stats: EnrichmentStats): Promise<void> {
    const catalog = await this.loadCatalog();
    const resolver = new EntityResolver(catalog);

    const settled = await mapPool(batch, this.settings.concurrency, (comment) =>
      this.processComment(comment, resolver, catalog)
    );

    const outcomes: CommentOutcome[] = [];
    for (const [index, result] of settled.entries()) {
      const comment = batch[index];
      if (result.ok) {
        outcomes.push(result.value);
        continue;
      }
      stats.failed++;
      const message = errorMessage(result.error);
      log.error(`Failed to enrich comment ${comment.id}: ${message}`);
      await this.store.markFailed(comment.id, message);
    }

    if (outcomes.length === 0) return;

    const enrichedAt = this.now();
    const commit: CommitBatch = {
      signals: outcomes.flatMap((o) => o.signals),
      reviewItems: outcomes.flatMap((o) => o.reviewItems),
      states: outcomes.map((o) => ({ commentId: o.run.commentId, state: o.state, enrichedAt })),
    };

    try {
      await withRetry(() => this.store.commitBatch(commit), {
        retries: this.settings.retries,
        baseDelayMs: this.settings.retryBaseDelayMs,
        shouldRetry: (error) => !(error instanceof SignalConflictError),
        label: "Batch commit",
      });
    } catch (error) {
      stats.failedBatches++;
      log.error(
        `Batch commit failed, comments left unprocessed: ${outcomes
          .map((o) => o.run.commentId)
          .join(", ")}`,
        errorMessage(error)
      );
      return;
    }

    for (const outcome of outcomes) {
      outcome.run.advance("DONE");
      stats.commentsProcessed++;
      if (outcome.state === "COMMITTED") stats.committed++;
      else stats.queuedForReview++;
      for (const sighting of outcome.sightings) {
        if (this.tracker.track(sighting.name, sighting.kind, sighting.snippet)) {
          stats.entitiesDiscovered++;
        }
      }
    }
    stats.signalsWritten += commit.signals.length;
    stats.reviewItemsQueued += commit.reviewItems.length;

    try {
      await this.tracker.flush();
    } catch (error) {
      log.error(`Failed to record discovered entities: ${errorMessage(error)}`);
    }
  }

  private async processComment(
    comment: Comment,
    resolver: EntityResolver,
    catalog: EntityCatalog
  ): Promise<CommentOutcome> {
    const run = new CommentRun(comment.id);
    const postContext = {
      caption: comment.postCaption ?? comment.postSubject ?? "",
      subject: comment.postSubject,
      platform: comment.platform,
    };

    run.advance("RESOLVING");
    const candidates = resolver.resolve(comment.text, postContext);

    run.advance("SCORING");
    let result: ScoreResult;
    try {
      result = await withRetry(
        () =>
          this.scorer.score({
            text: comment.text,
            postContext,
            candidates,
            engagement: { likeCount: comment.likeCount },
          }),
        {
          retries: this.settings.retries,
          baseDelayMs: this.settings.retryBaseDelayMs,
          shouldRetry: (error) => !(error instanceof ScoringError) || error.transient,
          label: `Scoring comment ${comment.id}`,
        }
      );
    } catch (error) {
      run.advance("UNPROCESSED");
      throw error;
    }

    run.advance("VALIDATING");
    const outcome = this.validate(run, comment, candidates, catalog, result);
    run.advance(outcome.state);
    return outcome;
  }

  private validate(
    run: CommentRun,
    comment: Comment,
    candidates: CandidateMatch[],
    catalog: EntityCatalog,
    result: ScoreResult
  ): CommentOutcome {
    const threshold = this.settings.autoCommitConfidence;
    const weight = engagementWeight(comment.likeCount);
    const signals: SignalDraft[] = [];
    const reviewItems: ReviewItemDraft[] = [];
    const sightings: Sighting[] = [];
    const tracked = new Set<string>();
    const snippet = comment.text;

    const signal = (
      kind: SignalKind,
      entity: CandidateMatch | null,
      value: string,
      numericValue: number | null,
      confidence: number
    ): SignalDraft => ({
      commentId: comment.id,
      entityId: entity?.entityId ?? null,
      entityName: entity?.entityName ?? null,
      kind,
      value,
      numericValue,
      weight,
      confidence,
      source: result.source,
      commentPostedAt: comment.postedAt,
      platform: comment.platform,
      likeCount: comment.likeCount,
    });

    const review = (
      entity: CandidateMatch | null,
      sentiment: number,
      confidence: number,
      reason: string,
      possibleEntities: string[]
    ): ReviewItemDraft => ({
      commentId: comment.id,
      entityId: entity?.entityId ?? null,
      mention: entity?.matchedString ?? "",
      context: comment.text.slice(0, REVIEW_CONTEXT_LENGTH),
      postCaption: comment.postCaption,
      proposed: {
        kind: "sentiment",
        value: sentimentLabel(sentiment),
        numericValue: sentiment,
        weight,
        source: result.source,
      },
      confidence,
      possibleEntities,
      reason,
    });

    const discover = (name: string, kind: EntityKind): void => {
      const key = normalizeName(name);
      if (tracked.has(key) || catalog.lookup(name)) return;
      tracked.add(key);
      sightings.push({ name, kind, snippet });
    };

    const committed: CandidateMatch[] = [];
    const signaled = new Set<string>();
    let targeted = 0;

    // Canonical-name keys first, so an alias key for the same entity is the one skipped.
    const scored = Object.entries(result.entities).sort(
      ([a], [b]) => Number(!isCanonicalKey(catalog, a)) - Number(!isCanonicalKey(catalog, b))
    );

    for (const [name, score] of scored) {
      if (!isValidEntityName(name)) continue;

      const entity = catalog.lookup(name);
      if (!entity) {
        if (score.mentioned) discover(name, "person");
        continue;
      }
      if (signaled.has(entity.id)) {
        log.debug(`Skipping duplicate score for ${name} on ${comment.id}`);
        continue;
      }

      const candidate = candidates.find((c) => c.entityId === entity.id);
      if (!candidate) {
        log.debug(`Dropping score for ${name} on ${comment.id}: not a candidate`);
        continue;
      }
      if (!score.mentioned) continue;
      signaled.add(entity.id);
      targeted++;

      const confidence = Math.min(score.confidence ?? result.confidence, candidate.confidence);
      if (candidate.ambiguous || confidence < threshold) {
        const possible = candidates
          .filter((c) => c.matchedString.toLowerCase() === candidate.matchedString.toLowerCase())
          .map((c) => c.entityName);
        const reason = candidate.ambiguous
          ? `Ambiguous mention "${candidate.matchedString}"`
          : `Low confidence (${confidence.toFixed(2)}) for entity assignment`;
        reviewItems.push(review(candidate, score.sentiment, confidence, reason, possible));
        continue;
      }

      committed.push(candidate);
      signals.push(
        signal("sentiment", candidate, sentimentLabel(score.sentiment), score.sentiment, confidence)
      );
      const emotion = score.emotion ?? result.emotion;
      if (emotion) signals.push(signal("emotion", candidate, emotion, null, confidence));
      if (this.settings.enableStanceSignals && score.stance) {
        signals.push(signal("stance", candidate, score.stance, null, confidence));
      }
    }

    if (targeted === 0) {
      if (result.confidence >= threshold) {
        signals.push(
          signal(
            "sentiment",
            null,
            sentimentLabel(result.overallSentiment),
            result.overallSentiment,
            result.confidence
          )
        );
      } else if (candidates.length > 0) {
        reviewItems.push(
          review(
            null,
            result.overallSentiment,
            result.confidence,
            `Low confidence (${result.confidence.toFixed(2)}) for comment sentiment`,
            candidates.map((c) => c.entityName)
          )
        );
      }
    }

    if (committed.length === 0 && result.emotion) {
      signals.push(signal("emotion", null, result.emotion, null, result.confidence));
    }
    if (result.topics.length > 0) {
      signals.push(signal("topic", null, result.topics.join(", "), null, result.confidence));
    }
    if (result.toxicity !== undefined) {
      signals.push(
        signal("toxicity", null, toxicityLabel(result.toxicity), result.toxicity, result.confidence)
      );
    }
    if (result.sarcasm) {
      signals.push(signal("sarcasm", null, "sarcasm", 1.0, result.confidence));
    }

    for (const discovery of result.discoveries) discover(discovery.name, discovery.kind);

    return {
      run,
      state: reviewItems.length > 0 ? "QUEUED_FOR_REVIEW" : "COMMITTED",
      signals,
      reviewItems,
      sightings,
    };
  }
}
