import type { EntityCatalog } from "./catalog";
import { ReviewStateError } from "./errors";
import { log } from "./log";
import type { SignalStore } from "./storage/signalStore";
import type { ReviewQueueItem, SignalDraft } from "./types/signals";

export const HUMAN_REVIEW_SOURCE = "human_review";

export type ReviewDecision = "accepted" | "rejected";

export interface ResolveReviewInput {
  decision: ReviewDecision;
  reviewer: string;
  /** Entity the reviewer assigned; defaults to the item's proposed entity. */
  entityId?: string;
}

/**
 * Human-in-the-loop resolution of low-confidence readings. Accepting an item
 * writes one signal attributed to the reviewer; rejecting it discards the
 * proposal. Items are resolved once.
 */
export class ReviewService {
  constructor(
    private readonly store: SignalStore,
    private readonly loadCatalog: () => Promise<EntityCatalog>,
    private readonly now: () => Date = () => new Date()
  ) {}

  pending(limit?: number): Promise<ReviewQueueItem[]> {
    return this.store.listReviewItems("pending", limit);
  }

  async resolve(itemId: string, input: ResolveReviewInput): Promise<ReviewQueueItem> {
    const item = await this.store.getReviewItem(itemId);
    if (!item) throw new ReviewStateError(`Review item ${itemId} not found`);
    if (item.state !== "pending") {
      throw new ReviewStateError(`Review item ${itemId} is already ${item.state}`);
    }

    const resolved: ReviewQueueItem = {
      ...item,
      state: input.decision,
      resolvedBy: input.reviewer,
      resolvedAt: this.now(),
      resolvedEntityId: input.entityId ?? item.entityId ?? undefined,
    };

    let signal: SignalDraft | null = null;
    if (input.decision === "accepted") {
      signal = await this.buildSignal(resolved);
    }

    await this.store.saveReviewResolution(resolved, signal);
    log.info(`📝 Review item ${itemId} ${input.decision} by ${input.reviewer}`);
    return resolved;
  }

  private async buildSignal(item: ReviewQueueItem): Promise<SignalDraft> {
    const [comment] = await this.store.getComments([item.commentId]);
    if (!comment) throw new ReviewStateError(`Comment ${item.commentId} no longer exists`);

    let entityName: string | null = null;
    const entityId = item.resolvedEntityId ?? null;
    if (entityId) {
      const entity = (await this.loadCatalog()).get(entityId);
      if (!entity) throw new ReviewStateError(`Unknown entity ${entityId}`);
      entityName = entity.canonicalName;
    }

    return {
      commentId: item.commentId,
      entityId,
      entityName,
      kind: item.proposed.kind,
      value: item.proposed.value,
      numericValue: item.proposed.numericValue,
      weight: item.proposed.weight,
      confidence: 1.0,
      source: HUMAN_REVIEW_SOURCE,
      commentPostedAt: comment.postedAt,
      platform: comment.platform,
      likeCount: comment.likeCount,
    };
  }
}
