import { randomUUID } from "node:crypto";
import { ReviewStateError } from "../errors";
import type { TimeWindow } from "../types/analytics";
import type { Comment, NormalizedComment, PersistedState } from "../types/comments";
import type {
  DiscoveredEntity,
  DiscoveryDisposition,
  DiscoverySighting,
} from "../types/entities";
import type {
  ExtractedSignal,
  ReviewItemDraft,
  ReviewQueueItem,
  ReviewState,
  SignalDraft,
  SignalKind,
} from "../types/signals";

export interface PendingQuery {
  commentIds?: string[];
  since?: Date;
  limit?: number;
}

export interface SignalQuery {
  entityIds?: string[];
  kinds?: SignalKind[];
  sources?: string[];
  commentIds?: string[];
  platforms?: string[];
  /** Half-open on the comment's posted time: start <= t < end. */
  window?: TimeWindow;
  /** true: entity-targeted only; false: comment-level only. */
  targeted?: boolean;
  numericOnly?: boolean;
}

export interface CommentStateUpdate {
  commentId: string;
  state: PersistedState;
  enrichedAt: Date;
}

/** Everything one enrichment batch writes. Applied all-or-nothing. */
export interface CommitBatch {
  signals: SignalDraft[];
  reviewItems: ReviewItemDraft[];
  states: CommentStateUpdate[];
}

export interface SaveCommentsResult {
  created: number;
  updated: number;
}

export interface DiscoveredQuery {
  reviewed?: boolean;
  minMentions?: number;
  limit?: number;
}

export interface SignalStore {
  saveComments(records: NormalizedComment[]): Promise<SaveCommentsResult>;
  getComments(ids: string[]): Promise<Comment[]>;
  listPendingComments(query?: PendingQuery): Promise<Comment[]>;
  commitBatch(batch: CommitBatch): Promise<void>;
  markFailed(commentId: string, error: string): Promise<void>;

  findSignals(query?: SignalQuery): Promise<ExtractedSignal[]>;
  countSignals(query?: SignalQuery): Promise<number>;

  listReviewItems(state?: ReviewState, limit?: number): Promise<ReviewQueueItem[]>;
  getReviewItem(id: string): Promise<ReviewQueueItem | null>;
  /** Persist a decision on a pending item, plus the signal it produced when accepted. */
  saveReviewResolution(item: ReviewQueueItem, signal: SignalDraft | null): Promise<void>;

  recordSightings(sightings: DiscoverySighting[], sampleCap: number): Promise<void>;
  listDiscovered(query?: DiscoveredQuery): Promise<DiscoveredEntity[]>;
  setDiscoveredDisposition(
    normalizedName: string,
    disposition: DiscoveryDisposition,
    reviewedAt: Date
  ): Promise<DiscoveredEntity | null>;
}

export function commentKey(platform: string, externalId: string): string {
  return `${platform}:${externalId}`;
}

export function signalKey(s: Pick<SignalDraft, "commentId" | "entityId" | "kind" | "source">): string {
  return `${s.commentId}|${s.entityId ?? ""}|${s.kind}|${s.source}`;
}

export function reviewKey(item: Pick<ReviewItemDraft, "commentId" | "entityId" | "proposed">): string {
  return `${item.commentId}|${item.entityId ?? ""}|${item.proposed.kind}|${item.proposed.source}`;
}

export function matchesSignal(signal: ExtractedSignal, query: SignalQuery): boolean {
  if (query.entityIds && (signal.entityId === null || !query.entityIds.includes(signal.entityId))) {
    return false;
  }
  if (query.kinds && !query.kinds.includes(signal.kind)) return false;
  if (query.sources && !query.sources.includes(signal.source)) return false;
  if (query.commentIds && !query.commentIds.includes(signal.commentId)) return false;
  if (query.platforms && !query.platforms.includes(signal.platform)) return false;
  if (query.targeted === true && signal.entityId === null) return false;
  if (query.targeted === false && signal.entityId !== null) return false;
  if (query.numericOnly && signal.numericValue === null) return false;
  if (query.window) {
    const t = signal.commentPostedAt.getTime();
    if (t < query.window.start.getTime() || t >= query.window.end.getTime()) return false;
  }
  return true;
}

export function toComment(record: NormalizedComment): Comment {
  return {
    id: commentKey(record.platform, record.commentExternalId),
    postId: commentKey(record.platform, record.postExternalId),
    externalId: record.commentExternalId,
    platform: record.platform,
    postCaption: record.postCaption,
    postSubject: record.postSubject,
    postUrl: record.postUrl,
    author: record.author,
    text: record.text,
    postedAt: record.postedAt,
    likeCount: record.likeCount,
    replyCount: record.replyCount ?? 0,
    threadDepth: record.threadDepth,
    raw: record.raw,
    enrichment: { state: "UNPROCESSED", attempts: 0 },
  };
}

interface MemoryState {
  comments: Map<string, Comment>;
  signals: Map<string, ExtractedSignal>;
  reviews: Map<string, ReviewQueueItem>;
  discovered: Map<string, DiscoveredEntity>;
}

/**
 * In-process implementation of the store. Batch commits are staged on copies
 * and swapped in at the end, so a failure leaves the previous state intact.
 */
export class MemorySignalStore implements SignalStore {
  private state: MemoryState = {
    comments: new Map(),
    signals: new Map(),
    reviews: new Map(),
    discovered: new Map(),
  };

  constructor(private readonly now: () => Date = () => new Date()) {}

  async saveComments(records: NormalizedComment[]): Promise<SaveCommentsResult> {
    let created = 0;
    let updated = 0;

    for (const record of records) {
      const comment = toComment(record);
      const existing = this.state.comments.get(comment.id);
      if (existing) {
        // Re-ingestion only refreshes engagement metrics
        existing.likeCount = comment.likeCount;
        existing.replyCount = comment.replyCount;
        updated++;
      } else {
        this.state.comments.set(comment.id, comment);
        created++;
      }
    }

    return { created, updated };
  }

  async getComments(ids: string[]): Promise<Comment[]> {
    return ids.flatMap((id) => {
      const comment = this.state.comments.get(id);
      return comment ? [structuredClone(comment)] : [];
    });
  }

  async listPendingComments(query: PendingQuery = {}): Promise<Comment[]> {
    let pending = [...this.state.comments.values()].filter(
      (c) => c.enrichment.state === "UNPROCESSED"
    );
    if (query.commentIds) {
      const wanted = new Set(query.commentIds);
      pending = pending.filter((c) => wanted.has(c.id));
    }
    if (query.since) {
      const since = query.since.getTime();
      pending = pending.filter((c) => c.postedAt.getTime() >= since);
    }
    pending.sort((a, b) => a.postedAt.getTime() - b.postedAt.getTime() || a.id.localeCompare(b.id));
    const limited = query.limit === undefined ? pending : pending.slice(0, query.limit);
    return limited.map((c) => structuredClone(c));
  }

  async commitBatch(batch: CommitBatch): Promise<void> {
    const staged: MemoryState = {
      comments: new Map(this.state.comments),
      signals: new Map(this.state.signals),
      reviews: new Map(this.state.reviews),
      discovered: this.state.discovered,
    };
    const now = this.now();

    for (const draft of batch.signals) {
      this.upsertSignal(staged.signals, draft, now);
    }

    for (const draft of batch.reviewItems) {
      const key = reviewKey(draft);
      const existing = staged.reviews.get(key);
      if (existing && existing.state !== "pending") continue;
      staged.reviews.set(key, {
        ...draft,
        id: existing?.id ?? randomUUID(),
        createdAt: existing?.createdAt ?? now,
        state: "pending",
      });
    }

    for (const update of batch.states) {
      const comment = staged.comments.get(update.commentId);
      if (!comment) throw new Error(`Unknown comment ${update.commentId}`);
      staged.comments.set(update.commentId, {
        ...comment,
        enrichment: {
          state: update.state,
          attempts: comment.enrichment.attempts + 1,
          enrichedAt: update.enrichedAt,
        },
      });
    }

    this.state = staged;
  }

  async markFailed(commentId: string, error: string): Promise<void> {
    const comment = this.state.comments.get(commentId);
    if (!comment) return;
    comment.enrichment = {
      state: "UNPROCESSED",
      attempts: comment.enrichment.attempts + 1,
      lastError: error,
    };
  }

  async findSignals(query: SignalQuery = {}): Promise<ExtractedSignal[]> {
    return [...this.state.signals.values()]
      .filter((signal) => matchesSignal(signal, query))
      .map((signal) => ({ ...signal }));
  }

  async countSignals(query: SignalQuery = {}): Promise<number> {
    return [...this.state.signals.values()].filter((signal) => matchesSignal(signal, query)).length;
  }

  async listReviewItems(state?: ReviewState, limit?: number): Promise<ReviewQueueItem[]> {
    const items = [...this.state.reviews.values()]
      .filter((item) => state === undefined || item.state === state)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return (limit === undefined ? items : items.slice(0, limit)).map((item) => ({ ...item }));
  }

  async getReviewItem(id: string): Promise<ReviewQueueItem | null> {
    const item = [...this.state.reviews.values()].find((r) => r.id === id);
    return item ? { ...item } : null;
  }

  async saveReviewResolution(item: ReviewQueueItem, signal: SignalDraft | null): Promise<void> {
    const key = reviewKey(item);
    const current = this.state.reviews.get(key);
    if (!current || current.id !== item.id) {
      throw new ReviewStateError(`Review item ${item.id} not found`);
    }
    if (current.state !== "pending") {
      throw new ReviewStateError(`Review item ${item.id} is already ${current.state}`);
    }

    if (signal) this.upsertSignal(this.state.signals, signal, this.now());
    this.state.reviews.set(key, { ...item });
  }

  async recordSightings(sightings: DiscoverySighting[], sampleCap: number): Promise<void> {
    for (const sighting of sightings) {
      const existing = this.state.discovered.get(sighting.normalizedName);
      if (existing) {
        existing.mentionCount += sighting.count;
        if (sighting.seenAt > existing.lastSeenAt) existing.lastSeenAt = sighting.seenAt;
        const room = Math.max(0, sampleCap - existing.samples.length);
        existing.samples.push(...sighting.samples.slice(0, room));
        continue;
      }

      this.state.discovered.set(sighting.normalizedName, {
        id: randomUUID(),
        name: sighting.name,
        normalizedName: sighting.normalizedName,
        kind: sighting.kind,
        firstSeenAt: sighting.seenAt,
        lastSeenAt: sighting.seenAt,
        mentionCount: sighting.count,
        samples: sighting.samples.slice(0, sampleCap),
        reviewed: false,
      });
    }
  }

  async listDiscovered(query: DiscoveredQuery = {}): Promise<DiscoveredEntity[]> {
    const rows = [...this.state.discovered.values()]
      .filter((d) => query.reviewed === undefined || d.reviewed === query.reviewed)
      .filter((d) => d.mentionCount >= (query.minMentions ?? 0))
      .sort((a, b) => b.mentionCount - a.mentionCount || a.normalizedName.localeCompare(b.normalizedName));
    return (query.limit === undefined ? rows : rows.slice(0, query.limit)).map((d) => ({
      ...d,
      samples: [...d.samples],
    }));
  }

  async setDiscoveredDisposition(
    normalizedName: string,
    disposition: DiscoveryDisposition,
    reviewedAt: Date
  ): Promise<DiscoveredEntity | null> {
    const entity = this.state.discovered.get(normalizedName);
    if (!entity) return null;
    entity.reviewed = true;
    entity.disposition = disposition;
    entity.reviewedAt = reviewedAt;
    return { ...entity, samples: [...entity.samples] };
  }

  private upsertSignal(signals: Map<string, ExtractedSignal>, draft: SignalDraft, now: Date): void {
    const key = signalKey(draft);
    const existing = signals.get(key);
    signals.set(key, {
      ...draft,
      id: existing?.id ?? randomUUID(),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
  }
}
