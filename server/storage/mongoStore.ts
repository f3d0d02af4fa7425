import { randomUUID } from "node:crypto";
import mongoose, {
  type AnyBulkWriteOperation,
  type ClientSession,
  type FilterQuery,
} from "mongoose";
import { ReviewStateError, SignalConflictError } from "../errors";
import { log } from "../log";
import type { Comment, NormalizedComment } from "../types/comments";
import type {
  DiscoveredEntity,
  DiscoveryDisposition,
  DiscoverySighting,
} from "../types/entities";
import type {
  ExtractedSignal,
  ReviewQueueItem,
  ReviewState,
  SignalDraft,
} from "../types/signals";
import {
  CommentModel,
  DiscoveredEntityModel,
  ReviewItemModel,
  SignalModel,
  type CommentDoc,
  type DiscoveredDoc,
  type ReviewDoc,
  type SignalDoc,
} from "./models";
import {
  reviewKey,
  toComment,
  type CommitBatch,
  type DiscoveredQuery,
  type PendingQuery,
  type SaveCommentsResult,
  type SignalQuery,
  type SignalStore,
} from "./signalStore";

const DUPLICATE_KEY = 11000;

export async function connectMongo(uri: string): Promise<typeof mongoose> {
  const connection = await mongoose.connect(uri);
  log.info(`🗄️ Connected to MongoDB (${connection.connection.name})`);
  return connection;
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}

function fromCommentDoc({ _id, ...rest }: CommentDoc): Comment {
  return { id: _id, ...rest };
}

function fromSignalDoc({ _id, ...rest }: SignalDoc): ExtractedSignal {
  return { id: _id, ...rest };
}

function fromReviewDoc({ _id, key: _key, ...rest }: ReviewDoc): ReviewQueueItem {
  return { id: _id, ...rest };
}

function fromDiscoveredDoc({ _id, ...rest }: DiscoveredDoc): DiscoveredEntity {
  return { id: _id, ...rest };
}

function signalFilter(query: SignalQuery): FilterQuery<SignalDoc> {
  const filter: FilterQuery<SignalDoc> = {};
  if (query.entityIds) filter.entityId = { $in: query.entityIds };
  if (query.kinds) filter.kind = { $in: query.kinds };
  if (query.sources) filter.source = { $in: query.sources };
  if (query.commentIds) filter.commentId = { $in: query.commentIds };
  if (query.platforms) filter.platform = { $in: query.platforms };
  if (query.targeted === true && !query.entityIds) filter.entityId = { $ne: null };
  if (query.targeted === false) filter.entityId = null;
  if (query.numericOnly) filter.numericValue = { $ne: null };
  if (query.window) {
    filter.commentPostedAt = { $gte: query.window.start, $lt: query.window.end };
  }
  return filter;
}

function signalUpsert(draft: SignalDraft, now: Date): AnyBulkWriteOperation<SignalDoc> {
  return {
    updateOne: {
      filter: {
        commentId: draft.commentId,
        entityId: draft.entityId,
        kind: draft.kind,
        source: draft.source,
      },
      update: {
        $set: { ...draft, updatedAt: now },
        $setOnInsert: { _id: randomUUID(), createdAt: now },
      },
      upsert: true,
    },
  };
}

export interface MongoStoreOptions {
  transactions: boolean;
  now?: () => Date;
}

/**
 * MongoDB implementation of the store. With transactions enabled every batch
 * commit runs in one session; without them the upserts still converge when a
 * batch is retried.
 */
export class MongoSignalStore implements SignalStore {
  private readonly now: () => Date;

  constructor(private readonly options: MongoStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private async atomically(work: (session: ClientSession | undefined) => Promise<void>): Promise<void> {
    if (!this.options.transactions) {
      await work(undefined);
      return;
    }
    await mongoose.connection.transaction(async (session) => {
      await work(session);
    });
  }

  async saveComments(records: NormalizedComment[]): Promise<SaveCommentsResult> {
    if (records.length === 0) return { created: 0, updated: 0 };

    const ops: AnyBulkWriteOperation<CommentDoc>[] = records.map((record) => {
      const { id, likeCount, replyCount, ...immutable } = toComment(record);
      return {
        updateOne: {
          filter: { _id: id },
          update: { $set: { likeCount, replyCount }, $setOnInsert: immutable },
          upsert: true,
        },
      };
    });

    const result = await CommentModel.bulkWrite(ops, { ordered: false });
    return { created: result.upsertedCount, updated: result.matchedCount };
  }

  async getComments(ids: string[]): Promise<Comment[]> {
    const docs = await CommentModel.find({ _id: { $in: ids } }).lean<CommentDoc[]>();
    return docs.map(fromCommentDoc);
  }

  async listPendingComments(query: PendingQuery = {}): Promise<Comment[]> {
    const filter: FilterQuery<CommentDoc> = { "enrichment.state": "UNPROCESSED" };
    if (query.commentIds) filter._id = { $in: query.commentIds };
    if (query.since) filter.postedAt = { $gte: query.since };

    let cursor = CommentModel.find(filter).sort({ postedAt: 1, _id: 1 });
    if (query.limit !== undefined) cursor = cursor.limit(query.limit);
    const docs = await cursor.lean<CommentDoc[]>();
    return docs.map(fromCommentDoc);
  }

  async commitBatch(batch: CommitBatch): Promise<void> {
    const now = this.now();

    const keys = batch.reviewItems.map(reviewKey);
    const resolved = new Set<string>(
      keys.length > 0
        ? await ReviewItemModel.distinct("key", { key: { $in: keys }, state: { $ne: "pending" } })
        : []
    );

    const reviewOps: AnyBulkWriteOperation<ReviewDoc>[] = batch.reviewItems
      .filter((item) => !resolved.has(reviewKey(item)))
      .map((item) => ({
        updateOne: {
          filter: { key: reviewKey(item) },
          update: {
            $set: { ...item, state: "pending" },
            $setOnInsert: { _id: randomUUID(), createdAt: now },
          },
          upsert: true,
        },
      }));

    const stateOps: AnyBulkWriteOperation<CommentDoc>[] = batch.states.map((update) => ({
      updateOne: {
        filter: { _id: update.commentId },
        update: {
          $set: {
            "enrichment.state": update.state,
            "enrichment.enrichedAt": update.enrichedAt,
          },
          $unset: { "enrichment.lastError": "" },
          $inc: { "enrichment.attempts": 1 },
        },
      },
    }));

    const signalOps = batch.signals.map((draft) => signalUpsert(draft, now));

    try {
      await this.atomically(async (session) => {
        if (signalOps.length > 0) await SignalModel.bulkWrite(signalOps, { session });
        if (reviewOps.length > 0) await ReviewItemModel.bulkWrite(reviewOps, { session });
        if (stateOps.length > 0) await CommentModel.bulkWrite(stateOps, { session });
      });
    } catch (error) {
      // Two upserts racing on the same signal key surface as a duplicate key error
      if (error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY) {
        throw new SignalConflictError(
          `Signal uniqueness violated: ${error.message}`,
          batch.states.map((s) => s.commentId)
        );
      }
      throw error;
    }
  }

  async markFailed(commentId: string, error: string): Promise<void> {
    await CommentModel.updateOne(
      { _id: commentId },
      {
        $set: { "enrichment.state": "UNPROCESSED", "enrichment.lastError": error },
        $inc: { "enrichment.attempts": 1 },
      }
    );
  }

  async findSignals(query: SignalQuery = {}): Promise<ExtractedSignal[]> {
    const docs = await SignalModel.find(signalFilter(query)).lean<SignalDoc[]>();
    return docs.map(fromSignalDoc);
  }

  async countSignals(query: SignalQuery = {}): Promise<number> {
    return SignalModel.countDocuments(signalFilter(query));
  }

  async listReviewItems(state?: ReviewState, limit?: number): Promise<ReviewQueueItem[]> {
    let cursor = ReviewItemModel.find(state ? { state } : {}).sort({ createdAt: 1 });
    if (limit !== undefined) cursor = cursor.limit(limit);
    const docs = await cursor.lean<ReviewDoc[]>();
    return docs.map(fromReviewDoc);
  }

  async getReviewItem(id: string): Promise<ReviewQueueItem | null> {
    const doc = await ReviewItemModel.findById(id).lean<ReviewDoc>();
    return doc ? fromReviewDoc(doc) : null;
  }

  async saveReviewResolution(item: ReviewQueueItem, signal: SignalDraft | null): Promise<void> {
    const now = this.now();
    await this.atomically(async (session) => {
      const result = await ReviewItemModel.updateOne(
        { _id: item.id, state: "pending" },
        {
          $set: {
            state: item.state,
            resolvedBy: item.resolvedBy,
            resolvedAt: item.resolvedAt,
            resolvedEntityId: item.resolvedEntityId,
          },
        },
        { session }
      );
      if (result.matchedCount === 0) {
        throw new ReviewStateError(`Review item ${item.id} is not pending`);
      }
      if (signal) await SignalModel.bulkWrite([signalUpsert(signal, now)], { session });
    });
  }

  async recordSightings(sightings: DiscoverySighting[], sampleCap: number): Promise<void> {
    if (sightings.length === 0) return;

    const ops: AnyBulkWriteOperation<DiscoveredDoc>[] = sightings.map((s) => ({
      updateOne: {
        filter: { normalizedName: s.normalizedName },
        update: {
          $setOnInsert: { _id: randomUUID(), name: s.name, kind: s.kind, reviewed: false },
          $min: { firstSeenAt: s.seenAt },
          $max: { lastSeenAt: s.seenAt },
          $inc: { mentionCount: s.count },
          // positive $slice keeps the first N: samples are capped, never rotated
          $push: { samples: { $each: s.samples, $slice: sampleCap } },
        },
        upsert: true,
      },
    }));

    await DiscoveredEntityModel.bulkWrite(ops, { ordered: false });
  }

  async listDiscovered(query: DiscoveredQuery = {}): Promise<DiscoveredEntity[]> {
    const filter: FilterQuery<DiscoveredDoc> = {
      mentionCount: { $gte: query.minMentions ?? 0 },
    };
    if (query.reviewed !== undefined) filter.reviewed = query.reviewed;

    let cursor = DiscoveredEntityModel.find(filter).sort({ mentionCount: -1, normalizedName: 1 });
    if (query.limit !== undefined) cursor = cursor.limit(query.limit);
    const docs = await cursor.lean<DiscoveredDoc[]>();
    return docs.map(fromDiscoveredDoc);
  }

  async setDiscoveredDisposition(
    normalizedName: string,
    disposition: DiscoveryDisposition,
    reviewedAt: Date
  ): Promise<DiscoveredEntity | null> {
    const doc = await DiscoveredEntityModel.findOneAndUpdate(
      { normalizedName },
      { $set: { reviewed: true, disposition, reviewedAt } },
      { new: true }
    ).lean<DiscoveredDoc>();
    return doc ? fromDiscoveredDoc(doc) : null;
  }
}
