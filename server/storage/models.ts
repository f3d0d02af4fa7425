import mongoose, { Schema } from "mongoose";
import type { Comment } from "../types/comments";
import type { DiscoveredEntity } from "../types/entities";
import type { ExtractedSignal, ReviewQueueItem } from "../types/signals";

export type CommentDoc = Omit<Comment, "id"> & { _id: string };
export type SignalDoc = Omit<ExtractedSignal, "id"> & { _id: string };
export type ReviewDoc = Omit<ReviewQueueItem, "id"> & { _id: string; key: string };
export type DiscoveredDoc = Omit<DiscoveredEntity, "id"> & { _id: string };

const enrichmentSchema = new Schema(
  {
    state: {
      type: String,
      enum: ["UNPROCESSED", "COMMITTED", "QUEUED_FOR_REVIEW"],
      default: "UNPROCESSED",
    },
    attempts: { type: Number, default: 0 },
    lastError: String,
    enrichedAt: Date,
  },
  { _id: false }
);

const commentSchema = new Schema<CommentDoc>({
  _id: { type: String, required: true },
  postId: { type: String, required: true, index: true },
  externalId: { type: String, required: true },
  platform: { type: String, required: true },
  postCaption: String,
  postSubject: String,
  postUrl: String,
  author: String,
  text: { type: String, required: true },
  postedAt: { type: Date, required: true, index: true },
  likeCount: { type: Number, default: 0 },
  replyCount: { type: Number, default: 0 },
  threadDepth: Number,
  raw: Schema.Types.Mixed,
  enrichment: { type: enrichmentSchema, default: () => ({}) },
});
commentSchema.index({ "enrichment.state": 1, postedAt: 1 });

const signalSchema = new Schema<SignalDoc>({
  _id: { type: String, required: true },
  commentId: { type: String, required: true },
  entityId: { type: String, default: null },
  entityName: { type: String, default: null },
  kind: { type: String, required: true },
  value: { type: String, required: true },
  numericValue: { type: Number, default: null },
  weight: { type: Number, required: true },
  confidence: { type: Number, required: true },
  source: { type: String, required: true },
  commentPostedAt: { type: Date, required: true },
  platform: { type: String, required: true },
  likeCount: { type: Number, default: 0 },
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
});
signalSchema.index({ commentId: 1, entityId: 1, kind: 1, source: 1 }, { unique: true });
signalSchema.index({ entityId: 1, kind: 1, commentPostedAt: 1 });

const reviewSchema = new Schema<ReviewDoc>({
  _id: { type: String, required: true },
  key: { type: String, required: true, unique: true },
  commentId: { type: String, required: true, index: true },
  entityId: { type: String, default: null },
  mention: String,
  context: String,
  postCaption: String,
  proposed: {
    kind: String,
    value: String,
    numericValue: Number,
    weight: Number,
    source: String,
  },
  confidence: Number,
  possibleEntities: [String],
  reason: String,
  createdAt: { type: Date, required: true },
  state: { type: String, enum: ["pending", "accepted", "rejected"], default: "pending", index: true },
  resolvedBy: String,
  resolvedAt: Date,
  resolvedEntityId: String,
});

const discoveredSchema = new Schema<DiscoveredDoc>({
  _id: { type: String, required: true },
  name: { type: String, required: true },
  normalizedName: { type: String, required: true, unique: true },
  kind: { type: String, required: true },
  firstSeenAt: { type: Date, required: true },
  lastSeenAt: { type: Date, required: true },
  mentionCount: { type: Number, default: 0, index: true },
  samples: [String],
  reviewed: { type: Boolean, default: false },
  disposition: String,
  reviewedAt: Date,
});

export const CommentModel = mongoose.model<CommentDoc>("Comment", commentSchema);
export const SignalModel = mongoose.model<SignalDoc>("ExtractedSignal", signalSchema);
export const ReviewItemModel = mongoose.model<ReviewDoc>("ReviewQueueItem", reviewSchema);
export const DiscoveredEntityModel = mongoose.model<DiscoveredDoc>(
  "DiscoveredEntity",
  discoveredSchema
);
