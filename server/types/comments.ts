export type Platform = "instagram" | "youtube" | "tiktok" | "reddit" | (string & {});

/** A comment record as handed over by an ingestion adapter. */
export interface NormalizedComment {
  platform: Platform;
  postExternalId: string;
  postCaption?: string;
  postSubject?: string;
  postUrl?: string;
  commentExternalId: string;
  author: string;
  text: string;
  postedAt: Date;
  likeCount: number;
  replyCount?: number;
  threadDepth?: number;
  raw?: Record<string, unknown>; // opaque original payload
}

export const ENRICHMENT_STATES = [
  "UNPROCESSED",
  "RESOLVING",
  "SCORING",
  "VALIDATING",
  "COMMITTED",
  "QUEUED_FOR_REVIEW",
  "DONE",
] as const;
export type EnrichmentState = (typeof ENRICHMENT_STATES)[number];

/** States a comment can be stored in between runs. */
export type PersistedState = Extract<
  EnrichmentState,
  "UNPROCESSED" | "COMMITTED" | "QUEUED_FOR_REVIEW"
>;

export interface EnrichmentStatus {
  state: PersistedState;
  attempts: number;
  lastError?: string;
  enrichedAt?: Date;
}

export interface Comment {
  id: string;
  postId: string; // platform:postExternalId
  externalId: string;
  platform: Platform;
  postCaption?: string;
  postSubject?: string;
  postUrl?: string;
  author: string;
  text: string;
  postedAt: Date;
  likeCount: number;
  replyCount: number;
  threadDepth?: number;
  raw?: Record<string, unknown>;
  enrichment: EnrichmentStatus;
}

export interface PostContext {
  caption: string;
  subject?: string;
  platform: Platform;
}
