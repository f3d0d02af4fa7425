import type { CandidateMatch, EntityKind } from "./entities";
import type { PostContext } from "./comments";

export type SignalKind =
  | "sentiment"
  | "emotion"
  | "stance"
  | "topic"
  | "toxicity"
  | "sarcasm"
  | (string & {});

export type Stance = "support" | "oppose" | "neutral";

export type SentimentLabel =
  | "Strongly Positive"
  | "Positive"
  | "Neutral"
  | "Negative"
  | "Strongly Negative";

/** Everything needed to write one signal row. */
export interface SignalDraft {
  commentId: string;
  entityId: string | null;
  entityName: string | null;
  kind: SignalKind;
  value: string;
  numericValue: number | null;
  weight: number;
  confidence: number;
  source: string;
  commentPostedAt: Date;
  platform: string;
  likeCount: number;
}

export interface ExtractedSignal extends SignalDraft {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface EntityScore {
  sentiment: number; // -1..1
  confidence?: number;
  stance?: Stance;
  emotion?: string;
  mentioned: boolean;
}

export interface DiscoveredMention {
  name: string;
  kind: EntityKind;
}

export interface ScoreRequest {
  text: string;
  postContext: PostContext;
  candidates: CandidateMatch[];
  engagement: { likeCount: number };
}

export interface ScoreResult {
  source: string;
  confidence: number; // overall confidence of this scorer in its reading
  entities: Record<string, EntityScore>; // keyed by entity name
  overallSentiment: number;
  emotion?: string;
  topics: string[];
  toxicity?: number;
  sarcasm: boolean;
  discoveries: DiscoveredMention[];
}

export type ReviewState = "pending" | "accepted" | "rejected";

export interface ProposedSignal {
  kind: SignalKind;
  value: string;
  numericValue: number | null;
  weight: number;
  source: string;
}

export interface ReviewQueueItem {
  id: string;
  commentId: string;
  entityId: string | null;
  mention: string;
  context: string;
  postCaption?: string;
  proposed: ProposedSignal;
  confidence: number;
  possibleEntities: string[];
  reason: string;
  createdAt: Date;
  state: ReviewState;
  resolvedBy?: string;
  resolvedAt?: Date;
  resolvedEntityId?: string;
}

export type ReviewItemDraft = Omit<
  ReviewQueueItem,
  "id" | "createdAt" | "state" | "resolvedBy" | "resolvedAt" | "resolvedEntityId"
>;
