export const ENTITY_KINDS = ["person", "show", "couple", "brand"] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export interface MonitoredEntity {
  id: string;
  canonicalName: string;
  displayName: string;
  kind: EntityKind;
  aliases: string[];
  active: boolean;
}

export type MatchType = "canonical" | "alias" | "fragment";

export interface CandidateMatch {
  entityId: string;
  entityName: string; // canonical name of the owning entity
  matchedString: string; // exact slice of the comment text that matched
  matchType: MatchType;
  confidence: number; // 0-1
  ambiguous: boolean;
}

export type DiscoveryDisposition = "promoted" | "ignored";

export interface DiscoveredEntity {
  id: string;
  name: string;
  normalizedName: string;
  kind: EntityKind;
  firstSeenAt: Date;
  lastSeenAt: Date;
  mentionCount: number;
  samples: string[]; // capped, oldest kept
  reviewed: boolean;
  disposition?: DiscoveryDisposition;
  reviewedAt?: Date;
}

export interface DiscoverySighting {
  name: string;
  normalizedName: string;
  kind: EntityKind;
  seenAt: Date;
  count: number;
  samples: string[];
}
