import { EntityCatalog } from "../server/catalog";
import { NERService, type RecognizedName } from "../server/ner";
import type { SignalScorer } from "../server/scoring/port";
import type { NormalizedComment } from "../server/types/comments";
import type { ScoreRequest, ScoreResult } from "../server/types/signals";

export const TEST_ENTITIES = [
  { id: "ent-blake", canonicalName: "Blake Lively", kind: "person", aliases: ["Blake"] },
  { id: "ent-ryan", canonicalName: "Ryan Reynolds", kind: "person", aliases: ["Ryan"] },
  { id: "ent-justin", canonicalName: "Justin Baldoni", kind: "person", aliases: ["Baldoni"] },
  { id: "ent-iewu", canonicalName: "It Ends With Us", kind: "show", aliases: ["IEWU"] },
];

export function testCatalog(): EntityCatalog {
  return EntityCatalog.fromEntities(TEST_ENTITIES);
}

let sequence = 0;

export function makeComment(overrides: Partial<NormalizedComment> = {}): NormalizedComment {
  sequence++;
  return {
    platform: "instagram",
    postExternalId: "post-1",
    postCaption: "",
    commentExternalId: `c-${sequence}`,
    author: "someone",
    text: "",
    postedAt: new Date("2024-08-10T12:00:00Z"),
    likeCount: 0,
    ...overrides,
  };
}

export function scoreResult(overrides: Partial<ScoreResult> = {}): ScoreResult {
  return {
    source: "stub-v1",
    confidence: 0.9,
    entities: {},
    overallSentiment: 0,
    topics: [],
    sarcasm: false,
    discoveries: [],
    ...overrides,
  };
}

/** Scorer driven by a function; records every request it sees. */
export class StubScorer implements SignalScorer {
  readonly name = "stub";
  readonly requests: ScoreRequest[] = [];

  constructor(private readonly respond: (request: ScoreRequest) => ScoreResult | Promise<ScoreResult>) {}

  async score(request: ScoreRequest): Promise<ScoreResult> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** NER stand-in that always returns the same names. */
export class FixedNER extends NERService {
  constructor(private readonly names: RecognizedName[] = []) {
    super();
  }

  override extractEntities(): RecognizedName[] {
    return this.names;
  }
}
