import { AxiosError, AxiosHeaders } from "axios";
import { describe, it, expect } from "vitest";
import { ScoringError } from "../../server/errors";
import { EntityResolver } from "../../server/resolver";
import { RemoteModelScorer, type ChatRequest, type ChatTransport } from "../../server/scoring/remote";
import type { ScoreRequest } from "../../server/types/signals";
import { testCatalog } from "../helpers";

const resolver = new EntityResolver(testCatalog());

function request(text: string, caption = ""): ScoreRequest {
  const postContext = { caption, platform: "instagram" };
  return { text, postContext, candidates: resolver.resolve(text, postContext), engagement: { likeCount: 12 } };
}

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

function scorerWith(transport: ChatTransport): RemoteModelScorer {
  return new RemoteModelScorer({
    apiKey: "test-secret",
    baseUrl: "http://localhost:0",
    model: "test-model",
    timeoutMs: 1000,
    transport,
  });
}

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, null, {
    status,
    statusText: "",
    data: {},
    headers: {},
    config,
  });
}

async function scoringFailure(promise: Promise<unknown>): Promise<ScoringError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ScoringError) return error;
    throw error;
  }
  throw new Error("expected a ScoringError");
}

describe("RemoteModelScorer", () => {
  it("sends the candidates and comment to the model", async () => {
    const sent: ChatRequest[] = [];
    const scorer = scorerWith(async (req) => {
      sent.push(req);
      return completion(
        JSON.stringify({
          confidence: 0.9,
          entities: { "Blake Lively": { sentiment: 0.8, mentioned: true } },
          overallSentiment: 0.8,
        })
      );
    });

    await scorer.score(request("Blake is amazing", "Premiere night"));

    expect(sent).toHaveLength(1);
    expect(sent[0]?.model).toBe("test-model");
    expect(sent[0]?.response_format).toEqual({ type: "json_object" });
    const user = sent[0]?.messages.find((m) => m.role === "user")?.content ?? "";
    expect(user).toContain('- Blake Lively (written as "Blake")');
    expect(user).toContain("Post caption: Premiere night");
    expect(user).toContain("Comment: Blake is amazing");
  });

  it("parses a valid response and fills defaults", async () => {
    const scorer = scorerWith(async () =>
      completion(
        JSON.stringify({
          confidence: 0.85,
          entities: { "Blake Lively": { sentiment: 0.8, stance: "support", mentioned: true } },
          overallSentiment: 0.7,
          emotion: "joy",
        })
      )
    );

    const result = await scorer.score(request("Blake is amazing"));

    expect(result.source).toBe("remote:test-model");
    expect(result.confidence).toBe(0.85);
    expect(result.entities["Blake Lively"]).toEqual({ sentiment: 0.8, stance: "support", mentioned: true });
    expect(result.topics).toEqual([]);
    expect(result.sarcasm).toBe(false);
    expect(result.discoveries).toEqual([]);
  });

  it("zeroes entities the comment never mentions", async () => {
    const scorer = scorerWith(async () =>
      completion(
        JSON.stringify({
          confidence: 0.9,
          entities: {
            "Blake Lively": { sentiment: 0.8, mentioned: true },
            "Ryan Reynolds": { sentiment: 0.6, stance: "support", mentioned: true },
          },
          overallSentiment: 0.8,
        })
      )
    );

    const result = await scorer.score(request("Blake is amazing"));

    expect(result.entities["Blake Lively"]?.sentiment).toBe(0.8);
    expect(result.entities["Ryan Reynolds"]).toEqual({ sentiment: 0, stance: "neutral", mentioned: false });
  });

  it("holds genuine questions to zero", async () => {
    const scorer = scorerWith(async () =>
      completion(
        JSON.stringify({
          confidence: 0.9,
          entities: { "Blake Lively": { sentiment: -0.6, mentioned: true } },
          overallSentiment: -0.6,
        })
      )
    );

    const result = await scorer.score(request("Is it true that Blake did this?"));

    expect(result.entities["Blake Lively"]?.sentiment).toBe(0);
    expect(result.overallSentiment).toBe(0);
  });

  it("keeps the model's reading of exclamations and statements", async () => {
    const reply = (sentiment: number) =>
      scorerWith(async () =>
        completion(
          JSON.stringify({
            confidence: 0.9,
            entities: { "Blake Lively": { sentiment, mentioned: true } },
            overallSentiment: sentiment,
          })
        )
      );

    const exclamation = await reply(0.9).score(request("What a queen Blake is!"));
    const statement = await reply(-0.8).score(request("Can't stand Blake."));

    expect(exclamation.entities["Blake Lively"]?.sentiment).toBe(0.9);
    expect(exclamation.overallSentiment).toBe(0.9);
    expect(statement.entities["Blake Lively"]?.sentiment).toBe(-0.8);
  });

  it("clamps out-of-range sentiment", async () => {
    const scorer = scorerWith(async () =>
      completion(
        JSON.stringify({
          confidence: 0.9,
          entities: { "Blake Lively": { sentiment: 3, mentioned: true } },
          overallSentiment: -2,
        })
      )
    );

    const result = await scorer.score(request("Blake is amazing"));

    expect(result.entities["Blake Lively"]?.sentiment).toBe(1);
    expect(result.overallSentiment).toBe(-1);
  });

  it("rejects invalid JSON as malformed", async () => {
    const error = await scoringFailure(scorerWith(async () => completion("not json")).score(request("Blake")));
    expect(error.reason).toBe("malformed");
  });

  it("rejects an empty completion as malformed", async () => {
    const error = await scoringFailure(scorerWith(async () => completion(null)).score(request("Blake")));
    expect(error.reason).toBe("malformed");
  });

  it("rejects a response missing required fields", async () => {
    const scorer = scorerWith(async () => completion(JSON.stringify({ entities: {} })));
    const error = await scoringFailure(scorer.score(request("Blake")));
    expect(error.reason).toBe("malformed");
    expect(error.message).toContain("confidence");
  });

  it("maps rate limiting to a transient quota failure", async () => {
    const scorer = scorerWith(async () => {
      throw httpError(429);
    });

    const error = await scoringFailure(scorer.score(request("Blake")));
    expect(error.reason).toBe("quota");
    expect(error.transient).toBe(true);
  });

  it("treats other client errors as permanent", async () => {
    const scorer = scorerWith(async () => {
      throw httpError(401);
    });

    const error = await scoringFailure(scorer.score(request("Blake")));
    expect(error.reason).toBe("unavailable");
    expect(error.transient).toBe(false);
  });

  it("maps aborted requests to timeouts", async () => {
    const scorer = scorerWith(async () => {
      throw new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED");
    });

    const error = await scoringFailure(scorer.score(request("Blake")));
    expect(error.reason).toBe("timeout");
  });
});
