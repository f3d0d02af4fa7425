import { describe, it, expect } from "vitest";
import { NERService } from "../../server/ner";
import { EntityResolver } from "../../server/resolver";
import { LexiconScorer, detectEmotion, detectTopics, toxicityScore } from "../../server/scoring/lexicon";
import type { ScoreRequest } from "../../server/types/signals";
import { FixedNER, testCatalog } from "../helpers";

const resolver = new EntityResolver(testCatalog());

function request(text: string, likeCount = 0): ScoreRequest {
  const postContext = { caption: "", platform: "instagram" };
  return {
    text,
    postContext,
    candidates: resolver.resolve(text, postContext),
    engagement: { likeCount },
  };
}

describe("LexiconScorer", () => {
  const scorer = new LexiconScorer(new FixedNER([]));

  it("scores each entity from its own clause", async () => {
    const result = await scorer.score(request("I love Ryan but hate Blake"));

    expect(result.entities["Ryan Reynolds"]?.sentiment).toBeGreaterThan(0);
    expect(result.entities["Blake Lively"]?.sentiment).toBeLessThan(0);
    expect(result.entities["Ryan Reynolds"]?.mentioned).toBe(true);
    expect(result.confidence).toBeCloseTo(0.7, 5);
    expect(result.source).toBe("lexicon-v1");
  });

  it("keeps genuine questions neutral", async () => {
    const result = await scorer.score(request("Is it true that Blake did this?"));

    expect(result.entities["Blake Lively"]).toMatchObject({ sentiment: 0, confidence: 0.8, mentioned: true });
    expect(result.overallSentiment).toBe(0);
    expect(result.confidence).toBe(0.8);
    expect(result.sarcasm).toBe(false);
  });

  it("scores exclamations and statements that open like questions", async () => {
    const sentimentFor = async (text: string) =>
      (await scorer.score(request(text))).entities["Blake Lively"]?.sentiment ?? 0;

    expect(await sentimentFor("What a queen Blake is!")).toBeGreaterThan(0);
    expect(await sentimentFor("How amazing is Blake!")).toBeGreaterThan(0);
    expect(await sentimentFor("Will always love Blake.")).toBeGreaterThan(0);
    expect(await sentimentFor("Can't stand Blake, she is awful.")).toBeLessThan(0);
  });

  it("scores candidates absent from the text as unmentioned", async () => {
    const result = await scorer.score({
      ...request("Blake is amazing"),
      candidates: [
        {
          entityId: "ent-ryan",
          entityName: "Ryan Reynolds",
          matchedString: "Ryan",
          matchType: "alias",
          confidence: 0.9,
          ambiguous: false,
        },
      ],
    });

    expect(result.entities["Ryan Reynolds"]).toMatchObject({ sentiment: 0, mentioned: false });
  });

  it("flips a positive surface behind an irony marker", async () => {
    const result = await scorer.score(request("Great job Blake 🙄"));

    expect(result.sarcasm).toBe(true);
    expect(result.overallSentiment).toBeLessThan(0);
    expect(result.entities["Blake Lively"]?.sentiment).toBeLessThan(0);
  });

  it("reads sympathy as positive toward the person", async () => {
    const result = await scorer.score(request("I feel so bad for Blake"));
    expect(result.entities["Blake Lively"]?.sentiment).toBe(0.5);
  });

  it("does not let likes change the sentiment value", async () => {
    const quiet = await scorer.score(request("I love Blake, she is amazing", 0));
    const viral = await scorer.score(request("I love Blake, she is amazing", 500));

    expect(viral.entities["Blake Lively"]?.sentiment).toBe(quiet.entities["Blake Lively"]?.sentiment);
    expect(viral.overallSentiment).toBe(quiet.overallSentiment);
  });

  it("reports names the catalog does not cover", async () => {
    const withNer = new LexiconScorer(
      new FixedNER([
        { text: "Colleen Hoover", normalizedText: "colleen hoover", kind: "person", confidence: 0.8 },
        { text: "Blake", normalizedText: "blake", kind: "person", confidence: 0.8 },
      ])
    );

    const result = await withNer.score(request("Colleen Hoover wrote it and Blake ruined it"));
    expect(result.discoveries).toEqual([{ name: "Colleen Hoover", kind: "person" }]);
  });
});

describe("lexicon helpers", () => {
  it("detects topics by keyword", () => {
    expect(detectTopics("Blake is a clown and this lawsuit is garbage")).toEqual(["lawsuit"]);
  });

  it("scores toxicity by abusive terms", () => {
    expect(toxicityScore("Blake is a clown and this lawsuit is garbage")).toBeCloseTo(0.7, 5);
    expect(toxicityScore("What a lovely dress")).toBe(0);
  });

  it("picks the dominant emotion", () => {
    expect(detectEmotion("I love this so much, so happy")).toBe("joy");
    expect(detectEmotion("the weather report")).toBeUndefined();
  });
});

describe("NERService", () => {
  it("returns nothing for blank text", () => {
    expect(new NERService().extractEntities("   ")).toEqual([]);
  });

  it("drops stock-photo credits", () => {
    const names = new NERService().extractEntities("Photo by Getty Images").map((e) => e.text);
    expect(names).not.toContain("Getty Images");
  });
});
