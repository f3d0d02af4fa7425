import { describe, it, expect } from "vitest";
import { AnalyticsEngine } from "../server/analytics";
import { MemorySignalStore, commentKey } from "../server/storage/signalStore";
import type { LiveVelocity } from "../server/types/analytics";
import type { SignalDraft } from "../server/types/signals";
import { makeComment } from "./helpers";

let counter = 0;

function draft(overrides: Partial<SignalDraft> & { at: string }): SignalDraft {
  counter++;
  const { at, ...rest } = overrides;
  return {
    commentId: `instagram:s-${counter}`,
    entityId: "ent-blake",
    entityName: "Blake Lively",
    kind: "sentiment",
    value: "",
    numericValue: 0,
    weight: 1,
    confidence: 0.9,
    source: "stub-v1",
    commentPostedAt: new Date(at),
    platform: "instagram",
    likeCount: 0,
    ...rest,
  };
}

async function storeWith(signals: SignalDraft[]): Promise<MemorySignalStore> {
  const store = new MemorySignalStore();
  await store.commitBatch({ signals, reviewItems: [], states: [] });
  return store;
}

function velocity(percentChange: number): LiveVelocity {
  return {
    ok: true,
    mode: "live",
    entityId: "ent-blake",
    recentSentiment: 0,
    previousSentiment: 0,
    percentChange,
    recentSampleSize: 10,
    previousSampleSize: 10,
    alert: Math.abs(percentChange) > 30,
    direction: percentChange > 0 ? "up" : percentChange < 0 ? "down" : "flat",
    windowHours: 72,
    calculatedAt: new Date("2024-08-20T00:00:00Z"),
  };
}

const august = { start: new Date("2024-08-01T00:00:00Z"), end: new Date("2024-09-01T00:00:00Z") };

describe("computeLiveVelocity", () => {
  const now = new Date("2024-08-20T00:00:00Z");

  it("compares the last window with the one before it", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-17T23:00:00Z", numericValue: -1 }),
      draft({ at: "2024-08-18T06:00:00Z", numericValue: 0.5 }),
      draft({ at: "2024-08-18T12:00:00Z", numericValue: 0.5 }),
      draft({ at: "2024-08-18T18:00:00Z", numericValue: 0.5 }),
      draft({ at: "2024-08-19T00:00:00Z", numericValue: 0.2 }),
      draft({ at: "2024-08-19T12:00:00Z", numericValue: 0.2 }),
      draft({ at: "2024-08-19T20:00:00Z", numericValue: 0.2 }),
    ]);
    const analytics = new AnalyticsEngine(store);

    const result = await analytics.computeLiveVelocity("ent-blake", { windowHours: 24, minSamples: 3, now });

    expect(result).toEqual({
      ok: true,
      mode: "live",
      entityId: "ent-blake",
      recentSentiment: 0.2,
      previousSentiment: 0.5,
      percentChange: -60,
      recentSampleSize: 3,
      previousSampleSize: 3,
      alert: true,
      direction: "down",
      windowHours: 24,
      calculatedAt: now,
    });
  });

  it("reports insufficient data below the sample minimum", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-19T10:00:00Z", numericValue: 0.4 }),
      draft({ at: "2024-08-19T11:00:00Z", numericValue: 0.4 }),
    ]);
    const analytics = new AnalyticsEngine(store);

    const result = await analytics.computeLiveVelocity("ent-blake", { windowHours: 24, minSamples: 3, now });

    expect(result).toEqual({
      ok: false,
      reason: "insufficient_data",
      entityId: "ent-blake",
      recentCount: 2,
      previousCount: 0,
      minRequired: 3,
    });
  });

  it("reports no change when the previous mean is zero", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-18T06:00:00Z", numericValue: 0.5 }),
      draft({ at: "2024-08-18T07:00:00Z", numericValue: -0.5 }),
      draft({ at: "2024-08-18T08:00:00Z", numericValue: 0 }),
      draft({ at: "2024-08-19T06:00:00Z", numericValue: 0.3 }),
      draft({ at: "2024-08-19T07:00:00Z", numericValue: 0.3 }),
      draft({ at: "2024-08-19T08:00:00Z", numericValue: 0.3 }),
    ]);
    const analytics = new AnalyticsEngine(store);

    const result = await analytics.computeLiveVelocity("ent-blake", { windowHours: 24, minSamples: 3, now });

    expect(result).toMatchObject({ ok: true, percentChange: 0, alert: false, direction: "flat" });
  });
});

describe("computeWindowVelocity", () => {
  it("splits the period at its midpoint", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-02T00:00:00Z", numericValue: 0.6 }),
      draft({ at: "2024-08-03T00:00:00Z", numericValue: 0.4 }),
      draft({ at: "2024-08-06T00:00:00Z", numericValue: -0.2 }),
      draft({ at: "2024-08-09T00:00:00Z", numericValue: -0.4 }),
      draft({ at: "2024-08-11T00:00:00Z", numericValue: 1 }),
    ]);
    const analytics = new AnalyticsEngine(store);
    const window = { start: new Date("2024-08-01T00:00:00Z"), end: new Date("2024-08-11T00:00:00Z") };

    const result = await analytics.computeWindowVelocity("ent-blake", window, { minSamples: 2 });

    expect(result).toMatchObject({
      ok: true,
      mode: "window",
      previousSentiment: 0.5,
      recentSentiment: -0.3,
      percentChange: -160,
      previousSampleSize: 2,
      recentSampleSize: 2,
      alert: true,
      midpoint: new Date("2024-08-06T00:00:00Z"),
    });
  });

  it("uses the window sample minimum by default", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-02T00:00:00Z", numericValue: 0.6 }),
      draft({ at: "2024-08-09T00:00:00Z", numericValue: -0.4 }),
    ]);
    const analytics = new AnalyticsEngine(store);
    const window = { start: new Date("2024-08-01T00:00:00Z"), end: new Date("2024-08-11T00:00:00Z") };

    expect(await analytics.computeWindowVelocity("ent-blake", window)).toMatchObject({
      ok: false,
      minRequired: 5,
    });
  });
});

describe("classifyTrend", () => {
  const analytics = new AnalyticsEngine(new MemorySignalStore());
  const insufficient = {
    ok: false as const,
    reason: "insufficient_data" as const,
    entityId: "ent-blake",
    recentCount: 1,
    previousCount: 1,
    minRequired: 10,
  };

  it("calls a negative but improving entity recovering", () => {
    expect(analytics.classifyTrend(-0.5, velocity(40))).toBe("recovering");
    expect(analytics.classifyTrend(-0.5, velocity(10))).toBe("recovering");
  });

  it("separates risers from fallers on large moves", () => {
    expect(analytics.classifyTrend(0.2, velocity(40))).toBe("riser");
    expect(analytics.classifyTrend(0.6, velocity(-40))).toBe("faller");
  });

  it("falls back to the mean without a usable velocity", () => {
    expect(analytics.classifyTrend(-0.5, insufficient)).toBe("newly_negative");
    expect(analytics.classifyTrend(0.6, velocity(5))).toBe("newly_positive");
    expect(analytics.classifyTrend(0.1, velocity(5))).toBe("stable");
  });
});

describe("aggregates", () => {
  it("ranks entities by mentions with engagement-weighted sentiment", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", numericValue: 0.8 }),
      draft({ at: "2024-08-10T01:00:00Z", numericValue: -0.4, weight: 6, likeCount: 500 }),
      draft({ at: "2024-08-10T02:00:00Z", entityId: "ent-ryan", entityName: "Ryan Reynolds", numericValue: 0.5 }),
      draft({ at: "2024-08-10T03:00:00Z", entityId: null, entityName: null, numericValue: -0.9 }),
      draft({ at: "2024-08-10T04:00:00Z", kind: "emotion", value: "joy", numericValue: null }),
    ]);
    const analytics = new AnalyticsEngine(store);

    const rows = await analytics.getTopEntities(august);

    expect(rows).toEqual([
      {
        entityId: "ent-blake",
        entityName: "Blake Lively",
        mentionCount: 2,
        signalCount: 2,
        avgSentiment: 0.2,
        weightedSentiment: -0.2286,
        totalLikes: 500,
      },
      {
        entityId: "ent-ryan",
        entityName: "Ryan Reynolds",
        mentionCount: 1,
        signalCount: 1,
        avgSentiment: 0.5,
        weightedSentiment: 0.5,
        totalLikes: 0,
      },
    ]);
  });

  it("buckets sentiment by label", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", numericValue: 0.8 }),
      draft({ at: "2024-08-10T01:00:00Z", numericValue: -0.4 }),
      draft({ at: "2024-08-10T02:00:00Z", numericValue: 0.5 }),
    ]);

    expect(await new AnalyticsEngine(store).getSentimentDistribution(august)).toEqual({
      "Strongly Positive": 1,
      Positive: 1,
      Neutral: 0,
      Negative: 1,
      "Strongly Negative": 0,
    });
  });

  it("groups history by UTC day", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T23:30:00Z", numericValue: 0.8, likeCount: 4 }),
      draft({ at: "2024-08-10T10:00:00Z", numericValue: 0.4, likeCount: 6 }),
      draft({ at: "2024-08-11T00:30:00Z", numericValue: -0.2 }),
    ]);

    expect(await new AnalyticsEngine(store).getEntitySentimentHistory("ent-blake", august)).toEqual([
      { date: "2024-08-10", avgSentiment: 0.6, mentionCount: 2, totalLikes: 10 },
      { date: "2024-08-11", avgSentiment: -0.2, mentionCount: 1, totalLikes: 0 },
    ]);
  });

  it("compares entities side by side", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", numericValue: 0.8 }),
      draft({ at: "2024-08-10T01:00:00Z", numericValue: -0.4 }),
    ]);

    const rows = await new AnalyticsEngine(store).getEntityComparison(["ent-blake", "ent-ryan"], august);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      entityId: "ent-blake",
      minSentiment: -0.4,
      maxSentiment: 0.8,
      avgSentiment: 0.2,
      sentimentStddev: 0.6,
    });
  });

  it("counts each topic tag separately", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", entityId: null, kind: "topic", value: "lawsuit, casting", numericValue: null }),
      draft({ at: "2024-08-10T01:00:00Z", entityId: null, kind: "topic", value: "lawsuit", numericValue: null }),
    ]);

    expect(await new AnalyticsEngine(store).getTopTopics(august)).toEqual([
      { value: "lawsuit", count: 2, percentage: 66.7 },
      { value: "casting", count: 1, percentage: 33.3 },
    ]);
  });

  it("counts emotions and stances", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", kind: "emotion", value: "anger", numericValue: null }),
      draft({ at: "2024-08-10T01:00:00Z", kind: "emotion", value: "anger", numericValue: null }),
      draft({ at: "2024-08-10T02:00:00Z", kind: "emotion", value: "joy", numericValue: null }),
      draft({ at: "2024-08-10T03:00:00Z", kind: "stance", value: "oppose", numericValue: null }),
      draft({ at: "2024-08-10T04:00:00Z", kind: "stance", value: "support", numericValue: null }),
      draft({ at: "2024-08-10T05:00:00Z", kind: "stance", value: "oppose", numericValue: null }),
    ]);
    const analytics = new AnalyticsEngine(store);

    expect(await analytics.getEmotionDistribution(august, "ent-blake")).toEqual([
      { value: "anger", count: 2, percentage: 66.7 },
      { value: "joy", count: 1, percentage: 33.3 },
    ]);
    expect(await analytics.getStanceBreakdown("ent-blake", august)).toEqual({ support: 1, oppose: 2, neutral: 0 });
  });

  it("lists toxic comments by reach", async () => {
    const toxic = (at: string, numericValue: number, likeCount: number) =>
      draft({ at, entityId: null, kind: "toxicity", value: "high", numericValue, likeCount });
    const quiet = toxic("2024-08-10T00:00:00Z", 0.8, 10);
    const louder = toxic("2024-08-10T01:00:00Z", 0.9, 10);
    const mild = toxic("2024-08-10T02:00:00Z", 0.5, 1000);
    const viral = toxic("2024-08-10T03:00:00Z", 0.75, 50);
    const store = await storeWith([quiet, louder, mild, viral]);

    const alerts = await new AnalyticsEngine(store).getToxicityAlerts(august);

    expect(alerts.map((a) => a.commentId)).toEqual([viral.commentId, louder.commentId, quiet.commentId]);
  });

  it("lists what changed, skipping stable entities", async () => {
    const store = await storeWith([
      draft({ at: "2024-08-10T00:00:00Z", numericValue: -0.5 }),
      draft({ at: "2024-08-10T01:00:00Z", numericValue: -0.5 }),
      draft({ at: "2024-08-10T02:00:00Z", entityId: "ent-ryan", entityName: "Ryan Reynolds", numericValue: 0.1 }),
    ]);

    expect(await new AnalyticsEngine(store).getWhatChanged(august)).toEqual([
      {
        entityId: "ent-blake",
        entityName: "Blake Lively",
        classification: "newly_negative",
        avgSentiment: -0.5,
        mentionCount: 2,
        percentChange: null,
      },
    ]);
  });

  it("returns the most liked comments for an entity", async () => {
    const store = new MemorySignalStore();
    const popular = makeComment({ text: "Blake is iconic", likeCount: 300 });
    const modest = makeComment({ text: "Blake is fine", likeCount: 2 });
    await store.saveComments([popular, modest]);
    const popularId = commentKey(popular.platform, popular.commentExternalId);
    const modestId = commentKey(modest.platform, modest.commentExternalId);
    await store.commitBatch({
      signals: [
        draft({ at: "2024-08-10T12:00:00Z", commentId: modestId, numericValue: 0.1, likeCount: 2 }),
        draft({ at: "2024-08-10T12:00:00Z", commentId: popularId, numericValue: 0.9, likeCount: 300 }),
      ],
      reviewItems: [],
      states: [],
    });

    const rows = await new AnalyticsEngine(store).getTopCommentsForEntity("ent-blake", august);

    expect(rows.map((r) => [r.commentId, r.text, r.sentiment])).toEqual([
      [popularId, "Blake is iconic", 0.9],
      [modestId, "Blake is fine", 0.1],
    ]);
  });
});
