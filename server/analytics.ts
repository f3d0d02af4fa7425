import { addMilliseconds, differenceInMilliseconds, subHours } from "date-fns";
import { DEFAULT_ANALYTICS, type AnalyticsSettings } from "./config";
import { extent, mean, round, sentimentLabel, stddev, weightedMean } from "./sentiment";
import type { SignalQuery, SignalStore } from "./storage/signalStore";
import type {
  EntityComparisonRow,
  InsufficientData,
  LiveVelocityResult,
  SentimentHistoryPoint,
  TimeWindow,
  ToxicityAlert,
  TopEntityRow,
  TrendClass,
  VelocityMeasurement,
  WhatChangedRow,
  WindowVelocityResult,
} from "./types/analytics";
import type { ExtractedSignal, SentimentLabel, Stance } from "./types/signals";

const NEGATIVE_MEAN = -0.3;
const POSITIVE_MEAN = 0.5;

export interface TopEntitiesOptions {
  platforms?: string[];
  limit?: number;
}

export interface LiveVelocityOptions {
  windowHours?: number;
  minSamples?: number;
  now?: Date;
}

export interface CountRow {
  value: string;
  count: number;
  percentage: number;
}

export interface TopCommentRow {
  commentId: string;
  text: string;
  likeCount: number;
  sentiment: number;
  platform: string;
  postedAt: Date;
}

function countRows(values: string[]): CountRow[] {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  const total = values.length;
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count, percentage: round((count / total) * 100, 1) }))
    .sort((a, b) => b.count - a.count || a.value.localeCompare(b.value));
}

function numeric(signals: ExtractedSignal[]): number[] {
  return signals.flatMap((s) => (s.numericValue === null ? [] : [s.numericValue]));
}

function distinctLikes(signals: ExtractedSignal[]): number {
  const likes = new Map<string, number>();
  for (const s of signals) likes.set(s.commentId, s.likeCount);
  return [...likes.values()].reduce((sum, n) => sum + n, 0);
}

/**
 * Read-only aggregation over the signal store. Windows are half-open on the
 * comment's posted time; only numeric sentiment feeds the sentiment metrics.
 */
export class AnalyticsEngine {
  private readonly settings: AnalyticsSettings;

  constructor(
    private readonly store: SignalStore,
    settings: Partial<AnalyticsSettings> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.settings = { ...DEFAULT_ANALYTICS, ...settings };
  }

  private sentimentSignals(query: Omit<SignalQuery, "kinds" | "numericOnly">): Promise<ExtractedSignal[]> {
    return this.store.findSignals({ ...query, kinds: ["sentiment"], numericOnly: true });
  }

  async getTopEntities(window: TimeWindow, options: TopEntitiesOptions = {}): Promise<TopEntityRow[]> {
    const signals = await this.sentimentSignals({
      window,
      platforms: options.platforms,
      targeted: true,
    });

    const byEntity = new Map<string, ExtractedSignal[]>();
    for (const signal of signals) {
      if (!signal.entityId) continue;
      const group = byEntity.get(signal.entityId) ?? [];
      group.push(signal);
      byEntity.set(signal.entityId, group);
    }

    const rows: TopEntityRow[] = [...byEntity.entries()].map(([entityId, group]) => ({
      entityId,
      entityName: group[0]?.entityName ?? entityId,
      mentionCount: new Set(group.map((s) => s.commentId)).size,
      signalCount: group.length,
      avgSentiment: round(mean(numeric(group))),
      weightedSentiment: round(
        weightedMean(group.map((s) => ({ value: s.numericValue ?? 0, weight: s.weight })))
      ),
      totalLikes: distinctLikes(group),
    }));

    return rows
      .sort((a, b) => b.mentionCount - a.mentionCount || b.signalCount - a.signalCount)
      .slice(0, options.limit ?? 20);
  }

  private measure(
    entityId: string,
    recent: number[],
    previous: number[],
    minSamples: number
  ): VelocityMeasurement | InsufficientData {
    if (recent.length < minSamples || previous.length < minSamples) {
      return {
        ok: false,
        reason: "insufficient_data",
        entityId,
        recentCount: recent.length,
        previousCount: previous.length,
        minRequired: minSamples,
      };
    }

    const recentMean = mean(recent);
    const previousMean = mean(previous);
    const percentChange =
      previousMean === 0 ? 0 : ((recentMean - previousMean) / Math.abs(previousMean)) * 100;

    return {
      ok: true,
      entityId,
      recentSentiment: round(recentMean, 3),
      previousSentiment: round(previousMean, 3),
      percentChange: round(percentChange, 1),
      recentSampleSize: recent.length,
      previousSampleSize: previous.length,
      alert: Math.abs(percentChange) > this.settings.alertPercent,
      direction: percentChange > 0 ? "up" : percentChange < 0 ? "down" : "flat",
    };
  }

  /**
   * Live velocity: compares [now - w, now] with [now - 2w, now - w).
   * Answers "is this changing right now".
   */
  async computeLiveVelocity(
    entityId: string,
    options: LiveVelocityOptions = {}
  ): Promise<LiveVelocityResult> {
    const windowHours = options.windowHours ?? this.settings.liveWindowHours;
    const minSamples = options.minSamples ?? this.settings.minSamples;
    const now = options.now ?? this.now();
    const recentStart = subHours(now, windowHours);
    const previousStart = subHours(now, windowHours * 2);

    const signals = await this.sentimentSignals({
      entityIds: [entityId],
      window: { start: previousStart, end: addMilliseconds(now, 1) },
    });

    const recent: number[] = [];
    const previous: number[] = [];
    for (const signal of signals) {
      if (signal.numericValue === null) continue;
      (signal.commentPostedAt < recentStart ? previous : recent).push(signal.numericValue);
    }

    const result = this.measure(entityId, recent, previous, minSamples);
    if (!result.ok) return result;
    return { ...result, mode: "live", windowHours, calculatedAt: now };
  }

  /**
   * Velocity inside a reporting period: first half [start, mid) against
   * second half [mid, end). Answers "did this change across the period".
   */
  async computeWindowVelocity(
    entityId: string,
    window: TimeWindow,
    options: { minSamples?: number } = {}
  ): Promise<WindowVelocityResult> {
    const minSamples = options.minSamples ?? this.settings.windowMinSamples;
    const midpoint = addMilliseconds(
      window.start,
      Math.floor(differenceInMilliseconds(window.end, window.start) / 2)
    );

    const signals = await this.sentimentSignals({ entityIds: [entityId], window });
    const first: number[] = [];
    const second: number[] = [];
    for (const signal of signals) {
      if (signal.numericValue === null) continue;
      (signal.commentPostedAt < midpoint ? first : second).push(signal.numericValue);
    }

    const result = this.measure(entityId, second, first, minSamples);
    if (!result.ok) return result;
    return { ...result, mode: "window", window, midpoint };
  }

  /**
   * Label an entity from its window mean and its velocity. The two are
   * independent: a negative mean that is improving is recovering.
   */
  classifyTrend(windowMean: number, velocity: LiveVelocityResult | WindowVelocityResult): TrendClass {
    if (velocity.ok && Math.abs(velocity.percentChange) > this.settings.alertPercent) {
      if (velocity.percentChange < 0) return "faller";
      return windowMean < 0 ? "recovering" : "riser";
    }
    if (windowMean < NEGATIVE_MEAN) {
      return velocity.ok && velocity.percentChange > 0 ? "recovering" : "newly_negative";
    }
    if (windowMean > POSITIVE_MEAN) return "newly_positive";
    return "stable";
  }

  /** Entities whose classification over the window is anything but stable. */
  async getWhatChanged(window: TimeWindow, options: TopEntitiesOptions = {}): Promise<WhatChangedRow[]> {
    const top = await this.getTopEntities(window, options);
    const rows: WhatChangedRow[] = [];

    for (const entity of top) {
      const velocity = await this.computeWindowVelocity(entity.entityId, window);
      const classification = this.classifyTrend(entity.avgSentiment, velocity);
      if (classification === "stable") continue;
      rows.push({
        entityId: entity.entityId,
        entityName: entity.entityName,
        classification,
        avgSentiment: entity.avgSentiment,
        mentionCount: entity.mentionCount,
        percentChange: velocity.ok ? velocity.percentChange : null,
      });
    }

    return rows.sort(
      (a, b) => Math.abs(b.percentChange ?? 0) - Math.abs(a.percentChange ?? 0)
    );
  }

  async getEmotionDistribution(window: TimeWindow, entityId?: string): Promise<CountRow[]> {
    const signals = await this.store.findSignals({
      kinds: ["emotion"],
      window,
      entityIds: entityId ? [entityId] : undefined,
    });
    return countRows(signals.map((s) => s.value));
  }

  async getStanceBreakdown(entityId: string, window: TimeWindow): Promise<Record<Stance, number>> {
    const signals = await this.store.findSignals({ kinds: ["stance"], window, entityIds: [entityId] });
    const breakdown: Record<Stance, number> = { support: 0, oppose: 0, neutral: 0 };
    for (const signal of signals) {
      if (signal.value === "support" || signal.value === "oppose" || signal.value === "neutral") {
        breakdown[signal.value]++;
      }
    }
    return breakdown;
  }

  /** Topic signals hold comma-joined tags; each tag is counted on its own. */
  async getTopTopics(window: TimeWindow, limit = 10): Promise<CountRow[]> {
    const signals = await this.store.findSignals({ kinds: ["topic"], window });
    const tags = signals.flatMap((s) =>
      s.value
        .split(",")
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0)
    );
    return countRows(tags).slice(0, limit);
  }

  async getToxicityAlerts(window: TimeWindow, threshold = 0.7, limit = 20): Promise<ToxicityAlert[]> {
    const signals = await this.store.findSignals({ kinds: ["toxicity"], window, numericOnly: true });
    return signals
      .filter((s) => (s.numericValue ?? 0) >= threshold)
      .map((s) => ({
        commentId: s.commentId,
        toxicity: s.numericValue ?? 0,
        likeCount: s.likeCount,
        platform: s.platform,
      }))
      .sort((a, b) => b.likeCount - a.likeCount || b.toxicity - a.toxicity)
      .slice(0, limit);
  }

  async getSentimentDistribution(
    window: TimeWindow,
    entityId?: string
  ): Promise<Record<SentimentLabel, number>> {
    const signals = await this.sentimentSignals({
      window,
      entityIds: entityId ? [entityId] : undefined,
    });
    const distribution: Record<SentimentLabel, number> = {
      "Strongly Positive": 0,
      Positive: 0,
      Neutral: 0,
      Negative: 0,
      "Strongly Negative": 0,
    };
    for (const value of numeric(signals)) distribution[sentimentLabel(value)]++;
    return distribution;
  }

  /** Daily (UTC) buckets of mean sentiment for one entity. */
  async getEntitySentimentHistory(entityId: string, window: TimeWindow): Promise<SentimentHistoryPoint[]> {
    const signals = await this.sentimentSignals({ entityIds: [entityId], window });
    const days = new Map<string, ExtractedSignal[]>();
    for (const signal of signals) {
      const day = signal.commentPostedAt.toISOString().slice(0, 10);
      const bucket = days.get(day) ?? [];
      bucket.push(signal);
      days.set(day, bucket);
    }

    return [...days.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, bucket]) => ({
        date,
        avgSentiment: round(mean(numeric(bucket))),
        mentionCount: new Set(bucket.map((s) => s.commentId)).size,
        totalLikes: distinctLikes(bucket),
      }));
  }

  async getEntityComparison(entityIds: string[], window: TimeWindow): Promise<EntityComparisonRow[]> {
    const signals = await this.sentimentSignals({ entityIds, window });

    return entityIds.flatMap((entityId) => {
      const group = signals.filter((s) => s.entityId === entityId);
      if (group.length === 0) return [];
      const values = numeric(group);
      const { min, max } = extent(values);
      return [
        {
          entityId,
          entityName: group[0]?.entityName ?? entityId,
          mentionCount: new Set(group.map((s) => s.commentId)).size,
          avgSentiment: round(mean(values)),
          minSentiment: min,
          maxSentiment: max,
          sentimentStddev: round(stddev(values)),
          totalLikes: distinctLikes(group),
        },
      ];
    });
  }

  async getTopCommentsForEntity(
    entityId: string,
    window: TimeWindow,
    limit = 10
  ): Promise<TopCommentRow[]> {
    const signals = (await this.sentimentSignals({ entityIds: [entityId], window }))
      .sort((a, b) => b.likeCount - a.likeCount || a.commentId.localeCompare(b.commentId))
      .slice(0, limit);
    const comments = new Map(
      (await this.store.getComments(signals.map((s) => s.commentId))).map((c) => [c.id, c])
    );

    return signals.flatMap((signal) => {
      const comment = comments.get(signal.commentId);
      if (!comment) return [];
      return [
        {
          commentId: comment.id,
          text: comment.text,
          likeCount: comment.likeCount,
          sentiment: signal.numericValue ?? 0,
          platform: comment.platform,
          postedAt: comment.postedAt,
        },
      ];
    });
  }
}
