export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface TopEntityRow {
  entityId: string;
  entityName: string;
  mentionCount: number; // distinct comments
  signalCount: number;
  avgSentiment: number;
  weightedSentiment: number;
  totalLikes: number;
}

export interface InsufficientData {
  ok: false;
  reason: "insufficient_data";
  entityId: string;
  recentCount: number;
  previousCount: number;
  minRequired: number;
}

export interface VelocityMeasurement {
  ok: true;
  entityId: string;
  recentSentiment: number;
  previousSentiment: number;
  percentChange: number;
  recentSampleSize: number;
  previousSampleSize: number;
  alert: boolean;
  direction: "up" | "down" | "flat";
}

export interface LiveVelocity extends VelocityMeasurement {
  mode: "live";
  windowHours: number;
  calculatedAt: Date;
}

export interface WindowVelocity extends VelocityMeasurement {
  mode: "window";
  window: TimeWindow;
  midpoint: Date;
}

export type LiveVelocityResult = LiveVelocity | InsufficientData;
export type WindowVelocityResult = WindowVelocity | InsufficientData;

export type TrendClass =
  | "riser"
  | "faller"
  | "recovering"
  | "newly_negative"
  | "newly_positive"
  | "stable";

export interface WhatChangedRow {
  entityId: string;
  entityName: string;
  classification: TrendClass;
  avgSentiment: number;
  mentionCount: number;
  percentChange: number | null;
}

export interface SentimentHistoryPoint {
  date: string; // yyyy-MM-dd
  avgSentiment: number;
  mentionCount: number;
  totalLikes: number;
}

export interface EntityComparisonRow {
  entityId: string;
  entityName: string;
  mentionCount: number;
  avgSentiment: number;
  minSentiment: number;
  maxSentiment: number;
  sentimentStddev: number;
  totalLikes: number;
}

export interface ToxicityAlert {
  commentId: string;
  toxicity: number;
  likeCount: number;
  platform: string;
}
