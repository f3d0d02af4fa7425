import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const bool = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().int().positive().default(3001),

  MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017/comment_signals"),
  MONGODB_TRANSACTIONS: bool.default("false"),

  SCORING_BACKEND: z.enum(["lexicon", "remote", "hybrid"]).default("lexicon"),
  MODEL_API_KEY: z.string().optional(),
  MODEL_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  MODEL_NAME: z.string().min(1).default("gpt-4o-mini"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  HYBRID_ESCALATE_BELOW: z.coerce.number().min(0).max(1).default(0.7),
  HYBRID_NEUTRAL_BAND: z.coerce.number().min(0).max(1).default(0.2),

  CATALOG_PATH: z.string().min(1).default("config/entities.json"),
  AUTO_COMMIT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.7),
  BATCH_SIZE: z.coerce.number().int().positive().default(50),
  SCORING_CONCURRENCY: z.coerce.number().int().positive().default(4),
  SCORING_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  ENABLE_STANCE_SIGNALS: bool.default("false"),
  DISCOVERY_SAMPLE_CAP: z.coerce.number().int().positive().default(10),

  VELOCITY_ALERT_PERCENT: z.coerce.number().positive().default(30),
  VELOCITY_MIN_SAMPLES: z.coerce.number().int().positive().default(10),
  WINDOW_VELOCITY_MIN_SAMPLES: z.coerce.number().int().positive().default(5),
  VELOCITY_WINDOW_HOURS: z.coerce.number().int().positive().default(72),

  EXPORT_DIR: z.string().min(1).default("logs"),
});

export type ScoringBackend = z.infer<typeof envSchema>["SCORING_BACKEND"];

export interface EnrichmentSettings {
  autoCommitConfidence: number;
  batchSize: number;
  concurrency: number;
  retries: number;
  retryBaseDelayMs: number;
  enableStanceSignals: boolean;
  discoverySampleCap: number;
}

export interface AnalyticsSettings {
  alertPercent: number;
  minSamples: number;
  windowMinSamples: number;
  liveWindowHours: number;
}

export interface ScoringSettings {
  backend: ScoringBackend;
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  escalateBelow: number;
  neutralBand: number;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  logLevel: "debug" | "info" | "warn" | "error";
  port: number;
  mongo: { uri: string; transactions: boolean };
  catalogPath: string;
  exportDir: string;
  scoring: ScoringSettings;
  enrichment: EnrichmentSettings;
  analytics: AnalyticsSettings;
}

export const DEFAULT_ENRICHMENT: EnrichmentSettings = {
  autoCommitConfidence: 0.7,
  batchSize: 50,
  concurrency: 4,
  retries: 3,
  retryBaseDelayMs: 500,
  enableStanceSignals: false,
  discoverySampleCap: 10,
};

export const DEFAULT_ANALYTICS: AnalyticsSettings = {
  alertPercent: 30,
  minSamples: 10,
  windowMinSamples: 5,
  liveWindowHours: 72,
};

/**
 * Parse and validate the environment. Throws with every zod issue listed so a
 * bad deployment fails before any comment is touched.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }

  const e = parsed.data;
  if (e.SCORING_BACKEND !== "lexicon" && !e.MODEL_API_KEY) {
    throw new Error(
      `Invalid configuration:\n  - MODEL_API_KEY: required when SCORING_BACKEND=${e.SCORING_BACKEND}`
    );
  }

  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
    mongo: { uri: e.MONGODB_URI, transactions: e.MONGODB_TRANSACTIONS },
    catalogPath: e.CATALOG_PATH,
    exportDir: e.EXPORT_DIR,
    scoring: {
      backend: e.SCORING_BACKEND,
      apiKey: e.MODEL_API_KEY,
      baseUrl: e.MODEL_BASE_URL,
      model: e.MODEL_NAME,
      timeoutMs: e.MODEL_TIMEOUT_MS,
      escalateBelow: e.HYBRID_ESCALATE_BELOW,
      neutralBand: e.HYBRID_NEUTRAL_BAND,
    },
    enrichment: {
      autoCommitConfidence: e.AUTO_COMMIT_CONFIDENCE,
      batchSize: e.BATCH_SIZE,
      concurrency: e.SCORING_CONCURRENCY,
      retries: e.SCORING_RETRIES,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
      enableStanceSignals: e.ENABLE_STANCE_SIGNALS,
      discoverySampleCap: e.DISCOVERY_SAMPLE_CAP,
    },
    analytics: {
      alertPercent: e.VELOCITY_ALERT_PERCENT,
      minSamples: e.VELOCITY_MIN_SAMPLES,
      windowMinSamples: e.WINDOW_VELOCITY_MIN_SAMPLES,
      liveWindowHours: e.VELOCITY_WINDOW_HOURS,
    },
  };
}
