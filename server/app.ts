import { subDays } from "date-fns";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { z } from "zod";
import type { AnalyticsEngine } from "./analytics";
import type { EntityCatalog } from "./catalog";
import type { DiscoveredEntityTracker } from "./discovery";
import { ReviewStateError, errorMessage } from "./errors";
import { log } from "./log";
import type { ReviewService } from "./review";
import type { TimeWindow } from "./types/analytics";

export interface AppDeps {
  analytics: AnalyticsEngine;
  review: ReviewService;
  tracker: DiscoveredEntityTracker;
  loadCatalog: () => Promise<EntityCatalog>;
  production?: boolean;
  logRequests?: boolean;
  now?: () => Date;
}

class BadRequestError extends Error {}

const DEFAULT_WINDOW_DAYS = 7;

const windowSchema = z.object({
  start: z.coerce.date().optional(),
  end: z.coerce.date().optional(),
});

const resolveSchema = z.object({
  decision: z.enum(["accepted", "rejected"]),
  reviewer: z.string().min(1),
  entityId: z.string().min(1).optional(),
});

const dispositionSchema = z.object({
  disposition: z.enum(["promoted", "ignored"]),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}

function intParam(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** Positive integer query value, or undefined so the engine's configured default applies. */
function optionalIntParam(value: string | undefined): number | undefined {
  const n = Number(value);
  return value !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}

function listParam(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(",").map((v) => v.trim()).filter((v) => v.length > 0);
  return items.length > 0 ? items : undefined;
}

/** Read-only reporting API. Review and discovery triage are the only writes. */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const now = deps.now ?? (() => new Date());

  const windowFrom = (c: Context): TimeWindow => {
    const { start, end } = parseOrThrow(windowSchema, c.req.query());
    const resolvedEnd = end ?? now();
    const resolvedStart = start ?? subDays(resolvedEnd, DEFAULT_WINDOW_DAYS);
    if (resolvedStart >= resolvedEnd) {
      throw new BadRequestError("start must be before end");
    }
    return { start: resolvedStart, end: resolvedEnd };
  };

  if (deps.logRequests ?? true) app.use("*", logger());

  app.use(
    "*",
    cors({
      origin: deps.production ? "*" : ["http://localhost:3000", "http://localhost:5173"],
      credentials: true,
    })
  );

  app.onError((error, c) => {
    if (error instanceof BadRequestError) {
      return c.json({ success: false, error: error.message }, 400);
    }
    if (error instanceof ReviewStateError) {
      return c.json({ success: false, error: error.message }, 409);
    }
    log.error(`Unhandled API error on ${c.req.path}: ${errorMessage(error)}`);
    return c.json({ success: false, error: "Internal server error" }, 500);
  });

  app.get("/health", (c) =>
    c.json({
      status: "OK",
      timestamp: now().toISOString(),
      message: "Comment signals API is running",
    })
  );

  app.get("/api/entities", async (c) => {
    const catalog = await deps.loadCatalog();
    return c.json({ success: true, data: catalog.active() });
  });

  app.get("/api/analytics/top-entities", async (c) => {
    const data = await deps.analytics.getTopEntities(windowFrom(c), {
      platforms: listParam(c.req.query("platforms")),
      limit: intParam(c.req.query("limit"), 20),
    });
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/velocity/:entityId", async (c) => {
    const data = await deps.analytics.computeLiveVelocity(c.req.param("entityId"), {
      windowHours: optionalIntParam(c.req.query("windowHours")),
      minSamples: optionalIntParam(c.req.query("minSamples")),
      now: now(),
    });
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/window-velocity/:entityId", async (c) => {
    const data = await deps.analytics.computeWindowVelocity(c.req.param("entityId"), windowFrom(c));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/what-changed", async (c) => {
    const data = await deps.analytics.getWhatChanged(windowFrom(c), {
      platforms: listParam(c.req.query("platforms")),
    });
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/emotions", async (c) => {
    const data = await deps.analytics.getEmotionDistribution(windowFrom(c), c.req.query("entityId"));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/stance/:entityId", async (c) => {
    const data = await deps.analytics.getStanceBreakdown(c.req.param("entityId"), windowFrom(c));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/topics", async (c) => {
    const data = await deps.analytics.getTopTopics(windowFrom(c), intParam(c.req.query("limit"), 10));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/toxicity", async (c) => {
    const threshold = Number(c.req.query("threshold") ?? "0.7");
    const data = await deps.analytics.getToxicityAlerts(
      windowFrom(c),
      Number.isFinite(threshold) ? threshold : 0.7,
      intParam(c.req.query("limit"), 20)
    );
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/sentiment-distribution", async (c) => {
    const data = await deps.analytics.getSentimentDistribution(windowFrom(c), c.req.query("entityId"));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/history/:entityId", async (c) => {
    const data = await deps.analytics.getEntitySentimentHistory(c.req.param("entityId"), windowFrom(c));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/compare", async (c) => {
    const ids = listParam(c.req.query("ids"));
    if (!ids) throw new BadRequestError("ids is required");
    const data = await deps.analytics.getEntityComparison(ids, windowFrom(c));
    return c.json({ success: true, data });
  });

  app.get("/api/analytics/top-comments/:entityId", async (c) => {
    const data = await deps.analytics.getTopCommentsForEntity(
      c.req.param("entityId"),
      windowFrom(c),
      intParam(c.req.query("limit"), 10)
    );
    return c.json({ success: true, data });
  });

  app.get("/api/review", async (c) => {
    const data = await deps.review.pending(intParam(c.req.query("limit"), 50));
    return c.json({ success: true, data });
  });

  app.post("/api/review/:id/resolve", async (c) => {
    const body = parseOrThrow(resolveSchema, await c.req.json().catch(() => null));
    const data = await deps.review.resolve(c.req.param("id"), body);
    return c.json({ success: true, data });
  });

  app.get("/api/discovered", async (c) => {
    const data = await deps.tracker.topUnreviewed(
      intParam(c.req.query("minMentions"), 3),
      intParam(c.req.query("limit"), 50)
    );
    return c.json({ success: true, data });
  });

  app.post("/api/discovered/:name/disposition", async (c) => {
    const { disposition } = parseOrThrow(dispositionSchema, await c.req.json().catch(() => null));
    const data = await deps.tracker.markReviewed(c.req.param("name"), disposition);
    if (!data) {
      return c.json({ success: false, error: "Discovered entity not found" }, 404);
    }
    return c.json({ success: true, data });
  });

  app.notFound((c) => c.json({ success: false, error: "Not found" }, 404));

  return app;
}
