import { serve } from "@hono/node-server";
import { AnalyticsEngine } from "./analytics";
import { createApp } from "./app";
import { loadCatalogFile } from "./catalog";
import { loadConfig } from "./config";
import { DiscoveredEntityTracker } from "./discovery";
import { errorMessage } from "./errors";
import { log, setLogLevel } from "./log";
import { ReviewService } from "./review";
import { MongoSignalStore, connectMongo } from "./storage/mongoStore";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  await connectMongo(config.mongo.uri);
  const store = new MongoSignalStore({ transactions: config.mongo.transactions });
  const loadCatalog = () => loadCatalogFile(config.catalogPath);

  // Fail fast on a bad catalog before accepting requests
  await loadCatalog();

  const app = createApp({
    analytics: new AnalyticsEngine(store, config.analytics),
    review: new ReviewService(store, loadCatalog),
    tracker: new DiscoveredEntityTracker(store, config.enrichment.discoverySampleCap),
    loadCatalog,
    production: config.env === "production",
  });

  log.info(`🚀 Comment signals API starting on port ${config.port}`);
  log.info(`🎯 Available endpoints:`);
  log.info(`   GET  /health - Health check`);
  log.info(`   GET  /api/entities - Tracked entities`);
  log.info(`   GET  /api/analytics/* - Top entities, velocity, distributions`);
  log.info(`   GET  /api/review - Pending review items`);
  log.info(`   POST /api/review/:id/resolve - Accept or reject a review item`);
  log.info(`   GET  /api/discovered - Unreviewed discovered entities`);

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`✅ Server running on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  log.error(`Server failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
