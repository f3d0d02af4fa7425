import { subDays } from "date-fns";
import { AnalyticsEngine } from "./server/analytics";
import { loadCatalogFile } from "./server/catalog";
import { loadConfig } from "./server/config";
import { DiscoveredEntityTracker } from "./server/discovery";
import { EnrichmentEngine } from "./server/enrichment";
import { errorMessage } from "./server/errors";
import { exportSnapshot } from "./server/exports";
import { loadCommentsFile } from "./server/ingest";
import { log, setLogLevel } from "./server/log";
import { createScorer } from "./server/scoring";
import { MongoSignalStore, connectMongo, disconnectMongo } from "./server/storage/mongoStore";

const commands = ["enrich", "export", "discovered"] as const;
type Command = (typeof commands)[number];

function isCommand(value: string | undefined): value is Command {
  return commands.some((command) => command === value);
}

function flag(name: string): string | undefined {
  const index = process.argv.indexOf(`--${name}`);
  return index === -1 ? undefined : process.argv[index + 1];
}

const commandArg = process.argv[2];

if (!isCommand(commandArg)) {
  console.error("❌ Usage: tsx index.ts <command> [options]");
  console.error("\nCommands:");
  console.error("  enrich      [--import comments.json] [--since YYYY-MM-DD] [--limit N]");
  console.error("  export      <label> [--days 7]");
  console.error("  discovered  [--min-mentions 3] [--limit 20]");
  process.exit(1);
}

async function run(command: Command): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  await connectMongo(config.mongo.uri);
  const store = new MongoSignalStore({ transactions: config.mongo.transactions });
  const loadCatalog = () => loadCatalogFile(config.catalogPath);

  try {
    if (command === "enrich") {
      const importPath = flag("import");
      if (importPath) {
        const records = await loadCommentsFile(importPath);
        const saved = await store.saveComments(records);
        log.info(`📥 Imported ${saved.created} new comments, refreshed ${saved.updated}`);
      }

      // Validate the catalog before the first batch
      await loadCatalog();

      const engine = new EnrichmentEngine({
        store,
        scorer: createScorer(config.scoring),
        loadCatalog,
        settings: config.enrichment,
      });

      const since = flag("since");
      const limit = flag("limit");
      const stats = await engine.enrich({
        since: since ? new Date(since) : undefined,
        limit: limit ? parseInt(limit, 10) : undefined,
      });

      console.log("\n📊 Enrichment summary:");
      console.log(`   💬 ${stats.commentsProcessed} comments in ${stats.batches} batches`);
      console.log(`   ✅ ${stats.committed} committed, 📝 ${stats.queuedForReview} queued for review`);
      console.log(`   ❌ ${stats.failed} failed comments, ${stats.failedBatches} failed batches`);
      console.log(`   🔍 ${stats.entitiesDiscovered} discovered names`);
      return;
    }

    if (command === "export") {
      const label = process.argv[3];
      if (!label || label.startsWith("--")) throw new Error("export needs a label");
      const days = parseInt(flag("days") ?? "7", 10);
      const end = new Date();
      const analytics = new AnalyticsEngine(store, config.analytics);
      await exportSnapshot(analytics, { start: subDays(end, days), end }, {
        exportDir: config.exportDir,
        label,
        now: end,
      });
      return;
    }

    const tracker = new DiscoveredEntityTracker(store, config.enrichment.discoverySampleCap);
    const rows = await tracker.topUnreviewed(
      parseInt(flag("min-mentions") ?? "3", 10),
      parseInt(flag("limit") ?? "20", 10)
    );
    console.log(`\n🔍 ${rows.length} unreviewed discovered entities:`);
    for (const row of rows) {
      console.log(`   ${row.name} (${row.kind}) - ${row.mentionCount} mentions`);
    }
  } finally {
    await disconnectMongo();
  }
}

run(commandArg)
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    log.error(`${commandArg} failed: ${errorMessage(error)}`);
    process.exit(1);
  });
