import { format } from "date-fns";
import fs from "fs-extra";
import path from "path";
import type { AnalyticsEngine } from "./analytics";
import { log } from "./log";
import type { TimeWindow } from "./types/analytics";

export interface SnapshotOptions {
  exportDir: string;
  label: string;
  platforms?: string[];
  now?: Date;
}

export function slugify(label: string): string {
  return label.replace(/[^a-zA-Z0-9-_]/g, "_").toLowerCase();
}

/** Directory for a snapshot: <exportDir>/<DDMMYYYY>/<slug>. */
export function snapshotDir(exportDir: string, label: string, date: Date): string {
  return path.join(exportDir, format(date, "ddMMyyyy"), slugify(label));
}

export async function writeJsonExport(dir: string, name: string, data: unknown): Promise<string> {
  try {
    await fs.ensureDir(dir);
    const filePath = path.join(dir, `${name}.json`);
    await fs.writeJson(filePath, data, { spaces: 2 });
    log.info(`✅ Successfully stored data in ${filePath}`);
    return filePath;
  } catch (error) {
    log.error("Failed to save data to file:", error);
    throw error;
  }
}

/**
 * Write the analytics for one reporting window to disk, one JSON file per
 * snapshot. Re-running on the same day overwrites the previous snapshot.
 */
export async function exportSnapshot(
  analytics: AnalyticsEngine,
  window: TimeWindow,
  options: SnapshotOptions
): Promise<string> {
  const generatedAt = options.now ?? new Date();
  const filters = { platforms: options.platforms };

  const [topEntities, whatChanged, topTopics, emotions, sentiment, toxicity] = await Promise.all([
    analytics.getTopEntities(window, filters),
    analytics.getWhatChanged(window, filters),
    analytics.getTopTopics(window),
    analytics.getEmotionDistribution(window),
    analytics.getSentimentDistribution(window),
    analytics.getToxicityAlerts(window),
  ]);

  return writeJsonExport(snapshotDir(options.exportDir, options.label, generatedAt), "snapshot", {
    label: options.label,
    generatedAt: generatedAt.toISOString(),
    window: { start: window.start.toISOString(), end: window.end.toISOString() },
    topEntities,
    whatChanged,
    topTopics,
    emotions,
    sentiment,
    toxicity,
  });
}
