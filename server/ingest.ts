import fs from "fs-extra";
import { z } from "zod";
import { log } from "./log";
import type { NormalizedComment } from "./types/comments";

export const normalizedCommentSchema = z.object({
  platform: z.string().min(1),
  postExternalId: z.string().min(1),
  postCaption: z.string().optional(),
  postSubject: z.string().optional(),
  postUrl: z.string().optional(),
  commentExternalId: z.string().min(1),
  author: z.string().default(""),
  text: z.string(),
  postedAt: z.coerce.date(),
  likeCount: z.number().int().min(0).default(0),
  replyCount: z.number().int().min(0).optional(),
  threadDepth: z.number().int().min(0).optional(),
  raw: z.record(z.unknown()).optional(),
});

/**
 * Read normalized comment records written by an ingestion adapter. Invalid
 * records are skipped with a warning.
 */
export async function loadCommentsFile(path: string): Promise<NormalizedComment[]> {
  const data: unknown = await fs.readJson(path);
  if (!Array.isArray(data)) {
    throw new Error(`${path} must contain a JSON array of comments`);
  }

  const records: NormalizedComment[] = [];
  data.forEach((entry, index) => {
    const parsed = normalizedCommentSchema.safeParse(entry);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      log.warn(`Skipping comment #${index} in ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
  });
  return records;
}
