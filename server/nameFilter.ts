import blocklist from "./data/blocklist.json";
import { log } from "./log";

const STOPWORDS = new Set(blocklist.stopwords);
const BLOCKED_NAMES = new Set(blocklist.names);

const EMOJI = /\p{Extended_Pictographic}/u;
const RENDERING_ARTIFACTS = /[■□▪▫�]/;
const LETTER = /\p{L}/u;

export type RejectReason =
  | "too_short"
  | "emoji"
  | "artifact"
  | "no_letters"
  | "mostly_non_letters"
  | "numeric"
  | "stopword"
  | "blocklisted";

export function normalizeName(name: string): string {
  return name.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Returns why a string cannot be an entity name, or null when it can.
 */
export function rejectReason(name: string): RejectReason | null {
  const clean = name.trim();
  if (clean.length < 2) return "too_short";
  if (EMOJI.test(clean)) return "emoji";
  if (RENDERING_ARTIFACTS.test(clean)) return "artifact";
  if (!LETTER.test(clean)) return /\d/.test(clean) ? "numeric" : "no_letters";

  const chars = Array.from(clean.replace(/\s+/g, ""));
  const letters = chars.filter((c) => LETTER.test(c)).length;
  if (letters < chars.length * 0.5) return "mostly_non_letters";

  const normalized = normalizeName(clean);
  if (STOPWORDS.has(normalized)) return "stopword";
  if (BLOCKED_NAMES.has(normalized) || BLOCKED_NAMES.has(normalized.replace(/[’]/g, "'"))) {
    return "blocklisted";
  }

  return null;
}

export function isValidEntityName(name: string): boolean {
  const reason = rejectReason(name);
  if (reason) {
    log.debug(`Dropping entity name "${name}" (${reason})`);
    return false;
  }
  return true;
}
