import type { EntityCatalog } from "./catalog";
import { normalizeName } from "./nameFilter";
import type { PostContext } from "./types/comments";
import type { CandidateMatch, MatchType, MonitoredEntity } from "./types/entities";

const CONFIDENCE: Record<MatchType, number> = {
  canonical: 1.0,
  alias: 0.9,
  fragment: 0.5,
};
const CAPTION_FRAGMENT_CONFIDENCE = 0.65;
const MIN_FRAGMENT_LETTERS = 3;

interface Pattern {
  entity: MonitoredEntity;
  matchType: MatchType;
  regex: RegExp;
}

interface Span {
  start: number;
  end: number;
  text: string;
  pattern: Pattern;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function namePattern(name: string): RegExp {
  const body = name.trim().split(/\s+/).map(escapeRegex).join("\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "giu");
}

/** The same bare name owned by two people: both stay, both ambiguous. */
function sharedFragment(a: Span, b: Span): boolean {
  return (
    a.start === b.start &&
    a.end === b.end &&
    a.pattern.matchType === "fragment" &&
    b.pattern.matchType === "fragment"
  );
}

function letterCount(value: string): number {
  return Array.from(value).filter((c) => /\p{L}/u.test(c)).length;
}

/**
 * Maps free-text comments to catalog entities. Only the comment text can
 * introduce a candidate; the post caption is used to break ties on bare
 * first or last names.
 */
export class EntityResolver {
  private readonly patterns: Pattern[];

  constructor(private readonly catalog: EntityCatalog) {
    this.patterns = this.buildPatterns();
  }

  private buildPatterns(): Pattern[] {
    const patterns: Pattern[] = [];
    const claimed = new Set<string>();

    for (const { entity, name, isCanonical } of this.catalog.names()) {
      claimed.add(normalizeName(name));
      patterns.push({
        entity,
        matchType: isCanonical ? "canonical" : "alias",
        regex: namePattern(name),
      });
    }

    for (const entity of this.catalog.active()) {
      if (entity.kind !== "person") continue;
      const parts = entity.canonicalName.trim().split(/\s+/);
      if (parts.length < 2) continue;

      for (const part of [parts[0], parts[parts.length - 1]]) {
        const key = normalizeName(part);
        if (claimed.has(key) || letterCount(part) < MIN_FRAGMENT_LETTERS) continue;
        patterns.push({ entity, matchType: "fragment", regex: namePattern(part) });
      }
    }

    return patterns;
  }

  resolve(commentText: string, postContext?: PostContext): CandidateMatch[] {
    if (this.patterns.length === 0 || !commentText.trim()) return [];

    const spans: Span[] = [];
    for (const pattern of this.patterns) {
      for (const match of commentText.matchAll(pattern.regex)) {
        const start = match.index ?? 0;
        spans.push({ start, end: start + match[0].length, text: match[0], pattern });
      }
    }

    // Longest span wins; among equal lengths the earlier one, then the stronger match type.
    spans.sort(
      (a, b) =>
        b.end - b.start - (a.end - a.start) ||
        a.start - b.start ||
        CONFIDENCE[b.pattern.matchType] - CONFIDENCE[a.pattern.matchType]
    );

    const accepted: Span[] = [];
    for (const span of spans) {
      const overlaps = accepted.some(
        (a) => span.start < a.end && a.start < span.end && !sharedFragment(a, span)
      );
      if (!overlaps) accepted.push(span);
    }
    accepted.sort((a, b) => a.start - b.start);

    const caption = postContext?.caption ?? "";
    const best = new Map<string, CandidateMatch>();

    for (const span of accepted) {
      const { entity, matchType } = span.pattern;
      const fragment = matchType === "fragment";
      const confidence =
        fragment && this.captionNames(caption, entity)
          ? CAPTION_FRAGMENT_CONFIDENCE
          : CONFIDENCE[matchType];

      const candidate: CandidateMatch = {
        entityId: entity.id,
        entityName: entity.canonicalName,
        matchedString: span.text,
        matchType,
        confidence,
        ambiguous: fragment,
      };

      const existing = best.get(entity.id);
      if (!existing || candidate.confidence > existing.confidence) {
        best.set(entity.id, candidate);
      }
    }

    return [...best.values()];
  }

  private captionNames(caption: string, entity: MonitoredEntity): boolean {
    if (!caption) return false;
    return [entity.canonicalName, ...entity.aliases].some((name) =>
      namePattern(name).test(caption)
    );
  }
}
