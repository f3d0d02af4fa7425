import nlp from "compromise";
import { isValidEntityName, normalizeName } from "./nameFilter";
import type { EntityKind } from "./types/entities";

export interface RecognizedName {
  text: string;
  normalizedText: string;
  kind: EntityKind;
  confidence: number;
}

const BRAND_PATTERNS = [
  /\b(Inc|LLC|Corp|Ltd|Company|Group|Studios?|Records|Pictures|Entertainment|Network|Media)\b/i,
  /\b(Netflix|HBO|Hulu|Disney|Sony|Warner|Paramount|Marvel|Spotify|Sephora|Gucci|Prada|Chanel)\b/i,
];

function texts(terms: unknown): string[] {
  if (!Array.isArray(terms)) return [];
  return terms.flatMap((term: unknown) =>
    typeof term === "object" && term !== null && "text" in term && typeof term.text === "string"
      ? [term.text.trim()]
      : []
  );
}

/**
 * Named-entity recognition over comment text with compromise. Used for
 * discovery only: anything it finds that is not in the catalog becomes a
 * candidate for the discovered-entity triage list.
 */
export class NERService {
  extractEntities(text: string): RecognizedName[] {
    if (!text.trim()) return [];

    const doc = nlp(text);
    const found: RecognizedName[] = [];

    const people = texts(doc.people().json());
    for (const name of people) {
      found.push(this.recognized(name, "person", 0.8));
    }

    const orgs = texts(doc.organizations().json());
    for (const name of orgs) {
      found.push(this.recognized(name, "brand", 0.8));
    }

    // Proper nouns compromise did not classify, kept only when they look like a brand
    const known = new Set([...people, ...orgs]);
    for (const name of texts(doc.match("#ProperNoun+").json())) {
      if (known.has(name) || name.length < 3) continue;
      if (BRAND_PATTERNS.some((pattern) => pattern.test(name))) {
        found.push(this.recognized(name, "brand", 0.6));
      }
    }

    return this.deduplicate(found.filter((entity) => isValidEntityName(entity.text)));
  }

  private recognized(text: string, kind: EntityKind, confidence: number): RecognizedName {
    const clean = text.replace(/[.,!?;:'"]+$/u, "").replace(/['’]s$/u, "");
    return {
      text: clean,
      normalizedText: normalizeName(clean),
      kind,
      confidence,
    };
  }

  private deduplicate(entities: RecognizedName[]): RecognizedName[] {
    const seen = new Set<string>();
    return entities.filter((entity) => {
      const key = normalizeName(entity.text);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }
}
