import { describe, it, expect } from "vitest";
import { EntityCatalog } from "../server/catalog";
import { EntityResolver } from "../server/resolver";
import { testCatalog } from "./helpers";

const context = (caption: string) => ({ caption, platform: "instagram" });

describe("EntityResolver", () => {
  const resolver = new EntityResolver(testCatalog());

  it("finds every entity named in the comment, in order of appearance", () => {
    const matches = resolver.resolve("I love Ryan but hate Blake", context(""));

    expect(matches).toEqual([
      {
        entityId: "ent-ryan",
        entityName: "Ryan Reynolds",
        matchedString: "Ryan",
        matchType: "alias",
        confidence: 0.9,
        ambiguous: false,
      },
      {
        entityId: "ent-blake",
        entityName: "Blake Lively",
        matchedString: "Blake",
        matchType: "alias",
        confidence: 0.9,
        ambiguous: false,
      },
    ]);
  });

  it("prefers the longest overlapping name", () => {
    const matches = resolver.resolve("Blake Lively looked stunning", context(""));

    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({
      entityId: "ent-blake",
      matchedString: "Blake Lively",
      matchType: "canonical",
      confidence: 1.0,
    });
  });

  it("matches case-insensitively and keeps the original slice", () => {
    const [match] = resolver.resolve("ryan is the best", context(""));
    expect(match?.matchedString).toBe("ryan");
    expect(match?.entityId).toBe("ent-ryan");
  });

  it("respects word boundaries", () => {
    expect(resolver.resolve("Blakeley and Bryant were there", context(""))).toEqual([]);
  });

  it("matches multi-word show titles", () => {
    const [match] = resolver.resolve("It Ends With Us was better than the book", context(""));
    expect(match).toMatchObject({ entityId: "ent-iewu", matchType: "canonical", confidence: 1.0 });
  });

  it("flags bare first names as ambiguous fragments", () => {
    const [match] = resolver.resolve("Justin needs a new publicist", context(""));
    expect(match).toMatchObject({
      entityId: "ent-justin",
      matchType: "fragment",
      confidence: 0.5,
      ambiguous: true,
    });
  });

  it("raises fragment confidence when the caption names the entity", () => {
    const [match] = resolver.resolve(
      "Justin needs a new publicist",
      context("Justin Baldoni responds to the lawsuit")
    );
    expect(match?.confidence).toBe(0.65);
    expect(match?.ambiguous).toBe(true);
  });

  it("never takes candidates from the caption alone", () => {
    expect(resolver.resolve("This is so sad", context("Blake Lively and Ryan Reynolds"))).toEqual([]);
  });

  it("returns nothing for an empty catalog", () => {
    const empty = new EntityResolver(EntityCatalog.empty());
    expect(empty.resolve("I love Ryan", context(""))).toEqual([]);
  });
});
