import { describe, it, expect } from "vitest";
import { isValidEntityName, normalizeName, rejectReason } from "../server/nameFilter";

describe("rejectReason", () => {
  it.each([
    ["B", "too_short"],
    ["🔥🔥", "emoji"],
    ["Blake 😍", "emoji"],
    ["Blake\uFFFD", "artifact"],
    ["2024", "numeric"],
    ["!!!", "no_letters"],
    ["a1234", "mostly_non_letters"],
    ["the", "stopword"],
    ["Getty Images", "blocklisted"],
    ["Link in bio", "blocklisted"],
    ["Harper's Bazaar", "blocklisted"],
    ["Harper’s Bazaar", "blocklisted"],
  ])("rejects %s as %s", (name, reason) => {
    expect(rejectReason(name)).toBe(reason);
  });

  it("accepts real names", () => {
    expect(rejectReason("Colleen Hoover")).toBeNull();
    expect(rejectReason("Taylor Swift")).toBeNull();
  });
});

describe("isValidEntityName", () => {
  it("returns false for blocklisted stock-photo credits", () => {
    expect(isValidEntityName("Getty Images")).toBe(false);
  });

  it("returns true for a person", () => {
    expect(isValidEntityName("Colleen Hoover")).toBe(true);
  });
});

describe("normalizeName", () => {
  it("lowercases and collapses whitespace", () => {
    expect(normalizeName("  Colleen   HOOVER ")).toBe("colleen hoover");
  });
});
