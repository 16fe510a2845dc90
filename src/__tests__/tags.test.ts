import { describe, expect, it } from "vitest";

import { buildGrep, isTagName, parseTags, TAGS } from "../config/tags";

describe("parseTags", () => {
  it("trims, lower-cases and de-duplicates", () => {
    expect(parseTags(" Smoke, slow ,smoke")).toEqual(["smoke", "slow"]);
  });

  it("returns an empty list for an empty string", () => {
    expect(parseTags("")).toEqual([]);
  });

  it("throws on an unknown tag", () => {
    expect(() => parseTags("smoke,fast")).toThrow('Unknown test tag "fast"');
  });
});

describe("isTagName", () => {
  it("accepts known markers only", () => {
    expect(isTagName("regression")).toBe(true);
    expect(isTagName("@regression")).toBe(false);
  });
});

describe("buildGrep", () => {
  it("returns undefined when no tags are selected", () => {
    expect(buildGrep([])).toBeUndefined();
  });

  it("matches any selected tag", () => {
    const grep = buildGrep(["smoke", "slow"]);

    expect(grep?.source).toBe("(@smoke|@slow)\\b");
    expect(grep?.test(`home page loads ${TAGS.smoke}`)).toBe(true);
    expect(grep?.test(`docs ${TAGS.slow}`)).toBe(true);
    expect(grep?.test(`search ${TAGS.regression}`)).toBe(false);
  });

  it("does not match a longer tag with the same prefix", () => {
    expect(buildGrep(["slow"])?.test("perf @slower")).toBe(false);
  });
});
