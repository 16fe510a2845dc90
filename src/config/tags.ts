/**
 * Test markers. Suites attach them as Playwright tags (`{ tag: TAGS.smoke }`)
 * and a run selects them through the TAGS environment variable.
 */

export const TAG_NAMES = ["smoke", "regression", "slow"] as const;
export type TagName = (typeof TAG_NAMES)[number];

export const TAGS = {
  smoke: "@smoke",
  regression: "@regression",
  slow: "@slow",
} as const satisfies Record<TagName, `@${TagName}`>;

export function isTagName(value: string): value is TagName {
  return TAG_NAMES.some((name) => name === value);
}

/** Split a comma list of marker names. Throws on an unknown marker. */
export function parseTags(list: string): TagName[] {
  const names = list
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  const tags: TagName[] = [];
  for (const name of names) {
    if (!isTagName(name)) {
      throw new Error(`Unknown test tag "${name}" (expected one of: ${TAG_NAMES.join(", ")})`);
    }
    if (!tags.includes(name)) tags.push(name);
  }
  return tags;
}

/**
 * Build the `grep` filter for a tag selection. Matches a test carrying any
 * of the tags; `undefined` when nothing is selected (run everything).
 */
export function buildGrep(tags: readonly TagName[]): RegExp | undefined {
  if (tags.length === 0) return undefined;
  // @slow must not match @slower.
  return new RegExp(`(${tags.map((tag) => TAGS[tag]).join("|")})\\b`);
}
