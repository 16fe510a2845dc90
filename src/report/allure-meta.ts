/**
 * Allure metadata for a single test.
 *
 * Call from inside a test body (or a beforeEach); allure-playwright picks the
 * values up from the running test and writes them into allure-results.
 */

import * as allure from "allure-js-commons";
import { Severity } from "allure-js-commons";

export { Severity };

export interface AllureMeta {
  title?: string;
  description?: string;
  severity: Severity;
  epic: string;
  feature: string;
  story: string;
  /** Extra name/value labels, e.g. { pattern: "page-object" }. */
  labels?: Record<string, string>;
}

export async function annotate(meta: AllureMeta): Promise<void> {
  if (meta.title !== undefined) await allure.displayName(meta.title);
  if (meta.description !== undefined) await allure.description(meta.description);
  await allure.severity(meta.severity);
  await allure.epic(meta.epic);
  await allure.feature(meta.feature);
  await allure.story(meta.story);
  for (const [name, value] of Object.entries(meta.labels ?? {})) {
    await allure.label(name, value);
  }
}
