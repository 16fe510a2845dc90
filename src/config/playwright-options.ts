/**
 * Builders from the suite environment to Playwright configuration.
 *
 * These are consumed once, when the runner loads tests/playwright.config.ts;
 * every browser context a test gets is created from them and nothing changes
 * them afterwards. Only types are imported from @playwright/test so the
 * builders load under Vitest without the runner.
 */

import type {
  PlaywrightTestConfig,
  PlaywrightTestProject,
  ReporterDescription,
} from "@playwright/test";

import type { SuiteBrowser, SuiteEnv } from "./env";
import { buildGrep } from "./tags";

/** Headers sent with every request from every context. */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
});

export const TEST_TIMEOUT_MS = 30_000;
export const EXPECT_TIMEOUT_MS = 5_000;
export const HTML_REPORT_DIR = "playwright-report";
export const ARTIFACTS_DIR = "test-results";

export interface ContextOptions {
  baseURL: string;
  viewport: { width: number; height: number };
  ignoreHTTPSErrors: boolean;
  extraHTTPHeaders: Record<string, string>;
  storageState?: string;
}

export interface LaunchOptions {
  headless: boolean;
  launchOptions: { slowMo: number };
}

export function buildContextOptions(env: SuiteEnv): ContextOptions {
  const options: ContextOptions = {
    baseURL: env.BASE_URL,
    viewport: { width: env.VIEWPORT_WIDTH, height: env.VIEWPORT_HEIGHT },
    ignoreHTTPSErrors: env.IGNORE_HTTPS_ERRORS,
    extraHTTPHeaders: { ...DEFAULT_HEADERS },
  };
  if (env.STORAGE_STATE !== undefined) {
    options.storageState = env.STORAGE_STATE;
  }
  return options;
}

export function buildLaunchOptions(env: SuiteEnv): LaunchOptions {
  return {
    headless: env.HEADLESS,
    launchOptions: { slowMo: env.SLOW_MO },
  };
}

/** One project per selected browser, named after the browser. */
export function buildProjects(env: SuiteEnv): PlaywrightTestProject[] {
  return env.BROWSERS.map((browserName: SuiteBrowser) => ({
    name: browserName,
    use: { browserName },
  }));
}

export function buildReporters(env: SuiteEnv): ReporterDescription[] {
  return [
    ["list"],
    ["html", { outputFolder: HTML_REPORT_DIR, open: "never", title: env.REPORT_TITLE }],
    [
      "allure-playwright",
      { resultsDir: env.ALLURE_RESULTS_DIR, detail: true, suiteTitle: false },
    ],
  ];
}

export function buildTestConfig(env: SuiteEnv): PlaywrightTestConfig {
  const grep = buildGrep(env.TAGS);

  return {
    timeout: TEST_TIMEOUT_MS,
    expect: { timeout: EXPECT_TIMEOUT_MS },
    fullyParallel: true,
    forbidOnly: env.CI,
    retries: env.RETRIES,
    workers: env.CI ? 1 : undefined,
    reporter: buildReporters(env),
    outputDir: ARTIFACTS_DIR,
    metadata: { baseURL: env.BASE_URL, reportTitle: env.REPORT_TITLE },
    ...(grep ? { grep } : {}),
    use: {
      ...buildContextOptions(env),
      ...buildLaunchOptions(env),
      trace: "on-first-retry",
      screenshot: "only-on-failure",
      video: "retain-on-failure",
    },
    projects: buildProjects(env),
  };
}
