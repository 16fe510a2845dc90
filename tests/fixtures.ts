/**
 * Custom Playwright test fixtures for the E2E suites.
 *
 * Provides:
 * - mockSite option: serve the site from tests/site/ instead of the network
 *   (defaults to the MOCK_SITE env var; override per file with test.use)
 * - site: auto fixture that installs the stand-in and records requests
 * - homePage / docsPage: page objects bound to the test's page
 *
 * Usage:
 *   import { test, expect } from "./fixtures";
 *   test("my test", async ({ homePage }) => { ... });
 */

import { test as base } from "@playwright/test";

import { loadEnv } from "../src/config/env";
import { DocsPage, HomePage } from "../src/pages";
import { setupMockSite, type MockSite } from "./site";

const env = loadEnv();

type SiteOptions = {
  /** Route the baseURL origin to the local stand-in. */
  mockSite: boolean;
};

type SuiteFixtures = {
  /** Request recorder for the stand-in; null when hitting the real site. */
  site: MockSite | null;
  homePage: HomePage;
  docsPage: DocsPage;
};

export const test = base.extend<SuiteFixtures & SiteOptions>({
  mockSite: [env.MOCK_SITE, { option: true }],

  site: [
    async ({ page, baseURL, mockSite }, use) => {
      if (!mockSite || baseURL === undefined) {
        await use(null);
        return;
      }
      await use(await setupMockSite(page, baseURL));
    },
    { auto: true },
  ],

  homePage: async ({ page }, use) => {
    await use(new HomePage(page));
  },

  docsPage: async ({ page }, use) => {
    await use(new DocsPage(page));
  },
});

export { expect } from "@playwright/test";
export { env };
