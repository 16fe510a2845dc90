import type { Page } from "@playwright/test";

/**
 * Base for page objects. Borrows the test's page for the lifetime of one
 * test; the fixture that created the page owns and closes it.
 */
export abstract class BasePage {
  readonly page: Page;

  /** Path relative to the configured baseURL. */
  abstract readonly path: string;

  constructor(page: Page) {
    this.page = page;
  }

  /**
   * Load this page's path against the baseURL. Navigation failures
   * (DNS, timeout, refused connection) reject unchanged.
   */
  async navigate(): Promise<void> {
    await this.page.goto(this.path);
  }
}
