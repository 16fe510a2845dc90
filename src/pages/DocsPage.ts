import type { Locator, Page } from "@playwright/test";

import { BasePage } from "./BasePage";

export class DocsPage extends BasePage {
  readonly path = "/docs/intro";

  readonly mainHeading: Locator;

  constructor(page: Page) {
    super(page);
    this.mainHeading = page.locator("h1");
  }
}
