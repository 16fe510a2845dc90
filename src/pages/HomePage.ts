import type { Locator, Page } from "@playwright/test";

import { BasePage } from "./BasePage";
import { byRole, type LocatorDescriptor } from "./locators";

export const HOME_LOCATORS = {
  searchButton: { role: "button", name: "Search (Ctrl+K)" },
  searchBox: { role: "searchbox", name: "Search" },
  docsLink: { role: "link", name: "Docs" },
} as const satisfies Record<string, LocatorDescriptor>;

/**
 * HomePage - page object for the site landing page.
 *
 * Exposes the search control, the docs link and the main heading, plus the
 * two flows the suites drive from here: searching and opening the docs.
 */
export class HomePage extends BasePage {
  readonly path = "/";

  readonly searchButton: Locator;
  readonly searchBox: Locator;
  readonly docsLink: Locator;
  readonly mainHeading: Locator;

  constructor(page: Page) {
    super(page);
    this.searchButton = byRole(page, HOME_LOCATORS.searchButton);
    this.searchBox = byRole(page, HOME_LOCATORS.searchBox);
    this.docsLink = byRole(page, HOME_LOCATORS.docsLink);
    this.mainHeading = page.locator("h1");
  }

  /** Open the search dialog and type a query into it. */
  async search(query: string): Promise<void> {
    await this.searchButton.click();
    await this.searchBox.waitFor({ state: "visible" });
    await this.searchBox.fill(query);
  }

  async goToDocs(): Promise<void> {
    await this.docsLink.click();
  }
}
