import type { Locator, Page } from "@playwright/test";

export type AriaRole = Parameters<Page["getByRole"]>[0];

/** A role plus accessible name, resolved by Playwright only when used. */
export interface LocatorDescriptor {
  readonly role: AriaRole;
  readonly name: string | RegExp;
  readonly exact?: boolean;
}

export function byRole(page: Pick<Page, "getByRole">, descriptor: LocatorDescriptor): Locator {
  const { role, name, exact } = descriptor;
  return page.getByRole(role, exact === undefined ? { name } : { name, exact });
}

