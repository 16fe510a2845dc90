import { beforeEach, describe, expect, it, vi } from "vitest";

import { HOME_LOCATORS } from "../pages/HomePage";
import { byRole } from "../pages/locators";

const getByRole = vi.fn();
const page = { getByRole };

beforeEach(() => {
  getByRole.mockReset();
});

describe("HOME_LOCATORS", () => {
  it("declares role-based descriptors for the home page controls", () => {
    expect(HOME_LOCATORS).toEqual({
      searchButton: { role: "button", name: "Search (Ctrl+K)" },
      searchBox: { role: "searchbox", name: "Search" },
      docsLink: { role: "link", name: "Docs" },
    });
  });
});

describe("byRole", () => {
  it("passes role and name without exact when it is not set", () => {
    const locator = { kind: "locator" };
    getByRole.mockReturnValue(locator);

    expect(byRole(page, HOME_LOCATORS.searchButton)).toBe(locator);
    expect(getByRole).toHaveBeenCalledWith("button", { name: "Search (Ctrl+K)" });
  });

  it("forwards exact matching", () => {
    byRole(page, { role: "link", name: "Docs", exact: true });

    expect(getByRole).toHaveBeenCalledWith("link", { name: "Docs", exact: true });
  });

  it("forwards exact: false and regex names", () => {
    byRole(page, { role: "heading", name: /install/i, exact: false });

    expect(getByRole).toHaveBeenCalledWith("heading", { name: /install/i, exact: false });
  });
});
