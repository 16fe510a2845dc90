export { BasePage } from "./BasePage";
export { DocsPage } from "./DocsPage";
export { HOME_LOCATORS, HomePage } from "./HomePage";
export { byRole } from "./locators";
export type { AriaRole, LocatorDescriptor } from "./locators";
