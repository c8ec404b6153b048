/**
 * Browser session management.
 *
 * WhatsApp Web keeps its login in browser storage, so the session runs on a
 * persistent context rooted at the configured user-data directory: a QR code
 * scanned once is reused on the next launch. Playwright is imported lazily so
 * that loading the package does not pull in the browser tooling.
 */

import { existsSync } from "node:fs";
import type { Page } from "playwright";
import type { ClientConfig } from "../config.js";

export type SessionConfig = Pick<
  ClientConfig,
  "browser" | "headless" | "userDataDir" | "launchArgs"
>;

export interface BrowserSession {
  page: Page;
  /** True when the profile directory existed before launch (login likely persisted). */
  resumed: boolean;
  close(): Promise<void>;
}

export type SessionLauncher = (config: SessionConfig) => Promise<BrowserSession>;

const HEADLESS_VIEWPORT = { width: 1280, height: 720 };

export const launchSession: SessionLauncher = async (config) => {
  const resumed = existsSync(config.userDataDir);

  const playwright = await import("playwright");
  const browserType = playwright[config.browser];

  const context = await browserType.launchPersistentContext(config.userDataDir, {
    headless: config.headless,
    args: config.launchArgs,
    // Headed windows size the page to the window itself
    viewport: config.headless ? HEADLESS_VIEWPORT : null,
  });

  // A persistent context opens with one blank tab already
  const page = context.pages()[0] ?? (await context.newPage());

  return {
    page,
    resumed,
    close: () => context.close(),
  };
};
