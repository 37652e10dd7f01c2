/**
 * Thin seam over playwright-core. The driver only talks to the PwPage and
 * PwLocator shapes below, so tests can hand it plain objects; the adapters
 * map a real Playwright Page onto them.
 */

import type { Browser, LaunchOptions, Locator, Page } from "playwright-core";
import { BrowserInitializationError, errorMessage } from "@webpilot/schemas";
import { BASE_CONTEXT_OPTS, STEALTH_ARGS, STEALTH_CONTEXT_OPTS, STEALTH_INIT_SCRIPT } from "./stealth.js";

export type LoadState = "load" | "domcontentloaded" | "networkidle";

export interface PwLocator {
  first(): PwLocator;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  click(opts: { timeout: number }): Promise<void>;
  fill(value: string, opts: { timeout: number }): Promise<void>;
  pressSequentially(text: string, opts: { delay: number }): Promise<void>;
  waitFor(opts: { state: "visible"; timeout: number }): Promise<void>;
}

export interface PwPage {
  goto(url: string, opts: { waitUntil: LoadState; timeout: number }): Promise<unknown>;
  waitForLoadState(state: LoadState, opts: { timeout: number }): Promise<void>;
  url(): string;
  title(): Promise<string>;
  screenshot(opts: { fullPage: boolean; type: "png" }): Promise<Buffer>;
  keyboard: { press(key: string): Promise<void> };
  /** Evaluates an expression string in the page. */
  evaluate(script: string): Promise<unknown>;
  getByRole(role: "button" | "link" | "textbox", opts: { name: string }): PwLocator;
  getByText(text: string, opts?: { exact: boolean }): PwLocator;
  getByPlaceholder(text: string): PwLocator;
  getByLabel(text: string): PwLocator;
  locator(selector: string): PwLocator;
}

export interface PwSession {
  page: PwPage;
  close(): Promise<void>;
}

export interface LaunchSettings {
  headless: boolean;
  slowMo: number;
  stealth: boolean;
  /** Use an installed Chrome or Edge instead of Playwright's Chromium build. */
  channel?: "chrome" | "msedge";
}

export type SessionLauncher = (settings: LaunchSettings) => Promise<PwSession>;

export function adaptLocator(locator: Locator): PwLocator {
  return {
    first: () => adaptLocator(locator.first()),
    count: () => locator.count(),
    isVisible: () => locator.isVisible(),
    click: (opts) => locator.click(opts),
    fill: (value, opts) => locator.fill(value, opts),
    pressSequentially: (text, opts) => locator.pressSequentially(text, opts),
    waitFor: (opts) => locator.waitFor(opts),
  };
}

export function adaptPage(page: Page): PwPage {
  return {
    goto: (url, opts) => page.goto(url, opts),
    waitForLoadState: (state, opts) => page.waitForLoadState(state, opts),
    url: () => page.url(),
    title: () => page.title(),
    screenshot: (opts) => page.screenshot(opts),
    keyboard: { press: (key) => page.keyboard.press(key) },
    evaluate: (script) => page.evaluate<unknown>(script),
    getByRole: (role, opts) => adaptLocator(page.getByRole(role, opts)),
    getByText: (text, opts) => adaptLocator(page.getByText(text, opts)),
    getByPlaceholder: (text) => adaptLocator(page.getByPlaceholder(text)),
    getByLabel: (text) => adaptLocator(page.getByLabel(text)),
    locator: (selector) => adaptLocator(page.locator(selector)),
  };
}

export async function loadPlaywright(): Promise<typeof import("playwright-core")> {
  try {
    return await import("playwright-core");
  } catch (err) {
    throw new BrowserInitializationError(`playwright-core could not be loaded (${errorMessage(err)})`);
  }
}

/** Default launcher: one Chromium, one context, one page. */
export async function launchChromium(settings: LaunchSettings): Promise<PwSession> {
  const pw = await loadPlaywright();
  const launchOpts: LaunchOptions = {
    headless: settings.headless,
    slowMo: settings.slowMo,
    ...(settings.stealth ? { args: [...STEALTH_ARGS] } : {}),
    ...(settings.channel ? { channel: settings.channel } : {}),
  };

  let browser: Browser;
  try {
    browser = await pw.chromium.launch(launchOpts);
  } catch (err) {
    throw new BrowserInitializationError(errorMessage(err), settings.channel ?? "chromium");
  }

  try {
    const context = await browser.newContext(settings.stealth ? STEALTH_CONTEXT_OPTS : BASE_CONTEXT_OPTS);
    // A real Chrome channel already looks genuine; patching it can trip detection.
    if (settings.stealth && !settings.channel) {
      await context.addInitScript(STEALTH_INIT_SCRIPT);
    }
    const page = await context.newPage();
    return { page: adaptPage(page), close: () => browser.close() };
  } catch (err) {
    await browser.close();
    throw new BrowserInitializationError(errorMessage(err), settings.channel ?? "chromium");
  }
}
