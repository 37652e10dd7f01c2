/**
 * ManagedDriver: Playwright-backed BrowserDriver.
 *
 * Owns a single lazily launched browser page. Element lookups try a fixed
 * list of strategies (text, placeholder, label, attributes, roles) until
 * one yields a visible element or the element timeout passes. Clicks fall
 * back to an in-page script when direct interaction fails.
 */

import type { Challenge, ClickRole, Logger, PageInfo } from "@webpilot/schemas";
import {
  AutomationError,
  BrowserInitializationError,
  ElementNotFoundError,
  NavigationError,
  NavigationTimeoutError,
  TimeoutError,
  WaitTimeoutError,
  createLogger,
  errorMessage,
  logError,
  pollUntil,
} from "@webpilot/schemas";
import { CHALLENGE_SELECTORS, classifyChallenge } from "../challenge.js";
import type { LoadState, PwLocator, PwPage, PwSession, SessionLauncher } from "./playwright.js";
import { launchChromium } from "./playwright.js";
import { FORM_SUBMIT_SCRIPT, PAGE_TEXT_SCRIPT, SUBMIT_SELECTORS, clickScript } from "./scripts.js";
import type { BrowserDriver, ElementMatch, SubmitMethod } from "./types.js";

export interface ManagedDriverOptions {
  headless?: boolean;
  /** Delay Playwright inserts between operations, in ms. */
  slowMo?: number;
  /** Close the browser after this long without activity. 0 disables. */
  idleTimeoutMs?: number;
  navigationTimeoutMs?: number;
  elementTimeoutMs?: number;
  /** Upper bound for the post-action load/networkidle settle. */
  settleTimeoutMs?: number;
  typeDelayMs?: number;
  pollIntervalMs?: number;
  /** Stealth launch args, fingerprint and init script. Default: true */
  stealth?: boolean;
  channel?: "chrome" | "msedge";
  launcher?: SessionLauncher;
  logger?: Logger;
}

const DEFAULT_IDLE_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;
const DEFAULT_ELEMENT_TIMEOUT_MS = 5_000;
const DEFAULT_SETTLE_TIMEOUT_MS = 5_000;
const MAX_PROBE_TEXT = 20_000;

export interface LookupStrategy {
  name: string;
  locate(page: PwPage, target: string): PwLocator;
}

interface FoundElement {
  locator: PwLocator;
  strategy: string;
}

export function cssString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function attributeSelector(target: string): string {
  const v = cssString(target);
  return ["input", "textarea"]
    .flatMap((tag) => ["name", "id", "aria-label"].map((attr) => `${tag}[${attr}=${v}]`))
    .join(", ");
}

const byText: LookupStrategy = { name: "text", locate: (p, t) => p.getByText(t, { exact: true }) };
const byPlaceholder: LookupStrategy = { name: "placeholder", locate: (p, t) => p.getByPlaceholder(t) };
const byLabel: LookupStrategy = { name: "label", locate: (p, t) => p.getByLabel(t) };
const byAttribute: LookupStrategy = { name: "attribute", locate: (p, t) => p.locator(attributeSelector(t)) };

export const CLICK_STRATEGIES: readonly LookupStrategy[] = [
  byText,
  byPlaceholder,
  byLabel,
  byAttribute,
  { name: "button", locate: (p, t) => p.getByRole("button", { name: t }) },
  { name: "link", locate: (p, t) => p.getByRole("link", { name: t }) },
  { name: "partial_text", locate: (p, t) => p.getByText(t) },
];

export const FIELD_STRATEGIES: readonly LookupStrategy[] = [
  byPlaceholder,
  byLabel,
  byAttribute,
  { name: "textbox", locate: (p, t) => p.getByRole("textbox", { name: t }) },
  {
    name: "attribute_contains",
    locate: (p, t) => {
      const v = cssString(t);
      return p.locator(`input[name*=${v} i], input[id*=${v} i], textarea[name*=${v} i]`);
    },
  },
];

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

export class ManagedDriver implements BrowserDriver {
  protected session: PwSession | null = null;
  private launching: Promise<PwSession> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly headless: boolean;
  private readonly slowMo: number;
  private readonly stealth: boolean;
  private readonly channel: "chrome" | "msedge" | undefined;
  private readonly idleTimeoutMs: number;
  private readonly navigationTimeoutMs: number;
  private readonly elementTimeoutMs: number;
  private readonly settleTimeoutMs: number;
  private readonly typeDelayMs: number;
  private readonly pollIntervalMs: number;
  private readonly launcher: SessionLauncher;
  private readonly log: Logger;

  constructor(options?: ManagedDriverOptions) {
    this.headless = options?.headless ?? true;
    this.slowMo = options?.slowMo ?? 0;
    this.stealth = options?.stealth ?? true;
    this.channel = options?.channel;
    this.idleTimeoutMs = options?.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.navigationTimeoutMs = options?.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    this.elementTimeoutMs = options?.elementTimeoutMs ?? DEFAULT_ELEMENT_TIMEOUT_MS;
    this.settleTimeoutMs = options?.settleTimeoutMs ?? DEFAULT_SETTLE_TIMEOUT_MS;
    this.typeDelayMs = options?.typeDelayMs ?? 50;
    this.pollIntervalMs = options?.pollIntervalMs ?? 250;
    this.launcher = options?.launcher ?? launchChromium;
    this.log = options?.logger ?? createLogger("browser");
  }

  isActive(): boolean {
    return this.session !== null;
  }

  async navigate(url: string): Promise<PageInfo> {
    const page = await this.getPage();
    this.log.info(`Navigating to ${url}`);
    try {
      await page.goto(url, { waitUntil: "load", timeout: this.navigationTimeoutMs });
    } catch (err) {
      if (isTimeout(err)) throw new NavigationTimeoutError(url, this.navigationTimeoutMs);
      throw new NavigationError(url, errorMessage(err));
    }
    await this.settle(page, "networkidle");
    return this.readPageInfo(page);
  }

  async click(target: string, role?: ClickRole): Promise<ElementMatch> {
    const page = await this.getPage();
    const strategies = this.withRole(CLICK_STRATEGIES, role);

    let found: FoundElement | null = null;
    try {
      found = await this.findElement(page, target, strategies, this.elementTimeoutMs);
    } catch (err) {
      if (!(err instanceof ElementNotFoundError)) throw err;
      this.log.debug(`No direct match for "${target}", trying script fallback`);
    }

    if (found) {
      try {
        await found.locator.click({ timeout: this.elementTimeoutMs });
        await this.settle(page, "load");
        return { strategy: found.strategy };
      } catch (err) {
        this.log.warn(`Click on "${target}" failed, trying script fallback`, { error: errorMessage(err) });
      }
    }

    const clicked = await page.evaluate(clickScript(target));
    if (clicked !== true) {
      throw new ElementNotFoundError(target, { strategies: [...strategies.map((s) => s.name), "script"] });
    }
    await this.settle(page, "load");
    return { strategy: "script" };
  }

  async type(field: string, text: string): Promise<ElementMatch> {
    const page = await this.getPage();
    const found = await this.findElement(page, field, FIELD_STRATEGIES, this.elementTimeoutMs);
    await this.clearAndType(found.locator, text);
    return { strategy: found.strategy };
  }

  async fill(selector: string, text: string): Promise<void> {
    const page = await this.getPage();
    const locator = page.locator(selector).first();
    try {
      await locator.waitFor({ state: "visible", timeout: this.elementTimeoutMs });
    } catch (err) {
      if (isTimeout(err)) throw new ElementNotFoundError(selector, { selector, timeout_ms: this.elementTimeoutMs });
      throw err;
    }
    await this.clearAndType(locator, text);
  }

  async submit(preferredSelector?: string): Promise<SubmitMethod> {
    const page = await this.getPage();

    if (preferredSelector && (await this.clickIfVisible(page, preferredSelector))) {
      return "selector";
    }
    for (const selector of SUBMIT_SELECTORS) {
      if (await this.clickIfVisible(page, selector)) return "button";
    }

    const submitted = await page.evaluate(FORM_SUBMIT_SCRIPT);
    if (submitted === true) {
      await this.settle(page, "load");
      return "form";
    }

    await page.keyboard.press("Enter");
    await this.settle(page, "load");
    return "enter";
  }

  async waitForElement(description: string, timeoutMs: number): Promise<ElementMatch> {
    const page = await this.getPage();
    try {
      const found = await this.findElement(page, description, CLICK_STRATEGIES, timeoutMs);
      return { strategy: found.strategy };
    } catch (err) {
      if (err instanceof ElementNotFoundError) throw new WaitTimeoutError(`element "${description}"`, timeoutMs);
      throw err;
    }
  }

  async waitForText(text: string, timeoutMs: number): Promise<void> {
    const page = await this.getPage();
    try {
      await page.getByText(text).first().waitFor({ state: "visible", timeout: timeoutMs });
    } catch (err) {
      if (isTimeout(err)) throw new WaitTimeoutError(`text "${text}"`, timeoutMs);
      throw err;
    }
  }

  async screenshot(fullPage: boolean): Promise<Buffer> {
    const page = await this.getPage();
    return page.screenshot({ fullPage, type: "png" });
  }

  async pageInfo(): Promise<PageInfo | null> {
    if (!this.session) return null;
    return this.readPageInfo(this.session.page);
  }

  async probeChallenge(extraSelectors: readonly string[] = []): Promise<Challenge | null> {
    if (!this.session) return null;
    const page = this.session.page;
    const builtIn = CHALLENGE_SELECTORS.map((s) => s.match);
    const selectors = [...builtIn, ...extraSelectors.filter((s) => !builtIn.includes(s))];

    const matched: string[] = [];
    for (const selector of selectors) {
      if (await this.isVisible(page.locator(selector).first(), selector)) matched.push(selector);
    }
    let text = "";
    try {
      const raw = await page.evaluate(PAGE_TEXT_SCRIPT);
      if (typeof raw === "string") text = raw.toLowerCase().slice(0, MAX_PROBE_TEXT);
    } catch (err) {
      this.log.debug("Reading page text failed", { error: errorMessage(err) });
    }

    const challenge = classifyChallenge({ url: page.url(), matched_selectors: matched, text });
    if (challenge) {
      this.log.warn(`Challenge detected: ${challenge.type}`, { indicator: challenge.indicator });
    }
    return challenge;
  }

  async clickFirstMatching(texts: readonly string[], timeoutMs: number): Promise<string | null> {
    const page = await this.getPage();
    try {
      return await pollUntil(
        async () => {
          for (const text of texts) {
            for (const role of ["link", "button"] as const) {
              const locator = page.getByRole(role, { name: text }).first();
              if (await this.isVisible(locator, role)) {
                await locator.click({ timeout: this.elementTimeoutMs });
                await this.settle(page, "load");
                return text;
              }
            }
          }
          return null;
        },
        { timeoutMs, intervalMs: this.pollIntervalMs, label: "Matching link" },
      );
    } catch (err) {
      if (err instanceof TimeoutError) return null;
      throw err;
    }
  }

  async close(): Promise<void> {
    this.clearIdleTimer();
    const session = this.session;
    this.session = null;
    if (session) {
      await session.close();
      this.log.info("Browser closed");
    }
  }

  // ── Internals ────────────────────────────────────────────────────

  protected async getPage(): Promise<PwPage> {
    let session = this.session;
    if (!session) {
      this.launching ??= this.launch();
      try {
        session = await this.launching;
      } finally {
        this.launching = null;
      }
      this.session = session;
    }
    this.resetIdleTimer();
    return session.page;
  }

  private async launch(): Promise<PwSession> {
    this.log.info("Launching browser", { headless: this.headless, slow_mo: this.slowMo });
    try {
      return await this.launcher({
        headless: this.headless,
        slowMo: this.slowMo,
        stealth: this.stealth,
        ...(this.channel ? { channel: this.channel } : {}),
      });
    } catch (err) {
      if (err instanceof AutomationError) throw err;
      throw new BrowserInitializationError(errorMessage(err), this.channel ?? "chromium");
    }
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer();
    if (this.idleTimeoutMs <= 0) return;
    this.idleTimer = setTimeout(() => {
      this.log.info(`Closing browser after ${this.idleTimeoutMs}ms idle`);
      this.close().catch((err: unknown) => logError(this.log, "Idle close failed", err));
    }, this.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private withRole(strategies: readonly LookupStrategy[], role: ClickRole | undefined): readonly LookupStrategy[] {
    if (!role) return strategies;
    return [{ name: `role:${role}`, locate: (p, t) => p.getByRole(role, { name: t }) }, ...strategies];
  }

  private async findElement(
    page: PwPage,
    target: string,
    strategies: readonly LookupStrategy[],
    timeoutMs: number,
  ): Promise<FoundElement> {
    try {
      return await pollUntil(
        async () => {
          for (const strategy of strategies) {
            const locator = strategy.locate(page, target).first();
            if (await this.isVisible(locator, strategy.name)) {
              this.log.debug(`Found "${target}" by ${strategy.name}`);
              return { locator, strategy: strategy.name };
            }
          }
          return null;
        },
        { timeoutMs, intervalMs: this.pollIntervalMs, label: `Element "${target}"` },
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new ElementNotFoundError(target, { strategies: strategies.map((s) => s.name), timeout_ms: timeoutMs });
      }
      throw err;
    }
  }

  /** Invalid selectors for a given page count as "not visible". */
  private async isVisible(locator: PwLocator, label: string): Promise<boolean> {
    try {
      return await locator.isVisible();
    } catch (err) {
      this.log.debug(`Visibility check "${label}" failed`, { error: errorMessage(err) });
      return false;
    }
  }

  private async clickIfVisible(page: PwPage, selector: string): Promise<boolean> {
    const locator = page.locator(selector).first();
    if (!(await this.isVisible(locator, selector))) return false;
    try {
      await locator.click({ timeout: this.elementTimeoutMs });
    } catch (err) {
      this.log.warn(`Click on submit control "${selector}" failed`, { error: errorMessage(err) });
      return false;
    }
    await this.settle(page, "load");
    return true;
  }

  private async clearAndType(locator: PwLocator, text: string): Promise<void> {
    await locator.click({ timeout: this.elementTimeoutMs });
    await locator.fill("", { timeout: this.elementTimeoutMs });
    await locator.pressSequentially(text, { delay: this.typeDelayMs });
  }

  /** Waits for a load state, but never fails the action over it. */
  private async settle(page: PwPage, state: LoadState): Promise<void> {
    try {
      await page.waitForLoadState(state, { timeout: this.settleTimeoutMs });
    } catch (err) {
      if (isTimeout(err)) {
        this.log.debug(`Page did not reach "${state}" within ${this.settleTimeoutMs}ms`);
      } else {
        this.log.warn(`Waiting for "${state}" failed`, { error: errorMessage(err) });
      }
    }
  }

  private async readPageInfo(page: PwPage): Promise<PageInfo> {
    return { url: page.url(), title: await page.title() };
  }
}
