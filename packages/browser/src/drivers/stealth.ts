import type { BrowserContextOptions } from "playwright-core";

export const VIEWPORT = { width: 1280, height: 800 } as const;

/** Chromium args that reduce automation fingerprinting. */
export const STEALTH_ARGS: readonly string[] = [
  "--disable-blink-features=AutomationControlled",
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-extensions",
  "--disable-default-apps",
  "--disable-features=Translate",
  "--disable-popup-blocking",
  "--disable-sync",
  "--password-store=basic",
  "--use-mock-keychain",
  "--lang=en-US,en",
];

export const BASE_CONTEXT_OPTS: BrowserContextOptions = {
  viewport: VIEWPORT,
  locale: "en-US",
};

/** Context that looks like an ordinary desktop Chrome. */
export const STEALTH_CONTEXT_OPTS: BrowserContextOptions = {
  ...BASE_CONTEXT_OPTS,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36",
  timezoneId: "America/New_York",
  extraHTTPHeaders: {
    "Accept-Language": "en-US,en;q=0.9",
    "Upgrade-Insecure-Requests": "1",
  },
};

/**
 * Runs before any page script. Hides navigator.webdriver and fills in the
 * properties headless Chromium leaves empty.
 */
export const STEALTH_INIT_SCRIPT = `
Object.defineProperty(Navigator.prototype, 'webdriver', { get: () => undefined, configurable: true });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3] });
if (!window.chrome) window.chrome = {};
if (!window.chrome.runtime) window.chrome.runtime = {};
`;
