import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { PageInfo } from "@webpilot/schemas";
import { ElementNotFoundError, createLogger } from "@webpilot/schemas";
import type { BrowserDriver } from "@webpilot/browser";
import { ActionExecutor, DEFAULT_LOGIN_LINK_TEXTS, SEARCH_SELECTOR } from "./action-executor.js";
import type { ActionExecutorOptions, ExecutionObserver } from "./action-executor.js";
import { ArtifactStore } from "./artifact-store.js";
import { SessionTracker } from "./session-tracker.js";
import { SiteProfileRegistry } from "./site-profiles.js";

// ── Helpers ────────────────────────────────────────────────────────

function createFakeDriver(overrides: Partial<BrowserDriver> = {}): BrowserDriver {
  let active = false;
  let page: PageInfo = { url: "about:blank", title: "" };
  return {
    navigate: vi.fn(async (url: string) => {
      active = true;
      page = { url, title: `Title of ${url}` };
      return page;
    }),
    click: vi.fn().mockResolvedValue({ strategy: "text" }),
    type: vi.fn().mockResolvedValue({ strategy: "placeholder" }),
    fill: vi.fn().mockResolvedValue(undefined),
    submit: vi.fn().mockResolvedValue("button"),
    waitForElement: vi.fn().mockResolvedValue({ strategy: "label" }),
    waitForText: vi.fn().mockResolvedValue(undefined),
    screenshot: vi.fn().mockResolvedValue(Buffer.from("png-bytes")),
    pageInfo: vi.fn(async () => (active ? page : null)),
    probeChallenge: vi.fn().mockResolvedValue(null),
    clickFirstMatching: vi.fn().mockResolvedValue("Log in"),
    isActive: vi.fn(() => active),
    close: vi.fn(async () => {
      active = false;
    }),
    ...overrides,
  };
}

function createObserver(): ExecutionObserver {
  return {
    recordInteraction: vi.fn(),
    recordChallenge: vi.fn(),
    recordReset: vi.fn(),
  };
}

const profiles = new SiteProfileRegistry([
  {
    host: "github.com",
    login_url: "https://github.com/login",
    username_selector: "#login_field",
    password_selector: "#password",
    submit_selector: 'input[name="commit"]',
    credentials_env: { username: "GITHUBS_USERNAME", password: "GITHUBS_PASSWORD" },
  },
  { host: "example.org", search_url: "https://example.org/find?q={query}" },
]);

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "webpilot-exec-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function setup(driver: BrowserDriver, options?: Partial<ActionExecutorOptions>) {
  const tracker = new SessionTracker();
  const sleep = vi.fn().mockResolvedValue(undefined);
  const executor = new ActionExecutor({
    driver,
    tracker,
    artifacts: new ArtifactStore(dir),
    profiles,
    env: {},
    loginLinkTimeoutMs: 0,
    logger: createLogger("test", { level: "silent" }),
    sleep,
    ...options,
  });
  return { executor, tracker, sleep };
}

// ── Simple intents ─────────────────────────────────────────────────

describe("ActionExecutor simple intents", () => {
  it("navigates and records the page in the status", async () => {
    const { executor } = setup(createFakeDriver());
    const result = await executor.execute({ kind: "navigate", url: "https://github.com" });
    expect(result).toEqual({
      success: true,
      message: "Successfully executed: navigate to https://github.com",
      data: { url: "https://github.com", title: "Title of https://github.com" },
    });
    const status = executor.status();
    expect(status.status).toBe("ready");
    expect(status.current_url).toContain("github.com");
    expect(status.last_action).toBe("navigate");
    expect(status.actions_executed).toBe(1);
  });

  it("leaves the same url and title after repeated navigates", async () => {
    const { executor } = setup(createFakeDriver());
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    const first = executor.status();
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    const second = executor.status();
    expect(second.current_url).toBe(first.current_url);
    expect(second.title).toBe(first.title);
    expect(second.actions_executed).toBe(2);
  });

  it("clicks and reports the page", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver);
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    const result = await executor.execute({ kind: "click", target: "Docs", role: "link" });
    expect(driver.click).toHaveBeenCalledWith("Docs", "link");
    expect(result.data).toEqual({
      clicked: "Docs",
      strategy: "text",
      current_url: "https://example.com",
      title: "Title of https://example.com",
    });
  });

  it("does not echo text typed into password fields", async () => {
    const { executor } = setup(createFakeDriver());
    const secret = await executor.execute({ kind: "type", text: "hunter22", field: "password" });
    expect(secret.data).toEqual({ field: "password", typed_length: 8, strategy: "placeholder" });
    const plain = await executor.execute({ kind: "type", text: "cats", field: "search" });
    expect(plain.data).toEqual({ field: "search", typed_length: 4, strategy: "placeholder", text: "cats" });
  });

  it("submits", async () => {
    const { executor } = setup(createFakeDriver());
    const result = await executor.execute({ kind: "submit" });
    expect(result.data).toEqual({ submitted: true, method: "button" });
  });

  it("sleeps for duration waits", async () => {
    const { executor, sleep } = setup(createFakeDriver());
    const result = await executor.execute({ kind: "wait", condition: { type: "duration", seconds: 2 } });
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(result.data).toEqual({ waited_seconds: 2 });
  });

  it("rejects waits over the maximum", async () => {
    const { executor, sleep } = setup(createFakeDriver());
    const result = await executor.execute({ kind: "wait", condition: { type: "duration", seconds: 301 } });
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe("INVALID_REQUEST");
    expect(result.message).toBe("Wait of 301s exceeds the maximum of 300s");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("waits for text and elements through the driver", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver);
    await executor.execute({ kind: "wait", condition: { type: "text", text: "Done", timeout_ms: 1000 } });
    expect(driver.waitForText).toHaveBeenCalledWith("Done", 1000);
    const result = await executor.execute({ kind: "wait", condition: { type: "element", element: "results", timeout_ms: 500 } });
    expect(driver.waitForElement).toHaveBeenCalledWith("results", 500);
    expect(result.data).toEqual({ element: "results", strategy: "label" });
  });

  it("saves screenshots and optionally inlines them", async () => {
    const { executor } = setup(createFakeDriver());
    const plain = await executor.execute({ kind: "screenshot", full_page: false });
    const path = plain.data.screenshot;
    expect(typeof path).toBe("string");
    expect(typeof path === "string" && path.startsWith(dir) && existsSync(path)).toBe(true);
    expect(plain.data.format).toBe("png");
    expect(plain.data.base64).toBeUndefined();

    const inline = await executor.execute({ kind: "screenshot", full_page: true }, { include_base64: true });
    expect(inline.data.base64).toBe("cG5nLWJ5dGVz");
    expect(inline.data.full_page).toBe(true);
  });
});

// ── Failures ───────────────────────────────────────────────────────

describe("ActionExecutor failures", () => {
  it("reports a missing element with a screenshot", async () => {
    const driver = createFakeDriver({ click: vi.fn().mockRejectedValue(new ElementNotFoundError("Login")) });
    const { executor } = setup(driver);
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    const result = await executor.execute({ kind: "click", target: "Login" });

    expect(result.success).toBe(false);
    expect(result.message).toBe("Could not find element: Login");
    expect(result.error?.code).toBe("ELEMENT_NOT_FOUND");
    const shot = result.error?.screenshot;
    expect(typeof shot === "string" && existsSync(shot)).toBe(true);

    const status = executor.status();
    expect(status.status).toBe("error");
    expect(status.last_error?.code).toBe("ELEMENT_NOT_FOUND");
    expect(status.current_url).toBe("https://example.com");
  });

  it("skips the screenshot while no browser is running", async () => {
    const driver = createFakeDriver({ click: vi.fn().mockRejectedValue(new ElementNotFoundError("Login")) });
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "click", target: "Login" });
    expect(result.error?.screenshot).toBeUndefined();
    expect(driver.screenshot).not.toHaveBeenCalled();
  });

  it("wraps unexpected errors as library errors", async () => {
    const driver = createFakeDriver({ click: vi.fn().mockRejectedValue(new Error("Target closed")) });
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "click", target: "x" });
    expect(result.error?.code).toBe("LIBRARY_ERROR");
    expect(result.message).toBe("Unexpected error: Target closed");
  });

  it("clears the last error after a success", async () => {
    const driver = createFakeDriver({ click: vi.fn().mockRejectedValue(new ElementNotFoundError("x")) });
    const { executor } = setup(driver);
    await executor.execute({ kind: "click", target: "x" });
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    expect(executor.status().last_error).toBeNull();
    expect(executor.status().status).toBe("ready");
  });

  it("reports outcomes to the observer", async () => {
    const observer = createObserver();
    const driver = createFakeDriver({ click: vi.fn().mockRejectedValue(new ElementNotFoundError("x")) });
    const { executor } = setup(driver, { observer });
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    await executor.execute({ kind: "click", target: "x" });
    expect(observer.recordInteraction).toHaveBeenCalledWith("navigate", "success", expect.any(Number));
    expect(observer.recordInteraction).toHaveBeenCalledWith("click", "failure", expect.any(Number));
  });
});

// ── Login ──────────────────────────────────────────────────────────

describe("ActionExecutor login", () => {
  const challenge = { type: "recaptcha" as const, indicator: ".g-recaptcha" };

  it("logs in with profile selectors and credentials from the environment", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver, { env: { GITHUBS_USERNAME: "octo", GITHUBS_PASSWORD: "test-secret" } });
    const result = await executor.execute({ kind: "login", website: "github.com" });

    expect(driver.navigate).toHaveBeenCalledWith("https://github.com/login");
    expect(driver.fill).toHaveBeenCalledWith("#login_field", "octo");
    expect(driver.fill).toHaveBeenCalledWith("#password", "test-secret");
    expect(driver.submit).toHaveBeenCalledWith('input[name="commit"]');
    expect(result).toEqual({
      success: true,
      message: "Successfully executed: log in to github.com",
      data: {
        website: "github.com",
        logged_in: true,
        username: "octo",
        credentials_source: "environment",
        submit_method: "button",
        current_url: "https://github.com/login",
        title: "Title of https://github.com/login",
      },
    });
  });

  it("prefers credentials from the command", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver, { env: { GITHUBS_USERNAME: "octo", GITHUBS_PASSWORD: "test-secret" } });
    const result = await executor.execute({ kind: "login", website: "github.com", username: "alice", password: "test-pass" });
    expect(driver.fill).toHaveBeenCalledWith("#login_field", "alice");
    expect(result.data.credentials_source).toBe("command");
  });

  it("stops on the login page without credentials", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "login", website: "example.com" });

    expect(driver.navigate).toHaveBeenCalledWith("https://example.com");
    expect(driver.clickFirstMatching).toHaveBeenCalledWith(DEFAULT_LOGIN_LINK_TEXTS, 0);
    expect(driver.fill).not.toHaveBeenCalled();
    expect(result.data).toEqual({
      website: "example.com",
      logged_in: false,
      current_url: "https://example.com",
      title: "Title of https://example.com",
    });
  });

  it("refuses half a set of credentials", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "login", website: "example.com", username: "octo" });
    expect(result.error?.code).toBe("AUTHENTICATION_FAILED");
    expect(driver.navigate).not.toHaveBeenCalled();
  });

  it("returns a manual-intervention result when a challenge shows", async () => {
    const observer = createObserver();
    const driver = createFakeDriver({ probeChallenge: vi.fn().mockResolvedValue(challenge) });
    const { executor } = setup(driver, {
      observer,
      env: { GITHUBS_USERNAME: "octo", GITHUBS_PASSWORD: "test-secret" },
    });
    const result = await executor.execute({ kind: "login", website: "github.com" });

    expect(result.success).toBe(false);
    expect(result.message).toBe("Manual intervention required: recaptcha challenge detected on github.com");
    expect(result.error?.code).toBe("CHALLENGE_DETECTED");
    expect(result.data.manual_intervention_required).toBe(true);
    expect(result.data.challenge).toEqual(challenge);
    expect(typeof result.data.screenshot).toBe("string");
    expect(result.data.screenshot).toBe(result.error?.screenshot);
    expect(driver.fill).not.toHaveBeenCalled();
    expect(observer.recordChallenge).toHaveBeenCalledWith("recaptcha");
    expect(observer.recordInteraction).toHaveBeenCalledWith("login", "challenge", expect.any(Number));
  });

  it("continues once a challenge is cleared by hand", async () => {
    const probe = vi.fn().mockResolvedValueOnce(challenge).mockResolvedValueOnce(challenge).mockResolvedValue(null);
    const driver = createFakeDriver({ probeChallenge: probe });
    const { executor, sleep } = setup(driver, { challengePollMs: 1000 });
    const result = await executor.execute({
      kind: "login",
      website: "github.com",
      username: "octo",
      password: "test-secret",
      manual_wait_ms: 3000,
    });
    expect(result.success).toBe(true);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("gives up when the manual wait runs out", async () => {
    const driver = createFakeDriver({ probeChallenge: vi.fn().mockResolvedValue(challenge) });
    const { executor, sleep } = setup(driver, { challengePollMs: 1000 });
    const result = await executor.execute({ kind: "login", website: "github.com", manual_wait_ms: 2000 });
    expect(result.error?.code).toBe("CHALLENGE_DETECTED");
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});

// ── Search ─────────────────────────────────────────────────────────

describe("ActionExecutor search", () => {
  it("types into the search field and submits the form", async () => {
    const driver = createFakeDriver({ submit: vi.fn().mockResolvedValue("form") });
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "search", query: "cats", website: "example.net" });
    expect(driver.fill).toHaveBeenCalledWith(SEARCH_SELECTOR, "cats");
    expect(driver.submit).toHaveBeenCalledWith(undefined);
    expect(result.data).toEqual({
      search_query: "cats",
      website: "example.net",
      method: "field",
      submit_method: "form",
      current_url: "https://example.net",
      title: "Title of https://example.net",
    });
  });

  it("falls back to the profile search URL", async () => {
    const driver = createFakeDriver({ fill: vi.fn().mockRejectedValue(new ElementNotFoundError("search")) });
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "search", query: "headless browser", website: "example.org" });
    expect(driver.navigate).toHaveBeenLastCalledWith("https://example.org/find?q=headless%20browser");
    expect(result.data.method).toBe("url");
    expect(result.data.submit_method).toBeNull();
    expect(driver.submit).not.toHaveBeenCalled();
    expect(result.data.current_url).toBe("https://example.org/find?q=headless%20browser");
  });

  it("fails without a field or a search URL", async () => {
    const driver = createFakeDriver({ fill: vi.fn().mockRejectedValue(new ElementNotFoundError("search")) });
    const { executor } = setup(driver);
    const result = await executor.execute({ kind: "search", query: "cats", website: "example.net" });
    expect(result.error?.code).toBe("ELEMENT_NOT_FOUND");
  });
});

describe("ActionExecutor.reset", () => {
  it("closes the browser and clears the status", async () => {
    const observer = createObserver();
    const driver = createFakeDriver();
    const { executor } = setup(driver, { observer });
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    await executor.reset();
    expect(driver.close).toHaveBeenCalled();
    expect(executor.browserActive).toBe(false);
    expect(executor.status()).toMatchObject({ status: "not_initialized", current_url: null, actions_executed: 0 });
    expect(observer.recordReset).toHaveBeenCalled();
  });
});

describe("ActionExecutor.close", () => {
  it("closes the browser but keeps the action count", async () => {
    const observer = createObserver();
    const driver = createFakeDriver();
    const { executor } = setup(driver, { observer });
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    await executor.close();
    expect(driver.close).toHaveBeenCalled();
    expect(executor.status().actions_executed).toBe(1);
    expect(observer.recordReset).not.toHaveBeenCalled();
  });
});

describe("ActionExecutor.status", () => {
  it("reports not_initialized once the browser closes on its own", async () => {
    const driver = createFakeDriver();
    const { executor } = setup(driver);
    await executor.execute({ kind: "navigate", url: "https://github.com/" });
    expect(executor.status()).toMatchObject({ status: "ready", current_url: "https://github.com/" });

    await driver.close();
    expect(executor.status()).toMatchObject({
      status: "not_initialized",
      current_url: null,
      title: null,
      last_action: "navigate",
      actions_executed: 1,
    });
  });

  it("leaves a failed launch reported as an error", async () => {
    const driver = createFakeDriver({ navigate: vi.fn().mockRejectedValue(new Error("launch failed")) });
    const { executor } = setup(driver);
    await executor.execute({ kind: "navigate", url: "https://example.com" });
    expect(executor.status().status).toBe("error");
  });
});
