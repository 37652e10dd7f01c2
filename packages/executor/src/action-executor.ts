/**
 * ActionExecutor: runs one Intent against the browser driver and turns the
 * outcome into an InteractionResult. Every failure is caught here; callers
 * never see an exception for a failed action.
 */

import type {
  Challenge,
  ChallengeType,
  Intent,
  InteractionResult,
  IntentKind,
  Logger,
  LoginIntent,
  PageInfo,
  SearchIntent,
  SessionSnapshot,
  SiteProfile,
  WaitCondition,
} from "@webpilot/schemas";
import {
  AuthenticationError,
  ChallengeDetectedError,
  ElementNotFoundError,
  InvalidRequestError,
  assertNever,
  createLogger,
  errorMessage,
  sleep,
  toErrorPayload,
} from "@webpilot/schemas";
import type { BrowserDriver, SubmitMethod } from "@webpilot/browser";
import type { ExecutionOptions } from "@webpilot/resolver";
import { describeIntent, isSecretField, normalizeUrl } from "@webpilot/resolver";
import type { ArtifactStore } from "./artifact-store.js";
import type { SessionTracker } from "./session-tracker.js";
import { SiteProfileRegistry } from "./site-profiles.js";

export type InteractionOutcome = "success" | "failure" | "challenge";

/** Receives one call per executed intent. The metrics collector implements it. */
export interface ExecutionObserver {
  recordInteraction(intent: IntentKind, outcome: InteractionOutcome, durationMs: number): void;
  recordChallenge(type: ChallengeType): void;
  recordReset(): void;
}

export interface ActionExecutorOptions {
  driver: BrowserDriver;
  tracker: SessionTracker;
  artifacts: ArtifactStore;
  profiles?: SiteProfileRegistry;
  observer?: ExecutionObserver;
  /** Where site credential variables are read from. Default: process.env */
  env?: Readonly<Record<string, string | undefined>>;
  maxWaitSeconds?: number;
  loginLinkTimeoutMs?: number;
  challengePollMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

type ResultData = Record<string, unknown>;

interface Credentials {
  username: string;
  password: string;
  source: "command" | "environment";
}

export const DEFAULT_MAX_WAIT_SECONDS = 300;

export const DEFAULT_LOGIN_LINK_TEXTS: readonly string[] = [
  "Log in",
  "Login",
  "Sign in",
  "Signin",
  "Sign In",
  "Account",
  "My Account",
];

export const USERNAME_SELECTOR = [
  'input[name="username"]',
  'input[name="email"]',
  'input[name="user"]',
  'input[name="login"]',
  'input[id="username"]',
  'input[id="email"]',
  'input[type="email"]',
  'input[autocomplete="username"]',
].join(", ");

export const PASSWORD_SELECTOR = ['input[type="password"]', 'input[name="password"]', 'input[name="pass"]'].join(", ");

export const SEARCH_SELECTOR = [
  'input[name="search"]',
  'input[name="q"]',
  'input[name="query"]',
  'input[name="find"]',
  'textarea[name="q"]',
  'input[type="search"]',
  'input[placeholder*="search" i]',
  'input[aria-label*="search" i]',
].join(", ");

export class ActionExecutor {
  private readonly driver: BrowserDriver;
  private readonly tracker: SessionTracker;
  private readonly artifacts: ArtifactStore;
  private readonly profiles: SiteProfileRegistry;
  private readonly observer: ExecutionObserver | undefined;
  private readonly env: Readonly<Record<string, string | undefined>>;
  private readonly maxWaitSeconds: number;
  private readonly loginLinkTimeoutMs: number;
  private readonly challengePollMs: number;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ActionExecutorOptions) {
    this.driver = options.driver;
    this.tracker = options.tracker;
    this.artifacts = options.artifacts;
    this.profiles = options.profiles ?? new SiteProfileRegistry();
    this.observer = options.observer;
    this.env = options.env ?? process.env;
    this.maxWaitSeconds = options.maxWaitSeconds ?? DEFAULT_MAX_WAIT_SECONDS;
    this.loginLinkTimeoutMs = options.loginLinkTimeoutMs ?? 5_000;
    this.challengePollMs = options.challengePollMs ?? 1_000;
    this.log = options.logger ?? createLogger("executor");
    this.sleep = options.sleep ?? sleep;
  }

  get browserActive(): boolean {
    return this.driver.isActive();
  }

  async execute(intent: Intent, options: ExecutionOptions = { include_base64: false }): Promise<InteractionResult> {
    const label = describeIntent(intent);
    const started = Date.now();
    this.tracker.markBusy(intent.kind);
    this.log.info(`Executing: ${label}`);

    try {
      const data = await this.dispatch(intent, options);
      this.tracker.markReady(await this.currentPage());
      this.observer?.recordInteraction(intent.kind, "success", Date.now() - started);
      return { success: true, message: `Successfully executed: ${label}`, data };
    } catch (err) {
      const payload = toErrorPayload(err);
      const screenshot = await this.captureFailureScreenshot(intent.kind);
      if (screenshot) payload.screenshot = screenshot;
      this.tracker.markError(payload, await this.currentPage());

      const challenge = err instanceof ChallengeDetectedError ? err.challenge : null;
      this.observer?.recordInteraction(intent.kind, challenge ? "challenge" : "failure", Date.now() - started);
      this.log.warn(`Failed: ${label}: ${payload.message}`, { code: payload.code });

      return {
        success: false,
        message: payload.message,
        data: challenge ? challengeData(challenge, screenshot) : {},
        error: payload,
      };
    }
  }

  status(): SessionSnapshot {
    const snapshot = this.tracker.snapshot();
    if (snapshot.status === "busy" || snapshot.current_url === null || this.driver.isActive()) return snapshot;
    this.tracker.markClosed();
    return this.tracker.snapshot();
  }

  async reset(): Promise<void> {
    await this.driver.close();
    this.tracker.reset();
    this.observer?.recordReset();
    this.log.info("Session reset");
  }

  /** Release the browser without touching the tracker; used on shutdown. */
  async close(): Promise<void> {
    await this.driver.close();
  }

  private async dispatch(intent: Intent, options: ExecutionOptions): Promise<ResultData> {
    switch (intent.kind) {
      case "navigate": {
        const info = await this.driver.navigate(intent.url);
        return { url: info.url, title: info.title };
      }
      case "click": {
        const match = await this.driver.click(intent.target, intent.role);
        return { clicked: intent.target, strategy: match.strategy, ...pageData(await this.currentPage()) };
      }
      case "type": {
        const match = await this.driver.type(intent.field, intent.text);
        return {
          field: intent.field,
          typed_length: intent.text.length,
          strategy: match.strategy,
          ...(isSecretField(intent.field) ? {} : { text: intent.text }),
        };
      }
      case "submit": {
        const method = await this.driver.submit();
        return { submitted: true, method, ...pageData(await this.currentPage()) };
      }
      case "wait":
        return this.wait(intent.condition);
      case "screenshot": {
        const bytes = await this.driver.screenshot(intent.full_page);
        const path = await this.artifacts.saveScreenshot(bytes, "screenshot");
        return {
          screenshot: path,
          format: "png",
          full_page: intent.full_page,
          ...(options.include_base64 ? { base64: bytes.toString("base64") } : {}),
        };
      }
      case "login":
        return this.login(intent);
      case "search":
        return this.search(intent);
      default:
        return assertNever(intent, "intent");
    }
  }

  private async wait(condition: WaitCondition): Promise<ResultData> {
    switch (condition.type) {
      case "duration":
        if (condition.seconds > this.maxWaitSeconds) {
          throw new InvalidRequestError(
            `Wait of ${condition.seconds}s exceeds the maximum of ${this.maxWaitSeconds}s`,
            { seconds: condition.seconds, max_seconds: this.maxWaitSeconds },
          );
        }
        await this.sleep(condition.seconds * 1000);
        return { waited_seconds: condition.seconds };
      case "element": {
        const match = await this.driver.waitForElement(condition.element, condition.timeout_ms);
        return { element: condition.element, strategy: match.strategy };
      }
      case "text":
        await this.driver.waitForText(condition.text, condition.timeout_ms);
        return { text: condition.text };
      default:
        return assertNever(condition, "wait condition");
    }
  }

  // ── Composite flows ──────────────────────────────────────────────

  private async login(intent: LoginIntent): Promise<ResultData> {
    const profile = this.profiles.lookup(intent.website);
    const credentials = this.resolveCredentials(intent, profile);

    if (profile?.login_url) {
      await this.driver.navigate(profile.login_url);
    } else {
      await this.driver.navigate(normalizeUrl(intent.website));
      const clicked = await this.driver.clickFirstMatching(
        profile?.login_link_texts ?? DEFAULT_LOGIN_LINK_TEXTS,
        this.loginLinkTimeoutMs,
      );
      if (clicked) this.log.debug(`Opened login page via "${clicked}"`);
      else this.log.info(`No login link on ${intent.website}; using the current page`);
    }
    await this.checkChallenge(intent, profile);

    if (!credentials) {
      this.log.info(`No credentials for ${intent.website}; stopping at the login page`);
      return { website: intent.website, logged_in: false, ...pageData(await this.currentPage()) };
    }

    await this.driver.fill(profile?.username_selector ?? USERNAME_SELECTOR, credentials.username);
    await this.driver.fill(profile?.password_selector ?? PASSWORD_SELECTOR, credentials.password);
    const method = await this.driver.submit(profile?.submit_selector);
    await this.checkChallenge(intent, profile);

    return {
      website: intent.website,
      logged_in: true,
      username: credentials.username,
      credentials_source: credentials.source,
      submit_method: method,
      ...pageData(await this.currentPage()),
    };
  }

  private resolveCredentials(intent: LoginIntent, profile: SiteProfile | undefined): Credentials | null {
    const envNames = profile?.credentials_env;
    const envUser = envNames ? this.env[envNames.username] : undefined;
    const envPass = envNames ? this.env[envNames.password] : undefined;
    const username = intent.username ?? envUser;
    const password = intent.password ?? envPass;

    if (username && password) {
      const fromCommand = intent.username !== undefined && intent.password !== undefined;
      return { username, password, source: fromCommand ? "command" : "environment" };
    }
    if (username || password) {
      throw new AuthenticationError(
        `Both a username and a password are needed to log in to ${intent.website}`,
        intent.website,
      );
    }
    return null;
  }

  /**
   * Throws ChallengeDetectedError when the page shows a CAPTCHA or 2FA
   * prompt. With manual_wait_ms set, polls for it to be cleared by hand first.
   */
  private async checkChallenge(intent: LoginIntent, profile: SiteProfile | undefined): Promise<void> {
    const extra = profile?.challenge_selectors ?? [];
    let challenge = await this.driver.probeChallenge(extra);
    if (!challenge) return;
    this.observer?.recordChallenge(challenge.type);

    const waitMs = intent.manual_wait_ms ?? 0;
    if (waitMs > 0) {
      this.log.warn(`${challenge.type} challenge on ${intent.website}; waiting up to ${waitMs}ms for manual resolution`);
      const attempts = Math.ceil(waitMs / this.challengePollMs);
      for (let i = 0; i < attempts && challenge; i++) {
        await this.sleep(this.challengePollMs);
        challenge = await this.driver.probeChallenge(extra);
      }
      if (!challenge) {
        this.log.info("Challenge cleared");
        return;
      }
    }
    throw new ChallengeDetectedError(challenge, intent.website);
  }

  private async search(intent: SearchIntent): Promise<ResultData> {
    const profile = this.profiles.lookup(intent.website);
    await this.driver.navigate(normalizeUrl(intent.website));

    let method: "field" | "url" = "field";
    let submitMethod: SubmitMethod | null = null;
    try {
      await this.driver.fill(profile?.search_selector ?? SEARCH_SELECTOR, intent.query);
      submitMethod = await this.driver.submit(profile?.submit_selector);
    } catch (err) {
      if (!(err instanceof ElementNotFoundError) || !profile?.search_url) throw err;
      this.log.info(`No search field on ${intent.website}; using the search URL`);
      await this.driver.navigate(profile.search_url.replace("{query}", encodeURIComponent(intent.query)));
      method = "url";
    }

    return {
      search_query: intent.query,
      website: intent.website,
      method,
      submit_method: submitMethod,
      ...pageData(await this.currentPage()),
    };
  }

  // ── Helpers ──────────────────────────────────────────────────────

  private async currentPage(): Promise<PageInfo | null> {
    try {
      return await this.driver.pageInfo();
    } catch (err) {
      this.log.debug("Could not read the current page", { error: errorMessage(err) });
      return null;
    }
  }

  private async captureFailureScreenshot(kind: IntentKind): Promise<string | undefined> {
    if (!this.driver.isActive()) return undefined;
    try {
      const bytes = await this.driver.screenshot(false);
      return await this.artifacts.saveScreenshot(bytes, `${kind}-error`);
    } catch (err) {
      this.log.warn("Failure screenshot could not be taken", { error: errorMessage(err) });
      return undefined;
    }
  }
}

function pageData(page: PageInfo | null): ResultData {
  return page ? { current_url: page.url, title: page.title } : {};
}

function challengeData(challenge: Challenge, screenshot: string | undefined): ResultData {
  return {
    manual_intervention_required: true,
    challenge,
    ...(screenshot ? { screenshot } : {}),
  };
}
