export { ManagedDriver, CLICK_STRATEGIES, FIELD_STRATEGIES, cssString } from "./drivers/managed.js";
export type { ManagedDriverOptions, LookupStrategy } from "./drivers/managed.js";
export { adaptPage, adaptLocator, launchChromium, loadPlaywright } from "./drivers/playwright.js";
export type { LaunchSettings, LoadState, PwLocator, PwPage, PwSession, SessionLauncher } from "./drivers/playwright.js";
export { STEALTH_ARGS, STEALTH_CONTEXT_OPTS, STEALTH_INIT_SCRIPT, VIEWPORT } from "./drivers/stealth.js";
export { SUBMIT_SELECTORS, clickScript } from "./drivers/scripts.js";
export { CHALLENGE_SELECTORS, classifyChallenge } from "./challenge.js";
export type { ChallengeProbe } from "./challenge.js";
export type { BrowserDriver, ElementMatch, SubmitMethod } from "./drivers/types.js";
