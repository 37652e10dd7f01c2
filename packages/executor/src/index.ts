export {
  ActionExecutor,
  DEFAULT_LOGIN_LINK_TEXTS,
  DEFAULT_MAX_WAIT_SECONDS,
  PASSWORD_SELECTOR,
  SEARCH_SELECTOR,
  USERNAME_SELECTOR,
} from "./action-executor.js";
export type { ActionExecutorOptions, ExecutionObserver, InteractionOutcome } from "./action-executor.js";
export { SessionTracker } from "./session-tracker.js";
export { ArtifactStore, slugify } from "./artifact-store.js";
export { DEFAULT_PROFILES_PATH, SiteProfileRegistry, normalizeHost } from "./site-profiles.js";
