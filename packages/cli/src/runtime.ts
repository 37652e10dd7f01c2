import { createLogger } from "@webpilot/schemas";
import { ManagedDriver } from "@webpilot/browser";
import type { BrowserDriver } from "@webpilot/browser";
import { ActionExecutor, ArtifactStore, SessionTracker, SiteProfileRegistry } from "@webpilot/executor";
import { MetricsCollector } from "@webpilot/metrics";
import type { Env, WebpilotConfig } from "./config.js";

export interface Runtime {
  driver: BrowserDriver;
  tracker: SessionTracker;
  executor: ActionExecutor;
  metrics: MetricsCollector;
}

export interface RuntimeOverrides {
  driver?: BrowserDriver;
  env?: Env;
}

/** Wire driver, tracker, artifact store, profiles and metrics into one executor. */
export async function createRuntime(config: WebpilotConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const level = config.logLevel;
  const driver =
    overrides.driver ??
    new ManagedDriver({
      headless: config.headless,
      slowMo: config.slowMo,
      idleTimeoutMs: config.idleTimeoutMs,
      navigationTimeoutMs: config.navigationTimeoutMs,
      elementTimeoutMs: config.elementTimeoutMs,
      logger: createLogger("browser", { level }),
    });
  const tracker = new SessionTracker();
  const metrics = new MetricsCollector();
  const profiles = await SiteProfileRegistry.loadFromFile(config.siteProfilesPath);
  const executor = new ActionExecutor({
    driver,
    tracker,
    artifacts: new ArtifactStore(config.screenshotDir),
    profiles,
    observer: metrics,
    env: overrides.env ?? process.env,
    logger: createLogger("executor", { level }),
  });
  return { driver, tracker, executor, metrics };
}
