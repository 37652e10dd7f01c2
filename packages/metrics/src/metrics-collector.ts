import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";
import type { ChallengeType, IntentKind } from "@webpilot/schemas";
import type { ExecutionObserver, InteractionOutcome } from "@webpilot/executor";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

export class MetricsCollector implements ExecutionObserver {
  private readonly registry: Registry;
  private readonly prefix: string;

  private readonly interactionsTotal: Counter<"intent" | "outcome">;
  private readonly actionDurationSeconds: Histogram<"intent">;
  private readonly challengesDetectedTotal: Counter<"type">;
  private readonly unrecognizedCommandsTotal: Counter;
  private readonly browserResetsTotal: Counter;
  private readonly sessionBusy: Gauge;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "webpilot_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.interactionsTotal = new Counter({
      name: `${this.prefix}interactions_total`,
      help: "Executed intents by kind and outcome",
      labelNames: ["intent", "outcome"] as const,
      registers: [this.registry],
    });

    // Logins and searches chain several page loads, hence the long tail.
    this.actionDurationSeconds = new Histogram({
      name: `${this.prefix}action_duration_seconds`,
      help: "Intent execution duration in seconds",
      labelNames: ["intent"] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
      registers: [this.registry],
    });

    this.challengesDetectedTotal = new Counter({
      name: `${this.prefix}challenges_detected_total`,
      help: "CAPTCHA and two-factor challenges detected, by type",
      labelNames: ["type"] as const,
      registers: [this.registry],
    });

    this.unrecognizedCommandsTotal = new Counter({
      name: `${this.prefix}unrecognized_commands_total`,
      help: "Commands no pattern matched",
      registers: [this.registry],
    });

    this.browserResetsTotal = new Counter({
      name: `${this.prefix}browser_resets_total`,
      help: "Browser session resets",
      registers: [this.registry],
    });

    this.sessionBusy = new Gauge({
      name: `${this.prefix}session_busy`,
      help: "1 while an action is running against the browser",
      registers: [this.registry],
    });
  }

  recordInteraction(intent: IntentKind, outcome: InteractionOutcome, durationMs: number): void {
    this.interactionsTotal.inc({ intent, outcome });
    this.actionDurationSeconds.observe({ intent }, durationMs / 1000);
  }

  recordChallenge(type: ChallengeType): void {
    this.challengesDetectedTotal.inc({ type });
  }

  recordUnrecognized(): void {
    this.unrecognizedCommandsTotal.inc();
  }

  recordReset(): void {
    this.browserResetsTotal.inc();
  }

  setBusy(busy: boolean): void {
    this.sessionBusy.set(busy ? 1 : 0);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
