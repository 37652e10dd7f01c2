import type { ErrorPayload, IntentKind, PageInfo, SessionSnapshot } from "@webpilot/schemas";

function initialState(now: Date): SessionSnapshot {
  return {
    status: "not_initialized",
    current_url: null,
    title: null,
    last_action: null,
    last_error: null,
    actions_executed: 0,
    updated_at: now.toISOString(),
  };
}

/**
 * Status of the one browser session. The executor is the only writer;
 * readers get copies.
 */
export class SessionTracker {
  private state: SessionSnapshot;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.state = initialState(this.now());
  }

  markBusy(kind: IntentKind): void {
    this.update({ status: "busy", last_action: kind });
  }

  /** A successful action clears the previous error. */
  markReady(page: PageInfo | null): void {
    this.update({
      status: "ready",
      last_error: null,
      actions_executed: this.state.actions_executed + 1,
      ...this.pageFields(page),
    });
  }

  markError(error: ErrorPayload, page?: PageInfo | null): void {
    this.update({
      status: "error",
      last_error: error,
      actions_executed: this.state.actions_executed + 1,
      ...this.pageFields(page ?? null),
    });
  }

  /** The browser went away outside an action, e.g. on idle close. Counters and the last error survive. */
  markClosed(): void {
    this.update({ status: "not_initialized", current_url: null, title: null });
  }

  reset(): void {
    this.state = initialState(this.now());
  }

  snapshot(): SessionSnapshot {
    return structuredClone(this.state);
  }

  private pageFields(page: PageInfo | null): Pick<SessionSnapshot, "current_url" | "title"> {
    // Keep the last known page when the browser could not be asked.
    if (!page) return { current_url: this.state.current_url, title: this.state.title };
    return { current_url: page.url, title: page.title };
  }

  private update(patch: Partial<SessionSnapshot>): void {
    this.state = { ...this.state, ...patch, updated_at: this.now().toISOString() };
  }
}
