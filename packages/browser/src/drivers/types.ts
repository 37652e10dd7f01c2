import type { Challenge, ClickRole, PageInfo } from "@webpilot/schemas";

/** How a form ended up submitted. */
export type SubmitMethod = "selector" | "button" | "form" | "enter";

export interface ElementMatch {
  /** Name of the lookup strategy that found the element. */
  strategy: string;
}

export interface BrowserDriver {
  navigate(url: string): Promise<PageInfo>;
  click(target: string, role?: ClickRole): Promise<ElementMatch>;
  type(field: string, text: string): Promise<ElementMatch>;
  /** Clears and types into the first element matching a CSS selector. */
  fill(selector: string, text: string): Promise<void>;
  /** Submits the current form, trying `preferredSelector` before the generic submit controls. */
  submit(preferredSelector?: string): Promise<SubmitMethod>;
  waitForElement(description: string, timeoutMs: number): Promise<ElementMatch>;
  waitForText(text: string, timeoutMs: number): Promise<void>;
  screenshot(fullPage: boolean): Promise<Buffer>;
  /** Current page, or null while no browser is running. Never launches one. */
  pageInfo(): Promise<PageInfo | null>;
  probeChallenge(extraSelectors?: readonly string[]): Promise<Challenge | null>;
  /** Clicks the first visible link or button whose text matches; returns that text. */
  clickFirstMatching(texts: readonly string[], timeoutMs: number): Promise<string | null>;
  isActive(): boolean;
  close(): Promise<void>;
}
