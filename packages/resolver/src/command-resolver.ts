import type { ClickRole, Intent } from "@webpilot/schemas";
import { UnrecognizedCommandError, createLogger } from "@webpilot/schemas";

const log = createLogger("resolver");

export const DEFAULT_WAIT_TIMEOUT_MS = 30_000;

/** Host or absolute URL: "github.com", "https://www.google.com/search", "localhost:3000/x". */
const HOST = String.raw`((?:https?:\/\/)?(?:localhost|[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,})(?::\d+)?(?:\/\S*)?)`;
const QUOTED = String.raw`["']([^"']+)["']`;
const FIELD_SUFFIX = String.raw`(?:\s+(?:field|input|box|textbox|text box))?`;
const TYPE_VERB = String.raw`(?:type|enter|input|fill in|write)`;

export interface CommandPattern {
  name: string;
  regex: RegExp;
  build(match: RegExpMatchArray): Intent;
}

export interface ResolvedMatch {
  pattern: string;
  intent: Intent;
}

function pattern(name: string, source: string, build: (match: RegExpMatchArray) => Intent): CommandPattern {
  return { name, regex: new RegExp(`^${source}$`, "i"), build };
}

function group(match: RegExpMatchArray, index: number): string {
  const value = match[index];
  if (value === undefined) {
    throw new Error(`Pattern group ${index} did not participate in the match`);
  }
  return value;
}

function toRole(noun: string | undefined): ClickRole | undefined {
  const lower = noun?.toLowerCase();
  return lower === "button" || lower === "link" ? lower : undefined;
}

function unquote(value: string): string {
  const m = /^["'](.*)["']$/.exec(value);
  return m?.[1] ?? value;
}

export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Ordered pattern table. Order is the disambiguation rule: the first pattern
 * whose regex matches the whole (normalized) command wins.
 */
export const COMMAND_PATTERNS: readonly CommandPattern[] = [
  pattern(
    "navigate",
    String.raw`(?:please\s+)?(?:go to|navigate to|open|visit|browse to|load)\s+(?:the\s+)?(?:(?:website|site|page|url)\s+)?(?:at\s+)?${HOST}`,
    (m) => ({ kind: "navigate", url: normalizeUrl(group(m, 1)) }),
  ),
  pattern(
    "login",
    String.raw`(?:log ?in(?:to)?|sign ?in(?:to)?)(?:\s+(?:to|on|at))?\s+${HOST}(?:\s+with\s+username\s+${QUOTED}\s+and\s+password\s+${QUOTED})?`,
    (m) => ({
      kind: "login",
      website: group(m, 1),
      ...(m[2] !== undefined ? { username: m[2] } : {}),
      ...(m[3] !== undefined ? { password: m[3] } : {}),
    }),
  ),
  pattern(
    "search_quoted",
    String.raw`search(?:\s+for)?\s+${QUOTED}\s+(?:on|in|at)\s+${HOST}`,
    (m) => ({ kind: "search", query: group(m, 1), website: group(m, 2) }),
  ),
  pattern(
    "search",
    String.raw`search(?:\s+for)?\s+(.+?)\s+(?:on|in|at)\s+${HOST}`,
    (m) => ({ kind: "search", query: group(m, 1), website: group(m, 2) }),
  ),
  pattern(
    "click_quoted",
    String.raw`click(?:\s+on)?(?:\s+the)?(?:\s+(button|link|element))?(?:\s+(?:with text|with|that says|containing|labell?ed))?\s+${QUOTED}(?:\s+(button|link|element))?`,
    (m) => {
      const role = toRole(m[1]) ?? toRole(m[3]);
      return { kind: "click", target: group(m, 2), ...(role ? { role } : {}) };
    },
  ),
  pattern(
    "click",
    String.raw`click(?:\s+on)?(?:\s+the)?\s+(.+?)(?:\s+(button|link|element))?`,
    (m) => {
      const role = toRole(m[2]);
      return { kind: "click", target: group(m, 1), ...(role ? { role } : {}) };
    },
  ),
  pattern(
    "type_quoted",
    String.raw`${TYPE_VERB}\s+${QUOTED}\s+(?:in|into|on)\s+(?:the\s+)?(.+?)${FIELD_SUFFIX}`,
    (m) => ({ kind: "type", text: group(m, 1), field: unquote(group(m, 2)) }),
  ),
  pattern(
    "type",
    String.raw`${TYPE_VERB}\s+(.+?)\s+(?:in|into|on)\s+(?:the\s+)?(.+?)${FIELD_SUFFIX}`,
    (m) => ({ kind: "type", text: group(m, 1), field: unquote(group(m, 2)) }),
  ),
  pattern(
    "submit",
    String.raw`(?:(?:submit|send)(?:\s+the)?(?:\s+(?:form|search|query))?|(?:press|hit)\s+(?:the\s+)?(?:enter|return)(?:\s+key)?)`,
    () => ({ kind: "submit" }),
  ),
  pattern(
    "wait_duration",
    String.raw`wait(?:\s+for)?\s+(\d+(?:\.\d+)?)(?:\s*(seconds?|secs?|s|milliseconds?|ms))?`,
    (m) => {
      const amount = Number(group(m, 1));
      const unit = m[2]?.toLowerCase() ?? "seconds";
      const seconds = unit === "ms" || unit.startsWith("milli") ? amount / 1000 : amount;
      return { kind: "wait", condition: { type: "duration", seconds } };
    },
  ),
  pattern(
    "wait_text",
    String.raw`wait\s+(?:for|until)\s+(?:the\s+)?text\s+${QUOTED}(?:\s+to\s+appear)?`,
    (m) => ({ kind: "wait", condition: { type: "text", text: group(m, 1), timeout_ms: DEFAULT_WAIT_TIMEOUT_MS } }),
  ),
  pattern(
    "wait_element",
    String.raw`wait\s+(?:for|until)\s+(?:the\s+)?(.+?)(?:\s+to\s+(?:appear|load|be visible|show up))?`,
    (m) => ({
      kind: "wait",
      condition: { type: "element", element: unquote(group(m, 1)), timeout_ms: DEFAULT_WAIT_TIMEOUT_MS },
    }),
  ),
  pattern(
    "screenshot",
    String.raw`(?:(?:take|capture|grab|save)\s+(?:a\s+)?)?(full[- ]page\s+)?screenshot(?:\s+of\s+(?:the\s+)?(whole\s+|full\s+|entire\s+)?(?:page|screen))?`,
    (m) => ({ kind: "screenshot", full_page: m[1] !== undefined || m[2] !== undefined }),
  ),
];

const QUOTED_SEGMENT = /("[^"]*"|'[^']*')/;

/**
 * Trim, collapse whitespace outside quoted values, and drop one trailing
 * sentence mark. Text inside quotes reaches the page as written.
 */
export function normalizeCommand(text: string): string {
  return text
    .trim()
    .split(QUOTED_SEGMENT)
    .map((part, i) => (i % 2 === 1 ? part : part.replace(/\s+/g, " ")))
    .join("")
    .replace(/[.!?]$/, "")
    .trim();
}

/** Every pattern that matches, in table order. Useful for spotting overlapping phrasings. */
export function resolveAll(text: string): ResolvedMatch[] {
  const normalized = normalizeCommand(text);
  if (normalized.length === 0) return [];
  const matches: ResolvedMatch[] = [];
  for (const p of COMMAND_PATTERNS) {
    const m = normalized.match(p.regex);
    if (m) matches.push({ pattern: p.name, intent: p.build(m) });
  }
  return matches;
}

export function resolveCommand(text: string): Intent {
  const normalized = normalizeCommand(text);
  for (const p of COMMAND_PATTERNS) {
    const m = normalized.match(p.regex);
    if (m) {
      const intent = p.build(m);
      log.debug(`Matched pattern "${p.name}"`, { kind: intent.kind });
      return intent;
    }
  }
  log.warn(`No pattern matched for command: ${normalized}`);
  throw new UnrecognizedCommandError(normalized.length > 0 ? normalized : text);
}
