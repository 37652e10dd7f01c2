import type { Challenge, ChallengeType } from "@webpilot/schemas";

interface Indicator {
  match: string;
  type: ChallengeType;
}

/** Checked in order; the first selector present on the page decides the type. */
export const CHALLENGE_SELECTORS: readonly Indicator[] = [
  { match: 'iframe[src*="recaptcha"]', type: "recaptcha" },
  { match: ".g-recaptcha", type: "recaptcha" },
  { match: 'iframe[src*="hcaptcha"]', type: "hcaptcha" },
  { match: ".h-captcha", type: "hcaptcha" },
  { match: 'iframe[src*="challenges.cloudflare.com"]', type: "turnstile" },
  { match: ".cf-turnstile", type: "turnstile" },
  { match: 'img[alt*="captcha" i]', type: "text_captcha" },
  { match: 'input[name*="captcha" i]', type: "text_captcha" },
  { match: 'input[autocomplete="one-time-code"]', type: "two_factor" },
  { match: 'input[name*="otp" i]', type: "two_factor" },
  { match: 'input[name*="2fa" i]', type: "two_factor" },
  { match: 'input[placeholder*="verification" i]', type: "two_factor" },
  { match: 'div[class*="captcha" i]', type: "unknown" },
];

const URL_PATTERNS: readonly Indicator[] = [
  { match: "two-factor", type: "two_factor" },
  { match: "/2fa", type: "two_factor" },
  { match: "captcha", type: "unknown" },
];

// Weaker signals: plain page text. Compared against lower-cased text.
const TEXT_PATTERNS: readonly Indicator[] = [
  { match: "i'm not a robot", type: "recaptcha" },
  { match: "i am not a robot", type: "recaptcha" },
  { match: "verify you are human", type: "turnstile" },
  { match: "enter the characters you see", type: "text_captcha" },
  { match: "two-factor authentication", type: "two_factor" },
  { match: "two factor authentication", type: "two_factor" },
  { match: "authentication code", type: "two_factor" },
  { match: "verification code", type: "two_factor" },
];

/** What the driver collected from the page. */
export interface ChallengeProbe {
  url: string;
  /** Selectors (built-in and site-specific) with at least one match, in probe order. */
  matched_selectors: readonly string[];
  /** Lower-cased visible text of the page body. */
  text: string;
}

export function classifyChallenge(probe: ChallengeProbe): Challenge | null {
  const selector = probe.matched_selectors[0];
  if (selector !== undefined) {
    const known = CHALLENGE_SELECTORS.find((s) => s.match === selector);
    return { type: known?.type ?? "unknown", indicator: selector };
  }
  const url = probe.url.toLowerCase();
  const byUrl = URL_PATTERNS.find((p) => url.includes(p.match));
  if (byUrl) return { type: byUrl.type, indicator: `url:${byUrl.match}` };
  const byText = TEXT_PATTERNS.find((p) => probe.text.includes(p.match));
  if (byText) return { type: byText.type, indicator: `text:${byText.match}` };
  return null;
}
