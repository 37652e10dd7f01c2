export type DemoName = "github-login" | "wikipedia-search" | "reddit-search";

export interface DemoScript {
  description: string;
  commands: readonly string[];
  /** Environment variables the script reads through the site profile. */
  credentials?: readonly [string, string];
}

export const DEMOS: Readonly<Record<DemoName, DemoScript>> = {
  "github-login": {
    description: "Sign in to GitHub and capture the landing page",
    commands: ["go to github.com", "log in to github.com", "take a screenshot"],
    credentials: ["GITHUBS_USERNAME", "GITHUBS_PASSWORD"],
  },
  "wikipedia-search": {
    description: "Search Wikipedia and open a result",
    commands: [
      "go to wikipedia.org",
      'type "headless browser" in the search field',
      "press enter",
      'click "Headless browser"',
      "take a full page screenshot",
    ],
  },
  "reddit-search": {
    description: "Sign in to Reddit and search it",
    commands: ["log in to reddit.com", 'search for "browser automation" on reddit.com', "take a screenshot"],
    credentials: ["REDDIT_USERNAME", "REDDIT_PASSWORD"],
  },
};

export function isDemoName(value: string): value is DemoName {
  return Object.hasOwn(DEMOS, value);
}

/** Credential variables a demo needs that are not set. */
export function missingCredentials(demo: DemoScript, env: Readonly<Record<string, string | undefined>>): string[] {
  return (demo.credentials ?? []).filter((key) => !env[key]);
}
