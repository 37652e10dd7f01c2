import { describe, it, expect } from "vitest";
import { DEFAULT_PROFILES_PATH, SiteProfileRegistry, normalizeHost } from "./site-profiles.js";

describe("normalizeHost", () => {
  it("strips scheme, www, port and path", () => {
    expect(normalizeHost("https://www.GitHub.com:443/login")).toBe("github.com");
    expect(normalizeHost("reddit.com")).toBe("reddit.com");
    expect(normalizeHost("en.wikipedia.org/wiki/Main_Page")).toBe("en.wikipedia.org");
  });
});

describe("SiteProfileRegistry", () => {
  const registry = new SiteProfileRegistry([
    { host: "wikipedia.org", search_selector: 'input[name="search"]' },
    { host: "en.wikipedia.org", search_selector: "#searchInput" },
  ]);

  it("matches the exact host first", () => {
    expect(registry.lookup("en.wikipedia.org")?.search_selector).toBe("#searchInput");
  });

  it("matches parent domains", () => {
    expect(registry.lookup("https://de.wikipedia.org")?.search_selector).toBe('input[name="search"]');
  });

  it("does not match unrelated hosts", () => {
    expect(registry.lookup("notwikipedia.org")).toBeUndefined();
    expect(registry.lookup("localhost")).toBeUndefined();
  });

  it("parses YAML", () => {
    const loaded = SiteProfileRegistry.fromYaml(
      ["profiles:", "  - host: example.com", "    search_url: https://example.com/s?q={query}"].join("\n"),
    );
    expect(loaded.lookup("www.example.com")).toEqual({ host: "example.com", search_url: "https://example.com/s?q={query}" });
  });

  it("rejects invalid YAML documents", () => {
    expect(() => SiteProfileRegistry.fromYaml("profiles:\n  - login_url: nope\n", "bad.yaml")).toThrow(
      'Invalid site profiles at "bad.yaml"',
    );
  });

  it("loads the bundled profiles", async () => {
    const bundled = await SiteProfileRegistry.loadFromFile(DEFAULT_PROFILES_PATH);
    expect(bundled.list().map((p) => p.host)).toEqual(["github.com", "reddit.com", "wikipedia.org", "google.com"]);
    expect(bundled.lookup("github.com")?.credentials_env).toEqual({
      username: "GITHUBS_USERNAME",
      password: "GITHUBS_PASSWORD",
    });
    expect(bundled.lookup("old.reddit.com")?.search_url).toBe("https://www.reddit.com/search/?q={query}");
  });

  it("reports a missing file", async () => {
    await expect(SiteProfileRegistry.loadFromFile("/nonexistent/profiles.yaml")).rejects.toThrow(
      "Site profiles not found: /nonexistent/profiles.yaml",
    );
  });
});
