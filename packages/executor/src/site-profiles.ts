import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import type { SiteProfile } from "@webpilot/schemas";
import { isSiteProfilesDocument, validateSiteProfiles } from "@webpilot/schemas";

export const DEFAULT_PROFILES_PATH = fileURLToPath(new URL("../profiles/site-profiles.yaml", import.meta.url));

/** "https://www.GitHub.com:443/login" -> "github.com" */
export function normalizeHost(website: string): string {
  const withoutScheme = website.trim().toLowerCase().replace(/^[a-z][a-z0-9+.-]*:\/\//, "");
  const host = withoutScheme.split(/[/?#]/, 1)[0] ?? "";
  return host.replace(/:\d+$/, "").replace(/^www\./, "");
}

export class SiteProfileRegistry {
  private readonly profiles: SiteProfile[];

  constructor(profiles: SiteProfile[] = []) {
    this.profiles = profiles.map((p) => ({ ...p, host: normalizeHost(p.host) }));
  }

  static async loadFromFile(filePath: string): Promise<SiteProfileRegistry> {
    if (!existsSync(filePath)) throw new Error(`Site profiles not found: ${filePath}`);
    const content = await readFile(filePath, "utf-8");
    return SiteProfileRegistry.fromYaml(content, filePath);
  }

  static fromYaml(content: string, source = "<inline>"): SiteProfileRegistry {
    const data: unknown = yaml.load(content);
    if (!isSiteProfilesDocument(data)) {
      const { errors } = validateSiteProfiles(data);
      throw new Error(`Invalid site profiles at "${source}": ${errors.join(", ")}`);
    }
    return new SiteProfileRegistry(data.profiles);
  }

  /** Exact host first, then the closest parent domain. */
  lookup(website: string): SiteProfile | undefined {
    let host = normalizeHost(website);
    while (host.includes(".")) {
      const match = this.profiles.find((p) => p.host === host);
      if (match) return match;
      host = host.slice(host.indexOf(".") + 1);
    }
    return undefined;
  }

  list(): SiteProfile[] {
    return [...this.profiles];
  }
}
