import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { v4 as uuid } from "uuid";

export function slugify(label: string): string {
  const slug = label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40)
    .replace(/-+$/, "");
  return slug || "screenshot";
}

/** Writes screenshots as `<timestamp>-<label>-<id>.png` under one directory. */
export class ArtifactStore {
  readonly dir: string;

  constructor(dir: string, private readonly now: () => Date = () => new Date()) {
    this.dir = resolve(dir);
  }

  async saveScreenshot(bytes: Buffer, label: string): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    const filePath = join(this.dir, `${stamp}-${slugify(label)}-${uuid().slice(0, 8)}.png`);
    await writeFile(filePath, bytes);
    return filePath;
  }
}
