/**
 * Archive of original files.
 *
 * Before a file is rewritten, a copy goes into the archive directory under
 * a unique name and an entry is appended to the archive's manifest. The
 * manifest is what `recover` reads to put originals back.
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";

export const MANIFEST_NAME = "manifest.jsonl";

export type ArchiveEntry = {
  /** Absolute path of the archived file */
  original: string;
  /** File name inside the archive directory */
  archived: string;
  /** ISO timestamp */
  storedAt: string;
};

export class Archive {
  readonly root: string;
  private writes: Promise<void> = Promise.resolve();

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  get manifestPath(): string {
    return path.join(this.root, MANIFEST_NAME);
  }

  /**
   * Copy `file` into the archive and record it.
   */
  async store(file: string): Promise<ArchiveEntry> {
    await fs.mkdir(this.root, { recursive: true });
    const ext = path.extname(file);
    const stem = path.basename(file, ext);
    const archived = `${stem}-${randomUUID()}${ext}`;
    await fs.copyFile(file, path.join(this.root, archived));

    const entry: ArchiveEntry = {
      original: path.resolve(file),
      archived,
      storedAt: new Date().toISOString(),
    };
    await this.append(entry);
    return entry;
  }

  /**
   * Manifest entries in the order they were stored.
   */
  async entries(): Promise<ArchiveEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.manifestPath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    return content
      .split("\n")
      .filter((line) => line.trim() !== "")
      .map((line, index) => parseEntry(line, index + 1, this.manifestPath));
  }

  /**
   * Restore every archived file to its original path. When a file was
   * archived more than once, the earliest copy wins: it is the one taken
   * before any conversion.
   */
  async recover(): Promise<ArchiveEntry[]> {
    const earliest = new Map<string, ArchiveEntry>();
    for (const entry of await this.entries()) {
      if (!earliest.has(entry.original)) earliest.set(entry.original, entry);
    }
    const restored: ArchiveEntry[] = [];
    for (const entry of earliest.values()) {
      await fs.mkdir(path.dirname(entry.original), { recursive: true });
      await fs.copyFile(path.join(this.root, entry.archived), entry.original);
      restored.push(entry);
    }
    return restored;
  }

  // Manifest appends are chained so concurrent stores never interleave
  private append(entry: ArchiveEntry): Promise<void> {
    const write = this.writes.then(() => fs.appendFile(this.manifestPath, JSON.stringify(entry) + "\n", "utf8"));
    this.writes = write.catch(() => undefined);
    return write;
  }
}

function parseEntry(line: string, lineNumber: number, manifest: string): ArchiveEntry {
  const value: unknown = JSON.parse(line);
  if (
    typeof value === "object" &&
    value !== null &&
    "original" in value &&
    "archived" in value &&
    "storedAt" in value &&
    typeof value.original === "string" &&
    typeof value.archived === "string" &&
    typeof value.storedAt === "string"
  ) {
    return { original: value.original, archived: value.archived, storedAt: value.storedAt };
  }
  throw new Error(`${manifest}:${lineNumber}: malformed archive entry`);
}
