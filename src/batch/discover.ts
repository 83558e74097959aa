/**
 * Source file discovery.
 */

import type { Stats } from "fs";
import * as fs from "fs/promises";
import * as path from "path";

export const SOURCE_EXTENSIONS: readonly string[] = [".py", ".pyw"];

export type SourceList = {
  /** Python sources, sorted, without duplicates */
  files: string[];
  /** Arguments that do not exist */
  missing: string[];
};

export function isPythonSource(file: string): boolean {
  return SOURCE_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

/**
 * Expand files and directories into the Python sources they hold.
 * Directories are walked recursively; symbolic links inside them are
 * skipped.
 */
export async function findSources(paths: readonly string[]): Promise<SourceList> {
  const found = new Set<string>();
  const missing: string[] = [];

  for (const entry of paths) {
    let stat: Stats;
    try {
      stat = await fs.stat(entry);
    } catch (err) {
      if (isNotFound(err)) {
        missing.push(entry);
        continue;
      }
      throw err;
    }
    if (stat.isDirectory()) {
      for (const file of await walk(entry)) found.add(file);
    } else if (stat.isFile() && isPythonSource(entry)) {
      found.add(path.normalize(entry));
    }
  }

  return { files: [...found].sort(), missing };
}

async function walk(dir: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isSymbolicLink()) continue;
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile() && isPythonSource(full)) {
      files.push(full);
    }
  }
  return files;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
