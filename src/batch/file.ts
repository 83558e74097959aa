/**
 * Conversion of a single file on disk.
 *
 * A file is either fully converted, archived and replaced, or left as it
 * was. The new content goes to a temporary file beside the original and is
 * renamed over it.
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import type { ConvertOptions } from "../config/options";
import { convertSource } from "../convert/convert";
import type { Edit } from "../convert/rewriter";
import type { Archive, ArchiveEntry } from "./archive";

export type FileOptions = {
  convert: Partial<ConvertOptions>;
  encoding: BufferEncoding;
  /** Where originals are copied before being replaced */
  archive?: Archive;
  /** Convert without writing anything */
  dryRun?: boolean;
};

export type FileOutcome = {
  file: string;
  state: "unchanged" | "assembled";
  /** The original text, for reporting edit locations */
  source: string;
  edits: readonly Edit[];
  written: boolean;
  archived?: ArchiveEntry;
};

export async function convertFile(file: string, options: FileOptions): Promise<FileOutcome> {
  const source = await fs.readFile(file, options.encoding);
  const result = convertSource(source, { ...options.convert, filename: file });

  if (result.state === "unchanged" || options.dryRun) {
    return { file, state: result.state, source, edits: result.edits, written: false };
  }

  const archived = options.archive ? await options.archive.store(file) : undefined;
  await replaceFile(file, result.text, options.encoding);
  return { file, state: result.state, source, edits: result.edits, written: true, archived };
}

async function replaceFile(file: string, text: string, encoding: BufferEncoding): Promise<void> {
  const temp = path.join(path.dirname(file), `.${path.basename(file)}.${randomUUID()}.tmp`);
  const { mode } = await fs.stat(file);
  try {
    await fs.writeFile(temp, text, { encoding, mode });
    await fs.rename(temp, file);
  } catch (err) {
    await fs.rm(temp, { force: true });
    throw err;
  }
}
