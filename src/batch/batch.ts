/**
 * Batch conversion over many files.
 */

import { availableParallelism } from "os";
import { convertFile } from "./file";
import type { FileOptions, FileOutcome } from "./file";
import { runPool } from "./pool";

export type BatchOptions = FileOptions & {
  /** Files converted at once (default: available parallelism) */
  concurrency?: number;
  signal?: AbortSignal;
  failFast?: boolean;
  /** Called as each file finishes, in completion order */
  onFile?: (outcome: FileOutcome) => void;
  onError?: (file: string, error: unknown) => void;
};

export type BatchFailure = {
  file: string;
  error: unknown;
};

export type BatchSummary = {
  converted: FileOutcome[];
  unchanged: FileOutcome[];
  failed: BatchFailure[];
  /** Files never started because of an abort or fail-fast */
  skipped: string[];
};

export async function runBatch(files: readonly string[], options: BatchOptions): Promise<BatchSummary> {
  const outcomes = await runPool(
    files,
    async (file) => {
      try {
        const outcome = await convertFile(file, options);
        options.onFile?.(outcome);
        return outcome;
      } catch (error) {
        options.onError?.(file, error);
        throw error;
      }
    },
    {
      concurrency: options.concurrency ?? availableParallelism(),
      signal: options.signal,
      failFast: options.failFast,
    }
  );

  const summary: BatchSummary = { converted: [], unchanged: [], failed: [], skipped: [] };
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "fulfilled":
        if (outcome.value.state === "assembled") {
          summary.converted.push(outcome.value);
        } else {
          summary.unchanged.push(outcome.value);
        }
        break;
      case "rejected":
        summary.failed.push({ file: outcome.item, error: outcome.reason });
        break;
      case "skipped":
        summary.skipped.push(outcome.item);
        break;
    }
  }
  return summary;
}
