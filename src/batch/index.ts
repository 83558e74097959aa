/**
 * Batch pipeline: discovery, archiving, pooled per-file conversion.
 */

export { findSources, isPythonSource, SOURCE_EXTENSIONS } from "./discover";
export type { SourceList } from "./discover";
export { Archive, MANIFEST_NAME } from "./archive";
export type { ArchiveEntry } from "./archive";
export { runPool } from "./pool";
export type { PoolOptions, TaskOutcome } from "./pool";
export { convertFile } from "./file";
export type { FileOptions, FileOutcome } from "./file";
export { runBatch } from "./batch";
export type { BatchOptions, BatchFailure, BatchSummary } from "./batch";
