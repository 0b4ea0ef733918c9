import type { Document } from "../artifacts/types.js";

/**
 * An opaque document transformation (parser, splitter, merger...).
 *
 * Transformers may be slow, non-deterministic or call the network. Errors
 * they throw are never caught, wrapped or retried by this package; callers
 * own retry and timeout policy.
 */
export interface Transformer {
  /** Recorded in each output's metadata.transformer */
  readonly name: string;
  transform(documents: Document[]): Promise<Document[]>;
}

/**
 * Per-document read behaviour for getMatchingDocuments:
 * - "throw" (default): first unreadable payload aborts the sequence
 * - "skip": log and continue with the next record
 */
export type OnReadError = "throw" | "skip";

export type ReadOpts = {
  onError?: OnReadError;
};

export type DeleteOpts = {
  /** Also delete the payloads of removed records (cascading delete) */
  payloads?: boolean;
};

export type DeleteResult = {
  removed: string[]; // hashes removed from the index
  payloadsDeleted: number;
};

export type GCOpts = {
  dryRun?: boolean;
};

export type GCResult = {
  orphans: string[]; // payload hashes no record references
  deleted: number; // 0 on dry run
};

export type AddResult = {
  hash: string;
  outcome: "added" | "replaced" | "skipped";
};

export type InterceptorStats = {
  hits: number;
  misses: number;
};
