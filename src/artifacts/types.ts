/**
 * A document in transit between pipeline steps.
 * An ArtifactRecord is its persisted projection in the metadata index.
 */
export interface Document {
  id: string; // logical id, caller assigned, stable across reprocessing
  hash: string; // sha256 hex of the canonical form (see computeContentHash)
  parent_hashes: string[]; // provenance, ordered
  metadata: Record<string, unknown>; // JSON-compatible
  content: string;
}

/**
 * Index-side record. Field names follow the persisted snapshot layout:
 * custom_id = logical id, uuid = content hash, parent_uuids = parent hashes.
 */
export interface ArtifactRecord {
  custom_id: string;
  uuid: string;
  parent_uuids: string[];
  metadata: Record<string, unknown>;
}

/** Values a metadata clause can compare against */
export type MetadataValue = string | number | boolean | null;

/**
 * Structured query over the metadata index.
 *
 * Each present clause is one predicate; a record matches when ANY present
 * clause matches. Parts of one clause are ANDed (all `metadata` entries,
 * both time bounds). Absent clauses are never evaluated, so `{}` matches
 * nothing.
 */
export interface Selector {
  ids?: string[];
  hashes?: string[];
  parent_hashes?: string[]; // matched against any element of parent_uuids
  transformer?: string; // metadata.transformer
  metadata?: Record<string, MetadataValue>;
  stored_after?: number; // Unix ms, inclusive
  stored_before?: number; // Unix ms, exclusive
}

/**
 * Collision policy for add:
 * - "error" (default): DuplicateError when the hash is already indexed
 * - "replace": opt-in upsert, overwrites the existing record
 * - "skip": keep the existing record, report "skipped"
 */
export type AddMode = "error" | "replace" | "skip";

export type AddOutcome = "added" | "replaced" | "skipped";

export type AddOpts = {
  mode?: AddMode;
};

/** Reserved record metadata key holding the store time (Unix ms) */
export const STORED_AT_KEY = "stored_at";

/** Reserved metadata key naming the transformer that produced a document */
export const TRANSFORMER_KEY = "transformer";

/** Reserved metadata key holding an output's position among its siblings */
export const OUTPUT_INDEX_KEY = "output_index";
