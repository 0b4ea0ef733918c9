import type {
  AddOpts,
  AddOutcome,
  ArtifactRecord,
  Selector,
} from "../artifacts/types.js";

/**
 * Interface for the provenance index.
 * Implementations: SnapshotMetadataIndex (JSON snapshot file),
 * SqliteMetadataIndex (transactional database).
 */
export interface MetadataIndex {
  /**
   * Insert a record.
   * - mode "error" (default): DuplicateError if uuid is already indexed
   * - mode "replace": overwrite in place (keeps insertion position)
   * - mode "skip": keep the existing record
   * IntegrityError if any parent_uuid is not indexed.
   */
  add(record: ArtifactRecord, opts?: AddOpts): Promise<AddOutcome>;

  /**
   * Fetch a record by content hash. Returns null if not indexed.
   */
  get(hash: string): Promise<ArtifactRecord | null>;

  /**
   * Most recently added record carrying this logical id.
   */
  latestById(id: string): Promise<ArtifactRecord | null>;

  /** Order-preserving existence check against custom_id */
  existsById(ids: readonly string[]): Promise<boolean[]>;

  /** Order-preserving existence check against uuid */
  existsByHash(hashes: readonly string[]): Promise<boolean[]>;

  /**
   * Hashes of matching records in insertion order. Each call re-evaluates
   * the selector over the records present when iteration starts.
   */
  select(selector: Selector): AsyncGenerator<string, void, undefined>;

  /**
   * Delete matching records from the index (payloads are untouched).
   * Returns the number removed.
   */
  remove(selector: Selector): Promise<number>;

  /** All records in insertion order */
  records(): Promise<ArtifactRecord[]>;

  size(): Promise<number>;

  /** Persist current state atomically */
  save(): Promise<void>;

  /** Replace in-memory state with durable state */
  load(): Promise<void>;

  /**
   * Run fn with exclusive write access: durable state is refreshed first,
   * changes are persisted when fn resolves and discarded when it throws.
   * Not reentrant.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
