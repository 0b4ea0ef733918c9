/**
 * Interface for payload storage keyed by content hash.
 * Implementations: FsContentStore (production), InMemoryContentStore (tests)
 *
 * Payloads are opaque bytes. A resolved put is visible to every later get.
 */
export interface ContentStore {
  /**
   * Persist a payload under its hash.
   * - identical payload already stored: no-op
   * - different payload under the same hash: IntegrityError
   */
  put(hash: string, payload: Buffer): Promise<void>;

  /**
   * Read a payload. Throws NotFoundError if absent.
   */
  get(hash: string): Promise<Buffer>;

  exists(hash: string): Promise<boolean>;

  /**
   * Remove a payload. Returns false if it was not stored.
   */
  delete(hash: string): Promise<boolean>;

  /**
   * All stored hashes (unordered). Used by garbage collection.
   */
  list(): Promise<string[]>;
}
