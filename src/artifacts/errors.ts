/**
 * Error codes for artifact store operations.
 */
export type ErrorCode =
  | "NOT_FOUND"        // lookup by hash/id with no match
  | "INTEGRITY"        // hash collision, bad payload, or dangling parent hash
  | "DUPLICATE"        // add of a hash that is already indexed (mode: "error")
  | "PERSISTENCE"      // snapshot / database read or write failed
  | "INVALID_REQUEST"  // malformed selector, hash or config value
  | "LOCK_TIMEOUT";    // cross-process lock not acquired in time

export interface ArtifactErrorDetails {
  hash?: string;
  id?: string;
  parent_hash?: string;
  path?: string;
  cause?: unknown;
}

/**
 * Custom error class for artifact store operations.
 * Enables typed error handling via error.code or instanceof on the subclasses.
 */
export class ArtifactError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ArtifactErrorDetails,
  ) {
    super(message);
    this.name = "ArtifactError";
  }
}

export class NotFoundError extends ArtifactError {
  constructor(message: string, details?: ArtifactErrorDetails) {
    super("NOT_FOUND", message, details);
    this.name = "NotFoundError";
  }
}

export class IntegrityError extends ArtifactError {
  constructor(message: string, details?: ArtifactErrorDetails) {
    super("INTEGRITY", message, details);
    this.name = "IntegrityError";
  }
}

export class DuplicateError extends ArtifactError {
  constructor(message: string, details?: ArtifactErrorDetails) {
    super("DUPLICATE", message, details);
    this.name = "DuplicateError";
  }
}

export class PersistenceError extends ArtifactError {
  constructor(message: string, details?: ArtifactErrorDetails) {
    super("PERSISTENCE", message, details);
    this.name = "PersistenceError";
  }
}

export class LockTimeoutError extends ArtifactError {
  constructor(path: string) {
    super("LOCK_TIMEOUT", `Timed out waiting for lock on ${path}`, { path });
    this.name = "LockTimeoutError";
  }
}
