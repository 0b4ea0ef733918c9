// Types
export type {
  AddMode,
  AddOpts,
  AddOutcome,
  ArtifactRecord,
  Document,
  MetadataValue,
  Selector,
} from "./types.js";
export { OUTPUT_INDEX_KEY, STORED_AT_KEY, TRANSFORMER_KEY } from "./types.js";

// Errors
export {
  ArtifactError,
  DuplicateError,
  IntegrityError,
  LockTimeoutError,
  NotFoundError,
  PersistenceError,
} from "./errors.js";
export type { ArtifactErrorDetails, ErrorCode } from "./errors.js";

// Hashing
export {
  computeContentHash,
  createDocument,
  isContentHash,
  sha256Hex,
  stableStringify,
  verifyDocumentHash,
  withProvenance,
} from "./hash.js";
export type { CreateDocumentOpts } from "./hash.js";

// Serialization
export { jsonSerializer } from "./serialize.js";
export type { DocumentSerializer } from "./serialize.js";

// Selectors
export { compileSelector, matchesSelector, parseSelector } from "./selector.js";
export type { Clause } from "./selector.js";
export { ArtifactRecordSchema, DocumentSchema, SelectorSchema, SnapshotSchema } from "./schemas.js";
export type { Snapshot } from "./schemas.js";
