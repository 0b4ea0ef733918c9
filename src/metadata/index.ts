// Interface
export type { MetadataIndex } from "./store.js";

// Implementations
export { SnapshotMetadataIndex } from "./snapshot.js";
export { SqliteMetadataIndex } from "./sqlite.js";

// Utilities
export { RecordSet } from "./record-set.js";
