// Interface
export type { ContentStore } from "./store.js";

// Implementations
export { FsContentStore } from "./fs.js";
export { InMemoryContentStore } from "./memory.js";

// Utilities
export { assertContentHash } from "./validate.js";
