export * from "./artifacts/index.js";
export * from "./config/index.js";
export * from "./content/index.js";
export * from "./engine/index.js";
export * from "./logging/index.js";
export * from "./metadata/index.js";
