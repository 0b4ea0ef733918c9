export {
  ConfigSchema,
  DEFAULT_CONFIG,
  METADATA_FILES,
  metadataPath,
  resolveConfig,
} from "./config.js";
export type { StoreConfig, StoreConfigOverrides } from "./config.js";
export { openArtifactLayer, openIndex } from "./open.js";
export type { OpenOpts } from "./open.js";
