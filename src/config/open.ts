import * as fs from "node:fs";
import { FsContentStore } from "../content/fs.js";
import { ArtifactLayer } from "../engine/artifact-layer.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { MetadataIndex } from "../metadata/store.js";
import { SnapshotMetadataIndex } from "../metadata/snapshot.js";
import { SqliteMetadataIndex } from "../metadata/sqlite.js";
import {
  metadataPath,
  resolveConfig,
  type StoreConfig,
  type StoreConfigOverrides,
} from "./config.js";

export type OpenOpts = StoreConfigOverrides & {
  logger?: Logger;
  env?: Record<string, string | undefined>;
};

export async function openIndex(config: StoreConfig, logger: Logger): Promise<MetadataIndex> {
  const location = metadataPath(config);
  if (config.index === "sqlite") {
    return new SqliteMetadataIndex({ dbPath: location, logger });
  }
  return SnapshotMetadataIndex.open({ path: location, lock: config.lock, logger });
}

/**
 * Open the filesystem-backed store under config.root: payload files plus the
 * configured metadata index, loaded and ready.
 */
export async function openArtifactLayer(opts: OpenOpts = {}): Promise<ArtifactLayer> {
  const { logger: providedLogger, env, ...overrides } = opts;
  const config = resolveConfig(overrides, env);
  const logger = providedLogger ?? createLogger({ level: config.log_level });

  await fs.promises.mkdir(config.root, { recursive: true });
  const content = new FsContentStore({ root: config.root });
  const index = await openIndex(config, logger);
  logger.info({ root: config.root, index: config.index }, "artifact store opened");
  return new ArtifactLayer({ content, index, logger });
}
