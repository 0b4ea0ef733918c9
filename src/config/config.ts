import * as path from "node:path";
import { z } from "zod";
import { ArtifactError } from "../artifacts/errors.js";

export const ConfigSchema = z
  .object({
    root: z.string().min(1), // payload files + metadata snapshot/database
    index: z.enum(["snapshot", "sqlite"]),
    lock: z
      .object({
        stale: z.number().int().positive(),
        retries: z.number().int().nonnegative(),
      })
      .strict(),
    log_level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  })
  .strict();

export type StoreConfig = z.infer<typeof ConfigSchema>;

export type StoreConfigOverrides = {
  root?: string;
  index?: StoreConfig["index"];
  lock?: Partial<StoreConfig["lock"]>;
  log_level?: StoreConfig["log_level"];
};

export const DEFAULT_CONFIG: Readonly<StoreConfig> = {
  root: "data/artifacts",
  index: "snapshot",
  lock: {
    stale: 10_000,
    retries: 300,
  },
  log_level: "info",
};

/** File names inside root */
export const METADATA_FILES = {
  snapshot: "metadata.json",
  sqlite: "metadata.sqlite",
} as const;

type Env = Record<string, string | undefined>;

type EnvConfig = {
  root?: string;
  index?: string;
  log_level?: string;
  lock: { stale?: number; retries?: number };
};

function envValue(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw === "" ? undefined : raw;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = envValue(env, key);
  // NaN is rejected by the schema
  return raw === undefined ? undefined : Number(raw);
}

function fromEnv(env: Env): EnvConfig {
  return {
    root: envValue(env, "LINEAGE_STORE_ROOT"),
    index: envValue(env, "LINEAGE_STORE_INDEX"),
    log_level: envValue(env, "LOG_LEVEL"),
    lock: {
      stale: envNumber(env, "LINEAGE_STORE_LOCK_STALE_MS"),
      retries: envNumber(env, "LINEAGE_STORE_LOCK_RETRIES"),
    },
  };
}

/**
 * Resolve configuration.
 * Precedence: explicit overrides > environment > DEFAULT_CONFIG.
 * `root` is returned as an absolute path.
 *
 * @throws ArtifactError INVALID_REQUEST on values that fail validation
 */
export function resolveConfig(
  overrides: StoreConfigOverrides = {},
  env: Env = process.env,
): StoreConfig {
  const fromEnvironment = fromEnv(env);
  const candidate = {
    root: overrides.root ?? fromEnvironment.root ?? DEFAULT_CONFIG.root,
    index: overrides.index ?? fromEnvironment.index ?? DEFAULT_CONFIG.index,
    log_level: overrides.log_level ?? fromEnvironment.log_level ?? DEFAULT_CONFIG.log_level,
    lock: {
      stale: overrides.lock?.stale ?? fromEnvironment.lock.stale ?? DEFAULT_CONFIG.lock.stale,
      retries:
        overrides.lock?.retries ?? fromEnvironment.lock.retries ?? DEFAULT_CONFIG.lock.retries,
    },
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ArtifactError("INVALID_REQUEST", `Invalid configuration: ${parsed.error.message}`);
  }
  return { ...parsed.data, root: path.resolve(parsed.data.root) };
}

export function metadataPath(config: StoreConfig): string {
  return path.join(config.root, METADATA_FILES[config.index]);
}
