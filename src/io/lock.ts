/**
 * Cross-process file locking around load-mutate-save sequences.
 * Uses proper-lockfile; the lock itself is a `<path>.lock` directory, so the
 * locked path does not need to exist.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import lockfile from "proper-lockfile";
import { ArtifactError, LockTimeoutError } from "../artifacts/errors.js";

export interface LockOptions {
  /** Lock considered stale after this many ms without refresh (default: 10000) */
  stale?: number;
  /** Retry attempts at ~100ms intervals before giving up (default: 300) */
  retries?: number;
}

export const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  stale: 10_000,
  retries: 300, // 300 retries * 100ms = 30s
};

export type ReleaseFn = () => Promise<void>;

export async function acquireLock(
  lockPath: string,
  options: LockOptions = {},
): Promise<ReleaseFn> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true });

  try {
    return await lockfile.lock(lockPath, {
      realpath: false,
      stale: opts.stale,
      retries: {
        retries: opts.retries,
        minTimeout: 100,
        maxTimeout: 200,
        factor: 1,
      },
    });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
      throw new LockTimeoutError(lockPath);
    }
    throw new ArtifactError(
      "PERSISTENCE",
      `Failed to acquire lock on ${lockPath}: ${err instanceof Error ? err.message : String(err)}`,
      { path: lockPath, cause: err },
    );
  }
}

/**
 * Execute a function with the lock held. The lock is released even when fn
 * throws.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  const release = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}

export async function isLocked(lockPath: string): Promise<boolean> {
  return lockfile.check(lockPath, { realpath: false });
}
