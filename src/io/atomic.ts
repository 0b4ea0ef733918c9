/**
 * Crash-safe file writes: content goes to a uniquely named temp file in the
 * target directory, is fsynced, then moved into place.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ulid } from "ulid";

export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number;
  /** Whether to fsync before the rename/link (default: true) */
  fsync?: boolean;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o644,
  fsync: true,
};

/** Temp files start with a dot and end in .tmp so directory scans can skip them */
export function tmpPathFor(targetPath: string): string {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  return path.join(dir, `.${base}.${ulid()}.tmp`);
}

async function writeTmp(
  targetPath: string,
  content: string | Buffer,
  opts: Required<AtomicWriteOptions>,
): Promise<string> {
  await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
  const tmpPath = tmpPathFor(targetPath);
  const handle = await fs.promises.open(tmpPath, "wx", opts.mode);
  try {
    await handle.writeFile(content);
    if (opts.fsync) {
      await handle.sync();
    }
  } finally {
    await handle.close();
  }
  return tmpPath;
}

async function removeQuietly(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/**
 * Write content to a file atomically, replacing any existing file.
 * Readers see either the old file or the new one, never a partial write.
 */
export async function atomicWrite(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const tmpPath = await writeTmp(filePath, content, opts);
  try {
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await removeQuietly(tmpPath);
    throw err;
  }
}

/**
 * Create a file atomically only if it does not exist yet.
 * The hard link fails with EEXIST when the target is present, so two
 * concurrent writers of the same path cannot both win.
 */
export async function atomicCreate(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {},
): Promise<"created" | "exists"> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const tmpPath = await writeTmp(filePath, content, opts);
  try {
    await fs.promises.link(tmpPath, filePath);
    return "created";
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      return "exists";
    }
    throw err;
  } finally {
    await removeQuietly(tmpPath);
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
