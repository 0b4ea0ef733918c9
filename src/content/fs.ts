import * as fs from "node:fs";
import * as path from "node:path";
import { IntegrityError, NotFoundError, PersistenceError } from "../artifacts/errors.js";
import { isContentHash } from "../artifacts/hash.js";
import { atomicCreate, isErrnoException } from "../io/atomic.js";
import type { ContentStore } from "./store.js";
import { assertContentHash } from "./validate.js";

interface FsContentStoreOptions {
  root: string; // directory holding one file per hash
}

/**
 * Filesystem ContentStore: `<root>/<hash>`, one file per payload.
 *
 * Writes are create-if-absent via temp file + hard link, so concurrent puts
 * of distinct hashes need no coordination and concurrent puts of the same
 * hash settle on a single file.
 */
export class FsContentStore implements ContentStore {
  readonly root: string;

  constructor(opts: FsContentStoreOptions) {
    this.root = path.resolve(opts.root);
  }

  pathFor(hash: string): string {
    assertContentHash(hash);
    return path.join(this.root, hash);
  }

  async put(hash: string, payload: Buffer): Promise<void> {
    const filePath = this.pathFor(hash);
    let result: "created" | "exists";
    try {
      result = await atomicCreate(filePath, payload);
    } catch (err) {
      throw new PersistenceError(`Failed to write payload ${hash}`, {
        hash,
        path: filePath,
        cause: err,
      });
    }
    if (result === "created") return;

    const existing = await this.get(hash);
    if (!existing.equals(payload)) {
      throw new IntegrityError(`Hash collision: ${hash} already stored with different payload`, {
        hash,
        path: filePath,
      });
    }
  }

  async get(hash: string): Promise<Buffer> {
    const filePath = this.pathFor(hash);
    try {
      return await fs.promises.readFile(filePath);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new NotFoundError(`Payload not found: ${hash}`, { hash, path: filePath });
      }
      throw new PersistenceError(`Failed to read payload ${hash}`, {
        hash,
        path: filePath,
        cause: err,
      });
    }
  }

  async exists(hash: string): Promise<boolean> {
    const filePath = this.pathFor(hash);
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.isFile();
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw new PersistenceError(`Failed to stat payload ${hash}`, {
        hash,
        path: filePath,
        cause: err,
      });
    }
  }

  async delete(hash: string): Promise<boolean> {
    const filePath = this.pathFor(hash);
    try {
      await fs.promises.unlink(filePath);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw new PersistenceError(`Failed to delete payload ${hash}`, {
        hash,
        path: filePath,
        cause: err,
      });
    }
  }

  async list(): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw new PersistenceError(`Failed to list ${this.root}`, {
        path: this.root,
        cause: err,
      });
    }
    // Snapshot, lock and temp files share the directory; only hash names count
    return entries.filter((e) => e.isFile() && isContentHash(e.name)).map((e) => e.name);
  }
}
