import * as fs from "node:fs";
import { ArtifactError, PersistenceError } from "../artifacts/errors.js";
import { SnapshotSchema } from "../artifacts/schemas.js";
import { parseSelector } from "../artifacts/selector.js";
import type {
  AddOpts,
  AddOutcome,
  ArtifactRecord,
  Selector,
} from "../artifacts/types.js";
import { atomicWrite, isErrnoException } from "../io/atomic.js";
import { type LockOptions, withFileLock } from "../io/lock.js";
import { componentLogger, type Logger } from "../logging/index.js";
import { RecordSet } from "./record-set.js";
import type { MetadataIndex } from "./store.js";
import { WriterScope } from "./writer-scope.js";

interface SnapshotMetadataIndexOptions {
  path: string; // e.g. <root>/metadata.json
  lock?: LockOptions;
  logger?: Logger;
}

/**
 * MetadataIndex held fully in memory and persisted as one JSON snapshot
 * `{ artifacts: [...] }`.
 *
 * Writers are serialized twice: an in-process WriterScope, and a
 * proper-lockfile lock on the snapshot path for other processes. Inside
 * transaction() the snapshot is reloaded before fn runs and rewritten after,
 * so concurrent processes never overwrite each other's records. Calls from
 * outside an open transaction wait for it to finish.
 */
export class SnapshotMetadataIndex implements MetadataIndex {
  readonly path: string;
  private set = new RecordSet();
  private readonly writer = new WriterScope();
  private readonly lockOpts: LockOptions;
  private readonly log: Logger;

  constructor(opts: SnapshotMetadataIndexOptions) {
    this.path = opts.path;
    this.lockOpts = opts.lock ?? {};
    this.log = componentLogger("snapshot-index", opts.logger);
  }

  /**
   * Open an index and load its snapshot (missing file = empty index).
   */
  static async open(opts: SnapshotMetadataIndexOptions): Promise<SnapshotMetadataIndex> {
    const index = new SnapshotMetadataIndex(opts);
    await index.load();
    return index;
  }

  async add(record: ArtifactRecord, opts: AddOpts = {}): Promise<AddOutcome> {
    return this.writer.guard(() => this.set.add(record, opts.mode ?? "error"));
  }

  async get(hash: string): Promise<ArtifactRecord | null> {
    return this.writer.guard(() => this.set.get(hash));
  }

  async latestById(id: string): Promise<ArtifactRecord | null> {
    return this.writer.guard(() => this.set.latestById(id));
  }

  async existsById(ids: readonly string[]): Promise<boolean[]> {
    return this.writer.guard(() => ids.map((id) => this.set.hasId(id)));
  }

  async existsByHash(hashes: readonly string[]): Promise<boolean[]> {
    return this.writer.guard(() => hashes.map((hash) => this.set.hasHash(hash)));
  }

  async *select(selector: Selector): AsyncGenerator<string, void, undefined> {
    // Evaluated eagerly so later mutations do not shift an ongoing iteration
    const parsed = parseSelector(selector);
    const hashes = await this.writer.guard(() => this.set.select(parsed));
    yield* hashes;
  }

  async remove(selector: Selector): Promise<number> {
    const parsed = parseSelector(selector);
    return this.writer.guard(() => this.set.removeHashes(this.set.select(parsed)));
  }

  async records(): Promise<ArtifactRecord[]> {
    return this.writer.guard(() => this.set.toArray());
  }

  async size(): Promise<number> {
    return this.writer.guard(() => this.set.size);
  }

  async save(): Promise<void> {
    const snapshot = { artifacts: this.set.toArray() };
    try {
      await atomicWrite(this.path, `${JSON.stringify(snapshot, null, 2)}\n`);
    } catch (err) {
      throw new PersistenceError(`Failed to write snapshot ${this.path}`, {
        path: this.path,
        cause: err,
      });
    }
    this.log.debug({ path: this.path, artifacts: snapshot.artifacts.length }, "snapshot saved");
  }

  async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.path, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        this.set = new RecordSet();
        return;
      }
      throw new PersistenceError(`Failed to read snapshot ${this.path}`, {
        path: this.path,
        cause: err,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new PersistenceError(`Snapshot is not valid JSON: ${this.path}`, {
        path: this.path,
        cause: err,
      });
    }
    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(
        `Corrupted snapshot ${this.path}: ${parsed.error.message}`,
        { path: this.path },
      );
    }

    try {
      this.set = RecordSet.from(parsed.data.artifacts);
    } catch (err) {
      if (err instanceof ArtifactError) {
        throw new PersistenceError(`Corrupted snapshot ${this.path}: ${err.message}`, {
          path: this.path,
          cause: err,
        });
      }
      throw err;
    }
    this.log.debug({ path: this.path, artifacts: this.set.size }, "snapshot loaded");
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.writer.exclusive(() =>
      withFileLock(
        this.path,
        async () => {
          await this.load();
          const before = this.set.clone();
          try {
            const result = await this.writer.enter(fn);
            await this.save();
            return result;
          } catch (err) {
            this.set = before;
            this.log.debug({ err }, "transaction rolled back");
            throw err;
          }
        },
        this.lockOpts,
      ),
    );
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
