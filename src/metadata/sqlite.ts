import Database, { type Database as DatabaseType, type Statement } from "better-sqlite3";
import { z } from "zod";
import {
  ArtifactError,
  DuplicateError,
  IntegrityError,
  PersistenceError,
} from "../artifacts/errors.js";
import {
  type Clause,
  compileSelector,
  matchesClauses,
  parseSelector,
} from "../artifacts/selector.js";
import type {
  AddOpts,
  AddOutcome,
  ArtifactRecord,
  Selector,
} from "../artifacts/types.js";
import { componentLogger, type Logger } from "../logging/index.js";
import type { MetadataIndex } from "./store.js";
import { WriterScope } from "./writer-scope.js";

interface SqliteMetadataIndexOptions {
  dbPath: string; // ":memory:" for tests, file path for production
  logger?: Logger;
}

const ArtifactRowSchema = z.object({
  seq: z.number(),
  uuid: z.string(),
  custom_id: z.string(),
  parent_uuids_json: z.string(),
  metadata_json: z.string(),
});

const HashRowSchema = z.object({ uuid: z.string() });

type ArtifactRow = z.infer<typeof ArtifactRowSchema>;

const StringArraySchema = z.array(z.string());
const MetadataSchema = z.record(z.unknown());

/**
 * SQLite implementation of MetadataIndex.
 * WAL mode, one row per artifact plus a parent relation table for
 * provenance lookups. Every write is durable at commit, so save() only
 * checkpoints and load() has nothing to refresh.
 *
 * One connection serves everything, so an open BEGIN IMMEDIATE would be
 * visible to any statement on it. Calls from outside transaction() wait on
 * the WriterScope until the transaction commits or rolls back.
 */
export class SqliteMetadataIndex implements MetadataIndex {
  private db: DatabaseType;
  private readonly writer = new WriterScope();
  private readonly log: Logger;
  private stmts: {
    fetchByHash: Statement;
    latestById: Statement;
    existsById: Statement;
    existsByHash: Statement;
    insertArtifact: Statement;
    replaceArtifact: Statement;
    insertParent: Statement;
    deleteParents: Statement;
    deleteArtifact: Statement;
    listAll: Statement;
    count: Statement;
  };

  constructor(opts: SqliteMetadataIndexOptions) {
    this.log = componentLogger("sqlite-index", opts.logger);
    try {
      this.db = new Database(opts.dbPath);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("busy_timeout = 3000");
      this.db.pragma("foreign_keys = ON");
      this.initSchema();
      this.stmts = this.prepareStatements();
    } catch (err) {
      throw new PersistenceError(`Failed to open metadata database ${opts.dbPath}`, {
        path: opts.dbPath,
        cause: err,
      });
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        seq               INTEGER PRIMARY KEY AUTOINCREMENT,
        uuid              TEXT NOT NULL UNIQUE,
        custom_id         TEXT NOT NULL,
        parent_uuids_json TEXT NOT NULL,
        metadata_json     TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS artifact_parents (
        child_uuid  TEXT NOT NULL REFERENCES artifacts(uuid) ON DELETE CASCADE,
        position    INTEGER NOT NULL,
        parent_uuid TEXT NOT NULL,
        PRIMARY KEY (child_uuid, position)
      );

      CREATE INDEX IF NOT EXISTS idx_artifacts_custom_id ON artifacts(custom_id, seq);
      CREATE INDEX IF NOT EXISTS idx_artifact_parents_parent ON artifact_parents(parent_uuid);
    `);
  }

  private prepareStatements() {
    return {
      fetchByHash: this.db.prepare(`
        SELECT * FROM artifacts WHERE uuid = ?
      `),
      latestById: this.db.prepare(`
        SELECT * FROM artifacts WHERE custom_id = ? ORDER BY seq DESC LIMIT 1
      `),
      existsById: this.db.prepare(`
        SELECT 1 FROM artifacts WHERE custom_id = ? LIMIT 1
      `),
      existsByHash: this.db.prepare(`
        SELECT 1 FROM artifacts WHERE uuid = ? LIMIT 1
      `),
      insertArtifact: this.db.prepare(`
        INSERT INTO artifacts (uuid, custom_id, parent_uuids_json, metadata_json)
        VALUES (@uuid, @custom_id, @parent_uuids_json, @metadata_json)
      `),
      replaceArtifact: this.db.prepare(`
        UPDATE artifacts SET
          custom_id = @custom_id,
          parent_uuids_json = @parent_uuids_json,
          metadata_json = @metadata_json
        WHERE uuid = @uuid
      `),
      insertParent: this.db.prepare(`
        INSERT INTO artifact_parents (child_uuid, position, parent_uuid) VALUES (?, ?, ?)
      `),
      deleteParents: this.db.prepare(`
        DELETE FROM artifact_parents WHERE child_uuid = ?
      `),
      deleteArtifact: this.db.prepare(`
        DELETE FROM artifacts WHERE uuid = ?
      `),
      listAll: this.db.prepare(`
        SELECT * FROM artifacts ORDER BY seq
      `),
      count: this.db.prepare(`
        SELECT COUNT(*) AS n FROM artifacts
      `),
    };
  }

  private rowToRecord(row: ArtifactRow): ArtifactRecord {
    return {
      custom_id: row.custom_id,
      uuid: row.uuid,
      parent_uuids: StringArraySchema.parse(JSON.parse(row.parent_uuids_json)),
      metadata: MetadataSchema.parse(JSON.parse(row.metadata_json)),
    };
  }

  private fetchRow(stmt: Statement, param: string): ArtifactRecord | null {
    const row = stmt.get(param);
    if (row === undefined) return null;
    return this.rowToRecord(ArtifactRowSchema.parse(row));
  }

  async add(record: ArtifactRecord, opts: AddOpts = {}): Promise<AddOutcome> {
    return this.writer.guard(() => this.addRecord(record, opts));
  }

  private addRecord(record: ArtifactRecord, opts: AddOpts): AddOutcome {
    const mode = opts.mode ?? "error";
    const exists = this.stmts.existsByHash.get(record.uuid) !== undefined;
    if (exists && mode === "skip") return "skipped";
    if (exists && mode === "error") {
      throw new DuplicateError(`Artifact already indexed: ${record.uuid}`, {
        hash: record.uuid,
        id: record.custom_id,
      });
    }
    for (const parent of record.parent_uuids) {
      if (this.stmts.existsByHash.get(parent) === undefined) {
        throw new IntegrityError(
          `Artifact ${record.uuid} references unknown parent ${parent}`,
          { hash: record.uuid, parent_hash: parent },
        );
      }
    }

    const params = {
      uuid: record.uuid,
      custom_id: record.custom_id,
      parent_uuids_json: JSON.stringify(record.parent_uuids),
      metadata_json: JSON.stringify(record.metadata),
    };
    const write = this.db.transaction(() => {
      if (exists) {
        this.stmts.replaceArtifact.run(params);
        this.stmts.deleteParents.run(record.uuid);
      } else {
        this.stmts.insertArtifact.run(params);
      }
      record.parent_uuids.forEach((parent, position) => {
        this.stmts.insertParent.run(record.uuid, position, parent);
      });
    });
    this.runWrite(() => write());
    return exists ? "replaced" : "added";
  }

  async get(hash: string): Promise<ArtifactRecord | null> {
    return this.writer.guard(() => this.fetchRow(this.stmts.fetchByHash, hash));
  }

  async latestById(id: string): Promise<ArtifactRecord | null> {
    return this.writer.guard(() => this.fetchRow(this.stmts.latestById, id));
  }

  async existsById(ids: readonly string[]): Promise<boolean[]> {
    return this.writer.guard(() =>
      ids.map((id) => this.stmts.existsById.get(id) !== undefined),
    );
  }

  async existsByHash(hashes: readonly string[]): Promise<boolean[]> {
    return this.writer.guard(() =>
      hashes.map((hash) => this.stmts.existsByHash.get(hash) !== undefined),
    );
  }

  async *select(selector: Selector): AsyncGenerator<string, void, undefined> {
    // Rows are materialized up front: an open iterator would keep the
    // connection busy and block writes issued by the consumer.
    const parsed = parseSelector(selector);
    const hashes = await this.writer.guard(() => this.selectHashes(parsed));
    yield* hashes;
  }

  /**
   * Matching hashes in insertion order. Selectors made only of id, hash and
   * parent clauses run as one SQL query; anything else is a full scan with
   * the shared matcher.
   */
  private selectHashes(selector: Selector): string[] {
    const clauses = compileSelector(selector);
    if (clauses.length === 0) return [];

    const sqlConditions: string[] = [];
    const params: string[] = [];
    for (const clause of clauses) {
      const condition = this.clauseToSql(clause);
      if (condition === null) {
        return this.scan(clauses);
      }
      sqlConditions.push(condition.sql);
      params.push(condition.param);
    }

    const rows = this.db
      .prepare(`SELECT uuid FROM artifacts WHERE ${sqlConditions.join(" OR ")} ORDER BY seq`)
      .all(...params);
    return rows.map((row) => HashRowSchema.parse(row).uuid);
  }

  private clauseToSql(clause: Clause): { sql: string; param: string } | null {
    switch (clause.kind) {
      case "ids":
        return {
          sql: "custom_id IN (SELECT value FROM json_each(?))",
          param: JSON.stringify([...clause.ids]),
        };
      case "hashes":
        return {
          sql: "uuid IN (SELECT value FROM json_each(?))",
          param: JSON.stringify([...clause.hashes]),
        };
      case "parent_hashes":
        return {
          sql:
            "uuid IN (SELECT child_uuid FROM artifact_parents" +
            " WHERE parent_uuid IN (SELECT value FROM json_each(?)))",
          param: JSON.stringify([...clause.parents]),
        };
      default:
        return null;
    }
  }

  private scan(clauses: Clause[]): string[] {
    return this.allRecords()
      .filter((record) => matchesClauses(record, clauses))
      .map((record) => record.uuid);
  }

  private allRecords(): ArtifactRecord[] {
    return this.stmts.listAll
      .all()
      .map((row) => this.rowToRecord(ArtifactRowSchema.parse(row)));
  }

  async remove(selector: Selector): Promise<number> {
    const parsed = parseSelector(selector);
    const removeAll = this.db.transaction((targets: string[]) => {
      let removed = 0;
      for (const hash of targets) {
        removed += this.stmts.deleteArtifact.run(hash).changes;
      }
      return removed;
    });
    return this.writer.guard(() =>
      this.runWrite(() => removeAll(this.selectHashes(parsed))),
    );
  }

  async records(): Promise<ArtifactRecord[]> {
    return this.writer.guard(() => this.allRecords());
  }

  async size(): Promise<number> {
    return this.writer.guard(() => z.object({ n: z.number() }).parse(this.stmts.count.get()).n);
  }

  async save(): Promise<void> {
    this.runWrite(() => this.db.pragma("wal_checkpoint(TRUNCATE)"));
  }

  async load(): Promise<void> {
    // Reads always hit the database
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.writer.exclusive(async () => {
      this.runWrite(() => this.db.exec("BEGIN IMMEDIATE"));
      try {
        const result = await this.writer.enter(fn);
        this.runWrite(() => this.db.exec("COMMIT"));
        return result;
      } catch (err) {
        if (this.db.inTransaction) {
          this.db.exec("ROLLBACK");
        }
        this.log.debug({ err }, "transaction rolled back");
        throw err;
      }
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  /** Map driver failures to PersistenceError; store errors pass through */
  private runWrite<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ArtifactError) throw err;
      throw new PersistenceError(
        `Metadata database write failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
}
