import { DuplicateError, IntegrityError } from "../artifacts/errors.js";
import { type Clause, compileSelector, matchesClauses } from "../artifacts/selector.js";
import type {
  AddMode,
  AddOutcome,
  ArtifactRecord,
  Selector,
} from "../artifacts/types.js";

function copyRecord(record: ArtifactRecord): ArtifactRecord {
  return structuredClone(record);
}

/** Clauses answerable from the secondary maps alone */
function isIndexedClause(
  clause: Clause,
): clause is Extract<Clause, { kind: "ids" | "hashes" | "parent_hashes" }> {
  return clause.kind === "ids" || clause.kind === "hashes" || clause.kind === "parent_hashes";
}

/**
 * In-memory record set with secondary indexes:
 * hash → record, logical id → hashes, parent hash → child hashes.
 * Lookups through the maps return exactly what a full scan would,
 * ordered by insertion.
 */
export class RecordSet {
  private nextSeq = 0;
  private readonly byHash = new Map<string, { seq: number; record: ArtifactRecord }>();
  private readonly byId = new Map<string, Set<string>>();
  private readonly byParent = new Map<string, Set<string>>();

  /**
   * Rebuild from persisted records. Parents are not verified: removal may
   * legitimately leave provenance pointing at records that are gone.
   */
  static from(records: readonly ArtifactRecord[]): RecordSet {
    const set = new RecordSet();
    for (const record of records) {
      set.add(record, "error", false);
    }
    return set;
  }

  clone(): RecordSet {
    return RecordSet.from(this.toArray());
  }

  get size(): number {
    return this.byHash.size;
  }

  add(record: ArtifactRecord, mode: AddMode = "error", verifyParents = true): AddOutcome {
    const existing = this.byHash.get(record.uuid);
    if (existing && mode === "skip") return "skipped";
    if (existing && mode === "error") {
      throw new DuplicateError(`Artifact already indexed: ${record.uuid}`, {
        hash: record.uuid,
        id: record.custom_id,
      });
    }

    for (const parent of verifyParents ? record.parent_uuids : []) {
      if (!this.byHash.has(parent)) {
        throw new IntegrityError(
          `Artifact ${record.uuid} references unknown parent ${parent}`,
          { hash: record.uuid, parent_hash: parent },
        );
      }
    }

    if (existing) {
      this.unlink(existing.record);
    }
    const seq = existing ? existing.seq : this.nextSeq++;
    const stored = copyRecord(record);
    this.byHash.set(stored.uuid, { seq, record: stored });
    this.link(stored);
    return existing ? "replaced" : "added";
  }

  get(hash: string): ArtifactRecord | null {
    const entry = this.byHash.get(hash);
    return entry ? copyRecord(entry.record) : null;
  }

  hasHash(hash: string): boolean {
    return this.byHash.has(hash);
  }

  hasId(id: string): boolean {
    return (this.byId.get(id)?.size ?? 0) > 0;
  }

  latestById(id: string): ArtifactRecord | null {
    const hashes = this.byId.get(id);
    if (!hashes || hashes.size === 0) return null;
    let latest: { seq: number; record: ArtifactRecord } | undefined;
    for (const hash of hashes) {
      const entry = this.byHash.get(hash);
      if (entry && (!latest || entry.seq > latest.seq)) latest = entry;
    }
    return latest ? copyRecord(latest.record) : null;
  }

  /**
   * Matching hashes in insertion order (OR across clauses).
   */
  select(selector: Selector): string[] {
    const clauses = compileSelector(selector);
    if (clauses.length === 0) return [];
    if (clauses.every(isIndexedClause)) {
      return this.selectIndexed(clauses);
    }
    return this.scan(clauses);
  }

  /**
   * Remove records by hash. Unknown hashes are ignored.
   */
  removeHashes(hashes: Iterable<string>): number {
    let removed = 0;
    for (const hash of hashes) {
      const entry = this.byHash.get(hash);
      if (!entry) continue;
      this.unlink(entry.record);
      this.byHash.delete(hash);
      removed++;
    }
    return removed;
  }

  toArray(): ArtifactRecord[] {
    return this.ordered().map((e) => copyRecord(e.record));
  }

  private ordered(): Array<{ seq: number; record: ArtifactRecord }> {
    return [...this.byHash.values()].sort((a, b) => a.seq - b.seq);
  }

  private scan(clauses: Clause[]): string[] {
    return this.ordered()
      .filter((e) => matchesClauses(e.record, clauses))
      .map((e) => e.record.uuid);
  }

  private selectIndexed(
    clauses: Array<Extract<Clause, { kind: "ids" | "hashes" | "parent_hashes" }>>,
  ): string[] {
    const candidates = new Set<string>();
    for (const clause of clauses) {
      switch (clause.kind) {
        case "ids":
          for (const id of clause.ids) {
            for (const hash of this.byId.get(id) ?? []) candidates.add(hash);
          }
          break;
        case "hashes":
          for (const hash of clause.hashes) {
            if (this.byHash.has(hash)) candidates.add(hash);
          }
          break;
        case "parent_hashes":
          for (const parent of clause.parents) {
            for (const child of this.byParent.get(parent) ?? []) candidates.add(child);
          }
          break;
      }
    }
    const entries: Array<{ seq: number; hash: string }> = [];
    for (const hash of candidates) {
      const entry = this.byHash.get(hash);
      if (entry) entries.push({ seq: entry.seq, hash });
    }
    return entries.sort((a, b) => a.seq - b.seq).map((e) => e.hash);
  }

  private link(record: ArtifactRecord): void {
    addToBucket(this.byId, record.custom_id, record.uuid);
    for (const parent of record.parent_uuids) {
      addToBucket(this.byParent, parent, record.uuid);
    }
  }

  private unlink(record: ArtifactRecord): void {
    removeFromBucket(this.byId, record.custom_id, record.uuid);
    for (const parent of record.parent_uuids) {
      removeFromBucket(this.byParent, parent, record.uuid);
    }
  }
}

function addToBucket(map: Map<string, Set<string>>, key: string, value: string): void {
  let bucket = map.get(key);
  if (!bucket) {
    bucket = new Set();
    map.set(key, bucket);
  }
  bucket.add(value);
}

function removeFromBucket(map: Map<string, Set<string>>, key: string, value: string): void {
  const bucket = map.get(key);
  if (!bucket) return;
  bucket.delete(value);
  if (bucket.size === 0) map.delete(key);
}
