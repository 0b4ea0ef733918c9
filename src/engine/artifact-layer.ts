import {
  ArtifactError,
  DuplicateError,
  IntegrityError,
  NotFoundError,
} from "../artifacts/errors.js";
import { verifyDocumentHash } from "../artifacts/hash.js";
import { type DocumentSerializer, jsonSerializer } from "../artifacts/serialize.js";
import {
  type AddOpts,
  type ArtifactRecord,
  type Document,
  type Selector,
  STORED_AT_KEY,
  TRANSFORMER_KEY,
} from "../artifacts/types.js";
import type { ContentStore } from "../content/store.js";
import { componentLogger, type Logger } from "../logging/index.js";
import type { MetadataIndex } from "../metadata/store.js";
import type {
  AddResult,
  DeleteOpts,
  DeleteResult,
  GCOpts,
  GCResult,
  ReadOpts,
} from "./types.js";

export interface ArtifactLayerOptions {
  content: ContentStore;
  index: MetadataIndex;
  serializer?: DocumentSerializer; // default: jsonSerializer
  logger?: Logger;
  now?: () => number; // clock for stored_at (Unix ms)
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/**
 * Payload store + provenance index as one unit.
 *
 * add() runs inside index.transaction(): for each document the payload is
 * written first, then the record. A failure rolls the index back, so it
 * never references a payload that was not written; payloads written before
 * the failure stay behind as orphans for collectGarbage().
 */
export class ArtifactLayer {
  readonly content: ContentStore;
  readonly index: MetadataIndex;
  private readonly serializer: DocumentSerializer;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(opts: ArtifactLayerOptions) {
    this.content = opts.content;
    this.index = opts.index;
    this.serializer = opts.serializer ?? jsonSerializer;
    this.log = componentLogger("artifact-layer", opts.logger);
    this.now = opts.now ?? Date.now;
  }

  /**
   * Persist documents (payload + record) as one transaction.
   *
   * Rejected before anything is written:
   * - IntegrityError: a hash does not match its document, or a parent hash
   *   is neither indexed nor an earlier document of this batch
   * - DuplicateError (mode "error"): a hash is already indexed or repeats
   *   within the batch
   */
  async add(documents: readonly Document[], opts: AddOpts = {}): Promise<AddResult[]> {
    if (documents.length === 0) return [];
    const mode = opts.mode ?? "error";

    for (const doc of documents) {
      if (!verifyDocumentHash(doc)) {
        throw new IntegrityError(`Document ${doc.id} does not match its hash ${doc.hash}`, {
          hash: doc.hash,
          id: doc.id,
        });
      }
    }

    const results = await this.index.transaction(async () => {
      await this.checkBatch(documents, mode);

      const storedAt = this.now();
      const added: AddResult[] = [];
      for (const doc of documents) {
        await this.content.put(doc.hash, this.serializer.serialize(doc));
        const outcome = await this.index.add(this.toRecord(doc, storedAt), { mode });
        added.push({ hash: doc.hash, outcome });
      }
      return added;
    });

    this.log.debug(
      {
        documents: documents.length,
        added: results.filter((r) => r.outcome === "added").length,
        skipped: results.filter((r) => r.outcome === "skipped").length,
      },
      "documents stored",
    );
    return results;
  }

  private async checkBatch(documents: readonly Document[], mode: AddOpts["mode"]): Promise<void> {
    const hashes = documents.map((d) => d.hash);
    const indexed = await this.index.existsByHash(hashes);

    if (mode === "error" || mode === undefined) {
      const seen = new Set<string>();
      documents.forEach((doc, i) => {
        if (indexed[i] || seen.has(doc.hash)) {
          throw new DuplicateError(`Artifact already indexed: ${doc.hash}`, {
            hash: doc.hash,
            id: doc.id,
          });
        }
        seen.add(doc.hash);
      });
    }

    const available = new Set(hashes.filter((_, i) => indexed[i]));
    const parents = [...new Set(documents.flatMap((d) => d.parent_hashes))];
    const parentIndexed = await this.index.existsByHash(parents);
    parents.forEach((parent, i) => {
      if (parentIndexed[i]) available.add(parent);
    });

    for (const doc of documents) {
      for (const parent of doc.parent_hashes) {
        if (!available.has(parent)) {
          throw new IntegrityError(`Document ${doc.id} references unknown parent ${parent}`, {
            hash: doc.hash,
            id: doc.id,
            parent_hash: parent,
          });
        }
      }
      available.add(doc.hash);
    }
  }

  private toRecord(doc: Document, storedAt: number): ArtifactRecord {
    return {
      custom_id: doc.id,
      uuid: doc.hash,
      parent_uuids: [...doc.parent_hashes],
      metadata: { ...doc.metadata, [STORED_AT_KEY]: storedAt },
    };
  }

  /** Order-preserving existence check by logical id */
  async exists(ids: readonly string[]): Promise<boolean[]> {
    return this.index.existsById(ids);
  }

  /** Order-preserving existence check by content hash */
  async existsByHash(hashes: readonly string[]): Promise<boolean[]> {
    return this.index.existsByHash(hashes);
  }

  /**
   * Read one document. NotFoundError if it is not indexed or its payload is
   * missing; IntegrityError if the payload does not hash back to `hash`.
   */
  async getDocument(hash: string): Promise<Document> {
    const record = await this.index.get(hash);
    if (!record) {
      throw new NotFoundError(`Artifact not found: ${hash}`, { hash });
    }
    return this.readPayload(hash);
  }

  private async readPayload(hash: string): Promise<Document> {
    const doc = this.serializer.deserialize(await this.content.get(hash));
    if (doc.hash !== hash || !verifyDocumentHash(doc)) {
      throw new IntegrityError(`Payload for ${hash} does not match its hash`, { hash });
    }
    return doc;
  }

  /**
   * Stream the documents whose records match the selector, in insertion order.
   */
  async *getMatchingDocuments(
    selector: Selector,
    opts: ReadOpts = {},
  ): AsyncGenerator<Document, void, undefined> {
    const onError = opts.onError ?? "throw";
    for await (const hash of this.index.select(selector)) {
      let doc: Document;
      try {
        doc = await this.readPayload(hash);
      } catch (err) {
        if (onError === "skip" && err instanceof ArtifactError) {
          this.log.warn({ hash, code: err.code, err }, "skipping unreadable artifact");
          continue;
        }
        throw err;
      }
      yield doc;
    }
  }

  /**
   * Documents derived from `parentHash`, optionally only those produced by
   * one transformer.
   */
  async getChildDocuments(
    parentHash: string,
    opts: { transformer?: string } = {},
  ): Promise<Document[]> {
    const children: Document[] = [];
    for await (const hash of this.index.select({ parent_hashes: [parentHash] })) {
      if (opts.transformer !== undefined) {
        const record = await this.index.get(hash);
        if (record?.metadata[TRANSFORMER_KEY] !== opts.transformer) continue;
      }
      children.push(await this.readPayload(hash));
    }
    return children;
  }

  /**
   * Remove matching records. Records the selector does not match are never
   * touched, even if their provenance points at removed ones. With
   * `payloads: true` the removed records' payloads are deleted after the
   * index change is committed.
   */
  async delete(selector: Selector, opts: DeleteOpts = {}): Promise<DeleteResult> {
    const removed = await this.index.transaction(async () => {
      const hashes = await collect(this.index.select(selector));
      if (hashes.length > 0) {
        await this.index.remove({ hashes });
      }
      return hashes;
    });

    let payloadsDeleted = 0;
    if (opts.payloads) {
      for (const hash of removed) {
        if (await this.content.delete(hash)) payloadsDeleted++;
      }
    }

    this.log.info({ removed: removed.length, payloadsDeleted }, "artifacts deleted");
    return { removed, payloadsDeleted };
  }

  /**
   * Delete payloads no index record references. Runs under the index
   * transaction so no concurrent add can have a payload written but its
   * record not yet committed.
   */
  async collectGarbage(opts: GCOpts = {}): Promise<GCResult> {
    const result = await this.index.transaction(async () => {
      const referenced = new Set((await this.index.records()).map((r) => r.uuid));
      const orphans = (await this.content.list()).filter((hash) => !referenced.has(hash)).sort();

      let deleted = 0;
      if (!opts.dryRun) {
        for (const hash of orphans) {
          if (await this.content.delete(hash)) deleted++;
        }
      }
      return { orphans, deleted };
    });

    this.log.info(
      { orphans: result.orphans.length, deleted: result.deleted, dryRun: opts.dryRun ?? false },
      "garbage collection finished",
    );
    return result;
  }

  async close(): Promise<void> {
    await this.index.close();
  }
}
