import { createHash } from "node:crypto";
import type { Document } from "./types.js";

const HASH_PATTERN = /^[0-9a-f]{64}$/;

/** SHA-256 hash as hex string (64 characters) */
export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function isContentHash(value: string): boolean {
  return HASH_PATTERN.test(value);
}

/**
 * Deterministic JSON serialization with sorted keys (recursive).
 *
 * Rules:
 * - Primitive values: delegate to JSON.stringify
 * - Arrays: preserve order, recurse into elements; undefined → null
 * - Objects: sort keys alphabetically, recurse into values
 * - Omit keys with `undefined` values (matches JSON.stringify behavior)
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : stableStringify(v))).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`,
  );
  return `{${pairs.join(",")}}`;
}

/**
 * Content hash of a document: identity, content, metadata and provenance.
 * Relinking a document to new parents therefore yields a new hash.
 */
export function computeContentHash(doc: Omit<Document, "hash">): string {
  return sha256Hex(
    stableStringify({
      id: doc.id,
      content: doc.content,
      metadata: doc.metadata,
      parent_hashes: doc.parent_hashes,
    }),
  );
}

export type CreateDocumentOpts = {
  content: string;
  id?: string; // default: hash of the document with an empty id
  metadata?: Record<string, unknown>;
  parent_hashes?: string[];
};

export function createDocument(opts: CreateDocumentOpts): Document {
  const metadata = opts.metadata ?? {};
  const parent_hashes = opts.parent_hashes ?? [];
  const id =
    opts.id ??
    computeContentHash({ id: "", content: opts.content, metadata, parent_hashes });
  const base = { id, content: opts.content, metadata, parent_hashes };
  return { ...base, hash: computeContentHash(base) };
}

/**
 * Relink a document to its parents. Returns a new document (no mutation)
 * with `parent_hashes` replaced and `extraMetadata` merged over its metadata.
 */
export function withProvenance(
  doc: Document,
  parentHashes: string[],
  extraMetadata: Record<string, unknown> = {},
): Document {
  const base = {
    id: doc.id,
    content: doc.content,
    metadata: { ...doc.metadata, ...extraMetadata },
    parent_hashes: [...parentHashes],
  };
  return { ...base, hash: computeContentHash(base) };
}

export function verifyDocumentHash(doc: Document): boolean {
  return computeContentHash(doc) === doc.hash;
}
