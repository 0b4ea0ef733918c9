import { describe, expect, test } from "vitest";
import {
  computeContentHash,
  createDocument,
  isContentHash,
  sha256Hex,
  stableStringify,
  verifyDocumentHash,
  withProvenance,
} from "./hash.js";

describe("sha256Hex", () => {
  test("hex digest of known input", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  test("string and buffer inputs agree", () => {
    expect(sha256Hex(Buffer.from("abc", "utf8"))).toBe(sha256Hex("abc"));
  });
});

describe("isContentHash", () => {
  test("accepts 64 lowercase hex chars only", () => {
    expect(isContentHash("a".repeat(64))).toBe(true);
    expect(isContentHash("A".repeat(64))).toBe(false);
    expect(isContentHash("a".repeat(63))).toBe(false);
    expect(isContentHash("../etc/passwd")).toBe(false);
  });
});

describe("stableStringify", () => {
  test("sorts keys recursively", () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  test("preserves array order and maps undefined to null", () => {
    expect(stableStringify([3, undefined, 1])).toBe("[3,null,1]");
  });

  test("omits undefined object values", () => {
    expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
  });

  test("key order of input does not matter", () => {
    expect(stableStringify({ x: 1, y: [{ q: 1, p: 2 }] })).toBe(
      stableStringify({ y: [{ p: 2, q: 1 }], x: 1 }),
    );
  });
});

describe("createDocument", () => {
  test("builds a document whose hash verifies", () => {
    const doc = createDocument({ id: "doc-1", content: "hello", metadata: { source: "a.txt" } });

    expect(doc).toEqual({
      id: "doc-1",
      content: "hello",
      metadata: { source: "a.txt" },
      parent_hashes: [],
      hash: computeContentHash({
        id: "doc-1",
        content: "hello",
        metadata: { source: "a.txt" },
        parent_hashes: [],
      }),
    });
    expect(isContentHash(doc.hash)).toBe(true);
    expect(verifyDocumentHash(doc)).toBe(true);
  });

  test("same inputs give the same hash", () => {
    const a = createDocument({ id: "x", content: "same", metadata: { k: 1, j: 2 } });
    const b = createDocument({ id: "x", content: "same", metadata: { j: 2, k: 1 } });
    expect(a.hash).toBe(b.hash);
  });

  test("id, content, metadata and parents each change the hash", () => {
    const parent = createDocument({ id: "p", content: "parent" });
    const base = createDocument({ id: "x", content: "c" });

    expect(createDocument({ id: "y", content: "c" }).hash).not.toBe(base.hash);
    expect(createDocument({ id: "x", content: "d" }).hash).not.toBe(base.hash);
    expect(createDocument({ id: "x", content: "c", metadata: { k: 1 } }).hash).not.toBe(base.hash);
    expect(
      createDocument({ id: "x", content: "c", parent_hashes: [parent.hash] }).hash,
    ).not.toBe(base.hash);
  });

  test("id defaults to the hash of the id-less document", () => {
    const doc = createDocument({ content: "anonymous" });
    expect(doc.id).toBe(
      computeContentHash({ id: "", content: "anonymous", metadata: {}, parent_hashes: [] }),
    );
    expect(verifyDocumentHash(doc)).toBe(true);
  });
});

describe("withProvenance", () => {
  test("relinks parents, merges metadata and rehashes without mutating", () => {
    const parent = createDocument({ id: "p", content: "parent" });
    const child = createDocument({ id: "c", content: "child", metadata: { page: 1 } });

    const linked = withProvenance(child, [parent.hash], { transformer: "splitter" });

    expect(linked.id).toBe("c");
    expect(linked.parent_hashes).toEqual([parent.hash]);
    expect(linked.metadata).toEqual({ page: 1, transformer: "splitter" });
    expect(linked.hash).not.toBe(child.hash);
    expect(verifyDocumentHash(linked)).toBe(true);

    expect(child.parent_hashes).toEqual([]);
    expect(child.metadata).toEqual({ page: 1 });
  });
});

describe("verifyDocumentHash", () => {
  test("detects tampered content", () => {
    const doc = createDocument({ id: "x", content: "original" });
    expect(verifyDocumentHash({ ...doc, content: "tampered" })).toBe(false);
  });
});
