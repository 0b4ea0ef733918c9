import { describe, expect, test } from "vitest";
import { IntegrityError } from "../errors.js";
import { createDocument } from "../hash.js";
import { jsonSerializer } from "../serialize.js";

describe("jsonSerializer", () => {
  test("round-trips a document", () => {
    const parent = createDocument({ id: "p", content: "parent" });
    const doc = createDocument({
      id: "d",
      content: "line one\nline two ✓",
      metadata: { page: 3, tags: ["a", "b"], nested: { ok: true } },
      parent_hashes: [parent.hash],
    });

    expect(jsonSerializer.deserialize(jsonSerializer.serialize(doc))).toEqual(doc);
  });

  test("serializes identical documents to identical bytes", () => {
    const a = createDocument({ id: "d", content: "c", metadata: { b: 1, a: 2 } });
    const b = createDocument({ id: "d", content: "c", metadata: { a: 2, b: 1 } });
    expect(jsonSerializer.serialize(a).equals(jsonSerializer.serialize(b))).toBe(true);
  });

  test("rejects payloads that are not JSON", () => {
    expect(() => jsonSerializer.deserialize(Buffer.from("not json"))).toThrow(IntegrityError);
  });

  test("rejects JSON that is not a document", () => {
    const payload = Buffer.from(JSON.stringify({ id: "d", content: "c" }));
    expect(() => jsonSerializer.deserialize(payload)).toThrow(IntegrityError);
  });
});
