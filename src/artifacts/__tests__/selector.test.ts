import { describe, expect, test } from "vitest";
import { ArtifactError } from "../errors.js";
import { compileSelector, matchesSelector, parseSelector } from "../selector.js";
import type { ArtifactRecord } from "../types.js";

const hashA = "a".repeat(64);
const hashB = "b".repeat(64);

const recordA: ArtifactRecord = {
  custom_id: "x",
  uuid: hashA,
  parent_uuids: [],
  metadata: { source: "https://example.test/a", stored_at: 100 },
};

const recordB: ArtifactRecord = {
  custom_id: "y",
  uuid: hashB,
  parent_uuids: [hashA],
  metadata: { transformer: "splitter", lang: "en", stored_at: 200 },
};

describe("compileSelector", () => {
  test("only present clauses are compiled", () => {
    expect(compileSelector({}).map((c) => c.kind)).toEqual([]);
    expect(
      compileSelector({ parent_hashes: [], ids: ["x"], stored_before: 5 }).map((c) => c.kind),
    ).toEqual(["ids", "parent_hashes", "stored"]);
  });

  test("time bounds form a single clause", () => {
    expect(compileSelector({ stored_after: 1, stored_before: 2 })).toEqual([
      { kind: "stored", after: 1, before: 2 },
    ]);
  });
});

describe("matchesSelector", () => {
  test("empty selector matches nothing", () => {
    expect(matchesSelector(recordA, {})).toBe(false);
  });

  test("ids clause", () => {
    expect(matchesSelector(recordA, { ids: ["x"] })).toBe(true);
    expect(matchesSelector(recordB, { ids: ["x"] })).toBe(false);
  });

  test("hashes clause", () => {
    expect(matchesSelector(recordB, { hashes: [hashB] })).toBe(true);
    expect(matchesSelector(recordA, { hashes: [hashB] })).toBe(false);
  });

  test("parent_hashes clause matches any parent", () => {
    expect(matchesSelector(recordB, { parent_hashes: ["c".repeat(64), hashA] })).toBe(true);
    expect(matchesSelector(recordA, { parent_hashes: [hashA] })).toBe(false);
  });

  test("present but empty list clauses match nothing", () => {
    expect(matchesSelector(recordA, { ids: [] })).toBe(false);
    expect(matchesSelector(recordA, { metadata: {} })).toBe(false);
  });

  test("clauses combine with OR", () => {
    const selector = { ids: ["x"], parent_hashes: [hashA] };
    expect(matchesSelector(recordA, selector)).toBe(true);
    expect(matchesSelector(recordB, selector)).toBe(true);
  });

  test("transformer clause reads metadata.transformer", () => {
    expect(matchesSelector(recordB, { transformer: "splitter" })).toBe(true);
    expect(matchesSelector(recordA, { transformer: "splitter" })).toBe(false);
  });

  test("metadata clause requires every entry to match", () => {
    expect(matchesSelector(recordB, { metadata: { lang: "en", transformer: "splitter" } })).toBe(
      true,
    );
    expect(matchesSelector(recordB, { metadata: { lang: "en", transformer: "parser" } })).toBe(
      false,
    );
  });

  test("metadata null only matches a present null", () => {
    const withNull: ArtifactRecord = { ...recordA, metadata: { lang: null } };
    expect(matchesSelector(withNull, { metadata: { lang: null } })).toBe(true);
    expect(matchesSelector(recordA, { metadata: { lang: null } })).toBe(false);
  });

  test("stored clause: after inclusive, before exclusive", () => {
    expect(matchesSelector(recordA, { stored_after: 100 })).toBe(true);
    expect(matchesSelector(recordA, { stored_after: 101 })).toBe(false);
    expect(matchesSelector(recordB, { stored_before: 200 })).toBe(false);
    expect(matchesSelector(recordB, { stored_after: 150, stored_before: 201 })).toBe(true);
  });

  test("stored clause never matches records without stored_at", () => {
    const unstamped: ArtifactRecord = { ...recordA, metadata: {} };
    expect(matchesSelector(unstamped, { stored_after: 0 })).toBe(false);
  });
});

describe("parseSelector", () => {
  test("accepts a valid selector", () => {
    expect(parseSelector({ ids: ["x"], stored_after: 10 })).toEqual({
      ids: ["x"],
      stored_after: 10,
    });
  });

  test("rejects unknown clauses", () => {
    expect(() => parseSelector({ name: "x" })).toThrow(ArtifactError);
  });

  test("rejects wrongly typed clauses with INVALID_REQUEST", () => {
    try {
      parseSelector({ ids: "x" });
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ArtifactError);
      expect((err as ArtifactError).code).toBe("INVALID_REQUEST");
    }
  });
});
