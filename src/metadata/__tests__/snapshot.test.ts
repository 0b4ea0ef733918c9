import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PersistenceError } from "../../artifacts/errors.js";
import { createLogger } from "../../logging/index.js";
import { SnapshotMetadataIndex } from "../snapshot.js";

const logger = createLogger({ level: "silent" });
const hashA = "a".repeat(64);
const hashB = "b".repeat(64);

let tmpDir: string;
let snapshotPath: string;

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "snapshot-"));
  snapshotPath = path.join(tmpDir, "metadata.json");
});

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true });
});

describe("SnapshotMetadataIndex persistence", () => {
  test("missing snapshot opens as an empty index", async () => {
    const index = await SnapshotMetadataIndex.open({ path: snapshotPath, logger });
    expect(await index.size()).toBe(0);
  });

  test("save writes the artifacts layout and leaves no temp files", async () => {
    const index = new SnapshotMetadataIndex({ path: snapshotPath, logger });
    await index.add({ custom_id: "x", uuid: hashA, parent_uuids: [], metadata: { page: 1 } });
    await index.add({ custom_id: "y", uuid: hashB, parent_uuids: [hashA], metadata: {} });
    await index.save();

    const raw: unknown = JSON.parse(await fs.promises.readFile(snapshotPath, "utf8"));
    expect(raw).toEqual({
      artifacts: [
        { custom_id: "x", uuid: hashA, parent_uuids: [], metadata: { page: 1 } },
        { custom_id: "y", uuid: hashB, parent_uuids: [hashA], metadata: {} },
      ],
    });
    expect(await fs.promises.readdir(tmpDir)).toEqual(["metadata.json"]);
  });

  test("reload reproduces the saved records", async () => {
    const index = new SnapshotMetadataIndex({ path: snapshotPath, logger });
    await index.add({ custom_id: "x", uuid: hashA, parent_uuids: [], metadata: { n: 1 } });
    await index.add({ custom_id: "y", uuid: hashB, parent_uuids: [hashA], metadata: {} });
    await index.save();

    const reopened = await SnapshotMetadataIndex.open({ path: snapshotPath, logger });
    expect(await reopened.records()).toEqual(await index.records());
  });

  test("load discards unsaved changes", async () => {
    const index = new SnapshotMetadataIndex({ path: snapshotPath, logger });
    await index.add({ custom_id: "x", uuid: hashA, parent_uuids: [], metadata: {} });
    await index.save();
    await index.add({ custom_id: "y", uuid: hashB, parent_uuids: [], metadata: {} });
    await index.load();
    expect(await index.existsByHash([hashA, hashB])).toEqual([true, false]);
  });

  test("invalid JSON is a PersistenceError", async () => {
    await fs.promises.writeFile(snapshotPath, "{ not json");
    await expect(
      SnapshotMetadataIndex.open({ path: snapshotPath, logger }),
    ).rejects.toBeInstanceOf(PersistenceError);
  });

  test("schema violations are a PersistenceError", async () => {
    await fs.promises.writeFile(
      snapshotPath,
      JSON.stringify({ artifacts: [{ custom_id: "x", uuid: hashA }] }),
    );
    await expect(
      SnapshotMetadataIndex.open({ path: snapshotPath, logger }),
    ).rejects.toBeInstanceOf(PersistenceError);
  });

  test("duplicate records in a snapshot are a PersistenceError", async () => {
    const entry = { custom_id: "x", uuid: hashA, parent_uuids: [], metadata: {} };
    await fs.promises.writeFile(snapshotPath, JSON.stringify({ artifacts: [entry, entry] }));
    await expect(
      SnapshotMetadataIndex.open({ path: snapshotPath, logger }),
    ).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("SnapshotMetadataIndex transactions", () => {
  test("two instances on one file see each other's commits", async () => {
    const first = new SnapshotMetadataIndex({ path: snapshotPath, logger });
    const second = new SnapshotMetadataIndex({ path: snapshotPath, logger });

    await first.transaction(async () => {
      await first.add({ custom_id: "x", uuid: hashA, parent_uuids: [], metadata: {} });
    });
    await second.transaction(async () => {
      await second.add({ custom_id: "y", uuid: hashB, parent_uuids: [hashA], metadata: {} });
    });

    await first.load();
    expect((await first.records()).map((r) => r.uuid)).toEqual([hashA, hashB]);
  });

  test("lock directory is released after commit and rollback", async () => {
    const index = new SnapshotMetadataIndex({ path: snapshotPath, logger });
    await index.transaction(async () => {
      await index.add({ custom_id: "x", uuid: hashA, parent_uuids: [], metadata: {} });
    });
    await expect(
      index.transaction(async () => {
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(await fs.promises.readdir(tmpDir)).toEqual(["metadata.json"]);
  });
});
