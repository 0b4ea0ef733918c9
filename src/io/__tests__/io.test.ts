import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LockTimeoutError } from "../../artifacts/errors.js";
import { atomicCreate, atomicWrite, tmpPathFor } from "../atomic.js";
import { isLocked, withFileLock } from "../lock.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "io-"));
});

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true });
});

describe("atomic writes", () => {
  test("temp paths are hidden siblings of the target", () => {
    const tmp = tmpPathFor(path.join(tmpDir, "metadata.json"));
    expect(path.dirname(tmp)).toBe(tmpDir);
    expect(path.basename(tmp)).toMatch(/^\.metadata\.json\.[0-9A-Z]{26}\.tmp$/);
  });

  test("atomicWrite replaces the file and leaves no temp file", async () => {
    const target = path.join(tmpDir, "nested", "metadata.json");
    await atomicWrite(target, "one");
    await atomicWrite(target, "two");
    expect(await fs.promises.readFile(target, "utf8")).toBe("two");
    expect(await fs.promises.readdir(path.dirname(target))).toEqual(["metadata.json"]);
  });

  test("atomicCreate never overwrites", async () => {
    const target = path.join(tmpDir, "payload");
    expect(await atomicCreate(target, "first")).toBe("created");
    expect(await atomicCreate(target, "second")).toBe("exists");
    expect(await fs.promises.readFile(target, "utf8")).toBe("first");
    expect(await fs.promises.readdir(tmpDir)).toEqual(["payload"]);
  });
});

describe("withFileLock", () => {
  test("holds the lock while fn runs and releases it after", async () => {
    const target = path.join(tmpDir, "metadata.json");
    const heldDuring = await withFileLock(target, () => isLocked(target));
    expect(heldDuring).toBe(true);
    expect(await isLocked(target)).toBe(false);
  });

  test("releases the lock when fn throws", async () => {
    const target = path.join(tmpDir, "metadata.json");
    await expect(
      withFileLock(target, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await isLocked(target)).toBe(false);
  });

  test("a held lock times out other holders", async () => {
    const target = path.join(tmpDir, "metadata.json");
    await withFileLock(target, async () => {
      await expect(
        withFileLock(target, async () => "never", { retries: 0 }),
      ).rejects.toBeInstanceOf(LockTimeoutError);
    });
  });
});
