import { IntegrityError, NotFoundError } from "../artifacts/errors.js";
import type { ContentStore } from "./store.js";
import { assertContentHash } from "./validate.js";

/**
 * Map-backed ContentStore for tests and ephemeral pipelines.
 * Payloads are copied on the way in and out so callers cannot mutate stored bytes.
 */
export class InMemoryContentStore implements ContentStore {
  private readonly payloads = new Map<string, Buffer>();

  async put(hash: string, payload: Buffer): Promise<void> {
    assertContentHash(hash);
    const existing = this.payloads.get(hash);
    if (existing) {
      if (!existing.equals(payload)) {
        throw new IntegrityError(`Hash collision: ${hash} already stored with different payload`, {
          hash,
        });
      }
      return;
    }
    this.payloads.set(hash, Buffer.from(payload));
  }

  async get(hash: string): Promise<Buffer> {
    assertContentHash(hash);
    const payload = this.payloads.get(hash);
    if (!payload) {
      throw new NotFoundError(`Payload not found: ${hash}`, { hash });
    }
    return Buffer.from(payload);
  }

  async exists(hash: string): Promise<boolean> {
    assertContentHash(hash);
    return this.payloads.has(hash);
  }

  async delete(hash: string): Promise<boolean> {
    assertContentHash(hash);
    return this.payloads.delete(hash);
  }

  async list(): Promise<string[]> {
    return [...this.payloads.keys()];
  }
}
