import { IntegrityError } from "./errors.js";
import { stableStringify } from "./hash.js";
import { DocumentSchema } from "./schemas.js";
import type { Document } from "./types.js";

/**
 * Serialization collaborator. The payload format is owned here, not by the
 * content store, which treats payloads as opaque bytes.
 */
export interface DocumentSerializer {
  serialize(doc: Document): Buffer;
  deserialize(payload: Buffer): Document;
}

/** UTF-8 stable JSON; identical documents always produce identical bytes. */
export const jsonSerializer: DocumentSerializer = {
  serialize(doc) {
    return Buffer.from(stableStringify(doc), "utf8");
  },

  deserialize(payload) {
    let raw: unknown;
    try {
      raw = JSON.parse(payload.toString("utf8"));
    } catch (err) {
      throw new IntegrityError("Payload is not valid JSON", { cause: err });
    }
    const parsed = DocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError(`Malformed document payload: ${parsed.error.message}`);
    }
    return parsed.data;
  },
};
