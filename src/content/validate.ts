import { ArtifactError } from "../artifacts/errors.js";
import { isContentHash } from "../artifacts/hash.js";

/** Hashes double as file names, so only sha256 hex is accepted */
export function assertContentHash(hash: string): void {
  if (!isContentHash(hash)) {
    throw new ArtifactError(
      "INVALID_REQUEST",
      `Invalid content hash: ${JSON.stringify(hash)}`,
      { hash },
    );
  }
}
