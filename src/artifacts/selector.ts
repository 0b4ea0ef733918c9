import { ArtifactError } from "./errors.js";
import { SelectorSchema } from "./schemas.js";
import {
  type ArtifactRecord,
  type Selector,
  STORED_AT_KEY,
  TRANSFORMER_KEY,
} from "./types.js";

/**
 * Predicate clauses of a selector, in evaluation order.
 * Only clauses present on the selector are produced.
 */
export type Clause =
  | { kind: "ids"; ids: ReadonlySet<string> }
  | { kind: "hashes"; hashes: ReadonlySet<string> }
  | { kind: "parent_hashes"; parents: ReadonlySet<string> }
  | { kind: "transformer"; name: string }
  | { kind: "metadata"; entries: ReadonlyArray<[string, unknown]> }
  | { kind: "stored"; after?: number; before?: number };

/**
 * Validate a selector from an untrusted source.
 * @throws ArtifactError INVALID_REQUEST
 */
export function parseSelector(input: unknown): Selector {
  const parsed = SelectorSchema.safeParse(input);
  if (!parsed.success) {
    throw new ArtifactError(
      "INVALID_REQUEST",
      `Invalid selector: ${parsed.error.message}`,
    );
  }
  return parsed.data;
}

export function compileSelector(selector: Selector): Clause[] {
  const clauses: Clause[] = [];
  if (selector.ids !== undefined) {
    clauses.push({ kind: "ids", ids: new Set(selector.ids) });
  }
  if (selector.hashes !== undefined) {
    clauses.push({ kind: "hashes", hashes: new Set(selector.hashes) });
  }
  if (selector.parent_hashes !== undefined) {
    clauses.push({ kind: "parent_hashes", parents: new Set(selector.parent_hashes) });
  }
  if (selector.transformer !== undefined) {
    clauses.push({ kind: "transformer", name: selector.transformer });
  }
  if (selector.metadata !== undefined) {
    clauses.push({ kind: "metadata", entries: Object.entries(selector.metadata) });
  }
  if (selector.stored_after !== undefined || selector.stored_before !== undefined) {
    clauses.push({
      kind: "stored",
      after: selector.stored_after,
      before: selector.stored_before,
    });
  }
  return clauses;
}

function matchesClause(record: ArtifactRecord, clause: Clause): boolean {
  switch (clause.kind) {
    case "ids":
      return clause.ids.has(record.custom_id);
    case "hashes":
      return clause.hashes.has(record.uuid);
    case "parent_hashes":
      return record.parent_uuids.some((p) => clause.parents.has(p));
    case "transformer":
      return record.metadata[TRANSFORMER_KEY] === clause.name;
    case "metadata":
      if (clause.entries.length === 0) return false;
      return clause.entries.every(
        ([key, value]) => key in record.metadata && record.metadata[key] === value,
      );
    case "stored": {
      const storedAt = record.metadata[STORED_AT_KEY];
      if (typeof storedAt !== "number") return false;
      if (clause.after !== undefined && storedAt < clause.after) return false;
      if (clause.before !== undefined && storedAt >= clause.before) return false;
      return true;
    }
  }
}

/**
 * OR across clauses, first match wins. No clauses → no match.
 */
export function matchesClauses(record: ArtifactRecord, clauses: Clause[]): boolean {
  for (const clause of clauses) {
    if (matchesClause(record, clause)) return true;
  }
  return false;
}

export function matchesSelector(record: ArtifactRecord, selector: Selector): boolean {
  return matchesClauses(record, compileSelector(selector));
}
