import { z } from "zod";
import type { ArtifactRecord, Document, Selector } from "./types.js";

const HashSchema = z.string().regex(/^[0-9a-f]{64}$/, "expected sha256 hex");

export const DocumentSchema: z.ZodType<Document> = z
  .object({
    id: z.string(),
    hash: HashSchema,
    parent_hashes: z.array(HashSchema),
    metadata: z.record(z.unknown()),
    content: z.string(),
  })
  .strict();

export const ArtifactRecordSchema: z.ZodType<ArtifactRecord> = z.object({
  custom_id: z.string(),
  uuid: HashSchema,
  parent_uuids: z.array(HashSchema),
  metadata: z.record(z.unknown()),
});

/** Persisted snapshot: { artifacts: [...] } */
export const SnapshotSchema = z.object({
  artifacts: z.array(ArtifactRecordSchema),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

export const SelectorSchema: z.ZodType<Selector> = z
  .object({
    ids: z.array(z.string()).optional(),
    hashes: z.array(z.string()).optional(),
    parent_hashes: z.array(z.string()).optional(),
    transformer: z.string().optional(),
    metadata: z
      .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
      .optional(),
    stored_after: z.number().finite().optional(),
    stored_before: z.number().finite().optional(),
  })
  .strict();
