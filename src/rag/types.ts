/**
 * Vector database artifact and retrieval types
 */

import { z } from "zod";
import type { ImageId, NoteId } from "../identity/ids.js";

// ============================================================================
// Schema Version Management
// ============================================================================

/** Current artifact schema version */
export const ARTIFACT_SCHEMA_VERSION = 1;

// ============================================================================
// Zod Schemas
// ============================================================================

const ReferencePositionSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  line: z.number().int().nonnegative(),
});

const ReferenceTargetSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("note"), noteId: z.string(), path: z.string() }),
  z.object({ type: z.literal("image"), imageId: z.string(), path: z.string() }),
]);

export const ResolvedReferenceSchema = z.object({
  kind: z.enum(["wikilink", "image-embed", "diagram-embed"]),
  rawTarget: z.string(),
  sourceNoteId: z.string(),
  position: ReferencePositionSchema,
  raw: z.string(),
  section: z.string().optional(),
  alias: z.string().optional(),
  status: z.enum(["resolved", "ambiguous", "broken"]),
  target: ReferenceTargetSchema.nullable(),
  candidates: z.array(z.string()),
  tried: z.array(z.string()),
  context: z.string(),
});

export const SerializedNoteGraphSchema = z.object({
  outbound: z.array(
    z.object({ noteId: z.string(), references: z.array(ResolvedReferenceSchema) })
  ),
  inbound: z.array(
    z.object({
      key: z.string(),
      entries: z.array(z.object({ sourceNoteId: z.string(), index: z.number().int().nonnegative() })),
    })
  ),
  clusters: z.array(z.object({ folderPath: z.string(), noteIds: z.array(z.string()) })),
});

/**
 * 임베딩 레코드 스키마
 * One chunk and its vector.
 */
export const EmbeddingRecordSchema = z.object({
  id: z.string(),
  noteId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
  text: z.string(),
  vector: z.array(z.number()),
  headerText: z.string().optional(),
});

export const NoteRecordSchema = z.object({
  noteId: z.string(),
  canonicalPath: z.string(),
  title: z.string(),
  folderPath: z.string(),
  tags: z.array(z.string()),
  chunkCount: z.number().int().nonnegative(),
});

export const ImageRecordSchema = z.object({
  imageId: z.string(),
  noteId: z.string(),
  relativePath: z.string(),
  canonicalPath: z.string(),
  absolutePath: z.string(),
  kind: z.enum(["image", "diagram"]),
  mimeType: z.string(),
});

/**
 * Whole artifact. The version is checked before the rest is validated.
 */
export const VectorDatabaseArtifactSchema = z.object({
  schemaVersion: z.number().int(),
  createdAt: z.string(),
  notesRoot: z.string(),
  dimensions: z.number().int().positive().nullable(),
  records: z.array(EmbeddingRecordSchema),
  notes: z.array(NoteRecordSchema),
  images: z.array(ImageRecordSchema),
  graph: SerializedNoteGraphSchema,
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type EmbeddingRecord = z.infer<typeof EmbeddingRecordSchema>;
export type NoteRecord = z.infer<typeof NoteRecordSchema>;
export type ImageRecord = z.infer<typeof ImageRecordSchema>;
export type VectorDatabaseArtifact = z.infer<typeof VectorDatabaseArtifactSchema>;

/**
 * Entity reached by graph expansion around a hit
 */
export interface RelatedEntity {
  type: "note" | "image";
  id: NoteId | ImageId;
  path: string;
  /** Edges from the hit's note, at least 1 */
  hops: number;
  /** Direction of the last edge followed */
  via: "outbound" | "inbound";
}

export interface Provenance {
  noteId: NoteId;
  notePath: string;
  noteTitle: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
  headerText?: string;
  related: RelatedEntity[];
}

/**
 * 검색 결과
 */
export interface RetrievalHit {
  chunk: EmbeddingRecord;
  /** Cosine similarity */
  score: number;
  provenance: Provenance;
}

/**
 * Broken or ambiguous reference with its source, for diagnostics
 */
export interface ReferenceDiagnostic {
  status: "broken" | "ambiguous";
  rawTarget: string;
  kind: "wikilink" | "image-embed" | "diagram-embed";
  sourceNoteId: NoteId;
  sourcePath: string;
  line: number;
  candidates: string[];
  tried: string[];
}

export interface DatabaseValidation {
  ok: boolean;
  issues: string[];
}
