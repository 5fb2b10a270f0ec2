/**
 * Vector database artifact
 *
 * The ordered embedding records, notes, images and note graph of one ingestion
 * run, persisted as a single versioned JSON file. Read-only once built or loaded.
 * Similarity search is brute-force cosine over every record.
 */

import { NoteGraph } from "../graph/noteGraph.js";
import type { ImageId, NoteId } from "../identity/ids.js";
import { ArtifactError, ErrorCode, FileSystemError, toErrorCause, ValidationError } from "../utils/errors.js";
import { readTextFile, writeFileAtomic } from "../utils/files.js";
import { cosineSimilarity } from "./embeddings/provider.js";
import {
  ARTIFACT_SCHEMA_VERSION,
  VectorDatabaseArtifactSchema,
  type EmbeddingRecord,
  type ImageRecord,
  type NoteRecord,
  type VectorDatabaseArtifact,
} from "./types.js";

export interface ScoredRecord {
  record: EmbeddingRecord;
  /** Position in `records`, the tie-breaker */
  position: number;
  score: number;
}

export interface VectorDatabaseInit {
  createdAt: string;
  notesRoot: string;
  dimensions: number | null;
  records: EmbeddingRecord[];
  notes: NoteRecord[];
  images: ImageRecord[];
  graph: NoteGraph;
}

export class VectorDatabase {
  readonly schemaVersion = ARTIFACT_SCHEMA_VERSION;
  readonly createdAt: string;
  readonly notesRoot: string;
  readonly dimensions: number | null;
  readonly records: readonly EmbeddingRecord[];
  readonly notes: readonly NoteRecord[];
  readonly images: readonly ImageRecord[];
  readonly graph: NoteGraph;

  private readonly noteIndex: ReadonlyMap<NoteId, NoteRecord>;
  private readonly imageIndex: ReadonlyMap<ImageId, ImageRecord>;

  constructor(init: VectorDatabaseInit) {
    this.createdAt = init.createdAt;
    this.notesRoot = init.notesRoot;
    this.dimensions = init.dimensions;
    this.records = init.records;
    this.notes = init.notes;
    this.images = init.images;
    this.graph = init.graph;
    this.noteIndex = new Map(init.notes.map((note) => [note.noteId, note]));
    this.imageIndex = new Map(init.images.map((image) => [image.imageId, image]));
  }

  static fromArtifact(artifact: VectorDatabaseArtifact): VectorDatabase {
    return new VectorDatabase({
      createdAt: artifact.createdAt,
      notesRoot: artifact.notesRoot,
      dimensions: artifact.dimensions,
      records: artifact.records,
      notes: artifact.notes,
      images: artifact.images,
      graph: NoteGraph.fromJSON(artifact.graph),
    });
  }

  toArtifact(): VectorDatabaseArtifact {
    return {
      schemaVersion: this.schemaVersion,
      createdAt: this.createdAt,
      notesRoot: this.notesRoot,
      dimensions: this.dimensions,
      records: [...this.records],
      notes: [...this.notes],
      images: [...this.images],
      graph: this.graph.toJSON(),
    };
  }

  getNote(noteId: NoteId): NoteRecord | undefined {
    return this.noteIndex.get(noteId);
  }

  getImage(imageId: ImageId): ImageRecord | undefined {
    return this.imageIndex.get(imageId);
  }

  /**
   * Records of one note in chunk order
   */
  recordsOf(noteId: NoteId): EmbeddingRecord[] {
    return this.records.filter((record) => record.noteId === noteId);
  }

  /**
   * Top-k records by cosine similarity, descending; equal scores keep record order
   *
   * @throws ValidationError when k is not a positive integer or the vector size is wrong
   */
  search(queryVector: readonly number[], k: number): ScoredRecord[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ValidationError(ErrorCode.VALIDATION_INVALID_QUERY, `k must be a positive integer, got ${k}`, {
        field: "k",
        value: k,
      });
    }
    if (this.dimensions !== null && queryVector.length !== this.dimensions) {
      throw new ValidationError(
        ErrorCode.VALIDATION_INVALID_QUERY,
        `Query vector has ${queryVector.length} dimensions, index has ${this.dimensions}`,
        { field: "queryVector", value: queryVector.length }
      );
    }

    const scored = this.records.map((record, position) => ({
      record,
      position,
      score: cosineSimilarity(queryVector, record.vector),
    }));

    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, k);
  }

  /**
   * @throws ArtifactError ARTIFACT_WRITE_FAILED
   */
  async save(artifactPath: string): Promise<void> {
    try {
      await writeFileAtomic(artifactPath, JSON.stringify(this.toArtifact(), null, 2));
    } catch (err) {
      throw new ArtifactError(ErrorCode.ARTIFACT_WRITE_FAILED, artifactPath, "Failed to write vector database", {
        cause: toErrorCause(err),
      });
    }
  }
}

/**
 * Load and validate a persisted vector database
 *
 * @throws ArtifactError ARTIFACT_NOT_FOUND, ARTIFACT_VERSION_MISMATCH or ARTIFACT_CORRUPT
 */
export async function loadVectorDatabase(artifactPath: string): Promise<VectorDatabase> {
  let text: string;
  try {
    text = await readTextFile(artifactPath);
  } catch (err) {
    const missing = err instanceof FileSystemError && err.code === ErrorCode.FS_FILE_NOT_FOUND;
    throw new ArtifactError(
      missing ? ErrorCode.ARTIFACT_NOT_FOUND : ErrorCode.ARTIFACT_CORRUPT,
      artifactPath,
      missing ? "Vector database not found" : "Vector database could not be read",
      { cause: toErrorCause(err) }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ArtifactError(ErrorCode.ARTIFACT_CORRUPT, artifactPath, "Vector database is not valid JSON", {
      cause: toErrorCause(err),
    });
  }

  const version =
    typeof raw === "object" && raw !== null && "schemaVersion" in raw ? raw.schemaVersion : undefined;
  if (version !== ARTIFACT_SCHEMA_VERSION) {
    throw new ArtifactError(
      ErrorCode.ARTIFACT_VERSION_MISMATCH,
      artifactPath,
      `Expected schema version ${ARTIFACT_SCHEMA_VERSION}, found ${String(version)}`
    );
  }

  const parsed = VectorDatabaseArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ArtifactError(ErrorCode.ARTIFACT_CORRUPT, artifactPath, parsed.error.message, {
      cause: parsed.error,
    });
  }

  try {
    return VectorDatabase.fromArtifact(parsed.data);
  } catch (err) {
    throw new ArtifactError(ErrorCode.ARTIFACT_CORRUPT, artifactPath, "Vector database graph is inconsistent", {
      cause: toErrorCause(err),
    });
  }
}
