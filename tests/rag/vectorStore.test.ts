/**
 * Tests for the vector database artifact: search, persistence and loading
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import path from "node:path";
import { buildNoteGraph } from "../../src/graph/builder.js";
import type { ResolvedReference } from "../../src/graph/types.js";
import { noteId } from "../../src/identity/ids.js";
import type { EmbeddingRecord, NoteRecord } from "../../src/rag/types.js";
import { loadVectorDatabase, VectorDatabase } from "../../src/rag/vectorStore.js";
import { ArtifactError, ErrorCode, ValidationError } from "../../src/utils/errors.js";
import { createTempVault, removeTempVault } from "../helpers.js";

const A = noteId("a.md");
const B = noteId("b.md");

const NOTES: NoteRecord[] = [
  { noteId: A, canonicalPath: "a.md", title: "A", folderPath: ".", tags: ["x"], chunkCount: 2 },
  { noteId: B, canonicalPath: "b.md", title: "B", folderPath: ".", tags: [], chunkCount: 1 },
];

function record(id: string, vector: number[], noteIdValue: string = A, chunkIndex: number = 0): EmbeddingRecord {
  return { id, noteId: noteIdValue, chunkIndex, startOffset: 0, endOffset: 4, text: "text", vector };
}

const LINK: ResolvedReference = {
  kind: "wikilink",
  rawTarget: "b",
  sourceNoteId: A,
  position: { start: 0, end: 5, line: 0 },
  raw: "[[b]]",
  status: "resolved",
  target: { type: "note", noteId: B, path: "b.md" },
  candidates: [],
  tried: ["exact:b.md"],
  context: "[[b]]",
};

function createDatabase(records: EmbeddingRecord[], dimensions: number | null = 2): VectorDatabase {
  return new VectorDatabase({
    createdAt: "2026-01-01T00:00:00.000Z",
    notesRoot: "/vault",
    dimensions,
    records,
    notes: NOTES,
    images: [],
    graph: buildNoteGraph(NOTES, new Map([[A, [LINK]]])),
  });
}

describe("VectorDatabase", () => {
  describe("search", () => {
    const db = createDatabase([
      record("r0", [1, 0], A, 0),
      record("r1", [0, 1], B, 0),
      record("r2", [1, 0], A, 1),
    ]);

    it("should rank by cosine similarity and break ties by record order", () => {
      const results = db.search([1, 0], 3);

      expect(results.map((result) => [result.record.id, result.position, result.score])).toEqual([
        ["r0", 0, 1],
        ["r2", 2, 1],
        ["r1", 1, 0],
      ]);
    });

    it("should return at most k records", () => {
      expect(db.search([0, 1], 1).map((result) => result.record.id)).toEqual(["r1"]);
      expect(db.search([0, 1], 10)).toHaveLength(3);
    });

    it("should reject a bad k or vector size", () => {
      expect(() => db.search([1, 0], 0)).toThrow(ValidationError);
      expect(() => db.search([1, 0], 1.5)).toThrow(ValidationError);
      expect(() => db.search([1, 0, 0], 1)).toThrow(ValidationError);
    });

    it("should look up notes and records", () => {
      expect(db.getNote(B)?.title).toBe("B");
      expect(db.getNote("note_missing")).toBeUndefined();
      expect(db.recordsOf(A).map((entry) => entry.id)).toEqual(["r0", "r2"]);
    });
  });

  describe("persistence", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempVault({});
    });

    afterEach(async () => {
      await removeTempVault(dir);
    });

    it("should load what it saved", async () => {
      const db = createDatabase([record("r0", [1, 0])]);
      const artifactPath = path.join(dir, "out", "vector-db.json");

      await db.save(artifactPath);
      const loaded = await loadVectorDatabase(artifactPath);

      expect(loaded.toArtifact()).toEqual(db.toArtifact());
      expect(loaded.graph.verifyInverse().ok).toBe(true);
      expect(loaded.graph.backlinks(B).map((link) => link.sourceNoteId)).toEqual([A]);
      expect(await fs.readdir(path.join(dir, "out"))).toEqual(["vector-db.json"]);
    });

    it("should report a missing artifact", async () => {
      await expect(loadVectorDatabase(path.join(dir, "none.json"))).rejects.toMatchObject({
        code: ErrorCode.ARTIFACT_NOT_FOUND,
      });
    });

    it("should report invalid JSON as corrupt", async () => {
      const artifactPath = path.join(dir, "bad.json");
      await fs.writeFile(artifactPath, "{ not json");

      await expect(loadVectorDatabase(artifactPath)).rejects.toMatchObject({ code: ErrorCode.ARTIFACT_CORRUPT });
    });

    it("should report a schema version mismatch", async () => {
      const artifactPath = path.join(dir, "old.json");
      await fs.writeFile(artifactPath, JSON.stringify({ ...createDatabase([]).toArtifact(), schemaVersion: 2 }));

      await expect(loadVectorDatabase(artifactPath)).rejects.toMatchObject({
        code: ErrorCode.ARTIFACT_VERSION_MISMATCH,
      });
    });

    it("should report a malformed artifact as corrupt", async () => {
      const artifactPath = path.join(dir, "shape.json");
      await fs.writeFile(artifactPath, JSON.stringify({ ...createDatabase([]).toArtifact(), records: "none" }));

      await expect(loadVectorDatabase(artifactPath)).rejects.toMatchObject({ code: ErrorCode.ARTIFACT_CORRUPT });
    });

    it("should report an inconsistent graph as corrupt", async () => {
      const artifact = createDatabase([]).toArtifact();
      artifact.graph.inbound[0].entries[0].index = 5;
      const artifactPath = path.join(dir, "graph.json");
      await fs.writeFile(artifactPath, JSON.stringify(artifact));

      await expect(loadVectorDatabase(artifactPath)).rejects.toMatchObject({ code: ErrorCode.ARTIFACT_CORRUPT });
    });

    it("should wrap write failures", async () => {
      await fs.writeFile(path.join(dir, "blocker"), "");
      const db = createDatabase([]);

      const error = await db.save(path.join(dir, "blocker", "vector-db.json")).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ArtifactError);
      expect(error).toMatchObject({ code: ErrorCode.ARTIFACT_WRITE_FAILED });
    });
  });
});
