/**
 * Tests for the retrieval engine: ranking, graph expansion and lookups
 */

import { describe, it, expect } from "@jest/globals";
import { buildNoteGraph } from "../../src/graph/builder.js";
import type { ResolvedReference } from "../../src/graph/types.js";
import { imageId, noteId, type NoteId } from "../../src/identity/ids.js";
import { RetrievalEngine } from "../../src/rag/retriever.js";
import type { EmbeddingRecord, ImageRecord, NoteRecord } from "../../src/rag/types.js";
import { VectorDatabase } from "../../src/rag/vectorStore.js";
import { ValidationError } from "../../src/utils/errors.js";

const A = noteId("notes/a.md");
const B = noteId("notes/b.md");
const C = noteId("other/c.md");
const D = noteId("other/d.md");
const IMG = imageId(A, "pic.png");

const NOTES: NoteRecord[] = [
  { noteId: A, canonicalPath: "notes/a.md", title: "Alpha Note", folderPath: "notes", tags: [], chunkCount: 2 },
  { noteId: B, canonicalPath: "notes/b.md", title: "Beta", folderPath: "notes", tags: [], chunkCount: 1 },
  { noteId: C, canonicalPath: "other/c.md", title: "Gamma_Ray", folderPath: "other", tags: [], chunkCount: 1 },
  { noteId: D, canonicalPath: "other/d.md", title: "Delta", folderPath: "other", tags: [], chunkCount: 0 },
];

const IMAGES: ImageRecord[] = [
  {
    imageId: IMG,
    noteId: A,
    relativePath: "pic.png",
    canonicalPath: "notes/a.assets/pic.png",
    absolutePath: "/vault/notes/a.assets/pic.png",
    kind: "image",
    mimeType: "image/png",
  },
];

function base(sourceNoteId: NoteId, rawTarget: string, line: number): ResolvedReference {
  return {
    kind: "wikilink",
    rawTarget,
    sourceNoteId,
    position: { start: 0, end: rawTarget.length + 4, line },
    raw: `[[${rawTarget}]]`,
    status: "broken",
    target: null,
    candidates: [],
    tried: [`exact:${rawTarget}.md`, "search:."],
    context: `see ${rawTarget}`,
  };
}

function link(sourceNoteId: NoteId, targetPath: string): ResolvedReference {
  return {
    ...base(sourceNoteId, targetPath, 0),
    status: "resolved",
    target: { type: "note", noteId: noteId(targetPath), path: targetPath },
  };
}

const REFERENCES = new Map<NoteId, ResolvedReference[]>([
  [
    A,
    [
      link(A, "notes/b.md"),
      {
        ...base(A, "pic.png", 1),
        kind: "image-embed",
        status: "resolved",
        target: { type: "image", imageId: IMG, path: "notes/a.assets/pic.png" },
      },
      { ...base(A, "dup", 2), status: "ambiguous", candidates: ["x/dup.md", "y/dup.md"] },
    ],
  ],
  [B, [link(B, "other/c.md")]],
  [C, [base(C, "ghost", 4)]],
]);

function record(noteIdValue: NoteId, chunkIndex: number, vector: number[]): EmbeddingRecord {
  return {
    id: `${noteIdValue}:${chunkIndex}`,
    noteId: noteIdValue,
    chunkIndex,
    startOffset: chunkIndex * 10,
    endOffset: chunkIndex * 10 + 8,
    text: `chunk ${chunkIndex}`,
    vector,
    headerText: chunkIndex === 0 ? "Intro" : undefined,
  };
}

function createDatabase(records: EmbeddingRecord[]): VectorDatabase {
  return new VectorDatabase({
    createdAt: "2026-01-01T00:00:00.000Z",
    notesRoot: "/vault",
    dimensions: 3,
    records,
    notes: NOTES,
    images: IMAGES,
    graph: buildNoteGraph(NOTES, REFERENCES),
  });
}

const RECORDS = [record(A, 0, [1, 0, 0]), record(B, 0, [0, 1, 0]), record(C, 0, [0, 0, 1]), record(A, 1, [1, 0, 0])];
const engine = new RetrievalEngine(createDatabase(RECORDS));

describe("RetrievalEngine", () => {
  describe("query", () => {
    it("should return hits with provenance, ties in record order", () => {
      const hits = engine.query([1, 0, 0], 2);

      expect(hits.map((hit) => [hit.chunk.id, hit.score])).toEqual([
        [`${A}:0`, 1],
        [`${A}:1`, 1],
      ]);
      expect(hits[0].provenance).toEqual({
        noteId: A,
        notePath: "notes/a.md",
        noteTitle: "Alpha Note",
        chunkIndex: 0,
        startOffset: 0,
        endOffset: 8,
        headerText: "Intro",
        related: [],
      });
    });

    it("should expand one hop in both directions", () => {
      const [hit] = engine.query([0, 1, 0], 1, 1);

      expect(hit.provenance.related).toEqual([
        { type: "note", id: C, path: "other/c.md", hops: 1, via: "outbound" },
        { type: "note", id: A, path: "notes/a.md", hops: 1, via: "inbound" },
      ]);
    });

    it("should reach images at the second hop and skip unresolved references", () => {
      const [hit] = engine.query([0, 1, 0], 1, 2);

      expect(hit.provenance.related).toEqual([
        { type: "note", id: C, path: "other/c.md", hops: 1, via: "outbound" },
        { type: "note", id: A, path: "notes/a.md", hops: 1, via: "inbound" },
        { type: "image", id: IMG, path: "notes/a.assets/pic.png", hops: 2, via: "outbound" },
      ]);
    });

    it("should reject a negative hop count", () => {
      expect(() => engine.query([1, 0, 0], 1, -1)).toThrow(ValidationError);
    });
  });

  describe("findNoteByTitle", () => {
    it.each([
      ["Beta", B],
      ["beta", B],
      ["gamma ray", C],
      ["d", D],
      ["alph", A],
    ])("should find %s", (title, expected) => {
      expect(engine.findNoteByTitle(title)?.noteId).toBe(expected);
    });

    it("should return undefined when nothing matches", () => {
      expect(engine.findNoteByTitle("zzz")).toBeUndefined();
    });
  });

  describe("findPath", () => {
    it("should follow links in either direction", () => {
      expect(engine.findPath(A, C)).toEqual([A, B, C]);
      expect(engine.findPath(C, A)).toEqual([C, B, A]);
    });

    it("should handle trivial and disconnected cases", () => {
      expect(engine.findPath(A, A)).toEqual([A]);
      expect(engine.findPath(A, D)).toBeNull();
      expect(engine.findPath(A, "note_unknown")).toBeNull();
    });
  });

  it("should list the notes of a folder", () => {
    expect(engine.getNoteCluster(A)).toEqual([A, B]);
    expect(engine.getNoteCluster(D)).toEqual([C, D]);
    expect(engine.getNoteCluster("note_unknown")).toEqual([]);
  });

  it("should describe backlinks", () => {
    expect(engine.backlinks(B)).toEqual([
      { noteId: A, notePath: "notes/a.md", noteTitle: "Alpha Note", mentions: 1, contexts: ["see notes/b.md"] },
    ]);
  });

  it("should list broken and ambiguous references by target", () => {
    expect(engine.diagnostics()).toEqual([
      {
        status: "ambiguous",
        rawTarget: "dup",
        kind: "wikilink",
        sourceNoteId: A,
        sourcePath: "notes/a.md",
        line: 2,
        candidates: ["x/dup.md", "y/dup.md"],
        tried: ["exact:dup.md", "search:."],
      },
      {
        status: "broken",
        rawTarget: "ghost",
        kind: "wikilink",
        sourceNoteId: C,
        sourcePath: "other/c.md",
        line: 4,
        candidates: [],
        tried: ["exact:ghost.md", "search:."],
      },
    ]);
  });

  describe("validate", () => {
    it("should accept a consistent database", () => {
      expect(engine.validate()).toEqual({ ok: true, issues: [] });
    });

    it("should flag vectors of the wrong size", () => {
      const invalid = new RetrievalEngine(createDatabase([record(A, 0, [1, 0])]));
      expect(invalid.validate()).toEqual({
        ok: false,
        issues: [`record ${A}:0 has 2 dimensions, expected 3`],
      });
    });
  });
});
