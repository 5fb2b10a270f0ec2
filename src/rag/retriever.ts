/**
 * Retrieval engine
 * Cosine top-k over a vector database, with provenance and graph expansion
 */

import path from "node:path";
import type { ImageId, NoteId } from "../identity/ids.js";
import { normalizeNoteTitle } from "../references/text.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import type {
  DatabaseValidation,
  NoteRecord,
  Provenance,
  ReferenceDiagnostic,
  RelatedEntity,
  RetrievalHit,
} from "./types.js";
import type { VectorDatabase } from "./vectorStore.js";

/**
 * One note linking to another, grouped across its mentions
 */
export interface BacklinkInfo {
  noteId: NoteId;
  notePath: string;
  noteTitle: string;
  /** Number of mentions in the source note */
  mentions: number;
  /** Text around each mention */
  contexts: string[];
}

export class RetrievalEngine {
  constructor(private readonly db: VectorDatabase) {}

  /**
   * Top-k chunks for a query vector. Each hit carries the notes and images
   * reachable within `expandHops` edges of its note, nearest first.
   *
   * @throws ValidationError for a bad k, a bad hop count or a wrong vector size
   */
  query(queryVector: readonly number[], k: number, expandHops: number = 0): RetrievalHit[] {
    if (!Number.isInteger(expandHops) || expandHops < 0) {
      throw new ValidationError(
        ErrorCode.VALIDATION_INVALID_QUERY,
        `expandHops must be a non-negative integer, got ${expandHops}`,
        { field: "expandHops", value: expandHops }
      );
    }

    const expansions = new Map<NoteId, RelatedEntity[]>();
    const relatedOf = (noteId: NoteId): RelatedEntity[] => {
      let related = expansions.get(noteId);
      if (!related) {
        related = this.expand(noteId, expandHops);
        expansions.set(noteId, related);
      }
      return related;
    };

    return this.db.search(queryVector, k).map(({ record, score }) => {
      const note = this.db.getNote(record.noteId);
      const provenance: Provenance = {
        noteId: record.noteId,
        notePath: note?.canonicalPath ?? "",
        noteTitle: note?.title ?? "",
        chunkIndex: record.chunkIndex,
        startOffset: record.startOffset,
        endOffset: record.endOffset,
        headerText: record.headerText,
        related: relatedOf(record.noteId),
      };
      return { chunk: record, score, provenance };
    });
  }

  /**
   * Breadth-first walk over outbound and inbound edges. Images are leaves;
   * every entity is reported once, at its smallest hop distance.
   */
  private expand(origin: NoteId, maxHops: number): RelatedEntity[] {
    const related: RelatedEntity[] = [];
    const visited = new Set<string>([`note:${origin}`]);
    let frontier: NoteId[] = [origin];

    for (let hops = 1; hops <= maxHops && frontier.length > 0; hops++) {
      const next: NoteId[] = [];
      for (const noteId of frontier) {
        for (const neighbour of this.db.graph.neighbours(noteId)) {
          const key = `${neighbour.type}:${neighbour.id}`;
          if (visited.has(key)) continue;
          visited.add(key);

          related.push({
            type: neighbour.type,
            id: neighbour.id,
            path: this.pathOf(neighbour.type, neighbour.id) ?? neighbour.path ?? "",
            hops,
            via: neighbour.via,
          });
          if (neighbour.type === "note") {
            next.push(neighbour.id);
          }
        }
      }
      frontier = next;
    }

    return related;
  }

  private pathOf(type: "note" | "image", id: NoteId | ImageId): string | undefined {
    return type === "note" ? this.db.getNote(id)?.canonicalPath : this.db.getImage(id)?.canonicalPath;
  }

  /**
   * Find a note by title: exact, then case-insensitive, then normalized,
   * then file stem, then substring of the normalized title
   */
  findNoteByTitle(title: string): NoteRecord | undefined {
    const notes = this.db.notes;
    const wanted = normalizeNoteTitle(title);
    const lower = title.toLowerCase();
    const stemOf = (note: NoteRecord): string => path.posix.basename(note.canonicalPath, ".md");

    return (
      notes.find((note) => note.title === title) ??
      notes.find((note) => note.title.toLowerCase() === lower) ??
      notes.find((note) => normalizeNoteTitle(note.title) === wanted) ??
      notes.find((note) => normalizeNoteTitle(stemOf(note)) === wanted) ??
      (wanted.length > 0 ? notes.find((note) => normalizeNoteTitle(note.title).includes(wanted)) : undefined)
    );
  }

  /**
   * Shortest chain of notes between two notes, links followed in either
   * direction. Null when they are not connected.
   */
  findPath(sourceId: NoteId, targetId: NoteId): NoteId[] | null {
    const graph = this.db.graph;
    if (!graph.hasNote(sourceId) || !graph.hasNote(targetId)) {
      return null;
    }
    if (sourceId === targetId) {
      return [sourceId];
    }

    const previous = new Map<NoteId, NoteId>();
    const visited = new Set<NoteId>([sourceId]);
    const queue: NoteId[] = [sourceId];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      for (const neighbour of graph.neighbours(current)) {
        if (neighbour.type !== "note" || visited.has(neighbour.id)) continue;
        visited.add(neighbour.id);
        previous.set(neighbour.id, current);

        if (neighbour.id === targetId) {
          const chain: NoteId[] = [targetId];
          let step = previous.get(targetId);
          while (step !== undefined) {
            chain.unshift(step);
            step = previous.get(step);
          }
          return chain;
        }
        queue.push(neighbour.id);
      }
    }

    return null;
  }

  /**
   * Notes sharing the folder of the given note, the note included
   */
  getNoteCluster(noteId: NoteId): NoteId[] {
    const note = this.db.getNote(noteId);
    if (!note) {
      return [];
    }
    return [...(this.db.graph.clusters().get(note.folderPath) ?? [])];
  }

  backlinks(noteId: NoteId): BacklinkInfo[] {
    return this.db.graph.backlinks(noteId).map(({ sourceNoteId, references }) => {
      const source = this.db.getNote(sourceNoteId);
      return {
        noteId: sourceNoteId,
        notePath: source?.canonicalPath ?? "",
        noteTitle: source?.title ?? "",
        mentions: references.length,
        contexts: references.map((reference) => reference.context),
      };
    });
  }

  /**
   * Broken and ambiguous references, grouped by raw target in key order
   */
  diagnostics(): ReferenceDiagnostic[] {
    const diagnostics: ReferenceDiagnostic[] = [];
    for (const bucket of this.db.graph.unresolved()) {
      for (const { reference } of bucket.entries) {
        if (reference.status === "resolved") continue;
        diagnostics.push({
          status: reference.status,
          rawTarget: reference.rawTarget,
          kind: reference.kind,
          sourceNoteId: reference.sourceNoteId,
          sourcePath: this.db.getNote(reference.sourceNoteId)?.canonicalPath ?? "",
          line: reference.position.line,
          candidates: reference.candidates,
          tried: reference.tried,
        });
      }
    }
    return diagnostics;
  }

  /**
   * Check the inverse index and that every vector has the database's dimensions
   */
  validate(): DatabaseValidation {
    const issues: string[] = [];

    const inverse = this.db.graph.verifyInverse();
    for (const missing of inverse.missing) {
      issues.push(`missing inbound entry: ${missing}`);
    }
    for (const extra of inverse.extra) {
      issues.push(`orphan inbound entry: ${extra}`);
    }

    const dimensions = this.db.dimensions;
    for (const record of this.db.records) {
      if (dimensions === null || record.vector.length !== dimensions) {
        issues.push(`record ${record.id} has ${record.vector.length} dimensions, expected ${String(dimensions)}`);
      }
      if (!this.db.getNote(record.noteId)) {
        issues.push(`record ${record.id} belongs to unknown note ${record.noteId}`);
      }
    }

    for (const noteId of this.db.graph.notes()) {
      if (!this.db.getNote(noteId)) {
        issues.push(`graph note ${noteId} has no note record`);
      }
    }

    return { ok: issues.length === 0, issues };
  }
}
