/**
 * Ingestion run summary
 *
 * Per-reference and per-note problems are accumulated here instead of being
 * thrown. The summary is what a web layer shows: its `message` and every
 * `message` field are fixed sanitized strings, never raw exception text.
 */

import type { CompositeIndexStats } from "../identity/compositeIndex.js";
import type { NoteId } from "../identity/ids.js";
import type { ResolvedReference } from "../graph/types.js";
import { toVaultweaveError, type ErrorCode } from "../utils/errors.js";
import type { FailedChunk } from "./embeddings/queue.js";

export type IngestionStatus = "ok" | "degraded" | "failed";

export interface ReferenceIssue {
  sourceNoteId: NoteId;
  sourcePath: string;
  kind: ResolvedReference["kind"];
  rawTarget: string;
  line: number;
  candidates: string[];
  tried: string[];
}

export interface SkippedNote {
  path: string;
  code: ErrorCode;
  message: string;
}

export interface FailedChunkReport extends FailedChunk {
  path: string;
}

export interface IngestionCounts {
  notes: number;
  notesSkipped: number;
  references: number;
  resolved: number;
  broken: number;
  ambiguous: number;
  images: number;
  chunks: number;
  embedded: number;
  failedChunks: number;
}

export interface IngestionSummary {
  status: IngestionStatus;
  message: string;
  counts: IngestionCounts;
  broken: ReferenceIssue[];
  ambiguous: ReferenceIssue[];
  failedChunks: FailedChunkReport[];
  skippedNotes: SkippedNote[];
  compositeIndex: CompositeIndexStats;
  durationMs: number;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

export class SummaryCollector {
  private readonly startedAt = Date.now();
  private notes = 0;
  private references = 0;
  private resolved = 0;
  private images = 0;
  private chunks = 0;
  private embedded = 0;
  private readonly broken: ReferenceIssue[] = [];
  private readonly ambiguous: ReferenceIssue[] = [];
  private readonly failedChunks: FailedChunkReport[] = [];
  private readonly skippedNotes: SkippedNote[] = [];

  noteSeen(): void {
    this.notes++;
  }

  recordReferences(sourcePath: string, references: readonly ResolvedReference[]): void {
    for (const reference of references) {
      this.references++;
      if (reference.status === "resolved") {
        this.resolved++;
        continue;
      }

      const issue: ReferenceIssue = {
        sourceNoteId: reference.sourceNoteId,
        sourcePath,
        kind: reference.kind,
        rawTarget: reference.rawTarget,
        line: reference.position.line,
        candidates: reference.candidates,
        tried: reference.tried,
      };
      if (reference.status === "broken") {
        this.broken.push(issue);
      } else {
        this.ambiguous.push(issue);
      }
    }
  }

  recordImages(count: number): void {
    this.images += count;
  }

  recordChunks(count: number): void {
    this.chunks += count;
  }

  recordEmbedded(count: number): void {
    this.embedded += count;
  }

  recordFailedChunks(failures: readonly FailedChunk[], pathOf: (noteId: NoteId) => string): void {
    for (const failure of failures) {
      this.failedChunks.push({ ...failure, path: pathOf(failure.noteId) });
    }
  }

  /**
   * Record a note left out of the index; only the sanitized message is kept
   */
  skipNote(notePath: string, error: unknown): void {
    const normalized = toVaultweaveError(error);
    this.skippedNotes.push({
      path: notePath,
      code: normalized.code,
      message: normalized.getUserMessage(),
    });
  }

  finish(compositeIndex: CompositeIndexStats): IngestionSummary {
    const counts: IngestionCounts = {
      notes: this.notes,
      notesSkipped: this.skippedNotes.length,
      references: this.references,
      resolved: this.resolved,
      broken: this.broken.length,
      ambiguous: this.ambiguous.length,
      images: this.images,
      chunks: this.chunks,
      embedded: this.embedded,
      failedChunks: this.failedChunks.length,
    };

    const status = this.status(counts);

    return {
      status,
      message: this.message(status, counts),
      counts,
      broken: this.broken,
      ambiguous: this.ambiguous,
      failedChunks: this.failedChunks,
      skippedNotes: this.skippedNotes,
      compositeIndex,
      durationMs: Date.now() - this.startedAt,
    };
  }

  private status(counts: IngestionCounts): IngestionStatus {
    const nothingIndexed =
      (counts.notes > 0 && counts.notesSkipped === counts.notes) ||
      (counts.chunks > 0 && counts.embedded === 0);
    if (nothingIndexed) {
      return "failed";
    }
    if (counts.notesSkipped > 0 || counts.failedChunks > 0) {
      return "degraded";
    }
    return "ok";
  }

  private message(status: IngestionStatus, counts: IngestionCounts): string {
    if (status === "failed") {
      return "No notes could be indexed.";
    }

    const parts = [`Indexed ${plural(counts.notes - counts.notesSkipped, "note")}.`];
    if (counts.failedChunks > 0) {
      parts.push(`${plural(counts.failedChunks, "section")} could not be embedded.`);
    }
    if (counts.notesSkipped > 0) {
      parts.push(`${plural(counts.notesSkipped, "note")} skipped.`);
    }
    if (counts.broken > 0 || counts.ambiguous > 0) {
      parts.push(`${plural(counts.broken, "broken reference")}, ${counts.ambiguous} ambiguous.`);
    }
    return parts.join(" ");
  }
}
