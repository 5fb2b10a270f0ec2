/**
 * Tests for the ingestion summary
 */

import { describe, it, expect } from "@jest/globals";
import { runInNewContext } from "node:vm";
import type { ResolvedReference } from "../../src/graph/types.js";
import { noteId } from "../../src/identity/ids.js";
import { SummaryCollector } from "../../src/rag/summary.js";
import { ErrorCode, FileSystemError } from "../../src/utils/errors.js";

const A = noteId("a.md");
const STATS = { size: 0, hits: 0, misses: 0, hitRate: 0 };

function reference(status: ResolvedReference["status"], rawTarget: string): ResolvedReference {
  return {
    kind: "wikilink",
    rawTarget,
    sourceNoteId: A,
    position: { start: 0, end: 4, line: 3 },
    raw: `[[${rawTarget}]]`,
    status,
    target: status === "resolved" ? { type: "note", noteId: noteId(`${rawTarget}.md`), path: `${rawTarget}.md` } : null,
    candidates: status === "ambiguous" ? ["x/dup.md", "y/dup.md"] : [],
    tried: [`exact:${rawTarget}.md`],
    context: rawTarget,
  };
}

describe("SummaryCollector", () => {
  it("should report a clean run", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.recordChunks(2);
    collector.recordEmbedded(2);

    const summary = collector.finish(STATS);

    expect(summary.status).toBe("ok");
    expect(summary.message).toBe("Indexed 1 note.");
  });

  it("should count references without degrading the run", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.noteSeen();
    collector.recordReferences("a.md", [
      reference("resolved", "b"),
      reference("broken", "ghost"),
      reference("broken", "phantom"),
      reference("ambiguous", "dup"),
    ]);

    const summary = collector.finish(STATS);

    expect(summary.status).toBe("ok");
    expect(summary.message).toBe("Indexed 2 notes. 2 broken references, 1 ambiguous.");
    expect(summary.counts).toMatchObject({ references: 4, resolved: 1, broken: 2, ambiguous: 1 });
    expect(summary.ambiguous).toEqual([
      {
        sourceNoteId: A,
        sourcePath: "a.md",
        kind: "wikilink",
        rawTarget: "dup",
        line: 3,
        candidates: ["x/dup.md", "y/dup.md"],
        tried: ["exact:dup.md"],
      },
    ]);
  });

  it("should degrade on skipped notes and keep only sanitized messages", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.noteSeen();
    collector.skipNote(
      "b.md",
      new FileSystemError(ErrorCode.FS_PERMISSION_DENIED, "EACCES: /home/test-user/b.md")
    );
    collector.recordChunks(1);
    collector.recordEmbedded(1);

    const summary = collector.finish(STATS);

    expect(summary.status).toBe("degraded");
    expect(summary.message).toBe("Indexed 1 note. 1 note skipped.");
    expect(summary.skippedNotes).toEqual([
      {
        path: "b.md",
        code: ErrorCode.FS_PERMISSION_DENIED,
        message: "Permission was denied while accessing the notes.",
      },
    ]);
  });

  it("should degrade on failed chunks", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.recordChunks(3);
    collector.recordEmbedded(1);
    collector.recordFailedChunks(
      [
        { noteId: A, chunkIndex: 1, code: ErrorCode.EMBEDDING_FAILED, message: "m", attempts: 4 },
        { noteId: A, chunkIndex: 2, code: ErrorCode.EMBEDDING_FAILED, message: "m", attempts: 4 },
      ],
      () => "a.md"
    );

    const summary = collector.finish(STATS);

    expect(summary.status).toBe("degraded");
    expect(summary.message).toBe("Indexed 1 note. 2 sections could not be embedded.");
    expect(summary.failedChunks.map((failure) => [failure.path, failure.chunkIndex])).toEqual([
      ["a.md", 1],
      ["a.md", 2],
    ]);
  });

  it("should fail when nothing was embedded", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.recordChunks(2);

    const summary = collector.finish(STATS);

    expect(summary.status).toBe("failed");
    expect(summary.message).toBe("No notes could be indexed.");
  });

  it("should keep the errno code of a file error from another realm", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.noteSeen();
    collector.skipNote("gone.md", runInNewContext('Object.assign(new Error("ENOENT: gone.md"), { code: "ENOENT" })'));

    expect(collector.finish(STATS).skippedNotes).toEqual([
      { path: "gone.md", code: ErrorCode.FS_FILE_NOT_FOUND, message: "A required file could not be found." },
    ]);
  });

  it("should fail when every note was skipped", () => {
    const collector = new SummaryCollector();
    collector.noteSeen();
    collector.skipNote("a.md", new Error("boom"));

    expect(collector.finish(STATS).status).toBe("failed");
  });

  it("should report an empty vault as ok", () => {
    expect(new SummaryCollector().finish(STATS).message).toBe("Indexed 0 notes.");
  });
});
