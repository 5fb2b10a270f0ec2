/**
 * Content-addressed identities for notes and images
 *
 * Ids are pure functions of their defining strings: no counters, no randomness,
 * so a full re-ingestion reproduces every id byte for byte.
 */

import crypto from "node:crypto";

export type NoteId = string;
export type ImageId = string;

const ID_HASH_LENGTH = 16;

function digest(value: string): string {
  return crypto.createHash("sha256").update(value, "utf8").digest("hex").slice(0, ID_HASH_LENGTH);
}

/**
 * Canonical form of a notes-root-relative path: POSIX separators, no leading `./`
 */
export function canonicalizePath(relativePath: string): string {
  return relativePath.replace(/\\/g, "/").replace(/^(?:\.\/)+/, "");
}

/**
 * @example noteId("projects/alpha.md") // "note_…" (16 hex chars)
 */
export function noteId(canonicalPath: string): NoteId {
  return `note_${digest(canonicalizePath(canonicalPath))}`;
}

/**
 * Image identity is composite: the same physical file referenced from two notes
 * gets two ids, one per referencing note.
 */
export function imageId(sourceNoteId: NoteId, relativePath: string): ImageId {
  return `img_${digest(`${sourceNoteId}\u0000${relativePath}`)}`;
}
