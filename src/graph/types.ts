/**
 * Note graph types
 * Forward references per note and their exact inverse per target
 */

import type { ImageId, NoteId } from "../identity/ids.js";
import type { Reference } from "../references/types.js";

export type ReferenceStatus = "resolved" | "ambiguous" | "broken";

/**
 * Concrete entity a resolved reference points at. Wikilinks bind to notes,
 * image and diagram embeds to images.
 */
export type ReferenceTarget =
  | { type: "note"; noteId: NoteId; path: string }
  | { type: "image"; imageId: ImageId; path: string };

/**
 * A reference after path resolution. Broken and ambiguous references are kept
 * with `target: null`.
 */
export interface ResolvedReference extends Reference {
  status: ReferenceStatus;
  target: ReferenceTarget | null;
  /** Every matching path, lexicographic; only filled when ambiguous */
  candidates: string[];
  /** Exact paths and search roots attempted */
  tried: string[];
  /** Text around the mention, for backlink display */
  context: string;
}

/**
 * Key of the inverse index: a note id, an image id, or `unresolved:<rawTarget>`
 */
export type TargetKey = string;

export const UNRESOLVED_PREFIX = "unresolved:";

/**
 * One inbound mention: `reference` is `outbound[sourceNoteId][index]`
 */
export interface InboundEntry {
  sourceNoteId: NoteId;
  index: number;
  reference: ResolvedReference;
}

/**
 * Minimal note shape the graph needs
 */
export interface GraphNote {
  noteId: NoteId;
  canonicalPath: string;
  /** POSIX folder of the note, `.` at the notes root */
  folderPath: string;
}

export interface Backlink {
  sourceNoteId: NoteId;
  /** Mentions in source order */
  references: ResolvedReference[];
}

export interface UnresolvedBucket {
  key: TargetKey;
  rawTarget: string;
  entries: InboundEntry[];
}

export interface Neighbour {
  type: "note" | "image";
  id: string;
  /** Resolved path, known for outbound edges */
  path?: string;
  /** Whether the edge was followed forwards or backwards */
  via: "outbound" | "inbound";
}

export interface InverseCheck {
  ok: boolean;
  /** Outbound edges without their inbound entry */
  missing: string[];
  /** Inbound entries without a matching outbound edge */
  extra: string[];
}

/**
 * JSON form stored in the vector database artifact. Inbound entries refer to
 * outbound references by index so each reference is stored once.
 */
export interface SerializedNoteGraph {
  outbound: Array<{ noteId: NoteId; references: ResolvedReference[] }>;
  inbound: Array<{ key: TargetKey; entries: Array<{ sourceNoteId: NoteId; index: number }> }>;
  clusters: Array<{ folderPath: string; noteIds: NoteId[] }>;
}
