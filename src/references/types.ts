/**
 * Reference types
 * Mentions of other notes, images and diagrams found in raw note text
 */

import type { NoteId } from "../identity/ids.js";

export type ReferenceKind = "wikilink" | "image-embed" | "diagram-embed";

export const REFERENCE_KINDS: readonly ReferenceKind[] = [
  "wikilink",
  "image-embed",
  "diagram-embed",
];

export interface ReferencePosition {
  /** Char offset of the first matched character in the raw note content */
  start: number;
  /** Char offset just past the match */
  end: number;
  /** 0-based line of `start` */
  line: number;
}

/**
 * A parsed mention inside a note. Produced by the parser, never mutated downstream.
 */
export interface Reference {
  kind: ReferenceKind;
  /** Target text exactly as written, no normalization */
  rawTarget: string;
  sourceNoteId: NoteId;
  position: ReferencePosition;
  /** The whole matched syntax, e.g. `[[Note#Intro|see intro]]` */
  raw: string;
  section?: string;
  alias?: string;
}

/**
 * One entry of the reference pattern table.
 *
 * `pattern` is a regular expression source that must contain a named `target`
 * group; `section` and `alias` groups are picked up when present. Entries earlier
 * in the table win when two matches start at the same offset.
 */
export interface ReferencePatternDefinition {
  kind: ReferenceKind;
  pattern: string;
  /** Extra RegExp flags besides `g` (e.g. `i`) */
  flags?: string;
  /** Targets matching this expression are consumed but never emitted */
  exclude?: string;
  description?: string;
}
