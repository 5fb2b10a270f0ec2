/**
 * Path resolution result types
 *
 * Resolution never falls back silently: a caller gets either one canonical path
 * or an error carrying what was tried and, for ambiguity, every candidate.
 */

export type ResolutionVia = "exact" | "note-relative" | "search";

export interface AmbiguousResolution {
  kind: "ambiguous";
  /** Normalized target that was looked up */
  target: string;
  /** Every matching file, lexicographic */
  candidates: string[];
  tried: string[];
}

export interface BrokenResolution {
  kind: "broken";
  target: string;
  tried: string[];
}

export type ResolutionError = AmbiguousResolution | BrokenResolution;

export type Resolution =
  | { ok: true; path: string; via: ResolutionVia; tried: string[] }
  | { ok: false; error: ResolutionError };

/**
 * Templates expanded per source note. `{noteDir}` is the note's folder (empty at
 * the root), `{noteStem}` its file name without `.md`.
 *
 * @example ["{noteDir}", "{noteDir}/{noteStem}.assets", "attachments"]
 */
export type AttachmentSearchRoots = string[];
