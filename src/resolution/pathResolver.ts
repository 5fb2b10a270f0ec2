/**
 * Path resolver
 *
 * Maps a raw reference target to a canonical notes-root-relative path.
 *
 * Order:
 * 1. exact root-relative path, then exact path relative to the source note
 * 2. search of the attachment roots (whole vault for wikilinks) by name or suffix,
 *    one file-name variant at a time
 * 3. several distinct matches -> ambiguous, with every candidate
 * 4. no match -> broken
 */

import path from "node:path";
import type { NoteId } from "../identity/ids.js";
import type { ReferenceKind } from "../references/types.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import type { FileSnapshot } from "./snapshot.js";
import type { AttachmentSearchRoots, Resolution } from "./types.js";

const posix = path.posix;

export interface PathResolverOptions {
  snapshot: FileSnapshot;
  attachmentSearchRoots: AttachmentSearchRoots;
  /** Canonical path of every note that can be a reference source */
  notePaths: ReadonlyMap<NoteId, string>;
}

export interface NormalizedTarget {
  target: string;
  /** Written with a leading `/`: never relative to the source note */
  rootAnchored: boolean;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes such as a literal "100%" stay as written
    return value;
  }
}

/**
 * Clean a raw target for lookup: trim, drop a markdown image title and angle
 * brackets, URL-decode, use `/` separators, strip leading `/` and `./`.
 */
export function normalizeTarget(rawTarget: string): NormalizedTarget {
  let target = rawTarget.trim();

  const titled = /^(.*?)\s+(?:"[^"]*"|'[^']*')$/.exec(target);
  if (titled) {
    target = titled[1];
  }
  if (target.startsWith("<") && target.endsWith(">")) {
    target = target.slice(1, -1);
  }

  target = safeDecode(target).replace(/\\/g, "/");
  const rootAnchored = target.startsWith("/");
  target = target.replace(/^\/+/, "").replace(/^(?:\.\/)+/, "");

  return { target, rootAnchored };
}

export function isNotePath(file: string): boolean {
  return file.endsWith(".md") && !file.endsWith(".excalidraw.md");
}

function escapesRoot(relativePath: string): boolean {
  return relativePath === ".." || relativePath.startsWith("../");
}

/**
 * File names a target may be stored under, per kind, most preferred first.
 * A diagram may exist only as its markdown companion or its PNG export.
 */
function variantsFor(kind: ReferenceKind, target: string): string[] {
  switch (kind) {
    case "wikilink":
      return target.endsWith(".md") ? [target] : [`${target}.md`];
    case "diagram-embed":
      return target.endsWith(".md") ? [target] : [target, `${target}.md`, `${target}.png`];
    case "image-embed":
      return [target];
  }
}

function acceptsFile(kind: ReferenceKind, file: string): boolean {
  return kind === "wikilink" ? isNotePath(file) : true;
}

export class PathResolver {
  private readonly snapshot: FileSnapshot;
  private readonly attachmentSearchRoots: AttachmentSearchRoots;
  private readonly notePaths: ReadonlyMap<NoteId, string>;

  constructor(options: PathResolverOptions) {
    this.snapshot = options.snapshot;
    this.attachmentSearchRoots = options.attachmentSearchRoots;
    this.notePaths = options.notePaths;
  }

  /**
   * Resolve one target as seen from the note `sourceNoteId`
   *
   * @throws ValidationError when `sourceNoteId` is not a known note
   */
  resolve(rawTarget: string, sourceNoteId: NoteId, kind: ReferenceKind): Resolution {
    const sourcePath = this.notePaths.get(sourceNoteId);
    if (sourcePath === undefined) {
      throw new ValidationError(
        ErrorCode.VALIDATION_INVALID_FORMAT,
        `Unknown source note ${sourceNoteId}`,
        { field: "sourceNoteId", value: sourceNoteId }
      );
    }

    const { target, rootAnchored } = normalizeTarget(rawTarget);
    const variants = variantsFor(kind, target).map((variant) => posix.normalize(variant));
    const tried: string[] = [];

    // 1. Exact matches
    for (const variant of variants) {
      if (escapesRoot(variant)) continue;
      tried.push(`exact:${variant}`);
      if (this.snapshot.has(variant) && acceptsFile(kind, variant)) {
        return { ok: true, path: variant, via: "exact", tried };
      }
    }

    const noteDir = this.noteDir(sourcePath);
    if (noteDir !== "" && !rootAnchored) {
      for (const variant of variants) {
        const candidate = posix.normalize(posix.join(noteDir, variant));
        if (escapesRoot(candidate)) continue;
        tried.push(`note-relative:${candidate}`);
        if (this.snapshot.has(candidate) && acceptsFile(kind, candidate)) {
          return { ok: true, path: candidate, via: "note-relative", tried };
        }
      }
    }

    // 2. Search by name or path suffix
    const roots = kind === "wikilink" ? [""] : this.expandRoots(sourcePath);
    for (const root of roots) {
      tried.push(`search:${root || "."}`);
    }

    // The first variant with any match decides; its matches across all roots
    // are the candidates
    let sorted: string[] = [];
    for (const variant of variants) {
      const suffix = variant.replace(/^(?:\.\.\/)+/, "");
      if (suffix === "" || suffix === "." || suffix.endsWith("/")) continue;

      const candidates = new Set<string>();
      for (const file of this.snapshot.withBasename(posix.basename(suffix))) {
        if (!acceptsFile(kind, file)) continue;
        if (roots.some((root) => this.matchesInRoot(file, root, suffix))) {
          candidates.add(file);
        }
      }
      if (candidates.size > 0) {
        sorted = [...candidates].sort();
        break;
      }
    }

    // 3. / 4.
    if (sorted.length === 1) {
      return { ok: true, path: sorted[0], via: "search", tried };
    }
    if (sorted.length > 1) {
      return { ok: false, error: { kind: "ambiguous", target, candidates: sorted, tried } };
    }
    return { ok: false, error: { kind: "broken", target, tried } };
  }

  /**
   * Attachment roots for one source note, templates expanded, duplicates and
   * roots outside the vault dropped
   */
  expandRoots(sourcePath: string): string[] {
    const noteDir = this.noteDir(sourcePath);
    const noteStem = posix.basename(sourcePath, ".md");
    const roots: string[] = [];

    for (const template of this.attachmentSearchRoots) {
      const expanded = template
        .replace(/\{noteDir\}/g, noteDir)
        .replace(/\{noteStem\}/g, noteStem)
        .replace(/\\/g, "/");
      let root = posix.normalize(expanded === "" ? "." : expanded)
        .replace(/^\/+/, "")
        .replace(/\/+$/, "");
      if (root === ".") root = "";
      if (escapesRoot(root)) continue;
      if (!roots.includes(root)) roots.push(root);
    }

    return roots;
  }

  private noteDir(sourcePath: string): string {
    const dir = posix.dirname(sourcePath);
    return dir === "." ? "" : dir;
  }

  private matchesInRoot(file: string, root: string, suffix: string): boolean {
    let inside: string;
    if (root === "") {
      inside = file;
    } else if (file.startsWith(`${root}/`)) {
      inside = file.slice(root.length + 1);
    } else {
      return false;
    }
    return inside === suffix || inside.endsWith(`/${suffix}`);
  }
}
