/**
 * Graph builder
 * Binds parsed references to resolution results and assembles the note graph
 */

import type { CompositeIndex } from "../identity/compositeIndex.js";
import { noteId as toNoteId, type NoteId } from "../identity/ids.js";
import { extractContext } from "../references/text.js";
import type { Reference } from "../references/types.js";
import type { PathResolver } from "../resolution/pathResolver.js";
import { GraphDelta, mergeDeltas, type NoteGraph } from "./noteGraph.js";
import type { GraphNote, ReferenceTarget, ResolvedReference } from "./types.js";

export interface BindOptions {
  resolver: PathResolver;
  compositeIndex: CompositeIndex;
  /** Raw note content the reference positions point into */
  content: string;
  contextLength?: number;
}

/**
 * Resolve one reference. Never throws for a missing or ambiguous target: the
 * outcome is carried by `status`.
 */
export function resolveReference(reference: Reference, options: BindOptions): ResolvedReference {
  const resolution = options.resolver.resolve(reference.rawTarget, reference.sourceNoteId, reference.kind);
  const context = extractContext(options.content, reference.position, options.contextLength);

  if (!resolution.ok) {
    const { error } = resolution;
    return {
      ...reference,
      status: error.kind,
      target: null,
      candidates: error.kind === "ambiguous" ? error.candidates : [],
      tried: error.tried,
      context,
    };
  }

  const target: ReferenceTarget =
    reference.kind === "wikilink"
      ? { type: "note", noteId: toNoteId(resolution.path), path: resolution.path }
      : {
          type: "image",
          imageId: options.compositeIndex.lookup(reference.sourceNoteId, reference.rawTarget),
          path: resolution.path,
        };

  return {
    ...reference,
    status: "resolved",
    target,
    candidates: [],
    tried: resolution.tried,
    context,
  };
}

/**
 * Delta for a single note, references in parse order
 */
export function buildNoteDelta(noteId: NoteId, references: readonly ResolvedReference[]): GraphDelta {
  const delta = new GraphDelta();
  delta.registerNote(noteId);
  for (const reference of references) {
    delta.addEdge(reference);
  }
  return delta;
}

/**
 * Build the graph of a whole corpus. Notes without an entry in `references`
 * are still part of the graph.
 */
export function buildNoteGraph(
  notes: readonly GraphNote[],
  references: ReadonlyMap<NoteId, readonly ResolvedReference[]>
): NoteGraph {
  const deltas = notes.map((note) => buildNoteDelta(note.noteId, references.get(note.noteId) ?? []));
  return mergeDeltas(deltas, notes);
}
