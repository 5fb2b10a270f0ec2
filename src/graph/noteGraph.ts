/**
 * Note graph
 *
 * Each worker fills a GraphDelta for its own note; one mergeDeltas call reduces
 * all deltas into the final, read-only NoteGraph. addEdge writes the forward edge
 * and its inverse entry together, so every reference kind and every status gets
 * an inbound entry.
 */

import type { NoteId } from "../identity/ids.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import {
  UNRESOLVED_PREFIX,
  type Backlink,
  type GraphNote,
  type InboundEntry,
  type InverseCheck,
  type Neighbour,
  type ResolvedReference,
  type SerializedNoteGraph,
  type TargetKey,
  type UnresolvedBucket,
} from "./types.js";

export function unresolvedKey(rawTarget: string): TargetKey {
  return `${UNRESOLVED_PREFIX}${rawTarget}`;
}

export function targetKeyOf(reference: ResolvedReference): TargetKey {
  if (reference.status === "resolved" && reference.target) {
    return reference.target.type === "note" ? reference.target.noteId : reference.target.imageId;
  }
  return unresolvedKey(reference.rawTarget);
}

function bucket<K, V>(map: Map<K, V[]>, key: K): V[] {
  let values = map.get(key);
  if (!values) {
    values = [];
    map.set(key, values);
  }
  return values;
}

/**
 * Edges produced by one worker
 */
export class GraphDelta {
  readonly outbound = new Map<NoteId, ResolvedReference[]>();
  readonly inbound = new Map<TargetKey, InboundEntry[]>();

  /**
   * Make a note part of the graph even when it has no references
   */
  registerNote(noteId: NoteId): void {
    bucket(this.outbound, noteId);
  }

  addEdge(reference: ResolvedReference): void {
    const references = bucket(this.outbound, reference.sourceNoteId);
    const index = references.length;
    references.push(reference);
    bucket(this.inbound, targetKeyOf(reference)).push({
      sourceNoteId: reference.sourceNoteId,
      index,
      reference,
    });
  }
}

/**
 * Reduce deltas, in order, into one graph. A source note appearing in several
 * deltas keeps all its edges, later ones after earlier ones.
 */
export function mergeDeltas(deltas: readonly GraphDelta[], notes: readonly GraphNote[]): NoteGraph {
  const outbound = new Map<NoteId, ResolvedReference[]>();
  const inbound = new Map<TargetKey, InboundEntry[]>();

  for (const delta of deltas) {
    const offsets = new Map<NoteId, number>();
    for (const [noteId, references] of delta.outbound) {
      const merged = bucket(outbound, noteId);
      offsets.set(noteId, merged.length);
      merged.push(...references);
    }

    for (const [key, entries] of delta.inbound) {
      const merged = bucket(inbound, key);
      for (const entry of entries) {
        merged.push({ ...entry, index: entry.index + (offsets.get(entry.sourceNoteId) ?? 0) });
      }
    }
  }

  const clusters = new Map<string, NoteId[]>();
  for (const note of notes) {
    bucket(clusters, note.folderPath).push(note.noteId);
  }

  return new NoteGraph(outbound, inbound, clusters);
}

export class NoteGraph {
  constructor(
    private readonly outbound: ReadonlyMap<NoteId, ResolvedReference[]>,
    private readonly inbound: ReadonlyMap<TargetKey, InboundEntry[]>,
    private readonly folderClusters: ReadonlyMap<string, NoteId[]>
  ) {}

  /**
   * Note ids in graph order
   */
  notes(): NoteId[] {
    return [...this.outbound.keys()];
  }

  hasNote(noteId: NoteId): boolean {
    return this.outbound.has(noteId);
  }

  /**
   * References written in a note, in parse order, duplicates kept
   */
  outboundOf(noteId: NoteId): readonly ResolvedReference[] {
    return this.outbound.get(noteId) ?? [];
  }

  inboundOf(key: TargetKey): readonly InboundEntry[] {
    return this.inbound.get(key) ?? [];
  }

  /**
   * Notes mentioning a target, one entry per source note in first-mention order
   */
  backlinks(key: TargetKey): Backlink[] {
    const bySource = new Map<NoteId, ResolvedReference[]>();
    for (const entry of this.inboundOf(key)) {
      bucket(bySource, entry.sourceNoteId).push(entry.reference);
    }
    return [...bySource].map(([sourceNoteId, references]) => ({ sourceNoteId, references }));
  }

  /**
   * Broken and ambiguous references grouped by raw target, sorted by key
   */
  unresolved(): UnresolvedBucket[] {
    const buckets: UnresolvedBucket[] = [];
    for (const [key, entries] of this.inbound) {
      if (key.startsWith(UNRESOLVED_PREFIX)) {
        buckets.push({ key, rawTarget: key.slice(UNRESOLVED_PREFIX.length), entries });
      }
    }
    return buckets.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  /**
   * Distinct entities one edge away: resolved outbound targets first, then notes
   * linking here. Unresolved buckets are not neighbours.
   */
  neighbours(noteId: NoteId): Neighbour[] {
    const seen = new Set<string>();
    const result: Neighbour[] = [];

    const add = (neighbour: Neighbour): void => {
      const key = `${neighbour.type}:${neighbour.id}`;
      if (neighbour.id === noteId || seen.has(key)) return;
      seen.add(key);
      result.push(neighbour);
    };

    for (const reference of this.outboundOf(noteId)) {
      if (reference.status !== "resolved" || !reference.target) continue;
      if (reference.target.type === "note") {
        add({ type: "note", id: reference.target.noteId, path: reference.target.path, via: "outbound" });
      } else {
        add({ type: "image", id: reference.target.imageId, path: reference.target.path, via: "outbound" });
      }
    }

    for (const entry of this.inboundOf(noteId)) {
      add({ type: "note", id: entry.sourceNoteId, via: "inbound" });
    }

    return result;
  }

  /**
   * Check that the inverse index is exactly the transpose of the forward one
   */
  verifyInverse(): InverseCheck {
    const missing: string[] = [];
    const extra: string[] = [];

    for (const [noteId, references] of this.outbound) {
      references.forEach((reference, index) => {
        const key = targetKeyOf(reference);
        const found = this.inboundOf(key).some(
          (entry) => entry.sourceNoteId === noteId && entry.index === index && entry.reference === reference
        );
        if (!found) {
          missing.push(`${noteId}#${index} -> ${key}`);
        }
      });
    }

    for (const [key, entries] of this.inbound) {
      for (const entry of entries) {
        const reference = this.outboundOf(entry.sourceNoteId)[entry.index];
        if (!reference || reference !== entry.reference || targetKeyOf(reference) !== key) {
          extra.push(`${key} <- ${entry.sourceNoteId}#${entry.index}`);
        }
      }
    }

    return { ok: missing.length === 0 && extra.length === 0, missing, extra };
  }

  /**
   * Number of outbound edges, duplicates included
   */
  get edgeCount(): number {
    let count = 0;
    for (const references of this.outbound.values()) {
      count += references.length;
    }
    return count;
  }

  clusters(): ReadonlyMap<string, NoteId[]> {
    return this.folderClusters;
  }

  toJSON(): SerializedNoteGraph {
    return {
      outbound: [...this.outbound].map(([noteId, references]) => ({ noteId, references })),
      inbound: [...this.inbound].map(([key, entries]) => ({
        key,
        entries: entries.map(({ sourceNoteId, index }) => ({ sourceNoteId, index })),
      })),
      clusters: [...this.folderClusters].map(([folderPath, noteIds]) => ({ folderPath, noteIds })),
    };
  }

  /**
   * @throws ValidationError when an inbound entry points at no outbound reference
   */
  static fromJSON(data: SerializedNoteGraph): NoteGraph {
    const outbound = new Map<NoteId, ResolvedReference[]>();
    for (const { noteId, references } of data.outbound) {
      outbound.set(noteId, references);
    }

    const inbound = new Map<TargetKey, InboundEntry[]>();
    for (const { key, entries } of data.inbound) {
      inbound.set(
        key,
        entries.map(({ sourceNoteId, index }) => {
          const reference = outbound.get(sourceNoteId)?.[index];
          if (!reference) {
            throw new ValidationError(
              ErrorCode.VALIDATION_INVALID_FORMAT,
              `Inbound entry ${key} <- ${sourceNoteId}#${index} has no outbound reference`,
              { field: "graph.inbound", value: key }
            );
          }
          return { sourceNoteId, index, reference };
        })
      );
    }

    const clusters = new Map<string, NoteId[]>();
    for (const { folderPath, noteIds } of data.clusters) {
      clusters.set(folderPath, noteIds);
    }

    return new NoteGraph(outbound, inbound, clusters);
  }
}
