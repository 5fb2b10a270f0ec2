import { imageId, type ImageId, type NoteId } from "./ids.js";

export interface CompositeIndexStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

/**
 * `(noteId, relativePath) -> imageId` with a read-through cache scoped to one
 * ingestion run. Concurrent inserts of the same key are harmless: the computed
 * value is identical whichever caller lands first.
 */
export class CompositeIndex {
  private cache = new Map<string, ImageId>();
  private hits = 0;
  private misses = 0;

  private key(sourceNoteId: NoteId, relativePath: string): string {
    return `${sourceNoteId}\u0000${relativePath}`;
  }

  lookup(sourceNoteId: NoteId, relativePath: string): ImageId {
    const key = this.key(sourceNoteId, relativePath);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const id = imageId(sourceNoteId, relativePath);
    this.cache.set(key, id);
    return id;
  }

  has(sourceNoteId: NoteId, relativePath: string): boolean {
    return this.cache.has(this.key(sourceNoteId, relativePath));
  }

  get size(): number {
    return this.cache.size;
  }

  stats(): CompositeIndexStats {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
