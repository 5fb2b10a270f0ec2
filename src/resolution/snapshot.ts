/**
 * Immutable listing of every file under the notes root, taken once per run.
 * Resolution reads only this snapshot, so results never depend on directory
 * enumeration order or on files appearing mid-run.
 */

import path from "node:path";
import { glob } from "glob";
import { canonicalizePath } from "../identity/ids.js";

/** Folders never indexed in addition to dot-folders */
const IGNORED = ["**/node_modules/**"];

export class FileSnapshot {
  readonly files: readonly string[];
  private readonly fileSet: ReadonlySet<string>;
  private readonly byBasename: ReadonlyMap<string, readonly string[]>;

  private constructor(files: string[]) {
    const sorted = [...new Set(files.map(canonicalizePath))].sort();
    this.files = sorted;
    this.fileSet = new Set(sorted);

    const byBasename = new Map<string, string[]>();
    for (const file of sorted) {
      const base = path.posix.basename(file);
      const bucket = byBasename.get(base);
      if (bucket) {
        bucket.push(file);
      } else {
        byBasename.set(base, [file]);
      }
    }
    this.byBasename = byBasename;
  }

  /**
   * Snapshot from an explicit list of root-relative paths
   */
  static fromPaths(paths: string[]): FileSnapshot {
    return new FileSnapshot(paths);
  }

  /**
   * Snapshot of a directory; hidden files and folders are skipped
   */
  static async scan(root: string): Promise<FileSnapshot> {
    const files = await glob("**/*", {
      cwd: root,
      nodir: true,
      dot: false,
      posix: true,
      ignore: IGNORED,
    });
    return new FileSnapshot(files);
  }

  has(relativePath: string): boolean {
    return this.fileSet.has(relativePath);
  }

  /**
   * Files sharing a basename, lexicographic
   */
  withBasename(basename: string): readonly string[] {
    return this.byBasename.get(basename) ?? [];
  }

  /**
   * Markdown notes, excluding diagram companions (`*.excalidraw.md`)
   */
  notes(): string[] {
    return this.files.filter(
      (file) => file.endsWith(".md") && !file.endsWith(".excalidraw.md")
    );
  }

  get size(): number {
    return this.files.length;
  }
}
