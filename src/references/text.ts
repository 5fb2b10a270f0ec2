/**
 * Text helpers shared by the parser, the graph and title lookup
 */

import type { ReferencePosition } from "./types.js";

/**
 * Surrounding text of a reference, newlines collapsed, ellipsis on cut ends
 *
 * @param contextLength characters kept on each side
 */
export function extractContext(
  content: string,
  position: Pick<ReferencePosition, "start" | "end">,
  contextLength: number = 60
): string {
  const start = Math.max(0, position.start - contextLength);
  const end = Math.min(content.length, position.end + contextLength);

  let context = content.slice(start, end);

  if (start > 0) {
    context = "..." + context.trimStart();
  }

  if (end < content.length) {
    context = context.trimEnd() + "...";
  }

  return context.replace(/\s*\n+\s*/g, " ").trim();
}

/**
 * Normalize a note title or file name for loose comparison
 *
 * @example normalizeNoteTitle("My_Important-Note.md") // "my important note"
 */
export function normalizeNoteTitle(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .replace(/\.md$/i, "")
    .replace(/[-_]/g, " ")
    .replace(/\s+/g, " ");
}

/**
 * Offsets of every line start, for offset -> line lookups
 */
export function lineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * 0-based line containing `offset`
 */
export function lineAt(starts: number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (starts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

const CODE_REGEX = /```[\s\S]*?```|~~~[\s\S]*?~~~|`[^`\n]+`/g;

/**
 * [start, end) ranges of fenced code blocks and inline code spans
 */
export function findCodeRanges(content: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const match of content.matchAll(CODE_REGEX)) {
    const start = match.index ?? 0;
    ranges.push([start, start + match[0].length]);
  }
  return ranges;
}
