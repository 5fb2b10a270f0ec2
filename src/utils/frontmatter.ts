import path from "node:path";
import matter from "gray-matter";

/**
 * Parsed note structure
 */
export interface ParsedNote {
  title?: string;
  tags: string[];
  /** Body without frontmatter, untrimmed */
  body: string;
  /** Offset of `body` in the raw content */
  bodyOffset: number;
  /** Raw frontmatter data */
  rawFrontmatter: Record<string, unknown>;
  /** False when a frontmatter block exists but is not valid YAML */
  frontmatterValid: boolean;
}

function normalizeTags(value: unknown): string[] {
  const raw: unknown[] = Array.isArray(value)
    ? value
    : typeof value === "string"
      ? value.split(/[,\s]+/)
      : [];

  const tags: string[] = [];
  for (const tag of raw) {
    if (typeof tag !== "string" && typeof tag !== "number") continue;
    const cleaned = String(tag).trim().replace(/^#/, "");
    if (cleaned && !tags.includes(cleaned)) {
      tags.push(cleaned);
    }
  }
  return tags;
}

/**
 * Parse a markdown note with frontmatter
 */
export function parseNote(content: string): ParsedNote {
  if (!hasFrontmatter(content)) {
    return { tags: [], body: content, bodyOffset: 0, rawFrontmatter: {}, frontmatterValid: true };
  }

  let data: Record<string, unknown>;
  let body: string;
  try {
    // Options object turns off gray-matter's content-keyed cache
    const parsed = matter(content, {});
    data = parsed.data;
    body = parsed.content;
  } catch {
    return { tags: [], body: content, bodyOffset: 0, rawFrontmatter: {}, frontmatterValid: false };
  }

  const bodyOffset = content.endsWith(body) ? content.length - body.length : 0;
  const title = typeof data.title === "string" && data.title.trim() ? data.title.trim() : undefined;

  return {
    title,
    tags: normalizeTags(data.tags),
    body: content.slice(bodyOffset),
    bodyOffset,
    rawFrontmatter: data,
    frontmatterValid: true,
  };
}

/**
 * Title of a note: frontmatter `title`, else the first `# ` heading, else the file stem
 */
export function resolveNoteTitle(parsed: ParsedNote, canonicalPath: string): string {
  if (parsed.title) {
    return parsed.title;
  }

  const heading = /^#[ \t]+(.+?)[ \t]*#*[ \t]*$/m.exec(parsed.body);
  if (heading && heading[1].trim()) {
    return heading[1].trim();
  }

  return path.posix.basename(canonicalPath, ".md");
}

/**
 * Check if content has valid frontmatter
 */
export function hasFrontmatter(content: string): boolean {
  return /^---\r?\n/.test(content);
}
