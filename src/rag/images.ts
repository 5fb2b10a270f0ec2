/**
 * Image records for resolved image, diagram and attachment embeds
 */

import path from "node:path";
import type { ResolvedReference } from "../graph/types.js";
import type { ImageRecord } from "./types.js";

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".avif": "image/avif",
  ".excalidraw": "application/vnd.excalidraw+json",
  ".md": "text/markdown",
  ".pdf": "application/pdf",
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
};

export function mimeTypeFor(filePath: string): string {
  return MIME_TYPES[path.posix.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/**
 * Record for a resolved embed; null for wikilinks and unresolved references
 */
export function toImageRecord(reference: ResolvedReference, notesRoot: string): ImageRecord | null {
  const target = reference.target;
  if (reference.status !== "resolved" || !target || target.type !== "image") {
    return null;
  }

  const { imageId, path: canonicalPath } = target;
  return {
    imageId,
    noteId: reference.sourceNoteId,
    relativePath: reference.rawTarget,
    canonicalPath,
    absolutePath: path.join(notesRoot, canonicalPath),
    kind: reference.kind === "diagram-embed" ? "diagram" : "image",
    mimeType: mimeTypeFor(canonicalPath),
  };
}
