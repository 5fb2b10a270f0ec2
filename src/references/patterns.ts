/**
 * Reference pattern table
 *
 * Every reference kind is recognised through entries of this table; the parser
 * has no per-kind logic. Order matters: at equal start offsets the earlier entry
 * wins, so diagram embeds are listed before image embeds, image embeds before
 * other attachment embeds, and all of them before wikilinks (which also accept
 * `![[note]]` transclusions).
 */

import { ErrorCode, toErrorCause, ValidationError } from "../utils/errors.js";
import type { ReferenceKind, ReferencePatternDefinition } from "./types.js";

/** URLs, protocol-relative links and data URIs are never local files */
const EXTERNAL_TARGET = String.raw`^\s*(?:[a-zA-Z][a-zA-Z0-9+.-]*:|//)`;

const IMAGE_EXTENSIONS = "png|jpe?g|gif|svg|webp|bmp|tiff?|avif";

/** Alias separator; inside markdown tables it is written escaped as `\|` */
const ALIAS = String.raw`(?:\\?\|(?<alias>[^\]\n]*))?`;

/** Section text, stopping before an escaped alias separator */
const SECTION = String.raw`(?:#(?<section>(?:[^\]|\n\\]|\\(?!\|))*))?`;

export const DEFAULT_REFERENCE_PATTERNS: ReferencePatternDefinition[] = [
  {
    kind: "diagram-embed",
    description: "Excalidraw embed: ![[drawing.excalidraw]] or ![[drawing.excalidraw.md]]",
    pattern: String.raw`!\[\[(?<target>[^\]|#\n]+?\.excalidraw(?:\.md)?)${SECTION}${ALIAS}\]\]`,
  },
  {
    kind: "image-embed",
    description: "Wiki-style image embed: ![[photo.png]] or ![[photo.png|300]]",
    pattern: String.raw`!\[\[(?<target>[^\]|#\n]+?\.(?:${IMAGE_EXTENSIONS}))${ALIAS}\]\]`,
    flags: "i",
  },
  {
    kind: "image-embed",
    description: "Markdown image: ![alt](path/with spaces/Image (2).png)",
    pattern: String.raw`!\[(?<alias>[^\]\n]*)\]\((?<target>[^()\n]*(?:\([^()\n]*\)[^()\n]*)*)\)`,
    exclude: EXTERNAL_TARGET,
  },
  {
    kind: "image-embed",
    description: "HTML image: <img src=\"path\">",
    pattern: String.raw`<img\s[^>]*?src\s*=\s*["'](?<target>[^"'\n]+)["'][^>]*>`,
    flags: "i",
    exclude: EXTERNAL_TARGET,
  },
  {
    kind: "image-embed",
    description: "Any other attachment embed: ![[report.pdf]], ![[clip.mp4|Clip]]",
    pattern: String.raw`!\[\[(?<target>[^\]|#\n\\]+\.(?!md(?:[|#\]\\]|$))[A-Za-z][A-Za-z0-9]{0,9})${ALIAS}\]\]`,
    flags: "i",
    exclude: EXTERNAL_TARGET,
  },
  {
    kind: "wikilink",
    description: "Wikilink or note transclusion: [[Note#Section|Alias]], ![[Note]]",
    pattern: String.raw`!?\[\[(?<target>(?:[^\]|#\n\\]|\\(?!\|))+)${SECTION}${ALIAS}\]\]`,
  },
];

export interface CompiledPattern {
  kind: ReferenceKind;
  /** Table position, lower wins on ties */
  priority: number;
  regex: RegExp;
  exclude?: RegExp;
}

function compileExpression(source: string, flags: string, index: number, field: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new ValidationError(
      ErrorCode.VALIDATION_INVALID_PATTERN,
      `Reference pattern #${index} has an invalid ${field}: ${source}`,
      { cause: toErrorCause(err), field: `referencePatterns[${index}].${field}`, value: source }
    );
  }
}

/**
 * Compile and validate a pattern table
 *
 * @throws ValidationError when an entry does not compile or lacks a `target` group
 */
export function compilePatternTable(definitions: ReferencePatternDefinition[]): CompiledPattern[] {
  return definitions.map((definition, index) => {
    if (!definition.pattern.includes("(?<target>")) {
      throw new ValidationError(
        ErrorCode.VALIDATION_INVALID_PATTERN,
        `Reference pattern #${index} (${definition.kind}) has no named "target" group`,
        { field: `referencePatterns[${index}].pattern`, value: definition.pattern }
      );
    }

    const extraFlags = (definition.flags ?? "").replace(/g/g, "");
    const regex = compileExpression(definition.pattern, `g${extraFlags}`, index, "pattern");
    const exclude = definition.exclude !== undefined
      ? compileExpression(definition.exclude, "", index, "exclude")
      : undefined;

    return { kind: definition.kind, priority: index, regex, exclude };
  });
}
