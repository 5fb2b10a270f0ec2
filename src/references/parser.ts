/**
 * Reference parser
 *
 * Extracts wikilinks, image embeds and diagram embeds from raw note text through
 * one table-driven matching routine. Pure: no I/O, no normalization of targets.
 */

import type { NoteId } from "../identity/ids.js";
import { compilePatternTable, DEFAULT_REFERENCE_PATTERNS, type CompiledPattern } from "./patterns.js";
import { findCodeRanges, lineAt, lineStarts } from "./text.js";
import type { Reference, ReferencePatternDefinition } from "./types.js";

export interface ReferenceParserOptions {
  patterns?: ReferencePatternDefinition[];
  /** Skip references inside fenced code blocks and inline code. Default: true */
  skipCode?: boolean;
}

interface Candidate {
  pattern: CompiledPattern;
  match: RegExpExecArray;
  start: number;
  end: number;
}

function insideRanges(ranges: Array<[number, number]>, offset: number): boolean {
  return ranges.some(([start, end]) => offset >= start && offset < end);
}

function optionalGroup(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class ReferenceParser {
  private readonly patterns: CompiledPattern[];
  private readonly skipCode: boolean;

  /**
   * @throws ValidationError when a pattern definition is invalid
   */
  constructor(options: ReferenceParserOptions = {}) {
    this.patterns = compilePatternTable(options.patterns ?? DEFAULT_REFERENCE_PATTERNS);
    this.skipCode = options.skipCode ?? true;
  }

  /**
   * Parse all references in source order.
   *
   * Overlapping matches are resolved by start offset, then table order, then
   * length; a match overlapping an accepted one is dropped. Matches whose target
   * is empty or excluded consume their text but emit nothing.
   */
  parse(noteText: string, sourceNoteId: NoteId): Reference[] {
    const candidates: Candidate[] = [];

    for (const pattern of this.patterns) {
      // Fresh RegExp per call: a shared global regex would carry lastIndex across notes
      const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
      let match: RegExpExecArray | null;
      while ((match = regex.exec(noteText)) !== null) {
        if (match[0].length === 0) {
          regex.lastIndex++;
          continue;
        }
        candidates.push({
          pattern,
          match,
          start: match.index,
          end: match.index + match[0].length,
        });
      }
    }

    candidates.sort(
      (a, b) =>
        a.start - b.start ||
        a.pattern.priority - b.pattern.priority ||
        b.end - a.end
    );

    const codeRanges = this.skipCode ? findCodeRanges(noteText) : [];
    const starts = lineStarts(noteText);
    const references: Reference[] = [];
    let consumedUntil = 0;

    for (const candidate of candidates) {
      if (candidate.start < consumedUntil) continue;
      if (insideRanges(codeRanges, candidate.start)) continue;

      consumedUntil = candidate.end;

      const rawTarget = candidate.match.groups?.target;
      if (rawTarget === undefined || rawTarget.trim() === "") continue;
      if (candidate.pattern.exclude?.test(rawTarget)) continue;

      const reference: Reference = {
        kind: candidate.pattern.kind,
        rawTarget,
        sourceNoteId,
        position: {
          start: candidate.start,
          end: candidate.end,
          line: lineAt(starts, candidate.start),
        },
        raw: candidate.match[0],
      };

      const section = optionalGroup(candidate.match.groups?.section);
      if (section) reference.section = section;
      const alias = optionalGroup(candidate.match.groups?.alias);
      if (alias) reference.alias = alias;

      references.push(reference);
    }

    return references;
  }
}

/**
 * Parse with the default pattern table
 */
export function parseReferences(noteText: string, sourceNoteId: NoteId): Reference[] {
  return new ReferenceParser().parse(noteText, sourceNoteId);
}
