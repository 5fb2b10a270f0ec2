/**
 * Document Chunker for the ingestion pipeline
 *
 * Features:
 * - Header preservation (a `##` section starts a new chunk)
 * - Overlap between chunks for context continuity
 * - Frontmatter skipped, offsets always point into the raw note content
 * - Breaks snapped to paragraph, sentence, then word boundaries
 */

import { findCodeRanges } from "../references/text.js";
import { parseNote } from "../utils/frontmatter.js";

/**
 * 청크 설정 옵션
 */
export interface ChunkConfig {
  /** Maximum chunk size in characters. Default: 1000 */
  maxChunkSize: number;
  /** Characters shared by consecutive chunks of a section. Default: 200 */
  overlapSize: number;
  /** Start a new chunk at every markdown header. Default: true */
  preserveHeaders: boolean;
}

export interface ChunkMetadata {
  /** Whether the chunk's section starts with a header */
  hasHeader: boolean;
  headerLevel?: number;
  headerText?: string;
  /** Position of the chunk inside its section */
  sectionChunkIndex: number;
}

/**
 * 문서 청크
 * Invariant: `content === raw.slice(startOffset, endOffset)`
 */
export interface Chunk {
  content: string;
  startOffset: number;
  endOffset: number;
  /** 0-based, in document order */
  index: number;
  metadata: ChunkMetadata;
}

interface HeaderInfo {
  level: number;
  text: string;
}

interface Section {
  header?: HeaderInfo;
  startOffset: number;
  endOffset: number;
}

/** 기본 청크 설정 */
export const DEFAULT_CHUNK_CONFIG: ChunkConfig = {
  maxChunkSize: 1000,
  overlapSize: 200,
  preserveHeaders: true,
};

const HEADER_REGEX = /^(#{1,6})[ \t]+(.+)$/gm;
const SENTENCE_END_REGEX = /[.!?。！？](?=\s)/g;

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

export class DocumentChunker {
  private config: ChunkConfig;

  constructor(config: Partial<ChunkConfig> = {}) {
    this.config = { ...DEFAULT_CHUNK_CONFIG, ...config };
  }

  /**
   * Split a note into chunks
   * @param content raw note content
   * @param bodyOffset where the body starts; computed from the frontmatter when omitted
   */
  chunk(content: string, bodyOffset?: number): Chunk[] {
    const start = bodyOffset ?? parseNote(content).bodyOffset;
    if (!content.slice(start).trim()) {
      return [];
    }

    const sections = this.config.preserveHeaders
      ? this.splitByHeaders(content, start)
      : [{ startOffset: start, endOffset: content.length }];

    const chunks: Chunk[] = [];
    for (const section of sections) {
      const spans = this.windows(content, section.startOffset, section.endOffset);
      spans.forEach(([spanStart, spanEnd], sectionChunkIndex) => {
        chunks.push({
          content: content.slice(spanStart, spanEnd),
          startOffset: spanStart,
          endOffset: spanEnd,
          index: chunks.length,
          metadata: {
            hasHeader: section.header !== undefined,
            headerLevel: section.header?.level,
            headerText: section.header?.text,
            sectionChunkIndex,
          },
        });
      });
    }

    return chunks;
  }

  /**
   * 헤더 기준으로 섹션 분할
   * Lines inside fenced code are not headers.
   */
  private splitByHeaders(content: string, start: number): Section[] {
    const codeRanges = findCodeRanges(content);
    const headers: Array<HeaderInfo & { offset: number }> = [];

    const regex = new RegExp(HEADER_REGEX.source, HEADER_REGEX.flags);
    regex.lastIndex = start;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(content)) !== null) {
      const offset = match.index;
      if (codeRanges.some(([codeStart, codeEnd]) => offset >= codeStart && offset < codeEnd)) {
        continue;
      }
      headers.push({ level: match[1].length, text: match[2].trim(), offset });
    }

    if (headers.length === 0) {
      return [{ startOffset: start, endOffset: content.length }];
    }

    const sections: Section[] = [];
    if (headers[0].offset > start) {
      sections.push({ startOffset: start, endOffset: headers[0].offset });
    }

    headers.forEach((header, i) => {
      sections.push({
        header: { level: header.level, text: header.text },
        startOffset: header.offset,
        endOffset: headers[i + 1]?.offset ?? content.length,
      });
    });

    return sections;
  }

  /**
   * Overlapping [start, end) spans covering a section, whitespace-trimmed
   */
  private windows(content: string, sectionStart: number, sectionEnd: number): Array<[number, number]> {
    const { maxChunkSize, overlapSize } = this.config;
    const spans: Array<[number, number]> = [];
    let position = sectionStart;

    while (position < sectionEnd) {
      while (position < sectionEnd && isWhitespace(content[position])) {
        position++;
      }
      if (position >= sectionEnd) break;

      const limit = Math.min(position + maxChunkSize, sectionEnd);
      const cut = limit === sectionEnd ? sectionEnd : this.findBreak(content, position, limit);

      let end = cut;
      while (end > position && isWhitespace(content[end - 1])) {
        end--;
      }
      if (end > position) {
        spans.push([position, end]);
      }

      if (cut >= sectionEnd) break;
      position = Math.max(this.overlapStart(content, cut, overlapSize), position + 1);
    }

    return spans;
  }

  /**
   * Last paragraph break, else sentence end, else whitespace in the back half
   * of the window; the hard limit when there is none
   */
  private findBreak(content: string, position: number, limit: number): number {
    const minCut = position + Math.floor(this.config.maxChunkSize / 2);

    const paragraph = content.lastIndexOf("\n\n", limit - 2);
    if (paragraph >= minCut) {
      return paragraph;
    }

    const region = content.slice(minCut, limit);
    let sentenceEnd = -1;
    for (const match of region.matchAll(SENTENCE_END_REGEX)) {
      sentenceEnd = minCut + (match.index ?? 0) + 1;
    }
    if (sentenceEnd > minCut) {
      return sentenceEnd;
    }

    for (let i = limit - 1; i > minCut; i--) {
      if (isWhitespace(content[i])) {
        return i;
      }
    }

    return limit;
  }

  /**
   * Start of the next window: `overlapSize` before the cut, moved to the next
   * word start so a chunk never begins mid-word
   */
  private overlapStart(content: string, cut: number, overlapSize: number): number {
    if (overlapSize <= 0) {
      return cut;
    }
    const start = Math.max(cut - overlapSize, 0);
    if (start === 0 || isWhitespace(content[start - 1])) {
      return start;
    }
    for (let i = start; i < cut; i++) {
      if (isWhitespace(content[i])) {
        return i + 1;
      }
    }
    return start;
  }
}
