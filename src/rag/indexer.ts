/**
 * Ingestion pipeline
 *
 * snapshot -> per-note parse + resolve (bounded concurrency, one graph delta
 * per note) -> single merge -> chunking -> batched embedding -> atomic write
 * of the vector database artifact.
 *
 * Broken and ambiguous references never abort a run; a note that cannot be
 * read or chunked is skipped and reported. Only the artifact write is fatal,
 * unless `ingestion.failFast` is set.
 */

import fs from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import { buildNoteDelta, resolveReference } from "../graph/builder.js";
import { mergeDeltas, type GraphDelta } from "../graph/noteGraph.js";
import type { GraphNote, ResolvedReference } from "../graph/types.js";
import { CompositeIndex } from "../identity/compositeIndex.js";
import { noteId as toNoteId, type NoteId } from "../identity/ids.js";
import { ReferenceParser } from "../references/parser.js";
import { normalizeNoteTitle } from "../references/text.js";
import { PathResolver } from "../resolution/pathResolver.js";
import { FileSnapshot } from "../resolution/snapshot.js";
import { expandPath, parseConfig, resolveOutputPath, type VaultweaveConfig, type VaultweaveConfigInput } from "../utils/config.js";
import { ConfigError, ErrorCode, toErrorCause, VaultweaveError } from "../utils/errors.js";
import { readTextFile } from "../utils/files.js";
import { parseNote, resolveNoteTitle } from "../utils/frontmatter.js";
import { getLogger } from "../utils/logger.js";
import { DocumentChunker, type Chunk } from "./chunker.js";
import type { EmbeddingProvider } from "./embeddings/provider.js";
import { EmbeddingQueue, type EmbeddingJob } from "./embeddings/queue.js";
import { toImageRecord } from "./images.js";
import { SummaryCollector, type IngestionSummary } from "./summary.js";
import type { EmbeddingRecord, ImageRecord, NoteRecord } from "./types.js";
import { VectorDatabase } from "./vectorStore.js";

const MAX_TITLE_CONTEXT_LENGTH = 80;
const MAX_HEADER_CONTEXT_LENGTH = 80;

/**
 * Progress information during ingestion
 */
export interface IngestionProgress {
  total: number;
  processed: number;
  currentFile: string;
  status: "scanning" | "resolving" | "embedding" | "storing" | "complete" | "error";
}

export interface IngestOptions {
  notesRoot: string;
  embeddingProvider: EmbeddingProvider;
  /** Defaults to `<notesRoot>/.vaultweave/vector-db.json` or `config.outputPath` */
  outputPath?: string;
  config?: VaultweaveConfigInput;
  onProgress?: (progress: IngestionProgress) => void;
  /** Delay function for embedding retries */
  sleep?: (ms: number) => Promise<void>;
}

export interface IngestionResult {
  database: VectorDatabase;
  summary: IngestionSummary;
}

interface LoadedNote {
  note: NoteRecord;
  references: ResolvedReference[];
  delta: GraphDelta;
  images: ImageRecord[];
  chunks: Chunk[];
}

type NoteOutcome = { ok: true; loaded: LoadedNote } | { ok: false; path: string; error: unknown };

function truncateContextText(value: string, maxLength: number): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/**
 * Text sent to the embedding provider: the note title, the section header when
 * the chunk itself does not start with it, then the chunk
 */
export function buildEmbeddingText(chunk: Chunk, title: string): string {
  const parts = [truncateContextText(title, MAX_TITLE_CONTEXT_LENGTH)];

  const headerText = chunk.metadata.headerText;
  if (
    headerText &&
    !chunk.content.startsWith("#") &&
    normalizeNoteTitle(headerText) !== normalizeNoteTitle(title)
  ) {
    parts.push(truncateContextText(headerText, MAX_HEADER_CONTEXT_LENGTH));
  }

  parts.push(chunk.content);
  return parts.join("\n\n");
}

export function recordId(noteId: NoteId, chunkIndex: number): string {
  return `${noteId}:${chunkIndex}`;
}

async function assertNotesRoot(notesRoot: string): Promise<void> {
  const stat = await fs.stat(notesRoot).catch((err: unknown) => {
    throw new ConfigError(ErrorCode.CONFIG_NOTES_DIR_NOT_FOUND, `Notes root not found: ${notesRoot}`, {
      cause: toErrorCause(err),
      configKey: "notesDir",
    });
  });
  if (!stat.isDirectory()) {
    throw new ConfigError(ErrorCode.CONFIG_NOTES_DIR_NOT_FOUND, `Notes root is not a directory: ${notesRoot}`, {
      configKey: "notesDir",
    });
  }
}

/**
 * Ingest a notes folder into a vector database and write it to disk
 *
 * @throws ConfigError when the configuration is invalid or the notes root is missing
 * @throws ArtifactError when the artifact cannot be written
 * @throws VaultweaveError INGESTION_ABORTED when `failFast` stops the run
 */
export async function ingest(options: IngestOptions): Promise<IngestionResult> {
  const logger = getLogger().child("ingest");
  const config: VaultweaveConfig = parseConfig({ ...options.config, notesDir: options.notesRoot });
  const notesRoot = expandPath(options.notesRoot);
  const outputPath = options.outputPath ? expandPath(options.outputPath) : resolveOutputPath(config);
  const onProgress = options.onProgress;

  try {
    return await runIngestion({ ...options, notesRoot, outputPath }, config);
  } catch (err) {
    logger.error("Ingestion failed", err);
    onProgress?.({ total: 0, processed: 0, currentFile: "", status: "error" });
    throw err;
  }
}

async function runIngestion(
  options: IngestOptions & { outputPath: string },
  config: VaultweaveConfig
): Promise<IngestionResult> {
  const logger = getLogger().child("ingest");
  const { notesRoot, outputPath, onProgress } = options;
  const collector = new SummaryCollector();

  await assertNotesRoot(notesRoot);

  // 1. Snapshot
  onProgress?.({ total: 0, processed: 0, currentFile: "", status: "scanning" });
  const snapshot = await FileSnapshot.scan(notesRoot);
  const notePaths = snapshot.notes();
  const notePathById = new Map<NoteId, string>(notePaths.map((notePath) => [toNoteId(notePath), notePath]));
  logger.info(`Found ${notePaths.length} notes in ${snapshot.size} files`);

  // 2. Parse + resolve per note
  const parser = new ReferenceParser({
    patterns: config.referencePatterns,
    skipCode: config.ingestion.skipCode,
  });
  const resolver = new PathResolver({
    snapshot,
    attachmentSearchRoots: config.attachmentSearchRoots,
    notePaths: notePathById,
  });
  const compositeIndex = new CompositeIndex();
  const chunker = new DocumentChunker({
    maxChunkSize: config.chunkSize,
    overlapSize: config.chunkOverlap,
  });

  const limit = pLimit(config.ingestion.concurrency);
  let processed = 0;

  const loadNote = async (canonicalPath: string): Promise<NoteOutcome> => {
    const noteId = toNoteId(canonicalPath);
    let content: string;
    try {
      content = await readTextFile(path.join(notesRoot, canonicalPath));
    } catch (error) {
      return { ok: false, path: canonicalPath, error };
    }

    const parsed = parseNote(content);
    if (!parsed.frontmatterValid) {
      logger.warn(`Ignoring invalid frontmatter in ${canonicalPath}`);
    }

    const references = parser
      .parse(content, noteId)
      .map((reference) =>
        resolveReference(reference, {
          resolver,
          compositeIndex,
          content,
          contextLength: config.ingestion.contextLength,
        })
      );

    const images: ImageRecord[] = [];
    for (const reference of references) {
      const image = toImageRecord(reference, notesRoot);
      if (image && !images.some((existing) => existing.imageId === image.imageId)) {
        images.push(image);
      }
    }

    let chunks: Chunk[] = [];
    try {
      chunks = chunker.chunk(content, parsed.bodyOffset);
    } catch (error) {
      const chunkingError = new VaultweaveError(ErrorCode.CHUNKING_FAILED, `Chunking failed for ${canonicalPath}`, {
        cause: toErrorCause(error),
      });
      if (config.ingestion.failFast) {
        throw new VaultweaveError(ErrorCode.INGESTION_ABORTED, chunkingError.message, { cause: chunkingError });
      }
      collector.skipNote(canonicalPath, chunkingError);
    }

    const folderPath = path.posix.dirname(canonicalPath);
    processed++;
    onProgress?.({ total: notePaths.length, processed, currentFile: canonicalPath, status: "resolving" });

    return {
      ok: true,
      loaded: {
        note: {
          noteId,
          canonicalPath,
          title: resolveNoteTitle(parsed, canonicalPath),
          folderPath,
          tags: parsed.tags,
          chunkCount: chunks.length,
        },
        references,
        delta: buildNoteDelta(noteId, references),
        images,
        chunks,
      },
    };
  };

  // Settle every worker before reporting an abort so none outlives the run
  const settled = await Promise.allSettled(notePaths.map((notePath) => limit(() => loadNote(notePath))));
  const rejected = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (rejected) {
    throw rejected.reason;
  }

  const loaded: LoadedNote[] = [];
  for (const result of settled) {
    if (result.status !== "fulfilled") continue;
    const outcome = result.value;
    collector.noteSeen();
    if (outcome.ok) {
      loaded.push(outcome.loaded);
    } else {
      logger.warn(`Skipping unreadable note ${outcome.path}`);
      collector.skipNote(outcome.path, outcome.error);
    }
  }

  // 3. Reduce
  const graphNotes: GraphNote[] = loaded.map(({ note }) => note);
  const graph = mergeDeltas(
    loaded.map(({ delta }) => delta),
    graphNotes
  );

  const images: ImageRecord[] = [];
  for (const entry of loaded) {
    collector.recordReferences(entry.note.canonicalPath, entry.references);
    images.push(...entry.images);
    collector.recordChunks(entry.chunks.length);
  }
  collector.recordImages(images.length);

  // 4. Embed
  const jobs: EmbeddingJob[] = [];
  for (const { note, chunks } of loaded) {
    for (const chunk of chunks) {
      jobs.push({
        key: recordId(note.noteId, chunk.index),
        noteId: note.noteId,
        chunkIndex: chunk.index,
        text: buildEmbeddingText(chunk, note.title),
      });
    }
  }

  onProgress?.({ total: jobs.length, processed: 0, currentFile: "", status: "embedding" });
  const queue = new EmbeddingQueue(options.embeddingProvider, {
    ...config.embedding,
    failFast: config.ingestion.failFast,
    sleep: options.sleep,
    onProgress: (completed, total) =>
      onProgress?.({ total, processed: completed, currentFile: "", status: "embedding" }),
  });
  const embedded = await queue.run(jobs);

  collector.recordFailedChunks(embedded.failures, (noteId) => notePathById.get(noteId) ?? noteId);

  // 5. Assemble in note order, chunk order
  const records: EmbeddingRecord[] = [];
  for (const { note, chunks } of loaded) {
    for (const chunk of chunks) {
      const vector = embedded.vectors.get(recordId(note.noteId, chunk.index));
      if (!vector) continue;
      records.push({
        id: recordId(note.noteId, chunk.index),
        noteId: note.noteId,
        chunkIndex: chunk.index,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        text: chunk.content,
        vector,
        headerText: chunk.metadata.headerText,
      });
    }
  }
  collector.recordEmbedded(records.length);

  const database = new VectorDatabase({
    createdAt: new Date().toISOString(),
    notesRoot,
    dimensions: embedded.dimensions,
    records,
    notes: loaded.map(({ note }) => note),
    images,
    graph,
  });

  // 6. Persist
  onProgress?.({ total: records.length, processed: records.length, currentFile: outputPath, status: "storing" });
  await database.save(outputPath);

  const summary = collector.finish(compositeIndex.stats());
  logger.info(summary.message, { status: summary.status, outputPath });
  onProgress?.({ total: notePaths.length, processed: notePaths.length, currentFile: "", status: "complete" });

  return { database, summary };
}
