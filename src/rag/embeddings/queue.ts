/**
 * Embedding queue
 *
 * Features:
 * - Bounded concurrency (p-limit) to respect provider rate limits
 * - Batches never span two notes, so a failure stays inside one note
 * - Error handling with exponential backoff retries
 * - Vector count and dimension validation
 */

import pLimit from "p-limit";
import type { NoteId } from "../../identity/ids.js";
import { ErrorCode, EmbeddingError, VaultweaveError } from "../../utils/errors.js";
import { getLogger } from "../../utils/logger.js";
import type { EmbeddingProvider } from "./provider.js";

export interface EmbeddingJob {
  /** Unique key the resulting vector is stored under */
  key: string;
  noteId: NoteId;
  chunkIndex: number;
  text: string;
}

export interface EmbeddingQueueOptions {
  concurrency: number;
  /** Texts per provider call when `embedBatch` is available */
  batchSize: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry; doubled for each further one */
  retryDelayMs: number;
  /** Abort on the first chunk that fails after its retries */
  failFast?: boolean;
  /** Expected vector length; taken from the first response when omitted */
  dimensions?: number;
  onProgress?: (completed: number, total: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface FailedChunk {
  noteId: NoteId;
  chunkIndex: number;
  code: ErrorCode;
  /** Sanitized message, safe to surface */
  message: string;
  attempts: number;
}

export interface EmbeddingQueueResult {
  vectors: Map<string, number[]>;
  failures: FailedChunk[];
  dimensions: number | null;
}

const DEFAULT_OPTIONS: EmbeddingQueueOptions = {
  concurrency: 4,
  batchSize: 16,
  maxRetries: 3,
  retryDelayMs: 500,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item) => typeof item === "number" && Number.isFinite(item))
  );
}

export class EmbeddingQueue {
  private readonly options: EmbeddingQueueOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger = getLogger().child("embeddings");
  private dimensions: number | null;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: Partial<EmbeddingQueueOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.sleep = this.options.sleep ?? defaultSleep;
    this.dimensions = this.options.dimensions ?? null;
  }

  /**
   * Embed every job. Failed chunks are reported, never thrown, unless
   * `failFast` is set.
   *
   * @throws VaultweaveError INGESTION_ABORTED with `failFast` on the first failure
   */
  async run(jobs: readonly EmbeddingJob[]): Promise<EmbeddingQueueResult> {
    const vectors = new Map<string, number[]>();
    const failures: FailedChunk[] = [];
    const batches = this.createBatches(jobs);
    const limit = pLimit(Math.max(1, this.options.concurrency));

    let completed = 0;
    const state: { aborted: VaultweaveError | null } = { aborted: null };

    this.logger.debug(`Embedding ${jobs.length} chunks in ${batches.length} batches`, {
      provider: this.provider.name ?? "custom",
    });

    const tasks = batches.map((batch) =>
      limit(async () => {
        // Batches still waiting when a fail-fast abort happens are skipped
        if (state.aborted) return;

        try {
          const result = await this.embedWithRetry(batch.map((job) => job.text));
          batch.forEach((job, i) => vectors.set(job.key, result[i]));
        } catch (error) {
          const embeddingError = EmbeddingError.fromError(error);
          this.logger.warn(`Embedding failed for ${batch.length} chunk(s) of ${batch[0].noteId}`, {
            code: embeddingError.code,
            detail: embeddingError.message,
          });

          for (const job of batch) {
            failures.push({
              noteId: job.noteId,
              chunkIndex: job.chunkIndex,
              code: embeddingError.code,
              message: embeddingError.getUserMessage(),
              attempts: embeddingError.attempts ?? 1,
            });
          }

          if (this.options.failFast && !state.aborted) {
            state.aborted = new VaultweaveError(
              ErrorCode.INGESTION_ABORTED,
              `Embedding failed for note ${batch[0].noteId}`,
              { cause: embeddingError, recoverable: false }
            );
          }
        }

        completed += batch.length;
        this.options.onProgress?.(completed, jobs.length);
      })
    );

    await Promise.all(tasks);

    if (state.aborted) {
      throw state.aborted;
    }

    failures.sort((a, b) =>
      a.noteId === b.noteId ? a.chunkIndex - b.chunkIndex : a.noteId < b.noteId ? -1 : 1
    );

    return { vectors, failures, dimensions: this.dimensions };
  }

  /**
   * Consecutive jobs of the same note, split to the batch size. Without
   * `embedBatch` every chunk is its own call.
   */
  private createBatches(jobs: readonly EmbeddingJob[]): EmbeddingJob[][] {
    const size = this.provider.embedBatch ? Math.max(1, this.options.batchSize) : 1;
    const batches: EmbeddingJob[][] = [];
    let current: EmbeddingJob[] = [];

    for (const job of jobs) {
      if (current.length > 0 && (current.length >= size || current[0].noteId !== job.noteId)) {
        batches.push(current);
        current = [];
      }
      current.push(job);
    }
    if (current.length > 0) {
      batches.push(current);
    }

    return batches;
  }

  private async embedWithRetry(texts: string[]): Promise<number[][]> {
    const { maxRetries, retryDelayMs } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return this.validate(await this.callProvider(texts), texts.length);
      } catch (error) {
        const embeddingError = EmbeddingError.fromError(error, attempt + 1);
        if (!embeddingError.recoverable || attempt >= maxRetries) {
          throw new EmbeddingError(embeddingError.code, embeddingError.message, {
            cause: embeddingError.cause ?? embeddingError,
            attempts: attempt + 1,
            recoverable: embeddingError.recoverable,
          });
        }

        const delay = retryDelayMs * 2 ** attempt;
        this.logger.debug(`Retrying embedding in ${delay}ms`, { attempt: attempt + 1 });
        await this.sleep(delay);
      }
    }
  }

  private async callProvider(texts: string[]): Promise<unknown[]> {
    if (this.provider.embedBatch && texts.length > 1) {
      return this.provider.embedBatch(texts);
    }
    const vectors: unknown[] = [];
    for (const text of texts) {
      vectors.push(await this.provider.embed(text));
    }
    return vectors;
  }

  private validate(vectors: unknown, expected: number): number[][] {
    if (!Array.isArray(vectors) || vectors.length !== expected) {
      throw new EmbeddingError(
        ErrorCode.EMBEDDING_INVALID_RESPONSE,
        `Expected ${expected} vectors from provider`
      );
    }

    const result: number[][] = [];
    for (const vector of vectors) {
      if (!isVector(vector)) {
        throw new EmbeddingError(ErrorCode.EMBEDDING_INVALID_RESPONSE, "Provider returned a malformed vector");
      }
      if (this.dimensions === null) {
        this.dimensions = vector.length;
      } else if (vector.length !== this.dimensions) {
        throw new EmbeddingError(
          ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
          `Expected ${this.dimensions} dimensions, got ${vector.length}`
        );
      }
      result.push(vector);
    }
    return result;
  }
}
