export * from "./types.js";

// 임베딩
export {
  EmbeddingQueue,
  cosineSimilarity,
  type EmbeddingJob,
  type EmbeddingProvider,
  type EmbeddingQueueOptions,
  type EmbeddingQueueResult,
  type FailedChunk,
} from "./embeddings/index.js";

export {
  DocumentChunker,
  DEFAULT_CHUNK_CONFIG,
  type ChunkConfig,
  type Chunk,
  type ChunkMetadata,
} from "./chunker.js";

export {
  ingest,
  buildEmbeddingText,
  recordId,
  type IngestOptions,
  type IngestionProgress,
  type IngestionResult,
} from "./indexer.js";

export {
  SummaryCollector,
  type FailedChunkReport,
  type IngestionCounts,
  type IngestionStatus,
  type IngestionSummary,
  type ReferenceIssue,
  type SkippedNote,
} from "./summary.js";

export { mimeTypeFor, toImageRecord } from "./images.js";

// VectorStore
export { VectorDatabase, loadVectorDatabase, type ScoredRecord, type VectorDatabaseInit } from "./vectorStore.js";

export { RetrievalEngine, type BacklinkInfo } from "./retriever.js";
