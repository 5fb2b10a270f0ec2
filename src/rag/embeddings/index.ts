export { cosineSimilarity, type EmbeddingProvider } from "./provider.js";
export {
  EmbeddingQueue,
  type EmbeddingJob,
  type EmbeddingQueueOptions,
  type EmbeddingQueueResult,
  type FailedChunk,
} from "./queue.js";
