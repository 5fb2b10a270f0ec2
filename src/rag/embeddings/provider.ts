/**
 * 임베딩 프로바이더 인터페이스
 *
 * The embedding model is an external collaborator: anything that turns text
 * into a vector of floats. Backends that accept several inputs per request
 * implement `embedBatch`.
 */

export interface EmbeddingProvider {
  /**
   * 프로바이더 이름
   * Recorded in logs.
   * @example "local-transformers", "openai"
   */
  readonly name?: string;

  /**
   * 단일 텍스트 임베딩 생성
   */
  embed(text: string): Promise<number[]>;

  /**
   * 배치 텍스트 임베딩 생성
   * Must return one vector per input, in input order.
   */
  embedBatch?(texts: string[]): Promise<number[][]>;
}

/**
 * Cosine similarity; 0 when either vector has zero length or norm
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}
