/**
 * Embeddings Module
 * Exports for semantic embedding functionality
 */

export { VoyageClient, parseEmbeddingResponse } from './voyage-client.js';
export type {
  EmbeddingCache,
  EmbeddingProvider,
  VoyageClientOptions,
  CircuitBreakerState,
} from './voyage-client.js';
