/**
 * Voyage AI Embedding Client
 * Query and document embeddings with Redis caching and a circuit breaker
 */

import { createHash } from 'crypto';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Voyage');

const VOYAGE_API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-3';
const EMBEDDING_DIMENSION = 1024;
const MAX_BATCH_SIZE = 128;

// Cache configuration
const CACHE_TTL_SECONDS = 300; // 5 minutes
const CACHE_KEY_PREFIX = 'EMB:query:';

// Circuit breaker configuration
const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60000; // 1 minute

/**
 * Subset of the Redis API used for caching query embeddings
 */
export interface EmbeddingCache {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

/**
 * What the vector connector and the ingestion pipeline need
 */
export interface EmbeddingProvider {
  readonly dimension: number;
  isConfigured(): boolean;
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export interface VoyageClientOptions {
  apiKey: string | undefined;
  model?: string;
  cache?: EmbeddingCache;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

export interface CircuitBreakerState {
  failures: number;
  lastFailure: number;
  isOpen: boolean;
}

interface VoyageEmbeddingResponse {
  embeddings: number[][];
  totalTokens: number;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'number');
}

/**
 * Validate the API payload: { data: [{ embedding, index }], usage: { total_tokens } }
 */
export function parseEmbeddingResponse(payload: unknown): VoyageEmbeddingResponse {
  if (typeof payload !== 'object' || payload === null || !('data' in payload) || !Array.isArray(payload.data)) {
    throw new Error('Malformed Voyage API response');
  }

  const indexed: Array<{ index: number; embedding: number[] }> = [];
  payload.data.forEach((entry: unknown, position: number) => {
    if (typeof entry !== 'object' || entry === null || !('embedding' in entry) || !isNumberArray(entry.embedding)) {
      throw new Error(`Malformed embedding at position ${position}`);
    }
    const index = 'index' in entry && typeof entry.index === 'number' ? entry.index : position;
    indexed.push({ index, embedding: entry.embedding });
  });
  indexed.sort((a, b) => a.index - b.index);

  let totalTokens = 0;
  if ('usage' in payload && typeof payload.usage === 'object' && payload.usage !== null && 'total_tokens' in payload.usage) {
    const tokens = payload.usage.total_tokens;
    totalTokens = typeof tokens === 'number' ? tokens : 0;
  }

  return { embeddings: indexed.map((entry) => entry.embedding), totalTokens };
}

export class VoyageClient implements EmbeddingProvider {
  readonly dimension = EMBEDDING_DIMENSION;

  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly cache: EmbeddingCache | undefined;
  private readonly fetchImpl: typeof fetch;
  private circuitBreaker: CircuitBreakerState = { failures: 0, lastFailure: 0, isOpen: false };

  constructor(options: VoyageClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.cache = options.cache;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Embed a search query
   * Returns the cached embedding if available, otherwise calls Voyage API
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const cacheKey = this.getCacheKey(text);

    if (this.cache) {
      try {
        const cached = await this.cache.get(cacheKey);
        if (cached) {
          const parsed: unknown = JSON.parse(cached);
          if (isNumberArray(parsed)) {
            log.debug('Cache hit for query embedding');
            return parsed;
          }
        }
      } catch (error) {
        // Continue to API call on cache error
        log.warn('Cache read error', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    const { embeddings } = await this.request([text], 'query', signal);
    const embedding = embeddings[0];
    if (!embedding) {
      throw new Error('No embedding returned from Voyage API');
    }

    if (this.cache) {
      try {
        await this.cache.setex(cacheKey, CACHE_TTL_SECONDS, JSON.stringify(embedding));
      } catch (error) {
        log.warn('Cache write error', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    return embedding;
  }

  /**
   * Embed document chunks in batches of at most 128 inputs
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (let start = 0; start < texts.length; start += MAX_BATCH_SIZE) {
      const batch = texts.slice(start, start + MAX_BATCH_SIZE);
      const result = await this.request(batch, 'document');
      if (result.embeddings.length !== batch.length) {
        throw new Error(`Voyage API returned ${result.embeddings.length} embeddings for ${batch.length} inputs`);
      }
      embeddings.push(...result.embeddings);
    }

    return embeddings;
  }

  /**
   * Get circuit breaker status (for monitoring)
   */
  getCircuitBreakerStatus(): CircuitBreakerState {
    return { ...this.circuitBreaker };
  }

  /**
   * Reset circuit breaker (for testing or manual intervention)
   */
  resetCircuitBreaker(): void {
    this.circuitBreaker = { failures: 0, lastFailure: 0, isOpen: false };
    log.info('Circuit breaker manually reset');
  }

  private getCacheKey(text: string): string {
    const hash = createHash('sha256').update(`${this.model}:${text}`).digest('hex').substring(0, 16);
    return `${CACHE_KEY_PREFIX}${hash}`;
  }

  private checkCircuitBreaker(): boolean {
    if (!this.circuitBreaker.isOpen) {
      return true;
    }

    if (Date.now() - this.circuitBreaker.lastFailure > CIRCUIT_BREAKER_RESET_MS) {
      log.info('Circuit breaker reset');
      this.circuitBreaker = { failures: 0, lastFailure: 0, isOpen: false };
      return true;
    }

    return false;
  }

  private recordFailure(): void {
    this.circuitBreaker.failures++;
    this.circuitBreaker.lastFailure = Date.now();

    if (this.circuitBreaker.failures >= CIRCUIT_BREAKER_THRESHOLD) {
      this.circuitBreaker.isOpen = true;
      log.warn(`Circuit breaker opened after ${this.circuitBreaker.failures} failures`);
    }
  }

  private recordSuccess(): void {
    if (this.circuitBreaker.failures > 0) {
      this.circuitBreaker = { failures: 0, lastFailure: 0, isOpen: false };
    }
  }

  private async request(
    input: string[],
    inputType: 'query' | 'document',
    signal?: AbortSignal
  ): Promise<VoyageEmbeddingResponse> {
    if (!this.checkCircuitBreaker()) {
      throw new Error('Voyage API circuit breaker is open');
    }
    if (!this.apiKey) {
      throw new Error('VOYAGE_API_KEY not configured');
    }

    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(VOYAGE_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input, input_type: inputType }),
        ...(signal && { signal }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Voyage API error ${response.status}: ${errorText}`);
      }

      const payload: unknown = await response.json();
      const result = parseEmbeddingResponse(payload);

      log.debug(`Embedded ${input.length} ${inputType} text(s) in ${Date.now() - startTime}ms`, {
        tokens: result.totalTokens,
      });

      this.recordSuccess();
      return result;
    } catch (error) {
      // caller aborts are not API failures
      if (!signal?.aborted) {
        this.recordFailure();
      }
      throw error;
    }
  }
}
