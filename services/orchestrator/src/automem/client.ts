/**
 * AutoMem API Client
 * Handles communication with the AutoMem memory service
 */

import { createLogger } from '../utils/logger.js';
import type {
  AutoMemMemory,
  DeleteMemoriesResponse,
  HealthResponse,
  RecallQuery,
  RecallResponse,
  RecallResult,
  StoreMemoryRequest,
  StoreMemoryResponse,
} from './memory-types.js';

const log = createLogger('AutoMem');

/**
 * What the memory connector, ingestion and chat persistence need
 */
export interface MemoryService {
  recall(query: RecallQuery, signal?: AbortSignal): Promise<RecallResponse>;
  store(request: StoreMemoryRequest): Promise<StoreMemoryResponse>;
  deleteByTags(tags: string[]): Promise<DeleteMemoriesResponse>;
}

export interface AutoMemClientOptions {
  baseUrl: string;
  token?: string | undefined;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMemory(value: unknown): AutoMemMemory | null {
  if (!isRecord(value) || typeof value['id'] !== 'string' || typeof value['content'] !== 'string') {
    return null;
  }
  const tags = Array.isArray(value['tags'])
    ? value['tags'].filter((tag): tag is string => typeof tag === 'string')
    : [];
  return {
    id: value['id'],
    content: value['content'],
    type: typeof value['type'] === 'string' ? value['type'] : 'Context',
    confidence: typeof value['confidence'] === 'number' ? value['confidence'] : 0,
    tags,
    importance: typeof value['importance'] === 'number' ? value['importance'] : 0,
    metadata: isRecord(value['metadata']) ? value['metadata'] : {},
    timestamp: typeof value['timestamp'] === 'string' ? value['timestamp'] : '',
  };
}

/**
 * Validate a /recall payload, dropping results that are not well formed
 */
export function parseRecallResponse(payload: unknown): RecallResponse {
  if (!isRecord(payload) || !Array.isArray(payload['results'])) {
    throw new Error('Malformed AutoMem recall response');
  }

  const results: RecallResult[] = [];
  for (const entry of payload['results']) {
    if (!isRecord(entry)) continue;
    const memory = toMemory(entry['memory']);
    const finalScore = entry['final_score'];
    if (!memory || typeof finalScore !== 'number') continue;

    results.push({
      id: typeof entry['id'] === 'string' ? entry['id'] : memory.id,
      match_type: typeof entry['match_type'] === 'string' ? entry['match_type'] : 'unknown',
      final_score: finalScore,
      memory,
    });
  }

  return {
    status: payload['status'] === 'error' ? 'error' : 'success',
    results,
    count: results.length,
  };
}

/**
 * AutoMem API Client
 * Provides methods for storing and recalling memories
 */
export class AutoMemClient implements MemoryService {
  private baseUrl: string;
  private token: string | undefined;
  private fetchImpl: typeof fetch;
  private isConnected: boolean = false;

  constructor(options: AutoMemClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Initialize connection and verify health
   */
  async connect(): Promise<void> {
    const health = await this.health();
    this.isConnected = health.status !== 'unhealthy';
    if (health.status === 'healthy') {
      log.info('Connected to AutoMem');
    } else {
      log.warn(`AutoMem status: ${health.status}`);
    }
  }

  /**
   * Check if client is connected
   */
  get connected(): boolean {
    return this.isConnected;
  }

  /**
   * Build headers for API requests
   */
  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }

  /**
   * Check AutoMem service health
   */
  async health(): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.getHeaders(),
    });

    if (!response.ok) {
      throw new Error(`Health check failed: ${response.status} ${response.statusText}`);
    }

    const payload: unknown = await response.json();
    const status = isRecord(payload) ? payload['status'] : undefined;
    if (status === 'healthy' || status === 'degraded' || status === 'unhealthy') {
      return { status };
    }
    return { status: 'degraded' };
  }

  /**
   * Store a new memory
   */
  async store(request: StoreMemoryRequest): Promise<StoreMemoryResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/memory`, {
      method: 'POST',
      headers: this.getHeaders(),
      body: JSON.stringify(request),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Failed to store memory: ${response.status} ${errorText}`);
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload) || typeof payload['memory_id'] !== 'string') {
      throw new Error('Malformed AutoMem store response');
    }
    return {
      status: payload['status'] === 'error' ? 'error' : 'success',
      memory_id: payload['memory_id'],
    };
  }

  /**
   * Delete every memory carrying the given tags
   */
  async deleteByTags(tags: string[]): Promise<DeleteMemoriesResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/memory`, {
      method: 'DELETE',
      headers: this.getHeaders(),
      body: JSON.stringify({ tags }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Failed to delete memories: ${response.status} ${errorText}`);
    }

    const payload: unknown = await response.json();
    const deleted = isRecord(payload) ? payload['deleted'] : undefined;
    return {
      success: isRecord(payload) && payload['success'] !== false,
      deleted: typeof deleted === 'number' ? deleted : 0,
    };
  }

  /**
   * Recall memories based on query parameters
   */
  async recall(query: RecallQuery, signal?: AbortSignal): Promise<RecallResponse> {
    const params = new URLSearchParams();

    if (query.query) {
      params.append('query', query.query);
    }
    if (query.tags && query.tags.length > 0) {
      for (const tag of query.tags) {
        params.append('tags', tag);
      }
    }
    if (query.tag_mode) {
      params.append('tag_mode', query.tag_mode);
    }
    if (query.tag_match) {
      params.append('tag_match', query.tag_match);
    }
    if (query.limit) {
      params.append('limit', query.limit.toString());
    }
    if (query.context_types && query.context_types.length > 0) {
      params.append('context_types', query.context_types.join(','));
    }

    const url = `${this.baseUrl}/recall?${params.toString()}`;
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: this.getHeaders(),
      ...(signal && { signal }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Failed to recall memories: ${response.status} ${errorText}`);
    }

    return parseRecallResponse(await response.json());
  }
}
