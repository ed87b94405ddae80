/**
 * Memory Connector
 * Semantic recall from AutoMem
 */

import type { ContextCandidate } from '@fusionchat/shared-types';
import type { MemoryService } from '../automem/client.js';
import { capabilityTag, type RecallQuery, type RecallResult } from '../automem/memory-types.js';
import { clampScore } from '../fusion/normalize.js';
import type { SearchRequest, SourceConnector } from './types.js';

/**
 * Chunks written by the ingestion pipeline carry their chunk id, so memory
 * hits line up with vector and graph hits on the same chunk
 */
export function memoryIdentifier(result: RecallResult): string {
  const chunkId = result.memory.metadata['chunkId'];
  if (typeof chunkId === 'string' && chunkId.trim() !== '') {
    return chunkId;
  }
  return `memory:${result.memory.id}`;
}

export class MemoryConnector implements SourceConnector {
  readonly source = 'memory' as const;

  constructor(private readonly memory: MemoryService) {}

  async search(request: SearchRequest, limit: number): Promise<ContextCandidate[]> {
    const query: RecallQuery = { query: request.query, limit };
    if (request.capability) {
      query.tags = [capabilityTag(request.capability)];
      query.tag_match = 'exact';
    }
    const response = await this.memory.recall(query, request.signal);

    return response.results.slice(0, limit).map((result) => {
      const { memory } = result;
      const metadata: Record<string, unknown> = {
        memoryId: memory.id,
        memoryType: memory.type,
        tags: memory.tags,
        importance: memory.importance,
        confidence: memory.confidence,
        timestamp: memory.timestamp,
        matchType: result.match_type,
      };
      if (typeof memory.metadata['capability'] === 'string') {
        metadata['capability'] = memory.metadata['capability'];
      }
      if (typeof memory.metadata['documentId'] === 'string') {
        metadata['documentId'] = memory.metadata['documentId'];
      }

      return {
        identifier: memoryIdentifier(result),
        source: this.source,
        rawScore: clampScore(result.final_score),
        content: memory.content,
        metadata,
      };
    });
  }
}
