/**
 * Vector Connector
 * Voyage query embedding + FalkorDB vector index over Chunk nodes
 */

import type { ContextCandidate } from '@fusionchat/shared-types';
import type { EmbeddingProvider } from '../embeddings/voyage-client.js';
import type { GraphQueryRunner } from '../falkordb/client.js';
import { searchChunksByEmbedding } from '../falkordb/queries.js';
import { clampScore } from '../fusion/normalize.js';
import type { SearchRequest, SourceConnector } from './types.js';

/**
 * The index reports cosine distance; 0 means identical
 */
export function distanceToSimilarity(distance: number): number {
  return clampScore(1 - distance);
}

export class VectorConnector implements SourceConnector {
  readonly source = 'vector' as const;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly graph: GraphQueryRunner
  ) {}

  isAvailable(): boolean {
    return this.embeddings.isConfigured();
  }

  async search(request: SearchRequest, limit: number): Promise<ContextCandidate[]> {
    const embedding = await this.embeddings.embedQuery(request.query, request.signal);
    const rows = await searchChunksByEmbedding(this.graph, embedding, limit, {
      capability: request.capability?.toUpperCase(),
      signal: request.signal,
    });

    return rows.map((row) => ({
      identifier: row.id,
      source: this.source,
      rawScore: distanceToSimilarity(row.distance),
      content: row.content,
      metadata: {
        documentId: row.documentId,
        title: row.title,
        capability: row.capability,
        distance: row.distance,
      },
    }));
  }
}
