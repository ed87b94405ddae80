/**
 * Graph Connector
 * Chunks reached through (:Chunk)-[:MENTIONS]->(:Concept) for the query's concepts
 */

import type { ContextCandidate } from '@fusionchat/shared-types';
import type { GraphQueryRunner } from '../falkordb/client.js';
import { findChunksByConcepts } from '../falkordb/queries.js';
import { clampScore } from '../fusion/normalize.js';
import { extractConcepts } from '../text/concepts.js';
import type { SearchRequest, SourceConnector } from './types.js';

export class GraphConnector implements SourceConnector {
  readonly source = 'graph' as const;

  constructor(private readonly graph: GraphQueryRunner) {}

  async search(request: SearchRequest, limit: number): Promise<ContextCandidate[]> {
    const concepts = extractConcepts(request.query);
    if (concepts.length === 0) {
      return [];
    }

    const rows = await findChunksByConcepts(this.graph, concepts, limit, {
      capability: request.capability?.toUpperCase(),
      signal: request.signal,
    });

    return rows.map((row) => ({
      identifier: row.id,
      source: this.source,
      // share of the query's concepts this chunk mentions
      rawScore: clampScore(row.matchedConcepts.length / concepts.length),
      content: row.content,
      metadata: {
        matchedConcepts: row.matchedConcepts,
        queryConcepts: concepts,
        relationshipStrength: row.strength,
        documentId: row.documentId,
        title: row.title,
        capability: row.capability,
      },
    }));
  }
}
