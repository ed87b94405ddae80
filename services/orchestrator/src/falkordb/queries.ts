/**
 * FalkorDB Query Functions for Context Retrieval
 * Vector-index and concept-traversal lookups over ingested chunks
 */

import type { GraphQueryRunner, GraphRow, QueryParams } from './client.js';

/**
 * A chunk row as returned by the retrieval queries
 */
export interface ChunkRow {
  id: string;
  content: string;
  documentId: string | null;
  title: string | null;
  capability: string | null;
}

export interface VectorChunkRow extends ChunkRow {
  /** Cosine distance reported by the index (0 = identical) */
  distance: number;
}

export interface ConceptChunkRow extends ChunkRow {
  matchedConcepts: string[];
  /** Sum of MENTIONS weights over the matched concepts */
  strength: number;
}

function readString(row: GraphRow, key: string): string | null {
  const value = row[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function readNumber(row: GraphRow, key: string): number | null {
  const value = row[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readStringArray(row: GraphRow, key: string): string[] {
  const value = row[key];
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function toChunkRow(row: GraphRow): ChunkRow | null {
  const id = readString(row, 'id');
  const content = readString(row, 'content');
  if (!id || content === null) {
    return null;
  }
  return {
    id,
    content,
    documentId: readString(row, 'documentId'),
    title: readString(row, 'title'),
    capability: readString(row, 'capability'),
  };
}

export interface ChunkSearchOptions {
  /** Only chunks ingested under this capability, as stored (upper case) */
  capability?: string | undefined;
  /** Checked before the query is sent and again before its rows are used */
  signal?: AbortSignal | undefined;
}

/** Index hits fetched per requested row when a capability filter drops some of them */
export const CAPABILITY_OVERFETCH = 4;

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error('Graph query aborted');
  }
}

/**
 * Nearest chunks to a query embedding via the Chunk.embedding vector index
 */
export async function searchChunksByEmbedding(
  graph: GraphQueryRunner,
  embedding: number[],
  limit: number,
  options: ChunkSearchOptions = {}
): Promise<VectorChunkRow[]> {
  const { capability, signal } = options;

  // The index returns its top hits before any WHERE applies
  const query = capability
    ? `
    CALL db.idx.vector.queryNodes('Chunk', 'embedding', $candidates, vecf32($embedding))
    YIELD node, score
    WITH node, score
    WHERE node.capability = $capability
    RETURN node.id AS id, node.content AS content, node.documentId AS documentId,
           node.title AS title, node.capability AS capability, score
    ORDER BY score ASC
    LIMIT $limit
  `
    : `
    CALL db.idx.vector.queryNodes('Chunk', 'embedding', $limit, vecf32($embedding))
    YIELD node, score
    RETURN node.id AS id, node.content AS content, node.documentId AS documentId,
           node.title AS title, node.capability AS capability, score
  `;
  const params: QueryParams = capability
    ? { embedding, limit, candidates: limit * CAPABILITY_OVERFETCH, capability }
    : { embedding, limit };

  throwIfAborted(signal);
  const rows = await graph.query(query, params);
  throwIfAborted(signal);

  const results: VectorChunkRow[] = [];
  for (const row of rows) {
    const chunk = toChunkRow(row);
    const distance = readNumber(row, 'score');
    if (chunk && distance !== null) {
      results.push({ ...chunk, distance });
    }
  }
  return results;
}

/**
 * Chunks that mention any of the given concepts, most matches first
 */
export async function findChunksByConcepts(
  graph: GraphQueryRunner,
  concepts: string[],
  limit: number,
  options: ChunkSearchOptions = {}
): Promise<ConceptChunkRow[]> {
  const { capability, signal } = options;

  const query = `
    MATCH (ch:Chunk)-[m:MENTIONS]->(c:Concept)
    WHERE c.name IN $concepts${capability ? ' AND ch.capability = $capability' : ''}
    WITH ch, collect(DISTINCT c.name) AS matched, sum(m.weight) AS strength
    RETURN ch.id AS id, ch.content AS content, ch.documentId AS documentId,
           ch.title AS title, ch.capability AS capability, matched, strength
    ORDER BY size(matched) DESC, strength DESC, id ASC
    LIMIT $limit
  `;
  const params: QueryParams = capability ? { concepts, limit, capability } : { concepts, limit };

  throwIfAborted(signal);
  const rows = await graph.query(query, params);
  throwIfAborted(signal);

  const results: ConceptChunkRow[] = [];
  for (const row of rows) {
    const chunk = toChunkRow(row);
    if (chunk) {
      results.push({
        ...chunk,
        matchedConcepts: readStringArray(row, 'matched'),
        strength: readNumber(row, 'strength') ?? 0,
      });
    }
  }
  return results;
}

/**
 * Counts of the main node labels (health and /api/config output)
 */
export async function getGraphStats(graph: GraphQueryRunner): Promise<Record<string, number>> {
  const query = `
    MATCH (n)
    WHERE n:Document OR n:Chunk OR n:Concept OR n:Conversation
    RETURN labels(n)[0] AS label, count(n) AS count
  `;

  const rows = await graph.query(query);

  const stats: Record<string, number> = {};
  for (const row of rows) {
    const label = readString(row, 'label');
    const count = readNumber(row, 'count');
    if (label && count !== null) {
      stats[label] = count;
    }
  }
  return stats;
}
