/**
 * FalkorDB Mutations - Write operations for the knowledge graph
 * Documents, chunks, concepts and conversation records
 */

import type { GraphQueryRunner } from './client.js';

export interface DocumentRecord {
  id: string;
  title: string;
  sourceType: string;
  sourceUri: string | null;
  capability: string;
  chunkCount: number;
  ingestedAt: number;
}

export interface ChunkRecord {
  id: string;
  index: number;
  content: string;
}

export interface ConceptMention {
  chunkId: string;
  concept: string;
  weight: number;
}

/**
 * Create or update a document node
 */
export async function upsertDocument(graph: GraphQueryRunner, document: DocumentRecord): Promise<void> {
  const query = `
    MERGE (d:Document {id: $id})
    SET d.title = $title,
        d.sourceType = $sourceType,
        d.sourceUri = $sourceUri,
        d.capability = $capability,
        d.chunkCount = $chunkCount,
        d.ingestedAt = $ingestedAt
    RETURN d.id
  `;

  await graph.query(query, { ...document });
}

/**
 * Create or update chunk nodes and link them to their document
 */
export async function upsertChunks(
  graph: GraphQueryRunner,
  document: Pick<DocumentRecord, 'id' | 'title' | 'capability'>,
  chunks: ChunkRecord[]
): Promise<void> {
  if (chunks.length === 0) return;

  const query = `
    MATCH (d:Document {id: $documentId})
    UNWIND $chunks AS chunk
    MERGE (ch:Chunk {id: chunk.id})
    SET ch.content = chunk.content,
        ch.index = chunk.index,
        ch.documentId = $documentId,
        ch.title = $title,
        ch.capability = $capability
    MERGE (d)-[:CONTAINS]->(ch)
    RETURN count(ch) AS count
  `;

  await graph.query(query, {
    documentId: document.id,
    title: document.title,
    capability: document.capability,
    chunks: chunks.map((chunk) => ({ id: chunk.id, index: chunk.index, content: chunk.content })),
  });
}

/**
 * Clear what an earlier ingest of the document left behind: chunks at or past
 * the new chunk count, and the MENTIONS edges of the chunks that stay.
 * Runs before the chunks are rewritten.
 */
export async function pruneDocumentChunks(
  graph: GraphQueryRunner,
  documentId: string,
  chunkCount: number
): Promise<void> {
  await graph.query(
    `
    MATCH (d:Document {id: $documentId})-[:CONTAINS]->(ch:Chunk)
    WHERE ch.index >= $chunkCount
    DETACH DELETE ch
  `,
    { documentId, chunkCount }
  );

  await graph.query(
    `
    MATCH (ch:Chunk {documentId: $documentId})-[m:MENTIONS]->(:Concept)
    DELETE m
  `,
    { documentId }
  );
}

/**
 * Link chunks to the concepts they mention
 */
export async function linkConcepts(graph: GraphQueryRunner, mentions: ConceptMention[]): Promise<void> {
  if (mentions.length === 0) return;

  const query = `
    UNWIND $mentions AS mention
    MATCH (ch:Chunk {id: mention.chunkId})
    MERGE (c:Concept {name: mention.concept})
    MERGE (ch)-[m:MENTIONS]->(c)
    SET m.weight = mention.weight
    RETURN count(m) AS count
  `;

  await graph.query(query, {
    mentions: mentions.map((mention) => ({
      chunkId: mention.chunkId,
      concept: mention.concept,
      weight: mention.weight,
    })),
  });
}

/**
 * Store chunk embeddings for the vector index
 */
export async function setChunkEmbeddings(
  graph: GraphQueryRunner,
  rows: Array<{ id: string; embedding: number[] }>
): Promise<void> {
  if (rows.length === 0) return;

  const query = `
    UNWIND $rows AS row
    MATCH (ch:Chunk {id: row.id})
    SET ch.embedding = vecf32(row.embedding)
    RETURN count(ch) AS count
  `;

  await graph.query(query, { rows: rows.map((row) => ({ id: row.id, embedding: row.embedding })) });
}

/**
 * Record a chat exchange and the chunks it drew on
 */
export async function recordConversation(
  graph: GraphQueryRunner,
  conversation: {
    id: string;
    sessionId: string;
    question: string;
    answer: string;
    createdAt: number;
    chunkIds: string[];
  }
): Promise<void> {
  const query = `
    CREATE (cv:Conversation {id: $id, sessionId: $sessionId, question: $question, answer: $answer, createdAt: $createdAt})
    WITH cv
    UNWIND $chunkIds AS chunkId
    MATCH (ch:Chunk {id: chunkId})
    MERGE (cv)-[:USED_CONTEXT]->(ch)
    RETURN count(ch) AS count
  `;

  await graph.query(query, { ...conversation });
}
