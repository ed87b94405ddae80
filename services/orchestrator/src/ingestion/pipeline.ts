/**
 * Ingestion Pipeline
 *
 * Takes already-extracted document text, chunks it, extracts concepts and
 * writes the result to the three retrieval stores: the knowledge graph
 * (Document, Chunk, Concept, MENTIONS), the vector index (embeddings on
 * Chunk nodes) and semantic memory (one memory per chunk). The stores are
 * written concurrently and independently; the result reports each one.
 * Re-ingesting a document replaces its chunks, mentions and memories.
 */

import { createHash } from 'crypto';
import { documentTag, generateChunkTags } from '../automem/memory-types.js';
import type { MemoryService } from '../automem/client.js';
import type { EmbeddingProvider } from '../embeddings/voyage-client.js';
import type { GraphQueryRunner } from '../falkordb/client.js';
import {
  linkConcepts,
  pruneDocumentChunks,
  setChunkEmbeddings,
  upsertChunks,
  upsertDocument,
  type ConceptMention,
  type DocumentRecord,
} from '../falkordb/mutations.js';
import { conceptWeight, extractConcepts } from '../text/concepts.js';
import { IngestionError, getErrorMessage } from '../utils/errors.js';
import { createLogger, logError } from '../utils/logger.js';
import { DEFAULT_CHUNK_OPTIONS, chunkText, type ChunkOptions, type TextChunk } from './chunker.js';

const log = createLogger('Ingestion');

export type SourceType = 'file' | 'url' | 'repository' | 'text';

export const SOURCE_TYPES: readonly SourceType[] = ['file', 'url', 'repository', 'text'];

export const DEFAULT_CAPABILITY = 'GENERAL';

export interface IngestDocument {
  id?: string | undefined;
  title: string;
  content: string;
  sourceType: SourceType;
  sourceUri?: string | undefined;
  capability?: string | undefined;
}

export type StoreName = 'graph' | 'vector' | 'memory';

export interface StoreOutcome {
  status: 'ok' | 'error' | 'skipped';
  /** Chunks written before completion or failure */
  written: number;
  error?: string;
}

export interface IngestionResult {
  documentId: string;
  title: string;
  chunkCount: number;
  conceptCount: number;
  stores: Record<StoreName, StoreOutcome>;
  latencyMs: number;
}

export interface IngestionOptions extends ChunkOptions {
  maxContentBytes: number;
}

export const DEFAULT_INGESTION_OPTIONS: Readonly<IngestionOptions> = {
  ...DEFAULT_CHUNK_OPTIONS,
  maxContentBytes: 5 * 1024 * 1024,
};

export interface IngestionDeps {
  graph: GraphQueryRunner;
  embeddings: EmbeddingProvider;
  memory: MemoryService;
  options?: Partial<IngestionOptions>;
  now?: () => number;
}

/**
 * Stable document id from its source URI, or its title when there is none
 */
export function deriveDocumentId(document: Pick<IngestDocument, 'title' | 'sourceUri'>): string {
  const key = document.sourceUri ?? document.title;
  return `doc-${createHash('sha256').update(key).digest('hex').slice(0, 16)}`;
}

export class IngestionPipeline {
  private readonly options: IngestionOptions;
  private readonly now: () => number;

  constructor(private readonly deps: IngestionDeps) {
    this.options = { ...DEFAULT_INGESTION_OPTIONS, ...deps.options };
    this.now = deps.now ?? Date.now;
  }

  /**
   * Ingest one document
   * @throws IngestionError for empty or oversized content
   */
  async ingest(document: IngestDocument): Promise<IngestionResult> {
    const startTime = this.now();
    const title = document.title.trim();
    if (title.length === 0) {
      throw new IngestionError('Document title is required');
    }
    if (document.content.trim().length === 0) {
      throw new IngestionError('Document content is empty');
    }

    const size = Buffer.byteLength(document.content, 'utf-8');
    if (size > this.options.maxContentBytes) {
      throw new IngestionError(`Document is ${size} bytes, the limit is ${this.options.maxContentBytes}`);
    }

    const documentId = document.id ?? deriveDocumentId({ title, sourceUri: document.sourceUri });
    const capability = (document.capability ?? DEFAULT_CAPABILITY).toUpperCase();
    const chunks = chunkText(documentId, document.content, this.options);

    const mentions: ConceptMention[] = chunks.flatMap((chunk) =>
      extractConcepts(chunk.content).map((concept) => ({
        chunkId: chunk.id,
        concept,
        weight: conceptWeight(concept, chunk.content),
      }))
    );
    const conceptCount = new Set(mentions.map((mention) => mention.concept)).size;

    log.info(`Ingesting "${title}" as ${documentId}`, {
      sourceType: document.sourceType,
      chunks: chunks.length,
      concepts: conceptCount,
    });

    const progress: Record<StoreName, number> = { graph: 0, vector: 0, memory: 0 };

    const graphWrite = this.writeGraph(
      {
        id: documentId,
        title,
        sourceType: document.sourceType,
        sourceUri: document.sourceUri ?? null,
        capability,
        chunkCount: chunks.length,
        ingestedAt: startTime,
      },
      chunks,
      mentions,
      progress
    );
    const vectorWrite = this.deps.embeddings.isConfigured()
      ? this.writeVectors(chunks, graphWrite, progress)
      : null;
    const memoryWrite = this.writeMemories(documentId, title, capability, chunks, progress);

    const [graphResult, vectorResult, memoryResult] = await Promise.allSettled([
      graphWrite,
      vectorWrite ?? Promise.resolve(),
      memoryWrite,
    ]);

    const outcome = (store: StoreName, result: PromiseSettledResult<void>): StoreOutcome => {
      if (result.status === 'fulfilled') {
        return { status: 'ok', written: progress[store] };
      }
      logError(log, `Failed to write ${documentId} to ${store}`, result.reason);
      return { status: 'error', written: progress[store], error: getErrorMessage(result.reason) };
    };

    const result: IngestionResult = {
      documentId,
      title,
      chunkCount: chunks.length,
      conceptCount,
      stores: {
        graph: outcome('graph', graphResult),
        vector: vectorWrite
          ? outcome('vector', vectorResult)
          : { status: 'skipped', written: 0, error: 'Embedding provider not configured' },
        memory: outcome('memory', memoryResult),
      },
      latencyMs: this.now() - startTime,
    };

    log.info(`Ingested ${documentId}`, {
      graph: result.stores.graph.status,
      vector: result.stores.vector.status,
      memory: result.stores.memory.status,
      latencyMs: result.latencyMs,
    });

    return result;
  }

  private async writeGraph(
    document: DocumentRecord,
    chunks: TextChunk[],
    mentions: ConceptMention[],
    progress: Record<StoreName, number>
  ): Promise<void> {
    const { graph } = this.deps;
    await upsertDocument(graph, document);
    await pruneDocumentChunks(graph, document.id, chunks.length);
    await upsertChunks(graph, document, chunks);
    progress.graph = chunks.length;
    await linkConcepts(graph, mentions);
  }

  /**
   * Embeddings are computed while the graph write runs; they are attached
   * once the Chunk nodes exist.
   */
  private async writeVectors(
    chunks: TextChunk[],
    chunksWritten: Promise<void>,
    progress: Record<StoreName, number>
  ): Promise<void> {
    const embeddings = await this.deps.embeddings.embedDocuments(chunks.map((chunk) => chunk.content));
    if (embeddings.length !== chunks.length) {
      throw new Error(`Expected ${chunks.length} embeddings, got ${embeddings.length}`);
    }

    try {
      await chunksWritten;
    } catch (error) {
      throw new Error(`Chunk nodes were not written: ${getErrorMessage(error)}`);
    }

    await setChunkEmbeddings(
      this.deps.graph,
      chunks.map((chunk, index) => ({ id: chunk.id, embedding: embeddings[index] ?? [] }))
    );
    progress.vector = chunks.length;
  }

  private async writeMemories(
    documentId: string,
    title: string,
    capability: string,
    chunks: TextChunk[],
    progress: Record<StoreName, number>
  ): Promise<void> {
    const tags = generateChunkTags(documentId, capability);
    // Memories from an earlier ingest of this document are replaced
    const { deleted } = await this.deps.memory.deleteByTags([documentTag(documentId)]);
    if (deleted > 0) {
      log.debug(`Removed ${deleted} memories from the previous ingest of ${documentId}`);
    }

    for (const chunk of chunks) {
      await this.deps.memory.store({
        content: chunk.content,
        type: 'Context',
        tags,
        importance: 0.5,
        metadata: { chunkId: chunk.id, documentId, title, capability, chunkIndex: chunk.index },
      });
      progress.memory += 1;
    }
  }
}
