/**
 * FalkorDB Client for Orchestrator Service
 * Graph and vector-index queries over the knowledge graph of ingested chunks
 */

import { Redis } from 'ioredis';
import { createLogger, logError } from '../utils/logger.js';

const log = createLogger('FalkorDB');

const FALKORDB_HOST = process.env['FALKORDB_HOST'] || 'localhost';
const FALKORDB_PORT = parseInt(process.env['FALKORDB_PORT'] || '6379', 10);
const FALKORDB_PASSWORD = process.env['FALKORDB_PASSWORD'];
const GRAPH_NAME = process.env['FALKORDB_GRAPH'] || 'knowledge_graph';

/**
 * Values that can be passed as query parameters
 */
export type CypherValue =
  | string
  | number
  | boolean
  | null
  | readonly CypherValue[]
  | { readonly [key: string]: CypherValue };

export type QueryParams = Record<string, CypherValue>;

/**
 * One result row keyed by the RETURN column names
 */
export type GraphRow = Record<string, unknown>;

/**
 * What connectors and the ingestion pipeline need from the graph database
 */
export interface GraphQueryRunner {
  query(cypherQuery: string, params?: QueryParams): Promise<GraphRow[]>;
}

/**
 * Render a parameter as a Cypher literal for the CYPHER prefix.
 * Map keys are emitted unquoted, so they must be plain identifiers.
 */
export function toCypherLiteral(value: CypherValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot pass non-finite number ${value} as a query parameter`);
    }
    return String(value);
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (isCypherList(value)) {
    return `[${value.map((entry) => toCypherLiteral(entry)).join(', ')}]`;
  }

  const entries = Object.entries(value).map(([key, entry]) => {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      throw new Error(`Invalid map key "${key}" in query parameter`);
    }
    return `${key}: ${toCypherLiteral(entry)}`;
  });
  return `{${entries.join(', ')}}`;
}

function isCypherList(value: CypherValue): value is readonly CypherValue[] {
  return Array.isArray(value);
}

/**
 * Build the full query text with its CYPHER parameter prefix
 * (the --params flag does not work through ioredis)
 */
export function buildQuery(cypherQuery: string, params: QueryParams = {}): string {
  const cypherPrefix = Object.entries(params)
    .map(([key, value]) => `${key}=${toCypherLiteral(value)}`)
    .join(' ');

  return cypherPrefix ? `CYPHER ${cypherPrefix} ${cypherQuery}` : cypherQuery;
}

/**
 * Parse individual value from FalkorDB response
 */
function parseValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;

  if (Array.isArray(value)) {
    // Node: [1, id, labels, properties]; relationship: [2, id, type, src, dest, properties]
    if (value[0] === 1 && value.length === 4) {
      const [, id, labels, properties] = value;
      return { _id: id, _labels: labels, ...parseProperties(properties) };
    }
    if (value[0] === 2 && value.length === 6) {
      const [, id, type, srcId, destId, properties] = value;
      return { _id: id, _type: type, _srcId: srcId, _destId: destId, ...parseProperties(properties) };
    }
    return value.map((entry) => parseValue(entry));
  }

  return value;
}

function parseProperties(properties: unknown): Record<string, unknown> {
  const parsed: Record<string, unknown> = {};
  if (!Array.isArray(properties)) {
    return parsed;
  }
  for (const pair of properties) {
    if (Array.isArray(pair) && typeof pair[0] === 'string') {
      parsed[pair[0]] = pair[1];
    }
  }
  return parsed;
}

/**
 * Parse a GRAPH.QUERY reply ([header, rows, statistics]) into row objects
 */
export function parseGraphResult(result: unknown): GraphRow[] {
  if (!Array.isArray(result) || result.length < 2) {
    return [];
  }

  const [header, data] = result;
  if (!Array.isArray(header) || !Array.isArray(data) || data.length === 0) {
    return [];
  }

  const columns = header.map((column) => (Array.isArray(column) ? String(column[1]) : String(column)));

  return data.filter(Array.isArray).map((row: unknown[]) => {
    const obj: GraphRow = {};
    columns.forEach((column, index) => {
      obj[column] = parseValue(row[index]);
    });
    return obj;
  });
}

class FalkorDBClient implements GraphQueryRunner {
  private client: Redis;

  constructor() {
    this.client = new Redis({
      host: FALKORDB_HOST,
      port: FALKORDB_PORT,
      ...(FALKORDB_PASSWORD && { password: FALKORDB_PASSWORD }),
      lazyConnect: true,
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        log.warn(`Retrying connection... (${times})`);
        return delay;
      },
      maxRetriesPerRequest: 3,
    });

    this.client.on('connect', () => {
      log.info('Connected to FalkorDB');
    });

    this.client.on('error', (err: Error) => {
      log.error('FalkorDB client error', { error: err.message });
    });

    this.client.on('close', () => {
      log.info('FalkorDB connection closed');
    });
  }

  async connect(): Promise<void> {
    if (this.client.status === 'wait') {
      await this.client.connect();
    }
    await this.client.ping();
    log.info(`FalkorDB client ready (graph: ${GRAPH_NAME})`);
  }

  async quit(): Promise<void> {
    await this.client.quit();
    log.info('FalkorDB client disconnected');
  }

  async ping(): Promise<boolean> {
    const reply = await this.client.ping();
    return reply === 'PONG';
  }

  /**
   * Execute a Cypher query with parameters
   */
  async query(cypherQuery: string, params: QueryParams = {}): Promise<GraphRow[]> {
    try {
      const result = await this.client.call('GRAPH.QUERY', GRAPH_NAME, buildQuery(cypherQuery, params));
      return parseGraphResult(result);
    } catch (error) {
      logError(log, 'Query error', error, { query: cypherQuery.trim().slice(0, 120) });
      throw error;
    }
  }

  /**
   * Create the cosine vector index on Chunk.embedding if it is missing
   * @returns false when the index could not be created
   */
  async ensureVectorIndex(dimension: number): Promise<boolean> {
    try {
      await this.query(
        `CREATE VECTOR INDEX FOR (c:Chunk) ON (c.embedding) OPTIONS {dimension: ${dimension}, similarityFunction: 'cosine'}`
      );
      log.info(`Created Chunk vector index (dimension ${dimension})`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (/already indexed|already exists/i.test(message)) {
        log.debug('Chunk vector index already exists');
        return true;
      }
      log.warn('Vector index not available', { error: message });
      return false;
    }
  }
}

// Export singleton instance
export const falkordbClient = new FalkorDBClient();
