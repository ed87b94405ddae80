/**
 * Orchestrator Service - Context Fusion Chat API
 * Wires the backends, connectors, chat flow and ingestion pipeline behind the HTTP API
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

// Load environment variables from project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, '../../../.env') });

import type { Server } from 'http';
import { parseListEnv } from '@fusionchat/shared-types';
import { ChatClient } from './anthropic/chat-client.js';
import { AutoMemClient } from './automem/index.js';
import { ChatService } from './chat/chat-service.js';
import { loadFusionConfig, loadRetrievalSettings } from './config/fusion-config.js';
import {
  ConversationConnector,
  GraphConnector,
  MemoryConnector,
  VectorConnector,
} from './connectors/index.js';
import { VoyageClient } from './embeddings/index.js';
import { falkordbClient } from './falkordb/client.js';
import { getGraphStats } from './falkordb/queries.js';
import { HistoryStore } from './history/index.js';
import { IngestionPipeline } from './ingestion/pipeline.js';
import { MetricsCollector } from './metrics/collector.js';
import { redisClient } from './redis/client.js';
import { createApp } from './server/app.js';
import { ConfigurationError } from './utils/errors.js';
import { createLogger, logError } from './utils/logger.js';

const log = createLogger('Orchestrator');

const PORT = parseInt(process.env['ORCHESTRATOR_PORT'] || '3002', 10);
const NODE_ENV = process.env['NODE_ENV'] || 'development';

let server: Server | null = null;

function loadConfiguration() {
  try {
    return { fusionConfig: loadFusionConfig(), retrieval: loadRetrievalSettings() };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      for (const problem of error.problems) {
        log.error(problem);
      }
      log.error('Invalid configuration, refusing to start');
      process.exit(1);
    }
    throw error;
  }
}

async function startOrchestratorService(): Promise<void> {
  log.info(`Starting Orchestrator Service (${NODE_ENV})`);

  const { fusionConfig, retrieval } = loadConfiguration();
  log.info('Fusion configuration loaded', {
    sourceWeights: fusionConfig.sourceWeights,
    maxContextItems: fusionConfig.maxContextItems,
    enabledSources: retrieval.enabledSources,
  });

  await redisClient.connect();
  await falkordbClient.connect();

  const automem = new AutoMemClient({
    baseUrl: process.env['AUTOMEM_API_URL'] || 'http://localhost:8001',
    token: process.env['AUTOMEM_API_TOKEN'],
  });
  try {
    await automem.connect();
  } catch (error) {
    // Memory is one source among four; the API starts without it
    logError(log, 'AutoMem not reachable', error);
  }

  const voyage = new VoyageClient({ apiKey: process.env['VOYAGE_API_KEY'], cache: redisClient.client });
  if (voyage.isConfigured()) {
    await falkordbClient.ensureVectorIndex(voyage.dimension);
  } else {
    log.warn('VOYAGE_API_KEY not set, vector retrieval and chunk embeddings are disabled');
  }

  const history = new HistoryStore(redisClient.client);
  const llm = new ChatClient();

  const metrics = new MetricsCollector(redisClient.client, {
    healthChecks: [
      { name: 'redis', check: () => redisClient.ping() },
      { name: 'falkordb', check: () => falkordbClient.ping() },
      { name: 'automem', check: async () => (await automem.health()).status !== 'unhealthy' },
    ],
  });

  const chat = new ChatService({
    connectors: [
      new MemoryConnector(automem),
      new VectorConnector(voyage, falkordbClient),
      new GraphConnector(falkordbClient),
      new ConversationConnector(history),
    ],
    fusionConfig,
    retrieval,
    llm,
    history,
    memory: automem,
    graph: falkordbClient,
    metrics,
  });

  const ingestion = new IngestionPipeline({ graph: falkordbClient, embeddings: voyage, memory: automem });

  const app = createApp(
    {
      chat,
      ingestion,
      history,
      metrics,
      graphStats: () => getGraphStats(falkordbClient),
      fusionConfig,
      retrieval,
    },
    { corsOrigins: parseListEnv('CORS_ORIGINS', ['http://localhost:3000']) }
  );

  server = app.listen(PORT, () => {
    log.info(`Orchestrator service ready on port ${PORT}`);
  });
}

// Graceful shutdown
async function shutdown(): Promise<void> {
  log.info('Shutting down gracefully...');

  try {
    if (server) {
      const closing = server;
      await new Promise<void>((resolveClose, rejectClose) => {
        closing.close((error) => (error ? rejectClose(error) : resolveClose()));
      });
    }
    await redisClient.quit();
    await falkordbClient.quit();
    log.info('Orchestrator service shut down');
    process.exit(0);
  } catch (error) {
    logError(log, 'Error during shutdown', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown();
});
process.on('SIGINT', () => {
  void shutdown();
});

startOrchestratorService().catch((error: unknown) => {
  logError(log, 'Failed to start Orchestrator service', error);
  process.exit(1);
});
