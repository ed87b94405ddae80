/**
 * API Route Handlers
 * Framework-free handlers: validated input in, status and JSON body out.
 * app.ts binds them to Express.
 */

import type { FusionConfig, StoredMessage } from '@fusionchat/shared-types';
import type { ChatResult, ChatService, ContextSearchResult } from '../chat/chat-service.js';
import type { RetrievalSettings } from '../config/fusion-config.js';
import { SOURCE_TYPES, type IngestionPipeline, type IngestionResult, type SourceType } from '../ingestion/pipeline.js';
import type { HealthStatus, MetricsSnapshot } from '../metrics/collector.js';
import { IngestionError, getErrorMessage } from '../utils/errors.js';
import { createLogger, logError } from '../utils/logger.js';
import { isRecord, validateFields, type ObjectSchema } from './middleware.js';

const log = createLogger('API');

const MAX_MESSAGE_LENGTH = 8000;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const CAPABILITY_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
const DEFAULT_HISTORY_LIMIT = 50;

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface RouteDeps {
  chat: Pick<ChatService, 'handleChat' | 'searchContext'>;
  ingestion: Pick<IngestionPipeline, 'ingest'>;
  history: {
    getHistory(sessionId: string, limit?: number): Promise<StoredMessage[]>;
    clearHistory(sessionId: string): Promise<void>;
  };
  metrics: {
    getMetrics(): Promise<MetricsSnapshot>;
    getHealthStatus(): Promise<HealthStatus>;
  };
  graphStats(): Promise<Record<string, number>>;
  fusionConfig: FusionConfig;
  retrieval: RetrievalSettings;
}

const chatSchema: ObjectSchema = {
  message: { type: 'string', required: true, maxLength: MAX_MESSAGE_LENGTH },
  sessionId: { type: 'string', pattern: SESSION_ID_PATTERN },
  capability: { type: 'string', pattern: CAPABILITY_PATTERN },
};

const searchSchema: ObjectSchema = {
  query: { type: 'string', required: true, maxLength: MAX_MESSAGE_LENGTH },
  sessionId: { type: 'string', pattern: SESSION_ID_PATTERN },
  capability: { type: 'string', pattern: CAPABILITY_PATTERN },
};

const ingestSchema: ObjectSchema = {
  title: { type: 'string', required: true, maxLength: 500 },
  content: { type: 'string', required: true },
  sourceType: { type: 'string', enum: SOURCE_TYPES },
  sourceUri: { type: 'string', maxLength: 2048 },
  capability: { type: 'string', pattern: CAPABILITY_PATTERN },
};

function badRequest(errors: string[]): ApiResponse {
  return { status: 400, body: { success: false, error: errors.join('; ') } };
}

function serverError(message: string, error: unknown): ApiResponse {
  logError(log, message, error);
  return { status: 500, body: { success: false, error: message } };
}

function isSourceType(value: unknown): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value);
}

function readString(input: unknown, field: string): string | undefined {
  const value = isRecord(input) ? input[field] : undefined;
  return typeof value === 'string' ? value : undefined;
}

export function createRouteHandlers(deps: RouteDeps) {
  return {
    async chat(body: unknown): Promise<ApiResponse> {
      const errors = validateFields(body, chatSchema, 'body');
      const message = readString(body, 'message')?.trim();
      if (errors.length > 0 || !message) return badRequest(errors);

      try {
        const result: ChatResult = await deps.chat.handleChat({
          message,
          sessionId: readString(body, 'sessionId'),
          capability: readString(body, 'capability'),
        });
        return { status: 200, body: { success: true, ...result } };
      } catch (error) {
        return serverError('Failed to process chat message', error);
      }
    },

    async searchContext(body: unknown): Promise<ApiResponse> {
      const errors = validateFields(body, searchSchema, 'body');
      const query = readString(body, 'query')?.trim();
      if (errors.length > 0 || !query) return badRequest(errors);

      try {
        const result: ContextSearchResult = await deps.chat.searchContext(
          query,
          readString(body, 'sessionId'),
          readString(body, 'capability')
        );
        return { status: 200, body: { success: true, ...result } };
      } catch (error) {
        return serverError('Context search failed', error);
      }
    },

    async ingest(body: unknown): Promise<ApiResponse> {
      const errors = validateFields(body, ingestSchema, 'body');
      const title = readString(body, 'title');
      const content = readString(body, 'content');
      if (errors.length > 0 || title === undefined || content === undefined) return badRequest(errors);

      const sourceType = readString(body, 'sourceType');
      try {
        const result: IngestionResult = await deps.ingestion.ingest({
          title,
          content,
          sourceType: isSourceType(sourceType) ? sourceType : 'text',
          sourceUri: readString(body, 'sourceUri'),
          capability: readString(body, 'capability'),
        });
        return { status: 200, body: { success: true, ...result } };
      } catch (error) {
        if (error instanceof IngestionError) {
          return badRequest([error.message]);
        }
        return serverError('Ingestion failed', error);
      }
    },

    async config(): Promise<ApiResponse> {
      return {
        status: 200,
        body: { success: true, fusion: deps.fusionConfig, retrieval: deps.retrieval },
      };
    },

    async sessionHistory(sessionId: string, limitParam: unknown): Promise<ApiResponse> {
      if (!SESSION_ID_PATTERN.test(sessionId)) return badRequest(['Invalid session ID']);

      let limit = DEFAULT_HISTORY_LIMIT;
      if (typeof limitParam === 'string') {
        limit = parseInt(limitParam, 10);
        if (Number.isNaN(limit) || limit < 1 || limit > 500) return badRequest(['limit must be between 1 and 500']);
      }

      try {
        const messages = await deps.history.getHistory(sessionId, limit);
        return { status: 200, body: { success: true, sessionId, messages, count: messages.length } };
      } catch (error) {
        return serverError('Failed to load session history', error);
      }
    },

    async clearSessionHistory(sessionId: string): Promise<ApiResponse> {
      if (!SESSION_ID_PATTERN.test(sessionId)) return badRequest(['Invalid session ID']);

      try {
        await deps.history.clearHistory(sessionId);
        return { status: 200, body: { success: true, sessionId } };
      } catch (error) {
        return serverError('Failed to clear session history', error);
      }
    },

    async stats(): Promise<ApiResponse> {
      try {
        const [graph, metrics] = await Promise.all([deps.graphStats(), deps.metrics.getMetrics()]);
        return { status: 200, body: { success: true, graph, metrics } };
      } catch (error) {
        return serverError('Failed to load stats', error);
      }
    },

    async health(): Promise<ApiResponse> {
      try {
        const health = await deps.metrics.getHealthStatus();
        return {
          status: health.status === 'unhealthy' ? 503 : 200,
          body: { status: health.status, service: 'orchestrator', checks: health.checks, timestamp: new Date().toISOString() },
        };
      } catch (error) {
        return {
          status: 503,
          body: { status: 'unhealthy', service: 'orchestrator', error: getErrorMessage(error), timestamp: new Date().toISOString() },
        };
      }
    },

    async metrics(): Promise<ApiResponse> {
      return { status: 200, body: { success: true, metrics: await deps.metrics.getMetrics() } };
    },
  };
}
