/**
 * API Route Handler Tests
 * Validation and status mapping with fake services
 */

import { describe, it, expect, vi } from 'vitest';
import { loadFusionConfig, loadRetrievalSettings } from '../../config/fusion-config.js';
import type { ChatResult, ContextSearchResult } from '../../chat/chat-service.js';
import type { IngestionResult } from '../../ingestion/pipeline.js';
import type { HealthStatus, MetricsSnapshot } from '../../metrics/collector.js';
import { IngestionError } from '../../utils/errors.js';
import { validateFields } from '../middleware.js';
import { createRouteHandlers, type RouteDeps } from '../routes.js';

const chatResult: ChatResult = {
  response: 'Answer',
  sessionId: 's1',
  contextItems: [],
  processingInfo: {
    sourceCounts: { memory: 0, vector: 0, graph: 0, conversation: 0 },
    connectorReports: [],
    totalContextItems: 0,
    omittedContextItems: 0,
    tokenEstimate: 0,
    llmMode: 'live',
    latencyMs: 12,
  },
};

const ingestionResult: IngestionResult = {
  documentId: 'doc-1',
  title: 'Guide',
  chunkCount: 1,
  conceptCount: 2,
  stores: {
    graph: { status: 'ok', written: 1 },
    vector: { status: 'ok', written: 1 },
    memory: { status: 'ok', written: 1 },
  },
  latencyMs: 5,
};

function createDeps() {
  const chat = {
    handleChat: vi.fn<RouteDeps['chat']['handleChat']>().mockResolvedValue(chatResult),
    searchContext: vi.fn<RouteDeps['chat']['searchContext']>(),
  };
  const ingestion = { ingest: vi.fn<RouteDeps['ingestion']['ingest']>().mockResolvedValue(ingestionResult) };
  const history = {
    getHistory: vi.fn<RouteDeps['history']['getHistory']>().mockResolvedValue([]),
    clearHistory: vi.fn<RouteDeps['history']['clearHistory']>().mockResolvedValue(undefined),
  };
  const metrics = {
    getMetrics: vi.fn<() => Promise<MetricsSnapshot>>(),
    getHealthStatus: vi.fn<() => Promise<HealthStatus>>(),
  };
  const deps: RouteDeps = {
    chat,
    ingestion,
    history,
    metrics,
    graphStats: vi.fn<RouteDeps['graphStats']>().mockResolvedValue({ Document: 2, Chunk: 10 }),
    fusionConfig: loadFusionConfig({}),
    retrieval: loadRetrievalSettings({}),
  };
  return { deps, chat, ingestion, history, metrics };
}

describe('validateFields', () => {
  it('should report missing, mistyped and out-of-range fields', () => {
    const errors = validateFields(
      { message: '  ', limit: '5', kind: 'pdf', size: 0 },
      {
        message: { type: 'string', required: true },
        limit: { type: 'number' },
        kind: { type: 'string', enum: ['file', 'url'] },
        size: { type: 'number', min: 1 },
        optional: { type: 'string' },
      },
      'body'
    );

    expect(errors).toEqual([
      'body.message is required',
      'body.limit must be a number',
      'body.kind must be one of: file, url',
      'body.size must be at least 1',
    ]);
  });

  it('should reject non-object input', () => {
    expect(validateFields(null, {}, 'body')).toEqual(['body must be an object']);
    expect(validateFields(['a'], {}, 'body')).toEqual(['body must be an object']);
  });
});

describe('route handlers', () => {
  describe('chat', () => {
    it('should pass the trimmed message and session to the chat service', async () => {
      const { deps, chat } = createDeps();

      const response = await createRouteHandlers(deps).chat({ message: '  What is eKYC?  ', sessionId: 's1' });

      expect(chat.handleChat).toHaveBeenCalledWith({ message: 'What is eKYC?', sessionId: 's1', capability: undefined });
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, ...chatResult });
    });

    it('should scope the chat to a capability', async () => {
      const { deps, chat } = createDeps();

      await createRouteHandlers(deps).chat({ message: 'Loan terms?', capability: 'lending' });

      expect(chat.handleChat).toHaveBeenCalledWith({ message: 'Loan terms?', sessionId: undefined, capability: 'lending' });
    });

    it('should reject a malformed capability', async () => {
      const { deps, chat } = createDeps();

      const response = await createRouteHandlers(deps).chat({ message: 'hi', capability: 'lending desk' });

      expect(response).toEqual({ status: 400, body: { success: false, error: 'body.capability has invalid format' } });
      expect(chat.handleChat).not.toHaveBeenCalled();
    });

    it('should reject a missing message', async () => {
      const { deps, chat } = createDeps();

      const response = await createRouteHandlers(deps).chat({ sessionId: 's1' });

      expect(response).toEqual({ status: 400, body: { success: false, error: 'body.message is required' } });
      expect(chat.handleChat).not.toHaveBeenCalled();
    });

    it('should reject a malformed session id', async () => {
      const { deps } = createDeps();

      const response = await createRouteHandlers(deps).chat({ message: 'hi', sessionId: 'bad id!' });

      expect(response).toEqual({ status: 400, body: { success: false, error: 'body.sessionId has invalid format' } });
    });

    it('should map unexpected failures to 500', async () => {
      const { deps, chat } = createDeps();
      chat.handleChat.mockRejectedValue(new Error('boom'));

      const response = await createRouteHandlers(deps).chat({ message: 'hi' });

      expect(response).toEqual({ status: 500, body: { success: false, error: 'Failed to process chat message' } });
    });
  });

  describe('searchContext', () => {
    it('should return fused items and reports', async () => {
      const { deps, chat } = createDeps();
      const searchResult: ContextSearchResult = {
        items: [],
        fragment: { text: '', items: [], omitted: [], tokenEstimate: 0, tokenBudget: 2000 },
        reports: [],
        rejectedCount: 0,
      };
      chat.searchContext.mockResolvedValue(searchResult);

      const response = await createRouteHandlers(deps).searchContext({ query: 'loan' });

      expect(chat.searchContext).toHaveBeenCalledWith('loan', undefined, undefined);
      expect(response.body).toEqual({ success: true, ...searchResult });
    });

    it('should pass the capability to the search', async () => {
      const { deps, chat } = createDeps();
      chat.searchContext.mockResolvedValue({
        items: [],
        fragment: { text: '', items: [], omitted: [], tokenEstimate: 0, tokenBudget: 2000 },
        reports: [],
        rejectedCount: 0,
      });

      await createRouteHandlers(deps).searchContext({ query: 'loan', sessionId: 's1', capability: 'LENDING' });

      expect(chat.searchContext).toHaveBeenCalledWith('loan', 's1', 'LENDING');
    });

    it('should reject a capability that is not a string', async () => {
      const { deps, chat } = createDeps();

      const response = await createRouteHandlers(deps).searchContext({ query: 'loan', capability: 7 });

      expect(response.status).toBe(400);
      expect(chat.searchContext).not.toHaveBeenCalled();
    });
  });

  describe('ingest', () => {
    it('should default the source type to text', async () => {
      const { deps, ingestion } = createDeps();

      const response = await createRouteHandlers(deps).ingest({ title: 'Guide', content: 'eKYC steps' });

      expect(ingestion.ingest).toHaveBeenCalledWith({
        title: 'Guide',
        content: 'eKYC steps',
        sourceType: 'text',
        sourceUri: undefined,
        capability: undefined,
      });
      expect(response.status).toBe(200);
      expect(response.body['documentId']).toBe('doc-1');
    });

    it('should reject an unknown source type', async () => {
      const { deps } = createDeps();

      const response = await createRouteHandlers(deps).ingest({ title: 'Guide', content: 'x', sourceType: 'pdf' });

      expect(response).toEqual({
        status: 400,
        body: { success: false, error: 'body.sourceType must be one of: file, url, repository, text' },
      });
    });

    it('should turn ingestion validation errors into 400', async () => {
      const { deps, ingestion } = createDeps();
      ingestion.ingest.mockRejectedValue(new IngestionError('Document is 11 bytes, the limit is 10'));

      const response = await createRouteHandlers(deps).ingest({ title: 'Guide', content: 'abcdefghijk' });

      expect(response).toEqual({ status: 400, body: { success: false, error: 'Document is 11 bytes, the limit is 10' } });
    });
  });

  describe('sessionHistory', () => {
    it('should load history with the requested limit', async () => {
      const { deps, history } = createDeps();

      const response = await createRouteHandlers(deps).sessionHistory('s1', '20');

      expect(history.getHistory).toHaveBeenCalledWith('s1', 20);
      expect(response.body).toEqual({ success: true, sessionId: 's1', messages: [], count: 0 });
    });

    it('should reject an out of range limit', async () => {
      const { deps } = createDeps();

      const response = await createRouteHandlers(deps).sessionHistory('s1', '0');

      expect(response.status).toBe(400);
    });

    it('should clear a session', async () => {
      const { deps, history } = createDeps();

      const response = await createRouteHandlers(deps).clearSessionHistory('s1');

      expect(history.clearHistory).toHaveBeenCalledWith('s1');
      expect(response.status).toBe(200);
    });
  });

  describe('health', () => {
    it('should return 503 when unhealthy', async () => {
      const { deps, metrics } = createDeps();
      metrics.getHealthStatus.mockResolvedValue({
        status: 'unhealthy',
        checks: [{ name: 'redis', status: 'fail', message: 'down' }],
      });

      const response = await createRouteHandlers(deps).health();

      expect(response.status).toBe(503);
      expect(response.body['checks']).toEqual([{ name: 'redis', status: 'fail', message: 'down' }]);
    });

    it('should return 200 while degraded', async () => {
      const { deps, metrics } = createDeps();
      metrics.getHealthStatus.mockResolvedValue({ status: 'degraded', checks: [] });

      expect((await createRouteHandlers(deps).health()).status).toBe(200);
    });
  });

  it('should expose the active configuration', async () => {
    const { deps } = createDeps();

    const response = await createRouteHandlers(deps).config();

    expect(response.body['fusion']).toEqual({
      sourceWeights: { memory: 0.25, vector: 0.6, graph: 0.4, conversation: 0.1 },
      maxContextItems: 8,
      dedupSimilarityThreshold: null,
      minMaxSources: [],
    });
  });
});
