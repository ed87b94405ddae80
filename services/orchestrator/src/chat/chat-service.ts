/**
 * Chat Service
 *
 * One chat turn: fan out to the connectors, fuse and assemble the context,
 * generate the answer, then persist the exchange and record metrics.
 * Only a broken connector list or a bug can fail a request; every backend
 * failure degrades to less context, a canned answer or a skipped write.
 */

import { randomUUID } from 'crypto';
import type {
  ConnectorReport,
  ContextSource,
  ConversationMessage,
  FusedContextItem,
  FusionConfig,
  PromptFragment,
  StoredMessage,
} from '@fusionchat/shared-types';
import type { ContextualResponse, AnswerGenerator } from '../anthropic/chat-client.js';
import { buildDemoResponse, buildFallbackResponse } from '../anthropic/prompt-templates.js';
import { generateConversationTags, type MemoryService } from '../automem/index.js';
import type { RetrievalSettings } from '../config/fusion-config.js';
import { gatherCandidates } from '../connectors/fan-out.js';
import type { SourceConnector } from '../connectors/types.js';
import type { GraphQueryRunner } from '../falkordb/client.js';
import { recordConversation } from '../falkordb/mutations.js';
import { assemble, formatSourceSummary, fuseWithReport, summarizeSources } from '../fusion/index.js';
import type { ChatMetrics, LlmMode } from '../metrics/collector.js';
import { createLogger, logError, logPerformance } from '../utils/logger.js';

const log = createLogger('ChatService');

const CONTEXT_PREVIEW_ITEMS = 3;
const CONTEXT_PREVIEW_LENGTH = 100;

/**
 * History operations the chat flow uses
 */
export interface ChatHistory {
  addMessage(message: StoredMessage): Promise<boolean>;
  getPromptMessages(sessionId: string): Promise<ConversationMessage[]>;
}

export interface ChatMetricsRecorder {
  recordChat(metrics: ChatMetrics): Promise<void>;
}

export interface ChatServiceDeps {
  connectors: readonly SourceConnector[];
  fusionConfig: FusionConfig;
  retrieval: RetrievalSettings;
  llm: AnswerGenerator;
  history: ChatHistory;
  memory: MemoryService;
  graph: GraphQueryRunner;
  metrics: ChatMetricsRecorder;
  generateId?: () => string;
  now?: () => number;
}

export interface ChatRequest {
  message: string;
  sessionId?: string | undefined;
  /** Limits retrieval to chunks ingested under this capability */
  capability?: string | undefined;
}

export interface ProcessingInfo {
  sourceCounts: Record<ContextSource, number>;
  connectorReports: readonly ConnectorReport[];
  totalContextItems: number;
  omittedContextItems: number;
  tokenEstimate: number;
  llmMode: LlmMode;
  latencyMs: number;
}

export interface ChatResult {
  response: string;
  sessionId: string;
  /** First items of the prompt context, "<source>: <excerpt>..." */
  contextItems: string[];
  processingInfo: ProcessingInfo;
}

export interface ContextSearchResult {
  items: FusedContextItem[];
  fragment: PromptFragment;
  reports: readonly ConnectorReport[];
  /** Candidates dropped during validation */
  rejectedCount: number;
}

interface GeneratedAnswer {
  mode: LlmMode;
  result: ContextualResponse;
}

function emptyUsage(response: string): ContextualResponse {
  return { response, tokensUsed: 0, cacheReadTokens: 0, cacheWriteTokens: 0 };
}

export function previewContextItems(items: readonly FusedContextItem[]): string[] {
  return items
    .slice(0, CONTEXT_PREVIEW_ITEMS)
    .map((item) => `${item.source}: ${item.content.slice(0, CONTEXT_PREVIEW_LENGTH)}...`);
}

export class ChatService {
  private readonly generateId: () => string;
  private readonly now: () => number;

  constructor(private readonly deps: ChatServiceDeps) {
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Retrieve, fuse and assemble context for a query
   */
  async searchContext(query: string, sessionId?: string, capability?: string): Promise<ContextSearchResult> {
    const { connectors, fusionConfig, retrieval } = this.deps;

    const snapshot = await gatherCandidates(
      connectors,
      {
        query,
        ...(sessionId !== undefined && { sessionId }),
        ...(capability !== undefined && { capability }),
      },
      {
        limit: retrieval.perSourceLimit,
        timeoutMs: retrieval.connectorTimeoutMs,
        timeouts: retrieval.connectorTimeouts,
        enabledSources: retrieval.enabledSources,
      }
    );

    const report = fuseWithReport(snapshot.candidates, fusionConfig);
    if (report.rejected.length > 0) {
      log.warn(`Rejected ${report.rejected.length} malformed candidates`, {
        rejected: report.rejected.map((r) => `${r.source}:${r.identifier ?? '?'}:${r.reason}`),
      });
    }

    const fragment = assemble(report.items, retrieval.contextTokenBudget);

    return {
      items: report.items,
      fragment,
      reports: snapshot.reports,
      rejectedCount: report.rejected.length,
    };
  }

  async handleChat(request: ChatRequest): Promise<ChatResult> {
    const startTime = this.now();
    const sessionId = request.sessionId ?? this.generateId();
    const { message } = request;

    const [context, priorTurns] = await Promise.all([
      this.searchContext(message, sessionId, request.capability),
      this.deps.history.getPromptMessages(sessionId),
    ]);
    const { fragment } = context;

    log.info(`Context for ${sessionId}: ${formatSourceSummary(summarizeSources(fragment.items))}`, {
      items: fragment.items.length,
      omitted: fragment.omitted.length,
      tokenEstimate: fragment.tokenEstimate,
    });

    const answer = await this.generateAnswer(message, fragment, priorTurns);
    const finishedAt = this.now();

    await this.persistExchange(sessionId, message, answer, fragment, startTime, finishedAt);

    const latencyMs = finishedAt - startTime;
    await this.deps.metrics.recordChat({
      latencyMs,
      llmMode: answer.mode,
      tokensUsed: answer.result.tokensUsed,
      cacheReadTokens: answer.result.cacheReadTokens,
      cacheWriteTokens: answer.result.cacheWriteTokens,
      contextItems: fragment.items.length,
      reports: context.reports,
    });
    logPerformance('chat', latencyMs, { sessionId, llmMode: answer.mode });

    return {
      response: answer.result.response,
      sessionId,
      contextItems: previewContextItems(fragment.items),
      processingInfo: {
        sourceCounts: summarizeSources(fragment.items),
        connectorReports: context.reports,
        totalContextItems: fragment.items.length,
        omittedContextItems: fragment.omitted.length,
        tokenEstimate: fragment.tokenEstimate,
        llmMode: answer.mode,
        latencyMs,
      },
    };
  }

  private async generateAnswer(
    message: string,
    fragment: PromptFragment,
    priorTurns: readonly ConversationMessage[]
  ): Promise<GeneratedAnswer> {
    const { llm } = this.deps;

    if (!llm.isConfigured()) {
      return { mode: 'demo', result: emptyUsage(buildDemoResponse(message, fragment.items)) };
    }

    try {
      return { mode: 'live', result: await llm.generate(message, fragment, priorTurns) };
    } catch (error) {
      logError(log, 'Answer generation failed, using fallback response', error);
      return { mode: 'fallback', result: emptyUsage(buildFallbackResponse(message, fragment.items)) };
    }
  }

  /**
   * Write the exchange to history, memory and the graph. Each write is
   * independent; failures are logged. Memory and graph only keep live answers.
   */
  private async persistExchange(
    sessionId: string,
    message: string,
    answer: GeneratedAnswer,
    fragment: PromptFragment,
    startedAt: number,
    finishedAt: number
  ): Promise<void> {
    const { history, memory, graph } = this.deps;
    const response = answer.result.response;
    const contextIdentifiers = fragment.items.flatMap((item) => item.mergedIdentifiers);

    const writes: Array<{ target: string; run: () => Promise<unknown> }> = [
      {
        target: 'history',
        run: async () => {
          await history.addMessage({ id: this.generateId(), role: 'user', content: message, timestamp: startedAt, sessionId });
          await history.addMessage({ id: this.generateId(), role: 'assistant', content: response, timestamp: finishedAt, sessionId });
        },
      },
    ];

    if (answer.mode === 'live') {
      writes.push(
        {
          target: 'memory',
          run: () =>
            memory.store({
              content: `Q: ${message}\nA: ${response}`,
              type: 'Insight',
              tags: generateConversationTags(sessionId),
              importance: 0.5,
              metadata: { sessionId, contextIdentifiers },
              timestamp: new Date(finishedAt).toISOString(),
            }),
        },
        {
          target: 'graph',
          run: () =>
            recordConversation(graph, {
              id: this.generateId(),
              sessionId,
              question: message,
              answer: response,
              createdAt: finishedAt,
              chunkIds: contextIdentifiers,
            }),
        }
      );
    }

    const results = await Promise.allSettled(writes.map((write) => write.run()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logError(log, `Failed to persist exchange to ${writes[index]?.target ?? 'unknown'}`, result.reason, { sessionId });
      }
    });
  }
}
