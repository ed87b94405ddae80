/**
 * Conversation Connector
 * Earlier turns of the same session, scored by keyword overlap with the query
 */

import type { ContextCandidate, HistoryRetrievalConfig, StoredMessage } from '@fusionchat/shared-types';
import { extractKeywords, queryCoverage, truncateText } from '../text/keywords.js';
import type { SearchRequest, SourceConnector } from './types.js';

/**
 * What the connector reads from the history store
 */
export interface ConversationHistorySource {
  readonly enabled: boolean;
  readonly retrieval: HistoryRetrievalConfig;
  getHistory(sessionId: string, limit: number): Promise<StoredMessage[]>;
}

export function conversationIdentifier(sessionId: string, messageId: string): string {
  return `conversation:${sessionId}:${messageId}`;
}

export class ConversationConnector implements SourceConnector {
  readonly source = 'conversation' as const;

  constructor(private readonly history: ConversationHistorySource) {}

  isAvailable(): boolean {
    return this.history.enabled;
  }

  async search(request: SearchRequest, limit: number): Promise<ContextCandidate[]> {
    const { sessionId } = request;
    if (!sessionId) {
      return [];
    }

    const { searchMessages, maxMessageLength, minWordLength } = this.history.retrieval;
    const queryKeywords = extractKeywords(request.query, minWordLength);
    if (queryKeywords.size === 0) {
      return [];
    }

    const messages = await this.history.getHistory(sessionId, searchMessages);

    const scored: Array<{ message: StoredMessage; score: number; matched: string[] }> = [];
    for (const message of messages) {
      const messageKeywords = extractKeywords(message.content, minWordLength);
      const score = queryCoverage(queryKeywords, messageKeywords);
      if (score > 0) {
        const matched = [...queryKeywords].filter((word) => messageKeywords.has(word));
        scored.push({ message, score, matched });
      }
    }

    // best overlap first, newer turns win ties
    scored.sort((a, b) => b.score - a.score || b.message.timestamp - a.message.timestamp);

    return scored.slice(0, limit).map(({ message, score, matched }) => ({
      identifier: conversationIdentifier(sessionId, message.id),
      source: this.source,
      rawScore: score,
      content: `${message.role === 'user' ? 'User' : 'Assistant'}: ${truncateText(message.content, maxMessageLength)}`,
      metadata: {
        messageId: message.id,
        role: message.role,
        timestamp: message.timestamp,
        matchedKeywords: matched,
      },
    }));
  }
}
