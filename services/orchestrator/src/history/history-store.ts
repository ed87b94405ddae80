/**
 * Conversation History Store
 * Per-session turns in a Redis Sorted Set, scored by timestamp
 *
 * Uses Sorted Set for:
 * - Natural ordering by timestamp (score)
 * - Efficient range queries (ZREVRANGE)
 * - Easy trimming of old messages
 * A companion Set (<key>:ids) makes re-delivery of a message id a no-op.
 */

import {
  isStoredMessage,
  type ConversationMessage,
  type HistoryConfig,
  type StoredMessage,
} from '@fusionchat/shared-types';
import { historyConfig as defaultHistoryConfig } from '../config/history-config.js';
import { truncateText } from '../text/keywords.js';
import { createLogger, logError } from '../utils/logger.js';

const log = createLogger('HistoryStore');

/**
 * Subset of the Redis API the store needs
 */
export interface HistoryBackend {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  zcard(key: string): Promise<number>;
  del(...keys: string[]): Promise<number>;
}

// Atomic add: duplicate check, add, trim, TTL refresh
const ADD_MESSAGE_SCRIPT = `
  local key = KEYS[1]
  local idsKey = KEYS[2]
  local messageJson = ARGV[1]
  local timestamp = tonumber(ARGV[2])
  local messageId = ARGV[3]
  local maxMessages = tonumber(ARGV[4])
  local ttlSeconds = tonumber(ARGV[5])

  if redis.call('SISMEMBER', idsKey, messageId) == 1 then
    return 0
  end

  redis.call('SADD', idsKey, messageId)
  redis.call('ZADD', key, timestamp, messageJson)

  local count = redis.call('ZCARD', key)
  if count > maxMessages then
    local toRemove = redis.call('ZRANGE', key, 0, count - maxMessages - 1)
    for _, msg in ipairs(toRemove) do
      local id = string.match(msg, '"id":"([^"]+)"')
      if id then
        redis.call('SREM', idsKey, id)
      end
    end
    redis.call('ZREMRANGEBYRANK', key, 0, count - maxMessages - 1)
  end

  redis.call('EXPIRE', key, ttlSeconds)
  redis.call('EXPIRE', idsKey, ttlSeconds)

  return 1
`;

export class HistoryStore {
  constructor(
    private readonly redis: HistoryBackend,
    private readonly config: HistoryConfig = defaultHistoryConfig
  ) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  get retrieval(): HistoryConfig['retrieval'] {
    return this.config.retrieval;
  }

  private getKey(sessionId: string): string {
    return `${this.config.storage.keyPrefix}${sessionId}`;
  }

  /**
   * Add a message to the session history
   * @returns true if the message was added, false if duplicate or on error
   */
  async addMessage(message: StoredMessage): Promise<boolean> {
    const key = this.getKey(message.sessionId);
    const { maxMessages, ttlSeconds } = this.config.storage;

    try {
      const result = await this.redis.eval(
        ADD_MESSAGE_SCRIPT,
        2,
        key,
        `${key}:ids`,
        JSON.stringify(message),
        message.timestamp.toString(),
        message.id,
        maxMessages.toString(),
        ttlSeconds.toString()
      );

      if (result === 1) {
        log.debug(`Added message ${message.id} for ${message.sessionId} (${message.role})`);
        return true;
      }
      log.debug(`Duplicate message ${message.id} for ${message.sessionId}, skipped`);
      return false;
    } catch (error) {
      // history storage must not block the chat response
      logError(log, `Error adding message for ${message.sessionId}`, error);
      return false;
    }
  }

  /**
   * Most recent messages, newest first. Entries that fail validation are skipped.
   */
  async getHistory(sessionId: string, limit: number = 50): Promise<StoredMessage[]> {
    if (limit <= 0) {
      return [];
    }

    const rawMessages = await this.redis.zrevrange(this.getKey(sessionId), 0, limit - 1);

    const messages: StoredMessage[] = [];
    for (const json of rawMessages) {
      try {
        const parsed: unknown = JSON.parse(json);
        if (isStoredMessage(parsed)) {
          messages.push(parsed);
        } else {
          log.warn('Invalid message structure in Redis', { sessionId });
        }
      } catch (parseError) {
        logError(log, 'Error parsing message JSON', parseError, { sessionId });
      }
    }

    return messages;
  }

  /**
   * Prior turns for the LLM, oldest first, each truncated to maxMessageLength
   */
  async getPromptMessages(sessionId: string): Promise<ConversationMessage[]> {
    if (!this.config.enabled) {
      return [];
    }

    const { promptMessages, maxMessageLength } = this.config.retrieval;
    try {
      const recent = await this.getHistory(sessionId, promptMessages);
      return recent.reverse().map((message) => ({
        role: message.role,
        content: truncateText(message.content, maxMessageLength),
      }));
    } catch (error) {
      logError(log, `Error retrieving prompt history for ${sessionId}`, error);
      return [];
    }
  }

  async clearHistory(sessionId: string): Promise<void> {
    const key = this.getKey(sessionId);
    await this.redis.del(key, `${key}:ids`);
    log.info(`Cleared history for ${sessionId}`);
  }

  async getHistoryCount(sessionId: string): Promise<number> {
    return this.redis.zcard(this.getKey(sessionId));
  }
}
