/**
 * Conversation History Configuration
 * Storage and retrieval of per-session turns for prompts and the conversation connector
 */

import { parseBooleanEnv, parseIntEnv, type HistoryConfig } from '@fusionchat/shared-types';

export const historyConfig: HistoryConfig = {
  // Feature flag - can be disabled via environment variable
  enabled: parseBooleanEnv('ENABLE_CONVERSATION_HISTORY', true),

  storage: {
    maxMessages: parseIntEnv('HISTORY_MAX_MESSAGES', 100),
    ttlSeconds: parseIntEnv('HISTORY_TTL_SECONDS', 7 * 24 * 60 * 60), // 7 days
    keyPrefix: process.env['HISTORY_KEY_PREFIX'] || 'HISTORY:',
  },

  retrieval: {
    promptMessages: 10, // prior turns sent with the question
    searchMessages: 30, // turns scanned for keyword overlap
    maxMessageLength: 500, // Truncate very long messages
    minWordLength: 3,
  },
};

/**
 * Estimate token count for a string (rough approximation)
 * Uses ~4 characters per token for English text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
