/**
 * Shared History Types
 * Conversation turns stored per chat session
 */

/**
 * Message structure stored in Redis
 */
export interface StoredMessage {
  /** Unique message ID (for idempotency) */
  id: string;
  /** 'user' (person chatting) or 'assistant' (generated answer) */
  role: 'user' | 'assistant';
  content: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  sessionId: string;
}

/**
 * Message format for the Messages API
 */
export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Configuration for history storage
 */
export interface HistoryStorageConfig {
  /** Maximum messages to store per session */
  maxMessages: number;
  /** TTL in seconds (auto-expire old sessions) */
  ttlSeconds: number;
  /** Redis key prefix */
  keyPrefix: string;
}

/**
 * Configuration for history retrieval
 */
export interface HistoryRetrievalConfig {
  /** Turns passed to the LLM as prior messages */
  promptMessages: number;
  /** Turns scanned by the conversation connector */
  searchMessages: number;
  /** Maximum length per message before truncation */
  maxMessageLength: number;
  /** Minimum word length to consider as keyword */
  minWordLength: number;
}

export interface HistoryConfig {
  enabled: boolean;
  storage: HistoryStorageConfig;
  retrieval: HistoryRetrievalConfig;
}
