/**
 * Shared Types Package
 * Exports all shared types for FusionChat services
 */

// Fusion types
export type {
  ContextSource,
  ContextCandidate,
  FusedContextItem,
  CandidatesBySource,
  FusionConfig,
  PromptFragment,
  ConnectorStatus,
  ConnectorReport,
  CandidateSnapshot,
} from './fusion.js';

export { CONTEXT_SOURCES, CONTEXT_SOURCE_LABELS } from './fusion.js';

// History types
export type {
  StoredMessage,
  ConversationMessage,
  HistoryStorageConfig,
  HistoryRetrievalConfig,
  HistoryConfig,
} from './history.js';

// Environment variable utilities
export { parseIntEnv, parseFloatEnv, parseListEnv, parseBooleanEnv } from './env-utils.js';

// Runtime type guards
export { isContextSource, isContextCandidate, isStoredMessage } from './guards.js';
