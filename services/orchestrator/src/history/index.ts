/**
 * Conversation History Module
 */

export type { StoredMessage, ConversationMessage } from '@fusionchat/shared-types';
export { HistoryStore } from './history-store.js';
export type { HistoryBackend } from './history-store.js';
