/**
 * AutoMem Module Index
 */

export { AutoMemClient, parseRecallResponse } from './client.js';
export type { MemoryService, AutoMemClientOptions } from './client.js';

export type {
  MemoryType,
  AutoMemMemory,
  StoreMemoryRequest,
  StoreMemoryResponse,
  RecallQuery,
  RecallResponse,
  RecallResult,
  HealthResponse,
  DeleteMemoriesResponse,
} from './memory-types.js';

export {
  capabilityTag,
  documentTag,
  generateChunkTags,
  generateConversationTags,
} from './memory-types.js';
