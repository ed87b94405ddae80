/**
 * AutoMem Memory Types and Interfaces
 * Maps ingested chunks and chat exchanges to AutoMem memories
 */

/**
 * AutoMem memory types supported by the API
 */
export type MemoryType =
  | 'Context' // Ingested document chunks
  | 'Style'
  | 'Preference'
  | 'Pattern'
  | 'Insight' // Chat exchanges worth remembering
  | 'Decision'
  | 'Habit';

/**
 * Base memory structure from AutoMem API
 */
export interface AutoMemMemory {
  id: string;
  content: string;
  type: MemoryType | string;
  confidence: number;
  tags: string[];
  importance: number;
  metadata: Record<string, unknown>;
  timestamp: string;
}

/**
 * Request body for storing a memory
 */
export interface StoreMemoryRequest {
  content: string;
  type?: MemoryType;
  confidence?: number;
  tags?: string[];
  importance?: number;
  metadata?: Record<string, unknown>;
  timestamp?: string;
}

/**
 * Response from storing a memory
 */
export interface StoreMemoryResponse {
  status: 'success' | 'error';
  memory_id: string;
}

/**
 * Response from deleting memories by tag
 */
export interface DeleteMemoriesResponse {
  success: boolean;
  deleted: number;
}

/**
 * Query parameters for recalling memories
 */
export interface RecallQuery {
  query?: string;
  tags?: string[];
  tag_mode?: 'any' | 'all';
  tag_match?: 'prefix' | 'exact';
  limit?: number;
  context_types?: MemoryType[];
}

/**
 * A single result from memory recall
 */
export interface RecallResult {
  id: string;
  match_type: string;
  final_score: number;
  memory: AutoMemMemory;
}

/**
 * Response from recalling memories
 */
export interface RecallResponse {
  status: 'success' | 'error';
  results: RecallResult[];
  count: number;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
}

// =============================================================================
// Tags
// =============================================================================

/**
 * Tags for an ingested chunk memory
 */
export function generateChunkTags(documentId: string, capability: string): string[] {
  return ['kind:chunk', documentTag(documentId), capabilityTag(capability)];
}

export function documentTag(documentId: string): string {
  return `document:${documentId}`;
}

export function capabilityTag(capability: string): string {
  return `capability:${capability.toLowerCase()}`;
}

/**
 * Tags for a stored chat exchange
 */
export function generateConversationTags(sessionId: string): string[] {
  return [`session:${sessionId}`, 'kind:conversation'];
}
