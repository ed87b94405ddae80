/**
 * Runtime Type Guards
 * Validates data structures at runtime to catch malformed data from external sources
 */

import { CONTEXT_SOURCES, type ContextCandidate, type ContextSource } from './fusion.js';
import type { StoredMessage } from './history.js';

function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === 'object' && obj !== null && !Array.isArray(obj);
}

/**
 * Type guard for ContextSource
 */
export function isContextSource(value: unknown): value is ContextSource {
  return typeof value === 'string' && CONTEXT_SOURCES.some((source) => source === value);
}

/**
 * Type guard for ContextCandidate
 * Checks shape only; the score range is the fusion engine's concern because
 * some sources are allowed to hand over unbounded scores.
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a well-formed ContextCandidate
 */
export function isContextCandidate(obj: unknown): obj is ContextCandidate {
  if (!isRecord(obj)) {
    return false;
  }

  return (
    typeof obj['identifier'] === 'string' &&
    obj['identifier'].trim().length > 0 &&
    isContextSource(obj['source']) &&
    typeof obj['rawScore'] === 'number' &&
    Number.isFinite(obj['rawScore']) &&
    typeof obj['content'] === 'string' &&
    isRecord(obj['metadata'])
  );
}

/**
 * Type guard for StoredMessage
 * Use this when parsing JSON from Redis before trusting its shape.
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a valid StoredMessage
 */
export function isStoredMessage(obj: unknown): obj is StoredMessage {
  if (!isRecord(obj)) {
    return false;
  }

  return (
    typeof obj['id'] === 'string' &&
    (obj['role'] === 'user' || obj['role'] === 'assistant') &&
    typeof obj['content'] === 'string' &&
    typeof obj['timestamp'] === 'number' &&
    typeof obj['sessionId'] === 'string'
  );
}
