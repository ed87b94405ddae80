/**
 * Type Guards Tests
 * Unit tests for fusion and history runtime type guards
 */

import { describe, it, expect } from 'vitest';
import { isContextSource, isContextCandidate, isStoredMessage } from '../guards.js';

describe('isContextSource', () => {
  it('should return true for known sources', () => {
    expect(isContextSource('memory')).toBe(true);
    expect(isContextSource('vector')).toBe(true);
    expect(isContextSource('graph')).toBe(true);
    expect(isContextSource('conversation')).toBe(true);
  });

  it('should return false for unknown or non-string values', () => {
    expect(isContextSource('keyword')).toBe(false);
    expect(isContextSource('')).toBe(false);
    expect(isContextSource(null)).toBe(false);
    expect(isContextSource(1)).toBe(false);
  });
});

describe('isContextCandidate', () => {
  const validCandidate = {
    identifier: 'doc-1:0',
    source: 'vector',
    rawScore: 0.72,
    content: 'Loan disbursement happens after approval.',
    metadata: { capability: 'LENDING' },
  };

  it('should return true for a well-formed candidate', () => {
    expect(isContextCandidate(validCandidate)).toBe(true);
  });

  it('should accept scores outside [0, 1] since range is checked during fusion', () => {
    expect(isContextCandidate({ ...validCandidate, rawScore: 12.5 })).toBe(true);
  });

  it('should reject a missing or blank identifier', () => {
    expect(isContextCandidate({ ...validCandidate, identifier: '' })).toBe(false);
    expect(isContextCandidate({ ...validCandidate, identifier: '   ' })).toBe(false);
    const { identifier: _identifier, ...withoutIdentifier } = validCandidate;
    expect(isContextCandidate(withoutIdentifier)).toBe(false);
  });

  it('should reject non-finite scores', () => {
    expect(isContextCandidate({ ...validCandidate, rawScore: Number.NaN })).toBe(false);
    expect(isContextCandidate({ ...validCandidate, rawScore: Number.POSITIVE_INFINITY })).toBe(false);
    expect(isContextCandidate({ ...validCandidate, rawScore: '0.5' })).toBe(false);
  });

  it('should reject unknown sources and bad metadata', () => {
    expect(isContextCandidate({ ...validCandidate, source: 'web' })).toBe(false);
    expect(isContextCandidate({ ...validCandidate, metadata: null })).toBe(false);
    expect(isContextCandidate({ ...validCandidate, metadata: [] })).toBe(false);
  });

  it('should return false for non-objects', () => {
    expect(isContextCandidate(null)).toBe(false);
    expect(isContextCandidate('candidate')).toBe(false);
    expect(isContextCandidate([validCandidate])).toBe(false);
  });
});

describe('isStoredMessage', () => {
  const validMessage = {
    id: 'msg-1',
    role: 'user',
    content: 'What does the eKYC flow check?',
    timestamp: 1_700_000_000_000,
    sessionId: 'session-a',
  };

  it('should return true for a valid stored message', () => {
    expect(isStoredMessage(validMessage)).toBe(true);
    expect(isStoredMessage({ ...validMessage, role: 'assistant' })).toBe(true);
  });

  it('should return false for invalid roles or missing session', () => {
    expect(isStoredMessage({ ...validMessage, role: 'system' })).toBe(false);
    const { sessionId: _sessionId, ...withoutSession } = validMessage;
    expect(isStoredMessage(withoutSession)).toBe(false);
  });

  it('should return false when timestamp is not a number', () => {
    expect(isStoredMessage({ ...validMessage, timestamp: '1700000000000' })).toBe(false);
  });
});
