/**
 * Candidate validation and per-source score normalization
 */

import { isContextCandidate, type ContextCandidate, type ContextSource } from '@fusionchat/shared-types';

export type RejectReason = 'malformed' | 'source-mismatch' | 'out-of-range';

export interface RejectedCandidate {
  source: ContextSource;
  identifier: string | null;
  reason: RejectReason;
}

/**
 * A valid candidate with the score that enters fusion
 */
export interface ScoredCandidate {
  candidate: ContextCandidate;
  /** rawScore, or its min-max rescaled value for unbounded sources */
  score: number;
}

export interface NormalizedBatch {
  source: ContextSource;
  accepted: ScoredCandidate[];
  rejected: RejectedCandidate[];
}

function describeIdentifier(value: unknown): string | null {
  if (typeof value === 'object' && value !== null && 'identifier' in value) {
    const { identifier } = value;
    return typeof identifier === 'string' ? identifier : null;
  }
  return null;
}

/**
 * Validate one source's batch and bring its scores onto [0, 1]
 *
 * Bounded sources keep their scores and lose candidates outside the range.
 * Unbounded sources (`useMinMax`) are rescaled over the batch's observed
 * min/max; a batch whose scores are all equal maps every candidate to 1.
 */
export function normalizeSourceBatch(
  source: ContextSource,
  batch: readonly unknown[],
  useMinMax: boolean
): NormalizedBatch {
  const valid: ContextCandidate[] = [];
  const rejected: RejectedCandidate[] = [];

  for (const entry of batch) {
    if (!isContextCandidate(entry)) {
      rejected.push({ source, identifier: describeIdentifier(entry), reason: 'malformed' });
      continue;
    }
    if (entry.source !== source) {
      rejected.push({ source, identifier: entry.identifier, reason: 'source-mismatch' });
      continue;
    }
    if (!useMinMax && (entry.rawScore < 0 || entry.rawScore > 1)) {
      rejected.push({ source, identifier: entry.identifier, reason: 'out-of-range' });
      continue;
    }
    valid.push(entry);
  }

  if (!useMinMax || valid.length === 0) {
    return {
      source,
      accepted: valid.map((candidate) => ({ candidate, score: candidate.rawScore })),
      rejected,
    };
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const candidate of valid) {
    min = Math.min(min, candidate.rawScore);
    max = Math.max(max, candidate.rawScore);
  }
  // Halved so that the span of two extreme finite scores stays finite
  const span = max / 2 - min / 2;

  return {
    source,
    accepted: valid.map((candidate) => ({
      candidate,
      score: span > 0 ? clampScore((candidate.rawScore / 2 - min / 2) / span) : 1,
    })),
    rejected,
  };
}

/**
 * Clamp a score to [0, 1]; non-finite values become 0.
 * Connectors use this to uphold the bounded-score contract.
 */
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.max(0, Math.min(1, score));
}
