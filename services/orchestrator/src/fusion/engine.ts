/**
 * Context Fusion Engine
 *
 * Merges candidates from every retrieval source into one ranked list:
 * validate and normalize per source, group identical (and optionally
 * near-identical) items, score each group as the weighted sum of its best
 * per-source scores, then rank and truncate.
 *
 * Pure and synchronous. The same input and config always give the same
 * output, whatever order the connectors finished in.
 */

import {
  CONTEXT_SOURCES,
  CONTEXT_SOURCE_LABELS,
  type CandidatesBySource,
  type ContextSource,
  type FusedContextItem,
  type FusionConfig,
} from '@fusionchat/shared-types';
import { compareIdentifiers, groupCandidates, type CandidateGroup } from './dedup.js';
import { normalizeSourceBatch, type RejectedCandidate, type ScoredCandidate } from './normalize.js';

export interface FusionReport {
  items: FusedContextItem[];
  rejected: RejectedCandidate[];
  /** Valid candidates that entered grouping */
  acceptedCount: number;
  /** Distinct groups before truncation */
  groupCount: number;
}

function weightOf(config: FusionConfig, source: ContextSource): number {
  return config.sourceWeights[source] ?? 0;
}

function sourceRank(source: ContextSource): number {
  return CONTEXT_SOURCES.indexOf(source);
}

/**
 * Pick the member whose content represents the group: highest weighted
 * contribution, then highest normalized score, then canonical source order,
 * then smallest identifier.
 */
function pickRepresentative(members: readonly ScoredCandidate[], config: FusionConfig): ScoredCandidate | undefined {
  let best: ScoredCandidate | undefined;

  for (const member of members) {
    if (!best) {
      best = member;
      continue;
    }

    const contribution = weightOf(config, member.candidate.source) * member.score;
    const bestContribution = weightOf(config, best.candidate.source) * best.score;
    if (contribution !== bestContribution) {
      if (contribution > bestContribution) best = member;
      continue;
    }
    if (member.score !== best.score) {
      if (member.score > best.score) best = member;
      continue;
    }
    const rankDiff = sourceRank(member.candidate.source) - sourceRank(best.candidate.source);
    if (rankDiff !== 0) {
      if (rankDiff < 0) best = member;
      continue;
    }
    if (compareIdentifiers(member.candidate.identifier, best.candidate.identifier) < 0) {
      best = member;
    }
  }

  return best;
}

function scoreGroup(group: CandidateGroup, config: FusionConfig): FusedContextItem | null {
  const representative = pickRepresentative(group.members, config);
  if (!representative) {
    return null;
  }

  // A source repeating an item counts once, with its best score
  const bestBySource = new Map<ContextSource, number>();
  for (const member of group.members) {
    const current = bestBySource.get(member.candidate.source);
    if (current === undefined || member.score > current) {
      bestBySource.set(member.candidate.source, member.score);
    }
  }

  let fusedScore = 0;
  const contributingSources: ContextSource[] = [];
  const sourceScores: Partial<Record<ContextSource, number>> = {};
  for (const source of CONTEXT_SOURCES) {
    const score = bestBySource.get(source);
    if (score === undefined) continue;
    fusedScore += weightOf(config, source) * score;
    contributingSources.push(source);
    sourceScores[source] = score;
  }

  return {
    identifier: group.key,
    content: representative.candidate.content,
    metadata: { ...representative.candidate.metadata },
    source: representative.candidate.source,
    fusedScore,
    contributingSources,
    sourceScores,
    mergedIdentifiers: [...group.identifiers],
  };
}

/**
 * fusedScore desc, then corroborating-source count desc, then identifier asc
 */
export function compareFusedItems(a: FusedContextItem, b: FusedContextItem): number {
  if (a.fusedScore !== b.fusedScore) {
    return b.fusedScore - a.fusedScore;
  }
  if (a.contributingSources.length !== b.contributingSources.length) {
    return b.contributingSources.length - a.contributingSources.length;
  }
  return compareIdentifiers(a.identifier, b.identifier);
}

/**
 * Fuse candidates and report what was dropped on the way
 */
export function fuseWithReport(candidatesBySource: CandidatesBySource, config: FusionConfig): FusionReport {
  const accepted: ScoredCandidate[] = [];
  const rejected: RejectedCandidate[] = [];

  for (const source of CONTEXT_SOURCES) {
    const batch = candidatesBySource[source];
    if (!batch || batch.length === 0) continue;

    const normalized = normalizeSourceBatch(source, batch, config.minMaxSources.includes(source));
    accepted.push(...normalized.accepted);
    rejected.push(...normalized.rejected);
  }

  const groups = groupCandidates(accepted, config.dedupSimilarityThreshold);
  const items: FusedContextItem[] = [];
  for (const group of groups) {
    const item = scoreGroup(group, config);
    if (item) items.push(item);
  }

  items.sort(compareFusedItems);

  return {
    items: items.slice(0, Math.max(0, config.maxContextItems)),
    rejected,
    acceptedCount: accepted.length,
    groupCount: groups.length,
  };
}

/**
 * Fuse per-source candidates into at most `maxContextItems` ranked items
 */
export function fuse(candidatesBySource: CandidatesBySource, config: FusionConfig): FusedContextItem[] {
  return fuseWithReport(candidatesBySource, config).items;
}

/**
 * Count how many fused items each source contributed to
 */
export function summarizeSources(items: readonly FusedContextItem[]): Record<ContextSource, number> {
  const counts: Record<ContextSource, number> = { memory: 0, vector: 0, graph: 0, conversation: 0 };
  for (const item of items) {
    for (const source of item.contributingSources) {
      counts[source] += 1;
    }
  }
  return counts;
}

/**
 * Human-readable source breakdown, e.g. "Vector: 3, Graph: 1"
 */
export function formatSourceSummary(counts: Readonly<Record<ContextSource, number>>): string {
  const parts = CONTEXT_SOURCES.filter((source) => counts[source] > 0).map(
    (source) => `${CONTEXT_SOURCE_LABELS[source]}: ${counts[source]}`
  );
  return parts.length > 0 ? parts.join(', ') : 'none';
}
