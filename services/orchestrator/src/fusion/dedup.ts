/**
 * Candidate grouping: exact identifier matches plus optional near-duplicate
 * collapsing across sources by token overlap
 */

import { jaccard, tokenize } from '../text/keywords.js';
import type { ScoredCandidate } from './normalize.js';

export interface CandidateGroup {
  /** Lexicographically smallest identifier in the group */
  key: string;
  /** Ascending, no repeats */
  identifiers: string[];
  members: ScoredCandidate[];
}

/**
 * Code-unit order; locale-independent so keys are reproducible everywhere
 */
export function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Union-find over identifiers whose root is always the smallest member
 */
class IdentifierUnion {
  private readonly parent = new Map<string, string>();

  add(identifier: string): void {
    if (!this.parent.has(identifier)) {
      this.parent.set(identifier, identifier);
    }
  }

  find(identifier: string): string {
    let root = identifier;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // path compression
    let current = identifier;
    while (current !== root) {
      const step = this.parent.get(current);
      this.parent.set(current, root);
      if (step === undefined) break;
      current = step;
    }
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    if (compareIdentifiers(rootA, rootB) < 0) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootA, rootB);
    }
  }
}

/**
 * True when two exact-identifier groups hold near-identical content from
 * different sources
 */
function isNearDuplicate(
  left: readonly ScoredCandidate[],
  right: readonly ScoredCandidate[],
  tokens: Map<ScoredCandidate, Set<string>>,
  threshold: number
): boolean {
  for (const a of left) {
    const tokensA = tokens.get(a);
    if (!tokensA || tokensA.size === 0) continue;

    for (const b of right) {
      if (a.candidate.source === b.candidate.source) continue;
      const tokensB = tokens.get(b);
      if (!tokensB || tokensB.size === 0) continue;

      if (jaccard(tokensA, tokensB) >= threshold) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Group candidates by identifier, then merge groups whose content overlaps
 * at or above `threshold` (null disables fuzzy merging).
 *
 * Groups are returned in ascending key order.
 */
export function groupCandidates(
  scored: readonly ScoredCandidate[],
  threshold: number | null
): CandidateGroup[] {
  const byIdentifier = new Map<string, ScoredCandidate[]>();
  for (const entry of scored) {
    const members = byIdentifier.get(entry.candidate.identifier);
    if (members) {
      members.push(entry);
    } else {
      byIdentifier.set(entry.candidate.identifier, [entry]);
    }
  }

  const identifiers = [...byIdentifier.keys()].sort(compareIdentifiers);
  const union = new IdentifierUnion();
  identifiers.forEach((identifier) => union.add(identifier));

  if (threshold !== null) {
    const tokens = new Map<ScoredCandidate, Set<string>>();
    for (const entry of scored) {
      tokens.set(entry, new Set(tokenize(entry.candidate.content)));
    }

    for (let i = 0; i < identifiers.length; i++) {
      const leftId = identifiers[i];
      if (leftId === undefined) continue;
      const left = byIdentifier.get(leftId) ?? [];

      for (let j = i + 1; j < identifiers.length; j++) {
        const rightId = identifiers[j];
        if (rightId === undefined) continue;
        if (union.find(leftId) === union.find(rightId)) continue;

        const right = byIdentifier.get(rightId) ?? [];
        if (isNearDuplicate(left, right, tokens, threshold)) {
          union.union(leftId, rightId);
        }
      }
    }
  }

  const groups = new Map<string, CandidateGroup>();
  for (const identifier of identifiers) {
    const key = union.find(identifier);
    const members = byIdentifier.get(identifier) ?? [];
    const group = groups.get(key);
    if (group) {
      group.identifiers.push(identifier);
      group.members.push(...members);
    } else {
      groups.set(key, { key, identifiers: [identifier], members: [...members] });
    }
  }

  return [...groups.values()].sort((a, b) => compareIdentifiers(a.key, b.key));
}
