/**
 * Fusion Engine Tests
 * Ranking, weighting, grouping and validation behaviour of fuse()
 */

import { describe, it, expect } from 'vitest';
import type { ContextCandidate, ContextSource, FusionConfig } from '@fusionchat/shared-types';
import { fuse, fuseWithReport, summarizeSources, formatSourceSummary } from '../engine.js';

function candidate(
  source: ContextSource,
  identifier: string,
  rawScore: number,
  content = `content of ${identifier}`,
  metadata: Record<string, unknown> = {}
): ContextCandidate {
  return { identifier, source, rawScore, content, metadata };
}

function createConfig(overrides: Partial<FusionConfig> = {}): FusionConfig {
  return {
    sourceWeights: { memory: 0.25, vector: 0.6, graph: 0.4, conversation: 0.1 },
    maxContextItems: 8,
    dedupSimilarityThreshold: null,
    minMaxSources: [],
    ...overrides,
  };
}

describe('fuse', () => {
  it('should return an empty list when no source produced candidates', () => {
    expect(fuse({}, createConfig())).toEqual([]);
    expect(fuse({ memory: [], vector: [], graph: [], conversation: [] }, createConfig())).toEqual([]);
  });

  it('should rank a single source by score and truncate to maxContextItems', () => {
    const items = fuse(
      {
        vector: [candidate('vector', 'c', 0.2), candidate('vector', 'a', 0.9), candidate('vector', 'b', 0.5)],
      },
      createConfig({ maxContextItems: 2 })
    );

    expect(items.map((item) => item.identifier)).toEqual(['a', 'b']);
    expect(items[0]?.fusedScore).toBeCloseTo(0.54, 10);
    expect(items[1]?.fusedScore).toBeCloseTo(0.3, 10);
    expect(items[0]?.contributingSources).toEqual(['vector']);
  });

  it('should sum weighted scores when two sources return the same identifier', () => {
    const items = fuse(
      {
        memory: [candidate('memory', 'doc-1:0', 0.4, 'memory text')],
        vector: [candidate('vector', 'doc-1:0', 0.8, 'vector text')],
      },
      createConfig()
    );

    expect(items).toHaveLength(1);
    const [item] = items;
    expect(item?.fusedScore).toBeCloseTo(0.58, 10);
    expect(item?.contributingSources).toEqual(['memory', 'vector']);
    expect(item?.sourceScores).toEqual({ memory: 0.4, vector: 0.8 });
    // vector contributes 0.48 against memory's 0.1
    expect(item?.content).toBe('vector text');
    expect(item?.source).toBe('vector');
    expect(item?.mergedIdentifiers).toEqual(['doc-1:0']);
  });

  it('should let corroboration across sources outrank a single stronger hit', () => {
    const items = fuse(
      {
        vector: [candidate('vector', 'A', 0.75), candidate('vector', 'B', 0.5)],
        graph: [candidate('graph', 'B', 0.5)],
      },
      createConfig()
    );

    expect(items.map((item) => item.identifier)).toEqual(['B', 'A']);
    expect(items[0]?.fusedScore).toBeCloseTo(0.5, 10);
    expect(items[1]?.fusedScore).toBeCloseTo(0.45, 10);
  });

  it('should prefer more contributing sources when fused scores tie', () => {
    const config = createConfig({ sourceWeights: { memory: 0.5, vector: 0.5 } });
    const items = fuse(
      {
        memory: [candidate('memory', 'b-corroborated', 0.4)],
        vector: [candidate('vector', 'b-corroborated', 0.4), candidate('vector', 'a-single', 0.8)],
      },
      config
    );

    expect(items.map((item) => item.identifier)).toEqual(['b-corroborated', 'a-single']);
    expect(items[0]?.fusedScore).toBe(items[1]?.fusedScore);
  });

  it('should break remaining ties by identifier', () => {
    const items = fuse(
      { graph: [candidate('graph', 'zeta', 0.5), candidate('graph', 'alpha', 0.5), candidate('graph', 'mu', 0.5)] },
      createConfig()
    );

    expect(items.map((item) => item.identifier)).toEqual(['alpha', 'mu', 'zeta']);
  });

  it('should produce identical output regardless of candidate order', () => {
    const memory = [candidate('memory', 'doc-2:1', 0.7), candidate('memory', 'memory:42', 0.3)];
    const vector = [candidate('vector', 'doc-2:1', 0.6), candidate('vector', 'doc-3:0', 0.9), candidate('vector', 'doc-4:2', 0.1)];
    const graph = [candidate('graph', 'doc-3:0', 0.5), candidate('graph', 'doc-4:2', 1)];

    const first = fuse({ memory, vector, graph }, createConfig());
    const second = fuse(
      { graph: [...graph].reverse(), vector: [...vector].reverse(), memory: [...memory].reverse() },
      createConfig()
    );

    expect(second).toEqual(first);
  });

  it('should keep the best score when a source repeats an identifier', () => {
    const items = fuse(
      { vector: [candidate('vector', 'doc-1:0', 0.3), candidate('vector', 'doc-1:0', 0.7)] },
      createConfig()
    );

    expect(items).toHaveLength(1);
    expect(items[0]?.sourceScores).toEqual({ vector: 0.7 });
    expect(items[0]?.fusedScore).toBeCloseTo(0.42, 10);
  });

  it('should never return duplicate identifiers or exceed the bounds', () => {
    const config = createConfig({ maxContextItems: 3 });
    const items = fuse(
      {
        memory: [candidate('memory', 'x', 1), candidate('memory', 'y', 0.2)],
        vector: [candidate('vector', 'x', 1), candidate('vector', 'z', 0.9), candidate('vector', 'w', 0.1)],
        graph: [candidate('graph', 'x', 1), candidate('graph', 'y', 0.6)],
        conversation: [candidate('conversation', 'x', 1)],
      },
      config
    );

    const identifiers = items.map((item) => item.identifier);
    expect(new Set(identifiers).size).toBe(identifiers.length);
    expect(items).toHaveLength(3);
    for (const item of items) {
      expect(item.fusedScore).toBeGreaterThanOrEqual(0);
      expect(item.fusedScore).toBeLessThanOrEqual(1.35 + 1e-9);
    }
    expect(items[0]?.identifier).toBe('x');
    expect(items[0]?.contributingSources).toEqual(['memory', 'vector', 'graph', 'conversation']);
  });

  it('should not move an item down when its source weight increases', () => {
    const positions = [0.1, 0.4, 0.8, 1.6].map((graphWeight) => {
      const items = fuse(
        {
          vector: [candidate('vector', 'vector-hit', 0.5)],
          graph: [candidate('graph', 'graph-hit', 0.6)],
        },
        createConfig({ sourceWeights: { vector: 0.6, graph: graphWeight } })
      );
      return items.findIndex((item) => item.identifier === 'graph-hit');
    });

    expect(positions).toEqual([1, 1, 0, 0]);
  });

  it('should treat a source without a weight as contributing zero', () => {
    const items = fuse(
      { conversation: [candidate('conversation', 'conversation:s1:m1', 0.9)] },
      createConfig({ sourceWeights: { vector: 1 } })
    );

    expect(items).toHaveLength(1);
    expect(items[0]?.fusedScore).toBe(0);
  });

  it('should not mutate the input candidates', () => {
    const metadata = { capability: 'LENDING' };
    const input = Object.freeze([Object.freeze(candidate('vector', 'doc-1:0', 0.5, 'text', metadata))]);

    const items = fuse({ vector: input }, createConfig());

    expect(items[0]?.metadata).toEqual({ capability: 'LENDING' });
    expect(items[0]?.metadata).not.toBe(metadata);
  });
});

describe('fuseWithReport', () => {
  it('should reject malformed, mismatched and out-of-range candidates individually', () => {
    const report = fuseWithReport(
      {
        vector: [
          candidate('vector', '', 0.9),
          candidate('vector', 'doc-1:0', 1.5),
          candidate('vector', 'doc-2:0', Number.NaN),
          candidate('vector', 'doc-3:0', 0.4),
        ],
        graph: [candidate('memory', 'doc-4:0', 0.8), candidate('graph', 'doc-5:0', 0.5)],
      },
      createConfig()
    );

    expect(report.items.map((item) => item.identifier)).toEqual(['doc-3:0', 'doc-5:0']);
    expect(report.rejected).toEqual([
      { source: 'vector', identifier: '', reason: 'malformed' },
      { source: 'vector', identifier: 'doc-1:0', reason: 'out-of-range' },
      { source: 'vector', identifier: 'doc-2:0', reason: 'malformed' },
      { source: 'graph', identifier: 'doc-4:0', reason: 'source-mismatch' },
    ]);
    expect(report.acceptedCount).toBe(2);
    expect(report.groupCount).toBe(2);
  });

  it('should rescale min-max sources over the batch', () => {
    const report = fuseWithReport(
      { graph: [candidate('graph', 'high', 10), candidate('graph', 'mid', 5), candidate('graph', 'low', 0)] },
      createConfig({ minMaxSources: ['graph'] })
    );

    expect(report.rejected).toEqual([]);
    expect(report.items.map((item) => item.sourceScores.graph)).toEqual([1, 0.5, 0]);
    expect(report.items[0]?.fusedScore).toBeCloseTo(0.4, 10);
    expect(report.items[1]?.fusedScore).toBeCloseTo(0.2, 10);
  });

  it('should map a min-max batch with equal scores to 1', () => {
    const report = fuseWithReport(
      { graph: [candidate('graph', 'a', 7), candidate('graph', 'b', 7)] },
      createConfig({ minMaxSources: ['graph'] })
    );

    expect(report.items.map((item) => item.sourceScores.graph)).toEqual([1, 1]);
  });

  it('should keep extreme min-max scores finite and ordered', () => {
    const report = fuseWithReport(
      {
        vector: [
          candidate('vector', 'a', 1e308),
          candidate('vector', 'b', -1e308),
          candidate('vector', 'c', 0),
        ],
      },
      createConfig({
        sourceWeights: { memory: 0, vector: 1, graph: 0, conversation: 0 },
        minMaxSources: ['vector'],
      })
    );

    expect(report.items.map((item) => [item.identifier, item.fusedScore])).toEqual([
      ['a', 1],
      ['c', 0.5],
      ['b', 0],
    ]);
  });

  it('should reject unbounded scores from sources that are not min-max normalized', () => {
    const report = fuseWithReport({ graph: [candidate('graph', 'high', 10)] }, createConfig());

    expect(report.items).toEqual([]);
    expect(report.rejected).toEqual([{ source: 'graph', identifier: 'high', reason: 'out-of-range' }]);
  });
});

describe('fuse with near-duplicate collapsing', () => {
  const text = 'Loan disbursement requires an approved credit limit';

  it('should merge near-identical content from different sources under the smallest identifier', () => {
    const items = fuse(
      {
        vector: [candidate('vector', 'doc-b:0', 0.8, text)],
        graph: [candidate('graph', 'doc-a:3', 0.5, text)],
      },
      createConfig({ dedupSimilarityThreshold: 0.5 })
    );

    expect(items).toHaveLength(1);
    expect(items[0]?.identifier).toBe('doc-a:3');
    expect(items[0]?.mergedIdentifiers).toEqual(['doc-a:3', 'doc-b:0']);
    expect(items[0]?.contributingSources).toEqual(['vector', 'graph']);
    expect(items[0]?.source).toBe('vector');
    expect(items[0]?.fusedScore).toBeCloseTo(0.68, 10);
  });

  it('should keep same-source near duplicates apart', () => {
    const items = fuse(
      { vector: [candidate('vector', 'doc-a:0', 0.8, text), candidate('vector', 'doc-b:0', 0.7, text)] },
      createConfig({ dedupSimilarityThreshold: 0.5 })
    );

    expect(items.map((item) => item.identifier)).toEqual(['doc-a:0', 'doc-b:0']);
  });

  it('should leave distinct identifiers alone when collapsing is disabled', () => {
    const items = fuse(
      {
        vector: [candidate('vector', 'doc-b:0', 0.8, text)],
        graph: [candidate('graph', 'doc-a:3', 0.5, text)],
      },
      createConfig()
    );

    expect(items.map((item) => item.identifier)).toEqual(['doc-b:0', 'doc-a:3']);
  });
});

describe('summarizeSources', () => {
  it('should count items per contributing source', () => {
    const items = fuse(
      {
        vector: [candidate('vector', 'a', 0.9), candidate('vector', 'b', 0.8), candidate('vector', 'c', 0.7)],
        graph: [candidate('graph', 'a', 0.5)],
      },
      createConfig()
    );

    const counts = summarizeSources(items);
    expect(counts).toEqual({ memory: 0, vector: 3, graph: 1, conversation: 0 });
    expect(formatSourceSummary(counts)).toBe('Vector: 3, Graph: 1');
  });

  it('should describe an empty result as none', () => {
    expect(formatSourceSummary(summarizeSources([]))).toBe('none');
  });
});
