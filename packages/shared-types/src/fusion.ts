/**
 * Context Fusion Types
 * Shared model for retrieval candidates, fused context and the fusion configuration
 */

/**
 * Retrieval backends that feed the fusion engine
 */
export type ContextSource = 'memory' | 'vector' | 'graph' | 'conversation';

/**
 * Canonical source order. Anything that iterates over sources uses this order
 * so results never depend on object key or completion order.
 */
export const CONTEXT_SOURCES: readonly ContextSource[] = ['memory', 'vector', 'graph', 'conversation'];

/**
 * Display labels for explainability output ("Vector: 3, Graph: 1")
 */
export const CONTEXT_SOURCE_LABELS: Readonly<Record<ContextSource, string>> = {
  memory: 'Memory',
  vector: 'Vector',
  graph: 'Graph',
  conversation: 'Conversation',
};

/**
 * A single retrieved item before fusion
 */
export interface ContextCandidate {
  /** Stable key (chunk id, concept name, memory id). Unique per source only */
  identifier: string;
  source: ContextSource;
  /** Source-local score, bounded to [0, 1] by the connector */
  rawScore: number;
  /** Text payload shown to the LLM */
  content: string;
  /** Capability tag, timestamps, relationship strength, confidence... */
  metadata: Record<string, unknown>;
}

/**
 * A post-fusion context item
 */
export interface FusedContextItem {
  identifier: string;
  content: string;
  metadata: Record<string, unknown>;
  /** Source of the candidate whose content was kept */
  source: ContextSource;
  fusedScore: number;
  /** Canonical order, no repeats */
  contributingSources: ContextSource[];
  /** Normalized score each contributing source added to the sum (before weighting) */
  sourceScores: Partial<Record<ContextSource, number>>;
  /** Every identifier collapsed into this item, ascending */
  mergedIdentifiers: string[];
}

/**
 * Candidates keyed by the source that produced them.
 * A missing key and an empty list mean the same thing.
 */
export type CandidatesBySource = Partial<Record<ContextSource, readonly ContextCandidate[]>>;

/**
 * Process-wide fusion configuration, immutable after startup
 */
export interface FusionConfig {
  /** Multiplicative coefficients; need not sum to 1. Missing source = weight 0 */
  readonly sourceWeights: Readonly<Partial<Record<ContextSource, number>>>;
  /** Upper bound on the fused result size (>= 1) */
  readonly maxContextItems: number;
  /** Token-overlap ratio in [0, 1] for near-duplicate collapsing, null when disabled */
  readonly dedupSimilarityThreshold: number | null;
  /** Sources whose connectors do not bound scores; rescaled per batch with min-max */
  readonly minMaxSources: readonly ContextSource[];
}

/**
 * Rendered, size-bounded context block for the LLM prompt
 */
export interface PromptFragment {
  text: string;
  items: FusedContextItem[];
  /** Identifiers left out because the budget ran out */
  omitted: string[];
  tokenEstimate: number;
  tokenBudget: number;
}

/**
 * Outcome of one connector call during fan-out
 */
export type ConnectorStatus = 'ok' | 'error' | 'timeout' | 'skipped';

export interface ConnectorReport {
  source: ContextSource;
  status: ConnectorStatus;
  candidateCount: number;
  latencyMs: number;
  error?: string;
}

/**
 * Finished fan-in result handed to the fusion engine
 */
export interface CandidateSnapshot {
  readonly candidates: Readonly<CandidatesBySource>;
  readonly reports: readonly ConnectorReport[];
}
