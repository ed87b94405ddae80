/**
 * Fusion & Retrieval Configuration
 * Loaded once at startup, validated, frozen and passed explicitly to the engine
 */

import {
  CONTEXT_SOURCES,
  isContextSource,
  parseFloatEnv,
  parseIntEnv,
  parseListEnv,
  type ContextSource,
  type FusionConfig,
} from '@fusionchat/shared-types';
import { ConfigurationError } from '../utils/errors.js';

type Env = Record<string, string | undefined>;

/**
 * Canonical weight table. Memory/vector/graph follow the context settings
 * (0.25 / 0.6 / 0.4); conversation history gets the 0.1 of the enhanced table.
 */
export const DEFAULT_SOURCE_WEIGHTS: Readonly<Record<ContextSource, number>> = {
  memory: 0.25,
  vector: 0.6,
  graph: 0.4,
  conversation: 0.1,
};

/**
 * Request-time retrieval settings that sit around the fusion engine
 */
export interface RetrievalSettings {
  readonly enabledSources: readonly ContextSource[];
  /** Candidates requested from each connector */
  readonly perSourceLimit: number;
  readonly connectorTimeoutMs: number;
  readonly connectorTimeouts: Readonly<Partial<Record<ContextSource, number>>>;
  /** Token budget for the assembled context block */
  readonly contextTokenBudget: number;
}

const WEIGHT_ENV_KEYS: Record<ContextSource, string> = {
  memory: 'FUSION_WEIGHT_MEMORY',
  vector: 'FUSION_WEIGHT_VECTOR',
  graph: 'FUSION_WEIGHT_GRAPH',
  conversation: 'FUSION_WEIGHT_CONVERSATION',
};

function parseSourceList(key: string, fallback: ContextSource[], env: Env, problems: string[]): ContextSource[] {
  const sources: ContextSource[] = [];
  for (const entry of parseListEnv(key, fallback, env)) {
    const name = entry.toLowerCase();
    if (!isContextSource(name)) {
      problems.push(`${key} contains unknown source "${entry}"`);
      continue;
    }
    if (!sources.includes(name)) {
      sources.push(name);
    }
  }
  // keep canonical order regardless of how the list was written
  return CONTEXT_SOURCES.filter((source) => sources.includes(source));
}

function parseThreshold(env: Env, problems: string[]): number | null {
  const raw = env['FUSION_DEDUP_THRESHOLD']?.trim().toLowerCase();
  if (!raw || raw === 'off' || raw === 'none' || raw === 'disabled') {
    return null;
  }

  const threshold = Number(raw);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    problems.push(`FUSION_DEDUP_THRESHOLD must be in [0, 1] or "off" (got "${raw}")`);
    return null;
  }
  return threshold;
}

/**
 * Load the fusion configuration from environment variables
 * @throws ConfigurationError when any value is invalid
 */
export function loadFusionConfig(env: Env = process.env): FusionConfig {
  const problems: string[] = [];

  const sourceWeights: Partial<Record<ContextSource, number>> = {};
  for (const source of CONTEXT_SOURCES) {
    const key = WEIGHT_ENV_KEYS[source];
    const raw = env[key];
    const weight = raw === undefined || raw.trim() === '' ? DEFAULT_SOURCE_WEIGHTS[source] : Number(raw);
    if (!Number.isFinite(weight) || weight < 0) {
      problems.push(`${key} must be a non-negative number (got "${raw ?? ''}")`);
      continue;
    }
    sourceWeights[source] = weight;
  }

  const totalWeight = Object.values(sourceWeights).reduce((sum: number, weight) => sum + (weight ?? 0), 0);
  if (problems.length === 0 && totalWeight <= 0) {
    problems.push('Fusion weights must sum to a positive value');
  }

  const maxContextItems = parseIntEnv('MAX_CONTEXT_ITEMS', 8, env);
  if (maxContextItems < 1) {
    problems.push(`MAX_CONTEXT_ITEMS must be at least 1 (got ${maxContextItems})`);
  }

  const dedupSimilarityThreshold = parseThreshold(env, problems);
  const minMaxSources = parseSourceList('FUSION_MINMAX_SOURCES', [], env, problems);

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return Object.freeze({
    sourceWeights: Object.freeze(sourceWeights),
    maxContextItems,
    dedupSimilarityThreshold,
    minMaxSources: Object.freeze(minMaxSources),
  });
}

/**
 * Load connector fan-out and context budget settings
 * @throws ConfigurationError when any value is invalid
 */
export function loadRetrievalSettings(env: Env = process.env): RetrievalSettings {
  const problems: string[] = [];

  const enabledSources = parseSourceList('ENABLED_SOURCES', [...CONTEXT_SOURCES], env, problems);
  const perSourceLimit = parseIntEnv('PER_SOURCE_LIMIT', 8, env);
  const connectorTimeoutMs = parseIntEnv('CONNECTOR_TIMEOUT_MS', 3000, env);
  const contextTokenBudget = parseIntEnv('CONTEXT_TOKEN_BUDGET', 2000, env);

  if (perSourceLimit < 1) {
    problems.push(`PER_SOURCE_LIMIT must be at least 1 (got ${perSourceLimit})`);
  }
  if (connectorTimeoutMs < 1) {
    problems.push(`CONNECTOR_TIMEOUT_MS must be positive (got ${connectorTimeoutMs})`);
  }
  if (contextTokenBudget < 0) {
    problems.push(`CONTEXT_TOKEN_BUDGET must not be negative (got ${contextTokenBudget})`);
  }

  const connectorTimeouts: Partial<Record<ContextSource, number>> = {};
  for (const source of CONTEXT_SOURCES) {
    const key = `CONNECTOR_TIMEOUT_${source.toUpperCase()}_MS`;
    if (env[key] === undefined) continue;
    const timeout = parseFloatEnv(key, connectorTimeoutMs, env);
    if (timeout <= 0) {
      problems.push(`${key} must be positive (got ${timeout})`);
      continue;
    }
    connectorTimeouts[source] = timeout;
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return Object.freeze({
    enabledSources: Object.freeze(enabledSources),
    perSourceLimit,
    connectorTimeoutMs,
    connectorTimeouts: Object.freeze(connectorTimeouts),
    contextTokenBudget,
  });
}
