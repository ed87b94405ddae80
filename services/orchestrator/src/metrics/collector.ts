/**
 * Metrics Collector
 * Daily chat counters in Redis, a derived snapshot for /metrics and dependency health checks
 */

import type { ConnectorReport, ContextSource } from '@fusionchat/shared-types';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, logError } from '../utils/logger.js';

const log = createLogger('Metrics');

const STATS_TTL_SECONDS = 30 * 24 * 60 * 60;

export type LlmMode = 'live' | 'demo' | 'fallback';

/**
 * Redis commands the collector uses (ioredis satisfies this)
 */
export interface MetricsBackend {
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  expire(key: string, seconds: number): Promise<number>;
}

export interface ChatMetrics {
  latencyMs: number;
  llmMode: LlmMode;
  tokensUsed: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
  contextItems: number;
  reports: readonly ConnectorReport[];
}

export interface ConnectorCounters {
  errors: number;
  timeouts: number;
}

export interface MetricsSnapshot {
  date: string;
  chats: number;
  avgLatencyMs: number;
  avgContextItems: number;
  tokensUsed: number;
  /** Share of cached prompt tokens that were reads (0-100) */
  cacheHitRate: number;
  llmModes: Record<LlmMode, number>;
  connectors: Record<ContextSource, ConnectorCounters>;
  uptime: number;
}

export interface HealthCheck {
  name: string;
  check(): Promise<boolean>;
}

export interface HealthCheckResult {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message?: string;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  checks: HealthCheckResult[];
}

export interface MetricsCollectorOptions {
  healthChecks?: HealthCheck[];
  now?: () => number;
}

export function getStatsKey(timestamp: number): string {
  return `STATS:chat:${new Date(timestamp).toISOString().slice(0, 10)}`;
}

function counter(stats: Record<string, string>, field: string): number {
  const value = parseInt(stats[field] ?? '0', 10);
  return Number.isNaN(value) ? 0 : value;
}

export class MetricsCollector {
  private readonly healthChecks: HealthCheck[];
  private readonly now: () => number;
  private readonly startTime: number;

  constructor(
    private readonly backend: MetricsBackend,
    options: MetricsCollectorOptions = {}
  ) {
    this.healthChecks = options.healthChecks ?? [];
    this.now = options.now ?? Date.now;
    this.startTime = this.now();
  }

  /**
   * Record one answered chat. Failures are logged, never thrown.
   */
  async recordChat(metrics: ChatMetrics): Promise<void> {
    const statsKey = getStatsKey(this.now());

    const increments: Array<[string, number]> = [
      ['chats', 1],
      ['total_latency', Math.round(metrics.latencyMs)],
      ['context_items', metrics.contextItems],
      ['tokens_used', metrics.tokensUsed],
      ['cache_read_tokens', metrics.cacheReadTokens],
      ['cache_write_tokens', metrics.cacheWriteTokens],
      [`llm_${metrics.llmMode}`, 1],
    ];

    for (const report of metrics.reports) {
      if (report.status === 'error') increments.push([`${report.source}_errors`, 1]);
      if (report.status === 'timeout') increments.push([`${report.source}_timeouts`, 1]);
    }

    try {
      await Promise.all(
        increments
          .filter(([, value]) => value !== 0)
          .map(([field, value]) => this.backend.hincrby(statsKey, field, value))
      );
      await this.backend.expire(statsKey, STATS_TTL_SECONDS);
    } catch (error) {
      logError(log, 'Error recording chat metrics', error, { statsKey });
    }
  }

  /**
   * Today's counters with derived averages
   */
  async getMetrics(): Promise<MetricsSnapshot> {
    const now = this.now();
    const statsKey = getStatsKey(now);

    let stats: Record<string, string> = {};
    try {
      stats = await this.backend.hgetall(statsKey);
    } catch (error) {
      logError(log, 'Error reading metrics', error, { statsKey });
    }

    const chats = counter(stats, 'chats');
    const cacheReadTokens = counter(stats, 'cache_read_tokens');
    const totalCacheTokens = cacheReadTokens + counter(stats, 'cache_write_tokens');

    const connectorCounters = (source: ContextSource): ConnectorCounters => ({
      errors: counter(stats, `${source}_errors`),
      timeouts: counter(stats, `${source}_timeouts`),
    });

    return {
      date: statsKey.slice('STATS:chat:'.length),
      chats,
      avgLatencyMs: chats > 0 ? counter(stats, 'total_latency') / chats : 0,
      avgContextItems: chats > 0 ? counter(stats, 'context_items') / chats : 0,
      tokensUsed: counter(stats, 'tokens_used'),
      cacheHitRate: totalCacheTokens > 0 ? (cacheReadTokens / totalCacheTokens) * 100 : 0,
      llmModes: {
        live: counter(stats, 'llm_live'),
        demo: counter(stats, 'llm_demo'),
        fallback: counter(stats, 'llm_fallback'),
      },
      connectors: {
        memory: connectorCounters('memory'),
        vector: connectorCounters('vector'),
        graph: connectorCounters('graph'),
        conversation: connectorCounters('conversation'),
      },
      uptime: Math.floor((now - this.startTime) / 1000),
    };
  }

  /**
   * Run every dependency check. Any failure makes the service unhealthy.
   */
  async getHealthStatus(): Promise<HealthStatus> {
    const checks: HealthCheckResult[] = await Promise.all(
      this.healthChecks.map(async (healthCheck): Promise<HealthCheckResult> => {
        const { name } = healthCheck;
        try {
          return (await healthCheck.check())
            ? { name, status: 'pass' }
            : { name, status: 'fail', message: `${name} check failed` };
        } catch (error) {
          return { name, status: 'fail', message: getErrorMessage(error) };
        }
      })
    );

    const uptime = Math.floor((this.now() - this.startTime) / 1000);
    checks.push(uptime < 60 ? { name: 'uptime', status: 'warn', message: 'Recently started' } : { name: 'uptime', status: 'pass' });

    let status: HealthStatus['status'] = 'healthy';
    if (checks.some((c) => c.status === 'fail')) {
      status = 'unhealthy';
    } else if (checks.some((c) => c.status === 'warn')) {
      status = 'degraded';
    }

    return { status, checks };
  }
}
