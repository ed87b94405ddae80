/**
 * Connector Fan-out / Fan-in
 *
 * Queries every enabled connector concurrently, each under its own deadline,
 * and waits for all of them before handing back one frozen snapshot.
 * A failing or slow connector contributes an empty list and a report entry;
 * it never fails the request.
 */

import {
  CONTEXT_SOURCES,
  type CandidateSnapshot,
  type CandidatesBySource,
  type ConnectorReport,
  type ContextCandidate,
  type ContextSource,
} from '@fusionchat/shared-types';
import { ConnectorTimeoutError, getErrorMessage } from '../utils/errors.js';
import { createLogger, logError } from '../utils/logger.js';
import type { SearchRequest, SourceConnector } from './types.js';

const log = createLogger('FanOut');

export interface FanOutOptions {
  /** Candidates requested from each connector */
  limit: number;
  /** Default deadline per connector */
  timeoutMs: number;
  /** Per-source deadline overrides */
  timeouts?: Readonly<Partial<Record<ContextSource, number>>>;
  /** Sources to query; all when omitted */
  enabledSources?: readonly ContextSource[];
}

type ConnectorOutcome =
  | { kind: 'ok'; candidates: ContextCandidate[] }
  | { kind: 'error'; error: unknown }
  | { kind: 'timeout'; error: ConnectorTimeoutError };

function runWithDeadline(
  connector: SourceConnector,
  request: Omit<SearchRequest, 'signal'>,
  limit: number,
  timeoutMs: number
): Promise<ConnectorOutcome> {
  const controller = new AbortController();

  return new Promise<ConnectorOutcome>((resolve) => {
    const timer = setTimeout(() => {
      const error = new ConnectorTimeoutError(connector.source, timeoutMs);
      controller.abort(error);
      resolve({ kind: 'timeout', error });
    }, timeoutMs);

    // Whichever settles first wins; later settlements are ignored
    void Promise.resolve()
      .then(() => connector.search({ ...request, signal: controller.signal }, limit))
      .then(
        (candidates) => {
          clearTimeout(timer);
          resolve({ kind: 'ok', candidates });
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (controller.signal.aborted) {
            log.debug(`${connector.source} connector settled after its deadline`, {
              error: getErrorMessage(error),
            });
          }
          resolve({ kind: 'error', error });
        }
      );
  });
}

async function gatherOne(
  source: ContextSource,
  connector: SourceConnector | undefined,
  enabled: boolean,
  request: Omit<SearchRequest, 'signal'>,
  options: FanOutOptions
): Promise<{ candidates: ContextCandidate[]; report: ConnectorReport }> {
  if (!connector || !enabled) {
    return { candidates: [], report: { source, status: 'skipped', candidateCount: 0, latencyMs: 0 } };
  }

  let available = true;
  try {
    available = connector.isAvailable?.() ?? true;
  } catch (error) {
    logError(log, `${source} connector availability check failed`, error);
    return {
      candidates: [],
      report: { source, status: 'error', candidateCount: 0, latencyMs: 0, error: getErrorMessage(error) },
    };
  }
  if (!available) {
    return { candidates: [], report: { source, status: 'skipped', candidateCount: 0, latencyMs: 0 } };
  }

  const timeoutMs = options.timeouts?.[source] ?? options.timeoutMs;
  const startTime = Date.now();
  const outcome = await runWithDeadline(connector, request, options.limit, timeoutMs);
  const latencyMs = Date.now() - startTime;

  switch (outcome.kind) {
    case 'ok':
      return {
        candidates: outcome.candidates,
        report: { source, status: 'ok', candidateCount: outcome.candidates.length, latencyMs },
      };
    case 'timeout':
      log.warn(`${source} connector timed out after ${timeoutMs}ms`);
      return {
        candidates: [],
        report: { source, status: 'timeout', candidateCount: 0, latencyMs, error: outcome.error.message },
      };
    case 'error':
      logError(log, `${source} connector failed`, outcome.error, { latencyMs });
      return {
        candidates: [],
        report: { source, status: 'error', candidateCount: 0, latencyMs, error: getErrorMessage(outcome.error) },
      };
  }
}

/**
 * Query all connectors and collect their candidates.
 * Reports come back in canonical source order, one per source.
 */
export async function gatherCandidates(
  connectors: readonly SourceConnector[],
  request: Omit<SearchRequest, 'signal'>,
  options: FanOutOptions
): Promise<CandidateSnapshot> {
  const bySource = new Map<ContextSource, SourceConnector>();
  for (const connector of connectors) {
    bySource.set(connector.source, connector);
  }

  const results = await Promise.all(
    CONTEXT_SOURCES.map((source) =>
      gatherOne(
        source,
        bySource.get(source),
        options.enabledSources ? options.enabledSources.includes(source) : true,
        request,
        options
      )
    )
  );

  const candidates: CandidatesBySource = {};
  CONTEXT_SOURCES.forEach((source, index) => {
    const result = results[index];
    if (result && result.candidates.length > 0) {
      candidates[source] = Object.freeze([...result.candidates]);
    }
  });

  const reports = results.map((result) => Object.freeze({ ...result.report }));

  log.debug('Fan-in complete', {
    reports: reports.map((report) => `${report.source}:${report.status}:${report.candidateCount}`),
  });

  return Object.freeze({
    candidates: Object.freeze(candidates),
    reports: Object.freeze(reports),
  });
}
