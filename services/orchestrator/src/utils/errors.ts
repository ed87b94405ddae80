/**
 * Error Handling Utilities
 * Error types and type-safe helpers for catch blocks and API responses
 */

/**
 * Invalid startup configuration. The only error that stops the process.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration errors: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * A source connector did not answer within its deadline
 */
export class ConnectorTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(source: string, timeoutMs: number) {
    super(`${source} connector timed out after ${timeoutMs}ms`);
    this.name = 'ConnectorTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Rejected ingestion input (empty, oversized)
 */
export class IngestionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IngestionError';
  }
}

/**
 * Extract a human-readable message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}
