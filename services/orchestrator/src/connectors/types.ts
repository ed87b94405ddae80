/**
 * Source Connector Contract
 */

import type { ContextCandidate, ContextSource } from '@fusionchat/shared-types';

export interface SearchRequest {
  query: string;
  sessionId?: string | undefined;
  /** Restricts results to chunks ingested under this capability */
  capability?: string | undefined;
  /** Aborted when the connector's deadline passes */
  signal?: AbortSignal | undefined;
}

/**
 * One retrieval backend. Scores come back bounded to [0, 1] unless the
 * source is listed for min-max normalization.
 */
export interface SourceConnector {
  readonly source: ContextSource;
  search(request: SearchRequest, limit: number): Promise<ContextCandidate[]>;
  /** False when the backend is not configured; the fan-out then skips it */
  isAvailable?(): boolean;
}
