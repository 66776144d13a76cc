import catalog from './data/status-outcomes.json';

export interface StatusOutcome {
  readonly code: number;
  readonly description: string;
}

/**
 * Reported by a caller when the proxy did not carry the request at all
 * (refused connection, tunnel failure, timeout before any response).
 */
export const TRANSPORT_FAILURE_STATUS = 0;

/** Reference rows of `status_outcomes`, seeded by migration */
export const STATUS_CATALOG: readonly StatusOutcome[] = catalog;
