export const USAGE_STATISTIC_STORE = 'USAGE_STATISTIC_STORE';

export interface OutcomeCount {
  readonly statusCode: number;
  readonly count: number;
}

export interface UsageStatisticRecord {
  readonly proxyId: number;
  readonly statusCode: number;
  readonly description: string;
  readonly counter: number;
  readonly lastReportedAt: Date;
}

/**
 * # Outcome history of proxies
 *
 * Owned by the health tracker; selection never writes here.
 */
export interface UsageStatisticStore {
  isKnownStatus(statusCode: number): Promise<boolean>;

  /** Bumps the (proxy, status) counter and logs the report, atomically */
  recordOutcome(
    proxyId: number,
    statusCode: number,
    reportedAt: Date,
  ): Promise<void>;

  /** Status codes of the latest reports, newest first */
  recentOutcomes(proxyId: number, limit: number): Promise<number[]>;

  /** Reports per status code at or after `since` */
  outcomeCountsSince(proxyId: number, since: Date): Promise<OutcomeCount[]>;

  /** Counters per status code, ordered by status code */
  statistics(proxyId: number): Promise<UsageStatisticRecord[]>;
}
