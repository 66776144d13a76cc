import { TRANSPORT_FAILURE_STATUS } from '../status-catalog';

export interface BlockingSettings {
  /** Consecutive blocking outcomes needed to block */
  readonly failureThreshold: number;
  /** Statuses meaning the target rejected the proxy itself, e.g. 403 */
  readonly blockingStatuses: readonly number[];
  /** Whether every 5xx counts as a blocking status */
  readonly blockServerErrors: boolean;
  /** Statuses that block on first sight */
  readonly fatalStatuses: readonly number[];
  /** Failure share of the window that blocks, in [0, 1] */
  readonly maxFailureRatio: number;
  /** Reports the window must hold before the ratio rule applies */
  readonly minSamples: number;
}

export interface OutcomeHistory {
  /** Newest first; the head is the outcome just reported */
  readonly recent: readonly number[];
  readonly windowTotal: number;
  readonly windowFailures: number;
}

export enum BlockingReason {
  TransportFailure = 'transport_failure',
  RepeatedFailures = 'repeated_failures',
  FailureRatio = 'failure_ratio',
}

export type BlockingDecision =
  | { readonly block: false }
  | { readonly block: true; readonly reason: BlockingReason };

export const DEFAULT_BLOCKING_SETTINGS: BlockingSettings = {
  failureThreshold: 3,
  blockingStatuses: [403, 407, 429],
  blockServerErrors: true,
  fatalStatuses: [TRANSPORT_FAILURE_STATUS],
  maxFailureRatio: 0.9,
  minSamples: 20,
};

export function isFailureStatus(statusCode: number): boolean {
  return statusCode >= 400 || statusCode === TRANSPORT_FAILURE_STATUS;
}

function isBlockingStatus(
  statusCode: number,
  settings: BlockingSettings,
): boolean {
  if (settings.fatalStatuses.includes(statusCode)) return true;
  if (settings.blockingStatuses.includes(statusCode)) return true;
  return settings.blockServerErrors && statusCode >= 500 && statusCode < 600;
}

function leadingRun(
  recent: readonly number[],
  settings: BlockingSettings,
): number {
  let run = 0;
  for (const statusCode of recent) {
    if (!isBlockingStatus(statusCode, settings)) break;
    run += 1;
  }
  return run;
}

/**
 * Decides whether a proxy should be blocked after its latest report.
 *
 * Only ever says "block": a success never unblocks, that is left to the
 * staleness reconciler or an operator.
 */
export function evaluateBlocking(
  history: OutcomeHistory,
  settings: BlockingSettings,
): BlockingDecision {
  const [latest] = history.recent;
  if (latest === undefined || !isFailureStatus(latest)) {
    return { block: false };
  }

  if (settings.fatalStatuses.includes(latest)) {
    return { block: true, reason: BlockingReason.TransportFailure };
  }

  if (leadingRun(history.recent, settings) >= settings.failureThreshold) {
    return { block: true, reason: BlockingReason.RepeatedFailures };
  }

  if (
    history.windowTotal > 0 &&
    history.windowTotal >= settings.minSamples &&
    history.windowFailures / history.windowTotal >= settings.maxFailureRatio
  ) {
    return { block: true, reason: BlockingReason.FailureRatio };
  }

  return { block: false };
}
