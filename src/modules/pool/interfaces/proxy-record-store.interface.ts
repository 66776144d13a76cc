export const PROXY_RECORD_STORE = 'PROXY_RECORD_STORE';

export interface ProxyRecord {
  readonly id: number;
  readonly address: string;
  readonly sourceId: number;
  readonly providerId: number | null;
  readonly priority: number;
  readonly blocked: boolean;
  readonly usageCooldownSec: number;
  readonly lastTouched: Date;
}

export type MarkAssignedResult =
  | { readonly assigned: true; readonly proxy: ProxyRecord }
  | { readonly assigned: false; readonly reason: 'conflict' | 'not_found' };

export interface PoolSize {
  readonly sourceId: number;
  readonly total: number;
  readonly blocked: number;
  /** Unblocked proxies, whether or not they are in cooldown */
  readonly eligible: number;
}

/**
 * # Durable table of proxies
 *
 * Every mutating call is atomic for the row (or, for
 * `unblockAllForSource`, the source's batch of rows) it touches.
 * Connectivity failures surface as `StoreUnavailableAppError`.
 */
export interface ProxyRecordStore {
  get(id: number): Promise<ProxyRecord | null>;

  /** Unblocked proxies of the source, priority desc then id asc */
  listEligible(sourceId: number, limit: number): Promise<ProxyRecord[]>;

  /**
   * Compare-and-update: sets `lastTouched = now` only when the proxy is not
   * blocked and `now - lastTouched >= usageCooldownSec`.
   */
  markAssigned(id: number, now: Date): Promise<MarkAssignedResult>;

  /** Also moves `lastTouched` to `now`. False when the proxy does not exist */
  setBlocked(id: number, blocked: boolean, now: Date): Promise<boolean>;

  /** Leaves `lastTouched` as is. Returns how many proxies changed */
  unblockAllForSource(sourceId: number): Promise<number>;

  /** Newest `lastTouched` among all proxies of the source, blocked or not */
  mostRecentTouch(sourceId: number): Promise<Date | null>;

  listSourceIds(): Promise<number[]>;

  sourceExists(sourceId: number): Promise<boolean>;

  /** Proxy counts of every source, sources without proxies included */
  poolSizes(): Promise<PoolSize[]>;
}
