import { Clock, CLOCK, secondsBetween } from '@common/time';
import {
  PROXY_RECORD_STORE,
  ProxyRecordStore,
} from '@modules/pool/interfaces/proxy-record-store.interface';
import { SourceNotFoundAppError } from '@modules/pool/errors/source-not-found.app-error';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ReconciliationConfig } from '../reconciliation.config';

export interface ReconcileOutcome {
  readonly sourceId: number;
  readonly stale: boolean;
  readonly unblocked: number;
  /** Seconds since the newest touch, null for a source without proxies */
  readonly idleSec: number | null;
}

/**
 * Staleness Reconciler
 *
 * When nothing of a source was assigned or blocked for `staleAfterSec`,
 * traffic for it has most likely stalled because every proxy got blocked.
 * The whole set is then unblocked and given a fresh chance.
 */
@Injectable()
export class StalenessReconcilerService {
  private readonly logger = new Logger(StalenessReconcilerService.name);

  constructor(
    @Inject(PROXY_RECORD_STORE)
    private readonly store: ProxyRecordStore,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly config: ReconciliationConfig,
  ) {}

  async reconcileSource(
    sourceId: number,
    now: Date = this.clock.now(),
    staleAfterSec: number = this.config.staleAfterSec,
  ): Promise<ReconcileOutcome> {
    const lastTouch = await this.store.mostRecentTouch(sourceId);
    if (!lastTouch) {
      if (!(await this.store.sourceExists(sourceId))) {
        throw new SourceNotFoundAppError(sourceId);
      }
      return { sourceId, stale: false, unblocked: 0, idleSec: null };
    }

    const idleSec = secondsBetween(lastTouch, now);
    if (idleSec <= staleAfterSec) {
      return { sourceId, stale: false, unblocked: 0, idleSec };
    }

    const unblocked = await this.store.unblockAllForSource(sourceId);
    if (unblocked > 0) {
      this.logger.log(
        `Source ${sourceId} idle for ${Math.round(idleSec)}s, unblocked ${unblocked} proxy(ies)`,
      );
    }

    return { sourceId, stale: true, unblocked, idleSec };
  }
}
