import { Clock, CLOCK } from '@common/time';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { PoolExhaustedAppError } from '../errors/pool-exhausted.app-error';
import { SourceNotFoundAppError } from '../errors/source-not-found.app-error';
import { ProxyHandle } from '../interfaces/proxy-handle.interface';
import {
  PROXY_RECORD_STORE,
  ProxyRecord,
  ProxyRecordStore,
} from '../interfaces/proxy-record-store.interface';
import { PoolConfig } from '../pool.config';

function toHandle(proxy: ProxyRecord): ProxyHandle {
  return {
    id: proxy.id,
    address: proxy.address,
    sourceId: proxy.sourceId,
    providerId: proxy.providerId,
    priority: proxy.priority,
    usageCooldownSec: proxy.usageCooldownSec,
    assignedAt: proxy.lastTouched,
  };
}

/**
 * Selection Engine
 * Hands out the best unblocked proxy of a source whose cooldown has elapsed
 */
@Injectable()
export class SelectionEngineService {
  private readonly logger = new Logger(SelectionEngineService.name);

  constructor(
    @Inject(PROXY_RECORD_STORE)
    private readonly store: ProxyRecordStore,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly config: PoolConfig,
  ) {}

  /**
   * Walk eligible candidates in priority order and claim the first one the
   * store lets us assign. A lost race on a candidate (conflict) just moves
   * on to the next. Never waits for a cooldown to pass.
   */
  async acquire(sourceId: number): Promise<ProxyHandle> {
    const candidates = await this.store.listEligible(
      sourceId,
      this.config.candidateLimit,
    );

    if (candidates.length === 0 && !(await this.store.sourceExists(sourceId))) {
      throw new SourceNotFoundAppError(sourceId);
    }

    const now = this.clock.now();

    for (const candidate of candidates) {
      const result = await this.store.markAssigned(candidate.id, now);
      if (result.assigned) {
        this.logger.debug(
          `Assigned proxy ${result.proxy.id} (priority ${result.proxy.priority}) for source ${sourceId}`,
        );
        return toHandle(result.proxy);
      }
    }

    this.logger.debug(
      `Source ${sourceId} exhausted: ${candidates.length} candidate(s) in cooldown`,
    );
    throw new PoolExhaustedAppError(sourceId, candidates.length);
  }
}
