import { registerError } from '@common/errors/registry';
import { singleLineMessage } from '@common/errors/single-line-message';
import {
  PROXY_RECORD_STORE,
  ProxyRecordStore,
} from '@modules/pool/interfaces/proxy-record-store.interface';
import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import Bottleneck from 'bottleneck';
import { ReconciliationConfig } from '../reconciliation.config';
import {
  ReconcileOutcome,
  StalenessReconcilerService,
} from './staleness-reconciler.service';

export interface ReconciliationTickSummary {
  readonly sources: number;
  readonly reconciled: number;
  readonly stale: number;
  readonly unblocked: number;
  /** Sources whose previous cycle was still running */
  readonly skipped: number[];
  readonly failed: number[];
}

type CycleResult =
  | { readonly ok: true; readonly outcome: ReconcileOutcome }
  | { readonly ok: false; readonly sourceId: number };

export const RECONCILIATION_INTERVAL = 'staleness-reconciliation';

/**
 * Task Scheduler
 * Drives staleness reconciliation over every source on a fixed interval,
 * a bounded number of sources at a time, never two cycles of one source
 * at once
 */
@Injectable()
export class TaskSchedulerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(TaskSchedulerService.name);

  private readonly running = new Set<number>();

  private readonly limiter: Bottleneck;

  constructor(
    private readonly reconciler: StalenessReconcilerService,
    @Inject(PROXY_RECORD_STORE)
    private readonly store: ProxyRecordStore,
    private readonly config: ReconciliationConfig,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.limiter = new Bottleneck({ maxConcurrent: config.concurrency });
  }

  onApplicationBootstrap(): void {
    if (!this.config.enabled) {
      this.logger.log('Periodic reconciliation disabled');
      return;
    }

    const interval = setInterval(() => {
      this.runReconciliationTick().catch((error) => {
        this.logger.error(
          `Reconciliation tick failed: ${singleLineMessage(error)}`,
        );
      });
    }, this.config.intervalSec * 1000);

    this.schedulerRegistry.addInterval(RECONCILIATION_INTERVAL, interval);
    this.logger.log(
      `Reconciling stale sources every ${this.config.intervalSec}s (stale after ${this.config.staleAfterSec}s)`,
    );
  }

  isRunning(sourceId: number): boolean {
    return this.running.has(sourceId);
  }

  /**
   * One pass over all known sources. A failing source is logged and counted;
   * the rest of the pass goes on.
   */
  async runReconciliationTick(): Promise<ReconciliationTickSummary> {
    const sourceIds = await this.store.listSourceIds();
    const skipped = sourceIds.filter((id) => this.running.has(id));
    const due = sourceIds.filter((id) => !this.running.has(id));

    // Claimed before queueing, so an overlapping tick skips queued sources too
    due.forEach((id) => this.running.add(id));

    const results = await Promise.all(
      due.map((sourceId) =>
        this.limiter.schedule(() => this.runCycle(sourceId)),
      ),
    );

    const summary = results.reduce<ReconciliationTickSummary>(
      (acc, result) => {
        if (!result.ok) {
          return { ...acc, failed: [...acc.failed, result.sourceId] };
        }
        return {
          ...acc,
          reconciled: acc.reconciled + 1,
          stale: acc.stale + (result.outcome.stale ? 1 : 0),
          unblocked: acc.unblocked + result.outcome.unblocked,
        };
      },
      {
        sources: sourceIds.length,
        reconciled: 0,
        stale: 0,
        unblocked: 0,
        skipped,
        failed: [],
      },
    );

    this.logger.debug(
      `Reconciliation tick: ${summary.reconciled}/${summary.sources} source(s), ${summary.unblocked} unblocked, ${summary.skipped.length} skipped, ${summary.failed.length} failed`,
    );

    return summary;
  }

  private async runCycle(sourceId: number): Promise<CycleResult> {
    try {
      const outcome = await this.reconciler.reconcileSource(sourceId);
      return { ok: true, outcome };
    } catch (error) {
      if (error instanceof Error) {
        const id = registerError(error);
        this.logger.error(
          `Reconciliation of source ${sourceId} failed (#${id}): ${singleLineMessage(error)}`,
        );
      } else {
        this.logger.error(
          `Reconciliation of source ${sourceId} failed: ${String(error)}`,
        );
      }
      return { ok: false, sourceId };
    } finally {
      this.running.delete(sourceId);
    }
  }
}
