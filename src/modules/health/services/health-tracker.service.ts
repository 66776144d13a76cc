import { Clock, CLOCK, secondsBefore } from '@common/time';
import { ProxyNotFoundAppError } from '@modules/pool/errors/proxy-not-found.app-error';
import {
  PROXY_RECORD_STORE,
  ProxyRecord,
  ProxyRecordStore,
} from '@modules/pool/interfaces/proxy-record-store.interface';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { UnknownStatusAppError } from '../errors/unknown-status.app-error';
import { HealthConfig } from '../health.config';
import {
  USAGE_STATISTIC_STORE,
  UsageStatisticRecord,
  UsageStatisticStore,
} from '../interfaces/usage-statistic-store.interface';
import {
  BlockingReason,
  evaluateBlocking,
  isFailureStatus,
  OutcomeHistory,
} from '../policy/blocking-policy';

export interface ReportResult {
  readonly proxyId: number;
  readonly statusCode: number;
  /** Block state after the report */
  readonly blocked: boolean;
  /** Set when this very report caused the block */
  readonly blockedReason?: BlockingReason;
}

interface WindowCounts {
  readonly total: number;
  readonly failures: number;
}

/**
 * Health Tracker
 * Records what clients observed through a proxy and blocks the proxy when
 * the blocking policy says so
 */
@Injectable()
export class HealthTrackerService {
  private readonly logger = new Logger(HealthTrackerService.name);

  constructor(
    @Inject(USAGE_STATISTIC_STORE)
    private readonly statistics: UsageStatisticStore,
    @Inject(PROXY_RECORD_STORE)
    private readonly proxies: ProxyRecordStore,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly config: HealthConfig,
  ) {}

  async report(proxyId: number, statusCode: number): Promise<ReportResult> {
    if (!(await this.statistics.isKnownStatus(statusCode))) {
      this.logger.warn(
        `Rejected report for proxy ${proxyId}: unknown status ${statusCode}`,
      );
      throw new UnknownStatusAppError(statusCode);
    }

    const proxy = await this.requireProxy(proxyId);
    const reportedAt = this.clock.now();

    await this.statistics.recordOutcome(proxyId, statusCode, reportedAt);

    if (proxy.blocked) {
      return { proxyId, statusCode, blocked: true };
    }

    const decision = evaluateBlocking(
      await this.history(proxyId, reportedAt),
      this.config,
    );
    if (!decision.block) {
      return { proxyId, statusCode, blocked: false };
    }

    if (!(await this.proxies.setBlocked(proxyId, true, reportedAt))) {
      throw new ProxyNotFoundAppError(proxyId);
    }
    this.logger.warn(
      `Proxy ${proxyId} of source ${proxy.sourceId} blocked after status ${statusCode} (${decision.reason})`,
    );

    return {
      proxyId,
      statusCode,
      blocked: true,
      blockedReason: decision.reason,
    };
  }

  /**
   * Share of failed outcomes (status >= 400 or transport failure) among the
   * reports of the last `windowSec` seconds. 0 when nothing was reported.
   */
  async failureRatio(
    proxyId: number,
    windowSec: number = this.config.windowSec,
  ): Promise<number> {
    await this.requireProxy(proxyId);

    const since = secondsBefore(this.clock.now(), windowSec);
    const { total, failures } = await this.windowCounts(proxyId, since);

    return total === 0 ? 0 : failures / total;
  }

  defaultWindowSec(): number {
    return this.config.windowSec;
  }

  async statisticsOf(proxyId: number): Promise<UsageStatisticRecord[]> {
    await this.requireProxy(proxyId);
    return this.statistics.statistics(proxyId);
  }

  private async requireProxy(proxyId: number): Promise<ProxyRecord> {
    const proxy = await this.proxies.get(proxyId);
    if (!proxy) {
      throw new ProxyNotFoundAppError(proxyId);
    }
    return proxy;
  }

  private async history(proxyId: number, now: Date): Promise<OutcomeHistory> {
    const recent = await this.statistics.recentOutcomes(
      proxyId,
      this.config.failureThreshold,
    );
    const since = secondsBefore(now, this.config.windowSec);
    const { total, failures } = await this.windowCounts(proxyId, since);

    return { recent, windowTotal: total, windowFailures: failures };
  }

  private async windowCounts(
    proxyId: number,
    since: Date,
  ): Promise<WindowCounts> {
    const counts = await this.statistics.outcomeCountsSince(proxyId, since);

    return counts.reduce<WindowCounts>(
      (acc, { statusCode, count }) => ({
        total: acc.total + count,
        failures: acc.failures + (isFailureStatus(statusCode) ? count : 0),
      }),
      { total: 0, failures: 0 },
    );
  }
}
