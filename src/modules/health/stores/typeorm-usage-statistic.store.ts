import { guardStore } from '@infra/database/store-guard';
import { Injectable } from '@nestjs/common';
import { InjectEntityManager } from '@nestjs/typeorm';
import { EntityManager, MoreThanOrEqual } from 'typeorm';
import { ProxyReportEntity } from '../entities/proxy-report.entity';
import { StatusOutcomeEntity } from '../entities/status-outcome.entity';
import { UsageStatisticEntity } from '../entities/usage-statistic.entity';
import {
  OutcomeCount,
  UsageStatisticRecord,
  UsageStatisticStore,
} from '../interfaces/usage-statistic-store.interface';

interface OutcomeCountRow {
  statusCode: number;
  count: string;
}

@Injectable()
export class TypeOrmUsageStatisticStore implements UsageStatisticStore {
  constructor(
    @InjectEntityManager()
    private readonly em: EntityManager,
  ) {}

  async isKnownStatus(statusCode: number): Promise<boolean> {
    return guardStore('isKnownStatus', async () => {
      const count = await this.em.countBy(StatusOutcomeEntity, {
        code: statusCode,
      });
      return count > 0;
    });
  }

  async recordOutcome(
    proxyId: number,
    statusCode: number,
    reportedAt: Date,
  ): Promise<void> {
    await guardStore('recordOutcome', () =>
      this.em.transaction(async (tx) => {
        await tx.query(
          `
            INSERT INTO "usage_statistics" ("proxy_id", "status_code", "counter", "last_reported_at")
            VALUES ($1, $2, 1, $3)
            ON CONFLICT ("proxy_id", "status_code")
            DO UPDATE SET "counter" = "usage_statistics"."counter" + 1,
                          "last_reported_at" = EXCLUDED."last_reported_at"
          `,
          [proxyId, statusCode, reportedAt],
        );
        await tx.insert(ProxyReportEntity, {
          proxyId,
          statusCode,
          reportedAt,
        });
      }),
    );
  }

  async recentOutcomes(proxyId: number, limit: number): Promise<number[]> {
    return guardStore('recentOutcomes', async () => {
      const reports = await this.em.find(ProxyReportEntity, {
        select: { statusCode: true },
        where: { proxyId },
        order: { reportedAt: 'DESC', id: 'DESC' },
        take: limit,
      });
      return reports.map((report) => report.statusCode);
    });
  }

  async outcomeCountsSince(
    proxyId: number,
    since: Date,
  ): Promise<OutcomeCount[]> {
    return guardStore('outcomeCountsSince', async () => {
      const rows = await this.em
        .createQueryBuilder(ProxyReportEntity, 'report')
        .select('report.status_code', 'statusCode')
        .addSelect('COUNT(*)', 'count')
        .where({ proxyId, reportedAt: MoreThanOrEqual(since) })
        .groupBy('report.status_code')
        .getRawMany<OutcomeCountRow>();

      // COUNT(*) comes back from pg as a bigint string
      return rows.map((row) => ({
        statusCode: Number(row.statusCode),
        count: Number(row.count),
      }));
    });
  }

  async statistics(proxyId: number): Promise<UsageStatisticRecord[]> {
    return guardStore('statistics', async () => {
      const rows = await this.em.find(UsageStatisticEntity, {
        where: { proxyId },
        relations: { status: true },
        order: { statusCode: 'ASC' },
      });
      return rows.map((row) => ({
        proxyId: row.proxyId,
        statusCode: row.statusCode,
        description: row.status?.description ?? '',
        counter: row.counter,
        lastReportedAt: row.lastReportedAt,
      }));
    });
  }
}
