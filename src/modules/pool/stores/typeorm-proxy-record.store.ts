import { guardStore } from '@infra/database/store-guard';
import { Injectable } from '@nestjs/common';
import { InjectEntityManager } from '@nestjs/typeorm';
import { EntityManager } from 'typeorm';
import { ProxyEntity } from '../entities/proxy.entity';
import { SourceEntity } from '../entities/source.entity';
import {
  MarkAssignedResult,
  PoolSize,
  ProxyRecord,
  ProxyRecordStore,
} from '../interfaces/proxy-record-store.interface';

function toRecord(entity: ProxyEntity): ProxyRecord {
  return {
    id: entity.id,
    address: entity.address,
    sourceId: entity.sourceId,
    providerId: entity.providerId,
    priority: entity.priority,
    blocked: entity.blocked,
    usageCooldownSec: entity.usageCooldownSec,
    lastTouched: entity.lastTouched,
  };
}

/** Row of `proxies` as returned by `UPDATE ... RETURNING *` */
export interface ProxyRow {
  id: number;
  address: string;
  source_id: number;
  provider_id: number | null;
  priority: number;
  blocked: boolean;
  usage_cooldown_sec: number;
  last_touched: Date;
}

export function fromRow(row: ProxyRow): ProxyRecord {
  return {
    id: row.id,
    address: row.address,
    sourceId: row.source_id,
    providerId: row.provider_id,
    priority: row.priority,
    blocked: row.blocked,
    usageCooldownSec: row.usage_cooldown_sec,
    lastTouched: row.last_touched,
  };
}

interface PoolSizeRow {
  sourceId: number;
  total: string;
  blocked: string;
}

/**
 * PostgreSQL-backed proxy table.
 *
 * Atomicity comes from single-statement updates: the blocked and cooldown
 * checks of `markAssigned` live in the UPDATE's WHERE clause, so concurrent
 * callers are linearized by the row lock and at most one of them matches.
 */
@Injectable()
export class TypeOrmProxyRecordStore implements ProxyRecordStore {
  constructor(
    @InjectEntityManager()
    private readonly em: EntityManager,
  ) {}

  async get(id: number): Promise<ProxyRecord | null> {
    return guardStore('get', async () => {
      const entity = await this.em.findOneBy(ProxyEntity, { id });
      return entity ? toRecord(entity) : null;
    });
  }

  async listEligible(sourceId: number, limit: number): Promise<ProxyRecord[]> {
    return guardStore('listEligible', async () => {
      const entities = await this.em.find(ProxyEntity, {
        where: { sourceId, blocked: false },
        order: { priority: 'DESC', id: 'ASC' },
        take: limit,
      });
      return entities.map(toRecord);
    });
  }

  async markAssigned(id: number, now: Date): Promise<MarkAssignedResult> {
    return guardStore('markAssigned', async () => {
      const result = await this.em
        .createQueryBuilder()
        .update(ProxyEntity)
        .set({ lastTouched: now })
        .where('id = :id', { id })
        .andWhere('blocked = false')
        .andWhere(
          'last_touched + make_interval(secs => usage_cooldown_sec) <= :now',
          { now },
        )
        .returning('*')
        .execute();

      const rows: ProxyRow[] = result.raw;
      const [row] = rows;
      if (row) {
        return { assigned: true, proxy: fromRow(row) };
      }

      const exists = await this.em.countBy(ProxyEntity, { id });
      return { assigned: false, reason: exists > 0 ? 'conflict' : 'not_found' };
    });
  }

  async setBlocked(id: number, blocked: boolean, now: Date): Promise<boolean> {
    return guardStore('setBlocked', async () => {
      const result = await this.em.update(
        ProxyEntity,
        { id },
        { blocked, lastTouched: now },
      );
      return (result.affected ?? 0) > 0;
    });
  }

  async unblockAllForSource(sourceId: number): Promise<number> {
    return guardStore('unblockAllForSource', async () => {
      const result = await this.em.update(
        ProxyEntity,
        { sourceId, blocked: true },
        { blocked: false },
      );
      return result.affected ?? 0;
    });
  }

  async mostRecentTouch(sourceId: number): Promise<Date | null> {
    return guardStore('mostRecentTouch', async () => {
      const row = await this.em
        .createQueryBuilder(ProxyEntity, 'proxy')
        .select('MAX(proxy.last_touched)', 'latest')
        .where('proxy.source_id = :sourceId', { sourceId })
        .getRawOne<{ latest: Date | null }>();
      return row?.latest ?? null;
    });
  }

  async listSourceIds(): Promise<number[]> {
    return guardStore('listSourceIds', async () => {
      const sources = await this.em.find(SourceEntity, {
        select: { id: true },
        order: { id: 'ASC' },
      });
      return sources.map((source) => source.id);
    });
  }

  async sourceExists(sourceId: number): Promise<boolean> {
    return guardStore('sourceExists', async () => {
      const count = await this.em.countBy(SourceEntity, { id: sourceId });
      return count > 0;
    });
  }

  async poolSizes(): Promise<PoolSize[]> {
    return guardStore('poolSizes', async () => {
      const rows = await this.em
        .createQueryBuilder(SourceEntity, 'source')
        .leftJoin(ProxyEntity, 'proxy', 'proxy.source_id = source.id')
        .select('source.id', 'sourceId')
        .addSelect('COUNT(proxy.id)', 'total')
        .addSelect('COUNT(proxy.id) FILTER (WHERE proxy.blocked)', 'blocked')
        .groupBy('source.id')
        .orderBy('source.id', 'ASC')
        .getRawMany<PoolSizeRow>();

      // COUNT comes back from pg as a bigint string
      return rows.map((row) => {
        const total = Number(row.total);
        const blocked = Number(row.blocked);
        return {
          sourceId: Number(row.sourceId),
          total,
          blocked,
          eligible: total - blocked,
        };
      });
    });
  }
}
