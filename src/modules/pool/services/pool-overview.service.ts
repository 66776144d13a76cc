import { Inject, Injectable } from '@nestjs/common';
import {
  PoolSize,
  PROXY_RECORD_STORE,
  ProxyRecordStore,
} from '../interfaces/proxy-record-store.interface';

/** Read-only view of how many proxies each source has and how many are blocked */
@Injectable()
export class PoolOverviewService {
  constructor(
    @Inject(PROXY_RECORD_STORE)
    private readonly store: ProxyRecordStore,
  ) {}

  async sizes(): Promise<PoolSize[]> {
    return this.store.poolSizes();
  }
}
