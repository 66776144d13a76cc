import { JsonRpcApiEntry } from '@common/json-rpc/json-rpc-api-entry.decorator';
import { Body, Controller } from '@nestjs/common';
import { AcquireProxyDto } from '../dto/acquire-proxy.dto';
import { ProxyHandle } from '../interfaces/proxy-handle.interface';
import { PoolSize } from '../interfaces/proxy-record-store.interface';
import { PoolOverviewService } from '../services/pool-overview.service';
import { SelectionEngineService } from '../services/selection-engine.service';

@Controller('api/pool')
export class PoolController {
  constructor(
    private readonly selectionEngine: SelectionEngineService,
    private readonly overview: PoolOverviewService,
  ) {}

  /** Next proxy of a source, `ERR_POOL_EXHAUSTED` when none is free */
  @JsonRpcApiEntry({ path: 'acquire' })
  async acquire(@Body() body: AcquireProxyDto): Promise<ProxyHandle> {
    return this.selectionEngine.acquire(body.sourceId);
  }

  /** Pool size per source */
  @JsonRpcApiEntry({ path: 'overview' })
  async sizes(): Promise<PoolSize[]> {
    return this.overview.sizes();
  }
}
