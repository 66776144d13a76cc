import { Module } from '@nestjs/common';
import { PoolController } from './controllers/pool.controller';
import { PROXY_RECORD_STORE } from './interfaces/proxy-record-store.interface';
import { PoolConfig } from './pool.config';
import { PoolOverviewService } from './services/pool-overview.service';
import { SelectionEngineService } from './services/selection-engine.service';
import { TypeOrmProxyRecordStore } from './stores/typeorm-proxy-record.store';

@Module({
  providers: [
    PoolConfig,
    {
      provide: PROXY_RECORD_STORE,
      useClass: TypeOrmProxyRecordStore,
    },
    SelectionEngineService,
    PoolOverviewService,
  ],
  controllers: [PoolController],
  exports: [PROXY_RECORD_STORE, SelectionEngineService],
})
export class PoolModule {}
