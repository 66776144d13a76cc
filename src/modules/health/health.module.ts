import { PoolModule } from '@modules/pool/pool.module';
import { Module } from '@nestjs/common';
import { HealthConfig } from './health.config';
import { USAGE_STATISTIC_STORE } from './interfaces/usage-statistic-store.interface';
import { ProxyHealthController } from './proxy-health.controller';
import { HealthTrackerService } from './services/health-tracker.service';
import { TypeOrmUsageStatisticStore } from './stores/typeorm-usage-statistic.store';

@Module({
  imports: [PoolModule],
  providers: [
    HealthConfig,
    {
      provide: USAGE_STATISTIC_STORE,
      useClass: TypeOrmUsageStatisticStore,
    },
    HealthTrackerService,
  ],
  controllers: [ProxyHealthController],
  exports: [HealthTrackerService],
})
export class HealthModule {}
