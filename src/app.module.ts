import { TimeModule } from '@common/time/time.module';
import { DatabaseModule } from '@infra/database/database.module';
import { WebserverModule } from '@infra/webserver/webserver.module';
import { HealthModule } from '@modules/health/health.module';
import { PoolModule } from '@modules/pool/pool.module';
import { ReconciliationModule } from '@modules/reconciliation/reconciliation.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [
    // Infra
    TimeModule,
    DatabaseModule,
    WebserverModule,

    // Features
    PoolModule,
    HealthModule,
    ReconciliationModule,
  ],
})
export class AppModule {}
