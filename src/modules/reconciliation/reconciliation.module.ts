import { PoolModule } from '@modules/pool/pool.module';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ReconciliationConfig } from './reconciliation.config';
import { ReconciliationController } from './reconciliation.controller';
import { StalenessReconcilerService } from './services/staleness-reconciler.service';
import { TaskSchedulerService } from './services/task-scheduler.service';

@Module({
  imports: [ScheduleModule.forRoot(), PoolModule],
  providers: [
    ReconciliationConfig,
    StalenessReconcilerService,
    TaskSchedulerService,
  ],
  controllers: [ReconciliationController],
  exports: [StalenessReconcilerService, TaskSchedulerService],
})
export class ReconciliationModule {}
