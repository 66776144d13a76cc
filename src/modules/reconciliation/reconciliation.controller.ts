import { JsonRpcApiEntry } from '@common/json-rpc/json-rpc-api-entry.decorator';
import { Body, Controller } from '@nestjs/common';
import { ReconcileSourceDto } from './dto';
import {
  ReconcileOutcome,
  StalenessReconcilerService,
} from './services/staleness-reconciler.service';
import {
  ReconciliationTickSummary,
  TaskSchedulerService,
} from './services/task-scheduler.service';

/** Manual entry points next to the periodic tick, for operators and job runners */
@Controller('api/reconciliation')
export class ReconciliationController {
  constructor(
    private readonly scheduler: TaskSchedulerService,
    private readonly reconciler: StalenessReconcilerService,
  ) {}

  @JsonRpcApiEntry({ path: 'tick' })
  async tick(): Promise<ReconciliationTickSummary> {
    return this.scheduler.runReconciliationTick();
  }

  @JsonRpcApiEntry({ path: 'source' })
  async reconcileSource(
    @Body() body: ReconcileSourceDto,
  ): Promise<ReconcileOutcome> {
    return this.reconciler.reconcileSource(body.sourceId);
  }
}
