import { JsonRpcApiEntry } from '@common/json-rpc/json-rpc-api-entry.decorator';
import { Body, Controller } from '@nestjs/common';
import { FailureRatioDto, ProxyStatisticsDto, ReportOutcomeDto } from './dto';
import { UsageStatisticRecord } from './interfaces/usage-statistic-store.interface';
import {
  HealthTrackerService,
  ReportResult,
} from './services/health-tracker.service';

interface FailureRatioResponse {
  proxyId: number;
  windowSec: number;
  ratio: number;
}

@Controller('api/pool')
export class ProxyHealthController {
  constructor(private readonly healthTracker: HealthTrackerService) {}

  @JsonRpcApiEntry({ path: 'report' })
  async report(@Body() body: ReportOutcomeDto): Promise<ReportResult> {
    return this.healthTracker.report(body.proxyId, body.statusCode);
  }

  @JsonRpcApiEntry({ path: 'failure-ratio' })
  async failureRatio(
    @Body() body: FailureRatioDto,
  ): Promise<FailureRatioResponse> {
    const windowSec = body.windowSec ?? this.healthTracker.defaultWindowSec();
    const ratio = await this.healthTracker.failureRatio(
      body.proxyId,
      windowSec,
    );
    return { proxyId: body.proxyId, windowSec, ratio };
  }

  @JsonRpcApiEntry({ path: 'statistics' })
  async statistics(
    @Body() body: ProxyStatisticsDto,
  ): Promise<UsageStatisticRecord[]> {
    return this.healthTracker.statisticsOf(body.proxyId);
  }
}
