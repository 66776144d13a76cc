import { ConfigFragment } from '@common/config/config-fragment';
import {
  boolOr,
  floatOr,
  intListOr,
  intOr,
} from '@common/config/env-parsers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsBoolean, IsInt, IsNumber, Max, Min } from 'class-validator';
import {
  BlockingSettings,
  DEFAULT_BLOCKING_SETTINGS,
} from './policy/blocking-policy';

export class HealthConfig extends ConfigFragment implements BlockingSettings {
  /** Default window of `failureRatio` and of the ratio blocking rule */
  @IsInt()
  @Min(1)
  @UseEnv('HEALTH_WINDOW_SEC', intOr(3600))
  public readonly windowSec!: number;

  @IsInt()
  @Min(1)
  @UseEnv(
    'BLOCKING_FAILURE_THRESHOLD',
    intOr(DEFAULT_BLOCKING_SETTINGS.failureThreshold),
  )
  public readonly failureThreshold!: number;

  /** Example: "403,407,429" */
  @IsInt({ each: true })
  @UseEnv(
    'BLOCKING_STATUSES',
    intListOr([...DEFAULT_BLOCKING_SETTINGS.blockingStatuses]),
  )
  public readonly blockingStatuses!: number[];

  @IsBoolean()
  @UseEnv(
    'BLOCKING_SERVER_ERRORS',
    boolOr(DEFAULT_BLOCKING_SETTINGS.blockServerErrors),
  )
  public readonly blockServerErrors!: boolean;

  @IsInt({ each: true })
  @UseEnv(
    'BLOCKING_FATAL_STATUSES',
    intListOr([...DEFAULT_BLOCKING_SETTINGS.fatalStatuses]),
  )
  public readonly fatalStatuses!: number[];

  @IsNumber()
  @Min(0)
  @Max(1)
  @UseEnv(
    'BLOCKING_MAX_FAILURE_RATIO',
    floatOr(DEFAULT_BLOCKING_SETTINGS.maxFailureRatio),
  )
  public readonly maxFailureRatio!: number;

  @IsInt()
  @Min(1)
  @UseEnv('BLOCKING_MIN_SAMPLES', intOr(DEFAULT_BLOCKING_SETTINGS.minSamples))
  public readonly minSamples!: number;
}
