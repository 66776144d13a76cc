import { ConfigFragment } from '@common/config/config-fragment';
import { boolOr, intOr } from '@common/config/env-parsers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsBoolean, IsInt, Min } from 'class-validator';

export class ReconciliationConfig extends ConfigFragment {
  /** Turns the periodic tick off; the HTTP entry still works */
  @IsBoolean()
  @UseEnv('RECONCILE_ENABLED', boolOr(true))
  public readonly enabled!: boolean;

  @IsInt()
  @Min(1)
  @UseEnv('RECONCILE_INTERVAL_SEC', intOr(300))
  public readonly intervalSec!: number;

  /** A source idle for longer than this gets all its proxies unblocked */
  @IsInt()
  @Min(1)
  @UseEnv('RECONCILE_STALE_AFTER_SEC', intOr(300))
  public readonly staleAfterSec!: number;

  /** Sources reconciled in parallel within one tick */
  @IsInt()
  @Min(1)
  @UseEnv('RECONCILE_CONCURRENCY', intOr(4))
  public readonly concurrency!: number;
}
