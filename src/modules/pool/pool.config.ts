import { ConfigFragment } from '@common/config/config-fragment';
import { intOr } from '@common/config/env-parsers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, Min } from 'class-validator';

export class PoolConfig extends ConfigFragment {
  /**
   * Upper bound of candidates one `acquire` scans.
   * Proxies past it are only reached once earlier ones cool down or block.
   */
  @IsInt()
  @Min(1)
  @UseEnv('POOL_CANDIDATE_LIMIT', intOr(100))
  public readonly candidateLimit!: number;
}
