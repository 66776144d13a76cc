import { ConfigFragment } from '@common/config/config-fragment';
import { intOr } from '@common/config/env-parsers';
import { UseEnv } from '@common/config/use-env.decorator';
import { IsInt, IsString, Max, Min } from 'class-validator';

export class WebserverConfig extends ConfigFragment {
  @IsInt()
  @Min(1)
  @Max(65535)
  @UseEnv('PORT', intOr(3000))
  public readonly port!: number;

  /** Only used in the startup log line */
  @IsString()
  @UseEnv('PUBLIC_URL', (raw) => raw ?? 'http://localhost:3000')
  public readonly publicUrl!: string;
}
