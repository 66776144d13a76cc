import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from '@common/time';

@Global()
@Module({
  providers: [{ provide: CLOCK, useClass: SystemClock }],
  exports: [CLOCK],
})
export class TimeModule {}
