import { GlobalExceptionFilter } from '@common/errors/global-exception.filter';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { WebserverConfig } from '@infra/webserver/webserver.config';
import { Global, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { HealthController } from './health.controller';

@Global()
@Module({
  providers: [
    WebserverConfig,
    WebserverSetupService,
    { provide: APP_FILTER, useClass: GlobalExceptionFilter },
  ],
  exports: [WebserverSetupService],
  controllers: [HealthController],
})
export class WebserverModule {}
