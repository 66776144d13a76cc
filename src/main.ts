import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { getAppEnv, getAppName } from '@common/env';
import { singleLineMessage } from '@common/errors/single-line-message';
import { registerError } from '@common/errors/registry';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

loadEnv();

const logger = new Logger('Main');

async function bootstrap(): Promise<void> {
  logger.log(`Starting ${getAppName()} in ${getAppEnv()} env`);
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  await app.get(WebserverSetupService).setup(app);
}

bootstrap().catch((err: unknown) => {
  const reason = singleLineMessage(err);
  logger.error(`Failed to start: ${reason}`);
  process.exitCode = 1;
});

process.on('uncaughtException', (err) => {
  if (err instanceof Error) {
    const reason = singleLineMessage(err);
    logger.error(`An uncaught exception: ${reason}`);
    registerError(err);
  } else {
    logger.error(`An uncaught exception: ${err}`);
  }
});

process.on('unhandledRejection', (err: unknown) => {
  if (err instanceof Error) {
    const reason = singleLineMessage(err);
    logger.error(`An unhandled rejection: ${reason}`);
    registerError(err);
  } else {
    logger.error(`An unhandled rejection: ${err}`);
  }
});
