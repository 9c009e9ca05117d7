import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { LoggerService } from '@/shared/services/logger.service';
import { AppConfigService } from '@/shared/services/config.service';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });

  const logger = app.get(LoggerService);
  app.useLogger(logger);
  app.enableShutdownHooks();

  const { name, version } = app.get(AppConfigService).appConfig;
  logger.log(`${name}${version ? ` ${version}` : ''} relaying outbox events`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start', error);
  process.exit(1);
});
