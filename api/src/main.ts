import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { AppModule } from './app.module';
import { AppConfig } from './config/app.config';
import { createShutdownHandler } from './shutdown';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  const { port, shutdownTimeout } = app
    .get(ConfigService)
    .getOrThrow<AppConfig>('app');

  // enableShutdownHooks() 대신 직접 처리
  const shutdown = createShutdownHandler({
    app,
    dataSource: app.get(DataSource),
    timeout: shutdownTimeout,
  });

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen(port);

  logger.log(`Application running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
