import { INestApplication, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

export interface ShutdownOptions {
  app: Pick<INestApplication, 'close'>;
  dataSource: Pick<DataSource, 'isInitialized' | 'destroy'>;
  timeout: number;
  exit?: (code: number) => void;
  logger?: Logger;
}

/**
 * SIGTERM/SIGINT 공용 graceful shutdown 핸들러.
 * 시그널이 여러 번 와도 종료 절차는 한 번만 실행한다.
 */
export function createShutdownHandler({
  app,
  dataSource,
  timeout,
  exit = (code) => process.exit(code),
  logger = new Logger('Shutdown'),
}: ShutdownOptions): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log(`Received ${signal}. Starting graceful shutdown...`);

    const shutdownTimer = setTimeout(() => {
      logger.error('Graceful shutdown timed out. Forcing exit.');
      exit(1);
    }, timeout);

    try {
      // 1. 새로운 요청 수신 중단 (close()가 onApplicationShutdown 훅도 실행)
      await app.close();
      logger.log('HTTP server closed.');

      // 2. DB 커넥션 정리
      if (dataSource.isInitialized) {
        logger.log('Closing database connections...');
        await dataSource.destroy();
        logger.log('Database connections closed.');
      }

      clearTimeout(shutdownTimer);
      logger.log('Graceful shutdown completed.');
      exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      clearTimeout(shutdownTimer);
      exit(1);
    }
  };
}
