import {
  Controller,
  Get,
  HttpStatus,
  Inject,
  Logger,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { BLOB_STORE, BlobStore } from '../files/blob-store';

export type HealthStatus =
  | { status: 'unhealthy'; store: 'unreachable'; timestamp: string }
  | {
      status: 'healthy';
      store: 'reachable';
      storedFiles: number;
      uptime: number;
      timestamp: string;
    };

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@Inject(BLOB_STORE) private readonly blobStore: BlobStore) {}

  /**
   * 파일 저장소 접근 가능 여부
   * GET /health (장애 시 503)
   */
  @Get()
  async check(@Res({ passthrough: true }) res: Response): Promise<HealthStatus> {
    try {
      const storedFiles = await this.blobStore.count();
      return {
        status: 'healthy',
        store: 'reachable',
        storedFiles,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(
        `File store health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
      return {
        status: 'unhealthy',
        store: 'unreachable',
        timestamp: new Date().toISOString(),
      };
    }
  }
}
