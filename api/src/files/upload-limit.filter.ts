import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Injectable,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { DEFAULT_RECENT_LIMIT } from '../config/upload.config';
import { RecentFileSummary } from './files.types';
import { RetrievalService } from './retrieval.service';
import { renderUploadPage } from './upload-page';
import { UploadValidator } from './upload-validator';

/**
 * POST /upload 전용. multer의 파일 크기 제한 초과를
 * TooLarge 검증 실패와 같은 폼 응답(200)으로 바꾼다.
 */
@Injectable()
@Catch(PayloadTooLargeException)
export class UploadLimitFilter implements ExceptionFilter {
  private readonly logger = new Logger(UploadLimitFilter.name);
  private readonly recentLimit: number;

  constructor(
    private readonly validator: UploadValidator,
    private readonly retrievalService: RetrievalService,
    configService: ConfigService,
  ) {
    this.recentLimit =
      configService.get<number>('upload.recentLimit') ?? DEFAULT_RECENT_LIMIT;
  }

  async catch(exception: PayloadTooLargeException, host: ArgumentsHost): Promise<void> {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const rejection = this.validator.tooLarge();

    this.logger.warn(
      `Rejected upload over ${this.validator.maxFileSize} bytes: ${request.method} ${request.url} - ${exception.message}`,
    );

    let files: RecentFileSummary[] = [];
    try {
      files = await this.retrievalService.listRecent(this.recentLimit);
    } catch (error) {
      // 목록 없이 폼만 보여준다
      this.logger.error(
        'Failed to list recent files',
        error instanceof Error ? error.stack : String(error),
      );
    }

    response
      .status(200)
      .type('html')
      .send(renderUploadPage({ files, errors: [rejection.message] }));
  }
}
