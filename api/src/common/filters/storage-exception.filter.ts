import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

// 저장소(DB) 접근 실패
export class StoreUnavailableException extends Error {
  constructor(
    message: string = 'File store is unavailable',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreUnavailableException';
  }
}

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    path: string;
  };
}

@Catch()
export class StorageExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(StorageExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'Internal server error';

    // 저장소 장애는 503으로 응답 (재시도는 클라이언트 몫)
    if (exception instanceof StoreUnavailableException) {
      status = HttpStatus.SERVICE_UNAVAILABLE;
      code = 'STORE_UNAVAILABLE';
      message = 'File store is unavailable. Please try again later.';
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = HttpStatus[status] ?? 'HTTP_ERROR';
      message = exception.message;
    }

    const detail =
      exception instanceof Error ? exception.message : String(exception);
    const stack = exception instanceof Error ? exception.stack : undefined;

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${request.method} ${request.url} - ${detail}`,
        stack,
      );
    } else {
      this.logger.warn(`[${code}] ${request.method} ${request.url} - ${detail}`);
    }

    const body: ErrorResponseBody = {
      success: false,
      error: {
        code,
        message,
        timestamp: new Date().toISOString(),
        path: request.url,
      },
    };

    response.status(status).json(body);
  }
}
