import {
  Controller,
  Get,
  Header,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
  Res,
  StreamableFile,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { IngestService } from './ingest.service';
import { RetrievalService } from './retrieval.service';
import { buildAttachmentDisposition } from './content-disposition';
import { renderUploadPage } from './upload-page';
import { UploadLimitFilter } from './upload-limit.filter';
import { DisplayPayload, IncomingFile } from './files.types';
import { DEFAULT_RECENT_LIMIT } from '../config/upload.config';

export const UPLOAD_SUCCESS_NOTICE = 'File uploaded successfully!';
export const MISSING_FILE_MESSAGE = 'This field is required.';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * multer는 multipart 파일명을 latin1로 디코딩한다. 브라우저가 보내는 UTF-8로 되돌린다.
 * latin1 바이트가 올바른 UTF-8이 아니면 이미 디코딩된 이름(filename*)으로 보고 그대로 둔다.
 */
export function decodeMultipartFilename(name: string): string {
  if (/[^\u0000-\u00ff]/.test(name)) return name;
  try {
    return strictUtf8.decode(Buffer.from(name, 'latin1'));
  } catch {
    return name;
  }
}

function toIncomingFile(file: Express.Multer.File): IncomingFile {
  return {
    originalName: decodeMultipartFilename(file.originalname),
    contentType: file.mimetype,
    size: file.size,
    read: () => file.buffer,
  };
}

@Controller()
export class FilesController {
  private readonly logger = new Logger(FilesController.name);
  private readonly recentLimit: number;

  constructor(
    private readonly ingestService: IngestService,
    private readonly retrievalService: RetrievalService,
    configService: ConfigService,
  ) {
    this.recentLimit =
      configService.get<number>('upload.recentLimit') ?? DEFAULT_RECENT_LIMIT;
  }

  /**
   * 업로드 폼 + 최근 파일 목록
   * GET /upload
   */
  @Get('upload')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async uploadForm(@Query('uploaded') uploaded?: string): Promise<string> {
    const files = await this.retrievalService.listRecent(this.recentLimit);
    return renderUploadPage({
      files,
      notice: uploaded === '1' ? UPLOAD_SUCCESS_NOTICE : undefined,
    });
  }

  /**
   * 파일 업로드
   * POST /upload (multipart/form-data, 필드명 file)
   * 성공 시 303 리다이렉트, 실패 시 폼을 에러와 함께 다시 렌더링 (200)
   * multer 크기 제한 초과(413)도 UploadLimitFilter가 폼으로 바꾼다
   */
  @Post('upload')
  @UseFilters(UploadLimitFilter)
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Res() res: Response,
  ): Promise<void> {
    const result = file
      ? await this.ingestService.ingest(toIncomingFile(file))
      : ({ ok: false, message: MISSING_FILE_MESSAGE } as const);

    if (result.ok) {
      res.redirect(303, '/upload?uploaded=1');
      return;
    }

    const files = await this.retrievalService.listRecent(this.recentLimit);
    res
      .status(200)
      .type('html')
      .send(renderUploadPage({ files, errors: [result.message] }));
  }

  /**
   * 첨부 파일로 다운로드
   * GET /download/:id
   */
  @Get('download/:id')
  async download(
    @Param('id') id: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const result = await this.retrievalService.prepareDownload(id);
    if (!result.ok) {
      throw new NotFoundException(`File ${id} not found`);
    }

    this.logger.debug(`download ${id} (${result.content.length} bytes)`);
    return this.send(res, result, buildAttachmentDisposition(result.suggestedFilename));
  }

  /**
   * 인라인 표시 (Content-Disposition 없음)
   * GET /file/:id
   */
  @Get('file/:id')
  async display(
    @Param('id') id: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const result = await this.retrievalService.prepareDisplay(id);
    if (!result.ok) {
      throw new NotFoundException(`File ${id} not found`);
    }

    return this.send(res, result);
  }

  private send(
    res: Response,
    payload: DisplayPayload,
    disposition?: string,
  ): StreamableFile {
    res.setHeader('ETag', `"${payload.contentHash}"`);
    res.setHeader('X-Content-Type-Options', 'nosniff');

    return new StreamableFile(payload.content, {
      type: payload.contentType,
      length: payload.content.length,
      disposition,
    });
  }
}
