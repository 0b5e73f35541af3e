import { Inject, Injectable, Logger } from '@nestjs/common';
import { BLOB_STORE, BlobStore } from './blob-store';
import { IncomingFile, IngestResult } from './files.types';
import { normalizeContentType, UploadValidator } from './upload-validator';

@Injectable()
export class IngestService {
  private readonly logger = new Logger(IngestService.name);

  constructor(
    private readonly validator: UploadValidator,
    @Inject(BLOB_STORE) private readonly blobStore: BlobStore,
  ) {}

  /**
   * 검증 → 저장 → id 반환. 유일한 쓰기 경로.
   * 검증 실패 시 본문을 읽지 않고 저장소도 건드리지 않는다.
   */
  async ingest(file: IncomingFile): Promise<IngestResult> {
    const declared = this.validator.validate(
      file.contentType,
      file.size,
      file.originalName,
    );
    if (!declared.ok) {
      this.logger.warn(
        `Rejected "${file.originalName}" (${file.contentType}, ${file.size} bytes): ${declared.reason}`,
      );
      return declared;
    }

    const content = await file.read();

    const actual = this.validator.validateActualSize(content.length);
    if (!actual.ok) {
      this.logger.warn(
        `Rejected "${file.originalName}" after read (${content.length} bytes): ${actual.reason}`,
      );
      return actual;
    }

    // 허용 목록과 같은 형태로 저장
    const contentType = normalizeContentType(file.contentType);
    const id = await this.blobStore.create({
      name: file.originalName,
      content,
      contentType,
    });

    this.logger.log(
      `Stored "${file.originalName}" as ${id} (${contentType}, ${content.length} bytes)`,
    );
    return { ok: true, id };
  }
}
