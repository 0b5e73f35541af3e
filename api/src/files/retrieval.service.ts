import { Inject, Injectable } from '@nestjs/common';
import { BLOB_STORE, BlobStore } from './blob-store';
import { sanitizeFilename } from './content-disposition';
import {
  DisplayResult,
  DownloadResult,
  NotFound,
  RecentFileSummary,
} from './files.types';

const NOT_FOUND: NotFound = { ok: false, reason: 'NotFound' };

@Injectable()
export class RetrievalService {
  constructor(@Inject(BLOB_STORE) private readonly blobStore: BlobStore) {}

  async prepareDownload(id: string): Promise<DownloadResult> {
    const record = await this.blobStore.get(id);
    if (!record) return NOT_FOUND;

    return {
      ok: true,
      content: record.content,
      contentType: record.contentType,
      contentHash: record.contentHash,
      suggestedFilename: sanitizeFilename(record.name),
    };
  }

  async prepareDisplay(id: string): Promise<DisplayResult> {
    const record = await this.blobStore.get(id);
    if (!record) return NOT_FOUND;

    return {
      ok: true,
      content: record.content,
      contentType: record.contentType,
      contentHash: record.contentHash,
    };
  }

  async listRecent(limit: number = 5): Promise<RecentFileSummary[]> {
    const records = await this.blobStore.listRecent(limit);
    return records.map(({ id, name }) => ({ id, name }));
  }
}
