import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { createHash } from 'crypto';
import { StoredFile } from '../database/entities';
import { StoreUnavailableException } from '../common/filters/storage-exception.filter';
import { BlobStore } from './blob-store';
import { BlobRecord, NewBlob } from './files.types';

const NUMERIC_ID = /^[1-9]\d{0,18}$/;

@Injectable()
export class TypeOrmBlobStore implements BlobStore {
  private readonly logger = new Logger(TypeOrmBlobStore.name);

  constructor(
    @InjectRepository(StoredFile)
    private readonly storedFileRepository: Repository<StoredFile>,
  ) {}

  async create(blob: NewBlob): Promise<string> {
    if (blob.content.length === 0 || blob.contentType.length === 0) {
      throw new TypeError('content and contentType must be non-empty');
    }

    const storedFile = this.storedFileRepository.create({
      name: blob.name,
      content: blob.content,
      contentType: blob.contentType,
      fileSize: blob.content.length,
      contentHash: createHash('sha256').update(blob.content).digest('hex'),
    });

    // save()는 INSERT 커밋 후 반환한다 (read-your-writes)
    const saved = await this.withStore('create', () =>
      this.storedFileRepository.save(storedFile),
    );
    return String(saved.id);
  }

  async get(id: string): Promise<BlobRecord | null> {
    // 숫자가 아닌 id는 조회 없이 NotFound
    if (!NUMERIC_ID.test(id)) return null;

    const storedFile = await this.withStore('get', () =>
      this.storedFileRepository.findOne({ where: { id } }),
    );
    return storedFile ? toRecord(storedFile) : null;
  }

  async listRecent(limit: number): Promise<BlobRecord[]> {
    if (limit <= 0) return [];

    const storedFiles = await this.withStore('listRecent', () =>
      this.storedFileRepository.find({
        order: { createdAt: 'DESC', id: 'DESC' },
        take: limit,
      }),
    );
    return storedFiles.map(toRecord);
  }

  async count(): Promise<number> {
    return this.withStore('count', () => this.storedFileRepository.count());
  }

  private async withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Store ${operation} failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new StoreUnavailableException(`Store ${operation} failed`, {
        cause: error,
      });
    }
  }
}

function toRecord(storedFile: StoredFile): BlobRecord {
  return {
    id: String(storedFile.id),
    name: storedFile.name,
    content: storedFile.content,
    contentType: storedFile.contentType,
    size: storedFile.fileSize,
    contentHash: storedFile.contentHash,
    createdAt: storedFile.createdAt,
  };
}
