import { Logger } from '@nestjs/common';
import { InMemoryBlobStore } from '../../test/in-memory-blob-store';
import { incomingFile, TEST_POLICY } from '../../test/fixtures';
import { IngestService } from './ingest.service';
import { UploadValidator } from './upload-validator';

describe('IngestService', () => {
  let store: InMemoryBlobStore;
  let service: IngestService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    store = new InMemoryBlobStore();
    service = new IngestService(new UploadValidator(TEST_POLICY), store);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('10바이트 PNG를 저장하고 id를 반환한다', async () => {
    const content = Buffer.from('0123456789');
    const result = await service.ingest(
      incomingFile({ originalName: 'a.png', contentType: 'image/png', content }),
    );

    expect(result).toEqual({ ok: true, id: '1' });
    const record = await store.get('1');
    expect(record?.name).toBe('a.png');
    expect(record?.contentType).toBe('image/png');
    expect(record?.content.equals(content)).toBe(true);
  });

  it('선언된 타입을 정규화해서 저장한다', async () => {
    const result = await service.ingest(incomingFile({ contentType: ' IMAGE/PNG ' }));

    expect(result).toEqual({ ok: true, id: '1' });
    const record = await store.get('1');
    expect(record?.contentType).toBe('image/png');
  });

  it('매번 새로운 id를 발급한다', async () => {
    const ids = new Set<string>();
    for (let i = 0; i < 3; i++) {
      const result = await service.ingest(incomingFile());
      if (result.ok) ids.add(result.id);
    }
    expect(ids.size).toBe(3);
  });

  it('6,000,000 바이트 JPEG는 TooLarge이고 본문을 읽지 않는다', async () => {
    const file = incomingFile({
      contentType: 'image/jpeg',
      size: 6_000_000,
      content: Buffer.alloc(1),
    });

    const result = await service.ingest(file);

    expect(result).toMatchObject({ ok: false, reason: 'TooLarge' });
    expect(file.read).not.toHaveBeenCalled();
    await expect(store.count()).resolves.toBe(0);
  });

  it('100바이트 PDF는 UnsupportedType이고 저장소는 그대로다', async () => {
    const file = incomingFile({
      originalName: 'doc.pdf',
      contentType: 'application/pdf',
      content: Buffer.alloc(100),
    });

    const result = await service.ingest(file);

    expect(result).toMatchObject({ ok: false, reason: 'UnsupportedType' });
    expect(file.read).not.toHaveBeenCalled();
    await expect(store.count()).resolves.toBe(0);
  });

  it.each(['text/plain', 'application/octet-stream', 'image/webp'])(
    '%s 는 거부되고 레코드 수가 변하지 않는다',
    async (contentType) => {
      await service.ingest(incomingFile());
      const result = await service.ingest(incomingFile({ contentType }));

      expect(result).toMatchObject({ reason: 'UnsupportedType' });
      await expect(store.count()).resolves.toBe(1);
    },
  );

  it('선언 크기보다 실제 본문이 크면 읽은 뒤 TooLarge', async () => {
    const file = incomingFile({
      size: 10,
      content: Buffer.alloc(TEST_POLICY.maxFileSize + 1),
    });

    const result = await service.ingest(file);

    expect(result).toMatchObject({ ok: false, reason: 'TooLarge' });
    expect(file.read).toHaveBeenCalledTimes(1);
    await expect(store.count()).resolves.toBe(0);
  });

  it('실제 본문이 비어 있으면 EmptyFile', async () => {
    const file = incomingFile({ size: 10, content: Buffer.alloc(0) });

    const result = await service.ingest(file);

    expect(result).toMatchObject({ ok: false, reason: 'EmptyFile' });
    await expect(store.count()).resolves.toBe(0);
  });

  it('저장소 장애는 그대로 전파한다', async () => {
    jest.spyOn(store, 'create').mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(service.ingest(incomingFile())).rejects.toThrow('ECONNREFUSED');
  });
});
