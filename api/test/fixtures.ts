import { IncomingFile } from '../src/files/files.types';
import { UploadPolicy } from '../src/config/upload.config';

export const TEST_POLICY: UploadPolicy = {
  allowedContentTypes: ['image/jpeg', 'image/png', 'image/gif'],
  maxFileSize: 5 * 1024 * 1024,
};

export function incomingFile(
  overrides: Partial<Omit<IncomingFile, 'read'>> & { content?: Buffer } = {},
): IncomingFile & { read: jest.Mock<Buffer, []> } {
  const content = overrides.content ?? Buffer.alloc(10, 1);
  return {
    originalName: overrides.originalName ?? 'a.png',
    contentType: overrides.contentType ?? 'image/png',
    size: overrides.size ?? content.length,
    read: jest.fn(() => content),
  };
}
