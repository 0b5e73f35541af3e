import { MulterModuleOptions } from '@nestjs/platform-express';
import { UploadPolicy } from '../config/upload.config';

/**
 * 메모리 버퍼링 상한. 최대 크기보다 1바이트 더 받아야 초과 여부를 알 수 있다.
 * 초과분은 multer가 413(PayloadTooLargeException)으로 끊는다.
 */
export function uploadMulterOptions(policy: UploadPolicy): MulterModuleOptions {
  return {
    limits: {
      fileSize: policy.maxFileSize + 1,
      files: 1,
    },
  };
}
