import { registerAs } from '@nestjs/config';

export const DEFAULT_ALLOWED_CONTENT_TYPES = [
  'image/jpeg',
  'image/png',
  'image/gif',
];

// 5 MB
export const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

export const DEFAULT_RECENT_LIMIT = 5;

export interface UploadPolicy {
  allowedContentTypes: string[];
  maxFileSize: number;
}

export interface UploadConfig extends UploadPolicy {
  recentLimit: number;
}

export function parseContentTypeList(
  raw: string | undefined,
  fallback: string[] = DEFAULT_ALLOWED_CONTENT_TYPES,
): string[] {
  if (raw === undefined) return [...fallback];

  const types = raw
    .split(',')
    .map((type) => type.trim().toLowerCase())
    .filter((type) => type.length > 0);

  return types.length > 0 ? types : [...fallback];
}

export function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) return fallback;
  return parseInt(raw, 10);
}

export function loadUploadConfig(env: NodeJS.ProcessEnv): UploadConfig {
  return {
    allowedContentTypes: parseContentTypeList(
      env.UPLOAD_ALLOWED_CONTENT_TYPES,
    ),
    maxFileSize: parseNonNegativeInt(
      env.UPLOAD_MAX_FILE_SIZE,
      DEFAULT_MAX_FILE_SIZE,
    ),
    recentLimit: parseNonNegativeInt(
      env.UPLOAD_RECENT_LIMIT,
      DEFAULT_RECENT_LIMIT,
    ),
  };
}

export default registerAs('upload', () => loadUploadConfig(process.env));
