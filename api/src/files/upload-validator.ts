import { Inject, Injectable } from '@nestjs/common';
import { MAX_NAME_LENGTH } from '../database/entities';
import { UploadPolicy } from '../config/upload.config';
import { ValidationFailure, ValidationResult } from './files.types';

export const UPLOAD_POLICY = Symbol('UPLOAD_POLICY');

const MEGABYTE = 1024 * 1024;

export function normalizeContentType(contentType: string): string {
  return contentType.trim().toLowerCase();
}

export function describeSizeLimit(maxFileSize: number): string {
  if (maxFileSize >= MEGABYTE) {
    return `${Math.floor(maxFileSize / MEGABYTE)} MB`;
  }
  return `${maxFileSize} bytes`;
}

/**
 * 선언된 메타데이터(타입, 크기, 이름)만 검사한다.
 * 검사 순서: 타입 → 빈 파일 → 크기 → 이름 길이. 첫 번째 위반만 보고한다.
 */
@Injectable()
export class UploadValidator {
  private readonly allowed: Set<string>;

  constructor(@Inject(UPLOAD_POLICY) private readonly policy: UploadPolicy) {
    this.allowed = new Set(policy.allowedContentTypes.map(normalizeContentType));
  }

  get maxFileSize(): number {
    return this.policy.maxFileSize;
  }

  validate(
    declaredContentType: string,
    sizeInBytes: number,
    name: string = '',
  ): ValidationResult {
    if (!this.allowed.has(normalizeContentType(declaredContentType))) {
      return {
        ok: false,
        reason: 'UnsupportedType',
        message: `Invalid file type. Only ${this.policy.allowedContentTypes.join(', ')} files are allowed.`,
      };
    }

    if (sizeInBytes <= 0) {
      return this.rejectEmpty();
    }

    if (sizeInBytes > this.policy.maxFileSize) {
      return this.tooLarge();
    }

    if (name.length > MAX_NAME_LENGTH) {
      return {
        ok: false,
        reason: 'NameTooLong',
        message: `Ensure the file name has at most ${MAX_NAME_LENGTH} characters.`,
      };
    }

    return { ok: true };
  }

  /** 실제로 읽은 바이트 수 재검사 (선언 크기와 다를 수 있다) */
  validateActualSize(sizeInBytes: number): ValidationResult {
    if (sizeInBytes <= 0) return this.rejectEmpty();
    if (sizeInBytes > this.policy.maxFileSize) return this.tooLarge();
    return { ok: true };
  }

  tooLarge(): ValidationFailure {
    return {
      ok: false,
      reason: 'TooLarge',
      message: `File size exceeds the limit of ${describeSizeLimit(this.policy.maxFileSize)}.`,
    };
  }

  private rejectEmpty(): ValidationFailure {
    return {
      ok: false,
      reason: 'EmptyFile',
      message: 'The submitted file is empty.',
    };
  }
}
