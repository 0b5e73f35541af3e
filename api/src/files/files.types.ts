export interface BlobRecord {
  id: string;
  name: string;
  content: Buffer;
  contentType: string;
  size: number;
  contentHash: string;
  createdAt: Date;
}

export interface NewBlob {
  name: string;
  content: Buffer;
  contentType: string;
}

export type RejectionReason =
  | 'UnsupportedType'
  | 'TooLarge'
  | 'EmptyFile'
  | 'NameTooLong';

export type ValidationResult =
  | { ok: true }
  | { ok: false; reason: RejectionReason; message: string };

export type ValidationFailure = Extract<ValidationResult, { ok: false }>;

/**
 * 업로드된 파일. 메타데이터는 바로 읽을 수 있고,
 * 본문은 검증을 통과한 뒤에만 read()로 읽는다.
 */
export interface IncomingFile {
  originalName: string;
  contentType: string;
  size: number;
  read(): Buffer | Promise<Buffer>;
}

export type IngestResult = { ok: true; id: string } | ValidationFailure;

export type NotFound = { ok: false; reason: 'NotFound' };

export interface DownloadPayload {
  content: Buffer;
  contentType: string;
  contentHash: string;
  suggestedFilename: string;
}

export interface DisplayPayload {
  content: Buffer;
  contentType: string;
  contentHash: string;
}

export type DownloadResult = ({ ok: true } & DownloadPayload) | NotFound;

export type DisplayResult = ({ ok: true } & DisplayPayload) | NotFound;

export interface RecentFileSummary {
  id: string;
  name: string;
}
