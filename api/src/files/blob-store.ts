import { BlobRecord, NewBlob } from './files.types';

export const BLOB_STORE = Symbol('BLOB_STORE');

/**
 * id → 레코드 저장소. 생성/조회만 있고 수정·삭제는 없다.
 * 기대된 결과(없음)는 null로 반환하고, 저장소 장애만 예외로 던진다.
 */
export interface BlobStore {
  create(blob: NewBlob): Promise<string>;
  get(id: string): Promise<BlobRecord | null>;
  /** createdAt 내림차순, 동률이면 id 내림차순 */
  listRecent(limit: number): Promise<BlobRecord[]>;
  /** 저장된 레코드 수. 헬스 체크에서 저장소 접근 확인용으로도 쓴다 */
  count(): Promise<number>;
}
