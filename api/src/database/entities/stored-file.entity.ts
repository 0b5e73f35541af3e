import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export const MAX_NAME_LENGTH = 255;

@Entity('stored_files')
export class StoredFile {
  // MySQL bigint은 문자열로 반환된다
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'varchar', length: MAX_NAME_LENGTH })
  name!: string;

  @Column({ type: 'longblob' })
  content!: Buffer;

  @Column({ name: 'content_type', type: 'varchar', length: 100 })
  contentType!: string;

  @Column({ name: 'file_size', type: 'int' })
  fileSize!: number;

  @Column({ name: 'content_hash', type: 'char', length: 64 })
  contentHash!: string;

  @Index('IDX_stored_files_created_at')
  @CreateDateColumn({ name: 'created_at', type: 'datetime', precision: 6 })
  createdAt!: Date;
}
