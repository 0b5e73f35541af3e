import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StoredFile } from '../database/entities';
import { UploadConfig } from '../config/upload.config';
import { FilesController } from './files.controller';
import { IngestService } from './ingest.service';
import { RetrievalService } from './retrieval.service';
import { UploadValidator, UPLOAD_POLICY } from './upload-validator';
import { BLOB_STORE } from './blob-store';
import { TypeOrmBlobStore } from './typeorm-blob-store';
import { uploadMulterOptions } from './multer-options';

@Module({
  imports: [
    TypeOrmModule.forFeature([StoredFile]),
    // FileInterceptor가 쓰는 multer 제한
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        uploadMulterOptions(configService.getOrThrow<UploadConfig>('upload')),
    }),
  ],
  controllers: [FilesController],
  providers: [
    {
      provide: UPLOAD_POLICY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        configService.getOrThrow<UploadConfig>('upload'),
    },
    { provide: BLOB_STORE, useClass: TypeOrmBlobStore },
    UploadValidator,
    IngestService,
    RetrievalService,
  ],
  exports: [IngestService, RetrievalService, BLOB_STORE],
})
export class FilesModule {}
