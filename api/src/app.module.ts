import { Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { FilesModule } from './files/files.module';
import { HealthModule } from './health/health.module';
import { StoredFile } from './database/entities';
import { migrations } from './database/migrations';
import { StorageExceptionFilter } from './common/filters/storage-exception.filter';
import { TimingInterceptor } from './common/interceptors/timing.interceptor';
import databaseConfig, { DatabaseConfig } from './config/database.config';
import appConfig from './config/app.config';
import uploadConfig from './config/upload.config';

@Module({
  imports: [
    // 환경변수 설정
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, appConfig, uploadConfig],
    }),

    // TypeORM 설정
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TypeOrmModuleOptions => {
        const dbConfig = configService.getOrThrow<DatabaseConfig>('database');
        return {
          type: 'mysql',
          host: dbConfig.host,
          port: dbConfig.port,
          username: dbConfig.username,
          password: dbConfig.password,
          database: dbConfig.database,
          entities: [StoredFile],
          migrations,
          migrationsRun: dbConfig.migrationsRun,
          synchronize: false,
          logging: dbConfig.logging,
          // 커넥션 풀 설정
          extra: {
            connectionLimit: dbConfig.poolSize,
            waitForConnections: true,
          },
          poolSize: dbConfig.poolSize,
        };
      },
    }),

    // 기능 모듈
    FilesModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: StorageExceptionFilter },
    { provide: APP_INTERCEPTOR, useClass: TimingInterceptor },
  ],
})
export class AppModule {}
