import { registerAs } from '@nestjs/config';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolSize: number;
  logging: boolean;
  migrationsRun: boolean;
}

export default registerAs(
  'database',
  (): DatabaseConfig => ({
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USERNAME || 'root',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_DATABASE || 'file_manager',

    // 커넥션 풀 크기
    poolSize: parseInt(process.env.DB_POOL_SIZE || '10', 10),

    // 로깅 설정
    logging: process.env.DB_LOGGING === 'true',

    // 기동 시 마이그레이션 실행 여부
    migrationsRun: process.env.DB_MIGRATIONS_RUN !== 'false',
  }),
);
