import { registerAs } from '@nestjs/config';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  shutdownTimeout: number;
  slowRequestThreshold: number;
}

export default registerAs(
  'app',
  (): AppConfig => ({
    port: parseInt(process.env.PORT || '3000', 10),
    nodeEnv: process.env.NODE_ENV || 'development',

    // Graceful shutdown 타임아웃
    shutdownTimeout: parseInt(process.env.SHUTDOWN_TIMEOUT || '30000', 10),

    // 느린 요청으로 간주할 기준 (ms)
    slowRequestThreshold: parseInt(
      process.env.SLOW_REQUEST_THRESHOLD || '500',
      10,
    ),
  }),
);
