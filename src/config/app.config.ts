import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { validateConfig } from '../utils/validate-config';
import { AppConfig } from './app-config.type';

const AppEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  APP_PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().min(1).default('api'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export default registerAs<AppConfig>('app', () => {
  const env = validateConfig(process.env, AppEnvSchema);

  return {
    nodeEnv: env.NODE_ENV,
    port: env.APP_PORT,
    apiPrefix: env.API_PREFIX,
    logLevel: env.LOG_LEVEL,
  };
});
