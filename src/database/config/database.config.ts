import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { validateConfig } from '../../utils/validate-config';
import { DatabaseConfig } from './database-config.type';

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const DatabaseEnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('rezzy.db'),
  DATABASE_DROP_SCHEMA: booleanFlag.default('false'),
  DATABASE_SEED: booleanFlag.default('true'),
});

export default registerAs<DatabaseConfig>('database', () => {
  const env = validateConfig(process.env, DatabaseEnvSchema);

  return {
    path: env.DATABASE_PATH,
    dropSchema: env.DATABASE_DROP_SCHEMA,
    seed: env.DATABASE_SEED,
  };
});
