import { z } from 'zod';

/**
 * Parses the process environment against a zod schema and fails fast at boot
 * with every offending variable listed.
 */
export function validateConfig<TSchema extends z.ZodTypeAny>(
  env: Record<string, string | undefined>,
  schema: TSchema,
): z.infer<TSchema> {
  const result = schema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return result.data;
}
