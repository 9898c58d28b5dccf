import { z } from 'zod';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('debug'),
  LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),

  // Harness layout
  HARNESS_ROOT: z.string().min(1).optional(),
  HARNESS_CONFIG_FILE: z.string().min(1).optional(),

  // Fake data
  FAKER_SEED: z.coerce.number().int().nonnegative().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 * Throws detailed error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    console.error('❌ Invalid environment variables:');
    console.error(JSON.stringify(errors, null, 2));
    throw new Error('Environment validation failed');
  }

  return result.data;
}

/**
 * Validated environment variables
 * Use this throughout the application
 */
export const env = parseEnv();
