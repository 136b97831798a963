import { z } from 'zod';

const numeric = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((val) => parseInt(val, 10));

const flag = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true');

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.string().default('development'),

  // Target
  CRAWLER_TARGET_URL: z.string().url().optional(),
  OUTPUT_DIR: z.string().optional(),
  CACHE_DIR: z.string().optional(),

  // Browser
  BROWSER_HEADLESS: flag.optional(),
  CHROME_PATH: z.string().optional(),

  // Concurrency
  CONCURRENCY_ENABLED: flag.optional(),
  MAX_CONCURRENT_TASKS: numeric.optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'verbose', 'info', 'warn', 'error']).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses the crawler's environment variables. Unrelated variables are ignored.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
