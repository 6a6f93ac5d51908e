import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';
import { PROVIDER_TYPES } from '../integrations/shared/stats-provider.types';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Seasons processed when --seasons is not given (comma-separated)
  DEFAULT_SEASONS: z
    .string()
    .default('2025')
    .transform((val) => val.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
    .pipe(z.array(z.string().regex(/^\d{4}$/, 'seasons must be 4-digit years')).min(1))
    .transform((seasons) => seasons.map((s) => parseInt(s, 10))),

  // Where CSV reports are written
  OUTPUT_DIR: z.string().min(1).default('output'),

  // Stats provider
  STATS_PROVIDER: z.enum(PROVIDER_TYPES).default('nflverse'),

  // nflverse data releases
  NFLVERSE_BASE_URL: z
    .string()
    .url()
    .default('https://github.com/nflverse/nflverse-data/releases/download'),
  HTTP_TIMEOUT_MS: z
    .string()
    .default('60000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
});

/**
 * Parse and validate environment variables.
 * Accepts an explicit source so tests do not depend on the process environment.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env) => {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
