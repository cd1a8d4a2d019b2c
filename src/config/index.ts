import { z } from 'zod';
import { loadEnv } from './env';
import { ValidationError } from '../utils/errors';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  /** When set, error and combined logs are also written under this directory */
  LOG_DIR: z.string().min(1).optional(),
  /** Seconds a TextGrid word boundary may differ from its phonemes' boundary */
  TEXTGRID_BOUNDARY_TOLERANCE: z.coerce.number().nonnegative().default(0),
});

export interface AppConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  logDir?: string;
  textGridBoundaryTolerance: number;
}

let cached: AppConfig | null = null;

/** Parse an environment into config. Pure; `getConfig` caches the result for process.env. */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    logDir: result.data.LOG_DIR,
    textGridBoundaryTolerance: result.data.TEXTGRID_BOUNDARY_TOLERANCE,
  };
}

export function getConfig(): AppConfig {
  if (!cached) {
    loadEnv();
    cached = parseConfig(process.env);
  }
  return cached;
}

export function resetConfig(): void {
  cached = null;
}
