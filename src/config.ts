import { z } from 'zod';
import { ConfigError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const EnvSchema = z.object({
  DOCQUERY_MONGO_URL: z
    .string()
    .regex(/^mongodb(\+srv)?:\/\//, 'must start with mongodb:// or mongodb+srv://')
    .optional(),
  DOCQUERY_DATABASE: z.string().min(1).default('app'),
  DOCQUERY_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  DOCQUERY_ALLOW_DISK_USE: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
  DOCQUERY_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
});

export interface EngineConfig {
  mongoUrl: string | null;
  database: string;
  batchSize: number;
  allowDiskUse: boolean;
  logLevel: (typeof LOG_LEVELS)[number];
}

/** Reads engine settings from the environment. Throws ConfigError listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, result.error);
  }
  const parsed = result.data;
  return {
    mongoUrl: parsed.DOCQUERY_MONGO_URL ?? null,
    database: parsed.DOCQUERY_DATABASE,
    batchSize: parsed.DOCQUERY_BATCH_SIZE,
    allowDiskUse: parsed.DOCQUERY_ALLOW_DISK_USE,
    logLevel: parsed.DOCQUERY_LOG_LEVEL,
  };
}
