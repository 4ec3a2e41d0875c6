import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { logger, type LogLevel } from './utils/logger.js';

export interface AppConfig {
  logFile?: string;
  logDir: string;
  outputDir: string;
  logLevel: LogLevel;
  port: number;
}

const DEFAULTS = {
  logDir: 'logs',
  outputDir: '.',
  logLevel: 'info',
  port: 3000,
} as const satisfies Omit<AppConfig, 'logFile'>;

const envSchema = z.object({
  RESILIENCE_LOG_FILE: z.string().min(1).optional(),
  RESILIENCE_LOG_DIR: z.string().min(1).default(DEFAULTS.logDir),
  RESILIENCE_OUTPUT_DIR: z.string().min(1).default(DEFAULTS.outputDir),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default(DEFAULTS.logLevel),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULTS.port),
});

/**
 * Build configuration from the environment. Invalid values fall back to
 * their defaults with a warning.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (result.success) {
    const parsed = result.data;
    return Object.freeze({
      logFile: parsed.RESILIENCE_LOG_FILE,
      logDir: parsed.RESILIENCE_LOG_DIR,
      outputDir: parsed.RESILIENCE_OUTPUT_DIR,
      logLevel: parsed.LOG_LEVEL,
      port: parsed.PORT,
    });
  }

  const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  logger.warn('Invalid configuration values, using defaults', { keys: [...invalid] });

  const cleaned: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!invalid.has(key)) cleaned[key] = value;
  }
  return parseConfig(cleaned);
}

let cached: AppConfig | undefined;

export function loadConfig(): AppConfig {
  if (!cached) {
    loadDotenv();
    cached = parseConfig(process.env);
  }
  return cached;
}
