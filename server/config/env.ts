/**
 * Application Configuration
 *
 * Reads the process environment once, validates it with zod and returns a
 * frozen AppConfig. Components receive the config (or the slice they need)
 * through their entry points; nothing reads process.env after startup
 * except the logger.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';

// Empty strings in .env files mean "unset".
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const booleanFlag = (defaultValue: boolean) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .optional()
      .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1' || value === 'yes'))
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  DATABASE_URL: optionalString,
  DATABASE_SSL: booleanFlag(false),

  BLOB_STORAGE_PATH: z.string().min(1).default('./storage/blobs'),
  RULES_FILE: z.string().min(1).default('./config/rules.json'),
  TEMPLATES_DIR: z.string().min(1).default('./config/templates'),

  TEMPLATE_MATCH_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.8),
  SUGGESTION_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.6),

  AI_SUGGESTIONS_ENABLED: booleanFlag(true),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AI_SAMPLE_ROWS: z.coerce.number().int().min(0).max(20).default(3),

  BATCH_ENABLED: booleanFlag(true),
  BATCH_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
});

export interface AppConfig {
  readonly env: 'development' | 'production' | 'test';
  readonly port: number;
  readonly databaseUrl?: string;
  readonly databaseSsl: boolean;
  readonly blobStoragePath: string;
  readonly rulesFile: string;
  readonly templatesDir: string;
  readonly matching: {
    readonly threshold: number;
  };
  readonly suggestions: {
    readonly minScore: number;
    readonly aiEnabled: boolean;
    readonly sampleRows: number;
  };
  readonly openai: {
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly model: string;
    readonly timeoutMs: number;
  };
  readonly batch: {
    readonly enabled: boolean;
    readonly intervalMinutes: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration:\n  ${issues.join('\n  ')}`, { issues });
  }

  const values = parsed.data;

  return Object.freeze({
    env: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    databaseSsl: values.DATABASE_SSL,
    blobStoragePath: values.BLOB_STORAGE_PATH,
    rulesFile: values.RULES_FILE,
    templatesDir: values.TEMPLATES_DIR,
    matching: Object.freeze({
      threshold: values.TEMPLATE_MATCH_THRESHOLD,
    }),
    suggestions: Object.freeze({
      minScore: values.SUGGESTION_MIN_SCORE,
      aiEnabled: values.AI_SUGGESTIONS_ENABLED,
      sampleRows: values.AI_SAMPLE_ROWS,
    }),
    openai: Object.freeze({
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.OPENAI_MODEL,
      timeoutMs: values.AI_TIMEOUT_MS,
    }),
    batch: Object.freeze({
      enabled: values.BATCH_ENABLED,
      intervalMinutes: values.BATCH_INTERVAL_MINUTES,
    }),
  });
}

/**
 * The AI collaborator is used only when it is both switched on and has a key.
 */
export function isAiConfigured(config: AppConfig): boolean {
  return config.suggestions.aiEnabled && Boolean(config.openai.apiKey);
}
