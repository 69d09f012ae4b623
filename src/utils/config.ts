import { z } from 'zod';
import { ConfigError } from '../verifier/errors.js';

const connectionString = (name: string) =>
  z
    .string()
    .min(1, { message: `${name} cannot be empty.` })
    .refine((val) => val.includes('://'), {
      message: `${name} must be a connection URI including a scheme (e.g. "postgres://...").`,
    });

const envBoolean = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((val) => val === 'true' || val === '1');

const EnvSchema = z.object({
  DATABASE_URL: connectionString('DATABASE_URL').optional(),

  SOLR_URL: z.string().url('SOLR_URL must be a valid URL.').optional(),
  SOLR_USER: z.string().default(''),
  SOLR_PASSWORD: z.string().default(''),
  SOLR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SOLR_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  SOLR_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  SOLR_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  SYNC_WINDOW_HOURS: z.coerce.number().positive().default(24),
  SYNC_MAX_JOBS: z.coerce.number().int().min(0).default(0),
  TITLE_DIFF_POSITIONS: z.coerce.number().int().min(1).max(50).default(5),
  SKILLS_MAX_MISSING_RATIO: z.coerce.number().min(0).max(1).default(0),
  ALLOW_SYNC_FAILURES: envBoolean(true),

  REPORTS_DIR: z.string().min(1).default('reports'),
  HISTORY_DIR: z.string().min(1).default('logs/history'),
  HISTORY_MODULE: z
    .string()
    .regex(/^[a-z0-9_-]+$/i, 'HISTORY_MODULE may only contain letters, digits, "-" and "_".')
    .default('jobseeker'),
  HISTORY_TEST_NAME: z.string().min(1).default('test_t1_09_db_solr_sync_verification'),
  HISTORY_RETENTION_DAYS: z.coerce.number().int().min(1).max(365).default(7),
  HISTORY_KEEP_LATEST_ONLY: envBoolean(false),
});

export type Env = z.infer<typeof EnvSchema>;

export interface SolrConfig {
  url: string | undefined;
  user: string;
  password: string;
  timeoutMs: number;
  batchSize: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface SyncConfig {
  windowHours: number;
  maxJobs: number;
  titleDiffPositions: number;
  skillsMaxMissingRatio: number;
  allowFailures: boolean;
}

export interface HistoryConfig {
  dir: string;
  module: string;
  testName: string;
  retentionDays: number;
  keepLatestOnly: boolean;
}

export interface AppConfig {
  databaseUrl: string | undefined;
  solr: SolrConfig;
  sync: SyncConfig;
  reportsDir: string;
  history: HistoryConfig;
}

/**
 * Parses the environment into an {@link AppConfig}.
 * Throws a {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${details}`);
  }

  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    solr: {
      url: e.SOLR_URL,
      user: e.SOLR_USER,
      password: e.SOLR_PASSWORD,
      timeoutMs: e.SOLR_TIMEOUT_MS,
      batchSize: e.SOLR_BATCH_SIZE,
      maxRetries: e.SOLR_MAX_RETRIES,
      retryDelayMs: e.SOLR_RETRY_DELAY_MS,
    },
    sync: {
      windowHours: e.SYNC_WINDOW_HOURS,
      maxJobs: e.SYNC_MAX_JOBS,
      titleDiffPositions: e.TITLE_DIFF_POSITIONS,
      skillsMaxMissingRatio: e.SKILLS_MAX_MISSING_RATIO,
      allowFailures: e.ALLOW_SYNC_FAILURES,
    },
    reportsDir: e.REPORTS_DIR,
    history: {
      dir: e.HISTORY_DIR,
      module: e.HISTORY_MODULE,
      testName: e.HISTORY_TEST_NAME,
      retentionDays: e.HISTORY_RETENTION_DAYS,
      keepLatestOnly: e.HISTORY_KEEP_LATEST_ONLY,
    },
  };
}

export function requireSetting<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new ConfigError(`${name} environment variable is required`);
  }
  return value;
}
