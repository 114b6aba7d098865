import path from 'path';
import type { ArrayStrategy } from '../types/replay';
import { ARRAY_STRATEGIES } from '../types/replay';

/**
 * Service configuration, read once from the environment.
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function strategyFromEnv(name: string): ArrayStrategy {
  const raw = process.env[name];
  return ARRAY_STRATEGIES.find(strategy => strategy === raw) ?? 'grouped';
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  /** Optional throttle between batch inserts, for debugging */
  insertDelayMs: number;
}

export interface ServiceConfig {
  port: number;
  storageDir: string;
  /** Uploads older than this are removed at startup */
  storageMaxAgeMs: number;
  useDatabase: boolean;
  batchSize: number;
  batchFlushIntervalMs: number;
  jobResultTtlMs: number;
  /** Documents kept in a job result */
  sampleSize: number;
  defaultArrayStrategy: ArrayStrategy;
  database: DatabaseConfig;
}

export function loadConfig(): ServiceConfig {
  return {
    port: intFromEnv('PORT', 3001),
    storageDir: process.env.STORAGE_DIR || path.join(process.cwd(), 'storage'),
    storageMaxAgeMs: intFromEnv('STORAGE_MAX_AGE_MS', 3600000), // 1 hour
    useDatabase: process.env.USE_DATABASE !== 'false',
    batchSize: intFromEnv('DB_BATCH_SIZE', 100),
    batchFlushIntervalMs: intFromEnv('BATCH_FLUSH_INTERVAL_MS', 5000),
    jobResultTtlMs: intFromEnv('JOB_RESULT_TTL_MS', 3600000),
    sampleSize: intFromEnv('SAMPLE_SIZE', 20),
    defaultArrayStrategy: strategyFromEnv('ARRAY_STRATEGY'),
    database: {
      host: process.env.DB_HOST || 'localhost',
      port: intFromEnv('DB_PORT', 5432),
      database: process.env.DB_NAME || 'csvreplay',
      user: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || '',
      max: intFromEnv('DB_POOL_MAX', 5),
      insertDelayMs: intFromEnv('DB_INSERT_DELAY_MS', 0),
    },
  };
}
