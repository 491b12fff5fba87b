/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the HTTP server, the storage
 * backend and the background job tracker. Gemini settings live in
 * src/gateway/config.ts and follow the same pattern.
 *
 * Environment variables:
 * - PORT: HTTP server port (default 3000)
 * - APP_ENV: 'production' disables development defaults
 * - STORAGE_BACKEND: 'sqlite' (default) or 'postgres'
 * - SQLITE_PATH: SQLite database file (default ./data/feedback.db)
 * - SUPABASE_URL / SUPABASE_SERVICE_KEY: Required when STORAGE_BACKEND=postgres
 * - EMBEDDING_DIMENSIONS: Vector length enforced by the store (default 768)
 * - MAX_JOBS: Job table size that triggers eviction (default 100)
 */

import 'dotenv/config';

export type StorageBackend = 'sqlite' | 'postgres';

export interface AppConfig {
  isDev: boolean;
  server: {
    port: number;
  };
  storage: {
    backend: StorageBackend;
    sqlitePath: string;
    supabaseUrl: string;
    supabaseKey: string;
    embeddingDimensions: number;
  };
  jobs: {
    maxJobs: number;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function parseBackend(value: string): StorageBackend {
  if (value === 'sqlite' || value === 'postgres') return value;
  throw new Error(`Unsupported STORAGE_BACKEND "${value}". Use "sqlite" or "postgres".`);
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';
const backend = parseBackend(optionalEnv('STORAGE_BACKEND', 'sqlite'));

export const appConfig: AppConfig = {
  isDev,
  server: {
    port: parseInt(optionalEnv('PORT', '3000'), 10),
  },
  storage: {
    backend,
    sqlitePath: optionalEnv('SQLITE_PATH', './data/feedback.db'),
    supabaseUrl: backend === 'postgres' ? requiredEnv('SUPABASE_URL') : optionalEnv('SUPABASE_URL'),
    supabaseKey: backend === 'postgres' ? requiredEnv('SUPABASE_SERVICE_KEY') : optionalEnv('SUPABASE_SERVICE_KEY'),
    embeddingDimensions: parseInt(optionalEnv('EMBEDDING_DIMENSIONS', '768'), 10),
  },
  jobs: {
    maxJobs: parseInt(optionalEnv('MAX_JOBS', '100'), 10),
  },
};
