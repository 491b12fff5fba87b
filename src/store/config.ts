/**
 * Store Configuration
 *
 * Resolves schema migration directories relative to the package root so the
 * same paths work from src/ (tsx, vitest) and dist/ (compiled).
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const storeConfig = {
  /** Ordered *.sql files applied by SqliteFeedbackStore.initialize() */
  sqliteMigrationsDir: path.resolve(__dirname, '../../migrations/sqlite'),
  /** Applied by hand (psql / Supabase SQL editor) before using the postgres backend */
  postgresMigrationsDir: path.resolve(__dirname, '../../migrations/postgres'),
};
