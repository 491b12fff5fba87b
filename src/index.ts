/**
 * Application Entry Point
 *
 * Opens the configured store and starts the Express API. Background jobs
 * (imports, reclassification) run in this process on the job tracker.
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Cancel jobs still pending or running and wait for their tasks to settle
 * 3. Close the store
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './api/server.js';
import { appConfig } from './config.js';
import { isTerminal } from './jobs/job-tracker.js';
import { createServices } from './services.js';

async function main() {
  console.log('[startup] Feedback Radar starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Storage backend:', appConfig.storage.backend);

  const services = await createServices();
  const { store, tracker } = services;

  const app = createApp(services);
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    const active = tracker.listJobs().filter(job => !isTerminal(job.status));
    for (const job of active) {
      tracker.cancelJob(job.id);
    }
    await Promise.all(active.map(job => tracker.waitForJob(job.id)));
    console.log('[shutdown] Background jobs stopped', { cancelled: active.length });

    await store.close();
    console.log('[shutdown] Store closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
