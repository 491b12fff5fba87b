/**
 * Service Wiring
 *
 * Builds the store, the Gemini gateway and the services on top of them.
 * Shared by the HTTP entry point and the CLI.
 *
 * Consumers: index.ts, cli.ts
 */

import { appConfig } from './config.js';
import { createStore, type FeedbackStore } from './store/index.js';
import { GeminiGateway } from './gateway/index.js';
import { FeedbackIngester } from './ingestion/index.js';
import { FeedbackQueryService } from './query/index.js';
import { JobTracker } from './jobs/index.js';

export interface Services {
  store: FeedbackStore;
  ingester: FeedbackIngester;
  queryService: FeedbackQueryService;
  tracker: JobTracker;
}

export async function createServices(): Promise<Services> {
  const store = await createStore(appConfig.storage);
  const gateway = new GeminiGateway();

  return {
    store,
    ingester: new FeedbackIngester(store, gateway),
    queryService: new FeedbackQueryService(store, gateway),
    tracker: new JobTracker({ maxJobs: appConfig.jobs.maxJobs }),
  };
}
