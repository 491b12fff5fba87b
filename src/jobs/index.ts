/**
 * Jobs Module - Barrel Export
 */

export type { Job, JobContext, JobProgress, JobStatus, JobTask, JobTrackerOptions } from './job-tracker.js';
export { JobTracker, DEFAULT_MAX_JOBS, isTerminal, progressPercentage } from './job-tracker.js';
export type { ImportDeps, ImportFormat, ImportRequest, ImportResult } from './import-jobs.js';
export { startImportJob, ImportRequestSchema, IMPORT_FORMATS, IMPORT_JOB_TYPE } from './import-jobs.js';
