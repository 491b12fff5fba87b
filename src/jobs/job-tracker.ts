/**
 * In-Process Job Tracker
 *
 * Tracks long-running background work (bulk imports, reclassification) so
 * callers can start it, poll progress and cancel it.
 *
 * Lifecycle: pending -> running -> completed | failed | cancelled.
 * Terminal states are final. Cancellation is cooperative: the task sees
 * `isCancelled()` turn true and stops at its next unit of work; anything it
 * already wrote stays written.
 *
 * The job table is only read or written inside the synchronous methods below,
 * so each call is one critical section on the event loop. Tasks run as
 * independent promises and only reach the table through those methods.
 *
 * When the table reaches `maxJobs`, half of the terminal jobs whose tasks have
 * settled are evicted, oldest completion first.
 *
 * Consumers: jobs/import-jobs.ts, api/server.ts, cli.ts
 */

import { randomUUID } from 'node:crypto';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

const TERMINAL: ReadonlySet<JobStatus> = new Set(['completed', 'failed', 'cancelled']);

export interface JobProgress {
  current: number;
  total: number;
  successful: number;
  errors: number;
  message: string;
}

export interface Job {
  id: string;
  type: string;
  status: JobStatus;
  progress: JobProgress;
  /** Task result once completed */
  result: unknown;
  /** Failure message once failed */
  error: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

/** What a background task can see of its own job */
export interface JobContext {
  jobId: string;
  isCancelled(): boolean;
  updateProgress(patch: Partial<JobProgress>): void;
}

export type JobTask<R> = (context: JobContext) => Promise<R>;

export interface JobTrackerOptions {
  maxJobs?: number;
  now?: () => Date;
  idFactory?: () => string;
}

export const DEFAULT_MAX_JOBS = 100;

/** current / total as a percentage; 0 when total is 0 */
export function progressPercentage(progress: JobProgress): number {
  return progress.total > 0 ? (progress.current / progress.total) * 100 : 0;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

interface JobEntry {
  job: Job;
  /** Creation order, newest-first tie breaker */
  seq: number;
}

export class JobTracker {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly maxJobs: number;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private seq = 0;

  constructor(options: JobTrackerOptions = {}) {
    this.maxJobs = options.maxJobs ?? DEFAULT_MAX_JOBS;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => randomUUID().slice(0, 8));
  }

  createJob(type: string): Job {
    if (this.jobs.size >= this.maxJobs) {
      this.evictTerminalJobs();
    }

    let id = this.idFactory();
    while (this.jobs.has(id)) {
      id = this.idFactory();
    }

    const job: Job = {
      id,
      type,
      status: 'pending',
      progress: { current: 0, total: 0, successful: 0, errors: 0, message: '' },
      result: null,
      error: null,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
    };
    this.jobs.set(id, { job, seq: this.seq++ });
    return snapshot(job);
  }

  /** A copy of the job, or null when unknown (never created or evicted) */
  getJob(id: string): Job | null {
    const entry = this.jobs.get(id);
    return entry ? snapshot(entry.job) : null;
  }

  /** Newest first, optionally only one type */
  listJobs(type?: string): Job[] {
    return [...this.jobs.values()]
      .filter(entry => type === undefined || entry.job.type === type)
      .sort((a, b) => b.job.createdAt.getTime() - a.job.createdAt.getTime() || b.seq - a.seq)
      .map(entry => snapshot(entry.job));
  }

  /** pending -> running */
  startJob(id: string): boolean {
    const job = this.jobs.get(id)?.job;
    if (!job || job.status !== 'pending') return false;
    job.status = 'running';
    job.startedAt = this.now();
    return true;
  }

  /** Merge only the given fields. Ignored once the job is terminal. */
  updateProgress(id: string, patch: Partial<JobProgress>): boolean {
    const job = this.jobs.get(id)?.job;
    if (!job || isTerminal(job.status)) return false;
    job.progress = {
      current: patch.current ?? job.progress.current,
      total: patch.total ?? job.progress.total,
      successful: patch.successful ?? job.progress.successful,
      errors: patch.errors ?? job.progress.errors,
      message: patch.message ?? job.progress.message,
    };
    return true;
  }

  completeJob(id: string, result: unknown): boolean {
    return this.finish(id, 'completed', (job) => {
      job.result = result;
    });
  }

  failJob(id: string, error: string): boolean {
    return this.finish(id, 'failed', (job) => {
      job.error = error;
    });
  }

  /**
   * Request cancellation of a pending or running job. False (and no change)
   * for unknown or already-terminal jobs.
   */
  cancelJob(id: string): boolean {
    return this.finish(id, 'cancelled', () => undefined);
  }

  isCancelled(id: string): boolean {
    return this.jobs.get(id)?.job.status === 'cancelled';
  }

  /**
   * Create a job and run `task` for it in the background. Returns the pending
   * job immediately. A task that resolves completes the job (unless it was
   * cancelled meanwhile); a task that rejects fails it.
   */
  runInBackground<R>(type: string, task: JobTask<R>): Job {
    const created = this.createJob(type);
    const jobId = created.id;

    const context: JobContext = {
      jobId,
      isCancelled: () => this.isCancelled(jobId),
      updateProgress: (patch) => {
        this.updateProgress(jobId, patch);
      },
    };

    const execution = Promise.resolve()
      .then(async () => {
        if (!this.startJob(jobId)) return;
        console.log('[jobs] Job started', { jobId, type });

        const result = await task(context);
        if (this.completeJob(jobId, result)) {
          console.log('[jobs] Job completed', { jobId, type });
        }
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        if (this.failJob(jobId, message)) {
          console.error('[jobs] Job failed', { jobId, type, error: message });
        }
      })
      .finally(() => {
        this.running.delete(jobId);
      });

    this.running.set(jobId, execution);
    return created;
  }

  /** Resolves with the job's final snapshot once its background task settles */
  async waitForJob(id: string): Promise<Job | null> {
    await this.running.get(id);
    return this.getJob(id);
  }

  /** Number of background tasks still executing */
  get activeTasks(): number {
    return this.running.size;
  }

  private finish(id: string, status: JobStatus, apply: (job: Job) => void): boolean {
    const job = this.jobs.get(id)?.job;
    if (!job || isTerminal(job.status)) return false;
    apply(job);
    job.status = status;
    job.completedAt = this.now();
    return true;
  }

  private evictTerminalJobs(): void {
    // Jobs whose task is still in flight are never evicted
    const terminal = [...this.jobs.values()]
      .filter(entry => isTerminal(entry.job.status) && !this.running.has(entry.job.id))
      .sort((a, b) =>
        (a.job.completedAt ?? a.job.createdAt).getTime() - (b.job.completedAt ?? b.job.createdAt).getTime(),
      );

    const evicted = terminal.slice(0, Math.floor(terminal.length / 2));
    for (const entry of evicted) {
      this.jobs.delete(entry.job.id);
    }
    if (evicted.length > 0) {
      console.log('[jobs] Evicted finished jobs', { evicted: evicted.length, remaining: this.jobs.size });
    }
  }
}

function snapshot(job: Job): Job {
  return {
    ...job,
    progress: { ...job.progress },
  };
}
