/**
 * Tests for JobTracker
 *
 * Tests cover:
 * - lifecycle transitions and terminal-state finality
 * - progress merging and percentage
 * - listing order and type filter
 * - eviction of finished jobs at capacity
 * - background execution: completion, failure, cooperative cancellation
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { JobTracker, progressPercentage, isTerminal } from '../job-tracker.js';

let clock: number;
let tracker: JobTracker;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  clock = Date.parse('2026-03-15T00:00:00.000Z');
  let next = 0;
  tracker = new JobTracker({
    now: () => new Date(clock),
    idFactory: () => `job-${++next}`,
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('lifecycle', () => {
  it('creates pending jobs with empty progress', () => {
    const job = tracker.createJob('import');

    expect(job).toEqual({
      id: 'job-1',
      type: 'import',
      status: 'pending',
      progress: { current: 0, total: 0, successful: 0, errors: 0, message: '' },
      result: null,
      error: null,
      createdAt: new Date('2026-03-15T00:00:00.000Z'),
      startedAt: null,
      completedAt: null,
    });
  });

  it('moves pending -> running -> completed', () => {
    const { id } = tracker.createJob('import');

    clock += 1000;
    expect(tracker.startJob(id)).toBe(true);
    expect(tracker.startJob(id)).toBe(false);

    clock += 1000;
    expect(tracker.completeJob(id, { imported: 3 })).toBe(true);

    expect(tracker.getJob(id)).toMatchObject({
      status: 'completed',
      result: { imported: 3 },
      startedAt: new Date('2026-03-15T00:00:01.000Z'),
      completedAt: new Date('2026-03-15T00:00:02.000Z'),
    });
  });

  it('records the failure message', () => {
    const { id } = tracker.createJob('reclassify');
    tracker.startJob(id);

    expect(tracker.failJob(id, 'gateway unavailable')).toBe(true);
    expect(tracker.getJob(id)).toMatchObject({ status: 'failed', error: 'gateway unavailable' });
  });

  it('never leaves a terminal state', () => {
    const { id } = tracker.createJob('import');
    tracker.completeJob(id, 'done');

    expect(tracker.cancelJob(id)).toBe(false);
    expect(tracker.failJob(id, 'late')).toBe(false);
    expect(tracker.completeJob(id, 'again')).toBe(false);
    expect(tracker.startJob(id)).toBe(false);
    expect(tracker.getJob(id)).toMatchObject({ status: 'completed', result: 'done', error: null });
  });

  it('cancels pending and running jobs', () => {
    const pending = tracker.createJob('import');
    const running = tracker.createJob('import');
    tracker.startJob(running.id);

    expect(tracker.cancelJob(pending.id)).toBe(true);
    expect(tracker.cancelJob(running.id)).toBe(true);
    expect(tracker.isCancelled(running.id)).toBe(true);
    expect(tracker.getJob(running.id)?.completedAt).not.toBeNull();
  });

  it('returns false and null for unknown ids', () => {
    expect(tracker.cancelJob('nope')).toBe(false);
    expect(tracker.updateProgress('nope', { current: 1 })).toBe(false);
    expect(tracker.getJob('nope')).toBeNull();
    expect(tracker.isCancelled('nope')).toBe(false);
  });

  it('hands out copies that do not alias the stored job', () => {
    const { id } = tracker.createJob('import');
    const copy = tracker.getJob(id);
    if (copy) copy.progress.current = 99;

    expect(tracker.getJob(id)?.progress.current).toBe(0);
  });
});

describe('progress', () => {
  it('merges only the given fields', () => {
    const { id } = tracker.createJob('import');
    tracker.updateProgress(id, { total: 10, message: 'Parsing' });
    tracker.updateProgress(id, { current: 4, successful: 3, errors: 1 });

    expect(tracker.getJob(id)?.progress).toEqual({ current: 4, total: 10, successful: 3, errors: 1, message: 'Parsing' });
  });

  it('ignores updates once terminal', () => {
    const { id } = tracker.createJob('import');
    tracker.cancelJob(id);

    expect(tracker.updateProgress(id, { current: 5 })).toBe(false);
    expect(tracker.getJob(id)?.progress.current).toBe(0);
  });

  it('computes the percentage, 0 for an empty total', () => {
    expect(progressPercentage({ current: 1, total: 4, successful: 0, errors: 0, message: '' })).toBe(25);
    expect(progressPercentage({ current: 0, total: 0, successful: 0, errors: 0, message: '' })).toBe(0);
  });

  it('treats completed, failed and cancelled as terminal', () => {
    expect(isTerminal('pending')).toBe(false);
    expect(isTerminal('running')).toBe(false);
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
  });
});

describe('listJobs', () => {
  it('lists newest first and filters by type', () => {
    tracker.createJob('import');
    clock += 1000;
    tracker.createJob('reclassify');
    tracker.createJob('import');

    expect(tracker.listJobs().map(j => j.id)).toEqual(['job-3', 'job-2', 'job-1']);
    expect(tracker.listJobs('import').map(j => j.id)).toEqual(['job-3', 'job-1']);
    expect(tracker.listJobs('missing')).toEqual([]);
  });
});

describe('eviction', () => {
  it('drops the older half of finished jobs when full', () => {
    const small = new JobTracker({ maxJobs: 4, now: () => new Date(clock), idFactory: (() => {
      let n = 0;
      return () => `j${++n}`;
    })() });

    for (let i = 0; i < 4; i++) {
      const { id } = small.createJob('import');
      clock += 1000;
      if (i < 3) small.completeJob(id, null);
    }
    small.createJob('import');

    // j1 is the oldest of three finished jobs; j4 is still pending
    expect(small.listJobs().map(j => j.id)).toEqual(['j5', 'j4', 'j3', 'j2']);
  });

  it('keeps a cancelled job while its task is still running', async () => {
    let n = 0;
    const small = new JobTracker({ maxJobs: 4, now: () => new Date(clock), idFactory: () => `j${++n}` });
    const seen: boolean[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = () => resolve(); });

    const worker = small.runInBackground('import', async (context) => {
      seen.push(context.isCancelled());
      await gate;
      seen.push(context.isCancelled());
    });
    await Promise.resolve();
    small.cancelJob(worker.id);

    for (let i = 0; i < 2; i++) {
      clock += 1000;
      const { id } = small.createJob('import');
      small.completeJob(id, null);
    }
    small.createJob('import');
    small.createJob('import');

    // j2 is the oldest finished job with no task; j1 is older but still running
    expect(small.listJobs().map(j => j.id)).toEqual(['j5', 'j4', 'j3', 'j1']);

    release();
    await small.waitForJob(worker.id);
    expect(seen).toEqual([false, true]);
    expect(small.getJob(worker.id)?.status).toBe('cancelled');
  });

  it('keeps every job when none has finished', () => {
    const small = new JobTracker({ maxJobs: 2 });
    small.createJob('a');
    small.createJob('b');
    small.createJob('c');

    expect(small.listJobs()).toHaveLength(3);
  });
});

describe('runInBackground', () => {
  it('returns a pending job and completes it with the task result', async () => {
    const job = tracker.runInBackground('import', async (context) => {
      context.updateProgress({ total: 2, current: 2 });
      return { imported: 2 };
    });

    expect(job.status).toBe('pending');
    expect(tracker.activeTasks).toBe(1);

    const finished = await tracker.waitForJob(job.id);

    expect(finished).toMatchObject({
      status: 'completed',
      result: { imported: 2 },
      progress: { current: 2, total: 2 },
    });
    expect(tracker.activeTasks).toBe(0);
  });

  it('fails the job when the task rejects', async () => {
    const job = tracker.runInBackground('import', async () => {
      throw new Error('bad file');
    });

    expect(await tracker.waitForJob(job.id)).toMatchObject({ status: 'failed', error: 'bad file' });
  });

  it('lets the task observe cancellation and keeps the cancelled state', async () => {
    let observed = false;
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = () => resolve(); });

    const job = tracker.runInBackground('import', async (context) => {
      await gate;
      observed = context.isCancelled();
      return 'partial';
    });

    await Promise.resolve();
    expect(tracker.cancelJob(job.id)).toBe(true);
    release();

    const finished = await tracker.waitForJob(job.id);
    expect(observed).toBe(true);
    expect(finished).toMatchObject({ status: 'cancelled', result: null });
  });

  it('does not start a job cancelled before it runs', async () => {
    const task = vi.fn(async () => 'never');
    const job = tracker.runInBackground('import', task);
    tracker.cancelJob(job.id);

    await tracker.waitForJob(job.id);

    expect(task).not.toHaveBeenCalled();
    expect(tracker.getJob(job.id)?.status).toBe('cancelled');
  });

  it('resolves waitForJob immediately for jobs without a task', async () => {
    const { id } = tracker.createJob('import');
    expect((await tracker.waitForJob(id))?.status).toBe('pending');
    expect(await tracker.waitForJob('missing')).toBeNull();
  });
});
