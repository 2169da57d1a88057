// packages/playlist-backend/src/application/task-orchestrator.ts
//
// Façade over the job store, event hub, worker pool and pipeline executor.
// Transport code talks to this class only.

import {
  CancelledError,
  NotFoundError,
  type JobStatus,
  type SubmitJobResponse,
} from '@vibelist/contracts';

import type { JobEvent, JobEventHub, JobEventSubscription } from '../domain/job-events.js';
import { isTerminal, type JobRecord } from '../domain/job-model.js';
import type { JobStore } from '../domain/job-store.js';
import { logger as rootLogger, type Logger } from '../infrastructure/logger.js';
import type { WorkerPool, WorkerPoolStats } from '../infrastructure/worker-pool.js';
import { FAILED_LABEL, type PipelineExecutor } from './pipeline-executor.js';
import { validateSubmitJobRequest } from './submit-job.js';

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export interface TaskOrchestratorDeps {
  store: JobStore;
  hub: JobEventHub;
  pool: WorkerPool;
  executor: PipelineExecutor;
  defaultDurationMinutes: number;
  retention: { maxAgeMs: number; sweepIntervalMs: number };
  logger?: Logger;
}

/** Live event sequence; `close()` ends it early, e.g. when a client disconnects. */
export type JobEventStream = AsyncIterable<JobEvent> & { close(): void };

export interface OrchestratorStats {
  workers: WorkerPoolStats;
  jobs: { total: number; byStatus: Record<JobStatus, number> };
  observers: number;
}

export class TaskOrchestrator {
  private readonly controllers = new Map<string, AbortController>();
  private readonly log: Logger;
  private sweepTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(private readonly deps: TaskOrchestratorDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  /**
   * Validates, records the job as pending and queues it on the worker pool.
   * Returns without waiting for any stage.
   */
  submit(request: unknown): SubmitJobResponse {
    if (this.stopped) {
      throw new Error('Orchestrator is shut down');
    }

    const validated = validateSubmitJobRequest(request, this.deps.defaultDurationMinutes);
    const job = this.deps.store.insert(validated);
    this.deps.hub.publish({ type: 'job_created', job });

    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    this.deps.pool.submit(job.id, async () => {
      try {
        await this.deps.executor.execute(job.id, controller.signal);
      } finally {
        this.controllers.delete(job.id);
      }
    });

    this.log.info('Job submitted', { event: 'job_submitted', jobId: job.id });
    return { jobId: job.id, status: job.status };
  }

  getStatus(jobId: string): JobRecord {
    const job = this.deps.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  /**
   * Yields a `job_snapshot` of the current state, then live events until the
   * terminal one. A job that is already terminal yields only its snapshot.
   */
  subscribe(jobId: string): JobEventStream {
    // Attach before reading the snapshot so nothing published in between is lost.
    const subscription = this.deps.hub.subscribe(jobId);
    const snapshot = this.deps.store.get(jobId);
    if (!snapshot) {
      subscription.close();
      throw new NotFoundError(jobId);
    }
    if (isTerminal(snapshot.status)) {
      subscription.close();
      return Object.assign(streamEvents(snapshot, null), { close: () => undefined });
    }
    return Object.assign(streamEvents(snapshot, subscription), {
      close: () => subscription.close(),
    });
  }

  /** Most recent first. */
  list(limit: number = DEFAULT_LIST_LIMIT): JobRecord[] {
    const bounded = Math.min(MAX_LIST_LIMIT, Math.max(1, Math.floor(limit)));
    return this.deps.store.list(bounded);
  }

  /**
   * Removes the job. A running executor keeps going; its later updates
   * become no-ops. Idempotent.
   */
  delete(jobId: string): void {
    const removed = this.deps.store.delete(jobId);
    this.deps.hub.closeJob(jobId);
    if (removed) {
      this.log.info('Job deleted', { event: 'job_deleted', jobId });
    }
  }

  cancel(jobId: string): { cancelled: boolean } {
    const job = this.deps.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    if (isTerminal(job.status)) {
      return { cancelled: false };
    }

    this.controllers.get(jobId)?.abort();

    if (job.status === 'pending') {
      // Still queued: fail it now rather than when a worker frees up.
      const failed = this.deps.store.transition({
        id: jobId,
        expected: 'pending',
        next: 'failed',
        error: { kind: 'cancelled', message: new CancelledError().message, stage: null },
        progress: FAILED_LABEL,
      });
      if (failed) {
        this.deps.hub.publish({ type: 'job_failed', job: failed });
      }
    }

    this.log.info('Job cancellation requested', { event: 'job_cancel', jobId, status: job.status });
    return { cancelled: true };
  }

  stats(): OrchestratorStats {
    const byStatus: Record<JobStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 };
    const all = this.deps.store.list(this.deps.store.size());
    for (const job of all) {
      byStatus[job.status] += 1;
    }
    return {
      workers: this.deps.pool.stats(),
      jobs: { total: all.length, byStatus },
      observers: this.deps.hub.observerCount(),
    };
  }

  /** Starts the retention sweep, if enabled. */
  start(): void {
    const { maxAgeMs, sweepIntervalMs } = this.deps.retention;
    if (this.sweepTimer || maxAgeMs <= 0 || sweepIntervalMs <= 0) return;

    this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
    this.sweepTimer.unref?.();
  }

  sweep(): string[] {
    const removed = this.deps.store.sweep(this.deps.retention.maxAgeMs);
    for (const jobId of removed) {
      this.deps.hub.closeJob(jobId);
    }
    return removed;
  }

  /** Cancels unfinished jobs and waits for the pool to drain. */
  async shutdown(): Promise<void> {
    this.stopped = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const jobId of [...this.controllers.keys()]) {
      const job = this.deps.store.get(jobId);
      if (job && !isTerminal(job.status)) {
        this.cancel(jobId);
      }
    }
    await this.deps.pool.close();
    this.log.info('Orchestrator stopped', { component: 'orchestrator' });
  }
}

async function* streamEvents(
  snapshot: JobRecord,
  subscription: JobEventSubscription | null,
): AsyncGenerator<JobEvent> {
  try {
    yield { type: 'job_snapshot', job: snapshot };
    if (!subscription) return;
    for await (const event of subscription) {
      yield event;
    }
  } finally {
    subscription?.close();
  }
}
