// packages/playlist-backend/src/domain/job-store.ts
// In-memory directory of JobRecords; the single source of truth for job status.
// - Every method runs synchronously on the event loop, so a reader never sees a
//   half-applied update and a created job is visible to the next reader.
// - Readers get structured clones; mutating a snapshot never touches the store.
// - Status transitions are guarded by `expected` to avoid races (same contract as a
//   conditional UPDATE ... WHERE status = $expected).
// - A transition on a deleted id returns null; executors treat that as a no-op.
import { randomUUID } from 'node:crypto';

import { logger as rootLogger, type Logger } from '../infrastructure/logger.js';
import { type JobError, type JobRecord, type JobStatus, assertTransition, isTerminal } from './job-model.js';
import type { PlaylistRequest, PlaylistResult } from './playlist-model.js';

export interface JobTransition {
  id: string;
  expected: JobStatus;
  next: JobStatus;
  progress?: string | null;
  result?: PlaylistResult;
  error?: JobError;
}

export interface JobStore {
  insert(request: PlaylistRequest): JobRecord;
  get(id: string): JobRecord | null;
  transition(args: JobTransition): JobRecord | null;
  updateProgress(id: string, progress: string): JobRecord | null;
  list(limit: number): JobRecord[];
  delete(id: string): boolean;
  sweep(maxAgeMs: number): string[];
  size(): number;
}

export interface InMemoryJobStoreOptions {
  now?: () => Date;
  idFactory?: () => string;
  logger?: Logger;
}

export class InMemoryJobStore implements JobStore {
  // Map iteration follows insertion order, i.e. creation order.
  private readonly jobs = new Map<string, JobRecord>();
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private readonly log: Logger;

  constructor(options: InMemoryJobStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
    this.log = options.logger ?? rootLogger;
  }

  // insert.declaration()
  insert(request: PlaylistRequest): JobRecord {
    const id = this.idFactory();
    if (this.jobs.has(id)) {
      throw new Error(`Duplicate job id: ${id}`);
    }

    const now = this.now();
    const record: JobRecord = {
      id,
      status: 'pending',
      request: Object.freeze({ ...request }),
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      progress: 'Queued',
      result: null,
      error: null,
    };
    this.jobs.set(id, record);

    this.log.info('Job inserted', { jobId: id });
    return snapshot(record);
  }

  get(id: string): JobRecord | null {
    const record = this.jobs.get(id);
    return record ? snapshot(record) : null;
  }

  // transition.declaration()
  transition(args: JobTransition): JobRecord | null {
    const { id, expected, next } = args;
    assertTransition(expected, next);

    if (next === 'completed' && !args.result) {
      throw new Error(`Job ${id} cannot complete without a result`);
    }
    if (next === 'failed' && !args.error) {
      throw new Error(`Job ${id} cannot fail without an error`);
    }

    const record = this.jobs.get(id);
    if (!record || record.status !== expected) {
      this.log.warn('No job updated (status race or deleted)', {
        jobId: id,
        expected,
        actual: record?.status ?? null,
      });
      return null;
    }

    const now = this.now();
    record.status = next;
    record.updatedAt = now;
    if (next === 'processing' && !record.startedAt) {
      record.startedAt = now;
    }
    if (isTerminal(next)) {
      record.completedAt = now;
    }
    if (next === 'completed' && args.result) {
      record.result = args.result;
    }
    if (next === 'failed' && args.error) {
      record.error = args.error;
    }
    if (args.progress !== undefined) {
      record.progress = args.progress;
    }

    this.log.debug('Job status updated', { jobId: id, status: next });
    return snapshot(record);
  }

  updateProgress(id: string, progress: string): JobRecord | null {
    const record = this.jobs.get(id);
    if (!record || isTerminal(record.status)) {
      return null;
    }
    record.progress = progress;
    record.updatedAt = this.now();
    return snapshot(record);
  }

  /** Most recent first. */
  list(limit: number): JobRecord[] {
    const bounded = Math.max(0, Math.floor(limit));
    const records = [...this.jobs.values()];
    const out: JobRecord[] = [];
    for (let i = records.length - 1; i >= 0 && out.length < bounded; i--) {
      out.push(snapshot(records[i]));
    }
    return out;
  }

  delete(id: string): boolean {
    const removed = this.jobs.delete(id);
    if (removed) {
      this.log.info('Job deleted', { jobId: id });
    }
    return removed;
  }

  /** Drops terminal jobs that finished more than `maxAgeMs` ago. */
  sweep(maxAgeMs: number): string[] {
    const cutoff = this.now().getTime() - maxAgeMs;
    const removed: string[] = [];
    for (const [id, record] of this.jobs) {
      if (record.completedAt && record.completedAt.getTime() <= cutoff) {
        this.jobs.delete(id);
        removed.push(id);
      }
    }
    if (removed.length > 0) {
      this.log.info('Swept expired jobs', { count: removed.length });
    }
    return removed;
  }

  size(): number {
    return this.jobs.size;
  }
}

function snapshot(record: JobRecord): JobRecord {
  return structuredClone(record);
}
