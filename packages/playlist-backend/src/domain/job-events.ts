// packages/playlist-backend/src/domain/job-events.ts
//
// In-memory event hub that fans job progress out to per-job observers.
// Each observer owns a bounded buffer: publishing never waits on a reader, and a
// full buffer drops the oldest non-terminal event. The terminal event is always
// delivered, after which the observer detaches itself.

import { EventEmitter } from 'node:events';

import type { JobEventType } from '@vibelist/contracts';

import { logger as rootLogger, type Logger } from '../infrastructure/logger.js';
import { isTerminal, type JobRecord } from './job-model.js';

export type { JobEventType } from '@vibelist/contracts';

export interface JobEvent {
  type: JobEventType;
  job: JobRecord;
}

export interface JobEventHubOptions {
  bufferSize: number;
  logger?: Logger;
}

export interface JobEventSubscription extends AsyncIterableIterator<JobEvent> {
  readonly jobId: string;
  /** Events discarded because this observer fell behind. */
  readonly dropped: number;
  close(): void;
}

export function isTerminalEvent(event: JobEvent): boolean {
  return event.type === 'job_completed' || event.type === 'job_failed' || isTerminal(event.job.status);
}

const eventChannel = (jobId: string) => `event:${jobId}`;
const closeChannel = (jobId: string) => `close:${jobId}`;

export class JobEventHub {
  private readonly emitter = new EventEmitter();
  private readonly bufferSize: number;
  private readonly log: Logger;
  private readonly activeJobs = new Map<string, number>();

  constructor(options: JobEventHubOptions) {
    if (options.bufferSize < 1) {
      throw new Error(`Event buffer size must be at least 1 (got ${options.bufferSize})`);
    }
    this.bufferSize = options.bufferSize;
    this.log = options.logger ?? rootLogger;
    this.emitter.setMaxListeners(0);
  }

  publish(event: JobEvent): void {
    this.emitter.emit(eventChannel(event.job.id), event);
  }

  /** Observers only see events published after this call. */
  subscribe(jobId: string): JobEventSubscription {
    const observer = new BufferedObserver(jobId, this.bufferSize, () => this.detach(jobId, observer));
    this.emitter.on(eventChannel(jobId), observer.push);
    this.emitter.on(closeChannel(jobId), observer.close);
    this.activeJobs.set(jobId, (this.activeJobs.get(jobId) ?? 0) + 1);
    this.log.debug('Observer attached', { jobId, observers: this.observerCount(jobId) });
    return observer;
  }

  /** Ends every observer of a job, e.g. when the job is deleted. */
  closeJob(jobId: string): void {
    this.emitter.emit(closeChannel(jobId));
  }

  observerCount(jobId?: string): number {
    if (jobId !== undefined) {
      return this.activeJobs.get(jobId) ?? 0;
    }
    let total = 0;
    for (const count of this.activeJobs.values()) total += count;
    return total;
  }

  private detach(jobId: string, observer: BufferedObserver): void {
    this.emitter.off(eventChannel(jobId), observer.push);
    this.emitter.off(closeChannel(jobId), observer.close);

    const next = (this.activeJobs.get(jobId) ?? 1) - 1;
    if (next <= 0) {
      this.activeJobs.delete(jobId);
    } else {
      this.activeJobs.set(jobId, next);
    }

    if (observer.dropped > 0) {
      this.log.warn('Observer fell behind; events dropped', { jobId, dropped: observer.dropped });
    }
  }
}

class BufferedObserver implements JobEventSubscription {
  private readonly queue: JobEvent[] = [];
  private waiter: ((result: IteratorResult<JobEvent>) => void) | null = null;
  // `ending`: terminal event buffered, finish once drained. `finished`: nothing more to yield.
  private ending = false;
  private finished = false;
  private detached = false;
  private droppedCount = 0;

  constructor(
    readonly jobId: string,
    private readonly capacity: number,
    private readonly onDetach: () => void,
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  readonly push = (event: JobEvent): void => {
    if (this.ending || this.finished) return;

    const terminal = isTerminalEvent(event);
    if (terminal) {
      this.ending = true;
      this.detach();
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      if (terminal) this.finished = true;
      resolve({ value: event, done: false });
      return;
    }

    if (this.queue.length >= this.capacity) {
      // Only non-terminal events are ever buffered ahead of this one.
      this.queue.shift();
      this.droppedCount += 1;
    }
    this.queue.push(event);
  };

  readonly close = (): void => {
    if (this.finished) return;
    this.finished = true;
    this.queue.length = 0;
    this.detach();
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  };

  next(): Promise<IteratorResult<JobEvent>> {
    const event = this.queue.shift();
    if (event) {
      if (this.ending && this.queue.length === 0) this.finished = true;
      return Promise.resolve({ value: event, done: false });
    }
    if (this.finished || this.ending) {
      this.finished = true;
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  return(): Promise<IteratorResult<JobEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private detach(): void {
    if (this.detached) return;
    this.detached = true;
    this.onDetach();
  }
}
