// packages/playlist-backend/src/infrastructure/worker-pool.ts
// Fixed-size pool that runs pipeline executions in FIFO admission order.
// - Submissions beyond capacity wait in an unbounded queue instead of being rejected.
// - Task failures are logged and counted; they never reject submit().
import { logger as rootLogger, type Logger } from './logger.js';
import { Semaphore } from './semaphore.js';

export interface WorkerPoolStats {
  concurrency: number;
  running: number;
  queued: number;
  completed: number;
  failed: number;
}

export interface WorkerPoolOptions {
  concurrency: number;
  logger?: Logger;
}

export class WorkerPool {
  private readonly semaphore: Semaphore;
  private readonly inflight = new Set<Promise<void>>();
  private readonly log: Logger;
  private closed = false;
  private completed = 0;
  private failed = 0;

  constructor(options: WorkerPoolOptions) {
    this.semaphore = new Semaphore(options.concurrency);
    this.log = options.logger ?? rootLogger;
  }

  submit(jobId: string, task: () => Promise<void>): void {
    if (this.closed) {
      throw new Error('Worker pool is closed');
    }

    const run = this.semaphore
      .run(task)
      .then(
        () => {
          this.completed += 1;
        },
        (error: unknown) => {
          this.failed += 1;
          this.log.error(error instanceof Error ? error : String(error), {
            component: 'worker-pool',
            jobId,
            message: 'Pipeline task crashed',
          });
        },
      )
      .finally(() => {
        this.inflight.delete(run);
      });

    this.inflight.add(run);
    this.log.debug('Task admitted', { component: 'worker-pool', jobId, ...this.semaphore.getStats() });
  }

  /** Resolves once every admitted task has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /** Stops admission, then waits for admitted tasks. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  stats(): WorkerPoolStats {
    const { active, queued, max } = this.semaphore.getStats();
    return {
      concurrency: max,
      running: active,
      queued,
      completed: this.completed,
      failed: this.failed,
    };
  }
}
