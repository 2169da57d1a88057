// packages/playlist-backend/src/application/pipeline-executor.ts
//
// Drives one job through interpret -> retrieve -> curate -> materialize.
// - Sole writer of the job's mutable fields while it runs.
// - Each stage attempt runs under its own timeout; transient failures are retried
//   with backoff, anything else fails the job at once.
// - Cancellation is cooperative: checked before the first stage, between stages and
//   before each attempt. An in-flight attempt is never interrupted.
// - Store updates on a deleted job return null; the executor then publishes nothing.

import { CancelledError, type StageName } from '@vibelist/contracts';

import type { JobError } from '../domain/job-model.js';
import type { JobEventHub, JobEventType } from '../domain/job-events.js';
import type { JobStore } from '../domain/job-store.js';
import {
  buildPlaylistResult,
  type PipelineRunMetrics,
  type PlaylistResult,
} from '../domain/playlist-model.js';
import { createJobLogger, type Logger } from '../infrastructure/logger.js';
import { metrics as defaultMetrics, type Metrics } from '../infrastructure/metrics.js';
import { errorMessage, runWithRetry, type RetryPolicy } from './retry-policy.js';
import { STAGE_ORDER, type PipelineStages, type Stage } from './stages/types.js';

export interface PlaylistHistorySink {
  record(jobId: string, result: PlaylistResult): Promise<void>;
}

export interface PipelineExecutorDeps {
  store: JobStore;
  hub: JobEventHub;
  stages: PipelineStages;
  policy: RetryPolicy;
  stageTimeoutsMs: Record<StageName, number>;
  metrics?: Metrics;
  historySink?: PlaylistHistorySink | null;
  loggerFactory?: (jobId: string, stage?: StageName) => Logger;
  now?: () => number;
  random?: () => number;
}

const STAGE_DONE_LABELS: Record<StageName, string> = {
  interpret: 'Vibe identified',
  retrieve: 'Candidate songs found',
  curate: 'Tracklist curated',
  materialize: 'Playlist built',
};

export const FAILED_LABEL = 'Failed';

type StageOutcome<O> = { ok: true; value: O } | { ok: false; error: JobError };

export class PipelineExecutor {
  private readonly metrics: Metrics;
  private readonly loggerFactory: (jobId: string, stage?: StageName) => Logger;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineExecutorDeps) {
    this.metrics = deps.metrics ?? defaultMetrics;
    this.loggerFactory = deps.loggerFactory ?? createJobLogger;
    this.now = deps.now ?? Date.now;
  }

  /** Never rejects: every failure ends as a failed job. */
  async execute(jobId: string, cancelSignal: AbortSignal): Promise<void> {
    const log = this.loggerFactory(jobId);
    try {
      await this.runPipeline(jobId, cancelSignal, log);
    } catch (error: unknown) {
      log.error(error instanceof Error ? error : String(error), { message: 'Pipeline crashed' });
      const current = this.deps.store.get(jobId);
      if (current && (current.status === 'pending' || current.status === 'processing')) {
        this.fail(jobId, current.status, { kind: 'permanent', message: errorMessage(error), stage: null }, log);
      }
    } finally {
      for (const name of STAGE_ORDER) {
        this.deps.stages[name].release?.(jobId);
      }
    }
  }

  private async runPipeline(jobId: string, cancelSignal: AbortSignal, log: Logger): Promise<void> {
    const { store, stages } = this.deps;

    const job = store.get(jobId);
    if (!job) {
      log.info('Job removed before start; skipping');
      return;
    }
    if (job.status !== 'pending') {
      // Cancelled while queued; the orchestrator already failed it.
      log.debug('Job no longer pending; skipping', { status: job.status });
      return;
    }

    if (cancelSignal.aborted) {
      this.fail(jobId, 'pending', cancelledError(null), log);
      return;
    }

    const started = store.transition({
      id: jobId,
      expected: 'pending',
      next: 'processing',
      progress: stages.interpret.label,
    });
    if (!started) return;
    this.publish('job_progress', jobId);
    log.info('Pipeline started');

    const startedAt = this.now();
    const runMetrics: PipelineRunMetrics = { stageTimings: {}, attempts: {} };

    const interpreted = await this.runStage(jobId, stages.interpret, job.request, cancelSignal, runMetrics, false);
    if (!interpreted.ok) return this.fail(jobId, 'processing', interpreted.error, log);

    const candidates = await this.runStage(jobId, stages.retrieve, interpreted.value, cancelSignal, runMetrics);
    if (!candidates.ok) return this.fail(jobId, 'processing', candidates.error, log);

    const curated = await this.runStage(jobId, stages.curate, candidates.value, cancelSignal, runMetrics);
    if (!curated.ok) return this.fail(jobId, 'processing', curated.error, log);

    const materialized = await this.runStage(jobId, stages.materialize, curated.value, cancelSignal, runMetrics);
    if (!materialized.ok) return this.fail(jobId, 'processing', materialized.error, log);

    const generationTimeMs = this.now() - startedAt;
    const result = buildPlaylistResult({
      request: job.request,
      materialized: materialized.value,
      generationTimeMs,
      metrics: runMetrics,
    });

    const completed = store.transition({
      id: jobId,
      expected: 'processing',
      next: 'completed',
      result,
      progress: `Done in ${Math.round(generationTimeMs / 1000)}s!`,
    });
    if (!completed) return;

    this.publish('job_completed', jobId);
    this.metrics.increment('pipeline.job.completed');
    log.info('Pipeline completed', { trackCount: result.trackCount, generationTimeMs });

    await this.recordHistory(jobId, result, log);
  }

  private async runStage<I, O>(
    jobId: string,
    stage: Stage<I, O>,
    input: I,
    cancelSignal: AbortSignal,
    runMetrics: PipelineRunMetrics,
    announce = true,
  ): Promise<StageOutcome<O>> {
    if (cancelSignal.aborted) {
      return { ok: false, error: cancelledError(stage.name) };
    }

    if (announce) this.progress(jobId, stage.label);

    const stageLog = this.loggerFactory(jobId, stage.name);
    const startedAt = this.now();

    const outcome = await runWithRetry({
      policy: this.deps.policy,
      timeoutMs: this.deps.stageTimeoutsMs[stage.name],
      label: `Stage ${stage.name}`,
      cancelSignal,
      random: this.deps.random,
      run: (attempt, signal) =>
        stage.run(input, {
          jobId,
          attempt,
          signal,
          logger: stageLog,
          reportProgress: (label) => this.progress(jobId, label),
        }),
      onRetry: ({ attempt, delayMs, error }) => {
        this.metrics.increment('pipeline.stage.retry', 1, { stage: stage.name });
        stageLog.warn('Stage attempt failed; retrying', {
          attempt,
          delayMs,
          error: errorMessage(error),
        });
      },
      onLateSettle: (error) => {
        stageLog.debug('Abandoned stage attempt settled', {
          error: error === null ? null : errorMessage(error),
        });
      },
    });

    const elapsed = this.now() - startedAt;
    runMetrics.stageTimings[stage.name] = elapsed;
    runMetrics.attempts[stage.name] = outcome.attempts;
    this.metrics.timing('pipeline.stage.duration', elapsed, {
      stage: stage.name,
      outcome: outcome.ok ? 'success' : outcome.kind,
    });

    if (!outcome.ok) {
      stageLog.warn('Stage failed', {
        kind: outcome.kind,
        attempts: outcome.attempts,
        error: errorMessage(outcome.error),
      });
      return {
        ok: false,
        error: { kind: outcome.kind, message: errorMessage(outcome.error), stage: stage.name },
      };
    }

    stageLog.debug('Stage succeeded', { attempts: outcome.attempts, elapsedMs: elapsed });
    if (stage.name !== 'materialize') {
      this.progress(jobId, STAGE_DONE_LABELS[stage.name]);
    }
    return { ok: true, value: outcome.value };
  }

  private progress(jobId: string, label: string): void {
    if (this.deps.store.updateProgress(jobId, label)) {
      this.publish('job_progress', jobId);
    }
  }

  private fail(jobId: string, expected: 'pending' | 'processing', error: JobError, log: Logger): void {
    const failed = this.deps.store.transition({
      id: jobId,
      expected,
      next: 'failed',
      error,
      progress: FAILED_LABEL,
    });
    if (!failed) return;

    this.publish('job_failed', jobId);
    this.metrics.increment('pipeline.job.failed', 1, { kind: error.kind, stage: error.stage ?? 'none' });
    log.warn('Pipeline failed', { kind: error.kind, failedStage: error.stage, error: error.message });
  }

  private publish(type: JobEventType, jobId: string): void {
    const job = this.deps.store.get(jobId);
    if (job) {
      this.deps.hub.publish({ type, job });
    }
  }

  private async recordHistory(jobId: string, result: PlaylistResult, log: Logger): Promise<void> {
    if (!this.deps.historySink) return;
    try {
      await this.deps.historySink.record(jobId, result);
    } catch (error: unknown) {
      log.error(error instanceof Error ? error : String(error), {
        message: 'Failed to record playlist history',
      });
    }
  }
}

function cancelledError(stage: StageName | null): JobError {
  return { kind: 'cancelled', message: new CancelledError().message, stage };
}
