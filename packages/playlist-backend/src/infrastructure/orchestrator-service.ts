// packages/playlist-backend/src/infrastructure/orchestrator-service.ts
// Composition root:
// - Builds the job store, event hub, worker pool, stages and executor from config.
// - Keeps client wiring in one place so transport and CLI code stay simple.
// - Every collaborator can be overridden, which is how tests swap in fakes.
import { PipelineExecutor } from '../application/pipeline-executor.js';
import type { RetryPolicy } from '../application/retry-policy.js';
import { CuratePlaylistStage } from '../application/stages/curate-playlist.js';
import { InterpretRequestStage } from '../application/stages/interpret-request.js';
import { MaterializePlaylistStage } from '../application/stages/materialize-playlist.js';
import { RetrieveCandidatesStage } from '../application/stages/retrieve-candidates.js';
import type { PipelineStages } from '../application/stages/types.js';
import { TaskOrchestrator } from '../application/task-orchestrator.js';
import type { PlaylistBackendConfig } from '../config/env.js';
import { JobEventHub } from '../domain/job-events.js';
import { InMemoryJobStore, type JobStore } from '../domain/job-store.js';
import { PlaylistHistoryRepository } from '../domain/playlist-history-repository.js';
import { HttpChatClient, type ChatClient } from './chat-client.js';
import { closePgPool, withPgClient } from './db.js';
import { logger, type Logger } from './logger.js';
import { metrics as defaultMetrics, type Metrics } from './metrics.js';
import { closeRedisClient, createRedisClient } from './redis.js';
import { MemoryResponseCache, RedisResponseCache, type ResponseCache } from './response-cache.js';
import { SpotifyClient, type PlaylistPlatform } from './spotify-client.js';
import { WorkerPool } from './worker-pool.js';

const RETRY_JITTER_MS = 250;

export interface OrchestratorServiceOverrides {
  stages?: PipelineStages;
  chat?: ChatClient;
  platform?: PlaylistPlatform;
  cache?: ResponseCache;
  /** null disables history even when PG_ENABLED=true. */
  history?: PlaylistHistoryRepository | null;
  store?: JobStore;
  metrics?: Metrics;
  logger?: Logger;
  fetchImplementation?: typeof fetch;
  random?: () => number;
}

export interface OrchestratorService {
  orchestrator: TaskOrchestrator;
  cache: ResponseCache;
  history: PlaylistHistoryRepository | null;
  close(): Promise<void>;
}

export function retryPolicyFromConfig(config: PlaylistBackendConfig): RetryPolicy {
  return {
    maxAttempts: config.pipeline.maxAttempts,
    baseDelayMs: config.pipeline.retryBaseDelayMs,
    maxDelayMs: config.pipeline.retryMaxDelayMs,
    jitterMs: config.pipeline.retryBaseDelayMs > 0 ? RETRY_JITTER_MS : 0,
  };
}

function createCache(config: PlaylistBackendConfig, log: Logger): ResponseCache {
  if (config.cache.provider === 'redis') {
    return new RedisResponseCache(createRedisClient(config), {
      ttlSeconds: config.cache.ttlSeconds,
      logger: log,
    });
  }
  return new MemoryResponseCache({
    ttlSeconds: config.cache.ttlSeconds,
    maxEntries: config.cache.maxEntries,
  });
}

function createStages(
  config: PlaylistBackendConfig,
  overrides: OrchestratorServiceOverrides,
  cache: ResponseCache,
): PipelineStages {
  const chat =
    overrides.chat ??
    new HttpChatClient({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey,
      fetchImplementation: overrides.fetchImplementation,
    });
  const platform =
    overrides.platform ??
    new SpotifyClient({
      clientId: config.spotify.clientId,
      clientSecret: config.spotify.clientSecret,
      apiBaseUrl: config.spotify.apiBaseUrl,
      accountsBaseUrl: config.spotify.accountsBaseUrl,
      fetchImplementation: overrides.fetchImplementation,
    });

  return {
    interpret: new InterpretRequestStage(chat, config.llm.interpretModel),
    retrieve: new RetrieveCandidatesStage(chat, config.llm.searchModel),
    curate: new CuratePlaylistStage(chat, config.llm.curateModel, config.llm.curateMaxSongs),
    materialize: new MaterializePlaylistStage({
      platform,
      cache,
      searchConcurrency: config.spotify.searchConcurrency,
      random: overrides.random,
    }),
  };
}

// createOrchestratorService.declaration()
export function createOrchestratorService(
  config: PlaylistBackendConfig,
  overrides: OrchestratorServiceOverrides = {},
): OrchestratorService {
  const log = overrides.logger ?? logger;
  const cache = overrides.cache ?? createCache(config, log);
  const stages = overrides.stages ?? createStages(config, overrides, cache);

  let history: PlaylistHistoryRepository | null = null;
  if (overrides.history !== undefined) {
    history = overrides.history;
  } else if (config.pg.enabled) {
    history = new PlaylistHistoryRepository((fn) => withPgClient((client) => fn(client), config));
  }

  const store = overrides.store ?? new InMemoryJobStore({ logger: log });
  const hub = new JobEventHub({ bufferSize: config.events.bufferSize, logger: log });
  const pool = new WorkerPool({ concurrency: config.worker.concurrency, logger: log });
  const executor = new PipelineExecutor({
    store,
    hub,
    stages,
    policy: retryPolicyFromConfig(config),
    stageTimeoutsMs: config.pipeline.stageTimeoutsMs,
    metrics: overrides.metrics ?? defaultMetrics,
    historySink: history,
    random: overrides.random,
  });

  const orchestrator = new TaskOrchestrator({
    store,
    hub,
    pool,
    executor,
    defaultDurationMinutes: config.pipeline.defaultDurationMinutes,
    retention: config.retention,
    logger: log,
  });

  log.info('Orchestrator service configured', {
    component: 'orchestrator',
    concurrency: config.worker.concurrency,
    cache: cache.stats().provider,
    history: history !== null,
  });

  return {
    orchestrator,
    cache,
    history,
    async close() {
      await orchestrator.shutdown();
      if (config.cache.provider === 'redis' && !overrides.cache) {
        await closeRedisClient();
      }
      if (history && overrides.history === undefined) {
        await closePgPool();
      }
    },
  };
}
