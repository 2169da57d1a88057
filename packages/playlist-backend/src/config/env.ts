// packages/playlist-backend/src/config/env.ts
// Centralized environment-based configuration for the playlist backend.
// - Safe local defaults; every orchestrator knob (timeouts, retries, pool size) is tunable here.
// - Redis/Postgres are optional and enabled via env flags.
// - Only throws when a feature is explicitly enabled but misconfigured.
import { ConfigurationError, type StageName } from '@vibelist/contracts';
import { readBool, readEnum, readInt, readString } from '@vibelist/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

export type CacheProvider = 'memory' | 'redis';

export interface PlaylistBackendConfig {
  nodeEnv: NodeEnv;
  http: {
    port: number;
    host: string;
  };
  worker: {
    concurrency: number;
  };
  pipeline: {
    stageTimeoutsMs: Record<StageName, number>;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    defaultDurationMinutes: number;
  };
  events: {
    bufferSize: number;
    heartbeatMs: number;
  };
  retention: {
    maxAgeMs: number;
    sweepIntervalMs: number;
  };
  llm: {
    baseUrl: string;
    apiKey?: string;
    interpretModel: string;
    searchModel: string;
    curateModel: string;
    curateMaxSongs: number;
  };
  spotify: {
    clientId?: string;
    clientSecret?: string;
    apiBaseUrl: string;
    accountsBaseUrl: string;
    searchConcurrency: number;
  };
  cache: {
    provider: CacheProvider;
    ttlSeconds: number;
    maxEntries: number;
  };
  redis: {
    enabled: boolean;
    host: string;
    port: number;
    password?: string;
  };
  pg: {
    enabled: boolean;
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    connectionString?: string;
  };
}

const NODE_ENVS = ['development', 'test', 'production'] as const;
const CACHE_PROVIDERS = ['memory', 'redis'] as const;

// loadConfig.declaration()
export function loadConfig(): PlaylistBackendConfig {
  const nodeEnv = readEnum('NODE_ENV', NODE_ENVS, 'development');

  const port = readInt('HTTP_PORT', 8080);
  const host = readString('HTTP_HOST', '0.0.0.0');

  const concurrency = readInt('WORKER_CONCURRENCY', 4);
  if (concurrency < 1) {
    throw new ConfigurationError(`WORKER_CONCURRENCY must be at least 1 (got ${concurrency})`);
  }

  // Operational tuning, not contract: attempt counts and timeouts per external stage.
  const stageTimeoutsMs: Record<StageName, number> = {
    interpret: readInt('STAGE_TIMEOUT_INTERPRET_MS', 30_000),
    retrieve: readInt('STAGE_TIMEOUT_RETRIEVE_MS', 120_000),
    curate: readInt('STAGE_TIMEOUT_CURATE_MS', 60_000),
    materialize: readInt('STAGE_TIMEOUT_MATERIALIZE_MS', 120_000),
  };
  const maxAttempts = readInt('STAGE_MAX_ATTEMPTS', 3);
  if (maxAttempts < 1) {
    throw new ConfigurationError(`STAGE_MAX_ATTEMPTS must be at least 1 (got ${maxAttempts})`);
  }
  const retryBaseDelayMs = readInt('RETRY_BASE_DELAY_MS', 500);
  const retryMaxDelayMs = readInt('RETRY_MAX_DELAY_MS', 8000);
  const defaultDurationMinutes = readInt('DEFAULT_DURATION_MINUTES', 60);

  const bufferSize = readInt('EVENT_BUFFER_SIZE', 32);
  if (bufferSize < 1) {
    throw new ConfigurationError(`EVENT_BUFFER_SIZE must be at least 1 (got ${bufferSize})`);
  }
  const heartbeatMs = readInt('SSE_HEARTBEAT_MS', 25_000);

  // 0 disables the sweep; jobs then live until deleted.
  const maxAgeMs = readInt('JOB_RETENTION_MS', 60 * 60 * 1000);
  const sweepIntervalMs = readInt('JOB_SWEEP_INTERVAL_MS', 60_000);

  const llmBaseUrl = readString('LLM_BASE_URL', 'https://api.perplexity.ai');
  const llmApiKey = readString('LLM_API_KEY');
  const interpretModel = readString('LLM_INTERPRET_MODEL', 'sonar');
  const searchModel = readString('LLM_SEARCH_MODEL', 'sonar');
  const curateModel = readString('LLM_CURATE_MODEL', 'sonar');
  const curateMaxSongs = readInt('CURATE_MAX_SONGS', 40);

  const spotifyClientId = readString('SPOTIFY_CLIENT_ID');
  const spotifyClientSecret = readString('SPOTIFY_CLIENT_SECRET');
  if (Boolean(spotifyClientId) !== Boolean(spotifyClientSecret)) {
    throw new ConfigurationError('SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set together');
  }
  const spotifyApiBaseUrl = readString('SPOTIFY_API_BASE_URL', 'https://api.spotify.com/v1');
  const spotifyAccountsBaseUrl = readString(
    'SPOTIFY_ACCOUNTS_BASE_URL',
    'https://accounts.spotify.com',
  );
  const searchConcurrency = readInt('SPOTIFY_SEARCH_CONCURRENCY', 15);

  const cacheProvider = readEnum('CACHE_PROVIDER', CACHE_PROVIDERS, 'memory');
  const cacheTtlSeconds = readInt('CACHE_TTL_SECONDS', 24 * 60 * 60);
  const cacheMaxEntries = readInt('CACHE_MAX_ENTRIES', 1000);

  const redisEnabled = readBool('REDIS_ENABLED', cacheProvider === 'redis');
  const redisHost = readString('REDIS_HOST', 'localhost');
  const redisPort = readInt('REDIS_PORT', 6379);
  const redisPassword = readString('REDIS_PASSWORD');
  if (cacheProvider === 'redis' && !redisEnabled) {
    throw new ConfigurationError('CACHE_PROVIDER=redis requires REDIS_ENABLED=true');
  }

  const pgEnabled = readBool('PG_ENABLED', false);
  const pgHost = readString('PG_HOST', 'localhost');
  const pgPort = readInt('PG_PORT', 5432);
  const pgUser = readString('PG_USER', 'vibelist');
  const pgPassword = readString('PG_PASSWORD', 'vibelist');
  const pgDatabase = readString('PG_DATABASE', 'vibelist');
  const pgConnectionString = readString('PG_CONNECTION_STRING');
  if (pgEnabled && !pgConnectionString && (!pgUser || !pgDatabase || !pgHost)) {
    throw new ConfigurationError('PG_ENABLED=true but Postgres configuration is incomplete');
  }

  return {
    nodeEnv,
    http: { port, host },
    worker: { concurrency },
    pipeline: {
      stageTimeoutsMs,
      maxAttempts,
      retryBaseDelayMs,
      retryMaxDelayMs,
      defaultDurationMinutes,
    },
    events: { bufferSize, heartbeatMs },
    retention: { maxAgeMs, sweepIntervalMs },
    llm: {
      baseUrl: llmBaseUrl,
      apiKey: llmApiKey,
      interpretModel,
      searchModel,
      curateModel,
      curateMaxSongs,
    },
    spotify: {
      clientId: spotifyClientId,
      clientSecret: spotifyClientSecret,
      apiBaseUrl: spotifyApiBaseUrl,
      accountsBaseUrl: spotifyAccountsBaseUrl,
      searchConcurrency,
    },
    cache: {
      provider: cacheProvider,
      ttlSeconds: cacheTtlSeconds,
      maxEntries: cacheMaxEntries,
    },
    redis: {
      enabled: redisEnabled,
      host: redisHost,
      port: redisPort,
      password: redisPassword,
    },
    pg: {
      enabled: pgEnabled,
      host: pgHost,
      port: pgPort,
      user: pgUser,
      password: pgPassword,
      database: pgDatabase,
      connectionString: pgConnectionString,
    },
  };
}
