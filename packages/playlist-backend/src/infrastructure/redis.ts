// packages/playlist-backend/src/infrastructure/redis.ts
// Thin Redis adapter (ioredis) backing the shared response cache.
// - Controlled via REDIS_ENABLED and related envs.
// - One client per process; closeRedisClient() is called on shutdown.
import { Redis } from 'ioredis';

import { loadConfig, type PlaylistBackendConfig } from '../config/env.js';
import { logger } from './logger.js';

let client: Redis | null = null;

// createRedisClient.declaration()
export function createRedisClient(config: PlaylistBackendConfig = loadConfig()): Redis {
  if (client) return client;

  if (!config.redis.enabled) {
    throw new Error('Redis requested but REDIS_ENABLED=false');
  }

  client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    // Cache lookups must fail fast instead of queueing while disconnected.
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('error', (err: Error) => {
    logger.error(err, {
      component: 'redis',
      message: 'Redis client error',
    });
  });

  client.on('connect', () => {
    logger.info('Redis connected', { component: 'redis' });
  });

  return client;
}

export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
