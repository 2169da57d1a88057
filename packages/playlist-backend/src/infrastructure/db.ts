// packages/playlist-backend/src/infrastructure/db.ts
// Thin Postgres adapter for the playlist history.
// - Optional: only required if PG_ENABLED=true.
// - Schema is created on first use.
import { Pool, type PoolClient } from 'pg';

import { loadConfig, type PlaylistBackendConfig } from '../config/env.js';
import { logger } from './logger.js';

let pool: Pool | null = null;
let schemaReadyPromise: Promise<void> | null = null;

const MAX_CONNECT_ATTEMPTS = 5;

const SCHEMA_STATEMENTS: string[] = [
  `
  CREATE TABLE IF NOT EXISTS playlists (
    job_id UUID PRIMARY KEY,
    playlist_name TEXT NOT NULL,
    playlist_url TEXT NULL,
    description TEXT NOT NULL,
    track_count INTEGER NOT NULL,
    duration_minutes NUMERIC(7, 1) NOT NULL,
    generation_time_ms INTEGER NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS playlist_tracks (
    job_id UUID NOT NULL REFERENCES playlists (job_id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    title TEXT NOT NULL,
    artist TEXT NOT NULL,
    album TEXT NOT NULL,
    uri TEXT NOT NULL,
    duration_ms INTEGER NOT NULL,
    PRIMARY KEY (job_id, position)
  )
  `,
  'CREATE INDEX IF NOT EXISTS idx_playlists_created_at ON playlists (created_at DESC)',
];

async function ensureSchema(client: PoolClient): Promise<void> {
  if (!schemaReadyPromise) {
    schemaReadyPromise = (async () => {
      for (const statement of SCHEMA_STATEMENTS) {
        await client.query(statement);
      }
      logger.info('Ensured playlist history schema', {
        component: 'pg',
        event: 'schema_ready',
      });
    })().catch((error: unknown) => {
      schemaReadyPromise = null;
      throw error;
    });
  }
  await schemaReadyPromise;
}

// createPgPool.declaration()
export function createPgPool(config: PlaylistBackendConfig = loadConfig()): Pool {
  if (pool) return pool;

  if (!config.pg.enabled) {
    throw new Error('Postgres requested but PG_ENABLED=false');
  }

  const connectionString =
    config.pg.connectionString ||
    `postgresql://${encodeURIComponent(config.pg.user)}:${encodeURIComponent(
      config.pg.password,
    )}@${config.pg.host}:${config.pg.port}/${config.pg.database}`;

  pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err: Error) => {
    logger.error(err, {
      component: 'pg',
      message: 'Unexpected Postgres pool error',
    });
  });

  return pool;
}

// withPgClient.declaration()
export async function withPgClient<T>(
  fn: (client: PoolClient) => Promise<T>,
  config?: PlaylistBackendConfig,
  attempt = 1,
): Promise<T> {
  const p = createPgPool(config);

  let client: PoolClient;
  try {
    client = await p.connect();
  } catch (error: unknown) {
    if (attempt < MAX_CONNECT_ATTEMPTS) {
      const delay = 500 * attempt;
      logger.warn('Postgres connection failed; retrying', {
        component: 'pg',
        attempt,
        delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
      return withPgClient(fn, config, attempt + 1);
    }
    throw error;
  }

  try {
    await ensureSchema(client);
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function closePgPool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  schemaReadyPromise = null;
  await current.end();
}
