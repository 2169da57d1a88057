// packages/playlist-backend/src/transport/http-server.ts
//
// Fastify HTTP server exposing the orchestrator:
// - POST /jobs                submit a playlist job
// - GET /jobs/:id             job snapshot (alias /jobs/:id/status)
// - GET /jobs/:id/events      server-sent events until the job is terminal
// - GET /jobs, DELETE /jobs/:id, POST /jobs/:id/cancel, GET /health, GET /playlists
// The worker pool runs in the same process; shutdown drains it on SIGINT/SIGTERM.
import Fastify, { type FastifyInstance } from 'fastify';
import { fileURLToPath } from 'node:url';

import { loadConfig, type PlaylistBackendConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import {
  createOrchestratorService,
  type OrchestratorService,
} from '../infrastructure/orchestrator-service.js';
import { registerCoreRoutes } from './core-routes.js';
import { registerErrorHandler } from './error-handler.js';

export function createHttpServer(service: OrchestratorService, config: PlaylistBackendConfig): FastifyInstance {
  const app = Fastify({
    logger: false,
  });

  registerErrorHandler(app);
  registerCoreRoutes(app, {
    config,
    orchestrator: service.orchestrator,
    cache: service.cache,
    history: service.history,
  });

  return app;
}

// startHttpServer.declaration()
export async function startHttpServer(config: PlaylistBackendConfig = loadConfig()): Promise<FastifyInstance> {
  const service = createOrchestratorService(config);
  const app = createHttpServer(service, config);
  service.orchestrator.start();

  await app.listen({
    port: config.http.port,
    host: config.http.host,
  });
  logger.info('HTTP server listening', {
    event: 'http_server_started',
    port: config.http.port,
    host: config.http.host,
  });

  const shutdown = async (signal: string) => {
    logger.info(`Shutting down (${signal})`, { component: 'http' });
    try {
      // Cancelling jobs first ends open event streams, which lets the server close.
      await service.close();
      await app.close();
      logger.info('Server closed cleanly', { component: 'http' });
      process.exit(0);
    } catch (error: unknown) {
      logger.error(error instanceof Error ? error : String(error), {
        component: 'http',
        message: 'Error during shutdown',
      });
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  return app;
}

// Allow running directly: node dist/transport/http-server.js
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startHttpServer().catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  });
}
