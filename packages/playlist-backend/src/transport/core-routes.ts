import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { jobRecordToDto, jobRecordToSummary } from '../application/job-dto.js';
import { MAX_LIST_LIMIT, type TaskOrchestrator } from '../application/task-orchestrator.js';
import type { PlaylistBackendConfig } from '../config/env.js';
import type { PlaylistHistoryRepository } from '../domain/playlist-history-repository.js';
import { logger } from '../infrastructure/logger.js';
import type { ResponseCache } from '../infrastructure/response-cache.js';
import { resolveRoutePath } from './route-helpers.js';

export interface CoreRouteOptions {
  config: PlaylistBackendConfig;
  orchestrator: TaskOrchestrator;
  cache?: ResponseCache;
  history?: PlaylistHistoryRepository | null;
}

type JobParams = { Params: { jobId: string } };

const submitJobSchema = z.object({
  description: z.string(),
  durationMinutes: z.number().optional(),
  accessToken: z.string().nullable().optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
});

export function registerCoreRoutes(app: FastifyInstance, options: CoreRouteOptions): void {
  const { config, orchestrator, cache, history } = options;

  app.post('/jobs', async (request, reply) => {
    const body = submitJobSchema.parse(request.body ?? {});
    const result = orchestrator.submit(body);

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: 'POST /jobs',
      statusCode: 202,
      jobId: result.jobId,
    });

    return reply.code(202).send(result);
  });

  app.get('/jobs', async (request, reply) => {
    const { limit } = listQuerySchema.parse(request.query ?? {});
    const jobs = orchestrator.list(limit).map(jobRecordToSummary);
    return reply.send({ jobs });
  });

  const handleJobStatusRequest = async (request: FastifyRequest<JobParams>, reply: FastifyReply) => {
    const { jobId } = request.params;
    const job = orchestrator.getStatus(jobId);

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: resolveRoutePath(request, 'GET /jobs/:jobId'),
      statusCode: 200,
      jobId,
      jobStatus: job.status,
    });

    return reply.send(jobRecordToDto(job));
  };

  app.get<JobParams>('/jobs/:jobId', handleJobStatusRequest);
  app.get<JobParams>('/jobs/:jobId/status', handleJobStatusRequest);

  app.delete<JobParams>('/jobs/:jobId', async (request, reply) => {
    orchestrator.delete(request.params.jobId);
    return reply.code(204).send();
  });

  app.post<JobParams>('/jobs/:jobId/cancel', async (request, reply) => {
    const { jobId } = request.params;
    const { cancelled } = orchestrator.cancel(jobId);
    return reply.code(202).send({ jobId, cancelled });
  });

  app.get<JobParams>('/jobs/:jobId/events', async (request, reply) => {
    const { jobId } = request.params;
    const routePath = resolveRoutePath(request, 'GET /jobs/:jobId/events');

    // Throws NotFoundError before the response is hijacked, so unknown ids get a plain 404.
    const events = orchestrator.subscribe(jobId);

    reply.raw.setHeader('Content-Type', 'text/event-stream');
    reply.raw.setHeader('Cache-Control', 'no-cache');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.setHeader('X-Accel-Buffering', 'no');
    reply.raw.flushHeaders?.();
    reply.hijack();

    reply.raw.write(': connected\n\n');
    logger.info('SSE client connected', { event: 'job_events_sse_connected', route: routePath, jobId });

    let closed = false;
    const heartbeat = setInterval(() => {
      if (!closed) reply.raw.write(':\n\n');
    }, config.events.heartbeatMs);
    heartbeat.unref?.();

    const cleanup = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      events.close();
      logger.info('SSE client disconnected', { event: 'job_events_sse_disconnected', route: routePath, jobId });
    };

    request.raw.on('close', cleanup);
    request.raw.on('error', cleanup);

    try {
      for await (const event of events) {
        if (closed) break;
        reply.raw.write(`event: ${event.type}\n`);
        reply.raw.write(`data: ${JSON.stringify(jobRecordToDto(event.job))}\n\n`);
      }
    } catch (error: unknown) {
      logger.warn('SSE stream aborted', {
        event: 'job_events_sse_failed',
        route: routePath,
        jobId,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      cleanup();
      reply.raw.end();
    }
  });

  app.get('/health', async (_request, reply) => {
    const stats = orchestrator.stats();
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      workers: stats.workers,
      jobs: stats.jobs,
      observers: stats.observers,
      cache: cache ? cache.stats() : null,
    });
  });

  if (history) {
    app.get('/playlists', async (request, reply) => {
      const { limit } = listQuerySchema.parse(request.query ?? {});
      const playlists = await history.list(limit ?? 20);
      return reply.send({
        playlists: playlists.map((entry) => ({ ...entry, createdAt: entry.createdAt.toISOString() })),
      });
    });
  }
}
