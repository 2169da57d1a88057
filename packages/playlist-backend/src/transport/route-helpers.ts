import type { FastifyRequest } from 'fastify';

export const resolveRoutePath = (request: FastifyRequest, fallback: string): string => {
  return request.routeOptions?.url ?? fallback;
};
