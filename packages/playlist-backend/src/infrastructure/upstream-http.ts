// packages/playlist-backend/src/infrastructure/upstream-http.ts
//
// Shared fetch plumbing for the LLM and playlist-platform clients.
// Turns HTTP and network failures into Transient/Permanent errors the retry policy understands.

import type { z } from 'zod';

import { PermanentError, TransientError, isOrchestratorError } from '@vibelist/contracts';

import { isTransientStatus } from '../application/retry-policy.js';

export interface UpstreamRequest {
  url: string;
  method?: 'GET' | 'POST' | 'PUT';
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

const MAX_ERROR_BODY = 300;

export async function fetchJson<S extends z.ZodTypeAny>(
  fetchImpl: typeof fetch,
  service: string,
  request: UpstreamRequest,
  schema: S,
): Promise<z.infer<S>> {
  let response: Response;
  try {
    response = await fetchImpl(request.url, {
      method: request.method ?? 'GET',
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });
  } catch (error: unknown) {
    throw toNetworkError(service, error);
  }

  if (!response.ok) {
    throw await toStatusError(service, response);
  }

  const text = await response.text();
  let payload: unknown;
  try {
    payload = text ? JSON.parse(text) : {};
  } catch (error: unknown) {
    throw new PermanentError(`${service} returned malformed JSON`, { cause: error });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new PermanentError(`${service} returned an unexpected response shape`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function toStatusError(service: string, response: Response): Promise<Error> {
  const body = (await response.text().catch(() => '')).slice(0, MAX_ERROR_BODY);
  const message = `${service} request failed (${response.status} ${response.statusText})${body ? `: ${body}` : ''}`;
  return isTransientStatus(response.status)
    ? new TransientError(message, { status: response.status })
    : new PermanentError(message, { status: response.status });
}

export function toNetworkError(service: string, error: unknown): Error {
  if (isOrchestratorError(error)) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new TransientError(`${service} request failed: ${detail}`, { cause: error });
}
