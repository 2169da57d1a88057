// packages/playlist-backend/src/application/submit-job.ts
//
// Request validation for new playlist jobs.
// Throws InvalidRequestError before any job exists; nothing is created for a bad request.
import { InvalidRequestError } from '@vibelist/contracts';

import type { PlaylistRequest } from '../domain/playlist-model.js';

export const MIN_DURATION_MINUTES = 1;
export const MAX_DURATION_MINUTES = 600;
export const MAX_DESCRIPTION_LENGTH = 2000;

export interface SubmitJobRequest {
  description: string;
  durationMinutes?: number;
  accessToken?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// validateSubmitJobRequest.declaration()
export function validateSubmitJobRequest(req: unknown, defaultDurationMinutes: number): PlaylistRequest {
  if (!isRecord(req)) {
    throw new InvalidRequestError('Request must be an object', 'invalid_body');
  }

  const { description, durationMinutes, accessToken } = req;

  if (typeof description !== 'string' || description.trim().length === 0) {
    throw new InvalidRequestError('description is required', 'description_required');
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw new InvalidRequestError(
      `description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
      'description_too_long',
    );
  }

  const duration = durationMinutes ?? defaultDurationMinutes;
  if (
    typeof duration !== 'number' ||
    !Number.isFinite(duration) ||
    duration < MIN_DURATION_MINUTES ||
    duration > MAX_DURATION_MINUTES
  ) {
    throw new InvalidRequestError(
      `durationMinutes must be between ${MIN_DURATION_MINUTES} and ${MAX_DURATION_MINUTES}`,
      'invalid_duration',
    );
  }

  if (accessToken !== undefined && accessToken !== null && typeof accessToken !== 'string') {
    throw new InvalidRequestError('accessToken must be a string when provided', 'invalid_access_token');
  }

  return {
    description: description.trim(),
    durationMinutes: duration,
    accessToken: accessToken || null,
  };
}
