// packages/playlist-backend/src/domain/job-model.ts

// Job domain model for the playlist orchestrator.
// Status only moves forward: pending -> processing -> completed | failed,
// with pending -> failed for jobs cancelled before their first stage.

import type { JobErrorKind, JobStatus, StageName } from '@vibelist/contracts';

import type { PlaylistRequest, PlaylistResult } from './playlist-model.js';

export type { JobStatus } from '@vibelist/contracts';

export interface JobError {
  kind: JobErrorKind;
  message: string;
  stage: StageName | null;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  request: Readonly<PlaylistRequest>;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  progress: string | null;
  result: PlaylistResult | null;
  error: JobError | null;
}
// JobRecord.declaration()

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['completed', 'failed']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

// canTransition.declaration()
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  switch (from) {
    case 'pending':
      // pending -> processing, or straight to failed when cancelled before start
      return to === 'pending' || to === 'processing' || to === 'failed';
    case 'processing':
      return to === 'processing' || to === 'completed' || to === 'failed';
    case 'completed':
    case 'failed':
      // completedAt is set exactly once; nothing leaves a terminal status
      return false;
    default:
      return false;
  }
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid job status transition: ${from} -> ${to}`);
  }
}
