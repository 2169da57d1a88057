import { describe, expect, it } from 'vitest';

import { jobRecordToDto, jobRecordToSummary, playlistResultToDto } from '../src/application/job-dto.js';
import type { JobRecord } from '../src/domain/job-model.js';
import { makeResult, makeTrack } from './helpers/fixtures.js';

const job: JobRecord = {
  id: 'job-1',
  status: 'completed',
  request: { description: 'late night drive, neon lights', durationMinutes: 60, accessToken: 'test-token' },
  createdAt: new Date('2024-03-01T10:00:00Z'),
  updatedAt: new Date('2024-03-01T10:00:05Z'),
  startedAt: new Date('2024-03-01T10:00:01Z'),
  completedAt: new Date('2024-03-01T10:00:05Z'),
  progress: 'Done in 4s!',
  result: makeResult({ tracks: [makeTrack(1, 212_400)], trackCount: 1 }),
  error: null,
};

describe('application/job-dto', () => {
  /**
   * Intent:
   * - Public shapes use ISO timestamps and whole-second track durations.
   * - The caller's access token never appears in any serialized form.
   */

  it('serializes a completed job snapshot', () => {
    const dto = jobRecordToDto(job);

    expect(dto).toMatchObject({
      id: 'job-1',
      status: 'completed',
      createdAt: '2024-03-01T10:00:00.000Z',
      completedAt: '2024-03-01T10:00:05.000Z',
      progress: 'Done in 4s!',
      error: null,
    });
    expect(dto.result?.tracks[0]).toEqual({
      title: 'Song 1',
      artist: 'Artist 1',
      album: 'Album 1',
      albumImage: 'https://images.test/1.jpg',
      durationSeconds: 212,
      uri: 'spotify:track:track1',
    });
    expect(JSON.stringify(dto)).not.toContain('test-token');
  });

  it('serializes a failed job with its error and no result', () => {
    const failed: JobRecord = {
      ...job,
      status: 'failed',
      result: null,
      progress: 'Failed',
      error: { kind: 'transient', message: 'Spotify search timed out', stage: 'materialize' },
    };

    const dto = jobRecordToDto(failed);
    expect(dto.result).toBeNull();
    expect(dto.error).toEqual({ kind: 'transient', message: 'Spotify search timed out', stage: 'materialize' });
  });

  it('keeps null completion for running jobs', () => {
    const running: JobRecord = { ...job, status: 'processing', completedAt: null, result: null };
    expect(jobRecordToDto(running).completedAt).toBeNull();
  });

  it('copies metrics instead of sharing them', () => {
    const result = makeResult();
    const dto = playlistResultToDto(result);
    dto.metrics.attempts.interpret = 9;
    expect(result.metrics.attempts.interpret).toBe(1);
  });

  it('builds list summaries', () => {
    expect(jobRecordToSummary(job)).toEqual({
      id: 'job-1',
      status: 'completed',
      description: 'late night drive, neon lights',
      createdAt: '2024-03-01T10:00:00.000Z',
      completedAt: '2024-03-01T10:00:05.000Z',
      trackCount: 1,
    });
    expect(jobRecordToSummary({ ...job, result: null }).trackCount).toBeNull();
  });
});
