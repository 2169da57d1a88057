// packages/playlist-backend/src/application/job-dto.ts
//
// Serializes JobRecord snapshots into the public HTTP/SSE shapes.
// The caller's access token never leaves the process.
import type {
  JobStatusDto,
  JobSummaryDto,
  PlaylistResultDto,
  PlaylistTrackDto,
} from '@vibelist/contracts';

import type { JobRecord } from '../domain/job-model.js';
import type { PlaylistResult, PlaylistTrack } from '../domain/playlist-model.js';

function trackToDto(track: PlaylistTrack): PlaylistTrackDto {
  return {
    title: track.title,
    artist: track.artist,
    album: track.album,
    albumImage: track.albumImage,
    durationSeconds: Math.round(track.durationMs / 1000),
    uri: track.uri,
  };
}

export function playlistResultToDto(result: PlaylistResult): PlaylistResultDto {
  return {
    playlistUrl: result.playlistUrl,
    playlistName: result.playlistName,
    description: result.description,
    trackCount: result.trackCount,
    durationMinutes: result.durationMinutes,
    tracks: result.tracks.map(trackToDto),
    generationTimeMs: result.generationTimeMs,
    cacheHits: result.cacheHits,
    success: result.success,
    metrics: {
      stageTimings: { ...result.metrics.stageTimings },
      attempts: { ...result.metrics.attempts },
    },
  };
}

// jobRecordToDto.declaration()
export function jobRecordToDto(job: JobRecord): JobStatusDto {
  return {
    id: job.id,
    status: job.status,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    progress: job.progress,
    result: job.result ? playlistResultToDto(job.result) : null,
    error: job.error ? { ...job.error } : null,
  };
}

export function jobRecordToSummary(job: JobRecord): JobSummaryDto {
  return {
    id: job.id,
    status: job.status,
    description: job.request.description,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    trackCount: job.result ? job.result.trackCount : null,
  };
}
