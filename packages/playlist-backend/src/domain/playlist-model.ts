// packages/playlist-backend/src/domain/playlist-model.ts
//
// Payloads handed from one pipeline stage to the next, and the final playlist result.
import type { StageName } from '@vibelist/contracts';

export interface PlaylistRequest {
  description: string;
  durationMinutes: number;
  /** Caller's playlist-platform credential; playlists are only saved when present. */
  accessToken?: string | null;
}

export interface SongRef {
  artist: string;
  title: string;
}

/** Output of the interpret stage: the request plus a short "vibe" description. */
export interface RequestInterpretation {
  request: PlaylistRequest;
  context: string;
}

/** Output of the retrieve stage: free-form research listing candidate songs. */
export interface CandidateSet extends RequestInterpretation {
  research: string;
}

/** Output of the curate stage. */
export interface CuratedPlaylist {
  request: PlaylistRequest;
  title: string;
  songs: SongRef[];
}

export interface PlaylistTrack {
  title: string;
  artist: string;
  album: string;
  albumImage: string;
  durationMs: number;
  uri: string;
}

/** Output of the materialize stage. */
export interface MaterializedPlaylist {
  playlistId: string | null;
  playlistUrl: string | null;
  playlistName: string;
  tracks: PlaylistTrack[];
  totalDurationMs: number;
  cacheHits: number;
}

export interface PipelineRunMetrics {
  stageTimings: Partial<Record<StageName, number>>;
  attempts: Partial<Record<StageName, number>>;
}

export interface PlaylistResult {
  playlistUrl: string | null;
  playlistName: string;
  description: string;
  trackCount: number;
  durationMinutes: number;
  tracks: PlaylistTrack[];
  generationTimeMs: number;
  cacheHits: number;
  success: boolean;
  metrics: PipelineRunMetrics;
}

export function buildPlaylistResult(args: {
  request: PlaylistRequest;
  materialized: MaterializedPlaylist;
  generationTimeMs: number;
  metrics: PipelineRunMetrics;
}): PlaylistResult {
  const { request, materialized, generationTimeMs, metrics } = args;
  return {
    playlistUrl: materialized.playlistUrl,
    playlistName: materialized.playlistName,
    description: request.description,
    trackCount: materialized.tracks.length,
    durationMinutes: Math.round((materialized.totalDurationMs / 60_000) * 10) / 10,
    tracks: materialized.tracks,
    generationTimeMs,
    cacheHits: materialized.cacheHits,
    success: materialized.playlistUrl !== null,
    metrics,
  };
}
