export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type StageName = 'interpret' | 'retrieve' | 'curate' | 'materialize';

export type JobErrorKind = 'invalid_request' | 'not_found' | 'transient' | 'permanent' | 'cancelled';

export interface JobErrorDto {
  kind: JobErrorKind;
  message: string;
  stage: StageName | null;
}

export interface PlaylistTrackDto {
  title: string;
  artist: string;
  album: string;
  albumImage: string;
  durationSeconds: number;
  uri: string;
}

export interface PipelineMetricsDto {
  stageTimings: Partial<Record<StageName, number>>;
  attempts: Partial<Record<StageName, number>>;
}

export interface PlaylistResultDto {
  playlistUrl: string | null;
  playlistName: string;
  description: string;
  trackCount: number;
  durationMinutes: number;
  tracks: PlaylistTrackDto[];
  generationTimeMs: number;
  cacheHits: number;
  success: boolean;
  metrics: PipelineMetricsDto;
}

export interface JobStatusDto {
  id: string;
  status: JobStatus;
  createdAt: string;
  completedAt: string | null;
  progress: string | null;
  result: PlaylistResultDto | null;
  error: JobErrorDto | null;
}

export interface JobSummaryDto {
  id: string;
  status: JobStatus;
  description: string;
  createdAt: string;
  completedAt: string | null;
  trackCount: number | null;
}

export type JobEventType =
  | 'job_snapshot'
  | 'job_created'
  | 'job_progress'
  | 'job_completed'
  | 'job_failed';

export interface JobEventMessage {
  type: JobEventType;
  job: JobStatusDto;
}

export interface SubmitJobResponse {
  jobId: string;
  status: JobStatus;
}

export * from './errors.js';
