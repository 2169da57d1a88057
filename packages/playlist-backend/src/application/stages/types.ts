// packages/playlist-backend/src/application/stages/types.ts
//
// Stage contract shared by the pipeline executor and the concrete stages.
// Stages never touch the job store: progress goes through `reportProgress`.

import type { StageName } from '@vibelist/contracts';

import type {
  CandidateSet,
  CuratedPlaylist,
  MaterializedPlaylist,
  PlaylistRequest,
  RequestInterpretation,
} from '../../domain/playlist-model.js';
import type { Logger } from '../../infrastructure/logger.js';

export interface StageContext {
  jobId: string;
  /** 1-based attempt number within the current stage. */
  attempt: number;
  /** Aborted when the attempt times out. */
  signal: AbortSignal;
  logger: Logger;
  reportProgress(label: string): void;
}

export interface Stage<I, O> {
  readonly name: StageName;
  /** Progress label shown while the stage runs. */
  readonly label: string;
  run(input: I, ctx: StageContext): Promise<O>;
  /** Drops any per-job state once the job is terminal. */
  release?(jobId: string): void;
}

export interface PipelineStages {
  interpret: Stage<PlaylistRequest, RequestInterpretation>;
  retrieve: Stage<RequestInterpretation, CandidateSet>;
  curate: Stage<CandidateSet, CuratedPlaylist>;
  materialize: Stage<CuratedPlaylist, MaterializedPlaylist>;
}

export const STAGE_ORDER: readonly StageName[] = ['interpret', 'retrieve', 'curate', 'materialize'];
