/**
 * @vibelist/playlist-backend
 *
 * Public entry points for embedding the orchestrator: the composition root,
 * the HTTP server factory, and the CLI program.
 */
export { createCliProgram, followJob } from './cli.js';
export { loadConfig } from './config/env.js';
export type { PlaylistBackendConfig } from './config/env.js';
export { TaskOrchestrator } from './application/task-orchestrator.js';
export type { JobEventStream, OrchestratorStats } from './application/task-orchestrator.js';
export type { PipelineStages, Stage, StageContext } from './application/stages/types.js';
export {
  createOrchestratorService,
  retryPolicyFromConfig,
} from './infrastructure/orchestrator-service.js';
export type {
  OrchestratorService,
  OrchestratorServiceOverrides,
} from './infrastructure/orchestrator-service.js';
export { createHttpServer, startHttpServer } from './transport/http-server.js';
