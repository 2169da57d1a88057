// packages/playlist-backend/src/cli.ts
//
// Commander program behind bin/cli.ts.
// - `serve` starts the HTTP server with its in-process worker pool.
// - `generate` runs one job through an in-process orchestrator and prints the result.
import { Command, InvalidOptionArgumentError } from 'commander';
import ora from 'ora';
import pc from 'picocolors';

import type { JobEventMessage, JobStatusDto } from '@vibelist/contracts';

import { jobRecordToDto } from './application/job-dto.js';
import type { JobEventStream, TaskOrchestrator } from './application/task-orchestrator.js';
import { loadConfig, type PlaylistBackendConfig } from './config/env.js';
import type { JobRecord } from './domain/job-model.js';
import {
  createOrchestratorService,
  type OrchestratorService,
} from './infrastructure/orchestrator-service.js';
import { startHttpServer } from './transport/http-server.js';

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDeps {
  loadConfig: () => PlaylistBackendConfig;
  createService: (config: PlaylistBackendConfig) => OrchestratorService;
  startServer: (config: PlaylistBackendConfig) => Promise<unknown>;
  io: CliIo;
  /** Spinner output; off for JSON output and non-TTY streams. */
  interactive: boolean;
}

interface GenerateFlags {
  duration?: number;
  token?: string;
  json?: boolean;
}

const defaultIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const positiveInt =
  (label: string) =>
  (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidOptionArgumentError(`${label} must be a positive integer.`);
    }
    return parsed;
  };

/**
 * Submits one job and follows its events until it is terminal.
 * Resolves with the final record whether the job completed or failed.
 */
export async function followJob(
  orchestrator: TaskOrchestrator,
  request: { description: string; durationMinutes?: number; accessToken?: string | null },
  onEvent: (event: JobEventMessage) => void,
): Promise<JobRecord> {
  const { jobId } = orchestrator.submit(request);
  const stream: JobEventStream = orchestrator.subscribe(jobId);

  let last: JobRecord | null = null;
  try {
    for await (const event of stream) {
      last = event.job;
      onEvent({ type: event.type, job: jobRecordToDto(event.job) });
    }
  } finally {
    stream.close();
  }

  // A deleted job ends its stream without a terminal event.
  return last ?? orchestrator.getStatus(jobId);
}

function formatSummary(dto: JobStatusDto): string[] {
  const result = dto.result;
  if (!result) return [];
  const lines = [
    pc.bold(result.playlistName),
    `  Tracks   : ${result.trackCount} (${result.durationMinutes} min)`,
    `  Time     : ${(result.generationTimeMs / 1000).toFixed(1)}s`,
  ];
  if (result.playlistUrl) lines.push(`  Playlist : ${pc.cyan(result.playlistUrl)}`);
  for (const [index, track] of result.tracks.entries()) {
    lines.push(pc.dim(`  ${String(index + 1).padStart(2, ' ')}. ${track.title} · ${track.artist}`));
  }
  return lines;
}

async function runGenerate(
  deps: CliDeps,
  description: string,
  flags: GenerateFlags,
): Promise<void> {
  const config = deps.loadConfig();
  const service = deps.createService(config);
  const fancy = deps.interactive && !flags.json;
  const spinner = fancy ? ora({ spinner: 'dots', color: 'cyan' }).start('Queued') : null;

  try {
    const final = await followJob(
      service.orchestrator,
      { description, durationMinutes: flags.duration, accessToken: flags.token ?? null },
      (event) => {
        if (flags.json) {
          deps.io.stdout(JSON.stringify(event));
          return;
        }
        if (spinner && event.job.progress) spinner.text = event.job.progress;
      },
    );
    const dto = jobRecordToDto(final);

    if (dto.status === 'completed') {
      spinner?.succeed(dto.progress ?? 'Done');
      if (!flags.json) {
        for (const line of formatSummary(dto)) deps.io.stdout(line);
      }
      return;
    }

    spinner?.fail(dto.progress ?? 'Failed');
    const reason = dto.error ? `${dto.error.kind}: ${dto.error.message}` : `job ended as ${dto.status}`;
    deps.io.stderr(pc.red(`Playlist generation failed (${reason})`));
    process.exitCode = 1;
  } finally {
    if (spinner?.isSpinning) spinner.stop();
    await service.close();
  }
}

// createCliProgram.declaration()
export function createCliProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = {
    loadConfig,
    createService: (config) => createOrchestratorService(config),
    startServer: startHttpServer,
    io: defaultIo,
    interactive: Boolean(process.stdout.isTTY),
    ...overrides,
  };

  const program = new Command()
    .name('vibelist')
    .description('Turns a free-text vibe into a Spotify playlist');

  program
    .command('serve')
    .description('Start the HTTP API and its worker pool')
    .option('--port <port>', 'Override HTTP_PORT', positiveInt('Port'))
    .action(async (opts: { port?: number }) => {
      const config = deps.loadConfig();
      const effective = opts.port ? { ...config, http: { ...config.http, port: opts.port } } : config;
      await deps.startServer(effective);
    });

  program
    .command('generate')
    .description('Generate one playlist in-process and print it')
    .argument('<description>', 'What the playlist should feel like')
    .option('-d, --duration <minutes>', 'Target length in minutes', positiveInt('Duration'))
    .option('-t, --token <accessToken>', 'Spotify user token; without it no playlist is created')
    .option('--json', 'Print every job event as one JSON line')
    .action(async (description: string, opts: GenerateFlags) => {
      try {
        await runGenerate(deps, description, opts);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        deps.io.stderr(pc.red(message));
        process.exitCode = 1;
      }
    });

  return program;
}
