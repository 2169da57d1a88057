import type { StageName } from '@vibelist/contracts';

import { CURATE_SYSTEM_PROMPT, VIBE_PROMPT } from '../../src/application/stages/prompts.js';
import type { PipelineStages, Stage, StageContext } from '../../src/application/stages/types.js';
import { loadConfig, type PlaylistBackendConfig } from '../../src/config/env.js';
import type {
  CandidateSet,
  CuratedPlaylist,
  MaterializedPlaylist,
  PlaylistRequest,
  PlaylistResult,
  PlaylistTrack,
  RequestInterpretation,
  SongRef,
} from '../../src/domain/playlist-model.js';
import type { ChatClient, ChatCompletionRequest } from '../../src/infrastructure/chat-client.js';
import type { Logger } from '../../src/infrastructure/logger.js';
import type {
  CreatedPlaylist,
  PlatformTrack,
  PlaylistPlatform,
} from '../../src/infrastructure/spotify-client.js';

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
  child: () => silentLogger,
};

export function makeTrack(index: number, durationMs = 200_000): PlaylistTrack {
  return {
    title: `Song ${index}`,
    artist: `Artist ${index}`,
    album: `Album ${index}`,
    albumImage: `https://images.test/${index}.jpg`,
    durationMs,
    uri: `spotify:track:track${index}`,
  };
}

export function makeResult(overrides: Partial<PlaylistResult> = {}): PlaylistResult {
  const tracks = [makeTrack(1), makeTrack(2)];
  return {
    playlistUrl: 'https://open.spotify.com/playlist/pl-1',
    playlistName: 'Night Drive',
    description: 'late night drive, neon lights',
    trackCount: tracks.length,
    durationMinutes: 6.7,
    tracks,
    generationTimeMs: 1234,
    cacheHits: 1,
    success: true,
    metrics: { stageTimings: { interpret: 10 }, attempts: { interpret: 1 } },
    ...overrides,
  };
}

type RunFn<I, O> = (input: I, ctx: StageContext) => Promise<O>;

/** Stage double that records every attempt and delegates to a swappable implementation. */
export class ScriptedStage<I, O> implements Stage<I, O> {
  readonly attempts: number[] = [];
  readonly released: string[] = [];

  constructor(
    readonly name: StageName,
    readonly label: string,
    public impl: RunFn<I, O>,
  ) {}

  async run(input: I, ctx: StageContext): Promise<O> {
    this.attempts.push(ctx.attempt);
    return this.impl(input, ctx);
  }

  release(jobId: string): void {
    this.released.push(jobId);
  }
}

export interface ScriptedStages extends PipelineStages {
  interpret: ScriptedStage<PlaylistRequest, RequestInterpretation>;
  retrieve: ScriptedStage<RequestInterpretation, CandidateSet>;
  curate: ScriptedStage<CandidateSet, CuratedPlaylist>;
  materialize: ScriptedStage<CuratedPlaylist, MaterializedPlaylist>;
}

/** Four stages that succeed immediately with a three-song playlist. */
export function createScriptedStages(): ScriptedStages {
  return {
    interpret: new ScriptedStage<PlaylistRequest, RequestInterpretation>('interpret', 'Processing your request...', async (request) => ({
      request,
      context: 'neon synthwave, nocturnal, driving',
    })),
    retrieve: new ScriptedStage<RequestInterpretation, CandidateSet>('retrieve', 'Searching over millions of sources...', async (input) => ({
      ...input,
      research: 'Artist 1 - Song 1\nArtist 2 - Song 2\nArtist 3 - Song 3',
    })),
    curate: new ScriptedStage<CandidateSet, CuratedPlaylist>('curate', 'Curating your playlist...', async (input) => ({
      request: input.request,
      title: 'Night Drive',
      songs: [1, 2, 3].map((index) => ({ artist: `Artist ${index}`, title: `Song ${index}` })),
    })),
    materialize: new ScriptedStage<CuratedPlaylist, MaterializedPlaylist>('materialize', 'Building your playlist...', async (input) => {
      const tracks = input.songs.map((_, index) => makeTrack(index + 1));
      return {
        playlistId: null,
        playlistUrl: null,
        playlistName: input.title,
        tracks,
        totalDurationMs: tracks.reduce((sum, track) => sum + track.durationMs, 0),
        cacheHits: 0,
      };
    }),
  };
}

/** Resolves on the next macrotask, after pending microtasks. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Polls `predicate` on each macrotask until true or the attempt budget runs out. */
export async function waitFor(predicate: () => boolean, attempts = 200): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (predicate()) return;
    await tick();
  }
  throw new Error('Condition not met in time');
}

export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function makeStageContext(
  jobId = 'job-1',
  overrides: Partial<StageContext> = {},
): StageContext & { progress: string[] } {
  const progress: string[] = [];
  return {
    jobId,
    attempt: 1,
    signal: new AbortController().signal,
    logger: silentLogger,
    reportProgress: (label) => {
      progress.push(label);
    },
    progress,
    ...overrides,
  };
}

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

/** fetch stand-in that replays `responses` in order and records every call. */
export function scriptedFetch(responses: Array<Response | Error>): {
  fetchImpl: typeof fetch;
  calls: RecordedRequest[];
} {
  const calls: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error('No scripted response left');
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchImpl, calls };
}

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
  });
}

export function platformTrack(index: number, durationMs = 60_000): PlatformTrack {
  return { ...makeTrack(index, durationMs), id: `id${index}` };
}

/** In-memory playlist platform: a title-keyed catalogue plus a record of every write. */
export class FakePlatform implements PlaylistPlatform {
  readonly catalogue = new Map<string, PlatformTrack>();
  readonly searches: string[] = [];
  readonly created: Array<{ userId: string; name: string; description: string }> = [];
  readonly added: Array<{ playlistId: string; uris: string[] }> = [];
  readonly recommendationCalls: Array<{ seeds: string[]; limit: number; token: string }> = [];
  recommended: PlatformTrack[] = [];
  searchError: ((song: SongRef) => unknown) | null = null;
  createError: unknown = null;
  addErrors: unknown[] = [];

  async serverToken(): Promise<string> {
    return 'server-token';
  }

  async searchTrack(song: SongRef, token: string): Promise<PlatformTrack | null> {
    this.searches.push(`${song.title}|${token}`);
    const failure = this.searchError?.(song);
    if (failure) throw failure;
    return this.catalogue.get(song.title) ?? null;
  }

  async currentUserId(): Promise<string> {
    return 'listener-1';
  }

  async createPlaylist(
    userId: string,
    _token: string,
    details: { name: string; description: string; public: boolean },
  ): Promise<CreatedPlaylist> {
    if (this.createError) throw this.createError;
    this.created.push({ userId, name: details.name, description: details.description });
    return { id: 'pl-1', url: 'https://open.spotify.com/playlist/pl-1' };
  }

  async addTracks(playlistId: string, uris: string[]): Promise<void> {
    const failure = this.addErrors.shift();
    if (failure) throw failure;
    this.added.push({ playlistId, uris });
  }

  async recommendations(seeds: string[], limit: number, token: string): Promise<PlatformTrack[]> {
    this.recommendationCalls.push({ seeds, limit, token });
    return this.recommended;
  }
}

/**
 * Chat stand-in that answers each stage by its system prompt: a vibe, a research
 * text, then a curated JSON list of `songCount` songs titled "Night Drive".
 */
export class ScriptedChat implements ChatClient {
  readonly requests: ChatCompletionRequest[] = [];

  constructor(private readonly songCount = 3) {}

  async complete(request: ChatCompletionRequest): Promise<string> {
    this.requests.push(request);
    const system = request.messages[0]?.content;
    const indexes = Array.from({ length: this.songCount }, (_, i) => i + 1);
    if (system === VIBE_PROMPT) {
      return 'neon synthwave, nocturnal, driving';
    }
    if (system === CURATE_SYSTEM_PROMPT) {
      return JSON.stringify({
        songs: indexes.map((index) => ({ artist: `Artist ${index}`, title: `Song ${index}` })),
        playlist_title: 'Night Drive',
      });
    }
    return indexes.map((index) => `Artist ${index} - Song ${index}`).join('\n');
  }
}

/** Environment config with instant retries and every external backend switched off. */
export function testConfig(): PlaylistBackendConfig {
  const base = loadConfig();
  return {
    ...base,
    pipeline: { ...base.pipeline, retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
    events: { bufferSize: 32, heartbeatMs: 60_000 },
    retention: { maxAgeMs: 0, sweepIntervalMs: 0 },
    cache: { provider: 'memory', ttlSeconds: 60, maxEntries: 100 },
    redis: { ...base.redis, enabled: false },
    pg: { ...base.pg, enabled: false },
  };
}
