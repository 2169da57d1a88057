// packages/playlist-backend/src/application/stages/materialize-playlist.ts
//
// Resolves curated songs on the playlist platform and, when the caller brought a
// token, saves them as a playlist.
// Side effects are memoized per job: a retried attempt reuses the playlist it
// already created and only adds URIs that were not added yet.

import { z } from 'zod';

import { PermanentError, TransientError } from '@vibelist/contracts';

import type {
  CuratedPlaylist,
  MaterializedPlaylist,
  PlaylistTrack,
  SongRef,
} from '../../domain/playlist-model.js';
import { normalizeQuery, type ResponseCache } from '../../infrastructure/response-cache.js';
import { mapWithConcurrency } from '../../infrastructure/semaphore.js';
import {
  ADD_BATCH_SIZE,
  type CreatedPlaylist,
  type PlatformTrack,
  type PlaylistPlatform,
} from '../../infrastructure/spotify-client.js';
import { classifyError, errorMessage } from '../retry-policy.js';
import type { Stage, StageContext } from './types.js';

const RECOMMENDATION_SEEDS = 5;
const RECOMMENDATION_LIMIT = 30;

const cachedTrackSchema = z
  .object({
    id: z.string(),
    uri: z.string(),
    title: z.string(),
    artist: z.string(),
    album: z.string(),
    albumImage: z.string(),
    durationMs: z.number(),
  })
  .nullable();

interface MaterializeMemo {
  matched?: PlatformTrack[];
  cacheHits: number;
  /** null: creation was attempted and given up on. */
  playlist?: CreatedPlaylist | null;
  fill?: PlatformTrack[];
  addedUris: Set<string>;
}

interface LookupResult {
  track: PlatformTrack | null;
  cacheHit: boolean;
  error?: unknown;
}

export interface MaterializePlaylistOptions {
  platform: PlaylistPlatform;
  cache: ResponseCache;
  searchConcurrency: number;
  random?: () => number;
}

export class MaterializePlaylistStage implements Stage<CuratedPlaylist, MaterializedPlaylist> {
  readonly name = 'materialize';
  readonly label = 'Building your playlist...';

  private readonly memos = new Map<string, MaterializeMemo>();
  private readonly platform: PlaylistPlatform;
  private readonly cache: ResponseCache;
  private readonly searchConcurrency: number;
  private readonly random: () => number;

  constructor(options: MaterializePlaylistOptions) {
    this.platform = options.platform;
    this.cache = options.cache;
    this.searchConcurrency = options.searchConcurrency;
    this.random = options.random ?? Math.random;
  }

  async run(curated: CuratedPlaylist, ctx: StageContext): Promise<MaterializedPlaylist> {
    const memo = this.memoFor(ctx.jobId);
    const { request } = curated;
    const userToken = request.accessToken || null;
    const searchToken = userToken ?? (await this.platform.serverToken(ctx.signal));

    if (!memo.matched) {
      ctx.reportProgress(`Matching ${curated.songs.length} songs...`);
      const { tracks, cacheHits } = await this.resolveTracks(curated.songs, searchToken, ctx);
      memo.matched = tracks;
      memo.cacheHits = cacheHits;
    }
    const matched = memo.matched;
    if (matched.length === 0) {
      throw new PermanentError('No tracks found on Spotify');
    }

    let playlist: CreatedPlaylist | null = null;
    if (userToken) {
      if (memo.playlist === undefined) {
        memo.playlist = await this.createPlaylist(curated, userToken, ctx);
      }
      playlist = memo.playlist;
      if (playlist) {
        ctx.reportProgress('Adding tracks to your playlist...');
        await this.addMissing(playlist.id, matched, userToken, memo, ctx);
      }
    }

    const targetMs = request.durationMinutes * 60_000;
    const matchedMs = totalDurationMs(matched);
    if (memo.fill === undefined) {
      memo.fill = matchedMs < targetMs ? await this.fillUp(matched, targetMs - matchedMs, searchToken, ctx) : [];
    }
    if (playlist && userToken && memo.fill.length > 0) {
      await this.addMissing(playlist.id, memo.fill, userToken, memo, ctx);
    }

    const tracks = [...matched, ...memo.fill];
    return {
      playlistId: playlist?.id ?? null,
      playlistUrl: playlist?.url ?? null,
      playlistName: curated.title,
      tracks: tracks.map(toPlaylistTrack),
      totalDurationMs: totalDurationMs(tracks),
      cacheHits: memo.cacheHits,
    };
  }

  release(jobId: string): void {
    this.memos.delete(jobId);
  }

  private memoFor(jobId: string): MaterializeMemo {
    let memo = this.memos.get(jobId);
    if (!memo) {
      memo = { cacheHits: 0, addedUris: new Set() };
      this.memos.set(jobId, memo);
    }
    return memo;
  }

  private async resolveTracks(
    songs: SongRef[],
    token: string,
    ctx: StageContext,
  ): Promise<{ tracks: PlatformTrack[]; cacheHits: number }> {
    const results = await mapWithConcurrency(songs, this.searchConcurrency, (song) =>
      this.lookup(song, token, ctx),
    );

    const seen = new Set<string>();
    const tracks: PlatformTrack[] = [];
    let cacheHits = 0;
    const failures: unknown[] = [];
    for (const result of results) {
      if (result.cacheHit) cacheHits += 1;
      if (result.error !== undefined) failures.push(result.error);
      if (result.track && !seen.has(result.track.uri)) {
        seen.add(result.track.uri);
        tracks.push(result.track);
      }
    }

    if (failures.length > 0) {
      ctx.logger.warn('Some track lookups failed', {
        failed: failures.length,
        total: songs.length,
        error: errorMessage(failures[0]),
      });
      if (tracks.length === 0 && failures.some((error) => classifyError(error) === 'transient')) {
        throw new TransientError('Track search failed for every song', { cause: failures[0] });
      }
    }

    ctx.logger.info('Tracks matched', { matched: tracks.length, requested: songs.length, cacheHits });
    return { tracks, cacheHits };
  }

  private async lookup(song: SongRef, token: string, ctx: StageContext): Promise<LookupResult> {
    const key = normalizeQuery('track', song.title, song.artist);
    const cached = await this.cache.get(key);
    if (cached !== null) {
      const hit = parseCachedTrack(cached);
      if (hit !== undefined) {
        return { track: hit, cacheHit: true };
      }
      ctx.logger.debug('Ignoring unreadable cache entry', { key });
    }

    try {
      const track = await this.platform.searchTrack(song, token, ctx.signal);
      await this.cache.set(key, JSON.stringify(track));
      return { track, cacheHit: false };
    } catch (error: unknown) {
      if (ctx.signal.aborted || isAuthFailure(error)) throw error;
      return { track: null, cacheHit: false, error };
    }
  }

  private async createPlaylist(
    curated: CuratedPlaylist,
    token: string,
    ctx: StageContext,
  ): Promise<CreatedPlaylist | null> {
    try {
      const userId = await this.platform.currentUserId(token, ctx.signal);
      const created = await this.platform.createPlaylist(
        userId,
        token,
        {
          name: curated.title,
          description: `Generated from: ${curated.request.description}`.slice(0, 300),
          public: true,
        },
        ctx.signal,
      );
      ctx.logger.info('Playlist created', { playlistId: created.id });
      return created;
    } catch (error: unknown) {
      if (classifyError(error) === 'transient') throw error;
      ctx.logger.warn('Playlist creation failed; returning track list only', {
        error: errorMessage(error),
      });
      return null;
    }
  }

  private async addMissing(
    playlistId: string,
    tracks: PlatformTrack[],
    token: string,
    memo: MaterializeMemo,
    ctx: StageContext,
  ): Promise<void> {
    const pending = tracks.map((track) => track.uri).filter((uri) => !memo.addedUris.has(uri));

    for (let offset = 0; offset < pending.length; offset += ADD_BATCH_SIZE) {
      const batch = pending.slice(offset, offset + ADD_BATCH_SIZE);
      try {
        await this.platform.addTracks(playlistId, batch, token, ctx.signal);
      } catch (error: unknown) {
        if (classifyError(error) === 'transient') throw error;
        ctx.logger.warn('Adding tracks failed; playlist left partial', {
          playlistId,
          error: errorMessage(error),
        });
        return;
      }
      for (const uri of batch) memo.addedUris.add(uri);
    }
  }

  private async fillUp(
    matched: PlatformTrack[],
    missingMs: number,
    token: string,
    ctx: StageContext,
  ): Promise<PlatformTrack[]> {
    let recommended: PlatformTrack[];
    try {
      const seeds = matched.slice(0, RECOMMENDATION_SEEDS).map((track) => track.id);
      recommended = await this.platform.recommendations(seeds, RECOMMENDATION_LIMIT, token, ctx.signal);
    } catch (error: unknown) {
      if (ctx.signal.aborted) throw error;
      ctx.logger.warn('Recommendations skipped', { error: errorMessage(error) });
      return [];
    }

    const known = new Set(matched.map((track) => track.uri));
    const picked: PlatformTrack[] = [];
    let addedMs = 0;
    for (const track of shuffle(recommended, this.random)) {
      if (addedMs >= missingMs) break;
      if (known.has(track.uri)) continue;
      known.add(track.uri);
      picked.push(track);
      addedMs += track.durationMs;
    }

    if (picked.length > 0) {
      ctx.logger.info('Filled playlist with recommendations', { added: picked.length, addedMs });
    }
    return picked;
  }
}

function parseCachedTrack(raw: string): PlatformTrack | null | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = cachedTrackSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}

function isAuthFailure(error: unknown): boolean {
  return error instanceof PermanentError && (error.status === 401 || error.status === 403);
}

function totalDurationMs(tracks: PlatformTrack[]): number {
  return tracks.reduce((sum, track) => sum + track.durationMs, 0);
}

function toPlaylistTrack(track: PlatformTrack): PlaylistTrack {
  return {
    title: track.title,
    artist: track.artist,
    album: track.album,
    albumImage: track.albumImage,
    durationMs: track.durationMs,
    uri: track.uri,
  };
}

/** Fisher-Yates on a copy. */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
