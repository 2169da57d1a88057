// packages/playlist-backend/src/infrastructure/spotify-client.ts
//
// Spotify Web API adapter behind the PlaylistPlatform interface.
// - Searches with the caller's token when present, otherwise with a server
//   client-credentials token (cached until shortly before expiry).
// - 401/403 map to PermanentError; 429/5xx to TransientError.

import { z } from 'zod';

import { PermanentError } from '@vibelist/contracts';

import type { PlaylistTrack, SongRef } from '../domain/playlist-model.js';
import { fetchJson } from './upstream-http.js';

export interface PlatformTrack extends PlaylistTrack {
  id: string;
}

export interface CreatedPlaylist {
  id: string;
  url: string;
}

export interface PlaylistPlatform {
  /** Token for catalogue calls when the caller brought none. */
  serverToken(signal?: AbortSignal): Promise<string>;
  searchTrack(song: SongRef, token: string, signal?: AbortSignal): Promise<PlatformTrack | null>;
  currentUserId(token: string, signal?: AbortSignal): Promise<string>;
  createPlaylist(
    userId: string,
    token: string,
    details: { name: string; description: string; public: boolean },
    signal?: AbortSignal,
  ): Promise<CreatedPlaylist>;
  /** Appends in order; the platform caps one request at ADD_BATCH_SIZE items. */
  addTracks(playlistId: string, uris: string[], token: string, signal?: AbortSignal): Promise<void>;
  recommendations(
    seedTrackIds: string[],
    limit: number,
    token: string,
    signal?: AbortSignal,
  ): Promise<PlatformTrack[]>;
}

export const ADD_BATCH_SIZE = 100;
const MAX_SEEDS = 5;
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const trackSchema = z.object({
  id: z.string(),
  uri: z.string(),
  name: z.string(),
  duration_ms: z.number(),
  artists: z.array(z.object({ name: z.string() })),
  album: z
    .object({
      name: z.string().optional().default(''),
      images: z.array(z.object({ url: z.string() })).optional().default([]),
    })
    .optional(),
});

type SpotifyTrackPayload = z.infer<typeof trackSchema>;

const searchSchema = z.object({
  tracks: z.object({ items: z.array(trackSchema) }),
});

const userSchema = z.object({ id: z.string() });

const playlistSchema = z.object({
  id: z.string(),
  external_urls: z.object({ spotify: z.string() }).partial().optional(),
});

const recommendationsSchema = z.object({ tracks: z.array(trackSchema) });

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const snapshotSchema = z.object({ snapshot_id: z.string().optional() });

export function toPlatformTrack(payload: SpotifyTrackPayload): PlatformTrack {
  return {
    id: payload.id,
    uri: payload.uri,
    title: payload.name,
    artist: payload.artists.map((artist) => artist.name).join(', '),
    album: payload.album?.name ?? '',
    albumImage: payload.album?.images[0]?.url ?? '',
    durationMs: payload.duration_ms,
  };
}

export interface SpotifyClientOptions {
  clientId?: string;
  clientSecret?: string;
  apiBaseUrl: string;
  accountsBaseUrl: string;
  fetchImplementation?: typeof fetch;
  now?: () => number;
}

export class SpotifyClient implements PlaylistPlatform {
  private readonly apiBaseUrl: string;
  private readonly accountsBaseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private cachedToken: { value: string; expiresAt: number } | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(private readonly options: SpotifyClientOptions) {
    this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
    this.accountsBaseUrl = options.accountsBaseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;
    this.now = options.now ?? Date.now;
  }

  async serverToken(signal?: AbortSignal): Promise<string> {
    if (this.cachedToken && this.cachedToken.expiresAt > this.now()) {
      return this.cachedToken.value;
    }
    if (!this.pendingToken) {
      this.pendingToken = this.requestServerToken(signal).finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  async searchTrack(song: SongRef, token: string, signal?: AbortSignal): Promise<PlatformTrack | null> {
    const params = new URLSearchParams({
      q: `track:${song.title} artist:${song.artist}`,
      type: 'track',
      limit: '1',
    });
    const data = await fetchJson(
      this.fetchImpl,
      'Spotify',
      { url: `${this.apiBaseUrl}/search?${params.toString()}`, headers: bearer(token), signal },
      searchSchema,
    );
    const first = data.tracks.items[0];
    return first ? toPlatformTrack(first) : null;
  }

  async currentUserId(token: string, signal?: AbortSignal): Promise<string> {
    const data = await fetchJson(
      this.fetchImpl,
      'Spotify',
      { url: `${this.apiBaseUrl}/me`, headers: bearer(token), signal },
      userSchema,
    );
    return data.id;
  }

  async createPlaylist(
    userId: string,
    token: string,
    details: { name: string; description: string; public: boolean },
    signal?: AbortSignal,
  ): Promise<CreatedPlaylist> {
    const data = await fetchJson(
      this.fetchImpl,
      'Spotify',
      {
        url: `${this.apiBaseUrl}/users/${encodeURIComponent(userId)}/playlists`,
        method: 'POST',
        headers: { ...bearer(token), 'content-type': 'application/json' },
        body: JSON.stringify(details),
        signal,
      },
      playlistSchema,
    );
    return {
      id: data.id,
      url: data.external_urls?.spotify ?? `https://open.spotify.com/playlist/${data.id}`,
    };
  }

  async addTracks(playlistId: string, uris: string[], token: string, signal?: AbortSignal): Promise<void> {
    for (let offset = 0; offset < uris.length; offset += ADD_BATCH_SIZE) {
      await fetchJson(
        this.fetchImpl,
        'Spotify',
        {
          url: `${this.apiBaseUrl}/playlists/${encodeURIComponent(playlistId)}/tracks`,
          method: 'POST',
          headers: { ...bearer(token), 'content-type': 'application/json' },
          body: JSON.stringify({ uris: uris.slice(offset, offset + ADD_BATCH_SIZE) }),
          signal,
        },
        snapshotSchema,
      );
    }
  }

  async recommendations(
    seedTrackIds: string[],
    limit: number,
    token: string,
    signal?: AbortSignal,
  ): Promise<PlatformTrack[]> {
    if (seedTrackIds.length === 0) return [];
    const params = new URLSearchParams({
      seed_tracks: seedTrackIds.slice(0, MAX_SEEDS).join(','),
      limit: String(limit),
    });
    const data = await fetchJson(
      this.fetchImpl,
      'Spotify',
      { url: `${this.apiBaseUrl}/recommendations?${params.toString()}`, headers: bearer(token), signal },
      recommendationsSchema,
    );
    return data.tracks.map(toPlatformTrack);
  }

  private async requestServerToken(signal?: AbortSignal): Promise<string> {
    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new PermanentError('SPOTIFY_CLIENT_ID/SPOTIFY_CLIENT_SECRET are not configured');
    }

    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const data = await fetchJson(
      this.fetchImpl,
      'Spotify accounts',
      {
        url: `${this.accountsBaseUrl}/api/token`,
        method: 'POST',
        headers: {
          authorization: `Basic ${basic}`,
          'content-type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        signal,
      },
      tokenSchema,
    );

    this.cachedToken = {
      value: data.access_token,
      expiresAt: this.now() + data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return data.access_token;
  }
}

function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}`, accept: 'application/json' };
}
