import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { PermanentError, TransientError } from '@vibelist/contracts';

import { HttpChatClient } from '../src/infrastructure/chat-client.js';
import { SpotifyClient, toPlatformTrack } from '../src/infrastructure/spotify-client.js';
import { fetchJson } from '../src/infrastructure/upstream-http.js';
import { jsonResponse, scriptedFetch } from './helpers/fixtures.js';

const okSchema = z.object({ ok: z.boolean().optional() });

function spotifyTrack(id: string, artists = ['The Midnight']) {
  return {
    id,
    uri: `spotify:track:${id}`,
    name: `Track ${id}`,
    duration_ms: 215_000,
    artists: artists.map((name) => ({ name })),
    album: { name: 'Endless Summer', images: [{ url: `https://images.test/${id}.jpg` }] },
  };
}

function headerOf(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

describe('infrastructure/upstream-http - fetchJson', () => {
  /**
   * Intent:
   * - 408, 429 and 5xx become TransientError; every other failure status is permanent.
   * - Network failures are transient; payload problems are permanent.
   */

  it('parses a successful response against the schema', async () => {
    const { fetchImpl } = scriptedFetch([jsonResponse({ ok: true })]);

    await expect(fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema)).resolves.toEqual({
      ok: true,
    });
  });

  it('treats an empty body as an empty object', async () => {
    const { fetchImpl } = scriptedFetch([new Response('', { status: 201 })]);

    await expect(fetchJson(fetchImpl, 'Spotify', { url: 'https://api.test/x' }, okSchema)).resolves.toEqual({});
  });

  it('maps retryable statuses to TransientError with the status and body', async () => {
    const { fetchImpl } = scriptedFetch([jsonResponse({ error: 'busy' }, 503, 'Service Unavailable')]);

    const failure = fetchJson(fetchImpl, 'Spotify', { url: 'https://api.test/x' }, okSchema);

    await expect(failure).rejects.toBeInstanceOf(TransientError);
    await expect(failure).rejects.toMatchObject({
      status: 503,
      message: 'Spotify request failed (503 Service Unavailable): {"error":"busy"}',
    });
  });

  it('maps client errors to PermanentError and caps the quoted body', async () => {
    const { fetchImpl } = scriptedFetch([new Response('x'.repeat(500), { status: 404, statusText: 'Not Found' })]);

    const failure = fetchJson(fetchImpl, 'Spotify', { url: 'https://api.test/x' }, okSchema);

    await expect(failure).rejects.toBeInstanceOf(PermanentError);
    await expect(failure).rejects.toMatchObject({
      status: 404,
      message: `Spotify request failed (404 Not Found): ${'x'.repeat(300)}`,
    });
  });

  it('omits the body suffix when the error body is empty', async () => {
    const { fetchImpl } = scriptedFetch([new Response('', { status: 429, statusText: 'Too Many Requests' })]);

    await expect(fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema)).rejects.toThrow(
      new TransientError('LLM request failed (429 Too Many Requests)'),
    );
  });

  it('wraps network failures as transient and passes orchestrator errors through', async () => {
    const passthrough = new PermanentError('already classified');
    const { fetchImpl } = scriptedFetch([new TypeError('fetch failed'), passthrough]);

    const network = fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema);
    await expect(network).rejects.toBeInstanceOf(TransientError);
    await expect(network).rejects.toThrow('LLM request failed: fetch failed');

    await expect(fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema)).rejects.toBe(passthrough);
  });

  it('rejects malformed JSON and unexpected shapes as permanent', async () => {
    const { fetchImpl } = scriptedFetch([
      new Response('{not json', { status: 200 }),
      jsonResponse({ ok: 'yes' }),
    ]);

    await expect(fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema)).rejects.toThrow(
      'LLM returned malformed JSON',
    );
    await expect(fetchJson(fetchImpl, 'LLM', { url: 'https://llm.test/x' }, okSchema)).rejects.toThrow(
      'LLM returned an unexpected response shape',
    );
  });
});

describe('infrastructure/chat-client', () => {
  it('posts a chat completion and returns the trimmed first choice', async () => {
    const { fetchImpl, calls } = scriptedFetch([
      jsonResponse({ choices: [{ message: { content: '  neon synthwave, nocturnal \n' } }] }),
    ]);
    const client = new HttpChatClient({
      baseUrl: 'https://llm.test/',
      apiKey: 'test-secret',
      fetchImplementation: fetchImpl,
    });

    const content = await client.complete({
      model: 'sonar',
      messages: [{ role: 'user', content: 'late night drive' }],
    });

    expect(content).toBe('neon synthwave, nocturnal');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://llm.test/chat/completions');
    expect(calls[0]?.init?.method).toBe('POST');
    expect(headerOf(calls[0]?.init, 'authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      model: 'sonar',
      messages: [{ role: 'user', content: 'late night drive' }],
      temperature: 0.2,
    });
  });

  it('returns an empty string for a null message', async () => {
    const { fetchImpl } = scriptedFetch([jsonResponse({ choices: [{ message: { content: null } }] })]);
    const client = new HttpChatClient({ baseUrl: 'https://llm.test', apiKey: 'test-secret', fetchImplementation: fetchImpl });

    await expect(client.complete({ model: 'sonar', messages: [], temperature: 0.7 })).resolves.toBe('');
  });

  it('fails permanently without an API key and makes no request', async () => {
    const { fetchImpl, calls } = scriptedFetch([]);
    const client = new HttpChatClient({ baseUrl: 'https://llm.test', fetchImplementation: fetchImpl });

    await expect(client.complete({ model: 'sonar', messages: [] })).rejects.toThrow(
      new PermanentError('LLM_API_KEY is not configured'),
    );
    expect(calls).toEqual([]);
  });

  it('requires a base URL', () => {
    expect(() => new HttpChatClient({ baseUrl: '' })).toThrow('HttpChatClient requires a baseUrl.');
  });
});

describe('infrastructure/spotify-client', () => {
  /**
   * Intent:
   * - The server token is fetched once and reused until shortly before it expires.
   * - Catalogue payloads are mapped onto PlatformTrack.
   */

  function client(responses: Array<Response | Error>, now: () => number = () => 0) {
    const scripted = scriptedFetch(responses);
    const spotify = new SpotifyClient({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      apiBaseUrl: 'https://api.spotify.test/v1/',
      accountsBaseUrl: 'https://accounts.spotify.test',
      fetchImplementation: scripted.fetchImpl,
      now,
    });
    return { spotify, calls: scripted.calls };
  }

  it('requests a client-credentials token and reuses it until near expiry', async () => {
    let now = 0;
    const { spotify, calls } = client(
      [
        jsonResponse({ access_token: 'server-token-1', expires_in: 3600 }),
        jsonResponse({ access_token: 'server-token-2', expires_in: 3600 }),
      ],
      () => now,
    );

    await expect(spotify.serverToken()).resolves.toBe('server-token-1');
    now = 3_539_999;
    await expect(spotify.serverToken()).resolves.toBe('server-token-1');
    now = 3_540_000;
    await expect(spotify.serverToken()).resolves.toBe('server-token-2');

    expect(calls).toHaveLength(2);
    expect(calls[0]?.url).toBe('https://accounts.spotify.test/api/token');
    expect(headerOf(calls[0]?.init, 'authorization')).toBe(
      `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`,
    );
    expect(calls[0]?.init?.body).toBe('grant_type=client_credentials');
  });

  it('shares one in-flight token request between concurrent callers', async () => {
    const { spotify, calls } = client([jsonResponse({ access_token: 'server-token', expires_in: 3600 })]);

    const tokens = await Promise.all([spotify.serverToken(), spotify.serverToken()]);

    expect(tokens).toEqual(['server-token', 'server-token']);
    expect(calls).toHaveLength(1);
  });

  it('fails permanently without client credentials', async () => {
    const spotify = new SpotifyClient({
      apiBaseUrl: 'https://api.spotify.test/v1',
      accountsBaseUrl: 'https://accounts.spotify.test',
      fetchImplementation: scriptedFetch([]).fetchImpl,
    });

    await expect(spotify.serverToken()).rejects.toThrow(
      new PermanentError('SPOTIFY_CLIENT_ID/SPOTIFY_CLIENT_SECRET are not configured'),
    );
  });

  it('searches by title and artist and maps the first hit', async () => {
    const { spotify, calls } = client([
      jsonResponse({ tracks: { items: [spotifyTrack('abc', ['The Midnight', 'Nikki Flores'])] } }),
      jsonResponse({ tracks: { items: [] } }),
    ]);

    const hit = await spotify.searchTrack({ title: 'Sunset', artist: 'The Midnight' }, 'test-token');
    const miss = await spotify.searchTrack({ title: 'Nothing', artist: 'Nobody' }, 'test-token');

    expect(hit).toEqual({
      id: 'abc',
      uri: 'spotify:track:abc',
      title: 'Track abc',
      artist: 'The Midnight, Nikki Flores',
      album: 'Endless Summer',
      albumImage: 'https://images.test/abc.jpg',
      durationMs: 215_000,
    });
    expect(miss).toBeNull();

    const url = new URL(calls[0]?.url ?? '');
    expect(url.pathname).toBe('/v1/search');
    expect(url.searchParams.get('q')).toBe('track:Sunset artist:The Midnight');
    expect(url.searchParams.get('type')).toBe('track');
    expect(url.searchParams.get('limit')).toBe('1');
    expect(headerOf(calls[0]?.init, 'authorization')).toBe('Bearer test-token');
  });

  it('maps authorization failures to PermanentError with the status', async () => {
    const { spotify } = client([jsonResponse({ error: 'expired' }, 401, 'Unauthorized')]);

    const failure = spotify.searchTrack({ title: 'Sunset', artist: 'The Midnight' }, 'test-token');

    await expect(failure).rejects.toBeInstanceOf(PermanentError);
    await expect(failure).rejects.toMatchObject({ status: 401 });
  });

  it('creates a playlist for the current user', async () => {
    const { spotify, calls } = client([
      jsonResponse({ id: 'listener 1' }),
      jsonResponse({ id: 'pl-1', external_urls: { spotify: 'https://open.spotify.com/playlist/pl-1' } }),
      jsonResponse({ id: 'pl-2' }),
    ]);

    const userId = await spotify.currentUserId('test-token');
    const details = { name: 'Night Drive', description: 'Generated from: late night drive', public: true };
    const created = await spotify.createPlaylist(userId, 'test-token', details);
    const withoutUrl = await spotify.createPlaylist(userId, 'test-token', details);

    expect(userId).toBe('listener 1');
    expect(calls[0]?.url).toBe('https://api.spotify.test/v1/me');
    expect(calls[1]?.url).toBe('https://api.spotify.test/v1/users/listener%201/playlists');
    expect(JSON.parse(String(calls[1]?.init?.body))).toEqual(details);
    expect(created).toEqual({ id: 'pl-1', url: 'https://open.spotify.com/playlist/pl-1' });
    expect(withoutUrl).toEqual({ id: 'pl-2', url: 'https://open.spotify.com/playlist/pl-2' });
  });

  it('adds tracks in batches of at most 100', async () => {
    const { spotify, calls } = client([
      jsonResponse({ snapshot_id: 's1' }),
      jsonResponse({ snapshot_id: 's2' }),
      jsonResponse({ snapshot_id: 's3' }),
    ]);
    const uris = Array.from({ length: 250 }, (_, index) => `spotify:track:t${index}`);

    await spotify.addTracks('pl-1', uris, 'test-token');

    const batches = calls.map((call) => z.object({ uris: z.array(z.string()) }).parse(JSON.parse(String(call.init?.body))).uris);
    expect(batches.map((batch) => batch.length)).toEqual([100, 100, 50]);
    expect(batches.flat()).toEqual(uris);
    expect(calls[0]?.url).toBe('https://api.spotify.test/v1/playlists/pl-1/tracks');
  });

  it('asks for recommendations with at most five seeds', async () => {
    const { spotify, calls } = client([jsonResponse({ tracks: [spotifyTrack('r1')] })]);

    await expect(spotify.recommendations([], 30, 'test-token')).resolves.toEqual([]);
    const tracks = await spotify.recommendations(['a', 'b', 'c', 'd', 'e', 'f'], 30, 'test-token');

    expect(calls).toHaveLength(1);
    const url = new URL(calls[0]?.url ?? '');
    expect(url.searchParams.get('seed_tracks')).toBe('a,b,c,d,e');
    expect(url.searchParams.get('limit')).toBe('30');
    expect(tracks.map((track) => track.id)).toEqual(['r1']);
  });

  it('toPlatformTrack tolerates a missing album', () => {
    expect(
      toPlatformTrack({ id: 'x', uri: 'spotify:track:x', name: 'X', duration_ms: 1000, artists: [] }),
    ).toEqual({
      id: 'x',
      uri: 'spotify:track:x',
      title: 'X',
      artist: '',
      album: '',
      albumImage: '',
      durationMs: 1000,
    });
  });
});
