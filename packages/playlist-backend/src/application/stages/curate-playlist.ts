// packages/playlist-backend/src/application/stages/curate-playlist.ts
import { z } from 'zod';

import { PermanentError } from '@vibelist/contracts';

import type { CandidateSet, CuratedPlaylist, SongRef } from '../../domain/playlist-model.js';
import type { ChatClient } from '../../infrastructure/chat-client.js';
import { CURATE_SYSTEM_PROMPT, curatePrompt } from './prompts.js';
import type { Stage, StageContext } from './types.js';

export const DEFAULT_PLAYLIST_TITLE = 'AI Generated Playlist';
export const MAX_TITLE_LENGTH = 50;

const curatedSchema = z.object({
  songs: z.array(
    z.object({
      artist: z.string(),
      title: z.string(),
    }),
  ),
  playlist_title: z.string().optional(),
});

/** Drops markdown fences and any prose around the outermost JSON object. */
export function extractJsonObject(raw: string): string {
  const unfenced = raw.replace(/```(?:json)?/gi, '').trim();
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  return start >= 0 && end > start ? unfenced.slice(start, end + 1) : unfenced;
}

export function parseCuratedResponse(raw: string, maxSongs: number): { title: string; songs: SongRef[] } {
  let payload: unknown;
  try {
    payload = JSON.parse(extractJsonObject(raw));
  } catch (error: unknown) {
    throw new PermanentError('Curation returned malformed JSON', { cause: error });
  }

  const parsed = curatedSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PermanentError('Curation returned an unexpected JSON shape', { cause: parsed.error });
  }

  const seen = new Set<string>();
  const songs: SongRef[] = [];
  for (const song of parsed.data.songs) {
    const artist = song.artist.trim();
    const title = song.title.trim();
    if (!artist || !title) continue;

    const key = `${artist.toLowerCase()}|${title.toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);

    songs.push({ artist, title });
    if (songs.length >= maxSongs) break;
  }

  if (songs.length === 0) {
    throw new PermanentError('Curation produced no songs');
  }

  const title = (parsed.data.playlist_title?.trim() || DEFAULT_PLAYLIST_TITLE).slice(0, MAX_TITLE_LENGTH);
  return { title, songs };
}

/** Extracts a deduplicated song list and a playlist title from the research text. */
export class CuratePlaylistStage implements Stage<CandidateSet, CuratedPlaylist> {
  readonly name = 'curate';
  readonly label = 'Curating your playlist...';

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
    private readonly maxSongs: number,
  ) {}

  async run(input: CandidateSet, ctx: StageContext): Promise<CuratedPlaylist> {
    const raw = await this.chat.complete({
      model: this.model,
      messages: [
        { role: 'system', content: CURATE_SYSTEM_PROMPT },
        { role: 'user', content: curatePrompt(input.research, input.request.description, input.context) },
      ],
      temperature: 0,
      signal: ctx.signal,
    });

    const { title, songs } = parseCuratedResponse(raw, this.maxSongs);
    ctx.logger.info('Playlist curated', { songs: songs.length, title });
    return { request: input.request, title, songs };
  }
}
