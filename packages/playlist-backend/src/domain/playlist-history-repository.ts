// packages/playlist-backend/src/domain/playlist-history-repository.ts
// PostgreSQL-backed history of completed playlists.
// - Written once per completed job; a failure here never changes the job outcome.
// - All queries parameterized.
import { z } from 'zod';

import type { PlaylistResult } from './playlist-model.js';

/** The part of a pg client the repository uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type WithSqlClient = <T>(fn: (client: SqlClient) => Promise<T>) => Promise<T>;

export interface PlaylistHistoryEntry {
  jobId: string;
  playlistName: string;
  playlistUrl: string | null;
  description: string;
  trackCount: number;
  durationMinutes: number;
  createdAt: Date;
}

const historyRowSchema = z.object({
  job_id: z.string(),
  playlist_name: z.string(),
  playlist_url: z.string().nullable(),
  description: z.string(),
  track_count: z.coerce.number(),
  // NUMERIC comes back as a string from node-postgres
  duration_minutes: z.coerce.number(),
  created_at: z.coerce.date(),
});

export class PlaylistHistoryRepository {
  constructor(private readonly withClient: WithSqlClient) {}

  // record.declaration()
  async record(jobId: string, result: PlaylistResult): Promise<void> {
    await this.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        await client.query(
          `
          INSERT INTO playlists (
            job_id,
            playlist_name,
            playlist_url,
            description,
            track_count,
            duration_minutes,
            generation_time_ms
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7)
          ON CONFLICT (job_id) DO NOTHING
          `,
          [
            jobId,
            result.playlistName,
            result.playlistUrl,
            result.description,
            result.trackCount,
            result.durationMinutes,
            result.generationTimeMs,
          ],
        );

        if (result.tracks.length > 0) {
          const values: unknown[] = [];
          const tuples = result.tracks.map((track, index) => {
            const base = index * 7;
            values.push(jobId, index, track.title, track.artist, track.album, track.uri, track.durationMs);
            return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6}, $${base + 7})`;
          });
          await client.query(
            `
            INSERT INTO playlist_tracks (job_id, position, title, artist, album, uri, duration_ms)
            VALUES ${tuples.join(', ')}
            ON CONFLICT (job_id, position) DO NOTHING
            `,
            values,
          );
        }

        await client.query('COMMIT');
      } catch (error: unknown) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  // list.declaration()
  async list(limit: number): Promise<PlaylistHistoryEntry[]> {
    const rows = await this.withClient(async (client) => {
      const result = await client.query(
        `
        SELECT
          job_id,
          playlist_name,
          playlist_url,
          description,
          track_count,
          duration_minutes,
          created_at
        FROM playlists
        ORDER BY created_at DESC
        LIMIT $1
        `,
        [limit],
      );
      return result.rows;
    });

    return rows.map((row) => mapRowToEntry(historyRowSchema.parse(row)));
  }
}

function mapRowToEntry(row: z.infer<typeof historyRowSchema>): PlaylistHistoryEntry {
  return {
    jobId: row.job_id,
    playlistName: row.playlist_name,
    playlistUrl: row.playlist_url,
    description: row.description,
    trackCount: row.track_count,
    durationMinutes: row.duration_minutes,
    createdAt: row.created_at,
  };
}
