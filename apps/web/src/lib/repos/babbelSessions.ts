import { queryRows } from '../db';
import type { SessionCache } from '../babbel/sessionCache';

type SessionRow = {
  cookie_header: string;
};

/** Session cookies shared by every process that talks to Babbel. */
export class PgSessionCache implements SessionCache {
  async get(key: string): Promise<string | null> {
    const rows = await queryRows<SessionRow>(
      `
        SELECT cookie_header
        FROM babbel_sessions
        WHERE cache_key = $1 AND expires_at > NOW()
      `,
      [key],
    );
    return rows[0]?.cookie_header ?? null;
  }

  async set(key: string, cookieHeader: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    await queryRows(
      `
        INSERT INTO babbel_sessions (cache_key, cookie_header, expires_at, updated_at)
        VALUES ($1, $2, NOW() + ($3::int * INTERVAL '1 millisecond'), NOW())
        ON CONFLICT (cache_key) DO UPDATE
        SET cookie_header = EXCLUDED.cookie_header, expires_at = EXCLUDED.expires_at, updated_at = NOW()
      `,
      [key, cookieHeader, Math.round(ttlMs)],
    );
  }

  async delete(key: string): Promise<void> {
    await queryRows('DELETE FROM babbel_sessions WHERE cache_key = $1', [key]);
  }

  async clear(): Promise<number> {
    const rows = await queryRows<{ live: boolean }>(
      'DELETE FROM babbel_sessions RETURNING expires_at > NOW() AS live',
    );
    return rows.filter((row) => row.live).length;
  }
}
