import { randomUUID } from 'node:crypto';
import type { SyncErrorRecord } from '../models';
import { queryRows, withTransaction } from '../db';

export const SYNC_ERROR_LOG_LIMIT = 50;

export async function recordSyncError(
  postId: string,
  message: string,
  context: Record<string, unknown> = {},
): Promise<void> {
  await withTransaction(async (client) => {
    await client.query(
      `
        INSERT INTO sync_errors (id, post_id, message, context_json, created_at)
        VALUES ($1, $2, $3, $4::jsonb, NOW())
      `,
      [randomUUID(), postId, message, JSON.stringify(context)],
    );
    await client.query(
      `
        DELETE FROM sync_errors
        WHERE id IN (
          SELECT id
          FROM sync_errors
          ORDER BY created_at DESC, id DESC
          OFFSET $1
        )
      `,
      [SYNC_ERROR_LOG_LIMIT],
    );
  });
}

export async function listRecentSyncErrors(limit = SYNC_ERROR_LOG_LIMIT): Promise<SyncErrorRecord[]> {
  return queryRows<SyncErrorRecord>(
    `
      SELECT *
      FROM sync_errors
      ORDER BY created_at DESC, id DESC
      LIMIT $1
    `,
    [Math.max(1, Math.min(SYNC_ERROR_LOG_LIMIT, Math.round(limit)))],
  );
}
