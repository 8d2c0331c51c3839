import { randomUUID } from 'node:crypto';
import type { PostRecord } from '../models';
import { queryRows } from '../db';
import type { ContentItem, ContentSource, PostChange, PostSnapshot, PostStatus } from '../sync/types';

export type CreatePostInput = {
  id?: string;
  title?: string;
  body?: string;
  status?: PostStatus;
  scheduledAt?: string | null;
  syncEnabled?: boolean;
};

/** `scheduledAt: null` clears the timestamp; an absent key keeps it. */
export type UpdatePostInput = {
  title?: string;
  body?: string;
  status?: PostStatus;
  scheduledAt?: string | null;
  syncEnabled?: boolean;
};

export type UpdatePostResult = {
  post: PostRecord;
  change: PostChange;
};

type UpdatedPostRow = PostRecord & {
  before_status: PostStatus;
  before_scheduled_at: string | null;
  before_sync_enabled: boolean;
};

function toIso(value: string | Date | null): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toSnapshot(post: Pick<PostRecord, 'status' | 'scheduled_at' | 'sync_enabled'>): PostSnapshot {
  return {
    syncEnabled: post.sync_enabled,
    status: post.status,
    scheduledAt: toIso(post.scheduled_at),
  };
}

export async function createPost(input: CreatePostInput): Promise<UpdatePostResult> {
  const rows = await queryRows<PostRecord>(
    `
      INSERT INTO posts (id, title, body, status, scheduled_at, sync_enabled, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5::timestamptz, $6, NOW(), NOW())
      RETURNING *
    `,
    [
      input.id || randomUUID(),
      input.title || '',
      input.body || '',
      input.status || 'draft',
      input.scheduledAt ?? null,
      input.syncEnabled ?? false,
    ],
  );
  const post = rows[0];
  return { post, change: { postId: post.id, before: null, after: toSnapshot(post) } };
}

export async function getPostById(postId: string): Promise<PostRecord | null> {
  const rows = await queryRows<PostRecord>(
    `
      SELECT *
      FROM posts
      WHERE id = $1
      LIMIT 1
    `,
    [postId],
  );
  return rows[0] || null;
}

export async function listPosts(filters: { status?: PostStatus } = {}): Promise<PostRecord[]> {
  return queryRows<PostRecord>(
    `
      SELECT *
      FROM posts
      WHERE ($1::text IS NULL OR status = $1)
      ORDER BY updated_at DESC
      LIMIT 200
    `,
    [filters.status ?? null],
  );
}

/**
 * Applies the patch and returns the snapshot pair in one statement, so the
 * caller feeds exactly one change into the sync engine per write.
 * `onlyIfStatus` restricts the write to posts currently in that status.
 */
export async function updatePost(
  postId: string,
  patch: UpdatePostInput,
  onlyIfStatus?: PostStatus,
): Promise<UpdatePostResult | null> {
  const hasScheduledAt = patch.scheduledAt !== undefined;
  const rows = await queryRows<UpdatedPostRow>(
    `
      WITH prev AS (
        SELECT id, status, scheduled_at, sync_enabled
        FROM posts
        WHERE id = $1 AND ($8::text IS NULL OR status = $8)
        FOR UPDATE
      )
      UPDATE posts AS p
      SET
        title = COALESCE($2, p.title),
        body = COALESCE($3, p.body),
        status = COALESCE($4, p.status),
        scheduled_at = CASE WHEN $5::boolean THEN $6::timestamptz ELSE p.scheduled_at END,
        sync_enabled = COALESCE($7, p.sync_enabled),
        updated_at = NOW()
      FROM prev
      WHERE p.id = prev.id
      RETURNING
        p.*,
        prev.status AS before_status,
        prev.scheduled_at AS before_scheduled_at,
        prev.sync_enabled AS before_sync_enabled
    `,
    [
      postId,
      patch.title ?? null,
      patch.body ?? null,
      patch.status ?? null,
      hasScheduledAt,
      patch.scheduledAt ?? null,
      patch.syncEnabled ?? null,
      onlyIfStatus ?? null,
    ],
  );
  const row = rows[0];
  if (!row) return null;

  const { before_status, before_scheduled_at, before_sync_enabled, ...post } = row;
  return {
    post,
    change: {
      postId,
      before: toSnapshot({ status: before_status, scheduled_at: before_scheduled_at, sync_enabled: before_sync_enabled }),
      after: toSnapshot(post),
    },
  };
}

export class PgContentSource implements ContentSource {
  async getItem(postId: string): Promise<ContentItem | null> {
    const post = await getPostById(postId);
    if (!post) return null;
    return { id: post.id, body: post.body, ...toSnapshot(post) };
  }
}
