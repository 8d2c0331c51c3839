import type { StoryStateRecord } from '../models';
import { queryRows, withTransaction } from '../db';
import { logEvent } from '../log';
import { errorMessage } from '../syncErrors';
import { DEFAULT_STORY_STATE, mergeStoryState, parseStoryState, serializeStoryState } from '../sync/stateCodec';
import type { StateChangeListener, StoryState, StoryStatePatch, StoryStateStore } from '../sync/types';

export type StoryStateOverviewRow = {
  post_id: string;
  post_title: string | null;
  post_status: string | null;
  state_json: unknown;
  status_changed_at: string;
};

export type StoryStateOverviewItem = {
  postId: string;
  postTitle: string | null;
  postStatus: string | null;
  state: StoryState;
};

type PgStoryStateStoreOptions = {
  onChange?: StateChangeListener;
  now?: () => Date;
};

async function writeState(postId: string, compute: (current: StoryState) => StoryState) {
  return withTransaction(async (client) => {
    const existing = await client.query<Pick<StoryStateRecord, 'state_json'>>(
      `
        SELECT state_json
        FROM story_states
        WHERE post_id = $1
        FOR UPDATE
      `,
      [postId],
    );
    const previous = existing.rows[0] ? parseStoryState(existing.rows[0].state_json) : { ...DEFAULT_STORY_STATE };
    const next = compute(previous);
    await client.query(
      `
        INSERT INTO story_states (post_id, state_json, status_changed_at)
        VALUES ($1, $2::jsonb, $3::timestamptz)
        ON CONFLICT (post_id)
        DO UPDATE SET state_json = EXCLUDED.state_json, status_changed_at = EXCLUDED.status_changed_at
      `,
      [postId, JSON.stringify(serializeStoryState(next)), next.statusChangedAt],
    );
    return { previous, next };
  });
}

/** One row per post; rows are overwritten, never deleted. */
export class PgStoryStateStore implements StoryStateStore {
  private onChange?: StateChangeListener;
  private now: () => Date;

  constructor(options: PgStoryStateStoreOptions = {}) {
    this.onChange = options.onChange;
    this.now = options.now || (() => new Date());
  }

  async get(postId: string): Promise<StoryState> {
    const rows = await queryRows<Pick<StoryStateRecord, 'state_json'>>(
      `
        SELECT state_json
        FROM story_states
        WHERE post_id = $1
        LIMIT 1
      `,
      [postId],
    );
    return rows[0] ? parseStoryState(rows[0].state_json) : { ...DEFAULT_STORY_STATE };
  }

  async update(postId: string, patch: StoryStatePatch): Promise<boolean> {
    return this.write(postId, (current) => mergeStoryState(current, patch, this.now()));
  }

  async reset(postId: string, message: string): Promise<boolean> {
    return this.write(postId, () => mergeStoryState(DEFAULT_STORY_STATE, { message }, this.now()));
  }

  private async write(postId: string, compute: (current: StoryState) => StoryState): Promise<boolean> {
    try {
      const { previous, next } = await writeState(postId, compute);
      this.onChange?.(postId, next, previous);
      return true;
    } catch (error) {
      logEvent('error', 'story_state.write_failed', { postId, message: errorMessage(error) });
      return false;
    }
  }
}

const DEFAULT_OVERVIEW_LIMIT = 25;

function normalizeOverviewLimit(limit: number): number {
  if (!Number.isFinite(limit)) return DEFAULT_OVERVIEW_LIMIT;
  return Math.max(1, Math.min(200, Math.round(limit)));
}

export async function listRecentStoryStates(limit = DEFAULT_OVERVIEW_LIMIT): Promise<StoryStateOverviewItem[]> {
  const rows = await queryRows<StoryStateOverviewRow>(
    `
      SELECT s.post_id, p.title AS post_title, p.status AS post_status, s.state_json, s.status_changed_at
      FROM story_states s
      LEFT JOIN posts p ON p.id = s.post_id
      ORDER BY s.status_changed_at DESC
      LIMIT $1
    `,
    [normalizeOverviewLimit(limit)],
  );
  return rows.map((row) => ({
    postId: row.post_id,
    postTitle: row.post_title,
    postStatus: row.post_status,
    state: parseStoryState(row.state_json),
  }));
}
