import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PgStoryStateStore, listRecentStoryStates } from './storyStates';

const db = vi.hoisted(() => {
  const query = vi.fn();
  return {
    query,
    queryRows: vi.fn(),
    withTransaction: vi.fn(async (fn: (client: { query: typeof query }) => Promise<unknown>) => fn({ query })),
  };
});

vi.mock('../db', () => ({ queryRows: db.queryRows, withTransaction: db.withTransaction }));

const now = new Date('2026-03-10T12:00:00.000Z');

describe('PgStoryStateStore', () => {
  beforeEach(() => {
    db.query.mockReset();
    db.queryRows.mockReset();
  });

  it('returns not_started for a post without a row', async () => {
    db.queryRows.mockResolvedValueOnce([]);
    const store = new PgStoryStateStore();

    expect(await store.get('p1')).toEqual({ status: 'not_started' });
  });

  it('parses the stored blob', async () => {
    db.queryRows.mockResolvedValueOnce([{ state_json: { status: 'sent', story_id: 'story-1', message: 'ok' } }]);
    const store = new PgStoryStateStore();

    expect(await store.get('p1')).toEqual({ status: 'sent', storyId: 'story-1', message: 'ok' });
  });

  it('merges under a row lock and notifies the listener', async () => {
    db.query
      .mockResolvedValueOnce({ rows: [{ state_json: { status: 'scheduled', message: 'Processing scheduled' } }] })
      .mockResolvedValueOnce({ rows: [] });
    const onChange = vi.fn();
    const store = new PgStoryStateStore({ onChange, now: () => now });

    const ok = await store.update('p1', { status: 'processing', message: 'Story is being processed...' });

    expect(ok).toBe(true);
    expect(String(db.query.mock.calls[0][0])).toContain('FOR UPDATE');
    const [, params] = db.query.mock.calls[1];
    expect(params[0]).toBe('p1');
    expect(JSON.parse(params[1])).toEqual({
      status: 'processing',
      message: 'Story is being processed...',
      status_changed_at: '2026-03-10T12:00:00.000Z',
    });
    expect(params[2]).toBe('2026-03-10T12:00:00.000Z');
    expect(onChange).toHaveBeenCalledWith(
      'p1',
      { status: 'processing', message: 'Story is being processed...', statusChangedAt: '2026-03-10T12:00:00.000Z' },
      { status: 'scheduled', message: 'Processing scheduled' },
    );
  });

  it('reports a failed write without throwing', async () => {
    db.withTransaction.mockRejectedValueOnce(new Error('connection refused'));
    const onChange = vi.fn();
    const store = new PgStoryStateStore({ onChange });

    expect(await store.update('p1', { status: 'error' })).toBe(false);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('resets to a fresh record and drops the story id', async () => {
    db.query
      .mockResolvedValueOnce({ rows: [{ state_json: { status: 'processing', story_id: 'story-1' } }] })
      .mockResolvedValueOnce({ rows: [] });
    const store = new PgStoryStateStore({ now: () => now });

    expect(await store.reset('p1', 'Processing cancelled')).toBe(true);
    expect(JSON.parse(db.query.mock.calls[1][1][1])).toEqual({
      status: 'not_started',
      message: 'Processing cancelled',
      status_changed_at: '2026-03-10T12:00:00.000Z',
    });
  });
});

describe('listRecentStoryStates', () => {
  beforeEach(() => {
    db.queryRows.mockReset();
    db.queryRows.mockResolvedValue([]);
  });

  it('falls back to the default page size for a value that is not a number', async () => {
    await listRecentStoryStates(Number('abc'));

    expect(db.queryRows.mock.calls[0][1]).toEqual([25]);
  });

  it('keeps the page size within bounds', async () => {
    await listRecentStoryStates(0);
    await listRecentStoryStates(1_000);
    await listRecentStoryStates(12.4);

    expect(db.queryRows.mock.calls.map((call) => call[1])).toEqual([[1], [200], [12]]);
  });

  it('maps rows onto their post and parsed state', async () => {
    db.queryRows.mockResolvedValueOnce([
      {
        post_id: 'p1',
        post_title: 'Morning news',
        post_status: 'published',
        state_json: { status: 'sent', story_id: 'story-1' },
        status_changed_at: '2026-03-10T12:00:00.000Z',
      },
    ]);

    const [item] = await listRecentStoryStates();

    expect(item).toMatchObject({ postId: 'p1', postTitle: 'Morning news', postStatus: 'published' });
    expect(item.state).toMatchObject({ status: 'sent', storyId: 'story-1' });
  });
});
