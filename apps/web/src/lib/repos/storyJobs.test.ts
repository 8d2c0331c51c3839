import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PgStoryJobScheduler, computeBackoffMs, recoverExpiredJobs, settleJobFailure } from './storyJobs';

const db = vi.hoisted(() => {
  const query = vi.fn();
  return {
    query,
    queryRows: vi.fn(),
    withTransaction: vi.fn(async (fn: (client: { query: typeof query }) => Promise<unknown>) => fn({ query })),
  };
});

vi.mock('../db', () => ({ queryRows: db.queryRows, withTransaction: db.withTransaction }));

const runningJob = {
  id: 'j1',
  post_id: 'p1',
  status: 'running',
  attempt_count: 1,
  max_attempts: 3,
  trace_id: 't1',
};

describe('PgStoryJobScheduler', () => {
  beforeEach(() => {
    db.queryRows.mockReset();
  });

  it('upserts onto the single queued slot of the post', async () => {
    db.queryRows.mockResolvedValueOnce([{ id: 'j1' }]);
    const jobs = new PgStoryJobScheduler({ maxAttempts: 5 });

    expect(await jobs.enqueue('p1')).toBe(true);
    const [sql, params] = db.queryRows.mock.calls[0];
    expect(sql).toContain("ON CONFLICT (post_id) WHERE status = 'queued'");
    expect(params[1]).toBe('p1');
    expect(params[2]).toBe(5);
  });

  it('defaults to three attempts', async () => {
    db.queryRows.mockResolvedValueOnce([{ id: 'j1' }]);
    await new PgStoryJobScheduler().enqueue('p1');

    expect(db.queryRows.mock.calls[0][1][2]).toBe(3);
  });

  it('reports pending jobs', async () => {
    db.queryRows.mockResolvedValueOnce([{ id: 'j1' }]).mockResolvedValueOnce([]);
    const jobs = new PgStoryJobScheduler();

    expect(await jobs.hasPending('p1')).toBe(true);
    expect(await jobs.hasPending('p2')).toBe(false);
  });

  it('counts cancelled jobs', async () => {
    db.queryRows.mockResolvedValueOnce([{ id: 'j1' }, { id: 'j2' }]);

    expect(await new PgStoryJobScheduler().cancelAll('p1')).toBe(2);
  });
});

describe('computeBackoffMs', () => {
  it('doubles per attempt up to the cap', () => {
    expect(computeBackoffMs(1, 5_000, 300_000)).toBe(5_000);
    expect(computeBackoffMs(3, 5_000, 300_000)).toBe(20_000);
    expect(computeBackoffMs(10, 5_000, 300_000)).toBe(300_000);
  });
});

describe('settleJobFailure', () => {
  beforeEach(() => {
    db.query.mockReset();
  });

  const input = { leaseToken: 'lease-1', errorMessage: 'socket hang up', retryable: true, backoffMs: 5_000 };

  it('ignores a job whose lease moved on', async () => {
    db.query.mockResolvedValueOnce({ rows: [] });

    expect(await settleJobFailure('j1', input)).toEqual({ job: null, outcome: 'stale' });
    expect(db.query).toHaveBeenCalledTimes(1);
  });

  it('requeues a retryable failure with attempts left', async () => {
    const requeued = { ...runningJob, status: 'queued' };
    db.query.mockResolvedValueOnce({ rows: [runningJob] }).mockResolvedValueOnce({ rows: [requeued] });

    expect(await settleJobFailure('j1', input)).toEqual({ job: requeued, outcome: 'retried' });
    expect(db.query.mock.calls[1][1]).toEqual(['j1', 'lease-1', 'socket hang up', 5_000]);
  });

  it('fails the job when a newer job already holds the queued slot', async () => {
    const failed = { ...runningJob, status: 'failed' };
    db.query
      .mockResolvedValueOnce({ rows: [runningJob] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [failed] });

    expect(await settleJobFailure('j1', input)).toEqual({ job: failed, outcome: 'failed' });
  });

  it('fails a non-retryable error at once', async () => {
    const failed = { ...runningJob, status: 'failed' };
    db.query.mockResolvedValueOnce({ rows: [runningJob] }).mockResolvedValueOnce({ rows: [failed] });

    expect(await settleJobFailure('j1', { ...input, retryable: false })).toEqual({ job: failed, outcome: 'failed' });
    expect(db.query).toHaveBeenCalledTimes(2);
  });

  it('fails once attempts are exhausted', async () => {
    const exhausted = { ...runningJob, attempt_count: 3 };
    db.query.mockResolvedValueOnce({ rows: [exhausted] }).mockResolvedValueOnce({ rows: [] });

    expect(await settleJobFailure('j1', input)).toEqual({ job: null, outcome: 'failed' });
    expect(String(db.query.mock.calls[1][0])).toContain("status = 'failed'");
  });
});

describe('recoverExpiredJobs', () => {
  beforeEach(() => {
    db.query.mockReset();
  });

  it('reports the posts whose expired job ran out of attempts', async () => {
    const exhausted = { ...runningJob, id: 'j1', post_id: 'p1', attempt_count: 3 };
    const retryable = { ...runningJob, id: 'j2', post_id: 'p2' };
    const superseded = { ...runningJob, id: 'j3', post_id: 'p3' };
    db.query
      .mockResolvedValueOnce({ rows: [exhausted, retryable, superseded] })
      .mockResolvedValueOnce({ rowCount: 1 })
      .mockResolvedValueOnce({ rowCount: 1 })
      .mockResolvedValueOnce({ rowCount: 0 })
      .mockResolvedValueOnce({ rowCount: 1 });

    const result = await recoverExpiredJobs({ limit: 50, backoffBaseMs: 5_000, backoffMaxMs: 300_000 });

    expect(result).toEqual({ processed: 3, requeued: 1, failed: 2, exhaustedPostIds: ['p1'] });
    expect(String(db.query.mock.calls[1][0])).toContain("status = 'failed'");
    expect(db.query.mock.calls[2][1]).toEqual(['j2', 5_000]);
  });
});
