import { randomUUID } from 'node:crypto';
import type { StoryJobRecord } from '../models';
import { queryRows, withTransaction } from '../db';
import type { StoryJobScheduler } from '../sync/types';

export type ClaimJobInput = {
  leaseToken: string;
  leaseMs: number;
};

export type SettleJobFailureInput = {
  leaseToken: string;
  errorMessage: string;
  retryable: boolean;
  backoffMs: number;
};

export type SettleJobFailureResult = {
  job: StoryJobRecord | null;
  outcome: 'stale' | 'retried' | 'failed';
};

export type RecoverExpiredJobsInput = {
  limit: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type RecoverExpiredJobsResult = {
  processed: number;
  requeued: number;
  failed: number;
  /** Posts whose job ran out of attempts; their story state still needs settling. */
  exhaustedPostIds: string[];
};

export type JobQueueMetrics = {
  queuedTotal: number;
  queuedReady: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
};

type PgStoryJobSchedulerOptions = {
  maxAttempts?: number;
};

export function computeBackoffMs(attemptCount: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attemptCount - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

function normalizeMaxAttempts(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 3;
  return Math.max(1, Math.min(20, Math.round(value)));
}

/**
 * Durable queue backing deferred story creation. The partial unique index
 * `story_jobs_one_queued_per_post` keeps at most one queued job per post, so
 * a racing second enqueue lands on the existing row.
 */
export class PgStoryJobScheduler implements StoryJobScheduler {
  private maxAttempts: number;

  constructor(options: PgStoryJobSchedulerOptions = {}) {
    this.maxAttempts = normalizeMaxAttempts(options.maxAttempts);
  }

  async hasPending(postId: string): Promise<boolean> {
    const rows = await queryRows<{ id: string }>(
      `
        SELECT id
        FROM story_jobs
        WHERE post_id = $1 AND status = 'queued'
        LIMIT 1
      `,
      [postId],
    );
    return rows.length > 0;
  }

  async enqueue(postId: string): Promise<boolean> {
    const rows = await queryRows<{ id: string }>(
      `
        INSERT INTO story_jobs (id, post_id, status, attempt_count, max_attempts, next_attempt_at, trace_id, created_at, updated_at)
        VALUES ($1, $2, 'queued', 0, $3, NOW(), $4, NOW(), NOW())
        ON CONFLICT (post_id) WHERE status = 'queued'
        DO UPDATE SET updated_at = NOW()
        RETURNING id
      `,
      [randomUUID(), postId, this.maxAttempts, randomUUID()],
    );
    return rows.length > 0;
  }

  async cancelAll(postId: string): Promise<number> {
    const rows = await queryRows<{ id: string }>(
      `
        UPDATE story_jobs
        SET status = 'cancelled', updated_at = NOW()
        WHERE post_id = $1 AND status = 'queued'
        RETURNING id
      `,
      [postId],
    );
    return rows.length;
  }
}

export async function listJobsForPost(postId: string): Promise<StoryJobRecord[]> {
  return queryRows<StoryJobRecord>(
    `
      SELECT *
      FROM story_jobs
      WHERE post_id = $1
      ORDER BY created_at DESC
      LIMIT 20
    `,
    [postId],
  );
}

export async function claimNextStoryJob(input: ClaimJobInput): Promise<StoryJobRecord | null> {
  const rows = await queryRows<StoryJobRecord>(
    `
      WITH candidate AS (
        SELECT id
        FROM story_jobs
        WHERE status = 'queued' AND next_attempt_at <= NOW()
        ORDER BY next_attempt_at ASC, created_at ASC
        LIMIT 1
        FOR UPDATE SKIP LOCKED
      )
      UPDATE story_jobs AS j
      SET
        status = 'running',
        attempt_count = j.attempt_count + 1,
        last_attempt_at = NOW(),
        lease_token = $1,
        lease_expires_at = NOW() + ($2::int * INTERVAL '1 millisecond'),
        updated_at = NOW()
      FROM candidate
      WHERE j.id = candidate.id
      RETURNING j.*
    `,
    [input.leaseToken, Math.max(1, Math.round(input.leaseMs))],
  );
  return rows[0] || null;
}

export async function extendJobLease(jobId: string, leaseToken: string, leaseMs: number): Promise<boolean> {
  const updated = await queryRows<{ id: string }>(
    `
      UPDATE story_jobs
      SET
        lease_expires_at = NOW() + ($3::int * INTERVAL '1 millisecond'),
        updated_at = NOW()
      WHERE id = $1 AND status = 'running' AND lease_token = $2 AND lease_expires_at > NOW()
      RETURNING id
    `,
    [jobId, leaseToken, leaseMs],
  );
  return updated.length > 0;
}

export async function markJobCompleted(
  jobId: string,
  leaseToken: string,
  result: Record<string, unknown>,
): Promise<StoryJobRecord | null> {
  const updated = await queryRows<StoryJobRecord>(
    `
      UPDATE story_jobs
      SET
        status = 'completed',
        result_json = $3::jsonb,
        error_message = NULL,
        lease_token = NULL,
        lease_expires_at = NULL,
        updated_at = NOW()
      WHERE id = $1 AND status = 'running' AND lease_token = $2 AND lease_expires_at > NOW()
      RETURNING *
    `,
    [jobId, leaseToken, JSON.stringify(result)],
  );
  return updated[0] || null;
}

export async function settleJobFailure(jobId: string, input: SettleJobFailureInput): Promise<SettleJobFailureResult> {
  return withTransaction(async (client) => {
    const selected = await client.query<StoryJobRecord>(
      `
        SELECT *
        FROM story_jobs
        WHERE id = $1 AND status = 'running' AND lease_token = $2 AND lease_expires_at > NOW()
        FOR UPDATE
      `,
      [jobId, input.leaseToken],
    );
    const active = selected.rows[0];
    if (!active) return { job: null, outcome: 'stale' };

    const attempts = Math.max(1, active.attempt_count);
    if (input.retryable && attempts < active.max_attempts) {
      // A fresh enqueue may already hold the post's queued slot.
      const requeued = await client.query<StoryJobRecord>(
        `
          UPDATE story_jobs
          SET
            status = 'queued',
            error_message = $3,
            next_attempt_at = NOW() + ($4::int * INTERVAL '1 millisecond'),
            lease_token = NULL,
            lease_expires_at = NULL,
            updated_at = NOW()
          WHERE id = $1 AND lease_token = $2
            AND NOT EXISTS (
              SELECT 1 FROM story_jobs q WHERE q.post_id = story_jobs.post_id AND q.status = 'queued'
            )
          RETURNING *
        `,
        [jobId, input.leaseToken, input.errorMessage, Math.max(0, Math.round(input.backoffMs))],
      );
      if (requeued.rows[0]) return { job: requeued.rows[0], outcome: 'retried' };
    }

    const failed = await client.query<StoryJobRecord>(
      `
        UPDATE story_jobs
        SET
          status = 'failed',
          error_message = $3,
          lease_token = NULL,
          lease_expires_at = NULL,
          updated_at = NOW()
        WHERE id = $1 AND lease_token = $2
        RETURNING *
      `,
      [jobId, input.leaseToken, input.errorMessage],
    );
    return { job: failed.rows[0] || null, outcome: 'failed' };
  });
}

export async function recoverExpiredJobs(input: RecoverExpiredJobsInput): Promise<RecoverExpiredJobsResult> {
  const limit = Math.max(1, Math.min(200, Math.round(input.limit)));
  const baseMs = Math.max(100, Math.round(input.backoffBaseMs));
  const maxMs = Math.max(baseMs, Math.round(input.backoffMaxMs));

  return withTransaction(async (client) => {
    const selected = await client.query<StoryJobRecord>(
      `
        SELECT *
        FROM story_jobs
        WHERE status = 'running' AND lease_expires_at IS NOT NULL AND lease_expires_at <= NOW()
        ORDER BY lease_expires_at ASC
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
      [limit],
    );

    let requeued = 0;
    let failed = 0;
    const exhaustedPostIds: string[] = [];
    for (const job of selected.rows) {
      const attempts = Math.max(1, job.attempt_count);
      const exhausted = attempts >= job.max_attempts;
      if (!exhausted) {
        const updated = await client.query(
          `
            UPDATE story_jobs
            SET
              status = 'queued',
              error_message = 'Worker lease expired before completion',
              next_attempt_at = NOW() + ($2::int * INTERVAL '1 millisecond'),
              lease_token = NULL,
              lease_expires_at = NULL,
              updated_at = NOW()
            WHERE id = $1
              AND NOT EXISTS (
                SELECT 1 FROM story_jobs q WHERE q.post_id = story_jobs.post_id AND q.status = 'queued'
              )
          `,
          [job.id, computeBackoffMs(attempts, baseMs, maxMs)],
        );
        if ((updated.rowCount ?? 0) > 0) {
          requeued += 1;
          continue;
        }
      }

      await client.query(
        `
          UPDATE story_jobs
          SET
            status = 'failed',
            error_message = 'Worker lease expired and max attempts reached',
            lease_token = NULL,
            lease_expires_at = NULL,
            updated_at = NOW()
          WHERE id = $1
        `,
        [job.id],
      );
      failed += 1;
      if (exhausted) exhaustedPostIds.push(job.post_id);
    }

    return { processed: selected.rows.length, requeued, failed, exhaustedPostIds };
  });
}

export async function getJobQueueMetrics(): Promise<JobQueueMetrics> {
  const rows = await queryRows<JobQueueMetrics>(
    `
      SELECT
        COUNT(*) FILTER (WHERE status = 'queued')::int AS "queuedTotal",
        COUNT(*) FILTER (WHERE status = 'queued' AND next_attempt_at <= NOW())::int AS "queuedReady",
        COUNT(*) FILTER (WHERE status = 'running')::int AS "running",
        COUNT(*) FILTER (WHERE status = 'completed')::int AS "completed",
        COUNT(*) FILTER (WHERE status = 'failed')::int AS "failed",
        COUNT(*) FILTER (WHERE status = 'cancelled')::int AS "cancelled"
      FROM story_jobs
    `,
  );
  return rows[0] || { queuedTotal: 0, queuedReady: 0, running: 0, completed: 0, failed: 0, cancelled: 0 };
}
