import { randomUUID } from 'node:crypto';
import { clearInterval, setInterval } from 'node:timers';
import { clampInt, loadEnvLocal } from '../lib/config';
import { closePool } from '../lib/db';
import { logEvent, type LogLevel } from '../lib/log';
import {
  claimNextStoryJob,
  computeBackoffMs,
  extendJobLease,
  markJobCompleted,
  recoverExpiredJobs,
  settleJobFailure,
} from '../lib/repos/storyJobs';
import { ensureSchema } from '../lib/schema';
import { getSyncServices } from '../lib/services/storySync';
import { errorMessage, isRetryableSyncErrorCode, toSyncError } from '../lib/syncErrors';

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function logWorker(level: LogLevel, event: string, workerId: string, detail: Record<string, unknown>) {
  logEvent(level, event, { workerId, ...detail });
}

type WorkerConfig = {
  workerId: string;
  leaseMs: number;
  heartbeatMs: number;
  recoveryIntervalMs: number;
  recoveryBatchSize: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

async function processOneJob(config: WorkerConfig, slot: number): Promise<boolean> {
  const leaseToken = randomUUID();
  const job = await claimNextStoryJob({ leaseToken, leaseMs: config.leaseMs });
  if (!job) return false;
  const startedAt = Date.now();
  logWorker('info', 'job.claimed', config.workerId, {
    slot,
    jobId: job.id,
    traceId: job.trace_id,
    postId: job.post_id,
    attempt: job.attempt_count,
    maxAttempts: job.max_attempts,
  });

  let heartbeatStale = false;
  let heartbeatBusy = false;
  const heartbeatHandle = setInterval(() => {
    if (heartbeatBusy) return;
    heartbeatBusy = true;
    void extendJobLease(job.id, leaseToken, config.leaseMs)
      .then((ok) => {
        if (!ok) {
          heartbeatStale = true;
          clearInterval(heartbeatHandle);
          logWorker('warn', 'job.lease_stale', config.workerId, { slot, jobId: job.id, traceId: job.trace_id });
        }
      })
      .catch((error: unknown) => {
        logWorker('error', 'job.heartbeat_error', config.workerId, {
          slot,
          jobId: job.id,
          traceId: job.trace_id,
          message: errorMessage(error),
        });
      })
      .finally(() => {
        heartbeatBusy = false;
      });
  }, config.heartbeatMs);
  heartbeatHandle.unref();

  const { engine } = getSyncServices();
  try {
    const action = await engine.processJob(job.post_id);
    const completed = await markJobCompleted(job.id, leaseToken, { action });
    if (!completed) {
      logWorker('warn', 'job.completed_stale', config.workerId, {
        slot,
        jobId: job.id,
        traceId: job.trace_id,
        leaseStale: heartbeatStale,
      });
      return true;
    }
    logWorker('info', 'job.completed', config.workerId, {
      slot,
      jobId: job.id,
      traceId: job.trace_id,
      postId: job.post_id,
      action,
      durationMs: Date.now() - startedAt,
      attempt: job.attempt_count,
    });
  } catch (error) {
    const normalized = toSyncError(error, 'Unknown job execution failure', {
      jobId: job.id,
      postId: job.post_id,
      traceId: job.trace_id,
      attempt: job.attempt_count,
    });
    const retryable = isRetryableSyncErrorCode(normalized.code);
    const backoffMs = computeBackoffMs(job.attempt_count, config.backoffBaseMs, config.backoffMaxMs);
    const settled = await settleJobFailure(job.id, {
      leaseToken,
      errorMessage: normalized.message,
      retryable,
      backoffMs,
    });
    if (settled.outcome === 'stale') {
      logWorker('warn', 'job.failed_stale', config.workerId, { slot, jobId: job.id, code: normalized.code });
      return true;
    }
    if (settled.outcome === 'retried') {
      logWorker('warn', 'job.requeued', config.workerId, {
        slot,
        jobId: job.id,
        traceId: job.trace_id,
        code: normalized.code,
        nextAttemptAt: settled.job?.next_attempt_at || null,
        backoffMs,
        attempt: job.attempt_count,
        maxAttempts: job.max_attempts,
      });
      return true;
    }
    logWorker('error', 'job.failed', config.workerId, {
      slot,
      jobId: job.id,
      traceId: job.trace_id,
      postId: job.post_id,
      code: normalized.code,
      message: normalized.message,
      retryable,
      durationMs: Date.now() - startedAt,
      attempt: job.attempt_count,
    });
    await engine.abandonJob(job.post_id, normalized.message);
  } finally {
    clearInterval(heartbeatHandle);
  }

  return true;
}

async function run() {
  await loadEnvLocal();
  await ensureSchema();

  const once = process.argv.includes('--once');
  const intervalMs = clampInt(Number(process.env.STORY_WORKER_INTERVAL_MS || 1500), 50, 30_000);
  const leaseMs = clampInt(Number(process.env.STORY_WORKER_LEASE_MS || 300_000), 5_000, 3_600_000);
  const heartbeatMs = clampInt(
    Number(process.env.STORY_WORKER_HEARTBEAT_MS || Math.floor(leaseMs / 3)),
    1_000,
    Math.max(1_000, leaseMs - 500),
  );
  const recoveryIntervalMs = clampInt(Number(process.env.STORY_WORKER_RECOVERY_INTERVAL_MS || intervalMs), 250, 120_000);
  const recoveryBatchSize = clampInt(Number(process.env.STORY_WORKER_RECOVERY_BATCH_SIZE || 50), 1, 500);
  const concurrency = clampInt(Number(process.env.STORY_WORKER_CONCURRENCY || 1), 1, 16);
  const backoffBaseMs = clampInt(Number(process.env.STORY_WORKER_BACKOFF_BASE_MS || 5_000), 100, 60_000);
  const backoffMaxMs = clampInt(Number(process.env.STORY_WORKER_BACKOFF_MAX_MS || 300_000), backoffBaseMs, 3_600_000);
  const workerId = process.env.STORY_WORKER_ID?.trim() || `${process.pid}-${randomUUID().slice(0, 8)}`;
  const config: WorkerConfig = {
    workerId,
    leaseMs,
    heartbeatMs,
    recoveryIntervalMs,
    recoveryBatchSize,
    backoffBaseMs,
    backoffMaxMs,
  };
  let stopped = false;

  const stop = () => {
    stopped = true;
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  if (once) {
    let handled = 0;
    while (!stopped) {
      const batch = await Promise.all(Array.from({ length: concurrency }, (_value, index) => processOneJob(config, index)));
      const count = batch.filter(Boolean).length;
      if (count === 0) break;
      handled += count;
    }
    logWorker('info', 'worker.once_finished', workerId, { handled, concurrency });
    return;
  }

  logWorker('info', 'worker.started', workerId, {
    intervalMs,
    leaseMs,
    heartbeatMs,
    recoveryIntervalMs,
    recoveryBatchSize,
    concurrency,
    backoffBaseMs,
    backoffMaxMs,
  });

  const loop = async (slot: number) => {
    while (!stopped) {
      try {
        const handled = await processOneJob(config, slot);
        if (!handled) {
          await sleep(intervalMs);
        }
      } catch (error) {
        logWorker('error', 'worker.slot_error', workerId, { slot, message: errorMessage(error) });
        await sleep(intervalMs);
      }
    }
  };

  const recoveryLoop = async () => {
    while (!stopped) {
      try {
        const recovered = await recoverExpiredJobs({
          limit: config.recoveryBatchSize,
          backoffBaseMs: config.backoffBaseMs,
          backoffMaxMs: config.backoffMaxMs,
        });
        if (recovered.processed > 0) {
          logWorker('warn', 'worker.recovered_expired', workerId, { ...recovered });
        }
        const { engine } = getSyncServices();
        for (const postId of recovered.exhaustedPostIds) {
          await engine.abandonJob(postId, 'Worker lease expired and max attempts reached');
        }
      } catch (error) {
        logWorker('error', 'worker.recovery_error', workerId, { message: errorMessage(error) });
      }
      await sleep(config.recoveryIntervalMs);
    }
  };

  await Promise.all([recoveryLoop(), ...Array.from({ length: concurrency }, (_value, index) => loop(index))]);
  logWorker('info', 'worker.stopped', workerId, { concurrency });
}

run()
  .catch((error: unknown) => {
    logEvent('error', 'worker.fatal', { message: errorMessage(error) });
    process.exitCode = 1;
  })
  .then(() => closePool())
  .catch((error: unknown) => {
    logEvent('error', 'worker.pool_close_failed', { message: errorMessage(error) });
  });
