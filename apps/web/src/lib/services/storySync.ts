import { getSyncSettings } from '../config';
import { logEvent } from '../log';
import type { PostRecord } from '../models';
import { BabbelClient } from '../babbel/client';
import { OpenAiGenerator } from '../generator/openai';
import {
  PgContentSource,
  createPost,
  getPostById,
  updatePost,
  type CreatePostInput,
  type UpdatePostInput,
  type UpdatePostResult,
} from '../repos/posts';
import { PgSessionCache } from '../repos/babbelSessions';
import { PgStoryJobScheduler } from '../repos/storyJobs';
import { PgStoryStateStore } from '../repos/storyStates';
import { recordSyncError } from '../repos/syncErrors';
import { SyncEngine, type SyncAction } from '../sync/engine';
import type { RemoteStoryResult, StateChangeListener, StoryState } from '../sync/types';
import { errorMessage } from '../syncErrors';

export type PostSyncResult = {
  post: PostRecord;
  action: SyncAction;
  state: StoryState;
};

export type SyncServices = {
  engine: SyncEngine;
  store: PgStoryStateStore;
  jobs: PgStoryJobScheduler;
  remote: BabbelClient;
  sessions: PgSessionCache;
};

const logStateChange: StateChangeListener = (postId, next, previous) => {
  logEvent('info', 'story.state_changed', {
    postId,
    from: previous.status,
    to: next.status,
    storyId: next.storyId ?? null,
    message: next.message ?? null,
  });
  if (next.status !== 'error') return;
  if (previous.status === 'error' && previous.message === next.message) return;
  void recordSyncError(postId, next.message || 'Unknown error', { from: previous.status }).catch((error) => {
    logEvent('error', 'story.error_record_failed', { postId, message: errorMessage(error) });
  });
};

let services: SyncServices | null = null;

export function getSyncServices(): SyncServices {
  if (!services) {
    const settings = getSyncSettings();
    const store = new PgStoryStateStore({ onChange: logStateChange });
    const jobs = new PgStoryJobScheduler({ maxAttempts: Number(process.env.STORY_WORKER_MAX_ATTEMPTS || 3) });
    const sessions = new PgSessionCache();
    const remote = new BabbelClient({ settings: settings.babbel, sessions });
    const engine = new SyncEngine({
      store,
      jobs,
      content: new PgContentSource(),
      remote,
      generator: new OpenAiGenerator({ settings: settings.generator }),
      settings: settings.story,
    });
    services = { engine, store, jobs, remote, sessions };
  }
  return services;
}

export function getSyncEngine(): SyncEngine {
  return getSyncServices().engine;
}

async function applyWrite(written: UpdatePostResult): Promise<PostSyncResult> {
  const { engine, store } = getSyncServices();
  const action = await engine.applyChange(written.change);
  const state = await store.get(written.post.id);
  return { post: written.post, action, state };
}

export async function createPostWithSync(input: CreatePostInput): Promise<PostSyncResult> {
  return applyWrite(await createPost(input));
}

export async function updatePostWithSync(postId: string, patch: UpdatePostInput): Promise<PostSyncResult | null> {
  const written = await updatePost(postId, patch);
  return written ? applyWrite(written) : null;
}

export async function trashPost(postId: string): Promise<PostSyncResult | null> {
  return updatePostWithSync(postId, { status: 'trashed' });
}

/** Untrashed posts come back as drafts. */
export async function untrashPost(postId: string): Promise<PostSyncResult | null> {
  const written = await updatePost(postId, { status: 'draft' }, 'trashed');
  return written ? applyWrite(written) : null;
}

export async function retryPost(postId: string): Promise<PostSyncResult | null> {
  const post = await getPostById(postId);
  if (!post) return null;
  const { engine, store } = getSyncServices();
  const action = await engine.retry(postId);
  return { post, action, state: await store.get(postId) };
}

export async function getPostWithState(postId: string): Promise<{ post: PostRecord; state: StoryState } | null> {
  const post = await getPostById(postId);
  if (!post) return null;
  return { post, state: await getSyncServices().store.get(postId) };
}

export async function testBabbelConnection(): Promise<RemoteStoryResult> {
  const result = await getSyncServices().remote.testConnection();
  logEvent(result.success ? 'info' : 'warn', 'babbel.connection_tested', { success: result.success, message: result.message });
  return result;
}

export async function clearBabbelSessions(): Promise<number> {
  const cleared = await getSyncServices().sessions.clear();
  logEvent('info', 'babbel.sessions_cleared', { cleared });
  return cleared;
}

export async function cancelJobsForPost(postId: string): Promise<number> {
  return getSyncServices().jobs.cancelAll(postId);
}
