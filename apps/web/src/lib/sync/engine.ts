import type { StorySettings } from '../config';
import { logEvent } from '../log';
import { errorMessage, type SyncErrorCode } from '../syncErrors';
import { calculateStoryDates } from './dates';
import type {
  ContentGenerator,
  ContentSource,
  PostChange,
  PostSnapshot,
  RemoteStoryClient,
  StoryJobScheduler,
  StoryState,
  StoryStateStore,
  StoryStatus,
} from './types';

export type SyncAction =
  | 'noop'
  | 'scheduled'
  | 'already_scheduled'
  | 'schedule_failed'
  | 'restored'
  | 'restore_failed'
  | 'deleted'
  | 'delete_failed'
  | 'cleared'
  | 'dates_updated'
  | 'dates_update_failed'
  | 'sent'
  | 'already_sent'
  | 'already_created'
  | 'abandoned'
  | 'failed';

export type SyncEngineDeps = {
  store: StoryStateStore;
  jobs: StoryJobScheduler;
  content: ContentSource;
  remote: RemoteStoryClient;
  generator: ContentGenerator;
  settings: StorySettings;
  now?: () => Date;
};

// Creation is already under way or done for these.
const IN_FLIGHT_STATUSES: readonly StoryStatus[] = ['sent', 'scheduled', 'processing'];

export function isLive(status: PostSnapshot['status']): boolean {
  return status === 'published' || status === 'scheduled';
}

function sameInstant(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return a === b;
  return Date.parse(a) === Date.parse(b);
}

export function plainText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<[^>]*>/g, '')
    .trim();
}

/**
 * Decides, for every post lifecycle event, what happens to the post's remote
 * story. Every trigger surface goes through `applyChange`; the deferred job
 * goes through `processJob`.
 */
export class SyncEngine {
  private store: StoryStateStore;
  private jobs: StoryJobScheduler;
  private content: ContentSource;
  private remote: RemoteStoryClient;
  private generator: ContentGenerator;
  private settings: StorySettings;
  private now: () => Date;

  constructor(deps: SyncEngineDeps) {
    this.store = deps.store;
    this.jobs = deps.jobs;
    this.content = deps.content;
    this.remote = deps.remote;
    this.generator = deps.generator;
    this.settings = deps.settings;
    this.now = deps.now || (() => new Date());
  }

  async applyChange(change: PostChange): Promise<SyncAction> {
    try {
      const action = await this.decide(change);
      if (action !== 'noop') {
        logEvent('info', 'sync.applied', {
          postId: change.postId,
          action,
          fromStatus: change.before?.status ?? null,
          toStatus: change.after.status,
          syncEnabled: change.after.syncEnabled,
        });
      }
      return action;
    } catch (error) {
      const message = errorMessage(error);
      logEvent('error', 'sync.apply_failed', { postId: change.postId, message });
      await this.store.update(change.postId, { status: 'error', message });
      return 'failed';
    }
  }

  /** Manual re-entry for a post whose story never reached the remote side. */
  async retry(postId: string): Promise<SyncAction> {
    const item = await this.content.getItem(postId);
    if (!item || !item.syncEnabled || !isLive(item.status)) return 'noop';
    const state = await this.store.get(postId);
    if (state.status !== 'error' && state.status !== 'not_started') return 'noop';
    return this.startStory(postId, item);
  }

  /**
   * Settles the state of a post whose job failed for good outside `processJob`,
   * so a later trigger can start over.
   */
  async abandonJob(postId: string, message: string): Promise<SyncAction> {
    const state = await this.store.get(postId);
    if (state.status !== 'processing' && state.status !== 'scheduled') return 'noop';
    if (await this.jobs.hasPending(postId)) return 'noop';
    await this.fail(postId, message);
    return 'abandoned';
  }

  async processJob(postId: string): Promise<SyncAction> {
    logEvent('info', 'job.started', { postId });

    const existing = await this.store.get(postId);
    if (existing.status === 'sent') {
      await this.store.update(postId, { status: 'sent', message: 'Already sent, skipping' });
      return 'already_sent';
    }
    // A story that exists remotely is only ever restored, never created again.
    if (existing.storyId) {
      logEvent('warn', 'job.story_exists', { postId, storyId: existing.storyId, status: existing.status });
      return 'already_created';
    }

    const item = await this.content.getItem(postId);
    if (!item) {
      await this.fail(postId, `Post not found (ID: ${postId})`, 'NOT_FOUND');
      return 'failed';
    }
    if (!item.syncEnabled) {
      await this.fail(postId, 'Sync is disabled for this post');
      return 'failed';
    }

    await this.store.update(postId, { status: 'processing', message: 'Story is being processed...' });

    const source = plainText(item.body);
    const title = await this.generator.generate(source, 'title');
    if (title === null) {
      await this.fail(postId, 'Could not generate title', 'GENERATION_FAILURE');
      return 'failed';
    }
    const speechText = await this.generator.generate(source, 'speech');
    if (speechText === null) {
      await this.fail(postId, 'Could not generate speech text', 'GENERATION_FAILURE');
      return 'failed';
    }

    const dates = calculateStoryDates(this.baseDateFor(item), this.settings);
    const result = await this.remote.createStory({
      title,
      text: speechText,
      startDate: dates.startDate,
      endDate: dates.endDate,
      weekdays: dates.weekdays,
      status: this.settings.defaultStatus,
      metadata: {
        post_id: postId,
        original_speech_text: speechText,
      },
    });

    if (!result.success || !result.storyId) {
      await this.fail(postId, result.message, 'REMOTE_API_ERROR');
      return 'failed';
    }

    const saved = await this.store.update(postId, {
      status: 'sent',
      storyId: result.storyId,
      message: 'Story created successfully',
      generatedTitle: title,
      generatedSpeechText: speechText,
    });
    if (!saved) {
      logEvent('error', 'story_state.write_failed', { postId, storyId: result.storyId, status: 'sent' });
    }
    return 'sent';
  }

  private async decide(change: PostChange): Promise<SyncAction> {
    const { postId, before, after } = change;
    const previousStatus = before?.status ?? null;

    if (after.status === 'trashed') {
      return previousStatus === 'trashed' ? 'noop' : this.removeStory(postId, 'Story deleted (post trashed)');
    }
    if (previousStatus === 'trashed') {
      return this.restoreAfterUntrash(postId, after);
    }

    const wasEnabled = before?.syncEnabled ?? false;
    if (wasEnabled && !after.syncEnabled) {
      return this.removeStory(postId, 'Story deleted from Babbel');
    }
    if (!wasEnabled && after.syncEnabled) {
      return isLive(after.status) ? this.startStory(postId, after) : 'noop';
    }

    const enteredScheduled =
      after.status === 'scheduled' && previousStatus !== 'scheduled' && previousStatus !== 'published';
    const enteredPublished = after.status === 'published' && previousStatus !== 'published';
    if (enteredScheduled || enteredPublished) {
      return after.syncEnabled ? this.startStory(postId, after) : 'noop';
    }

    if (after.status === 'scheduled' && previousStatus === 'scheduled') {
      if (sameInstant(before?.scheduledAt ?? null, after.scheduledAt)) return 'noop';
      return this.refreshDates(postId, after);
    }

    if (previousStatus === 'scheduled' && !isLive(after.status)) {
      return this.removeStory(postId, 'Story deleted (post unscheduled)');
    }

    return 'noop';
  }

  private async startStory(postId: string, snapshot: PostSnapshot): Promise<SyncAction> {
    const state = await this.store.get(postId);
    if (IN_FLIGHT_STATUSES.includes(state.status)) return 'noop';
    // A story that exists remotely is never created twice.
    if (state.storyId) {
      return this.restoreStory(postId, state, snapshot);
    }
    return this.scheduleProcessing(postId);
  }

  private async scheduleProcessing(postId: string): Promise<SyncAction> {
    if (await this.jobs.hasPending(postId)) {
      await this.store.update(postId, { status: 'scheduled', message: 'Processing already scheduled' });
      return 'already_scheduled';
    }

    let enqueued: boolean;
    try {
      enqueued = await this.jobs.enqueue(postId);
    } catch (error) {
      logEvent('error', 'sync.enqueue_failed', { postId, message: errorMessage(error) });
      enqueued = false;
    }

    if (!enqueued) {
      await this.store.update(postId, { status: 'error', message: 'Could not schedule action' });
      return 'schedule_failed';
    }
    await this.store.update(postId, { status: 'scheduled', message: 'Processing scheduled' });
    return 'scheduled';
  }

  private async restoreAfterUntrash(postId: string, after: PostSnapshot): Promise<SyncAction> {
    if (!after.syncEnabled) return 'noop';
    const state = await this.store.get(postId);
    if (state.status !== 'deleted' || !state.storyId) return 'noop';
    return this.restoreStory(postId, state, after);
  }

  private async restoreStory(postId: string, state: StoryState, snapshot: PostSnapshot): Promise<SyncAction> {
    if (!state.storyId) return 'noop';
    const result = await this.remote.restoreStory(state.storyId);
    if (!result.success) {
      await this.fail(postId, result.message, 'REMOTE_API_ERROR');
      return 'restore_failed';
    }
    // The restored story still carries the dates of its first schedule.
    if (snapshot.status === 'scheduled') {
      const updated = await this.pushDates(postId, state.storyId, snapshot);
      if (!updated) return 'dates_update_failed';
    }
    await this.store.update(postId, { status: 'sent', message: 'Story restored in Babbel' });
    return 'restored';
  }

  private async removeStory(postId: string, deletedMessage: string): Promise<SyncAction> {
    await this.cancelPending(postId);

    const state = await this.store.get(postId);
    if (state.status === 'sent' && state.storyId) {
      const result = await this.remote.deleteStory(state.storyId);
      if (!result.success) {
        await this.fail(postId, result.message, 'REMOTE_API_ERROR');
        return 'delete_failed';
      }
      await this.store.update(postId, { status: 'deleted', message: deletedMessage });
      return 'deleted';
    }

    if (state.status === 'scheduled' || state.status === 'processing') {
      await this.store.reset(postId, 'Processing cancelled');
      return 'cleared';
    }
    return 'noop';
  }

  private async refreshDates(postId: string, after: PostSnapshot): Promise<SyncAction> {
    const state = await this.store.get(postId);
    if (state.status !== 'sent' || !state.storyId) return 'noop';

    if (!(await this.pushDates(postId, state.storyId, after))) return 'dates_update_failed';
    await this.store.update(postId, { status: 'sent', message: 'Story dates updated in Babbel' });
    return 'dates_updated';
  }

  private async pushDates(postId: string, storyId: string, snapshot: PostSnapshot): Promise<boolean> {
    const dates = calculateStoryDates(this.baseDateFor(snapshot), this.settings);
    const result = await this.remote.updateStory(storyId, {
      start_date: dates.startDate,
      end_date: dates.endDate,
      weekdays: dates.weekdays,
    });
    if (!result.success) {
      await this.fail(postId, result.message, 'REMOTE_API_ERROR');
      return false;
    }
    return true;
  }

  private async cancelPending(postId: string): Promise<void> {
    try {
      const cancelled = await this.jobs.cancelAll(postId);
      if (cancelled > 0) logEvent('info', 'sync.jobs_cancelled', { postId, cancelled });
    } catch (error) {
      logEvent('error', 'sync.cancel_failed', { postId, message: errorMessage(error) });
    }
  }

  private baseDateFor(snapshot: PostSnapshot): Date {
    if (snapshot.status === 'scheduled' && snapshot.scheduledAt) {
      const scheduled = new Date(snapshot.scheduledAt);
      if (!Number.isNaN(scheduled.getTime())) return scheduled;
    }
    return this.now();
  }

  private async fail(postId: string, message: string, code?: SyncErrorCode): Promise<void> {
    logEvent('warn', 'sync.failed', { postId, code: code ?? null, message });
    await this.store.update(postId, { status: 'error', message });
  }
}
