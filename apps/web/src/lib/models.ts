import type { PostStatus } from './sync/types';

export type PostRecord = {
  id: string;
  title: string;
  body: string;
  status: PostStatus;
  scheduled_at: string | null;
  sync_enabled: boolean;
  created_at: string;
  updated_at: string;
};

export type StoryJobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export type StoryJobRecord = {
  id: string;
  post_id: string;
  status: StoryJobStatus;
  attempt_count: number;
  max_attempts: number;
  next_attempt_at: string;
  last_attempt_at: string | null;
  lease_token: string | null;
  lease_expires_at: string | null;
  trace_id: string;
  error_message: string | null;
  result_json: Record<string, unknown>;
  created_at: string;
  updated_at: string;
};

export type StoryStateRecord = {
  post_id: string;
  state_json: unknown;
  status_changed_at: string;
};

export type SyncErrorRecord = {
  id: string;
  post_id: string;
  message: string;
  context_json: Record<string, unknown>;
  created_at: string;
};
