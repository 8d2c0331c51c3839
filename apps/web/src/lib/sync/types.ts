import type { RemoteStoryStatus } from '../config';

export const STORY_STATUSES = ['not_started', 'scheduled', 'processing', 'sent', 'error', 'deleted'] as const;

export type StoryStatus = (typeof STORY_STATUSES)[number];

export type StoryState = {
  status: StoryStatus;
  storyId?: string;
  message?: string;
  statusChangedAt?: string;
  generatedTitle?: string;
  generatedSpeechText?: string;
};

export type StoryStatePatch = Partial<Omit<StoryState, 'statusChangedAt'>>;

export const POST_STATUSES = ['draft', 'scheduled', 'published', 'trashed'] as const;

export type PostStatus = (typeof POST_STATUSES)[number];

/** The fields of a post the state machine reacts to. */
export type PostSnapshot = {
  syncEnabled: boolean;
  status: PostStatus;
  scheduledAt: string | null;
};

export type PostChange = {
  postId: string;
  before: PostSnapshot | null;
  after: PostSnapshot;
};

export type ContentItem = PostSnapshot & {
  id: string;
  body: string;
};

export type StoryPayload = {
  title: string;
  text: string;
  startDate: string;
  endDate: string;
  weekdays: number;
  status: RemoteStoryStatus;
  metadata: Record<string, unknown>;
};

export type StoryScheduleFields = {
  start_date?: string;
  end_date?: string;
  weekdays?: number;
};

export type RemoteStoryResult = {
  success: boolean;
  message: string;
  storyId?: string;
};

export type StateChangeListener = (postId: string, next: StoryState, previous: StoryState) => void;

export interface StoryStateStore {
  get(postId: string): Promise<StoryState>;
  update(postId: string, patch: StoryStatePatch): Promise<boolean>;
  reset(postId: string, message: string): Promise<boolean>;
}

export interface StoryJobScheduler {
  hasPending(postId: string): Promise<boolean>;
  enqueue(postId: string): Promise<boolean>;
  cancelAll(postId: string): Promise<number>;
}

export interface ContentSource {
  getItem(postId: string): Promise<ContentItem | null>;
}

export interface RemoteStoryClient {
  createStory(payload: StoryPayload): Promise<RemoteStoryResult>;
  updateStory(storyId: string, fields: StoryScheduleFields): Promise<RemoteStoryResult>;
  deleteStory(storyId: string): Promise<RemoteStoryResult>;
  restoreStory(storyId: string): Promise<RemoteStoryResult>;
  testConnection(): Promise<RemoteStoryResult>;
}

export type GenerationKind = 'title' | 'speech';

export interface ContentGenerator {
  generate(sourceText: string, kind: GenerationKind): Promise<string | null>;
}
