import { z } from 'zod';
import { STORY_STATUSES, type StoryState, type StoryStatePatch, type StoryStatus } from './types';

// Stored form of StoryState; keys stay snake_case in the database.
const persistedStateSchema = z
  .object({
    status: z.string().optional(),
    story_id: z.union([z.string(), z.number()]).optional(),
    message: z.string().optional(),
    status_changed_at: z.string().optional(),
    generated_title: z.string().optional(),
    generated_speech_text: z.string().optional(),
  })
  .passthrough();

export const DEFAULT_STORY_STATE: StoryState = { status: 'not_started' };

export function isStoryStatus(value: unknown): value is StoryStatus {
  return typeof value === 'string' && STORY_STATUSES.some((status) => status === value);
}

export function parseStoryState(value: unknown): StoryState {
  const parsed = persistedStateSchema.safeParse(value);
  if (!parsed.success) return { ...DEFAULT_STORY_STATE };
  const raw = parsed.data;
  const state: StoryState = { status: isStoryStatus(raw.status) ? raw.status : 'not_started' };
  if (raw.story_id !== undefined && String(raw.story_id) !== '') state.storyId = String(raw.story_id);
  if (raw.message !== undefined) state.message = raw.message;
  if (raw.status_changed_at !== undefined) state.statusChangedAt = raw.status_changed_at;
  if (raw.generated_title !== undefined) state.generatedTitle = raw.generated_title;
  if (raw.generated_speech_text !== undefined) state.generatedSpeechText = raw.generated_speech_text;
  return state;
}

export function serializeStoryState(state: StoryState): Record<string, string> {
  const stored: Record<string, string> = { status: state.status };
  if (state.storyId !== undefined) stored.story_id = state.storyId;
  if (state.message !== undefined) stored.message = state.message;
  if (state.statusChangedAt !== undefined) stored.status_changed_at = state.statusChangedAt;
  if (state.generatedTitle !== undefined) stored.generated_title = state.generatedTitle;
  if (state.generatedSpeechText !== undefined) stored.generated_speech_text = state.generatedSpeechText;
  return stored;
}

/** Shallow merge; fields absent from the patch keep their current value. */
export function mergeStoryState(current: StoryState, patch: StoryStatePatch, changedAt: Date): StoryState {
  const next: StoryState = { ...current };
  if (patch.status !== undefined) next.status = patch.status;
  if (patch.storyId !== undefined) next.storyId = patch.storyId;
  if (patch.message !== undefined) next.message = patch.message;
  if (patch.generatedTitle !== undefined) next.generatedTitle = patch.generatedTitle;
  if (patch.generatedSpeechText !== undefined) next.generatedSpeechText = patch.generatedSpeechText;
  next.statusChangedAt = changedAt.toISOString();
  return next;
}
