import { describe, expect, it } from 'vitest';
import { mergeStoryState, parseStoryState, serializeStoryState } from './stateCodec';

describe('parseStoryState', () => {
  it('maps stored snake_case keys', () => {
    expect(
      parseStoryState({
        status: 'sent',
        story_id: 42,
        message: 'Story created successfully',
        status_changed_at: '2026-03-10T12:00:00.000Z',
        generated_title: 'Title',
        generated_speech_text: 'Speech',
      }),
    ).toEqual({
      status: 'sent',
      storyId: '42',
      message: 'Story created successfully',
      statusChangedAt: '2026-03-10T12:00:00.000Z',
      generatedTitle: 'Title',
      generatedSpeechText: 'Speech',
    });
  });

  it('falls back to not_started for unknown or malformed values', () => {
    expect(parseStoryState({ status: 'exploded', message: 'x' })).toEqual({ status: 'not_started', message: 'x' });
    expect(parseStoryState('garbage')).toEqual({ status: 'not_started' });
    expect(parseStoryState(null)).toEqual({ status: 'not_started' });
  });

  it('drops an empty story id', () => {
    expect(parseStoryState({ status: 'error', story_id: '' })).toEqual({ status: 'error' });
  });
});

describe('serializeStoryState', () => {
  it('writes only the fields that are present', () => {
    expect(serializeStoryState({ status: 'deleted', storyId: 'story-9', message: 'gone' })).toEqual({
      status: 'deleted',
      story_id: 'story-9',
      message: 'gone',
    });
  });
});

describe('mergeStoryState', () => {
  it('keeps fields the patch leaves out and stamps the change time', () => {
    const merged = mergeStoryState(
      { status: 'sent', storyId: 'story-9', generatedTitle: 'Title' },
      { status: 'deleted', message: 'Story deleted from Babbel' },
      new Date('2026-03-10T12:00:00Z'),
    );
    expect(merged).toEqual({
      status: 'deleted',
      storyId: 'story-9',
      generatedTitle: 'Title',
      message: 'Story deleted from Babbel',
      statusChangedAt: '2026-03-10T12:00:00.000Z',
    });
  });
});
