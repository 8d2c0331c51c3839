import { describe, expect, it } from 'vitest';
import { DEFAULT_OPENAI_API_URL, parseFlag, readSyncSettings } from './config';

describe('readSyncSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = readSyncSettings({});

    expect(settings.babbel).toEqual({
      baseUrl: '',
      username: '',
      password: '',
      sessionValiditySeconds: 3600,
      sessionSafetyMarginSeconds: 600,
      requestTimeoutMs: 30_000,
    });
    expect(settings.generator).toEqual({
      apiKey: null,
      apiUrl: DEFAULT_OPENAI_API_URL,
      model: 'gpt-4.1-mini',
      titlePrompt: null,
      speechPrompt: null,
    });
    expect(settings.story).toEqual({
      startOffsetDays: 1,
      endOffsetDays: 2,
      defaultStatus: 'draft',
      weekdays: {},
      timeZone: 'UTC',
    });
    expect(settings.debug).toBe(false);
  });

  it('reads and normalizes configured values', () => {
    const settings = readSyncSettings({
      BABBEL_API_BASE_URL: ' https://babbel.test/api/ ',
      BABBEL_API_USERNAME: 'editor',
      BABBEL_API_PASSWORD: 'test-secret',
      OPENAI_API_KEY: 'test-key',
      STORY_START_DAYS_OFFSET: '0',
      STORY_END_DAYS_OFFSET: '5',
      STORY_DEFAULT_STATUS: 'active',
      STORY_WEEKDAY_SUNDAY: 'off',
      STORY_WEEKDAY_MONDAY: 'yes',
      STORY_TIME_ZONE: 'Europe/Amsterdam',
      STORY_SYNC_DEBUG: '1',
    });

    expect(settings.babbel.baseUrl).toBe('https://babbel.test/api');
    expect(settings.generator.apiKey).toBe('test-key');
    expect(settings.story).toEqual({
      startOffsetDays: 0,
      endOffsetDays: 5,
      defaultStatus: 'active',
      weekdays: { sunday: false, monday: true },
      timeZone: 'Europe/Amsterdam',
    });
    expect(settings.debug).toBe(true);
  });

  it('keeps the safety margin below the session lifetime', () => {
    const settings = readSyncSettings({
      BABBEL_SESSION_VALIDITY_SECONDS: '120',
      BABBEL_SESSION_SAFETY_MARGIN_SECONDS: '600',
    });
    expect(settings.babbel.sessionSafetyMarginSeconds).toBe(90);
  });

  it('falls back to UTC for an unknown time zone', () => {
    expect(readSyncSettings({ STORY_TIME_ZONE: 'Mars/Olympus' }).story.timeZone).toBe('UTC');
  });
});

describe('parseFlag', () => {
  it('reads common false spellings', () => {
    expect(['0', 'false', 'No', 'OFF'].map((value) => parseFlag(value, true))).toEqual([false, false, false, false]);
    expect(parseFlag('true', false)).toBe(true);
    expect(parseFlag(undefined, true)).toBe(true);
    expect(parseFlag('  ', false)).toBe(false);
  });
});
