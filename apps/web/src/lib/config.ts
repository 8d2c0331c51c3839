import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { WEEKDAY_NAMES, type WeekdayName, type WeekdaySelection } from './sync/weekdays';

export type RemoteStoryStatus = 'draft' | 'active';

export type BabbelSettings = {
  baseUrl: string;
  username: string;
  password: string;
  sessionValiditySeconds: number;
  sessionSafetyMarginSeconds: number;
  requestTimeoutMs: number;
};

export type GeneratorSettings = {
  apiKey: string | null;
  apiUrl: string;
  model: string;
  titlePrompt: string | null;
  speechPrompt: string | null;
};

export type StorySettings = {
  startOffsetDays: number;
  endOffsetDays: number;
  defaultStatus: RemoteStoryStatus;
  weekdays: WeekdaySelection;
  timeZone: string;
};

export type SyncSettings = {
  babbel: BabbelSettings;
  generator: GeneratorSettings;
  story: StorySettings;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_OPENAI_MODEL = 'gpt-4.1-mini';
export const DEFAULT_OPENAI_API_URL = 'https://api.openai.com/v1/chat/completions';

export function clampInt(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, Math.round(value)));
}

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  return clampInt(Number(raw), min, max);
}

function readOptional(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const trimmed = (value || '').trim().toLowerCase();
  if (!trimmed) return fallback;
  return !['0', 'false', 'no', 'off'].includes(trimmed);
}

function readTimeZone(env: Env): string {
  const value = env.STORY_TIME_ZONE?.trim() || 'UTC';
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
    return value;
  } catch {
    return 'UTC';
  }
}

function readWeekdays(env: Env): WeekdaySelection {
  const selection: Partial<Record<WeekdayName, boolean>> = {};
  for (const day of WEEKDAY_NAMES) {
    const raw = env[`STORY_WEEKDAY_${day.toUpperCase()}`];
    if (raw === undefined || !raw.trim()) continue;
    selection[day] = parseFlag(raw, true);
  }
  return selection;
}

export function readSyncSettings(env: Env = process.env): SyncSettings {
  const startOffsetDays = readInt(env, 'STORY_START_DAYS_OFFSET', 1, 0, 365);
  const endOffsetDays = readInt(env, 'STORY_END_DAYS_OFFSET', 2, 0, 365);
  const sessionValiditySeconds = readInt(env, 'BABBEL_SESSION_VALIDITY_SECONDS', 3600, 60, 86_400);
  const sessionSafetyMarginSeconds = readInt(
    env,
    'BABBEL_SESSION_SAFETY_MARGIN_SECONDS',
    600,
    0,
    Math.max(0, sessionValiditySeconds - 30),
  );
  const defaultStatus = env.STORY_DEFAULT_STATUS?.trim() === 'active' ? 'active' : 'draft';

  return {
    babbel: {
      baseUrl: (env.BABBEL_API_BASE_URL || '').trim().replace(/\/+$/, ''),
      username: (env.BABBEL_API_USERNAME || '').trim(),
      password: env.BABBEL_API_PASSWORD || '',
      sessionValiditySeconds,
      sessionSafetyMarginSeconds,
      requestTimeoutMs: readInt(env, 'BABBEL_REQUEST_TIMEOUT_MS', 30_000, 1_000, 300_000),
    },
    generator: {
      apiKey: readOptional(env, 'OPENAI_API_KEY'),
      apiUrl: readOptional(env, 'OPENAI_API_URL') || DEFAULT_OPENAI_API_URL,
      model: readOptional(env, 'OPENAI_MODEL') || DEFAULT_OPENAI_MODEL,
      titlePrompt: readOptional(env, 'STORY_TITLE_PROMPT'),
      speechPrompt: readOptional(env, 'STORY_SPEECH_PROMPT'),
    },
    story: {
      startOffsetDays,
      endOffsetDays,
      defaultStatus,
      weekdays: readWeekdays(env),
      timeZone: readTimeZone(env),
    },
    debug: parseFlag(env.STORY_SYNC_DEBUG, false),
  };
}

let cachedSettings: SyncSettings | null = null;

export function getSyncSettings(): SyncSettings {
  if (!cachedSettings) {
    cachedSettings = readSyncSettings();
  }
  return cachedSettings;
}

export function isDebugEnabled(): boolean {
  return getSyncSettings().debug;
}

export async function loadEnvLocal(): Promise<void> {
  const candidates = [path.join(process.cwd(), '.env.local'), path.join(process.cwd(), 'apps', 'web', '.env.local')];
  for (const envPath of candidates) {
    try {
      const text = await fs.readFile(envPath, 'utf8');
      for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const eq = line.indexOf('=');
        if (eq <= 0) continue;
        const key = line.slice(0, eq).trim();
        const value = line.slice(eq + 1).trim();
        if (!(key in process.env)) process.env[key] = value;
      }
      cachedSettings = null;
      return;
    } catch {
      // Try next candidate.
    }
  }
}
