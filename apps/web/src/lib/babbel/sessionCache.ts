import { createHash } from 'node:crypto';

/**
 * Session cookies keyed by API endpoint and account. Entries expire before the
 * server-side session does, so a cached cookie is never presented stale.
 */
export interface SessionCache {
  get(key: string): Promise<string | null>;
  set(key: string, cookieHeader: string, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Drops every cached session and returns how many were live. */
  clear(): Promise<number>;
}

export function sessionKeyFor(baseUrl: string, username: string): string {
  return `babbel_session_${createHash('sha256').update(`${baseUrl}${username}`).digest('hex')}`;
}

type SessionEntry = {
  cookieHeader: string;
  expiresAt: number;
};

export class MemorySessionCache implements SessionCache {
  private entries = new Map<string, SessionEntry>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.cookieHeader;
  }

  async set(key: string, cookieHeader: string, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) return;
    this.entries.set(key, { cookieHeader, expiresAt: this.now() + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<number> {
    const now = this.now();
    const live = [...this.entries.values()].filter((entry) => entry.expiresAt > now).length;
    this.entries.clear();
    return live;
  }
}
