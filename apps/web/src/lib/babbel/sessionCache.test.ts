import { describe, expect, it } from 'vitest';
import { MemorySessionCache, sessionKeyFor } from './sessionCache';

describe('MemorySessionCache', () => {
  it('expires entries at their deadline', async () => {
    let clock = 1_000;
    const cache = new MemorySessionCache(() => clock);
    await cache.set('k', 'sid=abc', 500);

    clock = 1_499;
    expect(await cache.get('k')).toBe('sid=abc');
    clock = 1_500;
    expect(await cache.get('k')).toBeNull();
  });

  it('does not store entries without a positive lifetime', async () => {
    const cache = new MemorySessionCache(() => 0);
    await cache.set('k', 'sid=abc', 0);
    expect(await cache.get('k')).toBeNull();
  });

  it('clears every entry and reports the live count', async () => {
    let clock = 0;
    const cache = new MemorySessionCache(() => clock);
    await cache.set('a', 'sid=1', 1_000);
    await cache.set('b', 'sid=2', 1_000);
    await cache.set('c', 'sid=3', 100);
    clock = 500;

    expect(await cache.clear()).toBe(2);
    expect(await cache.get('a')).toBeNull();
  });
});

describe('sessionKeyFor', () => {
  it('derives distinct keys per endpoint and account', () => {
    const key = sessionKeyFor('https://babbel.test/api', 'editor');
    expect(key).toMatch(/^babbel_session_[0-9a-f]{64}$/);
    expect(sessionKeyFor('https://babbel.test/api', 'other')).not.toBe(key);
  });
});
