import { describe, it, expect, vi } from 'vitest';
import { PromptCache, promptCacheKey } from '@/services/promptCache.service';

const TEMPLATE = 'Answer using only the provided documents.';

function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('promptCacheKey', () => {
  it('ignores group order, duplicates and whitespace', () => {
    expect(promptCacheKey(TEMPLATE, ['b', 'a'])).toBe(promptCacheKey(TEMPLATE, ['a', ' b', 'a']));
  });

  it('changes with the group set', () => {
    expect(promptCacheKey(TEMPLATE, ['finance'])).not.toBe(promptCacheKey(TEMPLATE, ['finance', 'legal']));
  });

  it('keeps group names containing separators apart from separate groups', () => {
    expect(promptCacheKey(TEMPLATE, ['a,b'])).not.toBe(promptCacheKey(TEMPLATE, ['a', 'b']));
    expect(promptCacheKey('T|a', [])).not.toBe(promptCacheKey('T', ['a']));
  });

  it('changes with the template', () => {
    expect(promptCacheKey(TEMPLATE, ['finance'])).not.toBe(promptCacheKey(`${TEMPLATE}!`, ['finance']));
  });

  it('is a sha256 hex digest', () => {
    expect(promptCacheKey(TEMPLATE, [])).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('PromptCache', () => {
  it('returns stored payloads frozen', () => {
    const cache = new PromptCache<{ systemPrompt: string }>();
    cache.put('k', { systemPrompt: 'x' });

    const payload = cache.get('k');
    expect(payload).toEqual({ systemPrompt: 'x' });
    expect(Object.isFrozen(payload)).toBe(true);
  });

  it('treats expired entries as absent and evicts them', () => {
    const clock = createClock();
    const cache = new PromptCache<string>({ ttlMs: 1000, now: clock.now });
    cache.put('k', 'artifact');

    clock.advance(999);
    expect(cache.get('k')).toBe('artifact');

    clock.advance(1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('defaults to a 60 minute TTL', () => {
    const clock = createClock();
    const cache = new PromptCache<string>({ now: clock.now });
    cache.put('k', 'artifact');

    clock.advance(59 * 60 * 1000);
    expect(cache.get('k')).toBe('artifact');
    clock.advance(60 * 1000);
    expect(cache.get('k')).toBeUndefined();
  });

  it('builds once and then hits', async () => {
    const cache = new PromptCache<string>();
    const build = vi.fn(async () => 'artifact');

    const first = await cache.getOrBuild('k', build);
    const second = await cache.getOrBuild('k', build);

    expect(first).toEqual({ payload: 'artifact', hit: false });
    expect(second).toEqual({ payload: 'artifact', hit: true });
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('shares one in-flight build between concurrent callers', async () => {
    const cache = new PromptCache<string>();
    let release: (value: string) => void = () => {};
    const build = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );

    const a = cache.getOrBuild('k', build);
    const b = cache.getOrBuild('k', build);
    release('artifact');

    expect(await a).toEqual({ payload: 'artifact', hit: false });
    expect(await b).toEqual({ payload: 'artifact', hit: true });
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('isolates callers with different group sets', async () => {
    const cache = new PromptCache<string>();
    const build = vi.fn(async () => 'artifact');

    await cache.getOrBuild(promptCacheKey(TEMPLATE, ['finance']), build);
    const other = await cache.getOrBuild(promptCacheKey(TEMPLATE, ['legal']), build);

    expect(other.hit).toBe(false);
    expect(build).toHaveBeenCalledTimes(2);
  });

  it('does not cache failed builds', async () => {
    const cache = new PromptCache<string>();
    const build = vi.fn().mockRejectedValueOnce(new Error('template unavailable')).mockResolvedValueOnce('artifact');

    await expect(cache.getOrBuild('k', build)).rejects.toThrow('template unavailable');
    await expect(cache.getOrBuild('k', build)).resolves.toEqual({ payload: 'artifact', hit: false });
  });
});
