/**
 * Prompt Cache
 *
 * Process-local cache for prompt artifacts, keyed by template content
 * and the caller's sorted group set, so an artifact built under one
 * authorization scope is never served to a caller with another.
 *
 * Expired entries are treated as absent and evicted on read. Entries are
 * frozen and only ever replaced whole. Concurrent builders for one key
 * share a single in-flight build.
 */

import { sha256Hex } from '@/utils/crypto';

export const DEFAULT_PROMPT_CACHE_TTL_MS = 60 * 60 * 1000;

interface CacheEntry<T> {
  readonly payload: Readonly<T>;
  readonly storedAt: number;
}

export interface PromptCacheOptions {
  ttlMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

export function promptCacheKey(template: string, groups: readonly string[]): string {
  const scope = [...new Set(groups.map((g) => g.trim()).filter(Boolean))].sort();
  return sha256Hex(JSON.stringify([template, scope]));
}

export class PromptCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<Readonly<T>>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: PromptCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_PROMPT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get(key: string): Readonly<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.payload;
  }

  put(key: string, payload: T): Readonly<T> {
    const frozen = Object.freeze(payload);
    this.entries.set(key, Object.freeze({ payload: frozen, storedAt: this.now() }));
    return frozen;
  }

  /**
   * Return the cached payload, or build and store it. Callers that miss
   * while a build for the same key is running await that build.
   */
  async getOrBuild(key: string, build: () => Promise<T>): Promise<{ payload: Readonly<T>; hit: boolean }> {
    const cached = this.get(key);
    if (cached !== undefined) return { payload: cached, hit: true };

    const pending = this.inFlight.get(key);
    if (pending) return { payload: await pending, hit: true };

    const promise = build().then((payload) => this.put(key, payload));
    this.inFlight.set(key, promise);
    try {
      return { payload: await promise, hit: false };
    } finally {
      this.inFlight.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }
}
