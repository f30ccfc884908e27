/**
 * In-memory response cache for the undici network session.
 *
 * LRU over at most `maxEntries` entries; bodies larger than
 * `maxEntryBytes` are never stored. Freshness comes from the response's
 * `Cache-Control: max-age` or `Expires` header; responses without one are
 * not cached.
 */

import { DEFAULT_CACHE_MAX_ENTRIES, DEFAULT_CACHE_MAX_ENTRY_BYTES } from '../constants.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { CachedResponse } from './network-session.js';

export interface ResponseCacheOptions {
  /** @default 100 */
  maxEntries?: number;
  /** @default 1MB */
  maxEntryBytes?: number;
  now?: () => number;
}

interface CacheEntry {
  cached: CachedResponse;
  expiresAt: number;
}

function cacheControlDirectives(value: string | undefined): Map<string, string | true> {
  const directives = new Map<string, string | true>();
  if (!value) return directives;
  for (const part of value.split(',')) {
    const [name, argument] = part.trim().split('=');
    if (!name) continue;
    directives.set(name.toLowerCase(), argument === undefined ? true : argument.replace(/^"|"$/g, ''));
  }
  return directives;
}

/**
 * Absolute expiry of `response` in epoch ms, or undefined when it carries
 * no freshness information or forbids storing.
 */
export function freshnessExpiry(response: HttpResponse, now: number): number | undefined {
  const directives = cacheControlDirectives(response.header('cache-control'));
  if (directives.has('no-store') || directives.has('no-cache') || directives.has('private')) return undefined;

  const maxAge = directives.get('max-age');
  if (typeof maxAge === 'string') {
    const seconds = Number.parseInt(maxAge, 10);
    return Number.isNaN(seconds) || seconds <= 0 ? undefined : now + seconds * 1000;
  }

  const expires = response.header('expires');
  if (expires) {
    const date = Date.parse(expires);
    return Number.isNaN(date) || date <= now ? undefined : date;
  }
  return undefined;
}

export class MemoryResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly maxEntryBytes: number;
  private readonly now: () => number;

  constructor(options: ResponseCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.maxEntryBytes = options.maxEntryBytes ?? DEFAULT_CACHE_MAX_ENTRY_BYTES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Only plain GET requests that do not ask to bypass the cache take part.
   */
  static isCacheable(request: HttpRequest): boolean {
    if (request.method !== 'GET' || request.header('range')) return false;
    const directives = cacheControlDirectives(request.header('cache-control'));
    return !directives.has('no-store') && !directives.has('no-cache');
  }

  get(request: HttpRequest): CachedResponse | undefined {
    const key = request.url.href;
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    // LRU: move to end
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.cached;
  }

  /**
   * Stores `cached` under the request URL. Returns false when the response
   * is not storable.
   */
  set(request: HttpRequest, cached: CachedResponse): boolean {
    if (cached.storagePolicy === 'notAllowed' || cached.data.byteLength > this.maxEntryBytes) return false;

    const expiresAt = freshnessExpiry(cached.response, this.now());
    if (expiresAt === undefined) return false;

    const key = request.url.href;
    this.entries.delete(key);
    this.entries.set(key, { cached, expiresAt });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return true;
  }

  clear(): void {
    this.entries.clear();
  }
}
