import type { CachedResponse, SessionTask } from '../transport/network-session.js';

/**
 * Decides whether, and in what form, a response is stored in the network
 * session's response cache. Return null to skip caching.
 */
export interface CachedResponseHandler {
  dataTaskWillCacheResponse(
    task: SessionTask,
    response: CachedResponse
  ): CachedResponse | null | Promise<CachedResponse | null>;
}

export type CacheModifier = (
  task: SessionTask,
  response: CachedResponse
) => CachedResponse | null | Promise<CachedResponse | null>;

export type CacheBehavior =
  | { kind: 'cache' }
  | { kind: 'doNotCache' }
  | { kind: 'modify'; modifier: CacheModifier };

export class ResponseCacher implements CachedResponseHandler {
  static readonly cache = new ResponseCacher({ kind: 'cache' });
  static readonly doNotCache = new ResponseCacher({ kind: 'doNotCache' });

  static modify(modifier: CacheModifier): ResponseCacher {
    return new ResponseCacher({ kind: 'modify', modifier });
  }

  constructor(readonly behavior: CacheBehavior) {}

  dataTaskWillCacheResponse(task: SessionTask, response: CachedResponse): CachedResponse | null | Promise<CachedResponse | null> {
    switch (this.behavior.kind) {
      case 'cache':
        return response;
      case 'doNotCache':
        return null;
      case 'modify':
        return this.behavior.modifier(task, response);
    }
  }
}
