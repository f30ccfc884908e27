import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Headers, MockAgent } from 'undici';
import { unwrap } from '../../src/core/data-response.js';
import { HttpRequest } from '../../src/core/request.js';
import { HttpResponse } from '../../src/core/response.js';
import { Session } from '../../src/core/session.js';
import { ResponseCacher } from '../../src/plugins/cached-response.js';
import { Redirector } from '../../src/plugins/redirect.js';
import { UndiciNetworkSession } from '../../src/transport/undici-session.js';
import { silentLogger } from '../../src/types/logger.js';
import { MockNetworkSession, MockTask } from '../helpers/mock-network-session.js';

const origin = 'https://api.example.test';

describe('Redirector', () => {
  const task = new MockTask(new MockNetworkSession(), 'data', new HttpRequest(`${origin}/old`));
  const next = new HttpRequest(`${origin}/new`);
  const response = new HttpResponse({ url: `${origin}/old`, status: 302, headers: { location: '/new' } });

  it('should follow or stop', () => {
    expect(Redirector.follow.taskWillBeRedirected(task, next, response)).toBe(next);
    expect(Redirector.doNotFollow.taskWillBeRedirected(task, next, response)).toBeNull();
  });

  it('should hand the redirect to a modifier', async () => {
    const redirector = Redirector.modify((_task, request) => request.withHeader('X-Redirected', '1'));

    const modified = await redirector.taskWillBeRedirected(task, next, response);

    expect(modified?.header('x-redirected')).toBe('1');
  });
});

describe('ResponseCacher', () => {
  const task = new MockTask(new MockNetworkSession(), 'data', new HttpRequest(`${origin}/data`));
  const cached = {
    response: new HttpResponse({ url: `${origin}/data`, status: 200 }),
    data: new TextEncoder().encode('body'),
    storagePolicy: 'allowed' as const,
  };

  it('should cache, skip or modify', async () => {
    expect(ResponseCacher.cache.dataTaskWillCacheResponse(task, cached)).toBe(cached);
    expect(ResponseCacher.doNotCache.dataTaskWillCacheResponse(task, cached)).toBeNull();
    expect(await ResponseCacher.modify((_task, proposed) => ({ ...proposed, storagePolicy: 'notAllowed' })).dataTaskWillCacheResponse(task, cached)).toEqual({
      ...cached,
      storagePolicy: 'notAllowed',
    });
  });
});

describe('handlers on a live session', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  function createSession(options: { cache?: boolean } = {}): Session {
    const networkSession = new UndiciNetworkSession({ logger: silentLogger, dispatcher: mockAgent, cache: options.cache });
    return new Session({ networkSession, logger: silentLogger });
  }

  it('should send what the redirect modifier returns', async () => {
    const pool = mockAgent.get(origin);
    let marker: string | null = null;
    pool.intercept({ path: '/old', method: 'GET' }).reply(302, '', { headers: { location: '/new' } });
    pool.intercept({ path: '/new', method: 'GET' }).reply((options) => {
      marker = new Headers(options.headers).get('x-redirected');
      return { statusCode: 200, data: 'arrived' };
    });

    const response = await createSession()
      .request(`${origin}/old`)
      .redirect(Redirector.modify((_task, request) => request.withHeader('X-Redirected', 'yes')))
      .serializingString();

    expect(unwrap(response)).toBe('arrived');
    expect(marker).toBe('yes');
  });

  it('should keep a response out of the cache when the cacher declines', async () => {
    const pool = mockAgent.get(origin);
    pool.intercept({ path: '/config', method: 'GET' }).reply(200, 'v1', { headers: { 'cache-control': 'max-age=60' } });
    pool.intercept({ path: '/config', method: 'GET' }).reply(200, 'v2', { headers: { 'cache-control': 'max-age=60' } });
    const session = createSession({ cache: true });

    await session.request(`${origin}/config`).cacheResponse(ResponseCacher.doNotCache).serializingString();
    const second = await session.request(`${origin}/config`).serializingString();

    expect(unwrap(second)).toBe('v2');
    expect(second.metrics?.fromCache).toBe(false);
  });
});
