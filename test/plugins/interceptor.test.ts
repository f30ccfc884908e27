import { describe, it, expect } from 'vitest';
import type { HttpRequest } from '../../src/core/request.js';
import { Adapter, Interceptor, Retrier, RetryResult, retryDelayMs, retryRequired } from '../../src/plugins/interceptor.js';
import { createMockSession } from '../helpers/session.js';

const baseUrl = 'https://api.example.test';

function tag(value: string): Adapter {
  return new Adapter((request: HttpRequest) => {
    const previous = request.header('x-chain');
    return request.withHeader('X-Chain', previous ? `${previous}>${value}` : value);
  });
}

async function finishedRequest() {
  const { session, network } = createMockSession();
  network.setMockResponse('GET', '/ok', 200, 'ok');
  const request = session.request(`${baseUrl}/ok`);
  await request.serializingString();
  return { session, request };
}

describe('Interceptor', () => {
  it('should run adapters in order on the previous output', async () => {
    const { session } = createMockSession();
    const interceptor = new Interceptor({ adapters: [tag('a'), tag('b')], interceptors: [tag('c')] });
    const { request } = await finishedRequest();
    const initial = request.request;
    if (!initial) return expect.unreachable('request should have a wire request');

    const adapted = await interceptor.adapt(initial, { requestId: request.id, session });

    expect(adapted.header('x-chain')).toBe('a>b>c');
  });

  it('should stop at the first failing adapter', async () => {
    const { session } = createMockSession();
    let reached = false;
    const interceptor = new Interceptor({
      adapters: [
        new Adapter(() => {
          throw new Error('no token');
        }),
        new Adapter((request) => {
          reached = true;
          return request;
        }),
      ],
    });
    const { request } = await finishedRequest();
    const initial = request.request;
    if (!initial) return expect.unreachable('request should have a wire request');

    await expect(interceptor.adapt(initial, { requestId: request.id, session })).rejects.toThrow('no token');
    expect(reached).toBe(false);
  });

  it('should take the first retry answer other than doNotRetry', async () => {
    const { session, request } = await finishedRequest();
    const asked: string[] = [];
    const interceptor = new Interceptor({
      retriers: [
        new Retrier(() => {
          asked.push('first');
          return RetryResult.doNotRetry;
        }),
        new Retrier(() => {
          asked.push('second');
          return RetryResult.retryWithDelay(3);
        }),
        new Retrier(() => {
          asked.push('third');
          return RetryResult.retry;
        }),
      ],
    });

    expect(await interceptor.retry(request, session, new Error('failed'))).toEqual({ kind: 'retryWithDelay', delay: 3 });
    expect(asked).toEqual(['first', 'second']);
  });

  it('should not retry when no retrier wants to', async () => {
    const { session, request } = await finishedRequest();

    expect(await new Interceptor().retry(request, session, new Error('failed'))).toEqual({ kind: 'doNotRetry' });
  });

  it('should combine only the interceptors present', () => {
    const only = tag('a');

    expect(Interceptor.combine(undefined, undefined)).toBeUndefined();
    expect(Interceptor.combine(undefined, only)).toBe(only);
    expect(Interceptor.combine(only, tag('b'))).toBeInstanceOf(Interceptor);
  });
});

describe('RetryResult', () => {
  it('should tell retries apart', () => {
    expect(retryRequired(RetryResult.retry)).toBe(true);
    expect(retryRequired(RetryResult.retryWithDelay(1))).toBe(true);
    expect(retryRequired(RetryResult.doNotRetry)).toBe(false);
    expect(retryRequired(RetryResult.doNotRetryWithError(new Error('stop')))).toBe(false);
  });

  it('should convert delays to milliseconds', () => {
    expect(retryDelayMs(RetryResult.retryWithDelay(1.5))).toBe(1500);
    expect(retryDelayMs(RetryResult.retryWithDelay(-2))).toBe(0);
    expect(retryDelayMs(RetryResult.retry)).toBe(0);
  });
});
