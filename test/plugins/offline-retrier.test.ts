import { describe, it, expect, vi } from 'vitest';
import { unwrap } from '../../src/core/data-response.js';
import { RequestRetryFailedError, SessionTaskError } from '../../src/core/errors.js';
import {
  DnsConnectivityMonitor,
  isOfflineError,
  OfflineRetrier,
  type ConnectivityMonitor,
} from '../../src/plugins/offline-retrier.js';
import { createMockSession, failureOf } from '../helpers/session.js';

const baseUrl = 'https://feed.example.test';

class FakeMonitor implements ConnectivityMonitor {
  started = 0;
  stopped = 0;
  private onAvailable?: () => void;

  constructor(private readonly availableOnStart = false) {}

  start(onAvailable: () => void): void {
    this.started += 1;
    this.onAvailable = onAvailable;
    if (this.availableOnStart) setImmediate(onAvailable);
  }

  stop(): void {
    this.stopped += 1;
  }

  reportAvailable(): void {
    this.onAvailable?.();
  }
}

function offline(): SessionTaskError {
  return new SessionTaskError('Network is unreachable', { code: 'ENETUNREACH' });
}

function retrierWith(availableOnStart: boolean, options: { maximumWait?: number } = {}) {
  const monitors: FakeMonitor[] = [];
  const retrier = new OfflineRetrier({
    ...options,
    monitor: () => {
      const monitor = new FakeMonitor(availableOnStart);
      monitors.push(monitor);
      return monitor;
    },
  });
  return { retrier, monitors };
}

describe('OfflineRetrier', () => {
  it('should retry once the network is back', async () => {
    const { retrier, monitors } = retrierWith(true);
    const { session, network } = createMockSession({ interceptor: retrier });
    network.setMockError('GET', '/feed', offline(), { times: 1 });
    network.setMockResponse('GET', '/feed', 200, 'fresh');

    const request = session.request(`${baseUrl}/feed`);
    const response = await request.serializingString();

    expect(unwrap(response)).toBe('fresh');
    expect(request.retryCount).toBe(1);
    expect(monitors).toHaveLength(1);
    expect(monitors[0].started).toBe(1);
    expect(monitors[0].stopped).toBe(1);
    expect(retrier.pendingRequests).toBe(0);
  });

  it('should fail with the original error when the network stays down', async () => {
    const { retrier, monitors } = retrierWith(false, { maximumWait: 20 });
    const { session, network } = createMockSession({ interceptor: retrier });
    network.setMockError('GET', '/feed', offline());

    const request = session.request(`${baseUrl}/feed`);
    const response = await request.serializingString();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(SessionTaskError);
    expect(error instanceof SessionTaskError && error.code).toBe('ENETUNREACH');
    expect(request.retryCount).toBe(0);
    expect(monitors[0].stopped).toBe(1);
  });

  it('should share one monitor between every waiting request', async () => {
    const { retrier, monitors } = retrierWith(false);
    const { session, network } = createMockSession({ interceptor: retrier });
    network.setMockError('GET', '/a', offline(), { times: 1 });
    network.setMockResponse('GET', '/a', 200, 'a');
    network.setMockError('GET', '/b', offline(), { times: 1 });
    network.setMockResponse('GET', '/b', 200, 'b');

    const first = session.request(`${baseUrl}/a`).serializingString();
    const second = session.request(`${baseUrl}/b`).serializingString();
    await vi.waitFor(() => expect(retrier.pendingRequests).toBe(2));
    monitors[0].reportAvailable();

    expect(unwrap(await first)).toBe('a');
    expect(unwrap(await second)).toBe('b');
    expect(monitors).toHaveLength(1);
  });

  it('should not hold other failures', async () => {
    const { retrier, monitors } = retrierWith(true);
    const { session, network } = createMockSession({ interceptor: retrier });
    network.setMockError('GET', '/feed', new SessionTaskError('Connection reset', { code: 'ECONNRESET' }));

    const response = await session.request(`${baseUrl}/feed`).serializingString();

    expect(failureOf(response).message).toBe('Connection reset');
    expect(monitors).toHaveLength(0);
  });

  it('should fail the request when the monitor cannot start', async () => {
    const retrier = new OfflineRetrier({
      monitor: () => ({
        start: () => {
          throw new Error('no monitor');
        },
        stop: () => undefined,
      }),
    });
    const { session, network } = createMockSession({ interceptor: retrier });
    network.setMockError('GET', '/feed', offline());

    const response = await session.request(`${baseUrl}/feed`).serializingString();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(RequestRetryFailedError);
    expect(error.message).toBe('Request retry failed with retry error: no monitor, original error: Network is unreachable');
    expect(retrier.pendingRequests).toBe(0);
  });
});

describe('isOfflineError', () => {
  it('should recognise unreachable networks by transport code', () => {
    expect(isOfflineError(offline())).toBe(true);
    expect(isOfflineError(Object.assign(new Error('getaddrinfo EAI_AGAIN'), { code: 'EAI_AGAIN' }))).toBe(true);
    expect(isOfflineError(new SessionTaskError('refused', { code: 'ECONNREFUSED' }))).toBe(false);
    expect(isOfflineError(new Error('plain'))).toBe(false);
  });
});

describe('DnsConnectivityMonitor', () => {
  it('should report once the first lookup succeeds and stop polling', async () => {
    const resolve = vi
      .fn<(hostname: string) => Promise<unknown>>()
      .mockRejectedValueOnce(new Error('EAI_AGAIN'))
      .mockRejectedValueOnce(new Error('EAI_AGAIN'))
      .mockResolvedValue({ address: '192.0.2.1', family: 4 });
    const onAvailable = vi.fn();
    const monitor = new DnsConnectivityMonitor('feed.example.test', 1, resolve);

    monitor.start(onAvailable);
    await vi.waitFor(() => expect(onAvailable).toHaveBeenCalledTimes(1));
    const lookups = resolve.mock.calls.length;
    await new Promise((done) => setTimeout(done, 10));

    expect(resolve).toHaveBeenCalledWith('feed.example.test');
    expect(lookups).toBeGreaterThanOrEqual(3);
    expect(resolve.mock.calls.length).toBe(lookups);
    expect(onAvailable).toHaveBeenCalledTimes(1);
  });
});
