import { describe, it, expect, vi } from 'vitest';
import { CompositeEventMonitor, type EventMonitor } from '../../src/events/event-monitor.js';
import { HttpRequest } from '../../src/core/request.js';
import { immediateExecutor } from '../../src/utils/executor.js';
import { silentLogger } from '../../src/types/logger.js';
import { createMockSession, flushImmediates } from '../helpers/session.js';

describe('CompositeEventMonitor', () => {
  const urlRequest = new HttpRequest('https://api.example.test/');

  async function request() {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/', 200, 'ok');
    const request = session.request('https://api.example.test/');
    await request.serializingString();
    return request;
  }

  it('should deliver on the monitor queue', async () => {
    const seen: string[] = [];
    const immediate: EventMonitor = { queue: immediateExecutor, requestDidCreateURLRequest: () => seen.push('immediate') };
    const deferred: EventMonitor = { requestDidCreateURLRequest: () => seen.push('deferred') };
    const composite = new CompositeEventMonitor([deferred, immediate], silentLogger);

    composite.emit('requestDidCreateURLRequest', await request(), urlRequest);

    expect(seen).toEqual(['immediate']);
    await flushImmediates();
    expect(seen).toEqual(['immediate', 'deferred']);
  });

  it('should keep notifying after a monitor throws', async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const after = vi.fn();
    const composite = new CompositeEventMonitor(
      [
        {
          queue: immediateExecutor,
          requestDidCancel: () => {
            throw new Error('monitor bug');
          },
        },
        { queue: immediateExecutor, requestDidCancel: after },
      ],
      logger
    );

    composite.emit('requestDidCancel', await request());

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Event monitor failed handling requestDidCancel: monitor bug');
  });

  it('should skip monitors without a handler for the event', async () => {
    const finished = vi.fn();
    const composite = new CompositeEventMonitor(
      [{ queue: immediateExecutor }, { queue: immediateExecutor, requestDidFinish: finished }],
      silentLogger
    );

    composite.emit('requestDidFinish', await request());

    expect(finished).toHaveBeenCalledTimes(1);
  });
});
