import { describe, it, expect, vi } from 'vitest';
import { LoggingEventMonitor } from '../../src/events/logging-monitor.js';
import type { Logger } from '../../src/types/logger.js';
import { createMockSession } from '../helpers/session.js';

const baseUrl = 'https://api.example.test';

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('LoggingEventMonitor', () => {
  it('should log the request with sensitive headers masked', async () => {
    const logger = recordingLogger();
    const { session, network } = createMockSession({ eventMonitors: [new LoggingEventMonitor(logger, { showHeaders: true })] });
    network.setMockResponse('GET', '/users', 200, 'ok');

    const request = session.request(`${baseUrl}/users`, {
      headers: { Authorization: 'Bearer test-token', Accept: 'text/plain' },
    });
    await request.serializingString();

    await vi.waitFor(() => {
      expect(logger.debug).toHaveBeenCalledWith(
        {
          type: 'request',
          id: request.id,
          method: 'GET',
          url: `${baseUrl}/users`,
          headers: { accept: 'text/plain', authorization: '[REDACTED]' },
        },
        `→ GET ${baseUrl}/users`
      );
    });
  });

  it('should log a parsed response at the chosen level', async () => {
    const logger = recordingLogger();
    const { session, network } = createMockSession({ eventMonitors: [new LoggingEventMonitor(logger, { level: 'info' })] });
    network.setMockResponse('GET', '/users', 200, 'ok');

    const request = session.request(`${baseUrl}/users`);
    await request.serializingString();

    await vi.waitFor(() => {
      expect(logger.info).toHaveBeenCalledWith(
        { type: 'response', id: request.id, status: 200, duration: 1 },
        `← 200 GET ${baseUrl}/users (1ms)`
      );
    });
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('should log failures as errors', async () => {
    const logger = recordingLogger();
    const { session, network } = createMockSession({ eventMonitors: [new LoggingEventMonitor(logger)] });
    network.setMockResponse('GET', '/missing', 404, 'nope');

    const request = session.request(`${baseUrl}/missing`).validate();
    await request.serializingString();

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith(
        { type: 'response', id: request.id, status: 404, duration: 1 },
        `✖ 404 GET ${baseUrl}/missing (1ms) Response validation failed: unacceptable status code 404.`
      );
    });
  });
});
