import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ExplicitlyCancelledError,
  ResponseSerializationError,
  ResponseValidationError,
} from '../../src/core/errors.js';
import type { EventMonitor } from '../../src/events/event-monitor.js';
import type { Stream, StreamEvent } from '../../src/requests/data-stream-request.js';
import { immediateExecutor } from '../../src/utils/executor.js';
import { createMockSession } from '../helpers/session.js';

const baseUrl = 'https://stream.example.test';

function recorder<T>(onStream?: (stream: Stream<T>) => void): { events: StreamEvent<T>[]; handler: (stream: Stream<T>) => void } {
  const events: StreamEvent<T>[] = [];
  return {
    events,
    handler: (stream) => {
      events.push(stream.event);
      if (stream.event.kind === 'stream') onStream?.(stream);
    },
  };
}

function values<T>(events: StreamEvent<T>[]): T[] {
  const collected: T[] = [];
  for (const event of events) {
    if (event.kind === 'stream' && event.result.success) collected.push(event.result.value);
  }
  return collected;
}

function completionOf<T>(events: StreamEvent<T>[]) {
  const last = events.at(-1);
  if (last?.kind !== 'complete') throw new Error('Stream did not complete');
  return last.completion;
}

describe('DataStreamRequest', () => {
  it('should deliver chunks in order followed by one completion', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/events', 200, '', { 'content-type': 'text/plain' }, { chunks: ['a', 'b', 'c'] });
    const { events, handler } = recorder<string>();

    const request = session.streamRequest(`${baseUrl}/events`).responseStreamString(handler);
    await request.whenFinished();

    expect(values(events)).toEqual(['a', 'b', 'c']);
    expect(events.filter((event) => event.kind === 'complete')).toHaveLength(1);
    const completion = completionOf(events);
    expect(completion.error).toBeUndefined();
    expect(completion.response?.status).toBe(200);
    expect(completion.request?.url.href).toBe(`${baseUrl}/events`);
    expect(request.state).toBe('finished');
  });

  it('should hold back a character split across chunks', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/euro', 200, '', {}, { chunks: [new Uint8Array([0xe2, 0x82]), new Uint8Array([0xac])] });
    const { events, handler } = recorder<string>();

    await session.streamRequest(`${baseUrl}/euro`).responseStreamString(handler).whenFinished();

    expect(values(events)).toEqual(['', '€']);
  });

  it('should hand raw chunks to an unparsed stream without buffering them', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/bytes', 200, '', {}, { chunks: [new Uint8Array([1, 2]), new Uint8Array([3])] });
    const { events, handler } = recorder<Uint8Array>();

    const request = session.streamRequest(`${baseUrl}/bytes`).responseStream(handler);
    await request.whenFinished();

    expect(values(events).map((chunk) => [...chunk])).toEqual([[1, 2], [3]]);
    expect(request.currentTaskDelegate.kind).toBe('stream');
  });

  it('should fan every chunk out to each attached handler', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/events', 200, '', {}, { chunks: ['x', 'y'] });
    const first = recorder<string>();
    const second = recorder<Uint8Array>();

    await session
      .streamRequest(`${baseUrl}/events`)
      .responseStreamString(first.handler)
      .responseStream(second.handler)
      .whenFinished();

    expect(values(first.events)).toEqual(['x', 'y']);
    expect(values(second.events)).toHaveLength(2);
    expect(completionOf(first.events).error).toBeUndefined();
    expect(completionOf(second.events).error).toBeUndefined();
  });

  it('should report a chunk that fails to decode and keep streaming', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/items', 200, '', {}, { chunks: ['{"id":1}', '{"id":"two"}', '{"id":3}'] });
    const { events, handler } = recorder<{ id: number }>();

    const request = session.streamRequest(`${baseUrl}/items`).responseStreamDecodable(z.object({ id: z.number() }), handler);
    await request.whenFinished();

    expect(values(events)).toEqual([{ id: 1 }, { id: 3 }]);
    const failed = events[1];
    if (failed.kind !== 'stream' || failed.result.success) throw new Error('Expected a failed chunk');
    expect(failed.result.error).toBeInstanceOf(ResponseSerializationError);
    expect(failed.result.error instanceof ResponseSerializationError && failed.result.error.reason.kind).toBe('decodingFailed');
    expect(completionOf(events).error).toBeUndefined();
    expect(request.state).toBe('finished');
  });

  it('should cancel on the first failed chunk when asked to', async () => {
    const { session, network } = createMockSession({ serializationQueue: immediateExecutor });
    network.setMockResponse('GET', '/items', 200, '', {}, { chunks: ['{"id":"one"}', '{"id":2}'] });
    const { events, handler } = recorder<{ id: number }>();

    const request = session
      .streamRequest(`${baseUrl}/items`, { automaticallyCancelOnStreamError: true })
      .responseStreamDecodable(z.object({ id: z.number() }), handler, { queue: immediateExecutor });
    await request.whenFinished();

    expect(events).toHaveLength(2);
    expect(events[0].kind === 'stream' && events[0].result.success).toBe(false);
    expect(completionOf(events).error).toBeInstanceOf(ExplicitlyCancelledError);
    expect(request.state).toBe('cancelled');
    expect(network.tasks[0].cancelCalls).toBe(1);
  });

  it('should fail and cancel the request when a handler throws', async () => {
    const { session, network } = createMockSession({ serializationQueue: immediateExecutor });
    network.setMockResponse('GET', '/events', 200, '', {}, { chunks: ['a', 'b'] });
    const { events, handler } = recorder<string>(() => {
      throw new Error('boom');
    });

    const request = session.streamRequest(`${baseUrl}/events`).responseStreamString(handler, { queue: immediateExecutor });
    await request.whenFinished();

    expect(values(events)).toEqual(['a']);
    const error = completionOf(events).error;
    expect(error).toBeInstanceOf(ResponseSerializationError);
    expect(error?.message).toBe('Response could not be serialized: boom');
    expect(request.error).toBe(error);
    expect(request.state).toBe('cancelled');
  });

  it('should stop when a handler cancels through its stream', async () => {
    const { session, network } = createMockSession({ serializationQueue: immediateExecutor });
    network.setMockResponse('GET', '/events', 200, '', {}, { chunks: ['a', 'b', 'c'] });
    const { events, handler } = recorder<string>((stream) => stream.cancel());

    const request = session.streamRequest(`${baseUrl}/events`).responseStreamString(handler, { queue: immediateExecutor });
    await request.whenFinished();

    expect(values(events)).toEqual(['a']);
    expect(completionOf(events).error).toBeInstanceOf(ExplicitlyCancelledError);
  });

  describe('onHTTPResponse', () => {
    it('should see the response head before any chunk', async () => {
      const { session, network } = createMockSession();
      network.setMockResponse('GET', '/events', 200, '', { 'x-stream': 'on' }, { chunks: ['a'] });
      const order: string[] = [];

      await session
        .streamRequest(`${baseUrl}/events`)
        .onHTTPResponse((response) => {
          order.push(`head:${response.header('x-stream') ?? ''}`);
        })
        .responseStreamString((stream) => {
          order.push(stream.event.kind === 'stream' ? 'chunk' : 'complete');
        })
        .whenFinished();

      expect(order).toEqual(['head:on', 'chunk', 'complete']);
    });

    it('should drop the body and cancel when the response is refused', async () => {
      const { session, network } = createMockSession({ serializationQueue: immediateExecutor });
      network.setMockResponse('GET', '/events', 404, '', {}, { chunks: ['not', 'found'] });
      const { events, handler } = recorder<string>();

      const request = session
        .streamRequest(`${baseUrl}/events`)
        .onHTTPResponse((response) => (response.status === 404 ? 'cancel' : 'allow'), { queue: immediateExecutor })
        .responseStreamString(handler, { queue: immediateExecutor });
      await request.whenFinished();

      expect(values(events)).toEqual([]);
      expect(completionOf(events).error).toBeInstanceOf(ExplicitlyCancelledError);
      expect(request.state).toBe('cancelled');
    });
  });

  describe('validation', () => {
    it('should fail the completion on an unacceptable status code after streaming the body', async () => {
      const { session, network } = createMockSession();
      network.setMockResponse('GET', '/events', 503, '', { 'content-type': 'text/plain' }, { chunks: ['busy'] });
      const { events, handler } = recorder<string>();

      await session.streamRequest(`${baseUrl}/events`).validate().responseStreamString(handler).whenFinished();

      expect(values(events)).toEqual(['busy']);
      const error = completionOf(events).error;
      expect(error).toBeInstanceOf(ResponseValidationError);
      expect(error?.message).toBe('Response validation failed: unacceptable status code 503.');
    });

    it('should check the content type against the Accept header', async () => {
      const { session, network } = createMockSession();
      network.setMockResponse('GET', '/events', 200, '', { 'content-type': 'text/html' }, { chunks: ['<p>'] });
      const { events, handler } = recorder<string>();

      await session
        .streamRequest(`${baseUrl}/events`, { headers: { Accept: 'text/event-stream' } })
        .validate()
        .responseStreamString(handler)
        .whenFinished();

      expect(completionOf(events).error?.message).toBe(
        'Response validation failed: unacceptable content type "text/html", expected one of text/event-stream.'
      );
    });

    it('should skip validators once an error is latched', async () => {
      const { session, network } = createMockSession({ serializationQueue: immediateExecutor });
      network.setMockResponse('GET', '/events', 200, '', {}, { chunks: ['a', 'b'] });
      let validated = 0;

      const request = session
        .streamRequest(`${baseUrl}/events`)
        .validate(() => {
          validated += 1;
          return { success: true, value: undefined };
        })
        .responseStreamString(
          () => {
            throw new Error('stop');
          },
          { queue: immediateExecutor }
        );
      await request.whenFinished();

      expect(validated).toBe(0);
      expect(request.error?.message).toBe('Response could not be serialized: stop');
    });
  });

  it('should expose the body as a readable that ends with the request', async () => {
    const { session, network } = createMockSession();
    network.setMockResponse('GET', '/file', 200, '', {}, { chunks: ['hello ', 'world'] });

    const request = session.streamRequest(`${baseUrl}/file`);
    const readable = request.asReadable();
    const parts: Buffer[] = [];
    for await (const chunk of readable) {
      parts.push(Buffer.from(chunk));
    }
    await request.whenFinished();

    expect(Buffer.concat(parts).toString('utf8')).toBe('hello world');
    expect(request.error).toBeUndefined();
    expect(request.state).toBe('finished');
  });

  it('should report every parsed chunk to event monitors', async () => {
    const parsed: boolean[] = [];
    const monitor: EventMonitor = {
      queue: immediateExecutor,
      requestDidParseStream: (_request, result) => parsed.push(result.success),
    };
    const { session, network } = createMockSession({ eventMonitors: [monitor] });
    network.setMockResponse('GET', '/items', 200, '', {}, { chunks: ['{"id":1}', 'oops'] });

    await session
      .streamRequest(`${baseUrl}/items`)
      .responseStreamDecodable(z.object({ id: z.number() }), () => undefined)
      .whenFinished();

    expect(parsed).toEqual([true, false]);
  });
});
