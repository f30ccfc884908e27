import { inflateSync } from 'node:zlib';
import { describe, it, expect } from 'vitest';
import { unwrap } from '../../src/core/data-response.js';
import { RequestAdaptationError } from '../../src/core/errors.js';
import { JSONEncoding } from '../../src/core/parameter-encoding.js';
import { HttpRequest } from '../../src/core/request.js';
import { DeflateRequestCompressor, DuplicateHeaderError } from '../../src/plugins/compression.js';
import { createMockSession, failureOf } from '../helpers/session.js';

const url = 'https://upload.example.test/logs';
const payload = '{"entries":["one","two","three"]}';

function post(headers: Record<string, string> = {}): HttpRequest {
  return new HttpRequest(url, { method: 'POST', headers, body: payload });
}

function inflated(request: HttpRequest): string {
  if (!request.body) throw new Error('Request has no body');
  return inflateSync(request.body).toString('utf8');
}

describe('DeflateRequestCompressor', () => {
  it('should deflate the body and set Content-Encoding', async () => {
    const adapted = await new DeflateRequestCompressor().adapt(post());

    expect(adapted.header('content-encoding')).toBe('deflate');
    expect(adapted.body?.[0]).toBe(0x78);
    expect(inflated(adapted)).toBe(payload);
  });

  it('should leave requests without a body alone', async () => {
    const request = new HttpRequest(url);

    await expect(new DeflateRequestCompressor().adapt(request)).resolves.toBe(request);
  });

  it('should leave bodies the predicate declines alone', async () => {
    const request = post();
    const compressor = new DeflateRequestCompressor({ shouldCompressBodyData: (body) => body.byteLength > 1024 });

    await expect(compressor.adapt(request)).resolves.toBe(request);
  });

  describe('an existing Content-Encoding header', () => {
    it('should fail by default', async () => {
      const adapting = new DeflateRequestCompressor().adapt(post({ 'Content-Encoding': 'gzip' }));

      await expect(adapting).rejects.toBeInstanceOf(DuplicateHeaderError);
      await expect(adapting).rejects.toThrow('Request already has a Content-Encoding header (gzip).');
    });

    it('should be replaced with replace', async () => {
      const adapted = await new DeflateRequestCompressor({ duplicateHeaderBehavior: 'replace' }).adapt(post({ 'Content-Encoding': 'gzip' }));

      expect(adapted.header('content-encoding')).toBe('deflate');
      expect(inflated(adapted)).toBe(payload);
    });

    it('should skip compression with skip', async () => {
      const request = post({ 'Content-Encoding': 'gzip' });

      await expect(new DeflateRequestCompressor({ duplicateHeaderBehavior: 'skip' }).adapt(request)).resolves.toBe(request);
    });
  });

  it('should compress the body a session sends', async () => {
    const { session, network } = createMockSession({ interceptor: new DeflateRequestCompressor() });
    network.setMockResponse('POST', '/logs', 202, 'accepted');

    const request = session.request(url, { method: 'POST', parameters: { level: 'info' }, encoding: JSONEncoding.default });
    const response = await request.serializingString();

    expect(unwrap(response)).toBe('accepted');
    const sent = network.tasks[0].currentRequest;
    expect(sent.header('content-encoding')).toBe('deflate');
    expect(JSON.parse(inflated(sent))).toEqual({ level: 'info' });
  });

  it('should fail the request when the header is already set', async () => {
    const { session, network } = createMockSession({ interceptor: new DeflateRequestCompressor() });
    network.setMockResponse('POST', '/logs', 202, 'accepted');

    const response = await session
      .request(url, { method: 'POST', headers: { 'Content-Encoding': 'br' }, parameters: { level: 'info' }, encoding: JSONEncoding.default })
      .serializingString();

    const error = failureOf(response);
    expect(error).toBeInstanceOf(RequestAdaptationError);
    expect(error.underlyingError).toBeInstanceOf(DuplicateHeaderError);
    expect(network.getCallCount('POST', '/logs')).toBe(0);
  });
});
