/**
 * Request body compression
 * Deflates request bodies and marks them with `Content-Encoding: deflate`
 */

import { deflate } from 'node:zlib';
import { promisify } from 'node:util';
import type { HttpRequest } from '../core/request.js';
import type { RequestAdapterState, RequestInterceptor } from './interceptor.js';

const deflateAsync = promisify(deflate);

/**
 * What to do with a request that already carries a Content-Encoding header
 */
export type DuplicateHeaderBehavior = 'error' | 'replace' | 'skip';

export class DuplicateHeaderError extends Error {
  constructor(readonly value: string) {
    super(`Request already has a Content-Encoding header (${value}).`);
    this.name = 'DuplicateHeaderError';
  }
}

export interface DeflateRequestCompressorOptions {
  /** Default 'error' */
  duplicateHeaderBehavior?: DuplicateHeaderBehavior;
  /** Decides per body whether to compress. Defaults to always */
  shouldCompressBodyData?: (body: Uint8Array) => boolean;
}

/**
 * Adapter compressing the request body with zlib deflate. Requests without
 * a body, and upload bodies, are left alone.
 *
 * @example
 * ```typescript
 * const session = new Session({
 *   interceptor: new DeflateRequestCompressor({ shouldCompressBodyData: (body) => body.byteLength > 1024 })
 * });
 * ```
 */
export class DeflateRequestCompressor implements RequestInterceptor {
  readonly duplicateHeaderBehavior: DuplicateHeaderBehavior;
  readonly shouldCompressBodyData: (body: Uint8Array) => boolean;

  constructor(options: DeflateRequestCompressorOptions = {}) {
    this.duplicateHeaderBehavior = options.duplicateHeaderBehavior ?? 'error';
    this.shouldCompressBodyData = options.shouldCompressBodyData ?? (() => true);
  }

  async adapt(request: HttpRequest, _state?: RequestAdapterState): Promise<HttpRequest> {
    const body = request.body;
    if (!body || !this.shouldCompressBodyData(body)) return request;

    const existing = request.header('content-encoding');
    if (existing !== undefined) {
      switch (this.duplicateHeaderBehavior) {
        case 'error':
          throw new DuplicateHeaderError(existing);
        case 'skip':
          return request;
        case 'replace':
          break;
      }
    }

    const compressed = await deflateAsync(body);
    return request
      .withBody(new Uint8Array(compressed))
      .withHeader('Content-Encoding', 'deflate');
  }
}
