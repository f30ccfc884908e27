/**
 * Top-level shortcuts on the shared default session.
 *
 * @example
 * ```typescript
 * import { request, download } from 'courier-http';
 *
 * const user = await request('https://api.example.com/users/1').validate().serializingJSON();
 * const file = await download('https://example.com/report.pdf').serializingURL();
 * ```
 */

import { Session, type DownloadRequestOptions, type RequestOptions, type RequestTarget, type StreamRequestOptions } from './core/session.js';
import type { DataRequest } from './requests/data-request.js';
import type { DataStreamRequest } from './requests/data-stream-request.js';
import type { DownloadRequest } from './requests/download-request.js';
import type { Uploadable, UploadOptions, UploadRequest } from './requests/upload-request.js';

/**
 * Data request on the default session
 * @example await request('https://api.example.com/users', { parameters: { page: 2 } }).serializingJSON()
 */
export function request(target: RequestTarget, options?: RequestOptions): DataRequest {
  return Session.default.request(target, options);
}

/**
 * Upload request on the default session. POST unless `options.method` says otherwise.
 */
export function upload(target: RequestTarget, uploadable: Uploadable, options?: RequestOptions & UploadOptions): UploadRequest {
  return Session.default.upload(target, uploadable, options);
}

/**
 * Download request on the default session, or a continuation from resume data
 */
export function download(target: RequestTarget | Uint8Array, options?: DownloadRequestOptions): DownloadRequest {
  return Session.default.download(target, options);
}

/**
 * Streaming request on the default session
 */
export function streamRequest(target: RequestTarget, options?: StreamRequestOptions): DataStreamRequest {
  return Session.default.streamRequest(target, options);
}
