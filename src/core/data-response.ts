import type { Result, TaskMetrics } from '../types/index.js';
import type { CourierError } from './errors.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';

interface ResponseSnapshot<T> {
  /** Wire request of the final attempt */
  readonly request?: HttpRequest;
  readonly response?: HttpResponse;
  readonly metrics?: TaskMetrics;
  /** Time spent in the serializer, ms */
  readonly serializationDuration: number;
  readonly result: Result<T, CourierError>;
}

export interface DataResponse<T> extends ResponseSnapshot<T> {
  readonly data?: Uint8Array;
}

export interface DownloadResponse<T> extends ResponseSnapshot<T> {
  readonly fileUrl?: string;
  readonly resumeData?: Uint8Array;
}

export function createDataResponse<T>(init: DataResponse<T>): DataResponse<T> {
  return Object.freeze({ ...init });
}

export function createDownloadResponse<T>(init: DownloadResponse<T>): DownloadResponse<T> {
  return Object.freeze({ ...init });
}

/**
 * Success value, or throws the failure.
 */
export function unwrap<T>(response: { result: Result<T, CourierError> }): T {
  if (response.result.success) return response.result.value;
  throw response.result.error;
}

/**
 * One-line summary used by logs, e.g. `200 GET https://host/path (12ms)`.
 */
export function describeResponse(response: DataResponse<unknown> | DownloadResponse<unknown>): string {
  const method = response.request?.method ?? 'GET';
  const url = response.request?.url.href ?? '(no request)';
  const status = response.response?.status ?? 'ERR';
  const duration = response.metrics ? ` (${Math.round(response.metrics.duration)}ms)` : '';
  const outcome = response.result.success ? '' : ` ${response.result.error.message}`;
  return `${status} ${method} ${url}${duration}${outcome}`;
}
