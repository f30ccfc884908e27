import {
  DEFAULT_EXPONENTIAL_BACKOFF_BASE,
  DEFAULT_EXPONENTIAL_BACKOFF_SCALE,
  DEFAULT_RETRY_LIMIT,
} from '../constants.js';
import { CourierError, SessionTaskError, TimeoutError } from '../core/errors.js';
import type { Session } from '../core/session.js';
import type { Request } from '../requests/request.js';
import type { Method } from '../types/index.js';
import { RetryResult, type RequestInterceptor } from './interceptor.js';
import { parseRetryAfter, retryAfterSeconds } from './site-maintenance.js';

export const DEFAULT_RETRYABLE_METHODS: ReadonlySet<Method> = new Set(['DELETE', 'GET', 'HEAD', 'OPTIONS', 'PUT', 'TRACE']);

export const DEFAULT_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504]);

/**
 * Transport error codes worth another attempt: dropped or refused
 * connections, DNS hiccups and timeouts.
 */
export const DEFAULT_RETRYABLE_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export interface RetryPolicyOptions {
  /** Retries after the first attempt. Default 2 */
  retryLimit?: number;
  /** Default 2 */
  exponentialBackoffBase?: number;
  /** Seconds. Default 0.5 */
  exponentialBackoffScale?: number;
  retryableHTTPMethods?: Iterable<Method>;
  retryableHTTPStatusCodes?: Iterable<number>;
  retryableErrorCodes?: Iterable<string>;
  /** Use the response's Retry-After header as the delay. Default true */
  respectRetryAfter?: boolean;
}

/**
 * Transport error code of a failed attempt, when it has one.
 */
export function transportErrorCode(error: Error): string | undefined {
  if (error instanceof SessionTaskError && error.code) return error.code;
  if (error instanceof TimeoutError) return 'ETIMEDOUT';

  const cause = error instanceof CourierError ? error.underlyingError : error;
  if (cause && 'code' in cause && typeof cause.code === 'string') return cause.code;
  return undefined;
}

/**
 * Retrier with exponential backoff. An attempt is retried while the retry
 * count is under the limit, the method is idempotent and either the status
 * code or the transport error code is retryable. The delay before retry n
 * (0-based) is `base ^ n * scale` seconds.
 */
export class RetryPolicy implements RequestInterceptor {
  readonly retryLimit: number;
  readonly exponentialBackoffBase: number;
  readonly exponentialBackoffScale: number;
  readonly retryableHTTPMethods: ReadonlySet<Method>;
  readonly retryableHTTPStatusCodes: ReadonlySet<number>;
  readonly retryableErrorCodes: ReadonlySet<string>;
  readonly respectRetryAfter: boolean;

  constructor(options: RetryPolicyOptions = {}) {
    this.retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
    this.exponentialBackoffBase = options.exponentialBackoffBase ?? DEFAULT_EXPONENTIAL_BACKOFF_BASE;
    this.exponentialBackoffScale = options.exponentialBackoffScale ?? DEFAULT_EXPONENTIAL_BACKOFF_SCALE;
    this.retryableHTTPMethods = new Set(options.retryableHTTPMethods ?? DEFAULT_RETRYABLE_METHODS);
    this.retryableHTTPStatusCodes = new Set(options.retryableHTTPStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES);
    this.retryableErrorCodes = new Set(options.retryableErrorCodes ?? DEFAULT_RETRYABLE_ERROR_CODES);
    this.respectRetryAfter = options.respectRetryAfter ?? true;
  }

  retry(request: Request, _session: Session, error: Error): RetryResult {
    if (request.retryCount < this.retryLimit && this.shouldRetry(request, error)) {
      return RetryResult.retryWithDelay(this.delayFor(request));
    }
    return RetryResult.doNotRetry;
  }

  shouldRetry(request: Request, error: Error): boolean {
    const method = request.request?.method;
    if (!method || !this.retryableHTTPMethods.has(method)) return false;

    const status = request.httpResponse?.status;
    if (status !== undefined && this.retryableHTTPStatusCodes.has(status)) return true;

    const code = transportErrorCode(error);
    return code !== undefined && this.retryableErrorCodes.has(code);
  }

  /** Seconds before the next attempt */
  delayFor(request: Request): number {
    if (this.respectRetryAfter) {
      const retryAfter = parseRetryAfter(request.httpResponse?.header('retry-after'));
      if (retryAfter) return retryAfterSeconds(retryAfter);
    }
    return Math.pow(this.exponentialBackoffBase, request.retryCount) * this.exponentialBackoffScale;
  }
}

/**
 * Retries only dropped connections.
 */
export class ConnectionLostRetryPolicy extends RetryPolicy {
  constructor(options: Omit<RetryPolicyOptions, 'retryableHTTPStatusCodes' | 'retryableErrorCodes'> = {}) {
    super({
      ...options,
      retryableHTTPStatusCodes: [],
      retryableErrorCodes: ['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET'],
    });
  }
}
