import type { HttpRequest } from '../core/request.js';
import type { Request } from '../requests/request.js';
import type { Session } from '../core/session.js';

/**
 * Outcome of asking a retrier about a failed attempt. Delays are seconds.
 */
export type RetryResult =
  | { kind: 'retry' }
  | { kind: 'retryWithDelay'; delay: number }
  | { kind: 'doNotRetry' }
  | { kind: 'doNotRetryWithError'; error: Error };

export const RetryResult = {
  retry: { kind: 'retry' } satisfies RetryResult,
  doNotRetry: { kind: 'doNotRetry' } satisfies RetryResult,
  retryWithDelay: (delay: number): RetryResult => ({ kind: 'retryWithDelay', delay }),
  doNotRetryWithError: (error: Error): RetryResult => ({ kind: 'doNotRetryWithError', error }),
};

export function retryRequired(result: RetryResult): boolean {
  return result.kind === 'retry' || result.kind === 'retryWithDelay';
}

/** Delay in ms before the next attempt, 0 for an immediate retry */
export function retryDelayMs(result: RetryResult): number {
  return result.kind === 'retryWithDelay' ? Math.max(result.delay, 0) * 1000 : 0;
}

export interface RequestAdapterState {
  requestId: string;
  session: Session;
}

/**
 * Rewrites a wire request before it is sent. Throwing (or rejecting) fails
 * the request with a RequestAdaptationError and no task is created.
 */
export interface RequestAdapter {
  adapt(request: HttpRequest, state: RequestAdapterState): HttpRequest | Promise<HttpRequest>;
}

export interface RequestRetrier {
  retry(request: Request, session: Session, error: Error): RetryResult | Promise<RetryResult>;
}

/**
 * Adapter and retrier in one. Either half may be omitted.
 */
export interface RequestInterceptor {
  adapt?: RequestAdapter['adapt'];
  retry?: RequestRetrier['retry'];
}

export type AdaptHandler = (request: HttpRequest, state: RequestAdapterState) => HttpRequest | Promise<HttpRequest>;
export type RetryHandler = (request: Request, session: Session, error: Error) => RetryResult | Promise<RetryResult>;

/**
 * Closure-backed adapter.
 */
export class Adapter implements RequestInterceptor, RequestAdapter {
  constructor(private readonly handler: AdaptHandler) {}

  adapt(request: HttpRequest, state: RequestAdapterState): HttpRequest | Promise<HttpRequest> {
    return this.handler(request, state);
  }
}

/**
 * Closure-backed retrier.
 */
export class Retrier implements RequestInterceptor, RequestRetrier {
  constructor(private readonly handler: RetryHandler) {}

  retry(request: Request, session: Session, error: Error): RetryResult | Promise<RetryResult> {
    return this.handler(request, session, error);
  }
}

export interface InterceptorOptions {
  adapters?: RequestAdapter[];
  retriers?: RequestRetrier[];
  interceptors?: RequestInterceptor[];
}

function asAdapter(interceptor: RequestInterceptor): RequestAdapter | undefined {
  const adapt = interceptor.adapt;
  return adapt ? { adapt: (request, state) => adapt.call(interceptor, request, state) } : undefined;
}

function asRetrier(interceptor: RequestInterceptor): RequestRetrier | undefined {
  const retry = interceptor.retry;
  return retry ? { retry: (request, session, error) => retry.call(interceptor, request, session, error) } : undefined;
}

/**
 * Composite interceptor. Adapters run in order, each receiving the previous
 * one's output; the first failure stops the chain. Retriers are asked in
 * order and the first answer other than `doNotRetry` wins.
 */
export class Interceptor implements RequestInterceptor {
  readonly adapters: RequestAdapter[];
  readonly retriers: RequestRetrier[];

  constructor(options: InterceptorOptions = {}) {
    const interceptors = options.interceptors ?? [];
    this.adapters = [
      ...(options.adapters ?? []),
      ...interceptors.map(asAdapter).filter((adapter): adapter is RequestAdapter => adapter !== undefined),
    ];
    this.retriers = [
      ...(options.retriers ?? []),
      ...interceptors.map(asRetrier).filter((retrier): retrier is RequestRetrier => retrier !== undefined),
    ];
  }

  /**
   * Request-level and session-level interceptors combined, request first.
   */
  static combine(...interceptors: Array<RequestInterceptor | undefined>): RequestInterceptor | undefined {
    const present = interceptors.filter((interceptor): interceptor is RequestInterceptor => interceptor !== undefined);
    if (present.length === 0) return undefined;
    if (present.length === 1) return present[0];
    return new Interceptor({ interceptors: present });
  }

  async adapt(request: HttpRequest, state: RequestAdapterState): Promise<HttpRequest> {
    let adapted = request;
    for (const adapter of this.adapters) {
      adapted = await adapter.adapt(adapted, state);
    }
    return adapted;
  }

  async retry(request: Request, session: Session, error: Error): Promise<RetryResult> {
    for (const retrier of this.retriers) {
      const result = await retrier.retry(request, session, error);
      if (result.kind !== 'doNotRetry') return result;
    }
    return RetryResult.doNotRetry;
  }
}
