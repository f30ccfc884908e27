import { lookup } from 'node:dns/promises';
import type { Session } from '../core/session.js';
import type { Request } from '../requests/request.js';
import { RetryResult, type RequestInterceptor } from './interceptor.js';
import { transportErrorCode } from './retry.js';

/** ms */
export const DEFAULT_OFFLINE_WAIT = 5000;

/**
 * Transport error codes meaning the machine has no usable network.
 */
export const DEFAULT_OFFLINE_ERROR_CODES: ReadonlySet<string> = new Set(['ENETUNREACH', 'ENETDOWN', 'EAI_AGAIN']);

export function isOfflineError(error: Error): boolean {
  const code = transportErrorCode(error);
  return code !== undefined && DEFAULT_OFFLINE_ERROR_CODES.has(code);
}

/**
 * Watches for the network to come back. `onAvailable` may be called more
 * than once; only the first call counts.
 */
export interface ConnectivityMonitor {
  start(onAvailable: () => void): void;
  stop(): void;
}

export type ConnectivityMonitorFactory = (request: Request) => ConnectivityMonitor;

/**
 * Polls DNS for a host until a lookup succeeds, then reports once.
 */
export class DnsConnectivityMonitor implements ConnectivityMonitor {
  private timer?: ReturnType<typeof setInterval>;

  constructor(
    readonly hostname: string,
    readonly intervalMs = 1000,
    private readonly resolve: (hostname: string) => Promise<unknown> = (host) => lookup(host)
  ) {}

  start(onAvailable: () => void): void {
    if (this.timer !== undefined) return;

    const check = () => {
      this.resolve(this.hostname).then(
        () => {
          if (this.timer === undefined) return;
          this.stop();
          onAvailable();
        },
        // still offline
        () => undefined
      );
    };
    this.timer = setInterval(check, this.intervalMs);
    check();
  }

  stop(): void {
    if (this.timer === undefined) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }
}

export interface OfflineRetrierOptions {
  /** Creates the monitor when the first offline failure arrives. Defaults to polling DNS for the request's host */
  monitor?: ConnectivityMonitorFactory;
  /** ms to wait for the network before giving up. Default 5000 */
  maximumWait?: number;
  isOfflineError?: (error: Error) => boolean;
}

/**
 * Retrier that holds requests failed for lack of a network until the
 * network returns, then retries them all. Once `maximumWait` passes
 * they fail with their original error.
 *
 * @example
 * ```typescript
 * const session = new Session({ interceptor: new Interceptor({ retriers: [new OfflineRetrier(), new RetryPolicy()] }) });
 * ```
 */
export class OfflineRetrier implements RequestInterceptor {
  readonly maximumWait: number;
  readonly isOfflineError: (error: Error) => boolean;
  private readonly createMonitor: ConnectivityMonitorFactory;

  private pending: Array<(result: RetryResult) => void> = [];
  private monitor?: ConnectivityMonitor;
  private timeout?: ReturnType<typeof setTimeout>;

  constructor(options: OfflineRetrierOptions = {}) {
    this.maximumWait = options.maximumWait ?? DEFAULT_OFFLINE_WAIT;
    this.isOfflineError = options.isOfflineError ?? isOfflineError;
    this.createMonitor = options.monitor ?? ((request) => new DnsConnectivityMonitor(request.request?.url.hostname ?? 'localhost'));
  }

  /** Requests waiting for the network */
  get pendingRequests(): number {
    return this.pending.length;
  }

  retry(request: Request, _session: Session, error: Error): Promise<RetryResult> {
    if (!this.isOfflineError(error)) return Promise.resolve(RetryResult.doNotRetry);

    return new Promise<RetryResult>((resolve) => {
      this.pending.push(resolve);
      if (this.monitor) return;
      this.startListening(request);
    });
  }

  private startListening(request: Request): void {
    this.timeout = setTimeout(() => this.settle(RetryResult.doNotRetry), this.maximumWait);
    try {
      const monitor = this.createMonitor(request);
      this.monitor = monitor;
      monitor.start(() => {
        if (this.monitor === monitor) this.settle(RetryResult.retry);
      });
    } catch (error) {
      this.stopListening();
      throw error;
    }
  }

  private settle(result: RetryResult): void {
    const completions = this.pending;
    this.stopListening();
    for (const complete of completions) complete(result);
  }

  private stopListening(): void {
    this.pending = [];
    clearTimeout(this.timeout);
    this.timeout = undefined;
    this.monitor?.stop();
    this.monitor = undefined;
  }
}
