import type { Executor } from '../types/index.js';
import type { Logger as LoggerContract } from '../types/logger.js';
import { CompositeEventMonitor, type EventMonitor } from '../events/event-monitor.js';
import { LoggingEventMonitor } from '../events/logging-monitor.js';
import { SessionEventEmitter } from '../events/session-events.js';
import type { CachedResponseHandler } from '../plugins/cached-response.js';
import { Interceptor, RetryResult, type RequestInterceptor } from '../plugins/interceptor.js';
import type { RedirectHandler } from '../plugins/redirect.js';
import type { ServerTrustManager } from '../plugins/server-trust.js';
import { DataRequest } from '../requests/data-request.js';
import { DataStreamRequest, type DataStreamRequestOptions } from '../requests/data-stream-request.js';
import { DownloadRequest, type Destination } from '../requests/download-request.js';
import type { Request, RequestDelegate, RequestInit } from '../requests/request.js';
import { UploadRequest, type Uploadable, type UploadOptions } from '../requests/upload-request.js';
import type { NetworkSession, SessionTask, UploadSource } from '../transport/network-session.js';
import { UndiciNetworkSession } from '../transport/undici-session.js';
import { mainExecutor } from '../utils/executor.js';
import { getLogger, Logger } from '../utils/logger.js';
import { asURLRequest, RequestFromParts, type RequestConvertible, type RequestParts, type URLConvertible } from './convertible.js';
import {
  CourierError,
  CreateUrlRequestError,
  RequestAdaptationError,
  SessionDeinitializedError,
  SessionInvalidatedError,
  UploadableCreationError,
  asTaskError,
  toError,
} from './errors.js';
import type { HttpRequest } from './request.js';
import { RequestTaskMap } from './request-task-map.js';
import { SessionDelegate, type SessionStateProvider } from './session-delegate.js';

export interface SessionOptions {
  /** Networking primitive. Defaults to an undici backed session */
  networkSession?: NetworkSession;
  delegate?: SessionDelegate;
  /** Resume requests as soon as a response handler is attached. Default true */
  startRequestsImmediately?: boolean;
  interceptor?: RequestInterceptor;
  serverTrustManager?: ServerTrustManager;
  redirectHandler?: RedirectHandler;
  cachedResponseHandler?: CachedResponseHandler;
  eventMonitors?: EventMonitor[];
  /** Where serializers run. Defaults to the main executor */
  serializationQueue?: Executor;
  /** Log request lifecycle events */
  debug?: boolean;
  logger?: LoggerContract;
}

export interface RequestOptions extends RequestParts {
  /** Interceptor for this request only, run before the session's */
  interceptor?: RequestInterceptor;
}

export interface DownloadRequestOptions extends RequestOptions {
  destination?: Destination;
}

export interface StreamRequestOptions extends RequestOptions, DataStreamRequestOptions {}

export type RequestTarget = URLConvertible | RequestConvertible;

function isURLConvertible(target: RequestTarget): target is URLConvertible {
  return typeof target === 'string' || target instanceof URL;
}

let defaultSession: Session | undefined;

/**
 * Creates and manages requests. Owns the network session, the task map
 * and the policies every request falls back to.
 *
 * @example
 * ```typescript
 * const session = new Session({ interceptor: new RetryPolicy() });
 * const response = await session.request('https://api.example.com/users/1').validate().serializingJSON();
 * ```
 */
export class Session implements RequestDelegate, SessionStateProvider {
  readonly networkSession: NetworkSession;
  readonly delegate: SessionDelegate;
  readonly startImmediately: boolean;
  readonly interceptor?: RequestInterceptor;
  readonly serverTrustManager?: ServerTrustManager;
  readonly redirectHandler?: RedirectHandler;
  readonly cachedResponseHandler?: CachedResponseHandler;
  readonly serializationQueue: Executor;
  readonly logger: LoggerContract;
  readonly eventMonitor: CompositeEventMonitor;
  /** Notifications for task resume, suspend, cancel and completion */
  readonly events = new SessionEventEmitter();

  private readonly requestTaskMap = new RequestTaskMap<Request>();
  private readonly activeRequests = new Set<Request>();
  private readonly retryTimers = new Map<Request, ReturnType<typeof setTimeout>>();
  private invalidated = false;

  constructor(options: SessionOptions = {}) {
    this.startImmediately = options.startRequestsImmediately ?? true;
    this.interceptor = options.interceptor;
    this.serverTrustManager = options.serverTrustManager;
    this.redirectHandler = options.redirectHandler;
    this.cachedResponseHandler = options.cachedResponseHandler;
    this.serializationQueue = options.serializationQueue ?? mainExecutor;
    this.logger = options.logger ?? (options.debug ? new Logger({ level: 'debug' }) : getLogger());

    const monitors: EventMonitor[] = [this.events];
    if (options.debug) monitors.push(new LoggingEventMonitor(this.logger));
    monitors.push(...(options.eventMonitors ?? []));
    this.eventMonitor = new CompositeEventMonitor(monitors, this.logger);

    this.delegate = options.delegate ?? new SessionDelegate();
    this.delegate.attach(this);
    this.networkSession = options.networkSession ?? new UndiciNetworkSession({ logger: this.logger });
    this.networkSession.attach(this.delegate);
  }

  /**
   * Shared session used by the top-level convenience functions, created on
   * first use.
   */
  static get default(): Session {
    defaultSession ??= new Session();
    return defaultSession;
  }

  get isInvalidated(): boolean {
    return this.invalidated;
  }

  /**
   * Creates a data request. A URL target is combined with `options` into a
   * wire request when the request is performed; a convertible target is
   * used as is.
   */
  request(target: RequestTarget, options: RequestOptions = {}): DataRequest {
    const request = new DataRequest(this.convertible(target, options), this.requestInit(options));
    this.perform(request);
    return request;
  }

  /**
   * Creates a request whose body is handed to stream handlers as it
   * arrives instead of being buffered.
   */
  streamRequest(target: RequestTarget, options: StreamRequestOptions = {}): DataStreamRequest {
    const request = new DataStreamRequest(this.convertible(target, options), this.requestInit(options), options);
    this.perform(request);
    return request;
  }

  /**
   * Creates an upload request whose body comes from `upload`.
   */
  upload(target: RequestTarget, upload: Uploadable, options: RequestOptions & UploadOptions = {}): UploadRequest {
    const convertible = this.convertible(target, { method: 'POST', ...options });
    const request = new UploadRequest(convertible, upload, this.requestInit(options), options);
    this.perform(request);
    return request;
  }

  /**
   * Creates a download request, or continues one from resume data.
   */
  download(target: RequestTarget | Uint8Array, options: DownloadRequestOptions = {}): DownloadRequest {
    const downloadable = target instanceof Uint8Array
      ? { kind: 'resumeData' as const, data: target }
      : { kind: 'request' as const, convertible: this.convertible(target, options) };
    const request = new DownloadRequest(downloadable, this.requestInit(options), options.destination);
    this.perform(request);
    return request;
  }

  private convertible(target: RequestTarget, options: RequestParts): RequestConvertible {
    return isURLConvertible(target) ? new RequestFromParts(target, options) : target;
  }

  private requestInit(options: RequestOptions): RequestInit {
    return {
      delegate: this,
      serializationQueue: this.serializationQueue,
      eventMonitor: this.eventMonitor,
      interceptor: options.interceptor,
    };
  }

  /**
   * Runs the setup pipeline of `request`: build the wire request, adapt
   * it, create the body source and the task.
   * @internal
   */
  perform(request: Request): void {
    this.activeRequests.add(request);
    this.performSetup(request).catch((error: unknown) => {
      this.logger.error(`Setting up request ${request.id} failed: ${toError(error).message}`);
      request.finish(asTaskError(toError(error)));
    });
  }

  private async performSetup(request: Request): Promise<void> {
    if (request.isCancelled) return;

    if (this.invalidated) {
      request.finish(new SessionInvalidatedError());
      return;
    }

    if (request instanceof DownloadRequest && request.downloadable.kind === 'resumeData') {
      this.didCreateTask(request, this.networkSession.downloadTaskWithResumeData(request.downloadable.data));
      return;
    }

    const convertible = this.convertibleOf(request);
    if (!convertible) return;

    let initial: HttpRequest;
    try {
      initial = await asURLRequest(convertible);
    } catch (error) {
      request.didFailToCreateURLRequest(error instanceof CourierError ? error : new CreateUrlRequestError(error));
      return;
    }
    if (request.isCancelled) return;
    request.didCreateInitialURLRequest(initial);

    let urlRequest = initial;
    const adapter = Interceptor.combine(request.interceptor, this.interceptor);
    const adapt = adapter?.adapt;
    if (adapter && adapt) {
      try {
        urlRequest = await adapt.call(adapter, initial, { requestId: request.id, session: this });
      } catch (error) {
        request.didFailToAdaptURLRequest(initial, new RequestAdaptationError(error));
        return;
      }
      if (request.isCancelled) return;
      request.didAdaptInitialRequest(initial, urlRequest);
    }
    request.didCreateURLRequest(urlRequest);

    if (request instanceof UploadRequest) {
      let uploadable: UploadSource;
      try {
        uploadable = await request.createUploadable();
      } catch (error) {
        request.didFailToCreateUploadable(error instanceof UploadableCreationError ? error : new UploadableCreationError(error));
        return;
      }
      if (request.isCancelled) return;
      this.didCreateTask(request, this.networkSession.uploadTask(urlRequest, uploadable));
      return;
    }

    const task = request instanceof DownloadRequest
      ? this.networkSession.downloadTask(urlRequest)
      : this.networkSession.dataTask(urlRequest);
    this.didCreateTask(request, task);
  }

  private convertibleOf(request: Request): RequestConvertible | undefined {
    if (request instanceof DataRequest || request instanceof DataStreamRequest) return request.convertible;
    if (request instanceof DownloadRequest && request.downloadable.kind === 'request') return request.downloadable.convertible;
    return undefined;
  }

  private didCreateTask(request: Request, task: SessionTask): void {
    this.requestTaskMap.set(request, task);
    request.didCreateTask(task);
    request.updateStatesForTask(task);
  }

  /** @internal */
  async retryResult(request: Request, error: CourierError): Promise<RetryResult> {
    const retrier = Interceptor.combine(request.interceptor, this.interceptor);
    const retry = retrier?.retry;
    if (!retrier || !retry) return RetryResult.doNotRetry;

    try {
      return await retry.call(retrier, request, this, error);
    } catch (retryError) {
      return RetryResult.doNotRetryWithError(toError(retryError));
    }
  }

  /** @internal */
  retryRequest(request: Request, delayMs: number): void {
    const run = () => {
      if (request.isCancelled || request.isFinishing) return;
      request.prepareForRetry();
      this.perform(request);
    };

    if (delayMs > 0) {
      this.clearRetryTimer(request);
      this.retryTimers.set(request, setTimeout(() => {
        this.retryTimers.delete(request);
        run();
      }, delayMs));
    } else {
      setImmediate(run);
    }
  }

  private clearRetryTimer(request: Request): void {
    const timer = this.retryTimers.get(request);
    if (timer === undefined) return;
    clearTimeout(timer);
    this.retryTimers.delete(request);
  }

  /** @internal */
  cleanup(request: Request): void {
    this.clearRetryTimer(request);
    this.activeRequests.delete(request);
    this.requestTaskMap.deleteRequest(request);
  }

  /** @internal */
  requestFor(task: SessionTask): Request | undefined {
    return this.requestTaskMap.requestFor(task);
  }

  /** @internal */
  didCompleteTask(task: SessionTask): Request | undefined {
    return this.requestTaskMap.delete(task);
  }

  /**
   * Calls `action` with every request that has not finished yet.
   */
  withAllRequests(action: (requests: ReadonlySet<Request>) => void): void {
    action(new Set(this.activeRequests));
  }

  cancelAllRequests(): void {
    for (const request of [...this.activeRequests]) {
      request.cancel();
    }
  }

  /**
   * Cancels every task and finishes every outstanding request with
   * `SessionInvalidatedError`. Later requests fail the same way.
   */
  invalidateAndCancel(): void {
    if (this.invalidated) return;
    this.invalidated = true;
    this.finishAll(() => new SessionInvalidatedError());
    this.networkSession.invalidateAndCancel();
  }

  /**
   * Tears the session down: outstanding requests finish with
   * `SessionDeinitializedError`.
   */
  destroy(): void {
    this.invalidated = true;
    this.finishAll(() => new SessionDeinitializedError());
    this.networkSession.invalidateAndCancel();
    if (defaultSession === this) defaultSession = undefined;
  }

  private finishAll(makeError: () => CourierError): void {
    for (const request of [...this.activeRequests]) {
      this.clearRetryTimer(request);
      request.finish(makeError());
    }
  }
}
