import { randomUUID } from 'node:crypto';
import type { Credential, Executor, ProgressCallback, ProgressEvent, Result, TaskMetrics } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { CompositeEventMonitor } from '../events/event-monitor.js';
import type { CachedResponseHandler } from '../plugins/cached-response.js';
import { retryDelayMs, type RequestInterceptor, type RetryResult } from '../plugins/interceptor.js';
import type { RedirectHandler } from '../plugins/redirect.js';
import type { SessionTask } from '../transport/network-session.js';
import {
  CourierError,
  ExplicitlyCancelledError,
  RequestRetryFailedError,
  ResponseSerializationError,
  StateError,
  asTaskError,
} from '../core/errors.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import {
  createPlainTaskDelegate,
  createTaskDelegate,
  didComplete,
  didReceiveResponse as recordResponse,
  type TaskDelegate,
} from '../core/task-delegate.js';
import { ValidationResult } from '../core/validation.js';
import { createDeferred, Gate } from '../utils/gate.js';
import { mainExecutor, runOn } from '../utils/executor.js';
import { tryFn } from '../utils/try-fn.js';

export type RequestState = 'initialized' | 'resumed' | 'suspended' | 'cancelled' | 'finished';

/**
 * Legal state transitions:
 *
 * - `initialized` may go anywhere
 * - nothing re-enters `initialized` (retries reset it internally)
 * - `cancelled` and `finished` are terminal
 * - `resumed` and `suspended` toggle, and either may be cancelled
 * - a state never transitions to itself, apart from `initialized`
 */
export function canTransition(from: RequestState, to: RequestState): boolean {
  if (from === 'initialized') return true;
  if (to === 'initialized' || from === 'cancelled' || from === 'finished') return false;
  if (from === to) return false;
  return true;
}

/**
 * What a request needs from its owning session.
 */
export interface RequestDelegate {
  readonly startImmediately: boolean;
  readonly logger: Logger;
  /** Asks the retriers whether `error` should be retried */
  retryResult(request: Request, error: CourierError): Promise<RetryResult>;
  /** Re-runs the setup pipeline for `request` after `delayMs` */
  retryRequest(request: Request, delayMs: number): void;
  /** The request reached its terminal state and ran every serializer */
  cleanup(request: Request): void;
}

export interface RequestInit {
  id?: string;
  delegate: RequestDelegate;
  serializationQueue: Executor;
  eventMonitor?: CompositeEventMonitor;
  interceptor?: RequestInterceptor;
}

/** Hands a serialized response to its completion handler */
export type Delivery = () => Promise<void>;

interface ProgressSubscription {
  handler: ProgressCallback;
  queue: Executor;
}

/**
 * One logical unit of work. Survives retries: every attempt gets a new task
 * and task delegate while validators, serializers and identity carry over.
 */
export abstract class Request {
  readonly id: string;
  readonly interceptor?: RequestInterceptor;
  protected readonly delegate: RequestDelegate;
  protected readonly eventMonitor?: CompositeEventMonitor;
  readonly serializationQueue: Executor;

  protected taskDelegate: TaskDelegate = createPlainTaskDelegate();

  private currentState: RequestState = 'initialized';
  private latchedError?: CourierError;
  private readonly requestHistory: HttpRequest[] = [];
  private readonly taskHistory: SessionTask[] = [];
  private readonly metricsHistory: TaskMetrics[] = [];
  private retries = 0;
  private resumeAfterRetry = false;

  private credentialValue?: Credential;
  private redirectHandlerValue?: RedirectHandler;
  private cachedResponseHandlerValue?: CachedResponseHandler;
  private downloadProgressSubscription?: ProgressSubscription;
  private uploadProgressSubscription?: ProgressSubscription;

  protected readonly validators: Array<() => void> = [];
  private readonly serializers: Array<() => Promise<Delivery>> = [];
  private serializerIndex = 0;
  private draining = false;
  private finishing = false;
  private cleanedUp = false;
  private readonly finishGate = new Gate();
  private readonly completion = createDeferred<void>();

  constructor(init: RequestInit) {
    this.id = init.id ?? randomUUID();
    this.delegate = init.delegate;
    this.serializationQueue = init.serializationQueue;
    this.eventMonitor = init.eventMonitor;
    this.interceptor = init.interceptor;
  }

  get state(): RequestState {
    return this.currentState;
  }

  get isInitialized(): boolean {
    return this.currentState === 'initialized';
  }

  get isResumed(): boolean {
    return this.currentState === 'resumed';
  }

  get isSuspended(): boolean {
    return this.currentState === 'suspended';
  }

  get isCancelled(): boolean {
    return this.currentState === 'cancelled';
  }

  get isFinished(): boolean {
    return this.currentState === 'finished';
  }

  /** First error of the current attempt, or the final error once finished */
  get error(): CourierError | undefined {
    return this.latchedError;
  }

  get retryCount(): number {
    return this.retries;
  }

  /** Wire request of the latest attempt */
  get request(): HttpRequest | undefined {
    return this.requestHistory.at(-1);
  }

  get firstRequest(): HttpRequest | undefined {
    return this.requestHistory[0];
  }

  get requests(): readonly HttpRequest[] {
    return this.requestHistory;
  }

  get task(): SessionTask | undefined {
    return this.taskHistory.at(-1);
  }

  get tasks(): readonly SessionTask[] {
    return this.taskHistory;
  }

  /** Response of the latest attempt */
  get httpResponse(): HttpResponse | undefined {
    return this.task?.response;
  }

  get metrics(): TaskMetrics | undefined {
    return this.metricsHistory.at(-1);
  }

  get allMetrics(): readonly TaskMetrics[] {
    return this.metricsHistory;
  }

  get credential(): Credential | undefined {
    return this.credentialValue;
  }

  get redirectHandler(): RedirectHandler | undefined {
    return this.redirectHandlerValue;
  }

  get cachedResponseHandler(): CachedResponseHandler | undefined {
    return this.cachedResponseHandlerValue;
  }

  /** Per-task state of the current attempt */
  get currentTaskDelegate(): TaskDelegate {
    return this.taskDelegate;
  }

  get downloadProgress(): ProgressEvent | undefined {
    return this.taskDelegate.kind === 'plain' ? undefined : this.taskDelegate.downloadProgress.current();
  }

  /**
   * Resolves once the request is terminal and every serializer attached so
   * far has delivered its completion.
   */
  whenFinished(): Promise<void> {
    return this.completion.promise;
  }

  resume(): this {
    if (this.finishing || !canTransition(this.currentState, 'resumed')) return this;

    this.currentState = 'resumed';
    this.eventMonitor?.emit('requestDidResume', this);

    const task = this.task;
    if (!task || task.state === 'completed') return this;

    task.resume();
    this.eventMonitor?.emit('requestDidResumeTask', this, task);
    return this;
  }

  suspend(): this {
    if (this.finishing || !canTransition(this.currentState, 'suspended')) return this;

    this.currentState = 'suspended';
    this.eventMonitor?.emit('requestDidSuspend', this);

    const task = this.task;
    if (!task || task.state === 'completed') return this;

    task.suspend();
    this.eventMonitor?.emit('requestDidSuspendTask', this, task);
    return this;
  }

  /**
   * Cancels the request. Calling it on a cancelled or finished request does
   * nothing. Without a live task the request finishes right away.
   */
  cancel(): this {
    if (!this.beginCancel()) return this;

    const task = this.task;
    if (!task || task.state === 'completed') {
      this.finish();
      return this;
    }

    this.eventMonitor?.emit('requestDidCancelTask', this, task);
    task.cancel();
    return this;
  }

  /**
   * Shared first half of every cancel flavour. Returns false when the
   * request cannot be cancelled.
   */
  protected beginCancel(): boolean {
    if (this.finishing || !canTransition(this.currentState, 'cancelled')) return false;

    this.currentState = 'cancelled';
    this.eventMonitor?.emit('requestDidCancel', this);
    this.setError(new ExplicitlyCancelledError());
    return true;
  }

  /**
   * Credential offered once to a Basic authentication challenge.
   */
  authenticate(credential: Credential): this {
    this.credentialValue = credential;
    return this;
  }

  /**
   * Redirect handler for this request only, taking precedence over the
   * session's. May be set once.
   */
  redirect(handler: RedirectHandler): this {
    if (this.redirectHandlerValue) {
      throw new StateError('Redirect handler has already been set.');
    }
    this.redirectHandlerValue = handler;
    return this;
  }

  /**
   * Cached response handler for this request only. May be set once.
   */
  cacheResponse(handler: CachedResponseHandler): this {
    if (this.cachedResponseHandlerValue) {
      throw new StateError('Cached response handler has already been set.');
    }
    this.cachedResponseHandlerValue = handler;
    return this;
  }

  onDownloadProgress(handler: ProgressCallback, options: { queue?: Executor } = {}): this {
    this.downloadProgressSubscription = { handler, queue: options.queue ?? mainExecutor };
    return this;
  }

  onUploadProgress(handler: ProgressCallback, options: { queue?: Executor } = {}): this {
    this.uploadProgressSubscription = { handler, queue: options.queue ?? mainExecutor };
    return this;
  }

  /** @internal */
  didCreateInitialURLRequest(urlRequest: HttpRequest): void {
    this.requestHistory.push(urlRequest);
    this.eventMonitor?.emit('requestDidCreateInitialURLRequest', this, urlRequest);
  }

  /** @internal */
  didFailToCreateURLRequest(error: CourierError): void {
    this.setError(error);
    this.eventMonitor?.emit('requestDidFailToCreateURLRequest', this, error);
    void this.retryOrFinish(error);
  }

  /** @internal */
  didAdaptInitialRequest(initial: HttpRequest, adapted: HttpRequest): void {
    this.requestHistory.push(adapted);
    this.eventMonitor?.emit('requestDidAdaptInitialRequest', this, initial, adapted);
  }

  /** @internal */
  didFailToAdaptURLRequest(initial: HttpRequest, error: CourierError): void {
    this.setError(error);
    this.eventMonitor?.emit('requestDidFailToAdaptURLRequest', this, initial, error);
    void this.retryOrFinish(error);
  }

  /** @internal */
  didCreateURLRequest(urlRequest: HttpRequest): void {
    this.eventMonitor?.emit('requestDidCreateURLRequest', this, urlRequest);
  }

  /** @internal */
  didCreateTask(task: SessionTask): void {
    this.taskHistory.push(task);
    this.taskDelegate = this.makeTaskDelegate(task);
    this.eventMonitor?.emit('requestDidCreateTask', this, task);
  }

  /**
   * Per-task state for a new attempt.
   */
  protected makeTaskDelegate(task: SessionTask): TaskDelegate {
    return createTaskDelegate(task);
  }

  /**
   * Brings a freshly created task in line with the request state.
   * @internal
   */
  updateStatesForTask(task: SessionTask): void {
    switch (this.currentState) {
      case 'initialized':
        if (this.resumeAfterRetry) {
          this.resumeAfterRetry = false;
          this.resume();
        }
        return;
      case 'resumed':
        task.resume();
        this.eventMonitor?.emit('requestDidResumeTask', this, task);
        return;
      case 'suspended':
        task.suspend();
        this.eventMonitor?.emit('requestDidSuspendTask', this, task);
        return;
      case 'cancelled':
        task.cancel();
        this.eventMonitor?.emit('requestDidCancelTask', this, task);
        return;
      case 'finished':
        return;
    }
  }

  /** @internal */
  didReceiveResponse(response: HttpResponse): void {
    recordResponse(this.taskDelegate, response);
  }

  /** @internal */
  didGatherMetrics(metrics: TaskMetrics): void {
    this.metricsHistory.push(metrics);
    this.eventMonitor?.emit('requestDidGatherMetrics', this, metrics);
  }

  /** @internal */
  reportDownloadProgress(progress: ProgressEvent | undefined): void {
    const subscription = this.downloadProgressSubscription;
    if (!progress || !subscription) return;
    subscription.queue(() => subscription.handler(progress));
  }

  /** @internal */
  reportUploadProgress(progress: ProgressEvent | undefined): void {
    const subscription = this.uploadProgressSubscription;
    if (!progress || !subscription) return;
    subscription.queue(() => subscription.handler(progress));
  }

  /**
   * The task of the current attempt completed. Records the error, runs the
   * validators and then either retries or finishes.
   * @internal
   */
  didCompleteTask(task: SessionTask, error?: Error): void {
    // trust or file move failures recorded on the delegate explain the transport error
    const failure = this.taskDelegate.error ?? error;
    if (failure) this.setError(asTaskError(failure));

    this.reportDownloadProgress(didComplete(this.taskDelegate));
    this.runValidators();

    this.eventMonitor?.emit('requestDidCompleteTask', this, task, this.latchedError);
    void this.retryOrFinish(this.latchedError);
  }

  /**
   * Resets per-attempt state ahead of a retry.
   * @internal
   */
  prepareForRetry(): void {
    this.retries += 1;
    this.resumeAfterRetry = this.currentState !== 'suspended';
    this.currentState = 'initialized';
    this.latchedError = undefined;
    this.taskDelegate = createPlainTaskDelegate();
    this.eventMonitor?.emit('requestIsRetrying', this);
  }

  /** @internal */
  async retryOrFinish(error: CourierError | undefined): Promise<void> {
    if (this.finishing) return;
    if (this.isCancelled || !error) {
      this.finish();
      return;
    }

    const result = await this.delegate.retryResult(this, error);

    if (this.finishing) return;
    if (this.isCancelled) {
      this.finish();
      return;
    }

    switch (result.kind) {
      case 'doNotRetry':
        this.finish();
        return;
      case 'doNotRetryWithError':
        this.finish(new RequestRetryFailedError(result.error, error));
        return;
      case 'retry':
      case 'retryWithDelay':
        this.delegate.retryRequest(this, retryDelayMs(result));
        return;
    }
  }

  /**
   * Terminal step: opens the serialization gate exactly once. An error
   * passed here replaces the latched one (retrier wraps, session teardown).
   * @internal
   */
  finish(error?: CourierError): void {
    if (this.finishing) return;
    this.finishing = true;
    if (error) this.latchedError = error;
    void this.completeFinish();
  }

  get isFinishing(): boolean {
    return this.finishing;
  }

  private async completeFinish(): Promise<void> {
    await this.willFinish();
    this.finishGate.open();
    this.eventMonitor?.emit('requestDidFinish', this);
    await this.processResponseSerializers();
  }

  /**
   * Hook awaited before serializers run.
   */
  protected async willFinish(): Promise<void> {}

  /**
   * Hook run once after every serializer has delivered.
   */
  protected cleanup(): void {}

  /**
   * Latches the first error of the attempt.
   */
  protected setError(error: CourierError): void {
    this.latchedError ??= error;
  }

  private runValidators(): void {
    for (const validator of this.validators) {
      validator();
    }
  }

  /**
   * Builds a validator closure. Every validator runs on every completed
   * attempt with a response; only the first failure is kept.
   */
  protected makeValidator(run: (response: HttpResponse) => ValidationResult, wrap: (error: Error, response: HttpResponse) => CourierError): () => void {
    return () => {
      const response = this.httpResponse;
      if (!response) return;

      let result: ValidationResult;
      try {
        result = run(response);
      } catch (error) {
        result = ValidationResult.failure(error instanceof Error ? error : new Error(String(error)));
      }

      if (!result.success) this.setError(wrap(result.error, response));
      this.eventMonitor?.emit('requestDidValidateRequest', this, this.request, response, result);
    };
  }

  /**
   * Queues a serializer. Serializers run after the request finishes, in
   * attachment order, one at a time; each runs exactly once. The returned
   * deliveries run once every queued serializer is done and the request
   * is `finished`.
   */
  protected appendResponseSerializer(serializer: () => Promise<Delivery>): void {
    this.serializers.push(serializer);

    if (this.finishGate.isOpen) {
      void this.processResponseSerializers();
      return;
    }

    if (this.currentState === 'initialized' && this.delegate.startImmediately) {
      queueMicrotask(() => {
        if (this.currentState === 'initialized') this.resume();
      });
    }
  }

  private async processResponseSerializers(): Promise<void> {
    if (this.draining) return;
    this.draining = true;

    await this.finishGate.wait();

    const deliveries: Delivery[] = [];
    while (this.serializerIndex < this.serializers.length) {
      const serializer = this.serializers[this.serializerIndex];
      this.serializerIndex += 1;
      try {
        deliveries.push(await serializer());
      } catch (error) {
        this.delegate.logger.error(`Response serializer for request ${this.id} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    this.draining = false;

    if (canTransition(this.currentState, 'finished')) this.currentState = 'finished';

    for (const delivery of deliveries) {
      await delivery();
    }

    if (!this.cleanedUp) {
      this.cleanedUp = true;
      this.cleanup();
      this.delegate.cleanup(this);
    }
    this.completion.resolve();
  }

  /**
   * Runs `serialize` on the serialization queue and turns its outcome into
   * a Result, wrapping foreign errors as serialization failures.
   */
  protected async runSerializer<T>(serialize: () => T | Promise<T>): Promise<Result<T, CourierError>> {
    const outcome = await runOn(this.serializationQueue, () => tryFn(serialize));
    if (outcome.success) return outcome;
    const error = outcome.error instanceof CourierError
      ? outcome.error
      : new ResponseSerializationError({ kind: 'customSerializationFailed', error: outcome.error });
    return { success: false, error };
  }

  /**
   * Hands a completion to its queue and waits for it to run.
   */
  protected async deliver(queue: Executor, completion: () => void): Promise<void> {
    try {
      await runOn(queue, completion);
    } catch (error) {
      this.delegate.logger.error(`Completion handler for request ${this.id} threw: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  toString(): string {
    return this.request?.toString() ?? `Request ${this.id} (no request created yet)`;
  }
}
