import { PassThrough, type Readable } from 'node:stream';
import type { Executor, Result, TaskMetrics } from '../types/index.js';
import type { RequestConvertible } from '../core/convertible.js';
import { CourierError, ResponseSerializationError, toError } from '../core/errors.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { DataPreprocessor, Schema } from '../core/response-serializer.js';
import {
  DecodableStreamSerializer,
  StringStreamSerializer,
  type DataStreamSerializer,
} from '../core/stream-serializer.js';
import { createStreamTaskDelegate, didReceiveData, type TaskDelegate } from '../core/task-delegate.js';
import {
  acceptableContentTypes,
  asValidationError,
  defaultAcceptableStatusCodes,
  validateContentTypeOf,
  validateStatusCode,
  ValidationResult,
  type AcceptableStatusCodes,
} from '../core/validation.js';
import type { SessionTask } from '../transport/network-session.js';
import { mainExecutor, runOn } from '../utils/executor.js';
import type { CompletionOptions } from './data-request.js';
import { Request, type RequestInit } from './request.js';

/** What to do with a response once its head arrived */
export type ResponseDisposition = 'allow' | 'cancel';

/**
 * Final state of a stream, handed to every handler once.
 */
export interface StreamCompletion {
  request?: HttpRequest;
  response?: HttpResponse;
  metrics?: TaskMetrics;
  error?: CourierError;
}

export type StreamEvent<T> =
  | { kind: 'stream'; result: Result<T, CourierError> }
  | { kind: 'complete'; completion: StreamCompletion };

/**
 * One event of a stream. `cancel` cancels the request producing it.
 */
export interface Stream<T> {
  readonly event: StreamEvent<T>;
  cancel(): void;
}

export type StreamHandler<T> = (stream: Stream<T>) => void | Promise<void>;

export type DataStreamValidation = (request: HttpRequest | undefined, response: HttpResponse) => ValidationResult;

export type HTTPResponseHandler = (response: HttpResponse) => ResponseDisposition | void | Promise<ResponseDisposition | void>;

export interface DataStreamRequestOptions {
  /** Cancel the request when a serializer fails on a chunk. Default false */
  automaticallyCancelOnStreamError?: boolean;
}

type ChunkConsumer = (chunk: Uint8Array) => Promise<void>;

/**
 * Request whose body is handed to stream handlers chunk by chunk and never
 * buffered.
 *
 * @example
 * ```typescript
 * session.streamRequest('https://api.example.com/events').responseStreamString((stream) => {
 *   if (stream.event.kind === 'stream' && stream.event.result.success) process.stdout.write(stream.event.result.value);
 * });
 * ```
 */
export class DataStreamRequest extends Request {
  readonly convertible: RequestConvertible;
  readonly automaticallyCancelOnStreamError: boolean;

  private readonly consumers: ChunkConsumer[] = [];
  private readonly outputs: PassThrough[] = [];
  private responseHandler?: { handler: HTTPResponseHandler; queue: Executor };
  /** Resolves false when the current response was refused */
  private responseAllowed: Promise<boolean> = Promise.resolve(true);
  private dispatching: Promise<void> = Promise.resolve();

  constructor(convertible: RequestConvertible, init: RequestInit, options: DataStreamRequestOptions = {}) {
    super(init);
    this.convertible = convertible;
    this.automaticallyCancelOnStreamError = options.automaticallyCancelOnStreamError ?? false;
  }

  protected override makeTaskDelegate(task: SessionTask): TaskDelegate {
    return createStreamTaskDelegate(task);
  }

  /** @internal */
  override didReceiveResponse(response: HttpResponse): void {
    super.didReceiveResponse(response);

    const subscription = this.responseHandler;
    if (!subscription) {
      this.responseAllowed = Promise.resolve(true);
      return;
    }

    this.responseAllowed = runOn(subscription.queue, () => subscription.handler(response)).then(
      (disposition) => {
        if (disposition !== 'cancel') return true;
        this.cancel();
        return false;
      },
      (error: unknown) => {
        this.captureHandlerError(error);
        return false;
      }
    );
  }

  /**
   * Chunks are handed to every output and handler in arrival order, after
   * the response handler allowed the response.
   * @internal
   */
  didReceiveData(chunk: Uint8Array): void {
    this.reportDownloadProgress(didReceiveData(this.taskDelegate, chunk));

    const allowed = this.responseAllowed;
    this.dispatching = this.dispatching.then(async () => {
      if (!(await allowed)) return;
      for (const output of this.outputs) output.write(chunk);
      await Promise.all(this.consumers.map((consume) => consume(chunk)));
    });
  }

  /**
   * Called with the response head of every attempt. A `'cancel'`
   * disposition cancels the request and drops the body.
   */
  onHTTPResponse(handler: HTTPResponseHandler, options: CompletionOptions = {}): this {
    this.responseHandler = { handler, queue: options.queue ?? mainExecutor };
    return this;
  }

  /**
   * Adds a validator, run when the task completes and only while no error
   * is latched. Without arguments, validates that the status code is in
   * 200..<300 and that the Content-Type matches the request's Accept
   * header.
   */
  validate(validation?: DataStreamValidation): this {
    if (!validation) {
      return this.validate((request, response) => {
        const status = validateStatusCode(response, defaultAcceptableStatusCodes);
        if (!status.success) return status;
        return validateContentTypeOf(response, acceptableContentTypes(request));
      });
    }

    this.validators.push(
      this.makeValidator(
        (response) => (this.error ? ValidationResult.success : validation(this.request, response)),
        asValidationError
      )
    );
    return this;
  }

  validateStatusCode(acceptable: AcceptableStatusCodes): this {
    return this.validate((_request, response) => validateStatusCode(response, acceptable));
  }

  /**
   * Unparsed chunks.
   */
  responseStream(handler: StreamHandler<Uint8Array>, options: CompletionOptions = {}): this {
    const queue = options.queue ?? mainExecutor;
    this.consumers.push((chunk) => this.emit(queue, handler, { success: true, value: chunk }));
    this.appendStreamCompletion(queue, handler);
    return this;
  }

  /**
   * Chunks run through `serializer` on the serialization queue. A failing
   * chunk reaches the handler as a failure result.
   */
  responseStreamSerialized<T>(serializer: DataStreamSerializer<T>, handler: StreamHandler<T>, options: CompletionOptions = {}): this {
    const queue = options.queue ?? mainExecutor;
    this.consumers.push(async (chunk) => {
      const result = await this.runSerializer(() => serializer.serialize(chunk));
      this.eventMonitor?.emit('requestDidParseStream', this, result);
      if (!result.success && this.automaticallyCancelOnStreamError) this.cancel();
      await this.emit(queue, handler, result);
    });
    this.appendStreamCompletion(queue, handler);
    return this;
  }

  responseStreamString(handler: StreamHandler<string>, options: CompletionOptions = {}): this {
    return this.responseStreamSerialized(new StringStreamSerializer(), handler, options);
  }

  responseStreamDecodable<T>(
    schema: Schema<T>,
    handler: StreamHandler<T>,
    options: CompletionOptions & { dataPreprocessor?: DataPreprocessor } = {}
  ): this {
    return this.responseStreamSerialized(new DecodableStreamSerializer(schema, options), handler, options);
  }

  /**
   * Body as a Node Readable, ended once the request finishes. Resumes the
   * request. Check `error` after `end` to tell success from failure.
   */
  asReadable(options: { highWaterMark?: number } = {}): Readable {
    const output = new PassThrough({ highWaterMark: options.highWaterMark });
    this.outputs.push(output);
    this.resume();
    return output;
  }

  protected override async willFinish(): Promise<void> {
    await this.dispatching;
    for (const output of this.outputs) output.end();
  }

  private async emit<T>(queue: Executor, handler: StreamHandler<T>, result: Result<T, CourierError>): Promise<void> {
    const stream: Stream<T> = { event: { kind: 'stream', result }, cancel: () => this.cancel() };
    try {
      await runOn(queue, () => handler(stream));
    } catch (error) {
      this.captureHandlerError(error);
    }
  }

  /**
   * Completion events wait until every chunk handed out so far was handled.
   */
  private appendStreamCompletion<T>(queue: Executor, handler: StreamHandler<T>): void {
    this.appendResponseSerializer(async () => {
      await this.dispatching;
      return async () => {
        const completion: StreamCompletion = {
          request: this.request,
          response: this.httpResponse,
          metrics: this.metrics,
          error: this.error,
        };
        try {
          await runOn(queue, () => handler({ event: { kind: 'complete', completion }, cancel: () => this.cancel() }));
        } catch (error) {
          this.delegate.logger.debug(`Stream completion handler for request ${this.id} threw: ${toError(error).message}`);
        }
      };
    });
  }

  private captureHandlerError(error: unknown): void {
    this.setError(
      error instanceof CourierError
        ? error
        : new ResponseSerializationError({ kind: 'customSerializationFailed', error: toError(error) })
    );
    this.cancel();
  }
}
