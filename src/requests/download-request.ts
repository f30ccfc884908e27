import { copyFile, mkdir, rename, rm, unlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import type { RequestConvertible } from '../core/convertible.js';
import { createDownloadResponse, type DownloadResponse } from '../core/data-response.js';
import { DownloadFileMoveError, SessionTaskError, toError } from '../core/errors.js';
import type { HttpResponse } from '../core/response.js';
import {
  DataResponseSerializer,
  DecodableResponseSerializer,
  JSONResponseSerializer,
  StringResponseSerializer,
  URLResponseSerializer,
  type DownloadResponseSerializerProtocol,
  type Schema,
  type SerializerOptions,
  type StringSerializerOptions,
} from '../core/response-serializer.js';
import { didFinishDownloading, didResumeAtOffset, didWriteData } from '../core/task-delegate.js';
import {
  acceptableContentTypes,
  asValidationError,
  defaultAcceptableStatusCodes,
  validateDownloadContentType,
  validateStatusCode,
  type AcceptableStatusCodes,
  type DownloadValidation,
} from '../core/validation.js';
import { isDownloadTask, type DownloadTask, type SessionTask } from '../transport/network-session.js';
import type { Result } from '../types/index.js';
import { immediateExecutor, mainExecutor } from '../utils/executor.js';
import type { CompletionOptions } from './data-request.js';
import { Request, type RequestInit } from './request.js';

/**
 * What a download starts from.
 */
export type Downloadable =
  | { kind: 'request'; convertible: RequestConvertible }
  | { kind: 'resumeData'; data: Uint8Array };

export interface DownloadOptions {
  /** Create missing parent directories of the destination */
  createIntermediateDirectories?: boolean;
  /** Replace an existing file at the destination */
  removePreviousFile?: boolean;
}

export interface DestinationResult {
  url: string;
  options?: DownloadOptions;
}

/**
 * Picks where the temporary file of a finished download is moved.
 */
export type Destination = (temporaryUrl: string, response: HttpResponse | undefined) => DestinationResult | Promise<DestinationResult>;

/**
 * Keeps the file in the temp directory under a `courier_` prefixed name.
 */
export const defaultDestination: Destination = (temporaryUrl) => ({
  url: join(tmpdir(), `courier_${basename(temporaryUrl)}`),
});

/**
 * Moves the file into `directory` under the response's suggested filename.
 */
export function suggestedDownloadDestination(directory: string, options: DownloadOptions = {}): Destination {
  return (temporaryUrl, response) => ({
    url: join(directory, response?.suggestedFilename ?? basename(temporaryUrl)),
    options,
  });
}

export type DownloadCompletion<T> = (response: DownloadResponse<T>) => void;

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    // rename cannot cross devices
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      await copyFile(source, destination);
      await unlink(source);
      return;
    }
    throw error;
  }
}

/**
 * Request whose body streams to a temporary file, then moves to its
 * destination before serializers run.
 */
export class DownloadRequest extends Request {
  readonly downloadable: Downloadable;
  readonly destination: Destination;
  private resumeDataValue?: Uint8Array;

  constructor(downloadable: Downloadable, init: RequestInit, destination: Destination = defaultDestination) {
    super(init);
    this.downloadable = downloadable;
    this.destination = destination;
    if (downloadable.kind === 'resumeData') this.resumeDataValue = downloadable.data;
  }

  /** Final location of the downloaded file */
  get fileUrl(): string | undefined {
    return this.taskDelegate.kind === 'download' ? this.taskDelegate.fileUrl : undefined;
  }

  /** Continuation state left by a cancel or a failed transfer */
  get resumeData(): Uint8Array | undefined {
    return this.resumeDataValue;
  }

  /** @internal */
  didWriteData(totalBytesWritten: number, totalBytesExpectedToWrite: number): void {
    this.reportDownloadProgress(didWriteData(this.taskDelegate, totalBytesWritten, totalBytesExpectedToWrite));
  }

  /** @internal */
  didResumeAtOffset(fileOffset: number, expectedTotalBytes: number): void {
    this.reportDownloadProgress(didResumeAtOffset(this.taskDelegate, fileOffset, expectedTotalBytes));
  }

  /**
   * Moves the temporary file to its destination. A failure is recorded on
   * the task delegate and surfaces when the task completes.
   * @internal
   */
  async didFinishDownloading(task: SessionTask, temporaryUrl: string): Promise<void> {
    let result: Result<string>;
    let destinationUrl = temporaryUrl;

    try {
      const { url, options = {} } = await this.destination(temporaryUrl, task.response);
      destinationUrl = url;
      this.eventMonitor?.emit('requestDidCreateDestinationURL', this, url);

      if (options.createIntermediateDirectories) {
        await mkdir(dirname(url), { recursive: true });
      }
      if (options.removePreviousFile) {
        await rm(url, { force: true });
      }
      await moveFile(temporaryUrl, url);

      didFinishDownloading(this.taskDelegate, { fileUrl: url });
      result = { success: true, value: url };
    } catch (error) {
      const moveError = new DownloadFileMoveError(temporaryUrl, destinationUrl, error);
      didFinishDownloading(this.taskDelegate, { error: moveError });
      result = { success: false, error: moveError };
    }

    this.eventMonitor?.emit('requestDidFinishDownloading', this, task, result);
  }

  /**
   * Cancels the download. With `byProducingResumeData`, the resume blob is
   * captured before the request finishes and lands in `resumeData`.
   */
  override cancel(options: { byProducingResumeData?: boolean } = {}): this {
    if (!options.byProducingResumeData) return super.cancel();
    if (!this.beginCancel()) return this;

    const task = this.task;
    if (!task || task.state === 'completed' || !isDownloadTask(task) || this.taskDelegate.kind !== 'download') {
      this.finish();
      return this;
    }

    this.eventMonitor?.emit('requestDidCancelTask', this, task);
    this.taskDelegate.pendingResumeData = this.produceResumeData(task);
    return this;
  }

  private async produceResumeData(task: DownloadTask): Promise<void> {
    try {
      const data = await task.cancelByProducingResumeData();
      if (data) this.resumeDataValue = data;
    } catch (error) {
      this.delegate.logger.warn(`Producing resume data for request ${this.id} failed: ${toError(error).message}`);
    }
  }

  override didCompleteTask(task: SessionTask, error?: Error): void {
    if (error instanceof SessionTaskError && error.resumeData) {
      this.resumeDataValue = error.resumeData;
    }
    super.didCompleteTask(task, error);
  }

  protected override async willFinish(): Promise<void> {
    if (this.taskDelegate.kind === 'download' && this.taskDelegate.pendingResumeData) {
      await this.taskDelegate.pendingResumeData;
    }
  }

  /**
   * Adds a validator over the downloaded file. Without arguments, validates
   * the status code and the file's content type against the Accept header.
   */
  validate(validation?: DownloadValidation): this {
    if (!validation) {
      return this.validate((request, response, fileUrl) => {
        const status = validateStatusCode(response, defaultAcceptableStatusCodes);
        if (!status.success) return status;
        return validateDownloadContentType(response, acceptableContentTypes(request), fileUrl);
      });
    }

    this.validators.push(
      this.makeValidator((response) => validation(this.request, response, this.fileUrl), asValidationError)
    );
    return this;
  }

  validateStatusCode(acceptable: AcceptableStatusCodes): this {
    return this.validate((_request, response) => validateStatusCode(response, acceptable));
  }

  validateContentType(acceptable: string[] | (() => string[])): this {
    return this.validate((_request, response, fileUrl) =>
      validateDownloadContentType(response, typeof acceptable === 'function' ? acceptable() : acceptable, fileUrl)
    );
  }

  response<T>(serializer: DownloadResponseSerializerProtocol<T>, completion: DownloadCompletion<T>, options: CompletionOptions = {}): this {
    const queue = options.queue ?? mainExecutor;

    this.appendResponseSerializer(async () => {
      const start = performance.now();
      const result = await this.runSerializer(() =>
        serializer.serializeDownload(this.request, this.httpResponse, this.fileUrl, this.error)
      );
      const response = createDownloadResponse<T>({
        request: this.request,
        response: this.httpResponse,
        fileUrl: this.fileUrl,
        resumeData: this.resumeData,
        metrics: this.metrics,
        serializationDuration: performance.now() - start,
        result,
      });

      this.eventMonitor?.emit('requestDidParseResponse', this, response);
      return () => this.deliver(queue, () => completion(response));
    });

    return this;
  }

  responseURL(completion: DownloadCompletion<string>, options: CompletionOptions = {}): this {
    return this.response(new URLResponseSerializer(), completion, options);
  }

  responseData(completion: DownloadCompletion<Uint8Array>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new DataResponseSerializer(options), completion, options);
  }

  responseString(completion: DownloadCompletion<string>, options: CompletionOptions & StringSerializerOptions = {}): this {
    return this.response(new StringResponseSerializer(options), completion, options);
  }

  responseJSON(completion: DownloadCompletion<unknown>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new JSONResponseSerializer(options), completion, options);
  }

  responseDecodable<T>(schema: Schema<T>, completion: DownloadCompletion<T>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new DecodableResponseSerializer(schema, options), completion, options);
  }

  serializingDownload<T>(serializer: DownloadResponseSerializerProtocol<T>): Promise<DownloadResponse<T>> {
    return new Promise<DownloadResponse<T>>((resolve) => {
      this.response(serializer, resolve, { queue: immediateExecutor });
    });
  }

  serializingURL(): Promise<DownloadResponse<string>> {
    return this.serializingDownload(new URLResponseSerializer());
  }

  serializingData(options: SerializerOptions = {}): Promise<DownloadResponse<Uint8Array>> {
    return this.serializingDownload(new DataResponseSerializer(options));
  }

  serializingString(options: StringSerializerOptions = {}): Promise<DownloadResponse<string>> {
    return this.serializingDownload(new StringResponseSerializer(options));
  }

  serializingJSON(options: SerializerOptions = {}): Promise<DownloadResponse<unknown>> {
    return this.serializingDownload(new JSONResponseSerializer(options));
  }

  serializingDecodable<T>(schema: Schema<T>, options: SerializerOptions = {}): Promise<DownloadResponse<T>> {
    return this.serializingDownload(new DecodableResponseSerializer(schema, options));
  }
}
