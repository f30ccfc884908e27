import type { Executor } from '../types/index.js';
import type { RequestConvertible } from '../core/convertible.js';
import { createDataResponse, type DataResponse } from '../core/data-response.js';
import {
  DataResponseSerializer,
  DecodableResponseSerializer,
  JSONResponseSerializer,
  StringResponseSerializer,
  type DataResponseSerializerProtocol,
  type Schema,
  type SerializerOptions,
  type StringSerializerOptions,
} from '../core/response-serializer.js';
import { didReceiveData, didSendBodyData, receivedData } from '../core/task-delegate.js';
import {
  acceptableContentTypes,
  asValidationError,
  defaultAcceptableStatusCodes,
  validateContentType,
  validateStatusCode,
  type AcceptableStatusCodes,
  type DataValidation,
} from '../core/validation.js';
import { immediateExecutor, mainExecutor } from '../utils/executor.js';
import { Request, type RequestInit } from './request.js';

export interface CompletionOptions {
  /** Where the completion runs. Defaults to the main executor */
  queue?: Executor;
}

export type DataCompletion<T> = (response: DataResponse<T>) => void;

/**
 * Request whose response body is buffered in memory.
 */
export class DataRequest extends Request {
  readonly convertible: RequestConvertible;

  constructor(convertible: RequestConvertible, init: RequestInit) {
    super(init);
    this.convertible = convertible;
  }

  /** Body bytes received by the current attempt */
  get data(): Uint8Array | undefined {
    return receivedData(this.taskDelegate);
  }

  /** @internal */
  didReceiveData(chunk: Uint8Array): void {
    this.reportDownloadProgress(didReceiveData(this.taskDelegate, chunk));
  }

  /** @internal */
  didSendBodyData(totalBytesSent: number, totalBytesExpectedToSend: number): void {
    this.reportUploadProgress(didSendBodyData(this.taskDelegate, totalBytesSent, totalBytesExpectedToSend));
  }

  /**
   * Adds a validator. Without arguments, validates that the status code is
   * in 200..<300 and that the Content-Type matches the request's Accept
   * header.
   */
  validate(validation?: DataValidation): this {
    if (!validation) {
      return this.validate((request, response, data) => {
        const status = validateStatusCode(response, defaultAcceptableStatusCodes);
        if (!status.success) return status;
        return validateContentType(response, acceptableContentTypes(request), data);
      });
    }

    this.validators.push(
      this.makeValidator((response) => validation(this.request, response, this.data), asValidationError)
    );
    return this;
  }

  validateStatusCode(acceptable: AcceptableStatusCodes): this {
    return this.validate((_request, response) => validateStatusCode(response, acceptable));
  }

  validateContentType(acceptable: string[] | (() => string[])): this {
    return this.validate((_request, response, data) =>
      validateContentType(response, typeof acceptable === 'function' ? acceptable() : acceptable, data)
    );
  }

  /**
   * Attaches a serializer and its completion handler. Each attached
   * serializer re-reads the same bytes independently.
   */
  response<T>(serializer: DataResponseSerializerProtocol<T>, completion: DataCompletion<T>, options: CompletionOptions = {}): this {
    const queue = options.queue ?? mainExecutor;

    this.appendResponseSerializer(async () => {
      const start = performance.now();
      const result = await this.runSerializer(() => serializer.serialize(this.request, this.httpResponse, this.data, this.error));
      const response = createDataResponse<T>({
        request: this.request,
        response: this.httpResponse,
        data: this.data,
        metrics: this.metrics,
        serializationDuration: performance.now() - start,
        result,
      });

      this.eventMonitor?.emit('requestDidParseResponse', this, response);
      return () => this.deliver(queue, () => completion(response));
    });

    return this;
  }

  responseData(completion: DataCompletion<Uint8Array>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new DataResponseSerializer(options), completion, options);
  }

  responseString(completion: DataCompletion<string>, options: CompletionOptions & StringSerializerOptions = {}): this {
    return this.response(new StringResponseSerializer(options), completion, options);
  }

  responseJSON(completion: DataCompletion<unknown>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new JSONResponseSerializer(options), completion, options);
  }

  responseDecodable<T>(schema: Schema<T>, completion: DataCompletion<T>, options: CompletionOptions & SerializerOptions = {}): this {
    return this.response(new DecodableResponseSerializer(schema, options), completion, options);
  }

  /**
   * Promise form of {@link response}.
   */
  serializingResponse<T>(serializer: DataResponseSerializerProtocol<T>): Promise<DataResponse<T>> {
    return new Promise<DataResponse<T>>((resolve) => {
      this.response(serializer, resolve, { queue: immediateExecutor });
    });
  }

  serializingData(options: SerializerOptions = {}): Promise<DataResponse<Uint8Array>> {
    return this.serializingResponse(new DataResponseSerializer(options));
  }

  serializingString(options: StringSerializerOptions = {}): Promise<DataResponse<string>> {
    return this.serializingResponse(new StringResponseSerializer(options));
  }

  serializingJSON(options: SerializerOptions = {}): Promise<DataResponse<unknown>> {
    return this.serializingResponse(new JSONResponseSerializer(options));
  }

  serializingDecodable<T>(schema: Schema<T>, options: SerializerOptions = {}): Promise<DataResponse<T>> {
    return this.serializingResponse(new DecodableResponseSerializer(schema, options));
  }
}
