import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { DEFAULT_EMPTY_REQUEST_METHODS, DEFAULT_EMPTY_RESPONSE_CODES, GOOGLE_XSSI_PREFIX } from '../constants.js';
import { decodeText } from '../utils/charset.js';
import { ResponseSerializationError, toError } from './errors.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';

/**
 * Transforms raw bytes before a serializer parses them.
 */
export type DataPreprocessor = (data: Uint8Array) => Uint8Array;

const xssiPrefix = new TextEncoder().encode(GOOGLE_XSSI_PREFIX);

export const DataPreprocessors = {
  passthrough: ((data) => data) satisfies DataPreprocessor,

  /** Strips the `)]}',\n` anti-XSSI prefix some JSON APIs prepend */
  googleXssi: ((data) => {
    if (data.byteLength < xssiPrefix.byteLength) return data;
    for (let i = 0; i < xssiPrefix.byteLength; i++) {
      if (data[i] !== xssiPrefix[i]) return data;
    }
    return data.subarray(xssiPrefix.byteLength);
  }) satisfies DataPreprocessor,
};

/**
 * Turns the bytes of a finished data or upload request into a value.
 * Receives the request's error, if any, and must rethrow it.
 */
export interface DataResponseSerializerProtocol<T> {
  serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): T | Promise<T>;
}

/**
 * Turns the file of a finished download into a value.
 */
export interface DownloadResponseSerializerProtocol<T> {
  serializeDownload(request: HttpRequest | undefined, response: HttpResponse | undefined, fileUrl: string | undefined, error: Error | undefined): T | Promise<T>;
}

export type ResponseSerializer<T> = DataResponseSerializerProtocol<T> & DownloadResponseSerializerProtocol<T>;

export interface SerializerOptions {
  dataPreprocessor?: DataPreprocessor;
  /** Status codes whose empty bodies are acceptable. Defaults to 204, 205 */
  emptyResponseCodes?: ReadonlySet<number>;
  /** Methods whose empty bodies are acceptable. Defaults to HEAD */
  emptyRequestMethods?: ReadonlySet<string>;
}

type PreparedInput = { empty: true } | { empty: false; data: Uint8Array };

/**
 * Shared empty-body handling and download support. A download is
 * serialized by reading the file and handing its bytes to `serialize`.
 */
export abstract class BaseResponseSerializer<T> implements ResponseSerializer<T> {
  readonly dataPreprocessor: DataPreprocessor;
  readonly emptyResponseCodes: ReadonlySet<number>;
  readonly emptyRequestMethods: ReadonlySet<string>;

  constructor(options: SerializerOptions = {}) {
    this.dataPreprocessor = options.dataPreprocessor ?? DataPreprocessors.passthrough;
    this.emptyResponseCodes = options.emptyResponseCodes ?? DEFAULT_EMPTY_RESPONSE_CODES;
    this.emptyRequestMethods = options.emptyRequestMethods ?? DEFAULT_EMPTY_REQUEST_METHODS;
  }

  abstract serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): T | Promise<T>;

  async serializeDownload(request: HttpRequest | undefined, response: HttpResponse | undefined, fileUrl: string | undefined, error: Error | undefined): Promise<T> {
    if (error) throw error;
    if (!fileUrl) throw new ResponseSerializationError({ kind: 'inputFileNil' });

    let data: Uint8Array;
    try {
      data = await readFile(fileUrl);
    } catch {
      throw new ResponseSerializationError({ kind: 'inputFileReadFailed', path: fileUrl });
    }
    return this.serialize(request, response, data, undefined);
  }

  emptyResponseAllowed(request: HttpRequest | undefined, response: HttpResponse | undefined): boolean {
    if (request && this.emptyRequestMethods.has(request.method)) return true;
    return response !== undefined && this.emptyResponseCodes.has(response.status);
  }

  /**
   * Rethrows the request error, then resolves empty bodies against the
   * allowance rules and runs the preprocessor on non-empty ones.
   */
  protected prepare(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): PreparedInput {
    if (error) throw error;
    if (!data || data.byteLength === 0) {
      if (!this.emptyResponseAllowed(request, response)) {
        throw new ResponseSerializationError({ kind: 'inputDataNilOrZeroLength' });
      }
      return { empty: true };
    }
    return { empty: false, data: this.dataPreprocessor(data) };
  }
}

/**
 * Raw bytes.
 */
export class DataResponseSerializer extends BaseResponseSerializer<Uint8Array> {
  serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): Uint8Array {
    const input = this.prepare(request, response, data, error);
    return input.empty ? new Uint8Array(0) : input.data;
  }
}

export interface StringSerializerOptions extends SerializerOptions {
  /** Overrides the response charset */
  encoding?: string;
}

/**
 * Text decoded with the explicit encoding, else the response charset,
 * else UTF-8. Bytes invalid in that encoding fail serialization.
 */
export class StringResponseSerializer extends BaseResponseSerializer<string> {
  readonly encoding?: string;

  constructor(options: StringSerializerOptions = {}) {
    super(options);
    this.encoding = options.encoding;
  }

  serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): string {
    const input = this.prepare(request, response, data, error);
    if (input.empty) return '';

    const encoding = this.encoding ?? response?.textEncodingName ?? 'utf-8';
    try {
      return decodeText(input.data, encoding, { fatal: true });
    } catch {
      throw new ResponseSerializationError({ kind: 'stringSerializationFailed', encoding });
    }
  }
}

/**
 * `JSON.parse` of the UTF-8 body; an allowed empty body yields null.
 */
export class JSONResponseSerializer extends BaseResponseSerializer<unknown> {
  readonly reviver?: (key: string, value: unknown) => unknown;

  constructor(options: SerializerOptions & { reviver?: (key: string, value: unknown) => unknown } = {}) {
    super(options);
    this.reviver = options.reviver;
  }

  serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): unknown {
    const input = this.prepare(request, response, data, error);
    if (input.empty) return null;

    try {
      const parsed: unknown = JSON.parse(decodeText(input.data, 'utf-8'), this.reviver);
      return parsed;
    } catch (parseError) {
      throw new ResponseSerializationError({ kind: 'jsonSerializationFailed', error: toError(parseError) });
    }
  }
}

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * JSON body validated and typed by a zod schema. An allowed empty body is
 * checked against the schema as `undefined`, so `z.void()` or an optional
 * schema accepts it and anything else fails with `invalidEmptyResponse`.
 */
export class DecodableResponseSerializer<T> extends BaseResponseSerializer<T> {
  constructor(
    readonly schema: Schema<T>,
    options: SerializerOptions = {}
  ) {
    super(options);
  }

  serialize(request: HttpRequest | undefined, response: HttpResponse | undefined, data: Uint8Array | undefined, error: Error | undefined): T {
    const input = this.prepare(request, response, data, error);

    if (input.empty) {
      const empty = this.schema.safeParse(undefined);
      if (empty.success) return empty.data;
      throw new ResponseSerializationError({ kind: 'invalidEmptyResponse', type: this.schema.description ?? 'the expected type' });
    }

    let json: unknown;
    try {
      json = JSON.parse(decodeText(input.data, 'utf-8'));
    } catch (parseError) {
      throw new ResponseSerializationError({ kind: 'decodingFailed', error: toError(parseError) });
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      throw new ResponseSerializationError({ kind: 'decodingFailed', error: parsed.error });
    }
    return parsed.data;
  }
}

/**
 * Download serializer yielding the final file path.
 */
export class URLResponseSerializer implements DownloadResponseSerializerProtocol<string> {
  serializeDownload(_request: HttpRequest | undefined, _response: HttpResponse | undefined, fileUrl: string | undefined, error: Error | undefined): string {
    if (error) throw error;
    if (!fileUrl) throw new ResponseSerializationError({ kind: 'inputFileNil' });
    return fileUrl;
  }
}
