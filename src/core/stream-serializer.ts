import { decodeText } from '../utils/charset.js';
import { ResponseSerializationError, toError } from './errors.js';
import { DataPreprocessors, type DataPreprocessor, type Schema } from './response-serializer.js';

/**
 * Turns one streamed body chunk into a value. Throwing reports a failed
 * chunk to the stream handler.
 */
export interface DataStreamSerializer<T> {
  serialize(data: Uint8Array): T;
}

/**
 * Hands chunks through unchanged.
 */
export class PassthroughStreamSerializer implements DataStreamSerializer<Uint8Array> {
  serialize(data: Uint8Array): Uint8Array {
    return data;
  }
}

/**
 * UTF-8 text. A multi-byte character split across two chunks is held back
 * until its remaining bytes arrive; invalid bytes become U+FFFD.
 */
export class StringStreamSerializer implements DataStreamSerializer<string> {
  private readonly decoder = new TextDecoder('utf-8');

  serialize(data: Uint8Array): string {
    return this.decoder.decode(data, { stream: true });
  }
}

/**
 * Each chunk parsed as one JSON document and checked against a zod schema.
 */
export class DecodableStreamSerializer<T> implements DataStreamSerializer<T> {
  readonly dataPreprocessor: DataPreprocessor;

  constructor(
    readonly schema: Schema<T>,
    options: { dataPreprocessor?: DataPreprocessor } = {}
  ) {
    this.dataPreprocessor = options.dataPreprocessor ?? DataPreprocessors.passthrough;
  }

  serialize(data: Uint8Array): T {
    let json: unknown;
    try {
      json = JSON.parse(decodeText(this.dataPreprocessor(data), 'utf-8'));
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
