import { statSync } from 'node:fs';
import type { Result } from '../types/index.js';
import { CourierError, ResponseValidationError } from './errors.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';

export type ValidationResult = Result<void>;

export const ValidationResult = {
  success: { success: true, value: undefined } satisfies ValidationResult,
  failure: (error: Error): ValidationResult => ({ success: false, error }),
};

export type DataValidation = (
  request: HttpRequest | undefined,
  response: HttpResponse,
  data: Uint8Array | undefined
) => ValidationResult;

export type DownloadValidation = (
  request: HttpRequest | undefined,
  response: HttpResponse,
  fileUrl: string | undefined
) => ValidationResult;

export type AcceptableStatusCodes = Iterable<number> | ((statusCode: number) => boolean);

/** 200..<300 */
export const defaultAcceptableStatusCodes = (statusCode: number): boolean => statusCode >= 200 && statusCode < 300;

class MimeType {
  constructor(
    readonly type: string,
    readonly subtype: string
  ) {}

  static parse(value: string): MimeType | undefined {
    const essence = value.trim().split(';')[0].trim().toLowerCase();
    const [type, subtype, ...rest] = essence.split('/');
    if (!type || !subtype || rest.length > 0) return undefined;
    return new MimeType(type, subtype);
  }

  get isWildcard(): boolean {
    return this.type === '*' && this.subtype === '*';
  }

  /**
   * Whether a response of type `other` satisfies this acceptable type.
   */
  matches(other: MimeType): boolean {
    const typeMatches = this.type === '*' || this.type === other.type;
    const subtypeMatches = this.subtype === '*' || this.subtype === other.subtype;
    return typeMatches && subtypeMatches;
  }
}

/**
 * Content types from the request's Accept header, `*\/*` when absent.
 */
export function acceptableContentTypes(request: HttpRequest | undefined): string[] {
  const accept = request?.header('accept');
  if (!accept) return ['*/*'];
  return accept.split(',').map((value) => value.trim()).filter(Boolean);
}

export function validateStatusCode(response: HttpResponse, acceptable: AcceptableStatusCodes): ValidationResult {
  const isAcceptable = typeof acceptable === 'function'
    ? acceptable(response.status)
    : [...acceptable].includes(response.status);
  if (isAcceptable) return ValidationResult.success;
  return ValidationResult.failure(
    new ResponseValidationError({ kind: 'unacceptableStatusCode', code: response.status }, response)
  );
}

/**
 * Content type check. Empty bodies always pass; a missing content type
 * passes only when `*\/*` is acceptable.
 */
export function validateContentType(response: HttpResponse, acceptable: string[], data: Uint8Array | undefined): ValidationResult {
  if (!data || data.byteLength === 0) return ValidationResult.success;
  return validateContentTypeOf(response, acceptable);
}

/**
 * Content type check that does not look at the body.
 */
export function validateContentTypeOf(response: HttpResponse, acceptable: string[]): ValidationResult {
  const responseContentType = response.mimeType;
  const responseMimeType = responseContentType ? MimeType.parse(responseContentType) : undefined;

  if (!responseContentType || !responseMimeType) {
    if (acceptable.some((contentType) => MimeType.parse(contentType)?.isWildcard)) {
      return ValidationResult.success;
    }
    return ValidationResult.failure(
      new ResponseValidationError({ kind: 'missingContentType', acceptableContentTypes: acceptable }, response)
    );
  }

  if (acceptable.some((contentType) => MimeType.parse(contentType)?.matches(responseMimeType))) {
    return ValidationResult.success;
  }

  return ValidationResult.failure(
    new ResponseValidationError(
      { kind: 'unacceptableContentType', acceptableContentTypes: acceptable, responseContentType },
      response
    )
  );
}

/**
 * Content type check for a downloaded file. Only the file size is read.
 */
export function validateDownloadContentType(response: HttpResponse, acceptable: string[], fileUrl: string | undefined): ValidationResult {
  if (!fileUrl) {
    return ValidationResult.failure(new ResponseValidationError({ kind: 'dataFileNil' }, response));
  }
  let size: number;
  try {
    size = statSync(fileUrl).size;
  } catch {
    return ValidationResult.failure(new ResponseValidationError({ kind: 'dataFileReadFailed', path: fileUrl }, response));
  }
  if (size === 0) return ValidationResult.success;
  return validateContentTypeOf(response, acceptable);
}

/**
 * Wraps a validation error that is not already a CourierError as `customValidationFailed`.
 */
export function asValidationError(error: Error, response: HttpResponse): CourierError {
  if (error instanceof CourierError) return error;
  return new ResponseValidationError({ kind: 'customValidationFailed', error }, response);
}
