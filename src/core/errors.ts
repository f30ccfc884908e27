import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';

export type CourierErrorKind =
  | 'explicitlyCancelled'
  | 'invalidUrl'
  | 'parameterEncodingFailed'
  | 'createUrlRequestFailed'
  | 'createUploadableFailed'
  | 'requestAdaptationFailed'
  | 'requestRetryFailed'
  | 'responseValidationFailed'
  | 'responseSerializationFailed'
  | 'serverTrustEvaluationFailed'
  | 'downloadedFileMoveFailed'
  | 'sessionInvalidated'
  | 'sessionDeinitialized'
  | 'sessionTaskFailed'
  | 'timeout'
  | 'authenticationFailed'
  | 'invalidState';

export interface CourierErrorOptions {
  request?: HttpRequest;
  response?: HttpResponse;
  suggestions?: string[];
  retriable?: boolean;
  cause?: unknown;
}

export class CourierError extends Error {
  kind: CourierErrorKind;
  request?: HttpRequest;
  response?: HttpResponse;
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, kind: CourierErrorKind, options: CourierErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CourierError';
    this.kind = kind;
    this.request = options.request;
    this.response = options.response;
    this.suggestions = options.suggestions ?? [];
    this.retriable = options.retriable ?? false;
  }

  /**
   * The transport or user error this one wraps, when there is one.
   */
  get underlyingError(): Error | undefined {
    return this.cause instanceof Error ? this.cause : undefined;
  }
}

export class ExplicitlyCancelledError extends CourierError {
  constructor() {
    super('Request explicitly cancelled.', 'explicitlyCancelled');
    this.name = 'ExplicitlyCancelledError';
  }
}

export class InvalidUrlError extends CourierError {
  url: string;

  constructor(url: string, cause?: unknown) {
    super(`URL is not valid: ${url}`, 'invalidUrl', {
      cause,
      suggestions: [
        'Pass an absolute URL including the scheme, e.g. https://example.com/path.',
        'Percent-encode characters that are not allowed in URLs.'
      ]
    });
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

export type ParameterEncodingFailureReason =
  | { kind: 'missingUrl' }
  | { kind: 'jsonEncodingFailed'; error: Error }
  | { kind: 'unsupportedValue'; key: string };

export class ParameterEncodingError extends CourierError {
  reason: ParameterEncodingFailureReason;

  constructor(reason: ParameterEncodingFailureReason) {
    const messages: Record<ParameterEncodingFailureReason['kind'], string> = {
      missingUrl: 'URL request to encode was missing a URL',
      jsonEncodingFailed: 'JSON could not be encoded',
      unsupportedValue: 'Parameter value could not be encoded'
    };
    let message = messages[reason.kind];
    if (reason.kind === 'unsupportedValue') message += ` (key: ${reason.key})`;
    super(message, 'parameterEncodingFailed', {
      cause: reason.kind === 'jsonEncodingFailed' ? reason.error : undefined
    });
    this.name = 'ParameterEncodingError';
    this.reason = reason;
  }
}

export class CreateUrlRequestError extends CourierError {
  constructor(cause: unknown) {
    super(`URL request creation failed: ${describe(cause)}`, 'createUrlRequestFailed', { cause });
    this.name = 'CreateUrlRequestError';
  }
}

export class UploadableCreationError extends CourierError {
  constructor(cause: unknown) {
    super(`Uploadable creation failed: ${describe(cause)}`, 'createUploadableFailed', {
      cause,
      suggestions: ['Check that the upload file exists and is readable.']
    });
    this.name = 'UploadableCreationError';
  }
}

export class RequestAdaptationError extends CourierError {
  constructor(cause: unknown) {
    super(`Request adaption failed with error: ${describe(cause)}`, 'requestAdaptationFailed', { cause });
    this.name = 'RequestAdaptationError';
  }
}

/**
 * Raised when a retrier declines to retry and supplies its own error;
 * `originalError` is the error of the failed attempt.
 */
export class RequestRetryFailedError extends CourierError {
  retryError: Error;
  originalError: Error;

  constructor(retryError: Error, originalError: Error) {
    super(
      `Request retry failed with retry error: ${retryError.message}, original error: ${originalError.message}`,
      'requestRetryFailed',
      { cause: retryError }
    );
    this.name = 'RequestRetryFailedError';
    this.retryError = retryError;
    this.originalError = originalError;
  }
}

export type ValidationFailureReason =
  | { kind: 'unacceptableStatusCode'; code: number }
  | { kind: 'unacceptableContentType'; acceptableContentTypes: string[]; responseContentType: string }
  | { kind: 'missingContentType'; acceptableContentTypes: string[] }
  | { kind: 'dataFileNil' }
  | { kind: 'dataFileReadFailed'; path: string }
  | { kind: 'customValidationFailed'; error: Error };

export class ResponseValidationError extends CourierError {
  reason: ValidationFailureReason;

  constructor(reason: ValidationFailureReason, response?: HttpResponse) {
    super(`Response validation failed: ${validationMessage(reason)}`, 'responseValidationFailed', {
      response,
      cause: reason.kind === 'customValidationFailed' ? reason.error : undefined,
      retriable: reason.kind === 'unacceptableStatusCode' && isRetryableStatus(reason.code)
    });
    this.name = 'ResponseValidationError';
    this.reason = reason;
  }
}

function validationMessage(reason: ValidationFailureReason): string {
  switch (reason.kind) {
    case 'unacceptableStatusCode':
      return `unacceptable status code ${reason.code}.`;
    case 'unacceptableContentType':
      return `unacceptable content type "${reason.responseContentType}", expected one of ${reason.acceptableContentTypes.join(', ')}.`;
    case 'missingContentType':
      return `missing content type, expected one of ${reason.acceptableContentTypes.join(', ')}.`;
    case 'dataFileNil':
      return 'downloaded file was missing.';
    case 'dataFileReadFailed':
      return `downloaded file could not be read: ${reason.path}.`;
    case 'customValidationFailed':
      return reason.error.message;
  }
}

export type SerializationFailureReason =
  | { kind: 'inputDataNilOrZeroLength' }
  | { kind: 'inputFileNil' }
  | { kind: 'inputFileReadFailed'; path: string }
  | { kind: 'stringSerializationFailed'; encoding: string }
  | { kind: 'jsonSerializationFailed'; error: Error }
  | { kind: 'decodingFailed'; error: Error }
  | { kind: 'invalidEmptyResponse'; type: string }
  | { kind: 'customSerializationFailed'; error: Error };

export class ResponseSerializationError extends CourierError {
  reason: SerializationFailureReason;

  constructor(reason: SerializationFailureReason) {
    super(`Response could not be serialized: ${serializationMessage(reason)}`, 'responseSerializationFailed', {
      cause: 'error' in reason ? reason.error : undefined
    });
    this.name = 'ResponseSerializationError';
    this.reason = reason;
  }
}

function serializationMessage(reason: SerializationFailureReason): string {
  switch (reason.kind) {
    case 'inputDataNilOrZeroLength':
      return 'input data was empty.';
    case 'inputFileNil':
      return 'input file was missing.';
    case 'inputFileReadFailed':
      return `input file could not be read: ${reason.path}.`;
    case 'stringSerializationFailed':
      return `string could not be decoded with encoding ${reason.encoding}.`;
    case 'jsonSerializationFailed':
      return `JSON could not be parsed: ${reason.error.message}`;
    case 'decodingFailed':
      return `decoding failed: ${reason.error.message}`;
    case 'invalidEmptyResponse':
      return `empty response could not be represented as ${reason.type}.`;
    case 'customSerializationFailed':
      return reason.error.message;
  }
}

export type TrustFailureReason =
  | { kind: 'noRequiredEvaluator'; host: string }
  | { kind: 'noCertificatesFound' }
  | { kind: 'noPublicKeysFound' }
  | { kind: 'defaultEvaluationFailed'; host: string; detail: string }
  | { kind: 'hostValidationFailed'; host: string }
  | { kind: 'certificatePinningFailed'; host: string }
  | { kind: 'publicKeyPinningFailed'; host: string }
  | { kind: 'customEvaluationFailed'; error: Error };

export class ServerTrustEvaluationError extends CourierError {
  reason: TrustFailureReason;

  constructor(reason: TrustFailureReason) {
    super(`Server trust evaluation failed: ${trustMessage(reason)}`, 'serverTrustEvaluationFailed', {
      cause: reason.kind === 'customEvaluationFailed' ? reason.error : undefined,
      suggestions: [
        'Verify the pinned certificates or public keys match the server chain.',
        'Register an evaluator for every host when allHostsMustBeEvaluated is set.'
      ]
    });
    this.name = 'ServerTrustEvaluationError';
    this.reason = reason;
  }
}

function trustMessage(reason: TrustFailureReason): string {
  switch (reason.kind) {
    case 'noRequiredEvaluator':
      return `no evaluator registered for host ${reason.host}.`;
    case 'noCertificatesFound':
      return 'no certificates were found to pin against.';
    case 'noPublicKeysFound':
      return 'no public keys were found to pin against.';
    case 'defaultEvaluationFailed':
      return `certificate for ${reason.host} was rejected (${reason.detail}).`;
    case 'hostValidationFailed':
      return `certificate does not match host ${reason.host}.`;
    case 'certificatePinningFailed':
      return `no pinned certificate matched for host ${reason.host}.`;
    case 'publicKeyPinningFailed':
      return `no pinned public key matched for host ${reason.host}.`;
    case 'customEvaluationFailed':
      return reason.error.message;
  }
}

export class DownloadFileMoveError extends CourierError {
  source: string;
  destination: string;

  constructor(source: string, destination: string, cause: unknown) {
    super(`Moving downloaded file from ${source} to ${destination} failed: ${describe(cause)}`, 'downloadedFileMoveFailed', {
      cause,
      suggestions: [
        'Enable createIntermediateDirectories if the destination folder may not exist.',
        'Enable removePreviousFile to overwrite an existing destination.'
      ]
    });
    this.name = 'DownloadFileMoveError';
    this.source = source;
    this.destination = destination;
  }
}

export class SessionInvalidatedError extends CourierError {
  constructor(cause?: unknown) {
    super('Session was invalidated' + (cause === undefined ? '.' : `: ${describe(cause)}`), 'sessionInvalidated', { cause });
    this.name = 'SessionInvalidatedError';
  }
}

export class SessionDeinitializedError extends CourierError {
  constructor() {
    super('Session was destroyed while requests were still outstanding.', 'sessionDeinitialized', {
      suggestions: ['Keep a reference to the Session until every request has finished.']
    });
    this.name = 'SessionDeinitializedError';
  }
}

/**
 * Transport-level failure of an underlying task (socket, DNS, TLS).
 */
export class SessionTaskError extends CourierError {
  code?: string;
  /** Continuation state when a download failed part way and can resume */
  resumeData?: Uint8Array;

  constructor(
    message: string,
    options: { code?: string; request?: HttpRequest; cause?: unknown; retriable?: boolean; resumeData?: Uint8Array } = {}
  ) {
    super(message, 'sessionTaskFailed', {
      request: options.request,
      cause: options.cause,
      retriable: options.retriable ?? true,
      suggestions: [
        'Confirm the host and port are reachable from this environment.',
        'Check proxy/VPN/firewall settings that might block the request.',
        'Retry the request if this is transient.'
      ]
    });
    this.name = 'SessionTaskError';
    this.code = options.code;
    this.resumeData = options.resumeData;
  }
}

export type TimeoutPhase =
  | 'connect'   // TCP/TLS connection
  | 'headers'   // Waiting for response head (TTFB)
  | 'body'      // Idle time between body chunks
  | 'request';  // Total request time

export class TimeoutError extends CourierError {
  phase: TimeoutPhase;
  timeout?: number;

  constructor(phase: TimeoutPhase, options: { timeout?: number; request?: HttpRequest; cause?: unknown } = {}) {
    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'Connection timed out',
      headers: 'Waiting for response headers timed out',
      body: 'Waiting for response body timed out',
      request: 'Request timed out'
    };
    let message = phaseMessages[phase];
    if (options.timeout !== undefined) message += ` after ${options.timeout}ms`;
    super(message, 'timeout', {
      request: options.request,
      cause: options.cause,
      retriable: true,
      suggestions: [
        'Verify network connectivity for the target host.',
        'Increase the timeout for this phase or optimize the upstream response time.'
      ]
    });
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeout = options.timeout;
  }
}

export type AuthenticationFailureReason = 'missingCredential' | 'excessiveRefresh';

/**
 * Raised by an AuthenticationInterceptor: no credential to apply, or more
 * refreshes inside the refresh window than it allows.
 */
export class AuthenticationError extends CourierError {
  reason: AuthenticationFailureReason;

  constructor(reason: AuthenticationFailureReason) {
    super(
      reason === 'missingCredential'
        ? 'Authentication failed: no credential is available.'
        : 'Authentication failed: the credential was refreshed too often.',
      'authenticationFailed',
      {
        suggestions: reason === 'missingCredential'
          ? ['Set a credential on the interceptor before sending requests.']
          : ['Check that refreshed credentials are accepted by the server.']
      }
    );
    this.name = 'AuthenticationError';
    this.reason = reason;
  }
}

/**
 * Error thrown when a state precondition is not met
 */
export class StateError extends CourierError {
  expectedState?: string;
  actualState?: string;

  constructor(message: string, options?: { expectedState?: string; actualState?: string }) {
    super(message, 'invalidState', {
      suggestions: ['Check that operations are called in the correct order.']
    });
    this.name = 'StateError';
    this.expectedState = options?.expectedState;
    this.actualState = options?.actualState;
  }
}

export function isRetryableStatus(status: number): boolean {
  return [408, 425, 429, 500, 502, 503, 504].includes(status);
}

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value) ?? String(value));
}

/**
 * Errors reported by a network session, as CourierErrors.
 */
export function asTaskError(error: Error): CourierError {
  if (error instanceof CourierError) return error;
  return new SessionTaskError(error.message, { cause: error });
}

function describe(value: unknown): string {
  return toError(value).message;
}
