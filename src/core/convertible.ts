import type { HeadersInit } from 'undici';
import type { Method, Parameters } from '../types/index.js';
import { InvalidUrlError } from './errors.js';
import { URLEncoding, type ParameterEncoding } from './parameter-encoding.js';
import { HttpRequest } from './request.js';

export type URLConvertible = string | URL;

/**
 * Anything that can produce a wire request. Producing it may fail (bad URL,
 * encoding error); the failure surfaces as the request's error.
 */
export interface URLRequestConvertible {
  asURLRequest(): HttpRequest | Promise<HttpRequest>;
}

export type RequestConvertible = HttpRequest | URLRequestConvertible;

export type RequestModifier = (request: HttpRequest) => HttpRequest;

export function asURL(value: URLConvertible): URL {
  if (value instanceof URL) return value;
  try {
    return new URL(value);
  } catch (error) {
    throw new InvalidUrlError(value, error);
  }
}

export async function asURLRequest(convertible: RequestConvertible): Promise<HttpRequest> {
  if (convertible instanceof HttpRequest) return convertible;
  return convertible.asURLRequest();
}

export interface RequestParts {
  method?: Method;
  parameters?: Parameters;
  encoding?: ParameterEncoding;
  headers?: HeadersInit;
  timeout?: number;
  /** Final hook over the built request, run after encoding */
  requestModifier?: RequestModifier;
}

/**
 * Lazily builds a wire request from a URL plus method, headers and
 * parameters. Nothing is validated until the session performs the request.
 */
export class RequestFromParts implements URLRequestConvertible {
  constructor(
    readonly url: URLConvertible,
    readonly parts: RequestParts = {}
  ) {}

  asURLRequest(): HttpRequest {
    const { method = 'GET', parameters, encoding = URLEncoding.default, headers, timeout, requestModifier } = this.parts;
    const request = new HttpRequest(asURL(this.url), { method, headers, timeout });
    const encoded = encoding.encode(request, parameters);
    return requestModifier ? requestModifier(encoded) : encoded;
  }
}
