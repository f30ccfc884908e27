import { Headers, type HeadersInit } from 'undici';
import type { Method } from '../types/index.js';
import { InvalidUrlError } from './errors.js';

export type BodyInput = Uint8Array | string | null;

export interface HttpRequestInit {
  method?: Method;
  headers?: HeadersInit;
  body?: BodyInput;
  /** Per-request timeout in ms, overriding the network session's */
  timeout?: number;
}

const encoder = new TextEncoder();

function toBody(body: BodyInput | undefined): Uint8Array | null {
  if (body === undefined || body === null) return null;
  return typeof body === 'string' ? encoder.encode(body) : body;
}

function parseUrl(url: string | URL): URL {
  if (url instanceof URL) return new URL(url.href);
  try {
    return new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, error);
  }
}

/**
 * Immutable wire request: the method, URL, headers and body about to be
 * sent. Every `with*` helper returns a new instance.
 */
export class HttpRequest {
  public readonly url: URL;
  public readonly method: Method;
  public readonly headers: Headers;
  public readonly body: Uint8Array | null;
  public readonly timeout?: number;

  constructor(url: string | URL, init: HttpRequestInit = {}) {
    this.url = parseUrl(url);
    this.method = init.method || 'GET';
    this.headers = new Headers(init.headers);
    this.body = toBody(init.body);
    this.timeout = init.timeout;
  }

  header(name: string): string | undefined {
    return this.headers.get(name) ?? undefined;
  }

  withHeader(name: string, value: string): HttpRequest {
    const headers = new Headers(this.headers);
    headers.set(name, value);
    return this.copy({ headers });
  }

  withHeaders(values: Record<string, string>): HttpRequest {
    const headers = new Headers(this.headers);
    for (const [name, value] of Object.entries(values)) {
      headers.set(name, value);
    }
    return this.copy({ headers });
  }

  withoutHeader(name: string): HttpRequest {
    const headers = new Headers(this.headers);
    headers.delete(name);
    return this.copy({ headers });
  }

  withBody(body: BodyInput): HttpRequest {
    return this.copy({ body });
  }

  withUrl(url: string | URL): HttpRequest {
    return new HttpRequest(url, {
      method: this.method,
      headers: this.headers,
      body: this.body,
      timeout: this.timeout,
    });
  }

  withMethod(method: Method): HttpRequest {
    return this.copy({ method });
  }

  private copy(overrides: HttpRequestInit): HttpRequest {
    return new HttpRequest(this.url, {
      method: overrides.method ?? this.method,
      headers: overrides.headers ?? this.headers,
      body: overrides.body === undefined ? this.body : overrides.body,
      timeout: overrides.timeout ?? this.timeout,
    });
  }

  toString(): string {
    return `${this.method} ${this.url.href}`;
  }
}
