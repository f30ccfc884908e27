import type { Method, Parameters } from '../types/index.js';
import { ParameterEncodingError, toError } from './errors.js';
import type { HttpRequest } from './request.js';

/**
 * Applies parameters to a wire request, returning the encoded copy.
 */
export interface ParameterEncoding {
  encode(request: HttpRequest, parameters?: Parameters): HttpRequest;
}

export type UrlEncodingDestination = 'methodDependent' | 'queryString' | 'httpBody';

/** How array values are keyed: `key[]=a`, `key=a` or `key[0]=a` */
export type ArrayEncoding = 'brackets' | 'noBrackets' | 'indexInBrackets';

/** How booleans are written: `1`/`0` or `true`/`false` */
export type BoolEncoding = 'numeric' | 'literal';

export interface UrlEncodingOptions {
  destination?: UrlEncodingDestination;
  arrayEncoding?: ArrayEncoding;
  boolEncoding?: BoolEncoding;
}

const QUERY_METHODS: ReadonlySet<Method> = new Set(['GET', 'HEAD', 'DELETE']);

/**
 * Percent-escapes a query component per RFC 3986, leaving `?` and `/`
 * unescaped since both are legal inside a query.
 */
export function escapeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%3F/gi, '?')
    .replace(/%2F/gi, '/');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * `application/x-www-form-urlencoded` encoding into the query string or the
 * body. Keys are sorted; nested objects become `outer[inner]` keys.
 */
export class URLEncoding implements ParameterEncoding {
  static readonly default = new URLEncoding();
  static readonly queryString = new URLEncoding({ destination: 'queryString' });
  static readonly httpBody = new URLEncoding({ destination: 'httpBody' });

  readonly destination: UrlEncodingDestination;
  readonly arrayEncoding: ArrayEncoding;
  readonly boolEncoding: BoolEncoding;

  constructor(options: UrlEncodingOptions = {}) {
    this.destination = options.destination ?? 'methodDependent';
    this.arrayEncoding = options.arrayEncoding ?? 'brackets';
    this.boolEncoding = options.boolEncoding ?? 'numeric';
  }

  encode(request: HttpRequest, parameters?: Parameters): HttpRequest {
    if (!parameters) return request;

    const query = this.query(parameters);

    if (this.encodesInUrl(request.method)) {
      if (query === '') return request;
      const url = new URL(request.url.href);
      const existing = url.search.startsWith('?') ? url.search.slice(1) : '';
      url.search = existing ? `${existing}&${query}` : query;
      return request.withUrl(url);
    }

    let encoded = request;
    if (!request.headers.has('content-type')) {
      encoded = encoded.withHeader('Content-Type', 'application/x-www-form-urlencoded; charset=utf-8');
    }
    return encoded.withBody(query);
  }

  query(parameters: Parameters): string {
    const components: Array<[string, string]> = [];
    for (const key of Object.keys(parameters).sort()) {
      components.push(...this.queryComponents(key, parameters[key]));
    }
    return components.map(([key, value]) => `${key}=${value}`).join('&');
  }

  queryComponents(key: string, value: unknown): Array<[string, string]> {
    if (value === undefined) return [];

    if (isRecord(value)) {
      return Object.keys(value)
        .sort()
        .flatMap((nestedKey) => this.queryComponents(`${key}[${nestedKey}]`, value[nestedKey]));
    }

    if (Array.isArray(value)) {
      return value.flatMap((element, index) => this.queryComponents(this.arrayKey(key, index), element));
    }

    return [[escapeQueryComponent(key), escapeQueryComponent(this.scalar(key, value))]];
  }

  private arrayKey(key: string, index: number): string {
    switch (this.arrayEncoding) {
      case 'brackets':
        return `${key}[]`;
      case 'noBrackets':
        return key;
      case 'indexInBrackets':
        return `${key}[${index}]`;
    }
  }

  private scalar(key: string, value: unknown): string {
    if (value === null) return '';
    if (typeof value === 'boolean') {
      if (this.boolEncoding === 'numeric') return value ? '1' : '0';
      return value ? 'true' : 'false';
    }
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
      return String(value);
    }
    throw new ParameterEncodingError({ kind: 'unsupportedValue', key });
  }

  private encodesInUrl(method: Method): boolean {
    switch (this.destination) {
      case 'methodDependent':
        return QUERY_METHODS.has(method);
      case 'queryString':
        return true;
      case 'httpBody':
        return false;
    }
  }
}

/**
 * JSON body encoding. Sets `Content-Type: application/json` unless the
 * request already has a content type.
 */
export class JSONEncoding implements ParameterEncoding {
  static readonly default = new JSONEncoding();
  static readonly prettyPrinted = new JSONEncoding({ pretty: true });

  readonly pretty: boolean;

  constructor(options: { pretty?: boolean } = {}) {
    this.pretty = options.pretty ?? false;
  }

  encode(request: HttpRequest, parameters?: Parameters): HttpRequest {
    if (!parameters) return request;

    let body: string;
    try {
      body = JSON.stringify(parameters, null, this.pretty ? 2 : undefined);
    } catch (error) {
      throw new ParameterEncodingError({ kind: 'jsonEncodingFailed', error: toError(error) });
    }

    let encoded = request;
    if (!request.headers.has('content-type')) {
      encoded = encoded.withHeader('Content-Type', 'application/json');
    }
    return encoded.withBody(body);
  }
}
