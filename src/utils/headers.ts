import { Headers } from 'undici';
import { VERSION } from '../constants.js';
import type { Credential } from '../types/index.js';

/**
 * Factories for commonly used request headers.
 */
export const HttpHeader = {
  accept: (value: string): [string, string] => ['Accept', value],
  acceptEncoding: (value: string): [string, string] => ['Accept-Encoding', value],
  acceptLanguage: (value: string): [string, string] => ['Accept-Language', value],
  authorization: (value: string): [string, string] => ['Authorization', value],
  contentType: (value: string): [string, string] => ['Content-Type', value],
  userAgent: (value: string): [string, string] => ['User-Agent', value],

  basicAuth({ user, password }: Credential): [string, string] {
    const token = Buffer.from(`${user}:${password}`, 'utf8').toString('base64');
    return ['Authorization', `Basic ${token}`];
  },

  bearerToken(token: string): [string, string] {
    return ['Authorization', `Bearer ${token}`];
  },
} as const;

/**
 * Default User-Agent: `courier-http/<version> (node <version>; <platform>)`
 */
export function getDefaultUserAgent(): string {
  return `courier-http/${VERSION} (node ${process.versions.node}; ${process.platform})`;
}

/**
 * Accept-Language built from the process locale, with quality values
 * decreasing by 0.1 and stopping after six languages.
 */
export function getDefaultAcceptLanguage(locales: readonly string[] = [Intl.DateTimeFormat().resolvedOptions().locale]): string {
  return locales
    .slice(0, 6)
    .map((locale, index) => {
      const quality = Math.round((1 - index * 0.1) * 10) / 10;
      return index === 0 ? locale : `${locale};q=${quality.toFixed(1)}`;
    })
    .join(', ');
}

/**
 * Headers every request sent by a network session carries unless the
 * request sets them itself. No Accept-Encoding: undici's `request` hands
 * bodies over undecoded.
 */
export function defaultHeaders(): Headers {
  return new Headers({
    'Accept-Language': getDefaultAcceptLanguage(),
    'User-Agent': getDefaultUserAgent(),
  });
}

/**
 * Adds every header of `defaults` that `target` does not already carry.
 */
export function mergeMissingHeaders(target: Headers, defaults: Headers): Headers {
  const merged = new Headers(target);
  defaults.forEach((value, name) => {
    if (!merged.has(name)) merged.set(name, value);
  });
  return merged;
}
