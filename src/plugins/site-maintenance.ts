import type { HttpResponse } from '../core/response.js';

/**
 * Value of a `Retry-After` header: a delay, or the moment service resumes.
 */
export type RetryAfter =
  | { kind: 'seconds'; seconds: number }
  | { kind: 'date'; date: Date };

const IMF_FIXDATE = /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Parse Retry-After header value
 * Supports:
 * - Seconds: "120" (delay in seconds)
 * - HTTP-date: "Wed, 21 Oct 2025 07:28:00 GMT" (IMF-fixdate only)
 */
export function parseRetryAfter(headerValue: string | null | undefined): RetryAfter | undefined {
  if (!headerValue) return undefined;
  const value = headerValue.trim();

  if (/^\d+$/.test(value)) {
    return { kind: 'seconds', seconds: Number.parseInt(value, 10) };
  }

  const date = IMF_FIXDATE.test(value) ? Date.parse(value) : Number.NaN;
  if (!Number.isNaN(date)) {
    return { kind: 'date', date: new Date(date) };
  }

  return undefined;
}

/**
 * Seconds to wait from `now`; past dates yield 0.
 */
export function retryAfterSeconds(retryAfter: RetryAfter, now: number = Date.now()): number {
  switch (retryAfter.kind) {
    case 'seconds':
      return retryAfter.seconds;
    case 'date':
      return Math.max(retryAfter.date.getTime() - now, 0) / 1000;
  }
}

export interface SiteMaintenanceResponse {
  retryAfter?: RetryAfter;
}

export const SiteMaintenanceResponse = {
  /**
   * Reads a 503 Service Unavailable response. Other statuses are not
   * maintenance responses and yield undefined.
   */
  from(response: HttpResponse): SiteMaintenanceResponse | undefined {
    if (response.status !== 503) return undefined;
    return { retryAfter: parseRetryAfter(response.header('retry-after')) };
  },
};
