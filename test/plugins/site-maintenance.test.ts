import { describe, it, expect } from 'vitest';
import { HttpResponse } from '../../src/core/response.js';
import { parseRetryAfter, retryAfterSeconds, SiteMaintenanceResponse } from '../../src/plugins/site-maintenance.js';

describe('parseRetryAfter', () => {
  it('should read a delay in seconds', () => {
    expect(parseRetryAfter(' 120 ')).toEqual({ kind: 'seconds', seconds: 120 });
  });

  it('should read an HTTP date', () => {
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT')).toEqual({
      kind: 'date',
      date: new Date(Date.UTC(2026, 9, 21, 7, 28, 0)),
    });
  });

  it('should ignore missing and malformed values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });

  it('should reject fractional, negative and loosely formatted values', () => {
    expect(parseRetryAfter('1.5')).toBeUndefined();
    expect(parseRetryAfter('-1')).toBeUndefined();
    expect(parseRetryAfter('2026-10-21T07:28:00Z')).toBeUndefined();
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 +0000')).toBeUndefined();
  });
});

describe('retryAfterSeconds', () => {
  const now = Date.UTC(2026, 0, 1, 12, 0, 0);

  it('should return seconds as given', () => {
    expect(retryAfterSeconds({ kind: 'seconds', seconds: 30 }, now)).toBe(30);
  });

  it('should measure a date from now', () => {
    expect(retryAfterSeconds({ kind: 'date', date: new Date(now + 90_000) }, now)).toBe(90);
  });

  it('should not go below zero for a past date', () => {
    expect(retryAfterSeconds({ kind: 'date', date: new Date(now - 5_000) }, now)).toBe(0);
  });
});

describe('SiteMaintenanceResponse', () => {
  const url = 'https://api.example.test/';

  it('should read a 503 with Retry-After', () => {
    const response = new HttpResponse({ url, status: 503, headers: { 'retry-after': '60' } });

    expect(SiteMaintenanceResponse.from(response)).toEqual({ retryAfter: { kind: 'seconds', seconds: 60 } });
  });

  it('should read a 503 without Retry-After', () => {
    expect(SiteMaintenanceResponse.from(new HttpResponse({ url, status: 503 }))).toEqual({ retryAfter: undefined });
  });

  it('should ignore other statuses', () => {
    expect(SiteMaintenanceResponse.from(new HttpResponse({ url, status: 500, headers: { 'retry-after': '60' } }))).toBeUndefined();
  });
});
