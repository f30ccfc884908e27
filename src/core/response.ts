import { STATUS_CODES } from 'node:http';
import { Headers, type HeadersInit } from 'undici';
import { normalizeCharset } from '../utils/charset.js';

export interface HttpResponseInit {
  url: string | URL;
  status: number;
  statusText?: string;
  headers?: HeadersInit;
}

/**
 * Response head metadata for one task: status line and headers.
 * The body lives in the owning task delegate.
 */
export class HttpResponse {
  public readonly url: URL;
  public readonly status: number;
  public readonly statusText: string;
  public readonly headers: Headers;

  constructor(init: HttpResponseInit) {
    this.url = new URL(init.url);
    this.status = init.status;
    this.statusText = init.statusText ?? STATUS_CODES[init.status] ?? '';
    this.headers = new Headers(init.headers);
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  header(name: string): string | undefined {
    return this.headers.get(name) ?? undefined;
  }

  /**
   * Lowercased media type of the Content-Type header, without parameters.
   */
  get mimeType(): string | undefined {
    const contentType = this.headers.get('content-type');
    if (!contentType) return undefined;
    const mime = contentType.split(';')[0].trim().toLowerCase();
    return mime || undefined;
  }

  /**
   * Normalized charset parameter of the Content-Type header.
   */
  get textEncodingName(): string | undefined {
    const contentType = this.headers.get('content-type');
    const match = contentType?.match(/charset\s*=\s*"?([^";]+)"?/i);
    return match ? normalizeCharset(match[1]) : undefined;
  }

  /**
   * Declared Content-Length, or -1 when absent or unparseable.
   */
  get expectedContentLength(): number {
    const value = this.headers.get('content-length');
    if (value === null) return -1;
    const length = Number.parseInt(value, 10);
    return Number.isFinite(length) && length >= 0 ? length : -1;
  }

  /**
   * File name from Content-Disposition, else the last URL path component.
   */
  get suggestedFilename(): string {
    const disposition = this.headers.get('content-disposition');
    if (disposition) {
      const extended = disposition.match(/filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i);
      if (extended) return safeFilename(decodeURIComponent(extended[1].trim()));
      const plain = disposition.match(/filename\s*=\s*"?([^";]+)"?/i);
      if (plain) return safeFilename(plain[1].trim());
    }
    const segments = this.url.pathname.split('/').filter(Boolean);
    const last = segments.at(-1);
    return last ? safeFilename(decodeURIComponent(last)) : 'download';
  }
}

function safeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  return base && base !== '.' && base !== '..' ? base : 'download';
}
