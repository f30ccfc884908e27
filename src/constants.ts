/**
 * Global constants
 * Centralizes magic numbers and configuration defaults
 */

export const VERSION = '0.1.0';

// Retry policy defaults
export const DEFAULT_RETRY_LIMIT = 2;
export const DEFAULT_EXPONENTIAL_BACKOFF_BASE = 2;
export const DEFAULT_EXPONENTIAL_BACKOFF_SCALE = 0.5; // seconds

// Timeouts
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_HEADERS_TIMEOUT_MS = 30000;
export const DEFAULT_BODY_TIMEOUT_MS = 30000;

export const DEFAULT_MAX_REDIRECTS = 16;

// Response cache
export const DEFAULT_CACHE_MAX_ENTRIES = 100;
export const DEFAULT_CACHE_MAX_ENTRY_BYTES = 1024 * 1024; // 1MB

// Serialization
export const DEFAULT_EMPTY_RESPONSE_CODES: ReadonlySet<number> = new Set([204, 205]);
export const DEFAULT_EMPTY_REQUEST_METHODS: ReadonlySet<string> = new Set(['HEAD']);
export const GOOGLE_XSSI_PREFIX = ")]}',\n";
