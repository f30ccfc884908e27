export * from './courier.js';
export * from './constants.js';

export * from './core/session.js';
export * from './core/session-delegate.js';
export * from './core/request.js';
export * from './core/response.js';
export * from './core/convertible.js';
export * from './core/parameter-encoding.js';
export * from './core/errors.js';
export * from './core/validation.js';
export * from './core/data-response.js';
export * from './core/response-serializer.js';
export * from './core/stream-serializer.js';
export type { TaskDelegate } from './core/task-delegate.js';

export * from './requests/request.js';
export * from './requests/data-request.js';
export * from './requests/upload-request.js';
export * from './requests/download-request.js';
export * from './requests/data-stream-request.js';

export * from './plugins/interceptor.js';
export * from './plugins/retry.js';
export * from './plugins/redirect.js';
export * from './plugins/cached-response.js';
export * from './plugins/server-trust.js';
export * from './plugins/site-maintenance.js';
export * from './plugins/authentication.js';
export * from './plugins/compression.js';
export * from './plugins/offline-retrier.js';

export * from './events/event-monitor.js';
export * from './events/logging-monitor.js';
export * from './events/session-events.js';

export * from './transport/network-session.js';
export * from './transport/undici-session.js';
export * from './transport/response-cache.js';

export * from './types/index.js';
export type { Logger as LoggerContract, LogMethod, LogLevelName } from './types/logger.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export { Logger, getLogger, setLogger, formatBytes, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { mainExecutor, immediateExecutor, createSerialExecutor } from './utils/executor.js';
export { HttpHeader, defaultHeaders, getDefaultUserAgent, getDefaultAcceptLanguage } from './utils/headers.js';
