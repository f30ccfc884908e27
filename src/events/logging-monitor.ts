import type { Logger } from '../types/logger.js';
import { consoleLogger } from '../types/logger.js';
import { describeResponse, type DataResponse, type DownloadResponse } from '../core/data-response.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { Request } from '../requests/request.js';
import type { SessionTask } from '../transport/network-session.js';
import type { EventMonitor } from './event-monitor.js';

export interface LoggingEventMonitorOptions {
  /**
   * Log level for requests/responses
   * @default 'debug'
   */
  level?: 'debug' | 'info';

  /**
   * Show request headers
   * @default false
   */
  showHeaders?: boolean;
}

/**
 * Event monitor that logs the request lifecycle. Attached automatically by
 * `new Session({ debug: true })`.
 *
 * @example With Pino
 * ```typescript
 * import pino from 'pino';
 *
 * const session = new Session({ eventMonitors: [new LoggingEventMonitor(pino())] });
 * ```
 */
export class LoggingEventMonitor implements EventMonitor {
  private readonly log: Logger;
  private readonly logFn: Logger['debug'];
  private readonly showHeaders: boolean;

  constructor(logger: Logger = consoleLogger, options: LoggingEventMonitorOptions = {}) {
    this.log = logger;
    this.logFn = options.level === 'info' ? logger.info.bind(logger) : logger.debug.bind(logger);
    this.showHeaders = options.showHeaders ?? false;
  }

  requestDidCreateURLRequest(request: Request, urlRequest: HttpRequest): void {
    // Pino-style structured logging
    const logData: Record<string, unknown> = {
      type: 'request',
      id: request.id,
      method: urlRequest.method,
      url: urlRequest.url.href,
    };

    if (this.showHeaders) {
      const headers: Record<string, string> = {};
      urlRequest.headers.forEach((value, name) => {
        // Mask sensitive headers
        headers[name] = name.toLowerCase() === 'authorization' ? '[REDACTED]' : value;
      });
      logData.headers = headers;
    }

    this.logFn(logData, `→ ${urlRequest.method} ${urlRequest.url.href}`);
  }

  taskWillPerformRedirection(_task: SessionTask, response: HttpResponse, request: HttpRequest): void {
    this.logFn({ type: 'redirect', status: response.status, to: request.url.href }, `↪ ${response.status} ${request.url.href}`);
  }

  requestIsRetrying(request: Request): void {
    this.log.warn({ type: 'retry', id: request.id, attempt: request.retryCount }, `↻ retrying ${request.toString()} (attempt ${request.retryCount + 1})`);
  }

  requestDidCancel(request: Request): void {
    this.logFn({ type: 'cancel', id: request.id }, `✖ cancelled ${request.toString()}`);
  }

  requestDidParseResponse(request: Request, response: DataResponse<unknown> | DownloadResponse<unknown>): void {
    const logData = {
      type: 'response',
      id: request.id,
      status: response.response?.status,
      duration: response.metrics ? Math.round(response.metrics.duration) : undefined,
    };

    if (response.result.success) {
      this.logFn(logData, `← ${describeResponse(response)}`);
    } else {
      this.log.error(logData, `✖ ${describeResponse(response)}`);
    }
  }
}
