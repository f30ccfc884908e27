import type { Executor, Result, TaskMetrics } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { DataResponse, DownloadResponse } from '../core/data-response.js';
import type { CourierError } from '../core/errors.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { ValidationResult } from '../core/validation.js';
import type { Request } from '../requests/request.js';
import type { UploadRequest } from '../requests/upload-request.js';
import type { DownloadRequest } from '../requests/download-request.js';
import type { DataStreamRequest } from '../requests/data-stream-request.js';
import type {
  AuthenticationChallenge,
  CachedResponse,
  DownloadTask,
  SessionTask,
  UploadSource,
} from '../transport/network-session.js';
import { mainExecutor } from '../utils/executor.js';

/**
 * Every lifecycle and transport event, keyed by name, with its arguments.
 */
export interface EventMonitorEventMap {
  // Network session callbacks
  taskDidReceiveChallenge: [task: SessionTask | undefined, challenge: AuthenticationChallenge];
  taskWillPerformRedirection: [task: SessionTask, response: HttpResponse, request: HttpRequest];
  taskDidSendBodyData: [task: SessionTask, bytesSent: number, totalBytesSent: number, totalBytesExpectedToSend: number];
  taskDidReceiveResponse: [task: SessionTask, response: HttpResponse];
  dataTaskDidReceiveData: [task: SessionTask, data: Uint8Array];
  dataTaskWillCacheResponse: [task: SessionTask, proposed: CachedResponse];
  downloadTaskDidResumeAtOffset: [task: DownloadTask, fileOffset: number, expectedTotalBytes: number];
  downloadTaskDidWriteData: [task: DownloadTask, bytesWritten: number, totalBytesWritten: number, totalBytesExpectedToWrite: number];
  downloadTaskDidFinishDownloadingTo: [task: DownloadTask, location: string];
  taskDidFinishCollectingMetrics: [task: SessionTask, metrics: TaskMetrics];
  taskDidComplete: [task: SessionTask, error: Error | undefined];

  // Request lifecycle
  requestDidCreateInitialURLRequest: [request: Request, urlRequest: HttpRequest];
  requestDidFailToCreateURLRequest: [request: Request, error: Error];
  requestDidAdaptInitialRequest: [request: Request, initial: HttpRequest, adapted: HttpRequest];
  requestDidFailToAdaptURLRequest: [request: Request, initial: HttpRequest, error: Error];
  requestDidCreateURLRequest: [request: Request, urlRequest: HttpRequest];
  requestDidCreateTask: [request: Request, task: SessionTask];
  requestDidGatherMetrics: [request: Request, metrics: TaskMetrics];
  requestDidCompleteTask: [request: Request, task: SessionTask, error: Error | undefined];
  requestIsRetrying: [request: Request];
  requestDidFinish: [request: Request];
  requestDidResume: [request: Request];
  requestDidResumeTask: [request: Request, task: SessionTask];
  requestDidSuspend: [request: Request];
  requestDidSuspendTask: [request: Request, task: SessionTask];
  requestDidCancel: [request: Request];
  requestDidCancelTask: [request: Request, task: SessionTask];
  requestDidValidateRequest: [request: Request, urlRequest: HttpRequest | undefined, response: HttpResponse, result: ValidationResult];
  requestDidParseResponse: [request: Request, response: DataResponse<unknown> | DownloadResponse<unknown>];
  requestDidParseStream: [request: DataStreamRequest, result: Result<unknown, CourierError>];
  requestDidCreateUploadable: [request: UploadRequest, uploadable: UploadSource];
  requestDidFailToCreateUploadable: [request: UploadRequest, error: Error];
  requestDidCreateDestinationURL: [request: DownloadRequest, url: string];
  requestDidFinishDownloading: [request: DownloadRequest, task: SessionTask, result: Result<string>];
}

export type EventMonitorEvent = keyof EventMonitorEventMap;

export type EventMonitorHandlers = {
  [E in EventMonitorEvent]?: (...args: EventMonitorEventMap[E]) => void;
};

/**
 * Observer of session and request events. Implement any subset of the
 * handlers; each runs on the monitor's `queue` (the main executor by
 * default) and never blocks the request pipeline.
 */
export type EventMonitor = EventMonitorHandlers & {
  readonly queue?: Executor;
};

/**
 * Fans each event out to several monitors. A throwing monitor is logged
 * and does not affect the others.
 */
export class CompositeEventMonitor {
  readonly monitors: readonly EventMonitor[];
  private readonly logger: Logger;

  constructor(monitors: readonly EventMonitor[], logger: Logger) {
    this.monitors = monitors;
    this.logger = logger;
  }

  emit<E extends EventMonitorEvent>(event: E, ...args: EventMonitorEventMap[E]): void {
    for (const monitor of this.monitors) {
      const handlers: EventMonitorHandlers = monitor;
      const handler = handlers[event];
      if (!handler) continue;

      const queue = monitor.queue ?? mainExecutor;
      queue(() => {
        try {
          handler.apply(monitor, args);
        } catch (error) {
          this.logger.error(`Event monitor failed handling ${event}: ${error instanceof Error ? error.message : String(error)}`);
        }
      });
    }
  }
}
