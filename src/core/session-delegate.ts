import type { TaskMetrics } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { CompositeEventMonitor } from '../events/event-monitor.js';
import type { CachedResponseHandler } from '../plugins/cached-response.js';
import type { RedirectHandler } from '../plugins/redirect.js';
import type { ServerTrustManager } from '../plugins/server-trust.js';
import { DataRequest } from '../requests/data-request.js';
import { DataStreamRequest } from '../requests/data-stream-request.js';
import { DownloadRequest } from '../requests/download-request.js';
import type { Request } from '../requests/request.js';
import type {
  AuthenticationChallenge,
  CachedResponse,
  ChallengeResponse,
  DownloadTask,
  NetworkSessionDelegate,
  SessionTask,
} from '../transport/network-session.js';
import { ServerTrustEvaluationError, toError } from './errors.js';
import type { HttpRequest } from './request.js';
import type { HttpResponse } from './response.js';
import { recordError } from './task-delegate.js';

/**
 * What the delegate needs from the session that owns the task map.
 */
export interface SessionStateProvider {
  readonly serverTrustManager?: ServerTrustManager;
  readonly redirectHandler?: RedirectHandler;
  readonly cachedResponseHandler?: CachedResponseHandler;
  readonly eventMonitor: CompositeEventMonitor;
  readonly logger: Logger;
  requestFor(task: SessionTask): Request | undefined;
  /** Drops the task from the map and returns its request */
  didCompleteTask(task: SessionTask): Request | undefined;
}

const performDefaultHandling: ChallengeResponse = { disposition: 'performDefaultHandling' };

/**
 * Routes network session callbacks to the request owning each task.
 * Callbacks for tasks no request owns get default behaviour.
 */
export class SessionDelegate implements NetworkSessionDelegate {
  private provider?: SessionStateProvider;

  /** @internal */
  attach(provider: SessionStateProvider): void {
    this.provider = provider;
  }

  private get eventMonitor(): CompositeEventMonitor | undefined {
    return this.provider?.eventMonitor;
  }

  private requestFor(task: SessionTask): Request | undefined {
    return this.provider?.requestFor(task);
  }

  async onChallenge(task: SessionTask | undefined, challenge: AuthenticationChallenge): Promise<ChallengeResponse> {
    if (task) this.eventMonitor?.emit('taskDidReceiveChallenge', task, challenge);

    switch (challenge.kind) {
      case 'serverTrust':
        return this.attemptServerTrustAuthentication(task, challenge);
      case 'httpBasic':
        return this.attemptCredentialAuthentication(task, challenge);
    }
  }

  private attemptServerTrustAuthentication(
    task: SessionTask | undefined,
    challenge: Extract<AuthenticationChallenge, { kind: 'serverTrust' }>
  ): ChallengeResponse {
    const manager = this.provider?.serverTrustManager;
    if (!manager) return performDefaultHandling;

    try {
      const evaluator = manager.serverTrustEvaluator(challenge.host);
      if (!evaluator) return performDefaultHandling;
      evaluator.evaluate(challenge.trust, challenge.host);
      return { disposition: 'useCredential' };
    } catch (error) {
      const trustError = error instanceof ServerTrustEvaluationError
        ? error
        : new ServerTrustEvaluationError({ kind: 'customEvaluationFailed', error: toError(error) });
      const request = task ? this.requestFor(task) : undefined;
      if (request) {
        recordError(request.currentTaskDelegate, trustError);
      } else {
        this.provider?.logger.warn(`Server trust evaluation for ${challenge.host} failed: ${trustError.message}`);
      }
      return { disposition: 'cancelAuthenticationChallenge' };
    }
  }

  private attemptCredentialAuthentication(
    task: SessionTask | undefined,
    challenge: Extract<AuthenticationChallenge, { kind: 'httpBasic' }>
  ): ChallengeResponse {
    const request = task ? this.requestFor(task) : undefined;
    if (!request) return performDefaultHandling;

    const delegate = request.currentTaskDelegate;
    if (delegate.credentialAttempted || challenge.previousFailureCount > 0) {
      return { disposition: 'rejectProtectionSpace' };
    }

    const credential = request.credential;
    if (!credential) return performDefaultHandling;

    delegate.credentialAttempted = true;
    return { disposition: 'useCredential', credential };
  }

  async onRedirect(task: SessionTask, response: HttpResponse, proposedRequest: HttpRequest): Promise<HttpRequest | null> {
    this.eventMonitor?.emit('taskWillPerformRedirection', task, response, proposedRequest);

    const request = this.requestFor(task);
    const handler = request?.redirectHandler ?? this.provider?.redirectHandler;
    if (!handler) return proposedRequest;
    return handler.taskWillBeRedirected(task, proposedRequest, response);
  }

  onResponse(task: SessionTask, response: HttpResponse): void {
    this.eventMonitor?.emit('taskDidReceiveResponse', task, response);
    this.requestFor(task)?.didReceiveResponse(response);
  }

  onData(task: SessionTask, chunk: Uint8Array): void {
    this.eventMonitor?.emit('dataTaskDidReceiveData', task, chunk);

    const request = this.requestFor(task);
    if (!(request instanceof DataRequest || request instanceof DataStreamRequest) || request.isCancelled) return;
    request.didReceiveData(chunk);
  }

  onUploadProgress(task: SessionTask, bytesSent: number, totalBytesSent: number, totalBytesExpectedToSend: number): void {
    this.eventMonitor?.emit('taskDidSendBodyData', task, bytesSent, totalBytesSent, totalBytesExpectedToSend);

    const request = this.requestFor(task);
    if (request instanceof DataRequest) request.didSendBodyData(totalBytesSent, totalBytesExpectedToSend);
  }

  onDidWriteData(task: DownloadTask, bytesWritten: number, totalBytesWritten: number, totalBytesExpectedToWrite: number): void {
    this.eventMonitor?.emit('downloadTaskDidWriteData', task, bytesWritten, totalBytesWritten, totalBytesExpectedToWrite);

    const request = this.requestFor(task);
    if (!(request instanceof DownloadRequest) || request.isCancelled) return;
    request.didWriteData(totalBytesWritten, totalBytesExpectedToWrite);
  }

  onDidResume(task: DownloadTask, fileOffset: number, expectedTotalBytes: number): void {
    this.eventMonitor?.emit('downloadTaskDidResumeAtOffset', task, fileOffset, expectedTotalBytes);

    const request = this.requestFor(task);
    if (request instanceof DownloadRequest) request.didResumeAtOffset(fileOffset, expectedTotalBytes);
  }

  async onDidFinishDownloading(task: DownloadTask, location: string): Promise<void> {
    this.eventMonitor?.emit('downloadTaskDidFinishDownloadingTo', task, location);

    const request = this.requestFor(task);
    if (request instanceof DownloadRequest) await request.didFinishDownloading(task, location);
  }

  async onWillCacheResponse(task: SessionTask, proposed: CachedResponse): Promise<CachedResponse | null> {
    this.eventMonitor?.emit('dataTaskWillCacheResponse', task, proposed);

    const request = this.requestFor(task);
    const handler = request?.cachedResponseHandler ?? this.provider?.cachedResponseHandler;
    if (!handler) return proposed;
    return handler.dataTaskWillCacheResponse(task, proposed);
  }

  onMetrics(task: SessionTask, metrics: TaskMetrics): void {
    this.eventMonitor?.emit('taskDidFinishCollectingMetrics', task, metrics);
    this.requestFor(task)?.didGatherMetrics(metrics);
  }

  onTaskComplete(task: SessionTask, error?: Error): void {
    this.eventMonitor?.emit('taskDidComplete', task, error);
    this.provider?.didCompleteTask(task)?.didCompleteTask(task, error);
  }
}
