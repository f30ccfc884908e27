import type { Readable } from 'node:stream';
import type { DetailedPeerCertificate } from 'node:tls';
import type { Credential, TaskMetrics } from '../types/index.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';

export type TaskState = 'suspended' | 'running' | 'canceling' | 'completed';

export type TaskKind = 'data' | 'upload' | 'download';

/**
 * Handle to one in-flight network operation. Tasks are created suspended
 * and start moving bytes on the first `resume()`.
 */
export interface SessionTask {
  readonly taskIdentifier: number;
  readonly kind: TaskKind;
  readonly originalRequest: HttpRequest;
  /** Request currently being sent; differs from the original after redirects */
  readonly currentRequest: HttpRequest;
  readonly response?: HttpResponse;
  readonly state: TaskState;
  readonly error?: Error;
  readonly countOfBytesReceived: number;
  /** -1 while unknown */
  readonly countOfBytesExpectedToReceive: number;
  readonly countOfBytesSent: number;
  readonly countOfBytesExpectedToSend: number;
  resume(): void;
  suspend(): void;
  cancel(): void;
}

export interface DownloadTask extends SessionTask {
  readonly kind: 'download';
  /**
   * Cancels the task and resolves with an opaque blob a later download can
   * continue from, or undefined when the transfer cannot be resumed.
   */
  cancelByProducingResumeData(): Promise<Uint8Array | undefined>;
}

export function isDownloadTask(task: SessionTask): task is DownloadTask {
  return task.kind === 'download';
}

export type UploadSource =
  | { kind: 'data'; data: Uint8Array }
  | { kind: 'file'; path: string }
  /** Factory so each attempt reads a fresh stream */
  | { kind: 'stream'; stream: () => Readable };

/**
 * TLS state handed to trust evaluation.
 */
export interface ServerTrust {
  host: string;
  port: number;
  peerCertificate: DetailedPeerCertificate;
  /** Whether the platform's own chain validation accepted the peer */
  authorized: boolean;
  authorizationError?: string;
}

export type AuthenticationChallenge =
  | { kind: 'serverTrust'; host: string; port: number; trust: ServerTrust }
  | { kind: 'httpBasic'; host: string; port: number; realm?: string; previousFailureCount: number };

export type ChallengeResponse =
  | { disposition: 'useCredential'; credential?: Credential }
  | { disposition: 'performDefaultHandling' }
  | { disposition: 'cancelAuthenticationChallenge' }
  | { disposition: 'rejectProtectionSpace' };

export type CacheStoragePolicy = 'allowed' | 'allowedInMemoryOnly' | 'notAllowed';

export interface CachedResponse {
  response: HttpResponse;
  data: Uint8Array;
  storagePolicy: CacheStoragePolicy;
}

/**
 * Callbacks a network session delivers for its tasks. Every callback for
 * one session is delivered on the same event loop, in order per task.
 * Metrics are always delivered before completion.
 */
export interface NetworkSessionDelegate {
  /** Resolve with the request to follow, or null to surface the 3xx response */
  onRedirect(task: SessionTask, response: HttpResponse, proposedRequest: HttpRequest): Promise<HttpRequest | null>;
  onChallenge(task: SessionTask | undefined, challenge: AuthenticationChallenge): Promise<ChallengeResponse>;
  onResponse(task: SessionTask, response: HttpResponse): void;
  onData(task: SessionTask, chunk: Uint8Array): void;
  onUploadProgress(task: SessionTask, bytesSent: number, totalBytesSent: number, totalBytesExpectedToSend: number): void;
  onDidWriteData(task: DownloadTask, bytesWritten: number, totalBytesWritten: number, totalBytesExpectedToWrite: number): void;
  onDidResume(task: DownloadTask, fileOffset: number, expectedTotalBytes: number): void;
  /** The temporary file is removed once the returned promise settles */
  onDidFinishDownloading(task: DownloadTask, location: string): Promise<void>;
  onWillCacheResponse(task: SessionTask, proposed: CachedResponse): Promise<CachedResponse | null>;
  onMetrics(task: SessionTask, metrics: TaskMetrics): void;
  onTaskComplete(task: SessionTask, error?: Error): void;
}

/**
 * The asynchronous networking primitive the session layer drives.
 */
export interface NetworkSession {
  /** Registers the single delegate; a session accepts exactly one */
  attach(delegate: NetworkSessionDelegate): void;
  dataTask(request: HttpRequest): SessionTask;
  uploadTask(request: HttpRequest, source: UploadSource): SessionTask;
  downloadTask(request: HttpRequest): DownloadTask;
  downloadTaskWithResumeData(resumeData: Uint8Array): DownloadTask;
  /** Cancels every task and refuses new ones */
  invalidateAndCancel(): void;
  /** Lets running tasks finish and refuses new ones */
  finishTasksAndInvalidate(): void;
}
