import type { ProgressEvent } from '../types/index.js';
import type { SessionTask } from '../transport/network-session.js';
import { ProgressTracker } from '../utils/progress.js';
import type { HttpResponse } from './response.js';

/**
 * Per-task state, one value per underlying task. A retry gets a fresh
 * delegate so nothing accumulated by an earlier attempt leaks into the next.
 */
interface TaskDelegateState {
  error?: Error;
  /** Whether the request credential was already offered for an auth challenge */
  credentialAttempted: boolean;
}

export interface PlainTaskDelegate extends TaskDelegateState {
  readonly kind: 'plain';
  readonly task?: undefined;
}

interface BufferingState extends TaskDelegateState {
  readonly task: SessionTask;
  readonly chunks: Uint8Array[];
  byteLength: number;
  joined?: Uint8Array;
  readonly downloadProgress: ProgressTracker;
}

export interface DataTaskDelegate extends BufferingState {
  readonly kind: 'data';
}

export interface UploadTaskDelegate extends BufferingState {
  readonly kind: 'upload';
  readonly uploadProgress: ProgressTracker;
}

/** Chunks are handed straight to stream handlers; nothing is buffered */
export interface StreamTaskDelegate extends TaskDelegateState {
  readonly kind: 'stream';
  readonly task: SessionTask;
  readonly downloadProgress: ProgressTracker;
}

export interface DownloadTaskDelegate extends TaskDelegateState {
  readonly kind: 'download';
  readonly task: SessionTask;
  readonly downloadProgress: ProgressTracker;
  fileUrl?: string;
  resumeData?: Uint8Array;
  /** Set while resume data is being produced by a cancel */
  pendingResumeData?: Promise<void>;
}

export type TaskDelegate = PlainTaskDelegate | DataTaskDelegate | UploadTaskDelegate | StreamTaskDelegate | DownloadTaskDelegate;

export function createPlainTaskDelegate(): PlainTaskDelegate {
  return { kind: 'plain', credentialAttempted: false };
}

export function createTaskDelegate(task: SessionTask): TaskDelegate {
  switch (task.kind) {
    case 'data':
      return {
        kind: 'data',
        task,
        chunks: [],
        byteLength: 0,
        credentialAttempted: false,
        downloadProgress: new ProgressTracker({ direction: 'download' }),
      };
    case 'upload':
      return {
        kind: 'upload',
        task,
        chunks: [],
        byteLength: 0,
        credentialAttempted: false,
        downloadProgress: new ProgressTracker({ direction: 'download' }),
        uploadProgress: new ProgressTracker({ direction: 'upload' }),
      };
    case 'download':
      return {
        kind: 'download',
        task,
        credentialAttempted: false,
        downloadProgress: new ProgressTracker({ direction: 'download' }),
      };
  }
}

export function createStreamTaskDelegate(task: SessionTask): StreamTaskDelegate {
  return {
    kind: 'stream',
    task,
    credentialAttempted: false,
    downloadProgress: new ProgressTracker({ direction: 'download' }),
  };
}

/**
 * Response head arrived: the declared length becomes the expected total.
 */
export function didReceiveResponse(delegate: TaskDelegate, response: HttpResponse): void {
  switch (delegate.kind) {
    case 'data':
    case 'upload':
    case 'stream': {
      const expected = response.expectedContentLength;
      delegate.downloadProgress.setTotal(expected >= 0 ? expected : undefined);
      return;
    }
    case 'download':
    case 'plain':
      return;
  }
}

/**
 * Appends a body chunk. Returns the download progress to report, if any.
 */
export function didReceiveData(delegate: TaskDelegate, chunk: Uint8Array): ProgressEvent | undefined {
  switch (delegate.kind) {
    case 'data':
    case 'upload':
      delegate.chunks.push(chunk);
      delegate.byteLength += chunk.byteLength;
      delegate.joined = undefined;
      delegate.downloadProgress.add(chunk.byteLength);
      return delegate.downloadProgress.snapshot();
    case 'stream':
      delegate.downloadProgress.add(chunk.byteLength);
      return delegate.downloadProgress.snapshot();
    case 'download':
    case 'plain':
      return undefined;
  }
}

export function didSendBodyData(delegate: TaskDelegate, totalBytesSent: number, totalBytesExpectedToSend: number): ProgressEvent | undefined {
  if (delegate.kind !== 'upload') return undefined;
  delegate.uploadProgress.set(totalBytesSent, totalBytesExpectedToSend);
  return delegate.uploadProgress.snapshot();
}

export function didWriteData(delegate: TaskDelegate, totalBytesWritten: number, totalBytesExpectedToWrite: number): ProgressEvent | undefined {
  if (delegate.kind !== 'download') return undefined;
  delegate.downloadProgress.set(totalBytesWritten, totalBytesExpectedToWrite);
  return delegate.downloadProgress.snapshot();
}

export function didResumeAtOffset(delegate: TaskDelegate, fileOffset: number, expectedTotalBytes: number): ProgressEvent | undefined {
  if (delegate.kind !== 'download') return undefined;
  delegate.downloadProgress.set(fileOffset, expectedTotalBytes);
  return delegate.downloadProgress.snapshot();
}

export function didFinishDownloading(delegate: TaskDelegate, outcome: { fileUrl: string } | { error: Error }): void {
  if (delegate.kind !== 'download') return;
  if ('fileUrl' in outcome) {
    delegate.fileUrl = outcome.fileUrl;
  } else {
    recordError(delegate, outcome.error);
  }
}

/**
 * First error wins.
 */
export function recordError(delegate: TaskDelegate, error: Error): void {
  delegate.error ??= error;
}

/**
 * Task completed: indeterminate totals collapse to the bytes received.
 * Returns the final download progress, if the task tracks one.
 */
export function didComplete(delegate: TaskDelegate): ProgressEvent | undefined {
  switch (delegate.kind) {
    case 'data':
    case 'upload':
    case 'stream':
    case 'download':
      if (delegate.downloadProgress.expected === undefined) delegate.downloadProgress.complete();
      return delegate.downloadProgress.snapshot(true);
    case 'plain':
      return undefined;
  }
}

/**
 * Accumulated body bytes, or undefined for tasks that do not buffer or have
 * received nothing.
 */
export function receivedData(delegate: TaskDelegate): Uint8Array | undefined {
  switch (delegate.kind) {
    case 'data':
    case 'upload':
      if (delegate.byteLength === 0 && delegate.chunks.length === 0) return undefined;
      delegate.joined ??= Buffer.concat(delegate.chunks, delegate.byteLength);
      return delegate.joined;
    case 'stream':
    case 'download':
    case 'plain':
      return undefined;
  }
}
