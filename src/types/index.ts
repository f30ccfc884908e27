export type Method =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'PATCH'
  | 'HEAD'
  | 'OPTIONS'
  | 'TRACE'
  | 'CONNECT';

/**
 * Runs a unit of work on some execution context.
 *
 * The default delivery executor is {@link mainExecutor}-style `setImmediate`
 * scheduling; monitors and serializers may each declare their own.
 */
export type Executor = (work: () => void) => void;

export type TransferDirection = 'upload' | 'download';

export interface ProgressEvent {
  loaded: number;    // Bytes transferred
  total?: number;    // Total bytes, undefined while indeterminate
  percent?: number;  // Percentage (0-100)
  rate?: number;     // Bytes per second
  estimated?: number; // Estimated time remaining in ms
  direction: TransferDirection;
}

export type ProgressCallback = (progress: ProgressEvent) => void;

export interface Credential {
  user: string;
  password: string;
}

export type Parameters = Record<string, unknown>;

/**
 * Success value XOR error.
 */
export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export interface TaskMetrics {
  /** Epoch ms when the task was resumed for the first time */
  start: number;
  /** Epoch ms when the task completed */
  end: number;
  /** Wall time between start and end in ms */
  duration: number;
  redirectCount: number;
  /** Ms until the response head arrived */
  firstByte?: number;
  fromCache: boolean;
}
