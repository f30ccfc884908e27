import { rm } from 'node:fs/promises';
import type { RequestConvertible } from '../core/convertible.js';
import { UploadableCreationError, type CourierError } from '../core/errors.js';
import type { UploadSource } from '../transport/network-session.js';
import { DataRequest } from './data-request.js';
import type { RequestInit } from './request.js';

/**
 * Deferred body source, built once per attempt.
 */
export interface UploadableConvertible {
  createUploadable(): UploadSource | Promise<UploadSource>;
}

export type Uploadable = UploadSource | UploadableConvertible;

export interface UploadOptions {
  /** Delete a file source once the request has finished */
  removeFileOnCleanup?: boolean;
}

function isUploadSource(upload: Uploadable): upload is UploadSource {
  return 'kind' in upload;
}

/**
 * Data request whose body comes from bytes, a file or a stream.
 */
export class UploadRequest extends DataRequest {
  readonly upload: Uploadable;
  readonly removeFileOnCleanup: boolean;
  private uploadableValue?: UploadSource;

  constructor(convertible: RequestConvertible, upload: Uploadable, init: RequestInit, options: UploadOptions = {}) {
    super(convertible, init);
    this.upload = upload;
    this.removeFileOnCleanup = options.removeFileOnCleanup ?? false;
  }

  /** Source of the latest attempt */
  get uploadable(): UploadSource | undefined {
    return this.uploadableValue;
  }

  /**
   * Resolves the body source for a new attempt.
   * @internal
   */
  async createUploadable(): Promise<UploadSource> {
    try {
      const source = isUploadSource(this.upload) ? this.upload : await this.upload.createUploadable();
      this.didCreateUploadable(source);
      return source;
    } catch (error) {
      throw error instanceof UploadableCreationError ? error : new UploadableCreationError(error);
    }
  }

  private didCreateUploadable(source: UploadSource): void {
    this.uploadableValue = source;
    this.eventMonitor?.emit('requestDidCreateUploadable', this, source);
  }

  /** @internal */
  didFailToCreateUploadable(error: CourierError): void {
    this.eventMonitor?.emit('requestDidFailToCreateUploadable', this, error);
    this.setError(error);
    void this.retryOrFinish(error);
  }

  protected override cleanup(): void {
    const source = this.uploadableValue;
    if (!this.removeFileOnCleanup || source?.kind !== 'file') return;

    rm(source.path, { force: true }).catch((error: unknown) => {
      this.delegate.logger.warn(`Failed to remove upload file ${source.path}: ${error instanceof Error ? error.message : String(error)}`);
    });
  }
}
