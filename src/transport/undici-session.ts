/**
 * Network session on top of undici.
 *
 * Redirects and Basic challenges are handled here rather than by the
 * dispatcher so every hop goes through the delegate. Server trust is
 * evaluated from the connector: undici validates nothing on its own and the
 * delegate decides per host.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { open, rm, stat } from 'node:fs/promises';
import type { IncomingHttpHeaders } from 'node:http';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { TLSSocket, type ConnectionOptions } from 'node:tls';
import { Agent, Headers, buildConnector, errors as undiciErrors, request as undiciRequest, type Dispatcher } from 'undici';
import { z } from 'zod';
import {
  DEFAULT_BODY_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEADERS_TIMEOUT_MS,
  DEFAULT_MAX_REDIRECTS,
} from '../constants.js';
import { CourierError, SessionTaskError, StateError, TimeoutError, toError } from '../core/errors.js';
import { HttpRequest } from '../core/request.js';
import { HttpResponse } from '../core/response.js';
import type { Method } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import { createDeferred, Gate } from '../utils/gate.js';
import { defaultHeaders, HttpHeader, mergeMissingHeaders } from '../utils/headers.js';
import { getLogger } from '../utils/logger.js';
import { tryFn } from '../utils/try-fn.js';
import type {
  DownloadTask,
  NetworkSession,
  NetworkSessionDelegate,
  SessionTask,
  TaskKind,
  TaskState,
  UploadSource,
} from './network-session.js';
import { MemoryResponseCache, type ResponseCacheOptions } from './response-cache.js';

export type TlsOptions = Pick<
  ConnectionOptions,
  'ca' | 'cert' | 'key' | 'passphrase' | 'servername' | 'minVersion' | 'maxVersion' | 'ciphers' | 'rejectUnauthorized'
>;

export interface UndiciSessionOptions {
  /**
   * Dispatcher every task goes through, e.g. a MockAgent in tests.
   * Server trust challenges are only raised by the session's own agent.
   */
  dispatcher?: Dispatcher;
  /** @default 10000 */
  connectTimeout?: number;
  /** @default 30000 */
  headersTimeout?: number;
  /** @default 30000 */
  bodyTimeout?: number;
  /** @default 16 */
  maxRedirects?: number;
  tls?: TlsOptions;
  /** In-memory response cache for GET data tasks. Off by default */
  cache?: boolean | ResponseCacheOptions;
  /** Where downloads are written before the delegate moves them. Defaults to the OS temp dir */
  temporaryDirectory?: string;
  /** Sent with every request that does not set them itself */
  httpAdditionalHeaders?: Record<string, string>;
  logger?: Logger;
}

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

const resumeDataSchema = z.object({
  version: z.literal(1),
  url: z.string().url(),
  headers: z.array(z.tuple([z.string(), z.string()])),
  temporaryPath: z.string().min(1),
  bytesReceived: z.number().int().nonnegative(),
  validator: z.string().optional(),
});

type ResumeBlob = z.infer<typeof resumeDataSchema>;

interface ResumeState {
  path: string;
  offset: number;
  validator?: string;
}

interface TransferMetrics {
  redirectCount: number;
  firstByte?: number;
  fromCache: boolean;
}

let nextTaskIdentifier = 1;

// Connections are opened inside the request call chain, so the connector can
// find which task it is connecting for.
const taskContext = new AsyncLocalStorage<SessionTask>();

class UndiciSessionTask implements SessionTask {
  readonly taskIdentifier = nextTaskIdentifier++;
  currentRequest: HttpRequest;
  response?: HttpResponse;
  state: TaskState = 'suspended';
  error?: Error;
  countOfBytesReceived = 0;
  countOfBytesExpectedToReceive = -1;
  countOfBytesSent = 0;
  countOfBytesExpectedToSend = 0;

  readonly abortController = new AbortController();
  timedOut = false;

  private started = false;
  private pauseGate = new Gate();
  private readonly completed = createDeferred<void>();

  constructor(
    readonly kind: TaskKind,
    readonly originalRequest: HttpRequest,
    private readonly runner: (task: UndiciSessionTask) => Promise<void>,
    readonly upload?: UploadSource
  ) {
    this.currentRequest = originalRequest;
  }

  resume(): void {
    if (this.state === 'canceling' || this.state === 'completed') return;
    this.state = 'running';
    this.pauseGate.open();
    this.start();
  }

  suspend(): void {
    if (this.state !== 'running') return;
    this.state = 'suspended';
    this.pauseGate = new Gate();
  }

  cancel(): void {
    if (this.state === 'canceling' || this.state === 'completed') return;
    this.state = 'canceling';
    this.abortController.abort();
    this.pauseGate.open();
    // a task cancelled before it ever ran still reports completion
    this.start();
  }

  /** Resolves once the task is running or cancelled */
  waitIfSuspended(): Promise<void> {
    return this.pauseGate.wait();
  }

  complete(error: Error | undefined): void {
    this.error = error;
    this.state = 'completed';
    this.completed.resolve();
  }

  whenCompleted(): Promise<void> {
    return this.completed.promise;
  }

  private start(): void {
    if (this.started) return;
    this.started = true;
    void this.runner(this);
  }
}

class UndiciDownloadTask extends UndiciSessionTask implements DownloadTask {
  declare readonly kind: 'download';
  readonly temporaryPath: string;
  produceResumeData = false;
  resumeData?: Uint8Array;

  constructor(
    request: HttpRequest,
    runner: (task: UndiciSessionTask) => Promise<void>,
    temporaryDirectory: string,
    readonly resumeFrom?: ResumeState
  ) {
    super('download', request, runner);
    this.temporaryPath = resumeFrom?.path ?? join(temporaryDirectory, `courier-download-${randomUUID()}.tmp`);
  }

  async cancelByProducingResumeData(): Promise<Uint8Array | undefined> {
    this.produceResumeData = true;
    this.cancel();
    await this.whenCompleted();
    return this.resumeData;
  }
}

function toHeaders(incoming: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }
  return headers;
}

function headerRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name] = value;
  });
  return record;
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk);
  throw new TypeError(`Unexpected body chunk of type ${typeof chunk}`);
}

async function* bytesOf(source: AsyncIterable<unknown>): AsyncGenerator<Uint8Array> {
  for await (const chunk of source) yield toBytes(chunk);
}

function concatBytes(chunks: Uint8Array[]): Uint8Array {
  return Buffer.concat(chunks);
}

function basicChallengeRealm(value: string | string[] | undefined): { realm?: string } | undefined {
  const challenges = Array.isArray(value) ? value : value ? [value] : [];
  for (const challenge of challenges) {
    if (!/^\s*basic\b/i.test(challenge)) continue;
    const realm = /realm="([^"]*)"/i.exec(challenge)?.[1];
    return { realm };
  }
  return undefined;
}

function defaultPort(url: URL): number {
  if (url.port) return Number(url.port);
  return url.protocol === 'https:' ? 443 : 80;
}

/** Total size from `Content-Range: bytes a-b/total`, or undefined when unknown */
function contentRangeTotal(value: string | undefined): number | undefined {
  const match = value ? /\/(\d+)\s*$/.exec(value) : null;
  return match?.[1] ? Number(match[1]) : undefined;
}

/**
 * The request to follow a redirect with. 303, and 301/302 for anything but
 * GET or HEAD, become a body-less GET. Credentials never cross origins.
 */
export function redirectedRequest(request: HttpRequest, status: number, location: URL): HttpRequest {
  let next = request.withUrl(location);

  const rewritesToGet = status === 303 || ((status === 301 || status === 302) && request.method !== 'GET' && request.method !== 'HEAD');
  if (rewritesToGet) {
    next = next
      .withMethod(status === 303 && request.method === 'HEAD' ? 'HEAD' : 'GET')
      .withBody(null)
      .withoutHeader('content-type')
      .withoutHeader('content-length');
  }

  if (location.origin !== request.url.origin) {
    next = next.withoutHeader('authorization').withoutHeader('cookie');
  }
  return next;
}

export function encodeResumeData(blob: ResumeBlob): Uint8Array {
  return Buffer.from(JSON.stringify(blob), 'utf8');
}

/**
 * Parses a resume blob produced by a cancelled or failed download.
 * Throws a SessionTaskError when the blob is not one.
 */
export function decodeResumeData(data: Uint8Array): ResumeBlob {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(data).toString('utf8'));
  } catch (error) {
    throw new SessionTaskError('Resume data could not be read.', { code: 'ERR_INVALID_RESUME_DATA', cause: error, retriable: false });
  }
  const parsed = resumeDataSchema.safeParse(json);
  if (!parsed.success) {
    throw new SessionTaskError('Resume data could not be read.', {
      code: 'ERR_INVALID_RESUME_DATA',
      cause: parsed.error,
      retriable: false,
    });
  }
  return parsed.data;
}

export class UndiciNetworkSession implements NetworkSession {
  private delegate?: NetworkSessionDelegate;
  private invalidated = false;
  private readonly tasks = new Set<UndiciSessionTask>();
  private readonly dispatcher: Dispatcher;
  private readonly ownAgent?: Agent;
  private readonly cache?: MemoryResponseCache;
  private readonly additionalHeaders: Headers;
  private readonly headersTimeout: number;
  private readonly bodyTimeout: number;
  private readonly maxRedirects: number;
  private readonly temporaryDirectory: string;
  private readonly tls: TlsOptions;
  private readonly logger: Logger;

  constructor(options: UndiciSessionOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.headersTimeout = options.headersTimeout ?? DEFAULT_HEADERS_TIMEOUT_MS;
    this.bodyTimeout = options.bodyTimeout ?? DEFAULT_BODY_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.temporaryDirectory = options.temporaryDirectory ?? tmpdir();
    this.tls = options.tls ?? {};
    this.additionalHeaders = mergeMissingHeaders(new Headers(options.httpAdditionalHeaders), defaultHeaders());

    if (options.cache) {
      this.cache = new MemoryResponseCache(options.cache === true ? {} : options.cache);
    }

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
    } else {
      this.ownAgent = this.createAgent(options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT_MS);
      this.dispatcher = this.ownAgent;
    }
  }

  attach(delegate: NetworkSessionDelegate): void {
    if (this.delegate) throw new StateError('Network session already has a delegate.');
    this.delegate = delegate;
  }

  dataTask(request: HttpRequest): SessionTask {
    return this.track(new UndiciSessionTask('data', this.prepare(request), this.runner()));
  }

  uploadTask(request: HttpRequest, source: UploadSource): SessionTask {
    return this.track(new UndiciSessionTask('upload', this.prepare(request), this.runner(), source));
  }

  downloadTask(request: HttpRequest): DownloadTask {
    return this.track(new UndiciDownloadTask(this.prepare(request), this.runner(), this.temporaryDirectory));
  }

  downloadTaskWithResumeData(resumeData: Uint8Array): DownloadTask {
    const blob = decodeResumeData(resumeData);
    let request = new HttpRequest(blob.url, { method: 'GET', headers: blob.headers })
      .withHeader('Range', `bytes=${blob.bytesReceived}-`);
    if (blob.validator) request = request.withHeader('If-Range', blob.validator);

    const resumeFrom: ResumeState = { path: blob.temporaryPath, offset: blob.bytesReceived, validator: blob.validator };
    return this.track(new UndiciDownloadTask(this.prepare(request), this.runner(), this.temporaryDirectory, resumeFrom));
  }

  invalidateAndCancel(): void {
    this.invalidated = true;
    for (const task of this.tasks) task.cancel();
    this.closeAgentWhenIdle();
  }

  finishTasksAndInvalidate(): void {
    this.invalidated = true;
    this.closeAgentWhenIdle();
  }

  private track<T extends UndiciSessionTask>(task: T): T {
    this.tasks.add(task);
    return task;
  }

  private prepare(request: HttpRequest): HttpRequest {
    if (this.invalidated) throw new StateError('Network session was invalidated.');
    return new HttpRequest(request.url, {
      method: request.method,
      headers: mergeMissingHeaders(request.headers, this.additionalHeaders),
      body: request.body,
      timeout: request.timeout,
    });
  }

  private runner(): (task: UndiciSessionTask) => Promise<void> {
    const delegate = this.delegate;
    if (!delegate) throw new StateError('Network session has no delegate.');
    return (task) => this.execute(task, delegate);
  }

  private closeAgentWhenIdle(): void {
    if (!this.invalidated || this.tasks.size > 0 || !this.ownAgent || this.ownAgent.closed) return;
    this.ownAgent.close().catch((error: unknown) => {
      this.logger.warn({ err: toError(error) }, 'Failed to close network session agent');
    });
  }

  private createAgent(connectTimeout: number): Agent {
    const connector = buildConnector({ ...this.tls, rejectUnauthorized: false, timeout: connectTimeout });
    const platformValidates = this.tls.rejectUnauthorized !== false;

    return new Agent({
      connect: (options: buildConnector.Options, callback: buildConnector.Callback) => {
        const task = taskContext.getStore();
        connector(options, (error, socket) => {
          if (error || !socket) {
            callback(error ?? new Error('Connection failed'), null);
            return;
          }
          if (!(socket instanceof TLSSocket)) {
            callback(null, socket);
            return;
          }

          const host = options.servername || options.hostname;
          const port = Number(options.port) || 443;
          const reject = (reason: Error): void => {
            socket.destroy();
            callback(reason, null);
          };

          void this.challengeServerTrust(task, socket, host, port, platformValidates).then(
            (rejection) => (rejection ? reject(rejection) : callback(null, socket)),
            (failure: unknown) => reject(toError(failure))
          );
        });
      },
    });
  }

  /** Resolves with the error to fail the connection with, or undefined to accept it */
  private async challengeServerTrust(
    task: SessionTask | undefined,
    socket: TLSSocket,
    host: string,
    port: number,
    platformValidates: boolean
  ): Promise<Error | undefined> {
    const authorizationError = socket.authorizationError ? String(socket.authorizationError) : undefined;
    const trust = {
      host,
      port,
      peerCertificate: socket.getPeerCertificate(true),
      authorized: socket.authorized,
      authorizationError,
    };

    const delegate = this.delegate;
    const answer = delegate
      ? await delegate.onChallenge(task, { kind: 'serverTrust', host, port, trust })
      : { disposition: 'performDefaultHandling' as const };

    switch (answer.disposition) {
      case 'useCredential':
        return undefined;
      case 'performDefaultHandling':
        if (socket.authorized || !platformValidates) return undefined;
        return new SessionTaskError(`TLS certificate of ${host} was not accepted: ${authorizationError ?? 'unknown error'}`, {
          code: 'ERR_TLS_CERT_REJECTED',
          retriable: false,
        });
      case 'cancelAuthenticationChallenge':
      case 'rejectProtectionSpace':
        return new SessionTaskError(`Server trust evaluation for ${host} was cancelled.`, {
          code: 'ERR_TLS_TRUST_CANCELLED',
          retriable: false,
        });
    }
  }

  /** Runs one task to completion. Never rejects. */
  private async execute(task: UndiciSessionTask, delegate: NetworkSessionDelegate): Promise<void> {
    const start = Date.now();
    const metrics: TransferMetrics = { redirectCount: 0, fromCache: false };

    const timeout = task.originalRequest.timeout;
    const timer = timeout !== undefined
      ? setTimeout(() => {
        task.timedOut = true;
        task.abortController.abort();
      }, timeout)
      : undefined;

    let failure: Error | undefined;
    try {
      await taskContext.run(task, () => this.transfer(task, delegate, metrics, start));
    } catch (error) {
      failure = this.mapError(task, error);
    } finally {
      if (timer) clearTimeout(timer);
    }

    if (task instanceof UndiciDownloadTask) {
      failure = await this.settleDownloadFile(task, failure);
    }

    const end = Date.now();
    delegate.onMetrics(task, { start, end, duration: end - start, ...metrics });
    task.complete(failure);
    this.tasks.delete(task);
    delegate.onTaskComplete(task, failure);
    this.closeAgentWhenIdle();
  }

  private async transfer(
    task: UndiciSessionTask,
    delegate: NetworkSessionDelegate,
    metrics: TransferMetrics,
    start: number
  ): Promise<void> {
    const signal = task.abortController.signal;
    await task.waitIfSuspended();
    signal.throwIfAborted();

    const cacheable = this.cache !== undefined && task.kind === 'data' && MemoryResponseCache.isCacheable(task.currentRequest);
    const hit = cacheable ? this.cache?.get(task.currentRequest) : undefined;
    if (hit) {
      metrics.fromCache = true;
      metrics.firstByte = Date.now() - start;
      task.response = hit.response;
      task.countOfBytesExpectedToReceive = hit.data.byteLength;
      task.countOfBytesReceived = hit.data.byteLength;
      delegate.onResponse(task, hit.response);
      delegate.onData(task, hit.data);
      return;
    }

    if (task instanceof UndiciDownloadTask) await this.verifyResumeFile(task);

    let upload = task.upload;
    let authFailures = 0;

    for (;;) {
      const request = task.currentRequest;
      const result = await undiciRequest(request.url, {
        method: request.method,
        headers: headerRecord(request.headers),
        body: this.requestBody(task, delegate, request, upload),
        signal,
        dispatcher: this.dispatcher,
        headersTimeout: this.headersTimeout,
        bodyTimeout: this.bodyTimeout,
      });

      const response = new HttpResponse({ url: request.url, status: result.statusCode, headers: toHeaders(result.headers) });

      const basic = result.statusCode === 401 ? basicChallengeRealm(result.headers['www-authenticate']) : undefined;
      if (basic) {
        const answer = await delegate.onChallenge(task, {
          kind: 'httpBasic',
          host: request.url.hostname,
          port: defaultPort(request.url),
          realm: basic.realm,
          previousFailureCount: authFailures,
        });
        if (answer.disposition === 'useCredential' && answer.credential) {
          await result.body.dump();
          authFailures++;
          task.currentRequest = request.withHeader(...HttpHeader.basicAuth(answer.credential));
          continue;
        }
        if (answer.disposition === 'cancelAuthenticationChallenge') {
          await result.body.dump();
          throw new SessionTaskError('Authentication challenge was cancelled.', {
            code: 'ERR_AUTH_CANCELLED',
            request,
            retriable: false,
          });
        }
      }

      const location = response.header('location');
      if (REDIRECT_STATUSES.has(result.statusCode) && location) {
        if (metrics.redirectCount >= this.maxRedirects) {
          await result.body.dump();
          throw new SessionTaskError(`Exceeded ${this.maxRedirects} redirects.`, {
            code: 'ERR_TOO_MANY_REDIRECTS',
            request,
            retriable: false,
          });
        }

        const proposed = redirectedRequest(request, result.statusCode, new URL(location, request.url));
        const next = await delegate.onRedirect(task, response, proposed);
        if (next) {
          await result.body.dump();
          if (next.method === 'GET' || next.method === 'HEAD') upload = undefined;
          metrics.redirectCount++;
          task.currentRequest = next;
          continue;
        }
      }

      metrics.firstByte = Date.now() - start;
      task.response = response;
      task.countOfBytesExpectedToReceive = response.expectedContentLength;

      if (task instanceof UndiciDownloadTask) {
        await this.receiveFile(task, delegate, response, bytesOf(result.body));
      } else {
        delegate.onResponse(task, response);
        await this.receiveData(task, delegate, response, bytesOf(result.body), cacheable);
      }
      return;
    }
  }

  private async receiveData(
    task: UndiciSessionTask,
    delegate: NetworkSessionDelegate,
    response: HttpResponse,
    body: AsyncIterable<Uint8Array>,
    cacheable: boolean
  ): Promise<void> {
    const storeBody = cacheable && response.status === 200;
    const chunks: Uint8Array[] = [];

    for await (const chunk of body) {
      await task.waitIfSuspended();
      task.abortController.signal.throwIfAborted();
      task.countOfBytesReceived += chunk.byteLength;
      if (storeBody) chunks.push(chunk);
      delegate.onData(task, chunk);
    }

    if (!storeBody || !this.cache) return;
    const accepted = await delegate.onWillCacheResponse(task, { response, data: concatBytes(chunks), storagePolicy: 'allowed' });
    if (accepted) this.cache.set(task.currentRequest, accepted);
  }

  private async receiveFile(
    task: UndiciDownloadTask,
    delegate: NetworkSessionDelegate,
    response: HttpResponse,
    body: AsyncIterable<Uint8Array>
  ): Promise<void> {
    const resumed = response.status === 206 && task.resumeFrom !== undefined;
    const offset = resumed ? task.resumeFrom?.offset ?? 0 : 0;
    const length = response.expectedContentLength;
    const total = resumed
      ? contentRangeTotal(response.header('content-range')) ?? (length >= 0 ? offset + length : -1)
      : length;

    task.countOfBytesReceived = offset;
    task.countOfBytesExpectedToReceive = total;
    delegate.onResponse(task, response);
    if (resumed) delegate.onDidResume(task, offset, total);

    const handle = await open(task.temporaryPath, resumed ? 'a' : 'w');
    try {
      for await (const chunk of body) {
        await task.waitIfSuspended();
        task.abortController.signal.throwIfAborted();
        await handle.write(chunk);
        task.countOfBytesReceived += chunk.byteLength;
        delegate.onDidWriteData(task, chunk.byteLength, task.countOfBytesReceived, total);
      }
    } finally {
      await handle.close();
    }

    try {
      await delegate.onDidFinishDownloading(task, task.temporaryPath);
    } finally {
      await rm(task.temporaryPath, { force: true });
    }
  }

  /** Drops the Range header when the partial file is gone or does not match */
  private async verifyResumeFile(task: UndiciDownloadTask): Promise<void> {
    const resumeFrom = task.resumeFrom;
    if (!resumeFrom) return;

    const file = await tryFn(() => stat(resumeFrom.path));
    if (file.success && file.value.size === resumeFrom.offset) return;

    this.logger.debug(`Partial download at ${resumeFrom.path} is unusable, starting over`);
    task.currentRequest = task.currentRequest.withoutHeader('range').withoutHeader('if-range');
  }

  /**
   * Keeps the partial file and fills in resume data when the transfer can be
   * continued, otherwise removes it.
   */
  private async settleDownloadFile(task: UndiciDownloadTask, failure: Error | undefined): Promise<Error | undefined> {
    if (!failure) return undefined;

    const cancelled = failure instanceof SessionTaskError && failure.code === 'ECANCELED';
    const wantsResume = cancelled ? task.produceResumeData : failure instanceof SessionTaskError;
    const resumeData = wantsResume ? this.resumeDataFor(task) : undefined;

    if (!resumeData) {
      await rm(task.temporaryPath, { force: true });
      return failure;
    }

    task.resumeData = resumeData;
    if (failure instanceof SessionTaskError) failure.resumeData = resumeData;
    return failure;
  }

  private resumeDataFor(task: UndiciDownloadTask): Uint8Array | undefined {
    const response = task.response;
    if (!response || task.countOfBytesReceived <= 0) return undefined;

    const validator = response.header('etag') ?? response.header('last-modified');
    const acceptsRanges = response.status === 206 || response.header('accept-ranges')?.toLowerCase() === 'bytes';
    if (!validator && !acceptsRanges) return undefined;

    const headers: [string, string][] = [];
    task.currentRequest.headers.forEach((value, name) => {
      if (name !== 'range' && name !== 'if-range') headers.push([name, value]);
    });

    return encodeResumeData({
      version: 1,
      url: task.currentRequest.url.href,
      headers,
      temporaryPath: task.temporaryPath,
      bytesReceived: task.countOfBytesReceived,
      validator,
    });
  }

  private requestBody(
    task: UndiciSessionTask,
    delegate: NetworkSessionDelegate,
    request: HttpRequest,
    upload: UploadSource | undefined
  ): Uint8Array | Readable | null {
    if (!upload || !methodAllowsBody(request.method)) {
      if (request.body) {
        task.countOfBytesExpectedToSend = request.body.byteLength;
        task.countOfBytesSent = request.body.byteLength;
      }
      return request.body;
    }

    task.countOfBytesSent = 0;
    return Readable.from(this.countingUpload(task, delegate, upload));
  }

  private async *countingUpload(
    task: UndiciSessionTask,
    delegate: NetworkSessionDelegate,
    upload: UploadSource
  ): AsyncGenerator<Uint8Array> {
    let chunks: AsyncIterable<Uint8Array> | Iterable<Uint8Array>;
    switch (upload.kind) {
      case 'data':
        task.countOfBytesExpectedToSend = upload.data.byteLength;
        chunks = [upload.data];
        break;
      case 'file':
        task.countOfBytesExpectedToSend = (await stat(upload.path)).size;
        chunks = bytesOf(createReadStream(upload.path));
        break;
      case 'stream':
        task.countOfBytesExpectedToSend = -1;
        chunks = bytesOf(upload.stream());
        break;
    }

    for await (const chunk of chunks) {
      await task.waitIfSuspended();
      task.countOfBytesSent += chunk.byteLength;
      delegate.onUploadProgress(task, chunk.byteLength, task.countOfBytesSent, task.countOfBytesExpectedToSend);
      yield chunk;
    }
  }

  private mapError(task: UndiciSessionTask, error: unknown): Error {
    const request = task.currentRequest;
    if (error instanceof CourierError) return error;
    if (error instanceof Error && error.cause instanceof CourierError) return error.cause;

    if (task.abortController.signal.aborted) {
      if (task.timedOut) return new TimeoutError('request', { timeout: request.timeout, request, cause: error });
      return new SessionTaskError('Task was cancelled.', { code: 'ECANCELED', request, cause: error, retriable: false });
    }

    if (error instanceof undiciErrors.ConnectTimeoutError) return new TimeoutError('connect', { request, cause: error });
    if (error instanceof undiciErrors.HeadersTimeoutError) {
      return new TimeoutError('headers', { timeout: this.headersTimeout, request, cause: error });
    }
    if (error instanceof undiciErrors.BodyTimeoutError) {
      return new TimeoutError('body', { timeout: this.bodyTimeout, request, cause: error });
    }

    const failure = toError(error);
    return new SessionTaskError(failure.message, { code: errorCode(failure), request, cause: failure });
  }
}

function methodAllowsBody(method: Method): boolean {
  return method !== 'GET' && method !== 'HEAD';
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  const cause = error.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
  return undefined;
}
