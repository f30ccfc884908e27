/**
 * Credential-based authentication with refresh.
 *
 * The interceptor applies the current credential to every request. While a
 * refresh runs, new adaptations wait for it; requests that failed because
 * of authentication are retried once it succeeds.
 */

import { AuthenticationError, toError } from '../core/errors.js';
import type { HttpRequest } from '../core/request.js';
import type { HttpResponse } from '../core/response.js';
import type { Session } from '../core/session.js';
import type { Request } from '../requests/request.js';
import { RetryResult, type RequestAdapterState, type RequestInterceptor } from './interceptor.js';

export interface AuthenticationCredential {
  /** Whether the credential must be refreshed before it is applied again */
  readonly requiresRefresh: boolean;
}

/**
 * Knows how to apply, refresh and recognise one kind of credential.
 */
export interface Authenticator<C extends AuthenticationCredential> {
  apply(credential: C, request: HttpRequest): HttpRequest;
  refresh(credential: C, session: Session): Promise<C>;
  /** Whether the failure of `request` was caused by its credential (usually a 401) */
  didRequest(request: HttpRequest, response: HttpResponse, error: Error): boolean;
  /** Whether `request` carried `credential` */
  isRequest(request: HttpRequest, credential: C): boolean;
}

/**
 * At most `maximumAttempts` refreshes within `interval` seconds.
 */
export interface RefreshWindow {
  interval: number;
  maximumAttempts: number;
}

export const defaultRefreshWindow: RefreshWindow = { interval: 30, maximumAttempts: 5 };

export interface AuthenticationInterceptorOptions<C> {
  credential?: C;
  /** Without a window refreshes are never considered excessive */
  refreshWindow?: RefreshWindow;
}

export class AuthenticationInterceptor<C extends AuthenticationCredential> implements RequestInterceptor {
  credential?: C;
  readonly refreshWindow?: RefreshWindow;

  private refreshing?: Promise<C>;
  private refreshTimestamps: number[] = [];

  constructor(
    readonly authenticator: Authenticator<C>,
    options: AuthenticationInterceptorOptions<C> = {}
  ) {
    this.credential = options.credential;
    this.refreshWindow = options.refreshWindow;
  }

  get isRefreshing(): boolean {
    return this.refreshing !== undefined;
  }

  async adapt(request: HttpRequest, state: RequestAdapterState): Promise<HttpRequest> {
    if (this.refreshing) {
      await this.refreshing;
      return this.adapt(request, state);
    }

    const credential = this.credential;
    if (!credential) throw new AuthenticationError('missingCredential');

    if (credential.requiresRefresh) {
      await this.refresh(credential, state.session);
      return this.adapt(request, state);
    }

    return this.authenticator.apply(credential, request);
  }

  async retry(request: Request, session: Session, error: Error): Promise<RetryResult> {
    const urlRequest = request.request;
    const response = request.httpResponse;
    if (!urlRequest || !response) return RetryResult.doNotRetry;

    if (!this.authenticator.didRequest(urlRequest, response, error)) return RetryResult.doNotRetry;

    const credential = this.credential;
    if (!credential) return RetryResult.doNotRetryWithError(new AuthenticationError('missingCredential'));

    // sent with an older credential: the current one may already work
    if (!this.authenticator.isRequest(urlRequest, credential)) return RetryResult.retry;

    try {
      await this.refresh(credential, session);
      return RetryResult.retry;
    } catch (refreshError) {
      return RetryResult.doNotRetryWithError(toError(refreshError));
    }
  }

  /**
   * Starts a refresh, or joins the one in flight.
   */
  private refresh(credential: C, session: Session): Promise<C> {
    if (this.refreshing) return this.refreshing;
    if (this.isRefreshExcessive()) return Promise.reject(new AuthenticationError('excessiveRefresh'));

    this.refreshTimestamps.push(Date.now());
    const refreshing = Promise.resolve()
      .then(() => this.authenticator.refresh(credential, session))
      .then((refreshed) => {
        this.credential = refreshed;
        return refreshed;
      })
      .finally(() => {
        this.refreshing = undefined;
      });
    this.refreshing = refreshing;
    return refreshing;
  }

  private isRefreshExcessive(): boolean {
    const window = this.refreshWindow;
    if (!window) return false;

    const windowStart = Date.now() - window.interval * 1000;
    this.refreshTimestamps = this.refreshTimestamps.filter((timestamp) => timestamp >= windowStart);
    return this.refreshTimestamps.length >= window.maximumAttempts;
  }
}

/**
 * OAuth 2.0 style bearer token. `expiresAt` is epoch ms.
 */
export interface BearerCredential extends AuthenticationCredential {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly expiresAt?: number;
}

/**
 * Bearer credential that needs a refresh within `refreshMarginMs` of its
 * expiry.
 */
export function bearerCredential(
  token: { accessToken: string; refreshToken?: string; expiresAt?: number },
  refreshMarginMs = 5 * 60 * 1000
): BearerCredential {
  return {
    ...token,
    get requiresRefresh() {
      return token.expiresAt !== undefined && Date.now() >= token.expiresAt - refreshMarginMs;
    },
  };
}

export interface BearerAuthenticatorOptions {
  /** Exchanges the current credential for a fresh one */
  refresh: (credential: BearerCredential, session: Session) => Promise<BearerCredential>;
  /** Token type (default: 'Bearer') */
  tokenType?: string;
  /** Header name (default: 'Authorization') */
  headerName?: string;
}

/**
 * Sends the token as `Authorization: Bearer <token>` and treats a 401 as
 * a credential failure.
 *
 * @example
 * ```typescript
 * const auth = new AuthenticationInterceptor(
 *   new BearerAuthenticator({ refresh: (credential) => tokenStore.refresh(credential) }),
 *   { credential: bearerCredential({ accessToken: tokenStore.accessToken }), refreshWindow: defaultRefreshWindow }
 * );
 * const session = new Session({ interceptor: auth });
 * ```
 */
export class BearerAuthenticator implements Authenticator<BearerCredential> {
  private readonly tokenType: string;
  private readonly headerName: string;

  constructor(private readonly options: BearerAuthenticatorOptions) {
    this.tokenType = options.tokenType ?? 'Bearer';
    this.headerName = options.headerName ?? 'Authorization';
  }

  apply(credential: BearerCredential, request: HttpRequest): HttpRequest {
    return request.withHeader(this.headerName, `${this.tokenType} ${credential.accessToken}`);
  }

  refresh(credential: BearerCredential, session: Session): Promise<BearerCredential> {
    return this.options.refresh(credential, session);
  }

  didRequest(_request: HttpRequest, response: HttpResponse): boolean {
    return response.status === 401;
  }

  isRequest(request: HttpRequest, credential: BearerCredential): boolean {
    return request.header(this.headerName) === `${this.tokenType} ${credential.accessToken}`;
  }
}
