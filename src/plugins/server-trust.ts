import { createHash } from 'node:crypto';
import { checkServerIdentity, type DetailedPeerCertificate } from 'node:tls';
import { ServerTrustEvaluationError, toError } from '../core/errors.js';
import type { ServerTrust } from '../transport/network-session.js';

/**
 * Decides whether a TLS peer is trusted. Throws a
 * `ServerTrustEvaluationError` to reject it.
 */
export interface ServerTrustEvaluating {
  evaluate(trust: ServerTrust, host: string): void;
}

/**
 * Normalize fingerprint format (remove colons, lowercase)
 */
function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/:/g, '').toLowerCase();
}

/**
 * Peer certificate followed by its issuers, leaf first.
 */
export function certificateChain(certificate: DetailedPeerCertificate): DetailedPeerCertificate[] {
  const chain: DetailedPeerCertificate[] = [];
  let current: DetailedPeerCertificate | undefined = certificate;
  while (current && current.raw && !chain.includes(current)) {
    chain.push(current);
    // self-signed roots reference themselves
    current = current.issuerCertificate === current ? undefined : current.issuerCertificate;
  }
  return chain;
}

/** SHA-256 of the DER certificate, hex */
export function certificateFingerprint(certificate: DetailedPeerCertificate): string {
  return createHash('sha256').update(certificate.raw).digest('hex');
}

/** SHA-256 of the certificate's public key, base64 */
export function publicKeyFingerprint(certificate: DetailedPeerCertificate): string | undefined {
  if (!certificate.pubkey) return undefined;
  return createHash('sha256').update(certificate.pubkey).digest('base64');
}

/**
 * Check if hostname matches pattern (supports wildcards)
 */
function hostnameMatches(hostname: string, pattern: string): boolean {
  if (pattern === '*') return true;
  if (pattern.startsWith('*.')) {
    const baseDomain = pattern.slice(2);
    return hostname === baseDomain || hostname.endsWith('.' + baseDomain);
  }
  return hostname === pattern;
}

function evaluateDefault(trust: ServerTrust, host: string, validateHost: boolean): void {
  if (!trust.authorized) {
    throw new ServerTrustEvaluationError({
      kind: 'defaultEvaluationFailed',
      host,
      detail: trust.authorizationError ?? 'certificate not trusted',
    });
  }
  if (validateHost) evaluateHost(trust, host);
}

function evaluateHost(trust: ServerTrust, host: string): void {
  if (checkServerIdentity(host, trust.peerCertificate)) {
    throw new ServerTrustEvaluationError({ kind: 'hostValidationFailed', host });
  }
}

/**
 * Platform chain validation, plus host name validation unless disabled.
 */
export class DefaultTrustEvaluator implements ServerTrustEvaluating {
  constructor(private readonly options: { validateHost?: boolean } = {}) {}

  evaluate(trust: ServerTrust, host: string): void {
    evaluateDefault(trust, host, this.options.validateHost ?? true);
  }
}

/**
 * Accepts any peer. Only meant for local development against
 * self-signed servers.
 */
export class DisabledTrustEvaluator implements ServerTrustEvaluating {
  evaluate(): void {}
}

export interface PinningOptions {
  /** Run default validation before pin matching. Default true */
  performDefaultValidation?: boolean;
  /** Validate the host name. Default true */
  validateHost?: boolean;
}

/**
 * Trusts a peer when any certificate in its chain matches a pinned
 * SHA-256 fingerprint (hex, colons allowed).
 */
export class PinnedCertificatesTrustEvaluator implements ServerTrustEvaluating {
  private readonly pins: Set<string>;

  constructor(
    fingerprints: string[],
    private readonly options: PinningOptions & { acceptSelfSignedCertificates?: boolean } = {}
  ) {
    this.pins = new Set(fingerprints.map(normalizeFingerprint));
  }

  evaluate(trust: ServerTrust, host: string): void {
    if (this.pins.size === 0) {
      throw new ServerTrustEvaluationError({ kind: 'noCertificatesFound' });
    }

    const validateHost = this.options.validateHost ?? true;
    const chain = certificateChain(trust.peerCertificate);
    const pinned = chain.some((certificate) => this.pins.has(certificateFingerprint(certificate)));

    if (this.options.acceptSelfSignedCertificates && pinned) {
      if (validateHost) evaluateHost(trust, host);
      return;
    }
    if (this.options.performDefaultValidation ?? true) {
      evaluateDefault(trust, host, validateHost);
    }
    if (!pinned) {
      throw new ServerTrustEvaluationError({ kind: 'certificatePinningFailed', host });
    }
  }
}

/**
 * Trusts a peer when any public key in its chain matches a pinned
 * SHA-256 SPKI hash (base64). Survives certificate renewal with the same key.
 */
export class PublicKeysTrustEvaluator implements ServerTrustEvaluating {
  private readonly keys: Set<string>;

  constructor(
    keys: string[],
    private readonly options: PinningOptions = {}
  ) {
    this.keys = new Set(keys);
  }

  evaluate(trust: ServerTrust, host: string): void {
    if (this.keys.size === 0) {
      throw new ServerTrustEvaluationError({ kind: 'noPublicKeysFound' });
    }

    if (this.options.performDefaultValidation ?? true) {
      evaluateDefault(trust, host, this.options.validateHost ?? true);
    }

    const chain = certificateChain(trust.peerCertificate);
    const pinned = chain.some((certificate) => {
      const fingerprint = publicKeyFingerprint(certificate);
      return fingerprint !== undefined && this.keys.has(fingerprint);
    });
    if (!pinned) {
      throw new ServerTrustEvaluationError({ kind: 'publicKeyPinningFailed', host });
    }
  }
}

/**
 * Every evaluator must pass, in order.
 */
export class CompositeTrustEvaluator implements ServerTrustEvaluating {
  constructor(private readonly evaluators: ServerTrustEvaluating[]) {}

  evaluate(trust: ServerTrust, host: string): void {
    for (const evaluator of this.evaluators) {
      evaluator.evaluate(trust, host);
    }
  }
}

/**
 * Evaluator built from a closure. Anything it throws that is not a trust
 * error is reported as `customEvaluationFailed`.
 */
export class CustomTrustEvaluator implements ServerTrustEvaluating {
  constructor(private readonly closure: (trust: ServerTrust, host: string) => void) {}

  evaluate(trust: ServerTrust, host: string): void {
    try {
      this.closure(trust, host);
    } catch (error) {
      if (error instanceof ServerTrustEvaluationError) throw error;
      throw new ServerTrustEvaluationError({ kind: 'customEvaluationFailed', error: toError(error) });
    }
  }
}

export interface ServerTrustManagerOptions {
  /** Fail hosts with no registered evaluator. Default true */
  allHostsMustBeEvaluated?: boolean;
}

/**
 * Maps hosts to evaluators. Keys are exact host names, `*.domain`
 * (the domain and its subdomains) or `*`; exact keys win.
 */
export class ServerTrustManager {
  readonly allHostsMustBeEvaluated: boolean;
  private readonly evaluators: Map<string, ServerTrustEvaluating>;

  constructor(evaluators: Record<string, ServerTrustEvaluating>, options: ServerTrustManagerOptions = {}) {
    this.evaluators = new Map(Object.entries(evaluators));
    this.allHostsMustBeEvaluated = options.allHostsMustBeEvaluated ?? true;
  }

  /**
   * Evaluator for `host`, or undefined when the host may skip evaluation.
   * Throws `noRequiredEvaluator` when every host must be evaluated.
   */
  serverTrustEvaluator(host: string): ServerTrustEvaluating | undefined {
    const exact = this.evaluators.get(host);
    if (exact) return exact;

    for (const [pattern, evaluator] of this.evaluators) {
      if (hostnameMatches(host, pattern)) return evaluator;
    }

    if (this.allHostsMustBeEvaluated) {
      throw new ServerTrustEvaluationError({ kind: 'noRequiredEvaluator', host });
    }
    return undefined;
  }
}
