import { formatRepository, type RepositoryRef } from './types.js';

// ── Transport ────────────────────────────────────────────────────────────────

export abstract class TransportError extends Error {
  abstract readonly kind: 'network' | 'http' | 'rate-limited';
}

/** No HTTP response at all: DNS failure, reset connection or timeout. */
export class NetworkError extends TransportError {
  readonly kind = 'network';
  override readonly name = 'NetworkError';
}

export class HttpError extends TransportError {
  readonly kind = 'http';
  override readonly name = 'HttpError';

  constructor(
    readonly status: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  get notFound(): boolean {
    return this.status === 404;
  }
}

export class RateLimitedError extends TransportError {
  readonly kind = 'rate-limited';
  override readonly name = 'RateLimitedError';

  constructor(
    /** Unix timestamp (ms) after which the host accepts requests again. */
    readonly retryAt: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// ── Normalization ────────────────────────────────────────────────────────────

export type NormalizationReason = 'empty-path' | 'kind-conflict' | 'duplicate' | 'malformed';

export class NormalizationError extends Error {
  override readonly name = 'NormalizationError';

  constructor(
    readonly reason: NormalizationReason,
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// ── Sync ─────────────────────────────────────────────────────────────────────

export type SyncErrorKind = 'not-found' | 'rate-limited' | 'transient' | 'corrupt' | 'rejected';

export class SyncError extends Error {
  override readonly name = 'SyncError';
  readonly repository?: RepositoryRef;
  readonly status?: number;
  readonly retryAt?: number;

  constructor(
    readonly kind: SyncErrorKind,
    message: string,
    details: { repository?: RepositoryRef; status?: number; retryAt?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.repository = details.repository;
    this.status = details.status;
    this.retryAt = details.retryAt;
  }

  static fromTransport(repository: RepositoryRef | undefined, error: TransportError): SyncError {
    const label = repository ? formatRepository(repository) : 'request';
    if (error instanceof RateLimitedError) {
      return new SyncError('rate-limited', `Rate limited while fetching ${label}`, {
        repository,
        retryAt: error.retryAt,
        cause: error,
      });
    }
    if (error instanceof HttpError) {
      if (error.notFound) {
        return new SyncError('not-found', `${label} was not found`, { repository, status: 404, cause: error });
      }
      if (error.status >= 500) {
        return new SyncError('transient', `Host error ${error.status} for ${label}`, {
          repository,
          status: error.status,
          cause: error,
        });
      }
      return new SyncError('rejected', `Host rejected ${label} with ${error.status}`, {
        repository,
        status: error.status,
        cause: error,
      });
    }
    return new SyncError('transient', `Network failure while fetching ${label}: ${error.message}`, {
      repository,
      cause: error,
    });
  }
}

/** Transient and rate-limit failures that were absorbed by serving cached data. */
export function isRecoverable(error: TransportError): boolean {
  if (error instanceof HttpError) return error.status >= 500;
  return true;
}

export interface SyncWarning {
  kind: 'served-stale';
  reason: 'rate-limited' | 'transient';
  /** When known, the earliest time (ms) a refresh can succeed. */
  retryAt?: number;
  message: string;
}
