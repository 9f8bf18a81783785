export type ExchangeErrorKind = 'rate_limited' | 'network' | 'malformed' | 'rejected';

/**
 * Failure of a single exchange request.
 * Only `rate_limited` is retried by the fetcher.
 */
export class ExchangeRequestError extends Error {
  readonly kind: ExchangeErrorKind;
  /** HTTP status, when a response was received */
  readonly status?: number;
  /** Exchange-specific error code */
  readonly code?: string;

  constructor(
    kind: ExchangeErrorKind,
    message: string,
    details: { status?: number; code?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ExchangeRequestError';
    this.kind = kind;
    this.status = details.status;
    this.code = details.code;
  }
}

export function isRateLimited(error: unknown): boolean {
  return error instanceof ExchangeRequestError && error.kind === 'rate_limited';
}
