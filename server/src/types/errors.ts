export type FetchErrorReason = 'invalid-limit' | 'timeout' | 'network' | 'http-status' | 'malformed-body';

/**
 * Failure of the catalog query. Returned as a value by the catalog client,
 * never thrown past it.
 */
export class FetchError extends Error {
  readonly kind = 'FetchError' as const;

  constructor(
    message: string,
    readonly reason: FetchErrorReason,
    readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'FetchError';
  }

  /** Timeouts, network failures and 5xx answers are worth another attempt. */
  get transient(): boolean {
    return (
      this.reason === 'timeout' ||
      this.reason === 'network' ||
      (this.reason === 'http-status' && this.status !== undefined && this.status >= 500)
    );
  }
}

export class AdviceError extends Error {
  readonly kind = 'AdviceError' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AdviceError';
  }
}
