/**
 * Error types for GA4 queries
 *
 * Every failure the tool reports carries a stable `code` so front ends can
 * tell local validation problems apart from provider failures.
 */

export type GA4ErrorCode =
  | 'UNKNOWN_REPORT'
  | 'INVALID_RANGE'
  | 'INVALID_ARGUMENT'
  | 'MISSING_PROPERTY'
  | 'MISSING_CREDENTIALS'
  | 'INVALID_CONFIG'
  | 'PROVIDER_ERROR';

export class GA4QueryError extends Error {
  constructor(
    readonly code: GA4ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownReportError extends GA4QueryError {
  constructor(readonly report: string, known: readonly string[]) {
    super('UNKNOWN_REPORT', `Unknown report "${report}". Expected one of: ${known.join(', ')}`);
  }
}

export class InvalidRangeError extends GA4QueryError {
  constructor(message: string) {
    super('INVALID_RANGE', message);
  }
}

export class InvalidArgumentError extends GA4QueryError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class MissingPropertyError extends GA4QueryError {
  constructor() {
    super(
      'MISSING_PROPERTY',
      'No property ID provided. Use --property-id or set GA4_PROPERTY_ID env var.'
    );
  }
}

export class MissingCredentialsError extends GA4QueryError {
  constructor(message: string) {
    super('MISSING_CREDENTIALS', message);
  }
}

export class InvalidConfigError extends GA4QueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}

/**
 * Wraps a failure raised by the Analytics APIs. The provider's message is kept
 * as-is and the original error is available as `cause`.
 */
export class ProviderError extends GA4QueryError {
  constructor(cause: unknown) {
    super('PROVIDER_ERROR', cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
