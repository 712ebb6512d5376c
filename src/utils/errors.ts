/**
 * Error taxonomy of the pipeline
 *
 * Every failure a collaborator can report is one of these classes, told apart by `kind`.
 * The orchestrator decides per kind whether a photo fails or the whole run stops.
 */

export type ExtractionErrorKind = 'unreadable-file' | 'corrupt-metadata';

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.kind = kind;
  }
}

export type GeocodeErrorKind = 'rate-limited' | 'not-found' | 'transient';

export class GeocodeError extends Error {
  readonly kind: GeocodeErrorKind;
  readonly retryAfterMs?: number;

  constructor(
    kind: GeocodeErrorKind,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, options);
    this.name = 'GeocodeError';
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export type PublishErrorKind = 'auth' | 'rate-limited' | 'transient' | 'validation';

export class PublishError extends Error {
  readonly kind: PublishErrorKind;
  readonly retryAfterMs?: number;

  constructor(
    kind: PublishErrorKind,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, options);
    this.name = 'PublishError';
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }

  /** No later photo can succeed either, so the run stops */
  get isRunFatal(): boolean {
    return this.kind === 'auth';
  }

  get isRetryable(): boolean {
    return this.kind === 'rate-limited' || this.kind === 'transient';
  }
}

export type LedgerErrorKind = 'corrupt' | 'write-failed' | 'unknown-identity';

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

export type NamedPlaceErrorKind = 'corrupt' | 'invalid' | 'unknown-place';

export class NamedPlaceError extends Error {
  readonly kind: NamedPlaceErrorKind;

  constructor(kind: NamedPlaceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NamedPlaceError';
    this.kind = kind;
  }
}

/**
 * One-line reason for the ledger and the run summary
 */
export function describeError(error: unknown): string {
  if (error instanceof ExtractionError || error instanceof GeocodeError
    || error instanceof PublishError || error instanceof LedgerError || error instanceof NamedPlaceError) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
