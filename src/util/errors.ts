export type LedgerErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InvalidAmount'
  | 'InsufficientScore'
  | 'Unauthorized'
  | 'InvalidParameters';

/**
 * A rejected ledger operation. These are returned inside a {@link Result},
 * never thrown past the ledger facade.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: LedgerErrorKind, message: string): Result<T> {
  return { ok: false, error: new LedgerError(kind, message) };
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

export function mapOk<T, U>(res: Result<T>, fn: (value: T) => U): Result<U> {
  return res.ok ? ok(fn(res.value)) : res;
}
