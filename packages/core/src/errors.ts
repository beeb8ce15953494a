export type CompletionErrorKind = 'provider' | 'timeout' | 'cancelled' | 'empty';

/**
 * Normalized failure of a completion call. `message` is always a plain,
 * human-readable detail; the original provider error is kept as `cause`.
 */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;

  constructor(detail: string, kind: CompletionErrorKind = 'provider', options?: { cause?: unknown }) {
    super(detail, options);
    this.name = 'CompletionError';
    this.kind = kind;
  }

  get detail(): string {
    return this.message;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
