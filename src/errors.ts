export type AssistErrorKind =
  | 'EmptySelection'
  | 'SessionStartFailure'
  | 'RequestFailure'
  | 'UnexpectedResponseShape'
  | 'Cancelled';

export class AssistError extends Error {
  readonly kind: AssistErrorKind;

  constructor(kind: AssistErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistError';
    this.kind = kind;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: AssistError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: AssistErrorKind,
  message: string,
  cause?: unknown,
): Result<T> {
  return { ok: false, error: new AssistError(kind, message, cause === undefined ? undefined : { cause }) };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
