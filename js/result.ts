export interface MalformedInput {
  kind: 'MalformedInput';
  reason?: string;
}

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: MalformedInput };
export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function malformed(reason?: string): Failure {
  return { ok: false, error: { kind: 'MalformedInput', reason } };
}

export class MalformedInputError extends Error {
  constructor(readonly detail: MalformedInput) {
    super(detail.reason ? `malformed input: ${detail.reason}` : 'malformed input');
    this.name = 'MalformedInputError';
  }
}

/** Returns the value of a successful result, throws MalformedInputError otherwise. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new MalformedInputError(result.error);
  }
  return result.value;
}
