export type Result<T, E = Error> = 
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T, E = never>(value: T): Result<T, E> => ({ ok: true, value });

export const Err = <T = never, E = Error>(error: E): Result<T, E> => ({ ok: false, error });

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
