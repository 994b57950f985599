export type ClientResult<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const success = <T>(value: T): { ok: true; value: T } => ({
  ok: true,
  value,
});

export const failure = <E extends Error>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});
