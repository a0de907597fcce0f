export type Ok<T> = { ok: true; value: T };
export type Err<E = string> = { ok: false; error: E };
export type Result<T, E = string> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => r.ok === false;

/** Waits for a promise and folds its rejection into an Err, untouched. */
export const settle = async <T>(p: Promise<T>): Promise<Result<T, unknown>> => {
  try {
    return ok(await p);
  } catch (e) {
    return err(e);
  }
};
