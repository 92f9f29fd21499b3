/**
 * Discriminated success/failure values
 *
 * Same shape the input validators return: `success` narrows to either
 * `data` or `error`.
 */

export type Success<T> = { readonly success: true; readonly data: T };
export type Failure<E> = { readonly success: false; readonly error: E };
export type Result<T, E> = Success<T> | Failure<E>;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function err<E>(error: E): Failure<E> {
  return { success: false, error };
}
