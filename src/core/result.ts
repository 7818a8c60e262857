/**
 * =============================================================================
 * RESULT TYPE
 * =============================================================================
 *
 * Tagged success/failure value for expected outcomes.
 *
 * USAGE:
 * ```typescript
 * const quote = await orderPriceService.quote(req.query);
 * if (!quote.ok) return res.status(quote.error.statusCode).json(quote.error.toJSON());
 * res.json(quote.value);
 * ```
 * =============================================================================
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
