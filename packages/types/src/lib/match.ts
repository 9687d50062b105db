/**
 * @fileoverview Exhaustive matching over `_tag` discriminated unions
 *
 * @module @vitalcheck/types/match
 */

/**
 * Handler map with exactly one handler per `_tag` variant
 */
export type TagHandlers<T extends { readonly _tag: string }, R> = {
  [V in T['_tag']]: (value: Extract<T, { readonly _tag: V }>) => R;
};

/**
 * Dispatches a tagged value to the handler registered for its variant.
 * The handler map must cover every variant, so adding a variant is a compile error
 * at every call site until it is handled.
 *
 * @example
 * const label = matchTag(failure, {
 *   ValidationError: (f) => f.issues.join(', '),
 *   SecurityError: (f) => f.reason,
 *   // ...
 * });
 */
export function matchTag<T extends { readonly _tag: string }, R>(
  value: T,
  handlers: TagHandlers<T, R>
): R {
  const handler = handlers[value._tag as T['_tag']] as (value: T) => R;
  return handler(value);
}

/**
 * Asserts that a value is never reached (exhaustiveness check)
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
