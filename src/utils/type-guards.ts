export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  function: (...args: never[]) => unknown;
};

/**
 * Creates a guard for a built-in `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/** Guard verifying the value is a function. */
export const isFunction = is('function');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * Both spell "absent" for slices, maps, pointers and interface slots.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is `NaN`.
 *
 * Note:
 * Uses `Number.isNaN` (no coercion), composed from {@link isNumber}.
 * This intentionally differs from the global `isNaN(...)`, which coerces inputs.
 */
export function isNaNValue(value: unknown): value is number {
  return isNumber(value) && Number.isNaN(value);
}

/**
 * Guard verifying the value is `Infinity`.
 */
export function isInfinityValue(value: unknown): value is number {
  return isNumber(value) && value === Infinity;
}

/**
 * Guard verifying the value is `-0`.
 *
 * Why `Object.is`:
 * JavaScript equality cannot distinguish `-0` from `0` (`-0 === 0` is true);
 * `Object.is(-0, 0)` is false.
 */
export function isNegativeZeroValue(value: unknown): value is number {
  return isNumber(value) && Object.is(value, -0);
}
