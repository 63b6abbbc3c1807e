/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<PropertyKey, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * Struct records built by the runtime are plain objects; `Map`s, arrays and
 * class instances are not.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Record<PropertyKey, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}
