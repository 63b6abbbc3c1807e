import type { StructType } from './types';

import { isRecord } from '../guards';

/**
 * Brand key under which a struct record remembers its descriptor.
 *
 * Implementation Strategy:
 *
 * 1. Mechanism: Global Identity
 *    `Symbol.for('...')` registers the symbol in the global runtime registry,
 *    so every evaluation of this module returns the same key.
 *
 * 2. The Hazard: Duplicate Runtime Copies
 *    A generated module imports `estree-freeze/runtime`; the process that
 *    reads the frozen value may have loaded a second copy of this package. With
 *    a plain `Symbol()` the two copies would not recognise each other's records,
 *    and polymorphic slots could no longer recover their dynamic type.
 */
export const STRUCT_TYPE = Symbol.for('estree-freeze.struct_type');

/**
 * A struct record as built by `of(structType, init)`.
 */
export type StructRecord = Record<string, unknown> & {
  readonly [STRUCT_TYPE]: StructType;
};

/**
 * Attaches the brand as a non-enumerable property, so it stays out of
 * `Object.keys`, spreads and deep-equality checks.
 */
export function brandRecord(
  record: Record<string, unknown>,
  type: StructType
): asserts record is StructRecord {
  Object.defineProperty(record, STRUCT_TYPE, {
    value: type,
    enumerable: false,
    writable: false,
    configurable: false
  });
}

function isStructType(value: unknown): value is StructType {
  return (
    isRecord(value) &&
    value.kind === 'struct' &&
    typeof value.pkgPath === 'string' &&
    typeof value.name === 'string'
  );
}

/**
 * Reads the descriptor a struct record was built with.
 *
 * @param value
 *   Any host value.
 * @returns
 *   The struct descriptor, or `undefined` when `value` is not a branded record.
 */
export function structTypeOf(value: unknown): StructType | undefined {
  if (!isRecord(value)) return undefined;

  const brand = value[STRUCT_TYPE];
  return isStructType(brand) ? brand : undefined;
}
