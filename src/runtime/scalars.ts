import type { ScalarKind } from './types';

import { isRecord } from '../guards';
import {
  isBigInt,
  isBoolean,
  isNumber,
  isString
} from '../utils/type-guards';

/**
 * Host value of the `complex64` / `complex128` kinds.
 */
export type Complex = {
  readonly real: number;
  readonly imag: number;
};

/**
 * Every host value a scalar kind can hold.
 */
export type ScalarPayload = boolean | number | bigint | string | Complex;

/**
 * Outcome of {@link canonicalizeScalar}.
 *
 * Pattern:
 * - `success: true`  => `value` is the payload in its kind's canonical form
 * - `success: false` => `reason` says why the payload does not fit the kind
 */
export type CanonicalScalar =
  | { success: true; value: ScalarPayload }
  | { success: false; reason: string };

/**
 * Inclusive bounds of the fixed-width integer kinds held as `number`.
 */
const NUMBER_INTEGER_BOUNDS = {
  int8: [-0x80, 0x7f],
  int16: [-0x8000, 0x7fff],
  int32: [-0x80000000, 0x7fffffff],
  uint8: [0, 0xff],
  uint16: [0, 0xffff],
  uint32: [0, 0xffffffff],
  int: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  uint: [0, Number.MAX_SAFE_INTEGER],
  uintptr: [0, Number.MAX_SAFE_INTEGER]
} as const satisfies Partial<Record<ScalarKind, readonly [number, number]>>;

type NumberIntegerKind = keyof typeof NUMBER_INTEGER_BOUNDS;

function isNumberIntegerKind(kind: ScalarKind): kind is NumberIntegerKind {
  return Object.hasOwn(NUMBER_INTEGER_BOUNDS, kind);
}

export function isComplex(value: unknown): value is Complex {
  return isRecord(value) && isNumber(value.real) && isNumber(value.imag);
}

function accept(value: ScalarPayload): CanonicalScalar {
  return { success: true, value };
}

function reject(reason: string): CanonicalScalar {
  return { success: false, reason };
}

/**
 * Converts `payload` to the canonical host representation of `kind`.
 *
 * Conversion rules
 * ----------------
 * 1. Integers never change value: a payload outside the kind's range is
 *    rejected rather than wrapped.
 * 2. 64-bit integers are `bigint`; safe-integer numbers are widened.
 * 3. `float32` (and both `complex64` parts) are narrowed with `Math.fround`,
 *    so the result is exactly representable at 32 bits.
 * 4. `-0` collapses to `0` for integer kinds and is kept for float kinds.
 *
 * @param kind
 *   Target scalar kind.
 * @param payload
 *   Candidate host value.
 * @returns
 *   The canonical payload, or the reason it does not fit.
 */
export function canonicalizeScalar(
  kind: ScalarKind,
  payload: unknown
): CanonicalScalar {
  if (isNumberIntegerKind(kind)) {
    const [min, max] = NUMBER_INTEGER_BOUNDS[kind];
    if (!isNumber(payload) || !Number.isInteger(payload)) {
      return reject(`expected an integer number for ${kind}`);
    }
    if (payload < min || payload > max) {
      return reject(`${payload} is out of range [${min}, ${max}] for ${kind}`);
    }
    return accept(payload === 0 ? 0 : payload);
  }

  switch (kind) {
    case 'bool':
      return isBoolean(payload)
        ? accept(payload)
        : reject('expected a boolean');

    case 'string':
      return isString(payload) ? accept(payload) : reject('expected a string');

    case 'int64':
    case 'uint64': {
      let big: bigint;
      if (isBigInt(payload)) {
        big = payload;
      } else if (isNumber(payload) && Number.isSafeInteger(payload)) {
        big = BigInt(payload);
      } else {
        return reject(`expected a bigint or safe integer for ${kind}`);
      }
      const wrapped =
        kind === 'int64' ? BigInt.asIntN(64, big) : BigInt.asUintN(64, big);
      return wrapped === big
        ? accept(big)
        : reject(`${big} is out of range for ${kind}`);
    }

    case 'float32':
      return isNumber(payload)
        ? accept(Math.fround(payload))
        : reject('expected a number for float32');

    case 'float64':
      return isNumber(payload)
        ? accept(payload)
        : reject('expected a number for float64');

    case 'complex64':
      return isComplex(payload)
        ? accept({
            real: Math.fround(payload.real),
            imag: Math.fround(payload.imag)
          })
        : reject('expected { real, imag } for complex64');

    case 'complex128':
      return isComplex(payload)
        ? accept({ real: payload.real, imag: payload.imag })
        : reject('expected { real, imag } for complex128');
  }
}

/**
 * Shortest decimal that narrows back to the same `float32`.
 *
 * `Math.fround(0.1)` is `0.10000000149011612` at 64 bits; spelling that in
 * generated code would be correct but noisy, so the search walks precisions
 * 1..9 (9 significant digits always suffice for binary32) and returns the
 * first decimal whose narrowing is bit-identical.
 *
 * Non-finite values and `-0` are returned unchanged.
 *
 * @param value
 *   A value already narrowed with `Math.fround`.
 */
export function shortestFloat32(value: number): number {
  if (!Number.isFinite(value) || value === 0) return value;

  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Object.is(Math.fround(candidate), value)) return candidate;
  }

  return value;
}
