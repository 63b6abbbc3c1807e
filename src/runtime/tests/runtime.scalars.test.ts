import { describe, expect, it, test } from 'vitest';

import type { ScalarKind } from '../types';
import {
  type CanonicalScalar,
  canonicalizeScalar,
  shortestFloat32
} from '../scalars';

/**
 * Test suite: scalar canonicalization.
 *
 * Coverage:
 * - Range checks for every integer width.
 * - 64-bit integers as bigint.
 * - float32 narrowing and its shortest spelling.
 * - Rejection of payloads of the wrong host type.
 */
describe('canonicalizeScalar', () => {
  type Scenario = {
    id: string;
    kind: ScalarKind;
    payload: unknown;
    expected: CanonicalScalar;
  };

  describe('Accepted Payloads', () => {
    const scenarios: Scenario[] = [
      {
        id: 'int8 upper bound',
        kind: 'int8',
        payload: 127,
        expected: { success: true, value: 127 }
      },
      {
        id: 'uint32 upper bound',
        kind: 'uint32',
        payload: 0xffffffff,
        expected: { success: true, value: 4294967295 }
      },
      {
        id: 'int64 from a safe number',
        kind: 'int64',
        payload: 5,
        expected: { success: true, value: 5n }
      },
      {
        id: 'uint64 upper bound',
        kind: 'uint64',
        payload: 2n ** 64n - 1n,
        expected: { success: true, value: 18446744073709551615n }
      },
      {
        id: 'float32 narrowing',
        kind: 'float32',
        payload: 0.1,
        expected: { success: true, value: Math.fround(0.1) }
      },
      {
        id: 'complex64 parts narrowed',
        kind: 'complex64',
        payload: { real: 0.1, imag: 2 },
        expected: { success: true, value: { real: Math.fround(0.1), imag: 2 } }
      },
      {
        id: 'complex128 parts kept',
        kind: 'complex128',
        payload: { real: 0.1, imag: -2 },
        expected: { success: true, value: { real: 0.1, imag: -2 } }
      }
    ];

    test.for(scenarios)('[$id]', ({ kind, payload, expected }) => {
      expect(canonicalizeScalar(kind, payload)).toEqual(expected);
    });
  });

  describe('Rejected Payloads', () => {
    const scenarios: Scenario[] = [
      {
        id: 'int8 overflow',
        kind: 'int8',
        payload: 128,
        expected: {
          success: false,
          reason: '128 is out of range [-128, 127] for int8'
        }
      },
      {
        id: 'uint8 underflow',
        kind: 'uint8',
        payload: -1,
        expected: {
          success: false,
          reason: '-1 is out of range [0, 255] for uint8'
        }
      },
      {
        id: 'fractional int16',
        kind: 'int16',
        payload: 1.5,
        expected: {
          success: false,
          reason: 'expected an integer number for int16'
        }
      },
      {
        id: 'negative uint64',
        kind: 'uint64',
        payload: -1n,
        expected: { success: false, reason: '-1 is out of range for uint64' }
      },
      {
        id: 'int64 overflow',
        kind: 'int64',
        payload: 2n ** 63n,
        expected: {
          success: false,
          reason: '9223372036854775808 is out of range for int64'
        }
      },
      {
        id: 'unsafe number for int64',
        kind: 'int64',
        payload: 2 ** 53,
        expected: {
          success: false,
          reason: 'expected a bigint or safe integer for int64'
        }
      },
      {
        id: 'number for bool',
        kind: 'bool',
        payload: 1,
        expected: { success: false, reason: 'expected a boolean' }
      },
      {
        id: 'number for complex64',
        kind: 'complex64',
        payload: 1,
        expected: {
          success: false,
          reason: 'expected { real, imag } for complex64'
        }
      }
    ];

    test.for(scenarios)('[$id]', ({ kind, payload, expected }) => {
      expect(canonicalizeScalar(kind, payload)).toEqual(expected);
    });
  });

  describe('Signed Zero', () => {
    it('collapses -0 to 0 for integer kinds', () => {
      const result = canonicalizeScalar('int32', -0);

      expect(result.success).toBe(true);
      expect(result.success && Object.is(result.value, 0)).toBe(true);
    });

    it('keeps -0 for float kinds', () => {
      const result = canonicalizeScalar('float64', -0);

      expect(result.success && Object.is(result.value, -0)).toBe(true);
    });
  });
});

describe('shortestFloat32', () => {
  const scenarios = [
    { id: 'one tenth', input: Math.fround(0.1), expected: 0.1 },
    { id: 'one third', input: Math.fround(1 / 3), expected: 0.33333334 },
    { id: 'exact binary fraction', input: 1.5, expected: 1.5 },
    { id: 'large integer', input: Math.fround(16777217), expected: 16777216 },
    { id: 'infinity', input: Infinity, expected: Infinity }
  ];

  test.for(scenarios)('[$id]', ({ input, expected }) => {
    const shortest = shortestFloat32(input);

    expect(shortest).toBe(expected);
    expect(Math.fround(shortest)).toBe(input);
  });

  it('returns NaN and -0 unchanged', () => {
    expect(shortestFloat32(NaN)).toBeNaN();
    expect(Object.is(shortestFloat32(-0), -0)).toBe(true);
  });
});
