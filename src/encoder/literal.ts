import type {
  BigIntLiteral,
  CallExpression,
  Expression,
  ObjectExpression,
  UnaryExpression
} from 'estree';
import { valueToEstree } from 'estree-util-value-to-estree';

import type { PropertyPath, ScalarValue } from '../types';
import type { ScalarKind } from '../runtime/types';
import type { ImportScope } from './import-scope';

import {
  type Complex,
  type ScalarPayload,
  canonicalizeScalar,
  isComplex,
  shortestFloat32
} from '../runtime/scalars';
import { InvalidScalarError } from '../errors';
import {
  isBigInt,
  isInfinityValue,
  isNaNValue,
  isNegativeZeroValue,
  isNumber
} from '../utils/type-guards';

/**
 * Kinds whose canonical JavaScript literal is unambiguous on its own.
 * Every other kind is written as a width-declaring conversion
 * `runtime.of(runtime.<kind>, literal)`.
 */
const SELF_DESCRIBING_KINDS: ReadonlySet<ScalarKind> = new Set<ScalarKind>([
  'bool',
  'string',
  'int',
  'float64'
]);

function negate(argument: Expression): UnaryExpression {
  return {
    type: 'UnaryExpression',
    operator: '-',
    prefix: true,
    argument
  } satisfies UnaryExpression;
}

/**
 * Number literal with the non-finite values and `-0` spelled explicitly:
 * `NaN`, `Infinity`, `-Infinity`, `-0`, `-1.5`.
 */
function numberLiteral(value: number): Expression {
  if (isNaNValue(value)) return { type: 'Identifier', name: 'NaN' };
  if (value < 0 || isNegativeZeroValue(value)) {
    return negate(numberLiteral(-value));
  }
  if (isInfinityValue(value)) return { type: 'Identifier', name: 'Infinity' };
  return valueToEstree(value);
}

function bigintLiteral(value: bigint): Expression {
  if (value < 0n) return negate(bigintLiteral(-value));
  return {
    type: 'Literal',
    value,
    bigint: value.toString()
  } satisfies BigIntLiteral;
}

function complexLiteral(value: Complex, narrow: boolean): ObjectExpression {
  const part = (n: number) => numberLiteral(narrow ? shortestFloat32(n) : n);

  return {
    type: 'ObjectExpression',
    properties: [
      {
        type: 'Property',
        computed: false,
        shorthand: false,
        method: false,
        kind: 'init',
        key: { type: 'Identifier', name: 'real' },
        value: part(value.real)
      },
      {
        type: 'Property',
        computed: false,
        shorthand: false,
        method: false,
        kind: 'init',
        key: { type: 'Identifier', name: 'imag' },
        value: part(value.imag)
      }
    ]
  } satisfies ObjectExpression;
}

/**
 * Spells a canonical payload as a bare literal (no width declaration yet).
 */
function spellPayload(kind: ScalarKind, payload: ScalarPayload): Expression {
  if (isComplex(payload)) return complexLiteral(payload, kind === 'complex64');
  if (isBigInt(payload)) return bigintLiteral(payload);
  if (isNumber(payload)) {
    return numberLiteral(kind === 'float32' ? shortestFloat32(payload) : payload);
  }
  return valueToEstree(payload);
}

/**
 * Formats a scalar value as a literal expression.
 *
 * Steps:
 * 1. Convert the payload to its kind's canonical representation
 *    (see `canonicalizeScalar`): a `float32` is narrowed to 32 bits, a 64-bit
 *    integer becomes a `bigint`. Payloads that do not fit are rejected.
 * 2. Spell the canonical payload as an ESTree literal:
 *    - `"x"`, `true`, `5`, `-5`, `1.5`, `NaN`, `-0`
 *    - `5n` for 64-bit integers
 *    - the shortest decimal that narrows to the same `float32`
 *    - `{ real, imag }` for complex numbers
 * 3. Declare the width unless the literal already implies it:
 *    `runtime.of(runtime.int8, 5)`, `runtime.of(runtime.float32, 0.1)`.
 *
 * Named scalar types are written through their base kind.
 *
 * @param value
 *   The scalar to format.
 * @param scope
 *   Import scope for the runtime qualified names.
 * @param path
 *   Location of the scalar, reported on failure.
 * @returns
 *   The literal expression.
 * @throws InvalidScalarError
 *   When the payload does not fit the kind.
 */
export function formatScalar(
  value: ScalarValue,
  scope: ImportScope,
  path: PropertyPath = []
): Expression {
  const { kind } = value.type;

  // 1. Canonicalize
  const canonical = canonicalizeScalar(kind, value.value);
  if (!canonical.success) {
    throw new InvalidScalarError(canonical.reason, path);
  }

  // 2. Spell
  const literal = spellPayload(kind, canonical.value);

  if (SELF_DESCRIBING_KINDS.has(kind)) return literal;

  // 3. Declare the width
  return {
    type: 'CallExpression',
    callee: scope.qualify('', 'of'),
    arguments: [scope.qualify('', kind), literal],
    optional: false
  } satisfies CallExpression;
}
