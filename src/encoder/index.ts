import type {
  ArrayExpression,
  CallExpression,
  Expression,
  Literal,
  ObjectExpression,
  Property
} from 'estree';

import type {
  CompositeValue,
  EncodeOptions,
  MapEntry,
  PropertyPath,
  RuntimeValue,
  StructValue
} from '../types';

import {
  CyclicValueError,
  FieldAccessDeniedError,
  type FreezeError,
  TypeMismatchError,
  UnsupportedKindError,
  isFreezeError
} from '../errors';
import { canonicalizeScalar } from '../runtime/scalars';
import { renderExpression } from '../codegen/render';
import { isIdentifierName } from './import-scope';
import { formatScalar } from './literal';
import { resolveTypeExpression } from './type-expression';

export type EncodeResult =
  | { success: true; expression: Expression }
  | { success: false; error: FreezeError };

/**
 * Per-call state threaded through the recursion.
 */
type EncodeState = Required<EncodeOptions> & {
  /**
   * Composite values on the current recursion path (ancestors of the value
   * being encoded). Entries are removed on the way out, so shared subtrees
   * (siblings referencing the same value) are not mistaken for cycles.
   */
  active: Set<CompositeValue>;
};

function nullLiteral(): Literal {
  return { type: 'Literal', value: null } satisfies Literal;
}

function composite(
  state: EncodeState,
  typeExpression: Expression,
  payload: Expression
): CallExpression {
  return {
    type: 'CallExpression',
    callee: state.scope.qualify('', 'of'),
    arguments: [typeExpression, payload],
    optional: false
  } satisfies CallExpression;
}

/**
 * Builds the `{ Field: expr }` property for a struct field.
 *
 * Keys are identifiers where possible, string literals otherwise. `__proto__`
 * is emitted as a computed key so it stays an own data property instead of
 * setting the prototype.
 */
function fieldProperty(name: string, value: Expression): Property {
  const computed = name === '__proto__';

  return {
    type: 'Property',
    computed,
    shorthand: false,
    method: false,
    kind: 'init',
    key:
      isIdentifierName(name) && !computed
        ? { type: 'Identifier', name }
        : { type: 'Literal', value: name },
    value
  } satisfies Property;
}

function encodeSequence(
  elements: readonly RuntimeValue[],
  path: PropertyPath,
  state: EncodeState
): ArrayExpression {
  return {
    type: 'ArrayExpression',
    elements: elements.map((element, index) =>
      encodeNode(element, [...path, index], state)
    )
  } satisfies ArrayExpression;
}

/**
 * Identity of a map key once rebuilt, for keys that rebuild as primitives
 * (or `null`). Keys that rebuild as fresh objects never collide and have none.
 *
 * Tags keep `1` and `1n` apart; `-0` and `0` share one, as in a `Map`.
 */
function mapKeyIdentity(key: RuntimeValue): string | undefined {
  switch (key.kind) {
    case 'interface':
      return key.held === null ? 'null' : mapKeyIdentity(key.held);
    case 'pointer':
      return key.target === null ? 'null' : mapKeyIdentity(key.target);
    case 'slice':
      return key.elements === null ? 'null' : undefined;
    case 'map':
      return key.entries === null ? 'null' : undefined;
    case 'scalar': {
      const canonical = canonicalizeScalar(key.type.kind, key.value);
      if (!canonical.success || typeof canonical.value === 'object') {
        return undefined;
      }
      const payload = canonical.value;
      return `${typeof payload}:${Object.is(payload, -0) ? '0' : String(payload)}`;
    }
    default:
      return undefined;
  }
}

function encodeMapEntries(
  entries: readonly MapEntry[],
  path: PropertyPath,
  state: EncodeState
): ArrayExpression {
  const seenKeys = new Set<string>();

  const pairs = entries.map(([key, entryValue], index) => {
    const keyPath = [...path, index, 'key'];
    const keyExpression = encodeNode(key, keyPath, state);

    const identity = mapKeyIdentity(key);
    if (identity !== undefined) {
      if (seenKeys.has(identity)) {
        throw new TypeMismatchError(
          `Duplicate map key ${renderExpression(keyExpression)}`,
          keyPath
        );
      }
      seenKeys.add(identity);
    }

    return {
      key: keyExpression,
      value: encodeNode(entryValue, [...path, index, 'value'], state)
    };
  });

  if (state.sortMapEntries) {
    const keyed = pairs.map(pair => ({
      pair,
      sortKey: renderExpression(pair.key)
    }));

    // Code-unit order (not locale order) for byte-stable output.
    keyed.sort((a, b) =>
      a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0
    );

    pairs.splice(0, pairs.length, ...keyed.map(entry => entry.pair));
  }

  return {
    type: 'ArrayExpression',
    elements: pairs.map(
      pair =>
        ({
          type: 'ArrayExpression',
          elements: [pair.key, pair.value]
        }) satisfies ArrayExpression
    )
  } satisfies ArrayExpression;
}

function encodeStructFields(
  value: StructValue,
  path: PropertyPath,
  state: EncodeState
): ObjectExpression {
  const properties: Property[] = [];

  for (const field of value.fields) {
    if (!field.visible) continue;

    let fieldValue: RuntimeValue;
    try {
      fieldValue = field.read();
    } catch (error) {
      // Unreadable fields are left out; the decoder fills in the zero value.
      if (error instanceof FieldAccessDeniedError) continue;
      throw error;
    }

    properties.push(
      fieldProperty(
        field.name,
        encodeNode(fieldValue, [...path, field.name], state)
      )
    );
  }

  return {
    type: 'ObjectExpression',
    properties
  } satisfies ObjectExpression;
}

/**
 * Encodes a composite value while it is on the recursion path.
 */
function withActive<T>(
  value: CompositeValue,
  path: PropertyPath,
  state: EncodeState,
  encode: () => T
): T {
  if (state.active.has(value)) throw new CyclicValueError(path);

  state.active.add(value);
  try {
    return encode();
  } finally {
    state.active.delete(value);
  }
}

function encodeNode(
  value: RuntimeValue,
  path: PropertyPath,
  state: EncodeState
): Expression {
  switch (value.kind) {
    case 'scalar':
      return formatScalar(value, state.scope, path);

    case 'opaque':
      throw new UnsupportedKindError(value.type.kind, path);

    case 'array':
      return withActive(value, path, state, () =>
        composite(
          state,
          resolveTypeExpression(value.type, state.scope),
          encodeSequence(value.elements, path, state)
        )
      );

    case 'slice': {
      const { elements } = value;
      if (elements === null) return nullLiteral();

      return withActive(value, path, state, () =>
        composite(
          state,
          resolveTypeExpression(value.type, state.scope),
          encodeSequence(elements, path, state)
        )
      );
    }

    case 'map': {
      const { entries } = value;
      if (entries === null) return nullLiteral();

      return withActive(value, path, state, () =>
        composite(
          state,
          resolveTypeExpression(value.type, state.scope),
          encodeMapEntries(entries, path, state)
        )
      );
    }

    case 'pointer': {
      const { target } = value;
      if (target === null) return nullLiteral();

      return withActive(
        value,
        path,
        state,
        () =>
          ({
            type: 'CallExpression',
            callee: state.scope.qualify('', 'ref'),
            arguments: [encodeNode(target, path, state)],
            optional: false
          }) satisfies CallExpression
      );
    }

    case 'interface': {
      const { held } = value;
      if (held === null) return nullLiteral();

      // The held value carries its own dynamic type; no wrapper is emitted.
      return withActive(value, path, state, () =>
        encodeNode(held, path, state)
      );
    }

    case 'struct':
      return withActive(value, path, state, () =>
        composite(
          state,
          resolveTypeExpression(value.type, state.scope),
          encodeStructFields(value, path, state)
        )
      );

    default: {
      const exhaustive: never = value;
      throw new Error(
        `[freeze] Unhandled runtime value: ${JSON.stringify(exhaustive)}`
      );
    }
  }
}

/**
 * Encodes a runtime value as an expression that rebuilds an equal value when
 * evaluated against the runtime module and the schema modules the scope
 * imports.
 *
 * Encoding is pure apart from alias allocation in `options.scope`: the same
 * value and scope state always produce the same expression.
 *
 * | value                         | expression                                  |
 * |-------------------------------|---------------------------------------------|
 * | absent slice/map/pointer/slot | `null`                                      |
 * | array, slice                  | `runtime.of(runtime.slice(E), [e0, e1])`    |
 * | map                           | `runtime.of(runtime.map(K, V), [[k, v]])`   |
 * | pointer                       | `runtime.ref(pointee)`                      |
 * | interface                     | the held value                              |
 * | struct                        | `runtime.of(alias.Name, { Field: expr })`   |
 * | scalar                        | see `formatScalar`                          |
 *
 * @throws UnsupportedKindError
 *   For function, channel and raw pointer values.
 * @throws CyclicValueError
 *   When a composite value contains itself.
 * @throws InvalidScalarError
 *   When a scalar payload does not fit its kind.
 * @throws TypeMismatchError
 *   When two keys of a map rebuild as the same key.
 */
export function encodeValue(
  value: RuntimeValue,
  options: EncodeOptions
): Expression {
  return encodeNode(value, [], {
    scope: options.scope,
    sortMapEntries: options.sortMapEntries ?? false,
    active: new Set()
  });
}

/**
 * Variant of {@link encodeValue} that reports encoding failures as a result.
 *
 * Errors that are not `FreezeError`s (e.g. thrown by a custom field accessor)
 * are rethrown.
 */
export function tryEncodeValue(
  value: RuntimeValue,
  options: EncodeOptions
): EncodeResult {
  try {
    return { success: true, expression: encodeValue(value, options) };
  } catch (error) {
    if (isFreezeError(error)) return { success: false, error };
    throw error;
  }
}
