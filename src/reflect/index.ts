import type {
  InterfaceType,
  MapType,
  ScalarKind,
  StructType,
  TypeDescriptor
} from '../runtime/types';
import type { ScalarPayload } from '../runtime/scalars';
import type {
  MapEntry,
  PropertyPath,
  RuntimeValue,
  StructField,
  StructValue
} from '../types';

import { bool, float64, func, int64, string } from '../runtime/types';
import { structTypeOf } from '../runtime/brand';
import { zeroValue } from '../runtime/construct';
import { isComplex } from '../runtime/scalars';
import { FieldAccessDeniedError, TypeMismatchError } from '../errors';
import { isPlainObject } from '../guards';
import {
  isAbsent,
  isBigInt,
  isBoolean,
  isFunction,
  isNumber,
  isString
} from '../utils/type-guards';
import {
  interfaceValue,
  opaqueValue,
  pointerValue,
  scalarValue
} from '../values';

/**
 * Reflected values per host object and descriptor.
 *
 * A composite is registered before its children are reflected, so a host
 * graph that reaches the same object again (under the same descriptor) yields
 * the very same runtime value. The encoder relies on that identity to detect
 * cycles.
 */
type ReflectCache = Map<object, Map<TypeDescriptor, RuntimeValue>>;

function cached(
  cache: ReflectCache,
  host: object,
  type: TypeDescriptor
): RuntimeValue | undefined {
  return cache.get(host)?.get(type);
}

function remember(
  cache: ReflectCache,
  host: object,
  type: TypeDescriptor,
  value: RuntimeValue
): void {
  let byType = cache.get(host);
  if (!byType) {
    byType = new Map();
    cache.set(host, byType);
  }
  byType.set(type, value);
}

function describeHost(host: unknown): string {
  if (host === null) return 'null';
  if (Array.isArray(host)) return 'array';
  if (host instanceof Map) return 'Map';
  return typeof host;
}

function mismatch(
  expected: string,
  host: unknown,
  path: PropertyPath
): TypeMismatchError {
  return new TypeMismatchError(
    `Expected ${expected}, got ${describeHost(host)}`,
    path
  );
}

/**
 * Picks the descriptor of the value held by an interface slot.
 *
 * | host                  | dynamic type         |
 * |-----------------------|----------------------|
 * | branded struct record | the record's struct  |
 * | `boolean`             | `bool`               |
 * | `string`              | `string`             |
 * | `bigint`              | `int64`              |
 * | `number`              | `float64`            |
 * | function              | `func` (opaque)      |
 */
function dynamicType(
  host: unknown,
  type: InterfaceType,
  path: PropertyPath
): TypeDescriptor {
  const brand = structTypeOf(host);
  if (brand) return brand;

  if (isBoolean(host)) return bool;
  if (isString(host)) return string;
  if (isBigInt(host)) return int64;
  if (isNumber(host)) return float64;
  if (isFunction(host)) return func();

  throw new TypeMismatchError(
    `Cannot determine the dynamic type of ${describeHost(host)} held by ${type.name}`,
    path
  );
}

type MapSource = {
  owner: object;
  entries: Iterable<readonly [unknown, unknown]>;
};

function mapSource(
  host: unknown,
  type: MapType,
  path: PropertyPath
): MapSource {
  if (host instanceof Map) return { owner: host, entries: host.entries() };

  // String-keyed maps may also be given as plain objects.
  if (type.key.kind === 'string' && isPlainObject(host)) {
    return { owner: host, entries: Object.entries(host) };
  }

  throw mismatch(`a Map for ${describeType(type)}`, host, path);
}

function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'array':
      return `[${type.length}]${describeType(type.elem)}`;
    case 'slice':
      return `[]${describeType(type.elem)}`;
    case 'map':
      return `map[${describeType(type.key)}]${describeType(type.elem)}`;
    case 'pointer':
      return `*${describeType(type.elem)}`;
    default:
      return type.name;
  }
}

function reflectStruct(
  host: Record<PropertyKey, unknown>,
  type: StructType,
  path: PropertyPath,
  cache: ReflectCache
): StructValue {
  const fields: StructField[] = type.fields.map(descriptor => {
    let value: RuntimeValue | undefined;

    return {
      name: descriptor.name,
      visible: descriptor.visible,
      read() {
        if (value !== undefined) return value;

        const fieldPath = [...path, descriptor.name];
        let raw: unknown;
        try {
          raw = Object.hasOwn(host, descriptor.name)
            ? host[descriptor.name]
            : zeroValue(descriptor.type);
        } catch (cause) {
          throw new FieldAccessDeniedError(
            type.name,
            descriptor.name,
            fieldPath,
            cause
          );
        }

        value = reflectNode(raw, descriptor.type, fieldPath, cache);
        return value;
      }
    };
  });

  return { kind: 'struct', type, fields };
}

function reflectNode(
  host: unknown,
  type: TypeDescriptor,
  path: PropertyPath,
  cache: ReflectCache
): RuntimeValue {
  switch (type.kind) {
    case 'func':
    case 'chan':
    case 'unsafe-pointer':
      return opaqueValue(type);

    case 'pointer':
      return pointerValue(
        type,
        isAbsent(host) ? null : reflectNode(host, type.elem, path, cache)
      );

    case 'interface':
      return interfaceValue(
        type,
        isAbsent(host)
          ? null
          : reflectNode(host, dynamicType(host, type, path), path, cache)
      );

    case 'array':
    case 'slice': {
      if (type.kind === 'slice' && isAbsent(host)) {
        return { kind: 'slice', type, elements: null };
      }
      if (!Array.isArray(host)) {
        throw mismatch(`an array for ${describeType(type)}`, host, path);
      }
      if (type.kind === 'array' && host.length !== type.length) {
        throw new TypeMismatchError(
          `Expected ${type.length} elements for ${describeType(type)}, got ${host.length}`,
          path
        );
      }

      const hit = cached(cache, host, type);
      if (hit) return hit;

      const elements: RuntimeValue[] = [];
      const value: RuntimeValue =
        type.kind === 'array'
          ? { kind: 'array', type, elements }
          : { kind: 'slice', type, elements };
      remember(cache, host, type, value);

      for (let index = 0; index < host.length; index++) {
        const element: unknown = host[index];
        elements.push(reflectNode(element, type.elem, [...path, index], cache));
      }

      return value;
    }

    case 'map': {
      if (isAbsent(host)) return { kind: 'map', type, entries: null };

      const source = mapSource(host, type, path);

      const hit = cached(cache, source.owner, type);
      if (hit) return hit;

      const entries: MapEntry[] = [];
      const value: RuntimeValue = { kind: 'map', type, entries };
      remember(cache, source.owner, type, value);

      let index = 0;
      for (const [key, entryValue] of source.entries) {
        entries.push([
          reflectNode(key, type.key, [...path, index, 'key'], cache),
          reflectNode(entryValue, type.elem, [...path, index, 'value'], cache)
        ]);
        index++;
      }

      return value;
    }

    case 'struct': {
      if (!isPlainObject(host)) {
        throw mismatch(`a ${type.name} record`, host, path);
      }

      const brand = structTypeOf(host);
      if (brand && brand !== type) {
        throw new TypeMismatchError(
          `Expected a ${type.name} record, got a ${brand.name} record`,
          path
        );
      }

      const hit = cached(cache, host, type);
      if (hit) return hit;

      const value = reflectStruct(host, type, path, cache);
      remember(cache, host, type, value);
      return value;
    }

    default: {
      if (!fitsScalarKind(type.kind, host)) {
        throw mismatch(`a value of type ${type.name}`, host, path);
      }
      return scalarValue(type, host);
    }
  }
}

/**
 * Whether `host` has the JS type a scalar kind is held as. Ranges are left
 * to the encoder, which reports them as `InvalidScalar`.
 */
function fitsScalarKind(
  kind: ScalarKind,
  host: unknown
): host is ScalarPayload {
  switch (kind) {
    case 'bool':
      return isBoolean(host);
    case 'string':
      return isString(host);
    case 'int64':
    case 'uint64':
      return isBigInt(host) || isNumber(host);
    case 'complex64':
    case 'complex128':
      return isComplex(host);
    default:
      return isNumber(host);
  }
}

/**
 * Derives the runtime value of `host`, interpreted as a value of `type`.
 *
 * Host data follows the representation the runtime module builds (see `of`):
 * numbers or bigints for integers, `Map`s for maps, branded plain records for
 * structs, `null` for absent slices, maps, pointers and interface slots.
 *
 * Reflection is shallow at struct boundaries: fields are reflected on first
 * `read()`, and a field whose read throws surfaces as
 * `FieldAccessDeniedError`. Fields missing from a record read as the zero
 * value of their type.
 *
 * @throws TypeMismatchError
 *   When the host data does not fit the descriptor (also from `read()`).
 */
export function reflectValue(host: unknown, type: TypeDescriptor): RuntimeValue {
  return reflectNode(host, type, [], new Map());
}
