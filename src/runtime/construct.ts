import type {
  ArrayType,
  MapType,
  ScalarType,
  SliceType,
  StructType,
  TypeDescriptor
} from './types';
import { type StructRecord, brandRecord } from './brand';
import { type ScalarPayload, canonicalizeScalar } from './scalars';

import { isPlainObject } from '../guards';

/**
 * Composite descriptors accepted by {@link of}.
 */
export type ConstructibleType =
  | ScalarType
  | ArrayType
  | SliceType
  | MapType
  | StructType;

/**
 * Returns the zero value of `type`.
 *
 * - numbers: `0` (`0n` for 64-bit integers), complex: `{ real: 0, imag: 0 }`
 * - `bool`: `false`, `string`: `""`
 * - arrays: `length` zero elements
 * - structs: a record whose every field holds its zero value
 * - slices, maps, pointers, interfaces, opaque kinds: `null`
 */
export function zeroValue(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'bool':
      return false;
    case 'string':
      return '';
    case 'int64':
    case 'uint64':
      return 0n;
    case 'complex64':
    case 'complex128':
      return { real: 0, imag: 0 };
    case 'int':
    case 'int8':
    case 'int16':
    case 'int32':
    case 'uint':
    case 'uint8':
    case 'uint16':
    case 'uint32':
    case 'uintptr':
    case 'float32':
    case 'float64':
      return 0;
    case 'array':
      return Array.from({ length: type.length }, () => zeroValue(type.elem));
    case 'struct':
      return of(type, {});
    case 'slice':
    case 'map':
    case 'pointer':
    case 'interface':
    case 'func':
    case 'chan':
    case 'unsafe-pointer':
      return null;
  }
}

function buildRecord(
  type: StructType,
  init: Readonly<Record<string, unknown>>
): StructRecord {
  const declared = new Set(type.fields.map(field => field.name));
  for (const key of Object.keys(init)) {
    if (!declared.has(key)) {
      throw new TypeError(
        `[freeze] Struct ${type.name} has no field "${key}".`
      );
    }
  }

  const record: Record<string, unknown> = {};
  for (const field of type.fields) {
    // Defined rather than assigned, so a `__proto__` field stays an own field.
    Object.defineProperty(record, field.name, {
      value: Object.hasOwn(init, field.name)
        ? init[field.name]
        : zeroValue(field.type),
      enumerable: true,
      writable: true,
      configurable: true
    });
  }

  brandRecord(record, type);
  return record;
}

/**
 * Composite literal / conversion: builds the host value of `type` from its
 * spelled-out payload. Generated modules call this for every width-declared
 * scalar and every composite value.
 *
 * | type   | payload                          | result                          |
 * |--------|----------------------------------|---------------------------------|
 * | scalar | host scalar                      | payload at the kind's width     |
 * | slice  | elements                         | new array                       |
 * | array  | elements (at most `length`)      | array padded with zero values   |
 * | map    | `[key, value]` entries           | `Map` in entry order            |
 * | struct | `{ field: value }` (subset)      | branded record, zero-filled     |
 *
 * @throws TypeError when the payload does not fit the type.
 */
export function of(type: ScalarType, payload: ScalarPayload): ScalarPayload;
export function of(type: ArrayType | SliceType, elements: readonly unknown[]): unknown[];
export function of(
  type: MapType,
  entries: ReadonlyArray<readonly [unknown, unknown]>
): Map<unknown, unknown>;
export function of(
  type: StructType,
  init: Readonly<Record<string, unknown>>
): StructRecord;
export function of(type: ConstructibleType, payload: unknown): unknown {
  switch (type.kind) {
    case 'slice':
    case 'array': {
      if (!Array.isArray(payload)) {
        throw new TypeError(`[freeze] Expected an element list for ${type.kind}.`);
      }
      if (type.kind === 'slice') return [...payload];

      if (payload.length > type.length) {
        throw new TypeError(
          `[freeze] ${payload.length} elements exceed array length ${type.length}.`
        );
      }
      const padding = Array.from({ length: type.length - payload.length }, () =>
        zeroValue(type.elem)
      );
      return [...payload, ...padding];
    }

    case 'map': {
      if (!Array.isArray(payload)) {
        throw new TypeError('[freeze] Expected an entry list for map.');
      }
      const entries = new Map<unknown, unknown>();
      for (const entry of payload) {
        if (!Array.isArray(entry) || entry.length !== 2) {
          throw new TypeError('[freeze] Map entries must be [key, value] pairs.');
        }
        entries.set(entry[0], entry[1]);
      }
      return entries;
    }

    case 'struct': {
      if (!isPlainObject(payload)) {
        throw new TypeError(
          `[freeze] Expected a field object for struct ${type.name}.`
        );
      }
      return buildRecord(type, payload);
    }

    default: {
      const canonical = canonicalizeScalar(type.kind, payload);
      if (!canonical.success) {
        throw new TypeError(`[freeze] Cannot convert to ${type.name}: ${canonical.reason}.`);
      }
      return canonical.value;
    }
  }
}

/**
 * Reference operator for pointer sites.
 *
 * Host references already share identity, so the pointee is returned as is;
 * generated code keeps the call so that pointer sites stay visible.
 */
export function ref<T>(target: T): T {
  return target;
}
