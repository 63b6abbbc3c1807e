import type {
  ArrayType,
  InterfaceType,
  MapType,
  OpaqueType,
  PointerType,
  ScalarType,
  SliceType,
  StructType
} from './runtime/types';
import type { ScalarPayload } from './runtime/scalars';
import type {
  ArrayValue,
  InterfaceValue,
  MapEntry,
  MapValue,
  OpaqueValue,
  PointerValue,
  RuntimeValue,
  ScalarValue,
  SliceValue,
  StructField,
  StructValue
} from './types';

/**
 * Builders for runtime values.
 *
 * These are the hand-written counterpart of `reflectValue`: tests and custom
 * unit parsers use them to describe a value without going through host data.
 */

export function scalarValue(
  type: ScalarType,
  value: ScalarPayload
): ScalarValue {
  return { kind: 'scalar', type, value };
}

export function arrayValue(
  type: ArrayType,
  elements: readonly RuntimeValue[]
): ArrayValue {
  return { kind: 'array', type, elements };
}

/**
 * Pass `null` for an absent slice.
 */
export function sliceValue(
  type: SliceType,
  elements: readonly RuntimeValue[] | null
): SliceValue {
  return { kind: 'slice', type, elements };
}

/**
 * Pass `null` for an absent map.
 */
export function mapValue(
  type: MapType,
  entries: readonly MapEntry[] | null
): MapValue {
  return { kind: 'map', type, entries };
}

export function pointerValue(
  type: PointerType,
  target: RuntimeValue | null
): PointerValue {
  return { kind: 'pointer', type, target };
}

export function interfaceValue(
  type: InterfaceType,
  held: RuntimeValue | null
): InterfaceValue {
  return { kind: 'interface', type, held };
}

/**
 * Builds a struct value from eagerly known field values.
 *
 * Fields follow the descriptor's declaration order; a field missing from
 * `values` is left out of the value entirely (as if it could not be read).
 * For lazy or failing accessors, build the `StructField`s directly.
 */
export function structValue(
  type: StructType,
  values: Readonly<Record<string, RuntimeValue>>
): StructValue {
  const fields: StructField[] = [];

  for (const descriptor of type.fields) {
    if (!Object.hasOwn(values, descriptor.name)) continue;
    const fieldValue = values[descriptor.name];

    fields.push({
      name: descriptor.name,
      visible: descriptor.visible,
      read: () => fieldValue
    });
  }

  return { kind: 'struct', type, fields };
}

export function opaqueValue(type: OpaqueType): OpaqueValue {
  return { kind: 'opaque', type };
}
