import type {
  ArrayType,
  InterfaceType,
  MapType,
  OpaqueType,
  PointerType,
  ScalarType,
  SliceType,
  StructType
} from '../runtime/types';
import type { ScalarPayload } from '../runtime/scalars';

/**
 * Location of a value inside the top-level value being encoded.
 *
 * - `string` segments name struct fields, or the `"key"` / `"value"` side of a
 *   map entry
 * - `number` segments index array/slice elements and map entries
 *
 * Example: `["Files", 0, "Body", 2]`
 */
export type PropertyPath = (string | number)[];

export type ScalarValue = {
  readonly kind: 'scalar';
  readonly type: ScalarType;
  readonly value: ScalarPayload;
};

/**
 * Fixed-length sequence. The element count is the array length.
 */
export type ArrayValue = {
  readonly kind: 'array';
  readonly type: ArrayType;
  readonly elements: readonly RuntimeValue[];
};

/**
 * Dynamic sequence.
 *
 * `elements: null` is an absent sequence; `[]` is a present, empty one. The
 * two encode differently (`null` vs an empty composite literal).
 */
export type SliceValue = {
  readonly kind: 'slice';
  readonly type: SliceType;
  readonly elements: readonly RuntimeValue[] | null;
};

export type MapEntry = readonly [key: RuntimeValue, value: RuntimeValue];

/**
 * Key/value mapping. Entries are kept in encounter order; `null` is an absent
 * map.
 */
export type MapValue = {
  readonly kind: 'map';
  readonly type: MapType;
  readonly entries: readonly MapEntry[] | null;
};

export type PointerValue = {
  readonly kind: 'pointer';
  readonly type: PointerType;
  readonly target: RuntimeValue | null;
};

/**
 * Polymorphic slot. `held` carries its own dynamic type descriptor.
 */
export type InterfaceValue = {
  readonly kind: 'interface';
  readonly type: InterfaceType;
  readonly held: RuntimeValue | null;
};

/**
 * One field of a struct value.
 *
 * The value is read through an accessor rather than stored, so fields that are
 * never encoded (not visible) are never read either. An accessor may throw
 * `FieldAccessDeniedError` to report a field that cannot be read.
 */
export type StructField = {
  readonly name: string;
  readonly visible: boolean;
  readonly read: () => RuntimeValue;
};

export type StructValue = {
  readonly kind: 'struct';
  readonly type: StructType;
  readonly fields: readonly StructField[];
};

/**
 * A value of a kind that has no encoding rule (function, channel, raw
 * pointer).
 */
export type OpaqueValue = {
  readonly kind: 'opaque';
  readonly type: OpaqueType;
};

/**
 * Closed union of every value shape the encoder dispatches on.
 */
export type RuntimeValue =
  | ScalarValue
  | ArrayValue
  | SliceValue
  | MapValue
  | PointerValue
  | InterfaceValue
  | StructValue
  | OpaqueValue;

/**
 * Values the encoder tracks on its recursion path for cycle detection.
 */
export type CompositeValue = Exclude<RuntimeValue, ScalarValue | OpaqueValue>;
