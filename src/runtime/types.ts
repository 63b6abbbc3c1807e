/**
 * Type descriptors.
 *
 * A descriptor describes the shape of a type independently of any value. The
 * encoder reads descriptors to decide how a value is spelled; generated modules
 * reference the very same descriptors (through qualified names) to rebuild the
 * value at import time.
 *
 * Naming contract
 * ---------------
 * Named descriptors (named scalars, interfaces, structs, opaque types) carry a
 * `pkgPath` and a `name`:
 * - `pkgPath` is the module specifier that exports the descriptor
 *   (e.g. `"lang/ast"`). The empty string denotes this runtime module.
 * - `name` is the export name of the descriptor inside that module.
 *
 * A generated module can therefore always reach a descriptor as
 * `import * as alias from pkgPath` + `alias[name]`.
 */

/**
 * Scalar kinds, one per host width.
 *
 * `int`, `uint` and `uintptr` are the platform-width variants; on this
 * platform they are safe integers (53 bits).
 */
export type ScalarKind =
  | 'bool'
  | 'int'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'uintptr'
  | 'float32'
  | 'float64'
  | 'complex64'
  | 'complex128'
  | 'string';

/**
 * Kinds that can be described but never encoded.
 */
export type OpaqueKind = 'func' | 'chan' | 'unsafe-pointer';

/**
 * Qualifying namespace path and local name of a named type.
 */
export type TypeName = {
  readonly pkgPath: string;
  readonly name: string;
};

export type ScalarType<K extends ScalarKind = ScalarKind> = TypeName & {
  readonly kind: K;
};

export type ArrayType = {
  readonly kind: 'array';
  readonly elem: TypeDescriptor;
  readonly length: number;
};

export type SliceType = {
  readonly kind: 'slice';
  readonly elem: TypeDescriptor;
};

export type MapType = {
  readonly kind: 'map';
  readonly key: TypeDescriptor;
  readonly elem: TypeDescriptor;
};

export type PointerType = {
  readonly kind: 'pointer';
  readonly elem: TypeDescriptor;
};

/**
 * A polymorphic slot. The concrete type is only known from the held value.
 */
export type InterfaceType = TypeName & {
  readonly kind: 'interface';
};

/**
 * One declared field of a struct.
 *
 * `visible: false` marks a field that never participates in encoding; the
 * rebuilt record receives the zero value of its type instead.
 */
export type FieldDescriptor = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly visible: boolean;
};

export type StructType = TypeName & {
  readonly kind: 'struct';

  /**
   * Fields in declaration order.
   */
  readonly fields: readonly FieldDescriptor[];
};

export type OpaqueType = TypeName & {
  readonly kind: OpaqueKind;
};

/**
 * Closed union of every descriptor shape.
 */
export type TypeDescriptor =
  | ScalarType
  | ArrayType
  | SliceType
  | MapType
  | PointerType
  | InterfaceType
  | StructType
  | OpaqueType;

export const SCALAR_KINDS: readonly ScalarKind[] = [
  'bool',
  'int',
  'int8',
  'int16',
  'int32',
  'int64',
  'uint',
  'uint8',
  'uint16',
  'uint32',
  'uint64',
  'uintptr',
  'float32',
  'float64',
  'complex64',
  'complex128',
  'string'
];

export function isScalarKind(kind: string): kind is ScalarKind {
  return SCALAR_KINDS.some(scalarKind => scalarKind === kind);
}

export function isScalarType(type: TypeDescriptor): type is ScalarType {
  return isScalarKind(type.kind);
}

/**
 * Creates a scalar descriptor.
 *
 * Without `pkgPath`/`name` the result is the builtin scalar of that kind
 * (qualified into this runtime module). With them it is a named scalar type
 * whose values are still encoded through their base kind.
 */
export function scalar<K extends ScalarKind>(
  kind: K,
  pkgPath = '',
  name: string = kind
): ScalarType<K> {
  return { kind, pkgPath, name };
}

export function array(elem: TypeDescriptor, length: number): ArrayType {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(
      `[freeze] Array length must be a non-negative integer, got ${length}.`
    );
  }
  return { kind: 'array', elem, length };
}

export function slice(elem: TypeDescriptor): SliceType {
  return { kind: 'slice', elem };
}

export function map(key: TypeDescriptor, elem: TypeDescriptor): MapType {
  return { kind: 'map', key, elem };
}

export function pointer(elem: TypeDescriptor): PointerType {
  return { kind: 'pointer', elem };
}

export function iface(pkgPath: string, name: string): InterfaceType {
  return { kind: 'interface', pkgPath, name };
}

export function func(pkgPath = '', name = 'func'): OpaqueType {
  return { kind: 'func', pkgPath, name };
}

export function chan(pkgPath = '', name = 'chan'): OpaqueType {
  return { kind: 'chan', pkgPath, name };
}

export function unsafePointer(
  pkgPath = '',
  name = 'unsafePointer'
): OpaqueType {
  return { kind: 'unsafe-pointer', pkgPath, name };
}

/**
 * Declares a struct field. Fields are visible unless stated otherwise.
 */
export function field(
  name: string,
  type: TypeDescriptor,
  options: { visible?: boolean } = {}
): FieldDescriptor {
  return { name, type, visible: options.visible ?? true };
}

/**
 * Creates a struct descriptor.
 *
 * `fields` may be a thunk so that self-referential records (a node holding a
 * pointer to its own type) can be declared before the binding exists:
 *
 * ```ts
 * export const Block: StructType = struct('lang/ast', 'Block', () => [
 *   field('Parent', pointer(Block))
 * ]);
 * ```
 *
 * The thunk runs once, on first access.
 */
export function struct(
  pkgPath: string,
  name: string,
  fields: readonly FieldDescriptor[] | (() => readonly FieldDescriptor[])
): StructType {
  let resolved: readonly FieldDescriptor[] | undefined =
    typeof fields === 'function' ? undefined : fields;

  return {
    kind: 'struct',
    pkgPath,
    name,
    get fields() {
      if (resolved === undefined) {
        resolved = typeof fields === 'function' ? fields() : fields;
      }
      return resolved;
    }
  };
}

/**
 * Builtin scalars. Their export names equal their kinds so that
 * `scalar(kind)` qualifies to `runtime.<kind>`.
 */
export const bool = scalar('bool');
export const int = scalar('int');
export const int8 = scalar('int8');
export const int16 = scalar('int16');
export const int32 = scalar('int32');
export const int64 = scalar('int64');
export const uint = scalar('uint');
export const uint8 = scalar('uint8');
export const uint16 = scalar('uint16');
export const uint32 = scalar('uint32');
export const uint64 = scalar('uint64');
export const uintptr = scalar('uintptr');
export const float32 = scalar('float32');
export const float64 = scalar('float64');
export const complex64 = scalar('complex64');
export const complex128 = scalar('complex128');
export const string = scalar('string');
