export type {
  ArrayValue,
  CompositeValue,
  InterfaceValue,
  MapEntry,
  MapValue,
  OpaqueValue,
  PointerValue,
  PropertyPath,
  RuntimeValue,
  ScalarValue,
  SliceValue,
  StructField,
  StructValue
} from './value';
export type { EncodeOptions } from './options';
export type {
  ArrayType,
  FieldDescriptor,
  InterfaceType,
  MapType,
  OpaqueKind,
  OpaqueType,
  PointerType,
  ScalarKind,
  ScalarType,
  SliceType,
  StructType,
  TypeDescriptor,
  TypeName
} from '../runtime/types';
export type { Complex, ScalarPayload } from '../runtime/scalars';
