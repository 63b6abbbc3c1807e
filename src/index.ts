export type {
  ArrayValue,
  CompositeValue,
  EncodeOptions,
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
  StructValue,
  ArrayType,
  Complex,
  FieldDescriptor,
  InterfaceType,
  MapType,
  OpaqueKind,
  OpaqueType,
  PointerType,
  ScalarKind,
  ScalarPayload,
  ScalarType,
  SliceType,
  StructType,
  TypeDescriptor,
  TypeName
} from './types';

export { type EncodeResult, encodeValue, tryEncodeValue } from './encoder';
export {
  type ImportBinding,
  type ImportScope,
  type ImportScopeOptions,
  DEFAULT_RUNTIME_MODULE,
  createImportScope,
  preferredAlias
} from './encoder/import-scope';
export { formatScalar } from './encoder/literal';
export { resolveTypeExpression } from './encoder/type-expression';

export { reflectValue } from './reflect';
export {
  arrayValue,
  interfaceValue,
  mapValue,
  opaqueValue,
  pointerValue,
  scalarValue,
  sliceValue,
  structValue
} from './values';

export {
  type FrozenUnit,
  type UnitModuleOptions,
  DEFAULT_VARIABLE_NAME,
  GENERATED_HEADER,
  buildImportsModule,
  buildUnitModule
} from './codegen/unit-module';
export {
  type RenderModuleOptions,
  renderExpression,
  renderModule
} from './codegen/render';

export {
  type ParsedUnit,
  type UnitContext,
  type UnitParser,
  generate,
  isUnitParser,
  unitSpecifier,
  walkDirectories
} from './driver';

export {
  type FreezeConfigInput,
  FreezeConfig,
  resolveConfig
} from './config';
export {
  type LogLevel,
  type LogSink,
  type Logger,
  createConsoleLogger,
  silentLogger
} from './logger';

export {
  type FreezeErrorCode,
  CyclicValueError,
  FieldAccessDeniedError,
  FreezeError,
  InvalidScalarError,
  ResolutionFailureError,
  TypeMismatchError,
  UnsupportedKindError,
  isFreezeError
} from './errors';
