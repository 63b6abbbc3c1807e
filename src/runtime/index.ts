/**
 * Runtime imported by generated modules (`estree-freeze/runtime`).
 *
 * Builtin scalar descriptors are exported under their kind names so that the
 * qualified name `runtime.<kind>` written by the encoder resolves here.
 */
export * from './types';
export { of, ref, zeroValue, type ConstructibleType } from './construct';
export { STRUCT_TYPE, structTypeOf, type StructRecord } from './brand';
export {
  canonicalizeScalar,
  isComplex,
  type CanonicalScalar,
  type Complex,
  type ScalarPayload
} from './scalars';
export {
  lookupPackage,
  registerPackage,
  registeredPackages,
  resetRegistry
} from './registry';
