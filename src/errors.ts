import type { PropertyPath } from './types';
import { formatPathForDisplay } from './report';

/**
 * Failure classes raised while freezing a value.
 *
 * - `UnsupportedKind`: the value's kind has no encoding rule.
 * - `FieldAccessDenied`: a struct field could not be read. The encoder skips
 *   such fields; the error never leaves an encode call.
 * - `CyclicValue`: a composite value was reached again on its own path.
 * - `InvalidScalar`: a scalar payload does not fit its kind.
 * - `TypeMismatch`: a host value does not fit its descriptor.
 * - `ResolutionFailure`: the unit parser reported errors.
 */
export type FreezeErrorCode =
  | 'UnsupportedKind'
  | 'FieldAccessDenied'
  | 'CyclicValue'
  | 'InvalidScalar'
  | 'TypeMismatch'
  | 'ResolutionFailure';

export class FreezeError extends Error {
  readonly code: FreezeErrorCode;

  /**
   * Where in the top-level value the failure happened (empty for the root or
   * for failures not tied to a value).
   */
  readonly path: PropertyPath;

  constructor(
    code: FreezeErrorCode,
    detail: string,
    path: PropertyPath = [],
    options?: ErrorOptions
  ) {
    const location =
      path.length > 0 ? ` (at ${formatPathForDisplay(path)})` : '';
    super(`[freeze] ${detail}${location}`, options);
    this.name = 'FreezeError';
    this.code = code;
    this.path = path;
  }
}

export class UnsupportedKindError extends FreezeError {
  readonly kind: string;

  constructor(kind: string, path: PropertyPath) {
    super('UnsupportedKind', `Unsupported value kind "${kind}"`, path);
    this.name = 'UnsupportedKindError';
    this.kind = kind;
  }
}

export class FieldAccessDeniedError extends FreezeError {
  constructor(
    structName: string,
    fieldName: string,
    path: PropertyPath,
    cause: unknown
  ) {
    super(
      'FieldAccessDenied',
      `Field ${structName}.${fieldName} cannot be read`,
      path,
      { cause }
    );
    this.name = 'FieldAccessDeniedError';
  }
}

export class CyclicValueError extends FreezeError {
  constructor(path: PropertyPath) {
    super('CyclicValue', 'Value refers back to one of its ancestors', path);
    this.name = 'CyclicValueError';
  }
}

export class InvalidScalarError extends FreezeError {
  constructor(reason: string, path: PropertyPath) {
    super('InvalidScalar', `Invalid scalar: ${reason}`, path);
    this.name = 'InvalidScalarError';
  }
}

export class TypeMismatchError extends FreezeError {
  constructor(detail: string, path: PropertyPath) {
    super('TypeMismatch', detail, path);
    this.name = 'TypeMismatchError';
  }
}

export class ResolutionFailureError extends FreezeError {
  constructor(detail: string, cause?: unknown) {
    super('ResolutionFailure', detail, [], { cause });
    this.name = 'ResolutionFailureError';
  }
}

export function isFreezeError(value: unknown): value is FreezeError {
  return value instanceof FreezeError;
}
