import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Formats one issue path segment. Segments are either plain keys or
 * `{ key }` objects, depending on the validator library.
 */
function formatIssueSegment(
  segment: PropertyKey | StandardSchemaV1.PathSegment
): string {
  return typeof segment === 'object' ? String(segment.key) : String(segment);
}

/**
 * Validates and transforms input using a Standard Schema V1 compliant
 * validator.
 *
 * About `~standard`:
 * - Purpose:
 *   It acts as a universal adapter, so configuration can be described with
 *   Zod, Valibot, ArkType, and others without library-specific adapters.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // 1. Universal Adapter (Result Pattern):
 *   //    - Returns an object ({ value } or { issues }).
 *   //    - Does NOT throw errors.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *
 *   // 2. Library-Specific Internals (Ignored):
 *   //    - Native methods (like .parse) typically throw exceptions.
 *   parse,
 *   ...otherLibrarySpecificProps
 * };
 * ```
 *
 * @param schema - The schema instance.
 * @param input - The raw input (e.g. CLI flags merged over defaults).
 * @param subject - What is being validated (used for error reporting).
 * @returns The validated (and potentially transformed) value.
 *
 * @throws
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (the first issue is reported).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S> {
  const result = schema['~standard'].validate(input);

  // Configuration is resolved synchronously before any file is read.
  if (result instanceof Promise) {
    throw new Error(
      `[freeze] Async schema validation is not supported for ${subject}.`
    );
  }

  // Handle 'Result Pattern' (see JSDoc).
  if (result.issues) {
    const [firstIssue] = result.issues;
    const issuePath =
      firstIssue?.path?.map(formatIssueSegment).join('.') || '<root>';
    throw new Error(
      `[freeze] Invalid ${subject} at "${issuePath}": ${firstIssue?.message ?? 'unknown issue'}`
    );
  }

  return result.value;
}
