import type { ImportScope } from '../encoder/import-scope';

/**
 * Options for a single encoding call.
 */
export type EncodeOptions = {
  /**
   * Allocates the namespace aliases that qualified names are written through.
   * One scope is shared by every expression that ends up in the same module.
   */
  scope: ImportScope;

  /**
   * Emit map entries sorted by the rendered text of their keys instead of in
   * encounter order.
   *
   * Maps built the same way always iterate in the same order, so this is only
   * needed when the producer of the value builds maps in varying order and
   * byte-identical output is required.
   *
   * @default false
   */
  sortMapEntries?: boolean;
};
