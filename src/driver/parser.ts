import type { TypeDescriptor } from '../runtime/types';

/**
 * Where a directory sits in the walked tree.
 */
export type UnitContext = {
  rootDir: string;

  /**
   * Directory relative to `rootDir`, `/`-separated; `""` for the root.
   * This is also the key the unit is registered under.
   */
  relativePath: string;
};

/**
 * One unit found in a directory: the host value to freeze and the
 * descriptor it is interpreted as.
 */
export type ParsedUnit = {
  /**
   * Unit name, used in error messages.
   */
  name: string;

  value: unknown;

  type: TypeDescriptor;

  /**
   * Problems the parser found. A unit with errors is never frozen.
   */
  errors?: readonly string[];
};

/**
 * Pluggable source parser.
 *
 * The freezer knows nothing about the source language: for each directory of
 * the walk it asks the parser for the units that directory holds. A directory
 * without sources yields `[]`.
 */
export interface UnitParser {
  parseDir(
    dir: string,
    context: UnitContext
  ): readonly ParsedUnit[] | Promise<readonly ParsedUnit[]>;
}

export function isUnitParser(value: unknown): value is UnitParser {
  return (
    typeof value === 'object' &&
    value !== null &&
    'parseDir' in value &&
    typeof value.parseDir === 'function'
  );
}
