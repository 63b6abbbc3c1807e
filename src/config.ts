import { z } from 'zod';

import { DEFAULT_RUNTIME_MODULE } from './encoder/import-scope';
import { DEFAULT_VARIABLE_NAME } from './codegen/unit-module';
import { validateWithSchema } from './validator';

const fileName = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/, 'Expected a file name without directories');

/**
 * Options of a generation run.
 *
 * Every option has a default, so `{}` is a complete configuration.
 */
export const FreezeConfig = z.object({
  /**
   * Directory whose tree is walked.
   */
  rootDir: z.string().min(1).default('.'),

  /**
   * Module specifier of `rootDir`, used to address the generated modules from
   * the import-all module. Relative specifiers (`./sub/...`) when empty.
   */
  packageName: z.string().default(''),

  /**
   * File written into every directory that holds a unit.
   */
  outputFile: fileName.default('frozen.gen.js'),

  /**
   * Import-all module, relative to `rootDir`.
   */
  importFile: z.string().min(1).default('frozen_imports.gen.js'),

  runtimeModule: z.string().min(1).default(DEFAULT_RUNTIME_MODULE),

  variableName: z
    .string()
    .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'Expected an identifier')
    .default(DEFAULT_VARIABLE_NAME),

  sortMapEntries: z.boolean().default(false),

  /**
   * Directory names never descended into.
   */
  exclude: z.array(z.string().min(1)).default(['node_modules', '.git'])
});

export type FreezeConfig = z.infer<typeof FreezeConfig>;

/**
 * Configuration as accepted from callers: every key optional.
 */
export type FreezeConfigInput = z.input<typeof FreezeConfig>;

/**
 * Applies defaults and validates a configuration.
 *
 * @throws Error naming the first invalid option.
 */
export function resolveConfig(input: unknown = {}): FreezeConfig {
  return validateWithSchema(FreezeConfig, input, 'configuration');
}
