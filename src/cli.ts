#!/usr/bin/env node
/**
 * Command line front end.
 *
 * Usage:
 *   freeze generate --parser <module> [options]
 *   freeze --help
 *
 * Exit codes: 0 success, 1 failure, 2 usage error.
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';

import type { FreezeConfigInput } from './config';
import type { LogLevel } from './logger';

import { generate } from './driver';
import { isUnitParser, type UnitParser } from './driver/parser';
import { createConsoleLogger } from './logger';

export type GenerateCommand = {
  command: 'generate';

  /**
   * Module specifier or file path of the parser module.
   */
  parser: string;

  config: FreezeConfigInput;
  logLevel: LogLevel;
};

export type CliCommand = { command: 'help' } | GenerateCommand;

export type ParseArgsResult =
  | { success: true; value: CliCommand }
  | { success: false; error: string };

const HELP = `
freeze: freeze parsed source trees into generated modules

Usage:
  freeze generate --parser <module> [options]

Options:
  --parser <module>          Module whose default export implements UnitParser (required)
  --root-dir <dir>           Root directory of all units (default: .)
  --pkg <name>               Module specifier of the root directory (default: relative imports)
  --import-file <file>       Import-all module, relative to the root (default: frozen_imports.gen.js)
  --output-file <file>       File written into each unit directory (default: frozen.gen.js)
  --runtime-module <module>  Runtime module specifier (default: estree-freeze/runtime)
  --sort-maps                Sort map entries by key
  --verbose                  Log every directory
  --quiet                    Log errors only
  -h, --help                 Show this help

Examples:
  freeze generate --parser ./tools/parse-units.js --pkg my-lang/stdlib
  freeze generate --parser my-lang-parser --root-dir stdlib --sort-maps
`;

function printHelp(): void {
  console.log(HELP);
}

/**
 * Options taking a value, by flag, with the configuration key they set.
 */
const VALUE_OPTIONS = {
  '--root-dir': 'rootDir',
  '--pkg': 'packageName',
  '--import-file': 'importFile',
  '--output-file': 'outputFile',
  '--runtime-module': 'runtimeModule'
} as const satisfies Record<string, keyof FreezeConfigInput>;

function isValueOption(flag: string): flag is keyof typeof VALUE_OPTIONS {
  return Object.hasOwn(VALUE_OPTIONS, flag);
}

/**
 * Parses command line arguments (without the node binary and script).
 *
 * Values may be given as `--flag value` or `--flag=value`.
 */
export function parseArgs(args: readonly string[]): ParseArgsResult {
  const fail = (error: string): ParseArgsResult => ({ success: false, error });

  if (args.length === 0) return fail('No command specified');

  const config: FreezeConfigInput = {};
  let command: string | undefined;
  let parser: string | undefined;
  let verbose = false;
  let quiet = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equals === -1 ? arg : arg.slice(0, equals);

    const takeValue = (): string | undefined => {
      if (equals !== -1) return arg.slice(equals + 1);
      i++;
      return i < args.length ? args[i] : undefined;
    };

    if (flag === '-h' || flag === '--help') {
      return { success: true, value: { command: 'help' } };
    } else if (flag === '--parser') {
      parser = takeValue();
      if (!parser) return fail('--parser requires a module');
    } else if (isValueOption(flag)) {
      const value = takeValue();
      if (value === undefined) return fail(`${flag} requires a value`);
      config[VALUE_OPTIONS[flag]] = value;
    } else if (flag === '--sort-maps') {
      config.sortMapEntries = true;
    } else if (flag === '--verbose') {
      verbose = true;
    } else if (flag === '--quiet') {
      quiet = true;
    } else if (arg.startsWith('-')) {
      return fail(`Unknown option: ${arg}`);
    } else if (command === undefined) {
      command = arg;
    } else {
      return fail(`Unexpected argument: ${arg}`);
    }
    i++;
  }

  if (command !== 'generate') {
    return fail(
      command === undefined
        ? 'No command specified'
        : `Unknown command: ${command}`
    );
  }
  if (parser === undefined) return fail('--parser is required');
  if (verbose && quiet) return fail('--verbose and --quiet are exclusive');

  return {
    success: true,
    value: {
      command: 'generate',
      parser,
      config,
      logLevel: verbose ? 'debug' : quiet ? 'error' : 'info'
    }
  };
}

/**
 * Loads the parser module. Paths (`./x.js`, `/abs/x.js`) are resolved
 * against the working directory; anything else is imported as a package.
 */
async function loadParser(specifier: string): Promise<UnitParser> {
  const isPath = specifier.startsWith('.') || path.isAbsolute(specifier);
  const url = isPath ? pathToFileURL(path.resolve(specifier)).href : specifier;

  const loaded: unknown = await import(url);
  const candidate =
    typeof loaded === 'object' && loaded !== null && 'default' in loaded
      ? loaded.default
      : undefined;

  if (!isUnitParser(candidate)) {
    throw new Error(
      `[freeze] Parser module "${specifier}" must default-export an object with a parseDir method.`
    );
  }
  return candidate;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function run(args: readonly string[]): Promise<number> {
  const parsed = parseArgs(args);

  if (!parsed.success) {
    console.error(`Error: ${parsed.error}`);
    printHelp();
    return 2;
  }

  if (parsed.value.command === 'help') {
    printHelp();
    return 0;
  }

  const { parser, config, logLevel } = parsed.value;
  const logger = createConsoleLogger(logLevel);

  try {
    await generate(config, await loadParser(parser), logger);
    return 0;
  } catch (error) {
    // Failures are reported at every log level.
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

const invokedPath = process.argv[1];
if (
  invokedPath !== undefined &&
  import.meta.url === pathToFileURL(invokedPath).href
) {
  process.exitCode = await run(process.argv.slice(2));
}
