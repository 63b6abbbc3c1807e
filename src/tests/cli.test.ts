import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { type ParseArgsResult, parseArgs, run } from '../cli';
import { isUnitParser } from '../driver';

describe('parseArgs', () => {
  it.for<[readonly string[], string]>([
    [[], 'No command specified'],
    [['--parser', 'p'], 'No command specified'],
    [['build'], 'Unknown command: build'],
    [['generate'], '--parser is required'],
    [['generate', '--parser'], '--parser requires a module'],
    [['generate', '--parser', 'p', '--pkg'], '--pkg requires a value'],
    [['generate', '--parser', 'p', '--bogus'], 'Unknown option: --bogus'],
    [['generate', 'extra', '--parser', 'p'], 'Unexpected argument: extra'],
    [
      ['generate', '--parser', 'p', '--verbose', '--quiet'],
      '--verbose and --quiet are exclusive'
    ]
  ])('%j -> %s', ([args, error]) => {
    expect(parseArgs(args)).toEqual({ success: false, error });
  });

  it.for<[readonly string[]]>([[['-h']], [['--help']], [['generate', '--help']]])(
    '%j asks for help',
    ([args]) => {
      expect(parseArgs(args)).toEqual({
        success: true,
        value: { command: 'help' }
      });
    }
  );

  it('reads values given with or without =', () => {
    const expected: ParseArgsResult = {
      success: true,
      value: {
        command: 'generate',
        parser: './parse.js',
        config: {
          rootDir: 'std',
          packageName: 'my-lang/std',
          sortMapEntries: true
        },
        logLevel: 'debug'
      }
    };

    expect(
      parseArgs([
        'generate',
        '--parser=./parse.js',
        '--root-dir',
        'std',
        '--pkg=my-lang/std',
        '--sort-maps',
        '--verbose'
      ])
    ).toEqual(expected);
  });

  it('maps file options onto the configuration', () => {
    const expected: ParseArgsResult = {
      success: true,
      value: {
        command: 'generate',
        parser: 'parser-pkg',
        config: {
          outputFile: 'unit.gen.js',
          importFile: 'all.gen.js',
          runtimeModule: 'my-runtime'
        },
        logLevel: 'error'
      }
    };

    expect(
      parseArgs([
        'generate',
        '--parser',
        'parser-pkg',
        '--quiet',
        '--output-file',
        'unit.gen.js',
        '--import-file=all.gen.js',
        '--runtime-module',
        'my-runtime'
      ])
    ).toEqual(expected);
  });
});

describe('run', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits with 2 on usage errors', async () => {
    expect(await run([])).toBe(2);
    expect(console.error).toHaveBeenCalledWith('Error: No command specified');
  });

  it('prints help and exits with 0', async () => {
    expect(await run(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('exits with 1 when the parser module has no parser', async () => {
    expect(await run(['generate', '--parser', 'node:path'])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      '[freeze] Parser module "node:path" must default-export an object with a parseDir method.'
    );
  });
});

describe('isUnitParser', () => {
  it.for([
    [{ parseDir: () => [] }, true],
    [{ parseDir: 'x' }, false],
    [null, false],
    [() => [], false]
  ] as const)('%o -> %s', ([candidate, expected]) => {
    expect(isUnitParser(candidate)).toBe(expected);
  });
});
