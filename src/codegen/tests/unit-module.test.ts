import { parseModule } from 'meriyah';
import { describe, expect, it } from 'vitest';

import { int, map, of, string } from '../../runtime';
import { reflectValue } from '../../reflect';
import { CyclicValueError } from '../../errors';
import {
  GENERATED_HEADER,
  buildImportsModule,
  buildUnitModule
} from '../unit-module';
import { renderExpression, renderModule } from '../render';
import { Block, Position } from '../../tests/fixtures/lang-ast';

const position = reflectValue(of(Position, { Line: 1, Column: 2 }), Position);

/**
 * Test suite: generated module text.
 *
 * Coverage:
 * - Unit modules (imports, export, registration).
 * - Import-all modules.
 * - Header handling and syntactic validity.
 */
describe('Unit Modules', () => {
  it('renders the frozen value, its imports and its registration', () => {
    const text = renderModule(
      buildUnitModule({ path: 'sub/dir', value: position }),
      { header: GENERATED_HEADER }
    );

    expect(text).toBe(
      [
        '// DO NOT EDIT: This file is autogenerated via the freeze command.',
        '',
        'import * as runtime from "estree-freeze/runtime";',
        'import * as ast from "lang/ast";',
        'export const pkgAST = runtime.of(ast.Position, {',
        '  Line: 1,',
        '  Column: 2',
        '});',
        'runtime.registerPackage("sub/dir", pkgAST);',
        ''
      ].join('\n')
    );
  });

  it('keeps aliases clear of the exported binding', () => {
    const lines = renderModule(
      buildUnitModule(
        { path: '', value: position },
        { variableName: 'ast', runtimeModule: 'my-runtime' }
      )
    ).split('\n');

    expect(lines.slice(0, 3)).toEqual([
      'import * as my_runtime from "my-runtime";',
      'import * as ast2 from "lang/ast";',
      'export const ast = my_runtime.of(ast2.Position, {'
    ]);
    expect(lines.at(-2)).toBe('my_runtime.registerPackage("", ast);');
  });

  it('sorts map entries on request', () => {
    const value = reflectValue(
      new Map([
        ['b', 2],
        ['a', 1]
      ]),
      map(string, int)
    );

    const lines = renderModule(
      buildUnitModule({ path: 'm', value }, { sortMapEntries: true })
    ).split('\n');

    expect(lines[1]).toBe(
      'export const pkgAST = runtime.of(runtime.map(runtime.string, runtime.int), [["a", 1], ["b", 2]]);'
    );
  });

  it('produces a parseable module', () => {
    const text = renderModule(
      buildUnitModule({ path: 'sub/dir', value: position }),
      { header: GENERATED_HEADER }
    );

    expect(() => parseModule(text)).not.toThrow();
  });

  it('propagates encoding failures', () => {
    const root = of(Block, { Label: 'root' });
    root.Children = [of(Block, { Parent: root })];

    expect(() =>
      buildUnitModule({ path: '', value: reflectValue(root, Block) })
    ).toThrow(CyclicValueError);
  });
});

describe('Import-All Modules', () => {
  it('imports every unit for its side effects', () => {
    const text = renderModule(
      buildImportsModule(['./a/frozen.gen.js', 'my-pkg/b/frozen.gen.js']),
      { header: GENERATED_HEADER }
    );

    expect(text).toBe(
      [
        '// DO NOT EDIT: This file is autogenerated via the freeze command.',
        '',
        'import "./a/frozen.gen.js";',
        'import "my-pkg/b/frozen.gen.js";',
        ''
      ].join('\n')
    );
  });

  it('renders only the header when there is nothing to import', () => {
    expect(
      renderModule(buildImportsModule([]), { header: GENERATED_HEADER })
    ).toBe(`// ${GENERATED_HEADER}\n`);
  });
});

describe('Rendering', () => {
  it('prefixes every header line', () => {
    expect(
      renderModule(buildImportsModule(['x']), { header: 'one\ntwo' })
    ).toBe('// one\n// two\n\nimport "x";\n');
  });

  it('renders expressions without a trailing semicolon', () => {
    expect(renderExpression({ type: 'Literal', value: 'x' })).toBe('"x"');
  });

  it('keeps object literals parenthesized', () => {
    expect(
      renderExpression({ type: 'ObjectExpression', properties: [] })
    ).toBe('({})');
  });
});
