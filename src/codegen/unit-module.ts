import type {
  ExpressionStatement,
  ModuleDeclaration,
  Program,
  Statement,
  VariableDeclaration
} from 'estree';

import type { ImportBinding } from '../encoder/import-scope';
import type { RuntimeValue } from '../types';

import { createImportScope } from '../encoder/import-scope';
import { encodeValue } from '../encoder';

/**
 * First line of every generated file.
 */
export const GENERATED_HEADER =
  'DO NOT EDIT: This file is autogenerated via the freeze command.';

export const DEFAULT_VARIABLE_NAME = 'pkgAST';

/**
 * A value to freeze, keyed by the path it is registered under.
 */
export type FrozenUnit = {
  /**
   * Registry key, usually the unit's directory relative to the root
   * (`""` for the root itself).
   */
  path: string;
  value: RuntimeValue;
};

export type UnitModuleOptions = {
  /**
   * Module specifier of the runtime module.
   * @default 'estree-freeze/runtime'
   */
  runtimeModule?: string;

  /**
   * Name of the exported binding that holds the frozen value.
   * @default 'pkgAST'
   */
  variableName?: string;

  /**
   * Sort map entries by their rendered key.
   * @default false
   */
  sortMapEntries?: boolean;
};

type ModuleItem = Statement | ModuleDeclaration;

/**
 * `import * as <alias> from "<source>"` or, without an alias,
 * `import "<source>"`.
 *
 * The declaration is assembled before it is placed in the program so that it
 * type-checks whether or not the installed ESTree typings declare import
 * attributes.
 */
function importDeclaration(source: string, alias?: string): ModuleItem {
  const declaration = {
    type: 'ImportDeclaration' as const,
    specifiers:
      alias === undefined
        ? []
        : [
            {
              type: 'ImportNamespaceSpecifier' as const,
              local: { type: 'Identifier' as const, name: alias }
            }
          ],
    source: { type: 'Literal' as const, value: source },
    attributes: []
  };

  return declaration;
}

function namespaceImports(bindings: readonly ImportBinding[]): ModuleItem[] {
  return bindings.map(binding =>
    importDeclaration(binding.source, binding.alias)
  );
}

/**
 * Builds the module that freezes one unit:
 *
 * ```js
 * import * as runtime from "estree-freeze/runtime";
 * import * as ast from "lang/ast";
 * export const pkgAST = runtime.of(ast.Package, { ... });
 * runtime.registerPackage("sub/dir", pkgAST);
 * ```
 *
 * Imports are listed in first-use order; the runtime module always comes
 * first.
 *
 * @throws FreezeError
 *   When the unit value cannot be encoded.
 */
export function buildUnitModule(
  unit: FrozenUnit,
  options: UnitModuleOptions = {}
): Program {
  const variableName = options.variableName ?? DEFAULT_VARIABLE_NAME;
  const scope = createImportScope({
    runtimeModule: options.runtimeModule,
    reserved: [variableName]
  });

  const registerCallee = scope.qualify('', 'registerPackage');
  const init = encodeValue(unit.value, {
    scope,
    sortMapEntries: options.sortMapEntries ?? false
  });

  const variable: VariableDeclaration = {
    type: 'VariableDeclaration',
    kind: 'const',
    declarations: [
      {
        type: 'VariableDeclarator',
        id: { type: 'Identifier', name: variableName },
        init
      }
    ]
  };

  const exported = {
    type: 'ExportNamedDeclaration' as const,
    declaration: variable,
    specifiers: [],
    source: null,
    attributes: []
  };

  const registration: ExpressionStatement = {
    type: 'ExpressionStatement',
    expression: {
      type: 'CallExpression',
      callee: registerCallee,
      arguments: [
        { type: 'Literal', value: unit.path },
        { type: 'Identifier', name: variableName }
      ],
      optional: false
    }
  };

  return {
    type: 'Program',
    sourceType: 'module',
    body: [...namespaceImports(scope.imports()), exported, registration]
  };
}

/**
 * Builds the module that loads every generated unit for its registration
 * side effect:
 *
 * ```js
 * import "my-pkg/sub/frozen.gen.js";
 * import "my-pkg/sub/dir/frozen.gen.js";
 * ```
 */
export function buildImportsModule(specifiers: readonly string[]): Program {
  return {
    type: 'Program',
    sourceType: 'module',
    body: specifiers.map(specifier => importDeclaration(specifier))
  };
}
