import type { Expression, MemberExpression } from 'estree';

/**
 * One namespace import a module needs: `import * as <alias> from "<source>"`.
 */
export type ImportBinding = {
  readonly alias: string;
  readonly source: string;
};

/**
 * Allocates namespace aliases for the modules that qualified names live in.
 *
 * The scope is the only stateful piece of an encoding: every `qualify` call
 * may add a binding. It is created per generated module and handed to the
 * encoder explicitly.
 */
export type ImportScope = {
  /**
   * Returns the expression `alias.name` for the export `name` of module
   * `pkgPath`, allocating the alias on first use. `pkgPath` `""` denotes the
   * runtime module.
   */
  qualify(pkgPath: string, name: string): Expression;

  /**
   * Bindings in first-use order.
   */
  imports(): readonly ImportBinding[];
};

export type ImportScopeOptions = {
  /**
   * Module specifier that `pkgPath` `""` resolves to.
   * @default 'estree-freeze/runtime'
   */
  runtimeModule?: string;

  /**
   * Identifiers the module declares itself (e.g. the frozen variable name);
   * aliases never take these names.
   */
  reserved?: Iterable<string>;
};

export const DEFAULT_RUNTIME_MODULE = 'estree-freeze/runtime';

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Words that cannot be used as a binding name in module code.
 */
const RESERVED_WORDS = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger',
  'default', 'delete', 'do', 'else', 'enum', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'implements', 'import', 'in',
  'instanceof', 'interface', 'let', 'new', 'null', 'package', 'private',
  'protected', 'public', 'return', 'static', 'super', 'switch', 'this',
  'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
  'arguments', 'eval', 'undefined', 'NaN', 'Infinity'
]);

export function isIdentifierName(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Derives the preferred alias of a module specifier.
 *
 * Steps:
 * 1. Take the last path segment (`"@scope/my-pkg/ast.js"` -> `"ast.js"`).
 * 2. Drop a script extension (`"ast.js"` -> `"ast"`).
 * 3. Replace characters that cannot appear in an identifier with `_`.
 * 4. Prefix `_` when the result starts with a digit or is empty.
 * 5. Suffix `_` when the result is a reserved word.
 */
export function preferredAlias(source: string): string {
  const segments = source.split('/').filter(segment => segment.length > 0);
  const last = segments.at(-1) ?? '';
  const withoutExtension = last.replace(/\.(?:[cm]?[jt]s|jsx|tsx)$/, '');

  let alias = withoutExtension.replace(/[^A-Za-z0-9_$]/g, '_');
  if (alias === '' || /^[0-9]/.test(alias)) alias = `_${alias}`;
  if (RESERVED_WORDS.has(alias)) alias = `${alias}_`;

  return alias;
}

/**
 * Creates an empty import scope.
 *
 * Alias allocation:
 * - one alias per module specifier, reused for every name from that module
 * - collisions (with another module or a reserved name) get a numeric suffix
 *   starting at 2: `ast`, `ast2`, `ast3`
 */
export function createImportScope(
  options: ImportScopeOptions = {}
): ImportScope {
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const taken = new Set(options.reserved);
  const aliasBySource = new Map<string, string>();
  const bindings: ImportBinding[] = [];

  function aliasFor(source: string): string {
    const existing = aliasBySource.get(source);
    if (existing !== undefined) return existing;

    const base = preferredAlias(source);
    let alias = base;
    for (let suffix = 2; taken.has(alias); suffix++) {
      alias = `${base}${suffix}`;
    }

    taken.add(alias);
    aliasBySource.set(source, alias);
    bindings.push({ alias, source });
    return alias;
  }

  return {
    qualify(pkgPath, name) {
      const source = pkgPath === '' ? runtimeModule : pkgPath;
      const alias = aliasFor(source);

      /**
       * `alias.name` for identifier names, `alias["name"]` otherwise.
       */
      const computed = !isIdentifierName(name);
      return {
        type: 'MemberExpression',
        object: { type: 'Identifier', name: alias },
        property: computed
          ? { type: 'Literal', value: name }
          : { type: 'Identifier', name },
        computed,
        optional: false
      } satisfies MemberExpression;
    },

    imports() {
      return [...bindings];
    }
  };
}
