import type { Expression } from 'estree';

import type { TypeDescriptor } from '../runtime/types';
import type { RuntimeValue } from '../types';
import * as runtime from '../runtime';
import * as langAst from './fixtures/lang-ast';
import {
  DEFAULT_RUNTIME_MODULE,
  type ImportScope,
  createImportScope
} from '../encoder/import-scope';
import { encodeValue } from '../encoder';
import { renderExpression } from '../codegen/render';
import { reflectValue } from '../reflect';
import { isRecord } from '../guards';

/**
 * Modules generated code may import while under test, by specifier.
 */
const MODULES = new Map<string, unknown>([
  [DEFAULT_RUNTIME_MODULE, runtime],
  [langAst.PKG, langAst]
]);

/**
 * Evaluates an encoded expression in-process.
 *
 * The expression is rendered to source text and run as the body of a function
 * whose parameters are the scope's namespace aliases, bound to the runtime
 * module and the fixture schema module.
 *
 * @throws If the scope imports a module that is not available to tests.
 */
export function evaluateExpression(
  expression: Expression,
  scope: ImportScope
): unknown {
  const bindings = scope.imports();
  const modules = bindings.map(binding => {
    if (!MODULES.has(binding.source)) {
      throw new Error(`No test module for "${binding.source}".`);
    }
    return MODULES.get(binding.source);
  });

  const evaluate = new Function(
    ...bindings.map(binding => binding.alias),
    `return ${renderExpression(expression)};`
  );
  const result: unknown = evaluate(...modules);
  return result;
}

export type FrozenResult = {
  expression: Expression;
  scope: ImportScope;
  source: string;
  rebuilt: unknown;
};

/**
 * Encodes a runtime value and evaluates the result.
 */
export function freezeAndThawValue(
  value: RuntimeValue,
  options: { sortMapEntries?: boolean } = {}
): FrozenResult {
  const scope = createImportScope();
  const expression = encodeValue(value, { scope, ...options });

  return {
    expression,
    scope,
    source: renderExpression(expression),
    rebuilt: evaluateExpression(expression, scope)
  };
}

/**
 * Reflects host data, encodes it and evaluates the result.
 */
export function freezeAndThaw(
  host: unknown,
  type: TypeDescriptor,
  options: { sortMapEntries?: boolean } = {}
): FrozenResult {
  return freezeAndThawValue(reflectValue(host, type), options);
}

/**
 * Reads a nested property of a rebuilt value; `undefined` when the path
 * leaves the object graph.
 */
export function valueAt(
  value: unknown,
  ...path: readonly (string | number)[]
): unknown {
  let current = value;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}
