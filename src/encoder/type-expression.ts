import type { CallExpression, Expression } from 'estree';

import type { TypeDescriptor } from '../runtime/types';
import type { ImportScope } from './import-scope';

function callRuntime(
  scope: ImportScope,
  name: string,
  args: Expression[]
): CallExpression {
  return {
    type: 'CallExpression',
    callee: scope.qualify('', name),
    arguments: args,
    optional: false
  } satisfies CallExpression;
}

/**
 * Builds the type expression that names `type` in generated code.
 *
 * | descriptor                        | expression                        |
 * |-----------------------------------|-----------------------------------|
 * | map                               | `runtime.map(Key, Value)`         |
 * | pointer                           | `runtime.pointer(Elem)`           |
 * | array, slice                      | `runtime.slice(Elem)`             |
 * | scalar, interface, struct, opaque | `alias.Name` (qualified name)     |
 *
 * Arrays and slices share one spelling: the number of elements in the
 * literal carries an array's length.
 *
 * Only composite descriptors recurse; named descriptors stop at their
 * qualified name. The function is total over every descriptor and equal
 * descriptors always produce equal expressions.
 *
 * @param type
 *   Descriptor to spell.
 * @param scope
 *   Import scope that allocates the namespace aliases.
 * @returns
 *   ESTree expression evaluating to the descriptor at import time.
 */
export function resolveTypeExpression(
  type: TypeDescriptor,
  scope: ImportScope
): Expression {
  switch (type.kind) {
    case 'map':
      return callRuntime(scope, 'map', [
        resolveTypeExpression(type.key, scope),
        resolveTypeExpression(type.elem, scope)
      ]);

    case 'pointer':
      return callRuntime(scope, 'pointer', [
        resolveTypeExpression(type.elem, scope)
      ]);

    case 'array':
    case 'slice':
      return callRuntime(scope, 'slice', [
        resolveTypeExpression(type.elem, scope)
      ]);

    default:
      return scope.qualify(type.pkgPath, type.name);
  }
}
