import type { Expression, Program } from 'estree';
import { toJs } from 'estree-util-to-js';

export type RenderModuleOptions = {
  /**
   * Comment line(s) written above the module body, without comment markers.
   */
  header?: string;
};

/**
 * Prints a module program as JavaScript source text.
 *
 * The header (when given) is emitted as `//` line comments, separated from the
 * body by a blank line. The output always ends with a single newline.
 */
export function renderModule(
  program: Program,
  options: RenderModuleOptions = {}
): string {
  const body = toJs(program).value.trimEnd();

  const header = options.header
    ? options.header
        .split('\n')
        .map(line => `// ${line}`)
        .join('\n')
    : undefined;

  return `${[header, body].filter(Boolean).join('\n\n')}\n`;
}

/**
 * Prints a single expression as source text.
 *
 * The expression is printed in statement position, so an object literal keeps
 * its wrapping parentheses: `({ a: 1 })`. The text is valid after `return `.
 */
export function renderExpression(expression: Expression): string {
  const program: Program = {
    type: 'Program',
    sourceType: 'module',
    body: [{ type: 'ExpressionStatement', expression }]
  };

  return toJs(program).value.trimEnd().replace(/;$/, '');
}
