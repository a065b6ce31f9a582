/**
 * Lint rule: unused-binding
 *
 * Detects `let ... in` bindings and function parameters that are never
 * referenced in their scope. Names starting with `_` are ignored.
 */

import { Expr, childExpressions, walk } from '@sprig/interpreter';
import type { LintRule, Diagnostic } from '../linter';

/**
 * Whether `name` is read anywhere in `expr`, stopping at forms that
 * rebind it.
 */
export function references(expr: Expr, name: string): boolean {
  switch (expr.kind) {
    case 'symbol':
      return expr.name === name;
    case 'let':
      return references(expr.value, name)
        || (expr.body !== null && expr.name !== name && references(expr.body, name));
    case 'defn':
      if (expr.name === name || expr.params.some(p => p.name === name)) return false;
      return references(expr.body, name);
    case 'lambda':
      if (expr.params.some(p => p.name === name)) return false;
      return references(expr.body, name);
    default:
      return childExpressions(expr).some(child => references(child, name));
  }
}

function isIgnored(name: string): boolean {
  return name.startsWith('_');
}

export const unusedBindingRule: LintRule = {
  name: 'unused-binding',
  description: 'Detect let-in bindings and parameters that are never used',
  severity: 'warning',

  run(program: Expr[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const form of program) {
      walk(form, node => {
        if (node.kind === 'let' && node.body !== null) {
          if (!isIgnored(node.name) && !references(node.body, node.name)) {
            diagnostics.push({
              rule: 'unused-binding',
              severity: 'warning',
              message: `Binding '${node.name}' is never used`,
              line: node.loc.line,
              column: node.loc.column,
            });
          }
        }
        if (node.kind === 'defn' || node.kind === 'lambda') {
          for (const param of node.params) {
            if (isIgnored(param.name) || references(node.body, param.name)) continue;
            diagnostics.push({
              rule: 'unused-binding',
              severity: 'warning',
              message: `Parameter '${param.name}' is never used`,
              line: param.loc.line,
              column: param.loc.column,
            });
          }
        }
      });
    }

    return diagnostics;
  },
};
