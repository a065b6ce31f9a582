/**
 * Lint rule: shadowed-builtin
 *
 * Warns when a let binding, function name or parameter reuses the name of
 * a built-in function.
 */

import { BUILTIN_NAMES, Expr, SourceLocation, walk } from '@sprig/interpreter';
import type { LintRule, Diagnostic } from '../linter';

function shadowing(name: string, loc: SourceLocation): Diagnostic {
  return {
    rule: 'shadowed-builtin',
    severity: 'warning',
    message: `'${name}' shadows a built-in function`,
    line: loc.line,
    column: loc.column,
  };
}

export const shadowedBuiltinRule: LintRule = {
  name: 'shadowed-builtin',
  description: 'Warn on bindings that shadow a built-in function',
  severity: 'warning',

  run(program: Expr[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const form of program) {
      walk(form, node => {
        if ((node.kind === 'let' || node.kind === 'defn') && BUILTIN_NAMES.has(node.name)) {
          diagnostics.push(shadowing(node.name, node.loc));
        }
        if (node.kind === 'defn' || node.kind === 'lambda') {
          for (const param of node.params) {
            if (BUILTIN_NAMES.has(param.name)) diagnostics.push(shadowing(param.name, param.loc));
          }
        }
      });
    }

    return diagnostics;
  },
};
