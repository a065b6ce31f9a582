/**
 * Lint rule: missing-return-type
 *
 * Warns on anonymous functions that lack an explicit `-> Type` annotation.
 * `defn` always declares one, so only `fn`/`lambda` are checked.
 */

import { Expr, walk } from '@sprig/interpreter';
import type { LintRule, Diagnostic } from '../linter';

export const missingReturnTypeRule: LintRule = {
  name: 'missing-return-type',
  description: 'Warn on anonymous functions without explicit return type annotation',
  severity: 'warning',

  run(program: Expr[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const form of program) {
      walk(form, node => {
        if (node.kind !== 'lambda' || node.returnType !== null) return;
        diagnostics.push({
          rule: 'missing-return-type',
          severity: 'warning',
          message: 'Anonymous function is missing a return type annotation',
          line: node.loc.line,
          column: node.loc.column,
        });
      });
    }

    return diagnostics;
  },
};
