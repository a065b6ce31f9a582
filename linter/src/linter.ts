/**
 * Sprig linter engine.
 *
 * Runs a set of lint rules against the parsed program and collects
 * diagnostics (warnings and errors).
 */

import { Expr, SprigError, parseProgram } from '@sprig/interpreter';
import { unusedBindingRule } from './rules/unused-binding';
import { missingReturnTypeRule } from './rules/missing-return-type';
import { shadowedBuiltinRule } from './rules/shadowed-builtin';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  line: number;
  column: number;
}

/**
 * A lint rule receives the top-level forms and reports diagnostics.
 */
export interface LintRule {
  /** Kebab-case identifier, as accepted by `--rule` and `--disable` */
  name: string;
  description: string;
  severity: Severity;
  run(program: Expr[], source: string): Diagnostic[];
}

export interface LintOptions {
  /** When non-empty, only these rules run. */
  enabledRules?: string[];
  disabledRules?: string[];
}

/** Rule name reported when the source does not parse. */
export const PARSE_ERROR_RULE = 'parse-error';

export class Linter {
  private rules: LintRule[] = [];

  addRule(rule: LintRule): void {
    this.rules.push(rule);
  }

  /**
   * Lint Sprig source code. Returns diagnostics sorted by line.
   */
  lint(source: string, options?: LintOptions): Diagnostic[] {
    let program: Expr[];
    try {
      program = parseProgram(source);
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      return [{
        rule: PARSE_ERROR_RULE,
        severity: 'error',
        message: e.detail,
        line: e.line ?? 1,
        column: e.column ?? 0,
      }];
    }

    const diagnostics = this.selectRules(options).flatMap(rule => {
      try {
        return rule.run(program, source);
      } catch (e) {
        const failure: Diagnostic = {
          rule: rule.name,
          severity: 'error',
          message: `Rule failed internally: ${e instanceof Error ? e.message : String(e)}`,
          line: 0,
          column: 0,
        };
        return [failure];
      }
    });

    return diagnostics.sort((a, b) => a.line - b.line || a.column - b.column);
  }

  private selectRules(options?: LintOptions): LintRule[] {
    const enabled = new Set(options?.enabledRules ?? []);
    const disabled = new Set(options?.disabledRules ?? []);
    return this.rules.filter(rule =>
      !disabled.has(rule.name) && (enabled.size === 0 || enabled.has(rule.name)));
  }

  getRules(): readonly LintRule[] {
    return this.rules;
  }

  getRuleNames(): string[] {
    return this.rules.map(r => r.name);
  }
}

const SEVERITY_TAGS: Record<Severity, string> = { error: 'error', warning: 'warn', info: 'info' };

/** `  file:line:col  warn  message  (rule)` */
export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = `${d.line}:${d.column}`;
  return `  ${filename ? `${filename}:${loc}` : loc}  ${SEVERITY_TAGS[d.severity]}  ${d.message}  (${d.rule})`;
}

/** A linter with every rule in this package registered. */
export function createDefaultLinter(): Linter {
  const linter = new Linter();
  linter.addRule(unusedBindingRule);
  linter.addRule(missingReturnTypeRule);
  linter.addRule(shadowedBuiltinRule);
  return linter;
}
