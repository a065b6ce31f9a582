/**
 * Tests for the Sprig linter and its built-in rules.
 */

import { parse } from '@sprig/interpreter';
import { Linter, createDefaultLinter, formatDiagnostic, Diagnostic } from '../src/linter';
import { references } from '../src/rules/unused-binding';

function lint(source: string): Diagnostic[] {
  return createDefaultLinter().lint(source);
}

function summary(ds: Diagnostic[]): string[] {
  return ds.map(d => `${d.line}:${d.column} ${d.rule} ${d.message}`);
}

describe('unused-binding', () => {
  test('flags an unused let-in binding', () => {
    expect(summary(lint('(let x 1 2)'))).toEqual(["1:0 unused-binding Binding 'x' is never used"]);
  });

  test('flags unused parameters at their position', () => {
    expect(summary(lint('(defn f [a: i32 b: i32] -> i32 a)'))).toEqual([
      "1:16 unused-binding Parameter 'b' is never used",
    ]);
  });

  test('an inner rebinding hides the outer name', () => {
    expect(summary(lint('(let x 1 (let x 2 x))'))).toEqual(["1:0 unused-binding Binding 'x' is never used"]);
  });

  test('underscore names are ignored', () => {
    expect(lint('(let _tmp 1 2)')).toEqual([]);
  });

  test('sequential lets are not checked', () => {
    expect(lint('(let x 1)')).toEqual([]);
  });

  test('references follows shadowing', () => {
    expect(references(parse('(+ y 1)'), 'y')).toBe(true);
    expect(references(parse('(fn [y: i32] -> i32 y)'), 'y')).toBe(false);
    expect(references(parse('(let y y 1)'), 'y')).toBe(true);
  });
});

describe('missing-return-type', () => {
  test('flags anonymous functions without -> Type', () => {
    expect(summary(lint('(fn [x: i32] x)'))).toEqual([
      '1:0 missing-return-type Anonymous function is missing a return type annotation',
    ]);
  });

  test('accepts annotated lambdas', () => {
    expect(lint('(lambda [x: i32] -> i32 x)')).toEqual([]);
  });
});

describe('shadowed-builtin', () => {
  test('flags let bindings named after built-ins', () => {
    expect(summary(lint('(let not 1)'))).toEqual(["1:0 shadowed-builtin 'not' shadows a built-in function"]);
  });

  test('flags parameters, sorted after earlier diagnostics', () => {
    expect(summary(lint('(fn [print: i32] 1)'))).toEqual([
      '1:0 missing-return-type Anonymous function is missing a return type annotation',
      "1:5 unused-binding Parameter 'print' is never used",
      "1:5 shadowed-builtin 'print' shadows a built-in function",
    ]);
  });
});

describe('Linter', () => {
  test('reports a parse failure as a single diagnostic', () => {
    expect(lint('(+ 1')).toEqual([{
      rule: 'parse-error',
      severity: 'error',
      message: 'Unexpected end of input: unclosed list',
      line: 1,
      column: 0,
    }]);
  });

  test('sorts diagnostics by line', () => {
    expect(summary(lint('(let y 2 3)\n(fn [a: i32] -> i32 1)')).map(s => s.split(' ')[0])).toEqual(['1:0', '2:5']);
  });

  test('disabled and enabled rules', () => {
    const linter = createDefaultLinter();
    expect(linter.lint('(fn [x: i32] x)', { disabledRules: ['missing-return-type'] })).toEqual([]);
    const only = linter.lint('(fn [print: i32] 1)', { enabledRules: ['shadowed-builtin'] });
    expect(only.map(d => d.rule)).toEqual(['shadowed-builtin']);
  });

  test('lists rules in registration order', () => {
    expect(createDefaultLinter().getRuleNames()).toEqual(['unused-binding', 'missing-return-type', 'shadowed-builtin']);
  });

  test('a failing rule is reported instead of thrown', () => {
    const linter = new Linter();
    linter.addRule({
      name: 'broken',
      description: 'always fails',
      severity: 'warning',
      run: () => { throw new Error('boom'); },
    });
    expect(linter.lint('1')).toEqual([{
      rule: 'broken',
      severity: 'error',
      message: 'Rule failed internally: boom',
      line: 0,
      column: 0,
    }]);
  });

  test('formatDiagnostic', () => {
    const [d] = lint('(let x 1 2)');
    expect(formatDiagnostic(d, 'a.sprig')).toBe("  a.sprig:1:0  warn  Binding 'x' is never used  (unused-binding)");
  });
});
