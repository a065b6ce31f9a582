/**
 * Tests for the Sprig reader.
 */

import { parse, parseProgram, parseType } from '../src/parser';
import { SprigParseError, ParseErrorKind } from '../src/errors';

function parseErrorOf(source: string): SprigParseError {
  try {
    parse(source);
  } catch (e) {
    if (e instanceof SprigParseError) return e;
    throw e;
  }
  throw new Error(`expected a parse error for ${source}`);
}

function expectParseError(source: string, kind: ParseErrorKind, detail: string): void {
  const e = parseErrorOf(source);
  expect(e.kind).toBe(kind);
  expect(e.detail).toBe(detail);
}

describe('atoms', () => {
  test('small integers are i32', () => {
    expect(parse('42')).toMatchObject({ kind: 'i32', value: 42 });
    expect(parse('-17')).toMatchObject({ kind: 'i32', value: -17 });
    expect(parse('2147483647')).toMatchObject({ kind: 'i32', value: 2147483647 });
  });

  test('integers beyond i32 become i64', () => {
    expect(parse('2147483648')).toMatchObject({ kind: 'i64', value: 2147483648n });
    expect(parse('-9223372036854775808')).toMatchObject({ kind: 'i64', value: -9223372036854775808n });
  });

  test('integers beyond i64 are rejected', () => {
    expectParseError('9223372036854775808', 'InvalidNumber', 'Invalid number: 9223372036854775808 is out of i64 range');
  });

  test('floats need digits on both sides of the point', () => {
    expect(parse('3.14')).toMatchObject({ kind: 'float', value: 3.14 });
    expect(parse('-0.5')).toMatchObject({ kind: 'float', value: -0.5 });
    expectParseError('1.', 'InvalidNumber', 'Invalid number: 1.');
    expectParseError('12abc', 'InvalidNumber', 'Invalid number: 12abc');
  });

  test('booleans are whole tokens only', () => {
    expect(parse('true')).toMatchObject({ kind: 'bool', value: true });
    expect(parse('false')).toMatchObject({ kind: 'bool', value: false });
    expect(parse('trueish')).toMatchObject({ kind: 'symbol', name: 'trueish' });
  });

  test('operator symbols', () => {
    for (const name of ['+', '-', '+.', '<=', 'type-of', 'empty?']) {
      expect(parse(name)).toMatchObject({ kind: 'symbol', name });
    }
  });

  test('strings decode escapes', () => {
    expect(parse('"hello"')).toMatchObject({ kind: 'string', value: 'hello' });
    expect(parse('"a\\nb\\t\\"c\\"\\\\"')).toMatchObject({ kind: 'string', value: 'a\nb\t"c"\\' });
  });

  test('bad strings', () => {
    expectParseError('"open', 'InvalidString', 'Invalid string: unterminated string literal');
    expectParseError('"bad \\q"', 'InvalidString', 'Invalid string: unknown escape sequence \\q');
  });
});

describe('lists and errors', () => {
  test('generic lists keep their elements', () => {
    expect(parse('(+ 1 2)')).toMatchObject({
      kind: 'list',
      elements: [
        { kind: 'symbol', name: '+' },
        { kind: 'i32', value: 1 },
        { kind: 'i32', value: 2 },
      ],
    });
  });

  test('empty list parses', () => {
    expect(parse('()')).toMatchObject({ kind: 'list', elements: [] });
  });

  test('empty input', () => {
    expectParseError('   ', 'UnexpectedEof', 'Unexpected end of input');
  });

  test('unclosed list', () => {
    expectParseError('(+ 1 2', 'UnexpectedEof', 'Unexpected end of input: unclosed list');
  });

  test('stray closing paren', () => {
    expectParseError(')', 'UnmatchedParen', "Unmatched parenthesis: unexpected ')'");
  });

  test('trailing input after one expression', () => {
    expectParseError('1 2', 'UnexpectedInput', 'Unexpected input: 2');
  });

  test('unexpected character', () => {
    expectParseError('#', 'GenericParseFailure', "Unexpected character '#'");
  });

  test('positions are 1-based lines and 0-based columns', () => {
    const e = parseErrorOf('(+ 1\n  "x)');
    expect(e.line).toBe(2);
    expect(e.column).toBe(2);
    expect(e.message).toBe('ParseError [line 2, col 2]: Invalid string: unterminated string literal');
  });
});

describe('special forms', () => {
  test('if', () => {
    expect(parse('(if true 1 2)')).toMatchObject({
      kind: 'if',
      condition: { kind: 'bool', value: true },
      thenBranch: { kind: 'i32', value: 1 },
      elseBranch: { kind: 'i32', value: 2 },
    });
  });

  test('if with a missing branch', () => {
    expectParseError(
      '(if true 1)',
      'UnexpectedInput',
      "Unexpected input: if expects a condition, a then branch and an else branch, found ')'",
    );
  });

  test('let without annotation or body', () => {
    expect(parse('(let x 5)')).toMatchObject({
      kind: 'let', name: 'x', annotation: null, value: { kind: 'i32', value: 5 }, body: null,
    });
  });

  test('let with annotation, with and without a colon', () => {
    expect(parse('(let x: i32 5)')).toMatchObject({ kind: 'let', annotation: { kind: 'i32' } });
    expect(parse('(let x i64 5)')).toMatchObject({ kind: 'let', annotation: { kind: 'i64' } });
  });

  test('let with a body', () => {
    expect(parse('(let x 5 (+ x 1))')).toMatchObject({
      kind: 'let',
      name: 'x',
      value: { kind: 'i32', value: 5 },
      body: { kind: 'list' },
    });
  });

  test('a type name right before the closing paren is the value', () => {
    expect(parse('(let x i32)')).toMatchObject({
      kind: 'let', annotation: null, value: { kind: 'symbol', name: 'i32' }, body: null,
    });
  });

  test('defn', () => {
    expect(parse('(defn add [a: i32 b: i32] -> i32 (+ a b))')).toMatchObject({
      kind: 'defn',
      name: 'add',
      params: [
        { name: 'a', type: { kind: 'i32' } },
        { name: 'b', type: { kind: 'i32' } },
      ],
      returnType: { kind: 'i32' },
      body: { kind: 'list' },
    });
  });

  test('defn requires a return type', () => {
    expectParseError(
      '(defn f [x: i32] x)',
      'UnexpectedInput',
      "Unexpected input: defn expects a return type (-> Type), found 'x)'",
    );
  });

  test('parameters require annotations', () => {
    expectParseError(
      '(fn [x] x)',
      'UnexpectedInput',
      "Unexpected input: parameter 'x' needs a type annotation, found '] x)'",
    );
  });

  test('fn and lambda with optional return type', () => {
    expect(parse('(fn [x: i32] x)')).toMatchObject({ kind: 'lambda', returnType: null });
    expect(parse('(lambda [x: f64] -> f64 x)')).toMatchObject({ kind: 'lambda', returnType: { kind: 'f64' } });
  });

  test('unknown type names', () => {
    expectParseError('(fn [x: int] x)', 'InvalidType', 'Invalid type: int');
  });

  test('unclosed special form', () => {
    expectParseError('(if true 1 2', 'UnexpectedEof', 'Unexpected end of input: unclosed if form');
  });
});

describe('parseType', () => {
  test('base and function types', () => {
    expect(parseType('String')).toEqual({ kind: 'string' });
    expect(parseType('fn(i32, bool) -> _')).toEqual({
      kind: 'function',
      params: [{ kind: 'i32' }, { kind: 'bool' }],
      returnType: { kind: 'inferred' },
    });
    expect(parseType('fn() -> fn(i32) -> i32')).toEqual({
      kind: 'function',
      params: [],
      returnType: { kind: 'function', params: [{ kind: 'i32' }], returnType: { kind: 'i32' } },
    });
  });
});

describe('parseProgram', () => {
  test('reads every top-level form', () => {
    const program = parseProgram('(defn id [x: i32] -> i32 x)\n(id 3)\n');
    expect(program.map(e => e.kind)).toEqual(['defn', 'list']);
    expect(program[1].loc).toEqual({ line: 2, column: 0 });
  });

  test('empty source is an empty program', () => {
    expect(parseProgram('  \n ')).toEqual([]);
  });
});
