import { parse } from '@sprig/interpreter';
import {
  ToolResponse,
  handleExecute,
  handleFormat,
  handleParse,
  handleValidate,
  summarize,
} from '../src/tools';
import { listExamples, readExample, readLanguageReference } from '../src/resources';

function payload(response: ToolResponse): unknown {
  expect(response.content).toHaveLength(1);
  expect(response.content[0].type).toBe('text');
  return JSON.parse(response.content[0].text);
}

describe('sprig_validate', () => {
  test('accepts a well-typed program', async () => {
    const result = payload(await handleValidate({ code: '(defn sq [n: i32] -> i32 (* n n))\n(sq 4)' }));
    expect(result).toEqual({ valid: true, errors: [] });
  });

  test('reports one type error per failing form', async () => {
    const result = payload(await handleValidate({ code: '(let a 1)\n(+ a y)\n(if 1 2 3)' }));
    expect(result).toEqual({
      valid: false,
      errors: [
        { stage: 'type', line: 2, column: 5, message: 'Undefined variable: y' },
        { stage: 'type', line: 3, column: 4, message: 'If condition must be bool, got i32' },
      ],
    });
  });

  test('reports a parse error', async () => {
    const result = payload(await handleValidate({ code: '(+ 1 2' }));
    expect(result).toMatchObject({
      valid: false,
      errors: [{ stage: 'parse', message: 'Unexpected end of input: unclosed list' }],
    });
  });
});

describe('sprig_parse', () => {
  test('summarizes each top-level form', async () => {
    const result = payload(await handleParse({ code: '(defn sq [n: i32] -> i32 (* n n))\n  42' }));
    expect(result).toEqual({
      valid: true,
      errors: [],
      forms: [
        {
          kind: 'defn',
          line: 1,
          column: 0,
          text: '(defn sq [n: i32] -> i32 (* n n))',
          ast: '(defn sq (params (n i32)) i32 (list (symbol *) (symbol n) (symbol n)))',
        },
        { kind: 'i32', line: 2, column: 2, text: '42', ast: '(i32 42)' },
      ],
    });
  });

  test('returns no forms for invalid input', async () => {
    const result = payload(await handleParse({ code: ')' }));
    expect(result).toMatchObject({
      valid: false,
      forms: [],
      errors: [{ stage: 'parse', message: "Unmatched parenthesis: unexpected ')'" }],
    });
  });
});

describe('summarize', () => {
  test('let, lambda and if', () => {
    expect(summarize(parse('(let s: String "a\\"b")'))).toBe('(let s String (string "a\\"b"))');
    expect(summarize(parse('(fn [x: i32] x)'))).toBe('(lambda (params (x i32)) (symbol x))');
    expect(summarize(parse('(if true 1.5 2.0)'))).toBe('(if (bool true) (float 1.5) (float 2.0))');
    expect(summarize(parse('()'))).toBe('(list)');
  });

  test('elides nodes past the depth limit', () => {
    expect(summarize(parse('(f (g 1))'), 7)).toBe('(list (symbol f) (list ...))');
  });
});

describe('sprig_execute', () => {
  test('captures output and shows the last result', async () => {
    const result = payload(await handleExecute({ code: '(println "hi")\n(+ 1 2)' }));
    expect(result).toEqual({ success: true, output: 'hi\n', result: '3: i32' });
  });

  test('an empty program has no result', async () => {
    expect(payload(await handleExecute({ code: '' }))).toEqual({ success: true, output: '', result: null });
  });

  test('keeps output printed before a runtime error', async () => {
    const result = payload(await handleExecute({ code: '(println "before")\n(/ 1 0)' }));
    expect(result).toEqual({
      success: false,
      output: 'before\n',
      error: 'RuntimeError [line 2, col 0]: Division by zero',
    });
  });

  test('a type error stops the form before it prints', async () => {
    const result = payload(await handleExecute({ code: '(println (+ 1 y))' }));
    expect(result).toEqual({
      success: false,
      output: '',
      error: 'TypeError [line 1, col 14]: Undefined variable: y',
    });
  });

  test('each call starts a fresh session', async () => {
    await handleExecute({ code: '(let x 1)' });
    const result = payload(await handleExecute({ code: 'x' }));
    expect(result).toEqual({
      success: false,
      output: '',
      error: 'TypeError [line 1, col 0]: Undefined variable: x',
    });
  });
});

describe('sprig_format', () => {
  test('formats with custom options', async () => {
    const result = payload(await handleFormat({ code: '(defn f [x: i32] -> i32 x)', maxLineWidth: 10, indentSize: 4 }));
    expect(result).toEqual({ success: true, formatted: '(defn f [x: i32] -> i32\n    x)\n', changed: true });
  });

  test('canonical input is unchanged', async () => {
    const result = payload(await handleFormat({ code: '(+ 1 2)\n' }));
    expect(result).toEqual({ success: true, formatted: '(+ 1 2)\n', changed: false });
  });

  test('reports parse errors', async () => {
    const result = payload(await handleFormat({ code: '(+ 1' }));
    expect(result).toMatchObject({
      success: false,
      error: { stage: 'parse', message: 'Unexpected end of input: unclosed list' },
    });
  });
});

describe('resources', () => {
  test('language reference is bundled', () => {
    expect(readLanguageReference().startsWith('# Sprig Language Reference\n')).toBe(true);
  });

  test('example programs run', async () => {
    const examples = listExamples();
    expect(examples.map(e => e.name)).toEqual(['closures', 'factorial', 'fibonacci']);

    const outputs: Record<string, unknown> = {};
    for (const example of examples) {
      outputs[example.name] = payload(await handleExecute({ code: readExample(example) }));
    }
    expect(outputs).toEqual({
      closures: { success: true, output: '15\n', result: '15: i32' },
      factorial: { success: true, output: '3628800\n', result: '3628800: i32' },
      fibonacci: { success: true, output: '6765\n', result: '6765: i32' },
    });
  });
});
