/**
 * Tests for the `sprig` subcommands, run against files in a temp directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Session } from '../src/session';
import { runCheck, runFile, runFormatter, runLinter, runSource } from '../src/commands';
import { main } from '../src/main';

let dir: string;
let logs: string[];
let errors: string[];

function writeFile(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sprig-cli-'));
  logs = [];
  errors = [];
  jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => { logs.push(args.join(' ')); });
  jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => { errors.push(args.join(' ')); });
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('runSource', () => {
  test('prints the last result with --eval semantics', () => {
    expect(runSource('(let x 6)\n(* x 7)', true)).toBe(0);
    expect(logs).toEqual(['42: i32']);
  });

  test('program output goes to the session sink', () => {
    const output: string[] = [];
    expect(runSource('(println 5)', false, new Session({ output: t => { output.push(t); } }))).toBe(0);
    expect(output).toEqual(['5\n']);
    expect(logs).toEqual([]);
  });

  test('errors are printed and give exit code 1', () => {
    expect(runSource('(not 1)')).toBe(1);
    expect(errors).toEqual(['TypeError [line 1, col 5]: Type mismatch in argument: expected bool, got i32']);
  });
});

describe('runFile', () => {
  test('reports a missing file', () => {
    const missing = path.join(dir, 'missing.sprig');
    expect(runFile(missing)).toBe(1);
    expect(errors).toEqual([`Error: File not found: ${missing}`]);
  });
});

describe('runCheck', () => {
  test('clean file', () => {
    const file = writeFile('good.sprig', '(defn f [x: i32] -> i32 x)\n');
    expect(runCheck([file])).toBe(0);
    expect(logs).toEqual([`✓ ${file} - no errors`]);
  });

  test('type errors', () => {
    const file = writeFile('bad.sprig', '(let a 1)\n(not a)\n');
    expect(runCheck([file])).toBe(1);
    expect(logs).toEqual([
      `✗ ${file} - 1 error`,
      '  ERROR [2:5] Type mismatch in argument: expected bool, got i32',
    ]);
  });

  test('parse errors', () => {
    const file = writeFile('broken.sprig', '(+ 1');
    expect(runCheck([file])).toBe(1);
    expect(logs).toEqual([
      `✗ ${file} - parse error`,
      '  ParseError [line 1, col 0]: Unexpected end of input: unclosed list',
    ]);
  });

  test('requires a file', () => {
    expect(runCheck([])).toBe(1);
    expect(errors).toEqual(['Error: check requires at least one file argument']);
  });
});

describe('runFormatter', () => {
  test('check, rewrite, check again', () => {
    const file = writeFile('messy.sprig', '(+   1 2)');
    expect(runFormatter(['--check', file])).toBe(1);
    expect(runFormatter([file])).toBe(0);
    expect(fs.readFileSync(file, 'utf-8')).toBe('(+ 1 2)\n');
    expect(runFormatter(['--check', file])).toBe(0);
    expect(logs).toEqual([
      `Would reformat: ${file}`,
      `Formatted: ${file}`,
      `Already formatted: ${file}`,
    ]);
  });

  test('rejects a bad indent', () => {
    const file = writeFile('a.sprig', '1');
    expect(runFormatter(['--indent', '0', file])).toBe(1);
    expect(errors).toEqual(['Error: --indent must be a number between 1 and 8']);
  });

  test('reports parse errors', () => {
    const file = writeFile('broken.sprig', ')');
    expect(runFormatter([file])).toBe(1);
    expect(errors).toEqual([`Error formatting ${file}: ParseError [line 1, col 0]: Unmatched parenthesis: unexpected ')'`]);
  });
});

describe('runLinter', () => {
  test('prints diagnostics and a summary', () => {
    const file = writeFile('lint.sprig', '(let x 1 2)\n');
    expect(runLinter([file])).toBe(0);
    expect(logs).toEqual([
      `${file}:`,
      `  ${file}:1:0  warn  Binding 'x' is never used  (unused-binding)`,
      '',
      'Found 1 warning in 1 file.',
    ]);
  });

  test('parse errors fail the run', () => {
    const file = writeFile('broken.sprig', '(');
    expect(runLinter([file])).toBe(1);
    expect(logs[logs.length - 1]).toBe('Found 1 error in 1 file.');
  });

  test('clean files', () => {
    const file = writeFile('clean.sprig', '(defn id [x: i32] -> i32 x)\n');
    expect(runLinter([file])).toBe(0);
    expect(logs).toEqual(['All clean! 1 file checked.']);
  });

  test('--list-rules', () => {
    expect(runLinter(['--list-rules'])).toBe(0);
    expect(logs[0]).toBe('Available rules:');
    expect(logs).toHaveLength(4);
  });
});

describe('main', () => {
  test('--eval prints value and type', () => {
    expect(main(['--eval', '(+ 40 2)'])).toBe(0);
    expect(logs).toEqual(['42: i32']);
  });

  test('run executes a file', () => {
    const file = writeFile('prog.sprig', '(let x 1)\n');
    expect(main(['run', file])).toBe(0);
  });

  test('no arguments prints usage', () => {
    expect(main([])).toBe(0);
    expect(logs[0]).toBe('Sprig v0.1.0');
  });
});
