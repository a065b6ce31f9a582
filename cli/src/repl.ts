/**
 * Sprig REPL: interactive read-eval-print loop.
 *
 * Usage: sprig repl
 *
 * Features:
 *   - Persistent session state across inputs
 *   - Multi-line input (detects unclosed parens/brackets/strings)
 *   - Special commands: :help, :quit, :env, :type, :clear, :reset
 *   - Errors are printed and the loop continues
 *   - Prints `<value>: <type>` for each input
 */

import * as readline from 'readline';
import { typeToString, valueToString } from '@sprig/interpreter';
import { Session, formatResult } from './session';

export const VERSION = '0.1.0';
export const PROMPT = 'sprig> ';
export const CONTINUATION_PROMPT = '  ... ';

/** Where the REPL writes. */
export interface ReplIO {
  log(text: string): void;
  error(text: string): void;
  clear(): void;
}

const consoleIO: ReplIO = {
  log: text => console.log(text),
  error: text => console.error(text),
  clear: () => console.clear(),
};

/**
 * Line-driven REPL core, independent of the terminal.
 */
export class Repl {
  private buffer = '';
  private readonly session: Session;
  private readonly io: ReplIO;

  constructor(session: Session = new Session(), io: ReplIO = consoleIO) {
    this.session = session;
    this.io = io;
  }

  /** True while a multi-line input is being collected. */
  get pending(): boolean {
    return this.buffer !== '';
  }

  prompt(): string {
    return this.pending ? CONTINUATION_PROMPT : PROMPT;
  }

  /**
   * Feed one line of input. Returns false when the REPL should exit.
   */
  handleLine(line: string): boolean {
    const trimmed = line.trim();

    if (!this.pending) {
      if (trimmed === 'exit' || trimmed === 'quit') return false;
      // Special commands only outside multi-line mode
      if (trimmed.startsWith(':')) return this.handleCommand(trimmed);
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedDelimiters(this.buffer)) {
      return true;
    }

    const input = this.buffer.trim();
    this.buffer = '';
    if (input !== '') {
      this.report(() => {
        const result = this.session.evaluateProgram(input);
        if (result) this.io.log(formatResult(result));
      });
    }
    return true;
  }

  private handleCommand(cmd: string): boolean {
    const [command, ...rest] = cmd.split(/\s+/);

    switch (command) {
      case ':help':
      case ':h':
        this.io.log([
          '',
          'REPL Commands:',
          '  :help, :h       Show this help message',
          '  :quit, :q       Exit the REPL (also: exit, quit)',
          '  :env            Show user-defined bindings with their types',
          '  :type <expr>    Show the static type of an expression',
          '  :clear          Clear the screen',
          '  :reset          Reset the session state',
          '',
          'Tips:',
          '  - Multi-line input: leave parens or brackets unclosed',
          '  - Each result is printed as <value>: <type>',
          '  - Definitions persist between inputs',
          '',
        ].join('\n'));
        return true;

      case ':quit':
      case ':q':
        return false;

      case ':env':
        this.printEnvironment();
        return true;

      case ':type': {
        const expr = rest.join(' ').trim();
        if (!expr) {
          this.io.log('Usage: :type <expression>');
          return true;
        }
        this.report(() => this.io.log(typeToString(this.session.typeOf(expr))));
        return true;
      }

      case ':clear':
        this.io.clear();
        return true;

      case ':reset':
        this.session.reset();
        this.io.log('Session reset.');
        return true;

      default:
        this.io.log(`Unknown command: ${command}. Type :help for available commands.`);
        return true;
    }
  }

  private printEnvironment(): void {
    const bindings = this.session.bindings();
    if (bindings.length === 0) {
      this.io.log('  (no user-defined bindings)');
      return;
    }
    for (const { name, type, value } of bindings) {
      const preview = valueToString(value);
      const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
      this.io.log(`  ${name}: ${type ? typeToString(type) : '?'} = ${truncated}`);
    }
  }

  private report(action: () => void): void {
    try {
      action();
    } catch (e) {
      if (e instanceof Error) {
        this.io.error(`Error: ${e.message}`);
        return;
      }
      throw e;
    }
  }
}

/**
 * Check whether the input has unclosed delimiters.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let parens = 0;
  let brackets = 0;
  let inString = false;
  let escaped = false;

  for (const ch of input) {
    if (escaped) {
      escaped = false;
      continue;
    }

    if (inString) {
      if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    switch (ch) {
      case '"': inString = true; break;
      case '(': parens++; break;
      case ')': parens--; break;
      case '[': brackets++; break;
      case ']': brackets--; break;
    }
  }

  return inString || parens > 0 || brackets > 0;
}

/**
 * Start the Sprig REPL on the terminal.
 */
export function startRepl(): void {
  const repl = new Repl();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
    terminal: true,
  });

  console.log(`Sprig REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    if (!repl.handleLine(line)) {
      rl.close();
      return;
    }
    rl.setPrompt(repl.prompt());
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}
