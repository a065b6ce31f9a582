/**
 * The Sprig pipeline: parse, type-check, evaluate.
 *
 * `run` is the single entry point every surface goes through. A `Session`
 * keeps one type environment and one value environment alive across
 * inputs, both seeded from the built-in table.
 */

import {
  Environment,
  Expr,
  Interpreter,
  InterpreterOptions,
  SprigType,
  SprigValue,
  parse,
  parseProgram,
  typeToString,
  valueToString,
} from '@sprig/interpreter';
import { TypeChecker, TypeEnvironment } from '@sprig/typechecker';

export interface RunResult {
  value: SprigValue;
  type: SprigType;
}

export interface SessionBinding {
  name: string;
  type: SprigType | null;
  value: SprigValue;
}

/**
 * Type-check `expr`, then evaluate it. Evaluation never starts when checking
 * fails. Both stages write into child scopes, and the definitions a form
 * makes reach `typeEnv` and `valueEnv` together, only once evaluation has
 * succeeded.
 */
export function run(
  expr: Expr,
  typeEnv: TypeEnvironment,
  valueEnv: Environment,
  interpreter: Interpreter = new Interpreter(),
): RunResult {
  const pending = typeEnv.child();
  const type = new TypeChecker(pending).check(expr);
  const frame = valueEnv.child();
  const value = interpreter.evaluate(expr, frame);
  for (const [name, bound] of pending.localBindings()) {
    typeEnv.define(name, bound);
  }
  for (const [name, bound] of frame.localBindings()) {
    valueEnv.define(name, bound);
  }
  return { value, type };
}

/** `<value>: <type>`, as shown by the REPL and `--eval`. */
export function formatResult(result: RunResult): string {
  return `${valueToString(result.value)}: ${typeToString(result.type)}`;
}

export class Session {
  private interpreter: Interpreter;
  private typeEnv: TypeEnvironment;

  constructor(options: InterpreterOptions = {}) {
    this.interpreter = new Interpreter(options);
    this.typeEnv = TypeEnvironment.withBuiltins();
  }

  /**
   * Parse and run exactly one expression.
   */
  evaluate(source: string): RunResult {
    return this.runExpr(parse(source));
  }

  /**
   * Run every top-level expression in order; returns the last result, or
   * null when the source holds no expressions. Stops at the first error.
   */
  evaluateProgram(source: string): RunResult | null {
    let result: RunResult | null = null;
    for (const expr of parseProgram(source)) {
      result = this.runExpr(expr);
    }
    return result;
  }

  /**
   * Static type of a single expression, without evaluating it or keeping
   * any definitions it makes.
   */
  typeOf(source: string): SprigType {
    return new TypeChecker(this.typeEnv.child()).check(parse(source));
  }

  /**
   * User-defined top-level bindings, in definition order.
   */
  bindings(): SessionBinding[] {
    return this.interpreter
      .getGlobalEnv()
      .localBindings()
      .filter(([name, value]) => !(value.kind === 'builtin' && value.name === name))
      .map(([name, value]) => ({ name, type: this.typeEnv.lookup(name), value }));
  }

  reset(): void {
    this.interpreter.reset();
    this.typeEnv = TypeEnvironment.withBuiltins();
  }

  private runExpr(expr: Expr): RunResult {
    return run(expr, this.typeEnv, this.interpreter.getGlobalEnv(), this.interpreter);
  }
}
