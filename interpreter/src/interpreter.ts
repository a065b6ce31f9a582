/**
 * Tree-walking interpreter for the Sprig language.
 *
 * Evaluates AST nodes by recursively visiting them against an environment.
 * Function calls and scoped `let` bodies each get one child environment.
 */

import { Environment } from './environment';
import {
  SprigValue,
  ValueOf,
  BuiltinContext,
  mkI32,
  mkI64,
  mkFloat,
  mkBool,
  mkString,
  mkFunction,
  valueToString,
} from './values';
import { SprigRuntimeError, SprigNameError } from './errors';
import { registerBuiltins } from './builtins';
import { Expr, ExprOf, toApplication } from './ast';

/** Receives everything `print` and `println` write. */
export type OutputSink = (text: string) => void;

export interface InterpreterOptions {
  /** Defaults to process.stdout */
  output?: OutputSink;
}

export class Interpreter {
  private globalEnv: Environment;
  private readonly context: BuiltinContext;

  constructor(options: InterpreterOptions = {}) {
    const output = options.output ?? ((text: string) => { process.stdout.write(text); });
    this.context = { write: output };
    this.globalEnv = Interpreter.createGlobalEnv();
  }

  /**
   * A fresh root environment holding the built-in table.
   */
  static createGlobalEnv(): Environment {
    const env = new Environment();
    registerBuiltins(env);
    return env;
  }

  /**
   * Evaluate each top-level expression in the global environment and
   * return the value of the last one (null for an empty program).
   */
  run(program: Expr[]): SprigValue | null {
    let result: SprigValue | null = null;
    for (const expr of program) {
      result = this.evaluate(expr);
    }
    return result;
  }

  /**
   * Get the global environment (useful for testing).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  /**
   * Replace the global environment with a fresh one.
   */
  reset(): void {
    this.globalEnv = Interpreter.createGlobalEnv();
  }

  /**
   * Main dispatch: evaluate any node.
   */
  evaluate(expr: Expr, env: Environment = this.globalEnv): SprigValue {
    switch (expr.kind) {
      // ---- Literals ----
      case 'i32':
        return mkI32(expr.value);
      case 'i64':
        return mkI64(expr.value);
      case 'float':
        return mkFloat(expr.value);
      case 'bool':
        return mkBool(expr.value);
      case 'string':
        return mkString(expr.value);

      // ---- Names ----
      case 'symbol':
        return this.evalSymbol(expr, env);

      // ---- Special forms ----
      case 'if':
        return this.evalIf(expr, env);
      case 'let':
        return this.evalLet(expr, env);
      case 'defn':
        return this.evalDefn(expr, env);
      case 'lambda':
        return mkFunction(null, expr.params.map(p => p.name), expr.body, env.snapshot());

      // ---- Application ----
      case 'list': {
        const call = toApplication(expr);
        if (call === null) {
          throw new SprigRuntimeError('EmptyApplication', 'Empty list', expr.loc);
        }
        return this.evalCall(call, env);
      }
      case 'call':
        return this.evalCall(expr, env);
    }
  }

  // ==================================================================
  // Names & special forms
  // ==================================================================

  private evalSymbol(expr: ExprOf<'symbol'>, env: Environment): SprigValue {
    const value = env.lookup(expr.name);
    if (value === undefined) {
      throw new SprigNameError(expr.name, expr.loc);
    }
    return value;
  }

  private evalIf(expr: ExprOf<'if'>, env: Environment): SprigValue {
    const condition = this.evaluate(expr.condition, env);
    if (condition.kind !== 'bool') {
      throw new SprigRuntimeError('ConditionNotBool', 'If condition must be a boolean', expr.condition.loc);
    }
    return this.evaluate(condition.value ? expr.thenBranch : expr.elseBranch, env);
  }

  /**
   * With a body the binding lives in a child scope for that body only;
   * without one it is written into the current scope.
   */
  private evalLet(expr: ExprOf<'let'>, env: Environment): SprigValue {
    const value = this.evaluate(expr.value, env);
    if (expr.body !== null) {
      const scope = env.child();
      scope.define(expr.name, value);
      return this.evaluate(expr.body, scope);
    }
    env.define(expr.name, value);
    return value;
  }

  /**
   * The closure captures a frame that already binds the function's own
   * name, so the body can call itself however the function is reached.
   */
  private evalDefn(expr: ExprOf<'defn'>, env: Environment): SprigValue {
    const frame = env.snapshot().child();
    const fn = mkFunction(expr.name, expr.params.map(p => p.name), expr.body, frame);
    frame.define(expr.name, fn);
    env.define(expr.name, fn);
    return fn;
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private evalCall(expr: ExprOf<'call'>, env: Environment): SprigValue {
    const callee = this.evaluate(expr.callee, env);
    const argc = expr.args.length;

    if (callee.kind === 'function' || callee.kind === 'builtin') {
      const arity = callee.kind === 'function' ? callee.params.length : callee.arity;
      if (argc !== arity) {
        const target = callee.kind === 'builtin' ? ` for ${callee.name}` : '';
        throw new SprigRuntimeError(
          'ArityMismatch',
          `Wrong number of arguments${target}: expected ${arity}, got ${argc}`,
          expr.loc,
        );
      }
    } else {
      throw new SprigRuntimeError(
        'NotCallable',
        `Cannot call non-function value: ${valueToString(callee)}`,
        expr.callee.loc,
      );
    }

    const args = expr.args.map(arg => this.evaluate(arg, env));

    if (callee.kind === 'builtin') {
      return this.callBuiltin(callee, args, expr);
    }
    return this.callFunction(callee, args);
  }

  private callFunction(callee: ValueOf<'function'>, args: SprigValue[]): SprigValue {
    const frame = callee.closure.child();
    callee.params.forEach((param, i) => frame.define(param, args[i]));
    return this.evaluate(callee.body, frame);
  }

  private callBuiltin(callee: ValueOf<'builtin'>, args: SprigValue[], callSite: ExprOf<'call'>): SprigValue {
    try {
      return callee.fn(args, this.context);
    } catch (e) {
      // Built-ins have no position of their own; report the call site.
      if (e instanceof SprigRuntimeError && e.line === undefined) {
        throw new SprigRuntimeError(e.kind, e.detail, callSite.loc);
      }
      throw e;
    }
  }
}
