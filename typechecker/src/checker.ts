/**
 * Static type checker for the Sprig language.
 *
 * Structural and non-unifying: every expression gets one type from its own
 * shape and the environment, and the first mismatch is thrown as a
 * SprigTypeError. The `_` placeholder is accepted wherever a type is
 * expected; at a call site whose return type is `_` the result takes the
 * type of the last argument.
 */

import {
  Expr,
  ExprOf,
  Param,
  SprigError,
  SprigTypeError,
  toApplication,
} from '@sprig/interpreter';
import {
  SprigType,
  FunctionType,
  mkI32Type,
  mkI64Type,
  mkF64Type,
  mkBoolType,
  mkStringType,
  mkInferredType,
  mkFunctionType,
  isInferred,
  accepts,
  typeToString,
  typesEqual,
} from './types';
import { TypeEnvironment } from './type-env';
import { Diagnostic, diagnosticFromError } from './diagnostics';

// ---------------------------------------------------------------------------
// TypeChecker
// ---------------------------------------------------------------------------

export class TypeChecker {
  private env: TypeEnvironment;

  constructor(env?: TypeEnvironment) {
    this.env = env ?? TypeEnvironment.withBuiltins();
  }

  /**
   * Get the root type environment (top-level definitions land here).
   */
  getEnv(): TypeEnvironment {
    return this.env;
  }

  /**
   * Compute the type of an expression, recording top-level definitions.
   * Throws SprigTypeError on the first failure.
   */
  check(expr: Expr, env: TypeEnvironment = this.env): SprigType {
    switch (expr.kind) {
      case 'i32':
        return mkI32Type();
      case 'i64':
        return mkI64Type();
      case 'float':
        return mkF64Type();
      case 'bool':
        return mkBoolType();
      case 'string':
        return mkStringType();

      case 'symbol': {
        const t = env.lookup(expr.name);
        if (t === null) {
          throw new SprigTypeError('UndefinedVariable', `Undefined variable: ${expr.name}`, expr.loc);
        }
        return t;
      }

      case 'if':
        return this.checkIf(expr, env);
      case 'let':
        return this.checkLet(expr, env);
      case 'defn':
        return this.checkDefn(expr, env);
      case 'lambda':
        return this.checkLambda(expr, env);

      case 'list': {
        const call = toApplication(expr);
        if (call === null) {
          throw new SprigTypeError('EmptyApplication', 'Empty list', expr.loc);
        }
        return this.checkCall(call, env);
      }
      case 'call':
        return this.checkCall(expr, env);
    }
  }

  /**
   * Check a top-level form in a child scope. Its definitions, including
   * sequential lets nested inside it, reach the checker's environment only
   * when the whole form checks.
   */
  checkForm(expr: Expr): SprigType {
    const pending = this.env.child();
    const type = this.check(expr, pending);
    for (const [name, bound] of pending.localBindings()) {
      this.env.define(name, bound);
    }
    return type;
  }

  /**
   * Check every top-level form in order and collect one diagnostic per
   * failing form. A form that fails binds nothing.
   */
  diagnose(program: Expr[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const expr of program) {
      try {
        this.checkForm(expr);
      } catch (e) {
        if (!(e instanceof SprigError)) throw e;
        diagnostics.push(diagnosticFromError(e));
      }
    }
    return diagnostics;
  }

  // =========================================================================
  // Special forms
  // =========================================================================

  private checkIf(expr: ExprOf<'if'>, env: TypeEnvironment): SprigType {
    const condition = this.check(expr.condition, env);
    if (condition.kind !== 'bool') {
      throw new SprigTypeError(
        'ConditionNotBool',
        `If condition must be bool, got ${typeToString(condition)}`,
        expr.condition.loc,
      );
    }
    const thenType = this.check(expr.thenBranch, env);
    const elseType = this.check(expr.elseBranch, env);
    if (!typesEqual(thenType, elseType)) {
      throw new SprigTypeError(
        'BranchMismatch',
        `If branches must have same type: ${typeToString(thenType)} vs ${typeToString(elseType)}`,
        expr.loc,
      );
    }
    return thenType;
  }

  private checkLet(expr: ExprOf<'let'>, env: TypeEnvironment): SprigType {
    const valueType = this.check(expr.value, env);
    let bound = valueType;
    if (expr.annotation !== null && !isInferred(expr.annotation)) {
      if (!typesEqual(expr.annotation, valueType)) {
        throw new SprigTypeError(
          'AnnotationMismatch',
          `Type mismatch: expected ${typeToString(expr.annotation)}, got ${typeToString(valueType)}`,
          expr.value.loc,
        );
      }
      bound = expr.annotation;
    }

    if (expr.body !== null) {
      const scope = env.child();
      scope.define(expr.name, bound);
      return this.check(expr.body, scope);
    }
    env.define(expr.name, bound);
    return bound;
  }

  /**
   * The declared signature is visible inside the body before it is checked,
   * so recursive calls resolve. Parameters shadow the function's own name.
   */
  private checkDefn(expr: ExprOf<'defn'>, env: TypeEnvironment): SprigType {
    const paramTypes = expr.params.map(p => p.type);
    const scope = env.child();
    scope.define(expr.name, mkFunctionType(paramTypes, expr.returnType));
    this.bindParams(expr.params, scope);

    const bodyType = this.check(expr.body, scope);
    if (!accepts(expr.returnType, bodyType)) {
      throw new SprigTypeError(
        'ReturnMismatch',
        `Return type mismatch: expected ${typeToString(expr.returnType)}, got ${typeToString(bodyType)}`,
        expr.body.loc,
      );
    }

    const fnType = mkFunctionType(paramTypes, isInferred(expr.returnType) ? bodyType : expr.returnType);
    env.define(expr.name, fnType);
    return fnType;
  }

  private checkLambda(expr: ExprOf<'lambda'>, env: TypeEnvironment): SprigType {
    const scope = env.child();
    this.bindParams(expr.params, scope);
    const bodyType = this.check(expr.body, scope);
    if (expr.returnType !== null && !accepts(expr.returnType, bodyType)) {
      throw new SprigTypeError(
        'ReturnMismatch',
        `Lambda return type mismatch: expected ${typeToString(expr.returnType)}, got ${typeToString(bodyType)}`,
        expr.body.loc,
      );
    }
    return mkFunctionType(expr.params.map(p => p.type), bodyType);
  }

  private bindParams(params: Param[], scope: TypeEnvironment): void {
    for (const param of params) {
      scope.define(param.name, param.type);
    }
  }

  // =========================================================================
  // Calls
  // =========================================================================

  private checkCall(expr: ExprOf<'call'>, env: TypeEnvironment): SprigType {
    const calleeType = this.check(expr.callee, env);
    if (calleeType.kind !== 'function') {
      throw new SprigTypeError(
        'NotCallable',
        `Cannot call non-function type: ${typeToString(calleeType)}`,
        expr.callee.loc,
      );
    }
    const fn: FunctionType = calleeType;
    if (fn.params.length !== expr.args.length) {
      throw new SprigTypeError(
        'ArityMismatch',
        `Wrong number of arguments: expected ${fn.params.length}, got ${expr.args.length}`,
        expr.loc,
      );
    }

    let result: SprigType = isInferred(fn.returnType) ? mkInferredType() : fn.returnType;
    expr.args.forEach((arg, i) => {
      const argType = this.check(arg, env);
      const expected = fn.params[i];
      if (!accepts(expected, argType)) {
        throw new SprigTypeError(
          'ArgumentMismatch',
          `Type mismatch in argument: expected ${typeToString(expected)}, got ${typeToString(argType)}`,
          arg.loc,
        );
      }
      if (isInferred(fn.returnType)) result = argType;
    });
    return result;
  }
}

/**
 * Check a single expression against an environment.
 */
export function typeCheck(expr: Expr, env: TypeEnvironment): SprigType {
  return new TypeChecker(env).check(expr);
}
