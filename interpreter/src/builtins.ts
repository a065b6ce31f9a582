/**
 * Built-in functions for the Sprig interpreter.
 *
 * One table describes every built-in: its static signature (read by the
 * type checker) and its host implementation (installed in the root value
 * environment). Arity is the number of parameters in the signature.
 */

import { Environment } from './environment';
import {
  SprigValue,
  BuiltinFn,
  mkBuiltin,
  mkI32,
  mkI64,
  mkFloat,
  mkBool,
  mkString,
  valueToString,
  typeTag,
} from './values';
import { SprigRuntimeError } from './errors';
import type { SprigType } from './types';

export interface BuiltinDefinition {
  name: string;
  signature: Extract<SprigType, { kind: 'function' }>;
  fn: BuiltinFn;
}

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const ANY: SprigType = { kind: 'inferred' };
const F64: SprigType = { kind: 'f64' };
const BOOL: SprigType = { kind: 'bool' };
const STRING: SprigType = { kind: 'string' };

function sig(params: SprigType[], returnType: SprigType): BuiltinDefinition['signature'] {
  return { kind: 'function', params, returnType };
}

function checkI32(name: string, n: number): SprigValue {
  if (n < I32_MIN || n > I32_MAX) {
    throw new SprigRuntimeError('IntegerOverflow', `Integer overflow in ${name}: result does not fit in i32`);
  }
  return mkI32(n + 0);
}

function checkI64(name: string, n: bigint): SprigValue {
  if (n < I64_MIN || n > I64_MAX) {
    throw new SprigRuntimeError('IntegerOverflow', `Integer overflow in ${name}: result does not fit in i64`);
  }
  return mkI64(n);
}

function divisionByZero(): SprigRuntimeError {
  return new SprigRuntimeError('DivisionByZero', 'Division by zero');
}

/**
 * Arithmetic on two integers of the same width.
 */
function integerArithmetic(
  name: string,
  on32: (a: number, b: number) => number,
  on64: (a: bigint, b: bigint) => bigint,
  guardZero = false,
): BuiltinDefinition {
  return {
    name,
    signature: sig([ANY, ANY], ANY),
    fn: ([a, b]) => {
      if (a.kind === 'i32' && b.kind === 'i32') {
        if (guardZero && b.value === 0) throw divisionByZero();
        return checkI32(name, on32(a.value, b.value));
      }
      if (a.kind === 'i64' && b.kind === 'i64') {
        if (guardZero && b.value === 0n) throw divisionByZero();
        return checkI64(name, on64(a.value, b.value));
      }
      throw new SprigRuntimeError('OperandMismatch', `${name} requires two integers of the same type`);
    },
  };
}

function integerComparison(
  name: string,
  on32: (a: number, b: number) => boolean,
  on64: (a: bigint, b: bigint) => boolean,
): BuiltinDefinition {
  return {
    name,
    signature: sig([ANY, ANY], BOOL),
    fn: ([a, b]) => {
      if (a.kind === 'i32' && b.kind === 'i32') return mkBool(on32(a.value, b.value));
      if (a.kind === 'i64' && b.kind === 'i64') return mkBool(on64(a.value, b.value));
      throw new SprigRuntimeError('OperandMismatch', `${name} requires two integers of the same type`);
    },
  };
}

function floatArithmetic(name: string, op: (a: number, b: number) => number, guardZero = false): BuiltinDefinition {
  return {
    name,
    signature: sig([F64, F64], F64),
    fn: ([a, b]) => {
      if (a.kind !== 'float' || b.kind !== 'float') {
        throw new SprigRuntimeError('OperandMismatch', `${name} requires two floats`);
      }
      if (guardZero && b.value === 0) throw divisionByZero();
      return mkFloat(op(a.value, b.value));
    },
  };
}

function booleanConnective(name: string, op: (a: boolean, b: boolean) => boolean): BuiltinDefinition {
  return {
    name,
    signature: sig([BOOL, BOOL], BOOL),
    fn: ([a, b]) => {
      if (a.kind !== 'bool' || b.kind !== 'bool') {
        throw new SprigRuntimeError('OperandMismatch', `${name} requires two booleans`);
      }
      return mkBool(op(a.value, b.value));
    },
  };
}

/** print and println hand their argument back unchanged. */
function printer(name: string, suffix: string): BuiltinDefinition {
  return {
    name,
    signature: sig([ANY], ANY),
    fn: ([v], ctx) => {
      ctx.write(valueToString(v) + suffix);
      return v;
    },
  };
}

export const BUILTINS: readonly BuiltinDefinition[] = [
  // ---- Integer arithmetic ----
  integerArithmetic('+', (a, b) => a + b, (a, b) => a + b),
  integerArithmetic('-', (a, b) => a - b, (a, b) => a - b),
  integerArithmetic('*', (a, b) => a * b, (a, b) => a * b),
  integerArithmetic('/', (a, b) => Math.trunc(a / b), (a, b) => a / b, true),

  // ---- Float arithmetic ----
  floatArithmetic('+.', (a, b) => a + b),
  floatArithmetic('-.', (a, b) => a - b),
  floatArithmetic('*.', (a, b) => a * b),
  floatArithmetic('/.', (a, b) => a / b, true),

  // ---- Comparison ----
  integerComparison('=', (a, b) => a === b, (a, b) => a === b),
  integerComparison('<', (a, b) => a < b, (a, b) => a < b),
  integerComparison('>', (a, b) => a > b, (a, b) => a > b),
  integerComparison('<=', (a, b) => a <= b, (a, b) => a <= b),
  integerComparison('>=', (a, b) => a >= b, (a, b) => a >= b),

  // ---- Logic ----
  booleanConnective('and', (a, b) => a && b),
  booleanConnective('or', (a, b) => a || b),
  {
    name: 'not',
    signature: sig([BOOL], BOOL),
    fn: ([v]) => {
      if (v.kind !== 'bool') {
        throw new SprigRuntimeError('OperandMismatch', 'not requires a boolean');
      }
      return mkBool(!v.value);
    },
  },

  // ---- I/O ----
  printer('print', ''),
  printer('println', '\n'),

  // ---- Reflection ----
  {
    name: 'type-of',
    signature: sig([ANY], STRING),
    fn: ([v]) => mkString(typeTag(v)),
  },
];

export const BUILTIN_NAMES: ReadonlySet<string> = new Set(BUILTINS.map(b => b.name));

/**
 * Register all built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment): void {
  for (const builtin of BUILTINS) {
    env.define(builtin.name, mkBuiltin(builtin.name, builtin.signature.params.length, builtin.fn));
  }
}
