/**
 * Runtime value representations for the Sprig interpreter.
 */

import type { Expr } from './ast';
import type { Environment } from './environment';

export type SprigValue =
  | { readonly kind: 'i32'; readonly value: number }
  | { readonly kind: 'i64'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'string'; readonly value: string }
  | {
      readonly kind: 'function';
      readonly name: string | null;
      readonly params: readonly string[];
      readonly body: Expr;
      readonly closure: Environment;
    }
  | { readonly kind: 'builtin'; readonly name: string; readonly arity: number; readonly fn: BuiltinFn };

export type ValueKind = SprigValue['kind'];

export type ValueOf<K extends ValueKind> = Extract<SprigValue, { kind: K }>;

/** Host services a built-in may use. */
export interface BuiltinContext {
  write(text: string): void;
}

export type BuiltinFn = (args: SprigValue[], ctx: BuiltinContext) => SprigValue;

// ---- Value constructors ----

export function mkI32(value: number): SprigValue {
  return { kind: 'i32', value };
}

export function mkI64(value: bigint): SprigValue {
  return { kind: 'i64', value };
}

export function mkFloat(value: number): SprigValue {
  return { kind: 'float', value };
}

export function mkBool(value: boolean): SprigValue {
  return { kind: 'bool', value };
}

export function mkString(value: string): SprigValue {
  return { kind: 'string', value };
}

export function mkFunction(
  name: string | null,
  params: readonly string[],
  body: Expr,
  closure: Environment,
): ValueOf<'function'> {
  return { kind: 'function', name, params, body, closure };
}

export function mkBuiltin(name: string, arity: number, fn: BuiltinFn): SprigValue {
  return { kind: 'builtin', name, arity, fn };
}

// ---- Value utilities ----

/**
 * Display form used by `print`, the REPL and error messages.
 * Strings are shown without quotes.
 */
export function valueToString(v: SprigValue): string {
  switch (v.kind) {
    case 'i32': return String(v.value);
    case 'i64': return v.value.toString();
    case 'float': return formatFloat(v.value);
    case 'bool': return String(v.value);
    case 'string': return v.value;
    case 'function': return `#<function:${v.params.length}>`;
    case 'builtin': return `#<builtin:${v.name}:${v.arity}>`;
  }
}

function formatFloat(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Object.is(n, -0)) return '-0';
  return String(n);
}

/** The runtime type tag reported by `type-of`. */
export function typeTag(v: SprigValue): string {
  switch (v.kind) {
    case 'i32': return 'i32';
    case 'i64': return 'i64';
    case 'float': return 'f64';
    case 'bool': return 'bool';
    case 'string': return 'String';
    case 'function': return 'function';
    case 'builtin': return 'builtin';
  }
}

/**
 * Scalar values compare by variant and payload; callables by identity.
 */
export function valuesEqual(a: SprigValue, b: SprigValue): boolean {
  switch (a.kind) {
    case 'i32':
      return b.kind === 'i32' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'i64':
      return b.kind === 'i64' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'function':
    case 'builtin':
      return a === b;
  }
}
