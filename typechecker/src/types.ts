/**
 * Type helpers for the Sprig type checker.
 *
 * The type ADT itself lives with the syntax tree (annotations are part of
 * the source); this module adds constructors and the acceptance rule used
 * at call sites and annotations.
 */

import { SprigType, typesEqual } from '@sprig/interpreter';

export { SprigType, typeToString, typesEqual } from '@sprig/interpreter';

export type FunctionType = Extract<SprigType, { kind: 'function' }>;

// ---------------------------------------------------------------------------
// Constructor helpers
// ---------------------------------------------------------------------------

export function mkI32Type(): SprigType {
  return { kind: 'i32' };
}

export function mkI64Type(): SprigType {
  return { kind: 'i64' };
}

export function mkF64Type(): SprigType {
  return { kind: 'f64' };
}

export function mkBoolType(): SprigType {
  return { kind: 'bool' };
}

export function mkStringType(): SprigType {
  return { kind: 'string' };
}

export function mkInferredType(): SprigType {
  return { kind: 'inferred' };
}

export function mkFunctionType(params: SprigType[], returnType: SprigType): FunctionType {
  return { kind: 'function', params, returnType };
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function isInferred(t: SprigType): boolean {
  return t.kind === 'inferred';
}

/**
 * Whether a slot declared as `expected` takes a value of type `actual`.
 * The `_` placeholder takes anything; otherwise types must be equal.
 */
export function accepts(expected: SprigType, actual: SprigType): boolean {
  return isInferred(expected) || typesEqual(expected, actual);
}
