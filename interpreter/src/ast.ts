/**
 * Sprig abstract syntax tree.
 *
 * The parser produces these nodes; the type checker, the evaluator, the
 * formatter and the linter all walk them. Nodes are plain immutable data.
 */

import type { SprigType } from './types';

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

export interface Param {
  name: string;
  type: SprigType;
  loc: SourceLocation;
}

export type Expr =
  | { kind: 'i32'; value: number; loc: SourceLocation }
  | { kind: 'i64'; value: bigint; loc: SourceLocation }
  | { kind: 'float'; value: number; loc: SourceLocation }
  | { kind: 'bool'; value: boolean; loc: SourceLocation }
  | { kind: 'string'; value: string; loc: SourceLocation }
  | { kind: 'symbol'; name: string; loc: SourceLocation }
  | { kind: 'list'; elements: Expr[]; loc: SourceLocation }
  | { kind: 'if'; condition: Expr; thenBranch: Expr; elseBranch: Expr; loc: SourceLocation }
  | { kind: 'let'; name: string; annotation: SprigType | null; value: Expr; body: Expr | null; loc: SourceLocation }
  | { kind: 'defn'; name: string; params: Param[]; returnType: SprigType; body: Expr; loc: SourceLocation }
  | { kind: 'lambda'; params: Param[]; returnType: SprigType | null; body: Expr; loc: SourceLocation }
  | { kind: 'call'; callee: Expr; args: Expr[]; loc: SourceLocation };

export type ExprKind = Expr['kind'];

export type ExprOf<K extends ExprKind> = Extract<Expr, { kind: K }>;

/** Leading symbols the parser turns into dedicated nodes. */
export const SPECIAL_FORMS = ['if', 'let', 'defn', 'fn', 'lambda'] as const;

export type SpecialForm = (typeof SPECIAL_FORMS)[number];

export function isSpecialForm(name: string): name is SpecialForm {
  return (SPECIAL_FORMS as readonly string[]).includes(name);
}

/**
 * Reinterpret a generic list as an application of its first element.
 * Returns null for the empty list, which has no callee.
 */
export function toApplication(list: ExprOf<'list'>): ExprOf<'call'> | null {
  if (list.elements.length === 0) return null;
  const [callee, ...args] = list.elements;
  return { kind: 'call', callee, args, loc: list.loc };
}

/**
 * Direct sub-expressions of a node, in source order.
 */
export function childExpressions(expr: Expr): Expr[] {
  switch (expr.kind) {
    case 'i32':
    case 'i64':
    case 'float':
    case 'bool':
    case 'string':
    case 'symbol':
      return [];
    case 'list':
      return expr.elements;
    case 'if':
      return [expr.condition, expr.thenBranch, expr.elseBranch];
    case 'let':
      return expr.body ? [expr.value, expr.body] : [expr.value];
    case 'defn':
    case 'lambda':
      return [expr.body];
    case 'call':
      return [expr.callee, ...expr.args];
  }
}

/**
 * Pre-order traversal. Returning false from the visitor skips the node's children.
 */
export function walk(expr: Expr, visit: (node: Expr) => boolean | void): void {
  if (visit(expr) === false) return;
  for (const child of childExpressions(expr)) {
    walk(child, visit);
  }
}
