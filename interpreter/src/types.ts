/**
 * Static type vocabulary for Sprig.
 *
 * Types appear in source annotations (`i32`, `fn(i32, i32) -> i32`, `_`)
 * and are shared by the parser, the type checker and the built-in table.
 */

export type SprigType =
  | { kind: 'i32' }
  | { kind: 'i64' }
  | { kind: 'f64' }
  | { kind: 'bool' }
  | { kind: 'string' }
  | { kind: 'function'; params: SprigType[]; returnType: SprigType }
  | { kind: 'inferred' };

export type BaseTypeKind = 'i32' | 'i64' | 'f64' | 'bool' | 'string';

/** Source spelling of each base type plus the `_` placeholder. */
const TYPE_NAMES: Record<string, SprigType> = {
  i32: { kind: 'i32' },
  i64: { kind: 'i64' },
  f64: { kind: 'f64' },
  bool: { kind: 'bool' },
  String: { kind: 'string' },
  _: { kind: 'inferred' },
};

export function lookupTypeName(name: string): SprigType | null {
  return Object.prototype.hasOwnProperty.call(TYPE_NAMES, name) ? TYPE_NAMES[name] : null;
}

export function typeNames(): string[] {
  return Object.keys(TYPE_NAMES);
}

export function typeToString(t: SprigType): string {
  switch (t.kind) {
    case 'i32': return 'i32';
    case 'i64': return 'i64';
    case 'f64': return 'f64';
    case 'bool': return 'bool';
    case 'string': return 'String';
    case 'inferred': return '_';
    case 'function': return `fn(${t.params.map(typeToString).join(', ')}) -> ${typeToString(t.returnType)}`;
  }
}

/**
 * Structural equality. `_` is only equal to `_`; callers decide where the
 * placeholder accepts other types.
 */
export function typesEqual(a: SprigType, b: SprigType): boolean {
  if (a.kind === 'function' && b.kind === 'function') {
    if (a.params.length !== b.params.length) return false;
    return a.params.every((p, i) => typesEqual(p, b.params[i]))
      && typesEqual(a.returnType, b.returnType);
  }
  return a.kind === b.kind;
}
