/**
 * Error types for the Sprig pipeline.
 *
 * Each stage has its own error class and kind enumeration. `detail` holds the
 * plain description; `message` adds the stage label and the source position.
 */

import type { SourceLocation } from './ast';

export class SprigError extends Error {
  public readonly detail: string;
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(label: string, detail: string, loc?: SourceLocation) {
    const where = loc !== undefined ? ` [line ${loc.line}, col ${loc.column}]` : '';
    super(`${label}${where}: ${detail}`);
    this.name = 'SprigError';
    this.detail = detail;
    this.line = loc?.line;
    this.column = loc?.column;
  }
}

export type ParseErrorKind =
  | 'UnexpectedInput'
  | 'UnexpectedEof'
  | 'InvalidNumber'
  | 'InvalidString'
  | 'InvalidType'
  | 'UnmatchedParen'
  | 'GenericParseFailure';

export class SprigParseError extends SprigError {
  public readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, detail: string, loc?: SourceLocation) {
    super('ParseError', detail, loc);
    this.name = 'SprigParseError';
    this.kind = kind;
  }
}

export type TypeErrorKind =
  | 'UndefinedVariable'
  | 'ConditionNotBool'
  | 'BranchMismatch'
  | 'AnnotationMismatch'
  | 'ReturnMismatch'
  | 'ArityMismatch'
  | 'ArgumentMismatch'
  | 'NotCallable'
  | 'EmptyApplication';

export class SprigTypeError extends SprigError {
  public readonly kind: TypeErrorKind;

  constructor(kind: TypeErrorKind, detail: string, loc?: SourceLocation) {
    super('TypeError', detail, loc);
    this.name = 'SprigTypeError';
    this.kind = kind;
  }
}

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'ConditionNotBool'
  | 'ArityMismatch'
  | 'DivisionByZero'
  | 'NotCallable'
  | 'OperandMismatch'
  | 'IntegerOverflow'
  | 'EmptyApplication';

export class SprigRuntimeError extends SprigError {
  public readonly kind: RuntimeErrorKind;

  constructor(kind: RuntimeErrorKind, detail: string, loc?: SourceLocation) {
    super('RuntimeError', detail, loc);
    this.name = 'SprigRuntimeError';
    this.kind = kind;
  }
}

/**
 * Raised by the environment when a name is not bound anywhere in the chain.
 * The evaluator attaches the position of the offending symbol.
 */
export class SprigNameError extends SprigRuntimeError {
  public readonly variable: string;

  constructor(name: string, loc?: SourceLocation) {
    super('UndefinedVariable', `Undefined variable: ${name}`, loc);
    this.name = 'SprigNameError';
    this.variable = name;
  }
}
