/**
 * Recursive-descent reader for Sprig source text.
 *
 * Atoms are read as maximal runs of symbol characters and then classified
 * (boolean, float, width-promoted integer or symbol). A list whose first
 * element is `if`, `let`, `defn`, `fn` or `lambda` is read into its
 * dedicated node; any other list stays generic until checking/evaluation
 * reinterpret it as an application.
 */

import type { Expr, Param, SourceLocation } from './ast';
import { SprigParseError } from './errors';
import { SprigType, lookupTypeName } from './types';

const SYMBOL_CHAR = /[\p{L}\p{N}+\-*/<>=!&|_?.]/u;
const TYPE_WORD_CHAR = /[A-Za-z0-9_]/;
const WHITESPACE = /\s/;

const FLOAT_LITERAL = /^-?\d+\.\d+$/;
const INT_LITERAL = /^-?\d+$/;
const NUMERIC_START = /^-?\d/;

const I32_MIN = -(2n ** 31n);
const I32_MAX = 2n ** 31n - 1n;
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
  r: '\r',
};

/**
 * Parse exactly one expression. Surrounding whitespace is allowed; anything
 * else left over is an error.
 */
export function parse(source: string): Expr {
  const reader = new Reader(source);
  return reader.parseSingle();
}

/**
 * Parse a sequence of top-level expressions (a file or multi-form input).
 */
export function parseProgram(source: string): Expr[] {
  const reader = new Reader(source);
  return reader.parseAll();
}

/**
 * Parse a standalone type annotation such as `fn(i32) -> bool`.
 */
export function parseType(source: string): SprigType {
  const reader = new Reader(source);
  return reader.parseStandaloneType();
}

interface ReaderState {
  pos: number;
  line: number;
  column: number;
}

class Reader {
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 0;

  constructor(source: string) {
    this.source = source;
  }

  parseSingle(): Expr {
    this.skipWhitespace();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input', this.loc());
    }
    const expr = this.parseExpr();
    this.expectEnd();
    return expr;
  }

  parseAll(): Expr[] {
    const exprs: Expr[] = [];
    this.skipWhitespace();
    while (!this.atEnd()) {
      exprs.push(this.parseExpr());
      this.skipWhitespace();
    }
    return exprs;
  }

  parseStandaloneType(): SprigType {
    const type = this.parseTypeAnnotation();
    this.expectEnd();
    return type;
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  private parseExpr(): Expr {
    this.skipWhitespace();
    const loc = this.loc();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input', loc);
    }
    const ch = this.peek();
    if (ch === '(') return this.parseList();
    if (ch === ')') {
      throw new SprigParseError('UnmatchedParen', "Unmatched parenthesis: unexpected ')'", loc);
    }
    if (ch === '"') return this.parseString();
    if (!SYMBOL_CHAR.test(ch)) {
      throw new SprigParseError('GenericParseFailure', `Unexpected character '${ch}'`, loc);
    }
    return this.classifyAtom(this.readToken(), loc);
  }

  private classifyAtom(token: string, loc: SourceLocation): Expr {
    if (token === 'true') return { kind: 'bool', value: true, loc };
    if (token === 'false') return { kind: 'bool', value: false, loc };
    if (FLOAT_LITERAL.test(token)) return { kind: 'float', value: Number(token), loc };
    if (INT_LITERAL.test(token)) return this.integerLiteral(token, loc);
    if (NUMERIC_START.test(token)) {
      throw new SprigParseError('InvalidNumber', `Invalid number: ${token}`, loc);
    }
    return { kind: 'symbol', name: token, loc };
  }

  /** Small literals stay 32-bit; anything wider becomes 64-bit. */
  private integerLiteral(token: string, loc: SourceLocation): Expr {
    const n = BigInt(token);
    if (n >= I32_MIN && n <= I32_MAX) return { kind: 'i32', value: Number(n), loc };
    if (n >= I64_MIN && n <= I64_MAX) return { kind: 'i64', value: n, loc };
    throw new SprigParseError('InvalidNumber', `Invalid number: ${token} is out of i64 range`, loc);
  }

  private parseString(): Expr {
    const loc = this.loc();
    this.advance(); // opening quote
    let value = '';
    for (;;) {
      if (this.atEnd()) {
        throw new SprigParseError('InvalidString', 'Invalid string: unterminated string literal', loc);
      }
      const ch = this.advance();
      if (ch === '"') break;
      if (ch === '\\') {
        if (this.atEnd()) {
          throw new SprigParseError('InvalidString', 'Invalid string: unterminated string literal', loc);
        }
        const escaped = this.advance();
        const decoded = ESCAPES[escaped];
        if (decoded === undefined) {
          throw new SprigParseError('InvalidString', `Invalid string: unknown escape sequence \\${escaped}`, loc);
        }
        value += decoded;
        continue;
      }
      value += ch;
    }
    return { kind: 'string', value, loc };
  }

  private parseList(): Expr {
    const loc = this.loc();
    this.advance(); // (
    this.skipWhitespace();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input: unclosed list', loc);
    }
    if (this.peek() === ')') {
      this.advance();
      return { kind: 'list', elements: [], loc };
    }

    const first = this.parseExpr();
    if (first.kind === 'symbol') {
      switch (first.name) {
        case 'if': return this.parseIf(loc);
        case 'let': return this.parseLet(loc);
        case 'defn': return this.parseDefn(loc);
        case 'fn':
        case 'lambda':
          return this.parseLambda(first.name, loc);
      }
    }

    const elements: Expr[] = [first];
    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) {
        throw new SprigParseError('UnexpectedEof', 'Unexpected end of input: unclosed list', loc);
      }
      if (this.peek() === ')') {
        this.advance();
        break;
      }
      elements.push(this.parseExpr());
    }
    return { kind: 'list', elements, loc };
  }

  // ==================================================================
  // Special forms
  // ==================================================================

  private parseIf(loc: SourceLocation): Expr {
    const shape = 'a condition, a then branch and an else branch';
    const condition = this.operand('if', shape);
    const thenBranch = this.operand('if', shape);
    const elseBranch = this.operand('if', shape);
    this.closeForm('if', shape, loc);
    return { kind: 'if', condition, thenBranch, elseBranch, loc };
  }

  /**
   * (let name [:] [Type] value [body])
   */
  private parseLet(loc: SourceLocation): Expr {
    const name = this.parseName('let');
    this.skipWhitespace();
    if (this.peek() === ':') {
      this.advance();
    }
    const annotation = this.tryTypeAnnotation();
    const value = this.operand('let', 'a value');
    this.skipWhitespace();
    let body: Expr | null = null;
    if (!this.atEnd() && this.peek() !== ')') {
      body = this.parseExpr();
    }
    this.closeForm('let', 'a name, an optional type, a value and an optional body', loc);
    return { kind: 'let', name: name.name, annotation, value, body, loc };
  }

  /**
   * (defn name [param: Type ...] -> Type body)
   */
  private parseDefn(loc: SourceLocation): Expr {
    const name = this.parseName('defn');
    const params = this.parseParams('defn');
    this.skipWhitespace();
    if (!this.source.startsWith('->', this.pos)) {
      this.failAtCursor('defn expects a return type (-> Type)');
    }
    this.advance();
    this.advance();
    const returnType = this.parseTypeAnnotation();
    const body = this.operand('defn', 'a body');
    this.closeForm('defn', 'a name, parameters, a return type and a body', loc);
    return { kind: 'defn', name: name.name, params, returnType, body, loc };
  }

  /**
   * (fn [param: Type ...] [-> Type] body), also spelled `lambda`
   */
  private parseLambda(form: string, loc: SourceLocation): Expr {
    const params = this.parseParams(form);
    this.skipWhitespace();
    let returnType: SprigType | null = null;
    if (this.source.startsWith('->', this.pos)) {
      this.advance();
      this.advance();
      returnType = this.parseTypeAnnotation();
    }
    const body = this.operand(form, 'a body');
    this.closeForm(form, 'parameters, an optional return type and a body', loc);
    return { kind: 'lambda', params, returnType, body, loc };
  }

  private parseParams(form: string): Param[] {
    this.skipWhitespace();
    if (this.peek() !== '[') {
      this.failAtCursor(`${form} expects a parameter list`);
    }
    this.advance();
    const params: Param[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) {
        throw new SprigParseError('UnexpectedEof', 'Unexpected end of input: unclosed parameter list', this.loc());
      }
      if (this.peek() === ']') {
        this.advance();
        return params;
      }
      const { name, loc } = this.parseName(form);
      this.skipWhitespace();
      if (this.peek() !== ':') {
        this.failAtCursor(`parameter '${name}' needs a type annotation`);
      }
      this.advance();
      const type = this.parseTypeAnnotation();
      params.push({ name, type, loc });
    }
  }

  private parseName(form: string): { name: string; loc: SourceLocation } {
    this.skipWhitespace();
    const loc = this.loc();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input', loc);
    }
    const token = this.readToken();
    if (token === '') {
      this.failAtCursor(`${form} expects a name`);
    }
    const atom = this.classifyAtom(token, loc);
    if (atom.kind !== 'symbol') {
      throw new SprigParseError('UnexpectedInput', `Unexpected input: ${form} expects a name, found '${token}'`, loc);
    }
    return { name: atom.name, loc };
  }

  /** A sub-expression that a special form requires. */
  private operand(form: string, shape: string): Expr {
    this.skipWhitespace();
    if (!this.atEnd() && this.peek() === ')') {
      this.failAtCursor(`${form} expects ${shape}`);
    }
    return this.parseExpr();
  }

  private closeForm(form: string, shape: string, loc: SourceLocation): void {
    this.skipWhitespace();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', `Unexpected end of input: unclosed ${form} form`, loc);
    }
    if (this.peek() !== ')') {
      this.failAtCursor(`${form} expects ${shape}`);
    }
    this.advance();
  }

  // ==================================================================
  // Types
  // ==================================================================

  private parseTypeAnnotation(): SprigType {
    this.skipWhitespace();
    const loc = this.loc();
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input: expected a type', loc);
    }
    const word = this.readTypeWord();
    if (word === '') {
      throw new SprigParseError('InvalidType', `Invalid type: expected a type, found '${this.snippet()}'`, loc);
    }
    if (word === 'fn') return this.parseFunctionType();
    const type = lookupTypeName(word);
    if (type === null) {
      throw new SprigParseError('InvalidType', `Invalid type: ${word}`, loc);
    }
    return type;
  }

  /** fn(T, ...) -> R, after the `fn` keyword has been read. */
  private parseFunctionType(): SprigType {
    this.skipWhitespace();
    if (this.peek() !== '(') {
      throw new SprigParseError('InvalidType', "Invalid type: expected '(' after fn", this.loc());
    }
    this.advance();
    const params: SprigType[] = [];
    this.skipWhitespace();
    if (this.peek() === ')') {
      this.advance();
    } else {
      for (;;) {
        params.push(this.parseTypeAnnotation());
        this.skipWhitespace();
        const sep = this.peek();
        if (sep === ',') {
          this.advance();
          continue;
        }
        if (sep === ')') {
          this.advance();
          break;
        }
        if (this.atEnd()) {
          throw new SprigParseError('UnexpectedEof', 'Unexpected end of input: unclosed function type', this.loc());
        }
        throw new SprigParseError('InvalidType', `Invalid type: expected ',' or ')', found '${sep}'`, this.loc());
      }
    }
    this.skipWhitespace();
    if (!this.source.startsWith('->', this.pos)) {
      throw new SprigParseError('InvalidType', "Invalid type: expected '->' in function type", this.loc());
    }
    this.advance();
    this.advance();
    const returnType = this.parseTypeAnnotation();
    return { kind: 'function', params, returnType };
  }

  /**
   * Optional annotation in a `let`. Backtracks when the next token is not a
   * type, or when it is the last thing before `)` and must be the value.
   */
  private tryTypeAnnotation(): SprigType | null {
    this.skipWhitespace();
    const start = this.save();
    const word = this.readTypeWord();
    const boundary = this.atEnd() || !SYMBOL_CHAR.test(this.peek());
    if (word === '' || !boundary) {
      this.restore(start);
      return null;
    }

    let type: SprigType;
    if (word === 'fn') {
      this.skipWhitespace();
      if (this.peek() !== '(') {
        this.restore(start);
        return null;
      }
      type = this.parseFunctionType();
    } else {
      const named = lookupTypeName(word);
      if (named === null) {
        this.restore(start);
        return null;
      }
      type = named;
    }

    this.skipWhitespace();
    if (this.atEnd() || this.peek() === ')') {
      this.restore(start);
      return null;
    }
    return type;
  }

  // ==================================================================
  // Cursor
  // ==================================================================

  private readToken(): string {
    const start = this.pos;
    while (!this.atEnd() && SYMBOL_CHAR.test(this.peek())) {
      this.advance();
    }
    return this.source.slice(start, this.pos);
  }

  private readTypeWord(): string {
    const start = this.pos;
    while (!this.atEnd() && TYPE_WORD_CHAR.test(this.peek())) {
      this.advance();
    }
    return this.source.slice(start, this.pos);
  }

  private expectEnd(): void {
    this.skipWhitespace();
    if (!this.atEnd()) {
      throw new SprigParseError('UnexpectedInput', `Unexpected input: ${this.snippet()}`, this.loc());
    }
  }

  private failAtCursor(expectation: string): never {
    if (this.atEnd()) {
      throw new SprigParseError('UnexpectedEof', 'Unexpected end of input', this.loc());
    }
    throw new SprigParseError('UnexpectedInput', `Unexpected input: ${expectation}, found '${this.snippet()}'`, this.loc());
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && WHITESPACE.test(this.peek())) {
      this.advance();
    }
  }

  private peek(): string {
    return this.source[this.pos] ?? '';
  }

  private advance(): string {
    const ch = this.source[this.pos++] ?? '';
    if (ch === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return ch;
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private loc(): SourceLocation {
    return { line: this.line, column: this.column };
  }

  private snippet(): string {
    const rest = this.source.slice(this.pos);
    return rest.length > 20 ? rest.slice(0, 20) + '...' : rest;
  }

  private save(): ReaderState {
    return { pos: this.pos, line: this.line, column: this.column };
  }

  private restore(state: ReaderState): void {
    this.pos = state.pos;
    this.line = state.line;
    this.column = state.column;
  }
}
