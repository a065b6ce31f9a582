/**
 * Sprig code formatter.
 *
 * Parses source into the AST and prints it back in canonical form. A form
 * that fits within `maxLineWidth` stays on one line; a wider one keeps its
 * head on the first line and puts each remaining operand on its own line,
 * one indentation level deeper.
 */

import { Expr, Param, SprigType, parseProgram, typeToString } from '@sprig/interpreter';

export interface FormatOptions {
  /** Number of spaces per indentation level (default: 2) */
  indentSize: number;
  /** Max line width before a form is broken across lines */
  maxLineWidth: number;
  /** Blank lines before each top-level `defn` that follows another form */
  blankLinesBetweenDeclarations: number;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
  indentSize: 2,
  maxLineWidth: 80,
  blankLinesBetweenDeclarations: 1,
};

/**
 * Format Sprig source code. Throws SprigParseError for unparsable input.
 */
export function format(source: string, options?: Partial<FormatOptions>): string {
  const opts: FormatOptions = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const formatter = new SprigFormatter(opts);
  return formatter.formatProgram(parseProgram(source)).trimEnd() + '\n';
}

/**
 * Format a single expression without a trailing newline.
 */
export function formatExpr(expr: Expr, options?: Partial<FormatOptions>): string {
  return new SprigFormatter({ ...DEFAULT_FORMAT_OPTIONS, ...options }).formatNode(expr, 0);
}

/**
 * Canonical single-line text for an expression. Reading it back yields the
 * same tree apart from source positions.
 */
export function render(expr: Expr): string {
  switch (expr.kind) {
    case 'i32':
      return String(expr.value);
    case 'i64':
      return expr.value.toString();
    case 'float':
      return renderFloat(expr.value);
    case 'bool':
      return String(expr.value);
    case 'string':
      return renderString(expr.value);
    case 'symbol':
      return expr.name;
    case 'list':
      return `(${expr.elements.map(render).join(' ')})`;
    case 'call':
      return `(${[expr.callee, ...expr.args].map(render).join(' ')})`;
    case 'if':
      return `(if ${render(expr.condition)} ${render(expr.thenBranch)} ${render(expr.elseBranch)})`;
    case 'let':
      return `(${letHeader(expr.name, expr.annotation)} ${render(expr.value)}${expr.body ? ' ' + render(expr.body) : ''})`;
    case 'defn':
      return `(${defnHeader(expr.name, expr.params, expr.returnType)} ${render(expr.body)})`;
    case 'lambda':
      return `(${lambdaHeader(expr.params, expr.returnType)} ${render(expr.body)})`;
  }
}

// ================================================================
// Literal spelling
// ================================================================

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
};

function renderString(value: string): string {
  return `"${value.replace(/[\\"\n\t\r]/g, ch => ESCAPES[ch])}"`;
}

/**
 * Float literals always have digits on both sides of the point, so
 * exponent notation is expanded.
 */
function renderFloat(n: number): string {
  if (Object.is(n, -0)) return '-0.0';
  let text = String(n);
  const exp = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (exp) {
    const [, sign, whole, fraction = '', power] = exp;
    const digits = whole + fraction;
    const point = whole.length + Number(power);
    if (point <= 0) {
      text = `${sign}0.${'0'.repeat(-point)}${digits}`;
    } else if (point >= digits.length) {
      text = `${sign}${digits}${'0'.repeat(point - digits.length)}`;
    } else {
      text = `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
    }
  }
  return text.includes('.') ? text : `${text}.0`;
}

// ================================================================
// Form headers
// ================================================================

function renderParams(params: Param[]): string {
  return `[${params.map(p => `${p.name}: ${typeToString(p.type)}`).join(' ')}]`;
}

function letHeader(name: string, annotation: SprigType | null): string {
  return annotation ? `let ${name}: ${typeToString(annotation)}` : `let ${name}`;
}

function defnHeader(name: string, params: Param[], returnType: SprigType): string {
  return `defn ${name} ${renderParams(params)} -> ${typeToString(returnType)}`;
}

function lambdaHeader(params: Param[], returnType: SprigType | null): string {
  const ret = returnType ? ` -> ${typeToString(returnType)}` : '';
  return `fn ${renderParams(params)}${ret}`;
}

class SprigFormatter {
  private opts: FormatOptions;

  constructor(opts: FormatOptions) {
    this.opts = opts;
  }

  // ================================================================
  // Top level
  // ================================================================

  formatProgram(program: Expr[]): string {
    const parts: string[] = [];
    program.forEach((expr, i) => {
      if (i > 0 && expr.kind === 'defn') {
        for (let n = 0; n < this.opts.blankLinesBetweenDeclarations; n++) {
          parts.push('');
        }
      }
      parts.push(this.formatNode(expr, 0));
    });
    return parts.join('\n');
  }

  /**
   * Format a node whose first character sits at the given indentation level.
   */
  formatNode(expr: Expr, level: number): string {
    const flat = render(expr);
    if (level * this.opts.indentSize + flat.length <= this.opts.maxLineWidth) {
      return flat;
    }

    switch (expr.kind) {
      case 'list':
        if (expr.elements.length === 0) return flat;
        return this.breakForm(render(expr.elements[0]), expr.elements.slice(1), level);
      case 'call':
        return this.breakForm(render(expr.callee), expr.args, level);
      case 'if':
        return this.breakForm('if', [expr.condition, expr.thenBranch, expr.elseBranch], level);
      case 'let':
        return this.breakForm(letHeader(expr.name, expr.annotation), expr.body ? [expr.value, expr.body] : [expr.value], level);
      case 'defn':
        return this.breakForm(defnHeader(expr.name, expr.params, expr.returnType), [expr.body], level);
      case 'lambda':
        return this.breakForm(lambdaHeader(expr.params, expr.returnType), [expr.body], level);
      default:
        // Atoms never break.
        return flat;
    }
  }

  private breakForm(head: string, operands: Expr[], level: number): string {
    const pad = this.indent(level + 1);
    const body = operands.map(op => '\n' + pad + this.formatNode(op, level + 1)).join('');
    return `(${head}${body})`;
  }

  private indent(level: number): string {
    return ' '.repeat(level * this.opts.indentSize);
  }
}
