/**
 * Tool handlers for the Sprig MCP server.
 *
 * Each handler takes the tool's arguments and returns MCP text content
 * holding a JSON document, so they can be called directly without a
 * transport.
 */

import {
  Expr,
  SprigError,
  parseProgram,
  typeToString,
} from "@sprig/interpreter";
import { TypeChecker } from "@sprig/typechecker";
import { format, render } from "@sprig/formatter";
import { Session, formatResult } from "@sprig/cli";

export interface ToolError {
  stage: "parse" | "type";
  line: number;
  column: number;
  message: string;
}

export interface ToolResponse {
  content: Array<{ type: "text"; text: string }>;
}

function respond(result: object): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

function toolError(stage: ToolError["stage"], e: SprigError): ToolError {
  return {
    stage,
    line: e.line ?? 1,
    column: e.column ?? 0,
    message: e.detail,
  };
}

/**
 * Parse a program, turning a parse failure into a tool error. Anything
 * that is not a SprigError propagates.
 */
function parseOrError(code: string): { program: Expr[] } | { error: ToolError } {
  try {
    return { program: parseProgram(code) };
  } catch (e) {
    if (e instanceof SprigError) return { error: toolError("parse", e) };
    throw e;
  }
}

// -- AST summary --------------------------------------------------------------

const MAX_SUMMARY_DEPTH = 8;

function leafText(expr: Expr): string | null {
  switch (expr.kind) {
    case "i32":
    case "i64":
    case "float":
    case "bool":
      return render(expr);
    case "string":
      return JSON.stringify(expr.value);
    case "symbol":
      return expr.name;
    default:
      return null;
  }
}

/**
 * Compact S-expression view of the node kinds, e.g.
 * `(defn sq (params (n i32)) i32 (list (symbol *) (symbol n) (symbol n)))`.
 */
export function summarize(expr: Expr, depth = 0): string {
  const leaf = leafText(expr);
  if (leaf !== null) return `(${expr.kind} ${leaf})`;
  if (depth >= MAX_SUMMARY_DEPTH) return `(${expr.kind} ...)`;

  const sub = (e: Expr) => summarize(e, depth + 1);
  switch (expr.kind) {
    case "list":
      return expr.elements.length === 0
        ? "(list)"
        : `(list ${expr.elements.map(sub).join(" ")})`;
    case "call":
      return `(call ${[expr.callee, ...expr.args].map(sub).join(" ")})`;
    case "if":
      return `(if ${sub(expr.condition)} ${sub(expr.thenBranch)} ${sub(expr.elseBranch)})`;
    case "let": {
      const parts = [expr.name];
      if (expr.annotation) parts.push(typeToString(expr.annotation));
      parts.push(sub(expr.value));
      if (expr.body) parts.push(sub(expr.body));
      return `(let ${parts.join(" ")})`;
    }
    case "defn":
    case "lambda": {
      const params = expr.params
        .map((p) => `(${p.name} ${typeToString(p.type)})`)
        .join(" ");
      const parts: string[] = [];
      if (expr.kind === "defn") parts.push(expr.name);
      parts.push(params ? `(params ${params})` : "(params)");
      if (expr.returnType) parts.push(typeToString(expr.returnType));
      parts.push(sub(expr.body));
      return `(${expr.kind} ${parts.join(" ")})`;
    }
    default:
      return `(${expr.kind})`;
  }
}

// -- Handlers -----------------------------------------------------------------

export async function handleValidate(args: { code: string }): Promise<ToolResponse> {
  const parsed = parseOrError(args.code);
  if ("error" in parsed) {
    return respond({ valid: false, errors: [parsed.error] });
  }

  const errors: ToolError[] = new TypeChecker()
    .diagnose(parsed.program)
    .filter((d) => d.severity === "error")
    .map((d) => ({ stage: "type" as const, line: d.line, column: d.column, message: d.message }));

  return respond({ valid: errors.length === 0, errors });
}

export async function handleParse(args: { code: string }): Promise<ToolResponse> {
  const parsed = parseOrError(args.code);
  if ("error" in parsed) {
    return respond({ valid: false, forms: [], errors: [parsed.error] });
  }

  const forms = parsed.program.map((expr) => ({
    kind: expr.kind,
    line: expr.loc.line,
    column: expr.loc.column,
    text: render(expr),
    ast: summarize(expr),
  }));
  return respond({ valid: true, forms, errors: [] });
}

export async function handleExecute(args: { code: string }): Promise<ToolResponse> {
  const output: string[] = [];
  const session = new Session({ output: (text) => { output.push(text); } });

  try {
    const result = session.evaluateProgram(args.code);
    return respond({
      success: true,
      output: output.join(""),
      result: result ? formatResult(result) : null,
    });
  } catch (e) {
    if (e instanceof SprigError) {
      return respond({ success: false, output: output.join(""), error: e.message });
    }
    // Runaway recursion surfaces as a RangeError from the host.
    if (e instanceof RangeError) {
      return respond({ success: false, output: output.join(""), error: e.message });
    }
    throw e;
  }
}

export async function handleFormat(args: {
  code: string;
  indentSize?: number;
  maxLineWidth?: number;
}): Promise<ToolResponse> {
  try {
    const formatted = format(args.code, {
      ...(args.indentSize !== undefined ? { indentSize: args.indentSize } : {}),
      ...(args.maxLineWidth !== undefined ? { maxLineWidth: args.maxLineWidth } : {}),
    });
    return respond({ success: true, formatted, changed: formatted !== args.code });
  } catch (e) {
    if (e instanceof SprigError) {
      return respond({ success: false, error: toolError("parse", e) });
    }
    throw e;
  }
}
