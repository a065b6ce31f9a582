/**
 * Document analysis behind the Sprig language server: diagnostics, the
 * top-level declarations with their static types, hover text and
 * completion items. Everything here is pure so it can run without a
 * client connection.
 */

import {
  CompletionItem,
  CompletionItemKind,
  Diagnostic as LspDiagnostic,
  DiagnosticSeverity,
  Range,
} from "vscode-languageserver/node";
import {
  BUILTINS,
  Expr,
  SPECIAL_FORMS,
  SprigError,
  SprigType,
  parseProgram,
  typeNames,
  typeToString,
} from "@sprig/interpreter";
import { TypeChecker } from "@sprig/typechecker";

const SYMBOL_CHAR = /[\p{L}\p{N}+\-*/<>=!&|_?.]/u;

export interface DeclarationInfo {
  name: string;
  kind: "function" | "value";
  /** 0-based */
  line: number;
  /** 0-based */
  column: number;
  type: SprigType | null;
}

export interface DocumentAnalysis {
  diagnostics: LspDiagnostic[];
  declarations: DeclarationInfo[];
}

export interface SymbolAtPosition {
  name: string;
  range: Range;
}

// -- Validation ---------------------------------------------------------------

/**
 * Parse and type-check a document. A parse failure yields one diagnostic;
 * otherwise every top-level form is checked in order and reports at most
 * one error.
 */
export function analyzeDocument(text: string): DocumentAnalysis {
  let program: Expr[];
  try {
    program = parseProgram(text);
  } catch (e) {
    if (!(e instanceof SprigError)) throw e;
    return { diagnostics: [toLspDiagnostic(text, e, "sprig-parser")], declarations: [] };
  }

  const checker = new TypeChecker();
  const diagnostics: LspDiagnostic[] = [];
  const declarations: DeclarationInfo[] = [];

  for (const form of program) {
    try {
      checker.checkForm(form);
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      diagnostics.push(toLspDiagnostic(text, e, "sprig-typechecker"));
      continue;
    }
    if (form.kind === "defn" || (form.kind === "let" && form.body === null)) {
      declarations.push({
        name: form.name,
        kind: form.kind === "defn" ? "function" : "value",
        line: form.loc.line - 1,
        column: form.loc.column,
        type: checker.getEnv().lookup(form.name),
      });
    }
  }

  return { diagnostics, declarations };
}

function toLspDiagnostic(text: string, e: SprigError, source: string): LspDiagnostic {
  const line = (e.line ?? 1) - 1;
  const character = e.column ?? 0;
  const symbol = symbolAt(text, line, character);
  return {
    severity: DiagnosticSeverity.Error,
    range: symbol?.range ?? {
      start: { line, character },
      end: { line, character: character + 1 },
    },
    message: e.detail,
    source,
  };
}

// -- Positions ----------------------------------------------------------------

/**
 * The symbol token covering a 0-based position, if any.
 */
export function symbolAt(text: string, line: number, character: number): SymbolAtPosition | null {
  const lineText = text.split("\n")[line];
  if (lineText === undefined) return null;

  let start = character;
  if (!isSymbolChar(lineText[start])) {
    // Cursor just past the end of a token
    if (start > 0 && isSymbolChar(lineText[start - 1])) start--;
    else return null;
  }
  while (start > 0 && isSymbolChar(lineText[start - 1])) start--;
  let end = start;
  while (end < lineText.length && isSymbolChar(lineText[end])) end++;

  return {
    name: lineText.slice(start, end),
    range: {
      start: { line, character: start },
      end: { line, character: end },
    },
  };
}

function isSymbolChar(ch: string | undefined): boolean {
  return ch !== undefined && SYMBOL_CHAR.test(ch);
}

// -- Hover --------------------------------------------------------------------

const KEYWORD_HOVERS: Record<string, string> = {
  if: "**if** — Conditional\n\n`(if condition then else)`; the condition must be `bool`.",
  let: "**let** — Binding\n\n`(let name [Type] value [body])`; without a body the name stays defined.",
  defn: "**defn** — Function definition\n\n`(defn name [param: Type ...] -> Type body)`",
  fn: "**fn** — Anonymous function\n\n`(fn [param: Type ...] [-> Type] body)`",
  lambda: "**lambda** — Anonymous function\n\nSame as `fn`.",
};

/**
 * Markdown hover for a name: a declaration in the document, a built-in,
 * or a special-form keyword.
 */
export function hoverText(analysis: DocumentAnalysis, name: string): string | null {
  const decl = analysis.declarations.find(d => d.name === name);
  if (decl) {
    const type = decl.type ? typeToString(decl.type) : "_";
    return `**${decl.kind}** \`${name}\`: \`${type}\``;
  }

  const builtin = BUILTINS.find(b => b.name === name);
  if (builtin) {
    return `**builtin** \`${name}\`: \`${typeToString(builtin.signature)}\``;
  }

  return KEYWORD_HOVERS[name] ?? null;
}

/**
 * The top-level declaration of `name`, if the document has one.
 */
export function findDeclaration(analysis: DocumentAnalysis, name: string): DeclarationInfo | null {
  return analysis.declarations.find(d => d.name === name) ?? null;
}

// -- Completion ---------------------------------------------------------------

export function completionItems(analysis: DocumentAnalysis): CompletionItem[] {
  const completions: CompletionItem[] = [];

  for (const keyword of SPECIAL_FORMS) {
    completions.push({ label: keyword, kind: CompletionItemKind.Keyword, detail: "Special form" });
  }

  for (const decl of analysis.declarations) {
    completions.push({
      label: decl.name,
      kind: decl.kind === "function" ? CompletionItemKind.Function : CompletionItemKind.Variable,
      detail: decl.type ? typeToString(decl.type) : undefined,
    });
  }

  for (const builtin of BUILTINS) {
    completions.push({
      label: builtin.name,
      kind: CompletionItemKind.Function,
      detail: typeToString(builtin.signature),
    });
  }

  for (const name of typeNames()) {
    completions.push({ label: name, kind: CompletionItemKind.TypeParameter, detail: "Type" });
  }

  return completions;
}
