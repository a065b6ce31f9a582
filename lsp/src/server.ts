#!/usr/bin/env node
/**
 * Sprig Language Server
 *
 * LSP server providing diagnostics, hover, go-to-definition, and completion
 * for the Sprig language. Uses the Sprig parser and type checker.
 */

import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeParams,
  InitializeResult,
  TextDocumentSyncKind,
  Hover,
  MarkupKind,
  CompletionItem,
  TextDocumentPositionParams,
  DefinitionParams,
  Location,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import {
  DocumentAnalysis,
  analyzeDocument,
  completionItems,
  findDeclaration,
  hoverText,
  symbolAt,
} from "./analysis";

// -- Connection setup ---------------------------------------------------------

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

/** Cache of analyses keyed by document URI */
const analyses = new Map<string, DocumentAnalysis>();

// -- Initialization -----------------------------------------------------------

connection.onInitialize((_params: InitializeParams): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Full,
      hoverProvider: true,
      definitionProvider: true,
      completionProvider: {
        triggerCharacters: ["("],
        resolveProvider: false,
      },
    },
    serverInfo: {
      name: "sprig-lsp",
      version: "0.1.0",
    },
  };
});

// -- Document management ------------------------------------------------------

documents.onDidChangeContent((change) => {
  validateDocument(change.document);
});

documents.onDidClose((event) => {
  analyses.delete(event.document.uri);
  void connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] });
});

function validateDocument(document: TextDocument): void {
  const analysis = analyzeDocument(document.getText());
  analyses.set(document.uri, analysis);
  void connection.sendDiagnostics({ uri: document.uri, diagnostics: analysis.diagnostics });
}

// -- Hover --------------------------------------------------------------------

connection.onHover((params: TextDocumentPositionParams): Hover | null => {
  const document = documents.get(params.textDocument.uri);
  const analysis = analyses.get(params.textDocument.uri);
  if (!document || !analysis) return null;

  const symbol = symbolAt(document.getText(), params.position.line, params.position.character);
  if (!symbol) return null;

  const value = hoverText(analysis, symbol.name);
  if (!value) return null;

  return {
    contents: { kind: MarkupKind.Markdown, value },
    range: symbol.range,
  };
});

// -- Go to Definition ---------------------------------------------------------

connection.onDefinition((params: DefinitionParams): Location | null => {
  const document = documents.get(params.textDocument.uri);
  const analysis = analyses.get(params.textDocument.uri);
  if (!document || !analysis) return null;

  const symbol = symbolAt(document.getText(), params.position.line, params.position.character);
  if (!symbol) return null;

  const decl = findDeclaration(analysis, symbol.name);
  if (!decl) return null;

  return {
    uri: params.textDocument.uri,
    range: {
      start: { line: decl.line, character: decl.column },
      end: { line: decl.line, character: decl.column + 1 },
    },
  };
});

// -- Completion ---------------------------------------------------------------

connection.onCompletion((params: TextDocumentPositionParams): CompletionItem[] => {
  const analysis = analyses.get(params.textDocument.uri);
  return completionItems(analysis ?? { diagnostics: [], declarations: [] });
});

// -- Start --------------------------------------------------------------------

documents.listen(connection);
connection.listen();
