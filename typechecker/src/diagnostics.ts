/**
 * Diagnostics produced by the Sprig type checker.
 */

import { SprigError } from '@sprig/interpreter';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  severity: Severity;
  message: string;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

/**
 * Turn a pipeline error into an error diagnostic. Errors without a position
 * are reported at the start of the input.
 */
export function diagnosticFromError(e: SprigError): Diagnostic {
  return {
    severity: 'error',
    message: e.detail,
    line: e.line ?? 1,
    column: e.column ?? 0,
  };
}

const TAGS: Record<Severity, string> = { error: 'ERROR', warning: 'WARN', info: 'INFO' };

/** `ERROR [line:col] message` */
export function formatDiagnostic(d: Diagnostic): string {
  return `${TAGS[d.severity]} [${d.line}:${d.column}] ${d.message}`;
}

/**
 * One diagnostic per line, ordered by position.
 */
export function formatDiagnostics(ds: Diagnostic[]): string {
  return [...ds]
    .sort((a, b) => a.line - b.line || a.column - b.column)
    .map(formatDiagnostic)
    .join('\n');
}
