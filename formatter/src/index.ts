/**
 * Sprig code formatter: canonical rendering and width-aware pretty printing.
 */

export { format, formatExpr, render, FormatOptions, DEFAULT_FORMAT_OPTIONS } from './formatter';
