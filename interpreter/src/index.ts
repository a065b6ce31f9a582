/**
 * Sprig core: syntax tree, parser, runtime values, environments and the evaluator.
 */

export * from './ast';
export * from './types';
export * from './errors';
export * from './values';
export { Environment } from './environment';
export { parse, parseProgram, parseType } from './parser';
export { BUILTINS, BUILTIN_NAMES, BuiltinDefinition, registerBuiltins } from './builtins';
export { Interpreter, InterpreterOptions, OutputSink } from './interpreter';
