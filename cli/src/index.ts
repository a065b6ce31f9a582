/**
 * Sprig pipeline, REPL and command implementations.
 */

export { run, formatResult, RunResult, Session, SessionBinding } from './session';
export { Repl, ReplIO, hasUnclosedDelimiters, startRepl, PROMPT, VERSION } from './repl';
export { runSource, runFile, runCheck, runFormatter, runLinter } from './commands';
