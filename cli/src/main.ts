#!/usr/bin/env node
/**
 * Sprig command-line entry point.
 *
 * Usage: sprig <file.sprig>
 *        sprig run <file.sprig>
 *        sprig check <file.sprig> [...]
 *        sprig repl
 *        sprig fmt <file.sprig> [...]
 *        sprig lint <file.sprig> [...]
 *        sprig --eval "<code>"
 */

import { runCheck, runFile, runFormatter, runLinter, runSource } from './commands';
import { startRepl, VERSION } from './repl';

export function main(args: string[]): number | null {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  switch (args[0]) {
    case 'check':
      return runCheck(args.slice(1));
    case 'repl':
      startRepl();
      return null; // the REPL runs its own event loop
    case 'fmt':
      return runFormatter(args.slice(1));
    case 'lint':
      return runLinter(args.slice(1));
    case '--eval':
    case '-e':
      if (args.length < 2) {
        console.error('Error: --eval requires a code argument');
        return 1;
      }
      return runSource(args[1], true);
    case 'run':
      if (args.length < 2) {
        console.error('Error: run requires a file argument');
        return 1;
      }
      return runFile(args[1]);
    default:
      // `sprig <file.sprig>` (shorthand)
      return runFile(args[0]);
  }
}

function printUsage(): void {
  console.log(`Sprig v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  sprig <file.sprig>                          Run a Sprig file');
  console.log('  sprig run <file.sprig>                      Run a Sprig file');
  console.log('  sprig check <file.sprig> [...]              Check files for parse and type errors');
  console.log('  sprig repl                                  Start interactive REPL');
  console.log('  sprig fmt <file.sprig> [--check] [--stdout] Format Sprig files');
  console.log('  sprig lint <file.sprig> [...]               Lint Sprig files');
  console.log('  sprig --eval "<code>"                       Evaluate inline code');
  console.log('  sprig --help                                Show this help');
}

if (require.main === module) {
  const code = main(process.argv.slice(2));
  if (code !== null) process.exitCode = code;
}
