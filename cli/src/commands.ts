/**
 * Implementations of the `sprig` subcommands. Each returns the process exit
 * code instead of exiting, and reports through the console.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SprigError, parseProgram } from '@sprig/interpreter';
import { TypeChecker, formatDiagnostic } from '@sprig/typechecker';
import { format, FormatOptions } from '@sprig/formatter';
import { createDefaultLinter, formatDiagnostic as formatLintDiagnostic, LintOptions } from '@sprig/linter';
import { Session, formatResult } from './session';

/**
 * Run a program. With `showResult`, the value of the last expression is
 * printed as `<value>: <type>`.
 */
export function runSource(source: string, showResult = false, session: Session = new Session()): number {
  try {
    const result = session.evaluateProgram(source);
    if (showResult && result) {
      console.log(formatResult(result));
    }
    return 0;
  } catch (e) {
    if (e instanceof SprigError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
}

export function runFile(file: string): number {
  const source = readFile(file);
  if (source === null) return 1;
  return runSource(source);
}

/**
 * Parse and type-check files without evaluating them.
 * Returns 0 if all files are clean, 1 if any have errors.
 */
export function runCheck(files: string[]): number {
  if (files.length === 0) {
    console.error('Error: check requires at least one file argument');
    return 1;
  }

  let hasAnyErrors = false;

  for (const file of files) {
    const source = readFile(file);
    if (source === null) {
      hasAnyErrors = true;
      continue;
    }

    try {
      const diagnostics = new TypeChecker().diagnose(parseProgram(source));
      if (diagnostics.length === 0) {
        console.log(`✓ ${file} - no errors`);
        continue;
      }
      hasAnyErrors = true;
      const count = diagnostics.length;
      console.log(`✗ ${file} - ${count} error${count === 1 ? '' : 's'}`);
      for (const d of diagnostics) {
        console.log(`  ${formatDiagnostic(d)}`);
      }
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      hasAnyErrors = true;
      console.log(`✗ ${file} - parse error`);
      console.log(`  ${e.message}`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

/**
 * Format files in place, or check/print them.
 */
export function runFormatter(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log('Usage: sprig fmt <file.sprig> [...] [--check] [--stdout] [--indent <n>] [--max-width <n>]');
    return 0;
  }

  let check = false;
  let toStdout = false;
  const options: Partial<FormatOptions> = {};
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--check':
        check = true;
        break;
      case '--stdout':
        toStdout = true;
        break;
      case '--indent': {
        const n = parseInt(args[++i], 10);
        if (isNaN(n) || n < 1 || n > 8) {
          console.error('Error: --indent must be a number between 1 and 8');
          return 1;
        }
        options.indentSize = n;
        break;
      }
      case '--max-width': {
        const n = parseInt(args[++i], 10);
        if (isNaN(n) || n < 20) {
          console.error('Error: --max-width must be at least 20');
          return 1;
        }
        options.maxLineWidth = n;
        break;
      }
      default:
        if (args[i].startsWith('-')) {
          console.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  if (files.length === 0) {
    console.error('Error: no files specified');
    return 1;
  }

  let allFormatted = true;

  for (const file of files) {
    const source = readFile(file);
    if (source === null) return 1;

    let formatted: string;
    try {
      formatted = format(source, options);
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      console.error(`Error formatting ${file}: ${e.message}`);
      return 1;
    }

    if (check) {
      if (source !== formatted) {
        console.log(`Would reformat: ${file}`);
        allFormatted = false;
      } else {
        console.log(`Already formatted: ${file}`);
      }
    } else if (toStdout) {
      process.stdout.write(formatted);
    } else if (source !== formatted) {
      fs.writeFileSync(path.resolve(file), formatted, 'utf-8');
      console.log(`Formatted: ${file}`);
    } else {
      console.log(`Unchanged: ${file}`);
    }
  }

  return check && !allFormatted ? 1 : 0;
}

/**
 * Lint files with the default rule set.
 */
export function runLinter(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log('Usage: sprig lint <file.sprig> [...] [--rule <name>] [--disable <name>] [--list-rules]');
    return 0;
  }

  const linter = createDefaultLinter();
  const files: string[] = [];
  const enabledRules: string[] = [];
  const disabledRules: string[] = [];

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--rule':
        enabledRules.push(args[++i]);
        break;
      case '--disable':
        disabledRules.push(args[++i]);
        break;
      case '--list-rules':
        console.log('Available rules:');
        for (const rule of linter.getRules()) {
          console.log(`  ${rule.name.padEnd(22)}${rule.description}`);
        }
        return 0;
      default:
        if (args[i].startsWith('-')) {
          console.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  const options: LintOptions = {};
  if (enabledRules.length > 0) options.enabledRules = enabledRules;
  if (disabledRules.length > 0) options.disabledRules = disabledRules;

  if (files.length === 0) {
    console.error('Error: no files specified');
    return 1;
  }

  let totalDiagnostics = 0;
  let totalErrors = 0;

  for (const file of files) {
    const source = readFile(file);
    if (source === null) return 1;

    const diagnostics = linter.lint(source, options);
    totalDiagnostics += diagnostics.length;
    totalErrors += diagnostics.filter(d => d.severity === 'error').length;

    if (diagnostics.length > 0) {
      console.log(`${file}:`);
      for (const d of diagnostics) {
        console.log(formatLintDiagnostic(d, file));
      }
      console.log('');
    }
  }

  const fileCount = `${files.length} file${files.length === 1 ? '' : 's'}`;
  if (totalDiagnostics === 0) {
    console.log(`All clean! ${fileCount} checked.`);
  } else {
    const warnings = totalDiagnostics - totalErrors;
    const parts: string[] = [];
    if (totalErrors > 0) parts.push(`${totalErrors} error${totalErrors === 1 ? '' : 's'}`);
    if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
    console.log(`Found ${parts.join(' and ')} in ${fileCount}.`);
  }

  return totalErrors > 0 ? 1 : 0;
}

function readFile(file: string): string | null {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    return null;
  }
  return fs.readFileSync(resolved, 'utf-8');
}
