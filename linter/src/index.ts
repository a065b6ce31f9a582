/**
 * Sprig linter: rule engine plus the built-in rule set.
 */

export {
  Linter,
  LintRule,
  LintOptions,
  Diagnostic,
  Severity,
  PARSE_ERROR_RULE,
  createDefaultLinter,
  formatDiagnostic,
} from './linter';
export { unusedBindingRule, references } from './rules/unused-binding';
export { missingReturnTypeRule } from './rules/missing-return-type';
export { shadowedBuiltinRule } from './rules/shadowed-builtin';
