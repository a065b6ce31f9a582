export { TypeChecker, typeCheck } from './checker';
export { TypeEnvironment } from './type-env';
export {
  Diagnostic,
  Severity,
  diagnosticFromError,
  formatDiagnostic,
  formatDiagnostics,
} from './diagnostics';
export * from './types';
