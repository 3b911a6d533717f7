/**
 * @module diagnostics
 *
 * Structured diagnostics shared by the lexer, the parser and the CLI.
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticBuilder,
  Diagnostics,
  describeFound,
  formatDiagnostic,
  hasErrors,
  type Diagnostic,
  type SyntaxError,
  type SyntaxErrorKind,
} from './diagnostics.js';
