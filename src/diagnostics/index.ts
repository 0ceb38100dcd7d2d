/**
 * @module diagnostics
 *
 * Structured errors raised by the backends and rendered into JSON-RPC error
 * payloads.
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  formatDiagnostic,
  renderDiagnosticReport,
  isDiagnosticError,
} from './diagnostics.js';
export type { Diagnostic, DiagnosticReport } from './diagnostics.js';
