import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'manifest' | 'platform' | 'dependency' | 'filesystem' | 'engine';

/** Several diagnostics raised at once, e.g. everything wrong with a manifest. */
export class DiagnosticsError extends Error {
  constructor(readonly diagnostics: readonly Diagnostic[]) {
    super(diagnostics[0]?.message ?? 'diagnostics reported');
    this.name = 'DiagnosticsError';
  }
}

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.length > 0 && value.every(isDiagnostic);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('M')) return 'manifest';
  if (code.startsWith('P')) return 'platform';
  if (code.startsWith('D')) return 'dependency';
  if (code.startsWith('A')) return 'filesystem';
  return 'engine';
}

function hintFor(code: DiagnosticCode): string {
  switch (classify(code)) {
    case 'manifest':
      return 'fix the project manifest and try again';
    case 'platform':
      return 'check the platforms and channels declared in the manifest';
    case 'dependency':
      return 'check the dependency specifications of the project';
    case 'filesystem':
      return 'check that the work directory exists and is writable';
    case 'engine':
      return 're-run with --log-level debug to see the output of rattler-build';
  }
}

function printDiagnostics(diags: readonly Diagnostic[]): void {
  for (const diag of diags) {
    logError(`[${diag.code}] ${diag.message}`);
    logWarn(diag.help ?? hintFor(diag.code));
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`file not found: ${error.message}`);
      break;
    default:
      logError(`file system error (${code}): ${error.message}`);
      break;
  }
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
  } else if (error instanceof DiagnosticsError) {
    printDiagnostics(error.diagnostics);
  } else if (isDiagnosticArray(error)) {
    printDiagnostics(error);
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('an unknown error occurred');
  }

  process.exit(1);
}
