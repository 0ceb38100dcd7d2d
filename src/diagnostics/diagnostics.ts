// Structured diagnostics with error codes, help text and cause chains

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Manifest / configuration errors (M001-M099)
  M001_ManifestParseError = 'M001',
  M002_ManifestFileNotFound = 'M002',
  M003_InvalidPackageName = 'M003',
  M004_InvalidVersion = 'M004',
  M005_InvalidDependencySpec = 'M005',
  M006_InvalidTargetSelector = 'M006',
  M007_UnknownManifestField = 'M007',
  M008_ManifestSchemaViolation = 'M008',
  M009_MissingPackageName = 'M009',

  // Platform / channel errors (P001-P099)
  P001_UnknownPlatform = 'P001',
  P002_InvalidChannel = 'P002',
  P003_UnsupportedTargetPlatform = 'P003',

  // Dependency resolution errors (D001-D099)
  D001_RecursiveSourceDependency = 'D001',
  D002_InvalidMatchSpec = 'D002',
  D003_NoMatchingOutput = 'D003',

  // Rendered recipe artifact errors (A001-A099)
  A001_WorkDirectoryCreateFailed = 'A001',
  A002_RecipeWriteFailed = 'A002',
  A003_RecipeRemoveFailed = 'A003',

  // External engine errors (E001-E099)
  E001_EngineFailed = 'E001',
  E002_EngineOutputInvalid = 'E002',
  E003_PackageArchiveMissing = 'E003',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly help?: string;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic, options?: { cause?: unknown }) {
    super(diagnostic.message, options);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private help?: string;
  private cause?: unknown;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withHelp(help: string): DiagnosticBuilder {
    this.help = help;
    return this;
  }

  /** The underlying error, kept as the `cause` of the thrown error. */
  withCause(cause: unknown): DiagnosticBuilder {
    this.cause = cause;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    return this.help === undefined
      ? { severity: this.severity, code: this.code, message: this.message }
      : { severity: this.severity, code: this.code, message: this.message, help: this.help };
  }

  toError(): DiagnosticError {
    const diagnostic = this.build();
    return this.cause === undefined
      ? new DiagnosticError(diagnostic)
      : new DiagnosticError(diagnostic, { cause: this.cause });
  }

  throw(): never {
    throw this.toError();
  }
}

/**
 * JSON payload describing an error and everything that caused it. This is what
 * ends up in the `data` member of a JSON-RPC error response.
 */
export interface DiagnosticReport {
  readonly message: string;
  readonly code?: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly help?: string;
  readonly causes: readonly string[];
}

function messageOf(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function renderDiagnosticReport(error: unknown): DiagnosticReport {
  const causes: string[] = [];
  const seen = new Set<unknown>([error]);
  let current: unknown = error instanceof Error ? error.cause : undefined;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    causes.push(messageOf(current));
    current = current instanceof Error ? current.cause : undefined;
  }

  if (error instanceof DiagnosticError) {
    const { code, severity, message, help } = error.diagnostic;
    return help === undefined
      ? { message, code, severity, causes }
      : { message, code, severity, help, causes };
  }

  return { message: messageOf(error), severity: DiagnosticSeverity.Error, causes };
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  let result = `${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
  if (diagnostic.help) {
    result += `\n  help: ${diagnostic.help}`;
  }
  return result;
}

export function isDiagnosticError(error: unknown): error is DiagnosticError {
  return error instanceof DiagnosticError;
}
