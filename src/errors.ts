/**
 * Error taxonomy for client generation
 *
 * Fatal errors stop a run before anything is written. Non-fatal errors are
 * converted to diagnostics, collected during the run and reported at the end.
 */

/**
 * Stable error codes for programmatic handling
 */
export enum ErrorCode {
  CONFIG = 'CONFIG_ERROR',
  DESCRIPTOR_SOURCE = 'DESCRIPTOR_SOURCE_ERROR',
  DISCOVERY_VALIDATION = 'DISCOVERY_VALIDATION_ERROR',
  OUTPUT_COLLISION = 'OUTPUT_COLLISION_ERROR',
  TYPE_MAPPING = 'TYPE_MAPPING_ERROR',
  GENERATION = 'GENERATION_ERROR',
  IO = 'IO_ERROR',
}

/**
 * Structured context attached to an error (file, route, option path, ...)
 */
export type ErrorDetails = Record<string, string | number | boolean | string[] | undefined>;

/**
 * Base class for all generator errors
 */
export abstract class TypedRoutesError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** Whether this error aborts the run */
  readonly fatal: boolean;
  /** Structured context about the failure */
  readonly details: ErrorDetails;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param fatal - Whether the error aborts the run
   * @param details - Structured context
   * @param cause - The original error that caused this error
   */
  constructor(
    message: string,
    code: ErrorCode,
    fatal: boolean,
    details: ErrorDetails = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.fatal = fatal;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed or missing configuration. Raised before any IR work begins.
 */
export class ConfigError extends TypedRoutesError {
  /** Option paths that failed validation, e.g. `output.strategy` */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, ErrorCode.CONFIG, true, { issues }, cause);
    this.issues = issues;
  }
}

/**
 * The descriptor source could not be read (unreachable backend, unparsable document).
 */
export class DescriptorSourceError extends TypedRoutesError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, ErrorCode.DESCRIPTOR_SOURCE, true, details, cause);
  }
}

/**
 * A folder-derived path parameter is missing from a route handler, or a
 * folder name cannot be resolved. Must stop the API from being served.
 */
export class DiscoveryValidationError extends TypedRoutesError {
  readonly file: string;
  readonly segment: string;
  readonly route: string | undefined;
  readonly parameter: string | undefined;

  constructor(
    message: string,
    context: { file: string; segment: string; route?: string; parameter?: string }
  ) {
    super(message, ErrorCode.DISCOVERY_VALIDATION, true, { ...context });
    this.file = context.file;
    this.segment = context.segment;
    this.route = context.route;
    this.parameter = context.parameter;
  }
}

/**
 * Two artifacts, or an artifact and a source file, would be written to the same path.
 */
export class OutputCollisionError extends TypedRoutesError {
  readonly outputPath: string;
  readonly claimants: string[];

  constructor(outputPath: string, claimants: string[]) {
    super(
      `Output collision at ${outputPath}: claimed by ${claimants.join(', ')}`,
      ErrorCode.OUTPUT_COLLISION,
      true,
      { outputPath, claimants }
    );
    this.outputPath = outputPath;
    this.claimants = claimants;
  }
}

/**
 * A source type has no mapping rule. The type degrades to the permissive type.
 */
export class TypeMappingError extends TypedRoutesError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.TYPE_MAPPING, false, details);
  }
}

/**
 * A single route or model failed to render and was replaced with a placeholder.
 */
export class GenerationError extends TypedRoutesError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, ErrorCode.GENERATION, false, details, cause);
  }
}

/**
 * A single artifact failed to write.
 */
export class IOError extends TypedRoutesError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to write ${path}: ${describeError(cause)}`, ErrorCode.IO, false, { path }, cause);
    this.path = path;
  }
}

export type DiagnosticSeverity = 'warning' | 'error';

/**
 * A collected non-fatal problem
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: ErrorCode;
  message: string;
  /** What the diagnostic is about: a model, route, field or file */
  subject: string;
}

/**
 * Append-only list of diagnostics for one run. Repeats of the same
 * diagnostic are dropped.
 */
export class DiagnosticCollector {
  private readonly entries: Diagnostic[] = [];
  private readonly seen = new Set<string>();

  /**
   * Record a non-fatal error. Type mapping problems are warnings, everything
   * else is reported as an error.
   */
  report(error: TypedRoutesError, subject: string): void {
    const key = `${error.code}\u0000${subject}\u0000${error.message}`;
    // A model rendered into several modules reports its problems once
    if (this.seen.has(key)) return;
    this.seen.add(key);

    this.entries.push({
      severity: error.code === ErrorCode.TYPE_MAPPING ? 'warning' : 'error',
      code: error.code,
      message: error.message,
      subject,
    });
  }

  warn(message: string, subject: string): void {
    this.report(new TypeMappingError(message), subject);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly Diagnostic[] {
    return this.entries;
  }

  /**
   * Return every diagnostic collected so far and empty the collector.
   */
  drain(): Diagnostic[] {
    this.seen.clear();
    return this.entries.splice(0, this.entries.length);
  }
}

/**
 * Check whether a value is one of the generator's own errors
 */
export function isTypedRoutesError(error: unknown): error is TypedRoutesError {
  return error instanceof TypedRoutesError;
}

/**
 * Check whether an error must stop the run
 */
export function isFatalError(error: unknown): boolean {
  if (isTypedRoutesError(error)) {
    return error.fatal;
  }
  // Anything we did not classify is treated as fatal
  return true;
}

/**
 * Extract a one-line description from any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors raised by Node itself may belong to another realm
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Format diagnostics as summary lines: `[warning] TYPE_MAPPING_ERROR User.avatar: ...`
 */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map(d => `[${d.severity}] ${d.code} ${d.subject}: ${d.message}`);
}
