/**
 * Domain Error Base Class
 * Structured errors with stable codes and retry information, shared by the
 * configuration loader, the reasoning-service providers and the context parser.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Configuration Errors (1xxx)
  | 'CONFIG_001' // Invalid axis definition
  | 'CONFIG_002' // Keyword file unreadable
  | 'CONFIG_003' // Invalid classifier settings
  // Validation Errors (2xxx)
  | 'VALID_001' // Malformed classification context
  // External Service Errors (5xxx)
  | 'EXT_001' // Arbitration request failed
  | 'EXT_002' // Arbitration timeout
  | 'EXT_003' // Rate limited
  | 'EXT_004' // Empty arbitration response
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Axis identifier if applicable */
  axisId?: string;
  /** File path if applicable */
  filePath?: string;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...rest } = this.context;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      context: cause ? { ...rest, cause: cause.message } : rest,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create a user-friendly error message (without sensitive details).
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export interface ConfigurationIssue {
  /** Dotted path of the offending value, e.g. "axes.2.labels.T_Foo" */
  path: string;
  message: string;
}

export class ConfigurationError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly issues: ConfigurationIssue[],
    code: ErrorCode = 'CONFIG_001',
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, issues }, false);
    this.code = code;
  }

  static invalidAxes(issues: ConfigurationIssue[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid axis configuration: ${issues.length} issue(s)`,
      issues
    );
  }

  static unreadableFile(filePath: string, cause?: Error): ConfigurationError {
    return new ConfigurationError(
      `Cannot read axis keyword file: ${filePath}`,
      [{ path: filePath, message: cause?.message ?? 'unreadable' }],
      'CONFIG_002',
      { filePath, cause }
    );
  }

  static invalidSettings(issues: ConfigurationIssue[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid classifier settings: ${issues.map((issue) => issue.message).join('; ')}`,
      issues,
      'CONFIG_003'
    );
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends DomainError {
  readonly code: ErrorCode = 'VALID_001';

  constructor(
    message: string,
    public readonly issues: ValidationIssue[],
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, issues }, false);
  }

  static malformedContext(issues: ValidationIssue[]): ValidationError {
    return new ValidationError(
      `Malformed classification context: ${issues.length} issue(s)`,
      issues
    );
  }
}

// ============================================================================
// Arbitration (External Service) Errors
// ============================================================================

export class ArbitrationError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly provider: string,
    context: DomainErrorContext = {},
    isRetryable = true
  ) {
    super(message, { ...context, provider }, isRetryable);
    this.code = code;
  }

  static requestFailed(provider: string, details?: string, cause?: Error): ArbitrationError {
    return new ArbitrationError(
      `Arbitration request failed${details ? ': ' + details : ''}`,
      'EXT_001',
      provider,
      { cause }
    );
  }

  static timeout(provider: string, timeoutMs: number): ArbitrationError {
    return new ArbitrationError(
      `${provider} request timed out after ${timeoutMs}ms`,
      'EXT_002',
      provider,
      { timeoutMs }
    );
  }

  static rateLimited(provider: string, retryAfter?: number): ArbitrationError {
    return new ArbitrationError(
      `Rate limited by ${provider}`,
      'EXT_003',
      provider,
      { retryAfter }
    );
  }

  static emptyResponse(provider: string): ArbitrationError {
    return new ArbitrationError(
      `${provider} returned an empty response`,
      'EXT_004',
      provider,
      {},
      false
    );
  }

  static disabled(provider: string): ArbitrationError {
    return new ArbitrationError(
      'Arbitration is disabled',
      'EXT_001',
      provider,
      {},
      false
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new UnknownError(message, { cause });
}
