/**
 * Error taxonomy for spotkube
 * Structured error codes whose messages are rendered from context
 */

/**
 * Error categories, one per failure class of the provisioning workflow
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  STATE = 'STATE',
  ALLOCATION = 'ALLOCATION',
  PROVIDER = 'PROVIDER',
  READINESS = 'READINESS',
  BOOTSTRAP = 'BOOTSTRAP',
  REMOTE = 'REMOTE',
  TEARDOWN = 'TEARDOWN'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // Operation aborted
  ERROR = 'ERROR',        // Operation failed but a re-run may resume it
  WARNING = 'WARNING',    // Potential issue but operation succeeded
  INFO = 'INFO'
}

/**
 * Structured error code with metadata.
 * Messages may reference context keys as `{key}`.
 */
export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly possibleCauses?: string[];
  readonly suggestions?: string[];
}

/**
 * Registry of all known error codes
 */
export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  static register(errorCode: ErrorCode): void {
    this.codes.set(errorCode.code, errorCode);
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }
}

/**
 * Replace `{key}` placeholders with values from context.
 * Unknown keys are left untouched, arrays are joined with a comma.
 */
export function renderMessage(template: string, context: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
    if (!(key in context)) {
      return placeholder;
    }
    const value = context[key];
    return Array.isArray(value) ? value.map(v => String(v)).join(', ') : String(value);
  });
}

/**
 * Base structured error class
 */
export abstract class SpotkubeError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error
  ) {
    super(renderMessage(errorCode.message, context));

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly error details
   */
  getDetails(): {
    code: string;
    message: string;
    suggestions?: string[];
    context: Record<string, unknown>;
  } {
    const errorCode = ErrorCodeRegistry.get(this.code);

    return {
      code: this.code,
      message: this.message,
      suggestions: errorCode?.suggestions,
      context: this.context
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

/**
 * Missing or invalid configuration, raised before any provider call
 */
export class ConfigurationError extends SpotkubeError {}

/**
 * Ledger cannot be read, parsed or written
 */
export class StateError extends SpotkubeError {}

/**
 * Spot capacity request rejected or never fulfilled
 */
export class AllocationError extends SpotkubeError {}

/**
 * Provider returned something the workflow cannot use
 */
export class ProviderError extends SpotkubeError {}

/**
 * Node never became usable over the remote channel
 */
export class ReadinessError extends SpotkubeError {}

/**
 * Bootstrap agent reported a failure
 */
export class BootstrapError extends SpotkubeError {}

/**
 * Remote command exited with a non-zero status
 */
export class RemoteCommandError extends SpotkubeError {}

/**
 * Fatal teardown failure
 */
export class TeardownError extends SpotkubeError {}

/**
 * Type guard for spotkube errors
 */
export function isSpotkubeError(error: unknown): error is SpotkubeError {
  return error instanceof SpotkubeError;
}

/**
 * Extract error details safely from any error
 */
export function extractErrorDetails(error: unknown): {
  code?: string;
  message: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  suggestions?: string[];
  context?: Record<string, unknown>;
} {
  if (isSpotkubeError(error)) {
    const details = error.getDetails();
    return {
      code: details.code,
      message: details.message,
      category: error.category,
      severity: error.severity,
      suggestions: details.suggestions,
      context: details.context
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      context: { stack: error.stack }
    };
  }

  return {
    message: String(error),
    context: {}
  };
}
