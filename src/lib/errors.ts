/**
 * Structured Error Classes for kube-relay
 *
 * Every failure of a relay session is terminal. The controller raises one of
 * these after teardown and the CLI maps it to an exit status.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  SESSION_ACTIVE: 'SESSION_ACTIVE',

  PROVISIONING_FAILED: 'PROVISIONING_FAILED',
  RESOURCE_EXISTS: 'RESOURCE_EXISTS',

  READINESS_FAILED: 'READINESS_FAILED',
  READINESS_TIMEOUT: 'READINESS_TIMEOUT',

  TUNNEL_FAILED: 'TUNNEL_FAILED',
  TUNNEL_DIAGNOSTIC: 'TUNNEL_DIAGNOSTIC',

  TEARDOWN_FAILED: 'TEARDOWN_FAILED',
  INTERRUPTED: 'INTERRUPTED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Process exit statuses used by the CLI
 */
export const ExitCodes = {
  OK: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Base error class for all relay errors
 */
export class RelayError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  get exitCode(): ExitCode {
    return ExitCodes.FAILURE;
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Bad or missing input, raised before anything is provisioned
 */
export class ConfigurationError extends RelayError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    code: ErrorCode = ErrorCodes.CONFIGURATION_INVALID,
  ) {
    super(message, code, details, cause);
    this.name = 'ConfigurationError';
  }

  override get exitCode(): ExitCode {
    return ExitCodes.CONFIGURATION;
  }
}

export class ProvisioningError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.PROVISIONING_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ProvisioningError';
  }
}

export class ReadinessError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.READINESS_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ReadinessError';
  }
}

export class TunnelError extends RelayError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.TUNNEL_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'TunnelError';
  }
}

export class TeardownError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.TEARDOWN_FAILED, details, cause);
    this.name = 'TeardownError';
  }
}

/**
 * External interrupt (SIGINT / SIGTERM)
 */
export class InterruptedError extends RelayError {
  public readonly signal: string | undefined;

  constructor(signal?: string, details?: Record<string, unknown>) {
    super(
      signal ? `Interrupted by ${signal}` : 'Interrupted',
      ErrorCodes.INTERRUPTED,
      signal ? { signal, ...details } : details,
    );
    this.name = 'InterruptedError';
    this.signal = signal;
  }

  override get exitCode(): ExitCode {
    return ExitCodes.INTERRUPTED;
  }
}

/**
 * Type guard to check if an error is a RelayError
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Exit status for a terminal error
 */
export function exitCodeFor(error: unknown): ExitCode {
  return isRelayError(error) ? error.exitCode : ExitCodes.FAILURE;
}

/**
 * The InterruptedError an aborted cancellation signal carries
 */
export function interruptionOf(signal: AbortSignal): InterruptedError {
  const reason: unknown = signal.reason;
  return reason instanceof InterruptedError ? reason : new InterruptedError();
}
