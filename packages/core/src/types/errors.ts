/**
 * Error hierarchy for taxoforge
 * Structured errors carrying a stable code and the offending location.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // Repository path of the offending definition
  target?: string; // Path an operation was applied to
  operation?: string; // Description of the failing operation
  setting?: string; // Configuration key
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all taxoforge errors
 */
export abstract class TaxoforgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and context values
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return { ...rest, value: '[REDACTED]' };
  }
}

/**
 * A definition violates a structural invariant: unknown base, unknown
 * category, missing dictionary and the like.
 */
export class DefinitionError extends TaxoforgeError {
  constructor(params: ErrorParams & { context: ErrorContext & { path: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_DEFINITION,
    });
  }

  get path(): string {
    return this.context?.path ?? '';
  }
}

/**
 * Wraps any failure raised while applying an operation or materializing
 * the compiled schema.
 */
export class CompilationError extends TaxoforgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.COMPILATION_FAILED,
    });
  }
}

/**
 * Repository layout and parsing errors
 */
export class RepositoryError extends TaxoforgeError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_PATH });
  }
}

/**
 * Raised when two values of different shapes are compared
 */
export class DiffError extends TaxoforgeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INCOMPARABLE_VALUES,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends TaxoforgeError {
  constructor(params: ErrorParams<ErrorContext & { setting?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Schema server errors
 */
export class ClientError extends TaxoforgeError {
  constructor(params: ErrorParams<ErrorContext & { url?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SCHEMA_FETCH_FAILED,
    });
  }
}

/** Generic wrapper for unexpected failures surfaced to the CLI */
export class InternalError extends TaxoforgeError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR });
  }
}

export function isTaxoforgeError(error: unknown): error is TaxoforgeError {
  return error instanceof TaxoforgeError;
}

/** Coerce an unknown thrown value to an Error */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
