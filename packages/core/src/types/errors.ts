/**
 * Error hierarchy for hyperenum
 * Structured errors carrying a stable code, severity and context
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
  entity?: string; // Entity (game) the error belongs to
  option?: string; // Option identifier
  path?: string; // File path or JSON Pointer inside a loaded file
  value?: unknown; // Offending value
  suggestion?: string;
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

export interface HyperEnumErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all hyperenum errors
 */
export abstract class HyperEnumError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: HyperEnumErrorParams) {
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
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
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
}

/**
 * Option schema errors (unreadable file, structural violations)
 */
export class SchemaError extends HyperEnumError {
  constructor(params: Omit<HyperEnumErrorParams, 'errorCode'> & {
    errorCode?: ErrorCode;
  }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_STRUCTURE,
    });
  }
}

/**
 * Configuration errors: empty selections, bad split counts, bad restrictions.
 * Fatal to the unit of work (one entity or the whole run), never to the process.
 */
export class ConfigError extends HyperEnumError {
  constructor(params: Omit<HyperEnumErrorParams, 'errorCode'> & {
    errorCode?: ErrorCode;
  }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }
}

/**
 * Output sink failures, reported with the underlying I/O cause
 */
export class OutputError extends HyperEnumError {
  constructor(params: Omit<HyperEnumErrorParams, 'errorCode'>) {
    super({ ...params, errorCode: ErrorCode.OUTPUT_FAILED });
  }
}

export function isHyperEnumError(error: unknown): error is HyperEnumError {
  return error instanceof HyperEnumError;
}

/**
 * Wrap an arbitrary thrown value so callers can rely on the error contract
 */
export function toHyperEnumError(error: unknown): HyperEnumError {
  if (isHyperEnumError(error)) return error;
  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return new (class InternalError extends HyperEnumError {})({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    cause,
  });
}
