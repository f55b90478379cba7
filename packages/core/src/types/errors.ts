/**
 * Error hierarchy for confsmith
 * Provides structured error handling with context and stable codes
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
  path?: string; // JSON Pointer for instance data (e.g., '/servers/0/port')
  schemaPath?: string; // JSON Schema pointer (e.g., '#/properties/port')
  value?: unknown; // Problematic value (may contain secrets)
  valueExcerpt?: string; // Safe excerpt of value
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

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
  schemaPath?: string;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'credentials',
]);

/**
 * Base error class for all confsmith errors
 */
export abstract class ConfsmithError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts secrets found in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
      schemaPath: this.context?.schemaPath,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactValue);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * The schema document itself is malformed, or cannot be compiled
 */
export class SchemaError extends ConfsmithError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context: ErrorContext & { schemaPath: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_STRUCTURE,
      context: params.context,
      cause: params.cause,
    });
  }

  get schemaPath(): string {
    return this.context?.schemaPath ?? '#';
  }
}

/**
 * Individual validation failure details
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  params?: Record<string, unknown>;
}

/**
 * The instance violates one or more schema constraints
 */
export class ValidationError extends ConfsmithError {
  public readonly failures: ValidationFailure[];

  constructor(params: {
    message?: string;
    failures: ValidationFailure[];
    context?: ErrorContext;
  }) {
    const first = params.failures[0];
    super({
      message: params.message ?? summarizeFailures(params.failures),
      errorCode: ErrorCode.CONFIG_VALIDATION_FAILED,
      context: {
        path: first?.path,
        schemaPath: first?.schemaPath,
        failureCount: params.failures.length,
        ...(params.context ?? {}),
      },
    });
    this.failures = params.failures;
  }
}

/**
 * An object-typed additionalProperties schema met a value that is not a mapping
 */
export class ShapeError extends ConfsmithError {
  constructor(params: {
    message: string;
    context: ErrorContext & { path: string; schemaPath: string };
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.SHAPE_MISMATCH,
      context: params.context,
    });
  }
}

/**
 * Configuration and setup errors (bad options, unreadable files)
 */
export class ConfigError extends ConfsmithError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Config text could not be parsed
 */
export class ParseError extends ConfsmithError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { source?: string; line?: number };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Utility functions for error handling
 */
export function isConfsmithError(error: unknown): error is ConfsmithError {
  return error instanceof ConfsmithError;
}

export function createValidationFailure(
  path: string,
  message: string,
  keyword: string,
  schemaPath: string,
  params?: Record<string, unknown>
): ValidationFailure {
  return { path, message, keyword, schemaPath, params };
}

function summarizeFailures(failures: ValidationFailure[]): string {
  const [first] = failures;
  if (!first) return 'Config validation failed';
  const where = first.path === '' ? '(root)' : first.path;
  const more =
    failures.length > 1 ? ` (and ${failures.length - 1} more)` : '';
  return `Config validation failed at ${where}: ${first.message}${more}`;
}
