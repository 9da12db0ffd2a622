/**
 * HandlerKitError - Error hierarchy for handlerkit
 *
 * All errors extend the native JavaScript Error class, so callers can catch
 * them as plain Errors and still branch on `code`.
 *
 * Error types:
 * - SchemaError: ill-formed schema, detected before or during synthesis (error)
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - ConformanceError: object does not satisfy the capability interface (error)
 * - DispatchError: unknown operation, wrong arity, unknown handler (error)
 * - InvariantViolationError: capability index cache is corrupt (fatal)
 */

import type { SourceLocation } from '@handlerkit/types';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  source?: SourceLocation;
  system?: string;
  handler?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of HandlerKitError
 */
export interface HandlerKitErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all handlerkit errors.
 */
export abstract class HandlerKitError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): HandlerKitErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Schema error - invalid identifiers, duplicate names, malformed documents
 *
 * Severity: error
 * Codes: ERR_INVALID_IDENTIFIER, ERR_DUPLICATE_HANDLER, ERR_DUPLICATE_FUNCTION,
 *        ERR_DUPLICATE_PARAMETER, ERR_DUPLICATE_DISPATCH, ERR_UNKNOWN_HANDLER,
 *        ERR_NAME_COLLISION, ERR_BINDING_CONFLICT, ERR_SCHEMA_DOCUMENT
 */
export class SchemaError extends HandlerKitError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config.yaml validation
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends HandlerKitError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Conformance error - an added object lacks capability accessors
 *
 * Severity: error
 * Codes: ERR_NOT_CAPABILITY_OBJECT
 */
export class ConformanceError extends HandlerKitError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Dispatch error - call does not match any synthesized operation
 *
 * Severity: error
 * Codes: ERR_UNKNOWN_OPERATION, ERR_ARITY_MISMATCH, ERR_UNKNOWN_HANDLER
 */
export class DispatchError extends HandlerKitError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Invariant violation - a cached index points at an object that no longer
 * reports the handler. Never recoverable: it means the registration-time
 * capability facts are wrong.
 *
 * Severity: fatal (always)
 * Codes: ERR_CAPABILITY_CACHE_VIOLATION
 */
export class InvariantViolationError extends HandlerKitError {
  readonly code = 'ERR_CAPABILITY_CACHE_VIOLATION';
  readonly severity = 'fatal' as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'Object capabilities must stay fixed for the lifetime of the registry');
  }
}
