/**
 * ArchconfError - Error hierarchy for the archive configuration converter
 *
 * Error types:
 * - UsageError: Bad command line (fatal)
 * - FileAccessError: Input cannot be read or output cannot be written (fatal)
 * - ParseError: Database structure cannot be parsed, e.g. unterminated record (fatal)
 * - PolicyError: An archive annotation value does not parse (error, recoverable)
 * - ConfigError: .archconf/config.yaml is invalid (fatal)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  recordName?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of ArchconfError
 */
export interface ArchconfErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all converter errors.
 */
export abstract class ArchconfError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
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

  toJSON(): ArchconfErrorJSON {
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
 * Usage error - missing or extra command line arguments
 *
 * Severity: fatal (always)
 * Codes: ERR_MISSING_ARGUMENT
 */
export class UsageError extends ArchconfError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable input, unwritable output
 *
 * Severity: fatal (always)
 * Codes: ERR_INPUT_UNREADABLE, ERR_OUTPUT_UNWRITABLE
 */
export class FileAccessError extends ArchconfError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Parse error - record structure that cannot be recovered from
 *
 * Severity: fatal (always)
 * Codes: ERR_UNTERMINATED_RECORD
 */
export class ParseError extends ArchconfError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Sampling policy error - archive annotation value failed the policy grammar.
 * The attribute is skipped and parsing continues, unless strict mode is on.
 *
 * Severity: error (always)
 * Codes: ERR_POLICY_EMPTY, ERR_POLICY_MODE, ERR_POLICY_PERIOD, ERR_POLICY_SYNTAX
 */
export class PolicyError extends ArchconfError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config.yaml values of the wrong type or shape
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends ArchconfError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
