/**
 * QosError - Error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a QosError
 */
export interface QosErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a QosError
 */
export interface SerializedQosError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedQosError | { name: string; message: string; stack?: string };
}

/**
 * Base error for the QoS policy packages.
 *
 * @example
 * ```typescript
 * try {
 *   new PolicyBuilder(300, DIRECTION_UPLINK).setDscp(1).build();
 * } catch (error) {
 *   if (QosError.isCode(error, 'QOS_V100')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class QosError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: QosErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'QosError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a QosError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): QosError {
    return new QosError({ code, context });
  }

  /**
   * Wrap an existing error with a QosError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): QosError {
    return new QosError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isQosError(error: unknown): error is QosError {
    return error instanceof QosError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): error is QosError {
    return QosError.isQosError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): error is QosError {
    return QosError.isQosError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedQosError {
    const result: SerializedQosError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (QosError.isQosError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A single violated rule
 */
export interface FieldViolation {
  /** Identifier of the violated rule (e.g. 'dscp-range') */
  rule: string;
  /** Field the rule applies to */
  field: string;
  /** The offending value */
  value: unknown;
  /** Human-readable description */
  message: string;
}

/**
 * Raised when a policy breaks one or more invariants.
 */
export class PolicyValidationError extends QosError {
  /** Every violated rule, in evaluation order */
  readonly violations: readonly FieldViolation[];

  constructor(
    violations: readonly FieldViolation[],
    context?: Record<string, unknown>,
    code: 'QOS_V100' | 'QOS_V101' = 'QOS_V100'
  ) {
    const summary = violations.map((v) => `${v.field}: ${v.message}`).join('; ');

    super({
      code,
      message: `Provided parameters are invalid: ${summary}`,
      context: {
        ...context,
        violations: violations.map((v) => v.rule),
      },
    });

    this.name = 'PolicyValidationError';
    this.violations = violations;
  }
}

/**
 * Raised when a required argument is absent or malformed
 */
export class InvalidArgumentError extends QosError {
  /** Name of the offending argument */
  readonly argument: string;

  constructor(
    argument: string,
    message: string,
    code: 'QOS_A200' | 'QOS_A201' = 'QOS_A200',
    context?: Record<string, unknown>
  ) {
    super({ code, message, context: { ...context, argument } });
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/**
 * Raised when a wire payload cannot be decoded
 */
export class PolicyDecodeError extends QosError {
  /** Byte offset at which decoding failed */
  readonly offset: number;

  constructor(code: ErrorCode, message: string, offset: number, context?: Record<string, unknown>) {
    super({ code, message, context: { ...context, offset } });
    this.name = 'PolicyDecodeError';
    this.offset = offset;
  }
}

/**
 * Helper function to ensure errors are QosErrors
 */
export function ensureQosError(error: unknown, defaultCode: ErrorCode = 'QOS_X900'): QosError {
  if (QosError.isQosError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return QosError.wrap(error, defaultCode);
  }

  return new QosError({
    code: defaultCode,
    message: String(error),
  });
}
