/**
 * QoS Policy Error System
 *
 * Structured errors with unique codes (QOS_V100, QOS_W301, ...), suggestions,
 * categories and error chaining.
 *
 * @example
 * ```typescript
 * import { QosError } from '@qos-policy/core';
 *
 * try {
 *   codec.decode(payload);
 * } catch (error) {
 *   if (QosError.isCategory(error, 'wire')) {
 *     log.warn('Dropping malformed policy', { code: error.code });
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  InvalidArgumentError,
  PolicyDecodeError,
  PolicyValidationError,
  QosError,
  ensureQosError,
  type FieldViolation,
  type QosErrorOptions,
  type SerializedQosError,
} from './qos-error.js';
