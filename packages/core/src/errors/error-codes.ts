/**
 * QoS Policy Error Codes
 *
 * Error codes are structured as QOS_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - A: Argument errors (A200-A299)
 * - W: Wire format errors (W301-W399)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  QOS_V100: {
    code: 'QOS_V100',
    message: 'Policy validation failed',
    suggestion: 'Check the listed violations and correct the offending fields before building.',
  },
  QOS_V101: {
    code: 'QOS_V101',
    message: 'Policy input does not match the expected shape',
    suggestion: 'Ensure every field has the expected type. Numeric fields must be integers.',
  },

  // Argument errors (A200-A299)
  QOS_A200: {
    code: 'QOS_A200',
    message: 'Invalid argument',
    suggestion: 'A required argument was missing or malformed.',
  },
  QOS_A201: {
    code: 'QOS_A201',
    message: 'Invalid hardware address',
    suggestion: 'Hardware addresses are 6 bytes, written as "aa:bb:cc:dd:ee:ff".',
  },

  // Wire format errors (W301-W399)
  QOS_W301: {
    code: 'QOS_W301',
    message: 'Unexpected end of payload',
    suggestion: 'The payload was truncated. Make sure the whole message was received.',
  },
  QOS_W302: {
    code: 'QOS_W302',
    message: 'Unexpected trailing bytes after policy',
    suggestion: 'Use decodeList() for payloads holding several policies, or enable allowTrailingBytes.',
  },
  QOS_W303: {
    code: 'QOS_W303',
    message: 'Message exceeds maximum size',
    suggestion: 'Raise maxMessageSize in the codec configuration or split the payload.',
  },
  QOS_W304: {
    code: 'QOS_W304',
    message: 'Invalid presence flag or array length',
    suggestion: 'The payload was produced by an incompatible encoder or is corrupted.',
  },
  QOS_W305: {
    code: 'QOS_W305',
    message: 'Value does not fit a signed 32-bit integer',
    suggestion: 'Every encoded field must be an integer in -2147483648..2147483647.',
  },

  // Internal errors (X900-X999)
  QOS_X900: {
    code: 'QOS_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'argument' | 'wire' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(4);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'A':
      return 'argument';
    case 'W':
      return 'wire';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
