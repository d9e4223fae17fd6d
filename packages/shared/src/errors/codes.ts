// ============================================
// querymemo Error Codes
// ============================================

/**
 * Centralized error codes.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Remote execution errors
 * - 3xxx: Request validation errors
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,

  // Remote Execution Errors (2xxx)
  REMOTE_UNREACHABLE = 2001,
  REMOTE_TIMEOUT = 2002,
  REMOTE_BAD_REQUEST = 2003,
  REMOTE_QUERY_FAILED = 2004,
  REMOTE_INVALID_RESPONSE = 2005,

  // Request Validation Errors (3xxx)
  QUERY_EMPTY = 3001,
  FORMAT_NOT_FOUND = 3002,
}
