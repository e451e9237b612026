/**
 * Error Code Infrastructure
 * Stable error codes and severities shared by the engine and its facade.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Path Errors (E100–E199)
  INVALID_COMBINATOR = 'E100',
  INVALID_PATH_FILTER = 'E101',
  INVALID_PATH_SUBTREE = 'E102',

  // Filter Errors (E200–E299)
  RESERVED_CONTEXT_KEY = 'E200',
  INVALID_FILTER_OUTCOME = 'E201',
  INVALID_EVENT_SCHEMA = 'E210',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
}

export const SEVERITY_BY_CODE = {
  [ErrorCode.INVALID_COMBINATOR]: 'error',
  [ErrorCode.INVALID_PATH_FILTER]: 'error',
  [ErrorCode.INVALID_PATH_SUBTREE]: 'error',
  [ErrorCode.RESERVED_CONTEXT_KEY]: 'warn',
  [ErrorCode.INVALID_FILTER_OUTCOME]: 'error',
  [ErrorCode.INVALID_EVENT_SCHEMA]: 'error',
  [ErrorCode.CONFIGURATION_ERROR]: 'error',
} satisfies Record<ErrorCode, Severity>;

export function getDefaultSeverity(code: ErrorCode): Severity {
  return SEVERITY_BY_CODE[code];
}
