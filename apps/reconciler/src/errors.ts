/**
 * Error Classification and Structured Error Handling
 *
 * Thrown failures are classified into categories that map to operational
 * responses (retry the run, fix configuration, page someone). Recoverable
 * data problems are not thrown; they are collected as ReconcileIssue entries.
 */

import { ZodError } from 'zod'

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'validation' // Input rows, overrides or alias maps failed schema checks
  | 'configuration' // Settings or shipped data files are unusable
  | 'store' // Catalog store reads/writes (files, Postgres)
  | 'external' // Redis or network failures
  | 'timeout' // Operation timeout
  | 'aborted' // Run cancelled before publish
  | 'internal' // Unexpected internal errors

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isOperational: boolean // Expected errors vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

/**
 * Known error codes by category
 */
export const ERROR_CODES = {
  // Validation
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Store
  STORE_ERROR: 'STORE_ERROR',
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  DB_QUERY_ERROR: 'DB_QUERY_ERROR',
  DB_CONSTRAINT_VIOLATION: 'DB_CONSTRAINT_VIOLATION',

  // External
  NETWORK_ERROR: 'NETWORK_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',

  // Timeout
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',

  // Run lifecycle
  RUN_ABORTED: 'RUN_ABORTED',
  LEASE_UNAVAILABLE: 'LEASE_UNAVAILABLE',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ReconcileErrorCode = 'RUN_ABORTED' | 'STORE_ERROR' | 'CONFIGURATION_ERROR' | 'LEASE_UNAVAILABLE'

const RECONCILE_ERROR_CATEGORY: Record<ReconcileErrorCode, ErrorCategory> = {
  RUN_ABORTED: 'aborted',
  STORE_ERROR: 'store',
  CONFIGURATION_ERROR: 'configuration',
  LEASE_UNAVAILABLE: 'external',
}

/**
 * Failure that stops a run. Nothing is published when one escapes reconcile().
 */
export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode
  readonly details?: Record<string, unknown>

  constructor(
    code: ReconcileErrorCode,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'ReconcileError'
    this.code = code
    this.details = options.details
  }
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ReconcileError) {
    return {
      category: RECONCILE_ERROR_CATEGORY[error.code],
      code: error.code,
      message: error.message,
      isOperational: true,
      isRetryable: error.code === 'STORE_ERROR' || error.code === 'LEASE_UNAVAILABLE',
      details: error.details,
      originalError: error,
    }
  }

  // Zod validation errors
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return {
        category: 'aborted',
        code: ERROR_CODES.RUN_ABORTED,
        message: error.message,
        isOperational: true,
        isRetryable: true,
        originalError: error,
      }
    }

    const pgClassified = classifyPgError(error)
    if (pgClassified) {
      return pgClassified
    }

    const networkClassified = classifyNetworkError(error)
    if (networkClassified) {
      return networkClassified
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  // Non-Error thrown values
  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isOperational: false,
    isRetryable: false,
  }
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code')
  return typeof code === 'string' ? code : undefined
}

/**
 * Classify Postgres errors by SQLSTATE class
 */
function classifyPgError(error: Error): ClassifiedError | null {
  const code = errorCode(error)
  if (!code || !/^[0-9A-Z]{5}$/.test(code)) {
    return null
  }

  // Class 08: connection exception; 57P0x: server shutting down
  if (code.startsWith('08') || code.startsWith('57P')) {
    return {
      category: 'store',
      code: ERROR_CODES.DB_CONNECTION_ERROR,
      message: 'Database connection error',
      isOperational: true,
      isRetryable: true,
      details: { sqlState: code },
      originalError: error,
    }
  }

  // Class 23: integrity constraint violation
  if (code.startsWith('23')) {
    return {
      category: 'store',
      code: ERROR_CODES.DB_CONSTRAINT_VIOLATION,
      message: error.message,
      isOperational: true,
      isRetryable: false,
      details: { sqlState: code },
      originalError: error,
    }
  }

  // 40001 serialization failure, 40P01 deadlock
  const retryable = code === '40001' || code === '40P01'
  return {
    category: 'store',
    code: ERROR_CODES.DB_QUERY_ERROR,
    message: error.message,
    isOperational: true,
    isRetryable: retryable,
    details: { sqlState: code },
    originalError: error,
  }
}

/**
 * Classify network and timeout errors
 */
function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = errorCode(error)

  const networkErrorCodes = [
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'ETIMEDOUT',
    'EPIPE',
    'EHOSTUNREACH',
    'ENETUNREACH',
  ]

  if (code && networkErrorCodes.includes(code)) {
    const isTimeout = code === 'ETIMEDOUT'
    return {
      category: isTimeout ? 'timeout' : 'external',
      code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
      message: `Network error: ${code}`,
      isOperational: true,
      isRetryable: true,
      details: { errorCode: code },
      originalError: error,
    }
  }

  if (
    error.message.toLowerCase().includes('timeout') ||
    error.message.toLowerCase().includes('timed out')
  ) {
    return {
      category: 'timeout',
      code: ERROR_CODES.OPERATION_TIMEOUT,
      message: error.message,
      isOperational: true,
      isRetryable: true,
      originalError: error,
    }
  }

  return null
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

/**
 * Wrap a store failure, keeping ReconcileErrors as they are.
 */
export function toStoreError(error: unknown, message: string): ReconcileError {
  if (error instanceof ReconcileError) {
    return error
  }
  return new ReconcileError('STORE_ERROR', message, { cause: error })
}
