import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { ReconcileError, classifyError, formatErrorForLog, toStoreError } from '../errors'

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

describe('classifyError', () => {
  it('maps reconcile errors to their category', () => {
    expect(classifyError(new ReconcileError('LEASE_UNAVAILABLE', 'locked'))).toMatchObject({
      category: 'external',
      code: 'LEASE_UNAVAILABLE',
      isRetryable: true,
    })
    expect(classifyError(new ReconcileError('RUN_ABORTED', 'stopped'))).toMatchObject({
      category: 'aborted',
      isRetryable: false,
    })
  })

  it('lists zod issues', () => {
    const result = z.object({ reason: z.string() }).safeParse({})
    expect(result.success).toBe(false)
    if (result.success) return

    expect(classifyError(result.error)).toMatchObject({
      category: 'validation',
      code: 'VALIDATION_FAILED',
      details: { issues: [{ path: 'reason', message: 'Required', code: 'invalid_type' }] },
    })
  })

  it('reads Postgres SQLSTATE classes', () => {
    expect(classifyError(withCode('terminating connection', '57P01'))).toMatchObject({
      code: 'DB_CONNECTION_ERROR',
      isRetryable: true,
    })
    expect(classifyError(withCode('duplicate key', '23505'))).toMatchObject({
      code: 'DB_CONSTRAINT_VIOLATION',
      isRetryable: false,
    })
    expect(classifyError(withCode('deadlock detected', '40P01'))).toMatchObject({
      code: 'DB_QUERY_ERROR',
      isRetryable: true,
    })
  })

  it('recognises network failures and timeouts', () => {
    expect(classifyError(withCode('connect failed', 'ECONNREFUSED')).code).toBe('NETWORK_ERROR')
    expect(classifyError(new Error('Query timed out')).code).toBe('OPERATION_TIMEOUT')
  })

  it('handles thrown non-errors', () => {
    expect(classifyError('nope')).toEqual({
      category: 'internal',
      code: 'UNEXPECTED_ERROR',
      message: 'nope',
      isOperational: false,
      isRetryable: false,
    })
  })
})

describe('formatErrorForLog', () => {
  it('flattens the classification into log fields', () => {
    const error = new ReconcileError('STORE_ERROR', 'write failed', { details: { table: 'staged_views' } })

    expect(formatErrorForLog(classifyError(error))).toMatchObject({
      error_category: 'store',
      error_code: 'STORE_ERROR',
      error_message: 'write failed',
      error_is_retryable: true,
      error_details: { table: 'staged_views' },
      error_name: 'ReconcileError',
    })
  })
})

describe('toStoreError', () => {
  it('wraps foreign errors and keeps reconcile errors', () => {
    const cause = new Error('disk full')
    const wrapped = toStoreError(cause, 'Could not stage run')
    expect(wrapped.code).toBe('STORE_ERROR')
    expect(wrapped.cause).toBe(cause)

    const original = new ReconcileError('RUN_ABORTED', 'stopped')
    expect(toStoreError(original, 'ignored')).toBe(original)
  })
})
