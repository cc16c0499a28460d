// SPDX-License-Identifier: GPL-2.0-or-later
// Structured errors for report construction and device I/O

export type ReportErrorCode =
  | 'INVALID_FLAG_VALUE'
  | 'INVALID_BYTE_VALUE'
  | 'INVALID_HEX'
  | 'DEVICE_NOT_FOUND'
  | 'IO_ERROR'
  | 'NOT_CONNECTED'
  | 'RECONNECT_FAILED'
  | 'SEND_EXHAUSTED'

export type RecoveryAction = 'none' | 'retry' | 'reconnect' | 'check-device'

export const RECOVERY_ACTIONS: Readonly<Record<ReportErrorCode, RecoveryAction>> = {
  INVALID_FLAG_VALUE: 'none',
  INVALID_BYTE_VALUE: 'none',
  INVALID_HEX: 'none',
  DEVICE_NOT_FOUND: 'check-device',
  IO_ERROR: 'retry',
  NOT_CONNECTED: 'reconnect',
  RECONNECT_FAILED: 'check-device',
  SEND_EXHAUSTED: 'reconnect',
}

export class ReportError extends Error {
  readonly code: ReportErrorCode
  readonly recommendedAction: RecoveryAction
  readonly cause?: unknown

  constructor(code: ReportErrorCode, message: string, cause?: unknown) {
    super(message)
    this.name = 'ReportError'
    this.code = code
    this.recommendedAction = RECOVERY_ACTIONS[code]
    this.cause = cause
  }
}

export class SendExhaustedError extends ReportError {
  readonly attempts: number
  readonly reconnects: number

  constructor(attempts: number, reconnects: number, cause?: unknown) {
    super('SEND_EXHAUSTED', `Report send failed after ${attempts} attempts`, cause)
    this.name = 'SendExhaustedError'
    this.attempts = attempts
    this.reconnects = reconnects
  }
}

export function isReportError(err: unknown, code?: ReportErrorCode): err is ReportError {
  return err instanceof ReportError && (code === undefined || err.code === code)
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Validate that a value fits in one unsigned byte.
 * Throws INVALID_BYTE_VALUE naming the field otherwise.
 */
export function assertByte(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ReportError('INVALID_BYTE_VALUE', `${field} must be an integer 0-255, got ${value}`)
  }
  return value
}
