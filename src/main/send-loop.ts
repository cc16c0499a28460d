// SPDX-License-Identifier: GPL-2.0-or-later
// Bounded-retry report send with reconnect between attempts

import { SEND_ATTEMPTS, SEND_RETRY_DELAY_MS } from '../shared/constants/protocol'
import { ReportError, SendExhaustedError, isReportError } from '../shared/errors'
import type { SendSuccess } from '../shared/types/protocol'
import type { DeviceSession } from './device-session'
import { log } from './logger'

export interface SendOptions {
  attempts?: number
  retryDelayMs?: number
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Write a report, reconnecting after each I/O failure except the last.
 *
 * - Success reports the byte count of the write that went through.
 * - A reconnect that fails aborts immediately with RECONNECT_FAILED.
 * - After `attempts` failed writes the session is disconnected and
 *   SEND_EXHAUSTED is raised.
 * - Errors other than IO_ERROR propagate untouched.
 */
export function sendWithRetry<H>(
  session: DeviceSession<H>,
  report: Uint8Array,
  options: SendOptions = {},
): Promise<SendSuccess> {
  const attempts = options.attempts ?? SEND_ATTEMPTS
  const retryDelayMs = options.retryDelayMs ?? SEND_RETRY_DELAY_MS
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError('attempts must be a positive integer')
  }

  return session.runExclusive(async () => {
    if (!session.isOpen) {
      throw new ReportError('NOT_CONNECTED', 'No HID device is open')
    }

    let reconnects = 0
    let lastError: ReportError | undefined
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const bytesWritten = await session.write(report)
        if (attempt > 1) log('info', `Report sent on attempt ${attempt}/${attempts}`)
        return { bytesWritten, attempts: attempt }
      } catch (err) {
        if (!isReportError(err, 'IO_ERROR')) throw err
        lastError = err
        log('warn', `Report write failed (attempt ${attempt}/${attempts}): ${err.message}`)
      }

      if (attempt < attempts) {
        if (retryDelayMs > 0) await delay(retryDelayMs)
        reconnects++
        await session.reconnect()
      }
    }

    await session.disconnect()
    log('error', `Giving up after ${attempts} attempts and ${reconnects} reconnects`)
    throw new SendExhaustedError(attempts, reconnects, lastError)
  })
}
