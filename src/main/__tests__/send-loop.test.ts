// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createFakeTransport, ioError } from './helpers/fake-transport'
import { ReportError, SendExhaustedError } from '../../shared/errors'

// --- Mock logger ---

vi.mock('../logger', () => ({
  log: vi.fn(),
  logHidPacket: vi.fn(),
}))

// --- Import after mocking ---

import { DeviceSession } from '../device-session'
import { sendWithRetry } from '../send-loop'
import { log } from '../logger'

const REPORT = Uint8Array.from([0x02, 0x0c, 0x04])

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected the promise to reject')
}

describe('sendWithRetry', () => {
  let fake: ReturnType<typeof createFakeTransport>
  let session: DeviceSession<number>

  beforeEach(async () => {
    vi.clearAllMocks()
    fake = createFakeTransport()
    session = new DeviceSession(fake.transport, { vendorId: 0x054c, productId: 0x0ce6 })
    await session.open()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('writes once when the first attempt succeeds', async () => {
    const result = await sendWithRetry(session, REPORT)

    expect(result).toEqual({ bytesWritten: 3, attempts: 1 })
    expect(fake.write).toHaveBeenCalledTimes(1)
    expect(fake.write).toHaveBeenCalledWith(1, REPORT)
    expect(fake.open).toHaveBeenCalledTimes(1)
  })

  it('reconnects after each failure and reports the successful write', async () => {
    fake.write
      .mockRejectedValueOnce(ioError())
      .mockRejectedValueOnce(ioError())
      .mockResolvedValueOnce(64)

    const result = await sendWithRetry(session, REPORT)

    expect(result).toEqual({ bytesWritten: 64, attempts: 3 })
    expect(fake.write).toHaveBeenCalledTimes(3)
    // initial open + two reconnects
    expect(fake.open).toHaveBeenCalledTimes(3)
    expect(fake.close.mock.calls).toEqual([[1], [2]])
    // third write goes to the third handle
    expect(fake.write.mock.calls[2][0]).toBe(3)
    expect(session.isOpen).toBe(true)
  })

  it('gives up after three failed writes and two reconnects', async () => {
    fake.write.mockRejectedValue(ioError())

    const err = await rejection(sendWithRetry(session, REPORT))

    expect(err).toBeInstanceOf(SendExhaustedError)
    if (!(err instanceof SendExhaustedError)) return
    expect(err.code).toBe('SEND_EXHAUSTED')
    expect(err.message).toBe('Report send failed after 3 attempts')
    expect(err.attempts).toBe(3)
    expect(err.reconnects).toBe(2)
    expect(err.recommendedAction).toBe('reconnect')
    expect(err.cause).toBeInstanceOf(ReportError)

    expect(fake.write).toHaveBeenCalledTimes(3)
    expect(fake.open).toHaveBeenCalledTimes(3)
    // two reconnects plus the final disconnect
    expect(fake.close).toHaveBeenCalledTimes(3)
    expect(session.state).toBe('disconnected')
    expect(log).toHaveBeenCalledWith('error', 'Giving up after 3 attempts and 2 reconnects')
  })

  it('honours a custom attempt count', async () => {
    fake.write.mockRejectedValue(ioError())

    const err = await rejection(sendWithRetry(session, REPORT, { attempts: 1 }))

    expect(err).toBeInstanceOf(SendExhaustedError)
    if (!(err instanceof SendExhaustedError)) return
    expect(err.reconnects).toBe(0)
    expect(fake.open).toHaveBeenCalledTimes(1)
  })

  it('rejects a non-positive attempt count synchronously', () => {
    expect(() => sendWithRetry(session, REPORT, { attempts: 0 })).toThrow(RangeError)
    expect(fake.write).not.toHaveBeenCalled()
  })

  it('aborts when a reconnect fails', async () => {
    fake.write.mockRejectedValueOnce(ioError())
    fake.open.mockRejectedValueOnce(new ReportError('DEVICE_NOT_FOUND', 'No HID device found for 0x054c:0x0ce6'))

    const err = await rejection(sendWithRetry(session, REPORT))

    expect(err).toBeInstanceOf(ReportError)
    if (!(err instanceof ReportError)) return
    expect(err.code).toBe('RECONNECT_FAILED')
    expect(fake.write).toHaveBeenCalledTimes(1)
    expect(session.state).toBe('disconnected')
  })

  it('does not retry errors other than I/O failures', async () => {
    fake.write.mockRejectedValueOnce(new Error('boom'))

    await expect(sendWithRetry(session, REPORT)).rejects.toThrow('boom')
    expect(fake.write).toHaveBeenCalledTimes(1)
    expect(fake.open).toHaveBeenCalledTimes(1)
  })

  it('refuses to send without an open device', async () => {
    await session.close()

    const err = await rejection(sendWithRetry(session, REPORT))

    expect(err).toBeInstanceOf(ReportError)
    expect(err instanceof ReportError && err.code).toBe('NOT_CONNECTED')
    expect(fake.write).not.toHaveBeenCalled()
  })

  it('needs an explicit reconnect after exhaustion', async () => {
    fake.write.mockRejectedValueOnce(ioError()).mockRejectedValueOnce(ioError()).mockRejectedValueOnce(ioError())
    await expect(sendWithRetry(session, REPORT)).rejects.toBeInstanceOf(SendExhaustedError)

    const err = await rejection(sendWithRetry(session, REPORT))
    expect(err instanceof ReportError && err.code).toBe('NOT_CONNECTED')

    await session.reconnect()
    await expect(sendWithRetry(session, REPORT)).resolves.toEqual({ bytesWritten: 3, attempts: 1 })
  })

  it('waits between attempts when a retry delay is set', async () => {
    vi.useFakeTimers()
    fake.write.mockRejectedValueOnce(ioError())

    const pending = sendWithRetry(session, REPORT, { attempts: 2, retryDelayMs: 100 })

    await vi.advanceTimersByTimeAsync(99)
    expect(fake.write).toHaveBeenCalledTimes(1)
    expect(fake.open).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(1)
    await expect(pending).resolves.toEqual({ bytesWritten: 3, attempts: 2 })
    expect(fake.open).toHaveBeenCalledTimes(2)
  })

  it('serializes concurrent sends on one session', async () => {
    let releaseFirst: (bytes: number) => void = () => {}
    fake.write.mockImplementationOnce(
      () =>
        new Promise<number>((resolve) => {
          releaseFirst = resolve
        }),
    )

    const first = sendWithRetry(session, REPORT)
    const second = sendWithRetry(session, Uint8Array.from([0xff]))

    await vi.waitFor(() => expect(fake.write).toHaveBeenCalledTimes(1))
    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(fake.write).toHaveBeenCalledTimes(1)

    releaseFirst(3)
    await expect(first).resolves.toEqual({ bytesWritten: 3, attempts: 1 })
    await expect(second).resolves.toEqual({ bytesWritten: 1, attempts: 1 })
    expect(fake.write.mock.calls.map(([, data]) => Array.from(data))).toEqual([[0x02, 0x0c, 0x04], [0xff]])
  })
})
