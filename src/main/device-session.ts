// SPDX-License-Identifier: GPL-2.0-or-later
// Owned, reconnectable device handle.

import { ReportError, toError } from '../shared/errors'
import { formatDeviceId, type DeviceIdentity, type HidTransport } from './hid-transport'
import { log, logHidPacket } from './logger'

export type SessionState = 'closed' | 'open' | 'disconnected'

/**
 * Holds at most one open handle. The handle is dropped before any reopen,
 * so a failed reconnect never leaves a stale handle behind.
 *
 * open/reconnect/write/disconnect mutate the handle and must run inside
 * runExclusive when sessions are shared.
 */
export class DeviceSession<H> {
  readonly identity: DeviceIdentity
  private readonly transport: HidTransport<H>
  private handle: H | null = null
  private _state: SessionState = 'closed'
  private mutex: Promise<void> = Promise.resolve()

  constructor(transport: HidTransport<H>, identity: DeviceIdentity) {
    this.transport = transport
    this.identity = identity
  }

  get state(): SessionState {
    return this._state
  }

  get isOpen(): boolean {
    return this._state === 'open'
  }

  /**
   * Serialize fn against every other exclusive call on this session.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.mutex
    let release: () => void = () => {}
    this.mutex = new Promise<void>((resolve) => {
      release = resolve
    })
    return prev.then(async () => {
      try {
        return await fn()
      } finally {
        release()
      }
    })
  }

  async open(): Promise<void> {
    if (this.handle !== null) return
    const { vendorId, productId } = this.identity
    this.handle = await this.transport.open(vendorId, productId)
    this._state = 'open'
    log('info', `Opened HID device ${formatDeviceId(this.identity)}`)
  }

  /**
   * Close then reopen. A reopen failure leaves the session disconnected and
   * raises RECONNECT_FAILED.
   */
  async reconnect(): Promise<void> {
    await this.releaseHandle()
    log('info', `Reconnecting HID device ${formatDeviceId(this.identity)}`)
    try {
      await this.open()
    } catch (err) {
      this._state = 'disconnected'
      log('error', `Reconnect failed: ${toError(err).message}`)
      throw new ReportError(
        'RECONNECT_FAILED',
        `Reconnect to ${formatDeviceId(this.identity)} failed: ${toError(err).message}`,
        err,
      )
    }
  }

  async write(data: Uint8Array): Promise<number> {
    if (this.handle === null || this._state !== 'open') {
      throw new ReportError('NOT_CONNECTED', `HID device ${formatDeviceId(this.identity)} is not open`)
    }
    logHidPacket('TX', data)
    return this.transport.write(this.handle, data)
  }

  /** Drop the handle and stay disconnected until the next reconnect. */
  async disconnect(): Promise<void> {
    await this.releaseHandle()
    this._state = 'disconnected'
  }

  /** Close the handle; close errors propagate after the handle is released. */
  async close(): Promise<void> {
    const handle = this.handle
    this.handle = null
    this._state = 'closed'
    if (handle !== null) {
      await this.transport.close(handle)
    }
  }

  // Closing a handle whose device has gone away usually fails; the handle
  // is dropped either way.
  private async releaseHandle(): Promise<void> {
    const handle = this.handle
    this.handle = null
    if (handle === null) return
    try {
      await this.transport.close(handle)
    } catch (err) {
      log('warn', `Ignoring close failure on ${formatDeviceId(this.identity)}: ${toError(err).message}`)
    }
  }
}
