// SPDX-License-Identifier: GPL-2.0-or-later
// Model + encoder + device session, as seen by a front end

import { OutputReport, type OutputReportState } from '../shared/output-report'
import { encodeOutputReport, parseHexReport, toHex } from '../shared/report-encoder'
import { isReportError, type ReportError } from '../shared/errors'
import type { SendSuccess } from '../shared/types/protocol'
import type { AppConfig } from '../shared/types/app-config'
import { DeviceSession } from './device-session'
import type { HidTransport } from './hid-transport'
import { sendWithRetry } from './send-loop'

export type SendResult = ({ ok: true } & SendSuccess) | { ok: false; error: ReportError }

export interface ReportControllerOptions {
  reportLength: number
  sendAttempts: number
  retryDelayMs: number
}

export class ReportController<H> {
  readonly model: OutputReport
  readonly session: DeviceSession<H>
  private readonly options: ReportControllerOptions
  private hexOverride: Uint8Array | undefined

  constructor(session: DeviceSession<H>, options: ReportControllerOptions, model = new OutputReport()) {
    this.session = session
    this.options = options
    this.model = model
  }

  snapshot(): OutputReportState {
    return this.model.snapshot()
  }

  /** Encode the current model. */
  encode(): Uint8Array {
    return encodeOutputReport(this.model.snapshot(), this.options.reportLength)
  }

  encodeHex(): string {
    return toHex(this.encode())
  }

  /**
   * Replace the outgoing report with raw bytes from a hex string, fitted to
   * the report length. Pass undefined to go back to the model.
   */
  setHexOverride(hex: string | undefined): void {
    this.hexOverride = hex === undefined ? undefined : parseHexReport(hex, this.options.reportLength)
  }

  get hasHexOverride(): boolean {
    return this.hexOverride !== undefined
  }

  /** The bytes send() will write. */
  outgoingReport(): Uint8Array {
    return this.hexOverride ? Uint8Array.from(this.hexOverride) : this.encode()
  }

  connect(): Promise<void> {
    return this.session.runExclusive(() => this.session.open())
  }

  reconnect(): Promise<void> {
    return this.session.runExclusive(() => this.session.reconnect())
  }

  close(): Promise<void> {
    return this.session.runExclusive(() => this.session.close())
  }

  /**
   * Send the outgoing report. Device and encoding failures come back as
   * { ok: false }; anything else is a bug and is rethrown.
   */
  async send(): Promise<SendResult> {
    try {
      const result = await sendWithRetry(this.session, this.outgoingReport(), {
        attempts: this.options.sendAttempts,
        retryDelayMs: this.options.retryDelayMs,
      })
      return { ok: true, ...result }
    } catch (err) {
      if (isReportError(err)) return { ok: false, error: err }
      throw err
    }
  }
}

export function createReportController<H>(config: AppConfig, transport: HidTransport<H>): ReportController<H> {
  const session = new DeviceSession(transport, { vendorId: config.vendorId, productId: config.productId })
  return new ReportController(session, {
    reportLength: config.reportLength,
    sendAttempts: config.sendAttempts,
    retryDelayMs: config.retryDelayMs,
  })
}
