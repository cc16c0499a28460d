// SPDX-License-Identifier: GPL-2.0-or-later
// Command-line front end: build a report from flags, print or send it

import { parseArgs } from 'node:util'
import { LightEffectControl, PhysicalEffectControl, type DeviceInfo } from '../shared/types/protocol'
import type { AppConfig } from '../shared/types/app-config'
import type { OutputReport } from '../shared/output-report'
import { parseTriggerEffect, type TriggerEffect } from '../shared/trigger-effect'
import { getOffsetTable, toHex } from '../shared/report-encoder'
import { ReportError, isReportError, toError } from '../shared/errors'
import type { HidTransport } from './hid-transport'
import { createReportController } from './report-controller'
import { log } from './logger'

export const USAGE = `Usage: dualsense-output [options]

  --list                    list matching HID devices
  --offsets                 print the output report layout
  --print                   print the encoded report as hex, do not send
  --hex <hex>               send raw bytes instead of the encoded model
  --right-trigger <effect>  e.g. section:240,255 (enables right trigger effects)
  --left-trigger <effect>   e.g. vibrating:40,10 (enables left trigger effects)
  --lightbar <r,g,b>        lightbar colour (enables lightbar control)
  --player-leds <byte>      player indicator bits (enables player indicator control)
  --rumble <left,right>     motor intensities (enables haptics)
  -h, --help                show this help`

export interface CliOptions {
  help: boolean
  list: boolean
  offsets: boolean
  print: boolean
  hex?: string
  rightTrigger?: TriggerEffect
  leftTrigger?: TriggerEffect
  lightbar?: [number, number, number]
  playerLeds?: number
  rumble?: [number, number]
}

function parseNumberList(name: string, raw: string, count: number): number[] {
  const parts = raw.split(',').map((p) => p.trim())
  const values = parts.map((p) => Number(p))
  if (parts.length !== count || parts.some((p) => p === '') || values.some((n) => Number.isNaN(n))) {
    throw new ReportError('INVALID_BYTE_VALUE', `--${name} expects ${count} comma-separated numbers, got "${raw}"`)
  }
  return values
}

export function parseCliArgs(args: string[]): CliOptions {
  const { values } = parseArgs({
    args,
    strict: true,
    options: {
      help: { type: 'boolean', short: 'h' },
      list: { type: 'boolean' },
      offsets: { type: 'boolean' },
      print: { type: 'boolean' },
      hex: { type: 'string' },
      'right-trigger': { type: 'string' },
      'left-trigger': { type: 'string' },
      lightbar: { type: 'string' },
      'player-leds': { type: 'string' },
      rumble: { type: 'string' },
    },
  })

  const options: CliOptions = {
    help: values.help ?? false,
    list: values.list ?? false,
    offsets: values.offsets ?? false,
    print: values.print ?? false,
    hex: values.hex,
  }
  if (values['right-trigger'] !== undefined) options.rightTrigger = parseTriggerEffect(values['right-trigger'])
  if (values['left-trigger'] !== undefined) options.leftTrigger = parseTriggerEffect(values['left-trigger'])
  if (values.lightbar !== undefined) {
    const [r, g, b] = parseNumberList('lightbar', values.lightbar, 3)
    options.lightbar = [r, g, b]
  }
  if (values['player-leds'] !== undefined) {
    const [leds] = parseNumberList('player-leds', values['player-leds'], 1)
    options.playerLeds = leds
  }
  if (values.rumble !== undefined) {
    const [left, right] = parseNumberList('rumble', values.rumble, 2)
    options.rumble = [left, right]
  }
  return options
}

/** Copy CLI settings into the model, switching on the matching control flags. */
export function applyCliOptions(model: OutputReport, options: CliOptions): void {
  if (options.rightTrigger) {
    model.rightTriggerEffect = options.rightTrigger
    model.physicalEffectControl.toggle(PhysicalEffectControl.TriggerEffectsRight, true)
  }
  if (options.leftTrigger) {
    model.leftTriggerEffect = options.leftTrigger
    model.physicalEffectControl.toggle(PhysicalEffectControl.TriggerEffectsLeft, true)
  }
  if (options.lightbar) {
    model.setLightbarColor(...options.lightbar)
    model.lightEffectControl.toggle(LightEffectControl.LightbarControl, true)
  }
  if (options.playerLeds !== undefined) {
    model.playerLeds.raw = options.playerLeds
    model.lightEffectControl.toggle(LightEffectControl.PlayerIndicatorControl, true)
  }
  if (options.rumble) {
    model.setRumble(...options.rumble)
    model.physicalEffectControl.toggle(PhysicalEffectControl.EnableHaptics, true)
  }
}

export interface CliDeps<H> {
  config: AppConfig
  transport: HidTransport<H>
  listDevices: (vendorId: number, productId: number) => Promise<DeviceInfo[]>
  out: (line: string) => void
}

/** Run one invocation; resolves to the process exit code. */
export async function runCli<H>(args: string[], deps: CliDeps<H>): Promise<number> {
  const { config, out } = deps
  let options: CliOptions
  try {
    options = parseCliArgs(args)
  } catch (err) {
    out(err instanceof Error ? err.message : String(err))
    out(USAGE)
    return 2
  }

  if (options.help) {
    out(USAGE)
    return 0
  }
  if (options.offsets) {
    out(getOffsetTable())
    return 0
  }
  if (options.list) {
    const devices = await deps.listDevices(config.vendorId, config.productId)
    for (const d of devices) {
      out(`${d.path}  ${d.productName || '(unnamed)'}  ${d.serialNumber}`)
    }
    if (devices.length === 0) out('No matching devices')
    return 0
  }

  const controller = createReportController(config, deps.transport)
  try {
    applyCliOptions(controller.model, options)
    if (options.hex !== undefined) controller.setHexOverride(options.hex)
  } catch (err) {
    if (!isReportError(err)) throw err
    out(`${err.code}: ${err.message}`)
    return 2
  }

  if (options.print) {
    out(toHex(controller.outgoingReport()))
    return 0
  }

  try {
    await controller.connect()
  } catch (err) {
    if (!isReportError(err)) throw err
    log('error', err.message)
    out(`${err.code}: ${err.message}`)
    return 1
  }

  try {
    const result = await controller.send()
    if (result.ok) {
      out(`Wrote ${result.bytesWritten} bytes`)
      return 0
    }
    log('error', result.error.message)
    out(`${result.error.code}: ${result.error.message}`)
    return 1
  } finally {
    // Close failures do not change the exit code
    try {
      await controller.close()
    } catch (err) {
      log('warn', `Ignoring close failure: ${toError(err).message}`)
    }
  }
}
