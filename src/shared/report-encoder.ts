// SPDX-License-Identifier: GPL-2.0-or-later

/**
 * Output report serialization.
 *
 * The layout below was found by experiment, not read from documentation.
 * Fields are strictly sequential; the only gaps are the two reserved
 * regions, which are always written as zero. Offsets 0x2c-0x2f are
 * hardware-confirmed and every other offset follows from the widths.
 */

import {
  OUTPUT_REPORT_LEN,
  TRIGGER_EFFECT_LEN,
  RESERVED_A_LEN,
  RESERVED_B_LEN,
} from './constants/protocol'
import type { OutputReportState } from './output-report'
import { encodeTriggerEffect } from './trigger-effect'
import { ReportError } from './errors'

type ByteFieldName = Exclude<keyof OutputReportState, 'rightTriggerEffect' | 'leftTriggerEffect'>

export type ReportFieldName =
  | keyof OutputReportState
  | 'reservedA'
  | 'reservedB'

export interface ReportField {
  name: ReportFieldName
  offset: number
  width: number
}

const FIELD_WIDTHS: ReadonlyArray<readonly [ReportFieldName, number]> = [
  ['operatingMode', 1],
  ['physicalEffectControl', 1],
  ['lightEffectControl', 1],
  ['motorRight', 1],
  ['motorLeft', 1],
  ['reservedA', RESERVED_A_LEN],
  ['muteButtonLed', 1],
  ['powerSaveControl', 1],
  ['rightTriggerEffect', TRIGGER_EFFECT_LEN],
  ['leftTriggerEffect', TRIGGER_EFFECT_LEN],
  ['reservedB', RESERVED_B_LEN],
  ['lightbarControl', 1],
  ['lightbarSetup', 1],
  ['ledBrightness', 1],
  ['playerLeds', 1],
  ['lightbarRed', 1],
  ['lightbarGreen', 1],
  ['lightbarBlue', 1],
]

function buildLayout(): ReportField[] {
  const fields: ReportField[] = []
  let offset = 0
  for (const [name, width] of FIELD_WIDTHS) {
    fields.push({ name, offset, width })
    offset += width
  }
  return fields
}

export const OUTPUT_REPORT_LAYOUT: readonly ReportField[] = Object.freeze(buildLayout())

/** Bytes covered by named fields; the report is zero beyond this. */
export const LAYOUT_LEN = OUTPUT_REPORT_LAYOUT.reduce((end, f) => Math.max(end, f.offset + f.width), 0)

export function fieldOffset(name: ReportFieldName): number {
  const field = OUTPUT_REPORT_LAYOUT.find((f) => f.name === name)
  if (!field) throw new Error(`Unknown report field: ${name}`)
  return field.offset
}

/**
 * Reports shorter than the layout cannot carry every field, so both the
 * encoder and the raw override refuse them.
 */
function assertReportLength(length: number): void {
  if (!Number.isInteger(length) || length < LAYOUT_LEN) {
    throw new RangeError(`Report length must be an integer of at least ${LAYOUT_LEN} bytes, got ${length}`)
  }
}

function byteValue(state: OutputReportState, name: ByteFieldName): number {
  // An unset lightbar setup is written as zero
  return state[name] ?? 0
}

/**
 * Encode a model snapshot into a report of exactly `length` bytes (64 on the
 * reference device). Total over any validated snapshot.
 */
export function encodeOutputReport(
  state: OutputReportState,
  length: number = OUTPUT_REPORT_LEN,
): Uint8Array {
  assertReportLength(length)
  const report = new Uint8Array(length)
  for (const { name, offset } of OUTPUT_REPORT_LAYOUT) {
    switch (name) {
      case 'reservedA':
      case 'reservedB':
        break
      case 'rightTriggerEffect':
      case 'leftTriggerEffect':
        report.set(encodeTriggerEffect(state[name]), offset)
        break
      default:
        report[offset] = byteValue(state, name)
    }
  }
  return report
}

// --- Hex helpers ---

/** Lowercase contiguous hex, two digits per byte. */
export function toHex(data: ArrayLike<number>): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0')).join('')
}

/**
 * Pad data to exactly `length` bytes, truncating or zero-filling as needed.
 */
export function fitToLength(data: ArrayLike<number>, length: number = OUTPUT_REPORT_LEN): Uint8Array {
  const fitted = new Uint8Array(length)
  for (let i = 0; i < Math.min(data.length, length); i++) {
    fitted[i] = data[i]
  }
  return fitted
}

/**
 * Decode a user-edited hex string. Whitespace is ignored and a dangling
 * half byte (mid-keystroke) is dropped.
 */
export function parseHex(hex: string): Uint8Array {
  const compact = hex.replace(/\s+/g, '')
  if (!/^[0-9a-fA-F]*$/.test(compact)) {
    throw new ReportError('INVALID_HEX', `Hex data contains non-hex characters: "${hex}"`)
  }
  const whole = compact.length - (compact.length % 2)
  const out = new Uint8Array(whole / 2)
  for (let i = 0; i < whole; i += 2) {
    out[i / 2] = parseInt(compact.slice(i, i + 2), 16)
  }
  return out
}

/** Parse a raw override and fit it to the report length. */
export function parseHexReport(hex: string, length: number = OUTPUT_REPORT_LEN): Uint8Array {
  assertReportLength(length)
  return fitToLength(parseHex(hex), length)
}

/** Byte count of a hex string, as "n" or "n/n+1" while a byte is half typed. */
export function describeHexLength(hex: string): string {
  const digits = hex.replace(/\s+/g, '').length
  const whole = Math.floor(digits / 2)
  return digits % 2 === 0 ? String(whole) : `${whole}/${whole + 1}`
}

// --- Offset table ---

/**
 * Render the layout one field per line as "<offset>  <width> <name>",
 * e.g. "2c  01 playerLeds".
 */
export function getOffsetTable(): string {
  return OUTPUT_REPORT_LAYOUT.map(
    (f) => `${f.offset.toString(16).padStart(2, '0')}  ${String(f.width).padStart(2, '0')} ${f.name}`,
  ).join('\n')
}
