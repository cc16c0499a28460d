// SPDX-License-Identifier: GPL-2.0-or-later

/**
 * Adaptive trigger effects.
 *
 * Wire format: 11 bytes per trigger, [tag, body...] with the body
 * zero-filled to 10 bytes. EffectExtended carries two firmware quirks:
 * the start position is inverted (255 - start) and the frequency byte is
 * halved with a floor of 1.
 */

import {
  TRIGGER_EFFECT_LEN,
  TRIGGER_TAG_NONE,
  TRIGGER_TAG_CONTINUOUS_RESISTANCE,
  TRIGGER_TAG_SECTION_RESISTANCE,
  TRIGGER_TAG_VIBRATING,
  TRIGGER_TAG_EFFECT_EXTENDED,
  TRIGGER_TAG_CALIBRATE,
  EXTENDED_KEEP_EFFECT,
  EXTENDED_MIN_FREQUENCY,
} from './constants/protocol'
import { ReportError, assertByte } from './errors'

// --- Effect types ---

export type TriggerEffect =
  | { readonly type: 'none' }
  | { readonly type: 'continuousResistance'; readonly startPos: number; readonly force: number }
  | { readonly type: 'sectionResistance'; readonly startPos: number; readonly force: number }
  | { readonly type: 'vibrating'; readonly frequency: number; readonly offTime: number }
  | {
      readonly type: 'effectExtended'
      readonly startPos: number
      readonly keepEffect: boolean
      readonly beginForce: number
      readonly middleForce: number
      readonly endForce: number
      readonly frequency: number
    }
  | { readonly type: 'calibrate' }

export type TriggerEffectType = TriggerEffect['type']

export const TRIGGER_EFFECT_TAGS: Readonly<Record<TriggerEffectType, number>> = {
  none: TRIGGER_TAG_NONE,
  continuousResistance: TRIGGER_TAG_CONTINUOUS_RESISTANCE,
  sectionResistance: TRIGGER_TAG_SECTION_RESISTANCE,
  vibrating: TRIGGER_TAG_VIBRATING,
  effectExtended: TRIGGER_TAG_EFFECT_EXTENDED,
  calibrate: TRIGGER_TAG_CALIBRATE,
}

export const NO_TRIGGER_EFFECT: TriggerEffect = Object.freeze({ type: 'none' })

function frozen(effect: TriggerEffect): TriggerEffect {
  return Object.freeze(effect)
}

// --- Validation ---

/**
 * Check every byte parameter of an effect, returning a fresh frozen copy.
 * The model calls this on assignment so encoding never sees a bad value.
 */
export function validateTriggerEffect(effect: TriggerEffect): TriggerEffect {
  switch (effect.type) {
    case 'none':
      return NO_TRIGGER_EFFECT
    case 'calibrate':
      return frozen({ type: 'calibrate' })
    case 'continuousResistance':
      return frozen({
        type: 'continuousResistance',
        startPos: assertByte('startPos', effect.startPos),
        force: assertByte('force', effect.force),
      })
    case 'sectionResistance':
      return frozen({
        type: 'sectionResistance',
        startPos: assertByte('startPos', effect.startPos),
        force: assertByte('force', effect.force),
      })
    case 'vibrating':
      return frozen({
        type: 'vibrating',
        frequency: assertByte('frequency', effect.frequency),
        offTime: assertByte('offTime', effect.offTime),
      })
    case 'effectExtended':
      return frozen({
        type: 'effectExtended',
        startPos: assertByte('startPos', effect.startPos),
        keepEffect: effect.keepEffect,
        beginForce: assertByte('beginForce', effect.beginForce),
        middleForce: assertByte('middleForce', effect.middleForce),
        endForce: assertByte('endForce', effect.endForce),
        frequency: assertByte('frequency', effect.frequency),
      })
  }
}

// --- Encoding ---

function effectBody(effect: TriggerEffect): number[] {
  switch (effect.type) {
    case 'none':
    case 'calibrate':
      return []
    case 'continuousResistance':
    case 'sectionResistance':
      return [effect.startPos, effect.force]
    case 'vibrating':
      return [effect.frequency, effect.offTime]
    case 'effectExtended':
      return [
        0xff - effect.startPos,
        effect.keepEffect ? EXTENDED_KEEP_EFFECT : 0x00,
        0x00,
        effect.beginForce,
        effect.middleForce,
        effect.endForce,
        0x00,
        0x00,
        Math.max(EXTENDED_MIN_FREQUENCY, Math.floor(effect.frequency / 2)),
      ]
  }
}

/** Encode a trigger effect into its 11-byte sub-report. */
export function encodeTriggerEffect(effect: TriggerEffect): Uint8Array {
  const out = new Uint8Array(TRIGGER_EFFECT_LEN)
  out[0] = TRIGGER_EFFECT_TAGS[effect.type]
  out.set(effectBody(effect), 1)
  return out
}

// --- Decoding ---

/**
 * Decode an 11-byte sub-report. EffectExtended frequency comes back doubled,
 * so odd input frequencies lose their low bit.
 */
export function decodeTriggerEffect(data: ArrayLike<number>): TriggerEffect {
  if (data.length !== TRIGGER_EFFECT_LEN) {
    throw new ReportError(
      'INVALID_BYTE_VALUE',
      `Trigger effect must be ${TRIGGER_EFFECT_LEN} bytes, got ${data.length}`,
    )
  }
  const b = (i: number): number => data[i + 1] ?? 0

  switch (data[0]) {
    case TRIGGER_TAG_NONE:
      return { type: 'none' }
    case TRIGGER_TAG_CONTINUOUS_RESISTANCE:
      return { type: 'continuousResistance', startPos: b(0), force: b(1) }
    case TRIGGER_TAG_SECTION_RESISTANCE:
      return { type: 'sectionResistance', startPos: b(0), force: b(1) }
    case TRIGGER_TAG_VIBRATING:
      return { type: 'vibrating', frequency: b(0), offTime: b(1) }
    case TRIGGER_TAG_EFFECT_EXTENDED:
      return {
        type: 'effectExtended',
        startPos: 0xff - b(0),
        keepEffect: b(1) === EXTENDED_KEEP_EFFECT,
        beginForce: b(3),
        middleForce: b(4),
        endForce: b(5),
        frequency: Math.min(0xff, b(8) * 2),
      }
    case TRIGGER_TAG_CALIBRATE:
      return { type: 'calibrate' }
    default:
      throw new ReportError('INVALID_FLAG_VALUE', `Unknown trigger effect tag: ${data[0]}`)
  }
}

// --- Compact string form: "section:240,255" ---

const SPEC_NAMES: ReadonlyMap<string, TriggerEffectType> = new Map<string, TriggerEffectType>([
  ['none', 'none'],
  ['continuous', 'continuousResistance'],
  ['section', 'sectionResistance'],
  ['vibrating', 'vibrating'],
  ['extended', 'effectExtended'],
  ['calibrate', 'calibrate'],
])

const SPEC_ARITY: Readonly<Record<TriggerEffectType, number>> = {
  none: 0,
  continuousResistance: 2,
  sectionResistance: 2,
  vibrating: 2,
  effectExtended: 6,
  calibrate: 0,
}

function parseSpecNumber(raw: string): number {
  const trimmed = raw.trim()
  const value = /^0x[0-9a-f]+$/i.test(trimmed) ? parseInt(trimmed, 16) : Number(trimmed)
  if (trimmed === '' || Number.isNaN(value)) {
    throw new ReportError('INVALID_BYTE_VALUE', `Not a number: "${raw}"`)
  }
  return value
}

function parseSpecBoolean(raw: string): boolean {
  const v = raw.trim().toLowerCase()
  if (v === '1' || v === 'true' || v === 'keep') return true
  if (v === '0' || v === 'false' || v === '') return false
  throw new ReportError('INVALID_FLAG_VALUE', `Not a boolean: "${raw}"`)
}

/**
 * Parse a compact effect description such as "extended:0,keep,10,20,30,100".
 * Every byte parameter is range-checked.
 */
export function parseTriggerEffect(spec: string): TriggerEffect {
  const colon = spec.indexOf(':')
  const rawName = colon < 0 ? spec : spec.slice(0, colon)
  const rawArgs = colon < 0 ? '' : spec.slice(colon + 1)
  const type = SPEC_NAMES.get(rawName.trim().toLowerCase())
  if (!type) {
    throw new ReportError('INVALID_FLAG_VALUE', `Unknown trigger effect: "${rawName}"`)
  }
  const args = rawArgs.trim() === '' ? [] : rawArgs.split(',')
  if (args.length !== SPEC_ARITY[type]) {
    throw new ReportError(
      'INVALID_BYTE_VALUE',
      `${rawName} expects ${SPEC_ARITY[type]} parameters, got ${args.length}`,
    )
  }

  switch (type) {
    case 'none':
      return NO_TRIGGER_EFFECT
    case 'calibrate':
      return frozen({ type: 'calibrate' })
    case 'continuousResistance':
      return validateTriggerEffect({
        type: 'continuousResistance',
        startPos: parseSpecNumber(args[0]),
        force: parseSpecNumber(args[1]),
      })
    case 'sectionResistance':
      return validateTriggerEffect({
        type: 'sectionResistance',
        startPos: parseSpecNumber(args[0]),
        force: parseSpecNumber(args[1]),
      })
    case 'vibrating':
      return validateTriggerEffect({
        type: 'vibrating',
        frequency: parseSpecNumber(args[0]),
        offTime: parseSpecNumber(args[1]),
      })
    case 'effectExtended':
      return validateTriggerEffect({
        type: 'effectExtended',
        startPos: parseSpecNumber(args[0]),
        keepEffect: parseSpecBoolean(args[1]),
        beginForce: parseSpecNumber(args[2]),
        middleForce: parseSpecNumber(args[3]),
        endForce: parseSpecNumber(args[4]),
        frequency: parseSpecNumber(args[5]),
      })
  }
}

/** Inverse of parseTriggerEffect. */
export function formatTriggerEffect(effect: TriggerEffect): string {
  switch (effect.type) {
    case 'none':
      return 'none'
    case 'calibrate':
      return 'calibrate'
    case 'continuousResistance':
      return `continuous:${effect.startPos},${effect.force}`
    case 'sectionResistance':
      return `section:${effect.startPos},${effect.force}`
    case 'vibrating':
      return `vibrating:${effect.frequency},${effect.offTime}`
    case 'effectExtended':
      return `extended:${effect.startPos},${effect.keepEffect ? 1 : 0},${effect.beginForce},${effect.middleForce},${effect.endForce},${effect.frequency}`
  }
}
