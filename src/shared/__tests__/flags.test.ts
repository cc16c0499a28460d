// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect } from 'vitest'
import {
  FlagSet,
  OPERATING_MODE,
  PHYSICAL_EFFECT_CONTROL,
  LIGHT_EFFECT_CONTROL,
  PLAYER_LED,
  parseMuteButtonMode,
  parseLightbarSetup,
} from '../flags'
import {
  OperatingMode,
  PhysicalEffectControl,
  LightEffectControl,
  PlayerLed,
  MuteButtonMode,
  LightbarSetup,
} from '../types/protocol'
import { ReportError } from '../errors'

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    return err instanceof ReportError ? err.code : 'not-a-report-error'
  }
  return undefined
}

describe('flagDomain', () => {
  it('collects named members and skips reverse mappings', () => {
    expect(OPERATING_MODE.members).toEqual([
      ['Ds4Compatibility', 1],
      ['Ds5Mode', 2],
    ])
  })

  it('keeps composite masks as single members', () => {
    expect(PLAYER_LED.members).toEqual([
      ['Center', 0b00100],
      ['Inner', 0b01010],
      ['Outer', 0b10001],
    ])
  })
})

describe('FlagSet', () => {
  it('starts at zero', () => {
    const set = new FlagSet<OperatingMode>(OPERATING_MODE)
    expect(set.raw).toBe(0)
  })

  it('ORs a flag in and clears it again', () => {
    const set = new FlagSet<LightEffectControl>(LIGHT_EFFECT_CONTROL)
    set.toggle(LightEffectControl.LightbarControl, true)
    set.toggle(LightEffectControl.PlayerIndicatorControl, true)
    expect(set.raw).toBe(0b10100)

    set.toggle(LightEffectControl.LightbarControl, false)
    expect(set.raw).toBe(0b10000)
  })

  it('toggles both bits of EnableHaptics together', () => {
    const set = new FlagSet<PhysicalEffectControl>(PHYSICAL_EFFECT_CONTROL)
    set.toggle(PhysicalEffectControl.EnableHaptics, true)
    expect(set.raw).toBe(0x03)
    set.toggle(PhysicalEffectControl.EnableHaptics, false)
    expect(set.raw).toBe(0x00)
  })

  it('round-trips PlayerLed.Inner on then off', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED, PlayerLed.Center)
    const before = set.raw

    set.toggle(PlayerLed.Inner, true)
    expect(set.raw).toBe(0b01110)

    set.toggle(PlayerLed.Inner, false)
    expect(set.raw).toBe(before)
  })

  it('sets both Outer bits as one unit', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED)
    set.toggle(PlayerLed.Outer, true)
    expect(set.raw).toBe(0b10001)
  })

  it('clears a composite flag even when only half of it was set', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED, 0b00010)
    set.toggle(PlayerLed.Inner, false)
    expect(set.raw).toBe(0)
  })

  it('reports a composite flag only when all of its bits are set', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED, 0b00010)
    expect(set.has(PlayerLed.Inner)).toBe(false)

    set.raw = 0b01010
    expect(set.has(PlayerLed.Inner)).toBe(true)
    expect(set.has(PlayerLed.Center)).toBe(false)
  })

  it('rejects toggling a bit that is not a named flag of the domain', () => {
    const set = new FlagSet<number>(PLAYER_LED)
    expect(errorCode(() => set.toggle(0b00010, true))).toBe('INVALID_FLAG_VALUE')
    expect(set.raw).toBe(0)
  })

  it('rejects a flag from another domain', () => {
    const set = new FlagSet<number>(PLAYER_LED)
    expect(errorCode(() => set.toggle(LightEffectControl.ReleaseLeds, true))).toBe('INVALID_FLAG_VALUE')
  })

  it('accepts any byte as a raw value', () => {
    const set = new FlagSet<OperatingMode>(OPERATING_MODE)
    set.raw = 0xff
    expect(set.raw).toBe(0xff)
    expect(set.has(OperatingMode.Ds5Mode)).toBe(true)
  })

  it.each([256, -1, 1.5])('rejects raw value %s', (value) => {
    const set = new FlagSet<OperatingMode>(OPERATING_MODE)
    expect(errorCode(() => {
      set.raw = value
    })).toBe('INVALID_BYTE_VALUE')
    expect(set.raw).toBe(0)
  })

  it('lists fully-set flags in declaration order', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED, 0b11111)
    expect(set.activeNames()).toEqual(['Center', 'Inner', 'Outer'])

    set.raw = 0b00111
    expect(set.activeNames()).toEqual(['Center'])
  })

  it('clones independently', () => {
    const set = new FlagSet<PlayerLed>(PLAYER_LED, PlayerLed.Center)
    const copy = set.clone()
    copy.toggle(PlayerLed.Outer, true)
    expect(set.raw).toBe(PlayerLed.Center)
    expect(copy.raw).toBe(0b10101)
  })
})

describe('enumerations', () => {
  it('accepts every MuteButtonMode', () => {
    expect(parseMuteButtonMode(0)).toBe(MuteButtonMode.Off)
    expect(parseMuteButtonMode(1)).toBe(MuteButtonMode.On)
    expect(parseMuteButtonMode(2)).toBe(MuteButtonMode.Pulse)
  })

  it.each([3, 4, -1, 0.5])('rejects MuteButtonMode %s', (value) => {
    expect(errorCode(() => parseMuteButtonMode(value))).toBe('INVALID_FLAG_VALUE')
  })

  it('accepts both LightbarSetup values', () => {
    expect(parseLightbarSetup(1)).toBe(LightbarSetup.LightOn)
    expect(parseLightbarSetup(2)).toBe(LightbarSetup.LightOut)
  })

  it.each([0, 3, 4])('rejects LightbarSetup %s', (value) => {
    expect(errorCode(() => parseLightbarSetup(value))).toBe('INVALID_FLAG_VALUE')
  })
})
