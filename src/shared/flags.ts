// SPDX-License-Identifier: GPL-2.0-or-later
// Named-bit flag sets over a single report byte

import {
  OperatingMode,
  PhysicalEffectControl,
  LightEffectControl,
  LightbarControl,
  PowerSaveControl,
  PlayerLed,
  MuteButtonMode,
  LightbarSetup,
} from './types/protocol'
import { ReportError, assertByte } from './errors'

/** A named bitmask domain built from a numeric enum. */
export interface FlagDomain<F extends number> {
  readonly name: string
  readonly members: ReadonlyArray<readonly [name: string, flag: F]>
}

/** Build a domain from a numeric enum object (reverse-mapping keys are skipped). */
export function flagDomain<F extends number>(
  name: string,
  enumObject: Record<string, string | F>,
): FlagDomain<F> {
  const members: Array<readonly [string, F]> = []
  for (const [key, value] of Object.entries(enumObject)) {
    if (typeof value === 'number') members.push([key, value])
  }
  return { name, members }
}

export const OPERATING_MODE = flagDomain<OperatingMode>('OperatingMode', OperatingMode)
export const PHYSICAL_EFFECT_CONTROL = flagDomain<PhysicalEffectControl>(
  'PhysicalEffectControl',
  PhysicalEffectControl,
)
export const LIGHT_EFFECT_CONTROL = flagDomain<LightEffectControl>('LightEffectControl', LightEffectControl)
export const LIGHTBAR_CONTROL = flagDomain<LightbarControl>('LightbarControl', LightbarControl)
export const POWER_SAVE_CONTROL = flagDomain<PowerSaveControl>('PowerSaveControl', PowerSaveControl)
export const PLAYER_LED = flagDomain<PlayerLed>('PlayerLed', PlayerLed)

/**
 * Mutable byte with named-flag toggles.
 *
 * Toggling only ever applies a whole named flag, so composite flags such as
 * PlayerLed.Inner set or clear both of their bits together. The raw byte can
 * still be written directly: the hardware accepts any combination.
 */
export class FlagSet<F extends number> {
  readonly domain: FlagDomain<F>
  private value: number

  constructor(domain: FlagDomain<F>, raw = 0) {
    this.domain = domain
    this.value = assertByte(domain.name, raw)
  }

  get raw(): number {
    return this.value
  }

  set raw(raw: number) {
    this.value = assertByte(this.domain.name, raw)
  }

  /** True when every bit of the flag is set. */
  has(flag: F): boolean {
    const bits = this.requireMember(flag)
    return (this.value & bits) === bits
  }

  toggle(flag: F, on: boolean): void {
    const bits = this.requireMember(flag)
    this.value = on ? this.value | bits : this.value & ~bits & 0xff
  }

  /** Names of the flags that are fully set, in declaration order. */
  activeNames(): string[] {
    return this.domain.members
      .filter(([, bits]) => (this.value & bits) === bits)
      .map(([name]) => name)
  }

  clone(): FlagSet<F> {
    return new FlagSet(this.domain, this.value)
  }

  private requireMember(flag: F): number {
    if (!this.domain.members.some(([, bits]) => bits === flag)) {
      throw new ReportError(
        'INVALID_FLAG_VALUE',
        `${flag} is not a named ${this.domain.name} flag`,
      )
    }
    return flag
  }
}

// --- Enumerations ---

const MUTE_BUTTON_MODES: ReadonlySet<number> = new Set([
  MuteButtonMode.Off,
  MuteButtonMode.On,
  MuteButtonMode.Pulse,
])

const LIGHTBAR_SETUPS: ReadonlySet<number> = new Set([LightbarSetup.LightOn, LightbarSetup.LightOut])

function isMuteButtonMode(value: number): value is MuteButtonMode {
  return MUTE_BUTTON_MODES.has(value)
}

function isLightbarSetup(value: number): value is LightbarSetup {
  return LIGHTBAR_SETUPS.has(value)
}

export function parseMuteButtonMode(value: number): MuteButtonMode {
  if (!isMuteButtonMode(value)) {
    throw new ReportError('INVALID_FLAG_VALUE', `Invalid MuteButtonMode: ${value}`)
  }
  return value
}

export function parseLightbarSetup(value: number): LightbarSetup {
  if (!isLightbarSetup(value)) {
    throw new ReportError('INVALID_FLAG_VALUE', `Invalid LightbarSetup: ${value}`)
  }
  return value
}
