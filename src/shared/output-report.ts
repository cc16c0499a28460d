// SPDX-License-Identifier: GPL-2.0-or-later
// Output report model: every controllable field, validated on mutation

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
import {
  FlagSet,
  OPERATING_MODE,
  PHYSICAL_EFFECT_CONTROL,
  LIGHT_EFFECT_CONTROL,
  LIGHTBAR_CONTROL,
  POWER_SAVE_CONTROL,
  PLAYER_LED,
  parseMuteButtonMode,
  parseLightbarSetup,
} from './flags'
import { NO_TRIGGER_EFFECT, validateTriggerEffect, type TriggerEffect } from './trigger-effect'
import { assertByte } from './errors'

/** Plain, immutable view of a model; the encoder's only input. */
export interface OutputReportState {
  operatingMode: number
  physicalEffectControl: number
  lightEffectControl: number
  motorRight: number
  motorLeft: number
  muteButtonLed: MuteButtonMode
  powerSaveControl: number
  rightTriggerEffect: TriggerEffect
  leftTriggerEffect: TriggerEffect
  lightbarControl: number
  /** Unset leaves the setup byte at zero. */
  lightbarSetup?: LightbarSetup
  ledBrightness: number
  playerLeds: number
  lightbarRed: number
  lightbarGreen: number
  lightbarBlue: number
}

export const ZERO_OUTPUT_REPORT: Readonly<OutputReportState> = Object.freeze({
  operatingMode: 0,
  physicalEffectControl: 0,
  lightEffectControl: 0,
  motorRight: 0,
  motorLeft: 0,
  muteButtonLed: MuteButtonMode.Off,
  powerSaveControl: 0,
  rightTriggerEffect: NO_TRIGGER_EFFECT,
  leftTriggerEffect: NO_TRIGGER_EFFECT,
  lightbarControl: 0,
  ledBrightness: 0,
  playerLeds: 0,
  lightbarRed: 0,
  lightbarGreen: 0,
  lightbarBlue: 0,
})

export const DEFAULT_OUTPUT_REPORT: Readonly<OutputReportState> = Object.freeze({
  ...ZERO_OUTPUT_REPORT,
  lightbarSetup: LightbarSetup.LightOn,
})

export class OutputReport {
  readonly operatingMode = new FlagSet<OperatingMode>(OPERATING_MODE)
  readonly physicalEffectControl = new FlagSet<PhysicalEffectControl>(PHYSICAL_EFFECT_CONTROL)
  readonly lightEffectControl = new FlagSet<LightEffectControl>(LIGHT_EFFECT_CONTROL)
  readonly powerSaveControl = new FlagSet<PowerSaveControl>(POWER_SAVE_CONTROL)
  readonly lightbarControl = new FlagSet<LightbarControl>(LIGHTBAR_CONTROL)
  readonly playerLeds = new FlagSet<PlayerLed>(PLAYER_LED)

  private _motorRight = 0
  private _motorLeft = 0
  private _muteButtonLed = MuteButtonMode.Off
  private _rightTriggerEffect: TriggerEffect = NO_TRIGGER_EFFECT
  private _leftTriggerEffect: TriggerEffect = NO_TRIGGER_EFFECT
  private _lightbarSetup: LightbarSetup | undefined = LightbarSetup.LightOn
  private _ledBrightness = 0
  private _lightbarRed = 0
  private _lightbarGreen = 0
  private _lightbarBlue = 0

  constructor(initial?: Partial<OutputReportState>) {
    if (initial) this.update(initial)
  }

  get motorRight(): number {
    return this._motorRight
  }

  set motorRight(value: number) {
    this._motorRight = assertByte('motorRight', value)
  }

  get motorLeft(): number {
    return this._motorLeft
  }

  set motorLeft(value: number) {
    this._motorLeft = assertByte('motorLeft', value)
  }

  get muteButtonLed(): MuteButtonMode {
    return this._muteButtonLed
  }

  set muteButtonLed(value: number) {
    this._muteButtonLed = parseMuteButtonMode(value)
  }

  get rightTriggerEffect(): TriggerEffect {
    return this._rightTriggerEffect
  }

  set rightTriggerEffect(effect: TriggerEffect) {
    this._rightTriggerEffect = validateTriggerEffect(effect)
  }

  get leftTriggerEffect(): TriggerEffect {
    return this._leftTriggerEffect
  }

  set leftTriggerEffect(effect: TriggerEffect) {
    this._leftTriggerEffect = validateTriggerEffect(effect)
  }

  get lightbarSetup(): LightbarSetup | undefined {
    return this._lightbarSetup
  }

  set lightbarSetup(value: number | undefined) {
    this._lightbarSetup = value === undefined ? undefined : parseLightbarSetup(value)
  }

  get ledBrightness(): number {
    return this._ledBrightness
  }

  set ledBrightness(value: number) {
    this._ledBrightness = assertByte('ledBrightness', value)
  }

  get lightbarRed(): number {
    return this._lightbarRed
  }

  set lightbarRed(value: number) {
    this._lightbarRed = assertByte('lightbarRed', value)
  }

  get lightbarGreen(): number {
    return this._lightbarGreen
  }

  set lightbarGreen(value: number) {
    this._lightbarGreen = assertByte('lightbarGreen', value)
  }

  get lightbarBlue(): number {
    return this._lightbarBlue
  }

  set lightbarBlue(value: number) {
    this._lightbarBlue = assertByte('lightbarBlue', value)
  }

  setLightbarColor(red: number, green: number, blue: number): void {
    this.update({ lightbarRed: red, lightbarGreen: green, lightbarBlue: blue })
  }

  setRumble(left: number, right: number): void {
    this.update({ motorLeft: left, motorRight: right })
  }

  /**
   * Apply several fields at once. Everything is validated on a scratch copy
   * first, so a rejected value leaves the model untouched.
   */
  update(patch: Partial<OutputReportState>): void {
    this.clone().assign(patch)
    this.assign(patch)
  }

  snapshot(): OutputReportState {
    const state: OutputReportState = {
      operatingMode: this.operatingMode.raw,
      physicalEffectControl: this.physicalEffectControl.raw,
      lightEffectControl: this.lightEffectControl.raw,
      motorRight: this._motorRight,
      motorLeft: this._motorLeft,
      muteButtonLed: this._muteButtonLed,
      powerSaveControl: this.powerSaveControl.raw,
      rightTriggerEffect: this._rightTriggerEffect,
      leftTriggerEffect: this._leftTriggerEffect,
      lightbarControl: this.lightbarControl.raw,
      ledBrightness: this._ledBrightness,
      playerLeds: this.playerLeds.raw,
      lightbarRed: this._lightbarRed,
      lightbarGreen: this._lightbarGreen,
      lightbarBlue: this._lightbarBlue,
    }
    if (this._lightbarSetup !== undefined) state.lightbarSetup = this._lightbarSetup
    return Object.freeze(state)
  }

  clone(): OutputReport {
    const copy = new OutputReport()
    copy.assign({ ...this.snapshot(), lightbarSetup: this._lightbarSetup })
    return copy
  }

  /** Reset to the default model (lightbar on, everything else zero). */
  reset(): void {
    this.assign(DEFAULT_OUTPUT_REPORT)
  }

  private assign(patch: Partial<OutputReportState>): void {
    if (patch.operatingMode !== undefined) this.operatingMode.raw = patch.operatingMode
    if (patch.physicalEffectControl !== undefined) this.physicalEffectControl.raw = patch.physicalEffectControl
    if (patch.lightEffectControl !== undefined) this.lightEffectControl.raw = patch.lightEffectControl
    if (patch.motorRight !== undefined) this.motorRight = patch.motorRight
    if (patch.motorLeft !== undefined) this.motorLeft = patch.motorLeft
    if (patch.muteButtonLed !== undefined) this.muteButtonLed = patch.muteButtonLed
    if (patch.powerSaveControl !== undefined) this.powerSaveControl.raw = patch.powerSaveControl
    if (patch.rightTriggerEffect !== undefined) this.rightTriggerEffect = patch.rightTriggerEffect
    if (patch.leftTriggerEffect !== undefined) this.leftTriggerEffect = patch.leftTriggerEffect
    if (patch.lightbarControl !== undefined) this.lightbarControl.raw = patch.lightbarControl
    if ('lightbarSetup' in patch) this.lightbarSetup = patch.lightbarSetup
    if (patch.ledBrightness !== undefined) this.ledBrightness = patch.ledBrightness
    if (patch.playerLeds !== undefined) this.playerLeds.raw = patch.playerLeds
    if (patch.lightbarRed !== undefined) this.lightbarRed = patch.lightbarRed
    if (patch.lightbarGreen !== undefined) this.lightbarGreen = patch.lightbarGreen
    if (patch.lightbarBlue !== undefined) this.lightbarBlue = patch.lightbarBlue
  }
}
